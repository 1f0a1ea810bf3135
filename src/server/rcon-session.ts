import * as net from 'net';
import {
  RCON_COMMANDS,
  RCON_CONSTANTS,
  RconContent,
  RconResponse,
  JsonValue,
  ServerEndpoint,
  SessionPhase,
  SESSION_TRANSITIONS,
} from '../shared/types';
import {
  CommandError,
  ConnectionError,
  IOError,
  ProtocolError,
  RconError,
} from '../shared/rcon-errors';
import { config } from '../shared/config';
import { createLogger } from '../shared/logger';
import { FrameReader } from './frame-reader';
import {
  decodeResponse,
  encodeEnvelope,
  encodeFrame,
  nextMessageId,
  xorTransform,
} from './rcon';

const logger = createLogger('RconSession');

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export interface RconSessionOptions {
  /** Connect timeout and idle deadline of every read/write (ms) */
  timeoutMs?: number;
}

interface ExchangeOptions {
  encrypt: boolean;
  authenticated: boolean;
}

/**
 * Decode the base64 XOR key returned by ServerConnect.
 */
export function decodeXorKey(content: JsonValue): Buffer {
  if (typeof content !== 'string' || content.length === 0) {
    throw new ProtocolError('ServerConnect did not return an XOR key');
  }

  const encoded = content.trim();
  if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    throw new ProtocolError('Failed to decode XOR key from ServerConnect');
  }

  const key = Buffer.from(encoded, 'base64');
  if (key.length === 0) {
    throw new ProtocolError('Received empty XOR key from server');
  }
  return key;
}

/**
 * One RCON connection: connect, handshake, authenticated exchanges, close.
 *
 * DISCONNECTED → CONNECTED → KEYED → AUTHENTICATED → CLOSED
 * Any protocol or I/O fault moves the session to FAILED; only close() is
 * accepted from there.
 */
export class RconSession {
  private socket: net.Socket | null = null;
  private reader: FrameReader | null = null;
  private phase: SessionPhase = SessionPhase.DISCONNECTED;
  private xorKey: Buffer = Buffer.alloc(0);
  private authToken: string = '';
  private messageId: number = 0;
  private readonly timeoutMs: number;

  constructor(
    private readonly endpoint: ServerEndpoint,
    options: RconSessionOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? config.rcon.timeoutMs;
  }

  getPhase(): SessionPhase {
    return this.phase;
  }

  /**
   * Open the connection and run the handshake (key exchange, then login).
   */
  async connect(): Promise<void> {
    if (this.phase !== SessionPhase.DISCONNECTED) {
      throw new ProtocolError(`Cannot connect a session in phase ${this.phase}`);
    }

    const socket = await this.openSocket();
    this.socket = socket;
    this.reader = new FrameReader(socket, this.timeoutMs);
    this.transition(SessionPhase.CONNECTED);
    logger.debug(`Connected to ${this.describeEndpoint()}`);

    await this.performHandshake();
  }

  /**
   * Send an authenticated command and return its decoded content.
   */
  async sendCommand(name: string, content: RconContent = ''): Promise<JsonValue> {
    if (this.phase !== SessionPhase.AUTHENTICATED) {
      throw new ProtocolError(
        `Cannot send ${name} in phase ${this.phase}; the handshake has not completed`
      );
    }

    const response = await this.exchange(name, content, { encrypt: true, authenticated: true });
    return response.content;
  }

  /**
   * Release the socket and wipe key material. Safe to call repeatedly and on
   * a session that failed mid-handshake.
   */
  close(): void {
    if (this.phase === SessionPhase.CLOSED) {
      return;
    }

    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    if (this.reader) {
      this.reader.dispose();
      this.reader = null;
    }

    this.xorKey.fill(0);
    this.xorKey = Buffer.alloc(0);
    this.authToken = '';
    this.transition(SessionPhase.CLOSED);
    logger.debug(`Closed session to ${this.describeEndpoint()}`);
  }

  private openSocket(): Promise<net.Socket> {
    const { host, port } = this.endpoint;

    return new Promise((resolve, reject) => {
      const socket = new net.Socket();

      const cleanup = () => {
        socket.removeListener('error', onError);
        socket.removeListener('timeout', onTimeout);
      };
      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(new ConnectionError(host, port, err.message));
      };
      const onTimeout = () => {
        cleanup();
        socket.destroy();
        reject(new ConnectionError(host, port, `timed out after ${this.timeoutMs}ms`));
      };

      socket.setTimeout(this.timeoutMs);
      socket.once('error', onError);
      socket.once('timeout', onTimeout);

      socket.connect(port, host, () => {
        cleanup();
        resolve(socket);
      });
    });
  }

  private async performHandshake(): Promise<void> {
    // ServerConnect is the only exchange sent and answered in cleartext
    const connectResponse = await this.exchange(RCON_COMMANDS.SERVER_CONNECT, '', {
      encrypt: false,
      authenticated: false,
    });
    this.setXorKey(connectResponse.content);

    // Login is XOR'd but carries no auth token yet
    const loginResponse = await this.exchange(RCON_COMMANDS.LOGIN, this.endpoint.password, {
      encrypt: true,
      authenticated: false,
    });
    this.setAuthToken(loginResponse.content);
  }

  private setXorKey(content: JsonValue): void {
    try {
      this.xorKey = decodeXorKey(content);
    } catch (err: unknown) {
      this.invalidate();
      throw err;
    }
    this.transition(SessionPhase.KEYED);
  }

  private setAuthToken(content: JsonValue): void {
    const token = typeof content === 'string' ? content.trim() : '';
    if (!token) {
      this.invalidate();
      throw new ProtocolError('Login did not return an auth token');
    }
    this.authToken = token;
    this.transition(SessionPhase.AUTHENTICATED);
  }

  private async exchange(
    name: string,
    content: RconContent,
    options: ExchangeOptions,
  ): Promise<RconResponse> {
    const { socket, reader } = this;
    if (!socket || !reader) {
      throw new ProtocolError('Connection has been closed');
    }

    let body = encodeEnvelope({
      AuthToken: options.authenticated ? this.authToken : '',
      Version: RCON_CONSTANTS.PROTOCOL_VERSION,
      Name: name,
      ContentBody: content,
    });

    let response: RconResponse;
    try {
      if (options.encrypt) {
        body = xorTransform(body, this.xorKey);
      }

      this.messageId = nextMessageId(this.messageId);
      const messageId = this.messageId;
      await this.write(socket, encodeFrame(messageId, body));

      const frame = await reader.readFrame();
      if (frame.messageId !== messageId) {
        throw new ProtocolError(
          `Response ID ${frame.messageId} did not match request ID ${messageId} for ${name} (desync)`
        );
      }

      const plain = options.encrypt ? xorTransform(frame.body, this.xorKey) : frame.body;
      response = decodeResponse(frame.messageId, plain);
    } catch (err: unknown) {
      if (err instanceof RconError) {
        this.invalidate();
      }
      throw err;
    }

    if (response.statusCode !== RCON_CONSTANTS.STATUS_OK) {
      throw new CommandError(name, response.statusCode, response.statusMessage);
    }

    logger.debug(`${name} → ${response.statusCode}`, { server: this.describeEndpoint() });
    return response;
  }

  private write(socket: net.Socket, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.write(data, (err?: Error | null) => {
        if (err) {
          reject(new IOError(`Failed to send data to server: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  private transition(next: SessionPhase): void {
    if (!SESSION_TRANSITIONS[this.phase].includes(next)) {
      throw new ProtocolError(`Illegal session transition ${this.phase} → ${next}`);
    }
    this.phase = next;
  }

  private invalidate(): void {
    if (this.phase !== SessionPhase.FAILED && this.phase !== SessionPhase.CLOSED) {
      this.transition(SessionPhase.FAILED);
    }
  }

  private describeEndpoint(): string {
    return `${this.endpoint.name} (${this.endpoint.host}:${this.endpoint.port})`;
  }
}

/**
 * Scoped acquisition: connect, run `fn`, close on every exit path
 * (including a failed connect or handshake).
 */
export async function withRconSession<T>(
  endpoint: ServerEndpoint,
  options: RconSessionOptions,
  fn: (session: RconSession) => Promise<T>,
): Promise<T> {
  const session = new RconSession(endpoint, options);
  try {
    await session.connect();
    return await fn(session);
  } finally {
    session.close();
  }
}
