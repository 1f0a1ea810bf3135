/**
 * RconMock: the server side of an RCON v2 conversation, in process.
 *
 * Decodes the frames a client writes, answers ServerConnect with the XOR key,
 * Login with a token, and ChangeMap / ServerInformation from a small game
 * state. Replies can be scripted per command name to inject failures.
 */

import { encodeFrame, xorTransform } from '../server/rcon';
import { RCON_COMMANDS, RCON_CONSTANTS, isJsonObject } from '../shared/types';
import type { JsonValue, RconFrame } from '../shared/types';
import type {
  CapturedRconRequest,
  RconAction,
  RconMockOptions,
  RconReply,
} from './types/rcon-exchange-types';

interface ResolvedReply {
  statusCode: number;
  statusMessage: string;
  content: JsonValue;
}

export const DEFAULT_MOCK_OPTIONS: Required<Omit<RconMockOptions, 'password'>> = {
  xorKey: 'ABCD',
  authToken: 'tok123',
  serverName: 'Mock HLL Server',
  mapName: 'stmereeglise_warfare',
  camelCase: false,
};

export class RconMock {
  private readonly key: Buffer;
  private readonly authToken: string;
  private readonly password: string | undefined;
  private readonly camelCase: boolean;
  private serverName: string;
  private mapName: string;

  private keyed = false;
  private requests: CapturedRconRequest[] = [];
  private scripts: Map<string, RconReply[]> = new Map();

  constructor(options: RconMockOptions = {}) {
    const resolved = { ...DEFAULT_MOCK_OPTIONS, ...options };
    this.key = Buffer.from(resolved.xorKey, 'latin1');
    this.authToken = resolved.authToken;
    this.password = options.password;
    this.camelCase = resolved.camelCase;
    this.serverName = resolved.serverName;
    this.mapName = resolved.mapName;
  }

  /** Queue a reply for the next request named `name` */
  script(name: string, reply: RconReply): this {
    const queue = this.scripts.get(name) ?? [];
    queue.push(reply);
    this.scripts.set(name, queue);
    return this;
  }

  handleFrame(frame: RconFrame): RconAction {
    const encrypted = this.keyed;
    const plain = encrypted ? xorTransform(frame.body, this.key) : frame.body;
    const request = this.decodeRequest(frame.messageId, encrypted, plain.toString('utf8'));
    this.requests.push(request);

    if (request.name === RCON_COMMANDS.SERVER_CONNECT) {
      this.keyed = true;
    }

    const scripted = this.scripts.get(request.name)?.shift();
    if (scripted?.drop) {
      return { kind: 'drop' };
    }
    if (scripted?.close) {
      return { kind: 'close' };
    }

    let reply: ResolvedReply;
    if (scripted?.statusCode !== undefined) {
      reply = {
        statusCode: scripted.statusCode,
        statusMessage: scripted.statusMessage ?? '',
        content: scripted.content ?? '',
      };
    } else {
      reply = this.defaultReply(request);
      if (scripted?.content !== undefined) {
        reply.content = scripted.content;
      }
    }

    let body = scripted?.rawBody !== undefined
      ? Buffer.from(scripted.rawBody, 'utf8')
      : this.encodeReply(request.name, reply);

    // The ServerConnect answer precedes the key, so it is never XOR'd
    if (encrypted) {
      body = xorTransform(body, this.key);
    }

    return { kind: 'reply', frame: encodeFrame(scripted?.messageId ?? request.messageId, body) };
  }

  // === Test inspection methods ===

  getRequests(): CapturedRconRequest[] {
    return [...this.requests];
  }

  getRequestNames(): string[] {
    return this.requests.map(request => request.name);
  }

  getMapName(): string {
    return this.mapName;
  }

  reset(): void {
    this.keyed = false;
    this.requests = [];
    this.scripts.clear();
  }

  // === Internal helpers ===

  private decodeRequest(messageId: number, encrypted: boolean, plaintext: string): CapturedRconRequest {
    let payload: unknown = null;
    try {
      payload = JSON.parse(plaintext);
    } catch {
      payload = null;
    }
    const envelope = isJsonObject(payload) ? payload : {};

    return {
      messageId,
      encrypted,
      plaintext,
      authToken: typeof envelope.AuthToken === 'string' ? envelope.AuthToken : '',
      version: typeof envelope.Version === 'number' ? envelope.Version : 0,
      name: typeof envelope.Name === 'string' ? envelope.Name : '',
      contentBody: envelope.ContentBody ?? '',
    };
  }

  private defaultReply(request: CapturedRconRequest): ResolvedReply {
    switch (request.name) {
      case RCON_COMMANDS.SERVER_CONNECT:
        return this.ok(this.key.toString('base64'));

      case RCON_COMMANDS.LOGIN:
        if (this.password !== undefined && request.contentBody !== this.password) {
          return { statusCode: 401, statusMessage: 'Invalid password', content: '' };
        }
        return this.ok(this.authToken);
    }

    if (request.authToken !== this.authToken) {
      return { statusCode: 401, statusMessage: 'Unauthorized', content: '' };
    }

    switch (request.name) {
      case RCON_COMMANDS.CHANGE_MAP:
        this.mapName = String(request.contentBody);
        return this.ok('');

      case RCON_COMMANDS.SERVER_INFORMATION: {
        const section = isJsonObject(request.contentBody) ? request.contentBody.Name : undefined;
        if (section !== 'session') {
          return { statusCode: 400, statusMessage: `Unknown information section ${String(section)}`, content: '' };
        }
        // Real servers serialize the section into the ContentBody string
        return this.ok(JSON.stringify({
          ServerName: this.serverName,
          MapName: this.mapName,
          PlayerCount: 0,
        }));
      }

      default:
        return { statusCode: 400, statusMessage: `Unknown command ${request.name}`, content: '' };
    }
  }

  private ok(content: JsonValue): ResolvedReply {
    return { statusCode: RCON_CONSTANTS.STATUS_OK, statusMessage: 'OK', content };
  }

  private encodeReply(name: string, reply: ResolvedReply): Buffer {
    const envelope = this.camelCase
      ? {
          statusCode: reply.statusCode,
          statusMessage: reply.statusMessage,
          version: RCON_CONSTANTS.PROTOCOL_VERSION,
          name,
          contentBody: reply.content,
        }
      : {
          StatusCode: reply.statusCode,
          StatusMessage: reply.statusMessage,
          Version: RCON_CONSTANTS.PROTOCOL_VERSION,
          Name: name,
          ContentBody: reply.content,
        };
    return Buffer.from(JSON.stringify(envelope), 'utf8');
  }
}
