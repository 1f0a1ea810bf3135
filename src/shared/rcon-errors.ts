/**
 * RCON error taxonomy
 *
 * Every failure raised by the codec, the session or the command facade is an
 * RconError tagged with a kind. Callers that degrade (the server registry)
 * switch on the kind instead of catching everything.
 */

export type RconErrorKind = 'connection' | 'io' | 'closed' | 'protocol' | 'command';

export class RconError extends Error {
  constructor(
    public readonly kind: RconErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'RconError';
  }
}

/** Socket could not be opened (refused, unreachable, connect timeout) */
export class ConnectionError extends RconError {
  constructor(
    public readonly host: string,
    public readonly port: number,
    reason: string,
  ) {
    super('connection', `Failed to connect to ${host}:${port}: ${reason}`);
    this.name = 'ConnectionError';
  }
}

/** Read or write failed on an established connection */
export class IOError extends RconError {
  constructor(message: string, kind: 'io' | 'closed' = 'io') {
    super(kind, message);
    this.name = 'IOError';
  }
}

/** Peer closed the stream while a frame was still expected */
export class ConnectionClosedError extends IOError {
  constructor(message = 'Connection closed by remote host') {
    super(message, 'closed');
    this.name = 'ConnectionClosedError';
  }
}

/** Structural violation; the session must be discarded */
export class ProtocolError extends RconError {
  constructor(message: string) {
    super('protocol', message);
    this.name = 'ProtocolError';
  }
}

/** Well-formed exchange answered with a non-200 status */
export class CommandError extends RconError {
  constructor(
    public readonly command: string,
    public readonly statusCode: number,
    public readonly statusMessage: string,
  ) {
    super('command', `${command} failed with status ${statusCode}: ${statusMessage}`);
    this.name = 'CommandError';
  }
}

/** Missing or invalid environment configuration */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** CRCON HTTP API failure */
export class CrconHttpError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'CrconHttpError';
  }
}

export function isRconError(err: unknown): err is RconError {
  return err instanceof RconError;
}

/**
 * Human-readable label for a failure kind
 */
export function describeErrorKind(kind: RconErrorKind): string {
  switch (kind) {
    case 'connection':
      return 'Connection failed';
    case 'io':
      return 'I/O error';
    case 'closed':
      return 'Connection closed';
    case 'protocol':
      return 'Protocol error';
    case 'command':
      return 'Command rejected';
  }
}
