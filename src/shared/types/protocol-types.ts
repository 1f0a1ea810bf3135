/**
 * RCON Protocol Constants & Primitives
 * Low-level definitions for the version 2 remote-console protocol
 */

export const RCON_CONSTANTS = {
  /** Two little-endian uint32 fields: message id, body length */
  HEADER_SIZE: 8,
  PROTOCOL_VERSION: 2,
  STATUS_OK: 200,
  /** Message ids wrap modulo 2^32 */
  MESSAGE_ID_MODULUS: 0x1_0000_0000,
} as const;

export const RCON_COMMANDS = {
  SERVER_CONNECT: 'ServerConnect',
  LOGIN: 'Login',
  CHANGE_MAP: 'ChangeMap',
  SERVER_INFORMATION: 'ServerInformation',
} as const;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** ContentBody of a request */
export type RconContent = string | JsonObject | JsonValue[];

export interface RconFrame {
  messageId: number;
  length: number;
  body: Buffer;
}

/** Request envelope, serialized in this exact key order */
export interface RconRequestEnvelope {
  AuthToken: string;
  Version: number;
  Name: string;
  ContentBody: RconContent;
}

/** Decoded response envelope */
export interface RconResponse {
  messageId: number;
  statusCode: number;
  statusMessage: string;
  name: string;
  content: JsonValue;
}

/**
 * Session phases for the connection state machine
 */
export enum SessionPhase {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTED = 'CONNECTED',
  KEYED = 'KEYED',
  AUTHENTICATED = 'AUTHENTICATED',
  FAILED = 'FAILED',
  CLOSED = 'CLOSED',
}

/**
 * Allowed phase transitions. FAILED marks a session invalidated by a
 * protocol or I/O fault; it can only be closed.
 */
export const SESSION_TRANSITIONS: Record<SessionPhase, readonly SessionPhase[]> = {
  [SessionPhase.DISCONNECTED]: [SessionPhase.CONNECTED, SessionPhase.CLOSED],
  [SessionPhase.CONNECTED]: [SessionPhase.KEYED, SessionPhase.FAILED, SessionPhase.CLOSED],
  [SessionPhase.KEYED]: [SessionPhase.AUTHENTICATED, SessionPhase.FAILED, SessionPhase.CLOSED],
  [SessionPhase.AUTHENTICATED]: [SessionPhase.FAILED, SessionPhase.CLOSED],
  [SessionPhase.FAILED]: [SessionPhase.CLOSED],
  [SessionPhase.CLOSED]: [],
};

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
