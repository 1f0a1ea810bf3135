/**
 * RCON exchange types for the mock server.
 * Model what a Hell Let Loose server receives and how it answers.
 */

import type { JsonValue } from '../../shared/types';

/** A request as the mock server decoded it */
export interface CapturedRconRequest {
  messageId: number;
  /** True when the body arrived XOR'd */
  encrypted: boolean;
  /** Decoded JSON text, byte-exact as the client sent it */
  plaintext: string;
  authToken: string;
  version: number;
  name: string;
  contentBody: JsonValue;
}

/**
 * A scripted answer for the next request with a given command name.
 * Omitted fields fall back to the mock's default handling.
 */
export interface RconReply {
  statusCode?: number;
  statusMessage?: string;
  content?: JsonValue;
  /** Answer under a different message id (desync) */
  messageId?: number;
  /** Send these bytes as the (pre-XOR) body instead of an envelope */
  rawBody?: string;
  /** Never answer */
  drop?: boolean;
  /** Close the connection instead of answering */
  close?: boolean;
}

/** Initial state of a mock server */
export interface RconMockOptions {
  /** Raw XOR key bytes, sent base64-encoded by ServerConnect */
  xorKey?: string;
  authToken?: string;
  /** Expected Login password; any password is accepted when unset */
  password?: string;
  serverName?: string;
  mapName?: string;
  /** Answer with camelCase envelope fields (statusCode, contentBody, ...) */
  camelCase?: boolean;
}

/** What the mock server does with one request */
export type RconAction =
  | { kind: 'reply'; frame: Buffer }
  | { kind: 'drop' }
  | { kind: 'close' };
