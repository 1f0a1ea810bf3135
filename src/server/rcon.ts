import {
  RCON_CONSTANTS,
  RconFrame,
  RconRequestEnvelope,
  RconResponse,
  JsonValue,
  isJsonObject,
} from '../shared/types';
import { ProtocolError } from '../shared/rcon-errors';
import { toErrorMessage } from '../shared/error-utils';

/**
 * RCON Wire Codec
 * ---------------
 * Frame := uint32 messageId | uint32 bodyLength | byte[bodyLength] body
 * All integers little-endian. Bodies are UTF-8 JSON, XOR'd with the session
 * key for every frame after the first handshake exchange.
 */

export function encodeFrame(messageId: number, body: Buffer): Buffer {
  const header = Buffer.alloc(RCON_CONSTANTS.HEADER_SIZE);
  header.writeUInt32LE(messageId >>> 0, 0);
  header.writeUInt32LE(body.length, 4);
  return Buffer.concat([header, body]);
}

/**
 * Decode one frame from the start of `buffer`.
 * Returns null until the header and the whole body are available.
 */
export function decodeFrame(buffer: Buffer): { frame: RconFrame; bytesConsumed: number } | null {
  if (buffer.length < RCON_CONSTANTS.HEADER_SIZE) {
    return null;
  }

  const messageId = buffer.readUInt32LE(0);
  const length = buffer.readUInt32LE(4);
  const end = RCON_CONSTANTS.HEADER_SIZE + length;

  if (buffer.length < end) {
    return null;
  }

  return {
    frame: {
      messageId,
      length,
      body: Buffer.from(buffer.subarray(RCON_CONSTANTS.HEADER_SIZE, end)),
    },
    bytesConsumed: end,
  };
}

/**
 * Splits a TCP byte stream into frames. Chunks may carry partial frames or
 * several frames at once.
 */
export class RconFramer {
  private buffer: Buffer = Buffer.alloc(0);

  public ingest(chunk: Buffer): RconFrame[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: RconFrame[] = [];

    let decoded = decodeFrame(this.buffer);
    while (decoded) {
      frames.push(decoded.frame);
      this.buffer = this.buffer.subarray(decoded.bytesConsumed);
      decoded = decodeFrame(this.buffer);
    }

    return frames;
  }

  /** Bytes received that do not yet form a complete frame */
  public get pendingBytes(): number {
    return this.buffer.length;
  }
}

/**
 * XOR every byte with key[i mod key.length]. Applying it twice with the same
 * key restores the input, so the same call obscures and reveals.
 */
export function xorTransform(data: Buffer, key: Buffer): Buffer {
  if (key.length === 0) {
    throw new ProtocolError('XOR key has not been initialised');
  }

  const out = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = data[i] ^ key[i % key.length];
  }
  return out;
}

/**
 * Increment-then-wrap allocation: 0 → 1, 0xFFFFFFFF → 0.
 */
export function nextMessageId(current: number): number {
  return (current + 1) % RCON_CONSTANTS.MESSAGE_ID_MODULUS;
}

/**
 * Compact JSON, key order AuthToken, Version, Name, ContentBody.
 */
export function encodeEnvelope(envelope: RconRequestEnvelope): Buffer {
  const ordered: RconRequestEnvelope = {
    AuthToken: envelope.AuthToken,
    Version: envelope.Version,
    Name: envelope.Name,
    ContentBody: envelope.ContentBody,
  };
  return Buffer.from(JSON.stringify(ordered), 'utf8');
}

/**
 * ContentBody is often a JSON document serialized into a string, sometimes
 * padded with NULs. Strings that look like JSON are parsed; everything else
 * passes through.
 */
export function decodeContentBody(body: unknown): JsonValue {
  // A command without content answers with an empty ContentBody; absent and null read the same way
  if (body === undefined || body === null) {
    return '';
  }

  if (typeof body === 'string') {
    const stripped = body.replace(/\u0000/g, '').trim();
    if (stripped.startsWith('{') || stripped.startsWith('[')) {
      try {
        const parsed: JsonValue = JSON.parse(stripped);
        return parsed;
      } catch {
        return stripped;
      }
    }
    return stripped;
  }

  if (typeof body === 'number' || typeof body === 'boolean') {
    return body;
  }

  if (Array.isArray(body) || isJsonObject(body)) {
    const value: JsonValue = body;
    return value;
  }

  return '';
}

/**
 * Field lookup tolerant to PascalCase / camelCase (StatusCode vs statusCode).
 */
function readField(payload: Record<string, unknown>, name: string): unknown {
  if (name in payload) {
    return payload[name];
  }
  const camel = name.charAt(0).toLowerCase() + name.slice(1);
  return payload[camel];
}

/**
 * Parse a decrypted response body into a structured response.
 */
export function decodeResponse(messageId: number, body: Buffer): RconResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(body.toString('utf8'));
  } catch (err: unknown) {
    throw new ProtocolError(`Failed to decode response JSON: ${toErrorMessage(err)}`);
  }

  if (!isJsonObject(payload)) {
    throw new ProtocolError('Response body is not a JSON object');
  }

  const statusCode = readField(payload, 'StatusCode');
  const statusMessage = readField(payload, 'StatusMessage');
  const name = readField(payload, 'Name');

  return {
    messageId,
    statusCode: typeof statusCode === 'number' ? statusCode : 0,
    statusMessage: typeof statusMessage === 'string' ? statusMessage : '',
    name: typeof name === 'string' ? name : '',
    content: decodeContentBody(readField(payload, 'ContentBody')),
  };
}
