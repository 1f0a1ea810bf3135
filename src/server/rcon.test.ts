/**
 * Unit Tests for the RCON wire codec
 */

import { describe, it, expect } from '@jest/globals';
import {
  RconFramer,
  decodeContentBody,
  decodeFrame,
  decodeResponse,
  encodeEnvelope,
  encodeFrame,
  nextMessageId,
  xorTransform,
} from './rcon';
import { ProtocolError } from '../shared/rcon-errors';

describe('encodeFrame / decodeFrame', () => {
  it('writes a little-endian id and length header', () => {
    const frame = encodeFrame(0x01020304, Buffer.from('hi'));

    expect([...frame.subarray(0, 8)]).toEqual([0x04, 0x03, 0x02, 0x01, 0x02, 0x00, 0x00, 0x00]);
    expect(frame.subarray(8).toString()).toBe('hi');
  });

  it('decodes what it encodes', () => {
    const decoded = decodeFrame(encodeFrame(42, Buffer.from('{"a":1}')));

    expect(decoded?.bytesConsumed).toBe(15);
    expect(decoded?.frame.messageId).toBe(42);
    expect(decoded?.frame.length).toBe(7);
    expect(decoded?.frame.body.toString()).toBe('{"a":1}');
  });

  it('returns null for an incomplete header', () => {
    expect(decodeFrame(Buffer.from([1, 0, 0]))).toBeNull();
  });

  it('returns null until the whole body has arrived', () => {
    const frame = encodeFrame(1, Buffer.from('abcdef'));
    expect(decodeFrame(frame.subarray(0, 10))).toBeNull();
  });

  it('handles an empty body', () => {
    const decoded = decodeFrame(encodeFrame(7, Buffer.alloc(0)));
    expect(decoded?.frame.length).toBe(0);
    expect(decoded?.bytesConsumed).toBe(8);
  });
});

describe('RconFramer', () => {
  it('reassembles a frame split across chunks', () => {
    const framer = new RconFramer();
    const frame = encodeFrame(5, Buffer.from('payload'));

    expect(framer.ingest(frame.subarray(0, 4))).toEqual([]);
    expect(framer.ingest(frame.subarray(4, 11))).toEqual([]);
    expect(framer.pendingBytes).toBe(11);

    const frames = framer.ingest(frame.subarray(11));
    expect(frames).toHaveLength(1);
    expect(frames[0].messageId).toBe(5);
    expect(frames[0].body.toString()).toBe('payload');
    expect(framer.pendingBytes).toBe(0);
  });

  it('splits several frames from one chunk and keeps the remainder', () => {
    const framer = new RconFramer();
    const third = encodeFrame(3, Buffer.from('ccc'));
    const chunk = Buffer.concat([
      encodeFrame(1, Buffer.from('a')),
      encodeFrame(2, Buffer.from('bb')),
      third.subarray(0, 5),
    ]);

    const frames = framer.ingest(chunk);

    expect(frames.map(f => f.messageId)).toEqual([1, 2]);
    expect(framer.pendingBytes).toBe(5);
    expect(framer.ingest(third.subarray(5)).map(f => f.body.toString())).toEqual(['ccc']);
  });
});

describe('xorTransform', () => {
  const key = Buffer.from('ABCD');

  it('cycles the key over the data', () => {
    const out = xorTransform(Buffer.from([0x00, 0x00, 0x00, 0x00, 0x00]), key);
    expect([...out]).toEqual([0x41, 0x42, 0x43, 0x44, 0x41]);
  });

  it('is its own inverse', () => {
    const data = Buffer.from('{"Name":"Login"}');
    expect(xorTransform(xorTransform(data, key), key).equals(data)).toBe(true);
  });

  it('does not modify its input', () => {
    const data = Buffer.from('abc');
    xorTransform(data, key);
    expect(data.toString()).toBe('abc');
  });

  it('rejects an empty key', () => {
    expect(() => xorTransform(Buffer.from('abc'), Buffer.alloc(0))).toThrow(ProtocolError);
    expect(() => xorTransform(Buffer.from('abc'), Buffer.alloc(0))).toThrow('XOR key has not been initialised');
  });
});

describe('nextMessageId', () => {
  it('increments', () => {
    expect(nextMessageId(0)).toBe(1);
    expect(nextMessageId(41)).toBe(42);
  });

  it('wraps at 2^32', () => {
    expect(nextMessageId(0xffffffff)).toBe(0);
  });
});

describe('encodeEnvelope', () => {
  it('serializes compact JSON in protocol key order', () => {
    const body = encodeEnvelope({
      ContentBody: 'foy_warfare',
      Name: 'ChangeMap',
      Version: 2,
      AuthToken: 'tok123',
    });

    expect(body.toString()).toBe('{"AuthToken":"tok123","Version":2,"Name":"ChangeMap","ContentBody":"foy_warfare"}');
  });

  it('embeds object content as a nested object', () => {
    const body = encodeEnvelope({
      AuthToken: 't',
      Version: 2,
      Name: 'ServerInformation',
      ContentBody: { Name: 'session', Value: '' },
    });

    expect(body.toString()).toBe('{"AuthToken":"t","Version":2,"Name":"ServerInformation","ContentBody":{"Name":"session","Value":""}}');
  });
});

describe('decodeContentBody', () => {
  it('maps missing content to an empty string', () => {
    expect(decodeContentBody(undefined)).toBe('');
    expect(decodeContentBody(null)).toBe('');
  });

  it('strips NUL padding and whitespace', () => {
    expect(decodeContentBody('  tok123\u0000\u0000')).toBe('tok123');
  });

  it('parses padded JSON strings', () => {
    expect(decodeContentBody('  {"a":1}\u0000')).toEqual({ a: 1 });
  });

  it('leaves plain text unchanged', () => {
    expect(decodeContentBody('plain text')).toBe('plain text');
  });

  it('parses strings that hold JSON objects or arrays', () => {
    expect(decodeContentBody('{"MapName":"foy_warfare"}\u0000')).toEqual({ MapName: 'foy_warfare' });
    expect(decodeContentBody('[1,2]')).toEqual([1, 2]);
  });

  it('keeps JSON-looking strings that do not parse', () => {
    expect(decodeContentBody('{not json')).toBe('{not json');
  });

  it('passes other JSON values through', () => {
    expect(decodeContentBody(5)).toBe(5);
    expect(decodeContentBody(false)).toBe(false);
    expect(decodeContentBody({ a: 1 })).toEqual({ a: 1 });
  });
});

describe('decodeResponse', () => {
  it('reads PascalCase fields', () => {
    const body = Buffer.from(JSON.stringify({
      StatusCode: 200,
      StatusMessage: 'OK',
      Name: 'Login',
      ContentBody: 'tok123',
    }));

    expect(decodeResponse(2, body)).toEqual({
      messageId: 2,
      statusCode: 200,
      statusMessage: 'OK',
      name: 'Login',
      content: 'tok123',
    });
  });

  it('falls back to camelCase fields', () => {
    const body = Buffer.from(JSON.stringify({
      statusCode: 500,
      statusMessage: 'busy',
      name: 'ChangeMap',
      contentBody: '',
    }));

    expect(decodeResponse(3, body)).toMatchObject({ statusCode: 500, statusMessage: 'busy', name: 'ChangeMap' });
  });

  it('defaults absent fields', () => {
    expect(decodeResponse(1, Buffer.from('{}'))).toEqual({
      messageId: 1,
      statusCode: 0,
      statusMessage: '',
      name: '',
      content: '',
    });
  });

  it('rejects a body that is not JSON', () => {
    expect(() => decodeResponse(1, Buffer.from('nope'))).toThrow(/^Failed to decode response JSON: /);
  });

  it('rejects a JSON body that is not an object', () => {
    expect(() => decodeResponse(1, Buffer.from('[1]'))).toThrow('Response body is not a JSON object');
  });
});
