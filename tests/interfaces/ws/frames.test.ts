import { describe, it, expect } from 'vitest';
import {
  encodeControlFrame,
  encodeTextFrame,
  tryParseFrame,
  OPCODE_PING,
  OPCODE_TEXT,
} from '../../../src/interfaces/ws/frames.js';
import { maskedFrame } from './helpers.js';

describe('encodeTextFrame', () => {
  it('uses a 2-byte header for short payloads', () => {
    expect([...encodeTextFrame('hi')]).toEqual([0x81, 2, 0x68, 0x69]);
  });

  it('uses the 16-bit extended length from 126 bytes', () => {
    const frame = encodeTextFrame('x'.repeat(200));

    expect(frame[1]).toBe(126);
    expect(frame.readUInt16BE(2)).toBe(200);
    expect(frame.length).toBe(204);
  });
});

describe('encodeControlFrame', () => {
  it('prefixes FIN and the opcode', () => {
    expect([...encodeControlFrame(OPCODE_PING, Buffer.from('ab'))]).toEqual([0x89, 2, 0x61, 0x62]);
  });

  it('drops payloads over 125 bytes', () => {
    expect([...encodeControlFrame(OPCODE_PING, Buffer.alloc(200))]).toEqual([0x89, 0]);
  });
});

describe('tryParseFrame', () => {
  it('unmasks a client text frame', () => {
    const frame = tryParseFrame(maskedFrame(OPCODE_TEXT, '{"action":"ping"}'));

    expect(frame).not.toBeNull();
    expect(frame?.fin).toBe(true);
    expect(frame?.opcode).toBe(OPCODE_TEXT);
    expect(frame?.payload.toString('utf-8')).toBe('{"action":"ping"}');
    expect(frame?.nextOffset).toBe(2 + 4 + 17);
  });

  it('reads unmasked server frames', () => {
    const frame = tryParseFrame(encodeTextFrame('y'.repeat(300)));
    expect(frame?.payload.toString('utf-8')).toBe('y'.repeat(300));
  });

  it('returns null until the frame is complete', () => {
    const full = maskedFrame(OPCODE_TEXT, 'hello');

    expect(tryParseFrame(full.subarray(0, 1))).toBeNull();
    expect(tryParseFrame(full.subarray(0, full.length - 1))).toBeNull();
  });

  it('stops after the first of two concatenated frames', () => {
    const first = maskedFrame(OPCODE_TEXT, 'one');
    const both = Buffer.concat([first, maskedFrame(OPCODE_TEXT, 'two')]);

    const frame = tryParseFrame(both);
    expect(frame?.payload.toString('utf-8')).toBe('one');
    expect(frame?.nextOffset).toBe(first.length);
  });

  it('throws on 64-bit payload lengths', () => {
    expect(() => tryParseFrame(Buffer.from([0x81, 127, 0, 0, 0, 0, 0, 0, 0, 0]))).toThrow(
      '64-bit WebSocket payload length not supported',
    );
  });
});
