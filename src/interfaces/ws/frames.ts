/**
 * RFC 6455 frame codec for the telemetry socket.
 *
 * Browser-to-server frames are always masked per RFC 6455 §5.3.
 * Server-to-client frames are never masked.
 */

export const OPCODE_TEXT = 0x01;
export const OPCODE_CLOSE = 0x08;
export const OPCODE_PING = 0x09;
export const OPCODE_PONG = 0x0a;

export interface ParsedFrame {
  fin: boolean;
  opcode: number;
  payload: Buffer;
  nextOffset: number;
}

/**
 * Parse ONE WebSocket frame from the front of `buf`.
 * Returns null when more bytes are needed.
 * Throws on truly malformed data (e.g. 64-bit length overflow).
 */
export function tryParseFrame(buf: Buffer): ParsedFrame | null {
  if (buf.length < 2) return null;

  const b0 = buf.readUInt8(0);
  const b1 = buf.readUInt8(1);

  const fin = (b0 & 0x80) === 0x80;
  const opcode = b0 & 0x0f;
  const masked = (b1 & 0x80) === 0x80;

  let payloadLen = b1 & 0x7f;
  let offset = 2;

  if (payloadLen === 126) {
    if (buf.length < offset + 2) return null;
    payloadLen = buf.readUInt16BE(offset);
    offset += 2;
  } else if (payloadLen === 127) {
    // Client messages are small JSON commands.
    throw new Error('64-bit WebSocket payload length not supported');
  }

  const maskLen = masked ? 4 : 0;
  if (buf.length < offset + maskLen + payloadLen) return null;

  let payload = buf.subarray(offset + maskLen, offset + maskLen + payloadLen);

  if (masked) {
    const maskingKey = buf.subarray(offset, offset + 4);
    const unmasked = Buffer.allocUnsafe(payload.length);
    for (let i = 0; i < payload.length; i++) {
      unmasked[i] = payload.readUInt8(i) ^ maskingKey.readUInt8(i % 4);
    }
    payload = unmasked;
  }

  return { fin, opcode, payload, nextOffset: offset + maskLen + payloadLen };
}

export function encodeControlFrame(opcode: number, payload: Buffer): Buffer {
  if (payload.length > 125) {
    // RFC 6455 §5.5: control frames MUST have payload ≤ 125
    return Buffer.from([0x80 | opcode, 0x00]);
  }
  return Buffer.concat([Buffer.from([0x80 | opcode, payload.length]), payload]);
}

export function encodeTextFrame(data: string): Buffer {
  const payload = Buffer.from(data, 'utf-8');
  const len = payload.length;

  if (len < 126) {
    return Buffer.concat([Buffer.from([0x80 | OPCODE_TEXT, len]), payload]);
  }

  if (len <= 0xffff) {
    const header = Buffer.alloc(4);
    header[0] = 0x80 | OPCODE_TEXT;
    header[1] = 126;
    header.writeUInt16BE(len, 2);
    return Buffer.concat([header, payload]);
  }

  const header = Buffer.alloc(10);
  header[0] = 0x80 | OPCODE_TEXT;
  header[1] = 127;
  header.writeBigUInt64BE(BigInt(len), 2);
  return Buffer.concat([header, payload]);
}
