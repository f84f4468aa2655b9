import { EventEmitter } from 'node:events';

const MASK = [0x12, 0x34, 0x56, 0x78];

/** Encodes a client→server frame (always masked) with a short payload. */
export function maskedFrame(opcode: number, text: string): Buffer {
  const payload = Buffer.from(text, 'utf-8');
  const masked = Buffer.alloc(payload.length);
  for (let i = 0; i < payload.length; i++) {
    masked[i] = payload.readUInt8(i) ^ (MASK[i % 4] ?? 0);
  }
  return Buffer.concat([Buffer.from([0x80 | opcode, 0x80 | payload.length, ...MASK]), masked]);
}

/** Records what the server writes instead of touching the network. */
export class FakeSocket extends EventEmitter {
  writes: Array<string | Buffer> = [];
  destroyed = false;
  allowHalfOpen = false;

  write(data: string | Buffer): boolean {
    this.writes.push(data);
    return true;
  }

  destroy(): this {
    this.destroyed = true;
    return this;
  }

  setTimeout(): this {
    return this;
  }

  setNoDelay(): this {
    return this;
  }

  setKeepAlive(): this {
    return this;
  }

  resume(): this {
    return this;
  }

  /** Frames written after the handshake. */
  frames(): Buffer[] {
    return this.writes.filter((w): w is Buffer => Buffer.isBuffer(w));
  }
}
