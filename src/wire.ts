/**
 * Low-level OSC wire helpers.
 *
 * Everything on the wire is big-endian and aligned to 4 bytes. Strings are
 * NUL-terminated and zero-padded; the reader below walks a buffer with a
 * cursor and reports how many bytes were left when something runs short.
 */

import { OscError, type OscErrorCode } from './errors';

/** Round up to the next multiple of 4 */
export function padSize(size: number): number {
  return (size + 3) & ~3;
}

/** View any Uint8Array as a Buffer without copying */
export function toBuffer(data: Uint8Array): Buffer {
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Encode an OSC-string: UTF-8 bytes, a NUL terminator, zero padding.
 * Embedded NULs would truncate the string on the receiving side.
 */
export function encodeOscString(value: string, what = 'string'): Buffer {
  if (value.includes('\0')) {
    throw new OscError('SerializationError', `Cannot encode ${what} containing a NUL character`, { what });
  }
  const bytes = Buffer.from(value, 'utf-8');
  const out = Buffer.alloc(padSize(bytes.length + 1));
  bytes.copy(out, 0);
  return out;
}

/** Index of the first NUL at or after `from`, or -1 */
export function findNul(buffer: Buffer, from: number): number {
  return buffer.indexOf(0, from);
}

/**
 * Cursor over an OSC payload.
 * Every read checks bounds first and throws a DeserializationError
 * naming what was being read and how much data was left.
 */
export class ByteReader {
  private pos: number;

  constructor(private readonly buffer: Buffer, offset = 0) {
    this.pos = offset;
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return Math.max(0, this.buffer.length - this.pos);
  }

  get length(): number {
    return this.buffer.length;
  }

  seek(offset: number): void {
    this.pos = offset;
  }

  readInt32(what = 'int32'): number {
    this.require(4, what);
    const value = this.buffer.readInt32BE(this.pos);
    this.pos += 4;
    return value;
  }

  readUInt32(what = 'uint32'): number {
    this.require(4, what);
    const value = this.buffer.readUInt32BE(this.pos);
    this.pos += 4;
    return value;
  }

  readInt64(what = 'int64'): bigint {
    this.require(8, what);
    const value = this.buffer.readBigInt64BE(this.pos);
    this.pos += 8;
    return value;
  }

  readFloat32(what = 'float32'): number {
    this.require(4, what);
    const value = this.buffer.readFloatBE(this.pos);
    this.pos += 4;
    return value;
  }

  readFloat64(what = 'float64'): number {
    this.require(8, what);
    const value = this.buffer.readDoubleBE(this.pos);
    this.pos += 8;
    return value;
  }

  /** Copy of the next `size` bytes; the result never aliases the input */
  readBytes(size: number, what = 'bytes'): Buffer {
    this.require(size, what);
    const out = Buffer.from(this.buffer.subarray(this.pos, this.pos + size));
    this.pos += size;
    return out;
  }

  /** Skip zero padding after `size` payload bytes */
  skipPadding(size: number, what = 'padding'): void {
    const pad = padSize(size) - size;
    this.require(pad, what);
    this.pos += pad;
  }

  /**
   * Read a NUL-terminated, padded OSC-string.
   * A missing terminator is reported with `missingNulCode`.
   */
  readOscString(what = 'string', missingNulCode: OscErrorCode = 'DeserializationError'): string {
    const start = this.pos;
    const end = findNul(this.buffer, start);
    if (end === -1) {
      throw new OscError(missingNulCode, `Missing NUL terminator in ${what}`, {
        what,
        offset: start,
        remaining: this.remaining,
      });
    }
    const value = this.buffer.toString('utf-8', start, end);
    const next = start + padSize(end - start + 1);
    if (next > this.buffer.length) {
      throw new OscError('DeserializationError', `Truncated padding after ${what}`, {
        what,
        offset: start,
        remaining: this.remaining,
      });
    }
    this.pos = next;
    return value;
  }

  private require(size: number, what: string): void {
    if (this.pos + size > this.buffer.length) {
      throw new OscError(
        'DeserializationError',
        `Truncated ${what}: need ${size} bytes, ${this.remaining} remaining`,
        { what, needed: size, remaining: this.remaining, offset: this.pos },
      );
    }
  }
}
