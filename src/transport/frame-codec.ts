/**
 * Length-prefix framing for OSC over stream sockets (TCP, Unix).
 *
 *   uint32 big-endian length | `length` bytes of packet
 *
 * FrameReader reassembles frames from arbitrarily split chunks, so a
 * frame may arrive one byte at a time or several frames per chunk.
 */

import type { Readable, Writable } from 'stream';
import { OscError, errorMessage } from '../errors';
import { MIN_PACKET_SIZE } from '../packet';

export const FRAME_HEADER_SIZE = 4;
export const DEFAULT_MAX_FRAME_LENGTH = 65536;

export interface FrameOptions {
  /** Largest accepted payload; longer frames are rejected */
  maxLength?: number;
  /** Smallest accepted payload; defaults to the smallest OSC packet */
  minLength?: number;
}

export interface DecodedFrame {
  payload: Buffer;
  bytesConsumed: number;
}

export function encodeFrame(payload: Uint8Array): Buffer {
  const frame = Buffer.alloc(FRAME_HEADER_SIZE + payload.length);
  frame.writeUInt32BE(payload.length, 0);
  frame.set(payload, FRAME_HEADER_SIZE);
  return frame;
}

/**
 * Decode one frame starting at `offset`.
 * Returns null until the whole frame is available.
 */
export function decodeFrame(buffer: Buffer, offset = 0, options: FrameOptions = {}): DecodedFrame | null {
  const maxLength = options.maxLength ?? DEFAULT_MAX_FRAME_LENGTH;
  const minLength = options.minLength ?? MIN_PACKET_SIZE;

  if (buffer.length - offset < FRAME_HEADER_SIZE) return null;

  const length = buffer.readUInt32BE(offset);
  if (length > maxLength) {
    throw new OscError('MalformedPacket', `Frame length ${length} exceeds maximum ${maxLength}`, {
      length,
      maxLength,
    });
  }
  if (length < minLength) {
    throw new OscError('MalformedPacket', `Frame length ${length} is below minimum ${minLength}`, {
      length,
      minLength,
    });
  }

  const end = offset + FRAME_HEADER_SIZE + length;
  if (buffer.length < end) return null;

  return {
    payload: Buffer.from(buffer.subarray(offset + FRAME_HEADER_SIZE, end)),
    bytesConsumed: FRAME_HEADER_SIZE + length,
  };
}

interface PendingRead {
  resolve: (frame: Buffer | null) => void;
  reject: (err: OscError) => void;
}

export class FrameReader {
  private pending: Buffer = Buffer.alloc(0);
  private ready: Buffer[] = [];
  private readers: PendingRead[] = [];
  private ended = false;
  private failure: OscError | null = null;

  constructor(private readonly options: FrameOptions = {}) {}

  /**
   * Feed raw bytes from the socket. Returns every frame completed by this
   * chunk. A bad length prefix desynchronizes the stream, so the buffered
   * bytes are dropped before the error is thrown.
   */
  feed(chunk: Uint8Array): Buffer[] {
    this.pending = this.pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.pending, chunk]);

    const frames: Buffer[] = [];
    let offset = 0;
    try {
      for (;;) {
        const frame = decodeFrame(this.pending, offset, this.options);
        if (frame === null) break;
        frames.push(frame.payload);
        offset += frame.bytesConsumed;
      }
    } catch (err) {
      this.reset();
      throw err;
    }

    this.pending = offset === 0 ? this.pending : this.pending.subarray(offset);
    return frames;
  }

  /** Bytes of an incomplete frame still waiting for more data */
  get buffered(): number {
    return this.pending.length;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }

  /**
   * Pull frames from a readable stream. read() then yields them one at a
   * time, null once the stream ends cleanly.
   */
  attach(stream: Readable): this {
    stream.on('data', (chunk: Buffer) => {
      try {
        for (const frame of this.feed(chunk)) this.deliver(frame);
      } catch (err) {
        this.fail(err instanceof OscError ? err : new OscError('MalformedPacket', errorMessage(err)));
        stream.destroy();
      }
    });
    stream.on('error', (err: Error) => {
      this.fail(new OscError('NetworkError', `Stream error: ${err.message}`, {}, { cause: err }));
    });
    stream.on('close', () => this.finish());
    stream.on('end', () => this.finish());
    return this;
  }

  read(): Promise<Buffer | null> {
    const frame = this.ready.shift();
    if (frame) return Promise.resolve(frame);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this.readers.push({ resolve, reject });
    });
  }

  private deliver(frame: Buffer): void {
    const reader = this.readers.shift();
    if (reader) reader.resolve(frame);
    else this.ready.push(frame);
  }

  private finish(): void {
    if (this.ended || this.failure) return;
    if (this.pending.length > 0) {
      this.fail(new OscError('NetworkError', `Connection closed mid-frame with ${this.pending.length} bytes pending`, {
        pending: this.pending.length,
      }));
      return;
    }
    this.ended = true;
    for (const reader of this.readers.splice(0)) reader.resolve(null);
  }

  private fail(err: OscError): void {
    if (this.failure || this.ended) return;
    this.failure = err;
    for (const reader of this.readers.splice(0)) reader.reject(err);
  }
}

/**
 * Write one framed packet: the length prefix, then the payload.
 * Resolves once the payload write has been flushed to the socket.
 */
export function sendFramed(socket: Writable, payload: Uint8Array): Promise<void> {
  if (socket.destroyed || socket.writableEnded) {
    return Promise.reject(new OscError('NetworkError', 'Cannot send on a closed socket'));
  }

  const header = Buffer.alloc(FRAME_HEADER_SIZE);
  header.writeUInt32BE(payload.length, 0);

  return new Promise((resolve, reject) => {
    socket.cork();
    socket.write(header);
    socket.write(payload, (err) => {
      if (err) {
        reject(new OscError('NetworkError', `Framed send failed: ${err.message}`, { size: payload.length }, { cause: err }));
      } else {
        resolve();
      }
    });
    socket.uncork();
  });
}
