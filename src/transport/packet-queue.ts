/**
 * Ring buffer of received packets waiting to be dispatched.
 *
 * Datagrams and stream frames land here from socket callbacks; the
 * Server's receive() takes them out in arrival order. Capacity is fixed,
 * so when a producer outruns dispatch the oldest packet is evicted and
 * push() returns it for the caller to report.
 */

export interface QueuedPacket {
  data: Buffer;
  source: string;
  receivedAt: number;
}

export class PacketQueue {
  private buffer: Array<QueuedPacket | undefined>;
  private head: number = 0;   // next write position
  private count: number = 0;  // current item count
  private readonly capacity: number;

  constructor(capacity = 1024) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`PacketQueue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.buffer = new Array<QueuedPacket | undefined>(capacity);
  }

  /** Enqueue a packet. Returns the evicted packet when the buffer was full. */
  push(data: Buffer, source: string, receivedAt = Date.now()): QueuedPacket | undefined {
    let evicted: QueuedPacket | undefined;
    if (this.count === this.capacity) {
      evicted = this.buffer[this.head];
    } else {
      this.count++;
    }
    this.buffer[this.head] = { data, source, receivedAt };
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Oldest packet, or undefined when empty */
  shift(): QueuedPacket | undefined {
    if (this.count === 0) return undefined;
    const readIdx = (this.head - this.count + this.capacity) % this.capacity;
    const item = this.buffer[readIdx];
    this.buffer[readIdx] = undefined;
    this.count--;
    return item;
  }

  clear(): void {
    this.head = 0;
    this.count = 0;
    this.buffer = new Array<QueuedPacket | undefined>(this.capacity);
  }

  /** Number of packets currently queued */
  get size(): number {
    return this.count;
  }

  /** Whether the buffer is empty */
  get empty(): boolean {
    return this.count === 0;
  }
}
