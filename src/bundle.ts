/**
 * OSC Bundle
 *
 * A time tag plus an ordered list of elements, each a Message or a nested
 * Bundle. Elements are kept in one list so wire order always matches
 * insertion order.
 *
 * Wire layout:
 *   "#bundle\0"     8 bytes
 *   time tag        uint32 seconds, uint32 fraction
 *   element*        int32 size, then `size` bytes of message or bundle
 */

import { OscError, toOscError } from './errors';
import { Message } from './message';
import { TimeTag } from './time-tag';
import { ByteReader, toBuffer } from './wire';

export const BUNDLE_TAG = '#bundle';
export const BUNDLE_HEADER = Buffer.from('#bundle\0', 'ascii');

/** Magic (8) + time tag (8) */
export const BUNDLE_HEADER_SIZE = 16;

/** Smallest element that can hold a path and its type tags */
const MIN_ELEMENT_SIZE = 8;

/** Deepest bundle nesting accepted on decode, counting the outermost bundle */
export const MAX_BUNDLE_DEPTH = 32;

export type BundleElement = Message | Bundle;

export class Bundle {
  private readonly items: BundleElement[] = [];

  constructor(public timeTag: TimeTag = TimeTag.immediate(), elements: readonly BundleElement[] = []) {
    this.items.push(...elements);
  }

  addMessage(message: Message): this {
    this.items.push(message);
    return this;
  }

  addBundle(bundle: Bundle): this {
    this.items.push(bundle);
    return this;
  }

  addElement(element: BundleElement): this {
    this.items.push(element);
    return this;
  }

  get elements(): readonly BundleElement[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Direct child messages, in element order */
  messages(): Message[] {
    return this.items.filter((e): e is Message => e instanceof Message);
  }

  /** Direct child bundles, in element order */
  bundles(): Bundle[] {
    return this.items.filter((e): e is Bundle => e instanceof Bundle);
  }

  /** Visit every message, descending into nested bundles depth-first */
  forEach(callback: (message: Message) => void): void {
    for (const element of this.items) {
      if (element instanceof Bundle) {
        element.forEach(callback);
      } else {
        callback(element);
      }
    }
  }

  equals(other: Bundle): boolean {
    if (!this.timeTag.equals(other.timeTag) || this.items.length !== other.items.length) return false;
    return this.items.every((element, i) => {
      const peer = other.items[i];
      if (element instanceof Bundle) return peer instanceof Bundle && element.equals(peer);
      return peer instanceof Message && element.equals(peer);
    });
  }

  serialize(): Buffer {
    const header = Buffer.alloc(BUNDLE_HEADER_SIZE);
    BUNDLE_HEADER.copy(header, 0);
    header.writeUInt32BE(this.timeTag.seconds, 8);
    header.writeUInt32BE(this.timeTag.fraction, 12);

    const parts: Buffer[] = [header];
    for (const element of this.items) {
      const bytes = element.serialize();
      const size = Buffer.alloc(4);
      size.writeInt32BE(bytes.length, 0);
      parts.push(size, bytes);
    }
    return Buffer.concat(parts);
  }

  static deserialize(data: Uint8Array): Bundle {
    return decodeBundle(toBuffer(data), 1, []);
  }
}

function decodeBundle(buffer: Buffer, depth: number, path: readonly number[]): Bundle {
  if (depth > MAX_BUNDLE_DEPTH) {
    throw new OscError('MalformedPacket', `Bundle nesting exceeds ${MAX_BUNDLE_DEPTH} levels`, { depth });
  }
  if (buffer.length < BUNDLE_HEADER_SIZE) {
    throw new OscError('MalformedPacket', `Bundle too short: ${buffer.length} bytes`, { length: buffer.length });
  }
  if (!buffer.subarray(0, BUNDLE_HEADER.length).equals(BUNDLE_HEADER)) {
    throw new OscError('MalformedPacket', 'Bundle does not start with "#bundle"');
  }

  const reader = new ByteReader(buffer, BUNDLE_HEADER.length);
  const bundle = new Bundle(new TimeTag(reader.readUInt32('time tag'), reader.readUInt32('time tag')));

  let index = 0;
  while (reader.remaining >= 4) {
    const offset = reader.offset;
    const size = reader.readInt32('element size');
    if (size < MIN_ELEMENT_SIZE || size > reader.remaining) {
      throw new OscError('MalformedPacket', `Invalid bundle element size ${size}`, {
        element: index,
        size,
        offset,
        remaining: reader.remaining,
      });
    }
    const bytes = reader.readBytes(size, 'bundle element');
    const elementPath = [...path, index];
    // Nested bundles prefix their own message errors, so only messages are wrapped here
    bundle.addElement(isBundle(bytes) ? decodeBundle(bytes, depth + 1, elementPath) : decodeMessage(bytes, elementPath, offset));
    index++;
  }

  if (reader.remaining > 0) {
    throw new OscError('MalformedPacket', `Bundle has ${reader.remaining} trailing bytes`, {
      remaining: reader.remaining,
      offset: reader.offset,
    });
  }

  return bundle;
}

function decodeMessage(bytes: Buffer, path: readonly number[], offset: number): Message {
  try {
    return Message.deserialize(bytes);
  } catch (err) {
    const index = path[path.length - 1];
    throw toOscError(err, 'MalformedPacket').withPrefix(`Bundle element ${path.join('.')}`, {
      element: index,
      elementPath: path.join('.'),
      elementOffset: offset,
    });
  }
}

/** True when the bytes carry the bundle magic */
export function isBundle(data: Uint8Array): boolean {
  return data.length >= BUNDLE_HEADER.length && toBuffer(data).subarray(0, BUNDLE_TAG.length).toString('ascii') === BUNDLE_TAG;
}
