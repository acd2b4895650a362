/**
 * OSC Message
 *
 * An address path plus an ordered list of typed arguments.
 *
 * Wire layout:
 *   path      OSC-string, must begin with '/'
 *   ,tags     OSC-string, one character per argument ('[' ']' around arrays)
 *   payload   argument bytes in tag order
 *
 * The builder methods return `this` so messages read as one expression:
 *
 *   new Message('/mixer/ch/1/gain').addFloat(0.5).addString('dB')
 */

import { OscError } from './errors';
import { TimeTag } from './time-tag';
import { ARRAY_BEGIN_TAG, ARRAY_END_TAG, Value } from './value';
import type { RGBAColor } from './value';
import { ByteReader, encodeOscString, toBuffer } from './wire';

export class Message {
  private readonly path: string;
  private readonly args: Value[];

  constructor(path: string, args: readonly Value[] = []) {
    if (!path.startsWith('/')) {
      throw new OscError('AddressError', `OSC address must start with '/', got ${JSON.stringify(path)}`, { path });
    }
    this.path = path;
    this.args = [...args];
  }

  // --- Builder ---

  addInt32(value: number): this {
    return this.addValue(Value.int32(value));
  }

  addInt64(value: bigint | number): this {
    return this.addValue(Value.int64(value));
  }

  addFloat(value: number): this {
    return this.addValue(Value.float32(value));
  }

  addDouble(value: number): this {
    return this.addValue(Value.float64(value));
  }

  addString(value: string): this {
    return this.addValue(Value.string(value));
  }

  addSymbol(value: string): this {
    return this.addValue(Value.symbol(value));
  }

  addBlob(data: Uint8Array): this {
    return this.addValue(Value.blob(data));
  }

  addTimeTag(value: TimeTag): this {
    return this.addValue(Value.timeTag(value));
  }

  addChar(value: string): this {
    return this.addValue(Value.char(value));
  }

  addColor(value: RGBAColor | number): this {
    return this.addValue(Value.color(value));
  }

  addMidi(port: number, status: number, data1: number, data2: number): this {
    return this.addValue(Value.midi(port, status, data1, data2));
  }

  addTrue(): this {
    return this.addValue(Value.true());
  }

  addFalse(): this {
    return this.addValue(Value.false());
  }

  addBool(value: boolean): this {
    return this.addValue(Value.bool(value));
  }

  addNil(): this {
    return this.addValue(Value.nil());
  }

  addInfinitum(): this {
    return this.addValue(Value.infinitum());
  }

  addArray(values: readonly Value[]): this {
    return this.addValue(Value.array(values));
  }

  addValue(value: Value): this {
    this.args.push(value);
    return this;
  }

  // --- Accessors ---

  getPath(): string {
    return this.path;
  }

  getArguments(): readonly Value[] {
    return this.args;
  }

  getArgumentCount(): number {
    return this.args.length;
  }

  getArgument(index: number): Value {
    const value = this.args[index];
    if (value === undefined) {
      throw new OscError('InvalidArgument', `Argument index ${index} out of range (${this.args.length} arguments)`, {
        index,
        path: this.path,
      });
    }
    return value;
  }

  /** Type tag string without the leading comma, e.g. "if[ss]" */
  typeTags(): string {
    return this.args.map((v) => v.typeTag).join('');
  }

  equals(other: Message): boolean {
    if (this.path !== other.path || this.args.length !== other.args.length) return false;
    return this.args.every((v, i) => v.equals(other.args[i]));
  }

  toString(): string {
    const args = this.args.map((v) => v.toString()).join(' ');
    return args ? `${this.path} ${args}` : this.path;
  }

  // --- Wire format ---

  serialize(): Buffer {
    return Buffer.concat([
      encodeOscString(this.path, 'address'),
      encodeOscString(`,${this.typeTags()}`, 'type tags'),
      ...this.args.map((v) => v.serialize()),
    ]);
  }

  static deserialize(data: Uint8Array): Message {
    const buffer = toBuffer(data);
    if (buffer.length === 0 || buffer[0] !== 0x2f) {
      throw new OscError('AddressError', 'OSC message must begin with an address starting with \'/\'', {
        length: buffer.length,
      });
    }

    const reader = new ByteReader(buffer);
    const path = reader.readOscString('address', 'MalformedPacket');

    // Legacy OSC 1.0 senders may omit the type tag string entirely
    if (reader.remaining === 0) {
      return new Message(path);
    }

    const tags = reader.readOscString('type tag string', 'MalformedPacket');
    if (!tags.startsWith(',')) {
      throw new OscError('MalformedPacket', `Type tag string must start with ',', got ${JSON.stringify(tags)}`, {
        path,
      });
    }

    const args: Value[] = [];
    const open: Value[][] = [];
    let current = args;

    for (const tag of tags.slice(1)) {
      if (tag === ARRAY_BEGIN_TAG) {
        open.push(current);
        current = [];
        continue;
      }
      if (tag === ARRAY_END_TAG) {
        const parent = open.pop();
        if (parent === undefined) {
          throw new OscError('MalformedPacket', `Unbalanced ']' in type tags ${JSON.stringify(tags)}`, { path });
        }
        parent.push(Value.array(current));
        current = parent;
        continue;
      }
      current.push(Value.deserialize(reader, tag));
    }

    if (open.length > 0) {
      throw new OscError('MalformedPacket', `Unterminated '[' in type tags ${JSON.stringify(tags)}`, { path });
    }

    return new Message(path, args);
  }
}
