/**
 * OSC argument values
 *
 * One Value per message argument. Each kind maps to exactly one type tag:
 *
 *   i int32      h int64      f float32    d float64
 *   s string     S symbol     b blob       t time tag
 *   c char       r RGBA color m MIDI       T true
 *   F false      N nil        I infinitum  [ ... ] array
 *
 * Accessors never coerce: asFloat32() on an int32 throws TypeMismatch.
 */

import { OscError } from './errors';
import { TimeTag } from './time-tag';
import { ByteReader, encodeOscString, padSize } from './wire';

export interface RGBAColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface MidiMessage {
  port: number;
  status: number;
  data1: number;
  data2: number;
}

export type ValueData =
  | { kind: 'int32'; value: number }
  | { kind: 'int64'; value: bigint }
  | { kind: 'float32'; value: number }
  | { kind: 'float64'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'symbol'; value: string }
  | { kind: 'blob'; value: Buffer }
  | { kind: 'timetag'; value: TimeTag }
  | { kind: 'char'; value: string }
  | { kind: 'color'; value: RGBAColor }
  | { kind: 'midi'; value: MidiMessage }
  | { kind: 'true' }
  | { kind: 'false' }
  | { kind: 'nil' }
  | { kind: 'infinitum' }
  | { kind: 'array'; value: readonly Value[] };

export type ValueKind = ValueData['kind'];

/** Single-character tag for every non-array kind */
export const TYPE_TAGS = {
  int32: 'i',
  int64: 'h',
  float32: 'f',
  float64: 'd',
  string: 's',
  symbol: 'S',
  blob: 'b',
  timetag: 't',
  char: 'c',
  color: 'r',
  midi: 'm',
  true: 'T',
  false: 'F',
  nil: 'N',
  infinitum: 'I',
} as const satisfies Record<Exclude<ValueKind, 'array'>, string>;

export const ARRAY_BEGIN_TAG = '[';
export const ARRAY_END_TAG = ']';

const KNOWN_TAGS = new Set<string>([...Object.values(TYPE_TAGS), ARRAY_BEGIN_TAG, ARRAY_END_TAG]);

export function isTypeTag(ch: string): boolean {
  return KNOWN_TAGS.has(ch);
}

const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function assertByte(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new OscError('InvalidArgument', `${field} must be an integer 0-255, got ${value}`, { field });
  }
}

function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

function mismatch(expected: string, actual: ValueKind): OscError {
  return new OscError('TypeMismatch', `Expected ${expected} value, got ${actual}`, { expected, actual });
}

export class Value {
  private constructor(private readonly data: ValueData) {}

  // --- Constructors ---

  static int32(value: number): Value {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new OscError('InvalidArgument', `int32 out of range: ${value}`);
    }
    return new Value({ kind: 'int32', value });
  }

  static int64(value: bigint | number): Value {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new OscError('InvalidArgument', `int64 from a number must be a safe integer, got ${value}`);
    }
    const big = BigInt(value);
    if (big < INT64_MIN || big > INT64_MAX) {
      throw new OscError('InvalidArgument', `int64 out of range: ${big}`);
    }
    return new Value({ kind: 'int64', value: big });
  }

  /** Stored at float32 precision, so the value reads back as it travels */
  static float32(value: number): Value {
    return new Value({ kind: 'float32', value: Math.fround(value) });
  }

  static float64(value: number): Value {
    return new Value({ kind: 'float64', value });
  }

  static string(value: string): Value {
    return new Value({ kind: 'string', value });
  }

  static symbol(value: string): Value {
    return new Value({ kind: 'symbol', value });
  }

  /** The bytes are copied; later changes to `data` do not leak in */
  static blob(data: Uint8Array): Value {
    return new Value({ kind: 'blob', value: Buffer.from(data) });
  }

  static timeTag(value: TimeTag): Value {
    return new Value({ kind: 'timetag', value });
  }

  static char(value: string): Value {
    const codePoint = value.codePointAt(0);
    if (codePoint === undefined || String.fromCodePoint(codePoint) !== value) {
      throw new OscError('InvalidArgument', `char must be exactly one character, got ${JSON.stringify(value)}`);
    }
    return new Value({ kind: 'char', value });
  }

  static color(value: RGBAColor | number): Value {
    const color = typeof value === 'number' ? unpackColor(value) : { ...value };
    assertByte(color.r, 'color.r');
    assertByte(color.g, 'color.g');
    assertByte(color.b, 'color.b');
    assertByte(color.a, 'color.a');
    return new Value({ kind: 'color', value: color });
  }

  static midi(port: number, status: number, data1: number, data2: number): Value {
    assertByte(port, 'midi.port');
    assertByte(status, 'midi.status');
    assertByte(data1, 'midi.data1');
    assertByte(data2, 'midi.data2');
    return new Value({ kind: 'midi', value: { port, status, data1, data2 } });
  }

  static bool(value: boolean): Value {
    return value ? Value.true() : Value.false();
  }

  static true(): Value {
    return new Value({ kind: 'true' });
  }

  static false(): Value {
    return new Value({ kind: 'false' });
  }

  static nil(): Value {
    return new Value({ kind: 'nil' });
  }

  static infinitum(): Value {
    return new Value({ kind: 'infinitum' });
  }

  static array(values: readonly Value[]): Value {
    return new Value({ kind: 'array', value: [...values] });
  }

  // --- Introspection ---

  get kind(): ValueKind {
    return this.data.kind;
  }

  /** Type tag characters; arrays include their brackets and element tags */
  get typeTag(): string {
    const d = this.data;
    if (d.kind === 'array') {
      return ARRAY_BEGIN_TAG + d.value.map((v) => v.typeTag).join('') + ARRAY_END_TAG;
    }
    return TYPE_TAGS[d.kind];
  }

  /** Read-only view of the underlying union, for exhaustive switches */
  get variant(): Readonly<ValueData> {
    return this.data;
  }

  // --- Accessors ---

  asInt32(): number {
    const d = this.data;
    if (d.kind !== 'int32') throw mismatch('int32', d.kind);
    return d.value;
  }

  asInt64(): bigint {
    const d = this.data;
    if (d.kind !== 'int64') throw mismatch('int64', d.kind);
    return d.value;
  }

  asFloat32(): number {
    const d = this.data;
    if (d.kind !== 'float32') throw mismatch('float32', d.kind);
    return d.value;
  }

  asFloat64(): number {
    const d = this.data;
    if (d.kind !== 'float64') throw mismatch('float64', d.kind);
    return d.value;
  }

  asString(): string {
    const d = this.data;
    if (d.kind !== 'string') throw mismatch('string', d.kind);
    return d.value;
  }

  asSymbol(): string {
    const d = this.data;
    if (d.kind !== 'symbol') throw mismatch('symbol', d.kind);
    return d.value;
  }

  /** Returns a copy */
  asBlob(): Buffer {
    const d = this.data;
    if (d.kind !== 'blob') throw mismatch('blob', d.kind);
    return Buffer.from(d.value);
  }

  asTimeTag(): TimeTag {
    const d = this.data;
    if (d.kind !== 'timetag') throw mismatch('timetag', d.kind);
    return d.value;
  }

  asChar(): string {
    const d = this.data;
    if (d.kind !== 'char') throw mismatch('char', d.kind);
    return d.value;
  }

  asColor(): RGBAColor {
    const d = this.data;
    if (d.kind !== 'color') throw mismatch('color', d.kind);
    return { ...d.value };
  }

  asMidi(): MidiMessage {
    const d = this.data;
    if (d.kind !== 'midi') throw mismatch('midi', d.kind);
    return { ...d.value };
  }

  asBool(): boolean {
    const d = this.data;
    if (d.kind === 'true') return true;
    if (d.kind === 'false') return false;
    throw mismatch('boolean', d.kind);
  }

  asArray(): readonly Value[] {
    const d = this.data;
    if (d.kind !== 'array') throw mismatch('array', d.kind);
    return d.value;
  }

  isNil(): boolean {
    return this.data.kind === 'nil';
  }

  isInfinitum(): boolean {
    return this.data.kind === 'infinitum';
  }

  // --- Wire format ---

  /** Payload bytes only; the type tag travels in the message header */
  serialize(): Buffer {
    const d = this.data;
    switch (d.kind) {
      case 'int32': {
        const buf = Buffer.alloc(4);
        buf.writeInt32BE(d.value, 0);
        return buf;
      }
      case 'int64': {
        const buf = Buffer.alloc(8);
        buf.writeBigInt64BE(d.value, 0);
        return buf;
      }
      case 'float32': {
        const buf = Buffer.alloc(4);
        buf.writeFloatBE(d.value, 0);
        return buf;
      }
      case 'float64': {
        const buf = Buffer.alloc(8);
        buf.writeDoubleBE(d.value, 0);
        return buf;
      }
      case 'string':
        return encodeOscString(d.value, 'string');
      case 'symbol':
        return encodeOscString(d.value, 'symbol');
      case 'blob': {
        const buf = Buffer.alloc(4 + padSize(d.value.length));
        buf.writeInt32BE(d.value.length, 0);
        d.value.copy(buf, 4);
        return buf;
      }
      case 'timetag': {
        const buf = Buffer.alloc(8);
        buf.writeUInt32BE(d.value.seconds, 0);
        buf.writeUInt32BE(d.value.fraction, 4);
        return buf;
      }
      case 'char': {
        const buf = Buffer.alloc(4);
        buf.writeUInt32BE(d.value.codePointAt(0) ?? 0, 0);
        return buf;
      }
      case 'color':
        return Buffer.from([d.value.r, d.value.g, d.value.b, d.value.a]);
      case 'midi':
        return Buffer.from([d.value.port, d.value.status, d.value.data1, d.value.data2]);
      case 'true':
      case 'false':
      case 'nil':
      case 'infinitum':
        return Buffer.alloc(0);
      case 'array':
        return Buffer.concat(d.value.map((v) => v.serialize()));
    }
  }

  /**
   * Read one non-array value for `tag` from the reader.
   * Array brackets are structural and handled by the message parser.
   */
  static deserialize(reader: ByteReader, tag: string): Value {
    switch (tag) {
      case 'i':
        return new Value({ kind: 'int32', value: reader.readInt32('int32 (i)') });
      case 'h':
        return new Value({ kind: 'int64', value: reader.readInt64('int64 (h)') });
      case 'f':
        return new Value({ kind: 'float32', value: reader.readFloat32('float32 (f)') });
      case 'd':
        return new Value({ kind: 'float64', value: reader.readFloat64('float64 (d)') });
      case 's':
        return new Value({ kind: 'string', value: reader.readOscString('string (s)') });
      case 'S':
        return new Value({ kind: 'symbol', value: reader.readOscString('symbol (S)') });
      case 'b': {
        const size = reader.readInt32('blob size (b)');
        if (size < 0) {
          throw new OscError('DeserializationError', `Negative blob size ${size}`, {
            offset: reader.offset,
            remaining: reader.remaining,
          });
        }
        const value = reader.readBytes(size, 'blob data (b)');
        reader.skipPadding(size, 'blob padding (b)');
        return new Value({ kind: 'blob', value });
      }
      case 't': {
        const seconds = reader.readUInt32('time tag seconds (t)');
        const fraction = reader.readUInt32('time tag fraction (t)');
        return new Value({ kind: 'timetag', value: new TimeTag(seconds, fraction) });
      }
      case 'c': {
        const codePoint = reader.readUInt32('char (c)');
        if (codePoint > 0x10ffff) {
          throw new OscError('DeserializationError', `Invalid char code point ${codePoint}`, {
            offset: reader.offset,
          });
        }
        return new Value({ kind: 'char', value: String.fromCodePoint(codePoint) });
      }
      case 'r': {
        const bytes = reader.readBytes(4, 'color (r)');
        return new Value({ kind: 'color', value: { r: bytes[0], g: bytes[1], b: bytes[2], a: bytes[3] } });
      }
      case 'm': {
        const bytes = reader.readBytes(4, 'midi (m)');
        return new Value({
          kind: 'midi',
          value: { port: bytes[0], status: bytes[1], data1: bytes[2], data2: bytes[3] },
        });
      }
      case 'T':
        return Value.true();
      case 'F':
        return Value.false();
      case 'N':
        return Value.nil();
      case 'I':
        return Value.infinitum();
      default:
        throw new OscError('MalformedPacket', `Unknown type tag '${tag}'`, { tag, offset: reader.offset });
    }
  }

  // --- Comparison ---

  equals(other: Value): boolean {
    const a = this.data;
    const b = other.data;
    switch (a.kind) {
      case 'int32':
      case 'float32':
      case 'float64':
        return b.kind === a.kind && sameNumber(a.value, b.value);
      case 'int64':
        return b.kind === 'int64' && a.value === b.value;
      case 'string':
      case 'symbol':
      case 'char':
        return b.kind === a.kind && a.value === b.value;
      case 'blob':
        return b.kind === 'blob' && a.value.equals(b.value);
      case 'timetag':
        return b.kind === 'timetag' && a.value.equals(b.value);
      case 'color':
        return b.kind === 'color' && packColor(a.value) === packColor(b.value);
      case 'midi':
        return (
          b.kind === 'midi' &&
          a.value.port === b.value.port &&
          a.value.status === b.value.status &&
          a.value.data1 === b.value.data1 &&
          a.value.data2 === b.value.data2
        );
      case 'true':
      case 'false':
      case 'nil':
      case 'infinitum':
        return b.kind === a.kind;
      case 'array': {
        if (b.kind !== 'array' || a.value.length !== b.value.length) return false;
        return a.value.every((v, i) => v.equals(b.value[i]));
      }
    }
  }

  toString(): string {
    const d = this.data;
    switch (d.kind) {
      case 'string':
      case 'symbol':
      case 'char':
        return `${TYPE_TAGS[d.kind]}:${JSON.stringify(d.value)}`;
      case 'int32':
      case 'float32':
      case 'float64':
      case 'int64':
        return `${TYPE_TAGS[d.kind]}:${d.value}`;
      case 'blob':
        return `b:<${d.value.length} bytes>`;
      case 'timetag':
        return `t:${d.value.toString()}`;
      case 'color':
        return `r:#${packColor(d.value).toString(16).padStart(8, '0')}`;
      case 'midi':
        return `m:${[d.value.port, d.value.status, d.value.data1, d.value.data2].join(',')}`;
      case 'array':
        return `[${d.value.map((v) => v.toString()).join(' ')}]`;
      default:
        return TYPE_TAGS[d.kind];
    }
  }
}

/** RGBA packed big-endian: 0xRRGGBBAA */
export function packColor(color: RGBAColor): number {
  return ((color.r << 24) | (color.g << 16) | (color.b << 8) | color.a) >>> 0;
}

export function unpackColor(packed: number): RGBAColor {
  if (!Number.isInteger(packed) || packed < 0 || packed > 0xffff_ffff) {
    throw new OscError('InvalidArgument', `Packed color must be a uint32, got ${packed}`);
  }
  return {
    r: (packed >>> 24) & 0xff,
    g: (packed >>> 16) & 0xff,
    b: (packed >>> 8) & 0xff,
    a: packed & 0xff,
  };
}
