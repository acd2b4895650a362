/**
 * OSC time tag: a 64-bit NTP timestamp.
 *
 *   seconds   uint32  seconds since 1900-01-01T00:00:00Z
 *   fraction  uint32  fractional second in units of 2^-32 s
 *
 * (0, 1) is the reserved "immediately" value.
 */

import { OscError } from './errors';

/** Seconds between the NTP epoch (1900) and the Unix epoch (1970) */
export const NTP_EPOCH_OFFSET = 2_208_988_800;

const TWO_POW_32 = 0x1_0000_0000;
const UINT32_MAX = 0xffff_ffff;

function assertUInt32(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw new OscError('InvalidArgument', `TimeTag ${field} must be a uint32, got ${value}`, { field });
  }
}

export class TimeTag {
  readonly seconds: number;
  readonly fraction: number;

  constructor(seconds = 0, fraction = 1) {
    assertUInt32(seconds, 'seconds');
    assertUInt32(fraction, 'fraction');
    this.seconds = seconds;
    this.fraction = fraction;
  }

  static immediate(): TimeTag {
    return new TimeTag(0, 1);
  }

  static now(): TimeTag {
    return TimeTag.fromMillis(Date.now());
  }

  /** From the packed 64-bit NTP value (seconds in the high word) */
  static fromNtp(ntp: bigint): TimeTag {
    if (ntp < 0n || ntp > 0xffff_ffff_ffff_ffffn) {
      throw new OscError('InvalidArgument', `NTP value out of range: ${ntp}`);
    }
    return new TimeTag(Number(ntp >> 32n), Number(ntp & 0xffff_ffffn));
  }

  /**
   * From Unix epoch milliseconds. Times past 2036 wrap into the next
   * NTP era, as on the wire.
   */
  static fromMillis(ms: number): TimeTag {
    if (!Number.isFinite(ms)) {
      throw new OscError('InvalidArgument', `Cannot build a TimeTag from ${ms}`);
    }
    const unixSeconds = Math.floor(ms / 1000);
    const remainderMs = ms - unixSeconds * 1000;
    const seconds = (((unixSeconds + NTP_EPOCH_OFFSET) % TWO_POW_32) + TWO_POW_32) % TWO_POW_32;
    const fraction = Math.min(UINT32_MAX, Math.floor((remainderMs * TWO_POW_32) / 1000));
    return new TimeTag(seconds, fraction);
  }

  static fromDate(date: Date): TimeTag {
    return TimeTag.fromMillis(date.getTime());
  }

  toNtp(): bigint {
    return (BigInt(this.seconds) << 32n) | BigInt(this.fraction);
  }

  /** Unix epoch milliseconds, including the sub-millisecond part */
  toMillis(): number {
    return (this.seconds - NTP_EPOCH_OFFSET) * 1000 + (this.fraction * 1000) / TWO_POW_32;
  }

  toDate(): Date {
    return new Date(Math.round(this.toMillis()));
  }

  isImmediate(): boolean {
    return this.seconds === 0 && this.fraction === 1;
  }

  /** Negative, zero or positive, like a sort comparator */
  compare(other: TimeTag): number {
    if (this.seconds !== other.seconds) return this.seconds < other.seconds ? -1 : 1;
    if (this.fraction !== other.fraction) return this.fraction < other.fraction ? -1 : 1;
    return 0;
  }

  equals(other: TimeTag): boolean {
    return this.compare(other) === 0;
  }

  lessThan(other: TimeTag): boolean {
    return this.compare(other) < 0;
  }

  greaterThan(other: TimeTag): boolean {
    return this.compare(other) > 0;
  }

  toString(): string {
    if (this.isImmediate()) return 'immediate';
    return `${this.seconds}.${this.fraction.toString(16).padStart(8, '0')}`;
  }
}
