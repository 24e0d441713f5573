/**
 * Episode Bitwise Encoding
 *
 * Encodes an episodic activity period (a medication course, an admission)
 * as a fixed-width bitmask, one bit per discretized time unit, and provides
 * the bitwise algebra used to compare episodes cheaply.
 *
 * Bit positions are indexed from the most significant end:
 * position 0 is the earliest sample, position `width - 1` the latest
 * (nearest the reference instant). Values are bigints so that widths
 * beyond 53 bits stay exact.
 */

import { add, isAfter, isBefore } from 'date-fns';
import type { StepDuration, TimeWindow } from '../schemas/episodeEncoding';
import { defaultEncodingConfig } from '../schemas/episodeEncoding';
import { IncompatibleOperandsError, InvalidWidthError } from './encodingErrors';

export type Bit = '0' | '1';

export interface TimeWindowOptions {
  /** Signed distance between samples (default: one day backward) */
  step?: StepDuration;
  /** Number of samples, i.e. the encoding width (default: 32) */
  bitCount?: number;
}

const toBigInt = (value: bigint | number, width: number): bigint => {
  if (typeof value === 'bigint') return value;
  if (!Number.isInteger(value)) {
    throw new InvalidWidthError({ value, width, reason: 'value must be an integer' });
  }
  return BigInt(value);
};

/**
 * Number of set bits in a non-negative bigint
 */
export const popCount = (value: bigint): number => {
  let count = 0;
  for (let rest = value; rest > 0n; rest >>= 1n) {
    count += Number(rest & 1n);
  }
  return count;
};

export class EpisodeEncoding {
  private coding: bigint;
  private bitSize: number;

  constructor(value: bigint | number, width: number) {
    if (!Number.isInteger(width) || width <= 0) {
      throw new InvalidWidthError({ value, width, reason: 'width must be a positive integer' });
    }
    const coding = toBigInt(value, width);
    if (coding < 0n) {
      throw new InvalidWidthError({ value, width, reason: 'value must not be negative' });
    }
    const limit = (1n << BigInt(width)) - 1n;
    if (coding >= limit) {
      throw new InvalidWidthError({
        value,
        width,
        reason: `value is too large to fit the size (limit ${limit.toString()})`,
      });
    }
    this.coding = coding;
    this.bitSize = width;
  }

  get value(): bigint {
    return this.coding;
  }

  get width(): number {
    return this.bitSize;
  }

  size(): number {
    return this.bitSize;
  }

  codingValue(): bigint {
    return this.coding;
  }

  /**
   * Population count of the stored integer
   */
  magnitude(): number {
    return popCount(this.coding);
  }

  lshift(steps: number): bigint {
    return this.coding << this.shiftCount(steps, 'shift count');
  }

  rshift(steps: number): bigint {
    return this.coding >> this.shiftCount(steps, 'shift count');
  }

  private shiftCount(steps: number, name: string): bigint {
    if (!Number.isInteger(steps)) {
      throw new InvalidWidthError({
        value: this.coding,
        width: this.bitSize,
        reason: `${name} must be an integer (got ${steps})`,
      });
    }
    return BigInt(steps);
  }

  /**
   * Bits of the encoding, most significant (position 0) first
   */
  bitSequence(): Bit[] {
    const bits: Bit[] = [];
    for (let position = 0; position < this.bitSize; position++) {
      const shift = BigInt(this.bitSize - 1 - position);
      bits.push(((this.coding >> shift) & 1n) === 1n ? '1' : '0');
    }
    return bits;
  }

  toBitString(): string {
    return this.bitSequence().join('');
  }

  /**
   * Reduce resolution by OR-merging consecutive groups of bits, starting
   * from the most significant end. The last group may be shorter.
   */
  scaleDown(groupSize: number): void {
    if (!Number.isInteger(groupSize) || groupSize <= 0) {
      throw new InvalidWidthError({
        value: this.coding,
        width: this.bitSize,
        reason: `group size must be a positive integer (got ${groupSize})`,
      });
    }

    const bits = this.bitSequence();
    const finalSize = Math.ceil(this.bitSize / groupSize);
    let result = 0n;
    for (let group = 0; group < finalSize; group++) {
      const run = bits.slice(group * groupSize, Math.min((group + 1) * groupSize, bits.length));
      if (run.includes('1')) {
        result |= 1n << BigInt(finalSize - group - 1);
      }
    }

    this.bitSize = finalSize;
    this.coding = result;
  }

  /**
   * Extend every set bit toward the least significant (later) end by
   * `extraBits` positions to model an effect that outlasts its event.
   * Bits pushed past the last position are dropped; the width is unchanged.
   */
  postExpand(extraBits: number): void {
    this.shiftCount(extraBits, 'extra bits');
    // after `width` passes every bit below the first set one is already set
    const passes = Math.min(extraBits, this.bitSize);
    for (let i = 0; i < passes; i++) {
      this.coding |= this.coding >> 1n;
    }
    this.coding &= (1n << BigInt(this.bitSize)) - 1n;
  }

  clone(): EpisodeEncoding {
    // scaleDown/postExpand can leave the all-ones value the constructor rejects
    const copy = new EpisodeEncoding(0n, this.bitSize);
    copy.coding = this.coding;
    return copy;
  }

  equals(other: EpisodeEncoding): boolean {
    return this.bitSize === other.bitSize && this.coding === other.coding;
  }

  /**
   * Sum of (width - position) over set positions; earlier bits weigh more
   */
  scoreBitOrder(): number {
    let score = 0;
    for (let position = 0; position < this.bitSize; position++) {
      if (((this.coding >> BigInt(this.bitSize - position - 1)) & 1n) !== 0n) {
        score += this.bitSize - position;
      }
    }
    return score;
  }

  // ==========================================================================
  // COMBINATORS
  // ==========================================================================

  static zero(width: number): EpisodeEncoding {
    return new EpisodeEncoding(0n, width);
  }

  static assertCompatible(left: EpisodeEncoding, right: EpisodeEncoding): void {
    if (left.width !== right.width) {
      throw new IncompatibleOperandsError({ leftWidth: left.width, rightWidth: right.width });
    }
  }

  static and(left: EpisodeEncoding, right: EpisodeEncoding): EpisodeEncoding {
    EpisodeEncoding.assertCompatible(left, right);
    return new EpisodeEncoding(left.value & right.value, left.width);
  }

  static or(left: EpisodeEncoding, right: EpisodeEncoding): EpisodeEncoding {
    EpisodeEncoding.assertCompatible(left, right);
    return new EpisodeEncoding(left.value | right.value, left.width);
  }

  /**
   * Co-occurrence of two episodes once both are post-expanded by `extraBits`
   * (e.g. a drug-drug interaction window). An empty operand short-circuits to
   * an empty result of the left width without checking compatibility.
   */
  static interaction(left: EpisodeEncoding, right: EpisodeEncoding, extraBits: number): EpisodeEncoding {
    if (left.value === 0n || right.value === 0n) {
      return EpisodeEncoding.zero(left.width);
    }
    EpisodeEncoding.assertCompatible(left, right);

    const expandedLeft = left.clone();
    expandedLeft.postExpand(extraBits);
    const expandedRight = right.clone();
    expandedRight.postExpand(extraBits);

    const overlap = EpisodeEncoding.zero(left.width);
    overlap.coding = expandedLeft.coding & expandedRight.coding;
    return overlap;
  }

  // ==========================================================================
  // TIME WINDOWS
  // ==========================================================================

  /**
   * Sample `bitCount` instants from the reference time, `step` apart, and set
   * position `bitCount - 1 - i` when sample `i` lies within [start, end].
   * Sample 0 is the reference instant itself (least significant bit).
   */
  static fromTimeWindow(window: TimeWindow, options: TimeWindowOptions = {}): EpisodeEncoding {
    const step = options.step ?? defaultEncodingConfig.step;
    const bitCount = options.bitCount ?? defaultEncodingConfig.bitCount;

    let cursor = window.referenceTime;
    let code = 0n;
    for (let i = 0; i < bitCount; i++) {
      if (!isBefore(cursor, window.start) && !isAfter(cursor, window.end)) {
        code |= 1n << BigInt(i);
      }
      cursor = add(cursor, step);
    }
    return new EpisodeEncoding(code, bitCount);
  }
}
