/**
 * EPISODE ENCODING - CORE ALGEBRA TEST SUITE
 *
 * Covers construction boundaries, bit rendering, resolution changes,
 * lingering-effect expansion, combinators and time window sampling.
 * Dates are built in local time so day steps stay calendar-aligned.
 */

import { describe, it, expect } from 'vitest';
import { EpisodeEncoding, popCount } from '../services/episodeEncoding';
import { IncompatibleOperandsError, InvalidWidthError } from '../services/encodingErrors';

const bits = (value: number, width: number) => new EpisodeEncoding(value, width);

// ============================================================================
// 1. CONSTRUCTION
// ============================================================================

describe('EpisodeEncoding construction', () => {
  it('round-trips value and width through accessors', () => {
    const e = bits(5, 4);
    expect(e.value).toBe(5n);
    expect(e.width).toBe(4);
    expect(e.codingValue()).toBe(5n);
    expect(e.size()).toBe(4);
  });

  it('accepts every value below 2^width - 1 and rejects the rest', () => {
    for (let width = 1; width <= 8; width++) {
      const limit = 2 ** width - 1;
      for (let value = 0; value < limit; value++) {
        expect(bits(value, width).value).toBe(BigInt(value));
      }
      expect(() => bits(limit, width)).toThrow(InvalidWidthError);
      expect(() => bits(limit + 1, width)).toThrow(InvalidWidthError);
    }
  });

  it('rejects the all-ones pattern', () => {
    expect(() => bits(15, 4)).toThrow(InvalidWidthError);
    expect(bits(14, 4).toBitString()).toBe('1110');
  });

  it('rejects negative values, fractional values and bad widths', () => {
    expect(() => bits(-1, 4)).toThrow(InvalidWidthError);
    expect(() => bits(1.5, 4)).toThrow(InvalidWidthError);
    expect(() => bits(0, 0)).toThrow(InvalidWidthError);
    expect(() => bits(0, 2.5)).toThrow(InvalidWidthError);
  });

  it('reports the offending value and width on the error', () => {
    try {
      bits(16, 4);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidWidthError);
      if (error instanceof InvalidWidthError) {
        expect(error._tag).toBe('InvalidWidthError');
        expect(error.value).toBe(16);
        expect(error.width).toBe(4);
        expect(error.reason).toBe('value is too large to fit the size (limit 15)');
      }
    }
  });

  it('keeps widths beyond 53 bits exact', () => {
    const e = new EpisodeEncoding((1n << 99n) + 1n, 100);
    expect(e.magnitude()).toBe(2);
    expect(e.toBitString()).toBe('1' + '0'.repeat(98) + '1');
  });
});

// ============================================================================
// 2. BIT RENDERING & SCORING
// ============================================================================

describe('bitSequence', () => {
  it('renders the most significant bit first', () => {
    const e = new EpisodeEncoding(2147483648, 32);
    expect(e.toBitString()).toBe('1' + '0'.repeat(31));
    expect(e.bitSequence()).toHaveLength(32);
    expect(e.scoreBitOrder()).toBe(32);
  });

  it('pads on the left to the declared width', () => {
    expect(bits(5, 6).bitSequence()).toEqual(['0', '0', '0', '1', '0', '1']);
    expect(bits(0, 3).toBitString()).toBe('000');
  });

  it('magnitude matches the number of 1 characters', () => {
    for (let value = 0; value < 63; value++) {
      const e = bits(value, 6);
      expect(e.magnitude()).toBe(e.bitSequence().filter((b) => b === '1').length);
    }
  });

  it('scores earlier positions higher', () => {
    // positions 1 and 3 of 4: (4 - 1) + (4 - 3)
    expect(bits(0b0101, 4).scoreBitOrder()).toBe(4);
    expect(bits(0, 4).scoreBitOrder()).toBe(0);
  });

  it('popCount counts set bits of raw values', () => {
    expect(popCount(0n)).toBe(0);
    expect(popCount(0b1011n)).toBe(3);
  });
});

describe('shifts', () => {
  it('shift the raw value without masking or changing width', () => {
    const e = bits(5, 4);
    expect(e.lshift(2)).toBe(20n);
    expect(e.rshift(1)).toBe(2n);
    expect(e.width).toBe(4);
    expect(e.value).toBe(5n);
  });

  it('reject fractional shift counts', () => {
    const e = bits(5, 4);
    expect(() => e.lshift(1.5)).toThrow(InvalidWidthError);
    expect(() => e.rshift(1.5)).toThrow(InvalidWidthError);
  });
});

// ============================================================================
// 3. SCALE DOWN
// ============================================================================

describe('scaleDown', () => {
  it('OR-merges groups from the most significant end', () => {
    const e = bits(0b101100, 6);
    e.scaleDown(2);
    expect(e.width).toBe(3);
    expect(e.toBitString()).toBe('110');
  });

  it('allows a shorter final group', () => {
    const e = bits(0b1000001, 7);
    e.scaleDown(3);
    expect(e.width).toBe(3);
    expect(e.value).toBe(0b101n);
  });

  it('is the identity for a group size of 1', () => {
    for (let value = 0; value < 31; value++) {
      const e = bits(value, 5);
      e.scaleDown(1);
      expect(e.width).toBe(5);
      expect(e.value).toBe(BigInt(value));
    }
  });

  it('keeps an empty encoding empty at ceil(width / k) bits', () => {
    const e = EpisodeEncoding.zero(10);
    e.scaleDown(3);
    expect(e.width).toBe(4);
    expect(e.value).toBe(0n);
  });

  it('collapses to a single bit when grouping the whole width', () => {
    const e = bits(0b0010, 4);
    e.scaleDown(4);
    expect(e.toBitString()).toBe('1');
  });

  it('rejects non-positive group sizes', () => {
    expect(() => bits(3, 4).scaleDown(0)).toThrow(InvalidWidthError);
  });
});

// ============================================================================
// 4. POST EXPAND
// ============================================================================

describe('postExpand', () => {
  it('extends set bits toward the least significant end', () => {
    const e = bits(0b001000, 6);
    e.postExpand(2);
    expect(e.toBitString()).toBe('001110');
    expect(e.width).toBe(6);
  });

  it('is a no-op for 0 extra bits', () => {
    const e = bits(0b1010, 4);
    e.postExpand(0);
    expect(e.value).toBe(0b1010n);
  });

  it('drops bits pushed past the last position', () => {
    const e = bits(1, 4);
    e.postExpand(3);
    expect(e.toBitString()).toBe('0001');
  });

  it('never grows the width', () => {
    const e = bits(0b100000, 6);
    e.postExpand(10);
    expect(e.toBitString()).toBe('111111');
    expect(e.bitSequence()).toHaveLength(6);
  });

  it('rejects a fractional number of extra bits', () => {
    const e = bits(0b1000, 4);
    expect(() => e.postExpand(1.5)).toThrow(InvalidWidthError);
    expect(e.toBitString()).toBe('1000');
  });

  it('treats huge expansions like a full-width expansion', () => {
    const e = bits(0b0100, 4);
    e.postExpand(1e9);
    expect(e.toBitString()).toBe('0111');
    expect(EpisodeEncoding.interaction(bits(0b1000, 4), bits(0b0010, 4), 1e9).toBitString()).toBe('0011');
  });
});

describe('clone', () => {
  it('returns an independent copy', () => {
    const e = bits(0b1000, 4);
    const copy = e.clone();
    copy.postExpand(1);
    expect(copy.value).toBe(0b1100n);
    expect(e.value).toBe(0b1000n);
    expect(e.equals(bits(0b1000, 4))).toBe(true);
  });

  it('copies expanded values the constructor would reject', () => {
    const e = bits(0b100000, 6);
    e.postExpand(5);
    const copy = e.clone();
    expect(copy.value).toBe(63n);
    expect(copy.width).toBe(6);
  });
});

// ============================================================================
// 5. COMBINATORS
// ============================================================================

describe('and / or', () => {
  const a = bits(0b1100, 4);
  const b = bits(0b1010, 4);

  it('combine equal-width operands', () => {
    expect(EpisodeEncoding.and(a, b).value).toBe(0b1000n);
    expect(EpisodeEncoding.or(a, b).value).toBe(0b1110n);
    expect(EpisodeEncoding.and(a, b).width).toBe(4);
  });

  it('are commutative', () => {
    expect(EpisodeEncoding.and(a, b).equals(EpisodeEncoding.and(b, a))).toBe(true);
    expect(EpisodeEncoding.or(a, b).equals(EpisodeEncoding.or(b, a))).toBe(true);
  });

  it('and is idempotent and zero is the identity of or', () => {
    expect(EpisodeEncoding.and(a, a).equals(a)).toBe(true);
    expect(EpisodeEncoding.or(a, EpisodeEncoding.zero(4)).equals(a)).toBe(true);
  });

  it('does not mutate operands', () => {
    EpisodeEncoding.or(a, b);
    expect(a.value).toBe(0b1100n);
    expect(b.value).toBe(0b1010n);
  });

  it('fail on mismatched widths', () => {
    const wide = bits(3, 5);
    expect(() => EpisodeEncoding.and(a, wide)).toThrow(IncompatibleOperandsError);
    expect(() => EpisodeEncoding.or(wide, a)).toThrow(IncompatibleOperandsError);
    expect(() => EpisodeEncoding.assertCompatible(a, wide)).toThrow(
      'Operands are not equally sized (4 bits vs 5 bits)'
    );
  });

  it('or producing the all-ones pattern hits the construction boundary', () => {
    expect(() => EpisodeEncoding.or(bits(0b1100, 4), bits(0b0011, 4))).toThrow(InvalidWidthError);
  });
});

describe('interaction', () => {
  it('short-circuits on an empty operand without a width check', () => {
    const left = EpisodeEncoding.interaction(EpisodeEncoding.zero(4), bits(5, 8), 2);
    expect(left.value).toBe(0n);
    expect(left.width).toBe(4);

    const right = EpisodeEncoding.interaction(bits(5, 8), EpisodeEncoding.zero(4), 1);
    expect(right.value).toBe(0n);
    expect(right.width).toBe(8);
  });

  it('fails on mismatched non-empty operands', () => {
    expect(() => EpisodeEncoding.interaction(bits(1, 4), bits(1, 5), 0)).toThrow(
      IncompatibleOperandsError
    );
  });

  it('detects overlap only once the lingering effect reaches the other episode', () => {
    const early = bits(0b100000, 6);
    const late = bits(0b000100, 6);
    expect(EpisodeEncoding.interaction(early, late, 0).value).toBe(0n);
    expect(EpisodeEncoding.interaction(early, late, 2).value).toBe(0n);
    // early expands to 111100, late to 000111
    expect(EpisodeEncoding.interaction(early, late, 3).toBitString()).toBe('000100');
  });

  it('leaves its operands untouched', () => {
    const early = bits(0b100000, 6);
    const late = bits(0b000100, 6);
    EpisodeEncoding.interaction(early, late, 3);
    expect(early.value).toBe(0b100000n);
    expect(late.value).toBe(0b000100n);
  });

  it('self-interaction of a non-empty encoding is non-empty', () => {
    for (const value of [1, 6, 32]) {
      for (const extraBits of [0, 1, 5]) {
        const e = bits(value, 6);
        expect(EpisodeEncoding.interaction(e, e, extraBits).value).not.toBe(0n);
      }
    }
    expect(EpisodeEncoding.interaction(bits(32, 6), bits(32, 6), 5).value).toBe(63n);
  });
});

// ============================================================================
// 6. TIME WINDOWS
// ============================================================================

describe('fromTimeWindow', () => {
  const day = (d: number) => new Date(2024, 0, d);

  it('sets only the least significant bit for a window at the reference instant', () => {
    const t = day(10);
    const e = EpisodeEncoding.fromTimeWindow(
      { start: t, end: t, referenceTime: t },
      { step: { days: -1 }, bitCount: 4 }
    );
    expect(e.value).toBe(1n);
    expect(e.toBitString()).toBe('0001');
  });

  it('places earlier days at more significant positions', () => {
    // samples: 10, 9, 8*, 7*, 6, 5
    const e = EpisodeEncoding.fromTimeWindow(
      { start: day(7), end: day(8), referenceTime: day(10) },
      { step: { days: -1 }, bitCount: 6 }
    );
    expect(e.toBitString()).toBe('001100');
  });

  it('includes both ends of the window', () => {
    const e = EpisodeEncoding.fromTimeWindow(
      { start: day(9), end: day(10), referenceTime: day(10) },
      { bitCount: 4 }
    );
    expect(e.toBitString()).toBe('0011');
  });

  it('supports sub-day steps', () => {
    // samples: 12:00, 06:00*, 00:00*, 18:00 the day before
    const e = EpisodeEncoding.fromTimeWindow(
      {
        start: new Date(2024, 0, 10, 0),
        end: new Date(2024, 0, 10, 6),
        referenceTime: new Date(2024, 0, 10, 12),
      },
      { step: { hours: -6 }, bitCount: 4 }
    );
    expect(e.toBitString()).toBe('0110');
  });

  it('encodes a reversed window as empty', () => {
    const e = EpisodeEncoding.fromTimeWindow(
      { start: day(9), end: day(7), referenceTime: day(10) },
      { bitCount: 8 }
    );
    expect(e.value).toBe(0n);
  });

  it('defaults to 32 daily samples', () => {
    const e = EpisodeEncoding.fromTimeWindow({ start: day(1), end: day(1), referenceTime: day(10) });
    expect(e.width).toBe(32);
    // day 1 is sample 9
    expect(e.value).toBe(1n << 9n);
  });

  it('rejects a window covering every sample (all-ones boundary)', () => {
    expect(() =>
      EpisodeEncoding.fromTimeWindow(
        { start: day(1), end: day(20), referenceTime: day(10) },
        { bitCount: 4 }
      )
    ).toThrow(InvalidWidthError);
  });
});
