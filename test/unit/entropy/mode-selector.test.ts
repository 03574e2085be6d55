import { describe, it, expect } from 'vitest';
import { ModeSelector, describeMode } from '../../../src/entropy/mode-selector.js';
import { SeededEntropySource } from '../../../src/entropy/entropy-source.js';
import type { Bit } from '../../../src/entropy/types.js';

/** Every sequence of `length` bits, in counting order. */
function allSequences(length: number): Bit[][] {
  const sequences: Bit[][] = [];
  for (let n = 0; n < 2 ** length; n++) {
    sequences.push(Array.from({ length }, (_, i): Bit => ((n >> i) & 1) === 1 ? 1 : 0));
  }
  return sequences;
}

const setCount = (bits: readonly Bit[]): number => bits.filter(bit => bit === 1).length;

describe('ModeSelector', () => {
  const selector = new ModeSelector({ chaosThreshold: 0.5 });

  it('should select chaos when the set fraction reaches the threshold', () => {
    expect(selector.select([1, 1, 1, 1])).toBe('chaos');
    expect(selector.select([1, 0, 1, 0])).toBe('chaos');
  });

  it('should select logic below the threshold', () => {
    expect(selector.select([1, 0, 0, 0])).toBe('logic');
    expect(selector.select([0, 0, 0, 0])).toBe('logic');
  });

  it('should select logic for an empty draw', () => {
    expect(selector.select([])).toBe('logic');
    expect(selector.score([])).toBe(0);
  });

  it('should be pure', () => {
    const bits = [1, 0, 1, 1, 0] as const;
    expect(selector.select(bits)).toBe(selector.select(bits));
    expect(selector.score(bits)).toBe(0.6);
  });

  it('should follow the threshold rule for every 8-bit sequence, on every call', () => {
    const sequences = allSequences(8);
    expect(sequences).toHaveLength(256);

    for (const bits of sequences) {
      const expected = setCount(bits) >= 4 ? 'chaos' : 'logic';
      expect(selector.select(bits)).toBe(expected);
      expect(selector.select([...bits])).toBe(expected);
    }
  });

  it('should map every 8-bit sequence into the configured bands', () => {
    const banded = new ModeSelector({ chaosThreshold: 0.75, balancedThreshold: 0.5 });

    for (const bits of allSequences(8)) {
      const set = setCount(bits);
      const expected = set >= 6 ? 'chaos' : set >= 4 ? 'balanced' : 'logic';
      expect(banded.select(bits)).toBe(expected);
    }
  });

  it('should give the same mode when a seeded draw is replayed', () => {
    for (let seed = 1; seed <= 50; seed++) {
      const first = new SeededEntropySource(seed, { length: 16 }).draw().bits;
      const replayed = new SeededEntropySource(seed, { length: 16 }).draw().bits;

      expect(replayed).toEqual(first);
      expect(selector.select(replayed)).toBe(selector.select(first));
      expect(selector.select(first)).toBe(setCount(first) >= 8 ? 'chaos' : 'logic');
    }
  });

  it('should select balanced only when a balanced band is configured', () => {
    const banded = new ModeSelector({ chaosThreshold: 0.75, balancedThreshold: 0.5 });
    expect(banded.select([1, 1, 0, 0])).toBe('balanced');
    expect(banded.select([1, 1, 1, 0])).toBe('chaos');
    expect(banded.select([1, 0, 0, 0])).toBe('logic');
    expect(new ModeSelector({ chaosThreshold: 0.75 }).select([1, 1, 0, 0])).toBe('logic');
  });

  it('should reject invalid thresholds', () => {
    expect(() => new ModeSelector({ chaosThreshold: 1.2 })).toThrow(RangeError);
    expect(() => new ModeSelector({ chaosThreshold: 0.5, balancedThreshold: 0.6 })).toThrow(RangeError);
  });
});

describe('describeMode', () => {
  it('should give each mode a temperature', () => {
    expect(describeMode('logic').temperature).toBe(0.2);
    expect(describeMode('balanced').temperature).toBe(0.5);
    expect(describeMode('chaos').temperature).toBe(0.9);
  });
});
