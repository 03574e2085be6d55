/**
 * Entropy sources.
 *
 * CryptoEntropySource is the production source; SeededEntropySource gives
 * reproducible runs; ReplayEntropySource replays scripted bit patterns.
 * Any calibrated random-bit generator satisfies the EntropySource contract.
 */

import { randomBytes } from 'node:crypto';
import type { Bit, EntropyDraw, EntropyOptions, EntropySource } from './types.js';
import type { MindgateConfig } from '../core/types.js';
import { getLogger } from '../core/logger.js';

const UINT32_RANGE = 0x1_0000_0000;

const DEFAULT_OPTIONS: EntropyOptions = { length: 16, bias: 0.5 };

/**
 * mulberry32 — small 32-bit PRNG, good enough for decision bits and fully
 * reproducible from its seed.
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  };
}

function toBit(sample: number, bias: number): Bit {
  return sample < bias ? 1 : 0;
}

function sampleBits(next: () => number, options: EntropyOptions): Bit[] {
  const bits: Bit[] = [];
  for (let i = 0; i < options.length; i++) {
    bits.push(toBit(next(), options.bias));
  }
  return bits;
}

function normalizeOptions(options: Partial<EntropyOptions>): EntropyOptions {
  const merged = { ...DEFAULT_OPTIONS, ...options };
  if (!Number.isInteger(merged.length) || merged.length < 1) {
    throw new RangeError(`Entropy length must be a positive integer (got ${merged.length})`);
  }
  if (!(merged.bias >= 0 && merged.bias <= 1)) {
    throw new RangeError(`Entropy bias must be within [0, 1] (got ${merged.bias})`);
  }
  return merged;
}

export class SeededEntropySource implements EntropySource {
  readonly name = 'seeded';
  private readonly options: EntropyOptions;
  private next: () => number;

  constructor(seed: number, options: Partial<EntropyOptions> = {}) {
    this.options = normalizeOptions(options);
    this.next = mulberry32(seed);
  }

  draw(): EntropyDraw {
    return { bits: sampleBits(this.next, this.options), degraded: false, source: this.name };
  }

  reseed(seed: number): void {
    this.next = mulberry32(seed);
  }
}

export interface CryptoEntropyOptions extends Partial<EntropyOptions> {
  /** Byte generator; defaults to node:crypto randomBytes. */
  generator?: (size: number) => Uint8Array;
}

export class CryptoEntropySource implements EntropySource {
  readonly name = 'crypto';
  private readonly options: EntropyOptions;
  private readonly generator: (size: number) => Uint8Array;
  private seeded: (() => number) | null = null;
  private fallback: (() => number) | null = null;
  private logger = getLogger();

  constructor(options: CryptoEntropyOptions = {}) {
    const { generator, ...rest } = options;
    this.options = normalizeOptions(rest);
    this.generator = generator ?? randomBytes;
  }

  draw(): EntropyDraw {
    if (this.seeded) {
      return { bits: sampleBits(this.seeded, this.options), degraded: false, source: 'seeded' };
    }

    try {
      const bytes = this.generator(this.options.length * 4);
      if (bytes.length < this.options.length * 4) {
        throw new Error(`generator returned ${bytes.length} bytes, expected ${this.options.length * 4}`);
      }
      const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
      const bits: Bit[] = [];
      for (let i = 0; i < this.options.length; i++) {
        bits.push(toBit(view.getUint32(i * 4) / UINT32_RANGE, this.options.bias));
      }
      return { bits, degraded: false, source: this.name };
    } catch (err) {
      this.logger.warn(
        { error: err instanceof Error ? err.message : String(err) },
        'CryptoEntropySource: generator unavailable, using pseudo-random fallback',
      );
      if (!this.fallback) {
        this.fallback = mulberry32(Date.now() ^ process.pid);
      }
      return { bits: sampleBits(this.fallback, this.options), degraded: true, source: 'pseudo-random-fallback' };
    }
  }

  reseed(seed: number): void {
    this.seeded = mulberry32(seed);
  }
}

/**
 * Replays scripted bit patterns in order, cycling when exhausted.
 */
export class ReplayEntropySource implements EntropySource {
  readonly name = 'replay';
  private readonly patterns: Bit[][];
  private index = 0;

  constructor(patterns: Array<readonly Bit[] | string>) {
    if (patterns.length === 0) {
      throw new RangeError('ReplayEntropySource needs at least one pattern');
    }
    this.patterns = patterns.map(parseBits);
  }

  draw(): EntropyDraw {
    const bits = this.patterns[this.index % this.patterns.length];
    this.index++;
    return { bits: [...bits], degraded: false, source: this.name };
  }

  reseed(seed: number): void {
    this.index = Math.abs(Math.trunc(seed)) % this.patterns.length;
  }
}

/**
 * Parse "1011" (or an existing bit array) into bits. Whitespace is ignored.
 */
export function parseBits(pattern: readonly Bit[] | string): Bit[] {
  if (typeof pattern !== 'string') return [...pattern];

  const bits: Bit[] = [];
  for (const ch of pattern.replace(/\s+/g, '')) {
    if (ch === '0') bits.push(0);
    else if (ch === '1') bits.push(1);
    else throw new RangeError(`Invalid bit "${ch}" in entropy pattern "${pattern}"`);
  }
  if (bits.length === 0) {
    throw new RangeError('Entropy pattern is empty');
  }
  return bits;
}

export function createEntropySource(config: MindgateConfig['entropy']): EntropySource {
  const options = { length: config.bits, bias: config.bias };
  if (config.source === 'seeded') {
    return new SeededEntropySource(config.seed ?? 0, options);
  }
  const source = new CryptoEntropySource(options);
  if (config.seed !== undefined) {
    source.reseed(config.seed);
  }
  return source;
}
