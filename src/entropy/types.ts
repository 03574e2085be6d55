/**
 * Entropy Type Definitions
 * Decision bits that fix a run's behavioural mode.
 */

export type Bit = 0 | 1;

export interface EntropyDraw {
  bits: readonly Bit[];
  /** True when the primary generator failed and a pseudo-random fallback produced the bits. */
  degraded: boolean;
  source: string;
}

export interface EntropySource {
  readonly name: string;
  draw(): EntropyDraw;
  /** Make subsequent draws deterministic. */
  reseed(seed: number): void;
}

export interface EntropyOptions {
  /** Number of bits per draw. */
  length: number;
  /** Probability that a single bit is set (0.5 is unbiased). */
  bias: number;
}
