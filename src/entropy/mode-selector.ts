import type { Mode } from '../core/types.js';
import type { Bit } from './types.js';

export interface ModeSelectorOptions {
  chaosThreshold: number;
  balancedThreshold?: number;
}

export interface ModeProfile {
  mode: Mode;
  guidance: string;
  /** Sampling temperature handed to the language model for this mode. */
  temperature: number;
}

const PROFILES: Record<Mode, ModeProfile> = {
  logic: { mode: 'logic', guidance: 'Adhere strictly to established facts and conservative options.', temperature: 0.2 },
  balanced: { mode: 'balanced', guidance: 'Mix proven approaches with new ideas.', temperature: 0.5 },
  chaos: { mode: 'chaos', guidance: 'Explore unconventional options and creative alternatives.', temperature: 0.9 },
};

/**
 * Maps a bit sequence to a Mode by comparing the fraction of set bits to
 * configured thresholds. Pure: the same bits always give the same Mode.
 */
export class ModeSelector {
  private readonly chaosThreshold: number;
  private readonly balancedThreshold?: number;

  constructor(options: ModeSelectorOptions) {
    if (!(options.chaosThreshold >= 0 && options.chaosThreshold <= 1)) {
      throw new RangeError(`chaosThreshold must be within [0, 1] (got ${options.chaosThreshold})`);
    }
    if (options.balancedThreshold !== undefined && !(options.balancedThreshold < options.chaosThreshold)) {
      throw new RangeError('balancedThreshold must be below chaosThreshold');
    }
    this.chaosThreshold = options.chaosThreshold;
    this.balancedThreshold = options.balancedThreshold;
  }

  /** Fraction of set bits; 0 for an empty sequence. */
  score(bits: readonly Bit[]): number {
    if (bits.length === 0) return 0;
    let set = 0;
    for (const bit of bits) set += bit;
    return set / bits.length;
  }

  select(bits: readonly Bit[]): Mode {
    if (bits.length === 0) return 'logic';

    const fraction = this.score(bits);
    if (fraction >= this.chaosThreshold) return 'chaos';
    if (this.balancedThreshold !== undefined && fraction >= this.balancedThreshold) return 'balanced';
    return 'logic';
  }
}

export function describeMode(mode: Mode): ModeProfile {
  return PROFILES[mode];
}
