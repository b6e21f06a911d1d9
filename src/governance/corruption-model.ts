/**
 * Corruption Model — per-faction priors for the corruption trait.
 *
 * A senator without a corruption trait gets one value drawn uniformly from
 * their faction's range, once per session. Faction-level corruptibility
 * (used when factions weigh self-serving amendments) is drawn from the same
 * ranges.
 */

import type { Faction, Senator, SenatorId } from '../types/index.js';
import { type RandomSource, uniform } from '../kernel/random.js';
import { clampUnit } from '../utils/clamp.js';

export interface CorruptionRange {
  min: number;
  max: number;
}

export const CORRUPTION_RANGES: Readonly<Record<string, CorruptionRange>> = {
  Optimates: { min: 0.2, max: 0.6 },   // Traditional aristocrats
  Populares: { min: 0.1, max: 0.5 },   // Popular reformers
  Military: { min: 0.3, max: 0.8 },
  Religious: { min: 0.1, max: 0.4 },
  Merchant: { min: 0.4, max: 0.9 },    // Business interests
};

export const DEFAULT_CORRUPTION_RANGE: CorruptionRange = { min: 0.1, max: 0.5 };

export function corruptionRangeFor(faction: Faction): CorruptionRange {
  return Object.hasOwn(CORRUPTION_RANGES, faction) ? CORRUPTION_RANGES[faction] : DEFAULT_CORRUPTION_RANGE;
}

export class CorruptionModel {
  private readonly assigned = new Map<SenatorId, number>();

  /** Uniform draw from the faction's range. */
  sample(faction: Faction, rng: RandomSource): number {
    const range = corruptionRangeFor(faction);
    return clampUnit(uniform(rng, range.min, range.max));
  }

  /**
   * The senator's corruption: an external override, their own trait, or a
   * draw made on first request and reused for the rest of the session.
   */
  traitFor(senator: Senator, rng: RandomSource): number {
    const known = this.assigned.get(senator.id);
    if (known !== undefined) return known;

    const own = senator.traits.corruption;
    if (own !== undefined) return clampUnit(own);

    const drawn = this.sample(senator.faction, rng);
    this.assigned.set(senator.id, drawn);
    return drawn;
  }

  override(senatorId: SenatorId, value: number): void {
    this.assigned.set(senatorId, clampUnit(value));
  }

  /** Draws recorded so far (overrides included). */
  assignments(): Record<SenatorId, number> {
    return Object.fromEntries([...this.assigned].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }

  restore(assignments: Record<SenatorId, number>): void {
    this.assigned.clear();
    for (const [id, value] of Object.entries(assignments)) {
      this.assigned.set(id, clampUnit(value));
    }
  }

  /** One corruptibility level per faction, in the order given. */
  sampleFactionLevels(factions: readonly Faction[], rng: RandomSource): Record<Faction, number> {
    const levels: Record<Faction, number> = {};
    for (const faction of factions) {
      levels[faction] = this.sample(faction, rng);
    }
    return levels;
  }
}
