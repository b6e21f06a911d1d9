import type { Faction, HistoricalPeriod, Senator } from '../types/index.js';
import { resolveTraits } from '../types/index.js';
import { ownValue } from '../utils/own.js';

/**
 * Mean influence of each faction's attending senators, scaled by the
 * multipliers of every historical period that has begun by `year`.
 */
export function computeFactionInfluence(
  roster: readonly Senator[],
  year: number | undefined,
  periods: readonly HistoricalPeriod[] = [],
): Record<Faction, number> {
  const totals = new Map<Faction, { sum: number; count: number }>();
  for (const senator of roster) {
    const entry = totals.get(senator.faction) ?? { sum: 0, count: 0 };
    entry.sum += resolveTraits(senator).influence;
    entry.count += 1;
    totals.set(senator.faction, entry);
  }

  const active = year === undefined ? [] : periods.filter((p) => p.fromYear <= year);
  const influence: Record<Faction, number> = {};
  for (const [faction, { sum, count }] of totals) {
    let value = sum / count;
    for (const period of active) {
      value *= ownValue(period.influenceMultipliers, faction) ?? 1;
    }
    influence[faction] = value;
  }
  return influence;
}
