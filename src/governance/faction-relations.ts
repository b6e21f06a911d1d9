/**
 * Faction Relation Graph — symmetric relation scores between political blocs.
 *
 * Scores live in [-1, 1]. Unknown factions and unset pairs read as neutral (0).
 * Scores move only through deliberate alliance formation, historical period
 * shifts and the explicit decay policy; ordinary votes never touch them.
 *
 * @see src/governance/backroom-negotiation.ts — alliance nudges
 */

import type { Faction, HistoricalPeriod, RelationMap } from '../types/index.js';
import { type RandomSource, uniform } from '../kernel/random.js';
import { createLogger } from '../kernel/logger.js';
import { SymmetricPairMap } from './pair-map.js';

const log = createLogger('faction-relations');

export class FactionRelationGraph {
  private readonly scores: SymmetricPairMap;

  constructor(scores: SymmetricPairMap = new SymmetricPairMap()) {
    this.scores = scores;
  }

  /** Symmetric lookup; 0 for unknown pairs and for a faction with itself. */
  get(factionA: Faction, factionB: Faction): number {
    return this.scores.get(factionA, factionB);
  }

  set(factionA: Faction, factionB: Faction, value: number): number {
    return this.scores.set(factionA, factionB, value);
  }

  /** Add delta and clamp the result to [-1, 1]. Returns the stored value. */
  adjust(factionA: Faction, factionB: Faction, delta: number): number {
    return this.scores.adjust(factionA, factionB, delta);
  }

  /**
   * Multiplicative decay toward neutral. Returns the number of pairs touched.
   */
  decay(factor: number): number {
    if (factor >= 1) return 0;
    return this.scores.scale(Math.max(0, factor));
  }

  factions(): Faction[] {
    const names = new Set<Faction>();
    for (const [a, b] of this.scores.entries()) {
      names.add(a);
      names.add(b);
    }
    return [...names].sort();
  }

  entries(): Array<[Faction, Faction, number]> {
    return this.scores.entries();
  }

  /** Working copy for a staged round. */
  fork(): FactionRelationGraph {
    return new FactionRelationGraph(this.scores.clone());
  }

  replaceWith(other: FactionRelationGraph): void {
    this.scores.replaceWith(other.scores);
  }

  toJSON(): RelationMap {
    return this.scores.toJSON();
  }

  static fromJSON(data: RelationMap): FactionRelationGraph {
    return new FactionRelationGraph(SymmetricPairMap.fromJSON(data));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SEEDING
// ═══════════════════════════════════════════════════════════════════════════

type Prior = readonly [Faction, Faction, number | readonly [number, number]];

/** Fixed values or uniform ranges drawn once at simulation start. */
const RELATION_PRIORS: readonly Prior[] = [
  ['Optimates', 'Populares', -0.7],
  ['Military', 'Optimates', 0.3],
  ['Military', 'Populares', [-0.3, 0.3]],
  ['Religious', 'Optimates', 0.5],
  ['Religious', 'Populares', -0.2],
  ['Merchant', 'Optimates', [-0.1, 0.4]],
  ['Merchant', 'Populares', [-0.1, 0.4]],
  ['Merchant', 'Military', 0.2],
];

const SEEDED_FACTIONS: readonly Faction[] = ['Optimates', 'Populares', 'Military', 'Religious', 'Merchant'];

/** Remaining pairs of the five historical factions start slightly off neutral. */
const RESIDUAL_RANGE: readonly [number, number] = [-0.2, 0.2];

export function seedFactionRelations(rng: RandomSource): FactionRelationGraph {
  const graph = new FactionRelationGraph();
  const seeded = new Set<string>();

  for (const [a, b, prior] of RELATION_PRIORS) {
    const value = typeof prior === 'number' ? prior : uniform(rng, prior[0], prior[1]);
    graph.set(a, b, value);
    seeded.add(`${a}:${b}`);
    seeded.add(`${b}:${a}`);
  }

  for (let i = 0; i < SEEDED_FACTIONS.length; i++) {
    for (let j = i + 1; j < SEEDED_FACTIONS.length; j++) {
      const a = SEEDED_FACTIONS[i];
      const b = SEEDED_FACTIONS[j];
      if (seeded.has(`${a}:${b}`)) continue;
      graph.set(a, b, uniform(rng, RESIDUAL_RANGE[0], RESIDUAL_RANGE[1]));
    }
  }

  log.debug({ pairs: graph.entries().length }, 'Faction relations seeded');
  return graph;
}

/**
 * Apply the relation shifts of every period that has begun by `year`
 * (negative years are BCE). Returns the ids of the applied periods.
 */
export function applyHistoricalPeriods(
  graph: FactionRelationGraph,
  year: number,
  periods: readonly HistoricalPeriod[],
): string[] {
  const applied: string[] = [];
  for (const period of [...periods].sort((x, y) => x.fromYear - y.fromYear)) {
    if (period.fromYear > year) continue;
    for (const shift of period.relationShifts) {
      graph.adjust(shift.factions[0], shift.factions[1], shift.delta);
    }
    applied.push(period.id);
  }
  if (applied.length > 0) {
    log.debug({ year, periods: applied }, 'Historical relation shifts applied');
  }
  return applied;
}
