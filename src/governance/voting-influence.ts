/**
 * Voting Influence Calculator
 *
 * Turns the round's amendments into a per-senator vote bias handed to the
 * vote tally. Deltas accumulate across amendments and are clamped once at
 * the end, so no amendment makes an outcome certain.
 */

import type { Senator, SenatorId } from '../types/index.js';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../kernel/logger.js';
import { clamp } from '../utils/clamp.js';
import { ownValue } from '../utils/own.js';
import type { Amendment } from './amendment-engine.js';
import type { PoliticalFavorLedger } from './favor-ledger.js';

const log = createLogger('voting-influence');

export const PROPOSER_BONUS = 0.3;
export const SUPPORT_WEIGHT = 0.4;
export const FAVOR_WEIGHT = 0.2;
export const MAX_INFLUENCE = 0.5;

export type InfluenceMap = Record<SenatorId, number>;

/** Contribution of one amendment to one senator's delta, before clamping. */
export function amendmentContribution(
  amendment: Pick<Amendment, 'proposer' | 'support'>,
  senator: Pick<Senator, 'id' | 'faction'>,
  ledger: Pick<PoliticalFavorLedger, 'balance'>,
): number {
  if (senator.id === amendment.proposer) return PROPOSER_BONUS;

  const support = ownValue(amendment.support, senator.faction) ?? 0.5;
  const owed = ledger.balance(senator.id, amendment.proposer);
  return (support - 0.5) * SUPPORT_WEIGHT + owed * FAVOR_WEIGHT;
}

export class VotingInfluenceCalculator {
  constructor(private readonly eventBus?: EventBus) {}

  /**
   * Vote bias per senator in [-0.5, 0.5]. Every senator in the roster is
   * present, at 0 when nothing moves them.
   */
  compute(
    amendments: readonly Amendment[],
    senators: readonly Senator[],
    ledger: Pick<PoliticalFavorLedger, 'balance'>,
    roundId = 'adhoc',
  ): InfluenceMap {
    const influence: InfluenceMap = {};

    for (const senator of senators) {
      const raw = amendments.reduce((sum, amendment) => sum + amendmentContribution(amendment, senator, ledger), 0);
      influence[senator.id] = clamp(raw, -MAX_INFLUENCE, MAX_INFLUENCE);
    }

    const values = Object.values(influence);
    const maxDelta = values.length > 0 ? Math.max(...values) : 0;
    const minDelta = values.length > 0 ? Math.min(...values) : 0;

    log.debug({ roundId, senators: values.length, amendments: amendments.length, maxDelta, minDelta }, 'Voting influence computed');
    this.eventBus?.emit('influence:computed', { roundId, senators: values.length, maxDelta, minDelta });

    return influence;
  }
}
