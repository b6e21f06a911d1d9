/**
 * Deal types — the closed set of bargains two senators can strike in a
 * backroom meeting, with one effect handler per type.
 */

import type { DealType, KnownTopicCategory, NegotiationTuning, ResolvedTraits, Senator, SenatorId } from '../types/index.js';
import { displayName, isKnownTopicCategory } from '../types/index.js';
import { type RandomSource, chance } from '../kernel/random.js';
import type { FactionRelationGraph } from './faction-relations.js';
import type { PoliticalFavorLedger, ResolveResult } from './favor-ledger.js';

export interface DealContext {
  initiator: Senator;
  target: Senator;
  initiatorTraits: ResolvedTraits;
  targetTraits: ResolvedTraits;
  /** Mean corruption of the pair. */
  meanCorruption: number;
  ledger: PoliticalFavorLedger;
  relations: FactionRelationGraph;
  tuning: NegotiationTuning;
  rng: RandomSource;
}

export interface FavorCredit {
  debtor: SenatorId;
  benefactor: SenatorId;
  intensity: number;
  balance: number;
}

export interface FavorResolution extends ResolveResult {
  debtor: SenatorId;
  benefactor: SenatorId;
}

export interface DealEffect {
  /** A voting or amendment commitment with no ledger entry. */
  commitment: boolean;
  favorCredited: FavorCredit | null;
  favorResolved: FavorResolution | null;
  bribery: boolean;
  description: string;
}

type DealHandler = (ctx: DealContext) => DealEffect;

function noEffect(description: string, commitment: boolean): DealEffect {
  return { commitment, favorCredited: null, favorResolved: null, bribery: false, description };
}

/** Target ends up owing the initiator. */
function creditTarget(ctx: DealContext, intensity: number): FavorCredit {
  const balance = ctx.ledger.credit(ctx.target.id, ctx.initiator.id, intensity);
  return { debtor: ctx.target.id, benefactor: ctx.initiator.id, intensity, balance };
}

export const DEAL_HANDLERS: Readonly<Record<DealType, DealHandler>> = {
  'vote-exchange': (ctx) =>
    noEffect(
      `${displayName(ctx.initiator)} agrees to back ${displayName(ctx.target)} on a future matter in exchange for support on this one.`,
      true,
    ),

  'amendment-support': (ctx) =>
    noEffect(`${displayName(ctx.initiator)} and ${displayName(ctx.target)} agree to cooperate on an amendment.`, true),

  'speaking-opportunity': (ctx) => ({
    ...noEffect(
      `${displayName(ctx.initiator)} offers ${displayName(ctx.target)} a prime speaking slot in exchange for adjusting their position.`,
      false,
    ),
    favorCredited: creditTarget(ctx, ctx.tuning.speakingFavor),
  }),

  'favor-exchange': (ctx) => {
    if (ctx.ledger.balance(ctx.target.id, ctx.initiator.id) > 0) {
      const result = ctx.ledger.resolve(
        ctx.target.id,
        ctx.initiator.id,
        {
          debtorLoyalty: ctx.targetTraits.loyalty,
          relation: ctx.relations.get(ctx.target.faction, ctx.initiator.faction),
        },
        ctx.rng,
      );
      return {
        ...noEffect(`${displayName(ctx.initiator)} calls in a favor owed by ${displayName(ctx.target)}: ${result.reason}.`, false),
        favorResolved: { ...result, debtor: ctx.target.id, benefactor: ctx.initiator.id },
      };
    }
    return {
      ...noEffect(`${displayName(ctx.initiator)} does a favor for ${displayName(ctx.target)}, creating a political debt.`, false),
      favorCredited: creditTarget(ctx, ctx.tuning.newFavor),
    };
  },

  'resource-allocation': (ctx) => {
    const bribery = ctx.meanCorruption > 0.5;
    const effect: DealEffect = {
      ...noEffect(
        `${displayName(ctx.initiator)} and ${displayName(ctx.target)} negotiate the allocation of resources tied to the proposal.`,
        false,
      ),
      bribery,
    };
    // The more corrupt the pair, the likelier the spoils leave a debt behind
    if (chance(ctx.rng, ctx.meanCorruption)) {
      effect.favorCredited = creditTarget(ctx, 0.2 + 0.3 * ctx.meanCorruption);
    }
    return effect;
  },
};

/** Probability that a concluded deal also forms an alliance. */
export const ALLIANCE_CHANCE: Readonly<Record<DealType, number>> = {
  'vote-exchange': 0.3,
  'amendment-support': 0.3,
  'speaking-opportunity': 0.1,
  'favor-exchange': 0.1,
  'resource-allocation': 0.1,
};

export const ALLIANCE_PURPOSE: Readonly<Record<DealType, string>> = {
  'vote-exchange': 'short-term cooperation',
  'amendment-support': 'amendment coalition',
  'speaking-opportunity': 'floor coordination',
  'favor-exchange': 'patronage',
  'resource-allocation': 'shared spoils',
};

const CATEGORY_DEAL_BIAS: Readonly<Record<KnownTopicCategory, Partial<Record<DealType, number>>>> = {
  'Military Affairs': { 'vote-exchange': 0.5, 'resource-allocation': 0.5 },
  'Foreign Policy': { 'resource-allocation': 1 },
  'Domestic Policy': { 'speaking-opportunity': 0.5, 'vote-exchange': 0.5 },
  'Religious Matters': { 'speaking-opportunity': 1 },
  'Economic Policy': { 'resource-allocation': 1, 'favor-exchange': 0.5 },
  'Legal Reforms': { 'amendment-support': 1 },
};

function categoryBias(category: string | undefined): Partial<Record<DealType, number>> {
  return isKnownTopicCategory(category) ? CATEGORY_DEAL_BIAS[category] : {};
}

/** Draw weights for the deal type of a concluded negotiation. */
export function dealWeights(
  dealTypes: readonly DealType[],
  category: string | undefined,
  meanCorruption: number,
): Array<[DealType, number]> {
  const bias = categoryBias(category);
  return dealTypes.map((type) => {
    let weight = 1 + (bias[type] ?? 0);
    if (type === 'resource-allocation') weight += 2 * meanCorruption;
    if (type === 'favor-exchange') weight += meanCorruption;
    return [type, weight];
  });
}
