/**
 * Political Favor Ledger — who owes whom, and how much.
 *
 * A benefit granted creates an obligation: the debtor owes the benefactor a
 * favor of some intensity in (0, 1]. Credits accumulate (capped at 1), calls
 * consume them. The ledger also keeps the personal standing between pairs of
 * senators, which suffers when a called-in favor is refused.
 *
 * Invariants:
 * - intensities stay in [0, 1]; exhausted favors are dropped
 * - nobody owes a favor to themselves
 * - standing stays in [-1, 1]
 */

import type { FavorMap, LedgerState, SenatorId } from '../types/index.js';
import { type RandomSource, chance } from '../kernel/random.js';
import { createLogger } from '../kernel/logger.js';
import { clampSigned, clampUnit } from '../utils/clamp.js';
import { compareKeys, SymmetricPairMap } from './pair-map.js';

const log = createLogger('favor-ledger');

export const NO_FAVOR_OWED = 'no favor owed';

/** Below this a favor counts as exhausted. */
const EPSILON = 1e-9;

export interface ResolvePolicy {
  /** Chance an honored call leaves the benefactor owing something back. */
  counterFavorChance: number;
  /** Standing lost between the pair when the debtor refuses. */
  refusalPenalty: number;
}

export const DEFAULT_RESOLVE_POLICY: ResolvePolicy = {
  counterFavorChance: 0.2,
  refusalPenalty: 0.2,
};

export interface ResolveContext {
  /** Loyalty trait of the debtor being asked to honor the favor. */
  debtorLoyalty: number;
  /** Relation between the two senators' factions, in [-1, 1]. */
  relation: number;
  /** Intensity being called in; defaults to the whole balance. */
  requested?: number;
}

export interface ResolveResult {
  honored: boolean;
  /** Balance left on the favor after the call. */
  remainingIntensity: number;
  previousBalance: number;
  requested: number;
  complianceProbability: number;
  /** Intensity of the counter-obligation created, 0 when none. */
  counterFavor: number;
  /** Standing change applied to the pair (0 or negative). */
  standingChange: number;
  reason: string;
}

export class PoliticalFavorLedger {
  private readonly favors = new Map<SenatorId, Map<SenatorId, number>>();
  private readonly personal: SymmetricPairMap;
  private readonly policy: ResolvePolicy;

  constructor(policy: Partial<ResolvePolicy> = {}, standing: SymmetricPairMap = new SymmetricPairMap()) {
    this.policy = { ...DEFAULT_RESOLVE_POLICY, ...policy };
    this.personal = standing;
  }

  /**
   * Add intensity to the debt debtor owes benefactor. The result is capped
   * at 1. Self-debts and non-positive credits are ignored.
   * @returns the new balance
   */
  credit(debtor: SenatorId, benefactor: SenatorId, intensity: number): number {
    if (debtor === benefactor || !(intensity > 0)) {
      return this.balance(debtor, benefactor);
    }
    const next = clampUnit(this.balance(debtor, benefactor) + clampUnit(intensity));
    this.write(debtor, benefactor, next);

    log.debug({ debtor, benefactor, intensity, balance: next }, 'Political favor credited');
    return next;
  }

  balance(debtor: SenatorId, benefactor: SenatorId): number {
    return this.favors.get(debtor)?.get(benefactor) ?? 0;
  }

  /**
   * Call in a favor. The debtor complies with probability
   * `balance × (0.5 + loyalty) + 0.2 × relation`, clamped to [0, 1].
   */
  resolve(debtor: SenatorId, benefactor: SenatorId, context: ResolveContext, rng: RandomSource): ResolveResult {
    const previousBalance = this.balance(debtor, benefactor);

    if (previousBalance <= EPSILON) {
      return {
        honored: false,
        remainingIntensity: 0,
        previousBalance: 0,
        requested: 0,
        complianceProbability: 0,
        counterFavor: 0,
        standingChange: 0,
        reason: NO_FAVOR_OWED,
      };
    }

    const requested = clampUnit(Math.min(context.requested ?? previousBalance, previousBalance));
    const complianceProbability = complianceFor(previousBalance, context.debtorLoyalty, context.relation);
    const honored = chance(rng, complianceProbability);

    let remainingIntensity: number;
    let counterFavor = 0;
    let standingChange = 0;
    let reason: string;

    if (honored) {
      remainingIntensity = clampUnit(previousBalance - requested);
      this.write(debtor, benefactor, remainingIntensity);

      if (chance(rng, this.policy.counterFavorChance)) {
        counterFavor = clampUnit(requested * 0.5);
        this.credit(benefactor, debtor, counterFavor);
      }
      reason = remainingIntensity > EPSILON ? 'favor partially honored' : 'favor honored';
    } else {
      // A refusal still wears the obligation down somewhat
      remainingIntensity = clampUnit(previousBalance - requested * 0.3);
      this.write(debtor, benefactor, remainingIntensity);
      standingChange = -this.policy.refusalPenalty;
      this.adjustStanding(debtor, benefactor, standingChange);
      reason = 'favor refused';
    }

    log.debug(
      { debtor, benefactor, honored, previousBalance, remainingIntensity, counterFavor },
      'Political favor called in',
    );

    return {
      honored,
      remainingIntensity: this.balance(debtor, benefactor),
      previousBalance,
      requested,
      complianceProbability,
      counterFavor,
      standingChange,
      reason,
    };
  }

  /** Drop a debt entirely. Returns the forgiven intensity. */
  forgive(debtor: SenatorId, benefactor: SenatorId): number {
    const previous = this.balance(debtor, benefactor);
    this.write(debtor, benefactor, 0);
    return previous;
  }

  /** Everything the debtor owes, by benefactor. */
  debtsOf(debtor: SenatorId): Record<SenatorId, number> {
    return sortedRecord(this.favors.get(debtor) ?? new Map<SenatorId, number>());
  }

  /** Everyone who owes the benefactor, by debtor. */
  creditsOf(benefactor: SenatorId): Record<SenatorId, number> {
    const owed = new Map<SenatorId, number>();
    for (const [debtor, debts] of this.favors) {
      const intensity = debts.get(benefactor);
      if (intensity !== undefined) owed.set(debtor, intensity);
    }
    return sortedRecord(owed);
  }

  standing(a: SenatorId, b: SenatorId): number {
    return this.personal.get(a, b);
  }

  adjustStanding(a: SenatorId, b: SenatorId, delta: number): number {
    return clampSigned(this.personal.adjust(a, b, delta));
  }

  /** Number of open favors. */
  get size(): number {
    let count = 0;
    for (const debts of this.favors.values()) count += debts.size;
    return count;
  }

  fork(): PoliticalFavorLedger {
    const copy = new PoliticalFavorLedger(this.policy, this.personal.clone());
    for (const [debtor, debts] of this.favors) {
      copy.favors.set(debtor, new Map(debts));
    }
    return copy;
  }

  replaceWith(other: PoliticalFavorLedger): void {
    this.favors.clear();
    for (const [debtor, debts] of other.favors) {
      this.favors.set(debtor, new Map(debts));
    }
    this.personal.replaceWith(other.personal);
  }

  toJSON(): LedgerState {
    const favors: FavorMap = {};
    for (const debtor of [...this.favors.keys()].sort(compareKeys)) {
      favors[debtor] = this.debtsOf(debtor);
    }
    return { favors, standing: this.personal.toJSON() };
  }

  static fromJSON(state: LedgerState, policy: Partial<ResolvePolicy> = {}): PoliticalFavorLedger {
    const ledger = new PoliticalFavorLedger(policy, SymmetricPairMap.fromJSON(state.standing));
    for (const [debtor, debts] of Object.entries(state.favors)) {
      for (const [benefactor, intensity] of Object.entries(debts)) {
        if (debtor !== benefactor) ledger.write(debtor, benefactor, clampUnit(intensity));
      }
    }
    return ledger;
  }

  private write(debtor: SenatorId, benefactor: SenatorId, intensity: number): void {
    if (intensity <= EPSILON) {
      const debts = this.favors.get(debtor);
      debts?.delete(benefactor);
      if (debts && debts.size === 0) this.favors.delete(debtor);
      return;
    }
    let debts = this.favors.get(debtor);
    if (!debts) {
      debts = new Map();
      this.favors.set(debtor, debts);
    }
    debts.set(benefactor, intensity);
  }
}

export function complianceFor(balance: number, loyalty: number, relation: number): number {
  return clampUnit(clampUnit(balance) * (0.5 + clampUnit(loyalty)) + 0.2 * clampSigned(relation));
}

function sortedRecord(map: Map<SenatorId, number>): Record<SenatorId, number> {
  return Object.fromEntries([...map].sort(([a], [b]) => compareKeys(a, b)));
}
