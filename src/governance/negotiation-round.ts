/**
 * Negotiation Round — one topic carried through the negotiation core.
 *
 *   Idle → ActorsSelected → MeetingsArbitrated → OutcomeFinalized
 *        → AmendmentsGenerated → InfluenceComputed → Idle
 *
 * No phase may be skipped. Ledger and relation changes stay on working copies
 * until `finalize`; a round abandoned before that leaves no trace. A round
 * abandoned later keeps what `finalize` committed.
 */

import type { Faction, FactionStances, NegotiationTuning, RoundInput, Senator } from '../types/index.js';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../kernel/logger.js';
import type { RandomSource } from '../kernel/random.js';
import { type Amendment, AmendmentEngine } from './amendment-engine.js';
import {
  type ActorSelection,
  BackroomNegotiationEngine,
  type NegotiationDraft,
  type NegotiationOutcome,
  drawStance,
} from './backroom-negotiation.js';
import type { CorruptionModel } from './corruption-model.js';
import type { FactionRelationGraph } from './faction-relations.js';
import type { PoliticalFavorLedger } from './favor-ledger.js';
import { type InfluenceMap, VotingInfluenceCalculator } from './voting-influence.js';

const log = createLogger('negotiation-round');

// ─── Phases ─────────────────────────────────────────────────────────────────

export const ROUND_PHASES = [
  'Idle',
  'ActorsSelected',
  'MeetingsArbitrated',
  'OutcomeFinalized',
  'AmendmentsGenerated',
  'InfluenceComputed',
] as const;
export type RoundPhase = (typeof ROUND_PHASES)[number];

export class RoundPhaseError extends Error {
  constructor(
    public readonly operation: string,
    public readonly expected: RoundPhase,
    public readonly actual: RoundPhase,
  ) {
    super(`Cannot ${operation} in phase ${actual}; expected ${expected}`);
    this.name = 'RoundPhaseError';
  }
}

// ─── Types ──────────────────────────────────────────────────────────────────

export interface RoundResult {
  roundId: string;
  topic: string;
  outcome: Readonly<NegotiationOutcome>;
  amendments: readonly Amendment[];
  influence: InfluenceMap;
  /** Stances the amendments were judged against. */
  factionStances: FactionStances;
}

export interface NegotiationRoundDeps {
  roundId: string;
  input: RoundInput;
  relations: FactionRelationGraph;
  ledger: PoliticalFavorLedger;
  corruption: CorruptionModel;
  rng: RandomSource;
  tuning?: NegotiationTuning;
  maxAmendments?: number;
  factionCorruption?: Record<Faction, number>;
  factionInfluence?: Record<Faction, number>;
  eventBus?: EventBus;
  /** Called once the round returns to Idle. */
  onComplete?: (result: RoundResult) => void;
}

// ─── Round ──────────────────────────────────────────────────────────────────

export class NegotiationRound {
  readonly roundId: string;
  private readonly input: RoundInput;
  private readonly ledger: PoliticalFavorLedger;
  private readonly rng: RandomSource;
  private readonly eventBus: EventBus | undefined;
  private readonly onComplete: ((result: RoundResult) => void) | undefined;

  private readonly negotiation: BackroomNegotiationEngine;
  private readonly amendmentEngine: AmendmentEngine;
  private readonly voting: VotingInfluenceCalculator;

  private current: RoundPhase = 'Idle';
  private finished = false;
  private selection: ActorSelection | null = null;
  private draft: NegotiationDraft | null = null;
  private outcome: Readonly<NegotiationOutcome> | null = null;
  private amendments: readonly Amendment[] = [];
  private stances: FactionStances = {};
  private influence: InfluenceMap = {};

  constructor(deps: NegotiationRoundDeps) {
    this.roundId = deps.roundId;
    this.input = deps.input;
    this.ledger = deps.ledger;
    this.rng = deps.rng;
    this.eventBus = deps.eventBus;
    this.onComplete = deps.onComplete;

    this.negotiation = new BackroomNegotiationEngine({
      relations: deps.relations,
      ledger: deps.ledger,
      corruption: deps.corruption,
      tuning: deps.tuning,
      eventBus: deps.eventBus,
      factionInfluence: deps.factionInfluence,
      factionCorruption: deps.factionCorruption,
    });
    this.amendmentEngine = new AmendmentEngine({
      relations: deps.relations,
      corruption: deps.corruption,
      factionCorruption: deps.factionCorruption,
      maxPerRound: deps.maxAmendments,
      eventBus: deps.eventBus,
    });
    this.voting = new VotingInfluenceCalculator(deps.eventBus);
  }

  get phase(): RoundPhase {
    return this.current;
  }

  get topic(): string {
    return this.input.topic;
  }

  selectActors(): ActorSelection {
    this.expect('select actors', 'Idle');
    if (this.finished) {
      throw new RoundPhaseError('restart a finished round', 'Idle', this.current);
    }
    this.selection = this.negotiation.selectActors(this.input.roster, this.input.category);
    this.transition('ActorsSelected');
    return this.selection;
  }

  arbitrate(): NegotiationDraft {
    this.expect('arbitrate meetings', 'ActorsSelected');
    const selection = this.selection ?? this.negotiation.selectActors(this.input.roster, this.input.category);
    this.draft = this.negotiation.arbitrate(
      {
        roundId: this.roundId,
        roster: this.input.roster,
        topic: this.input.topic,
        category: this.input.category,
        factionStances: this.input.factionStances,
      },
      selection,
      this.rng,
    );
    this.transition('MeetingsArbitrated');
    return this.draft;
  }

  /** Commit the staged ledger and relation changes. */
  finalize(): Readonly<NegotiationOutcome> {
    this.expect('finalize the outcome', 'MeetingsArbitrated');
    if (this.draft === null) {
      throw new RoundPhaseError('finalize without a draft', 'MeetingsArbitrated', this.current);
    }
    this.outcome = this.negotiation.commit(this.draft);
    this.draft = null;
    this.transition('OutcomeFinalized');
    return this.outcome;
  }

  generateAmendments(): readonly Amendment[] {
    this.expect('generate amendments', 'OutcomeFinalized');
    this.stances = resolveFactionStances(this.input.roster, this.input.factionStances, this.rng);
    this.amendments = Object.freeze(
      this.amendmentEngine
        .proposeFromOutcome(this.outcome, this.input.roster, this.input.topic, this.stances, this.rng)
        .map(freezeAmendment),
    );
    this.transition('AmendmentsGenerated');
    return this.amendments;
  }

  computeInfluence(): InfluenceMap {
    this.expect('compute voting influence', 'AmendmentsGenerated');
    this.influence = this.voting.compute(this.amendments, this.input.roster, this.ledger, this.roundId);
    this.transition('InfluenceComputed');
    return this.influence;
  }

  /** Hand the result over and return to Idle. The round cannot run again. */
  complete(): RoundResult {
    this.expect('complete the round', 'InfluenceComputed');
    if (this.outcome === null) {
      throw new RoundPhaseError('complete without an outcome', 'InfluenceComputed', this.current);
    }
    const result: RoundResult = {
      roundId: this.roundId,
      topic: this.input.topic,
      outcome: this.outcome,
      amendments: this.amendments,
      influence: this.influence,
      factionStances: this.stances,
    };
    this.finished = true;
    this.transition('Idle');

    log.info(
      {
        roundId: this.roundId,
        topic: this.input.topic,
        meetings: result.outcome.meetings.length,
        amendments: result.amendments.length,
      },
      'Negotiation round completed',
    );
    this.eventBus?.emit('round:completed', {
      roundId: this.roundId,
      topic: this.input.topic,
      meetings: result.outcome.meetings.length,
      amendments: result.amendments.length,
    });
    this.onComplete?.(result);
    return result;
  }

  /**
   * Abandon the round and release it. Before `finalize` the staged draft is
   * dropped and nothing reaches the ledger or the relation graph; after it the
   * committed changes stand, but no amendments are archived and no decay runs.
   */
  discard(): void {
    if (this.current === 'Idle') {
      throw new RoundPhaseError('discard the round', 'ActorsSelected', this.current);
    }
    const committed = this.outcome !== null;
    this.selection = null;
    this.draft = null;
    this.finished = true;
    log.debug({ roundId: this.roundId, phase: this.current, committed }, 'Round discarded');
    this.transition('Idle');
  }

  /** Every phase in order. */
  run(): RoundResult {
    this.selectActors();
    this.arbitrate();
    this.finalize();
    this.generateAmendments();
    this.computeInfluence();
    return this.complete();
  }

  private expect(operation: string, phase: RoundPhase): void {
    if (this.current !== phase) {
      throw new RoundPhaseError(operation, phase, this.current);
    }
  }

  private transition(to: RoundPhase): void {
    const from = this.current;
    this.current = to;
    log.debug({ roundId: this.roundId, from, to }, 'Round phase changed');
    this.eventBus?.emit('round:phase', { roundId: this.roundId, from, to, topic: this.input.topic });
  }
}

/**
 * The caller's stances, plus one drawn stance for every attending faction
 * the caller left out (in order of first attendance).
 */
export function resolveFactionStances(
  roster: readonly Senator[],
  given: FactionStances | undefined,
  rng: RandomSource,
): FactionStances {
  const stances: FactionStances = { ...given };
  for (const senator of roster) {
    if (!Object.hasOwn(stances, senator.faction)) {
      stances[senator.faction] = drawStance(senator.faction, rng);
    }
  }
  return stances;
}

function freezeAmendment(amendment: Amendment): Amendment {
  Object.freeze(amendment.support);
  Object.freeze(amendment.cosponsors);
  return Object.freeze(amendment);
}
