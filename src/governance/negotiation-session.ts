/**
 * Negotiation Session — the long-lived state the core carries between rounds.
 *
 * The session exclusively owns the faction relation graph, the favor ledger
 * and the corruption model. Rounds run one at a time against it; a second
 * round cannot start while another is in flight.
 */

import {
  type Config,
  type Faction,
  type HistoricalPeriod,
  KNOWN_FACTIONS,
  type RoundInputData,
  RoundInputSchema,
  type SessionSnapshot,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/config.js';
import { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../kernel/logger.js';
import { type RandomSource, SeededRandom } from '../kernel/random.js';
import { type Amendment, type FactionStanceAssessment, AmendmentEngine } from './amendment-engine.js';
import { CorruptionModel } from './corruption-model.js';
import { computeFactionInfluence } from './faction-influence.js';
import { FactionRelationGraph, applyHistoricalPeriods, seedFactionRelations } from './faction-relations.js';
import { PoliticalFavorLedger } from './favor-ledger.js';
import { NegotiationRound, type RoundResult, RoundPhaseError } from './negotiation-round.js';

const log = createLogger('negotiation-session');

export interface SessionOptions {
  /** Seed for the session's random stream; ignored when `rng` is given. */
  seed?: number | string;
  rng?: RandomSource;
  config?: Config;
  periods?: readonly HistoricalPeriod[];
  eventBus?: EventBus;
}

export class NegotiationSession {
  readonly relations: FactionRelationGraph;
  readonly ledger: PoliticalFavorLedger;
  readonly corruption: CorruptionModel;
  readonly eventBus: EventBus;

  private readonly config: Config;
  private readonly periods: readonly HistoricalPeriod[];
  private readonly rng: RandomSource;
  private readonly factionCorruption: Record<Faction, number>;
  private readonly appliedPeriods = new Set<string>();
  private readonly archive: Amendment[] = [];
  private active: NegotiationRound | null = null;
  private roundCount = 0;

  constructor(options: SessionOptions = {}, state?: SessionSnapshot) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.periods = options.periods ?? [];
    this.rng = options.rng ?? new SeededRandom(options.seed ?? 1);
    this.eventBus = options.eventBus ?? new EventBus();

    const policy = {
      counterFavorChance: this.config.negotiation.counterFavorChance,
      refusalPenalty: this.config.negotiation.refusalPenalty,
    };
    this.corruption = new CorruptionModel();

    if (state) {
      this.relations = FactionRelationGraph.fromJSON(state.relations);
      this.ledger = PoliticalFavorLedger.fromJSON(state.ledger, policy);
      this.corruption.restore(state.corruption);
      this.factionCorruption = { ...state.factionCorruption };
      for (const id of state.appliedPeriods) this.appliedPeriods.add(id);
    } else {
      this.relations = seedFactionRelations(this.rng);
      this.ledger = new PoliticalFavorLedger(policy);
      this.factionCorruption = this.corruption.sampleFactionLevels(KNOWN_FACTIONS, this.rng);
    }
  }

  static fromSnapshot(snapshot: SessionSnapshot, options: SessionOptions = {}): NegotiationSession {
    return new NegotiationSession(options, snapshot);
  }

  /** Amendments of every completed round, oldest first. */
  get amendments(): readonly Amendment[] {
    return this.archive;
  }

  get rounds(): number {
    return this.roundCount;
  }

  factionCorruptionLevels(): Record<Faction, number> {
    return { ...this.factionCorruption };
  }

  /**
   * Start a round. The input is validated; missing traits and factions take
   * their documented defaults.
   */
  createRound(input: RoundInputData): NegotiationRound {
    if (this.active !== null && this.active.phase !== 'Idle') {
      throw new RoundPhaseError('start a new round', 'Idle', this.active.phase);
    }
    const parsed = RoundInputSchema.parse(input);

    if (parsed.year !== undefined) {
      this.applyPeriodsUpTo(parsed.year);
    }
    this.sampleNewFactions(parsed.roster.map((s) => s.faction));

    this.roundCount += 1;
    const roundId = `round-${this.roundCount}`;
    const round = new NegotiationRound({
      roundId,
      input: parsed,
      relations: this.relations,
      ledger: this.ledger,
      corruption: this.corruption,
      rng: this.rng,
      tuning: this.config.negotiation,
      maxAmendments: this.config.amendments.maxPerRound,
      factionCorruption: this.factionCorruption,
      factionInfluence: computeFactionInfluence(parsed.roster, parsed.year, this.periods),
      eventBus: this.eventBus,
      onComplete: (result) => this.afterRound(result),
    });
    this.active = round;
    return round;
  }

  runRound(input: RoundInputData): RoundResult {
    return this.createRound(input).run();
  }

  /** How a faction stands on a topic given the archived amendments on it. */
  assessFactionStance(faction: Faction, topic: string): FactionStanceAssessment {
    const engine = new AmendmentEngine({
      relations: this.relations,
      corruption: this.corruption,
      factionCorruption: this.factionCorruption,
    });
    return engine.assessFactionStance(
      faction,
      topic,
      this.archive.filter((a) => a.topic === topic),
    );
  }

  snapshot(): SessionSnapshot {
    return {
      version: 1,
      relations: this.relations.toJSON(),
      ledger: this.ledger.toJSON(),
      corruption: this.corruption.assignments(),
      factionCorruption: { ...this.factionCorruption },
      appliedPeriods: [...this.appliedPeriods],
    };
  }

  private afterRound(result: RoundResult): void {
    this.archive.push(...result.amendments);

    const factor = this.config.relations.decayFactor;
    if (factor < 1) {
      const pairs = this.relations.decay(factor);
      this.eventBus.emit('relations:decayed', { factor, pairs });
    }
  }

  /** Each period's relation shifts are applied once per session. */
  private applyPeriodsUpTo(year: number): void {
    const pending = this.periods.filter((p) => !this.appliedPeriods.has(p.id));
    const applied = applyHistoricalPeriods(this.relations, year, pending);
    for (const id of applied) this.appliedPeriods.add(id);
    if (applied.length > 0) {
      log.info({ year, periods: applied }, 'Historical periods entered');
    }
  }

  private sampleNewFactions(factions: readonly Faction[]): void {
    const unseen = [...new Set(factions)].filter((f) => !Object.hasOwn(this.factionCorruption, f));
    Object.assign(this.factionCorruption, this.corruption.sampleFactionLevels(unseen, this.rng));
  }
}
