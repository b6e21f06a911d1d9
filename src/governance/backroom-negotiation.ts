/**
 * Backroom Negotiation Engine — the private meetings held before debate.
 *
 * One round, for one topic, among the attending roster:
 * 1. pick actors: the most influential quarter plus stakeholder factions
 * 2. give each actor a meeting budget that grows with influence
 * 3. pick targets weighted by faction, relation and favors owed
 * 4. arbitrate each meeting and apply the effect of any deal struck
 *
 * All ledger and relation changes are made on working copies. Nothing reaches
 * the live ledger or relation graph until `commit`, so a discarded draft
 * leaves no trace.
 */

import type {
  DealType,
  Faction,
  FactionStances,
  KnownTopicCategory,
  NegotiationTuning,
  ResolvedTraits,
  Senator,
  SenatorId,
  Stance,
} from '../types/index.js';
import { DEAL_TYPES, displayName, isKnownTopicCategory, resolveTraits } from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/config.js';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../kernel/logger.js';
import { type RandomSource, chance, pickWeighted } from '../kernel/random.js';
import { clampUnit, round } from '../utils/clamp.js';
import { ownValue } from '../utils/own.js';
import type { CorruptionModel } from './corruption-model.js';
import { ALLIANCE_CHANCE, ALLIANCE_PURPOSE, DEAL_HANDLERS, type DealEffect, dealWeights } from './deal-types.js';
import type { FactionRelationGraph } from './faction-relations.js';
import type { PoliticalFavorLedger } from './favor-ledger.js';
import { pairKey } from './pair-map.js';

const log = createLogger('backroom-negotiation');

// ─── Types ──────────────────────────────────────────────────────────────────

export interface NegotiationRequest {
  roundId: string;
  roster: readonly Senator[];
  topic: string;
  category?: string;
  /** Faction dispositions on the topic; senators of unlisted factions draw one. */
  factionStances?: FactionStances;
}

export interface ActorSelection {
  /** Initiators in the order they act. */
  actors: Senator[];
  influential: Senator[];
  stakeholders: Senator[];
  stakeholderFactions: Faction[];
}

export interface AllianceRecord {
  members: [SenatorId, SenatorId];
  factions: [Faction, Faction];
  dealType: DealType;
  purpose: string;
  /** Change applied to the faction relation; 0 within one faction. */
  relationDelta: number;
  relationAfter: number;
  description: string;
}

export interface MeetingRecord {
  sequence: number;
  initiator: SenatorId;
  target: SenatorId;
  factions: [Faction, Faction];
  stances: [Stance, Stance];
  agreement: boolean;
  agreementProbability: number;
  dealMade: boolean;
  dealType: DealType | null;
  deal: DealEffect | null;
  alliance: AllianceRecord | null;
}

export interface NegotiationOutcome {
  roundId: string;
  topic: string;
  category: string | null;
  actors: SenatorId[];
  influentialSenators: SenatorId[];
  stakeholderFactions: Faction[];
  meetings: MeetingRecord[];
  alliances: AllianceRecord[];
  /** Human-readable lines for an external display. */
  summary: string[];
}

/** Outcome plus the working copies it was produced on. */
export interface NegotiationDraft {
  outcome: NegotiationOutcome;
  relations: FactionRelationGraph;
  ledger: PoliticalFavorLedger;
}

export interface BackroomNegotiationDeps {
  relations: FactionRelationGraph;
  ledger: PoliticalFavorLedger;
  corruption: CorruptionModel;
  tuning?: NegotiationTuning;
  eventBus?: EventBus;
  /** Faction influence for the summary lines. */
  factionInfluence?: Record<Faction, number>;
  /** Faction corruptibility for the summary lines. */
  factionCorruption?: Record<Faction, number>;
}

// ─── Tables ─────────────────────────────────────────────────────────────────

export const STAKEHOLDER_FACTIONS: Readonly<Record<KnownTopicCategory, readonly Faction[]>> = {
  'Military Affairs': ['Military', 'Optimates'],
  'Foreign Policy': ['Military', 'Merchant'],
  'Domestic Policy': ['Populares', 'Optimates'],
  'Religious Matters': ['Religious', 'Optimates'],
  'Economic Policy': ['Merchant', 'Populares'],
  'Legal Reforms': ['Optimates', 'Populares'],
};

/** Weights for support / oppose / neutral when a senator's stance is drawn. */
const STANCE_PRIORS: Readonly<Record<string, readonly [number, number, number]>> = {
  Populares: [0.6, 0.3, 0.1],
  Optimates: [0.3, 0.6, 0.1],
};
const DEFAULT_STANCE_PRIOR: readonly [number, number, number] = [0.4, 0.4, 0.2];

export function stakeholderFactionsFor(category: string | undefined): Faction[] {
  return isKnownTopicCategory(category) ? [...STAKEHOLDER_FACTIONS[category]] : [];
}

export function drawStance(faction: Faction, rng: RandomSource): Stance {
  const [support, oppose, neutral] = Object.hasOwn(STANCE_PRIORS, faction)
    ? STANCE_PRIORS[faction]
    : DEFAULT_STANCE_PRIOR;
  return (
    pickWeighted<Stance>(rng, [
      ['support', support],
      ['oppose', oppose],
      ['neutral', neutral],
    ]) ?? 'neutral'
  );
}

/**
 * Chance that a meeting ends in a deal:
 * 0.2 base, +0.3 when the stances agree (+0.1 otherwise), up to +0.5 for a
 * corrupt pair, plus 0.2 × faction relation and 0.2 × favor owed.
 */
export function agreementProbability(
  agreement: boolean,
  meanCorruption: number,
  relation: number,
  favorOwed: number,
): number {
  return clampUnit(0.2 + (agreement ? 0.3 : 0.1) + meanCorruption * 0.5 + relation * 0.2 + favorOwed * 0.2);
}

// ─── Engine ─────────────────────────────────────────────────────────────────

export class BackroomNegotiationEngine {
  private readonly relations: FactionRelationGraph;
  private readonly ledger: PoliticalFavorLedger;
  private readonly corruption: CorruptionModel;
  private readonly tuning: NegotiationTuning;
  private readonly eventBus: EventBus | undefined;
  private readonly factionInfluence: Record<Faction, number>;
  private readonly factionCorruption: Record<Faction, number>;

  constructor(deps: BackroomNegotiationDeps) {
    this.relations = deps.relations;
    this.ledger = deps.ledger;
    this.corruption = deps.corruption;
    this.tuning = deps.tuning ?? DEFAULT_CONFIG.negotiation;
    this.eventBus = deps.eventBus;
    this.factionInfluence = deps.factionInfluence ?? {};
    this.factionCorruption = deps.factionCorruption ?? {};
  }

  /**
   * The top share of the roster by influence (at least `minActors`), then
   * up to `maxStakeholderActors` senators of the category's stakeholder
   * factions. Equal influence keeps roster order.
   */
  selectActors(roster: readonly Senator[], category?: string): ActorSelection {
    const stakeholderFactions = stakeholderFactionsFor(category);
    if (roster.length === 0) {
      return { actors: [], influential: [], stakeholders: [], stakeholderFactions };
    }

    const count = Math.min(
      roster.length,
      Math.max(this.tuning.minActors, Math.ceil(roster.length * this.tuning.influentialShare)),
    );
    const influential = roster
      .map((senator, index) => ({ senator, index, influence: resolveTraits(senator).influence }))
      .sort((a, b) => b.influence - a.influence || a.index - b.index)
      .slice(0, count)
      .map((entry) => entry.senator);

    const stakeholders = roster
      .filter((senator) => stakeholderFactions.includes(senator.faction))
      .slice(0, this.tuning.maxStakeholderActors);

    const seen = new Set<SenatorId>();
    const actors: Senator[] = [];
    for (const senator of [...influential, ...stakeholders]) {
      if (seen.has(senator.id)) continue;
      seen.add(senator.id);
      actors.push(senator);
    }

    return { actors, influential, stakeholders, stakeholderFactions };
  }

  /** Meetings an initiator may hold this round: 1 to `maxMeetingsPerInitiator`. */
  meetingBudget(senator: Senator): number {
    const influence = resolveTraits(senator).influence;
    return Math.max(1, Math.min(this.tuning.maxMeetingsPerInitiator, 1 + Math.floor(influence * 3)));
  }

  /**
   * Hold every meeting of the round on working copies of the ledger and the
   * relation graph.
   */
  arbitrate(request: NegotiationRequest, selection: ActorSelection, rng: RandomSource): NegotiationDraft {
    const relations = this.relations.fork();
    const ledger = this.ledger.fork();
    const roster = request.roster;

    const traits = new Map<SenatorId, ResolvedTraits>();
    for (const senator of roster) {
      traits.set(senator.id, {
        ...resolveTraits(senator),
        corruption: this.corruption.traitFor(senator, rng),
      });
    }
    const traitsOf = (senator: Senator): ResolvedTraits => traits.get(senator.id) ?? resolveTraits(senator);

    const stances = new Map<SenatorId, Stance>();
    const stanceOf = (senator: Senator): Stance => {
      let stance = stances.get(senator.id);
      if (stance === undefined) {
        stance = ownValue(request.factionStances, senator.faction) ?? drawStance(senator.faction, rng);
        stances.set(senator.id, stance);
      }
      return stance;
    };

    const metPairs = new Set<string>();
    const meetings: MeetingRecord[] = [];
    const alliances: AllianceRecord[] = [];

    for (const initiator of selection.actors) {
      const budget = this.meetingBudget(initiator);

      for (let n = 0; n < budget; n++) {
        const candidates: Array<[Senator, number]> = [];
        for (const target of roster) {
          if (target.id === initiator.id || metPairs.has(pairKey(initiator.id, target.id))) continue;
          const weight = this.targetWeight(initiator, target, relations, ledger);
          if (weight > 0) candidates.push([target, weight]);
        }

        const target = pickWeighted(rng, candidates);
        if (target === undefined) break;
        metPairs.add(pairKey(initiator.id, target.id));

        const meeting = this.holdMeeting(
          meetings.length,
          request,
          initiator,
          target,
          { initiator: traitsOf(initiator), target: traitsOf(target) },
          [stanceOf(initiator), stanceOf(target)],
          relations,
          ledger,
          rng,
        );
        meetings.push(meeting);
        if (meeting.alliance) alliances.push(meeting.alliance);
      }
    }

    const outcome: NegotiationOutcome = {
      roundId: request.roundId,
      topic: request.topic,
      category: request.category ?? null,
      actors: selection.actors.map((s) => s.id),
      influentialSenators: selection.influential.map((s) => s.id),
      stakeholderFactions: selection.stakeholderFactions,
      meetings,
      alliances,
      summary: [],
    };
    outcome.summary = this.summarize(outcome, roster);

    log.debug(
      { roundId: request.roundId, meetings: meetings.length, alliances: alliances.length },
      'Backroom meetings arbitrated',
    );

    return { outcome, relations, ledger };
  }

  /**
   * Apply a draft's working copies to the live ledger and relation graph and
   * seal the outcome.
   */
  commit(draft: NegotiationDraft): Readonly<NegotiationOutcome> {
    this.relations.replaceWith(draft.relations);
    this.ledger.replaceWith(draft.ledger);
    const outcome = freezeOutcome(draft.outcome);

    const deals = outcome.meetings.filter((m) => m.dealMade).length;
    log.info(
      {
        roundId: outcome.roundId,
        topic: outcome.topic,
        meetings: outcome.meetings.length,
        deals,
        alliances: outcome.alliances.length,
      },
      'Backroom negotiation finalized',
    );

    if (this.eventBus) {
      for (const meeting of outcome.meetings) {
        const credited = meeting.deal?.favorCredited;
        if (credited) this.eventBus.emit('favor:credited', { ...credited });
        const resolved = meeting.deal?.favorResolved;
        if (resolved) {
          this.eventBus.emit('favor:resolved', {
            debtor: resolved.debtor,
            benefactor: resolved.benefactor,
            honored: resolved.honored,
            remaining: resolved.remainingIntensity,
            reason: resolved.reason,
          });
        }
      }
      for (const alliance of outcome.alliances) {
        this.eventBus.emit('alliance:formed', {
          roundId: outcome.roundId,
          members: [...alliance.members],
          factions: [...alliance.factions],
          dealType: alliance.dealType,
        });
      }
      this.eventBus.emit('negotiation:finalized', {
        roundId: outcome.roundId,
        topic: outcome.topic,
        meetings: outcome.meetings.length,
        deals,
        alliances: outcome.alliances.length,
      });
    }

    return outcome;
  }

  /** Select, arbitrate and commit in one call. */
  negotiate(request: NegotiationRequest, rng: RandomSource): Readonly<NegotiationOutcome> {
    const selection = this.selectActors(request.roster, request.category);
    return this.commit(this.arbitrate(request, selection, rng));
  }

  private targetWeight(
    initiator: Senator,
    target: Senator,
    relations: FactionRelationGraph,
    ledger: PoliticalFavorLedger,
  ): number {
    let weight = 1;
    if (target.faction === initiator.faction) weight += 1;
    weight += relations.get(initiator.faction, target.faction) * 2;
    // Those who owe the initiator are approached first
    weight += ledger.balance(target.id, initiator.id) * 3;
    return weight;
  }

  private holdMeeting(
    sequence: number,
    request: NegotiationRequest,
    initiator: Senator,
    target: Senator,
    traits: { initiator: ResolvedTraits; target: ResolvedTraits },
    stances: [Stance, Stance],
    relations: FactionRelationGraph,
    ledger: PoliticalFavorLedger,
    rng: RandomSource,
  ): MeetingRecord {
    const agreement = stances[0] === stances[1];
    const meanCorruption = (traits.initiator.corruption + traits.target.corruption) / 2;
    const relation = relations.get(initiator.faction, target.faction);
    const favorOwed = ledger.balance(target.id, initiator.id);
    const probability = agreementProbability(agreement, meanCorruption, relation, favorOwed);

    const record: MeetingRecord = {
      sequence,
      initiator: initiator.id,
      target: target.id,
      factions: [initiator.faction, target.faction],
      stances,
      agreement,
      agreementProbability: round(probability, 4),
      dealMade: false,
      dealType: null,
      deal: null,
      alliance: null,
    };

    if (!chance(rng, probability)) {
      log.debug({ initiator: initiator.id, target: target.id }, 'Meeting ended without a deal');
      return record;
    }

    const dealType = pickWeighted(rng, dealWeights(DEAL_TYPES, request.category, meanCorruption)) ?? 'vote-exchange';
    const deal = DEAL_HANDLERS[dealType]({
      initiator,
      target,
      initiatorTraits: traits.initiator,
      targetTraits: traits.target,
      meanCorruption,
      ledger,
      relations,
      tuning: this.tuning,
      rng,
    });
    record.dealMade = true;
    record.dealType = dealType;
    record.deal = deal;

    if (chance(rng, ALLIANCE_CHANCE[dealType])) {
      const crossFaction = initiator.faction !== target.faction;
      const relationAfter = crossFaction
        ? relations.adjust(initiator.faction, target.faction, this.tuning.allianceDelta)
        : relation;
      record.alliance = {
        members: [initiator.id, target.id],
        factions: [initiator.faction, target.faction],
        dealType,
        purpose: ALLIANCE_PURPOSE[dealType],
        relationDelta: crossFaction ? round(relationAfter - relation, 6) : 0,
        relationAfter,
        description: `A temporary alliance between ${displayName(initiator)} and ${displayName(target)} for ${ALLIANCE_PURPOSE[dealType]}.`,
      };
    }

    log.debug({ initiator: initiator.id, target: target.id, dealType, alliance: record.alliance !== null }, 'Deal struck');
    return record;
  }

  private summarize(outcome: NegotiationOutcome, roster: readonly Senator[]): string[] {
    const names = new Map(roster.map((s) => [s.id, displayName(s)]));
    const nameOf = (id: SenatorId): string => names.get(id) ?? id;
    const deals = outcome.meetings.filter((m) => m.dealMade);

    const lines = [
      `${outcome.meetings.length} private meetings, ${deals.length} deals, ${outcome.alliances.length} alliances on "${outcome.topic}".`,
    ];
    for (const meeting of deals.slice(0, 5)) {
      if (meeting.deal) lines.push(`${nameOf(meeting.initiator)} & ${nameOf(meeting.target)}: ${meeting.deal.description}`);
    }
    for (const alliance of outcome.alliances) {
      lines.push(alliance.description);
    }
    for (const faction of outcome.stakeholderFactions) {
      const influence = ownValue(this.factionInfluence, faction) ?? 0;
      const corruption = ownValue(this.factionCorruption, faction) ?? 0;
      const interest = influence > 0.7 ? 'is strongly interested in' : 'is concerned with';
      const bribes = corruption > 0.6 ? ' and willing to use bribes' : '';
      lines.push(`The ${faction} faction ${interest} this matter${bribes}.`);
    }
    return lines;
  }
}

function freezeOutcome(outcome: NegotiationOutcome): Readonly<NegotiationOutcome> {
  for (const meeting of outcome.meetings) {
    Object.freeze(meeting.factions);
    Object.freeze(meeting.stances);
    if (meeting.deal) {
      if (meeting.deal.favorCredited) Object.freeze(meeting.deal.favorCredited);
      if (meeting.deal.favorResolved) Object.freeze(meeting.deal.favorResolved);
      Object.freeze(meeting.deal);
    }
    if (meeting.alliance) {
      Object.freeze(meeting.alliance.members);
      Object.freeze(meeting.alliance.factions);
      Object.freeze(meeting.alliance);
    }
    Object.freeze(meeting);
  }
  Object.freeze(outcome.meetings);
  Object.freeze(outcome.alliances);
  Object.freeze(outcome.actors);
  Object.freeze(outcome.influentialSenators);
  Object.freeze(outcome.stakeholderFactions);
  Object.freeze(outcome.summary);
  return Object.freeze(outcome);
}
