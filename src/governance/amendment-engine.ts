/**
 * Amendment Engine — proposals to alter the measure under debate, and how
 * each faction is likely to receive them.
 *
 * A senator's intent follows from their stance on the topic and their
 * character: corrupt senators reach for self-serving intents, loyal ones for
 * wholehearted support or opposition. Support scores start neutral (0.5)
 * and move with faction relations, stance alignment and corruptibility.
 *
 * @see src/governance/voting-influence.ts — consumes the support scores
 */

import type {
  AmendmentIntent,
  Faction,
  FactionStances,
  Senator,
  SenatorId,
  Stance,
} from '../types/index.js';
import { resolveTraits } from '../types/index.js';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../kernel/logger.js';
import { type RandomSource, pickOne, sample } from '../kernel/random.js';
import { clampSigned, clampUnit, round } from '../utils/clamp.js';
import { ownValue } from '../utils/own.js';
import type { NegotiationOutcome } from './backroom-negotiation.js';
import type { CorruptionModel } from './corruption-model.js';
import type { FactionRelationGraph } from './faction-relations.js';

const log = createLogger('amendment-engine');

// ─── Types ──────────────────────────────────────────────────────────────────

export interface Amendment {
  id: string;
  roundId: string | null;
  proposer: SenatorId;
  proposerFaction: Faction;
  proposerStance: Stance;
  topic: string;
  intent: AmendmentIntent;
  rationale: string;
  /** Likely support per faction, each in [0, 1]. */
  support: Record<Faction, number>;
  /** Partners from an amendment-support deal. */
  cosponsors: SenatorId[];
  /** Proposer corruption above 0.6. */
  corruptionInvolved: boolean;
  /** Proposer corruption above 0.5. */
  personalBenefit: boolean;
}

export interface GenerateOptions {
  roundId?: string;
  cosponsors?: SenatorId[];
}

export interface AmendmentEffect {
  amendmentId: string;
  proposer: SenatorId;
  effect: number;
  reasoning: string;
}

export interface FactionStanceAssessment {
  faction: Faction;
  /** Disposition from the topic alone, in [-1, 1]. */
  initialStance: number;
  /** Disposition after weighing every amendment, in [-1, 1]. */
  finalStance: number;
  stance: Stance;
  effects: AmendmentEffect[];
  primaryReasoning: string;
}

export interface AmendmentEngineDeps {
  relations: FactionRelationGraph;
  corruption: CorruptionModel;
  /** Faction corruptibility; unlisted factions count as 0.3. */
  factionCorruption?: Record<Faction, number>;
  maxPerRound?: number;
  eventBus?: EventBus;
}

// ─── Tables ─────────────────────────────────────────────────────────────────

export const SELF_SERVING_INTENTS: ReadonlySet<AmendmentIntent> = new Set<AmendmentIntent>([
  'strengthen-with-benefits',
  'redirect-benefits',
  'insert-unrelated-benefits',
]);

const STRENGTHENING_INTENTS: ReadonlySet<AmendmentIntent> = new Set<AmendmentIntent>([
  'strengthen-with-benefits',
  'strengthen-broadly',
]);

const WEAKENING_INTENTS: ReadonlySet<AmendmentIntent> = new Set<AmendmentIntent>([
  'weaken-substantially',
  'limit-scope',
]);

const RATIONALE_PREFIXES = [
  'provided that',
  'on condition that',
  'with the stipulation that',
  'except that',
  'with the following amendments:',
] as const;

const PUBLIC_BENEFITS = ['public works', 'military provisions', 'religious ceremonies', 'grain distribution'] as const;

const RATIONALE_TEMPLATES: Readonly<Record<AmendmentIntent, (faction: Faction, benefit: string) => string>> = {
  'strengthen-with-benefits': (faction) =>
    `additional provisions be made for ${faction} interests, specifically in oversight and resource allocation`,
  'strengthen-broadly': (faction) =>
    `the scope be expanded to include further ${faction} priorities while keeping the core proposal`,
  'clarify-supportively': () => 'specific language be added to clarify implementation procedures',
  'redirect-benefits': (faction) =>
    `all benefits and resources provided be administered by a committee with ${faction} representation`,
  'weaken-substantially': () => "the proposal's scope be significantly reduced and subject to annual review by the Senate",
  'limit-scope': () => 'its application be limited to regions and circumstances determined by a Senate committee',
  'insert-unrelated-benefits': (faction, benefit) =>
    `additional funding be allocated for ${benefit} in regions supporting the ${faction}`,
  'moderate-compromise': () =>
    'a balanced approach be taken, incorporating reasonable concerns of supporting and opposing factions',
};

/** First keyword found in the topic sets the factions' starting disposition. */
const TOPIC_BIASES: ReadonlyArray<{ keyword: string; biases: Readonly<Record<Faction, number>> }> = [
  { keyword: 'military', biases: { Military: 0.6, Merchant: 0.3 } },
  { keyword: 'tax', biases: { Merchant: -0.4, Populares: 0.3 } },
  { keyword: 'land', biases: { Optimates: -0.5, Populares: 0.7 } },
  { keyword: 'religious', biases: { Religious: 0.6 } },
];

const DEFAULT_FACTION_CORRUPTION = 0.3;

// ─── Intent selection ───────────────────────────────────────────────────────

export function chooseIntent(stance: Stance, corruption: number, loyalty: number): AmendmentIntent {
  switch (stance) {
    case 'support':
      if (corruption > 0.7) return 'strengthen-with-benefits';
      if (loyalty > 0.7) return 'strengthen-broadly';
      return 'clarify-supportively';
    case 'oppose':
      if (corruption > 0.7) return 'redirect-benefits';
      if (loyalty > 0.7) return 'weaken-substantially';
      return 'limit-scope';
    case 'neutral':
      return corruption > 0.5 ? 'insert-unrelated-benefits' : 'moderate-compromise';
  }
}

export function topicBias(faction: Faction, topic: string): number {
  const lowered = topic.toLowerCase();
  const match = TOPIC_BIASES.find((entry) => lowered.includes(entry.keyword));
  return (match ? ownValue(match.biases, faction) : undefined) ?? 0;
}

// ─── Engine ─────────────────────────────────────────────────────────────────

export class AmendmentEngine {
  private readonly relations: FactionRelationGraph;
  private readonly corruption: CorruptionModel;
  private readonly factionCorruption: Record<Faction, number>;
  private readonly maxPerRound: number;
  private readonly eventBus: EventBus | undefined;
  private sequence = 0;

  constructor(deps: AmendmentEngineDeps) {
    this.relations = deps.relations;
    this.corruption = deps.corruption;
    this.factionCorruption = deps.factionCorruption ?? {};
    this.maxPerRound = deps.maxPerRound ?? 3;
    this.eventBus = deps.eventBus;
  }

  /**
   * Draft exactly one amendment for the senator. Whether a senator proposes
   * at all is the caller's decision.
   */
  generate(
    senator: Senator,
    topic: string,
    factionStances: FactionStances,
    rng: RandomSource,
    options: GenerateOptions = {},
  ): Amendment {
    const stance: Stance = ownValue(factionStances, senator.faction) ?? 'neutral';
    const corruption = this.corruption.traitFor(senator, rng);
    const loyalty = resolveTraits(senator).loyalty;
    const intent = chooseIntent(stance, corruption, loyalty);

    const prefix = pickOne(rng, RATIONALE_PREFIXES) ?? RATIONALE_PREFIXES[0];
    const benefit = intent === 'insert-unrelated-benefits' ? (pickOne(rng, PUBLIC_BENEFITS) ?? PUBLIC_BENEFITS[0]) : '';
    const rationale = `${prefix} ${RATIONALE_TEMPLATES[intent](senator.faction, benefit)}`;

    this.sequence += 1;
    const amendment: Amendment = {
      id: `${options.roundId ?? 'adhoc'}-amendment-${this.sequence}`,
      roundId: options.roundId ?? null,
      proposer: senator.id,
      proposerFaction: senator.faction,
      proposerStance: stance,
      topic,
      intent,
      rationale,
      support: {},
      cosponsors: [...(options.cosponsors ?? [])],
      corruptionInvolved: corruption > 0.6,
      personalBenefit: corruption > 0.5,
    };

    for (const faction of Object.keys(factionStances)) {
      amendment.support[faction] = this.computeFactionSupport(amendment, faction, factionStances);
    }

    log.debug({ amendment: amendment.id, proposer: senator.id, intent }, 'Amendment drafted');
    this.eventBus?.emit('amendment:proposed', {
      roundId: amendment.roundId ?? 'adhoc',
      amendmentId: amendment.id,
      proposer: amendment.proposer,
      intent,
    });

    return amendment;
  }

  /** Likely support of one faction for the amendment, in [0, 1]. */
  computeFactionSupport(
    amendment: Pick<Amendment, 'proposerFaction' | 'proposerStance' | 'intent'>,
    faction: Faction,
    factionStances: FactionStances,
  ): number {
    const stance: Stance = ownValue(factionStances, faction) ?? 'neutral';
    let support = 0.5;

    support += this.relations.get(faction, amendment.proposerFaction) * 0.2;

    if (stance === 'support') {
      support += amendment.proposerStance === 'support' ? 0.2 : -0.2;
    } else if (stance === 'oppose') {
      support += amendment.proposerStance === 'oppose' ? 0.2 : -0.1;
    }

    if (STRENGTHENING_INTENTS.has(amendment.intent) && stance === 'support') {
      support += 0.1;
    } else if (WEAKENING_INTENTS.has(amendment.intent) && stance === 'oppose') {
      support += 0.1;
    } else if (amendment.intent === 'moderate-compromise') {
      support += 0.05;
    }

    const corruptibility = this.corruptibilityOf(faction);
    if (SELF_SERVING_INTENTS.has(amendment.intent) && corruptibility > 0.4) {
      support += corruptibility * 0.2;
    }

    return clampUnit(support);
  }

  /**
   * Amendments for one round. Initiators of amendment-support deals propose
   * first, with their partners as cosponsors; the remaining places go to a
   * random sample of the roster.
   */
  proposeFromOutcome(
    outcome: Readonly<NegotiationOutcome> | null,
    roster: readonly Senator[],
    topic: string,
    factionStances: FactionStances,
    rng: RandomSource,
  ): Amendment[] {
    if (this.maxPerRound === 0 || roster.length === 0) return [];

    const byId = new Map(roster.map((s) => [s.id, s]));
    const proposers: Array<{ senator: Senator; cosponsors: SenatorId[] }> = [];
    const chosen = new Set<SenatorId>();

    for (const meeting of outcome?.meetings ?? []) {
      if (proposers.length >= this.maxPerRound) break;
      if (meeting.dealType !== 'amendment-support') continue;
      const senator = byId.get(meeting.initiator);
      if (!senator || chosen.has(senator.id)) continue;
      chosen.add(senator.id);
      proposers.push({ senator, cosponsors: [meeting.target] });
    }

    const remaining = roster.filter((s) => !chosen.has(s.id));
    for (const senator of sample(rng, remaining, this.maxPerRound - proposers.length)) {
      proposers.push({ senator, cosponsors: [] });
    }

    return proposers.map(({ senator, cosponsors }) =>
      this.generate(senator, topic, factionStances, rng, {
        roundId: outcome?.roundId,
        cosponsors,
      }),
    );
  }

  /**
   * How a faction stands on the topic once the amendments are on the table.
   */
  assessFactionStance(faction: Faction, topic: string, amendments: readonly Amendment[]): FactionStanceAssessment {
    const initialStance = clampSigned(topicBias(faction, topic));
    const corruptibility = this.corruptibilityOf(faction);

    const effects: AmendmentEffect[] = amendments.map((amendment) => {
      let effect = this.relations.get(faction, amendment.proposerFaction) * 0.3;
      effect += ((ownValue(amendment.support, faction) ?? 0.5) - 0.5) * 0.5;
      if (amendment.corruptionInvolved && corruptibility > 0.4) {
        effect += 0.2;
      }
      return {
        amendmentId: amendment.id,
        proposer: amendment.proposer,
        effect: round(effect, 6),
        reasoning: describeEffect(effect, amendment.proposer),
      };
    });

    const finalStance = clampSigned(effects.reduce((sum, e) => sum + e.effect, initialStance));
    const stance: Stance = finalStance > 0.3 ? 'support' : finalStance < -0.3 ? 'oppose' : 'neutral';

    const strongest = [...effects].sort((a, b) => Math.abs(b.effect) - Math.abs(a.effect))[0];
    return {
      faction,
      initialStance,
      finalStance,
      stance,
      effects,
      primaryReasoning: strongest?.reasoning ?? 'based on faction interests',
    };
  }

  private corruptibilityOf(faction: Faction): number {
    return ownValue(this.factionCorruption, faction) ?? DEFAULT_FACTION_CORRUPTION;
  }
}

function describeEffect(effect: number, proposer: SenatorId): string {
  if (effect > 0.3) return `strongly supports the amendment by ${proposer}`;
  if (effect > 0.1) return `moderately supports the amendment by ${proposer}`;
  if (effect < -0.3) return `strongly opposes the amendment by ${proposer}`;
  if (effect < -0.1) return `moderately opposes the amendment by ${proposer}`;
  return `is neutral toward the amendment by ${proposer}`;
}
