import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  type Amendment,
  AmendmentEngine,
  chooseIntent,
  topicBias,
} from '../../../src/governance/amendment-engine.js';
import type { MeetingRecord, NegotiationOutcome } from '../../../src/governance/backroom-negotiation.js';
import { CorruptionModel } from '../../../src/governance/corruption-model.js';
import { FactionRelationGraph } from '../../../src/governance/faction-relations.js';
import { EventBus } from '../../../src/kernel/event-bus.js';
import { SeededRandom, type RandomSource } from '../../../src/kernel/random.js';
import { AMENDMENT_INTENTS, type DealType, type Senator, type Stance } from '../../../src/types/index.js';

function fixed(value: number): RandomSource {
  return { next: () => value };
}

function meeting(sequence: number, initiator: string, target: string, dealType: DealType | null): MeetingRecord {
  return {
    sequence,
    initiator,
    target,
    factions: ['Populares', 'Populares'],
    stances: ['support', 'support'],
    agreement: true,
    agreementProbability: 0.5,
    dealMade: dealType !== null,
    dealType,
    deal: null,
    alliance: null,
  };
}

function outcomeWith(meetings: MeetingRecord[]): NegotiationOutcome {
  return {
    roundId: 'round-4',
    topic: 'Land bill',
    category: null,
    actors: [],
    influentialSenators: [],
    stakeholderFactions: [],
    meetings,
    alliances: [],
    summary: [],
  };
}

const clodius: Senator = { id: 'clodius', faction: 'Populares', traits: { corruption: 0.3, loyalty: 0.9 } };
const crassus: Senator = { id: 'crassus', faction: 'Merchant', traits: { corruption: 0.8, loyalty: 0.5 } };
const cato: Senator = { id: 'cato', faction: 'Optimates', traits: { corruption: 0.05, loyalty: 0.95 } };
const milo: Senator = { id: 'milo', faction: 'Populares', traits: { corruption: 0.2 } };

describe('chooseIntent', () => {
  it('follows stance, corruption and loyalty', () => {
    expect(chooseIntent('support', 0.8, 0.9)).toBe('strengthen-with-benefits');
    expect(chooseIntent('support', 0.3, 0.9)).toBe('strengthen-broadly');
    expect(chooseIntent('support', 0.3, 0.5)).toBe('clarify-supportively');
    expect(chooseIntent('oppose', 0.75, 0)).toBe('redirect-benefits');
    expect(chooseIntent('oppose', 0.1, 0.8)).toBe('weaken-substantially');
    expect(chooseIntent('oppose', 0.1, 0.1)).toBe('limit-scope');
    expect(chooseIntent('neutral', 0.6, 0.9)).toBe('insert-unrelated-benefits');
    expect(chooseIntent('neutral', 0.5, 0.9)).toBe('moderate-compromise');
  });
});

describe('topicBias', () => {
  it('uses the first keyword found', () => {
    expect(topicBias('Military', 'Military levy for Gaul')).toBe(0.6);
    expect(topicBias('Merchant', 'Tax on military contractors')).toBe(0.3);
    expect(topicBias('Populares', 'Land redistribution')).toBe(0.7);
    expect(topicBias('Religious', 'Aqueduct repairs')).toBe(0);
  });
});

describe('AmendmentEngine', () => {
  let relations: FactionRelationGraph;
  let engine: AmendmentEngine;

  beforeEach(() => {
    relations = new FactionRelationGraph();
    relations.set('Optimates', 'Populares', -0.7);
    engine = new AmendmentEngine({
      relations,
      corruption: new CorruptionModel(),
      factionCorruption: { Merchant: 0.8, Optimates: 0.3 },
    });
  });

  it('treats factions named like object members as unknown', () => {
    const senator: Senator = { id: 'gracchus', faction: 'constructor', traits: { corruption: 0.2, loyalty: 0.5 } };
    const amendment = engine.generate(senator, 'Grain dole', {}, fixed(0));
    expect(amendment.proposerStance).toBe('neutral');
    expect(amendment.intent).toBe('moderate-compromise');
    expect(amendment.rationale).toBe(
      'provided that a balanced approach be taken, incorporating reasonable concerns of supporting and opposing factions',
    );

    const assessment = engine.assessFactionStance('toString', 'Grain dole', [amendment]);
    expect(assessment.initialStance).toBe(0);
    expect(assessment.stance).toBe('neutral');
  });

  describe('computeFactionSupport', () => {
    const stances: Record<string, Stance> = { Optimates: 'oppose', Populares: 'support', Merchant: 'neutral' };

    it('weighs relation, stance and intent', () => {
      const amendment = { proposerFaction: 'Populares', proposerStance: 'support', intent: 'strengthen-broadly' } as const;
      // 0.5 − 0.14 (relation) − 0.1 (stance)
      expect(engine.computeFactionSupport(amendment, 'Optimates', stances)).toBeCloseTo(0.26, 10);
      // 0.5 + 0.2 (stance) + 0.1 (intent)
      expect(engine.computeFactionSupport(amendment, 'Populares', stances)).toBeCloseTo(0.8, 10);
    });

    it('lets corruptible factions warm to self-serving intents', () => {
      const amendment = { proposerFaction: 'Populares', proposerStance: 'neutral', intent: 'insert-unrelated-benefits' } as const;
      expect(engine.computeFactionSupport(amendment, 'Merchant', stances)).toBeCloseTo(0.66, 10);
      // Optimates corruptibility 0.3 is below the threshold
      expect(engine.computeFactionSupport(amendment, 'Optimates', stances)).toBeCloseTo(0.26, 10);
    });

    it('gives compromise a small bonus', () => {
      const amendment = { proposerFaction: 'Merchant', proposerStance: 'neutral', intent: 'moderate-compromise' } as const;
      expect(engine.computeFactionSupport(amendment, 'Equites', {})).toBeCloseTo(0.55, 10);
    });

    it('stays within [0, 1] for every intent and stance', () => {
      const extreme = new FactionRelationGraph();
      extreme.set('A', 'B', 1);
      extreme.set('A', 'C', -1);
      const corrupt = new AmendmentEngine({
        relations: extreme,
        corruption: new CorruptionModel(),
        factionCorruption: { A: 1, B: 1, C: 1 },
      });
      const allStances: Stance[] = ['support', 'oppose', 'neutral'];

      for (const intent of AMENDMENT_INTENTS) {
        for (const proposerStance of allStances) {
          for (const stance of allStances) {
            for (const proposerFaction of ['B', 'C']) {
              const support = corrupt.computeFactionSupport({ proposerFaction, proposerStance, intent }, 'A', { A: stance });
              expect(support).toBeGreaterThanOrEqual(0);
              expect(support).toBeLessThanOrEqual(1);
            }
          }
        }
      }
    });
  });

  describe('generate', () => {
    it('drafts a self-serving amendment for a corrupt supporter', () => {
      const amendment = engine.generate(crassus, 'Grain dole', { Merchant: 'support', Populares: 'support' }, fixed(0));

      expect(amendment).toMatchObject({
        id: 'adhoc-amendment-1',
        roundId: null,
        proposer: 'crassus',
        proposerFaction: 'Merchant',
        proposerStance: 'support',
        intent: 'strengthen-with-benefits',
        corruptionInvolved: true,
        personalBenefit: true,
        cosponsors: [],
      });
      expect(amendment.rationale).toBe(
        'provided that additional provisions be made for Merchant interests, specifically in oversight and resource allocation',
      );
      expect(Object.keys(amendment.support).sort()).toEqual(['Merchant', 'Populares']);
    });

    it('treats an unlisted faction as neutral', () => {
      const amendment = engine.generate(cato, 'Grain dole', {}, fixed(0));
      expect(amendment.proposerStance).toBe('neutral');
      expect(amendment.intent).toBe('moderate-compromise');
      expect(amendment.corruptionInvolved).toBe(false);
    });

    it('numbers amendments and announces them', () => {
      const eventBus = new EventBus();
      const proposed = vi.fn();
      eventBus.on('amendment:proposed', proposed);
      const announcing = new AmendmentEngine({ relations, corruption: new CorruptionModel(), eventBus });

      announcing.generate(cato, 'Grain dole', {}, fixed(0), { roundId: 'round-2' });
      const second = announcing.generate(clodius, 'Grain dole', { Populares: 'support' }, fixed(0), { roundId: 'round-2' });

      expect(second.id).toBe('round-2-amendment-2');
      expect(second.intent).toBe('strengthen-broadly');
      expect(proposed).toHaveBeenCalledTimes(2);
      expect(proposed).toHaveBeenLastCalledWith({
        roundId: 'round-2',
        amendmentId: 'round-2-amendment-2',
        proposer: 'clodius',
        intent: 'strengthen-broadly',
      });
    });
  });

  describe('proposeFromOutcome', () => {
    const roster = [clodius, crassus, cato, milo];
    const stances: Record<string, Stance> = { Populares: 'support', Merchant: 'neutral', Optimates: 'oppose' };

    it('lets amendment-support initiators propose first', () => {
      const outcome = outcomeWith([
        meeting(0, 'crassus', 'cato', 'vote-exchange'),
        meeting(1, 'milo', 'clodius', 'amendment-support'),
        meeting(2, 'milo', 'crassus', 'amendment-support'),
      ]);
      const amendments = engine.proposeFromOutcome(outcome, roster, 'Land bill', stances, new SeededRandom(6));

      expect(amendments).toHaveLength(3);
      expect(amendments[0].proposer).toBe('milo');
      expect(amendments[0].cosponsors).toEqual(['clodius']);
      expect(amendments[0].roundId).toBe('round-4');
      expect(new Set(amendments.map((a) => a.proposer)).size).toBe(3);
    });

    it('fills the round from the roster without an outcome', () => {
      const amendments = engine.proposeFromOutcome(null, roster, 'Land bill', stances, new SeededRandom(6));
      expect(amendments).toHaveLength(3);
      expect(amendments.every((a) => a.cosponsors.length === 0)).toBe(true);
    });

    it('proposes nothing when amendments are disabled or nobody attends', () => {
      const disabled = new AmendmentEngine({ relations, corruption: new CorruptionModel(), maxPerRound: 0 });
      expect(disabled.proposeFromOutcome(null, roster, 'Land bill', stances, new SeededRandom(1))).toEqual([]);
      expect(engine.proposeFromOutcome(null, [], 'Land bill', stances, new SeededRandom(1))).toEqual([]);
    });

    it('caps proposals for a small roster at its size', () => {
      expect(engine.proposeFromOutcome(null, [cato, milo], 'Land bill', stances, new SeededRandom(2))).toHaveLength(2);
    });
  });

  describe('assessFactionStance', () => {
    const amendment: Amendment = {
      id: 'round-1-amendment-1',
      roundId: 'round-1',
      proposer: 'clodius',
      proposerFaction: 'Populares',
      proposerStance: 'support',
      topic: 'Land redistribution',
      intent: 'strengthen-broadly',
      rationale: 'provided that the scope be expanded',
      support: { Optimates: 0.26, Populares: 0.8 },
      cosponsors: [],
      corruptionInvolved: false,
      personalBenefit: false,
    };

    it('starts from the topic alone', () => {
      const assessment = engine.assessFactionStance('Populares', 'Land redistribution', []);
      expect(assessment.initialStance).toBe(0.7);
      expect(assessment.finalStance).toBe(0.7);
      expect(assessment.stance).toBe('support');
      expect(assessment.primaryReasoning).toBe('based on faction interests');
    });

    it('moves with the amendments on the table', () => {
      const assessment = engine.assessFactionStance('Optimates', 'Land redistribution', [amendment]);
      // −0.7 × 0.3 + (0.26 − 0.5) × 0.5 = −0.33
      expect(assessment.effects[0].effect).toBeCloseTo(-0.33, 6);
      expect(assessment.finalStance).toBeCloseTo(-0.83, 6);
      expect(assessment.stance).toBe('oppose');
      expect(assessment.primaryReasoning).toBe('strongly opposes the amendment by clodius');
    });

    it('adds a boost for corruptible factions when corruption is involved', () => {
      const assessment = engine.assessFactionStance('Merchant', 'Aqueduct repairs', [
        { ...amendment, corruptionInvolved: true },
      ]);
      // unlisted support counts as 0.5; Merchant corruptibility 0.8 > 0.4
      expect(assessment.finalStance).toBeCloseTo(0.2, 6);
      expect(assessment.stance).toBe('neutral');
      expect(assessment.primaryReasoning).toBe('moderately supports the amendment by clodius');
    });
  });
});
