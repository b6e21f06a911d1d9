import { describe, it, expect } from 'vitest';
import { ALLIANCE_CHANCE, DEAL_HANDLERS, type DealContext, dealWeights } from '../../../src/governance/deal-types.js';
import { FactionRelationGraph } from '../../../src/governance/faction-relations.js';
import { PoliticalFavorLedger } from '../../../src/governance/favor-ledger.js';
import { DEFAULT_CONFIG } from '../../../src/config/config.js';
import { DEAL_TYPES, resolveTraits, type Senator } from '../../../src/types/index.js';
import type { RandomSource } from '../../../src/kernel/random.js';

function scripted(values: number[]): RandomSource {
  let i = 0;
  return { next: () => values[i++ % values.length] };
}

const crassus: Senator = { id: 'crassus', faction: 'Merchant', traits: { loyalty: 0.5 } };
const pompey: Senator = { id: 'pompey', faction: 'Military', traits: { loyalty: 0.9 } };

function context(overrides: Partial<DealContext> = {}): DealContext {
  return {
    initiator: crassus,
    target: pompey,
    initiatorTraits: resolveTraits(crassus),
    targetTraits: resolveTraits(pompey),
    meanCorruption: 0.3,
    ledger: new PoliticalFavorLedger(),
    relations: new FactionRelationGraph(),
    tuning: DEFAULT_CONFIG.negotiation,
    rng: scripted([0.5]),
    ...overrides,
  };
}

describe('DEAL_HANDLERS', () => {
  it('records vote exchanges as commitments only', () => {
    const ctx = context();
    const effect = DEAL_HANDLERS['vote-exchange'](ctx);
    expect(effect.commitment).toBe(true);
    expect(effect.favorCredited).toBeNull();
    expect(ctx.ledger.size).toBe(0);
  });

  it('leaves the target owing a small favor for a speaking slot', () => {
    const ctx = context();
    const effect = DEAL_HANDLERS['speaking-opportunity'](ctx);
    expect(effect.favorCredited).toEqual({ debtor: 'pompey', benefactor: 'crassus', intensity: 0.2, balance: 0.2 });
    expect(ctx.ledger.balance('pompey', 'crassus')).toBe(0.2);
  });

  it('creates a new debt in a favor exchange when none is owed', () => {
    const ctx = context();
    const effect = DEAL_HANDLERS['favor-exchange'](ctx);
    expect(effect.favorResolved).toBeNull();
    expect(effect.favorCredited?.intensity).toBe(0.4);
  });

  it('calls in an existing debt in a favor exchange', () => {
    const ledger = new PoliticalFavorLedger();
    ledger.credit('pompey', 'crassus', 0.6);
    // compliance 0.6 × 1.4 = 0.84; draws 0 (comply) then 0.9 (no counter-favor)
    const effect = DEAL_HANDLERS['favor-exchange'](context({ ledger, rng: scripted([0, 0.9]) }));

    expect(effect.favorCredited).toBeNull();
    expect(effect.favorResolved).toMatchObject({ debtor: 'pompey', benefactor: 'crassus', honored: true });
    expect(ledger.balance('pompey', 'crassus')).toBe(0);
  });

  it('flags bribery for a corrupt pair sharing resources', () => {
    // draw 0.1 < 0.8 credits 0.2 + 0.3 × 0.8
    const effect = DEAL_HANDLERS['resource-allocation'](context({ meanCorruption: 0.8, rng: scripted([0.1]) }));
    expect(effect.bribery).toBe(true);
    expect(effect.favorCredited?.intensity).toBeCloseTo(0.44, 10);
  });

  it('does not flag bribery below the threshold', () => {
    const effect = DEAL_HANDLERS['resource-allocation'](context({ meanCorruption: 0.2, rng: scripted([0.9]) }));
    expect(effect.bribery).toBe(false);
    expect(effect.favorCredited).toBeNull();
  });
});

describe('dealWeights', () => {
  it('adds corruption and category bias', () => {
    expect(dealWeights(DEAL_TYPES, 'Economic Policy', 0.5)).toEqual([
      ['vote-exchange', 1],
      ['amendment-support', 1],
      ['speaking-opportunity', 1],
      ['favor-exchange', 2],
      ['resource-allocation', 3],
    ]);
  });

  it('ignores unknown categories', () => {
    expect(dealWeights(DEAL_TYPES, 'Chariot Racing', 0)).toEqual(DEAL_TYPES.map((type) => [type, 1]));
  });
});

describe('ALLIANCE_CHANCE', () => {
  it('favors vote and amendment deals', () => {
    expect(ALLIANCE_CHANCE['vote-exchange']).toBe(0.3);
    expect(ALLIANCE_CHANCE['amendment-support']).toBe(0.3);
    expect(ALLIANCE_CHANCE['resource-allocation']).toBe(0.1);
  });
});
