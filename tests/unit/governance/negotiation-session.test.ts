import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_CONFIG, loadHistoricalPeriods } from '../../../src/config/config.js';
import { NegotiationSession } from '../../../src/governance/negotiation-session.js';
import { loadSnapshot, parseSnapshot, resumeSession, saveSnapshot } from '../../../src/governance/snapshot.js';
import { EventBus } from '../../../src/kernel/event-bus.js';
import type { HistoricalPeriod, RoundInputData } from '../../../src/types/index.js';

const input: RoundInputData = {
  topic: 'Tax on provincial grain',
  category: 'Economic Policy',
  roster: [
    { id: 'cicero', faction: 'Optimates', traits: { influence: 0.9 } },
    { id: 'clodius', faction: 'Populares', traits: { influence: 0.7 } },
    { id: 'pompey', faction: 'Military', traits: { influence: 0.95 } },
    { id: 'crassus', faction: 'Merchant', traits: { influence: 0.85, corruption: 0.9 } },
    { id: 'atticus', faction: 'Merchant', traits: { influence: 0.6 } },
    { id: 'milo', faction: 'Populares' },
    { id: 'varro' },
  ],
};

function bundledPeriods(): HistoricalPeriod[] {
  const table = loadHistoricalPeriods();
  if (!table.success) throw table.error;
  return table.data.periods;
}

describe('NegotiationSession', () => {
  it('replays identically for the same seed', () => {
    const first = new NegotiationSession({ seed: 'ides' });
    const second = new NegotiationSession({ seed: 'ides' });

    for (let i = 0; i < 3; i++) {
      expect(first.runRound(input)).toEqual(second.runRound(input));
    }
    expect(first.snapshot()).toEqual(second.snapshot());
  });

  it('fills in defaults for a senator without faction or traits', () => {
    const result = new NegotiationSession({ seed: 3 }).runRound(input);
    expect(result.influence).toHaveProperty('varro');
    expect(result.factionStances).toHaveProperty('Independent');
  });

  it('archives amendments across rounds', () => {
    const session = new NegotiationSession({ seed: 5 });
    session.runRound(input);
    session.runRound({ ...input, topic: 'Military levy' });

    expect(session.rounds).toBe(2);
    expect(session.amendments).toHaveLength(6);
    expect(Object.isFrozen(session.amendments[0])).toBe(true);

    const assessment = session.assessFactionStance('Military', 'Military levy');
    expect(assessment.initialStance).toBe(0.6);
    expect(assessment.effects).toHaveLength(3);
  });

  it('decays relations after each round when configured', () => {
    const steady = new NegotiationSession({ seed: 8 });
    const decaying = new NegotiationSession({
      seed: 8,
      config: { ...DEFAULT_CONFIG, relations: { decayFactor: 0.5 } },
    });
    const decayed = vi.fn();
    decaying.eventBus.on('relations:decayed', decayed);

    steady.runRound(input);
    decaying.runRound(input);

    expect(decaying.relations.get('Optimates', 'Populares')).toBeCloseTo(steady.relations.get('Optimates', 'Populares') * 0.5, 10);
    expect(decayed).toHaveBeenCalledWith({ factor: 0.5, pairs: steady.relations.entries().length });
  });

  it('applies each historical period once', () => {
    const session = new NegotiationSession({ seed: 2, periods: bundledPeriods() });

    session.createRound({ ...input, year: -100 });
    expect(session.relations.get('Optimates', 'Populares')).toBeCloseTo(-0.8, 10);
    expect(session.snapshot().appliedPeriods).toEqual([
      'tribunician-politics',
      'gracchan-land-reform',
      'marian-reforms',
      'aristocratic-decline',
    ]);

    session.createRound({ ...input, year: -90 });
    expect(session.relations.get('Optimates', 'Populares')).toBeCloseTo(-0.8, 10);

    session.createRound({ ...input, year: -59 });
    expect(session.relations.get('Optimates', 'Populares')).toBeCloseTo(-0.9, 10);
  });

  it('samples corruptibility for factions it has not seen', () => {
    const session = new NegotiationSession({ seed: 4 });
    expect(session.factionCorruptionLevels()).not.toHaveProperty('Independent');
    session.createRound(input);
    const level = session.factionCorruptionLevels().Independent;
    expect(level).toBeGreaterThanOrEqual(0.1);
    expect(level).toBeLessThanOrEqual(0.5);
  });

  it('shares one event bus across the round', () => {
    const eventBus = new EventBus();
    const completed = vi.fn();
    eventBus.on('round:completed', completed);

    const result = new NegotiationSession({ seed: 6, eventBus }).runRound(input);

    expect(completed).toHaveBeenCalledWith({
      roundId: 'round-1',
      topic: 'Tax on provincial grain',
      meetings: result.outcome.meetings.length,
      amendments: 3,
    });
  });
});

describe('snapshots', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'curia-snapshot-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('round-trips relations, favors and standing through a file', () => {
    const session = new NegotiationSession({ seed: 12 });
    session.ledger.credit('clodius', 'crassus', 0.45);
    session.ledger.adjustStanding('cicero', 'clodius', -0.3);
    session.runRound(input);

    const file = path.join(dir, 'session.json');
    expect(saveSnapshot(file, session).success).toBe(true);

    const loaded = loadSnapshot(file);
    expect(loaded.success).toBe(true);
    if (!loaded.success) return;
    const restored = NegotiationSession.fromSnapshot(loaded.data);

    for (const [a, b, value] of session.relations.entries()) {
      expect(restored.relations.get(a, b)).toBe(value);
    }
    for (const debtor of ['clodius', 'cicero', 'crassus', 'atticus', 'milo', 'pompey', 'varro']) {
      expect(restored.ledger.debtsOf(debtor)).toEqual(session.ledger.debtsOf(debtor));
    }
    expect(restored.ledger.standing('clodius', 'cicero')).toBe(session.ledger.standing('clodius', 'cicero'));
    expect(restored.snapshot()).toEqual(session.snapshot());
  });

  it('resumes a session from a file', () => {
    const session = new NegotiationSession({ seed: 12 });
    session.ledger.credit('milo', 'clodius', 0.2);
    const file = path.join(dir, 'nested', 'session.json');
    saveSnapshot(file, session);

    const resumed = resumeSession(file, { seed: 99 });
    expect(resumed.success).toBe(true);
    if (resumed.success) expect(resumed.data.ledger.balance('milo', 'clodius')).toBe(0.2);
  });

  it('rejects a malformed snapshot', () => {
    expect(parseSnapshot({ version: 2, relations: {}, ledger: { favors: {}, standing: {} } }).success).toBe(false);
    expect(parseSnapshot({ version: 1, relations: { 'Optimates|Populares': 'hostile' } }).success).toBe(false);
  });

  it('clamps out-of-range values on load', () => {
    const parsed = parseSnapshot({
      version: 1,
      relations: { 'Optimates|Populares': -3 },
      ledger: { favors: { brutus: { caesar: 4 } }, standing: {} },
    });
    expect(parsed.success).toBe(true);
    if (!parsed.success) return;
    const session = NegotiationSession.fromSnapshot(parsed.data);
    expect(session.relations.get('Populares', 'Optimates')).toBe(-1);
    expect(session.ledger.balance('brutus', 'caesar')).toBe(1);
  });

  it('reports a missing file as an error', () => {
    const result = loadSnapshot(path.join(dir, 'absent.json'));
    expect(result.success).toBe(false);
  });
});
