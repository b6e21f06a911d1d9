import { Command } from 'commander';
import * as fs from 'node:fs';
import {
  type Config,
  type FactionStances,
  FactionStancesSchema,
  type Result,
  RosterSchema,
  RoundInputSchema,
  err,
  ok,
} from '../../types/index.js';
import { loadConfig, loadHistoricalPeriods } from '../../config/config.js';
import { NegotiationSession } from '../../governance/negotiation-session.js';
import type { RoundResult } from '../../governance/negotiation-round.js';
import { loadSnapshot, saveSnapshot } from '../../governance/snapshot.js';

export interface NegotiateOptions {
  roster: string;
  topic: string;
  category?: string;
  year?: string;
  seed: string;
  stances?: string;
  snapshot?: string;
  config?: string;
}

export interface NegotiationReport {
  roundId: string;
  topic: string;
  summary: readonly string[];
  outcome: RoundResult['outcome'];
  amendments: RoundResult['amendments'];
  influence: RoundResult['influence'];
  factionStances: FactionStances;
}

function readJson(file: string): Result<unknown, Error> {
  try {
    return ok(JSON.parse(fs.readFileSync(file, 'utf-8')));
  } catch (error) {
    return err(new Error(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`));
  }
}

export function parseYear(value: string | undefined): Result<number | undefined, Error> {
  if (value === undefined) return ok(undefined);
  const year = Number(value);
  if (!Number.isInteger(year)) {
    return err(new Error(`Year must be an integer (negative for BCE), got "${value}"`));
  }
  return ok(year);
}

export function parseStances(value: string | undefined): Result<FactionStances | undefined, Error> {
  if (value === undefined) return ok(undefined);
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    return err(new Error('Stances must be a JSON object of faction to support|oppose|neutral'));
  }
  const parsed = FactionStancesSchema.safeParse(raw);
  return parsed.success ? ok(parsed.data) : err(new Error(`Invalid stances: ${parsed.error.message}`));
}

/** Seed from a numeric string, otherwise the string itself is hashed. */
export function parseSeed(value: string): number | string {
  return /^-?\d+$/.test(value) ? Number(value) : value;
}

/**
 * Run one round from command-line options. With `snapshot`, the session
 * resumes from that file when it exists and is written back afterwards.
 */
export function runNegotiation(options: NegotiateOptions, config: Config): Result<NegotiationReport, Error> {
  const rosterJson = readJson(options.roster);
  if (!rosterJson.success) return rosterJson;
  const roster = RosterSchema.safeParse(rosterJson.data);
  if (!roster.success) return err(new Error(`Invalid roster: ${roster.error.message}`));

  const year = parseYear(options.year);
  if (!year.success) return year;
  const stances = parseStances(options.stances);
  if (!stances.success) return stances;

  const periods = loadHistoricalPeriods(config);
  if (!periods.success) return periods;

  const sessionOptions = { seed: parseSeed(options.seed), config, periods: periods.data.periods };
  let session = new NegotiationSession(sessionOptions);
  if (options.snapshot !== undefined && fs.existsSync(options.snapshot)) {
    const snapshot = loadSnapshot(options.snapshot);
    if (!snapshot.success) return snapshot;
    session = NegotiationSession.fromSnapshot(snapshot.data, sessionOptions);
  }

  const input = RoundInputSchema.safeParse({
    roster: roster.data,
    topic: options.topic,
    category: options.category,
    year: year.data,
    factionStances: stances.data,
  });
  if (!input.success) return err(new Error(`Invalid round input: ${input.error.message}`));
  const result = session.runRound(input.data);

  if (options.snapshot !== undefined) {
    const saved = saveSnapshot(options.snapshot, session);
    if (!saved.success) return saved;
  }

  return ok({
    roundId: result.roundId,
    topic: result.topic,
    summary: result.outcome.summary,
    outcome: result.outcome,
    amendments: result.amendments,
    influence: result.influence,
    factionStances: result.factionStances,
  });
}

export function registerNegotiateCommand(program: Command): void {
  program
    .command('negotiate')
    .description('Run one backroom negotiation round and print the outcome as JSON')
    .requiredOption('-r, --roster <file>', 'JSON file with the attending senators')
    .requiredOption('-t, --topic <text>', 'Topic under debate')
    .option('-c, --category <category>', 'Topic category, e.g. "Military Affairs"')
    .option('-y, --year <year>', 'Current year, negative for BCE')
    .option('-s, --seed <seed>', 'Seed for the random stream', '1')
    .option('--stances <json>', 'Faction stances, e.g. {"Optimates":"oppose"}')
    .option('--snapshot <file>', 'Resume from and save the session to this file')
    .option('--config <file>', 'Configuration file')
    .action((options: NegotiateOptions) => {
      const config = loadConfig(options.config);
      if (!config.success) {
        process.stderr.write(`Error: ${config.error.message}\n`);
        process.exit(1);
        return;
      }

      const report = runNegotiation(options, config.data);
      if (!report.success) {
        process.stderr.write(`Error: ${report.error.message}\n`);
        process.exit(1);
        return;
      }

      process.stdout.write(`${JSON.stringify(report.data, null, 2)}\n`);
    });
}
