import { Command } from 'commander';
import { type Result, type RelationMap, ok } from '../../types/index.js';
import { loadConfig, loadHistoricalPeriods } from '../../config/config.js';
import { SeededRandom } from '../../kernel/random.js';
import { applyHistoricalPeriods, seedFactionRelations } from '../../governance/faction-relations.js';
import { parseSeed, parseYear } from './negotiate.js';

export interface RelationsOptions {
  year?: string;
  seed: string;
  config?: string;
}

export interface RelationsReport {
  seed: number | string;
  year: number | null;
  periods: string[];
  relations: RelationMap;
}

/** The seeded relation map, shifted by every period begun by `year`. */
export function describeRelations(options: RelationsOptions): Result<RelationsReport, Error> {
  const config = loadConfig(options.config);
  if (!config.success) return config;
  const year = parseYear(options.year);
  if (!year.success) return year;

  const seed = parseSeed(options.seed);
  const graph = seedFactionRelations(new SeededRandom(seed));

  let periods: string[] = [];
  if (year.data !== undefined) {
    const table = loadHistoricalPeriods(config.data);
    if (!table.success) return table;
    periods = applyHistoricalPeriods(graph, year.data, table.data.periods);
  }

  return ok({ seed, year: year.data ?? null, periods, relations: graph.toJSON() });
}

export function registerRelationsCommand(program: Command): void {
  program
    .command('relations')
    .description('Print the seeded faction relation map')
    .option('-y, --year <year>', 'Apply historical periods up to this year, negative for BCE')
    .option('-s, --seed <seed>', 'Seed for the random stream', '1')
    .option('--config <file>', 'Configuration file')
    .action((options: RelationsOptions) => {
      const report = describeRelations(options);
      if (!report.success) {
        process.stderr.write(`Error: ${report.error.message}\n`);
        process.exit(1);
        return;
      }
      process.stdout.write(`${JSON.stringify(report.data, null, 2)}\n`);
    });
}
