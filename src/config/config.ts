/**
 * Curia — Configuration Management
 *
 * Loads the JSON configuration file, merges it over the defaults and validates
 * the result. The historical period table is configuration data as well: the
 * bundled table ships in `config/historical-periods.json`.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { fileURLToPath } from 'node:url';
import {
  type Config,
  ConfigSchema,
  type HistoricalPeriodTable,
  HistoricalPeriodTableSchema,
  type Result,
  ok,
  err,
} from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_BASE_DIR = path.join(os.homedir(), '.curia');

export const DEFAULT_CONFIG: Config = {
  logging: {
    level: 'info',
  },
  negotiation: {
    minActors: 3,
    influentialShare: 0.25,
    maxStakeholderActors: 5,
    maxMeetingsPerInitiator: 4,
    allianceDelta: 0.05,
    refusalPenalty: 0.2,
    counterFavorChance: 0.2,
    speakingFavor: 0.2,
    newFavor: 0.4,
  },
  relations: {
    decayFactor: 1,
  },
  amendments: {
    maxPerRound: 3,
  },
  history: {},
};

// Sources live two levels below the package root, the build output three.
const PERIOD_FILE_CANDIDATES = [
  '../../config/historical-periods.json',
  '../../../config/historical-periods.json',
].map((relative) => fileURLToPath(new URL(relative, import.meta.url)));

export const BUNDLED_PERIODS_FILE =
  PERIOD_FILE_CANDIDATES.find((candidate) => fs.existsSync(candidate)) ?? PERIOD_FILE_CANDIDATES[0];

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getConfigPath(): string {
  return expandPath(process.env.CURIA_CONFIG ?? path.join(DEFAULT_BASE_DIR, 'config.json'));
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load configuration from file, merge with defaults.
 * A missing file yields the defaults.
 */
export function loadConfig(customPath?: string): Result<Config, Error> {
  try {
    const configPath = expandPath(customPath ?? getConfigPath());

    let userConfig: unknown = {};
    if (fs.existsSync(configPath)) {
      userConfig = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    }

    if (!isPlainObject(userConfig)) {
      return err(new Error(`Invalid configuration: ${configPath} must contain a JSON object`));
    }

    const result = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, userConfig));
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function saveConfig(config: Config, customPath?: string): Result<void, Error> {
  try {
    const configPath = expandPath(customPath ?? getConfigPath());
    const dir = path.dirname(configPath);

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    fs.writeFileSync(configPath, JSON.stringify(ConfigSchema.parse(config), null, 2), {
      mode: 0o600,
      encoding: 'utf-8',
    });

    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Read a historical period table. Falls back to the bundled table when the
 * config names no file.
 */
export function loadHistoricalPeriods(config?: Config): Result<HistoricalPeriodTable, Error> {
  try {
    const file = expandPath(config?.history.periodsFile ?? BUNDLED_PERIODS_FILE);
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    const result = HistoricalPeriodTableSchema.safeParse(parsed);
    if (!result.success) {
      return err(new Error(`Invalid historical period table ${file}: ${result.error.message}`));
    }
    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
