/**
 * Curia — Core Type Definitions
 *
 * Schemas for everything that crosses the boundary of the negotiation core:
 * rosters, round input, configuration, historical period tables and snapshots.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 */

import { z } from 'zod';
import { clampSigned, clampUnit } from '../utils/clamp.js';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const KNOWN_FACTIONS = ['Optimates', 'Populares', 'Military', 'Religious', 'Merchant'] as const;
export type KnownFaction = (typeof KNOWN_FACTIONS)[number];

/** Joins the two names of a pair key; not allowed inside a name. */
export const PAIR_SEPARATOR = '|';

/** A name usable as a record key and a pair-key half. */
function nameSchema(max: number) {
  return z
    .string()
    .min(1)
    .max(max)
    .refine((value) => !value.includes(PAIR_SEPARATOR), { message: `Name must not contain "${PAIR_SEPARATOR}"` })
    .refine((value) => value !== '__proto__', { message: 'Reserved name' });
}

/** Faction names are open: unknown factions resolve to neutral values. */
export const FactionSchema = nameSchema(128);
export type Faction = z.infer<typeof FactionSchema>;

export const SenatorIdSchema = nameSchema(256);
export type SenatorId = z.infer<typeof SenatorIdSchema>;

export const StanceSchema = z.enum(['support', 'oppose', 'neutral']);
export type Stance = z.infer<typeof StanceSchema>;

export const FactionStancesSchema = z.record(FactionSchema, StanceSchema);
export type FactionStances = z.infer<typeof FactionStancesSchema>;

export const KNOWN_TOPIC_CATEGORIES = [
  'Military Affairs',
  'Foreign Policy',
  'Domestic Policy',
  'Religious Matters',
  'Economic Policy',
  'Legal Reforms',
] as const;
export type KnownTopicCategory = (typeof KNOWN_TOPIC_CATEGORIES)[number];

export function isKnownTopicCategory(value: string | undefined): value is KnownTopicCategory {
  return KNOWN_TOPIC_CATEGORIES.some((known) => known === value);
}

export const TopicCategorySchema = z.string().max(128);
export type TopicCategory = z.infer<typeof TopicCategorySchema>;

export const DealTypeSchema = z.enum([
  'vote-exchange',
  'amendment-support',
  'speaking-opportunity',
  'favor-exchange',
  'resource-allocation',
]);
export type DealType = z.infer<typeof DealTypeSchema>;
export const DEAL_TYPES: readonly DealType[] = DealTypeSchema.options;

export const AmendmentIntentSchema = z.enum([
  'strengthen-with-benefits',
  'strengthen-broadly',
  'clarify-supportively',
  'redirect-benefits',
  'weaken-substantially',
  'limit-scope',
  'insert-unrelated-benefits',
  'moderate-compromise',
]);
export type AmendmentIntent = z.infer<typeof AmendmentIntentSchema>;
export const AMENDMENT_INTENTS: readonly AmendmentIntent[] = AmendmentIntentSchema.options;

// ═══════════════════════════════════════════════════════════════════════════
// SENATOR SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const unitTrait = z.number().finite().transform(clampUnit);

export const SenatorTraitsSchema = z.object({
  loyalty: unitTrait.optional(),
  corruption: unitTrait.optional(),
  eloquence: unitTrait.optional(),
  influence: unitTrait.optional(),
});
export type SenatorTraits = z.infer<typeof SenatorTraitsSchema>;

export const SenatorSchema = z.object({
  id: SenatorIdSchema,
  name: z.string().max(256).optional(),
  faction: FactionSchema.default('Independent'),
  traits: SenatorTraitsSchema.default({}),
});
export type Senator = z.infer<typeof SenatorSchema>;

export const RosterSchema = z.array(SenatorSchema);

/** Trait values with the documented defaults filled in. */
export interface ResolvedTraits {
  loyalty: number;
  corruption: number;
  eloquence: number;
  influence: number;
}

export const TRAIT_DEFAULTS: ResolvedTraits = {
  loyalty: 0.5,
  corruption: 0.1,
  eloquence: 0.5,
  influence: 0.5,
};

export function resolveTraits(senator: Pick<Senator, 'traits'>): ResolvedTraits {
  const traits = senator.traits;
  return {
    loyalty: clampUnit(traits.loyalty ?? TRAIT_DEFAULTS.loyalty),
    corruption: clampUnit(traits.corruption ?? TRAIT_DEFAULTS.corruption),
    eloquence: clampUnit(traits.eloquence ?? TRAIT_DEFAULTS.eloquence),
    influence: clampUnit(traits.influence ?? TRAIT_DEFAULTS.influence),
  };
}

export function displayName(senator: Pick<Senator, 'id' | 'name'>): string {
  return senator.name ?? senator.id;
}

// ═══════════════════════════════════════════════════════════════════════════
// ROUND INPUT
// ═══════════════════════════════════════════════════════════════════════════

export const RoundInputSchema = z.object({
  roster: RosterSchema,
  topic: z.string().min(1).max(2048),
  category: TopicCategorySchema.optional(),
  /** Negative for BCE. */
  year: z.number().int().optional(),
  factionStances: FactionStancesSchema.optional(),
});
export type RoundInput = z.infer<typeof RoundInputSchema>;
/** Round input before defaults are filled in. */
export type RoundInputData = z.input<typeof RoundInputSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// HISTORICAL PERIODS
// ═══════════════════════════════════════════════════════════════════════════

export const RelationShiftSchema = z.object({
  factions: z.tuple([FactionSchema, FactionSchema]),
  delta: z.number().min(-2).max(2),
});
export type RelationShift = z.infer<typeof RelationShiftSchema>;

export const HistoricalPeriodSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  fromYear: z.number().int(),
  relationShifts: z.array(RelationShiftSchema),
  influenceMultipliers: z.record(FactionSchema, z.number().positive().max(10)).default({}),
});
export type HistoricalPeriod = z.infer<typeof HistoricalPeriodSchema>;

export const HistoricalPeriodTableSchema = z.object({
  version: z.string(),
  periods: z.array(HistoricalPeriodSchema),
});
export type HistoricalPeriodTable = z.infer<typeof HistoricalPeriodTableSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const NegotiationTuningSchema = z.object({
  /** Floor on the number of actors picked by influence. */
  minActors: z.number().int().min(1),
  influentialShare: z.number().min(0).max(1),
  maxStakeholderActors: z.number().int().min(0),
  maxMeetingsPerInitiator: z.number().int().min(1),
  allianceDelta: z.number().min(0).max(1),
  refusalPenalty: z.number().min(0).max(1),
  counterFavorChance: z.number().min(0).max(1),
  speakingFavor: z.number().min(0).max(1),
  newFavor: z.number().min(0).max(1),
});
export type NegotiationTuning = z.infer<typeof NegotiationTuningSchema>;

export const ConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema,
  }),
  negotiation: NegotiationTuningSchema,
  relations: z.object({
    /** Multiplier applied to every relation after a round; 1 disables decay. */
    decayFactor: z.number().min(0).max(1),
  }),
  amendments: z.object({
    maxPerRound: z.number().int().min(0),
  }),
  history: z.object({
    periodsFile: z.string().optional(),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// SNAPSHOTS
// ═══════════════════════════════════════════════════════════════════════════

const signedValue = z.number().finite().transform(clampSigned);

export const RelationMapSchema = z.record(z.string(), signedValue);
export type RelationMap = z.infer<typeof RelationMapSchema>;

export const FavorMapSchema = z.record(SenatorIdSchema, z.record(SenatorIdSchema, unitTrait));
export type FavorMap = z.infer<typeof FavorMapSchema>;

export const LedgerStateSchema = z.object({
  favors: FavorMapSchema,
  standing: RelationMapSchema,
});
export type LedgerState = z.infer<typeof LedgerStateSchema>;

export const SessionSnapshotSchema = z.object({
  version: z.literal(1),
  relations: RelationMapSchema,
  ledger: LedgerStateSchema,
  corruption: z.record(SenatorIdSchema, unitTrait).default({}),
  factionCorruption: z.record(FactionSchema, unitTrait).default({}),
  /** Historical periods whose relation shifts are already in `relations`. */
  appliedPeriods: z.array(z.string()).default([]),
});
export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
