/**
 * Curia — negotiation core of a Roman senate simulation.
 *
 * @module curia
 */

export * from './types/index.js';
export * from './utils/clamp.js';
export { DEFAULT_CONFIG, loadConfig, saveConfig, getConfig, clearConfigCache, loadHistoricalPeriods } from './config/config.js';
export { EventBus, type EventMap } from './kernel/event-bus.js';
export { createLogger } from './kernel/logger.js';
export * from './kernel/random.js';

export * from './governance/faction-relations.js';
export * from './governance/faction-influence.js';
export * from './governance/corruption-model.js';
export * from './governance/favor-ledger.js';
export * from './governance/deal-types.js';
export * from './governance/backroom-negotiation.js';
export * from './governance/amendment-engine.js';
export * from './governance/voting-influence.js';
export * from './governance/negotiation-round.js';
export * from './governance/negotiation-session.js';
export * from './governance/snapshot.js';
export { SymmetricPairMap, pairKey } from './governance/pair-map.js';
