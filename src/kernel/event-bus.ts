import type { DealType, AmendmentIntent, SenatorId } from '../types/index.js';
import { createLogger } from './logger.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 * Mutation events are emitted only once a round's outcome is finalized.
 */
export interface EventMap {
  // ── Round lifecycle ────────────────────────────────────────────────────
  'round:phase': { roundId: string; from: string; to: string; topic: string };
  'round:completed': { roundId: string; topic: string; meetings: number; amendments: number };

  // ── Negotiation ────────────────────────────────────────────────────────
  'negotiation:finalized': {
    roundId: string;
    topic: string;
    meetings: number;
    deals: number;
    alliances: number;
  };
  'alliance:formed': {
    roundId: string;
    members: [SenatorId, SenatorId];
    factions: [string, string];
    dealType: DealType;
  };
  'favor:credited': { debtor: SenatorId; benefactor: SenatorId; intensity: number; balance: number };
  'favor:resolved': { debtor: SenatorId; benefactor: SenatorId; honored: boolean; remaining: number; reason: string };
  'relations:decayed': { factor: number; pairs: number };

  // ── Amendments & influence ─────────────────────────────────────────────
  'amendment:proposed': { roundId: string; amendmentId: string; proposer: SenatorId; intent: AmendmentIntent };
  'influence:computed': { roundId: string; senators: number; maxDelta: number; minDelta: number };

  // ── System ─────────────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

/**
 * Typed synchronous pub/sub. A throwing handler never breaks the emitter or
 * the other handlers.
 */
export class EventBus {
  private listeners: Map<string, Set<(payload: never) => void>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers] as Array<(payload: EventMap[K]) => void>) {
      try {
        handler(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event, err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event,
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  once<K extends keyof EventMap>(event: K, handler: (payload: EventMap[K]) => void): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
