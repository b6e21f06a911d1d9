import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../../../src/kernel/event-bus.js';

const credit = { debtor: 'brutus', benefactor: 'cassius', intensity: 0.4, balance: 0.4 };

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  it('should subscribe and receive events', () => {
    const handler = vi.fn();

    eventBus.on('favor:credited', handler);
    eventBus.emit('favor:credited', credit);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(credit);
  });

  it('should unsubscribe via returned function and stop receiving events', () => {
    const handler = vi.fn();

    const unsubscribe = eventBus.on('favor:credited', handler);
    eventBus.emit('favor:credited', credit);
    expect(handler).toHaveBeenCalledTimes(1);

    unsubscribe();
    eventBus.emit('favor:credited', credit);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should remove specific handler with off()', () => {
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    eventBus.on('relations:decayed', handler1);
    eventBus.on('relations:decayed', handler2);
    eventBus.emit('relations:decayed', { factor: 0.9, pairs: 10 });

    eventBus.off('relations:decayed', handler1);
    eventBus.emit('relations:decayed', { factor: 0.9, pairs: 10 });

    expect(handler1).toHaveBeenCalledTimes(1);
    expect(handler2).toHaveBeenCalledTimes(2);
  });

  it('should fire once() handler only once', () => {
    const handler = vi.fn();

    eventBus.once('round:phase', handler);
    eventBus.emit('round:phase', { roundId: 'round-1', from: 'Idle', to: 'ActorsSelected', topic: 'grain' });
    eventBus.emit('round:phase', { roundId: 'round-1', from: 'ActorsSelected', to: 'MeetingsArbitrated', topic: 'grain' });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ roundId: 'round-1', from: 'Idle', to: 'ActorsSelected', topic: 'grain' });
  });

  it('should remove all listeners with clear()', () => {
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    eventBus.on('favor:credited', handler1);
    eventBus.on('relations:decayed', handler2);
    expect(eventBus.listenerCount('favor:credited')).toBe(1);
    expect(eventBus.listenerCount('relations:decayed')).toBe(1);

    eventBus.clear();

    expect(eventBus.listenerCount('favor:credited')).toBe(0);
    eventBus.emit('favor:credited', credit);
    eventBus.emit('relations:decayed', { factor: 0.5, pairs: 1 });
    expect(handler1).not.toHaveBeenCalled();
    expect(handler2).not.toHaveBeenCalled();
  });

  it('should isolate a throwing handler and report it', () => {
    const failing = vi.fn(() => {
      throw new Error('handler failed');
    });
    const healthy = vi.fn();
    const errors = vi.fn();

    eventBus.on('favor:credited', failing);
    eventBus.on('favor:credited', healthy);
    eventBus.on('system:handler_error', errors);

    expect(() => eventBus.emit('favor:credited', credit)).not.toThrow();

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(eventBus.getHandlerErrorCount()).toBe(1);
    expect(errors).toHaveBeenCalledTimes(1);
    expect(errors.mock.calls[0][0]).toMatchObject({ event: 'favor:credited', error: 'handler failed' });
  });
});
