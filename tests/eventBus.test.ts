import { describe, it, expect, beforeEach } from 'vitest';
import { EventBus, eventBus, EventType } from '../src/infra/eventBus.js';

describe('EventBus', () => {
  beforeEach(() => {
    eventBus.clear();
  });

  it('delivers events to specific listeners', () => {
    const received: Array<{ event: EventType; data: unknown }> = [];
    eventBus.on('merchant.added', (event, data) => {
      received.push({ event, data });
    });

    eventBus.emit('merchant.added', { merchant: 'shop' });
    eventBus.emit('merchant.minted', { merchant: 'shop' });

    expect(received).toHaveLength(1);
    expect(received[0].event).toBe('merchant.added');
    expect(received[0].data).toEqual({ merchant: 'shop' });
  });

  it('delivers all events to wildcard listeners', () => {
    const received: EventType[] = [];
    eventBus.on('*', (event) => {
      received.push(event);
    });

    eventBus.emit('proposal.initiated', {});
    eventBus.emit('proposal.vote_cast', {});
    eventBus.emit('proposal.executed', {});

    expect(received).toEqual(['proposal.initiated', 'proposal.vote_cast', 'proposal.executed']);
  });

  it('unsubscribes correctly', () => {
    const received: unknown[] = [];
    const unsub = eventBus.on('merchant.payment', (_e, data) => {
      received.push(data);
    });

    eventBus.emit('merchant.payment', 'first');
    unsub();
    eventBus.emit('merchant.payment', 'second');

    expect(received).toEqual(['first']);
  });

  it('clear() removes all listeners', () => {
    const received: unknown[] = [];
    eventBus.on('merchant.added', (_e, data) => received.push(data));
    eventBus.on('*', (_e, data) => received.push(data));

    eventBus.clear();
    eventBus.emit('merchant.added', 'test');

    expect(received).toHaveLength(0);
  });

  it('reports listener errors without affecting other listeners', () => {
    const bus = new EventBus();
    const failures: Array<{ event: EventType; error: unknown }> = [];
    bus.onListenerError = (event, error) => {
      failures.push({ event, error });
    };

    const received: unknown[] = [];
    bus.on('merchant.frozen', () => {
      throw new Error('boom');
    });
    bus.on('merchant.frozen', (_e, data) => {
      received.push(data);
    });

    bus.emit('merchant.frozen', 'value');

    expect(received).toEqual(['value']);
    expect(failures).toHaveLength(1);
    expect(failures[0].event).toBe('merchant.frozen');
    expect(failures[0].error).toBeInstanceOf(Error);
  });
});
