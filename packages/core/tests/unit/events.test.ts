/**
 * Unit tests for events module.
 *
 * Tests cover:
 * - Basic emit / subscribe and unsubscribe
 * - Channel isolation
 * - subscriberCount and clear
 * - Run emitter routing to callback and bus
 */

import { describe, it, expect, vi } from 'vitest';
import { EventBus, channelOf, createEventBus, createRunEmitter } from '../../src/events.js';
import type { BusMessage, RunEvent } from '../../src/types.js';

const runStart: RunEvent = { type: 'run_start', scenario: 'greet', environment: 'node', index: 0, timestamp: 1 };

describe('events', () => {
  describe('EventBus', () => {
    it('should deliver a message to every subscriber', () => {
      const bus = new EventBus();
      const h1 = vi.fn();
      const h2 = vi.fn();
      bus.subscribe('run', h1);
      bus.subscribe('run', h2);

      const msg: BusMessage = { event: 'run_start', data: runStart };
      bus.emit('run', msg);

      expect(h1).toHaveBeenCalledWith(msg);
      expect(h2).toHaveBeenCalledTimes(1);
    });

    it('should not deliver messages to unsubscribed handlers', () => {
      const bus = new EventBus();
      const handler = vi.fn();
      const unsub = bus.subscribe('run', handler);

      unsub();
      bus.emit('run', { event: 'run_start', data: runStart });

      expect(handler).not.toHaveBeenCalled();
      expect(bus.subscriberCount('run')).toBe(0);
    });

    it('should isolate channels', () => {
      const bus = new EventBus();
      const onLog = vi.fn();
      bus.subscribe('log', onLog);

      bus.emit('run', { event: 'run_start', data: runStart });

      expect(onLog).not.toHaveBeenCalled();
    });

    it('clear should remove all subscriptions', () => {
      const bus = createEventBus();
      bus.subscribe('run', vi.fn());
      bus.subscribe('log', vi.fn());

      bus.clear();

      expect(bus.subscriberCount('run')).toBe(0);
      expect(bus.subscriberCount('log')).toBe(0);
    });
  });

  describe('createRunEmitter', () => {
    it('should send events to the callback and the matching bus channel', () => {
      const bus = new EventBus();
      const onEvent = vi.fn();
      const onRun = vi.fn();
      const onLog = vi.fn();
      bus.subscribe('run', onRun);
      bus.subscribe('log', onLog);

      const emitter = createRunEmitter({ onEvent, bus });
      emitter.emit(runStart);
      emitter.log('warn', 'teardown failed');

      expect(onEvent).toHaveBeenCalledTimes(2);
      expect(onRun).toHaveBeenCalledWith({ event: 'run_start', data: runStart });
      expect(onLog).toHaveBeenCalledTimes(1);
      expect(onLog.mock.calls[0]?.[0]).toMatchObject({
        event: 'log',
        data: { type: 'log', level: 'warn', message: 'teardown failed' },
      });
    });

    it('should work without any sink', () => {
      expect(() => createRunEmitter({}).log('info', 'quiet')).not.toThrow();
    });
  });

  it('should route log events to the log channel', () => {
    expect(channelOf({ type: 'log', level: 'info', message: 'x', timestamp: 0 })).toBe('log');
    expect(channelOf(runStart)).toBe('run');
  });
});
