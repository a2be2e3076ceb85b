/**
 * @module events
 * In-process event bus and the run event emitter.
 *
 * Run progress is published as {@link RunEvent}s to an `onEvent` callback
 * and/or a {@link MessageBus}. Log events go to the `log` channel, all
 * others to the `run` channel.
 */

import type { BusMessage, LogLevel, MessageBus, RunEvent, RunEventChannel } from './types.js';

/**
 * In-process event bus implementing {@link MessageBus}.
 *
 * Usage:
 * ```ts
 * const bus = createEventBus();
 * const unsub = bus.subscribe('run', (msg) => console.log(msg.event));
 * await runSuite(suite, { bus });
 * unsub();
 * ```
 */
export class EventBus implements MessageBus {
  private listeners = new Map<RunEventChannel, Set<(msg: BusMessage) => void>>();

  emit(channel: RunEventChannel, message: BusMessage): void {
    const subs = this.listeners.get(channel);
    if (!subs) return;
    for (const handler of subs) {
      handler(message);
    }
  }

  /**
   * Subscribe to a channel.
   *
   * @returns An unsubscribe function
   */
  subscribe(channel: RunEventChannel, handler: (msg: BusMessage) => void): () => void {
    let subs = this.listeners.get(channel);
    if (!subs) {
      subs = new Set();
      this.listeners.set(channel, subs);
    }
    subs.add(handler);

    return () => {
      subs.delete(handler);
      if (subs.size === 0) {
        this.listeners.delete(channel);
      }
    };
  }

  subscriberCount(channel: RunEventChannel): number {
    return this.listeners.get(channel)?.size ?? 0;
  }

  clear(): void {
    this.listeners.clear();
  }
}

export function createEventBus(): EventBus {
  return new EventBus();
}

/** Distributes run events to the configured sinks */
export interface RunEmitter {
  emit(event: RunEvent): void;
  log(level: LogLevel, message: string): void;
}

export function channelOf(event: RunEvent): RunEventChannel {
  return event.type === 'log' ? 'log' : 'run';
}

export function createRunEmitter(sinks: { onEvent?: (event: RunEvent) => void; bus?: MessageBus }): RunEmitter {
  const emit = (event: RunEvent): void => {
    sinks.onEvent?.(event);
    sinks.bus?.emit(channelOf(event), { event: event.type, data: event });
  };
  return {
    emit,
    log(level, message) {
      emit({ type: 'log', level, message, timestamp: Date.now() });
    },
  };
}
