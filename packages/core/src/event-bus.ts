/**
 * @module event-bus
 * Typed in-process bus for mock-server and verifier events.
 *
 * Each channel carries its own message union ({@link BusChannels}): the
 * mock server publishes its lifecycle and request outcomes, the verifier
 * republishes every {@link VerificationEvent}. Both publish `log` events,
 * which the CLI prints through {@link EventBus.onLog}.
 */

import type { Bus, BusChannel, BusChannels, LogLevel, LogRecord } from './types.js';

/** Channels published by the core. */
export const CHANNELS = {
  mockServer: 'mock-server',
  verifier: 'verifier',
} as const satisfies Record<string, BusChannel>;

type Handlers = { [C in BusChannel]: Set<(msg: BusChannels[C]) => void> };

/**
 * Usage:
 * ```ts
 * const bus = createEventBus();
 * const stop = bus.onLog(CHANNELS.mockServer, (record) => console.error(record.message));
 * bus.subscribe(CHANNELS.mockServer, (msg) => {
 *   if (msg.event === 'mismatch') console.error(msg.data.outcome.type);
 * });
 * stop();
 * ```
 */
export class EventBus implements Bus {
  private readonly handlers: Handlers = {
    'mock-server': new Set(),
    verifier: new Set(),
  };

  emit<C extends BusChannel>(channel: C, message: BusChannels[C]): void {
    for (const handler of [...this.handlers[channel]]) {
      handler(message);
    }
  }

  /** @returns a function removing the subscription */
  subscribe<C extends BusChannel>(channel: C, handler: (msg: BusChannels[C]) => void): () => void {
    const handlers = this.handlers[channel];
    handlers.add(handler);
    return () => {
      handlers.delete(handler);
    };
  }

  log(channel: BusChannel, level: LogLevel, message: string): void {
    const timestamp = Date.now();
    if (channel === CHANNELS.verifier) {
      this.emit(channel, { event: 'log', data: { type: 'log', level, message, timestamp } });
    } else {
      this.emit(channel, { event: 'log', data: { level, message, timestamp } });
    }
  }

  onLog(channel: BusChannel, handler: (record: LogRecord) => void): () => void {
    if (channel === CHANNELS.verifier) {
      return this.subscribe(channel, (msg) => {
        if (msg.data.type === 'log') handler(msg.data);
      });
    }
    return this.subscribe(channel, (msg) => {
      if (msg.event === 'log') handler(msg.data);
    });
  }

  subscriberCount(channel: BusChannel): number {
    return this.handlers[channel].size;
  }

  clear(): void {
    for (const handlers of Object.values(this.handlers)) handlers.clear();
  }
}

export function createEventBus(): EventBus {
  return new EventBus();
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** True when a message at `level` passes a `threshold` filter. */
export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}
