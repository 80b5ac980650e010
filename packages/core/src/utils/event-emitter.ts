/**
 * Simple typed event emitter
 */

import { log } from '../services/log-service';

type EventHandler<T> = (data: T) => void;

export class EventEmitter<TEvents> {
  private handlers: { [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>> } = {};

  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): () => void {
    const set = this.handlers[event] ?? new Set<EventHandler<TEvents[K]>>();
    this.handlers[event] = set;
    set.add(handler);

    // Return unsubscribe function
    return () => {
      this.off(event, handler);
    };
  }

  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): () => void {
    const wrappedHandler = (data: TEvents[K]) => {
      this.off(event, wrappedHandler);
      handler(data);
    };
    return this.on(event, wrappedHandler);
  }

  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const eventHandlers = this.handlers[event];
    if (!eventHandlers) return;

    // Copy so handlers may unsubscribe while we iterate
    for (const handler of [...eventHandlers]) {
      try {
        handler(data);
      } catch (error) {
        log.error('EventEmitter', `Error in event handler for ${String(event)}`, {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
  }

  listenerCount<K extends keyof TEvents>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }

  removeAllListeners(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }
}
