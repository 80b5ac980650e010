/**
 * Conversation Hub - short-lived subscriptions to a conversation's messages
 *
 * A wait registers a handler against one conversation, is resolved by the
 * handler calling `controller.stop()` or rejected with WaitTimeoutError, and
 * is unsubscribed in both cases. A handler that calls `controller.consume()`
 * takes the message, and publish() reports it so the caller does not route it.
 */

import type { IncomingMessage } from '../types/index';
import { EventEmitter } from '../utils/event-emitter';
import { WaitTimeoutError, errorMessage } from '../errors';
import { log } from './log-service';

export interface WaitController {
  stop(): void;
  /** Mark the message being handled as taken by this wait */
  consume(): void;
  readonly stopped: boolean;
}

export type WaitHandler = (message: IncomingMessage, controller: WaitController) => void | Promise<void>;

export interface WaitOptions {
  timeoutMs: number;
  /** Ends the wait early, as if a handler had called stop() */
  signal?: AbortSignal;
}

interface Delivery {
  message: IncomingMessage;
  claims: Promise<boolean>[];
}

interface HubEvents {
  message: Delivery;
}

export class ConversationHub {
  private emitter = new EventEmitter<HubEvents>();

  /**
   * Hand a message to every open wait of its conversation.
   * Resolves once those handlers have run, with true when one consumed it.
   */
  async publish(message: IncomingMessage): Promise<boolean> {
    const claims: Promise<boolean>[] = [];
    this.emitter.emit('message', { message, claims });
    const results = await Promise.all(claims);
    return results.includes(true);
  }

  /** Number of open waits across all conversations */
  get activeWaits(): number {
    return this.emitter.listenerCount('message');
  }

  wait(conversationId: string, handler: WaitHandler, options: WaitOptions): Promise<void> {
    const { timeoutMs, signal } = options;
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        resolve();
        return;
      }

      let settled = false;
      let consumed = false;
      // Handlers run one at a time, in arrival order
      let chain: Promise<void> = Promise.resolve();

      const finish = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        unsubscribe();
        signal?.removeEventListener('abort', onAbort);
        if (error) reject(error);
        else resolve();
      };

      const controller: WaitController = {
        stop: () => finish(),
        consume: () => {
          consumed = true;
        },
        get stopped() {
          return settled;
        }
      };

      const onAbort = () => finish();
      signal?.addEventListener('abort', onAbort, { once: true });

      const timer = setTimeout(() => finish(new WaitTimeoutError(timeoutMs)), timeoutMs);

      const unsubscribe = this.emitter.on('message', ({ message, claims }) => {
        if (message.conversationId !== conversationId) return;
        const handled = chain.then(async () => {
          if (settled) return false;
          consumed = false;
          try {
            await handler(message, controller);
          } catch (error) {
            log.error('ConversationHub', 'Wait handler failed', {
              conversationId,
              error: errorMessage(error)
            });
            finish(error instanceof Error ? error : new Error(String(error)));
          }
          return consumed;
        });
        chain = handled.then(() => undefined);
        claims.push(handled);
      });
    });
  }
}
