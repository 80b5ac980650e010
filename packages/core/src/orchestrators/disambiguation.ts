/**
 * Disambiguation - lets a user pick one of several search results
 *
 * open --(valid number)--> resolved
 * open --(timeout)-------> expired   (notice sent)
 * open --(trigger word)--> cancelled (silent)
 * open --(new session)---> cancelled (superseded)
 */

import type { CatalogProvider, Channel, Song } from '../types/index';
import type { ConversationHub } from '../services/conversation-hub';
import type { ProviderRegistry } from '../registry/provider-registry';
import { formatSelection } from '../services/song-format';
import { log } from '../services/log-service';
import { WaitTimeoutError, errorMessage } from '../errors';

export type SessionState = 'open' | 'resolved' | 'expired' | 'cancelled';

export interface DisambiguationRequest {
  conversationId: string;
  channel: Channel;
  provider: CatalogProvider;
  songs: Song[];
  title?: string;
}

export interface DisambiguationOptions {
  timeoutMs: number;
  /** Retract the list message when the session ends without a selection */
  retractList: boolean;
}

export type SelectionDispatcher = (selection: {
  channel: Channel;
  provider: CatalogProvider;
  song: Song;
}) => Promise<void>;

export const SELECTION_TIMEOUT_NOTICE = 'Song selection timed out.';

/** Parses "3" or "3 please"; null for anything else */
export function parseSelection(text: string, count: number): number | null {
  const token = leadingToken(text);
  if (!/^\d+$/.test(token)) return null;
  const index = Number(token);
  return index >= 1 && index <= count ? index : null;
}

export function leadingToken(text: string): string {
  return text.trim().split(/\s+/)[0] ?? '';
}

export class DisambiguationManager {
  private sessions = new Map<string, AbortController>();

  constructor(
    private hub: ConversationHub,
    private registry: ProviderRegistry,
    private dispatch: SelectionDispatcher,
    private options: DisambiguationOptions
  ) {}

  isOpen(conversationId: string): boolean {
    return this.sessions.has(conversationId);
  }

  /**
   * Publish the numbered list and wait for a selection.
   * Resolves with the terminal state once the session has ended and, for a
   * selection, once the chosen song has been dispatched.
   */
  async open(request: DisambiguationRequest): Promise<SessionState> {
    const { conversationId, channel, provider, songs, title } = request;

    this.sessions.get(conversationId)?.abort();
    const session = new AbortController();
    this.sessions.set(conversationId, session);

    // Written from the wait handler, so kept on an object rather than in locals
    const outcome: { state: SessionState; selected: { song: Song; channel: Channel } | null } = {
      state: 'open',
      selected: null
    };
    let listMessageId: string | null = null;

    try {
      listMessageId = await channel.sendText(formatSelection(songs, title));

      await this.hub.wait(conversationId, (message, controller) => {
        const token = leadingToken(message.text);

        if (this.registry.isTrigger(token)) {
          log.debug('Disambiguation', 'Cancelled by a new command', { conversationId, token });
          outcome.state = 'cancelled';
          controller.stop();
          return;
        }

        const index = parseSelection(message.text, songs.length);
        if (index === null) return;

        const song = songs[index - 1];
        if (!song) return;
        outcome.selected = { song, channel: message.channel };
        outcome.state = 'resolved';
        controller.consume();
        controller.stop();
      }, { timeoutMs: this.options.timeoutMs, signal: session.signal });

      if (outcome.state === 'open') {
        // Aborted from outside: superseded by a newer session
        outcome.state = 'cancelled';
      }
    } catch (error) {
      if (error instanceof WaitTimeoutError) {
        outcome.state = 'expired';
        await this.notify(channel, SELECTION_TIMEOUT_NOTICE);
      } else {
        outcome.state = 'cancelled';
        log.error('Disambiguation', 'Selection failed', { conversationId, error: errorMessage(error) });
      }
    } finally {
      if (this.sessions.get(conversationId) === session) {
        this.sessions.delete(conversationId);
      }
    }

    if (outcome.state !== 'resolved' && this.options.retractList && listMessageId && channel.retract) {
      try {
        await channel.retract(listMessageId);
      } catch (error) {
        log.warn('Disambiguation', 'Could not retract selection list', { error: errorMessage(error) });
      }
    }

    if (outcome.selected) {
      await this.dispatch({ channel: outcome.selected.channel, provider, song: outcome.selected.song });
    }

    return outcome.state;
  }

  cancel(conversationId: string): void {
    this.sessions.get(conversationId)?.abort();
  }

  cancelAll(): void {
    for (const session of this.sessions.values()) {
      session.abort();
    }
  }

  private async notify(channel: Channel, text: string): Promise<void> {
    try {
      await channel.sendText(text);
    } catch (error) {
      log.warn('Disambiguation', 'Could not send notice', { error: errorMessage(error) });
    }
  }
}
