/**
 * Command Router - turns incoming chat messages into pipeline runs
 *
 *   play <query> [n]          search the user's default provider
 *   <keyword> <query> [n]     search the provider owning the keyword
 *   lyrics <query>            lyrics image of the best match
 *   collect | uncollect <q>   per-user playlist
 *   playlist                  list the playlist
 *   playlist-play <n>         deliver a playlist entry
 *   use <provider>            set the user's default provider
 */

import type {
  CatalogProvider,
  Channel,
  IncomingMessage,
  LibraryStore,
  Song
} from '../types/index';
import type { ProviderRegistry } from '../registry/provider-registry';
import type { ConversationHub } from '../services/conversation-hub';
import type { DeliveryEngine } from './delivery-engine';
import { DisambiguationManager, type DisambiguationOptions, type SessionState } from './disambiguation';
import { songTitle } from '../services/song-format';
import { log } from '../services/log-service';
import { errorMessage } from '../errors';

export type CommandHandler = (message: IncomingMessage, args: string) => Promise<void>;

export interface CommandRouterOptions {
  /** Provider used by the generic trigger when the user has no preference */
  defaultProvider: string;
  searchLimit: number;
  /** Deliver a lone search result without asking */
  autoPlaySingle: boolean;
  disambiguation: DisambiguationOptions;
  /** Generic trigger word, bound to the default provider */
  playTrigger?: string;
}

export const MESSAGES = {
  noSongName: 'No song name given.',
  noProvider: 'No music provider available.',
  deliveryFailed: 'Song delivery failed.',
  noMatch: 'No matching song found.',
  noLyrics: 'No lyrics available for this song.',
  playlistEmpty: 'Your playlist is empty. Use "collect <song>" to add songs.',
  invalidIndex: 'Please give a valid number.',
  noResults: (query: string) => `No results for "${query}".`
} as const;

export class CommandRouter {
  private handlers = new Map<string, CommandHandler>();
  private disambiguation: DisambiguationManager;
  private playTrigger: string;
  /** Sessions started by this router, so callers can await them (tests, shutdown) */
  private inFlight = new Set<Promise<SessionState>>();

  constructor(
    private registry: ProviderRegistry,
    private hub: ConversationHub,
    private engine: DeliveryEngine,
    private options: CommandRouterOptions,
    private library?: LibraryStore
  ) {
    this.playTrigger = (options.playTrigger ?? 'play').toLowerCase();
    this.registry.addKeyword(this.playTrigger);
    this.disambiguation = new DisambiguationManager(
      hub,
      registry,
      async selection => {
        await this.play(selection.channel, selection.provider, selection.song);
      },
      options.disambiguation
    );

    this.register('lyrics', (message, args) => this.handleLyrics(message, args));
    if (library) {
      this.register('collect', (message, args) => this.handleCollect(library, message, args));
      this.register('uncollect', (message, args) => this.handleUncollect(library, message, args));
      this.register('playlist', message => this.handlePlaylist(library, message));
      this.register('playlist-play', (message, args) => this.handlePlaylistPlay(library, message, args));
      this.register('use', (message, args) => this.handleUse(library, message, args));
    }
  }

  /**
   * Register a command word. Exact words take precedence over provider keywords.
   */
  register(word: string, handler: CommandHandler): void {
    this.handlers.set(word.toLowerCase(), handler);
  }

  /**
   * Feed a message through open waits, then route it unless a wait took it.
   * Resolves true when the message was routed as a command.
   */
  async handle(message: IncomingMessage): Promise<boolean> {
    if (await this.hub.publish(message)) return false;

    const text = message.text.trim();
    const space = text.search(/\s/);
    const word = (space === -1 ? text : text.slice(0, space)).toLowerCase();
    const args = space === -1 ? '' : text.slice(space + 1).trim();
    if (!word) return false;

    const handler = this.handlers.get(word);
    if (handler) {
      await this.runHandler(word, handler, message, args);
      return true;
    }

    const provider = word === this.playTrigger
      ? this.defaultProviderFor(message.senderId)
      : this.registry.findByKeyword(word);
    if (!provider || !args) return false;

    await this.handleSearch(message, provider, word, args);
    return true;
  }

  /** Wait for every disambiguation session started so far */
  async settle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  shutdown(): void {
    this.disambiguation.cancelAll();
  }

  /**
   * Deliver a song; one failure notice when every mode failed
   */
  async play(channel: Channel, provider: CatalogProvider, song: Song): Promise<boolean> {
    const outcome = await this.engine.deliver({ channel, provider, song });
    if (outcome.status === 'succeeded') return true;

    await channel.sendText(MESSAGES.deliveryFailed);
    return false;
  }

  private async runHandler(word: string, handler: CommandHandler, message: IncomingMessage, args: string): Promise<void> {
    try {
      await handler(message, args);
    } catch (error) {
      log.error('Router', `Command "${word}" failed`, { error: errorMessage(error) });
    }
  }

  private async handleSearch(message: IncomingMessage, provider: CatalogProvider, word: string, args: string): Promise<void> {
    const { channel } = message;
    const tokens = args.split(/\s+/);
    const last = tokens[tokens.length - 1] ?? '';

    let index = 0;
    let query = args;
    if (/^\d+$/.test(last)) {
      index = Number(last);
      query = tokens.slice(0, -1).join(' ');
    }
    if (!query) {
      await channel.sendText(MESSAGES.noSongName);
      return;
    }

    log.debug('Router', `Searching ${provider.platform.displayName}: ${query}`, {
      sender: message.senderId,
      index
    });

    const songs = await provider.search(query, this.options.searchLimit, word);
    if (songs.length === 0) {
      await channel.sendText(MESSAGES.noResults(query));
      return;
    }

    if (songs.length === 1 && this.options.autoPlaySingle) {
      index = 1;
    }

    const chosen = index >= 1 ? songs[index - 1] : undefined;
    if (chosen) {
      await this.play(channel, provider, chosen);
      return;
    }

    const session = this.disambiguation.open({
      conversationId: message.conversationId,
      channel,
      provider,
      songs,
      title: `[${provider.platform.displayName}]`
    });
    this.inFlight.add(session);
    try {
      await session;
    } finally {
      this.inFlight.delete(session);
    }
  }

  private async handleLyrics(message: IncomingMessage, query: string): Promise<void> {
    const { channel } = message;
    const provider = this.defaultProviderFor(message.senderId);
    if (!provider) {
      await channel.sendText(MESSAGES.noProvider);
      return;
    }
    if (!query) {
      await channel.sendText(MESSAGES.noSongName);
      return;
    }

    const [song] = await provider.search(query, 1);
    if (!song) {
      await channel.sendText(MESSAGES.noMatch);
      return;
    }

    const sent = await this.engine.sendLyrics({ channel, provider, song });
    if (!sent) {
      await channel.sendText(MESSAGES.noLyrics);
    }
  }

  // ========================================
  // Playlist
  // ========================================

  private async findOne(message: IncomingMessage, query: string): Promise<{ provider: CatalogProvider; song: Song } | null> {
    const { channel } = message;
    const provider = this.defaultProviderFor(message.senderId);
    if (!provider) {
      await channel.sendText(MESSAGES.noProvider);
      return null;
    }
    if (!query) {
      await channel.sendText(MESSAGES.noSongName);
      return null;
    }

    const [song] = await provider.search(query, 1);
    if (!song) {
      await channel.sendText(MESSAGES.noResults(query));
      return null;
    }
    return { provider, song };
  }

  private async handleCollect(library: LibraryStore, message: IncomingMessage, query: string): Promise<void> {
    const found = await this.findOne(message, query);
    if (!found) return;

    const { provider, song } = found;
    const added = library.addSong(message.senderId, song, provider.platform.name);
    await message.channel.sendText(
      added
        ? `Added "${songTitle(song)}" to your playlist.`
        : `"${song.name}" is already in your playlist.`
    );
  }

  private async handleUncollect(library: LibraryStore, message: IncomingMessage, query: string): Promise<void> {
    const found = await this.findOne(message, query);
    if (!found) return;

    const { provider, song } = found;
    const removed = library.removeSong(message.senderId, song.id, provider.platform.name);
    await message.channel.sendText(
      removed
        ? `Removed "${songTitle(song)}" from your playlist.`
        : `"${song.name}" is not in your playlist.`
    );
  }

  private async handlePlaylist(library: LibraryStore, message: IncomingMessage): Promise<void> {
    const entries = library.getSongs(message.senderId);
    if (entries.length === 0) {
      await message.channel.sendText(MESSAGES.playlistEmpty);
      return;
    }

    const header = message.senderName ? `${message.senderName}'s playlist` : 'Your playlist';
    const lines = entries.map((entry, i) => `${i + 1}. ${songTitle(entry.song)}`);
    await message.channel.sendText([header, ...lines].join('\n'));
  }

  private async handlePlaylistPlay(library: LibraryStore, message: IncomingMessage, args: string): Promise<void> {
    const { channel } = message;
    if (!/^\d+$/.test(args) || Number(args) < 1) {
      await channel.sendText(MESSAGES.invalidIndex);
      return;
    }

    const entries = library.getSongs(message.senderId);
    if (entries.length === 0) {
      await channel.sendText(MESSAGES.playlistEmpty);
      return;
    }

    const entry = entries[Number(args) - 1];
    if (!entry) {
      await channel.sendText(`Only ${entries.length} songs in your playlist.`);
      return;
    }

    const provider = this.registry.get(entry.platform) ?? this.defaultProviderFor(message.senderId);
    if (!provider) {
      await channel.sendText(MESSAGES.noProvider);
      return;
    }
    await this.play(channel, provider, entry.song);
  }

  private async handleUse(library: LibraryStore, message: IncomingMessage, name: string): Promise<void> {
    const provider = this.registry.get(name);
    if (!provider) {
      const available = this.registry.getAll().map(p => p.platform.name).join(', ');
      await message.channel.sendText(`Unknown provider "${name}". Available: ${available}`);
      return;
    }

    library.setDefaultProvider(message.senderId, provider.platform.name);
    await message.channel.sendText(`Default provider set to ${provider.platform.displayName}.`);
  }

  private defaultProviderFor(userId: string): CatalogProvider | null {
    const preferred = this.library?.getDefaultProvider(userId);
    return (preferred ? this.registry.get(preferred) : null)
      ?? this.registry.get(this.options.defaultProvider)
      ?? this.registry.getAll()[0]
      ?? null;
  }
}
