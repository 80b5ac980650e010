/**
 * Delivery Engine - sends a resolved song to a channel
 *
 * Tries the configured delivery modes strictly in order. A mode whose
 * capability predicate fails is skipped without being attempted; a mode that
 * throws or reports false falls through to the next one. The first success
 * ends the loop and triggers the optional comment and lyrics post-steps,
 * which never affect the outcome.
 */

import * as path from 'path';
import type {
  CatalogProvider,
  Channel,
  DeliveryAttempt,
  DeliveryMode,
  DeliveryOutcome,
  LyricsRenderer,
  MediaFetcher,
  Song
} from '../types/index';
import { isModeSupported } from '../services/capability';
import { sanitizeFilename, songTitle, songToLines } from '../services/song-format';
import { log } from '../services/log-service';
import { errorMessage } from '../errors';

export interface DeliveryContext {
  channel: Channel;
  provider: CatalogProvider;
  song: Song;
}

/** Resolves true when the mode delivered the song */
export type ModeSender = (context: DeliveryContext) => Promise<boolean>;

export interface DeliveryRequest extends DeliveryContext {
  /** Overrides the configured mode order */
  modes?: DeliveryMode[];
}

export interface DeliveryEngineOptions {
  modes: DeliveryMode[];
  comments: boolean;
  lyrics: boolean;
  /** Deadline for a single audio download */
  audioTimeoutMs?: number;
  /** Source of randomness for picking a comment */
  random?: () => number;
  /** Replace individual mode senders (transport adapters, tests) */
  senders?: Partial<Record<DeliveryMode, ModeSender>>;
}

export class DeliveryEngine {
  private senders: Record<DeliveryMode, ModeSender>;
  private random: () => number;

  constructor(
    private fetcher: MediaFetcher,
    private renderer: LyricsRenderer,
    private options: DeliveryEngineOptions
  ) {
    this.random = options.random ?? Math.random;
    this.senders = {
      card: ctx => this.sendCard(ctx),
      voice: ctx => this.sendVoice(ctx),
      file: ctx => this.sendFile(ctx),
      text: ctx => this.sendText(ctx),
      ...options.senders
    };
  }

  get modes(): readonly DeliveryMode[] {
    return this.options.modes;
  }

  async deliver(request: DeliveryRequest): Promise<DeliveryOutcome> {
    const { channel, provider, song } = request;
    const modes = request.modes ?? this.options.modes;
    const attempts: DeliveryAttempt[] = [];

    log.debug('Delivery', `${provider.platform.displayName} -> ${songTitle(song)}`, {
      destination: channel.destinationId(),
      channel: channel.kind
    });

    for (const mode of modes) {
      if (!isModeSupported(mode, channel.tags, provider.tags)) {
        log.debug('Delivery', `${mode} not supported, skipping`);
        attempts.push({ mode, outcome: 'skipped' });
        continue;
      }

      let delivered = false;
      let failure: string | undefined;
      try {
        delivered = await this.senders[mode]({ channel, provider, song });
      } catch (error) {
        failure = errorMessage(error);
        log.error('Delivery', `${mode} send threw`, { song: song.id, error: failure });
      }

      if (delivered) {
        log.debug('Delivery', `${mode} delivered`);
        attempts.push({ mode, outcome: 'succeeded' });
        await this.runPostSteps({ channel, provider, song });
        return { status: 'succeeded', mode, attempts };
      }

      log.debug('Delivery', `${mode} failed, trying next mode`);
      attempts.push({ mode, outcome: 'failed', error: failure });
    }

    log.warn('Delivery', `All delivery modes exhausted for ${songTitle(song)}`, {
      attempts: attempts.map(a => `${a.mode}:${a.outcome}`)
    });
    return { status: 'exhausted', attempts };
  }

  /**
   * Render the song's lyrics and send them as an image
   */
  async sendLyrics(context: DeliveryContext): Promise<boolean> {
    const { channel, provider, song } = context;
    try {
      if (!song.lyrics?.length) {
        await provider.fetchLyrics(song);
      }
      if (!song.lyrics?.length) {
        log.warn('Delivery', `No lyrics for ${songTitle(song)}`);
        return false;
      }

      let cover: Buffer | undefined;
      if (song.coverUrl) {
        const image = await this.fetcher.fetchImage(song.coverUrl, {
          downgradeTls: provider.tags.has('plain-http-images')
        });
        if (image.ok) cover = image.asset.data;
      }

      const rendered = this.renderer.render(song.lyrics, { title: songTitle(song), cover });
      await channel.sendMedia('image', { type: 'bytes', data: rendered.data, mime: rendered.mime });
      return true;
    } catch (error) {
      log.error('Delivery', `Lyrics delivery failed for ${songTitle(song)}`, { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Send one random comment
   */
  async sendComment(context: DeliveryContext): Promise<boolean> {
    const { channel, provider, song } = context;
    try {
      if (!song.comments?.length) {
        await provider.fetchComments(song);
      }
      const comments = song.comments ?? [];
      if (comments.length === 0) return false;

      const index = Math.min(comments.length - 1, Math.floor(this.random() * comments.length));
      const comment = comments[index];
      if (!comment?.content) return false;

      await channel.sendText(comment.content);
      return true;
    } catch (error) {
      log.warn('Delivery', `Comment delivery failed for ${songTitle(song)}`, { error: errorMessage(error) });
      return false;
    }
  }

  private async runPostSteps(context: DeliveryContext): Promise<void> {
    if (this.options.comments) {
      await this.sendComment(context);
    }
    if (this.options.lyrics) {
      await this.sendLyrics(context);
    }
  }

  // ========================================
  // Mode senders
  // ========================================

  private async sendCard({ channel, provider, song }: DeliveryContext): Promise<boolean> {
    if (!provider.cardType) return false;
    await channel.sendMedia('card', { type: 'card', cardType: provider.cardType, id: song.id });
    return true;
  }

  private async sendVoice({ channel, provider, song }: DeliveryContext): Promise<boolean> {
    const url = await this.resolveAudioUrl(provider, song);
    if (!url) return false;

    if (!this.fetcher.isExtractorUrl(url)) {
      await channel.sendMedia('voice', { type: 'url', url });
      return true;
    }

    const file = await this.downloadAudio(song, url);
    if (!file) return false;
    await channel.sendMedia('voice', { type: 'file', path: file });
    return true;
  }

  private async sendFile({ channel, provider, song }: DeliveryContext): Promise<boolean> {
    const url = await this.resolveAudioUrl(provider, song);
    if (!url) return false;

    const file = await this.downloadAudio(song, url);
    if (!file) return false;

    const filename = sanitizeFilename(`${songTitle(song)}${path.extname(file)}`);
    await channel.sendMedia('file', { type: 'file', path: file }, filename);
    return true;
  }

  private async sendText({ channel, provider, song }: DeliveryContext): Promise<boolean> {
    try {
      await provider.resolveAudio(song);
    } catch (error) {
      log.debug('Delivery', 'Audio resolution failed for text mode', { error: errorMessage(error) });
    }
    await channel.sendText(songToLines(song));
    return true;
  }

  private async resolveAudioUrl(provider: CatalogProvider, song: Song): Promise<string | null> {
    if (!song.audioUrl) {
      await provider.resolveAudio(song);
    }
    if (!song.audioUrl) {
      log.warn('Delivery', `No audio URL for ${songTitle(song)}`);
      return null;
    }
    return song.audioUrl;
  }

  private async downloadAudio(song: Song, url: string): Promise<string | null> {
    const result = await this.fetcher.fetchAudio(url, { timeoutMs: this.options.audioTimeoutMs });
    if (!result.ok) {
      log.warn('Delivery', `Audio download failed for ${songTitle(song)}`, {
        kind: result.kind,
        message: result.message
      });
      return null;
    }

    if (song.durationMs <= 0) {
      const duration = await this.fetcher.probeDuration(result.asset.path);
      if (duration !== null) song.durationMs = duration;
    }
    return result.asset.path;
  }
}
