/**
 * Base class for catalog providers with helper methods
 *
 * Subclasses implement the do* hooks. The public methods enforce the
 * provider contract: search never rejects and never returns more than
 * `limit` songs, enrichment is skipped when the field is already present,
 * and hook failures are logged and leave the song untouched.
 */

import type {
  CatalogProvider,
  LyricsLine,
  Platform,
  ProviderTag,
  Song,
  SongComment
} from '@tunedrop/core';
import { errorMessage, log } from '@tunedrop/core';

/** Build an immutable platform descriptor */
export function definePlatform(name: string, displayName: string, keywords: string[]): Platform {
  return Object.freeze({ name, displayName, keywords: Object.freeze([...keywords]) });
}

const LRC_TIMESTAMP = /\[(\d{1,3}):(\d{2})(?:[.:](\d{1,3}))?\]/g;

export abstract class BaseCatalogProvider implements CatalogProvider {
  abstract readonly platform: Platform;
  abstract readonly tags: ReadonlySet<ProviderTag>;

  async initialize(): Promise<void> {
    // Override in subclass if needed
  }

  async dispose(): Promise<void> {
    // Override in subclass if needed
  }

  protected abstract doSearch(keyword: string, limit: number, extra?: string): Promise<Song[]>;
  protected abstract doResolveAudio(song: Song): Promise<string | null>;

  protected async doFetchLyrics(_song: Song): Promise<LyricsLine[]> {
    return [];
  }

  protected async doFetchComments(_song: Song): Promise<SongComment[]> {
    return [];
  }

  async search(keyword: string, limit: number, extra?: string): Promise<Song[]> {
    const query = keyword.trim();
    if (!query || limit <= 0) return [];

    try {
      const songs = await this.doSearch(query, limit, extra);
      return songs.slice(0, limit);
    } catch (error) {
      log.warn(this.platform.displayName, `Search failed: ${query}`, { error: errorMessage(error) });
      return [];
    }
  }

  async resolveAudio(song: Song): Promise<Song> {
    if (song.audioUrl) return song;

    try {
      const url = await this.doResolveAudio(song);
      if (url) song.audioUrl = url;
    } catch (error) {
      log.warn(this.platform.displayName, `Audio resolution failed for ${song.id}`, { error: errorMessage(error) });
    }
    return song;
  }

  async fetchLyrics(song: Song): Promise<Song> {
    if (song.lyrics?.length) return song;

    try {
      const lyrics = await this.doFetchLyrics(song);
      if (lyrics.length > 0) song.lyrics = lyrics;
    } catch (error) {
      log.warn(this.platform.displayName, `Lyrics fetch failed for ${song.id}`, { error: errorMessage(error) });
    }
    return song;
  }

  async fetchComments(song: Song): Promise<Song> {
    if (song.comments?.length) return song;

    try {
      const comments = await this.doFetchComments(song);
      if (comments.length > 0) song.comments = comments;
    } catch (error) {
      log.warn(this.platform.displayName, `Comment fetch failed for ${song.id}`, { error: errorMessage(error) });
    }
    return song;
  }

  /**
   * Helper: Parse LRC format to synced lyrics.
   * A line may carry several timestamps; metadata tags like [ar:...] are dropped.
   */
  protected parseLrc(lrc: string): LyricsLine[] {
    const lines: LyricsLine[] = [];

    for (const raw of lrc.split(/\r?\n/)) {
      const stamps = [...raw.matchAll(LRC_TIMESTAMP)];
      if (stamps.length === 0) continue;

      const text = raw.replace(LRC_TIMESTAMP, '').trim();
      if (!text) continue;

      for (const stamp of stamps) {
        const minutes = parseInt(stamp[1] ?? '0', 10);
        const seconds = parseInt(stamp[2] ?? '0', 10);
        const ms = parseInt((stamp[3] ?? '0').padEnd(3, '0'), 10);
        lines.push({ time: (minutes * 60 * 1000) + (seconds * 1000) + ms, text });
      }
    }

    return lines.sort((a, b) => a.time - b.time);
  }

  /**
   * Helper: Normalize string for loose comparisons
   */
  protected normalize(str: string): string {
    return str
      .toLowerCase()
      .normalize('NFD')
      .replace(/[\u0300-\u036f]/g, '')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Helper: Join artist names the way songs display them
   */
  protected joinArtists(names: Array<string | undefined>): string {
    return names.filter((name): name is string => Boolean(name)).join('/');
  }
}
