/**
 * YouTube Plugin
 *
 * Searches through the media extractor. Results carry the watch URL as
 * their audio URL, which the media fetcher hands back to the extractor.
 */

import { BaseCatalogProvider, definePlatform } from '@tunedrop/sdk';
import type { Platform, ProviderTag, Song } from '@tunedrop/core';
import type { Extractor, ExtractorEntry } from '../../src/services/extractor';

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function entryToSong(entry: ExtractorEntry): Song {
  return {
    id: entry.id,
    name: entry.title ?? 'Unknown Title',
    artists: entry.uploader ?? 'Unknown Artist',
    durationMs: entry.duration ? Math.round(entry.duration * 1000) : 0,
    audioUrl: entry.url?.startsWith('http') ? entry.url : watchUrl(entry.id),
    coverUrl: entry.thumbnail ?? `https://i.ytimg.com/vi/${entry.id}/hqdefault.jpg`
  };
}

export class YoutubePlugin extends BaseCatalogProvider {
  readonly platform: Platform = definePlatform('youtube', 'YouTube', ['youtube', 'yt']);
  readonly tags: ReadonlySet<ProviderTag> = new Set<ProviderTag>();

  constructor(private extractor: Extractor) {
    super();
  }

  protected async doSearch(keyword: string, limit: number): Promise<Song[]> {
    if (!(await this.extractor.isAvailable())) {
      return [];
    }
    const entries = await this.extractor.search(keyword, limit);
    return entries.map(entryToSong);
  }

  protected async doResolveAudio(song: Song): Promise<string | null> {
    return watchUrl(song.id);
  }
}
