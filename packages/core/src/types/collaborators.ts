/**
 * Contracts the pipeline consumes from the host application
 */

import type { DownloadedAsset, FetchResult, LyricsLine, Song } from './index';

export interface FetchAudioOptions {
  /** Report Timeout after this long; the underlying work is not killed */
  timeoutMs?: number;
}

export interface FetchImageOptions {
  /** Rewrite https:// to http:// for hosts with broken certificate chains */
  downgradeTls?: boolean;
}

export interface MediaFetcher {
  fetchImage(url: string, options?: FetchImageOptions): Promise<FetchResult<Extract<DownloadedAsset, { kind: 'bytes' }>>>;
  fetchAudio(url: string, options?: FetchAudioOptions): Promise<FetchResult<Extract<DownloadedAsset, { kind: 'file' }>>>;
  /** True when the URL needs the external extractor */
  isExtractorUrl(url: string): boolean;
  /** Duration in ms of a downloaded file, or null when unreadable */
  probeDuration(path: string): Promise<number | null>;
}

export interface LyricsRenderer {
  render(lyrics: LyricsLine[], options?: { title?: string; cover?: Buffer }): { data: Buffer; mime: string };
}

export interface PlaylistEntry {
  song: Song;
  platform: string;
}

export interface LibraryStore {
  addSong(userId: string, song: Song, platform: string): boolean;
  removeSong(userId: string, songId: string, platform: string): boolean;
  getSongs(userId: string): PlaylistEntry[];
  isEmpty(userId: string): boolean;
  getDefaultProvider(userId: string): string | null;
  setDefaultProvider(userId: string, provider: string): void;
}
