import type { Platform, Song } from './index';

/**
 * Declared capabilities of a catalog.
 * - card-addressable: entries can be shared as native music cards by id
 * - plain-http-images: cover hosts have broken certificate chains
 */
export type ProviderTag = 'card-addressable' | 'plain-http-images';

export interface CatalogProvider {
  readonly platform: Platform;
  readonly tags: ReadonlySet<ProviderTag>;
  /** Card type understood by card-capable channels (e.g. "163") */
  readonly cardType?: string;

  initialize(): Promise<void>;
  dispose(): Promise<void>;

  /** Never rejects; at most `limit` songs */
  search(keyword: string, limit: number, extra?: string): Promise<Song[]>;

  /** Fills `audioUrl` when absent */
  resolveAudio(song: Song): Promise<Song>;
  fetchLyrics(song: Song): Promise<Song>;
  fetchComments(song: Song): Promise<Song>;
}
