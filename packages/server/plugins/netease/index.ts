/**
 * NetEase Cloud Music Plugin
 *
 * Catalog backed by the public music.163.com web API.
 * Songs can be shared as native "163" music cards; cover hosts serve
 * broken certificate chains, so covers are fetched over plain http.
 */

import { BaseCatalogProvider, definePlatform } from '@tunedrop/sdk';
import { errorMessage, log, type LyricsLine, type Platform, type ProviderTag, type Song, type SongComment } from '@tunedrop/core';
import type { HttpClient } from '../../src/services/http-client';
import { getArray, getNumber, getRecord, getString } from '../../src/utils/json';

const API_BASE = 'https://music.163.com';
const HEADERS = {
  'Referer': 'https://music.163.com/',
  'Origin': 'https://music.163.com'
};
const COMMENT_LIMIT = 20;

export interface NeteasePluginOptions {
  http: HttpClient;
  /** Bitrate asked from the player endpoint */
  bitrate?: number;
}

/** Public fallback URL; redirects to the CDN file when the song is free */
export function outerUrl(songId: string): string {
  return `${API_BASE}/song/media/outer/url?id=${songId}.mp3`;
}

export function parseSearchSongs(body: unknown): Song[] {
  const songs: Song[] = [];

  for (const item of getArray(getRecord(body, 'result'), 'songs')) {
    const id = getString(item, 'id');
    const name = getString(item, 'name');
    if (!id || !name) continue;

    const artists = getArray(item, 'ar')
      .map(artist => getString(artist, 'name'))
      .filter((artist): artist is string => Boolean(artist))
      .join('/');

    songs.push({
      id,
      name,
      artists,
      durationMs: getNumber(item, 'dt') ?? 0,
      coverUrl: getString(getRecord(item, 'al'), 'picUrl')
    });
  }

  return songs;
}

export class NeteasePlugin extends BaseCatalogProvider {
  readonly platform: Platform = definePlatform('netease', 'NetEase Cloud Music', ['netease', 'ncm', '163']);
  readonly tags: ReadonlySet<ProviderTag> = new Set<ProviderTag>(['card-addressable', 'plain-http-images']);
  readonly cardType = '163';

  private http: HttpClient;
  private bitrate: number;

  constructor(options: NeteasePluginOptions) {
    super();
    this.http = options.http;
    this.bitrate = options.bitrate ?? 320000;
  }

  protected async doSearch(keyword: string, limit: number): Promise<Song[]> {
    const body = await this.http.postForm(`${API_BASE}/api/cloudsearch/pc`, {
      s: keyword,
      type: '1',
      limit: String(limit),
      offset: '0'
    }, { headers: HEADERS });

    return parseSearchSongs(body);
  }

  protected async doResolveAudio(song: Song): Promise<string | null> {
    const params = new URLSearchParams({ ids: `[${song.id}]`, br: String(this.bitrate) });
    try {
      const body = await this.http.getJson(`${API_BASE}/api/song/enhance/player/url?${params}`, { headers: HEADERS });
      const [entry] = getArray(body, 'data');
      const url = getString(entry, 'url');
      if (url) return url;
    } catch (error) {
      log.debug('NetEase', `Player endpoint failed for ${song.id}, using public URL`, { error: errorMessage(error) });
    }
    return outerUrl(song.id);
  }

  protected async doFetchLyrics(song: Song): Promise<LyricsLine[]> {
    const params = new URLSearchParams({ os: 'pc', id: song.id, lv: '-1', kv: '-1', tv: '-1' });
    const body = await this.http.getJson(`${API_BASE}/api/song/lyric?${params}`, { headers: HEADERS });
    const lrc = getString(getRecord(body, 'lrc'), 'lyric');
    return lrc ? this.parseLrc(lrc) : [];
  }

  protected async doFetchComments(song: Song): Promise<SongComment[]> {
    const body = await this.http.getJson(
      `${API_BASE}/api/v1/resource/comments/R_SO_4_${song.id}?limit=${COMMENT_LIMIT}`,
      { headers: HEADERS }
    );

    const hot = getArray(body, 'hotComments');
    const items = hot.length > 0 ? hot : getArray(body, 'comments');

    const comments: SongComment[] = [];
    for (const item of items) {
      const content = getString(item, 'content');
      if (!content) continue;
      comments.push({
        id: getString(item, 'commentId'),
        author: getString(getRecord(item, 'user'), 'nickname'),
        content,
        likedCount: getNumber(item, 'likedCount')
      });
    }
    return comments;
  }
}
