/**
 * SQLite-based Library Storage
 *
 * Provides persistent storage for:
 * - Per-user playlists
 * - Per-user default provider
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { log, type LibraryStore, type PlaylistEntry, type Song } from '@tunedrop/core';
import { getNumber, getString, isRecord } from '../utils/json';

interface PlaylistRow {
  platform: string;
  song_data: string;
}

/**
 * Rebuild a Song from stored JSON, or null when the row is unusable
 */
export function songFromJson(text: string): Song | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(value)) return null;

  const id = getString(value, 'id');
  const name = getString(value, 'name');
  if (!id || !name) return null;

  return {
    id,
    name,
    artists: getString(value, 'artists') ?? '',
    durationMs: getNumber(value, 'durationMs') ?? 0,
    audioUrl: getString(value, 'audioUrl'),
    coverUrl: getString(value, 'coverUrl')
  };
}

export class SqliteLibraryStore implements LibraryStore {
  readonly db: Database.Database;

  /** Pass ':memory:' for a throwaway database */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      // Ensure directory exists
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS playlist_songs (
        user_id TEXT NOT NULL,
        platform TEXT NOT NULL,
        song_id TEXT NOT NULL,
        song_data TEXT NOT NULL,
        added_at INTEGER NOT NULL,
        PRIMARY KEY (user_id, platform, song_id)
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS user_preferences (
        user_id TEXT PRIMARY KEY,
        default_provider TEXT
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_playlist_songs_user ON playlist_songs(user_id, added_at);
    `);

    log.debug('LibraryStore', 'Database initialized');
  }

  // ========================================
  // Playlist
  // ========================================

  addSong(userId: string, song: Song, platform: string): boolean {
    // Enrichment fields are re-fetched on demand
    const stored = {
      id: song.id,
      name: song.name,
      artists: song.artists,
      durationMs: song.durationMs,
      coverUrl: song.coverUrl
    };

    const result = this.db
      .prepare<[string, string, string, string, number]>(`
        INSERT OR IGNORE INTO playlist_songs (user_id, platform, song_id, song_data, added_at)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(userId, platform, song.id, JSON.stringify(stored), Date.now());

    return result.changes > 0;
  }

  removeSong(userId: string, songId: string, platform: string): boolean {
    const result = this.db
      .prepare<[string, string, string]>('DELETE FROM playlist_songs WHERE user_id = ? AND platform = ? AND song_id = ?')
      .run(userId, platform, songId);

    return result.changes > 0;
  }

  getSongs(userId: string): PlaylistEntry[] {
    const rows = this.db
      .prepare<[string], PlaylistRow>(
        'SELECT platform, song_data FROM playlist_songs WHERE user_id = ? ORDER BY added_at ASC, rowid ASC'
      )
      .all(userId);

    const entries: PlaylistEntry[] = [];
    for (const row of rows) {
      const song = songFromJson(row.song_data);
      if (song) {
        entries.push({ song, platform: row.platform });
      } else {
        log.warn('LibraryStore', 'Skipping unreadable playlist row', { userId });
      }
    }
    return entries;
  }

  isEmpty(userId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM playlist_songs WHERE user_id = ? LIMIT 1')
      .get(userId);
    return row === undefined;
  }

  // ========================================
  // Preferences
  // ========================================

  getDefaultProvider(userId: string): string | null {
    const row = this.db
      .prepare<[string], { default_provider: string | null }>('SELECT default_provider FROM user_preferences WHERE user_id = ?')
      .get(userId);
    return row?.default_provider ?? null;
  }

  setDefaultProvider(userId: string, provider: string): void {
    this.db
      .prepare<[string, string]>(`
        INSERT INTO user_preferences (user_id, default_provider) VALUES (?, ?)
        ON CONFLICT(user_id) DO UPDATE SET default_provider = excluded.default_provider
      `)
      .run(userId, provider);
  }

  close(): void {
    this.db.close();
  }
}
