import type { Song } from '../types/index';

const ILLEGAL_FILENAME_CHARS = /[\\/:*?"<>|]/g;

/**
 * Replace characters that break paths or URIs with "_".
 * The extension (text after the last dot) is kept as is.
 */
export function sanitizeFilename(filename: string, placeholder = '_'): string {
  const dot = filename.lastIndexOf('.');
  const hasExtension = dot > 0 && /^\.[A-Za-z0-9]+$/.test(filename.slice(dot));
  const stem = hasExtension ? filename.slice(0, dot) : filename;
  const extension = hasExtension ? filename.slice(dot) : '';
  return stem.replace(ILLEGAL_FILENAME_CHARS, placeholder) + extension;
}

export function formatDuration(durationMs: number): string {
  const total = Math.max(0, Math.floor(durationMs / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  const pad = (n: number) => String(n).padStart(2, '0');

  return hours > 0
    ? `${hours}:${pad(minutes)}:${pad(seconds)}`
    : `${pad(minutes)}:${pad(seconds)}`;
}

export function songTitle(song: Song): string {
  return `${song.name} - ${song.artists}`;
}

/** Plain-text description used by the text delivery mode */
export function songToLines(song: Song): string {
  const lines = [`🎶 ${songTitle(song)}`];
  if (song.durationMs > 0) lines.push(`Duration: ${formatDuration(song.durationMs)}`);
  if (song.audioUrl) lines.push(`Listen: ${song.audioUrl}`);
  if (song.coverUrl) lines.push(`Cover: ${song.coverUrl}`);
  return lines.join('\n');
}

/** Numbered selection list, optionally headed by a title line */
export function formatSelection(songs: Song[], title?: string): string {
  const lines = songs.map((song, index) => `${index + 1}. ${songTitle(song)}`);
  if (title) lines.unshift(title);
  return lines.join('\n');
}
