/**
 * Extractor Service
 * Runs the external media extractor (yt-dlp) as a child process.
 *
 * Every run goes through the shared TaskPool so at most `concurrency`
 * extractor processes exist at once.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import { TaskPool, log } from '@tunedrop/core';
import { getArray, getNumber, getString } from '../utils/json';

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Starts a process and collects its output. Rejects only when the
 * process could not be started (e.g. the binary is missing).
 */
export interface ProcessRunner {
  run(command: string, args: string[]): Promise<ProcessResult>;
}

export class SpawnRunner implements ProcessRunner {
  run(command: string, args: string[]): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        resolve({ code, stdout, stderr });
      });
      child.on('error', reject);
    });
  }
}

/** --audio-format values and the file extension the extractor writes for each */
export const AUDIO_FORMATS = {
  mp3: 'mp3',
  m4a: 'm4a',
  aac: 'aac',
  alac: 'm4a',
  flac: 'flac',
  opus: 'opus',
  vorbis: 'ogg',
  wav: 'wav'
} as const;

export type AudioFormat = keyof typeof AUDIO_FORMATS;

export function isAudioFormat(value: unknown): value is AudioFormat {
  return typeof value === 'string' && Object.hasOwn(AUDIO_FORMATS, value);
}

export interface ExtractorEntry {
  id: string;
  title?: string;
  uploader?: string;
  url?: string;
  thumbnail?: string;
  /** Seconds */
  duration?: number;
}

export interface ExtractorOptions {
  binary: string;
  /** Passed as --cookies when the file exists */
  cookiesPath?: string;
  audioFormat: AudioFormat;
  audioQuality: string;
  pool: TaskPool;
  runner?: ProcessRunner;
}

export class Extractor {
  private runner: ProcessRunner;
  private available: Promise<boolean> | null = null;

  constructor(private options: ExtractorOptions) {
    this.runner = options.runner ?? new SpawnRunner();
  }

  /** Extension of the files download() produces */
  get outputExtension(): string {
    return AUDIO_FORMATS[this.options.audioFormat];
  }

  /**
   * Probe the binary once with --version
   */
  isAvailable(): Promise<boolean> {
    if (!this.available) {
      this.available = this.runner.run(this.options.binary, ['--version']).then(
        (result) => {
          if (result.code === 0) {
            log.info('Extractor', `${this.options.binary} ${result.stdout.trim()}`);
            return true;
          }
          log.warn('Extractor', `${this.options.binary} --version exited with ${result.code}`);
          return false;
        },
        (error: unknown) => {
          log.warn('Extractor', `${this.options.binary} is not available`, {
            error: error instanceof Error ? error.message : String(error)
          });
          return false;
        }
      );
    }
    return this.available;
  }

  /**
   * Download best audio and convert it to the configured format.
   * `outputTemplate` uses the extractor's %(ext)s placeholder.
   */
  download(url: string, outputTemplate: string): Promise<ProcessResult> {
    const args = [
      '--format', 'bestaudio/best',
      '--extract-audio',
      '--audio-format', this.options.audioFormat,
      '--audio-quality', this.options.audioQuality,
      '--output', outputTemplate,
      '--no-playlist',
      '--quiet',
      '--no-warnings',
      ...this.cookieArgs(),
      url
    ];

    return this.options.pool.run(() => this.runner.run(this.options.binary, args), `extract ${url}`);
  }

  /**
   * Flat search ("ytsearchN:") without resolving stream URLs
   */
  async search(query: string, limit: number): Promise<ExtractorEntry[]> {
    const args = [
      '--flat-playlist',
      '--dump-single-json',
      '--ignore-errors',
      '--no-warnings',
      '--socket-timeout', '10',
      ...this.cookieArgs(),
      `ytsearch${limit}:${query}`
    ];

    const result = await this.options.pool.run(
      () => this.runner.run(this.options.binary, args),
      `search ${query}`
    );
    if (result.code !== 0 && !result.stdout.trim()) {
      throw new Error(`Extractor search exited with ${result.code}: ${result.stderr.trim()}`);
    }

    return parseEntries(JSON.parse(result.stdout));
  }

  private cookieArgs(): string[] {
    const cookies = this.options.cookiesPath;
    return cookies && fs.existsSync(cookies) ? ['--cookies', cookies] : [];
  }
}

export function parseEntries(info: unknown): ExtractorEntry[] {
  const entries: ExtractorEntry[] = [];

  for (const entry of getArray(info, 'entries')) {
    const id = getString(entry, 'id');
    if (!id) continue;
    entries.push({
      id,
      title: getString(entry, 'title'),
      uploader: getString(entry, 'uploader') ?? getString(entry, 'channel'),
      url: getString(entry, 'url'),
      thumbnail: getString(entry, 'thumbnail'),
      duration: getNumber(entry, 'duration')
    });
  }

  return entries;
}
