/**
 * Media Fetcher
 *
 * Downloads cover images into memory and audio into the cache directory.
 * Direct URLs are streamed to `<id>.part` and renamed once the file is
 * complete; extractor-hosted URLs (YouTube) are handed to the Extractor.
 * Cache filenames are random ids and never derive from song metadata.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { nanoid } from 'nanoid';
import { parseFile } from 'music-metadata';
import {
  errorMessage,
  log,
  type DownloadedAsset,
  type FailureKind,
  type FetchAudioOptions,
  type FetchImageOptions,
  type FetchResult,
  type MediaFetcher
} from '@tunedrop/core';
import { readBody, type HttpClient } from './http-client';
import type { Extractor } from './extractor';

type FileAsset = Extract<DownloadedAsset, { kind: 'file' }>;
type BytesAsset = Extract<DownloadedAsset, { kind: 'bytes' }>;

// Download configuration
export const CHUNK_SIZE = 64 * 1024;
const AUDIO_EXTENSIONS = new Set(['mp3', 'm4a', 'aac', 'flac', 'ogg', 'opus', 'wav', 'webm']);
const EXTRACTOR_HOSTS = ['youtube.com', 'youtu.be'];

export interface MediaFetcherOptions {
  cacheDir: string;
  clearOnStartup: boolean;
  http: HttpClient;
  extractor: Extractor;
  /** Cache file id generator */
  generateId?: () => string;
}

function failure(kind: FailureKind, message: string): { ok: false; kind: FailureKind; message: string } {
  return { ok: false, kind, message };
}

/**
 * Re-emit a byte stream as fixed-size chunks (the last one may be shorter)
 */
export async function* fixedChunks(source: AsyncIterable<Buffer | string>, size = CHUNK_SIZE): AsyncGenerator<Buffer> {
  let pending = Buffer.alloc(0);
  for await (const chunk of source) {
    pending = Buffer.concat([pending, typeof chunk === 'string' ? Buffer.from(chunk) : chunk]);
    while (pending.length >= size) {
      yield pending.subarray(0, size);
      pending = pending.subarray(size);
    }
  }
  if (pending.length > 0) {
    yield pending;
  }
}

export class MediaFetcherService implements MediaFetcher {
  private generateId: () => string;

  constructor(private options: MediaFetcherOptions) {
    this.generateId = options.generateId ?? (() => nanoid());
  }

  get cacheDir(): string {
    return this.options.cacheDir;
  }

  /**
   * Rebuild the cache directory when configured, otherwise make sure it exists
   */
  async initialize(): Promise<void> {
    const { cacheDir, clearOnStartup } = this.options;
    if (clearOnStartup) {
      await fs.promises.rm(cacheDir, { recursive: true, force: true });
      log.info('MediaFetcher', `Cache directory cleared: ${cacheDir}`);
    }
    await fs.promises.mkdir(cacheDir, { recursive: true });
  }

  async close(): Promise<void> {
    // The HTTP client is owned by the app
  }

  isExtractorUrl(url: string): boolean {
    let hostname: string;
    try {
      hostname = new URL(url).hostname.toLowerCase();
    } catch {
      return false;
    }
    return EXTRACTOR_HOSTS.some(host => hostname === host || hostname.endsWith(`.${host}`));
  }

  async fetchImage(url: string, options: FetchImageOptions = {}): Promise<FetchResult<BytesAsset>> {
    const target = options.downgradeTls ? url.replace(/^https:\/\//i, 'http://') : url;

    try {
      const response = await this.options.http.request(target);
      if (response.status < 200 || response.status >= 300) {
        response.body.resume();
        log.warn('MediaFetcher', `Image download failed: HTTP ${response.status}`, { url: target });
        return failure('TransportFailure', `HTTP ${response.status}`);
      }

      const data = await readBody(response.body);
      const contentType = response.headers['content-type'];
      return {
        ok: true,
        asset: { kind: 'bytes', id: this.generateId(), data, mime: contentType?.split(';')[0]?.trim() }
      };
    } catch (error) {
      log.warn('MediaFetcher', 'Image download failed', { url: target, error: errorMessage(error) });
      return failure('TransportFailure', errorMessage(error));
    }
  }

  async fetchAudio(url: string, options: FetchAudioOptions = {}): Promise<FetchResult<FileAsset>> {
    const work = this.isExtractorUrl(url) ? this.extract(url) : this.download(url);
    if (!options.timeoutMs) {
      return work;
    }

    // The deadline only stops waiting; the download or extractor keeps running
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<FetchResult<FileAsset>>((resolve) => {
      timer = setTimeout(() => {
        log.warn('MediaFetcher', `Audio fetch exceeded ${options.timeoutMs}ms`, { url });
        resolve(failure('Timeout', `No result within ${options.timeoutMs}ms`));
      }, options.timeoutMs);
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  async probeDuration(filePath: string): Promise<number | null> {
    try {
      const metadata = await parseFile(filePath, { duration: true });
      const seconds = metadata.format.duration;
      return seconds !== undefined && Number.isFinite(seconds) ? Math.round(seconds * 1000) : null;
    } catch (error) {
      log.debug('MediaFetcher', `Could not read duration of ${path.basename(filePath)}`, { error: errorMessage(error) });
      return null;
    }
  }

  // ========================================
  // Direct download
  // ========================================

  private async download(url: string): Promise<FetchResult<FileAsset>> {
    const id = this.generateId();
    const extension = this.audioExtension(url);
    const tempPath = path.join(this.options.cacheDir, `${id}.part`);
    const filePath = path.join(this.options.cacheDir, `${id}.${extension}`);

    try {
      const response = await this.options.http.request(url);
      if (response.status < 200 || response.status >= 300) {
        response.body.resume();
        log.error('MediaFetcher', `Song download failed, HTTP status ${response.status}`, { url });
        return failure('TransportFailure', `HTTP ${response.status}`);
      }

      await this.writeChunked(response.body, tempPath);
      await fs.promises.rename(tempPath, filePath);

      const { size } = await fs.promises.stat(filePath);
      log.debug('MediaFetcher', `Song downloaded to ${filePath}`, { bytes: size });
      return { ok: true, asset: { kind: 'file', id, path: filePath, bytes: size } };
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      log.error('MediaFetcher', 'Song download failed', { url, error: errorMessage(error) });
      return failure('TransportFailure', errorMessage(error));
    }
  }

  private async writeChunked(body: Readable, filePath: string): Promise<void> {
    await pipeline(
      body,
      (source: AsyncIterable<Buffer | string>) => fixedChunks(source),
      fs.createWriteStream(filePath)
    );
  }

  private audioExtension(url: string): string {
    try {
      const ext = path.extname(new URL(url).pathname).slice(1).toLowerCase();
      return AUDIO_EXTENSIONS.has(ext) ? ext : 'mp3';
    } catch {
      return 'mp3';
    }
  }

  // ========================================
  // Extractor download
  // ========================================

  private async extract(url: string): Promise<FetchResult<FileAsset>> {
    const { extractor, cacheDir } = this.options;

    if (!(await extractor.isAvailable())) {
      return failure('CapabilityUnavailable', 'Media extractor is not installed');
    }

    const id = this.generateId();
    const template = path.join(cacheDir, `${id}.%(ext)s`);
    const filePath = path.join(cacheDir, `${id}.${extractor.outputExtension}`);

    try {
      const result = await extractor.download(url, template);
      if (result.code !== 0) {
        log.error('MediaFetcher', `Extractor exited with ${result.code}`, { url, stderr: result.stderr.trim().slice(-500) });
        return failure('ExtractionFailure', `Extractor exited with ${result.code}`);
      }
      if (!fs.existsSync(filePath)) {
        log.error('MediaFetcher', 'Extractor finished but produced no file', { url, expected: filePath });
        return failure('ExtractionFailure', 'Output file was not produced');
      }

      const { size } = await fs.promises.stat(filePath);
      log.debug('MediaFetcher', `Extracted audio to ${filePath}`, { bytes: size });
      return { ok: true, asset: { kind: 'file', id, path: filePath, bytes: size } };
    } catch (error) {
      log.error('MediaFetcher', 'Extractor run failed', { url, error: errorMessage(error) });
      return failure('ExtractionFailure', errorMessage(error));
    }
  }
}
