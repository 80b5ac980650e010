/**
 * Tunedrop App
 *
 * Owns the pipeline: HTTP client, extractor pool, media fetcher, catalog
 * providers, delivery engine and command router. Transports (the HTTP
 * gateway, the console) feed it messages through handle().
 */

import {
  CommandRouter,
  ConversationHub,
  DeliveryEngine,
  ProviderRegistry,
  TaskPool,
  errorMessage,
  log,
  logService,
  type CatalogProvider,
  type IncomingMessage,
  type LibraryStore,
  type LyricsRenderer
} from '@tunedrop/core';
import type { TunedropConfig } from './config';
import { HttpClient } from './services/http-client';
import { Extractor, type ProcessRunner } from './services/extractor';
import { MediaFetcherService } from './services/media-fetcher';
import { SqliteLibraryStore } from './services/library-store';
import { SvgLyricsRenderer } from './services/lyrics-renderer';
import { createCookiesCommand } from './commands/cookies';
import { NeteasePlugin } from '../plugins/netease/index';
import { YoutubePlugin } from '../plugins/youtube/index';

export interface TunedropAppOptions {
  config: TunedropConfig;
  /** Replace the network client (tests) */
  http?: HttpClient;
  /** Replace the process runner used by the extractor (tests) */
  runner?: ProcessRunner;
  /** Replace the built-in catalog providers */
  providers?: (deps: { http: HttpClient; extractor: Extractor }) => CatalogProvider[];
  library?: LibraryStore & { close?(): void };
  renderer?: LyricsRenderer;
}

export class TunedropApp {
  readonly config: TunedropConfig;
  readonly registry = new ProviderRegistry();
  readonly hub = new ConversationHub();
  readonly http: HttpClient;
  readonly pool: TaskPool;
  readonly extractor: Extractor;
  readonly fetcher: MediaFetcherService;
  readonly library: LibraryStore & { close?(): void };
  readonly engine: DeliveryEngine;
  readonly router: CommandRouter;
  private isRunning = false;

  constructor(options: TunedropAppOptions) {
    const { config } = options;
    this.config = config;
    logService.setLevel(config.logging.level);

    this.http = options.http ?? new HttpClient({ proxy: config.network.proxy });
    this.pool = new TaskPool(config.extractor.concurrency, 'ExtractorPool');
    this.extractor = new Extractor({
      binary: config.extractor.binary,
      cookiesPath: config.storage.cookies,
      audioFormat: config.extractor.audioFormat,
      audioQuality: config.extractor.audioQuality,
      pool: this.pool,
      runner: options.runner
    });

    this.fetcher = new MediaFetcherService({
      cacheDir: config.storage.cache,
      clearOnStartup: config.cache.clearOnStartup,
      http: this.http,
      extractor: this.extractor
    });

    const deps = { http: this.http, extractor: this.extractor };
    const providers = options.providers
      ? options.providers(deps)
      : [new NeteasePlugin({ http: this.http }), new YoutubePlugin(this.extractor)];
    for (const provider of providers) {
      this.registry.register(provider);
    }

    this.library = options.library ?? new SqliteLibraryStore(config.storage.database);

    this.engine = new DeliveryEngine(this.fetcher, options.renderer ?? new SvgLyricsRenderer(), {
      modes: config.delivery.modes,
      comments: config.delivery.comments,
      lyrics: config.delivery.lyrics,
      audioTimeoutMs: config.extractor.timeoutSeconds * 1000
    });

    this.router = new CommandRouter(
      this.registry,
      this.hub,
      this.engine,
      {
        defaultProvider: config.providers.default,
        searchLimit: config.providers.searchLimit,
        autoPlaySingle: config.disambiguation.autoPlaySingle,
        disambiguation: {
          timeoutMs: config.disambiguation.timeoutSeconds * 1000,
          retractList: config.disambiguation.retractList
        }
      },
      this.library
    );

    this.router.register('cookies', createCookiesCommand({
      hub: this.hub,
      cookiesPath: config.storage.cookies,
      timeoutMs: config.disambiguation.timeoutSeconds * 1000
    }));
  }

  async start(): Promise<void> {
    if (this.isRunning) return;

    await this.fetcher.initialize();
    await this.registry.initializeAll();
    this.isRunning = true;

    log.info('App', 'Pipeline ready', {
      providers: this.registry.getAll().map(p => p.platform.name),
      modes: this.config.delivery.modes
    });
  }

  /**
   * Route one incoming message. Resolves once the command, including any
   * selection it opened, has finished.
   */
  async handle(message: IncomingMessage): Promise<boolean> {
    try {
      return await this.router.handle(message);
    } catch (error) {
      log.error('App', 'Message handling failed', {
        conversationId: message.conversationId,
        error: errorMessage(error)
      });
      return false;
    }
  }

  async stop(): Promise<void> {
    this.router.shutdown();
    await this.router.settle();
    await this.registry.disposeAll();
    await this.fetcher.close();
    this.http.close();
    this.library.close?.();
    this.isRunning = false;
    log.info('App', 'Stopped');
  }
}
