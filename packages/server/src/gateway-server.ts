/**
 * Tunedrop Gateway Server
 *
 * HTTP front end for chat adapters and scripts. Incoming chat messages are
 * posted per conversation; everything the bot says is queued in an outbox
 * the client polls. Downloaded media is served from the cache directory.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, isLogLevel, log, logService, type ChannelTag } from '@tunedrop/core';
import type { TunedropConfig } from './config';
import type { TunedropApp } from './app';
import { GatewayChannel, GatewayOutbox } from './channels/gateway-channel';

export const VERSION = '0.1.0';

const MEDIA_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.flac': 'audio/flac',
  '.ogg': 'audio/ogg',
  '.opus': 'audio/ogg',
  '.wav': 'audio/wav',
  '.webm': 'audio/webm'
};

const SAFE_MEDIA_NAME = /^[A-Za-z0-9_-]+\.[A-Za-z0-9]+$/;

export interface GatewayServerOptions {
  config: TunedropConfig;
  app: TunedropApp;
  onReady?: (info: ServerInfo) => void;
}

export interface ServerInfo {
  localUrl: string;
  port: number;
}

interface MessageBody {
  senderId: string;
  senderName?: string;
  text: string;
  private?: boolean;
}

export class GatewayServer {
  readonly fastify: FastifyInstance;
  readonly outbox = new GatewayOutbox();
  private config: TunedropConfig;
  private app: TunedropApp;
  private channelTags: ReadonlySet<ChannelTag>;
  private routesRegistered = false;
  private isRunning = false;
  /** Messages still being handled, awaited on stop */
  private inFlight = new Set<Promise<boolean>>();

  constructor(private options: GatewayServerOptions) {
    this.config = options.config;
    this.app = options.app;
    this.channelTags = new Set(this.config.server.channelTags);
    this.fastify = Fastify({
      logger: this.config.logging.level === 'debug'
    });
  }

  /**
   * Register routes without listening (used by start() and by tests)
   */
  async ready(): Promise<FastifyInstance> {
    if (!this.routesRegistered) {
      this.registerRoutes();
      this.routesRegistered = true;
    }
    await this.fastify.ready();
    return this.fastify;
  }

  /**
   * Start the server
   */
  async start(): Promise<ServerInfo> {
    if (this.isRunning) {
      throw new Error('Server is already running');
    }

    log.info('Server', 'Starting Tunedrop gateway...');
    await this.app.start();
    await this.ready();

    // Start listening
    let actualPort = this.config.server.port;
    const maxAttempts = 10;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        await this.fastify.listen({
          port: actualPort,
          host: this.config.server.host
        });
        break;
      } catch (error) {
        const code = error instanceof Error && 'code' in error ? error.code : undefined;
        if (code === 'EADDRINUSE' && attempt < maxAttempts - 1) {
          log.warn('Server', `Port ${actualPort} in use, trying ${actualPort + 1}...`);
          actualPort++;
        } else {
          throw error;
        }
      }
    }

    this.isRunning = true;

    const info: ServerInfo = {
      localUrl: `http://${this.config.server.host}:${actualPort}`,
      port: actualPort
    };

    log.info('Server', `Listening on ${info.localUrl}`, {
      providers: this.app.registry.getAll().map(p => p.platform.name),
      modes: this.config.delivery.modes,
      database: this.config.storage.database
    });

    this.options.onReady?.(info);
    return info;
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    log.info('Server', 'Stopping...');
    await this.fastify.close();
    await this.app.stop();
    await Promise.all([...this.inFlight]);
    this.isRunning = false;
    log.info('Server', 'Stopped');
  }

  /** Wait until every accepted message has been fully handled */
  async settle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private registerRoutes(): void {
    // Health check
    this.fastify.get('/health', async () => ({
      status: 'ok',
      version: VERSION,
      uptime: process.uptime()
    }));

    // Server info
    this.fastify.get('/api/info', async () => ({
      name: 'Tunedrop',
      version: VERSION,
      providers: this.app.registry.getAll().map(p => ({
        name: p.platform.name,
        displayName: p.platform.displayName,
        keywords: p.platform.keywords,
        tags: [...p.tags]
      })),
      delivery: {
        modes: this.config.delivery.modes,
        channelTags: [...this.channelTags]
      }
    }));

    // Recent logs
    this.fastify.get<{ Querystring: { count?: string; level?: string; service?: string } }>(
      '/api/logs',
      async (request) => {
        const { count, level, service } = request.query;
        const logs = logService.getRecent(parseInt(count || '100', 10) || 100, {
          level: isLogLevel(level) ? level : undefined,
          service
        });

        return {
          logs,
          stats: logService.getStats()
        };
      }
    );

    // Incoming chat message
    this.fastify.post<{ Params: { id: string }; Body: MessageBody }>(
      '/api/conversations/:id/messages',
      {
        schema: {
          body: {
            type: 'object',
            required: ['senderId', 'text'],
            properties: {
              senderId: { type: 'string', minLength: 1 },
              senderName: { type: 'string' },
              text: { type: 'string' },
              private: { type: 'boolean' }
            }
          }
        }
      },
      async (request, reply) => {
        const conversationId = request.params.id;
        const body = request.body;

        const channel = new GatewayChannel({
          conversationId,
          outbox: this.outbox,
          tags: this.channelTags,
          mediaDir: this.config.storage.cache,
          isPrivate: body.private
        });

        const handling = this.app.handle({
          conversationId,
          senderId: body.senderId,
          senderName: body.senderName,
          text: body.text,
          channel
        });
        this.inFlight.add(handling);
        void handling
          .catch((error: unknown) => {
            log.error('Server', 'Message handling failed', { conversationId, error: errorMessage(error) });
            return false;
          })
          .finally(() => {
            this.inFlight.delete(handling);
          });

        return reply.code(202).send({ accepted: true });
      }
    );

    // Drain pending outbound messages
    this.fastify.get<{ Params: { id: string } }>('/api/conversations/:id/outbox', async (request) => ({
      messages: this.outbox.drain(request.params.id)
    }));

    // Downloaded media
    this.fastify.get<{ Params: { file: string } }>('/media/:file', async (request, reply) => {
      const { file } = request.params;
      if (!SAFE_MEDIA_NAME.test(file)) {
        return reply.code(400).send({ error: 'Invalid file name' });
      }

      const filePath = path.join(this.config.storage.cache, file);
      let size: number;
      try {
        const stat = await fs.promises.stat(filePath);
        if (!stat.isFile()) {
          return reply.code(404).send({ error: 'Not found' });
        }
        size = stat.size;
      } catch {
        return reply.code(404).send({ error: 'Not found' });
      }

      reply.header('Content-Type', MEDIA_TYPES[path.extname(file).toLowerCase()] ?? 'application/octet-stream');
      reply.header('Content-Length', size);
      return reply.send(fs.createReadStream(filePath));
    });
  }
}
