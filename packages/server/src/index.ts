/**
 * Tunedrop Server - Library Entry Point
 *
 * This module exports the server components for programmatic use.
 * For CLI usage, see ./cli.ts
 */

// Core exports
export { TunedropApp } from './app';
export { GatewayServer, VERSION } from './gateway-server';
export { loadConfig, validateConfig, generateExampleConfig, DEFAULT_CONFIG } from './config';

// Services
export { HttpClient, NodeHttpTransport, HttpStatusError, readBody } from './services/http-client';
export { Extractor, SpawnRunner, AUDIO_FORMATS, isAudioFormat } from './services/extractor';
export { MediaFetcherService } from './services/media-fetcher';
export { SqliteLibraryStore } from './services/library-store';
export { SvgLyricsRenderer } from './services/lyrics-renderer';

// Channels
export { GatewayChannel, GatewayOutbox } from './channels/gateway-channel';
export { ConsoleChannel } from './channels/console-channel';

// Commands
export { createCookiesCommand } from './commands/cookies';

// Plugins
export { NeteasePlugin } from '../plugins/netease/index';
export { YoutubePlugin } from '../plugins/youtube/index';

// Types
export type { TunedropConfig, LoadConfigOptions } from './config';
export type { TunedropAppOptions } from './app';
export type { GatewayServerOptions, ServerInfo } from './gateway-server';
export type { HttpResponse, HttpRequestOptions, HttpTransport, HttpClientOptions } from './services/http-client';
export type { ProcessResult, ProcessRunner, ExtractorEntry, ExtractorOptions, AudioFormat } from './services/extractor';
export type { MediaFetcherOptions } from './services/media-fetcher';
export type { OutboundMessage, GatewayChannelOptions } from './channels/gateway-channel';
