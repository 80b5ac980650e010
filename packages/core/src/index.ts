/**
 * @tunedrop/core - Types, registry and orchestrators of the song pipeline
 */

// Types
export type {
  LyricsLine,
  SongComment,
  Song,
  Platform,
  SearchResult,
  DownloadedAsset,
  FailureKind,
  FetchResult,
  DeliveryMode,
  DeliveryAttempt,
  DeliveryOutcome,
  ProviderTag,
  CatalogProvider,
  ChannelTag,
  MediaKind,
  MediaPayload,
  Channel,
  IncomingMessage,
  FetchAudioOptions,
  FetchImageOptions,
  MediaFetcher,
  LyricsRenderer,
  PlaylistEntry,
  LibraryStore
} from './types/index';
export { DELIVERY_MODES, isDeliveryMode } from './types/index';

// Errors
export { PipelineError, WaitTimeoutError, errorMessage } from './errors';

// Registry
export { ProviderRegistry } from './registry/provider-registry';

// Orchestrators
export {
  DeliveryEngine,
  type DeliveryContext,
  type DeliveryRequest,
  type DeliveryEngineOptions,
  type ModeSender
} from './orchestrators/delivery-engine';
export {
  DisambiguationManager,
  SELECTION_TIMEOUT_NOTICE,
  parseSelection,
  leadingToken,
  type SessionState,
  type DisambiguationRequest,
  type DisambiguationOptions,
  type SelectionDispatcher
} from './orchestrators/disambiguation';
export {
  CommandRouter,
  MESSAGES,
  type CommandHandler,
  type CommandRouterOptions
} from './orchestrators/command-router';

// Services
export {
  ConversationHub,
  type WaitController,
  type WaitHandler,
  type WaitOptions
} from './services/conversation-hub';
export { isModeSupported } from './services/capability';
export {
  sanitizeFilename,
  formatDuration,
  songTitle,
  songToLines,
  formatSelection
} from './services/song-format';
export {
  LogService,
  logService,
  log,
  isLogLevel,
  consoleSink,
  type LogLevel,
  type LogEntry,
  type LogFilter,
  type LogSink,
  type LogServiceOptions
} from './services/log-service';

// Utils
export { EventEmitter } from './utils/event-emitter';
export { TaskPool } from './utils/task-pool';
