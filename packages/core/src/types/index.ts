/**
 * Core domain types for Tunedrop
 */

export interface LyricsLine {
  time: number;  // Milliseconds from start
  text: string;
}

export interface SongComment {
  id?: string;
  author?: string;
  content: string;
  likedCount?: number;
}

/**
 * A catalog entry. Only meaningful together with the platform that produced it;
 * enrichment steps fill the optional fields in place.
 */
export interface Song {
  id: string;
  name: string;
  artists: string;
  /** 0 when the catalog only reports it lazily */
  durationMs: number;
  audioUrl?: string;
  coverUrl?: string;
  lyrics?: LyricsLine[];
  comments?: SongComment[];
}

export interface Platform {
  /** Canonical key, e.g. "netease" */
  readonly name: string;
  readonly displayName: string;
  /** Trigger tokens used to route free-text commands */
  readonly keywords: readonly string[];
}

/** Ranked by relevance, never longer than the requested limit */
export type SearchResult = Song[];

export type DownloadedAsset =
  | { kind: 'file'; id: string; path: string; bytes: number }
  | { kind: 'bytes'; id: string; data: Buffer; mime?: string };

export type FailureKind =
  | 'NotFound'
  | 'TransportFailure'
  | 'CapabilityUnavailable'
  | 'ExtractionFailure'
  | 'Timeout'
  | 'UserCancelled';

export type FetchResult<T extends DownloadedAsset = DownloadedAsset> =
  | { ok: true; asset: T }
  | { ok: false; kind: FailureKind; message: string };

export type DeliveryMode = 'card' | 'voice' | 'file' | 'text';

export const DELIVERY_MODES: readonly DeliveryMode[] = ['card', 'voice', 'file', 'text'];

export function isDeliveryMode(value: string): value is DeliveryMode {
  return (DELIVERY_MODES as readonly string[]).includes(value);
}

export interface DeliveryAttempt {
  mode: DeliveryMode;
  outcome: 'skipped' | 'succeeded' | 'failed';
  error?: string;
}

export type DeliveryOutcome =
  | { status: 'succeeded'; mode: DeliveryMode; attempts: DeliveryAttempt[] }
  | { status: 'exhausted'; attempts: DeliveryAttempt[] };

export type {
  ProviderTag,
  CatalogProvider
} from './provider';

export type {
  ChannelTag,
  MediaKind,
  MediaPayload,
  Channel,
  IncomingMessage
} from './channel';

export type {
  FetchAudioOptions,
  FetchImageOptions,
  MediaFetcher,
  LyricsRenderer,
  PlaylistEntry,
  LibraryStore
} from './collaborators';
