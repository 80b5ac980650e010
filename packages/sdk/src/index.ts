/**
 * @tunedrop/sdk - SDK for building catalog providers
 */

// Re-export core types
export type {
  Song,
  SongComment,
  LyricsLine,
  Platform,
  ProviderTag,
  CatalogProvider,
  SearchResult
} from '@tunedrop/core';

// Base classes
export { BaseCatalogProvider, definePlatform } from './base/BaseCatalogProvider';
