/**
 * Core Module Exports
 *
 * Cache persistence, the updater that fills it and the reader that flattens it.
 */

// Errors
export {
  ScoreboardError,
  UnresolvableTeamError,
  CacheNotFoundError,
  CacheFormatError,
  ScheduleFetchError,
  getErrorMessage,
  type ScoreboardErrorCode,
} from './errors.js';

// Cache store
export {
  CACHE_VERSION,
  cacheExists,
  loadCache,
  saveCache,
  emptyCache,
  toCacheFile,
  fromCacheFile,
  type CacheFile,
  type StoredGame,
} from './cache.js';

// Updater
export {
  updateCache,
  currentSeason,
  seasonsToScrape,
  type UpdateOptions,
  type GameFetcher,
} from './updater.js';

// Reader
export {
  loadGames,
  flattenCache,
  filterGames,
  type GameFilter,
} from './reader.js';
