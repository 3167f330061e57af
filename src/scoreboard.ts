/**
 * Scoreboard library entry
 *
 * Read cached NBA results with `loadGames()`; refresh the cache with
 * `updateCache()` (or the `scoreboard-update` command).
 */

export type {
  Score,
  GameInput,
  GameRecord,
  GameCache,
  CellFailure,
  UpdateSummary,
} from './types/index.js';

export { CACHE_FILE, DEFAULT_CACHE_FILE, FIRST_SEASON } from './config.js';

export { TEAM_ALIASES, TEAMS, resolveTeam, isKnownTeam, type TeamAlias } from './data/teams.js';
export { buildGame, formatGame } from './models/game.js';
export { fetchGames, parseSchedulePage, type FetchGamesOptions, type PageFetcher } from './sources/espn-schedule.js';

export {
  ScoreboardError,
  UnresolvableTeamError,
  CacheNotFoundError,
  CacheFormatError,
  ScheduleFetchError,
  cacheExists,
  loadCache,
  saveCache,
  emptyCache,
  updateCache,
  currentSeason,
  seasonsToScrape,
  loadGames,
  flattenCache,
  filterGames,
  type UpdateOptions,
  type GameFetcher,
  type GameFilter,
} from './core/index.js';
