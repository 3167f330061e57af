/**
 * Cache Updater
 *
 * Walks every (season, team) cell from the first uncached season through the
 * current one, one cell at a time, checkpointing the whole cache after each.
 * An interrupted run loses at most the cell in flight.
 */

import { FIRST_SEASON } from '../config.js';
import { TEAMS } from '../data/teams.js';
import { fetchGames as fetchEspnGames } from '../sources/espn-schedule.js';
import type { CellFailure, GameCache, GameRecord, UpdateSummary } from '../types/index.js';
import { logger, range } from '../utils/index.js';
import { cacheExists, emptyCache, loadCache, saveCache } from './cache.js';
import { getErrorMessage } from './errors.js';

// =============================================================================
// TYPES
// =============================================================================

export type GameFetcher = (team: string, season: number) => AsyncIterable<GameRecord>;

export interface UpdateOptions {
  cacheFile: string;
  rebuild?: boolean;
  now?: Date;
  fetchGames?: GameFetcher;
  teams?: readonly string[];
}

// =============================================================================
// SEASONS
// =============================================================================

/**
 * Seasons are named for the year they end: from August on, the upcoming
 * season is the current one.
 */
export function currentSeason(now: Date = new Date()): number {
  const month = now.getMonth() + 1;
  return month > 7 ? now.getFullYear() + 1 : now.getFullYear();
}

/**
 * Seasons still worth scraping given what's already cached. The newest cached
 * season is refreshed since it may have been captured mid-season.
 */
export function seasonsToScrape(cache: GameCache, now: Date = new Date()): number[] {
  const latest = currentSeason(now);
  const cached = Array.from(cache.keys());
  const start = cached.length > 0 ? Math.max(...cached) : FIRST_SEASON;
  return range(start, latest);
}

// =============================================================================
// UPDATE
// =============================================================================

/**
 * Refresh (or rebuild) the cache file. Season-major order, so each season
 * is complete on disk before the next one starts.
 */
export async function updateCache(options: UpdateOptions): Promise<UpdateSummary> {
  const {
    cacheFile,
    rebuild = false,
    now = new Date(),
    fetchGames = fetchEspnGames,
    teams = TEAMS,
  } = options;

  let cache: GameCache;
  if (!rebuild && cacheExists(cacheFile)) {
    cache = loadCache(cacheFile);
    logger.info(`Loaded cache from ${cacheFile} (${cache.size} seasons)`);
  } else {
    cache = emptyCache();
    logger.info(rebuild ? 'Rebuilding cache from scratch' : `No cache at ${cacheFile}, building it`);
  }

  const seasons = seasonsToScrape(cache, now);
  if (seasons.length === 0) {
    logger.warn(
      `Nothing to scrape: newest cached season ${Math.max(...cache.keys())} ` +
      `is after the current season ${currentSeason(now)}`
    );
    return { seasons, cellsUpdated: 0, failedCells: [], gamesFetched: 0 };
  }

  logger.info(`Scraping seasons ${seasons[0]}-${seasons[seasons.length - 1]} for ${teams.length} teams`);

  const failedCells: CellFailure[] = [];
  let cellsUpdated = 0;
  let gamesFetched = 0;

  for (const season of seasons) {
    for (const team of teams) {
      let games: GameRecord[];
      try {
        games = await collect(fetchGames(team, season));
      } catch (error) {
        const message = getErrorMessage(error);
        logger.warn(`Skipping ${team} ${season}: ${message}`);
        failedCells.push({ season, team, error: message });
        continue;
      }

      let cells = cache.get(season);
      if (!cells) {
        cells = new Map();
        cache.set(season, cells);
      }
      cells.set(team, games);

      saveCache(cacheFile, cache, now);
      cellsUpdated++;
      gamesFetched += games.length;
      logger.debug(`${team} ${season}: ${games.length} games`);
    }
  }

  if (failedCells.length > 0) {
    logger.warn(`${failedCells.length} cells failed and kept their previous contents`);
  }

  return { seasons, cellsUpdated, failedCells, gamesFetched };
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}
