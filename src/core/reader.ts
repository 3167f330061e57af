/**
 * Cache Reader
 *
 * Flattens the cached schedules of every known team into one
 * date-ordered list of games.
 */

import { resolveTeam, TEAMS } from '../data/teams.js';
import type { GameCache, GameRecord } from '../types/index.js';
import { loadCache } from './cache.js';

/**
 * Load every cached game, sorted by date.
 *
 * @throws CacheNotFoundError if the refresh command hasn't been run yet
 */
export function loadGames(cacheFile: string): GameRecord[] {
  return flattenCache(loadCache(cacheFile));
}

/**
 * Games sharing a date are ordered by team, then season.
 */
export function flattenCache(cache: GameCache, teams: readonly string[] = TEAMS): GameRecord[] {
  const entries: Array<{ season: number; game: GameRecord }> = [];

  for (const [season, cells] of cache) {
    for (const team of teams) {
      for (const game of cells.get(team) ?? []) {
        entries.push({ season, game });
      }
    }
  }

  entries.sort(
    (a, b) =>
      compareStrings(a.game.date, b.game.date) ||
      compareStrings(a.game.team, b.game.team) ||
      a.season - b.season
  );

  return entries.map(e => e.game);
}

export interface GameFilter {
  team?: string;    // any name variant
  season?: number;  // cache season key (year the season ends)
}

/**
 * Flatten only the cells matching `filter`: one team's schedule and/or one
 * season as stored, so games a season pushed past June stay in that season.
 */
export function filterGames(cache: GameCache, filter: GameFilter): GameRecord[] {
  const teams = filter.team === undefined ? TEAMS : [resolveTeam(filter.team)];

  if (filter.season === undefined) {
    return flattenCache(cache, teams);
  }

  const selected: GameCache = new Map();
  const cells = cache.get(filter.season);
  if (cells) {
    selected.set(filter.season, cells);
  }
  return flattenCache(selected, teams);
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
