/**
 * Persistent Game Cache
 *
 * JSON file holding season → team → games. Only the base game fields are
 * stored; derived fields are rebuilt on load. Writes go to a temp file that
 * is renamed over the target, so a killed write leaves the previous
 * checkpoint intact. Assumes a single writer.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { buildGame } from '../models/game.js';
import type { GameCache, GameRecord } from '../types/index.js';
import { logger } from '../utils/index.js';
import { CacheFormatError, CacheNotFoundError, getErrorMessage } from './errors.js';

// =============================================================================
// FILE SCHEMA
// =============================================================================

export const CACHE_VERSION = 1;

const StoredGameSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  team: z.string().min(1),
  opp: z.string().min(1),
  home: z.boolean(),
  won: z.boolean(),
  score: z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]),
});

const CacheFileSchema = z.object({
  version: z.literal(CACHE_VERSION),
  updatedAt: z.string(),
  seasons: z.record(
    z.string().regex(/^\d{4}$/),
    z.record(z.string(), z.array(StoredGameSchema))
  ),
});

export type StoredGame = z.infer<typeof StoredGameSchema>;
export type CacheFile = z.infer<typeof CacheFileSchema>;

// =============================================================================
// CACHE OPERATIONS
// =============================================================================

export function emptyCache(): GameCache {
  return new Map();
}

export function cacheExists(path: string): boolean {
  return existsSync(path);
}

/**
 * Read and validate the cache file.
 *
 * @throws CacheNotFoundError if the file doesn't exist
 * @throws CacheFormatError if it isn't a valid cache document
 */
export function loadCache(path: string): GameCache {
  if (!existsSync(path)) {
    throw new CacheNotFoundError(path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new CacheFormatError(path, getErrorMessage(error), error);
  }

  const parsed = CacheFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid document';
    throw new CacheFormatError(path, where, parsed.error);
  }

  return fromCacheFile(parsed.data);
}

/**
 * Overwrite the cache file with the full in-memory cache.
 */
export function saveCache(path: string, cache: GameCache, now: Date = new Date()): void {
  mkdirSync(dirname(path), { recursive: true });

  const tmpPath = `${path}.tmp`;
  writeFileSync(tmpPath, JSON.stringify(toCacheFile(cache, now), null, 2));
  renameSync(tmpPath, path);

  logger.debug(`Checkpointed cache to ${path}`);
}

// =============================================================================
// CONVERSION
// =============================================================================

export function toCacheFile(cache: GameCache, now: Date = new Date()): CacheFile {
  const seasons: CacheFile['seasons'] = {};

  const seasonKeys = Array.from(cache.keys()).sort((a, b) => a - b);
  for (const season of seasonKeys) {
    const teams: Record<string, StoredGame[]> = {};
    for (const [team, games] of cache.get(season) ?? []) {
      teams[team] = games.map(toStoredGame);
    }
    seasons[String(season)] = teams;
  }

  return {
    version: CACHE_VERSION,
    updatedAt: now.toISOString(),
    seasons,
  };
}

export function fromCacheFile(file: CacheFile): GameCache {
  const cache = emptyCache();

  for (const [seasonKey, teams] of Object.entries(file.seasons)) {
    const cells = new Map<string, GameRecord[]>();
    for (const [team, games] of Object.entries(teams)) {
      cells.set(
        team,
        games.map(g => buildGame(g.date, g.team, g.opp, g.home, g.won, g.score))
      );
    }
    cache.set(Number(seasonKey), cells);
  }

  return cache;
}

function toStoredGame(game: GameRecord): StoredGame {
  return {
    date: game.date,
    team: game.team,
    opp: game.opp,
    home: game.home,
    won: game.won,
    score: [game.score[0], game.score[1]],
  };
}
