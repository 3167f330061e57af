#!/usr/bin/env node
/**
 * Scoreboard Query
 *
 * Prints cached games in date order, optionally for one team or season.
 *
 * Usage:
 *   npm run games -- --team "Golden State" --season 2016
 */

import 'dotenv/config';
import { CACHE_FILE } from './config.js';
import { CacheNotFoundError } from './core/errors.js';
import { loadCache } from './core/cache.js';
import { filterGames } from './core/reader.js';
import { formatGame } from './models/game.js';
import { logger, parseLogLevel, setLogLevel } from './utils/index.js';
import { CliUsageError, parseQueryArgs, QUERY_USAGE } from './utils/cli.js';

async function main(): Promise<void> {
  const args = parseQueryArgs(process.argv.slice(2));
  if (args.help) {
    console.log(QUERY_USAGE);
    return;
  }

  setLogLevel(args.logLevel ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info');

  const games = filterGames(loadCache(CACHE_FILE), {
    team: args.team,
    season: args.season,
  });

  for (const game of games) {
    console.log(formatGame(game));
  }
  logger.info(`${games.length} games`);
}

main().catch(error => {
  if (error instanceof CacheNotFoundError) {
    logger.error(`${error.message}; run \`npm run update\` first`);
  } else if (error instanceof CliUsageError) {
    logger.error(error.message);
    console.log(QUERY_USAGE);
  } else {
    logger.critical(`Fatal error: ${error}`);
  }
  process.exit(1);
});
