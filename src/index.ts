#!/usr/bin/env node
/**
 * Scoreboard Refresh
 *
 * Scrapes NBA results from ESPN for every team and season since 2003 and
 * checkpoints them to the local game cache.
 *
 * Usage:
 *   npm run update              # refresh the latest cached season onward
 *   npm run update -- --rebuild # rebuild every season
 */

import 'dotenv/config';
import dayjs from 'dayjs';
import { CACHE_FILE, validateConfig } from './config.js';
import { updateCache } from './core/updater.js';
import { formatDuration, logger, parseLogLevel, setLogLevel } from './utils/index.js';
import { CliUsageError, parseUpdateArgs, UPDATE_USAGE } from './utils/cli.js';

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
  const args = parseUpdateArgs(process.argv.slice(2));
  if (args.help) {
    console.log(UPDATE_USAGE);
    return;
  }

  const configCheck = validateConfig({ logLevelOverridden: args.logLevel !== undefined });
  if (!configCheck.valid) {
    logger.error('Configuration errors:');
    for (const error of configCheck.errors) {
      logger.error(`  - ${error}`);
    }
    logger.info('Please check your .env file');
    process.exit(1);
  }

  setLogLevel(args.logLevel ?? parseLogLevel(process.env.LOG_LEVEL) ?? 'info');

  const start = dayjs();
  logger.info(`started at ${start.format('YYYY-MM-DD HH:mm:ss')}`);

  const summary = await updateCache({ cacheFile: CACHE_FILE, rebuild: args.rebuild });

  const end = dayjs();
  logger.divider();
  logger.info(
    `Updated ${summary.cellsUpdated} cells, ${summary.gamesFetched} games, ` +
    `${summary.failedCells.length} failures`
  );
  for (const failure of summary.failedCells) {
    logger.warn(`  - ${failure.team} ${failure.season}: ${failure.error}`);
  }
  logger.info(
    `finished at ${end.format('YYYY-MM-DD HH:mm:ss')}, ${formatDuration(end.diff(start))} elapsed`
  );
}

// Run
main().catch(error => {
  if (error instanceof CliUsageError) {
    logger.error(error.message);
    console.log(UPDATE_USAGE);
  } else {
    logger.critical(`Fatal error: ${error}`);
  }
  process.exit(1);
});
