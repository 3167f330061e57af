/**
 * Configuration for the scoreboard
 */

import 'dotenv/config';
import { homedir } from 'os';
import { join } from 'path';
import { parseLogLevel } from './utils/index.js';

// =============================================================================
// CACHE
// =============================================================================
export const DEFAULT_CACHE_FILE = join(homedir(), '.cache', 'scoreboard', 'games.json');
export const CACHE_FILE = process.env.SCOREBOARD_CACHE_FILE ?? DEFAULT_CACHE_FILE;

// =============================================================================
// ESPN
// =============================================================================
export const ESPN_SCHEDULE_URL =
  process.env.ESPN_SCHEDULE_URL ?? 'https://www.espn.com/nba/team/schedule/_/name';

export const ESPN_HEADERS = {
  'Accept': 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
  'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
};

// =============================================================================
// SEASONS
// =============================================================================
export const FIRST_SEASON = 2003;

// =============================================================================
// LOGGING
// =============================================================================
export const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

/**
 * Validate configuration. `LOG_LEVEL` is not checked when a `--loglevel`
 * flag overrides it.
 */
export function validateConfig(
  options: { logLevelOverridden?: boolean } = {}
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!CACHE_FILE.trim()) {
    errors.push('SCOREBOARD_CACHE_FILE is empty');
  }

  try {
    new URL(ESPN_SCHEDULE_URL);
  } catch {
    errors.push(`ESPN_SCHEDULE_URL is not a valid URL: ${ESPN_SCHEDULE_URL}`);
  }

  if (!options.logLevelOverridden && !parseLogLevel(LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be one of debug, info, warning, error, critical (got "${LOG_LEVEL}")`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
