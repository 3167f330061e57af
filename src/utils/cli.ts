/**
 * Command-line flag parsing for the refresh and query commands
 */

import { parseLogLevel, type LogLevel } from './logger.js';

export interface UpdateArgs {
  rebuild: boolean;
  logLevel?: LogLevel;
  help: boolean;
}

export interface QueryArgs {
  team?: string;
  season?: number;
  logLevel?: LogLevel;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const LOG_LEVEL_CHOICES = 'debug, info, warning, error, critical';

function valueAfter(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return undefined;

  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function logLevelArg(args: string[]): LogLevel | undefined {
  const raw = valueAfter(args, '--loglevel');
  if (raw === undefined) return undefined;

  const level = parseLogLevel(raw);
  if (!level) {
    throw new CliUsageError(`--loglevel must be one of ${LOG_LEVEL_CHOICES} (got "${raw}")`);
  }
  return level;
}

function rejectUnknown(args: string[], flags: string[], valued: string[]): void {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valued.includes(arg)) {
      i++;
    } else if (!flags.includes(arg)) {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }
}

export function parseUpdateArgs(args: string[]): UpdateArgs {
  rejectUnknown(args, ['--rebuild', '--help', '-h'], ['--loglevel']);

  return {
    rebuild: args.includes('--rebuild'),
    logLevel: logLevelArg(args),
    help: args.includes('--help') || args.includes('-h'),
  };
}

export function parseQueryArgs(args: string[]): QueryArgs {
  rejectUnknown(args, ['--help', '-h'], ['--team', '--season', '--loglevel']);

  const seasonText = valueAfter(args, '--season');
  let season: number | undefined;
  if (seasonText !== undefined) {
    if (!/^\d{4}$/.test(seasonText)) {
      throw new CliUsageError(`--season must be a four-digit year (got "${seasonText}")`);
    }
    season = Number(seasonText);
  }

  return {
    team: valueAfter(args, '--team'),
    season,
    logLevel: logLevelArg(args),
    help: args.includes('--help') || args.includes('-h'),
  };
}

export const UPDATE_USAGE = `Usage: scoreboard-update [--rebuild] [--loglevel <level>]

  --rebuild            rebuild the game cache for every season since 2003
  --loglevel <level>   ${LOG_LEVEL_CHOICES} (default: info)`;

export const QUERY_USAGE = `Usage: scoreboard-games [--team <name>] [--season <year>] [--loglevel <level>]

  --team <name>        only this team's schedule (any name variant)
  --season <year>      only games of the season ending in <year>
  --loglevel <level>   ${LOG_LEVEL_CHOICES} (default: info)`;
