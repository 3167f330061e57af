/**
 * Error types surfaced by the scoreboard
 */

export type ScoreboardErrorCode =
  | 'UNRESOLVABLE_TEAM'
  | 'CACHE_NOT_FOUND'
  | 'CACHE_FORMAT'
  | 'SCHEDULE_FETCH';

export class ScoreboardError extends Error {
  readonly code: ScoreboardErrorCode;

  constructor(message: string, code: ScoreboardErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScoreboardError';
    this.code = code;
  }
}

/**
 * A team name the alias table cannot account for.
 */
export class UnresolvableTeamError extends ScoreboardError {
  readonly input: string;

  constructor(input: string) {
    super(`Unresolvable team name: "${input}"`, 'UNRESOLVABLE_TEAM');
    this.name = 'UnresolvableTeamError';
    this.input = input;
  }
}

export class CacheNotFoundError extends ScoreboardError {
  readonly path: string;

  constructor(path: string) {
    super(`Game cache not found at ${path}`, 'CACHE_NOT_FOUND');
    this.name = 'CacheNotFoundError';
    this.path = path;
  }
}

export class CacheFormatError extends ScoreboardError {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super(`Malformed game cache at ${path}: ${detail}`, 'CACHE_FORMAT', { cause });
    this.name = 'CacheFormatError';
    this.path = path;
  }
}

export class ScheduleFetchError extends ScoreboardError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, detail: string, status?: number, cause?: unknown) {
    super(`Failed to fetch schedule ${url}: ${detail}`, 'SCHEDULE_FETCH', { cause });
    this.name = 'ScheduleFetchError';
    this.url = url;
    this.status = status;
  }
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
