/**
 * ESPN Team Schedule Source
 *
 * Scrapes one team's results for one season from ESPN's schedule page.
 * Rows that don't parse (headers, postponed or canceled games, markup
 * irregularities) are skipped; a page without a table yields nothing.
 */

import * as cheerio from 'cheerio';
import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { ESPN_HEADERS, ESPN_SCHEDULE_URL } from '../config.js';
import { ScheduleFetchError, getErrorMessage } from '../core/errors.js';
import { resolveTeam } from '../data/teams.js';
import { buildGame, formatGame } from '../models/game.js';
import type { GameRecord } from '../types/index.js';
import { logger } from '../utils/index.js';

dayjs.extend(customParseFormat);

// =============================================================================
// TYPES
// =============================================================================

/**
 * Raw text pulled from one schedule table row.
 */
export interface ScheduleRow {
  date?: string;          // "Wed, Nov 10"
  homeMarker?: string;    // "vs" or "@"
  opponent?: string;      // "Boston"
  resultMarker?: string;  // "W" or "L"
  score?: string;         // "110-102" or "110-102 OT"
}

export type PageFetcher = (url: string) => Promise<string>;

export interface FetchGamesOptions {
  fetchPage?: PageFetcher;
  baseUrl?: string;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

const WEEKDAYS = new Set(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// Months before July belong to the calendar year the season ends in
const SEASON_SPLIT_MONTH = 7;

const HOME_MARKER = 'vs';
const AWAY_MARKER = '@';
const WIN_MARKER = 'W';
const LOSS_MARKER = 'L';

// =============================================================================
// FETCHING
// =============================================================================

export function scheduleUrl(team: string, season: number, baseUrl: string = ESPN_SCHEDULE_URL): string {
  return `${baseUrl}/${resolveTeam(team, true)}/season/${season}`;
}

/**
 * GET a schedule page; network failures and non-2xx responses throw.
 */
export async function fetchSchedulePage(url: string): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, { headers: ESPN_HEADERS });
  } catch (error) {
    throw new ScheduleFetchError(url, getErrorMessage(error), undefined, error);
  }

  if (!response.ok) {
    throw new ScheduleFetchError(url, `HTTP ${response.status} ${response.statusText}`, response.status);
  }

  return response.text();
}

/**
 * Lazily yield a team's games for a season, in page (chronological) order.
 * Each call issues a fresh request.
 */
export async function* fetchGames(
  team: string,
  season: number,
  options: FetchGamesOptions = {}
): AsyncGenerator<GameRecord> {
  const { fetchPage = fetchSchedulePage, baseUrl = ESPN_SCHEDULE_URL } = options;

  const url = scheduleUrl(team, season, baseUrl);
  logger.debug(`Fetching ${url}`);

  const html = await fetchPage(url);
  yield* parseSchedulePage(html, team, season);
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Pull raw cell text from every row of the first table after its header row.
 */
export function extractScheduleRows(html: string): ScheduleRow[] {
  const $ = cheerio.load(html);
  const table = $('table').first();
  if (table.length === 0) {
    return [];
  }

  return table
    .find('tr')
    .slice(1)
    .toArray()
    .map(tr => {
      const cells = $(tr).find('td');
      const [dateCell, opponentCell, resultCell] = [cells.eq(0), cells.eq(1), cells.eq(2)];

      return {
        date: textOf(dateCell),
        homeMarker: textOf(opponentCell.find('li').first()),
        opponent: textOf(opponentCell.find('a').eq(1)),
        resultMarker: textOf(resultCell.find('span').first()),
        score: textOf(resultCell.find('a').first()),
      };
    });
}

function textOf(node: { length: number; text(): string }): string | undefined {
  if (node.length === 0) return undefined;
  return node.text().trim();
}

/**
 * Parse a schedule page into games; malformed rows are dropped.
 *
 * Rows are chronological, so a date that falls before the previous game's
 * is moved a year later (seasons that ran past June).
 */
export function* parseSchedulePage(html: string, team: string, season: number): Generator<GameRecord> {
  const rows = extractScheduleRows(html);
  if (rows.length === 0) {
    logger.debug(`No schedule table for ${team} ${season}`);
    return;
  }

  const teamAbbr = resolveTeam(team);
  let previousDate: string | undefined;

  for (const row of rows) {
    let game = parseScheduleRow(row, teamAbbr, season);
    if (!game) continue;

    if (previousDate && game.date < previousDate) {
      const date = dayjs(game.date).add(1, 'year').format('YYYY-MM-DD');
      game = buildGame(date, game.team, game.opp, game.home, game.won, game.score);
    }
    previousDate = game.date;

    logger.info(formatGame(game));
    yield game;
  }
}

/**
 * Build a game from one row, or null when the row isn't a played game.
 */
export function parseScheduleRow(row: ScheduleRow, team: string, season: number): GameRecord | null {
  const date = row.date ? parseGameDate(row.date, season) : null;
  if (!date) {
    logger.debug(`Skipping row with unreadable date: ${JSON.stringify(row)}`);
    return null;
  }

  if (!row.opponent) {
    logger.debug(`Skipping ${date}: no opponent`);
    return null;
  }

  const home = parseMarker(row.homeMarker, HOME_MARKER, AWAY_MARKER);
  const won = parseMarker(row.resultMarker, WIN_MARKER, LOSS_MARKER);
  if (home === null || won === null) {
    logger.debug(`Skipping ${date}: unexpected markers "${row.homeMarker}" / "${row.resultMarker}"`);
    return null;
  }

  const score = row.score ? parseScore(row.score) : null;
  if (!score) {
    logger.debug(`Skipping ${date}: unreadable score "${row.score}"`);
    return null;
  }

  return buildGame(date, team, resolveTeam(row.opponent), home, won, score);
}

function parseMarker(text: string | undefined, yes: string, no: string): boolean | null {
  if (text === yes) return true;
  if (text === no) return false;
  return null;
}

/**
 * "Wed, Nov 10" in season 2021 → "2020-11-10"; "Fri, Jan 15" → "2021-01-15".
 */
export function parseGameDate(text: string, season: number): string | null {
  const parts = text.split(/\s+/).filter(Boolean);
  if (parts.length !== 3) return null;

  const [weekdayText, monthText, dayText] = parts;
  if (!WEEKDAYS.has(weekdayText.replace(/,$/, ''))) return null;

  const monthIndex = MONTHS.indexOf(monthText);
  if (monthIndex === -1 || !/^\d{1,2}$/.test(dayText)) return null;

  const year = monthIndex + 1 < SEASON_SPLIT_MONTH ? season : season - 1;
  const parsed = dayjs(`${monthText} ${Number(dayText)} ${year}`, 'MMM D YYYY', true);
  if (!parsed.isValid()) return null;

  return parsed.format('YYYY-MM-DD');
}

/**
 * "110-102 OT" → [110, 102]; the first "X-Y" token is the score.
 */
export function parseScore(text: string): [number, number] | null {
  for (const token of text.split(/\s+/)) {
    const match = /^(\d+)-(\d+)$/.exec(token);
    if (match) {
      return [Number(match[1]), Number(match[2])];
    }
  }
  return null;
}
