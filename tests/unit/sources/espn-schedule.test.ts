/**
 * ESPN Schedule Source Unit Tests
 *
 * Feeds synthetic schedule pages through the parser; no network.
 */

import { readFileSync } from 'fs';
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  extractScheduleRows,
  fetchGames,
  fetchSchedulePage,
  parseGameDate,
  parseSchedulePage,
  parseScore,
  scheduleUrl,
} from '../../../src/sources/espn-schedule.js';
import { ScheduleFetchError } from '../../../src/core/errors.js';
import type { GameRecord } from '../../../src/types/index.js';

const BOS_2020 = readFileSync(
  new URL('../../fixtures/espn-schedule-bos-2020.html', import.meta.url),
  'utf-8'
);

function row(date: string, marker: string, opponent: string, result: string, score: string): string {
  return `<tr>
    <td>${date}</td>
    <td><ul><li>${marker}</li><li><a href="#"><img alt=""></a></li><li><a href="#">${opponent}</a></li></ul></td>
    <td><ul><li><span>${result}</span></li><li><a href="#">${score}</a></li></ul></td>
  </tr>`;
}

function page(...rows: string[]): string {
  return `<html><body><table><tr><td>DATE</td><td>OPPONENT</td><td>RESULT</td></tr>${rows.join('')}</table></body></html>`;
}

async function collect(games: AsyncIterable<GameRecord>): Promise<GameRecord[]> {
  const result: GameRecord[] = [];
  for await (const game of games) {
    result.push(game);
  }
  return result;
}

describe('ESPN schedule source', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('scheduleUrl', () => {
    it('should use the ESPN abbreviation', () => {
      expect(scheduleUrl('GSW', 2016, 'https://example.test/schedule')).toBe(
        'https://example.test/schedule/gs/season/2016'
      );
      expect(scheduleUrl('Utah', 2021, 'https://example.test/schedule')).toBe(
        'https://example.test/schedule/utah/season/2021'
      );
    });
  });

  describe('parseGameDate', () => {
    it('should place January games in the season year', () => {
      expect(parseGameDate('Fri, Jan 15', 2021)).toBe('2021-01-15');
    });

    it('should place November games in the year before the season', () => {
      expect(parseGameDate('Tue, Nov 10', 2021)).toBe('2020-11-10');
    });

    it('should treat July as the start of the season', () => {
      expect(parseGameDate('Thu, Jul 30', 2020)).toBe('2019-07-30');
      expect(parseGameDate('Tue, Jun 30', 2020)).toBe('2020-06-30');
    });

    it('should reject impossible dates', () => {
      expect(parseGameDate('Mon, Feb 29', 2021)).toBeNull();
      expect(parseGameDate('Sat, Feb 29', 2020)).toBe('2020-02-29');
    });

    it('should reject anything that is not weekday, month, day', () => {
      expect(parseGameDate('DATE', 2021)).toBeNull();
      expect(parseGameDate('Xyz, Jan 15', 2021)).toBeNull();
      expect(parseGameDate('Fri, Janu 15', 2021)).toBeNull();
      expect(parseGameDate('Fri, Jan 15th', 2021)).toBeNull();
    });
  });

  describe('parseScore', () => {
    it('should read winner and loser points', () => {
      expect(parseScore('110-102')).toEqual([110, 102]);
      expect(parseScore('112-106 OT')).toEqual([112, 106]);
      expect(parseScore('W 98-97')).toEqual([98, 97]);
    });

    it('should reject text without a score', () => {
      expect(parseScore('Postponed')).toBeNull();
      expect(parseScore('110 - 102')).toBeNull();
      expect(parseScore('')).toBeNull();
    });
  });

  describe('extractScheduleRows', () => {
    it('should skip the header row and read cell text', () => {
      const rows = extractScheduleRows(BOS_2020);

      expect(rows).toHaveLength(3);
      expect(rows[0]).toEqual({
        date: 'Wed, Oct 23',
        homeMarker: '@',
        opponent: 'Philadelphia',
        resultMarker: 'L',
        score: '107-93',
      });
      expect(rows[2].resultMarker).toBeUndefined();
      expect(rows[2].score).toBeUndefined();
    });

    it('should return nothing for a page without a table', () => {
      expect(extractScheduleRows('<html><body><p>No games scheduled</p></body></html>')).toEqual([]);
    });
  });

  describe('parseSchedulePage', () => {
    it('should yield the well-formed games in row order and skip the malformed one', () => {
      const games = [...parseSchedulePage(BOS_2020, 'BOS', 2020)];

      expect(games).toHaveLength(2);

      expect(games[0]).toMatchObject({
        date: '2019-10-23',
        team: 'BOS',
        opp: 'PHI',
        home: false,
        won: false,
        score: [107, 93],
        teamScore: 93,
        oppScore: 107,
        winner: 'PHI',
      });
      expect(games[1]).toMatchObject({
        date: '2019-10-25',
        team: 'BOS',
        opp: 'TOR',
        home: true,
        won: true,
        score: [112, 106],
        homeTeam: 'BOS',
        winner: 'BOS',
      });
    });

    it('should normalize the team name it was given', () => {
      const games = [...parseSchedulePage(BOS_2020, 'Boston', 2020)];
      expect(games.map(g => g.team)).toEqual(['BOS', 'BOS']);
    });

    it('should skip rows with unknown markers', () => {
      const html = page(
        row('Wed, Oct 23', 'at', 'Philadelphia', 'L', '107-93'),
        row('Fri, Oct 25', 'vs', 'Toronto', 'T', '112-106'),
        row('Sat, Oct 26', 'vs', 'New York', 'W', '118-95')
      );

      const games = [...parseSchedulePage(html, 'BOS', 2020)];
      expect(games).toHaveLength(1);
      expect(games[0].opp).toBe('NYK');
    });

    it('should move games that run past June into the following year', () => {
      const html = page(
        row('Wed, Mar 11', 'vs', 'Utah', 'W', '114-106'),
        row('Fri, Jul 31', '@', 'Milwaukee', 'L', '119-112'),
        row('Sun, Aug 2', 'vs', 'Portland', 'W', '128-112')
      );

      const games = [...parseSchedulePage(html, 'BOS', 2020)];
      expect(games.map(g => g.date)).toEqual(['2020-03-11', '2020-07-31', '2020-08-02']);
    });

    it('should yield nothing when the page has no table', () => {
      expect([...parseSchedulePage('<html><body></body></html>', 'BOS', 2026)]).toEqual([]);
    });
  });

  describe('fetchGames', () => {
    it('should fetch the team page and yield its games', async () => {
      const fetchPage = vi.fn(async (_url: string) => BOS_2020);

      const games = await collect(
        fetchGames('BOS', 2020, { fetchPage, baseUrl: 'https://example.test/schedule' })
      );

      expect(fetchPage).toHaveBeenCalledWith('https://example.test/schedule/bos/season/2020');
      expect(games.map(g => g.date)).toEqual(['2019-10-23', '2019-10-25']);
    });

    it('should not fetch until iterated', async () => {
      const fetchPage = vi.fn(async (_url: string) => BOS_2020);

      const games = fetchGames('BOS', 2020, { fetchPage });
      expect(fetchPage).not.toHaveBeenCalled();

      await collect(games);
      expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it('should fetch again on every call', async () => {
      const fetchPage = vi.fn(async (_url: string) => BOS_2020);

      const first = await collect(fetchGames('BOS', 2020, { fetchPage }));
      const second = await collect(fetchGames('BOS', 2020, { fetchPage }));

      expect(fetchPage).toHaveBeenCalledTimes(2);
      expect(second).toEqual(first);
    });

    it('should propagate transport errors', async () => {
      const fetchPage = vi.fn(async (url: string): Promise<string> => {
        throw new ScheduleFetchError(url, 'connection reset');
      });

      await expect(collect(fetchGames('BOS', 2020, { fetchPage }))).rejects.toBeInstanceOf(
        ScheduleFetchError
      );
    });
  });

  describe('fetchSchedulePage', () => {
    it('should return the body of a successful response', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('<table></table>', { status: 200 })));

      await expect(fetchSchedulePage('https://example.test/schedule/bos/season/2020')).resolves.toBe(
        '<table></table>'
      );
    });

    it('should throw with the status for an error response', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response('missing', { status: 404, statusText: 'Not Found' }))
      );

      const error = await fetchSchedulePage('https://example.test/schedule/bos/season/1999').catch(
        (e: unknown) => e
      );

      if (!(error instanceof ScheduleFetchError)) {
        throw new Error(`expected ScheduleFetchError, got ${String(error)}`);
      }
      expect(error.status).toBe(404);
      expect(error.message).toBe(
        'Failed to fetch schedule https://example.test/schedule/bos/season/1999: HTTP 404 Not Found'
      );
    });

    it('should wrap network failures', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => {
        throw new TypeError('fetch failed');
      }));

      await expect(fetchSchedulePage('https://example.test/x')).rejects.toThrow(
        'Failed to fetch schedule https://example.test/x: fetch failed'
      );
    });
  });
});
