/**
 * Game Record Builder
 *
 * Derives the symmetric home/away and winner/loser views of a game
 * from one team's perspective.
 */

import type { GameRecord, Score } from '../types/index.js';

export function buildGame(
  date: string,
  team: string,
  opp: string,
  home: boolean,
  won: boolean,
  score: Score
): GameRecord {
  const [winnerPoints, loserPoints] = score;

  const teamScore = won ? winnerPoints : loserPoints;
  const oppScore = won ? loserPoints : winnerPoints;

  return Object.freeze({
    date,
    team,
    opp,
    home,
    won,
    score: Object.freeze([winnerPoints, loserPoints] as const),
    homeTeam: home ? team : opp,
    awayTeam: home ? opp : team,
    teamScore,
    oppScore,
    homeScore: home ? teamScore : oppScore,
    awayScore: home ? oppScore : teamScore,
    winner: won ? team : opp,
    loser: won ? opp : team,
  });
}

/**
 * One log line per game, e.g. `2020-12-25  BOS @BKN   95-123`.
 */
export function formatGame(game: GameRecord): string {
  const teams = `${game.team.padStart(4)} ${((game.home ? '' : '@') + game.opp).padEnd(5)}`;
  const score = `${String(game.teamScore).padStart(3)}-${String(game.oppScore).padEnd(3)}`;
  return `${game.date}${teams}${score}`;
}

