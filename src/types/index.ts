/**
 * Core type definitions for the scoreboard
 */

// =============================================================================
// GAME TYPES
// =============================================================================

/** Points scored as [winner, loser]. */
export type Score = readonly [number, number];

/**
 * One game seen from one team's schedule.
 */
export interface GameInput {
  date: string;   // YYYY-MM-DD
  team: string;   // standard abbreviation
  opp: string;    // standard abbreviation
  home: boolean;  // team was the home side
  won: boolean;   // team won
  score: Score;
}

export interface GameRecord extends Readonly<GameInput> {
  readonly homeTeam: string;
  readonly awayTeam: string;
  readonly teamScore: number;
  readonly oppScore: number;
  readonly homeScore: number;
  readonly awayScore: number;
  readonly winner: string;
  readonly loser: string;
}

// =============================================================================
// CACHE TYPES
// =============================================================================

/** Season (year the season ends) → team → that team's schedule. */
export type GameCache = Map<number, Map<string, GameRecord[]>>;

export interface CellFailure {
  season: number;
  team: string;
  error: string;
}

export interface UpdateSummary {
  seasons: number[];
  cellsUpdated: number;
  failedCells: CellFailure[];
  gamesFetched: number;
}
