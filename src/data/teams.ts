/**
 * NBA Team Alias Table
 *
 * 30 franchises with the standard abbreviation used as the cache key,
 * plus the abbreviation and display name ESPN uses on schedule pages.
 */

import { UnresolvableTeamError } from '../core/errors.js';
import { extractOne } from '../utils/similarity.js';

// =============================================================================
// TYPES
// =============================================================================

export interface TeamAlias {
  abbreviation: string;        // standard, e.g. GSW
  sourceAbbreviation: string;  // ESPN URL slug, e.g. gs
  sourceName: string;          // ESPN display name, e.g. Golden State
}

// =============================================================================
// NBA TEAMS (30)
// =============================================================================

export const TEAM_ALIASES: readonly TeamAlias[] = [
  { abbreviation: 'ATL', sourceAbbreviation: 'atl', sourceName: 'Atlanta' },
  { abbreviation: 'BKN', sourceAbbreviation: 'bkn', sourceName: 'Brooklyn' },
  { abbreviation: 'BOS', sourceAbbreviation: 'bos', sourceName: 'Boston' },
  { abbreviation: 'CHA', sourceAbbreviation: 'cha', sourceName: 'Charlotte' },
  { abbreviation: 'CHI', sourceAbbreviation: 'chi', sourceName: 'Chicago' },
  { abbreviation: 'CLE', sourceAbbreviation: 'cle', sourceName: 'Cleveland' },
  { abbreviation: 'DAL', sourceAbbreviation: 'dal', sourceName: 'Dallas' },
  { abbreviation: 'DEN', sourceAbbreviation: 'den', sourceName: 'Denver' },
  { abbreviation: 'DET', sourceAbbreviation: 'det', sourceName: 'Detroit' },
  { abbreviation: 'GSW', sourceAbbreviation: 'gs', sourceName: 'Golden State' },
  { abbreviation: 'HOU', sourceAbbreviation: 'hou', sourceName: 'Houston' },
  { abbreviation: 'IND', sourceAbbreviation: 'ind', sourceName: 'Indiana' },
  { abbreviation: 'LAC', sourceAbbreviation: 'lac', sourceName: 'LA' },
  { abbreviation: 'LAL', sourceAbbreviation: 'lal', sourceName: 'Los Angeles' },
  { abbreviation: 'MEM', sourceAbbreviation: 'mem', sourceName: 'Memphis' },
  { abbreviation: 'MIA', sourceAbbreviation: 'mia', sourceName: 'Miami' },
  { abbreviation: 'MIL', sourceAbbreviation: 'mil', sourceName: 'Milwaukee' },
  { abbreviation: 'MIN', sourceAbbreviation: 'min', sourceName: 'Minnesota' },
  { abbreviation: 'NOP', sourceAbbreviation: 'no', sourceName: 'New Orleans' },
  { abbreviation: 'NYK', sourceAbbreviation: 'ny', sourceName: 'New York' },
  { abbreviation: 'OKC', sourceAbbreviation: 'okc', sourceName: 'Oklahoma City' },
  { abbreviation: 'ORL', sourceAbbreviation: 'orl', sourceName: 'Orlando' },
  { abbreviation: 'PHI', sourceAbbreviation: 'phi', sourceName: 'Philadelphia' },
  { abbreviation: 'PHX', sourceAbbreviation: 'phx', sourceName: 'Phoenix' },
  { abbreviation: 'POR', sourceAbbreviation: 'por', sourceName: 'Portland' },
  { abbreviation: 'SAC', sourceAbbreviation: 'sac', sourceName: 'Sacramento' },
  { abbreviation: 'SAS', sourceAbbreviation: 'sa', sourceName: 'San Antonio' },
  { abbreviation: 'TOR', sourceAbbreviation: 'tor', sourceName: 'Toronto' },
  { abbreviation: 'UTA', sourceAbbreviation: 'utah', sourceName: 'Utah' },
  { abbreviation: 'WAS', sourceAbbreviation: 'wsh', sourceName: 'Washington' },
];

export const TEAMS: readonly string[] = TEAM_ALIASES.map(t => t.abbreviation);

// Every alias of every team, in table order
const CANDIDATES: readonly string[] = TEAM_ALIASES.flatMap(t => [
  t.abbreviation,
  t.sourceAbbreviation,
  t.sourceName,
]);

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Map any team name variant to the standard abbreviation,
 * or to ESPN's abbreviation when `useSourceAlias` is set.
 *
 * @throws UnresolvableTeamError when nothing in the table resembles `name`
 */
export function resolveTeam(name: string, useSourceAlias = false): string {
  const best = extractOne(name, CANDIDATES);
  if (!best || best.score <= 0) {
    throw new UnresolvableTeamError(name);
  }

  const team = TEAM_ALIASES.find(
    t =>
      t.abbreviation === best.candidate ||
      t.sourceAbbreviation === best.candidate ||
      t.sourceName === best.candidate
  );
  if (!team) {
    throw new UnresolvableTeamError(name);
  }

  return useSourceAlias ? team.sourceAbbreviation : team.abbreviation;
}

export function isKnownTeam(abbreviation: string): boolean {
  return TEAMS.includes(abbreviation);
}
