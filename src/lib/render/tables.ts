/**
 * Markdown tables shared by the game thread and post game thread bodies
 */

import { BasicGameData, Boxscore, Player, Team, TeamDirectory } from '../../types/nba';
import { LookupTables } from '../../types/settings';
import { MalformedDataError } from '../utils/errors';

export interface TeamRosters {
  home: readonly string[];
  away: readonly string[];
}

export function teamOf(teams: TeamDirectory, teamId: string): Team {
  const team = teams.get(teamId);
  if (!team) {
    throw new MalformedDataError(`Unknown team id ${teamId}`, 'teams', [`teamId: ${teamId}`]);
  }
  return team;
}

export function subredditOf(lookups: LookupTables, nickname: string): string {
  const subreddit = lookups.subreddits[nickname];
  if (!subreddit) {
    throw new MalformedDataError(`No subreddit for team ${nickname}`, 'lookup tables', [`nickname: ${nickname}`]);
  }
  return subreddit;
}

export function locationString(arena: BasicGameData['arena']): string {
  const location = `${arena.city}, ${arena.stateAbbr}`;
  return arena.country === 'USA' ? location : `${location} ${arena.country}`;
}

/** "+7" for positive whole numbers, the raw stat otherwise */
export function plusMinus(stat: string): string {
  return /^\d+$/.test(stat) && parseInt(stat, 10) > 0 ? `+${stat}` : stat;
}

/**
 * Points for one period, or "-" for a regulation period not reached yet
 * (the feed reports those as "0"). Overtime data is always shown.
 */
export function periodPoints(
  linescore: BasicGameData['hTeam']['linescore'],
  currentPeriod: number,
  requestedPeriod: number
): string {
  const entry = linescore[requestedPeriod - 1];
  const points = entry ? entry.score : '-';
  if (points === '0' && requestedPeriod > currentPeriod && currentPeriod <= 4) {
    return '-';
  }
  return points;
}

/**
 * Points per period, at least four columns, overtime as OT1, OT2, ...
 * Returns null while no period has started.
 */
export function buildLinescore(basic: BasicGameData, teams: TeamDirectory): string | null {
  const home = basic.hTeam;
  const road = basic.vTeam;
  if (home.linescore.length !== road.linescore.length) {
    throw new MalformedDataError('Home and road line scores differ in length', 'boxscore', [
      `hTeam.linescore: ${home.linescore.length}`,
      `vTeam.linescore: ${road.linescore.length}`,
    ]);
  }

  const numPeriods = home.linescore.length;
  if (numPeriods === 0) {
    return null;
  }

  const current = basic.period.current;
  let header = '|**Team**|';
  let align = '|:---|';
  let homeLine = `|${teamOf(teams, home.teamId).fullName}|`;
  let roadLine = `|${teamOf(teams, road.teamId).fullName}|`;

  for (let period = 1; period <= Math.max(4, numPeriods); period++) {
    header += period < 5 ? `**Q${period}**|` : `**OT${period - 4}**|`;
    align += ':--:|';
    homeLine += `${periodPoints(home.linescore, current, period)}|`;
    roadLine += `${periodPoints(road.linescore, current, period)}|`;
  }

  header += '**Total**|';
  align += ':--:|';
  homeLine += `${home.score}|`;
  roadLine += `${road.score}|`;

  return `${header}\n${align}\n${roadLine}\n${homeLine}`;
}

function twoColumnTable(awayName: string, homeName: string, away: string[], home: string[]): string {
  let result = `|${awayName}|${homeName}|\n`;
  result += '|:--|:--|\n';
  for (let i = 0; i < Math.max(away.length, home.length); i++) {
    result += `|${away[i] ?? ''}|${home[i] ?? ''}|\n`;
  }
  return result;
}

/**
 * Starters per team; only starters carry a position in the boxscore
 */
export function buildStartersTable(boxscore: Boxscore, teams: TeamDirectory): string | null {
  if (!boxscore.stats) {
    return null;
  }
  const { hTeam, vTeam } = boxscore.basicGameData;
  const away: string[] = [];
  const home: string[] = [];
  for (const player of boxscore.stats.activePlayers) {
    if (player.pos) {
      const line = `${player.firstName} ${player.lastName} (${player.pos})`;
      (player.teamId === vTeam.teamId ? away : home).push(line);
    }
  }
  if (away.length + home.length === 0) {
    return null;
  }
  return twoColumnTable(teamOf(teams, vTeam.teamId).fullName, teamOf(teams, hTeam.teamId).fullName, away, home);
}

export function playerLabel(player: Player): string {
  const pos = player.pos ? ` (${player.pos.replace(/-/g, '/')})` : '';
  return `${player.firstName} ${player.lastName}${pos}`;
}

/**
 * Roster players missing from the boxscore's active players
 */
export function buildInactiveTable(
  boxscore: Boxscore,
  teams: TeamDirectory,
  rosters: TeamRosters,
  players: readonly Player[]
): string | null {
  if (!boxscore.stats) {
    return null;
  }

  const active = new Set(boxscore.stats.activePlayers.map((player) => player.personId));
  const homeInactive = new Set(rosters.home.filter((id) => !active.has(id)));
  const awayInactive = new Set(rosters.away.filter((id) => !active.has(id)));
  if (homeInactive.size + awayInactive.size === 0) {
    return null;
  }

  const home = players.filter((p) => homeInactive.has(p.personId)).map(playerLabel);
  const away = players.filter((p) => awayInactive.has(p.personId)).map(playerLabel);

  const { hTeam, vTeam } = boxscore.basicGameData;
  return twoColumnTable(teamOf(teams, vTeam.teamId).fullName, teamOf(teams, hTeam.teamId).fullName, away, home);
}

export function officialsList(basic: BasicGameData): string {
  return basic.officials.formatted.map((official) => official.firstNameLastName).join(', ');
}
