/**
 * Sidebar sections: roster, schedule window and standings
 */

import { Game, Player, Schedule, StandingsRow, TeamDirectory } from '../../types/nba';
import { FollowedTeam, LookupTables } from '../../types/settings';
import { subredditOf, teamOf } from '../render/tables';
import { TIME_ZONES, calendarDay, formatShortClock, formatShortDate, shiftDay } from '../render/time';

/** Games after the cursor shown in the schedule window, cursor included */
const UPCOMING_GAMES = 7;
/** Games before the cursor, grown near the end of the season */
const PRIOR_GAMES = 4;
/** Rows in the tank standings */
const TANK_ROWS = 10;

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function buildRoster(roster: readonly string[], players: readonly Player[]): string {
  const onRoster = new Set(roster);
  const rows = players
    .filter((player) => onRoster.has(player.personId))
    .map((player) => {
      const position = player.pos ? player.pos.replace(/-/g, '/') : '';
      return { name: `${player.firstName} ${player.lastName}`, line: `${player.jersey}|${player.firstName} ${player.lastName}|${position}` };
    })
    .sort((a, b) => byText(a.name, b.name))
    .map((row) => row.line);

  return ['No.|Name|Position', ':--:|:--|:--:', ...rows].join('\n');
}

export function winLoss(ourScore: string, theirScore: string): string {
  const ours = parseInt(ourScore, 10);
  const theirs = parseInt(theirScore, 10);
  return ours > theirs ? `W ${ours}-${theirs}` : `L ${theirs}-${ours}`;
}

/**
 * Start and end (exclusive) of the 12-game window around the cursor
 */
export function scheduleWindow(lastPlayedIndex: number, gameCount: number): [number, number] {
  const end = Math.min(lastPlayedIndex + UPCOMING_GAMES, gameCount);
  const missingUpcoming = UPCOMING_GAMES - (end - lastPlayedIndex - 1);
  const start = Math.max(0, lastPlayedIndex - (PRIOR_GAMES + missingUpcoming));
  return [start, end];
}

function dayLabel(game: Game, today: string): string {
  const day = calendarDay(game.startTime, TIME_ZONES.eastern);
  if (day === today) return 'Today';
  if (day === shiftDay(today, -1)) return 'Yesterday';
  if (day === shiftDay(today, 1)) return 'Tomorrow';
  return formatShortDate(game.startTime, TIME_ZONES.eastern);
}

export function buildSchedule(
  schedule: Schedule,
  now: Date,
  teams: TeamDirectory,
  team: FollowedTeam,
  lookups: LookupTables
): string {
  const today = calendarDay(now, TIME_ZONES.eastern);
  const [start, end] = scheduleWindow(schedule.lastPlayedIndex, schedule.games.length);

  const rows = ['Date|Team|Loc|Time/Outcome', ':--:|:--:|:--:|:--:'];
  for (const game of schedule.games.slice(start, end)) {
    const isHome = game.isHomeTeam ?? teamOf(teams, game.home.teamId).urlName === team.urlName;
    const ours = isHome ? game.home : game.away;
    const theirs = isHome ? game.away : game.home;
    const opponent = teamOf(teams, theirs.teamId);
    const timeOrScore = ours.score === ''
      ? formatShortClock(game.startTime, TIME_ZONES.eastern)
      : winLoss(ours.score, theirs.score);

    rows.push(
      `${dayLabel(game, today)}|[](/r/${subredditOf(lookups, opponent.nickname)})|${isHome ? 'Home' : 'Away'}|${timeOrScore}`
    );
  }
  return rows.join('\n');
}

export function printStandings(
  standings: readonly StandingsRow[],
  teams: TeamDirectory,
  lookups: LookupTables
): string {
  const rows = [' | | |Record|GB', ':--:|:--:|:--|:--:|:--:'];
  standings.forEach((row, i) => {
    const nickname = teamOf(teams, row.teamId).nickname;
    const gamesBehind = row.gamesBehind === '0' ? '-' : row.gamesBehind;
    rows.push(`${i + 1}|[](/r/${subredditOf(lookups, nickname)})|${nickname}|${row.win}-${row.loss}|${gamesBehind}`);
  });
  return rows.join('\n');
}

/**
 * Race to the bottom: both conferences by loss percentage, games behind the
 * worst team
 */
export function tankStandings(east: readonly StandingsRow[], west: readonly StandingsRow[]): StandingsRow[] {
  const rows = [...east, ...west].sort((a, b) => parseFloat(b.lossPct) - parseFloat(a.lossPct));
  if (rows.length === 0) {
    return [];
  }
  const worstWins = parseInt(rows[0].win, 10);
  const worstLosses = parseInt(rows[0].loss, 10);
  return rows.slice(0, TANK_ROWS).map((row) => {
    const behind =
      (Math.abs(worstWins - parseInt(row.win, 10)) + Math.abs(worstLosses - parseInt(row.loss, 10))) / 2;
    return { ...row, gamesBehind: behind.toFixed(1).replace('.0', '') };
  });
}

/**
 * Replaces the text between [](#Start<marker>) and [](#End<marker>).
 * The description is returned untouched when either marker is missing.
 */
export function replaceMarkedSection(description: string, text: string, marker: string): string {
  const startMarker = `[](#Start${marker})`;
  const endMarker = `[](#End${marker})`;
  const start = description.indexOf(startMarker);
  const end = description.indexOf(endMarker);
  if (start === -1 || end === -1) {
    return description;
  }
  return (
    description.slice(0, start) +
    `${startMarker}\n\n${text}\n\n${endMarker}` +
    description.slice(end + endMarker.length)
  );
}
