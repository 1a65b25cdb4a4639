/**
 * Post game thread title and boxscore body
 */

import { ActivePlayer, BasicGameData, Boxscore, BoxscoreStats, TeamDirectory } from '../../types/nba';
import { FollowedTeam, LookupTables } from '../../types/settings';
import { RenderedThread } from '../../types/thread';
import { MalformedDataError } from '../utils/errors';
import { POST_GAME_PREFIX } from '../threads/reconciler';
import { RandomSource, defeatSynonym } from './defeatSynonyms';
import { buildLinescore, locationString, officialsList, plusMinus, subredditOf, teamOf } from './tables';
import { TIME_ZONES, formatStartTime } from './time';

export interface PostGameThreadContext {
  teams: TeamDirectory;
  team: FollowedTeam;
  lookups: LookupTables;
  random: RandomSource;
}

function finalScore(value: string, side: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new MalformedDataError(`Missing final score for ${side}`, 'boxscore', [`basicGameData.${side}.score`]);
  }
  return parsed;
}

export function overtimeSuffix(periods: number): string {
  if (periods === 5) return ' in OT';
  if (periods > 5) return ` in ${periods - 4}OTs`;
  return '';
}

export function buildPostGameTitle(basic: BasicGameData, context: PostGameThreadContext): string {
  const { teams, team, random } = context;
  const home = basic.hTeam;
  const road = basic.vTeam;
  const homeScore = finalScore(home.score, 'hTeam');
  const roadScore = finalScore(road.score, 'vTeam');

  const homeTeam = teamOf(teams, home.teamId);
  const roadTeam = teamOf(teams, road.teamId);
  const followedIsHome = homeTeam.urlName === team.urlName;
  const followedWon = followedIsHome ? homeScore > roadScore : roadScore > homeScore;
  const defeat = defeatSynonym(homeScore - roadScore, followedWon, random);

  const homeLabel = `${homeTeam.fullName} (${home.win}-${home.loss})`;
  const roadLabel = `${roadTeam.fullName} (${road.win}-${road.loss})`;
  const [winners, losers] = homeScore > roadScore ? [homeLabel, roadLabel] : [roadLabel, homeLabel];
  const score = `${Math.max(homeScore, roadScore)}-${Math.min(homeScore, roadScore)}`;

  return `${POST_GAME_PREFIX} The ${winners} ${defeat} the ${losers}${overtimeSuffix(road.linescore.length)}, ${score}`;
}

export function gameDuration(duration: BasicGameData['gameDuration']): string {
  return `${duration.hours} hours and ${duration.minutes} minutes`
    .replace(' and 0 minutes', '')
    .replace(' and 1 minutes', ' and 1 minute');
}

function teamStatsRows(stats: BoxscoreStats, roadName: string, homeName: string): string {
  const totalsRow = (name: string, side: 'hTeam' | 'vTeam'): string => {
    const t = stats[side].totals;
    return (
      `|${name}|${t.points}|${t.fgm}-${t.fga}|${t.fgp}%|${t.tpm}-${t.tpa}|${t.tpp}%|` +
      `${t.ftm}-${t.fta}|${t.ftp}%|${t.offReb}|${t.totReb}|${t.assists}|${t.pFouls}|` +
      `${t.steals}|${t.turnovers}|${t.blocks}|\n`
    );
  };
  const extrasRow = (name: string, side: 'hTeam' | 'vTeam'): string => {
    const s = stats[side];
    return `|${name}|${plusMinus(s.biggestLead)}|${s.longestRun}|${s.pointsInPaint}|${s.pointsOffTurnovers}|${s.fastBreakPoints}|\n`;
  };

  let text = '\n##### Team Stats\n\n';
  text += '|**Team**|**PTS**|**FG**|**FG%**|**3P**|**3P%**|**FT**|**FT%**|**OREB**|**TREB**|**AST**|**PF**|**STL**|**TO**|**BLK**|\n';
  text += '|:--|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|\n';
  text += totalsRow(roadName, 'vTeam');
  text += totalsRow(homeName, 'hTeam');
  text += '\n|**Team**|**Biggest Lead**|**Longest Run**|**PTS: In Paint**|**PTS: Off TOs**|**PTS: Fastbreak**|\n';
  text += '|:--|:--:|:--:|:--:|:--:|:--:|\n';
  text += extrasRow(roadName, 'vTeam');
  text += extrasRow(homeName, 'hTeam');
  return text;
}

function teamLeaderRows(stats: BoxscoreStats, roadName: string, homeName: string): string {
  const leaderRow = (name: string, side: 'hTeam' | 'vTeam'): string => {
    const { points, rebounds, assists } = stats[side].leaders;
    const cell = (leader: typeof points): string => {
      const player = leader.players[0];
      const who = player ? `${player.firstName} ${player.lastName}` : 'N/A';
      return `**${leader.value}** ${who}`;
    };
    return `|${name}|${cell(points)}|${cell(rebounds)}|${cell(assists)}|\n`;
  };

  let text = '\n##### Team Leaders\n\n';
  text += '|**Team**|**Points**|**Rebounds**|**Assists**|\n';
  text += '|:--|:--|:--|:--|\n';
  text += leaderRow(roadName, 'vTeam');
  text += leaderRow(homeName, 'hTeam');
  return text;
}

function playerStatHeader(nickname: string): string {
  return (
    `\n**${nickname.toUpperCase()}**|**MIN**|**FGM-A**|**3PM-A**|**FTM-A**` +
    '|**ORB**|**DRB**|**REB**|**AST**|**STL**|**BLK**|**TO**|**PF**|**+/-**|**PTS**|\n' +
    '|:--|:--|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|:--:|\n'
  );
}

export function playerStatRow(p: ActivePlayer): string {
  const position = p.pos ? `^${p.pos}` : '';
  return (
    `|${p.firstName} ${p.lastName}${position}|${p.min}|${p.fgm}-${p.fga}|${p.tpm}-${p.tpa}|` +
    `${p.ftm}-${p.fta}|${p.offReb}|${p.defReb}|${p.totReb}|${p.assists}|${p.steals}|` +
    `${p.blocks}|${p.turnovers}|${p.pFouls}|${plusMinus(p.plusMinus)}|${p.points}|\n`
  );
}

export function buildPostGameBody(boxscore: Boxscore, context: PostGameThreadContext): string {
  const { teams, team, lookups } = context;
  const basic = boxscore.basicGameData;
  const stats = boxscore.stats;
  if (!stats) {
    throw new MalformedDataError('Boxscore has no statistics for a finished game', 'boxscore', ['stats']);
  }

  const home = basic.hTeam;
  const road = basic.vTeam;
  const homeTeam = teamOf(teams, home.teamId);
  const roadTeam = teamOf(teams, road.teamId);
  const homeSubreddit = subredditOf(lookups, homeTeam.nickname);
  const roadSubreddit = subredditOf(lookups, roadTeam.nickname);
  const yahooCode = lookups.yahooCodes[home.triCode];
  if (yahooCode === undefined) {
    throw new MalformedDataError(`No Yahoo code for ${home.triCode}`, 'lookup tables', [`tricode: ${home.triCode}`]);
  }

  const start = new Date(basic.startTimeUTC);
  const slug = (name: string): string => name.toLowerCase().replace(/ /g, '-');
  const nbaUrl = `https://www.nba.com/game/${road.triCode}-vs-${home.triCode}-${basic.gameId}`;
  const yahooUrl =
    `http://sports.yahoo.com/nba/${slug(roadTeam.fullName)}-${slug(homeTeam.fullName)}-` +
    `${basic.startDateEastern}${yahooCode}`;
  const threadalyticsUrl =
    `https://threadalytics.com/teams/${team.tricode}/games/` +
    `${home.triCode}@${road.triCode}-${Math.floor(start.getTime() / 1000)}`;
  const attendance = basic.attendance !== '0' ? basic.attendance : 'No in-person attendance';

  let body = '##### Game Summary\n\n';
  body += '|||\n';
  body += '|:--|:--|\n';
  body += `|**Score**|[${roadTeam.fullName}](/r/${roadSubreddit}) **${road.score} -  ${home.score}** [${homeTeam.fullName}](/r/${homeSubreddit})|\n`;
  body += `|**Data**|[NBA](${nbaUrl}), [Yahoo](${yahooUrl}), [Threadalytics](${threadalyticsUrl})|\n`;
  body += `|**Location**|${locationString(basic.arena)}|\n`;
  body += `|**Arena**|${basic.arena.name}|\n`;
  body += `|**Attendance**|${attendance}|\n`;
  body += `|**Start Time**|${formatStartTime(start, TIME_ZONES.eastern)}|\n`;
  body += `|**Game Duration**|${gameDuration(basic.gameDuration)}|\n`;
  body += `|**Officials**|${officialsList(basic)}|\n`;

  const linescore = buildLinescore(basic, teams);
  if (linescore !== null) {
    body += '\n##### Line Score\n';
    body += `\n${linescore}\n`;
  }

  body += teamStatsRows(stats, roadTeam.fullName, homeTeam.fullName);
  body += teamLeaderRows(stats, roadTeam.fullName, homeTeam.fullName);

  let away = playerStatHeader(roadTeam.nickname);
  let homePlayers = playerStatHeader(homeTeam.nickname);
  for (const player of stats.activePlayers) {
    if (player.teamId === road.teamId) {
      away += playerStatRow(player);
    } else {
      homePlayers += playerStatRow(player);
    }
  }
  body += '\n##### Player Stats\n';
  body += away;
  body += homePlayers;

  return body;
}

export function buildPostGameThread(boxscore: Boxscore, context: PostGameThreadContext): RenderedThread {
  return {
    title: buildPostGameTitle(boxscore.basicGameData, context),
    body: buildPostGameBody(boxscore, context),
  };
}
