/**
 * Game thread (pre-game and live) title and body
 */

import { Boxscore, Player, TeamDirectory } from '../../types/nba';
import { FollowedTeam, LookupTables } from '../../types/settings';
import { RenderedThread } from '../../types/thread';
import { GAME_THREAD_PREFIX } from '../threads/reconciler';
import {
  TeamRosters,
  buildInactiveTable,
  buildLinescore,
  buildStartersTable,
  locationString,
  officialsList,
  subredditOf,
  teamOf,
} from './tables';
import { TIME_ZONES, formatClock, formatLongDate } from './time';

export interface GameThreadContext {
  teams: TeamDirectory;
  team: FollowedTeam;
  lookups: LookupTables;
  /** Run time; the title carries its Eastern date */
  now: Date;
  /** Needed for the inactive list; the section is skipped without them */
  rosters?: TeamRosters;
  players?: readonly Player[];
}

type Side = 'hTeam' | 'vTeam';

export function buildGameThread(boxscore: Boxscore, context: GameThreadContext): RenderedThread {
  const { teams, team, lookups, now } = context;
  const basic = boxscore.basicGameData;
  const { hTeam, vTeam } = basic;

  const [us, them, homeAwaySign]: [Side, Side, string] =
    hTeam.triCode === team.tricode ? ['hTeam', 'vTeam', 'vs'] : ['vTeam', 'hTeam', '@'];

  const broadcasters = basic.watch.broadcast.broadcasters;
  const broadcasterName = (type: 'national' | Side): string => {
    const first = broadcasters[type][0];
    if (!first) return 'N/A';
    const link = lookups.broadcasterLinks[first.longName];
    return link ? `[${first.longName}](${link})` : first.longName;
  };

  const ourTeam = teamOf(teams, basic[us].teamId);
  const otherTeam = teamOf(teams, basic[them].teamId);
  const ourRecord = `(${basic[us].win}-${basic[us].loss})`;
  const otherRecord = `(${basic[them].win}-${basic[them].loss})`;
  const otherSubreddit = subredditOf(lookups, otherTeam.nickname);

  const start = new Date(basic.startTimeUTC);
  const eastern = formatClock(start, TIME_ZONES.eastern);
  const central = formatClock(start, TIME_ZONES.central);
  const mountain = formatClock(start, TIME_ZONES.mountain);
  const pacific = formatClock(start, TIME_ZONES.pacific);

  const urlPart = `${vTeam.triCode.toLowerCase()}-vs-${hTeam.triCode.toLowerCase()}-${basic.gameId}`;
  const gameUrl = `https://www.nba.com/game/${urlPart}`;

  let body = '##### General Information\n\n';
  body += '**TIME**|**BROADCAST**|**Media**|**Location and Subreddit**|\n';
  body += ':------------|:------------------------------------|:------------------------------------|:-------------------|\n';
  body += `${eastern} Eastern   | National Broadcast: ${broadcasterName('national')}           |[Game Preview](${gameUrl})| ${locationString(basic.arena)}|\n`;
  body += `${central} Central   | ${ourTeam.nickname} Broadcast: ${broadcasterName(us)}               |[Play By Play](${gameUrl}/play-by-play)| ${basic.arena.name}|\n`;
  body += `${mountain} Mountain | ${otherTeam.nickname} Broadcast: ${broadcasterName(them)} |[Box Score](${gameUrl}/box-score#box-score)| r/${team.subreddit}|\n`;
  body += `${pacific} Pacific   | [NBA League Pass](${gameUrl}?watch)                   || r/${otherSubreddit}|\n`;

  const starters = buildStartersTable(boxscore, teams);
  if (starters !== null) {
    body += '\n##### Starting lineups\n\n';
    body += starters;
  }

  if (context.rosters && context.players) {
    const inactive = buildInactiveTable(boxscore, teams, context.rosters, context.players);
    if (inactive !== null) {
      body += '\n##### Inactive\n\n';
      body += inactive;
    }
  }

  if (basic.officials.formatted.length > 0) {
    body += '\n##### Officials\n\n';
    body += '||\n';
    body += '|:--|\n';
    body += `|${officialsList(basic)}|\n`;
  }

  const linescore = buildLinescore(basic, teams);
  if (linescore !== null) {
    body += '\n##### Score\n\n';
    body += `${linescore}\n`;
  }

  body += '\n-----\n\n';
  body += '[Reddit Stream](https://reddit-stream.com/comments/auto) ';
  body += '(You must click this link from the comment page.)\n';

  const title =
    `${GAME_THREAD_PREFIX} The ${ourTeam.fullName} ${ourRecord} ` +
    `${homeAwaySign} The ${otherTeam.fullName} ${otherRecord} - ` +
    `(${formatLongDate(now, TIME_ZONES.eastern)})`;

  return { title, body };
}
