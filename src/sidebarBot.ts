/**
 * Sidebar run
 *
 * Rebuilds the schedule, standings and roster sections of the subreddit
 * sidebar and saves it only when something changed.
 */

import { StatsProvider } from './lib/nba/client';
import {
  buildRoster,
  buildSchedule,
  printStandings,
  replaceMarkedSection,
  tankStandings,
} from './lib/sidebar/builders';
import { toError } from './lib/utils/errors';
import * as logger from './lib/utils/logger';
import { setTag } from './lib/utils/sentry';
import { trackEvent } from './lib/utils/telemetry';
import { BotSettings } from './types/settings';

export const SIDEBAR_PAGE = 'config/sidebar';

export interface SidebarForum {
  readWikiPage(subreddit: string, page: string): Promise<string>;
  editWikiPage(subreddit: string, page: string, content: string, reason: string): Promise<void>;
}

export interface SidebarBotDeps {
  stats: StatsProvider;
  forum: SidebarForum;
  settings: BotSettings;
  now: Date;
}

export interface SidebarOptions {
  subreddit: string;
  /** Show the race to the bottom instead of the Eastern Conference */
  tankStandings: boolean;
}

export interface SidebarReport {
  status: 'updated' | 'unchanged' | 'failed';
  error?: Error;
}

function report(result: SidebarReport): SidebarReport {
  trackEvent('sidebar.run', {
    status: result.status,
    ...(result.error && { errorMessage: result.error.message }),
  });
  return result;
}

/**
 * Runs once. Never throws: failures are logged and reported as `failed`.
 */
export async function runSidebarBot(deps: SidebarBotDeps, options: SidebarOptions): Promise<SidebarReport> {
  const { stats, forum, settings, now } = deps;
  const { subreddit } = options;
  setTag('function', 'sidebar');
  setTag('subreddit', subreddit);

  try {
    const year = await stats.currentSeasonYear();
    const teams = await stats.teams(year);

    logger.info('Building roster text.', { year });
    const roster = buildRoster(await stats.roster(settings.team.urlName, year), await stats.players(year));

    logger.info('Building schedule text.');
    const season = await stats.schedule(settings.team.urlName, year);
    const schedule = buildSchedule(
      { ...season, lastPlayedIndex: season.lastPlayedIndex + settings.postponedGames },
      now,
      teams,
      settings.team,
      settings.lookups
    );

    logger.info(options.tankStandings ? 'Building tank standings text.' : 'Building standings text.');
    const conferences = await stats.conferenceStandings();
    const rows = options.tankStandings ? tankStandings(conferences.east, conferences.west) : conferences.east;
    const standings = printStandings(rows, teams, settings.lookups);

    logger.info('Reading sidebar.', { subreddit });
    const description = await forum.readWikiPage(subreddit, SIDEBAR_PAGE);
    let updated = replaceMarkedSection(description, schedule, 'Schedule');
    updated = replaceMarkedSection(updated, standings, 'Standings');
    updated = replaceMarkedSection(updated, roster, 'Roster');

    if (updated === description) {
      logger.info('No changes.', { subreddit });
      return report({ status: 'unchanged' });
    }

    logger.info('Updating sidebar.', { subreddit });
    await forum.editWikiPage(subreddit, SIDEBAR_PAGE, updated, 'Schedule, standings and roster update');
    return report({ status: 'updated' });
  } catch (err) {
    const error = toError(err);
    logger.logError('Sidebar run failed', error, { subreddit });
    return report({ status: 'failed', error });
  }
}
