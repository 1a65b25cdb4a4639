/**
 * Game thread run
 *
 * One invocation: read the schedule, decide the phase, render, reconcile.
 * Nothing is kept between runs; the caller decides how often to invoke it.
 */

import { StatsProvider } from './lib/nba/client';
import { renderThread } from './lib/render';
import { RandomSource } from './lib/render/defeatSynonyms';
import { TeamRosters, teamOf } from './lib/render/tables';
import { classifyPhase } from './lib/threads/phaseClassifier';
import { ThreadGateway, reconcileThread } from './lib/threads/reconciler';
import { toError } from './lib/utils/errors';
import * as logger from './lib/utils/logger';
import { setTag } from './lib/utils/sentry';
import { trackEvent } from './lib/utils/telemetry';
import { Boxscore, Player, TeamDirectory } from './types/nba';
import { BotSettings } from './types/settings';
import { Action, ForumPost, RunReport } from './types/thread';

/**
 * Forum reads and writes a game thread run needs
 */
export interface ThreadForum {
  me(): Promise<string>;
  recentPosts(subreddit: string, limit: number): Promise<ForumPost[]>;
  threadGateway(subreddit: string): ThreadGateway;
}

export interface GameThreadBotDeps {
  stats: StatsProvider;
  forum: ThreadForum;
  settings: BotSettings;
  now: Date;
  random?: RandomSource;
}

async function loadInactiveContext(
  stats: StatsProvider,
  boxscore: Boxscore,
  teams: TeamDirectory,
  year: number
): Promise<{ rosters?: TeamRosters; players?: Player[] }> {
  if (!boxscore.stats) {
    return {};
  }
  const { hTeam, vTeam } = boxscore.basicGameData;
  const home = await stats.roster(teamOf(teams, hTeam.teamId).urlName, year);
  const away = await stats.roster(teamOf(teams, vTeam.teamId).urlName, year);
  const players = await stats.players(year);
  return { rosters: { home, away }, players };
}

function report(result: RunReport): RunReport {
  trackEvent('gameThread.run', {
    status: result.status,
    action: result.action,
    gameId: result.gameId ?? '',
    ...(result.error && { errorMessage: result.error.message }),
  });
  return result;
}

/**
 * Runs once. Never throws: failures are logged and reported as `failed`.
 */
export async function runGameThreadBot(deps: GameThreadBotDeps, subreddit: string): Promise<RunReport> {
  const { stats, forum, settings, now } = deps;
  const random = deps.random ?? Math.random;
  let action = Action.None;
  let gameId: string | undefined;

  setTag('function', 'gameThread');
  setTag('subreddit', subreddit);

  try {
    const year = await stats.currentSeasonYear();
    const schedule = await stats.schedule(settings.team.urlName, year);
    const decision = classifyPhase(schedule, now, settings.postponedGames);

    if (decision.action === Action.None) {
      logger.info('Nothing to do. Goodbye.', { year, lastPlayedIndex: schedule.lastPlayedIndex });
      return report({ status: 'idle', action: Action.None });
    }

    action = decision.action;
    gameId = decision.game.id;
    logger.info('Phase decided', { action, gameId, startTime: decision.game.startTime.toISOString() });

    const boxscore = await stats.boxscore(decision.game.startDateEastern, decision.game.id);
    const teams = await stats.teams(year);
    const inactive =
      action === Action.GameThread ? await loadInactiveContext(stats, boxscore, teams, year) : {};

    const { title, body } = renderThread(action, boxscore, {
      teams,
      team: settings.team,
      lookups: settings.lookups,
      now,
      random,
      ...inactive,
    });

    const identity = await forum.me();
    const recentPosts = await forum.recentPosts(subreddit, settings.recentPostsLimit);
    const { outcome, post } = await reconcileThread(
      { action, title, body, recentPosts, identity, now },
      forum.threadGateway(subreddit)
    );

    return report({ status: outcome, action, gameId, title: post.title });
  } catch (err) {
    const error = toError(err);
    logger.logError('Game thread run failed', error, { subreddit, action, gameId });
    return report({ status: 'failed', action, gameId, error });
  }
}
