/**
 * Sidebar Function (Timer Trigger)
 *
 * Refreshes the sidebar schedule, standings and roster once an hour by default.
 */

import { app, InvocationContext, Timer } from '@azure/functions';
import { runSidebarBot } from './sidebarBot';
import { createClients } from './lib/clients';
import { loadBotSettings } from './lib/settings';
import { toError } from './lib/utils/errors';
import * as logger from './lib/utils/logger';
import { getConfig, getFlagConfig } from './types/config';

async function sidebarHandler(timer: Timer, context: InvocationContext): Promise<void> {
  logger.info('Sidebar function triggered', {
    functionName: context.functionName,
    invocationId: context.invocationId,
    isPastDue: timer.isPastDue,
  });

  try {
    const settings = loadBotSettings();
    const subreddit = getConfig('SUBREDDIT', settings.team.subreddit);
    const { stats, forum } = createClients(settings);

    const result = await runSidebarBot(
      { stats, forum, settings, now: new Date() },
      { subreddit, tankStandings: getFlagConfig('TANK_STANDINGS') }
    );
    logger.info('Sidebar completed', { status: result.status });
  } catch (err) {
    logger.logError('Sidebar function could not start', toError(err), {
      functionName: context.functionName,
    });
  }
}

app.timer('sidebar', {
  schedule: getConfig('SIDEBAR_SCHEDULE', '0 0 * * * *'),
  handler: sidebarHandler,
});
