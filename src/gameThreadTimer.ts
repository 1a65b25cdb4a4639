/**
 * GameThread Function (Timer Trigger)
 *
 * Runs every five minutes by default and creates, updates or leaves the
 * current game thread or post game thread.
 */

import { app, InvocationContext, Timer } from '@azure/functions';
import { runGameThreadBot } from './gameThreadBot';
import { createClients } from './lib/clients';
import { loadBotSettings } from './lib/settings';
import { toError } from './lib/utils/errors';
import * as logger from './lib/utils/logger';
import { getConfig } from './types/config';

async function gameThreadHandler(timer: Timer, context: InvocationContext): Promise<void> {
  const startTime = Date.now();

  logger.info('GameThread function triggered', {
    functionName: context.functionName,
    invocationId: context.invocationId,
    isPastDue: timer.isPastDue,
  });

  try {
    const settings = loadBotSettings();
    const subreddit = getConfig('SUBREDDIT', settings.team.subreddit);
    const { stats, forum } = createClients(settings);

    const result = await runGameThreadBot({ stats, forum, settings, now: new Date() }, subreddit);

    logger.info('GameThread completed', {
      status: result.status,
      action: result.action,
      gameId: result.gameId,
      durationMs: Date.now() - startTime,
    });
  } catch (err) {
    // Only configuration can fail here; a failed run resolves with status "failed"
    logger.logError('GameThread function could not start', toError(err), {
      functionName: context.functionName,
    });
  }
}

app.timer('gameThread', {
  schedule: getConfig('GAME_THREAD_SCHEDULE', '0 */5 * * * *'),
  handler: gameThreadHandler,
});
