/**
 * Wires the live NBA and Reddit clients from configuration
 */

import { getConfig, validateConfig } from '../types/config';
import { BotSettings } from '../types/settings';
import { NbaService } from './nba/client';
import { RedditClient } from './reddit/client';

export const DEFAULT_BOT_ACCOUNT = 'nyknicks-automod';

export interface LiveClients {
  stats: NbaService;
  forum: RedditClient;
}

/**
 * @param username - Reddit account to run as; REDDIT_USERNAME when omitted
 * @throws Error when Reddit credentials are missing
 */
export function createClients(settings: BotSettings, username?: string): LiveClients {
  validateConfig();

  return {
    stats: new NbaService({ baseUrl: settings.nbaBaseUrl, timeoutMs: settings.httpTimeoutMs }),
    forum: new RedditClient(
      {
        clientId: getConfig('REDDIT_CLIENT_ID'),
        clientSecret: getConfig('REDDIT_CLIENT_SECRET'),
        username: username ?? getConfig('REDDIT_USERNAME', DEFAULT_BOT_ACCOUNT),
        password: getConfig('REDDIT_PASSWORD'),
        userAgent: getConfig('REDDIT_USER_AGENT', 'game-thread-bot/1.0'),
      },
      settings.httpTimeoutMs
    ),
  };
}
