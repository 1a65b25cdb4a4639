/**
 * Builds BotSettings from the environment and the bundled lookup tables
 */

import { z } from 'zod';
import teamData from '../data/teams.json';
import { getConfig, getIntConfig } from '../types/config';
import { BotSettings, LookupTables } from '../types/settings';
import { parseFeed } from './utils/validation';

const lookupTablesSchema = z.object({
  subreddits: z.record(z.string()),
  yahooCodes: z.record(z.string()),
  broadcasterLinks: z.record(z.string()),
});

export function loadLookupTables(): LookupTables {
  const tables = parseFeed(lookupTablesSchema, teamData, 'team lookup tables');
  return Object.freeze({
    subreddits: Object.freeze(tables.subreddits),
    yahooCodes: Object.freeze(tables.yahooCodes),
    broadcasterLinks: Object.freeze(tables.broadcasterLinks),
  });
}

export function loadBotSettings(): BotSettings {
  return Object.freeze({
    team: Object.freeze({
      urlName: getConfig('TEAM_URL_NAME', 'knicks'),
      tricode: getConfig('TEAM_TRICODE', 'NYK'),
      subreddit: getConfig('TEAM_SUBREDDIT', 'NYKnicks'),
    }),
    lookups: loadLookupTables(),
    postponedGames: getIntConfig('POSTPONED_GAMES', 0),
    recentPostsLimit: getIntConfig('RECENT_POSTS_LIMIT', 300),
    httpTimeoutMs: getIntConfig('HTTP_TIMEOUT_MS', 10000),
    nbaBaseUrl: getConfig('NBA_DATA_BASE_URL', 'https://data.nba.net/10s'),
  });
}
