#!/usr/bin/env node
/**
 * game-thread-bot <subreddit> [-u|--user <account>]
 */

import { parseArgs } from 'node:util';
import { runGameThreadBot } from '../gameThreadBot';
import { createClients } from '../lib/clients';
import { loadBotSettings } from '../lib/settings';
import { asUsage, runCli, UsageError } from './runCli';

const USAGE = 'Usage: game-thread-bot <subreddit> [-u|--user <account>]';

function parseCommandLine(argv: string[]): { subreddit: string; user?: string } {
  const parsed = asUsage(() =>
    parseArgs({
      args: argv,
      allowPositionals: true,
      options: { user: { type: 'string', short: 'u' } },
    })
  );

  const [subreddit, ...extra] = parsed.positionals;
  if (!subreddit || extra.length > 0) {
    throw new UsageError('Expected exactly one subreddit');
  }
  return { subreddit, user: parsed.values.user };
}

void runCli(USAGE, async () => {
  const { subreddit, user } = parseCommandLine(process.argv.slice(2));
  const settings = loadBotSettings();
  const { stats, forum } = createClients(settings, user);
  return runGameThreadBot({ stats, forum, settings, now: new Date() }, subreddit);
});
