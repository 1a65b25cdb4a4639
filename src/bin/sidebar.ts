#!/usr/bin/env node
/**
 * sidebar-bot <subreddit> [-t|--tank_standings yes|no]
 */

import { parseArgs } from 'node:util';
import { runSidebarBot } from '../sidebarBot';
import { createClients } from '../lib/clients';
import { loadBotSettings } from '../lib/settings';
import { getFlagConfig, isTruthy } from '../types/config';
import { asUsage, runCli, UsageError } from './runCli';

const USAGE = 'Usage: sidebar-bot <subreddit> [-t|--tank_standings yes|no]';

function parseCommandLine(argv: string[]): { subreddit: string; tankStandings: boolean } {
  const parsed = asUsage(() =>
    parseArgs({
      args: argv,
      allowPositionals: true,
      options: { tank_standings: { type: 'string', short: 't' } },
    })
  );

  const [subreddit, ...extra] = parsed.positionals;
  if (!subreddit || extra.length > 0) {
    throw new UsageError('Expected exactly one subreddit');
  }
  const flag = parsed.values.tank_standings;
  return {
    subreddit,
    tankStandings: flag === undefined ? getFlagConfig('TANK_STANDINGS') : isTruthy(flag),
  };
}

void runCli(USAGE, async () => {
  const { subreddit, tankStandings } = parseCommandLine(process.argv.slice(2));
  const settings = loadBotSettings();
  const { stats, forum } = createClients(settings);
  return runSidebarBot({ stats, forum, settings, now: new Date() }, { subreddit, tankStandings });
});
