/**
 * Unit tests for the game thread run
 */

import { runGameThreadBot } from '../../src/gameThreadBot';
import { DataFetchError, IndexOutOfRangeError } from '../../src/lib/utils/errors';
import { Schedule } from '../../src/types/nba';
import { Action } from '../../src/types/thread';
import { FakeStats } from '../helpers/fakeStats';
import { botSettings, fixedRandom, makeBoxscore, makeGame, makeSchedule } from '../helpers/fixtures';
import { InMemoryForum } from '../helpers/inMemoryForum';

const HOUR = 60 * 60 * 1000;
// 30 minutes before the fixture boxscore's tip-off
const NOW = new Date('2021-02-06T00:00:00Z');

/** Cursor at 10; game 12 (index 11) starts at `nextStart` */
function scheduleWithNext(nextStart: Date, lastResult: [string, string] = ['100', '90']): Schedule {
  const schedule = makeSchedule(20, 10, new Date('2021-01-01T00:30:00Z'));
  schedule.games[10] = makeGame(11, new Date(NOW.getTime() - 2 * 24 * HOUR), lastResult);
  schedule.games[11] = makeGame(12, nextStart);
  return schedule;
}

describe('runGameThreadBot', () => {
  let forum: InMemoryForum;

  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
    forum = new InMemoryForum('test-bot', () => NOW);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should do nothing between games', async () => {
    const stats = new FakeStats(scheduleWithNext(new Date(NOW.getTime() + 5 * HOUR)));

    const report = await runGameThreadBot({ stats, forum, settings: botSettings(), now: NOW }, 'NYKnicks');

    expect(report).toEqual({ status: 'idle', action: Action.None });
    expect(stats.requests).toEqual(['today', 'schedule knicks 2020']);
    expect(forum.calls).toEqual([]);
  });

  it('should create the game thread and then leave it unchanged', async () => {
    const stats = new FakeStats(scheduleWithNext(new Date(NOW.getTime() + 30 * 60 * 1000)));
    stats.boxscoreData = makeBoxscore({ withStats: false, currentPeriod: 0, homeLinescore: [], roadLinescore: [] });
    const deps = { stats, forum, settings: botSettings(), now: NOW };

    const first = await runGameThreadBot(deps, 'NYKnicks');
    const second = await runGameThreadBot(deps, 'NYKnicks');

    expect(first).toEqual({
      status: 'created',
      action: Action.GameThread,
      gameId: '0022000012',
      title: '[Game Thread] The New York Knicks (11-12) vs The Boston Celtics (11-12) - (February 05, 2021)',
    });
    expect(second.status).toBe('unchanged');
    expect(forum.posts).toHaveLength(1);
    expect(forum.posts[0].isPinned).toBe(true);
    expect(stats.requests).toContain('boxscore 20210205 0022000012');
    expect(stats.requests).not.toContain('players 2020');
  });

  it('should load rosters for the inactive list once the boxscore has stats', async () => {
    const stats = new FakeStats(scheduleWithNext(new Date(NOW.getTime() + 30 * 60 * 1000)));

    const report = await runGameThreadBot({ stats, forum, settings: botSettings(), now: NOW }, 'NYKnicks');

    expect(report.status).toBe('created');
    expect(stats.requests.slice(-4)).toEqual(['teams 2020', 'roster knicks 2020', 'roster celtics 2020', 'players 2020']);
  });

  it('should update the post game thread as the boxscore changes', async () => {
    const schedule = makeSchedule(20, 10, new Date('2021-01-01T00:30:00Z'));
    schedule.games[10] = makeGame(11, new Date(NOW.getTime() - 2 * HOUR), ['110', '102']);
    schedule.games[11] = makeGame(12, new Date(NOW.getTime() + 2 * 24 * HOUR));
    const stats = new FakeStats(schedule);
    const deps = { stats, forum, settings: botSettings(), now: NOW, random: fixedRandom(0) };

    const first = await runGameThreadBot(deps, 'NYKnicks');
    stats.boxscoreData = makeBoxscore({ activePlayers: [] });
    const second = await runGameThreadBot(deps, 'NYKnicks');

    expect(first.status).toBe('created');
    expect(first.title).toBe(
      '[Post Game Thread] The New York Knicks (11-12) defeat the Boston Celtics (11-12), 110-102'
    );
    expect(second.status).toBe('updated');
    expect(forum.calls).toEqual(['createPost t3_1', 'pinPost t3_1', 'editPost t3_1']);
  });

  it('should apply the postponed games offset', async () => {
    const schedule = makeSchedule(20, 9, new Date('2021-01-01T00:30:00Z'));
    schedule.games[11] = makeGame(12, new Date(NOW.getTime() + 30 * 60 * 1000));
    const stats = new FakeStats(schedule);

    const report = await runGameThreadBot(
      { stats, forum, settings: botSettings({ postponedGames: 1 }), now: NOW },
      'NYKnicks'
    );

    expect(report.action).toBe(Action.GameThread);
    expect(report.gameId).toBe('0022000012');
  });

  it('should report a failed run instead of throwing', async () => {
    const stats = new FakeStats(scheduleWithNext(new Date(NOW.getTime() + 30 * 60 * 1000)));
    const failure = new DataFetchError('nba request failed: 503 - down', 'nba', 'https://data.nba.test');
    stats.failure = failure;

    const report = await runGameThreadBot({ stats, forum, settings: botSettings(), now: NOW }, 'NYKnicks');

    expect(report).toEqual({ status: 'failed', action: Action.None, gameId: undefined, error: failure });
  });

  it('should fail when the cursor is out of range', async () => {
    const stats = new FakeStats(makeSchedule(5, 4, new Date('2021-01-01T00:30:00Z')));

    const report = await runGameThreadBot(
      { stats, forum, settings: botSettings({ postponedGames: 1 }), now: NOW },
      'NYKnicks'
    );

    expect(report.status).toBe('failed');
    expect(report.error).toBeInstanceOf(IndexOutOfRangeError);
  });
});
