/**
 * Test data builders. Values are made up; ids only need to be consistent.
 */

import { ActivePlayer, Boxscore, Game, Player, Schedule, Team, TeamDirectory } from '../../src/types/nba';
import { BotSettings } from '../../src/types/settings';
import { ForumPost } from '../../src/types/thread';
import { loadLookupTables } from '../../src/lib/settings';

export const KNICKS_ID = '1610612752';
export const CELTICS_ID = '1610612738';
export const RAPTORS_ID = '1610612761';

export const KNICKS: Team = {
  teamId: KNICKS_ID,
  fullName: 'New York Knicks',
  nickname: 'Knicks',
  urlName: 'knicks',
  tricode: 'NYK',
  isNBAFranchise: true,
};

export const CELTICS: Team = {
  teamId: CELTICS_ID,
  fullName: 'Boston Celtics',
  nickname: 'Celtics',
  urlName: 'celtics',
  tricode: 'BOS',
  isNBAFranchise: true,
};

export const RAPTORS: Team = {
  teamId: RAPTORS_ID,
  fullName: 'Toronto Raptors',
  nickname: 'Raptors',
  urlName: 'raptors',
  tricode: 'TOR',
  isNBAFranchise: true,
};

export function teamDirectory(...teams: Team[]): TeamDirectory {
  const list = teams.length > 0 ? teams : [KNICKS, CELTICS, RAPTORS];
  return new Map(list.map((team) => [team.teamId, team]));
}

export function botSettings(overrides: Partial<BotSettings> = {}): BotSettings {
  return {
    team: { urlName: 'knicks', tricode: 'NYK', subreddit: 'NYKnicks' },
    lookups: loadLookupTables(),
    postponedGames: 0,
    recentPostsLimit: 300,
    httpTimeoutMs: 1000,
    nbaBaseUrl: 'https://data.nba.test/10s',
    ...overrides,
  };
}

/** 1-based game number keeps generated ids readable */
export function makeGame(number: number, startTime: Date, scores: [string, string] = ['', '']): Game {
  const [home, away] = scores;
  return {
    id: `00220000${String(number).padStart(2, '0')}`,
    startTime,
    startDateEastern: '20210205',
    isHomeTeam: true,
    home: { teamId: KNICKS_ID, score: home },
    away: { teamId: CELTICS_ID, score: away },
  };
}

/**
 * A schedule of `count` games a day apart, the cursor at `lastPlayedIndex`.
 * Games up to the cursor are scored 100-90.
 */
export function makeSchedule(count: number, lastPlayedIndex: number, firstStart: Date): Schedule {
  const games: Game[] = [];
  for (let i = 0; i < count; i++) {
    const start = new Date(firstStart.getTime() + i * 24 * 60 * 60 * 1000);
    games.push(makeGame(i + 1, start, i <= lastPlayedIndex ? ['100', '90'] : ['', '']));
  }
  return { games, lastPlayedIndex };
}

export function makePost(overrides: Partial<ForumPost> = {}): ForumPost {
  return {
    id: 't3_abc123',
    title: '[Game Thread] The New York Knicks (10-12) vs The Boston Celtics (11-11) - (February 05, 2021)',
    body: 'Body',
    author: 'test-bot',
    createdAt: new Date('2021-02-05T23:30:00Z'),
    isPinned: true,
    ...overrides,
  };
}

export function makeActivePlayer(overrides: Partial<ActivePlayer> = {}): ActivePlayer {
  return {
    personId: '1',
    teamId: KNICKS_ID,
    firstName: 'Test',
    lastName: 'Player',
    pos: '',
    min: '30:00',
    points: '20',
    fgm: '8',
    fga: '15',
    tpm: '2',
    tpa: '5',
    ftm: '2',
    fta: '2',
    offReb: '1',
    defReb: '4',
    totReb: '5',
    assists: '3',
    pFouls: '2',
    steals: '1',
    turnovers: '2',
    blocks: '0',
    plusMinus: '7',
    ...overrides,
  };
}

export function makePlayer(personId: string, firstName: string, lastName: string, pos = ''): Player {
  return { personId, firstName, lastName, jersey: '1', pos };
}

type TeamStats = NonNullable<Boxscore['stats']>['hTeam'];

function teamStats(points: string, leader: string): TeamStats {
  return {
    totals: {
      points,
      fgm: '40',
      fga: '85',
      fgp: '47.1',
      tpm: '12',
      tpa: '33',
      tpp: '36.4',
      ftm: '18',
      fta: '22',
      ftp: '81.8',
      offReb: '9',
      totReb: '44',
      assists: '24',
      pFouls: '19',
      steals: '7',
      turnovers: '12',
      blocks: '5',
    },
    leaders: {
      points: { value: '31', players: [{ firstName: leader, lastName: 'Scorer' }] },
      rebounds: { value: '12', players: [{ firstName: leader, lastName: 'Rebounder' }] },
      assists: { value: '9', players: [] },
    },
    biggestLead: '15',
    longestRun: '10',
    pointsInPaint: '48',
    pointsOffTurnovers: '16',
    fastBreakPoints: '11',
  };
}

interface BoxscoreOptions {
  homeScore?: string;
  roadScore?: string;
  currentPeriod?: number;
  homeLinescore?: string[];
  roadLinescore?: string[];
  withStats?: boolean;
  activePlayers?: ActivePlayer[];
}

/**
 * Knicks (home) against the Celtics, tipping off 2021-02-06T00:30Z
 * (7:30 PM Eastern on February 5)
 */
export function makeBoxscore(options: BoxscoreOptions = {}): Boxscore {
  const {
    homeScore = '110',
    roadScore = '102',
    currentPeriod = 4,
    homeLinescore = ['30', '25', '28', '27'],
    roadLinescore = ['22', '30', '24', '26'],
    withStats = true,
    activePlayers = [
      makeActivePlayer({ personId: '11', firstName: 'Home', lastName: 'Guard', pos: 'G', plusMinus: '7' }),
      makeActivePlayer({ personId: '12', firstName: 'Home', lastName: 'Bench', plusMinus: '-3' }),
      makeActivePlayer({
        personId: '21',
        teamId: CELTICS_ID,
        firstName: 'Road',
        lastName: 'Forward',
        pos: 'F',
        plusMinus: '-7',
      }),
    ],
  } = options;

  return {
    basicGameData: {
      gameId: '0022000011',
      startTimeUTC: '2021-02-06T00:30:00.000Z',
      startDateEastern: '20210205',
      attendance: '0',
      gameDuration: { hours: '2', minutes: '1' },
      period: { current: currentPeriod },
      arena: { name: 'Madison Square Garden', city: 'New York', stateAbbr: 'NY', country: 'USA' },
      watch: {
        broadcast: {
          broadcasters: {
            national: [],
            hTeam: [{ longName: 'MSG' }],
            vTeam: [{ longName: 'NBC Sports Boston' }],
          },
        },
      },
      officials: {
        formatted: [{ firstNameLastName: 'Ref One' }, { firstNameLastName: 'Ref Two' }],
      },
      hTeam: {
        teamId: KNICKS_ID,
        triCode: 'NYK',
        win: '11',
        loss: '12',
        score: homeScore,
        linescore: homeLinescore.map((score) => ({ score })),
      },
      vTeam: {
        teamId: CELTICS_ID,
        triCode: 'BOS',
        win: '11',
        loss: '12',
        score: roadScore,
        linescore: roadLinescore.map((score) => ({ score })),
      },
    },
    stats: withStats
      ? {
          activePlayers,
          hTeam: teamStats(homeScore, 'Home'),
          vTeam: teamStats(roadScore, 'Road'),
        }
      : undefined,
  };
}

/** Always returns the same roll */
export function fixedRandom(value: number): () => number {
  return () => value;
}
