/**
 * NBA data feed client
 */

import { fetchJson } from '../http/fetchJson';
import * as logger from '../utils/logger';
import { parseFeed } from '../utils/validation';
import {
  boxscoreSchema,
  playersSchema,
  rosterSchema,
  scheduleSchema,
  standingsSchema,
  teamsSchema,
  todaySchema,
} from './schemas';
import {
  Boxscore,
  ConferenceStandings,
  Game,
  Player,
  Schedule,
  ScheduleGameFeed,
  TeamDirectory,
} from '../../types/nba';

/**
 * Everything the bots read from the statistics provider
 */
export interface StatsProvider {
  currentSeasonYear(): Promise<number>;
  schedule(teamUrlName: string, year: number): Promise<Schedule>;
  boxscore(startDateEastern: string, gameId: string): Promise<Boxscore>;
  teams(year: number): Promise<TeamDirectory>;
  /** Person ids on a team's roster */
  roster(teamUrlName: string, year: number): Promise<string[]>;
  players(year: number): Promise<Player[]>;
  conferenceStandings(): Promise<ConferenceStandings>;
}

export interface NbaServiceOptions {
  baseUrl: string;
  timeoutMs: number;
}

export function toGame(feed: ScheduleGameFeed): Game {
  return {
    id: feed.gameId,
    startTime: new Date(feed.startTimeUTC),
    startDateEastern: feed.startDateEastern,
    isHomeTeam: feed.isHomeTeam,
    home: { teamId: feed.hTeam.teamId, score: feed.hTeam.score },
    away: { teamId: feed.vTeam.teamId, score: feed.vTeam.score },
  };
}

export class NbaService implements StatsProvider {
  private readonly baseUrl: string;

  constructor(private readonly options: NbaServiceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  private get(path: string): Promise<unknown> {
    return fetchJson({
      service: 'nba',
      url: `${this.baseUrl}${path}`,
      timeoutMs: this.options.timeoutMs,
    });
  }

  async currentSeasonYear(): Promise<number> {
    const today = parseFeed(todaySchema, await this.get('/prod/v1/today.json'), 'today');
    return today.seasonScheduleYear;
  }

  async schedule(teamUrlName: string, year: number): Promise<Schedule> {
    const payload = await this.get(`/prod/v1/${year}/teams/${teamUrlName}/schedule.json`);
    const { league } = parseFeed(scheduleSchema, payload, 'schedule');
    logger.debug('Fetched schedule', {
      teamUrlName,
      year,
      games: league.standard.length,
      lastPlayedIndex: league.lastStandardGamePlayedIndex,
    });
    return {
      games: league.standard.map(toGame),
      lastPlayedIndex: league.lastStandardGamePlayedIndex,
    };
  }

  async boxscore(startDateEastern: string, gameId: string): Promise<Boxscore> {
    const payload = await this.get(`/prod/v1/${startDateEastern}/${gameId}_boxscore.json`);
    return parseFeed(boxscoreSchema, payload, 'boxscore');
  }

  async teams(year: number): Promise<TeamDirectory> {
    const { league } = parseFeed(teamsSchema, await this.get(`/prod/v2/${year}/teams.json`), 'teams');
    return new Map(league.standard.map((team) => [team.teamId, team]));
  }

  async roster(teamUrlName: string, year: number): Promise<string[]> {
    const payload = await this.get(`/prod/v1/${year}/teams/${teamUrlName}/roster.json`);
    const { league } = parseFeed(rosterSchema, payload, 'roster');
    return league.standard.players.map((player) => player.personId);
  }

  async players(year: number): Promise<Player[]> {
    const { league } = parseFeed(playersSchema, await this.get(`/prod/v1/${year}/players.json`), 'players');
    return league.standard;
  }

  async conferenceStandings(): Promise<ConferenceStandings> {
    const payload = await this.get('/prod/v1/current/standings_conference.json');
    return parseFeed(standingsSchema, payload, 'standings').league.standard.conference;
  }
}
