/**
 * Shapes read from the NBA data feed and the domain values built from them
 */

import { z } from 'zod';
import {
  activePlayerSchema,
  basicGameDataSchema,
  boxscoreSchema,
  boxscoreStatsSchema,
  playerSchema,
  scheduleGameSchema,
  teamSchema,
} from '../lib/nba/schemas';

export type ScheduleGameFeed = z.infer<typeof scheduleGameSchema>;
export type Boxscore = z.infer<typeof boxscoreSchema>;
export type BasicGameData = z.infer<typeof basicGameDataSchema>;
export type BoxscoreStats = z.infer<typeof boxscoreStatsSchema>;
export type ActivePlayer = z.infer<typeof activePlayerSchema>;
export type Team = z.infer<typeof teamSchema>;
export type Player = z.infer<typeof playerSchema>;

/**
 * One side of a scheduled game
 */
export interface GameSide {
  teamId: string;
  /** Empty until the provider reports a score */
  score: string;
}

/**
 * A game in the followed team's season schedule
 */
export interface Game {
  id: string;
  startTime: Date;
  /** Provider date key, YYYYMMDD in US Eastern time */
  startDateEastern: string;
  isHomeTeam?: boolean;
  home: GameSide;
  away: GameSide;
}

/**
 * A season schedule plus the provider's cursor to the last completed game
 */
export interface Schedule {
  games: Game[];
  lastPlayedIndex: number;
}

/**
 * Team directory keyed by teamId
 */
export type TeamDirectory = ReadonlyMap<string, Team>;

export interface StandingsRow {
  teamId: string;
  win: string;
  loss: string;
  gamesBehind: string;
  lossPct: string;
}

export interface ConferenceStandings {
  east: StandingsRow[];
  west: StandingsRow[];
}
