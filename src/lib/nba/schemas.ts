/**
 * Zod schemas for the NBA data feed
 *
 * Only the fields the bots read are declared; everything else in the payloads
 * is stripped. A payload that fails these schemas aborts the run with a
 * MalformedDataError.
 */

import { z } from 'zod';

const isoInstant = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid ISO-8601 instant' });

// Scores arrive as strings, empty until the game starts
const score = z.string().default('');

export const todaySchema = z.object({
  seasonScheduleYear: z.number().int(),
});

const scheduleTeamSchema = z.object({
  teamId: z.string(),
  score,
});

export const scheduleGameSchema = z.object({
  gameId: z.string(),
  startTimeUTC: isoInstant,
  startDateEastern: z.string(),
  isHomeTeam: z.boolean().optional(),
  hTeam: scheduleTeamSchema,
  vTeam: scheduleTeamSchema,
});

export const scheduleSchema = z.object({
  league: z.object({
    lastStandardGamePlayedIndex: z.number().int(),
    standard: z.array(scheduleGameSchema),
  }),
});

export const teamSchema = z.object({
  teamId: z.string(),
  fullName: z.string(),
  nickname: z.string(),
  urlName: z.string(),
  tricode: z.string(),
  isNBAFranchise: z.boolean().optional(),
});

export const teamsSchema = z.object({
  league: z.object({ standard: z.array(teamSchema) }),
});

export const rosterSchema = z.object({
  league: z.object({
    standard: z.object({
      players: z.array(z.object({ personId: z.string() })),
    }),
  }),
});

export const playerSchema = z.object({
  personId: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  jersey: z.string().default(''),
  pos: z.string().default(''),
});

export const playersSchema = z.object({
  league: z.object({ standard: z.array(playerSchema) }),
});

const standingsTeamSchema = z.object({
  teamId: z.string(),
  win: z.string(),
  loss: z.string(),
  gamesBehind: z.string(),
  lossPct: z.string(),
});

export const standingsSchema = z.object({
  league: z.object({
    standard: z.object({
      conference: z.object({
        east: z.array(standingsTeamSchema),
        west: z.array(standingsTeamSchema),
      }),
    }),
  }),
});

// Boxscore

const broadcasterSchema = z.object({ longName: z.string() });

const boxscoreTeamSchema = z.object({
  teamId: z.string(),
  triCode: z.string(),
  win: z.string(),
  loss: z.string(),
  score,
  linescore: z.array(z.object({ score: z.string() })),
});

export const basicGameDataSchema = z.object({
  gameId: z.string(),
  startTimeUTC: isoInstant,
  startDateEastern: z.string(),
  attendance: z.string().default('0'),
  gameDuration: z.object({
    hours: z.string().default('0'),
    minutes: z.string().default('0'),
  }),
  period: z.object({ current: z.number().int() }),
  arena: z.object({
    name: z.string(),
    city: z.string(),
    stateAbbr: z.string(),
    country: z.string(),
  }),
  watch: z.object({
    broadcast: z.object({
      broadcasters: z.object({
        national: z.array(broadcasterSchema),
        hTeam: z.array(broadcasterSchema),
        vTeam: z.array(broadcasterSchema),
      }),
    }),
  }),
  officials: z.object({
    formatted: z.array(z.object({ firstNameLastName: z.string() })),
  }),
  hTeam: boxscoreTeamSchema,
  vTeam: boxscoreTeamSchema,
});

export const activePlayerSchema = z.object({
  personId: z.string(),
  teamId: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  pos: z.string().default(''),
  min: z.string(),
  points: z.string(),
  fgm: z.string(),
  fga: z.string(),
  tpm: z.string(),
  tpa: z.string(),
  ftm: z.string(),
  fta: z.string(),
  offReb: z.string(),
  defReb: z.string(),
  totReb: z.string(),
  assists: z.string(),
  pFouls: z.string(),
  steals: z.string(),
  turnovers: z.string(),
  blocks: z.string(),
  plusMinus: z.string(),
});

const teamTotalsSchema = z.object({
  points: z.string(),
  fgm: z.string(),
  fga: z.string(),
  fgp: z.string(),
  tpm: z.string(),
  tpa: z.string(),
  tpp: z.string(),
  ftm: z.string(),
  fta: z.string(),
  ftp: z.string(),
  offReb: z.string(),
  totReb: z.string(),
  assists: z.string(),
  pFouls: z.string(),
  steals: z.string(),
  turnovers: z.string(),
  blocks: z.string(),
});

const leaderSchema = z.object({
  value: z.string(),
  players: z.array(z.object({ firstName: z.string(), lastName: z.string() })),
});

const teamStatsSchema = z.object({
  totals: teamTotalsSchema,
  leaders: z.object({
    points: leaderSchema,
    rebounds: leaderSchema,
    assists: leaderSchema,
  }),
  biggestLead: z.string(),
  longestRun: z.string(),
  pointsInPaint: z.string(),
  pointsOffTurnovers: z.string(),
  fastBreakPoints: z.string(),
});

export const boxscoreStatsSchema = z.object({
  activePlayers: z.array(activePlayerSchema),
  hTeam: teamStatsSchema,
  vTeam: teamStatsSchema,
});

export const boxscoreSchema = z.object({
  basicGameData: basicGameDataSchema,
  // Absent before tip-off
  stats: boxscoreStatsSchema.optional(),
});
