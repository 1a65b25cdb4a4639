/**
 * Decides whether a game thread, a post game thread or nothing is due
 */

import { Game, Schedule } from '../../types/nba';
import { Action, PhaseDecision } from '../../types/thread';
import { resolveScheduleCursor } from './scheduleCursor';

const HOUR_MS = 60 * 60 * 1000;

/** Game threads open this long before tip-off */
export const GAME_THREAD_LEAD_MS = HOUR_MS;

/** A finished game stays current this long after its start time */
export const MAX_POST_AGE_MS = 6 * HOUR_MS;

/**
 * Pre-game check: either side has a non-empty score string.
 */
export function hasAnyScore(game: Game): boolean {
  return Boolean(game.away.score) || Boolean(game.home.score);
}

/**
 * Post-game check: the concatenated score strings are non-empty.
 * Not the same predicate as hasAnyScore.
 */
export function hasCombinedScore(game: Game): boolean {
  return Boolean(game.away.score + game.home.score);
}

/**
 * First match wins:
 * 1. unscored next game, starting within the hour (or already started) → GameThread
 * 2. scored cursor game that started at most 6 hours ago → PostGameThread
 * 3. otherwise None
 */
export function classifyPhase(schedule: Schedule, now: Date, postponedOffset = 0): PhaseDecision {
  const { preGame, postGame } = resolveScheduleCursor(schedule, postponedOffset);
  const nowMs = now.getTime();

  if (preGame && !hasAnyScore(preGame) && preGame.startTime.getTime() - GAME_THREAD_LEAD_MS <= nowMs) {
    return { action: Action.GameThread, game: preGame };
  }

  if (hasCombinedScore(postGame) && postGame.startTime.getTime() + MAX_POST_AGE_MS >= nowMs) {
    return { action: Action.PostGameThread, game: postGame };
  }

  return { action: Action.None, game: null };
}
