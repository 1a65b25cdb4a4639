/**
 * Picks the games around the provider's "last played" cursor
 */

import { Game, Schedule } from '../../types/nba';
import { IndexOutOfRangeError } from '../utils/errors';

export interface ScheduleCursor {
  /** Next game after the cursor, if the season has one */
  preGame: Game | null;
  /** Game at the cursor */
  postGame: Game;
}

/**
 * Resolves the pre-game and post-game candidates.
 *
 * `postponedOffset` is a manual correction for games the provider still counts
 * at an index (a cancelled game, for example). It is never detected here.
 *
 * @throws IndexOutOfRangeError when the adjusted cursor is outside the schedule
 */
export function resolveScheduleCursor(schedule: Schedule, postponedOffset = 0): ScheduleCursor {
  const { games } = schedule;
  const index = schedule.lastPlayedIndex + postponedOffset;

  if (!Number.isInteger(index) || index < 0 || index >= games.length) {
    throw new IndexOutOfRangeError(index, games.length);
  }

  return {
    preGame: index + 1 < games.length ? games[index + 1] : null,
    postGame: games[index],
  };
}
