/**
 * Unit tests for the schedule cursor
 */

import { resolveScheduleCursor } from '../../src/lib/threads/scheduleCursor';
import { IndexOutOfRangeError } from '../../src/lib/utils/errors';
import { makeSchedule } from '../helpers/fixtures';

const SEASON_START = new Date('2020-12-22T00:00:00Z');

describe('resolveScheduleCursor', () => {
  it('should pick the cursor game and the one after it', () => {
    const schedule = makeSchedule(72, 10, SEASON_START);
    const { preGame, postGame } = resolveScheduleCursor(schedule);

    expect(postGame).toBe(schedule.games[10]);
    expect(preGame).toBe(schedule.games[11]);
  });

  it('should apply the postponed offset', () => {
    const schedule = makeSchedule(72, 10, SEASON_START);
    const { preGame, postGame } = resolveScheduleCursor(schedule, 2);

    expect(postGame).toBe(schedule.games[12]);
    expect(preGame).toBe(schedule.games[13]);
  });

  it('should have no pre-game candidate after the last game', () => {
    const schedule = makeSchedule(72, 71, SEASON_START);
    const { preGame, postGame } = resolveScheduleCursor(schedule);

    expect(postGame).toBe(schedule.games[71]);
    expect(preGame).toBeNull();
  });

  it('should reject a cursor past the end of the schedule', () => {
    const schedule = makeSchedule(72, 71, SEASON_START);

    expect(() => resolveScheduleCursor(schedule, 1)).toThrow(IndexOutOfRangeError);
    expect(() => resolveScheduleCursor(schedule, 1)).toThrow(
      'Schedule index 72 is out of range for a schedule of 72 games'
    );
  });

  it('should reject a negative cursor', () => {
    const schedule = makeSchedule(72, 0, SEASON_START);

    expect(() => resolveScheduleCursor(schedule, -1)).toThrow(IndexOutOfRangeError);
  });

  it('should reject an empty schedule', () => {
    expect(() => resolveScheduleCursor({ games: [], lastPlayedIndex: 0 })).toThrow(IndexOutOfRangeError);
  });
});
