import { Boxscore } from '../../types/nba';
import { Action, RenderedThread } from '../../types/thread';
import { GameThreadContext, buildGameThread } from './gameThread';
import { PostGameThreadContext, buildPostGameThread } from './postGameThread';

export type RenderContext = GameThreadContext & PostGameThreadContext;

/**
 * Renders the thread for a phase. Only the post game title's verb is random.
 */
export function renderThread(
  action: Action.GameThread | Action.PostGameThread,
  boxscore: Boxscore,
  context: RenderContext
): RenderedThread {
  return action === Action.GameThread
    ? buildGameThread(boxscore, context)
    : buildPostGameThread(boxscore, context);
}

