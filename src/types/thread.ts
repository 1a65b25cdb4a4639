/**
 * Thread decision, rendering and reconciliation types
 */

import { Game } from './nba';

/**
 * What a run should do with the forum right now
 */
export enum Action {
  GameThread = 'GameThread',
  PostGameThread = 'PostGameThread',
  None = 'None',
}

export type PhaseDecision =
  | { action: Action.GameThread | Action.PostGameThread; game: Game }
  | { action: Action.None; game: null };

export interface RenderedThread {
  title: string;
  body: string;
}

/**
 * A post as exposed by the forum; never cached across runs
 */
export interface ForumPost {
  /** Platform id of the post (a t3_ fullname on Reddit) */
  id: string;
  title: string;
  body: string;
  author: string;
  createdAt: Date;
  isPinned: boolean;
}

export type ReconcileOutcome = 'created' | 'updated' | 'unchanged';

export type RunStatus = 'idle' | ReconcileOutcome | 'failed';

/**
 * Result of one game thread run. `failed` runs still resolve so a scheduler
 * never sees an exception, but they are distinguishable from success.
 */
export interface RunReport {
  status: RunStatus;
  action: Action;
  gameId?: string;
  title?: string;
  error?: Error;
}
