/**
 * Thread reconciliation
 *
 * Keeps at most one live bot thread per phase: find the newest matching post
 * in the recent-posts feed, then create, edit or leave it.
 *
 * Reads the recent-posts feed, not search: search lags new
 * posts by minutes. The scan and the write are not atomic: two overlapping
 * runs can both miss each other's post and both create one. Nothing here
 * detects that; the scheduler interval is expected to exceed the feed's
 * read-after-write lag.
 */

import { Action, ForumPost, ReconcileOutcome } from '../../types/thread';
import { MAX_POST_AGE_MS } from './phaseClassifier';
import * as logger from '../utils/logger';

export const GAME_THREAD_PREFIX = '[Game Thread]';
export const POST_GAME_PREFIX = '[Post Game Thread]';

/**
 * Forum writes the reconciler needs
 */
export interface ThreadGateway {
  createPost(title: string, body: string): Promise<ForumPost>;
  pinPost(post: ForumPost): Promise<void>;
  editPost(post: ForumPost, body: string): Promise<void>;
}

export interface ReconcileRequest {
  action: Action.GameThread | Action.PostGameThread;
  title: string;
  body: string;
  /** Reverse chronological, newest first */
  recentPosts: readonly ForumPost[];
  /** Account the bot posts as */
  identity: string;
  now: Date;
}

export interface ReconcileResult {
  outcome: ReconcileOutcome;
  post: ForumPost;
}

export function phasePrefix(action: Action.GameThread | Action.PostGameThread): string {
  return action === Action.GameThread ? GAME_THREAD_PREFIX : POST_GAME_PREFIX;
}

/**
 * A post older than the freshness window belongs to an earlier game
 */
export function isObsolete(post: ForumPost, now: Date): boolean {
  return post.createdAt.getTime() + MAX_POST_AGE_MS < now.getTime();
}

/**
 * Finds the live bot thread for a phase, if any
 */
export function findLiveThread(
  action: Action.GameThread | Action.PostGameThread,
  recentPosts: readonly ForumPost[],
  identity: string,
  now: Date
): ForumPost | null {
  const prefix = phasePrefix(action);
  return (
    recentPosts.find(
      (post) => post.title.startsWith(prefix) && post.author === identity && !isObsolete(post, now)
    ) ?? null
  );
}

export async function reconcileThread(
  request: ReconcileRequest,
  gateway: ThreadGateway
): Promise<ReconcileResult> {
  const { action, title, body, recentPosts, identity, now } = request;
  const existing = findLiveThread(action, recentPosts, identity, now);

  if (!existing) {
    const post = await gateway.createPost(title, body);
    await gateway.pinPost(post);
    logger.info(`Created a new thread with title "${post.title}".`, { postId: post.id, action });
    return { outcome: 'created', post };
  }

  if (existing.body.trim() === body.trim()) {
    logger.info(`Text of "${existing.title}" did not change. Not updating.`, { postId: existing.id });
    return { outcome: 'unchanged', post: existing };
  }

  await gateway.editPost(existing, body);
  logger.info(`Updated "${existing.title}".`, { postId: existing.id });
  return { outcome: 'updated', post: { ...existing, body } };
}
