/**
 * Reddit client for a script-type app (OAuth password grant)
 */

import { fetchJson } from '../http/fetchJson';
import { parseFeed } from '../utils/validation';
import { ForumError } from '../utils/errors';
import * as logger from '../utils/logger';
import { ForumPost } from '../../types/thread';
import { RedditCredentials, RedditLinkData } from '../../types/reddit';
import { ThreadGateway } from '../threads/reconciler';
import {
  jsonEnvelopeSchema,
  linkDataSchema,
  listingSchema,
  meSchema,
  tokenSchema,
  wikiPageSchema,
} from './schemas';

const AUTH_URL = 'https://www.reddit.com/api/v1/access_token';
const API_URL = 'https://oauth.reddit.com';

/** Largest page the listing endpoints return */
const PAGE_SIZE = 100;

export function toForumPost(link: RedditLinkData): ForumPost {
  return {
    id: link.name,
    title: link.title,
    body: link.selftext,
    author: link.author,
    createdAt: new Date(link.created_utc * 1000),
    isPinned: link.stickied,
  };
}

export class RedditClient {
  private accessToken: string | null = null;
  private identity: string | null = null;

  constructor(
    private readonly credentials: RedditCredentials,
    private readonly timeoutMs: number
  ) {}

  private async token(): Promise<string> {
    if (this.accessToken) {
      return this.accessToken;
    }

    const { clientId, clientSecret, username, password, userAgent } = this.credentials;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
    logger.debug('Requesting Reddit access token', { username });

    const payload = await fetchJson({
      service: 'reddit',
      url: AUTH_URL,
      method: 'POST',
      headers: { Authorization: `Basic ${basic}`, 'User-Agent': userAgent },
      form: { grant_type: 'password', username, password },
      timeoutMs: this.timeoutMs,
    });

    this.accessToken = parseFeed(tokenSchema, payload, 'reddit token').access_token;
    return this.accessToken;
  }

  private async call(path: string, form?: Record<string, string>): Promise<unknown> {
    const token = await this.token();
    return fetchJson({
      service: 'reddit',
      url: `${API_URL}${path}`,
      method: form ? 'POST' : 'GET',
      headers: { Authorization: `bearer ${token}`, 'User-Agent': this.credentials.userAgent },
      form,
      timeoutMs: this.timeoutMs,
    });
  }

  private async write(path: string, form: Record<string, string>) {
    const envelope = parseFeed(jsonEnvelopeSchema, await this.call(path, { api_type: 'json', ...form }), path);
    if (envelope.json.errors.length > 0) {
      const errors = envelope.json.errors.map((entry) => entry.map(String).join(': '));
      throw new ForumError(`Reddit rejected ${path}: ${errors.join('; ')}`, errors);
    }
    return envelope.json.data;
  }

  /**
   * Name of the authenticated account
   */
  async me(): Promise<string> {
    if (!this.identity) {
      this.identity = parseFeed(meSchema, await this.call('/api/v1/me'), 'reddit me').name;
    }
    return this.identity;
  }

  /**
   * Newest posts of a subreddit, newest first, up to `limit`
   */
  async recentPosts(subreddit: string, limit: number): Promise<ForumPost[]> {
    const posts: ForumPost[] = [];
    let after: string | null = null;

    while (posts.length < limit) {
      const params = new URLSearchParams({
        limit: String(Math.min(PAGE_SIZE, limit - posts.length)),
        raw_json: '1',
      });
      if (after) params.set('after', after);

      const listing = parseFeed(listingSchema, await this.call(`/r/${subreddit}/new?${params}`), 'reddit listing');
      const links = listing.data.children
        .filter((child) => child.kind === 't3')
        .map((child) => toForumPost(parseFeed(linkDataSchema, child.data, 'reddit link')));
      posts.push(...links);

      after = listing.data.after;
      if (!after || links.length === 0) break;
    }

    logger.debug('Fetched recent posts', { subreddit, count: posts.length });
    return posts;
  }

  async submitSelfPost(subreddit: string, title: string, body: string): Promise<ForumPost> {
    const data = await this.write('/api/submit', {
      kind: 'self',
      sr: subreddit,
      title,
      text: body,
      sendreplies: 'false',
    });
    if (!data?.name) {
      throw new ForumError('Reddit did not return the id of the submitted post');
    }
    return {
      id: data.name,
      title,
      body,
      author: await this.me(),
      createdAt: new Date(),
      isPinned: false,
    };
  }

  async editPost(postId: string, body: string): Promise<void> {
    await this.write('/api/editusertext', { thing_id: postId, text: body });
  }

  async stickyPost(postId: string): Promise<void> {
    await this.write('/api/set_subreddit_sticky', { id: postId, state: 'true' });
  }

  async readWikiPage(subreddit: string, page: string): Promise<string> {
    const payload = await this.call(`/r/${subreddit}/wiki/${page}?raw_json=1`);
    return parseFeed(wikiPageSchema, payload, 'reddit wiki page').data.content_md;
  }

  async editWikiPage(subreddit: string, page: string, content: string, reason: string): Promise<void> {
    await this.call(`/r/${subreddit}/api/wiki/edit`, { page, content, reason });
  }

  /**
   * Thread writes bound to one subreddit
   */
  threadGateway(subreddit: string): ThreadGateway {
    return {
      createPost: (title, body) => this.submitSelfPost(subreddit, title, body),
      pinPost: (post) => this.stickyPost(post.id),
      editPost: (post, body) => this.editPost(post.id, body),
    };
  }
}
