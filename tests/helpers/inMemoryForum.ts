/**
 * In-process stand-in for the Reddit client
 */

import { ThreadGateway } from '../../src/lib/threads/reconciler';
import { ForumPost } from '../../src/types/thread';

export class InMemoryForum {
  /** Newest first, like the subreddit's new feed */
  readonly posts: ForumPost[] = [];
  readonly wiki = new Map<string, string>();
  readonly calls: string[] = [];
  private nextId = 1;

  constructor(private readonly identity: string, private readonly clock: () => Date = () => new Date()) {}

  async me(): Promise<string> {
    return this.identity;
  }

  async recentPosts(_subreddit: string, limit: number): Promise<ForumPost[]> {
    return this.posts.slice(0, limit).map((post) => ({ ...post }));
  }

  async readWikiPage(subreddit: string, page: string): Promise<string> {
    return this.wiki.get(`${subreddit}/${page}`) ?? '';
  }

  async editWikiPage(subreddit: string, page: string, content: string, _reason: string): Promise<void> {
    this.calls.push(`editWikiPage ${subreddit}/${page}`);
    this.wiki.set(`${subreddit}/${page}`, content);
  }

  threadGateway(_subreddit: string): ThreadGateway {
    return {
      createPost: async (title, body) => {
        const post: ForumPost = {
          id: `t3_${this.nextId++}`,
          title,
          body,
          author: this.identity,
          createdAt: this.clock(),
          isPinned: false,
        };
        this.posts.unshift(post);
        this.calls.push(`createPost ${post.id}`);
        return { ...post };
      },
      pinPost: async (post) => {
        this.find(post.id).isPinned = true;
        this.calls.push(`pinPost ${post.id}`);
      },
      editPost: async (post, body) => {
        this.find(post.id).body = body;
        this.calls.push(`editPost ${post.id}`);
      },
    };
  }

  private find(id: string): ForumPost {
    const post = this.posts.find((candidate) => candidate.id === id);
    if (!post) {
      throw new Error(`No post ${id}`);
    }
    return post;
  }
}
