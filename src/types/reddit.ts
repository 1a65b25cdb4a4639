/**
 * Reddit API types
 */

import { z } from 'zod';
import { linkDataSchema } from '../lib/reddit/schemas';

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
  userAgent: string;
}

/**
 * Link (t3) fields read from listings
 */
export type RedditLinkData = z.infer<typeof linkDataSchema>;
