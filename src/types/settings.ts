/**
 * Immutable run settings, built once at startup and passed to every component
 */

export interface FollowedTeam {
  /** NBA feed url name, e.g. "knicks" */
  urlName: string;
  /** NBA feed tricode, e.g. "NYK" */
  tricode: string;
  /** Home subreddit without the r/ prefix */
  subreddit: string;
}

export interface LookupTables {
  /** Team nickname → subreddit */
  subreddits: Readonly<Record<string, string>>;
  /** Team tricode → Yahoo Sports team number */
  yahooCodes: Readonly<Record<string, string>>;
  /** Broadcaster long name → watch link */
  broadcasterLinks: Readonly<Record<string, string>>;
}

export interface BotSettings {
  team: FollowedTeam;
  lookups: LookupTables;
  postponedGames: number;
  recentPostsLimit: number;
  httpTimeoutMs: number;
  nbaBaseUrl: string;
}
