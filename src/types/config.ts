/**
 * Environment variable configuration
 */
export interface EnvironmentConfig {
  // Reddit script app
  REDDIT_CLIENT_ID: string;
  REDDIT_CLIENT_SECRET: string;
  REDDIT_USERNAME?: string;
  REDDIT_PASSWORD: string;
  REDDIT_USER_AGENT?: string;
  SUBREDDIT?: string;

  // NBA data feed
  NBA_DATA_BASE_URL?: string;
  HTTP_TIMEOUT_MS?: string;

  // Team the bot follows
  TEAM_URL_NAME?: string;
  TEAM_TRICODE?: string;
  TEAM_SUBREDDIT?: string;

  // Thread behaviour
  POSTPONED_GAMES?: string;
  RECENT_POSTS_LIMIT?: string;
  TANK_STANDINGS?: string;
  FAIL_ON_ERROR?: string;

  // Timer triggers
  GAME_THREAD_SCHEDULE?: string;
  SIDEBAR_SCHEDULE?: string;

  // Observability
  LOG_LEVEL?: string;
  APPLICATIONINSIGHTS_CONNECTION_STRING?: string;
  SENTRY_DSN?: string;
  SENTRY_ENVIRONMENT?: string;
  SENTRY_RELEASE?: string;
}

/**
 * Validates that required environment variables are set
 * @throws Error if any required variable is missing
 */
export function validateConfig(): void {
  const required: (keyof EnvironmentConfig)[] = [
    'REDDIT_CLIENT_ID',
    'REDDIT_CLIENT_SECRET',
    'REDDIT_PASSWORD',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}`
    );
  }
}

/**
 * Gets configuration value from environment with default fallback
 */
export function getConfig<K extends keyof EnvironmentConfig>(
  key: K,
  defaultValue?: string
): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Environment variable ${key} is not set`);
  }
  return value;
}

/**
 * Gets an integer configuration value, rejecting anything that does not parse
 */
export function getIntConfig<K extends keyof EnvironmentConfig>(
  key: K,
  defaultValue: number
): number {
  const raw = getConfig(key, String(defaultValue));
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  }
  return value;
}

const TRUTHY = new Set(['yes', 'y', 'true', '1']);

/**
 * Gets a boolean flag; accepts yes/y/true/1 in any case
 */
export function getFlagConfig<K extends keyof EnvironmentConfig>(key: K): boolean {
  return isTruthy(getConfig(key, ''));
}

export function isTruthy(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}
