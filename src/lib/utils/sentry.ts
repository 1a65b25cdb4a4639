/**
 * Sentry error tracking
 *
 * Initialised once per process, either by the Azure Functions entry point or
 * by a CLI. Without SENTRY_DSN every helper is a no-op.
 */

import * as Sentry from '@sentry/node';
import { nodeProfilingIntegration } from '@sentry/profiling-node';
import { getConfig } from '../../types/config';

export type SentryRuntime = 'azure-functions' | 'cli';

let isInitialized = false;

/**
 * Initialize Sentry for the given runtime
 */
export function initializeSentry(runtime: SentryRuntime = 'azure-functions'): void {
  if (isInitialized) {
    return;
  }

  const dsn = getConfig('SENTRY_DSN', '');
  const environment = getConfig('SENTRY_ENVIRONMENT', 'development');
  const release = getConfig('SENTRY_RELEASE', '') || undefined;

  if (!dsn) {
    isInitialized = true;
    return;
  }

  try {
    Sentry.init({
      dsn,
      environment,
      release,

      // Sample everything outside production
      tracesSampleRate: environment === 'production' ? 0.2 : 1.0,
      profilesSampleRate: environment === 'production' ? 0.2 : 1.0,
      integrations: [nodeProfilingIntegration()],

      maxBreadcrumbs: 100,
      attachStacktrace: true,

      initialScope: {
        tags: {
          runtime,
          'node.version': process.version,
        },
      },
    });

    console.info('[Sentry] Error tracking initialized successfully');
    isInitialized = true;
  } catch (error) {
    console.error('[Sentry] Failed to initialize:', error);
    isInitialized = true;
  }
}

/**
 * Check if Sentry is initialized and configured
 */
export function isSentryEnabled(): boolean {
  return isInitialized && !!getConfig('SENTRY_DSN', '');
}

/**
 * Capture an exception and send to Sentry
 *
 * @returns Event ID from Sentry
 */
export function captureException(
  error: Error,
  context?: Record<string, unknown>
): string | undefined {
  if (!isSentryEnabled()) {
    return undefined;
  }

  return Sentry.captureException(error, {
    extra: context,
  });
}

/**
 * Capture a message and send to Sentry
 */
export function captureMessage(
  message: string,
  level: Sentry.SeverityLevel = 'info',
  context?: Record<string, unknown>
): string | undefined {
  if (!isSentryEnabled()) {
    return undefined;
  }

  return Sentry.captureMessage(message, {
    level,
    extra: context,
  });
}

/**
 * Add breadcrumb; the trail of a run is attached to any error it ends in
 */
export function addBreadcrumb(
  message: string,
  category: string,
  level: Sentry.SeverityLevel = 'info',
  data?: Record<string, unknown>
): void {
  if (!isSentryEnabled()) {
    return;
  }

  Sentry.addBreadcrumb({
    message,
    category,
    level,
    data,
    timestamp: Date.now() / 1000,
  });
}

/**
 * Set custom tag for filtering and grouping errors
 */
export function setTag(key: string, value: string): void {
  if (!isSentryEnabled()) {
    return;
  }

  Sentry.setTag(key, value);
}

/**
 * Flush all pending events to Sentry
 *
 * @param timeout - Timeout in milliseconds
 */
export async function flushSentry(timeout: number = 2000): Promise<boolean> {
  if (!isSentryEnabled()) {
    return true;
  }

  return Sentry.flush(timeout);
}

export type { SeverityLevel } from '@sentry/node';
