/**
 * Application Insights telemetry utilities
 *
 * Custom events, traces and HTTP dependencies for the bot runs. Every export is
 * a no-op when APPLICATIONINSIGHTS_CONNECTION_STRING is not configured, so the
 * CLI works without an Azure subscription.
 */

import * as appInsights from 'applicationinsights';
import { getConfig } from '../../types/config';

const CLOUD_ROLE = 'game-thread-bot';

/**
 * Telemetry client instance
 */
let telemetryClient: appInsights.TelemetryClient | null = null;
let isInitialized = false;

/**
 * Initialize Application Insights
 *
 * This should be called once at application startup. Later calls are ignored.
 */
export function initializeTelemetry(): void {
  if (isInitialized) {
    return;
  }

  const connectionString = getConfig('APPLICATIONINSIGHTS_CONNECTION_STRING', '');

  if (!connectionString) {
    isInitialized = true;
    return;
  }

  try {
    appInsights
      .setup(connectionString)
      .setAutoCollectRequests(false)
      .setAutoCollectPerformance(false, false)
      .setAutoCollectExceptions(true)
      .setAutoCollectDependencies(true)
      .setAutoCollectConsole(false)
      .setUseDiskRetryCaching(true)
      .setSendLiveMetrics(false)
      .setDistributedTracingMode(appInsights.DistributedTracingModes.AI_AND_W3C);

    appInsights.start();

    telemetryClient = appInsights.defaultClient;
    telemetryClient.context.tags[telemetryClient.context.keys.cloudRole] = CLOUD_ROLE;

    console.info('[Telemetry] Application Insights initialized successfully');
    isInitialized = true;
  } catch (error) {
    console.error('[Telemetry] Failed to initialize Application Insights:', error);
    isInitialized = true;
  }
}

/**
 * Get the telemetry client instance
 */
export function getTelemetryClient(): appInsights.TelemetryClient | null {
  if (!isInitialized) {
    initializeTelemetry();
  }
  return telemetryClient;
}

/**
 * Track a custom event
 */
export function trackEvent(
  name: string,
  properties?: Record<string, string>,
  measurements?: Record<string, number>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackEvent({ name, properties, measurements });
  }
}

/**
 * Track an outgoing HTTP call
 *
 * @param name - Dependency name, e.g. "GET /prod/v1/today.json"
 * @param target - Host the call went to
 * @param data - Full request URL
 * @param duration - Duration in milliseconds
 * @param resultCode - HTTP status, 0 when no response arrived
 */
export function trackDependency(
  name: string,
  target: string,
  data: string,
  duration: number,
  success: boolean,
  resultCode: number
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackDependency({
      name,
      target,
      dependencyTypeName: 'HTTP',
      data,
      duration,
      success,
      resultCode,
    });
  }
}

/**
 * Track an exception
 */
export function trackException(
  error: Error,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackException({ exception: error, properties });
  }
}

export const SeverityLevel = appInsights.Contracts.SeverityLevel;
export type SeverityLevel = appInsights.Contracts.SeverityLevel;

/**
 * Track a trace (custom log message)
 */
export function trackTrace(
  message: string,
  severity: SeverityLevel = SeverityLevel.Information,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackTrace({ message, severity, properties });
  }
}

/**
 * Flush all telemetry data
 *
 * The CLI calls this before exiting so short runs still report.
 */
export function flushTelemetry(): Promise<void> {
  return new Promise((resolve) => {
    const client = getTelemetryClient();
    if (client) {
      client.flush({ callback: () => resolve() });
    } else {
      resolve();
    }
  });
}
