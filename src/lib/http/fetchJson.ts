/**
 * Single-attempt JSON requests over the global fetch
 *
 * Failed requests are not retried: the next scheduled run is the retry.
 */

import { DataFetchError } from '../utils/errors';
import { trackDependency } from '../utils/telemetry';
import * as logger from '../utils/logger';

export interface JsonRequest {
  /** Label used in errors and telemetry, e.g. "nba" or "reddit" */
  service: string;
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  timeoutMs: number;
}

export async function fetchJson(request: JsonRequest): Promise<unknown> {
  const { service, url, timeoutMs } = request;
  const method = request.method ?? 'GET';
  const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
  let body: URLSearchParams | undefined;
  if (request.form) {
    body = new URLSearchParams(request.form);
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
  }

  const target = new URL(url);
  const dependencyName = `${method} ${target.pathname}`;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const startTime = Date.now();
  let status = 0;

  try {
    const response = await fetch(url, { method, headers, body, signal: controller.signal });
    status = response.status;

    if (!response.ok) {
      const errorText = await response.text();
      throw new DataFetchError(
        `${service} request failed: ${response.status} - ${errorText.slice(0, 200)}`,
        service,
        url,
        response.status
      );
    }

    const data: unknown = await response.json();
    logger.debug('HTTP request completed', { service, method, url, status });
    return data;
  } catch (err) {
    if (err instanceof DataFetchError) {
      throw err;
    }
    const cause = err instanceof Error ? err : new Error(String(err));
    const message = cause.name === 'AbortError'
      ? `${service} request timed out after ${timeoutMs}ms`
      : `${service} request failed: ${cause.message}`;
    throw new DataFetchError(message, service, url, undefined, cause);
  } finally {
    clearTimeout(timeoutId);
    trackDependency(
      dependencyName,
      target.host,
      url,
      Date.now() - startTime,
      status >= 200 && status < 300,
      status
    );
  }
}
