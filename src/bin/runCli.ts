/**
 * Shared wiring for the command-line entry points
 */

import { toError } from '../lib/utils/errors';
import * as logger from '../lib/utils/logger';
import { flushSentry, initializeSentry } from '../lib/utils/sentry';
import { flushTelemetry, initializeTelemetry } from '../lib/utils/telemetry';
import { getFlagConfig } from '../types/config';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

/**
 * Runs `task` once and sets the process exit code.
 *
 * A failed run exits 0 unless FAIL_ON_ERROR is set; bad arguments always exit 2.
 */
export async function runCli(usage: string, task: () => Promise<{ status: string }>): Promise<void> {
  initializeSentry('cli');
  initializeTelemetry();

  let failed = false;
  try {
    const result = await task();
    failed = result.status === 'failed';
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${usage}`);
      process.exitCode = 2;
      return;
    }
    logger.logError('Run could not start', toError(err));
    failed = true;
  } finally {
    await Promise.all([flushSentry(), flushTelemetry()]);
  }

  if (failed && getFlagConfig('FAIL_ON_ERROR')) {
    process.exitCode = 1;
  }
}

/**
 * Rethrows anything `parse` throws as a UsageError
 */
export function asUsage<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    throw new UsageError(toError(err).message);
  }
}
