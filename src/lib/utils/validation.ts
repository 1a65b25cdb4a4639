/**
 * Feed validation
 */

import { z } from 'zod';
import { MalformedDataError } from './errors';

/**
 * Validates a payload, converting zod issues into a MalformedDataError
 */
export function parseFeed<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  source: string
): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new MalformedDataError(`Malformed ${source} payload`, source, issues);
  }
  return result.data;
}
