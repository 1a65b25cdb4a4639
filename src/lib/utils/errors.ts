/**
 * Custom error classes for the game thread and sidebar pipelines
 */

/**
 * Error thrown when a request to the NBA feed or Reddit fails at the network
 * or HTTP level
 */
export class DataFetchError extends Error {
  constructor(
    message: string,
    public service: string,
    public url: string,
    public status?: number,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'DataFetchError';
    Object.setPrototypeOf(this, DataFetchError.prototype);
  }
}

/**
 * Error thrown when a feed is missing an expected field or has the wrong shape
 */
export class MalformedDataError extends Error {
  constructor(message: string, public source: string, public issues: string[] = []) {
    super(message);
    this.name = 'MalformedDataError';
    Object.setPrototypeOf(this, MalformedDataError.prototype);
  }
}

/**
 * Error thrown when the schedule cursor plus the postponed offset points
 * outside the season schedule
 */
export class IndexOutOfRangeError extends Error {
  constructor(public index: number, public length: number) {
    super(`Schedule index ${index} is out of range for a schedule of ${length} games`);
    this.name = 'IndexOutOfRangeError';
    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype);
  }
}

/**
 * Error thrown when Reddit accepts a request but reports errors in the body
 */
export class ForumError extends Error {
  constructor(message: string, public errors: string[] = []) {
    super(message);
    this.name = 'ForumError';
    Object.setPrototypeOf(this, ForumError.prototype);
  }
}

/**
 * Type guard to check if an error is a DataFetchError
 */
export function isDataFetchError(error: unknown): error is DataFetchError {
  return error instanceof DataFetchError;
}

/**
 * Type guard to check if an error is a MalformedDataError
 */
export function isMalformedDataError(error: unknown): error is MalformedDataError {
  return error instanceof MalformedDataError;
}

/**
 * Type guard to check if an error is an IndexOutOfRangeError
 */
export function isIndexOutOfRangeError(error: unknown): error is IndexOutOfRangeError {
  return error instanceof IndexOutOfRangeError;
}

/**
 * Type guard to check if an error is a ForumError
 */
export function isForumError(error: unknown): error is ForumError {
  return error instanceof ForumError;
}

/**
 * Normalizes anything thrown into an Error instance
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  return new Error(typeof thrown === 'string' ? thrown : JSON.stringify(thrown));
}
