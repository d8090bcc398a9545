import OpenAI from 'openai';
import { TimeoutError, TransientServiceError } from '../types/api';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Run an operation with a deadline. The operation receives a signal that is
 * aborted when the deadline passes so the underlying request can stop too.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

const CONNECTION_FAILURE = /ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|EPIPE|UND_ERR_SOCKET|socket hang up/i;

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readCode(error: object): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Timeouts, rate limits, upstream 5xx and dropped connections are worth retrying;
 * anything else (bad request, auth, malformed response) is not. Wrapped errors are
 * followed through `cause` so an errno from the socket is still recognised.
 */
export function isTransientError(error: unknown): boolean {
  const seen = new Set<unknown>();
  let current = error;

  while (typeof current === 'object' && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof TimeoutError || current instanceof TransientServiceError) {
      return true;
    }
    // Also covers APIConnectionTimeoutError
    if (current instanceof OpenAI.APIConnectionError) {
      return true;
    }
    const status = readStatus(current);
    if (status !== undefined) {
      return status === 408 || status === 429 || status >= 500;
    }
    const code = readCode(current);
    if (code && CONNECTION_FAILURE.test(code)) {
      return true;
    }
    if (current instanceof Error && CONNECTION_FAILURE.test(current.message)) {
      return true;
    }
    current = 'cause' in current ? current.cause : undefined;
  }

  return false;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Retry with exponential backoff (base, 2x base, 4x base, ...).
 * The last error is rethrown once attempts are exhausted.
 */
export async function retry<T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const maxDelay = options.maxDelayMs ?? 10000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delay = Math.min(options.baseDelayMs * 2 ** (attempt - 1), maxDelay);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}

/**
 * Serializes tasks that share a key while letting different keys run concurrently.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
