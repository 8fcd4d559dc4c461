import { getLogger } from "./logger.js";
import { CollaboratorTimeoutError, isTransientError } from "./errors.js";

const logger = getLogger("retry");

export interface BackoffPolicy {
  initialMs: number;
  maxMs: number;
  factor: number;
  /** Fraction of the base delay added at random, 0..1. */
  jitter: number;
}

const DEFAULT_BACKOFF: BackoffPolicy = {
  initialMs: 200,
  maxMs: 2_000,
  factor: 2,
  jitter: 0.2,
};

/** Delay before retry number `attempt` (1-based). */
export function computeBackoff(
  policy: Partial<BackoffPolicy>,
  attempt: number,
  random: () => number = Math.random,
): number {
  const { initialMs, maxMs, factor, jitter } = { ...DEFAULT_BACKOFF, ...policy };
  const base = initialMs * factor ** (attempt - 1);
  return Math.min(base + base * jitter * random(), maxMs);
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new DOMException("Aborted", "AbortError");
}

/** Waits `ms`, rejecting early with the signal's reason when it aborts. */
export function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface RetryOptions {
  /** Total attempts including the first. Default 3. */
  maxAttempts?: number;
  backoff?: Partial<BackoffPolicy>;
  /** Return false to stop retrying and rethrow. Default: retry everything. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  signal?: AbortSignal;
  /** Shows up in the retry log line. */
  label?: string;
}

/**
 * Calls `fn` until it resolves or attempts run out, sleeping with
 * exponential backoff in between. The last error is rethrown.
 */
export async function retryAsync<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      if (opts.shouldRetry && !opts.shouldRetry(err, attempt)) break;

      const delayMs = computeBackoff(opts.backoff ?? {}, attempt);
      logger.debug({ label: opts.label, attempt, maxAttempts, delayMs }, "Retrying after error");
      await sleepWithAbort(delayMs, opts.signal);
    }
  }

  throw lastError;
}

/**
 * Runs `fn` against a deadline. The signal handed to `fn` aborts when the
 * deadline passes and the call rejects with CollaboratorTimeoutError.
 */
export async function withTimeout<T>(
  collaborator: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new CollaboratorTimeoutError(collaborator, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface CollaboratorCallOptions {
  timeoutMs: number;
  maxAttempts: number;
  backoff?: Partial<BackoffPolicy>;
}

/**
 * A read-only collaborator call (price, fees): each attempt gets its own
 * deadline and only transient failures are tried again. Never use this
 * for a broadcast.
 */
export function callCollaborator<T>(
  collaborator: string,
  fn: (signal: AbortSignal) => Promise<T>,
  opts: CollaboratorCallOptions,
): Promise<T> {
  return retryAsync(() => withTimeout(collaborator, opts.timeoutMs, fn), {
    maxAttempts: opts.maxAttempts,
    backoff: opts.backoff,
    shouldRetry: (err) => isTransientError(err),
    label: collaborator,
  });
}
