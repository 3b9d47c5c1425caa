import { TimeoutError } from '../errors';

/**
 * Resolves after `ms`, or early (without rejecting) once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  signal?: AbortSignal;
  onFailure?: (error: unknown, attempt: number) => void;
}

/**
 * Runs `task` up to `attempts` times with a fixed delay in between.
 * Returns null once every attempt failed; never loops past the bound.
 */
export async function retry<T>(task: () => Promise<T>, options: RetryOptions): Promise<T | null> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (options.signal?.aborted) return null;
    try {
      return await task();
    } catch (error) {
      options.onFailure?.(error, attempt);
      if (attempt < attempts) {
        await sleep(options.delayMs, options.signal);
      }
    }
  }
  return null;
}

/** Resolves once `signal` aborts. */
export function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}
