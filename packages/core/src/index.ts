export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timeout);
      reject(abortReason(signal));
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    timeout.unref?.();

    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }

      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export interface BackoffPolicy {
  baseDelayMs: number;
  factor?: number;
  maxDelayMs?: number;
}

/**
 * Geometric delay for the given 1-based attempt, capped at `maxDelayMs`.
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  const factor = policy.factor ?? 2;
  const exponent = Math.max(0, attempt - 1);
  const delay = policy.baseDelayMs * factor ** exponent;
  const capped = typeof policy.maxDelayMs === 'number' ? Math.min(delay, policy.maxDelayMs) : delay;
  return Math.max(0, Math.round(capped));
}

export interface RetryOptions extends BackoffPolicy {
  attempts?: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function retry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === attempts || options.signal?.aborted) {
        break;
      }
      if (options.shouldRetry && !options.shouldRetry(error, attempt)) {
        break;
      }
      const delayMs = computeBackoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
  throw lastError;
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error('Sleep aborted');
  error.name = 'AbortError';
  return error;
}

export * from './serial.js';
