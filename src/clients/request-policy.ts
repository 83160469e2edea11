export class CallTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CallAbortedError extends Error {
  constructor(label: string) {
    super(`${label} was aborted`);
    this.name = "CallAbortedError";
  }
}

export interface TimeoutOptions {
  label: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface RetryOptions {
  retries: number;
  retryDelayMs: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation` with its own AbortSignal that fires when the timeout
 * elapses or the parent signal aborts. The returned promise settles at that
 * moment even if the operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  if (options.signal?.aborted) {
    throw new CallAbortedError(options.label);
  }

  const controller = new AbortController();
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new CallTimeoutError(options.label, options.timeoutMs);
      controller.abort(error);
      reject(error);
    }, options.timeoutMs);

    onParentAbort = () => {
      const error = new CallAbortedError(options.label);
      controller.abort(error);
      reject(error);
    };
    options.signal?.addEventListener("abort", onParentAbort, { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    clearTimeout(timeoutHandle);
    if (onParentAbort) {
      options.signal?.removeEventListener("abort", onParentAbort);
    }
  }
}

export async function withRetries<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.retries);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (error instanceof CallAbortedError || options.signal?.aborted) {
        throw error;
      }
      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }
      if (attempt < attempts) {
        await delay(options.retryDelayMs * attempt);
      }
    }
  }

  throw lastError;
}
