export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
  retryOn: (err: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (meta: { attempt: number; error: unknown; delayMs: number }) => void;
  onGiveup?: (meta: { attempt: number; error: unknown }) => void;
}

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

/** 429 and 5xx are worth another try; everything else is the caller's problem. */
export function isTransientHttpError(err: unknown): boolean {
  if (!(err instanceof HttpStatusError)) return false;
  return err.status === 429 || err.status >= 500;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new Error("Aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new Error("Aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function backoff(base: number, max: number, attempt: number, jitter: boolean): number {
  const raw = Math.min(max, base * Math.pow(2, attempt));
  if (!jitter) return raw;
  const delta = Math.floor(raw * 0.2);
  return raw - delta + Math.floor(Math.random() * (2 * delta + 1));
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= opts.retries; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= opts.retries || !opts.retryOn(error) || opts.signal?.aborted) {
        opts.onGiveup?.({ attempt: attempt + 1, error });
        throw error;
      }
      const delayMs = backoff(opts.baseDelayMs, opts.maxDelayMs, attempt, opts.jitter);
      opts.onRetry?.({ attempt: attempt + 1, error, delayMs });
      await sleep(delayMs, opts.signal);
    }
  }
  throw lastError;
}
