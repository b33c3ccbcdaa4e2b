import { errorMessage, logger, parseBoolEnv, parseIntEnv } from "@tradewire/core";

const log = logger.scope("rpc");

export interface BackoffOptions {
  readonly maxConcurrency?: number;
  readonly maxRetries?: number;
  readonly baseMs?: number;
  readonly maxMs?: number;
}

export type ResolvedBackoff = Required<BackoffOptions>;

export function backoffFromEnv(env: Record<string, string | undefined> = process.env): ResolvedBackoff {
  return {
    maxConcurrency: parseIntEnv(env.RPC_BACKOFF_MAX_CONCURRENCY, 6, 1),
    maxRetries: parseIntEnv(env.RPC_BACKOFF_MAX_RETRIES, 5, 0),
    baseMs: parseIntEnv(env.RPC_BACKOFF_BASE_MS, 200, 1),
    maxMs: parseIntEnv(env.RPC_BACKOFF_MAX_MS, 2000, 1),
  };
}

const SHOULD_LOG = parseBoolEnv(process.env.RPC_BACKOFF_LOG, true);

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** ±25% around `ms`. */
export function jitter(ms: number): number {
  const r = (Math.random() - 0.5) * 0.5;
  return Math.max(0, Math.floor(ms * (1 + r)));
}

/** min(maxMs, baseMs * 2^(attempt-1)) before jitter. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * Math.pow(2, Math.max(0, attempt - 1)));
}

export class Semaphore {
  private current = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly max: number) {}

  get inFlight(): number {
    return this.current;
  }

  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    await new Promise<void>((res) => this.queue.push(res));
    this.current++;
  }

  release(): void {
    this.current = Math.max(0, this.current - 1);
    const next = this.queue.shift();
    if (next) next();
  }

  async run<T>(work: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await work();
    } finally {
      this.release();
    }
  }
}

export function classifyError(e: unknown): { retry: boolean; rateLimited: boolean } {
  if (e == null) return { retry: false, rateLimited: false };
  const msg = errorMessage(e).toLowerCase();
  const rateLimited = msg.includes("429") || msg.includes("rate limit") || msg.includes("too many requests");
  const transient =
    rateLimited ||
    msg.includes("timeout") ||
    msg.includes("timed out") ||
    msg.includes("fetch failed") ||
    msg.includes("econnreset") ||
    msg.includes("internal server error") ||
    msg.includes("502") ||
    msg.includes("503") ||
    msg.includes("504");
  return { retry: transient, rateLimited };
}

export async function callWithRetry<T>(
  fn: () => Promise<T>,
  opts: Pick<ResolvedBackoff, "maxRetries" | "baseMs" | "maxMs"> & { label: string },
): Promise<T> {
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn();
    } catch (err) {
      const { retry, rateLimited } = classifyError(err);
      if (!retry || attempt > opts.maxRetries) {
        if (SHOULD_LOG) log.log("backoff_final_error", { label: opts.label, attempt, error: errorMessage(err) });
        throw err;
      }
      const wait = jitter(backoffDelay(attempt, opts.baseMs, opts.maxMs));
      if (SHOULD_LOG) {
        const rec: Record<string, unknown> = { label: opts.label, attempt, wait_ms: wait, error: errorMessage(err) };
        if (rateLimited) rec.rate_limited = true;
        log.log("backoff_retry", rec);
      }
      await sleep(wait);
    }
  }
}
