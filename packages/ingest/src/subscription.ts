import { NetworkError, logger, parseIntEnv, toError, type DecodeError } from "@tradewire/core";
import type { TradeEvent } from "@tradewire/events";
import { backoffDelay, jitter } from "@tradewire/rpc-facade";

const log = logger.scope("ingest");

export type EventCallback = (event: TradeEvent) => void;

export interface StreamHandlers<T> {
  onMessage(message: T): void;
  /** End of stream; `error` is absent for a clean server-side end. */
  onClose(error?: Error): void;
}

export interface OpenStream {
  close(): void;
}

/** Opens one transport stream and reports its messages and end through `handlers`. */
export type StreamOpener<T> = (handlers: StreamHandlers<T>) => Promise<OpenStream>;

export interface ReconnectOptions {
  readonly maxRetries: number;
  readonly baseMs: number;
  readonly maxMs: number;
  /** Spread delays ±25%. Default true. */
  readonly jitter?: boolean;
}

export function reconnectFromEnv(env: Record<string, string | undefined> = process.env): ReconnectOptions {
  return {
    maxRetries: parseIntEnv(env.INGEST_MAX_RETRIES, 10, 0),
    baseMs: parseIntEnv(env.INGEST_BACKOFF_BASE_MS, 1000, 1),
    maxMs: parseIntEnv(env.INGEST_BACKOFF_MAX_MS, 30_000, 1),
  };
}

export type SubscriptionOutcome =
  | { readonly status: "closed" }
  | { readonly status: "failed"; readonly error: NetworkError };

export interface SubscriptionHandle {
  /** Stops delivery and closes the underlying stream. Idempotent. */
  close(): void;
  /** Settles once: "closed" after close(), "failed" once reconnects are exhausted. */
  readonly done: Promise<SubscriptionOutcome>;
}

export interface SubscriptionHooks {
  /** Terminal transport failure; no further events follow. */
  onError?(error: NetworkError): void;
  onDecodeError?(error: DecodeError): void;
  onReconnect?(attempt: number, delayMs: number): void;
}

/**
 * Keeps one logical subscription alive across transport failures. Attempts count
 * consecutive failures and reset once a reconnected stream delivers a message.
 */
export function keepSubscribed<T>(
  source: string,
  open: StreamOpener<T>,
  onMessage: (message: T) => void,
  opts: ReconnectOptions,
  hooks: SubscriptionHooks = {},
): SubscriptionHandle {
  let stopped = false;
  let attempt = 0;
  let current: OpenStream | undefined;
  let retryTimer: NodeJS.Timeout | undefined;
  let settle: (outcome: SubscriptionOutcome) => void = () => {};
  const done = new Promise<SubscriptionOutcome>((resolve) => {
    settle = resolve;
  });

  const finish = (outcome: SubscriptionOutcome): void => {
    if (stopped) return;
    stopped = true;
    if (retryTimer) clearTimeout(retryTimer);
    retryTimer = undefined;
    current?.close();
    current = undefined;
    settle(outcome);
  };

  const retry = (cause: Error): void => {
    if (stopped) return;
    attempt++;
    if (attempt > opts.maxRetries) {
      const error = new NetworkError(
        `${source} stream lost after ${opts.maxRetries} reconnect attempts: ${cause.message}`,
        { cause },
      );
      log.log("stream_failed", { source, attempts: opts.maxRetries, error: cause.message });
      finish({ status: "failed", error });
      hooks.onError?.(error);
      return;
    }
    const base = backoffDelay(attempt, opts.baseMs, opts.maxMs);
    const delayMs = opts.jitter === false ? base : jitter(base);
    log.log("reconnect_scheduled", { source, attempt, delay_ms: delayMs, error: cause.message });
    hooks.onReconnect?.(attempt, delayMs);
    retryTimer = setTimeout(() => {
      retryTimer = undefined;
      void connect();
    }, delayMs);
  };

  const connect = async (): Promise<void> => {
    let ended = false;
    let delivered = false;
    const handlers: StreamHandlers<T> = {
      onMessage(message) {
        if (stopped || ended) return;
        if (!delivered) {
          delivered = true;
          attempt = 0;
        }
        onMessage(message);
      },
      onClose(error) {
        if (ended) return;
        ended = true;
        current = undefined;
        retry(error ?? new Error("stream ended"));
      },
    };
    try {
      const stream = await open(handlers);
      if (stopped || ended) {
        stream.close();
        return;
      }
      current = stream;
      log.log("stream_open", { source, attempt });
    } catch (e) {
      if (ended) return;
      ended = true;
      retry(toError(e));
    }
  };

  void connect();
  return {
    close: () => finish({ status: "closed" }),
    done,
  };
}

/** Logs the first `burst` decode errors, then one in every `every`. */
export function decodeErrorLogger(source: string, burst = 20, every = 1000): (error: DecodeError) => void {
  let seen = 0;
  return (error) => {
    seen++;
    if (seen <= burst || seen % every === 0) {
      log.log("decode_error", { source, reason: error.reason, error: error.message, seen });
    }
  };
}
