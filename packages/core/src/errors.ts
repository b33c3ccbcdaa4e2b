export type ErrorCode =
  | "network"
  | "decode"
  | "validation"
  | "slippage_exceeded"
  | "all_relays_failed";

export class TradeKitError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** RPC, stream or relay I/O failure. */
export class NetworkError extends TradeKitError {
  readonly endpoint?: string;
  readonly status?: number;

  constructor(message: string, opts: { endpoint?: string; status?: number; cause?: unknown } = {}) {
    super("network", message, { cause: opts.cause });
    this.endpoint = opts.endpoint;
    this.status = opts.status;
  }
}

export type DecodeFailure =
  | "unknown_program"
  | "protocol_filtered"
  | "unknown_discriminator"
  | "truncated"
  | "missing_account"
  | "malformed";

export class DecodeError extends TradeKitError {
  readonly reason: DecodeFailure;

  constructor(reason: DecodeFailure, message: string, options?: { cause?: unknown }) {
    super("decode", message, options);
    this.reason = reason;
  }
}

export class ValidationError extends TradeKitError {
  /** The caller input or adapter prerequisite that failed. */
  readonly requirement: string;

  constructor(requirement: string, message: string) {
    super("validation", message);
    this.requirement = requirement;
  }
}

export class SlippageExceeded extends TradeKitError {
  readonly expected: bigint;
  readonly required: bigint;

  constructor(expected: bigint, required: bigint) {
    super(
      "slippage_exceeded",
      `quoted output ${expected} is below the required minimum ${required}`,
    );
    this.expected = expected;
    this.required = required;
  }
}

export interface RelayFailure {
  readonly relay: string;
  readonly error: Error;
}

export class AllRelaysFailed extends TradeKitError {
  readonly failures: readonly RelayFailure[];

  constructor(failures: readonly RelayFailure[]) {
    const detail = failures.map((f) => `${f.relay}: ${f.error.message}`).join("; ");
    super("all_relays_failed", `all ${failures.length} relays failed (${detail})`);
    this.failures = failures;
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
