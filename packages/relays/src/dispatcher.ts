import bs58 from "bs58";
import type { PublicKey, VersionedTransaction } from "@solana/web3.js";
import { AllRelaysFailed, ValidationError, logger } from "@tradewire/core";
import { firstSuccess } from "./race.js";
import type { Relay } from "./relay.js";

const log = logger.scope("relay");

export interface DispatchEntry {
  readonly relay: Relay;
  readonly timeoutMs: number;
}

export interface DispatchOptions {
  /** Relays to race; defaults to all. */
  readonly relays?: readonly Relay[];
  /** Free-form label carried into logs, e.g. "pumpfun_buy". */
  readonly scope?: string;
}

export interface DispatchResult {
  readonly signature: string;
  readonly relay: string;
  /** Signature as reported by the winning relay, when it reported one. */
  readonly reported?: string;
  readonly elapsedMs: number;
}

export interface TransactionDispatcher {
  select(useRelays: boolean): readonly Relay[];
  submit(tx: VersionedTransaction, opts?: DispatchOptions): Promise<DispatchResult>;
}

export function transactionSignature(tx: VersionedTransaction): string {
  const sig = tx.signatures[0];
  if (!sig || sig.every((b) => b === 0)) throw new ValidationError("signature", "transaction is not signed");
  return bs58.encode(sig);
}

/** Fans one signed transaction out to every selected relay; first acceptance wins. */
export class RelayDispatcher implements TransactionDispatcher {
  private readonly timeouts = new Map<Relay, number>();
  readonly relays: readonly Relay[];

  constructor(entries: readonly DispatchEntry[]) {
    this.relays = entries.map((e) => e.relay);
    for (const e of entries) this.timeouts.set(e.relay, e.timeoutMs);
  }

  /** All relays, or only the plain rpc ones when relays are not wanted. */
  select(useRelays: boolean): readonly Relay[] {
    if (useRelays) return this.relays;
    const rpc = this.relays.filter((r) => r.kind === "rpc");
    if (!rpc.length) throw new ValidationError("relays", "no rpc relay configured");
    return rpc;
  }

  /** One tip account per tip-taking relay among `relays`, in order. */
  static tipAccounts(relays: readonly Relay[]): PublicKey[] {
    return relays.flatMap((r) => {
      const account = r.tipAccount();
      return account ? [account] : [];
    });
  }

  async submit(tx: VersionedTransaction, opts: DispatchOptions = {}): Promise<DispatchResult> {
    const signature = transactionSignature(tx);
    const raw = tx.serialize();
    const relays = opts.relays ?? this.relays;
    const scope = opts.scope ?? "submit";
    try {
      const winner = await firstSuccess(
        relays.map((relay) => ({
          name: relay.name,
          timeoutMs: this.timeouts.get(relay) ?? 5_000,
          run: (signal: AbortSignal) => relay.submit(raw, signal),
        })),
      );
      if (winner.value && winner.value !== signature) {
        log.log("submit_signature_mismatch", { scope, relay: winner.name, expected: signature, reported: winner.value });
      }
      log.log("submit_ok", { scope, relay: winner.name, signature, elapsed_ms: winner.elapsedMs, raced: relays.length });
      return { signature, relay: winner.name, reported: winner.value, elapsedMs: winner.elapsedMs };
    } catch (e) {
      if (e instanceof AllRelaysFailed) {
        log.log("submit_failed", {
          scope,
          signature,
          failures: e.failures.map((f) => ({ relay: f.relay, error: f.error.message })),
        });
      }
      throw e;
    }
  }
}
