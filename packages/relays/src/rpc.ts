import type { Connection } from "@solana/web3.js";
import { NetworkError, errorMessage } from "@tradewire/core";
import type { Relay } from "./relay.js";

export type RawTransactionSender = Pick<Connection, "sendRawTransaction">;

function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new NetworkError("aborted");
}

/** Rejects as soon as `signal` aborts; the underlying work is left to finish on its own. */
export function abortable<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(abortError(signal));
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
  });
}

/** Plain `sendTransaction` against the configured RPC node. Takes no tip. */
export class RpcRelay implements Relay {
  readonly kind = "rpc";

  constructor(
    readonly name: string,
    private readonly conn: RawTransactionSender,
  ) {}

  tipAccount(): undefined {
    return undefined;
  }

  async submit(raw: Uint8Array, signal: AbortSignal): Promise<string> {
    try {
      return await abortable(this.conn.sendRawTransaction(raw, { skipPreflight: true, maxRetries: 0 }), signal);
    } catch (e) {
      if (e instanceof NetworkError) throw e;
      throw new NetworkError(`${this.name}: ${errorMessage(e)}`, { cause: e });
    }
  }
}
