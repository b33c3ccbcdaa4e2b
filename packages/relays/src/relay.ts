import type { PublicKey } from "@solana/web3.js";
import type { RelayKind } from "@tradewire/core";

/** A submission path for signed transactions. */
export interface Relay {
  readonly name: string;
  readonly kind: RelayKind;
  /** Account to tip for this relay, or undefined when it takes none. */
  tipAccount(): PublicKey | undefined;
  /**
   * Sends the serialized transaction. Resolves with the signature the relay reported,
   * if any. Rejects with a NetworkError; honors `signal` by rejecting promptly.
   */
  submit(raw: Uint8Array, signal: AbortSignal): Promise<string | undefined>;
}
