import type { PublicKey } from "@solana/web3.js";
import { PROGRAM_IDS, type ProtocolTag } from "@tradewire/core";
import { protocolFilter } from "@tradewire/events";

/** Narrowing beyond the protocol set. Every listed condition must hold. */
export interface ExtraFilters {
  /** At least one of these accounts appears in the transaction. */
  readonly accountInclude?: readonly string[];
  /** All of these accounts appear in the transaction. */
  readonly accountRequired?: readonly string[];
  readonly signature?: string;
}

export interface EventFilter {
  readonly protocols: ReadonlySet<ProtocolTag>;
  readonly programIds: readonly string[];
  readonly extra: ExtraFilters;
}

export function eventFilter(protocols: Iterable<ProtocolTag>, extra: ExtraFilters = {}): EventFilter {
  const selected = protocolFilter(protocols);
  return {
    protocols: selected,
    programIds: [...selected].map((p) => PROGRAM_IDS[p].toBase58()),
    extra,
  };
}

/** Client-side check for transports that cannot filter on the server. */
export function matchesExtraFilters(
  extra: ExtraFilters,
  signature: string,
  accountKeys: readonly (PublicKey | string)[],
): boolean {
  if (extra.signature && extra.signature !== signature) return false;
  const include = extra.accountInclude ?? [];
  const required = extra.accountRequired ?? [];
  if (include.length === 0 && required.length === 0) return true;
  const keys = new Set(accountKeys.map((k) => (typeof k === "string" ? k : k.toBase58())));
  if (include.length && !include.some((k) => keys.has(k))) return false;
  return required.every((k) => keys.has(k));
}
