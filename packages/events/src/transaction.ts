import type { PublicKey } from "@solana/web3.js";
import type { DecodeError, ProtocolTag } from "@tradewire/core";
import { classify, stripEventTag } from "./classify.js";
import type { DiscriminatorRegistry } from "./registry.js";
import { isTrade, type TradeEvent } from "./types.js";

export interface PayloadRef {
  readonly programId: PublicKey | string;
  readonly data: Uint8Array;
  readonly accounts?: readonly (PublicKey | undefined)[];
}

export interface TransactionDecodeOptions {
  readonly signature: string;
  readonly slot: bigint;
  readonly protocols?: ReadonlySet<ProtocolTag>;
  readonly registry?: DiscriminatorRegistry;
  readonly onError?: (error: DecodeError, payload: PayloadRef) => void;
}

/**
 * Decodes every payload of one transaction. The same event bytes seen twice
 * (program log and self-CPI) yield one event.
 */
export function decodeTransaction(payloads: readonly PayloadRef[], opts: TransactionDecodeOptions): TradeEvent[] {
  const seen = new Set<string>();
  const events: TradeEvent[] = [];
  for (const p of payloads) {
    const program = typeof p.programId === "string" ? p.programId : p.programId.toBase58();
    const key = `${program}:${Buffer.from(stripEventTag(p.data)).toString("hex")}`;
    if (seen.has(key)) continue;
    seen.add(key);
    const res = classify(p.data, p.programId, {
      protocols: opts.protocols,
      signature: opts.signature,
      slot: opts.slot,
      accounts: p.accounts,
      registry: opts.registry,
    });
    if (res.ok) events.push(res.event);
    else opts.onError?.(res.error, p);
  }
  return markCreatorTrades(events);
}

/** Flags trades by the creator of a market created in the same transaction. */
export function markCreatorTrades(events: readonly TradeEvent[]): TradeEvent[] {
  const creators = new Map<ProtocolTag, Set<string>>();
  for (const e of events) {
    if (e.kind !== "create") continue;
    const set = creators.get(e.protocol) ?? new Set<string>();
    set.add(e.creator.toBase58());
    if (e.protocol === "pumpfun") set.add(e.user.toBase58());
    creators.set(e.protocol, set);
  }
  if (creators.size === 0) return [...events];
  return events.map((e): TradeEvent => {
    if (!isTrade(e)) return e;
    const set = creators.get(e.protocol);
    if (!set) return e;
    if (e.user === undefined || !set.has(e.user.toBase58())) return e;
    return { ...e, isCreatorTrade: true };
  });
}
