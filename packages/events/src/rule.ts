import type { PublicKey } from "@solana/web3.js";
import { DecodeError } from "@tradewire/core";
import type { BorshReader } from "./reader.js";
import type { EventMeta, EventOrigin, TradeEvent } from "./types.js";

export class RuleContext {
  constructor(
    readonly signature: string,
    readonly slot: bigint,
    private readonly accounts?: readonly (PublicKey | undefined)[],
  ) {}

  meta(origin: EventOrigin): EventMeta {
    return { signature: this.signature, slot: this.slot, origin, isCreatorTrade: false };
  }

  account(index: number, label: string): PublicKey {
    const key = this.accounts?.[index];
    if (!key) throw new DecodeError("missing_account", `${label} (account #${index}) is not available`);
    return key;
  }
}

export interface DecodeRule {
  readonly name: string;
  readonly origin: EventOrigin;
  readonly discriminator: Uint8Array;
  /** `r` is positioned just past the discriminator. */
  decode(r: BorshReader, ctx: RuleContext): TradeEvent;
}
