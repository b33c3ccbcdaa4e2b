import type { AccountInfo, PublicKey, TransactionInstruction } from "@solana/web3.js";
import type { Decimal } from "decimal.js";
import type { ProtocolTag, SnapshotMap } from "@tradewire/core";
import type { Quote, Side } from "../math.js";

/** Account data in the order returned by `snapshotAccounts`; null where the account does not exist. */
export type FetchedAccounts = ReadonlyArray<AccountInfo<Buffer> | null>;

/** Per-protocol overrides for market addresses that are otherwise derived from the mint. */
export interface MarketParamsMap {
  pumpfun: { readonly bondingCurve?: PublicKey };
  pumpswap: { readonly pool?: PublicKey };
  bonk: { readonly poolState?: PublicKey };
}

export type MarketParams<P extends ProtocolTag> = MarketParamsMap[P];

export interface BuildRequest<P extends ProtocolTag> {
  readonly payer: PublicKey;
  readonly mint: PublicKey;
  readonly quote: Quote;
  /** Floor placed on chain; already reconciled with any caller minimum. */
  readonly minOut: bigint;
  readonly snapshot: SnapshotMap[P];
  readonly creator?: PublicKey;
  readonly params?: MarketParams<P>;
  /** Close the payer's token account after a sell. */
  readonly closeTokenAccount?: boolean;
}

/**
 * One launchpad or AMM program. Pure: state comes in as a snapshot, instructions go out.
 */
export interface ProtocolAdapter<P extends ProtocolTag> {
  readonly protocol: P;
  readonly programId: PublicKey;

  quote(side: Side, amount: bigint, slippageBps: number, snapshot: SnapshotMap[P], creator?: PublicKey): Quote;
  build(req: BuildRequest<P>): TransactionInstruction[];

  /** Accounts whose data `decodeSnapshot` needs, in order. */
  snapshotAccounts(mint: PublicKey, params?: MarketParams<P>): PublicKey[];
  decodeSnapshot(mint: PublicKey, accounts: FetchedAccounts, params?: MarketParams<P>): SnapshotMap[P];

  /** Quote atoms per token atom, before fees. */
  spotPrice(snapshot: SnapshotMap[P]): Decimal;
}
