import type { PublicKey } from "@solana/web3.js";
import type { ProtocolTag } from "./protocols.js";

/** pumpfun bonding curve state. */
export interface BondingCurveSnapshot {
  readonly protocol: "pumpfun";
  readonly virtualTokenReserves: bigint;
  readonly virtualSolReserves: bigint;
  readonly realTokenReserves: bigint;
  readonly realSolReserves: bigint;
  readonly tokenTotalSupply: bigint;
  readonly complete: boolean;
  readonly creator?: PublicKey;
  readonly feeBasisPoints: bigint;
  readonly creatorFeeBasisPoints: bigint;
}

/** pumpswap pool state; base is the token, quote is wrapped SOL. */
export interface PoolSnapshot {
  readonly protocol: "pumpswap";
  readonly pool: PublicKey;
  readonly baseReserve: bigint;
  readonly quoteReserve: bigint;
  readonly coinCreator?: PublicKey;
  readonly lpFeeBps: bigint;
  readonly protocolFeeBps: bigint;
  readonly coinCreatorFeeBps: bigint;
}

export type LaunchpadStatus = "fund" | "migrate" | "trade";

/** bonk launchpad pool state. Rates are basis points of the traded amount. */
export interface LaunchpadSnapshot {
  readonly protocol: "bonk";
  readonly poolState: PublicKey;
  readonly virtualBase: bigint;
  readonly virtualQuote: bigint;
  readonly realBase: bigint;
  readonly realQuote: bigint;
  readonly status: LaunchpadStatus;
  readonly protocolFeeRate: bigint;
  readonly platformFeeRate: bigint;
  readonly shareFeeRate: bigint;
}

export interface SnapshotMap {
  pumpfun: BondingCurveSnapshot;
  pumpswap: PoolSnapshot;
  bonk: LaunchpadSnapshot;
}

export type MarketSnapshot = SnapshotMap[ProtocolTag];

export function isSnapshotFor<P extends ProtocolTag>(
  protocol: P,
  snapshot: MarketSnapshot,
): snapshot is SnapshotMap[P] {
  return snapshot.protocol === protocol;
}
