import type { PublicKey } from "@solana/web3.js";
import type { LaunchpadStatus, ProtocolTag } from "@tradewire/core";

/** Where the fields came from: an emitted program event, or the instruction arguments. */
export type EventOrigin = "event" | "instruction";

export type EventKind = "create" | "buy" | "sell" | "deposit" | "withdraw" | "complete";

export interface EventMeta {
  readonly signature: string;
  readonly slot: bigint;
  readonly origin: EventOrigin;
  /** True for a trade made by the creator inside the transaction that created the market. */
  readonly isCreatorTrade: boolean;
}

// ── pumpfun ─────────────────────────────────────────────────────

export interface PumpFunCreateEvent extends EventMeta {
  readonly protocol: "pumpfun";
  readonly kind: "create";
  readonly name: string;
  readonly symbol: string;
  readonly uri: string;
  readonly mint: PublicKey;
  readonly bondingCurve: PublicKey;
  readonly user: PublicKey;
  readonly creator: PublicKey;
  readonly timestamp?: bigint;
  readonly curve?: {
    readonly virtualTokenReserves: bigint;
    readonly virtualSolReserves: bigint;
    readonly realTokenReserves: bigint;
    readonly tokenTotalSupply: bigint;
  };
}

export interface PumpFunTradeEvent extends EventMeta {
  readonly protocol: "pumpfun";
  readonly kind: "buy" | "sell";
  readonly mint: PublicKey;
  readonly user: PublicKey;
  /** Actual SOL moved for events; max cost (buy) or min output (sell) for instructions. */
  readonly solAmount: bigint;
  readonly tokenAmount: bigint;
  readonly bondingCurve?: PublicKey;
  readonly timestamp?: bigint;
  /** Reserves after the trade. */
  readonly curve?: {
    readonly virtualSolReserves: bigint;
    readonly virtualTokenReserves: bigint;
    readonly realSolReserves: bigint;
    readonly realTokenReserves: bigint;
  };
  readonly fees?: {
    readonly feeRecipient: PublicKey;
    readonly feeBasisPoints: bigint;
    readonly fee: bigint;
    readonly creator: PublicKey;
    readonly creatorFeeBasisPoints: bigint;
    readonly creatorFee: bigint;
  };
}

export interface PumpFunCompleteEvent extends EventMeta {
  readonly protocol: "pumpfun";
  readonly kind: "complete";
  readonly user: PublicKey;
  readonly mint: PublicKey;
  readonly bondingCurve: PublicKey;
  readonly timestamp: bigint;
}

export type PumpFunEvent = PumpFunCreateEvent | PumpFunTradeEvent | PumpFunCompleteEvent;

// ── pumpswap ────────────────────────────────────────────────────

export interface PoolReserves {
  readonly base: bigint;
  readonly quote: bigint;
}

export interface PumpSwapCreateEvent extends EventMeta {
  readonly protocol: "pumpswap";
  readonly kind: "create";
  readonly pool: PublicKey;
  readonly creator: PublicKey;
  readonly baseMint: PublicKey;
  readonly quoteMint: PublicKey;
  readonly lpMint?: PublicKey;
  readonly index: number;
  readonly baseAmountIn: bigint;
  readonly quoteAmountIn: bigint;
  readonly coinCreator: PublicKey;
  readonly timestamp?: bigint;
  readonly detail?: {
    readonly baseMintDecimals: number;
    readonly quoteMintDecimals: number;
    readonly poolBaseAmount: bigint;
    readonly poolQuoteAmount: bigint;
    readonly minimumLiquidity: bigint;
    readonly initialLiquidity: bigint;
    readonly lpTokenAmountOut: bigint;
    readonly poolBump: number;
  };
}

export interface PumpSwapTradeEvent extends EventMeta {
  readonly protocol: "pumpswap";
  readonly kind: "buy" | "sell";
  readonly pool: PublicKey;
  readonly user: PublicKey;
  readonly baseAmount: bigint;
  /** Quote actually paid or received; equals `quoteLimit` for instructions. */
  readonly quoteAmount: bigint;
  /** max_quote_amount_in (buy) or min_quote_amount_out (sell). */
  readonly quoteLimit: bigint;
  readonly baseMint?: PublicKey;
  readonly quoteMint?: PublicKey;
  readonly timestamp?: bigint;
  /** Pool reserves before the trade. */
  readonly reserves?: PoolReserves;
  readonly coinCreator?: PublicKey;
  readonly fees?: {
    readonly lpFeeBps: bigint;
    readonly lpFee: bigint;
    readonly protocolFeeBps: bigint;
    readonly protocolFee: bigint;
    readonly coinCreatorFeeBps: bigint;
    readonly coinCreatorFee: bigint;
  };
}

export interface PumpSwapLiquidityEvent extends EventMeta {
  readonly protocol: "pumpswap";
  readonly kind: "deposit" | "withdraw";
  readonly pool: PublicKey;
  readonly user: PublicKey;
  readonly lpTokenAmount: bigint;
  /** Actual amounts for events; max in (deposit) or min out (withdraw) for instructions. */
  readonly baseAmount: bigint;
  readonly quoteAmount: bigint;
  readonly lpMint?: PublicKey;
  readonly timestamp?: bigint;
  readonly reserves?: PoolReserves;
  readonly lpMintSupply?: bigint;
}

export type PumpSwapEvent = PumpSwapCreateEvent | PumpSwapTradeEvent | PumpSwapLiquidityEvent;

// ── bonk ────────────────────────────────────────────────────────

export type BonkCurveParams =
  | {
      readonly type: "constant";
      readonly supply: bigint;
      readonly totalBaseSell: bigint;
      readonly totalQuoteFundRaising: bigint;
      readonly migrateType: number;
    }
  | {
      readonly type: "fixed" | "linear";
      readonly supply: bigint;
      readonly totalQuoteFundRaising: bigint;
      readonly migrateType: number;
    };

export interface BonkCreateEvent extends EventMeta {
  readonly protocol: "bonk";
  readonly kind: "create";
  readonly poolState: PublicKey;
  readonly creator: PublicKey;
  readonly config: PublicKey;
  readonly decimals: number;
  readonly name: string;
  readonly symbol: string;
  readonly uri: string;
  readonly curve: BonkCurveParams;
  readonly vesting: {
    readonly totalLockedAmount: bigint;
    readonly cliffPeriod: bigint;
    readonly unlockPeriod: bigint;
  };
}

export interface BonkTradeEvent extends EventMeta {
  readonly protocol: "bonk";
  readonly kind: "buy" | "sell";
  readonly poolState: PublicKey;
  readonly amountIn: bigint;
  /** Actual output for events; minimum_amount_out for instructions. */
  readonly amountOut: bigint;
  readonly user?: PublicKey;
  readonly baseMint?: PublicKey;
  readonly quoteMint?: PublicKey;
  readonly shareFeeRate?: bigint;
  readonly curve?: {
    readonly totalBaseSell: bigint;
    readonly virtualBase: bigint;
    readonly virtualQuote: bigint;
    readonly realBaseBefore: bigint;
    readonly realQuoteBefore: bigint;
    readonly realBaseAfter: bigint;
    readonly realQuoteAfter: bigint;
  };
  readonly fees?: {
    readonly protocolFee: bigint;
    readonly platformFee: bigint;
    readonly shareFee: bigint;
  };
  readonly poolStatus?: LaunchpadStatus;
}

export type BonkEvent = BonkCreateEvent | BonkTradeEvent;

export type TradeEvent = PumpFunEvent | PumpSwapEvent | BonkEvent;

export type EventOf<P extends ProtocolTag> = Extract<TradeEvent, { protocol: P }>;

export function isTrade(
  e: TradeEvent,
): e is PumpFunTradeEvent | PumpSwapTradeEvent | BonkTradeEvent {
  return e.kind === "buy" || e.kind === "sell";
}
