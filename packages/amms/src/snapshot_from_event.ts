import type { MarketSnapshot } from "@tradewire/core";
import type { BonkTradeEvent, PumpFunEvent, PumpSwapEvent, TradeEvent } from "@tradewire/events";
import {
  BONK_PLATFORM_FEE_RATE,
  BONK_PROTOCOL_FEE_RATE,
  BONK_SHARE_FEE_RATE,
} from "./adapters/bonk.js";
import { PUMPFUN_CREATOR_FEE_BPS, PUMPFUN_FEE_BPS, PUMPFUN_INITIAL_CURVE } from "./adapters/pumpfun.js";
import {
  PUMPSWAP_COIN_CREATOR_FEE_BPS,
  PUMPSWAP_LP_FEE_BPS,
  PUMPSWAP_PROTOCOL_FEE_BPS,
} from "./adapters/pumpswap.js";
import { isSetKey } from "./pda.js";

function fromPumpFun(e: PumpFunEvent): MarketSnapshot | undefined {
  if (e.kind === "create") {
    if (!e.curve) return undefined;
    return {
      protocol: "pumpfun",
      ...e.curve,
      realSolReserves: 0n,
      complete: false,
      creator: e.creator,
      feeBasisPoints: PUMPFUN_FEE_BPS,
      creatorFeeBasisPoints: PUMPFUN_CREATOR_FEE_BPS,
    };
  }
  if (e.kind === "complete" || !e.curve) return undefined;
  const creator = e.fees && isSetKey(e.fees.creator) ? e.fees.creator : undefined;
  return {
    protocol: "pumpfun",
    ...e.curve,
    tokenTotalSupply: PUMPFUN_INITIAL_CURVE.tokenTotalSupply,
    complete: e.curve.realTokenReserves === 0n,
    creator,
    feeBasisPoints: e.fees?.feeBasisPoints ?? PUMPFUN_FEE_BPS,
    creatorFeeBasisPoints: e.fees?.creatorFeeBasisPoints ?? PUMPFUN_CREATOR_FEE_BPS,
  };
}

function fromPumpSwap(e: PumpSwapEvent): MarketSnapshot | undefined {
  const defaults = {
    lpFeeBps: PUMPSWAP_LP_FEE_BPS,
    protocolFeeBps: PUMPSWAP_PROTOCOL_FEE_BPS,
    coinCreatorFeeBps: PUMPSWAP_COIN_CREATOR_FEE_BPS,
  };
  if (e.kind === "create") {
    if (!e.detail) return undefined;
    return {
      protocol: "pumpswap",
      pool: e.pool,
      baseReserve: e.detail.poolBaseAmount,
      quoteReserve: e.detail.poolQuoteAmount,
      coinCreator: isSetKey(e.coinCreator) ? e.coinCreator : undefined,
      ...defaults,
    };
  }
  if (e.kind !== "buy" && e.kind !== "sell") return undefined;
  if (!e.reserves) return undefined;
  // Event reserves are pre-trade.
  const buy = e.kind === "buy";
  return {
    protocol: "pumpswap",
    pool: e.pool,
    baseReserve: buy ? e.reserves.base - e.baseAmount : e.reserves.base + e.baseAmount,
    quoteReserve: buy ? e.reserves.quote + e.quoteAmount : e.reserves.quote - e.quoteAmount,
    coinCreator: isSetKey(e.coinCreator) ? e.coinCreator : undefined,
    lpFeeBps: e.fees?.lpFeeBps ?? defaults.lpFeeBps,
    protocolFeeBps: e.fees?.protocolFeeBps ?? defaults.protocolFeeBps,
    coinCreatorFeeBps: e.fees?.coinCreatorFeeBps ?? defaults.coinCreatorFeeBps,
  };
}

function fromBonk(e: BonkTradeEvent): MarketSnapshot | undefined {
  if (!e.curve || !e.poolStatus) return undefined;
  return {
    protocol: "bonk",
    poolState: e.poolState,
    virtualBase: e.curve.virtualBase,
    virtualQuote: e.curve.virtualQuote,
    realBase: e.curve.realBaseAfter,
    realQuote: e.curve.realQuoteAfter,
    status: e.poolStatus,
    protocolFeeRate: BONK_PROTOCOL_FEE_RATE,
    platformFeeRate: BONK_PLATFORM_FEE_RATE,
    shareFeeRate: e.shareFeeRate ?? BONK_SHARE_FEE_RATE,
  };
}

/**
 * Market state right after an observed event, for trading against it without a chain read.
 * Undefined when the event does not carry enough state (instruction-derived events, completions).
 */
export function snapshotFromEvent(event: TradeEvent): MarketSnapshot | undefined {
  switch (event.protocol) {
    case "pumpfun":
      return fromPumpFun(event);
    case "pumpswap":
      return fromPumpSwap(event);
    case "bonk":
      return event.kind === "create" ? undefined : fromBonk(event);
  }
}
