import { DecodeError, type LaunchpadStatus } from "@tradewire/core";
import type { BorshReader } from "../reader.js";
import type { DecodeRule } from "../rule.js";
import { BONK } from "../discriminators.js";
import type { BonkCreateEvent, BonkCurveParams, BonkTradeEvent } from "../types.js";

const POOL_STATUS: readonly LaunchpadStatus[] = ["fund", "migrate", "trade"];

export function poolStatusFromByte(v: number): LaunchpadStatus {
  const status = POOL_STATUS[v];
  if (status === undefined) throw new DecodeError("malformed", `unknown pool status ${v}`);
  return status;
}

function curveParams(r: BorshReader): BonkCurveParams {
  const variant = r.u8();
  switch (variant) {
    case 0: {
      const supply = r.u64();
      const totalBaseSell = r.u64();
      const totalQuoteFundRaising = r.u64();
      const migrateType = r.u8();
      return { type: "constant", supply, totalBaseSell, totalQuoteFundRaising, migrateType };
    }
    case 1:
    case 2: {
      const supply = r.u64();
      const totalQuoteFundRaising = r.u64();
      const migrateType = r.u8();
      return { type: variant === 1 ? "fixed" : "linear", supply, totalQuoteFundRaising, migrateType };
    }
    default:
      throw new DecodeError("malformed", `unknown curve params variant ${variant}`);
  }
}

const poolCreateEvent: DecodeRule = {
  name: "bonk.PoolCreateEvent",
  origin: "event",
  discriminator: BONK.events.poolCreate,
  decode(r, ctx): BonkCreateEvent {
    const poolState = r.pubkey();
    const creator = r.pubkey();
    const config = r.pubkey();
    const decimals = r.u8();
    const name = r.string();
    const symbol = r.string();
    const uri = r.string();
    const curve = curveParams(r);
    const totalLockedAmount = r.u64();
    const cliffPeriod = r.u64();
    const unlockPeriod = r.u64();
    return {
      ...ctx.meta("event"),
      protocol: "bonk",
      kind: "create",
      poolState,
      creator,
      config,
      decimals,
      name,
      symbol,
      uri,
      curve,
      vesting: { totalLockedAmount, cliffPeriod, unlockPeriod },
    };
  },
};

const tradeEvent: DecodeRule = {
  name: "bonk.TradeEvent",
  origin: "event",
  discriminator: BONK.events.trade,
  decode(r, ctx): BonkTradeEvent {
    const poolState = r.pubkey();
    const totalBaseSell = r.u64();
    const virtualBase = r.u64();
    const virtualQuote = r.u64();
    const realBaseBefore = r.u64();
    const realQuoteBefore = r.u64();
    const realBaseAfter = r.u64();
    const realQuoteAfter = r.u64();
    const amountIn = r.u64();
    const amountOut = r.u64();
    const protocolFee = r.u64();
    const platformFee = r.u64();
    const shareFee = r.u64();
    const direction = r.u8();
    if (direction > 1) throw new DecodeError("malformed", `unknown trade direction ${direction}`);
    const poolStatus = poolStatusFromByte(r.u8());
    return {
      ...ctx.meta("event"),
      protocol: "bonk",
      kind: direction === 0 ? "buy" : "sell",
      poolState,
      amountIn,
      amountOut,
      curve: {
        totalBaseSell,
        virtualBase,
        virtualQuote,
        realBaseBefore,
        realQuoteBefore,
        realBaseAfter,
        realQuoteAfter,
      },
      fees: { protocolFee, platformFee, shareFee },
      poolStatus,
    };
  },
};

// Instruction accounts: [payer, authority, global_config, platform_config, pool_state,
// user_base_token, user_quote_token, base_vault, quote_vault, base_token_mint, quote_token_mint, ...]

function tradeIx(kind: "buy" | "sell"): DecodeRule {
  return {
    name: kind === "buy" ? "bonk.buy_exact_in" : "bonk.sell_exact_in",
    origin: "instruction",
    discriminator: kind === "buy" ? BONK.ix.buyExactIn : BONK.ix.sellExactIn,
    decode(r, ctx): BonkTradeEvent {
      const amountIn = r.u64();
      const amountOut = r.u64();
      const shareFeeRate = r.u64();
      return {
        ...ctx.meta("instruction"),
        protocol: "bonk",
        kind,
        amountIn,
        amountOut,
        shareFeeRate,
        user: ctx.account(0, "payer"),
        poolState: ctx.account(4, "pool_state"),
        baseMint: ctx.account(9, "base_token_mint"),
        quoteMint: ctx.account(10, "quote_token_mint"),
      };
    },
  };
}

export const BONK_RULES: readonly DecodeRule[] = [poolCreateEvent, tradeEvent, tradeIx("buy"), tradeIx("sell")];
