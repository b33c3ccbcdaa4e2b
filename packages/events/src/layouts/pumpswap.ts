import type { DecodeRule, RuleContext } from "../rule.js";
import type { BorshReader } from "../reader.js";
import { PUMPSWAP } from "../discriminators.js";
import type { PumpSwapCreateEvent, PumpSwapLiquidityEvent, PumpSwapTradeEvent } from "../types.js";

const createPoolEvent: DecodeRule = {
  name: "pumpswap.CreatePoolEvent",
  origin: "event",
  discriminator: PUMPSWAP.events.createPool,
  decode(r, ctx): PumpSwapCreateEvent {
    const timestamp = r.i64();
    const index = r.u16();
    const creator = r.pubkey();
    const baseMint = r.pubkey();
    const quoteMint = r.pubkey();
    const baseMintDecimals = r.u8();
    const quoteMintDecimals = r.u8();
    const baseAmountIn = r.u64();
    const quoteAmountIn = r.u64();
    const poolBaseAmount = r.u64();
    const poolQuoteAmount = r.u64();
    const minimumLiquidity = r.u64();
    const initialLiquidity = r.u64();
    const lpTokenAmountOut = r.u64();
    const poolBump = r.u8();
    const pool = r.pubkey();
    const lpMint = r.pubkey();
    r.skip(64); // user base/quote token accounts
    const coinCreator = r.pubkey();
    return {
      ...ctx.meta("event"),
      protocol: "pumpswap",
      kind: "create",
      pool,
      creator,
      baseMint,
      quoteMint,
      lpMint,
      index,
      baseAmountIn,
      quoteAmountIn,
      coinCreator,
      timestamp,
      detail: {
        baseMintDecimals,
        quoteMintDecimals,
        poolBaseAmount,
        poolQuoteAmount,
        minimumLiquidity,
        initialLiquidity,
        lpTokenAmountOut,
        poolBump,
      },
    };
  },
};

// BuyEvent and SellEvent share one layout; only the meaning of the amount fields differs.
function tradeEvent(kind: "buy" | "sell"): DecodeRule {
  return {
    name: kind === "buy" ? "pumpswap.BuyEvent" : "pumpswap.SellEvent",
    origin: "event",
    discriminator: kind === "buy" ? PUMPSWAP.events.buy : PUMPSWAP.events.sell,
    decode(r, ctx): PumpSwapTradeEvent {
      const timestamp = r.i64();
      const baseAmount = r.u64();
      const quoteLimit = r.u64();
      r.skip(16); // user base/quote reserves
      const base = r.u64();
      const quote = r.u64();
      const quoteAmount = r.u64();
      const lpFeeBps = r.u64();
      const lpFee = r.u64();
      const protocolFeeBps = r.u64();
      const protocolFee = r.u64();
      r.skip(16); // quote amount with/without lp fee, user quote amount
      const pool = r.pubkey();
      const user = r.pubkey();
      r.skip(32 * 4); // user token accounts, protocol fee recipient and its token account
      const coinCreator = r.pubkey();
      const coinCreatorFeeBps = r.u64();
      const coinCreatorFee = r.u64();
      return {
        ...ctx.meta("event"),
        protocol: "pumpswap",
        kind,
        pool,
        user,
        baseAmount,
        quoteAmount,
        quoteLimit,
        timestamp,
        reserves: { base, quote },
        coinCreator,
        fees: { lpFeeBps, lpFee, protocolFeeBps, protocolFee, coinCreatorFeeBps, coinCreatorFee },
      };
    },
  };
}

function liquidityFields(r: BorshReader, ctx: RuleContext, kind: "deposit" | "withdraw"): PumpSwapLiquidityEvent {
  const timestamp = r.i64();
  const lpTokenAmount = r.u64();
  r.skip(16); // caller limits
  r.skip(16); // user base/quote reserves
  const base = r.u64();
  const quote = r.u64();
  const baseAmount = r.u64();
  const quoteAmount = r.u64();
  const lpMintSupply = r.u64();
  const pool = r.pubkey();
  const user = r.pubkey();
  r.skip(32 * 3); // user base/quote/pool token accounts
  return {
    ...ctx.meta("event"),
    protocol: "pumpswap",
    kind,
    pool,
    user,
    lpTokenAmount,
    baseAmount,
    quoteAmount,
    timestamp,
    reserves: { base, quote },
    lpMintSupply,
  };
}

const depositEvent: DecodeRule = {
  name: "pumpswap.DepositEvent",
  origin: "event",
  discriminator: PUMPSWAP.events.deposit,
  decode: (r, ctx) => liquidityFields(r, ctx, "deposit"),
};

const withdrawEvent: DecodeRule = {
  name: "pumpswap.WithdrawEvent",
  origin: "event",
  discriminator: PUMPSWAP.events.withdraw,
  decode: (r, ctx) => liquidityFields(r, ctx, "withdraw"),
};

// Instruction accounts: buy/sell = [pool, user, global_config, base_mint, quote_mint, ...];
// create_pool = [pool, global_config, creator, base_mint, quote_mint, lp_mint, ...];
// deposit/withdraw = [pool, global_config, user, base_mint, quote_mint, lp_mint, ...].

const createPoolIx: DecodeRule = {
  name: "pumpswap.create_pool",
  origin: "instruction",
  discriminator: PUMPSWAP.ix.createPool,
  decode(r, ctx): PumpSwapCreateEvent {
    const index = r.u16();
    const baseAmountIn = r.u64();
    const quoteAmountIn = r.u64();
    const coinCreator = r.pubkey();
    return {
      ...ctx.meta("instruction"),
      protocol: "pumpswap",
      kind: "create",
      index,
      baseAmountIn,
      quoteAmountIn,
      coinCreator,
      pool: ctx.account(0, "pool"),
      creator: ctx.account(2, "creator"),
      baseMint: ctx.account(3, "base_mint"),
      quoteMint: ctx.account(4, "quote_mint"),
      lpMint: ctx.account(5, "lp_mint"),
    };
  },
};

function tradeIx(kind: "buy" | "sell"): DecodeRule {
  return {
    name: `pumpswap.${kind}`,
    origin: "instruction",
    discriminator: kind === "buy" ? PUMPSWAP.ix.buy : PUMPSWAP.ix.sell,
    decode(r, ctx): PumpSwapTradeEvent {
      const baseAmount = r.u64();
      const quoteLimit = r.u64();
      return {
        ...ctx.meta("instruction"),
        protocol: "pumpswap",
        kind,
        baseAmount,
        quoteAmount: quoteLimit,
        quoteLimit,
        pool: ctx.account(0, "pool"),
        user: ctx.account(1, "user"),
        baseMint: ctx.account(3, "base_mint"),
        quoteMint: ctx.account(4, "quote_mint"),
      };
    },
  };
}

function liquidityIx(kind: "deposit" | "withdraw"): DecodeRule {
  return {
    name: `pumpswap.${kind}`,
    origin: "instruction",
    discriminator: kind === "deposit" ? PUMPSWAP.ix.deposit : PUMPSWAP.ix.withdraw,
    decode(r, ctx): PumpSwapLiquidityEvent {
      const lpTokenAmount = r.u64();
      const baseAmount = r.u64();
      const quoteAmount = r.u64();
      return {
        ...ctx.meta("instruction"),
        protocol: "pumpswap",
        kind,
        lpTokenAmount,
        baseAmount,
        quoteAmount,
        pool: ctx.account(0, "pool"),
        user: ctx.account(2, "user"),
        lpMint: ctx.account(5, "lp_mint"),
      };
    },
  };
}

export const PUMPSWAP_RULES: readonly DecodeRule[] = [
  createPoolEvent,
  tradeEvent("buy"),
  tradeEvent("sell"),
  depositEvent,
  withdrawEvent,
  createPoolIx,
  tradeIx("buy"),
  tradeIx("sell"),
  liquidityIx("deposit"),
  liquidityIx("withdraw"),
];
