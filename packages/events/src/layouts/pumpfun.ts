import type { DecodeRule } from "../rule.js";
import { PUMPFUN } from "../discriminators.js";
import type { PumpFunCompleteEvent, PumpFunCreateEvent, PumpFunTradeEvent } from "../types.js";

const createEvent: DecodeRule = {
  name: "pumpfun.CreateEvent",
  origin: "event",
  discriminator: PUMPFUN.events.create,
  decode(r, ctx): PumpFunCreateEvent {
    const name = r.string();
    const symbol = r.string();
    const uri = r.string();
    const mint = r.pubkey();
    const bondingCurve = r.pubkey();
    const user = r.pubkey();
    const creator = r.pubkey();
    const timestamp = r.i64();
    const virtualTokenReserves = r.u64();
    const virtualSolReserves = r.u64();
    const realTokenReserves = r.u64();
    const tokenTotalSupply = r.u64();
    return {
      ...ctx.meta("event"),
      protocol: "pumpfun",
      kind: "create",
      name,
      symbol,
      uri,
      mint,
      bondingCurve,
      user,
      creator,
      timestamp,
      curve: { virtualTokenReserves, virtualSolReserves, realTokenReserves, tokenTotalSupply },
    };
  },
};

const tradeEvent: DecodeRule = {
  name: "pumpfun.TradeEvent",
  origin: "event",
  discriminator: PUMPFUN.events.trade,
  decode(r, ctx): PumpFunTradeEvent {
    const mint = r.pubkey();
    const solAmount = r.u64();
    const tokenAmount = r.u64();
    const isBuy = r.bool();
    const user = r.pubkey();
    const timestamp = r.i64();
    const virtualSolReserves = r.u64();
    const virtualTokenReserves = r.u64();
    const realSolReserves = r.u64();
    const realTokenReserves = r.u64();
    const feeRecipient = r.pubkey();
    const feeBasisPoints = r.u64();
    const fee = r.u64();
    const creator = r.pubkey();
    const creatorFeeBasisPoints = r.u64();
    const creatorFee = r.u64();
    return {
      ...ctx.meta("event"),
      protocol: "pumpfun",
      kind: isBuy ? "buy" : "sell",
      mint,
      user,
      solAmount,
      tokenAmount,
      timestamp,
      curve: { virtualSolReserves, virtualTokenReserves, realSolReserves, realTokenReserves },
      fees: { feeRecipient, feeBasisPoints, fee, creator, creatorFeeBasisPoints, creatorFee },
    };
  },
};

const completeEvent: DecodeRule = {
  name: "pumpfun.CompleteEvent",
  origin: "event",
  discriminator: PUMPFUN.events.complete,
  decode(r, ctx): PumpFunCompleteEvent {
    const user = r.pubkey();
    const mint = r.pubkey();
    const bondingCurve = r.pubkey();
    const timestamp = r.i64();
    return { ...ctx.meta("event"), protocol: "pumpfun", kind: "complete", user, mint, bondingCurve, timestamp };
  },
};

// Instruction accounts: create = [mint, mint_authority, bonding_curve, associated_bonding_curve,
// global, mpl_token_metadata, metadata, user, ...]; buy/sell = [global, fee_recipient, mint,
// bonding_curve, associated_bonding_curve, associated_user, user, ...].

const createIx: DecodeRule = {
  name: "pumpfun.create",
  origin: "instruction",
  discriminator: PUMPFUN.ix.create,
  decode(r, ctx): PumpFunCreateEvent {
    const name = r.string();
    const symbol = r.string();
    const uri = r.string();
    const creator = r.pubkey();
    return {
      ...ctx.meta("instruction"),
      protocol: "pumpfun",
      kind: "create",
      name,
      symbol,
      uri,
      creator,
      mint: ctx.account(0, "mint"),
      bondingCurve: ctx.account(2, "bonding_curve"),
      user: ctx.account(7, "user"),
    };
  },
};

function tradeIx(kind: "buy" | "sell"): DecodeRule {
  return {
    name: `pumpfun.${kind}`,
    origin: "instruction",
    discriminator: kind === "buy" ? PUMPFUN.ix.buy : PUMPFUN.ix.sell,
    decode(r, ctx): PumpFunTradeEvent {
      const tokenAmount = r.u64();
      const solAmount = r.u64();
      return {
        ...ctx.meta("instruction"),
        protocol: "pumpfun",
        kind,
        tokenAmount,
        solAmount,
        mint: ctx.account(2, "mint"),
        bondingCurve: ctx.account(3, "bonding_curve"),
        user: ctx.account(6, "user"),
      };
    },
  };
}

export const PUMPFUN_RULES: readonly DecodeRule[] = [
  createEvent,
  tradeEvent,
  completeEvent,
  createIx,
  tradeIx("buy"),
  tradeIx("sell"),
];
