import { Decimal } from "decimal.js";
import { SlippageExceeded, ValidationError } from "@tradewire/core";

export const BPS_DENOMINATOR = 10_000n;

export function assertAmount(amount: bigint): void {
  if (amount <= 0n) throw new ValidationError("amount", `amount must be positive, got ${amount}`);
}

export function assertSlippageBps(bps: number): bigint {
  if (!Number.isInteger(bps) || bps < 0 || bps >= 10_000) {
    throw new ValidationError("slippageBps", `slippage must be an integer in [0, 10000), got ${bps}`);
  }
  return BigInt(bps);
}

/** x * (10000 - bps) / 10000, rounded down. */
export function applyBpsDown(x: bigint, bps: bigint): bigint {
  return (x * (BPS_DENOMINATOR - bps)) / BPS_DENOMINATOR;
}

export function feeOf(amount: bigint, bps: bigint): bigint {
  return (amount * bps) / BPS_DENOMINATOR;
}

/** Portion of `gross` left for the curve when a fee of `bps` is charged on top of it. */
export function netOfFeeOnTop(gross: bigint, bps: bigint): bigint {
  return (gross * BPS_DENOMINATOR) / (BPS_DENOMINATOR + bps);
}

/** Constant-product output for `amountIn` against (reserveIn, reserveOut). */
export function constantProductOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
  if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) return 0n;
  return (amountIn * reserveOut) / (reserveIn + amountIn);
}

export const minBig = (a: bigint, b: bigint): bigint => (a < b ? a : b);
export const maxBig = (a: bigint, b: bigint): bigint => (a > b ? a : b);

export type Side = "buy" | "sell";

/**
 * Buys spend quote (SOL) and receive tokens; sells spend tokens and receive quote.
 * `minOut` is the slippage floor that goes on chain.
 */
export interface Quote {
  readonly side: Side;
  readonly amountIn: bigint;
  readonly expectedOut: bigint;
  readonly minOut: bigint;
  /** Total fee charged by the program, in basis points. */
  readonly feeBps: bigint;
}

export function makeQuote(side: Side, amountIn: bigint, expectedOut: bigint, slippageBps: bigint, feeBps: bigint): Quote {
  if (expectedOut <= 0n) {
    throw new ValidationError("amount", `${side} of ${amountIn} yields no output at current reserves`);
  }
  return { side, amountIn, expectedOut, minOut: applyBpsDown(expectedOut, slippageBps), feeBps };
}

/** The on-chain floor: the slippage bound, raised to the caller's own minimum when one is given. */
export function resolveMinOut(quote: Quote, minAmountOut?: bigint): bigint {
  if (minAmountOut === undefined) return quote.minOut;
  if (minAmountOut > quote.expectedOut) throw new SlippageExceeded(quote.expectedOut, minAmountOut);
  return maxBig(quote.minOut, minAmountOut);
}

/** Average quote paid (buy) or received (sell) per token atom. */
export function executionPrice(q: Quote): Decimal {
  const quoteAtoms = q.side === "buy" ? q.amountIn : q.expectedOut;
  const tokenAtoms = q.side === "buy" ? q.expectedOut : q.amountIn;
  return new Decimal(quoteAtoms.toString()).div(tokenAtoms.toString());
}
