import { describe, expect, it } from "vitest";
import { PublicKey } from "@solana/web3.js";
import { SlippageExceeded, ValidationError } from "@tradewire/core";
import {
  applyBpsDown,
  constantProductOut,
  createBonkAdapter,
  createPumpFunAdapter,
  createPumpSwapAdapter,
  executionPrice,
  netOfFeeOnTop,
  resolveMinOut,
} from "../src/index.js";
import { CREATOR, curve, launchpad, pool } from "./fixtures.js";

const pumpfun = createPumpFunAdapter();
const pumpswap = createPumpSwapAdapter();
const bonk = createBonkAdapter();

describe("math", () => {
  it("rounds down throughout", () => {
    expect(applyBpsDown(999n, 100n)).toBe(989n);
    expect(netOfFeeOnTop(100_000n, 100n)).toBe(99_009n);
    expect(constantProductOut(10n, 100n, 1_000n)).toBe(90n);
  });

  it("yields nothing against an empty side", () => {
    expect(constantProductOut(10n, 0n, 1_000n)).toBe(0n);
    expect(constantProductOut(0n, 100n, 1_000n)).toBe(0n);
  });
});

describe("pumpfun quote", () => {
  it("bounds a buy by the fee-free curve output", () => {
    const snapshot = curve({ virtualSolReserves: 30_000_000_000n, virtualTokenReserves: 1_073_000_000_000_000n });
    const q = pumpfun.quote("buy", 100_000n, 100, snapshot);
    expect(q.feeBps).toBe(100n);
    expect(q.expectedOut).toBe(3_576_654_744n);
    expect(q.minOut).toBe(3_540_888_196n);
    expect(q.minOut).toBe((constantProductOut(100_000n, 30_000_000_000n, 1_073_000_000_000_000n) * 9_900n) / 10_000n);
  });

  it("drops the creator fee when no creator is known", () => {
    const q = pumpfun.quote("sell", 1_000_000_000n, 500, curve({ creator: undefined }));
    expect(q.feeBps).toBe(95n);
    expect(q.expectedOut).toBe(27_693n);
  });

  it("counts a creator passed alongside the snapshot", () => {
    const q = pumpfun.quote("buy", 100_000n, 100, curve({ creator: undefined }), CREATOR);
    expect(q.feeBps).toBe(100n);
  });

  it("takes the fee out of sell proceeds", () => {
    const q = pumpfun.quote("sell", 1_000_000_000n, 500, curve());
    expect(q.expectedOut).toBe(27_679n);
    expect(q.minOut).toBe(26_295n);
  });

  it("caps a buy at the real token reserves", () => {
    const q = pumpfun.quote("buy", 100_000_000_000n, 0, curve({ realTokenReserves: 5_000n }));
    expect(q.expectedOut).toBe(5_000n);
  });

  it("rejects a completed curve", () => {
    expect(() => pumpfun.quote("buy", 1n, 0, curve({ complete: true }))).toThrow(ValidationError);
  });

  it("rejects non-positive amounts and out-of-range slippage", () => {
    expect(() => pumpfun.quote("buy", 0n, 100, curve())).toThrow(ValidationError);
    expect(() => pumpfun.quote("buy", 1_000n, 10_000, curve())).toThrow(ValidationError);
    expect(() => pumpfun.quote("buy", 1_000n, -1, curve())).toThrow(ValidationError);
    expect(() => pumpfun.quote("buy", 1_000n, 1.5, curve())).toThrow(ValidationError);
  });

  it("rejects a trade too small to produce output", () => {
    expect(() => pumpfun.quote("sell", 1n, 0, curve())).toThrow(/yields no output/);
  });
});

describe("pumpswap quote", () => {
  it("adds lp, protocol and coin creator fees", () => {
    const q = pumpswap.quote("buy", 1_000_000_000n, 200, pool());
    expect(q.feeBps).toBe(30n);
    expect(q.expectedOut).toBe(2_461_841_457_213n);
    expect(q.minOut).toBe(2_412_604_628_068n);
  });

  it("skips the coin creator fee on pools without one", () => {
    const q = pumpswap.quote("sell", 10_000_000_000n, 0, pool({ coinCreator: PublicKey.default }));
    expect(q.feeBps).toBe(25n);
    expect(q.expectedOut).toBe(3_989_801n);
  });

  it("takes fees from sell output", () => {
    expect(pumpswap.quote("sell", 10_000_000_000n, 0, pool()).expectedOut).toBe(3_987_801n);
  });

  it("rejects a pool with empty reserves", () => {
    expect(() => pumpswap.quote("buy", 1_000n, 0, pool({ quoteReserve: 0n }))).toThrow(ValidationError);
  });
});

describe("bonk quote", () => {
  it("subtracts each fee rate from the input of a buy", () => {
    const q = bonk.quote("buy", 1_000_000_000n, 100, launchpad());
    expect(q.feeBps).toBe(125n);
    expect(q.expectedOut).toBe(28_270_354_462_650n);
    expect(q.minOut).toBe(27_987_650_918_023n);
  });

  it("subtracts fees from the output of a sell", () => {
    const q = bonk.quote("sell", 5_000_000_000_000n, 100, launchpad());
    expect(q.expectedOut).toBe(166_602_706n);
    expect(q.minOut).toBe(164_936_678n);
  });

  it("refuses pools that left the funding stage", () => {
    expect(() => bonk.quote("buy", 1_000n, 0, launchpad({ status: "migrate" }))).toThrow(/migrate state/);
  });
});

describe("resolveMinOut", () => {
  const q = pumpfun.quote("buy", 100_000n, 100, curve());

  it("keeps the slippage bound when the caller asks for less", () => {
    expect(resolveMinOut(q, 1n)).toBe(q.minOut);
    expect(resolveMinOut(q)).toBe(q.minOut);
  });

  it("raises the floor to the caller's minimum", () => {
    expect(resolveMinOut(q, 3_576_000_000n)).toBe(3_576_000_000n);
  });

  it("fails when the caller wants more than the quote", () => {
    const run = () => resolveMinOut(q, q.expectedOut + 1n);
    expect(run).toThrow(SlippageExceeded);
    expect(run).toThrow("quoted output 3576654744 is below the required minimum 3576654745");
  });
});

describe("prices", () => {
  it("reports spot price in quote atoms per token atom", () => {
    expect(pumpfun.spotPrice(curve()).toFixed(12)).toBe("0.000027958993");
    expect(pumpswap.spotPrice(pool()).toString()).toBe("0.0004");
  });

  it("reports execution price from a quote", () => {
    const q = pumpswap.quote("sell", 10_000_000_000n, 0, pool());
    expect(executionPrice(q).toString()).toBe("0.0003987801");
  });
});
