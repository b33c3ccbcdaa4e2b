import { describe, expect, it } from "vitest";
import { PublicKey } from "@solana/web3.js";
import { BONK_PROGRAM_ID, PUMPFUN_PROGRAM_ID, PUMPSWAP_PROGRAM_ID, ValidationError } from "@tradewire/core";
import type { BonkTradeEvent, PumpFunTradeEvent, PumpSwapTradeEvent } from "@tradewire/events";
import { TOKEN_PROGRAM_ID } from "@solana/spl-token";
import {
  WSOL_MINT,
  bondingCurvePda,
  bonkPoolPda,
  canonicalPoolPda,
  createAdapterRegistry,
  createPumpFunAdapter,
  curveAfterCreatorBuy,
  getAdapter,
  poolTokenAccount,
  snapshotFromEvent,
} from "../src/index.js";
import {
  CREATOR,
  MINT,
  POOL,
  account,
  bondingCurveData,
  key,
  poolData,
  poolStateData,
  tokenAccountData,
} from "./fixtures.js";

const meta = { signature: "sig", slot: 1n, origin: "event", isCreatorTrade: false } as const;

describe("registry", () => {
  it("maps each protocol to its adapter", () => {
    const registry = createAdapterRegistry();
    expect(getAdapter(registry, "pumpfun").programId.equals(PUMPFUN_PROGRAM_ID)).toBe(true);
    expect(getAdapter(registry, "pumpswap").programId.equals(PUMPSWAP_PROGRAM_ID)).toBe(true);
    expect(getAdapter(registry, "bonk").programId.equals(BONK_PROGRAM_ID)).toBe(true);
  });

  it("accepts a replacement adapter", () => {
    const custom = createPumpFunAdapter();
    expect(createAdapterRegistry({ pumpfun: custom }).pumpfun).toBe(custom);
  });
});

describe("decodeSnapshot", () => {
  const registry = createAdapterRegistry();

  it("reads a bonding curve with its creator", () => {
    const adapter = registry.pumpfun;
    expect(adapter.snapshotAccounts(MINT)[0].equals(bondingCurvePda(MINT))).toBe(true);
    const s = adapter.decodeSnapshot(MINT, [account(bondingCurveData(CREATOR), PUMPFUN_PROGRAM_ID)]);
    expect(s.virtualTokenReserves).toBe(1_000_000_000_000_000n);
    expect(s.virtualSolReserves).toBe(32_000_000_000n);
    expect(s.realTokenReserves).toBe(720_000_000_000_000n);
    expect(s.realSolReserves).toBe(2_000_000_000n);
    expect(s.complete).toBe(false);
    expect(s.creator?.equals(CREATOR)).toBe(true);
  });

  it("reads a bonding curve that predates creator fees", () => {
    const s = registry.pumpfun.decodeSnapshot(MINT, [account(bondingCurveData(), PUMPFUN_PROGRAM_ID)]);
    expect(s.creator).toBeUndefined();
  });

  it("treats a missing market account as an unknown mint", () => {
    expect(() => registry.pumpfun.decodeSnapshot(MINT, [null])).toThrow(ValidationError);
    expect(() => registry.pumpswap.decodeSnapshot(MINT, [null, null, null])).toThrow(/pumpswap pool .* not found/);
    expect(() => registry.bonk.decodeSnapshot(MINT, [null])).toThrow(ValidationError);
  });

  it("reads pool reserves from the pool token accounts", () => {
    const adapter = registry.pumpswap;
    const pool = canonicalPoolPda(MINT);
    const addresses = adapter.snapshotAccounts(MINT);
    expect(addresses.map((a) => a.toBase58())).toEqual([
      pool.toBase58(),
      poolTokenAccount(pool, MINT).toBase58(),
      poolTokenAccount(pool, WSOL_MINT).toBase58(),
    ]);
    const s = adapter.decodeSnapshot(MINT, [
      account(poolData(MINT, CREATOR), PUMPSWAP_PROGRAM_ID),
      account(tokenAccountData(MINT, pool, 150_000_000_000_000n), TOKEN_PROGRAM_ID),
      account(tokenAccountData(WSOL_MINT, pool, 95_000_000_000n), TOKEN_PROGRAM_ID),
    ]);
    expect(s.pool.equals(pool)).toBe(true);
    expect(s.baseReserve).toBe(150_000_000_000_000n);
    expect(s.quoteReserve).toBe(95_000_000_000n);
    expect(s.coinCreator?.equals(CREATOR)).toBe(true);
  });

  it("rejects a pool for another mint", () => {
    const run = () =>
      registry.pumpswap.decodeSnapshot(MINT, [
        account(poolData(key(8), CREATOR), PUMPSWAP_PROGRAM_ID),
        account(tokenAccountData(key(8), POOL, 1n), TOKEN_PROGRAM_ID),
        account(tokenAccountData(WSOL_MINT, POOL, 1n), TOKEN_PROGRAM_ID),
      ], { pool: POOL });
    expect(run).toThrow(ValidationError);
  });

  it("reads launchpad pool state", () => {
    const adapter = registry.bonk;
    expect(adapter.snapshotAccounts(MINT)[0].equals(bonkPoolPda(MINT))).toBe(true);
    const s = adapter.decodeSnapshot(MINT, [account(poolStateData(0), BONK_PROGRAM_ID)]);
    expect(s.status).toBe("fund");
    expect(s.virtualBase).toBe(1_073_025_605_596_382n);
    expect(s.virtualQuote).toBe(30_000_852_951n);
    expect(s.realBase).toBe(100_000_000_000_000n);
    expect(s.realQuote).toBe(3_000_000_000n);
    expect(adapter.decodeSnapshot(MINT, [account(poolStateData(2), BONK_PROGRAM_ID)]).status).toBe("trade");
  });
});

describe("snapshotFromEvent", () => {
  it("takes post-trade reserves from a pumpfun trade", () => {
    const event: PumpFunTradeEvent = {
      ...meta,
      protocol: "pumpfun",
      kind: "buy",
      mint: MINT,
      user: key(2),
      solAmount: 1_000_000_000n,
      tokenAmount: 34_612_903_225_806n,
      curve: {
        virtualSolReserves: 31_000_000_000n,
        virtualTokenReserves: 1_038_387_096_774_194n,
        realSolReserves: 1_000_000_000n,
        realTokenReserves: 758_487_096_774_194n,
      },
      fees: {
        feeRecipient: key(6),
        feeBasisPoints: 95n,
        fee: 9_500_000n,
        creator: CREATOR,
        creatorFeeBasisPoints: 5n,
        creatorFee: 500_000n,
      },
    };
    const s = snapshotFromEvent(event);
    expect(s).toEqual({
      protocol: "pumpfun",
      virtualSolReserves: 31_000_000_000n,
      virtualTokenReserves: 1_038_387_096_774_194n,
      realSolReserves: 1_000_000_000n,
      realTokenReserves: 758_487_096_774_194n,
      tokenTotalSupply: 1_000_000_000_000_000n,
      complete: false,
      creator: CREATOR,
      feeBasisPoints: 95n,
      creatorFeeBasisPoints: 5n,
    });
  });

  it("applies a pumpswap buy to the pre-trade reserves", () => {
    const event: PumpSwapTradeEvent = {
      ...meta,
      protocol: "pumpswap",
      kind: "buy",
      pool: POOL,
      user: key(2),
      baseAmount: 1_000n,
      quoteAmount: 400n,
      quoteLimit: 500n,
      reserves: { base: 10_000n, quote: 4_000n },
      coinCreator: PublicKey.default,
    };
    const s = snapshotFromEvent(event);
    expect(s?.protocol).toBe("pumpswap");
    if (s?.protocol !== "pumpswap") return;
    expect(s.baseReserve).toBe(9_000n);
    expect(s.quoteReserve).toBe(4_400n);
    expect(s.coinCreator).toBeUndefined();
  });

  it("uses the post-trade real reserves of a launchpad trade", () => {
    const event: BonkTradeEvent = {
      ...meta,
      protocol: "bonk",
      kind: "sell",
      poolState: POOL,
      amountIn: 10n,
      amountOut: 5n,
      shareFeeRate: 3n,
      poolStatus: "fund",
      curve: {
        totalBaseSell: 1n,
        virtualBase: 100n,
        virtualQuote: 50n,
        realBaseBefore: 20n,
        realQuoteBefore: 10n,
        realBaseAfter: 10n,
        realQuoteAfter: 5n,
      },
    };
    const s = snapshotFromEvent(event);
    if (s?.protocol !== "bonk") throw new Error("expected a launchpad snapshot");
    expect([s.realBase, s.realQuote, s.shareFeeRate]).toEqual([10n, 5n, 3n]);
  });

  it("has nothing to offer for instruction-only trades", () => {
    const event: PumpFunTradeEvent = {
      ...meta,
      origin: "instruction",
      protocol: "pumpfun",
      kind: "sell",
      mint: MINT,
      user: key(2),
      solAmount: 1n,
      tokenAmount: 1n,
    };
    expect(snapshotFromEvent(event)).toBeUndefined();
  });
});

describe("curveAfterCreatorBuy", () => {
  it("moves the initial curve by the creator's net spend", () => {
    const s = curveAfterCreatorBuy(CREATOR, 1_000_000_000n);
    expect(s.virtualSolReserves).toBe(30_990_099_009n);
    expect(s.virtualTokenReserves).toBe(1_038_718_849_870_455n);
    expect(s.realTokenReserves).toBe(758_818_849_870_455n);
    expect(s.realSolReserves).toBe(990_099_009n);
  });
});
