import { PublicKey } from "@solana/web3.js";
import { BONK, BorshWriter, EVENT_IX_TAG, PUMPFUN, PUMPSWAP } from "../src/index.js";

export const key = (n: number): PublicKey => new PublicKey(Buffer.alloc(32, n));

export const MINT = key(1);
export const USER = key(2);
export const CREATOR = key(3);
export const CURVE = key(4);
export const POOL = key(5);

export interface PumpFunTradeFields {
  mint: PublicKey;
  solAmount: bigint;
  tokenAmount: bigint;
  isBuy: boolean;
  user: PublicKey;
  timestamp: bigint;
  virtualSolReserves: bigint;
  virtualTokenReserves: bigint;
  realSolReserves: bigint;
  realTokenReserves: bigint;
  feeRecipient: PublicKey;
  feeBasisPoints: bigint;
  fee: bigint;
  creator: PublicKey;
  creatorFeeBasisPoints: bigint;
  creatorFee: bigint;
}

export const pumpfunTrade: PumpFunTradeFields = {
  mint: MINT,
  solAmount: 1_000_000_000n,
  tokenAmount: 34_612_903_225_806n,
  isBuy: true,
  user: USER,
  timestamp: 1_735_689_600n,
  virtualSolReserves: 31_000_000_000n,
  virtualTokenReserves: 1_038_387_096_774_194n,
  realSolReserves: 1_000_000_000n,
  realTokenReserves: 758_487_096_774_194n,
  feeRecipient: key(9),
  feeBasisPoints: 95n,
  fee: 9_500_000n,
  creator: CREATOR,
  creatorFeeBasisPoints: 5n,
  creatorFee: 500_000n,
};

export function encodePumpFunTrade(f: PumpFunTradeFields): Buffer {
  return new BorshWriter()
    .raw(PUMPFUN.events.trade)
    .pubkey(f.mint)
    .u64(f.solAmount)
    .u64(f.tokenAmount)
    .bool(f.isBuy)
    .pubkey(f.user)
    .i64(f.timestamp)
    .u64(f.virtualSolReserves)
    .u64(f.virtualTokenReserves)
    .u64(f.realSolReserves)
    .u64(f.realTokenReserves)
    .pubkey(f.feeRecipient)
    .u64(f.feeBasisPoints)
    .u64(f.fee)
    .pubkey(f.creator)
    .u64(f.creatorFeeBasisPoints)
    .u64(f.creatorFee)
    .toBuffer();
}

export function encodePumpFunCreate(): Buffer {
  return new BorshWriter()
    .raw(PUMPFUN.events.create)
    .string("Test Token")
    .string("TEST")
    .string("https://example.test/meta.json")
    .pubkey(MINT)
    .pubkey(CURVE)
    .pubkey(USER)
    .pubkey(USER)
    .i64(1_735_689_600n)
    .u64(1_073_000_000_000_000n)
    .u64(30_000_000_000n)
    .u64(793_100_000_000_000n)
    .u64(1_000_000_000_000_000n)
    .toBuffer();
}

export function encodePumpSwapBuy(): Buffer {
  return new BorshWriter()
    .raw(PUMPSWAP.events.buy)
    .i64(1_735_689_601n)
    .u64(5_000_000n) // base_amount_out
    .u64(2_100_000n) // max_quote_amount_in
    .u64(0n)
    .u64(3_000_000n)
    .u64(200_000_000_000n) // pool base
    .u64(85_000_000_000n) // pool quote
    .u64(2_000_000n) // quote_amount_in
    .u64(20n)
    .u64(4_000n)
    .u64(5n)
    .u64(1_000n)
    .u64(2_004_000n)
    .u64(2_006_000n)
    .pubkey(POOL)
    .pubkey(USER)
    .pubkey(key(10))
    .pubkey(key(11))
    .pubkey(key(12))
    .pubkey(key(13))
    .pubkey(CREATOR)
    .u64(5n)
    .u64(1_000n)
    .toBuffer();
}

export function encodeBonkTrade(direction: 0 | 1): Buffer {
  return new BorshWriter()
    .raw(BONK.events.trade)
    .pubkey(POOL)
    .u64(793_100_000_000_000n)
    .u64(1_073_025_605_596_382n)
    .u64(30_000_852_951n)
    .u64(0n)
    .u64(0n)
    .u64(34_000_000_000n)
    .u64(1_000_000_000n)
    .u64(1_000_000_000n)
    .u64(34_000_000_000n)
    .u64(2_500_000n)
    .u64(10_000_000n)
    .u64(0n)
    .u8(direction)
    .u8(0)
    .toBuffer();
}

export function encodeBonkPoolCreate(): Buffer {
  return new BorshWriter()
    .raw(BONK.events.poolCreate)
    .pubkey(POOL)
    .pubkey(CREATOR)
    .pubkey(key(20))
    .u8(6)
    .string("Bonk Test")
    .string("BTEST")
    .string("https://example.test/b.json")
    .u8(0)
    .u64(1_000_000_000_000_000n)
    .u64(793_100_000_000_000n)
    .u64(85_000_000_000n)
    .u8(1)
    .u64(0n)
    .u64(0n)
    .u64(0n)
    .toBuffer();
}

export function withCpiTag(payload: Uint8Array): Buffer {
  return Buffer.concat([EVENT_IX_TAG, payload]);
}

/** Deterministic byte generator for totality checks. */
export function* pseudoRandomPayloads(count: number, seed = 7): Generator<Uint8Array> {
  let s = seed;
  const next = (): number => {
    s = (s * 1_103_515_245 + 12_345) & 0x7fffffff;
    return s;
  };
  for (let i = 0; i < count; i++) {
    const len = next() % 300;
    const out = new Uint8Array(len);
    for (let j = 0; j < len; j++) out[j] = next() & 0xff;
    yield out;
  }
}
