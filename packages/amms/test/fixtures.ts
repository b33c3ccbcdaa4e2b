import { PublicKey, type AccountInfo } from "@solana/web3.js";
import { AccountLayout, AccountState } from "@solana/spl-token";
import type { BondingCurveSnapshot, LaunchpadSnapshot, PoolSnapshot } from "@tradewire/core";
import { BONK, BorshWriter, PUMPFUN, PUMPSWAP } from "@tradewire/events";
import { initialCurve } from "../src/index.js";

export const key = (n: number): PublicKey => new PublicKey(Buffer.alloc(32, n));

export const MINT = key(1);
export const PAYER = key(2);
export const CREATOR = key(3);
export const POOL = key(5);

export const curve = (overrides: Partial<BondingCurveSnapshot> = {}): BondingCurveSnapshot => ({
  ...initialCurve(CREATOR),
  ...overrides,
});

export const pool = (overrides: Partial<PoolSnapshot> = {}): PoolSnapshot => ({
  protocol: "pumpswap",
  pool: POOL,
  baseReserve: 200_000_000_000_000n,
  quoteReserve: 80_000_000_000n,
  coinCreator: CREATOR,
  lpFeeBps: 20n,
  protocolFeeBps: 5n,
  coinCreatorFeeBps: 5n,
  ...overrides,
});

export const launchpad = (overrides: Partial<LaunchpadSnapshot> = {}): LaunchpadSnapshot => ({
  protocol: "bonk",
  poolState: POOL,
  virtualBase: 1_073_025_605_596_382n,
  virtualQuote: 30_000_852_951n,
  realBase: 100_000_000_000_000n,
  realQuote: 3_000_000_000n,
  status: "fund",
  protocolFeeRate: 25n,
  platformFeeRate: 100n,
  shareFeeRate: 0n,
  ...overrides,
});

export const account = (data: Buffer, owner: PublicKey): AccountInfo<Buffer> => ({
  data,
  owner,
  lamports: 1_000_000,
  executable: false,
  rentEpoch: 0,
});

export function bondingCurveData(creator?: PublicKey): Buffer {
  const w = new BorshWriter()
    .raw(PUMPFUN.accounts.bondingCurve)
    .u64(1_000_000_000_000_000n)
    .u64(32_000_000_000n)
    .u64(720_000_000_000_000n)
    .u64(2_000_000_000n)
    .u64(1_000_000_000_000_000n)
    .bool(false);
  if (creator) w.pubkey(creator);
  return w.toBuffer();
}

export function poolData(baseMint: PublicKey, coinCreator: PublicKey): Buffer {
  return new BorshWriter()
    .raw(PUMPSWAP.accounts.pool)
    .u8(255)
    .u16(0)
    .pubkey(key(9))
    .pubkey(baseMint)
    .pubkey(key(10))
    .pubkey(key(11))
    .pubkey(key(12))
    .pubkey(key(13))
    .u64(1_000n)
    .pubkey(coinCreator)
    .toBuffer();
}

export function tokenAccountData(mint: PublicKey, owner: PublicKey, amount: bigint): Buffer {
  const buf = Buffer.alloc(AccountLayout.span);
  AccountLayout.encode(
    {
      mint,
      owner,
      amount,
      delegateOption: 0,
      delegate: PublicKey.default,
      state: AccountState.Initialized,
      isNativeOption: 0,
      isNative: 0n,
      delegatedAmount: 0n,
      closeAuthorityOption: 0,
      closeAuthority: PublicKey.default,
    },
    buf,
  );
  return buf;
}

export function poolStateData(status: number): Buffer {
  return new BorshWriter()
    .raw(BONK.accounts.poolState)
    .u64(0n)
    .u8(254)
    .u8(status)
    .u8(6)
    .u8(9)
    .u8(0)
    .u64(1_000_000_000_000_000n)
    .u64(793_100_000_000_000n)
    .u64(1_073_025_605_596_382n)
    .u64(30_000_852_951n)
    .u64(100_000_000_000_000n)
    .u64(3_000_000_000n)
    .raw(Buffer.alloc(64))
    .toBuffer();
}
