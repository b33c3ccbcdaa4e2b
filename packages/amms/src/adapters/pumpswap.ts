import { PublicKey, SystemProgram, TransactionInstruction, type AccountMeta } from "@solana/web3.js";
import {
  ASSOCIATED_TOKEN_PROGRAM_ID,
  AccountLayout,
  TOKEN_PROGRAM_ID,
  getAssociatedTokenAddressSync,
} from "@solana/spl-token";
import { Decimal } from "decimal.js";
import { DecodeError, PUMPSWAP_PROGRAM_ID, ValidationError, type PoolSnapshot } from "@tradewire/core";
import { BorshReader, BorshWriter, PUMPSWAP, hasPrefix } from "@tradewire/events";
import {
  assertAmount,
  assertSlippageBps,
  constantProductOut,
  feeOf,
  makeQuote,
  netOfFeeOnTop,
  type Quote,
  type Side,
} from "../math.js";
import {
  PUMPSWAP_PROTOCOL_FEE_RECIPIENT,
  WSOL_MINT,
  canonicalPoolPda,
  coinCreatorVaultAuthority,
  eventAuthority,
  isSetKey,
  poolTokenAccount,
  pumpswapGlobalConfig,
} from "../pda.js";
import { closeTokenAccountIx, ensureTokenAccountIx, unwrapSolIx, wrapSolIxs, wsolAccount } from "../wsol.js";
import type { BuildRequest, FetchedAccounts, MarketParams, ProtocolAdapter } from "./types.js";

// Global config defaults.
export const PUMPSWAP_LP_FEE_BPS = 20n;
export const PUMPSWAP_PROTOCOL_FEE_BPS = 5n;
export const PUMPSWAP_COIN_CREATOR_FEE_BPS = 5n;

const meta = (pubkey: PublicKey, isWritable = false, isSigner = false): AccountMeta => ({ pubkey, isSigner, isWritable });

export function poolFeeBps(s: PoolSnapshot): bigint {
  const creatorFee = isSetKey(s.coinCreator) ? s.coinCreatorFeeBps : 0n;
  return s.lpFeeBps + s.protocolFeeBps + creatorFee;
}

export interface PoolAccount {
  readonly index: number;
  readonly creator: PublicKey;
  readonly baseMint: PublicKey;
  readonly quoteMint: PublicKey;
  readonly lpMint: PublicKey;
  readonly poolBaseTokenAccount: PublicKey;
  readonly poolQuoteTokenAccount: PublicKey;
  readonly lpSupply: bigint;
  readonly coinCreator?: PublicKey;
}

export function decodePoolAccount(data: Uint8Array): PoolAccount {
  if (!hasPrefix(data, PUMPSWAP.accounts.pool)) {
    throw new DecodeError("unknown_discriminator", "account is not a pumpswap pool");
  }
  const r = new BorshReader(data);
  r.skip(8).u8();
  const index = r.u16();
  const creator = r.pubkey();
  const baseMint = r.pubkey();
  const quoteMint = r.pubkey();
  const lpMint = r.pubkey();
  const poolBaseTokenAccount = r.pubkey();
  const poolQuoteTokenAccount = r.pubkey();
  const lpSupply = r.u64();
  const coinCreator = r.remaining >= 32 ? r.pubkey() : undefined;
  return {
    index,
    creator,
    baseMint,
    quoteMint,
    lpMint,
    poolBaseTokenAccount,
    poolQuoteTokenAccount,
    lpSupply,
    coinCreator: isSetKey(coinCreator) ? coinCreator : undefined,
  };
}

export class PumpSwapAdapter implements ProtocolAdapter<"pumpswap"> {
  readonly protocol = "pumpswap";
  readonly programId = PUMPSWAP_PROGRAM_ID;

  quote(side: Side, amount: bigint, slippageBps: number, s: PoolSnapshot): Quote {
    assertAmount(amount);
    const bps = assertSlippageBps(slippageBps);
    if (s.baseReserve <= 0n || s.quoteReserve <= 0n) {
      throw new ValidationError("reserves", `pool ${s.pool.toBase58()} has empty reserves`);
    }
    const fee = poolFeeBps(s);
    if (side === "buy") {
      const net = netOfFeeOnTop(amount, fee);
      return makeQuote(side, amount, constantProductOut(net, s.quoteReserve, s.baseReserve), bps, fee);
    }
    const gross = constantProductOut(amount, s.baseReserve, s.quoteReserve);
    return makeQuote(side, amount, gross - feeOf(gross, fee), bps, fee);
  }

  build(req: BuildRequest<"pumpswap">): TransactionInstruction[] {
    const { payer, mint, quote, snapshot } = req;
    const pool = req.params?.pool ?? snapshot.pool;
    const coinCreator = snapshot.coinCreator ?? PublicKey.default;
    const vaultAuthority = coinCreatorVaultAuthority(coinCreator);
    const keys = [
      meta(pool),
      meta(payer, true, true),
      meta(pumpswapGlobalConfig()),
      meta(mint),
      meta(WSOL_MINT),
      meta(getAssociatedTokenAddressSync(mint, payer), true),
      meta(wsolAccount(payer), true),
      meta(poolTokenAccount(pool, mint), true),
      meta(poolTokenAccount(pool, WSOL_MINT), true),
      meta(PUMPSWAP_PROTOCOL_FEE_RECIPIENT),
      meta(getAssociatedTokenAddressSync(WSOL_MINT, PUMPSWAP_PROTOCOL_FEE_RECIPIENT, true), true),
      meta(TOKEN_PROGRAM_ID),
      meta(TOKEN_PROGRAM_ID),
      meta(SystemProgram.programId),
      meta(ASSOCIATED_TOKEN_PROGRAM_ID),
      meta(eventAuthority(PUMPSWAP_PROGRAM_ID)),
      meta(PUMPSWAP_PROGRAM_ID),
      meta(getAssociatedTokenAddressSync(WSOL_MINT, vaultAuthority, true), true),
      meta(vaultAuthority),
    ];

    if (quote.side === "buy") {
      const data = new BorshWriter().raw(PUMPSWAP.ix.buy).u64(req.minOut).u64(quote.amountIn).toBuffer();
      return [
        ensureTokenAccountIx(payer, mint),
        ...wrapSolIxs(payer, quote.amountIn),
        new TransactionInstruction({ programId: PUMPSWAP_PROGRAM_ID, keys, data }),
        unwrapSolIx(payer),
      ];
    }
    const data = new BorshWriter().raw(PUMPSWAP.ix.sell).u64(quote.amountIn).u64(req.minOut).toBuffer();
    const ixs = [
      ...wrapSolIxs(payer, 0n),
      new TransactionInstruction({ programId: PUMPSWAP_PROGRAM_ID, keys, data }),
      unwrapSolIx(payer),
    ];
    if (req.closeTokenAccount) ixs.push(closeTokenAccountIx(payer, mint));
    return ixs;
  }

  snapshotAccounts(mint: PublicKey, params?: MarketParams<"pumpswap">): PublicKey[] {
    const pool = params?.pool ?? canonicalPoolPda(mint);
    return [pool, poolTokenAccount(pool, mint), poolTokenAccount(pool, WSOL_MINT)];
  }

  decodeSnapshot(mint: PublicKey, accounts: FetchedAccounts, params?: MarketParams<"pumpswap">): PoolSnapshot {
    const [poolInfo, baseInfo, quoteInfo] = accounts;
    const pool = params?.pool ?? canonicalPoolPda(mint);
    if (!poolInfo) throw new ValidationError("pool", `pumpswap pool ${pool.toBase58()} not found`);
    if (!baseInfo || !quoteInfo) {
      throw new ValidationError("pool", `token accounts of pool ${pool.toBase58()} not found`);
    }
    const account = decodePoolAccount(poolInfo.data);
    if (!account.baseMint.equals(mint)) {
      throw new ValidationError("mint", `pool ${pool.toBase58()} trades ${account.baseMint.toBase58()}, not ${mint.toBase58()}`);
    }
    return {
      protocol: "pumpswap",
      pool,
      baseReserve: AccountLayout.decode(baseInfo.data).amount,
      quoteReserve: AccountLayout.decode(quoteInfo.data).amount,
      coinCreator: account.coinCreator,
      lpFeeBps: PUMPSWAP_LP_FEE_BPS,
      protocolFeeBps: PUMPSWAP_PROTOCOL_FEE_BPS,
      coinCreatorFeeBps: PUMPSWAP_COIN_CREATOR_FEE_BPS,
    };
  }

  spotPrice(s: PoolSnapshot): Decimal {
    return new Decimal(s.quoteReserve.toString()).div(s.baseReserve.toString());
  }
}

export const createPumpSwapAdapter = (): PumpSwapAdapter => new PumpSwapAdapter();
