import { TransactionInstruction, type AccountMeta, type PublicKey } from "@solana/web3.js";
import { TOKEN_PROGRAM_ID, getAssociatedTokenAddressSync } from "@solana/spl-token";
import { Decimal } from "decimal.js";
import { BONK_PROGRAM_ID, DecodeError, ValidationError, type LaunchpadSnapshot } from "@tradewire/core";
import { BONK, BorshReader, BorshWriter, hasPrefix, poolStatusFromByte } from "@tradewire/events";
import { assertAmount, assertSlippageBps, constantProductOut, feeOf, makeQuote, type Quote, type Side } from "../math.js";
import {
  BONK_GLOBAL_CONFIG,
  BONK_PLATFORM_CONFIG,
  WSOL_MINT,
  bonkAuthority,
  bonkPoolPda,
  bonkVaultPda,
  eventAuthority,
} from "../pda.js";
import { closeTokenAccountIx, ensureTokenAccountIx, unwrapSolIx, wrapSolIxs, wsolAccount } from "../wsol.js";
import type { BuildRequest, FetchedAccounts, MarketParams, ProtocolAdapter } from "./types.js";

export const BONK_PROTOCOL_FEE_RATE = 25n;
export const BONK_PLATFORM_FEE_RATE = 100n;
export const BONK_SHARE_FEE_RATE = 0n;

const meta = (pubkey: PublicKey, isWritable = false, isSigner = false): AccountMeta => ({ pubkey, isSigner, isWritable });

const totalFeeRate = (s: LaunchpadSnapshot): bigint => s.protocolFeeRate + s.platformFeeRate + s.shareFeeRate;

/** Each rate is charged separately and rounded down, as the program does. */
function chargeFees(amount: bigint, s: LaunchpadSnapshot): bigint {
  return amount - feeOf(amount, s.protocolFeeRate) - feeOf(amount, s.platformFeeRate) - feeOf(amount, s.shareFeeRate);
}

export class BonkAdapter implements ProtocolAdapter<"bonk"> {
  readonly protocol = "bonk";
  readonly programId = BONK_PROGRAM_ID;

  quote(side: Side, amount: bigint, slippageBps: number, s: LaunchpadSnapshot): Quote {
    assertAmount(amount);
    const bps = assertSlippageBps(slippageBps);
    if (s.status !== "fund") {
      throw new ValidationError("market", `launchpad pool ${s.poolState.toBase58()} is in ${s.status} state`);
    }
    const quoteReserve = s.virtualQuote + s.realQuote;
    const baseReserve = s.virtualBase - s.realBase;
    if (quoteReserve <= 0n || baseReserve <= 0n) {
      throw new ValidationError("reserves", `launchpad pool ${s.poolState.toBase58()} has empty reserves`);
    }
    const fee = totalFeeRate(s);
    if (side === "buy") {
      return makeQuote(side, amount, constantProductOut(chargeFees(amount, s), quoteReserve, baseReserve), bps, fee);
    }
    const gross = constantProductOut(amount, baseReserve, quoteReserve);
    return makeQuote(side, amount, chargeFees(gross, s), bps, fee);
  }

  build(req: BuildRequest<"bonk">): TransactionInstruction[] {
    const { payer, mint, quote, snapshot } = req;
    const pool = req.params?.poolState ?? snapshot.poolState;
    const keys = [
      meta(payer, true, true),
      meta(bonkAuthority()),
      meta(BONK_GLOBAL_CONFIG),
      meta(BONK_PLATFORM_CONFIG),
      meta(pool, true),
      meta(getAssociatedTokenAddressSync(mint, payer), true),
      meta(wsolAccount(payer), true),
      meta(bonkVaultPda(pool, mint), true),
      meta(bonkVaultPda(pool, WSOL_MINT), true),
      meta(mint),
      meta(WSOL_MINT),
      meta(TOKEN_PROGRAM_ID),
      meta(TOKEN_PROGRAM_ID),
      meta(eventAuthority(BONK_PROGRAM_ID)),
      meta(BONK_PROGRAM_ID),
    ];
    const discriminator = quote.side === "buy" ? BONK.ix.buyExactIn : BONK.ix.sellExactIn;
    const data = new BorshWriter()
      .raw(discriminator)
      .u64(quote.amountIn)
      .u64(req.minOut)
      .u64(snapshot.shareFeeRate)
      .toBuffer();
    const trade = new TransactionInstruction({ programId: BONK_PROGRAM_ID, keys, data });

    if (quote.side === "buy") {
      return [ensureTokenAccountIx(payer, mint), ...wrapSolIxs(payer, quote.amountIn), trade, unwrapSolIx(payer)];
    }
    const ixs = [...wrapSolIxs(payer, 0n), trade, unwrapSolIx(payer)];
    if (req.closeTokenAccount) ixs.push(closeTokenAccountIx(payer, mint));
    return ixs;
  }

  snapshotAccounts(mint: PublicKey, params?: MarketParams<"bonk">): PublicKey[] {
    return [params?.poolState ?? bonkPoolPda(mint)];
  }

  decodeSnapshot(mint: PublicKey, accounts: FetchedAccounts, params?: MarketParams<"bonk">): LaunchpadSnapshot {
    const poolState = params?.poolState ?? bonkPoolPda(mint);
    const info = accounts[0];
    if (!info) throw new ValidationError("mint", `launchpad pool ${poolState.toBase58()} not found`);
    return decodePoolState(poolState, info.data);
  }

  spotPrice(s: LaunchpadSnapshot): Decimal {
    return new Decimal((s.virtualQuote + s.realQuote).toString()).div((s.virtualBase - s.realBase).toString());
  }
}

/** Leading fields of the launchpad PoolState account; the rest is not needed for pricing. */
export function decodePoolState(poolState: PublicKey, data: Uint8Array): LaunchpadSnapshot {
  if (!hasPrefix(data, BONK.accounts.poolState)) {
    throw new DecodeError("unknown_discriminator", "account is not a launchpad pool state");
  }
  const r = new BorshReader(data);
  r.skip(8).u64();
  r.u8();
  const status = poolStatusFromByte(r.u8());
  r.skip(3);
  r.u64();
  r.u64();
  return {
    protocol: "bonk",
    poolState,
    virtualBase: r.u64(),
    virtualQuote: r.u64(),
    realBase: r.u64(),
    realQuote: r.u64(),
    status,
    protocolFeeRate: BONK_PROTOCOL_FEE_RATE,
    platformFeeRate: BONK_PLATFORM_FEE_RATE,
    shareFeeRate: BONK_SHARE_FEE_RATE,
  };
}

export const createBonkAdapter = (): BonkAdapter => new BonkAdapter();
