import {
  PublicKey,
  SYSVAR_RENT_PUBKEY,
  SystemProgram,
  TransactionInstruction,
  type AccountMeta,
} from "@solana/web3.js";
import { ASSOCIATED_TOKEN_PROGRAM_ID, TOKEN_PROGRAM_ID, getAssociatedTokenAddressSync } from "@solana/spl-token";
import { Decimal } from "decimal.js";
import {
  DecodeError,
  PUMPFUN_PROGRAM_ID,
  ValidationError,
  type BondingCurveSnapshot,
} from "@tradewire/core";
import { BorshReader, BorshWriter, PUMPFUN, hasPrefix } from "@tradewire/events";
import {
  assertAmount,
  assertSlippageBps,
  constantProductOut,
  feeOf,
  makeQuote,
  minBig,
  netOfFeeOnTop,
  type Quote,
  type Side,
} from "../math.js";
import {
  MPL_TOKEN_METADATA_PROGRAM_ID,
  PUMPFUN_FEE_RECIPIENT,
  bondingCurvePda,
  creatorVaultPda,
  eventAuthority,
  isSetKey,
  metadataPda,
  pumpfunGlobal,
  pumpfunMintAuthority,
} from "../pda.js";
import { closeTokenAccountIx, ensureTokenAccountIx } from "../wsol.js";
import type { BuildRequest, FetchedAccounts, MarketParams, ProtocolAdapter } from "./types.js";

export const PUMPFUN_FEE_BPS = 95n;
export const PUMPFUN_CREATOR_FEE_BPS = 5n;

/** Reserves of a freshly created curve. */
export const PUMPFUN_INITIAL_CURVE = {
  virtualTokenReserves: 1_073_000_000_000_000n,
  virtualSolReserves: 30_000_000_000n,
  realTokenReserves: 793_100_000_000_000n,
  tokenTotalSupply: 1_000_000_000_000_000n,
} as const;

const meta = (pubkey: PublicKey, isWritable = false, isSigner = false): AccountMeta => ({ pubkey, isSigner, isWritable });

export interface TokenMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly uri: string;
}

function curveFeeBps(s: BondingCurveSnapshot, creator?: PublicKey): bigint {
  return isSetKey(s.creator ?? creator) ? s.feeBasisPoints + s.creatorFeeBasisPoints : s.feeBasisPoints;
}

export class PumpFunAdapter implements ProtocolAdapter<"pumpfun"> {
  readonly protocol = "pumpfun";
  readonly programId = PUMPFUN_PROGRAM_ID;

  quote(side: Side, amount: bigint, slippageBps: number, s: BondingCurveSnapshot, creator?: PublicKey): Quote {
    assertAmount(amount);
    const bps = assertSlippageBps(slippageBps);
    if (s.complete) throw new ValidationError("market", "bonding curve is complete; trade on pumpswap");
    if (s.virtualSolReserves <= 0n || s.virtualTokenReserves <= 0n) {
      throw new ValidationError("reserves", "bonding curve has empty reserves");
    }
    const fee = curveFeeBps(s, creator);
    if (side === "buy") {
      // Floor is taken off the fee-free curve output; the program charges the fee on top of max_sol_cost.
      const out = minBig(constantProductOut(amount, s.virtualSolReserves, s.virtualTokenReserves), s.realTokenReserves);
      return makeQuote(side, amount, out, bps, fee);
    }
    const gross = constantProductOut(amount, s.virtualTokenReserves, s.virtualSolReserves);
    return makeQuote(side, amount, gross - feeOf(gross, fee), bps, fee);
  }

  build(req: BuildRequest<"pumpfun">): TransactionInstruction[] {
    const creator = isSetKey(req.snapshot.creator) ? req.snapshot.creator : req.creator;
    if (!isSetKey(creator)) {
      throw new ValidationError("creator", `creator of ${req.mint.toBase58()} is unknown; pass it with the request`);
    }
    const curve = req.params?.bondingCurve ?? bondingCurvePda(req.mint);
    const { payer, mint, quote } = req;
    const common = [
      meta(pumpfunGlobal()),
      meta(PUMPFUN_FEE_RECIPIENT, true),
      meta(mint),
      meta(curve, true),
      meta(getAssociatedTokenAddressSync(mint, curve, true), true),
      meta(getAssociatedTokenAddressSync(mint, payer), true),
      meta(payer, true, true),
    ];
    const tail = [meta(eventAuthority(PUMPFUN_PROGRAM_ID)), meta(PUMPFUN_PROGRAM_ID)];

    if (quote.side === "buy") {
      const data = new BorshWriter().raw(PUMPFUN.ix.buy).u64(req.minOut).u64(quote.amountIn).toBuffer();
      const keys = [
        ...common,
        meta(SystemProgram.programId),
        meta(TOKEN_PROGRAM_ID),
        meta(creatorVaultPda(creator), true),
        ...tail,
      ];
      return [ensureTokenAccountIx(payer, mint), new TransactionInstruction({ programId: PUMPFUN_PROGRAM_ID, keys, data })];
    }

    const data = new BorshWriter().raw(PUMPFUN.ix.sell).u64(quote.amountIn).u64(req.minOut).toBuffer();
    const keys = [
      ...common,
      meta(SystemProgram.programId),
      meta(creatorVaultPda(creator), true),
      meta(TOKEN_PROGRAM_ID),
      ...tail,
    ];
    const ixs = [new TransactionInstruction({ programId: PUMPFUN_PROGRAM_ID, keys, data })];
    if (req.closeTokenAccount) ixs.push(closeTokenAccountIx(payer, mint));
    return ixs;
  }

  snapshotAccounts(mint: PublicKey, params?: MarketParams<"pumpfun">): PublicKey[] {
    return [params?.bondingCurve ?? bondingCurvePda(mint)];
  }

  decodeSnapshot(mint: PublicKey, accounts: FetchedAccounts): BondingCurveSnapshot {
    const info = accounts[0];
    if (!info) throw new ValidationError("mint", `bonding curve of ${mint.toBase58()} not found`);
    return decodeBondingCurve(info.data);
  }

  spotPrice(s: BondingCurveSnapshot): Decimal {
    return new Decimal(s.virtualSolReserves.toString()).div(s.virtualTokenReserves.toString());
  }
}

/** Launches a new token; the mint keypair must co-sign. */
export function buildCreateInstruction(
  payer: PublicKey,
  mint: PublicKey,
  metadata: TokenMetadata,
  creator: PublicKey = payer,
): TransactionInstruction {
  const curve = bondingCurvePda(mint);
  const data = new BorshWriter()
    .raw(PUMPFUN.ix.create)
    .string(metadata.name)
    .string(metadata.symbol)
    .string(metadata.uri)
    .pubkey(creator)
    .toBuffer();
  const keys = [
    meta(mint, true, true),
    meta(pumpfunMintAuthority()),
    meta(curve, true),
    meta(getAssociatedTokenAddressSync(mint, curve, true), true),
    meta(pumpfunGlobal()),
    meta(MPL_TOKEN_METADATA_PROGRAM_ID),
    meta(metadataPda(mint), true),
    meta(payer, true, true),
    meta(SystemProgram.programId),
    meta(TOKEN_PROGRAM_ID),
    meta(ASSOCIATED_TOKEN_PROGRAM_ID),
    meta(SYSVAR_RENT_PUBKEY),
    meta(eventAuthority(PUMPFUN_PROGRAM_ID)),
    meta(PUMPFUN_PROGRAM_ID),
  ];
  return new TransactionInstruction({ programId: PUMPFUN_PROGRAM_ID, keys, data });
}

/** Bonding curve account: reserves, supply, complete flag, then the creator on curves created since creator fees. */
export function decodeBondingCurve(data: Uint8Array): BondingCurveSnapshot {
  if (!hasPrefix(data, PUMPFUN.accounts.bondingCurve)) {
    throw new DecodeError("unknown_discriminator", "account is not a pumpfun bonding curve");
  }
  const r = new BorshReader(data);
  r.skip(8);
  const virtualTokenReserves = r.u64();
  const virtualSolReserves = r.u64();
  const realTokenReserves = r.u64();
  const realSolReserves = r.u64();
  const tokenTotalSupply = r.u64();
  const complete = r.bool();
  const creator = r.remaining >= 32 ? r.pubkey() : undefined;
  return {
    protocol: "pumpfun",
    virtualTokenReserves,
    virtualSolReserves,
    realTokenReserves,
    realSolReserves,
    tokenTotalSupply,
    complete,
    creator: isSetKey(creator) ? creator : undefined,
    feeBasisPoints: PUMPFUN_FEE_BPS,
    creatorFeeBasisPoints: PUMPFUN_CREATOR_FEE_BPS,
  };
}

export function initialCurve(creator?: PublicKey): BondingCurveSnapshot {
  return {
    protocol: "pumpfun",
    ...PUMPFUN_INITIAL_CURVE,
    realSolReserves: 0n,
    complete: false,
    creator,
    feeBasisPoints: PUMPFUN_FEE_BPS,
    creatorFeeBasisPoints: PUMPFUN_CREATOR_FEE_BPS,
  };
}

/**
 * Curve state after `solAmount` is spent on a buy against `curve`, as seen by the
 * next trader in the same block.
 */
export function curveAfterBuy(curve: BondingCurveSnapshot, solAmount: bigint): BondingCurveSnapshot {
  const fee = curveFeeBps(curve);
  const net = netOfFeeOnTop(solAmount, fee);
  const tokens = minBig(constantProductOut(net, curve.virtualSolReserves, curve.virtualTokenReserves), curve.realTokenReserves);
  return {
    ...curve,
    virtualSolReserves: curve.virtualSolReserves + net,
    virtualTokenReserves: curve.virtualTokenReserves - tokens,
    realSolReserves: curve.realSolReserves + net,
    realTokenReserves: curve.realTokenReserves - tokens,
  };
}

export const curveAfterCreatorBuy = (creator: PublicKey, solAmount: bigint): BondingCurveSnapshot =>
  curveAfterBuy(initialCurve(creator), solAmount);

export const createPumpFunAdapter = (): PumpFunAdapter => new PumpFunAdapter();
