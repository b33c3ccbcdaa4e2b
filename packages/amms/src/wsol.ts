import { SystemProgram, type PublicKey, type TransactionInstruction } from "@solana/web3.js";
import {
  createAssociatedTokenAccountIdempotentInstruction,
  createCloseAccountInstruction,
  createSyncNativeInstruction,
  getAssociatedTokenAddressSync,
} from "@solana/spl-token";
import { WSOL_MINT } from "./pda.js";

export const wsolAccount = (owner: PublicKey): PublicKey => getAssociatedTokenAddressSync(WSOL_MINT, owner);

export function ensureTokenAccountIx(payer: PublicKey, mint: PublicKey): TransactionInstruction {
  const ata = getAssociatedTokenAddressSync(mint, payer);
  return createAssociatedTokenAccountIdempotentInstruction(payer, ata, payer, mint);
}

/** Creates the payer's WSOL account and funds it with `lamports` (zero only creates it). */
export function wrapSolIxs(payer: PublicKey, lamports: bigint): TransactionInstruction[] {
  const ata = wsolAccount(payer);
  const ixs = [createAssociatedTokenAccountIdempotentInstruction(payer, ata, payer, WSOL_MINT)];
  if (lamports > 0n) {
    ixs.push(SystemProgram.transfer({ fromPubkey: payer, toPubkey: ata, lamports }));
    ixs.push(createSyncNativeInstruction(ata));
  }
  return ixs;
}

/** Closes the payer's WSOL account, returning the remaining lamports to the payer. */
export function unwrapSolIx(payer: PublicKey): TransactionInstruction {
  return createCloseAccountInstruction(wsolAccount(payer), payer, payer);
}

export function closeTokenAccountIx(payer: PublicKey, mint: PublicKey): TransactionInstruction {
  return createCloseAccountInstruction(getAssociatedTokenAddressSync(mint, payer), payer, payer);
}
