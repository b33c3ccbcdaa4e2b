import {
  ComputeBudgetProgram,
  SystemProgram,
  TransactionMessage,
  VersionedTransaction,
} from "@solana/web3.js";
import type { AddressLookupTableAccount, PublicKey, Signer, TransactionInstruction } from "@solana/web3.js";
import { ValidationError, errorMessage, type PriorityFeeConfig } from "@tradewire/core";
import type { Relay } from "@tradewire/relays";

export function computeBudgetInstructions(fee: Pick<PriorityFeeConfig, "unitLimit" | "unitPrice">): TransactionInstruction[] {
  const ixs = [ComputeBudgetProgram.setComputeUnitLimit({ units: fee.unitLimit })];
  if (fee.unitPrice > 0) ixs.push(ComputeBudgetProgram.setComputeUnitPrice({ microLamports: fee.unitPrice }));
  return ixs;
}

/**
 * One transfer per tip-taking relay: `tipLamports[i]` goes to the i-th such relay's tip
 * account. Zero tips are skipped.
 */
export function tipInstructions(payer: PublicKey, relays: readonly Relay[], tipLamports: readonly bigint[]): TransactionInstruction[] {
  const tipped = relays.filter((r) => r.kind !== "rpc");
  if (tipped.length !== tipLamports.length) {
    throw new ValidationError(
      "priorityFee.tipLamports",
      `${tipLamports.length} tip amounts configured for ${tipped.length} tip-taking relays`,
    );
  }
  const ixs: TransactionInstruction[] = [];
  tipped.forEach((relay, i) => {
    const lamports = tipLamports[i];
    if (lamports <= 0n) return;
    const toPubkey = relay.tipAccount();
    if (!toPubkey) throw new ValidationError(`relays.${relay.name}.tipAccounts`, `relay ${relay.name} has no tip account`);
    ixs.push(SystemProgram.transfer({ fromPubkey: payer, toPubkey, lamports }));
  });
  return ixs;
}

/** Every signer an instruction asks for must be one we hold. */
export function assertOnlyExpectedSigners(ixs: readonly TransactionInstruction[], allowed: readonly PublicKey[]): void {
  const want = new Set(allowed.map((k) => k.toBase58()));
  const unexpected = new Set<string>();
  for (const ix of ixs) {
    for (const k of ix.keys) {
      if (k.isSigner && !want.has(k.pubkey.toBase58())) unexpected.add(k.pubkey.toBase58());
    }
  }
  if (unexpected.size) {
    throw new ValidationError("signers", `unexpected signer(s): ${[...unexpected].join(", ")}`);
  }
}

export function compileAndSign(params: {
  payer: Signer;
  instructions: TransactionInstruction[];
  recentBlockhash: string;
  lookupTables?: AddressLookupTableAccount[];
  extraSigners?: Signer[];
}): VersionedTransaction {
  const { payer, instructions, recentBlockhash, lookupTables = [], extraSigners = [] } = params;
  assertOnlyExpectedSigners(instructions, [payer.publicKey, ...extraSigners.map((s) => s.publicKey)]);
  const message = new TransactionMessage({
    payerKey: payer.publicKey,
    recentBlockhash,
    instructions,
  }).compileToV0Message(lookupTables);
  const tx = new VersionedTransaction(message);
  tx.sign([payer, ...extraSigners]);
  try {
    tx.serialize();
  } catch (e) {
    throw new ValidationError("transaction", `transaction does not fit in a packet: ${errorMessage(e)}`);
  }
  return tx;
}
