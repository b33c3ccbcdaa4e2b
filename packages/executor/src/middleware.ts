import type { PublicKey, TransactionInstruction } from "@solana/web3.js";
import type { ProtocolTag } from "@tradewire/core";
import type { Side } from "@tradewire/amms";

export interface MiddlewareContext {
  readonly protocol: ProtocolTag;
  readonly side: Side;
  readonly mint: PublicKey;
  readonly payer: PublicKey;
}

/**
 * Rewrites a trade's instructions before signing. `protocolInstructions` sees only what
 * the adapter built; `fullInstructions` sees the final list including compute budget and tips.
 */
export interface InstructionMiddleware {
  readonly name: string;
  protocolInstructions?(ixs: TransactionInstruction[], ctx: MiddlewareContext): TransactionInstruction[];
  fullInstructions?(ixs: TransactionInstruction[], ctx: MiddlewareContext): TransactionInstruction[];
}

export function applyMiddlewares(
  middlewares: readonly InstructionMiddleware[],
  stage: "protocol" | "full",
  ixs: TransactionInstruction[],
  ctx: MiddlewareContext,
): TransactionInstruction[] {
  return middlewares.reduce((acc, m) => {
    const hook = stage === "protocol" ? m.protocolInstructions : m.fullInstructions;
    return hook ? hook.call(m, acc, ctx) : acc;
  }, ixs);
}
