import type { PublicKey } from "@solana/web3.js";
import { DecodeError, errorMessage, protocolForProgram, type ProtocolTag } from "@tradewire/core";
import { EVENT_IX_TAG, hasPrefix } from "./discriminators.js";
import { BorshReader } from "./reader.js";
import { defaultRegistry, type DiscriminatorRegistry } from "./registry.js";
import { RuleContext } from "./rule.js";
import type { TradeEvent } from "./types.js";

export interface ClassifyOptions {
  /** Protocols the caller wants; everything else is dropped before field decoding. */
  readonly protocols?: ReadonlySet<ProtocolTag>;
  readonly signature?: string;
  readonly slot?: bigint;
  /** Resolved instruction accounts, required by instruction rules. */
  readonly accounts?: readonly (PublicKey | undefined)[];
  readonly registry?: DiscriminatorRegistry;
}

export type ClassifyResult =
  | { readonly ok: true; readonly event: TradeEvent }
  | { readonly ok: false; readonly error: DecodeError };

const fail = (error: DecodeError): ClassifyResult => ({ ok: false, error });

/** Drops the self-CPI event tag so the payload starts at the event discriminator. */
export function stripEventTag(payload: Uint8Array): Uint8Array {
  return payload.length >= 16 && hasPrefix(payload, EVENT_IX_TAG) ? payload.subarray(8) : payload;
}

export function protocolFilter(protocols: Iterable<ProtocolTag>): ReadonlySet<ProtocolTag> {
  return new Set(protocols);
}

/**
 * Decodes one raw payload (event bytes or instruction data) owned by `programId`.
 * Never throws: every failure comes back as a DecodeError.
 */
export function classify(
  payload: Uint8Array,
  programId: PublicKey | string,
  opts: ClassifyOptions = {},
): ClassifyResult {
  const protocol = protocolForProgram(programId);
  if (!protocol) {
    return fail(new DecodeError("unknown_program", `program ${String(programId)} is not a supported protocol`));
  }
  if (opts.protocols && !opts.protocols.has(protocol)) {
    return fail(new DecodeError("protocol_filtered", `${protocol} is not selected`));
  }

  const body = stripEventTag(payload);
  if (body.length < 8) {
    return fail(new DecodeError("truncated", `payload of ${body.length} bytes has no discriminator`));
  }
  const rule = (opts.registry ?? defaultRegistry).lookup(programId, body);
  if (!rule) {
    const disc = Buffer.from(body.subarray(0, 8)).toString("hex");
    return fail(new DecodeError("unknown_discriminator", `${protocol}: no rule for discriminator ${disc}`));
  }

  try {
    const ctx = new RuleContext(opts.signature ?? "", opts.slot ?? 0n, opts.accounts);
    return { ok: true, event: rule.decode(new BorshReader(body, 8), ctx) };
  } catch (e) {
    if (e instanceof DecodeError) {
      return fail(new DecodeError(e.reason, `${rule.name}: ${e.message}`, { cause: e }));
    }
    return fail(new DecodeError("malformed", `${rule.name}: ${errorMessage(e)}`, { cause: e }));
  }
}
