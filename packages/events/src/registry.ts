import type { PublicKey } from "@solana/web3.js";
import { PROGRAM_IDS, PROTOCOLS, type ProtocolTag } from "@tradewire/core";
import type { DecodeRule } from "./rule.js";
import { PUMPFUN_RULES } from "./layouts/pumpfun.js";
import { PUMPSWAP_RULES } from "./layouts/pumpswap.js";
import { BONK_RULES } from "./layouts/bonk.js";

/**
 * Layout generation of the built-in rules. Bump it whenever a program changes an
 * event or instruction layout; old payloads are not silently reinterpreted.
 */
export const LAYOUT_VERSION = 3;

const DISC_LEN = 8;

function hex(bytes: Uint8Array): string {
  return Buffer.from(bytes.subarray(0, DISC_LEN)).toString("hex");
}

function keyOf(programId: PublicKey | string): string {
  return typeof programId === "string" ? programId : programId.toBase58();
}

/** (program id, 8-byte discriminator) -> decode rule. */
export class DiscriminatorRegistry {
  private readonly byProgram = new Map<string, Map<string, DecodeRule>>();

  register(programId: PublicKey | string, rule: DecodeRule): this {
    if (rule.discriminator.length !== DISC_LEN) {
      throw new RangeError(`${rule.name}: discriminator must be ${DISC_LEN} bytes`);
    }
    const program = keyOf(programId);
    let rules = this.byProgram.get(program);
    if (!rules) {
      rules = new Map();
      this.byProgram.set(program, rules);
    }
    const disc = hex(rule.discriminator);
    const existing = rules.get(disc);
    if (existing) throw new Error(`discriminator ${disc} already registered by ${existing.name}`);
    rules.set(disc, rule);
    return this;
  }

  lookup(programId: PublicKey | string, payload: Uint8Array): DecodeRule | undefined {
    if (payload.length < DISC_LEN) return undefined;
    return this.byProgram.get(keyOf(programId))?.get(hex(payload));
  }

  get size(): number {
    let n = 0;
    for (const rules of this.byProgram.values()) n += rules.size;
    return n;
  }
}

export const RULESETS: Readonly<Record<ProtocolTag, readonly DecodeRule[]>> = {
  pumpfun: PUMPFUN_RULES,
  pumpswap: PUMPSWAP_RULES,
  bonk: BONK_RULES,
};

export function createDefaultRegistry(): DiscriminatorRegistry {
  const registry = new DiscriminatorRegistry();
  for (const protocol of PROTOCOLS) {
    for (const rule of RULESETS[protocol]) registry.register(PROGRAM_IDS[protocol], rule);
  }
  return registry;
}

export const defaultRegistry: DiscriminatorRegistry = createDefaultRegistry();
