import { PROTOCOLS, logger, type ProtocolTag } from "@tradewire/core";
import { createBonkAdapter } from "./bonk.js";
import { createPumpFunAdapter } from "./pumpfun.js";
import { createPumpSwapAdapter } from "./pumpswap.js";
import type { ProtocolAdapter } from "./types.js";

const log = logger.scope("amms");

/** One adapter per protocol; adding a protocol means adding a key here. */
export type AdapterRegistry = { readonly [P in ProtocolTag]: ProtocolAdapter<P> };

export function createAdapterRegistry(overrides: Partial<AdapterRegistry> = {}): AdapterRegistry {
  const registry: AdapterRegistry = {
    pumpfun: overrides.pumpfun ?? createPumpFunAdapter(),
    pumpswap: overrides.pumpswap ?? createPumpSwapAdapter(),
    bonk: overrides.bonk ?? createBonkAdapter(),
  };
  log.log("adapter_registry_ready", {
    protocols: PROTOCOLS,
    overridden: PROTOCOLS.filter((p) => overrides[p] !== undefined),
  });
  return registry;
}

export function getAdapter<P extends ProtocolTag>(registry: AdapterRegistry, protocol: P): ProtocolAdapter<P> {
  return registry[protocol];
}
