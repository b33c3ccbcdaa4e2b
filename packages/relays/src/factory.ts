import { Connection } from "@solana/web3.js";
import { logger, maskUrl, relayName, type ClientConfig, type RelayConfig } from "@tradewire/core";
import { RelayDispatcher, type DispatchEntry } from "./dispatcher.js";
import { HttpRelay } from "./http.js";
import type { Relay } from "./relay.js";
import { RpcRelay, type RawTransactionSender } from "./rpc.js";
import { resolveTipAccounts } from "./tips.js";

export interface RelayFactoryOptions {
  /** Sender for rpc relays whose endpoint is the client's own rpc node. */
  readonly connection?: RawTransactionSender;
}

export function createRelay(cfg: RelayConfig, index: number, opts: RelayFactoryOptions = {}): Relay {
  const name = relayName(cfg, index);
  if (cfg.kind === "rpc") return new RpcRelay(name, opts.connection ?? new Connection(cfg.endpoint, "processed"));
  return new HttpRelay(name, cfg.kind, cfg, resolveTipAccounts(cfg, name));
}

/**
 * Builds the dispatcher for a client config. An rpc relay on `rpcUrl` is added when none
 * is configured, so trades without relays always have a path.
 */
export function createDispatcher(
  config: Pick<ClientConfig, "rpcUrl" | "relays" | "relayTimeoutMs">,
  opts: RelayFactoryOptions = {},
): RelayDispatcher {
  const configs: RelayConfig[] = [...config.relays];
  if (!configs.some((r) => r.kind === "rpc")) configs.push({ kind: "rpc", endpoint: config.rpcUrl, name: "rpc" });
  const entries: DispatchEntry[] = configs.map((cfg, i) => ({
    relay: createRelay(cfg, i, cfg.endpoint === config.rpcUrl ? opts : {}),
    timeoutMs: cfg.timeoutMs ?? config.relayTimeoutMs,
  }));
  logger.scope("relay").log("dispatcher_ready", {
    relays: entries.map((e, i) => ({ name: e.relay.name, kind: e.relay.kind, endpoint: maskUrl(configs[i].endpoint) })),
  });
  return new RelayDispatcher(entries);
}
