import type { Connection, Signer } from "@solana/web3.js";
import { logger, maskUrl, validateConfig, type ClientConfig } from "@tradewire/core";
import type { AdapterRegistry } from "@tradewire/amms";
import { createDispatcher, type TransactionDispatcher } from "@tradewire/relays";
import { createChainReader, type BackoffOptions, type ChainReader } from "@tradewire/rpc-facade";
import { TradeEngine } from "./engine.js";
import type { InstructionMiddleware } from "./middleware.js";

export interface TradeClientOptions {
  readonly chain?: ChainReader;
  readonly dispatcher?: TransactionDispatcher;
  readonly adapters?: AdapterRegistry;
  readonly middlewares?: readonly InstructionMiddleware[];
  /** Used by rpc relays on the client's own node. */
  readonly connection?: Pick<Connection, "sendRawTransaction">;
  readonly backoff?: BackoffOptions;
}

/** Validates the config and wires chain reads, relays and adapters into a TradeEngine. */
export function createTradeClient(config: ClientConfig, signer: Signer, opts: TradeClientOptions = {}): TradeEngine {
  validateConfig(config);
  const chain = opts.chain ?? createChainReader(config.rpcUrl, config.commitment, opts.backoff);
  const dispatcher = opts.dispatcher ?? createDispatcher(config, { connection: opts.connection });
  logger.scope("trade").log("client_ready", {
    rpc: maskUrl(config.rpcUrl),
    payer: signer.publicKey.toBase58(),
    relays: config.relays.length,
    lookup_table: config.lookupTable ?? null,
  });
  return new TradeEngine({
    signer,
    config,
    chain,
    dispatcher,
    adapters: opts.adapters,
    middlewares: opts.middlewares,
  });
}
