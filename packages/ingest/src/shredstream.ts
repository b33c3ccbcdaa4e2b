import * as grpc from "@grpc/grpc-js";
import type { VersionedTransaction } from "@solana/web3.js";
import bs58 from "bs58";
import { DecodeError, errorMessage, logger, type ProtocolTag } from "@tradewire/core";
import { decodeTransaction, type DiscriminatorRegistry, type PayloadRef, type TradeEvent } from "@tradewire/events";
import { deliver, requireProtocols } from "./deliver.js";
import { parseEntries, type Entry } from "./entries.js";
import { eventFilter, matchesExtraFilters, type EventFilter, type ExtraFilters } from "./filters.js";
import { attachCall, grpcTarget, loadMethod } from "./grpc.js";
import {
  decodeErrorLogger,
  keepSubscribed,
  reconnectFromEnv,
  type EventCallback,
  type ReconnectOptions,
  type StreamOpener,
  type SubscriptionHandle,
  type SubscriptionHooks,
} from "./subscription.js";
import { bytes, field, u64 } from "./wire.js";

const log = logger.scope("ingest");

export interface EntryBatch {
  readonly slot: bigint;
  /** bincode `Vec<Entry>` */
  readonly entries: Uint8Array;
}

export type ShredTransport = StreamOpener<EntryBatch>;

export function parseEntryBatch(message: object): EntryBatch | undefined {
  const entries = bytes(field(message, "entries"));
  return entries ? { slot: u64(field(message, "slot")), entries } : undefined;
}

export function grpcShredTransport(endpoint: string): ShredTransport {
  const method = loadMethod("shredstream.proto", "shredstream.ShredstreamProxy", "SubscribeEntries");
  return async (handlers) => {
    const { address, credentials } = grpcTarget(endpoint);
    const client = new grpc.Client(address, credentials);
    const call = client.makeServerStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      {},
      new grpc.Metadata(),
    );
    const attached = attachCall(call, handlers, parseEntryBatch);
    return {
      close() {
        attached.close();
        client.close();
      },
    };
  };
}

/**
 * Top-level instructions of the selected programs. Accounts loaded through lookup
 * tables are unknown before execution and come back undefined.
 */
export function instructionPayloads(tx: VersionedTransaction, filter: EventFilter): PayloadRef[] {
  const keys = tx.message.staticAccountKeys;
  const selected = new Set(filter.programIds);
  const out: PayloadRef[] = [];
  for (const ix of tx.message.compiledInstructions) {
    const program = keys.at(ix.programIdIndex);
    if (!program || !selected.has(program.toBase58())) continue;
    out.push({ programId: program, data: ix.data, accounts: ix.accountKeyIndexes.map((i) => keys.at(i)) });
  }
  return out;
}

function readEntries(batch: EntryBatch, onError?: (error: DecodeError) => void): Entry[] {
  try {
    return parseEntries(batch.entries);
  } catch (e) {
    const reason = e instanceof DecodeError ? e.reason : "malformed";
    onError?.(new DecodeError(reason, `slot ${batch.slot} entries: ${errorMessage(e)}`, { cause: e }));
    return [];
  }
}

/** Decodes one entry batch into events, applying the account and signature filters. */
export function decodeEntryBatch(
  batch: EntryBatch,
  filter: EventFilter,
  opts: { registry?: DiscriminatorRegistry; onError?: (error: DecodeError) => void } = {},
): TradeEvent[] {
  const entries = readEntries(batch, opts.onError);
  const events: TradeEvent[] = [];
  for (const entry of entries) {
    for (const tx of entry.transactions) {
      const first = tx.signatures.at(0);
      if (!first) continue;
      const signature = bs58.encode(first);
      if (!matchesExtraFilters(filter.extra, signature, tx.message.staticAccountKeys)) continue;
      const payloads = instructionPayloads(tx, filter);
      if (payloads.length === 0) continue;
      events.push(
        ...decodeTransaction(payloads, {
          signature,
          slot: batch.slot,
          protocols: filter.protocols,
          registry: opts.registry,
          onError: opts.onError,
        }),
      );
    }
  }
  return events;
}

export interface ShredStreamOptions {
  readonly endpoint: string;
  readonly reconnect?: ReconnectOptions;
  readonly registry?: DiscriminatorRegistry;
  /** Replaces the gRPC transport. */
  readonly transport?: ShredTransport;
}

/**
 * Pre-confirmation events decoded from shredstream entries. Transactions seen here
 * may never land; events carry instruction arguments, not execution results.
 */
export class ShredStreamEventClient {
  private readonly transport: ShredTransport;
  private readonly reconnect: ReconnectOptions;

  constructor(private readonly opts: ShredStreamOptions) {
    this.transport = opts.transport ?? grpcShredTransport(opts.endpoint);
    this.reconnect = opts.reconnect ?? reconnectFromEnv();
  }

  subscribe(
    protocols: Iterable<ProtocolTag>,
    extra: ExtraFilters | undefined,
    callback: EventCallback,
    hooks: SubscriptionHooks = {},
  ): SubscriptionHandle {
    const filter = eventFilter(requireProtocols(protocols), extra);
    const onError = hooks.onDecodeError ?? decodeErrorLogger("shredstream");
    log.log("subscribe", { source: "shredstream", protocols: [...filter.protocols] });
    return keepSubscribed(
      "shredstream",
      this.transport,
      (batch) => deliver("shredstream", decodeEntryBatch(batch, filter, { registry: this.opts.registry, onError }), callback),
      this.reconnect,
      hooks,
    );
  }
}
