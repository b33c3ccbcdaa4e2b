import { createRequire } from "node:module";
import { PublicKey } from "@solana/web3.js";
import bs58 from "bs58";
import type { CommitmentLevel, SubscribeRequest, SubscribeUpdate } from "@triton-one/yellowstone-grpc";
import { errorMessage, logger, type ProtocolTag } from "@tradewire/core";
import {
  EVENT_IX_TAG,
  decodeTransaction,
  extractProgramData,
  hasPrefix,
  type DiscriminatorRegistry,
  type PayloadRef,
} from "@tradewire/events";
import { deliver, requireProtocols } from "./deliver.js";
import { eventFilter, matchesExtraFilters, type EventFilter, type ExtraFilters } from "./filters.js";
import { attachCall, type GrpcReadable } from "./grpc.js";
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
import { field } from "./wire.js";

const log = logger.scope("ingest");
const requireCjs = createRequire(import.meta.url);

export interface CompiledInstruction {
  readonly programIdIndex: number;
  readonly accounts: Uint8Array;
  readonly data: Uint8Array;
}

/** A confirmed transaction as the geyser feed reports it. */
export interface ConfirmedTransaction {
  readonly signature: string;
  readonly slot: bigint;
  readonly failed: boolean;
  /** Static keys, then lookup-table writable, then lookup-table readonly. */
  readonly accountKeys: readonly PublicKey[];
  readonly instructions: readonly CompiledInstruction[];
  readonly innerInstructions: readonly { readonly index: number; readonly instructions: readonly CompiledInstruction[] }[];
  readonly logMessages: readonly string[];
}

/** The parts of a `SubscribeUpdate` read here. */
export interface GeyserUpdateFields {
  readonly filters?: readonly string[];
  readonly ping?: object;
  readonly transaction?: {
    readonly slot: string | number | bigint;
    readonly transaction?: {
      readonly signature: Uint8Array;
      readonly transaction?: {
        readonly message?: {
          readonly accountKeys: readonly Uint8Array[];
          readonly instructions: readonly CompiledInstruction[];
        };
      };
      readonly meta?: {
        readonly err?: object;
        readonly innerInstructions: readonly { readonly index: number; readonly instructions: readonly CompiledInstruction[] }[];
        readonly logMessages: readonly string[];
        readonly loadedWritableAddresses: readonly Uint8Array[];
        readonly loadedReadonlyAddresses: readonly Uint8Array[];
      };
    };
  };
}

export type GeyserUpdate =
  | { readonly kind: "transaction"; readonly transaction: ConfirmedTransaction }
  | { readonly kind: "ping" }
  | { readonly kind: "other" };

export type GeyserCommitment = "PROCESSED" | "CONFIRMED" | "FINALIZED";

const COMMITMENT_LEVEL: Readonly<Record<GeyserCommitment, CommitmentLevel>> = {
  PROCESSED: 0,
  CONFIRMED: 1,
  FINALIZED: 2,
};

export type GeyserRequest = SubscribeRequest;

/** Opens the feed for one request; yields only transaction updates. */
export type GeyserTransport = (request: GeyserRequest) => StreamOpener<ConfirmedTransaction>;

const toKeys = (raw: readonly Uint8Array[]): PublicKey[] => raw.filter((k) => k.length === 32).map((k) => new PublicKey(k));

const compiled = (ix: CompiledInstruction): CompiledInstruction => ({
  programIdIndex: ix.programIdIndex,
  accounts: ix.accounts,
  data: ix.data,
});

export function parseGeyserUpdate(update: GeyserUpdateFields): GeyserUpdate {
  if (update.ping) return { kind: "ping" };
  const info = update.transaction?.transaction;
  const msg = info?.transaction?.message;
  if (!update.transaction || !info || !msg) return { kind: "other" };
  const meta = info.meta;
  return {
    kind: "transaction",
    transaction: {
      signature: bs58.encode(info.signature),
      slot: BigInt(update.transaction.slot),
      failed: meta?.err !== undefined,
      accountKeys: [
        ...toKeys(msg.accountKeys),
        ...toKeys(meta?.loadedWritableAddresses ?? []),
        ...toKeys(meta?.loadedReadonlyAddresses ?? []),
      ],
      instructions: msg.instructions.map(compiled),
      innerInstructions: (meta?.innerInstructions ?? []).map((group) => ({
        index: group.index,
        instructions: group.instructions.map(compiled),
      })),
      logMessages: [...(meta?.logMessages ?? [])],
    },
  };
}

/**
 * Event payloads of the selected programs: `Program data:` log lines and self-CPI
 * event instructions. Both copies of one event are deduplicated downstream.
 */
export function confirmedPayloads(tx: ConfirmedTransaction, programIds: ReadonlySet<string>): PayloadRef[] {
  const out: PayloadRef[] = [];
  for (const d of extractProgramData(tx.logMessages)) {
    if (programIds.has(d.programId)) out.push({ programId: d.programId, data: d.data });
  }
  for (const group of tx.innerInstructions) {
    for (const ix of group.instructions) {
      const program = tx.accountKeys.at(ix.programIdIndex);
      if (!program || !programIds.has(program.toBase58()) || !hasPrefix(ix.data, EVENT_IX_TAG)) continue;
      out.push({ programId: program, data: ix.data, accounts: [...ix.accounts].map((i) => tx.accountKeys.at(i)) });
    }
  }
  return out;
}

/**
 * Server-side filter: any selected program, plus the caller's required accounts and
 * signature. `accountInclude` from the caller is checked client-side, since the
 * server ORs include lists.
 */
export function buildGeyserRequest(filter: EventFilter, commitment: GeyserCommitment = "CONFIRMED"): GeyserRequest {
  return {
    accounts: {},
    slots: {},
    transactions: {
      tradewire: {
        vote: false,
        failed: false,
        accountInclude: [...filter.programIds],
        accountExclude: [],
        accountRequired: [...(filter.extra.accountRequired ?? [])],
        signature: filter.extra.signature,
      },
    },
    transactionsStatus: {},
    blocks: {},
    blocksMeta: {},
    entry: {},
    accountsDataSlice: [],
    commitment: COMMITMENT_LEVEL[commitment],
    ping: undefined,
  };
}

interface GeyserStream extends GrpcReadable<SubscribeUpdate> {
  write(request: SubscribeRequest, callback: (err?: Error | null) => void): boolean;
}

interface GeyserClient {
  subscribe(): Promise<GeyserStream>;
}

type GeyserClientCtor = new (endpoint: string, token: string | undefined, channelOptions: object | undefined) => GeyserClient;

// the package ships CommonJS whose default export does not survive ESM interop
const CLIENT_MODULES = [
  "@triton-one/yellowstone-grpc/dist/cjs",
  "@triton-one/yellowstone-grpc/dist/cjs/index.js",
  "@triton-one/yellowstone-grpc/dist/commonjs",
  "@triton-one/yellowstone-grpc/dist/commonjs/index.js",
  "@triton-one/yellowstone-grpc",
];

function isClientCtor(v: unknown): v is GeyserClientCtor {
  return typeof v === "function";
}

let geyserClientCtor: GeyserClientCtor | undefined;

export function loadGeyserClient(): GeyserClientCtor {
  if (geyserClientCtor) return geyserClientCtor;
  const failures: string[] = [];
  for (const id of CLIENT_MODULES) {
    let mod: unknown;
    try {
      mod = requireCjs(id);
    } catch (e) {
      failures.push(`${id}: ${errorMessage(e)}`);
      continue;
    }
    const ctor = field(mod, "default") ?? field(mod, "Client") ?? mod;
    if (isClientCtor(ctor)) {
      geyserClientCtor = ctor;
      return ctor;
    }
    failures.push(`${id}: no client export`);
  }
  throw new Error(`failed to load @triton-one/yellowstone-grpc (${failures.join("; ")})`);
}

export function grpcGeyserTransport(endpoint: string, token?: string): GeyserTransport {
  return (request) => async (handlers) => {
    const Client = loadGeyserClient();
    const stream = await new Client(endpoint, token, undefined).subscribe();
    const attached = attachCall(stream, handlers, (message: SubscribeUpdate) => {
      const update = parseGeyserUpdate(message);
      // keeps load balancers from dropping an idle stream
      if (update.kind === "ping") {
        stream.write({ ...request, ping: { id: 1 } }, (err) => {
          if (err) log.log("ping_failed", { source: "yellowstone", error: err.message });
        });
      }
      return update.kind === "transaction" ? update.transaction : undefined;
    });
    try {
      await new Promise<void>((resolve, reject) => {
        stream.write(request, (err) => (err ? reject(err) : resolve()));
      });
    } catch (e) {
      attached.close();
      throw e;
    }
    return { close: () => attached.close() };
  };
}

export interface YellowstoneOptions {
  readonly endpoint: string;
  readonly token?: string;
  readonly commitment?: GeyserCommitment;
  readonly reconnect?: ReconnectOptions;
  readonly registry?: DiscriminatorRegistry;
  /** Replaces the gRPC transport. */
  readonly transport?: GeyserTransport;
}

/** Confirmed-block events from a Yellowstone geyser endpoint. */
export class YellowstoneEventClient {
  private readonly transport: GeyserTransport;
  private readonly reconnect: ReconnectOptions;

  constructor(private readonly opts: YellowstoneOptions) {
    this.transport = opts.transport ?? grpcGeyserTransport(opts.endpoint, opts.token);
    this.reconnect = opts.reconnect ?? reconnectFromEnv();
  }

  subscribe(
    protocols: Iterable<ProtocolTag>,
    extra: ExtraFilters | undefined,
    callback: EventCallback,
    hooks: SubscriptionHooks = {},
  ): SubscriptionHandle {
    const filter = eventFilter(requireProtocols(protocols), extra);
    const programIds = new Set(filter.programIds);
    const onDecodeError = hooks.onDecodeError ?? decodeErrorLogger("yellowstone");
    const request = buildGeyserRequest(filter, this.opts.commitment);
    log.log("subscribe", { source: "yellowstone", protocols: [...filter.protocols], commitment: this.opts.commitment ?? "CONFIRMED" });

    return keepSubscribed(
      "yellowstone",
      this.transport(request),
      (tx) => {
        if (tx.failed || !matchesExtraFilters(filter.extra, tx.signature, tx.accountKeys)) return;
        const events = decodeTransaction(confirmedPayloads(tx, programIds), {
          signature: tx.signature,
          slot: tx.slot,
          protocols: filter.protocols,
          registry: this.opts.registry,
          onError: (e) => onDecodeError(e),
        });
        deliver("yellowstone", events, callback);
      },
      this.reconnect,
      hooks,
    );
  }
}
