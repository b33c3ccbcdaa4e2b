import { PublicKey } from "@solana/web3.js";
import type { AddressLookupTableAccount, Signer, TransactionInstruction } from "@solana/web3.js";
import {
  ValidationError,
  isSnapshotFor,
  logger,
  validatePriorityFee,
  type ClientConfig,
  type MarketSnapshot,
  type PriorityFeeConfig,
  type ProtocolTag,
  type SnapshotMap,
} from "@tradewire/core";
import {
  buildCreateInstruction,
  createAdapterRegistry,
  getAdapter,
  initialCurve,
  resolveMinOut,
  type AdapterRegistry,
  type MarketParams,
  type ProtocolAdapter,
  type Quote,
  type Side,
  type TokenMetadata,
} from "@tradewire/amms";
import type { ChainReader } from "@tradewire/rpc-facade";
import type { Relay, TransactionDispatcher } from "@tradewire/relays";
import { applyMiddlewares, type InstructionMiddleware, type MiddlewareContext } from "./middleware.js";
import { StageTimer, type StageTiming } from "./timer.js";
import { compileAndSign, computeBudgetInstructions, tipInstructions } from "./tx.js";

const log = logger.scope("trade");

export interface TradeContext {
  readonly signer: Signer;
  readonly config: ClientConfig;
  readonly chain: ChainReader;
  readonly dispatcher: TransactionDispatcher;
  readonly adapters?: AdapterRegistry;
  readonly middlewares?: readonly InstructionMiddleware[];
}

export interface TradeOptions<P extends ProtocolTag> {
  readonly protocol: P;
  readonly mint: PublicKey;
  readonly slippageBps: number;
  readonly creator?: PublicKey;
  readonly recentBlockhash?: string;
  /** Replaces the client's fee config for this trade. */
  readonly priorityFee?: PriorityFeeConfig;
  /** Race all configured relays with tips (default), or use plain rpc without tips. */
  readonly useRelays?: boolean;
  /** Trade against this state instead of reading it from chain. */
  readonly snapshot?: MarketSnapshot;
  readonly params?: MarketParams<P>;
  /** Floor on output; above the quoted output the trade is refused. */
  readonly minAmountOut?: bigint;
  readonly closeTokenAccount?: boolean;
}

export interface TradeRequest<P extends ProtocolTag> extends TradeOptions<P> {
  /** Lamports to spend on a buy; token atoms to sell on a sell. */
  readonly amount: bigint;
}

export interface SellPercentRequest<P extends ProtocolTag> extends TradeOptions<P> {
  /** Whole percent of the payer's balance, 1..100. */
  readonly percent: number;
}

export interface CreateAndBuyRequest {
  readonly mint: Signer;
  readonly metadata: TokenMetadata;
  readonly solAmount: bigint;
  readonly slippageBps: number;
  readonly creator?: PublicKey;
  readonly recentBlockhash?: string;
  readonly priorityFee?: PriorityFeeConfig;
  readonly useRelays?: boolean;
}

export interface TradeOutcome {
  readonly signature: string;
  readonly relay: string;
  readonly quote: Quote;
  readonly minOut: bigint;
  readonly timings: StageTiming[];
}

interface Assembly {
  readonly protocol: ProtocolTag;
  readonly side: Side;
  readonly mint: PublicKey;
  readonly quote: Quote;
  readonly minOut: bigint;
  readonly instructions: TransactionInstruction[];
  readonly recentBlockhash?: string;
  readonly priorityFee?: PriorityFeeConfig;
  readonly useRelays?: boolean;
  readonly extraSigners?: Signer[];
}

/**
 * Quotes, builds, signs and submits trades. Holds no global state: everything it needs
 * arrives in the context.
 */
export class TradeEngine {
  private readonly adapters: AdapterRegistry;
  private readonly middlewares: readonly InstructionMiddleware[];
  private lookupTables: Promise<AddressLookupTableAccount[]> | undefined;

  constructor(private readonly ctx: TradeContext) {
    this.adapters = ctx.adapters ?? createAdapterRegistry();
    this.middlewares = ctx.middlewares ?? [];
  }

  get payer(): PublicKey {
    return this.ctx.signer.publicKey;
  }

  buy<P extends ProtocolTag>(req: TradeRequest<P>): Promise<TradeOutcome> {
    return this.trade("buy", req);
  }

  sell<P extends ProtocolTag>(req: TradeRequest<P>): Promise<TradeOutcome> {
    return this.trade("sell", req);
  }

  async sellPercent<P extends ProtocolTag>(req: SellPercentRequest<P>): Promise<TradeOutcome> {
    const { percent } = req;
    if (!Number.isInteger(percent) || percent < 1 || percent > 100) {
      throw new ValidationError("percent", `percent must be a whole number in 1..100, got ${percent}`);
    }
    const balance = await this.ctx.chain.getTokenBalance(this.payer, req.mint);
    const amount = (balance * BigInt(percent)) / 100n;
    if (amount <= 0n) {
      throw new ValidationError("balance", `no ${req.mint.toBase58()} to sell (balance ${balance})`);
    }
    return this.trade("sell", { ...req, amount });
  }

  /** Launches a pumpfun token and buys into it in the same transaction. */
  async createAndBuy(req: CreateAndBuyRequest): Promise<TradeOutcome> {
    const creator = req.creator ?? this.payer;
    const mint = req.mint.publicKey;
    const adapter = getAdapter(this.adapters, "pumpfun");
    const snapshot = initialCurve(creator);
    const quote = adapter.quote("buy", req.solAmount, req.slippageBps, snapshot);
    const instructions = [
      buildCreateInstruction(this.payer, mint, req.metadata, creator),
      ...adapter.build({ payer: this.payer, mint, quote, minOut: quote.minOut, snapshot, creator }),
    ];
    return this.submit(new StageTimer("pumpfun_create_buy", "build"), {
      protocol: "pumpfun",
      side: "buy",
      mint,
      quote,
      minOut: quote.minOut,
      instructions,
      recentBlockhash: req.recentBlockhash,
      priorityFee: req.priorityFee,
      useRelays: req.useRelays,
      extraSigners: [req.mint],
    });
  }

  private async trade<P extends ProtocolTag>(side: Side, req: TradeRequest<P>): Promise<TradeOutcome> {
    const timer = new StageTimer(`${req.protocol}_${side}`, "snapshot");
    const adapter = getAdapter(this.adapters, req.protocol);
    const snapshot = await this.resolveSnapshot(adapter, req);
    timer.stage("build");
    const quote = adapter.quote(side, req.amount, req.slippageBps, snapshot, req.creator);
    const minOut = resolveMinOut(quote, req.minAmountOut);
    const instructions = adapter.build({
      payer: this.payer,
      mint: req.mint,
      quote,
      minOut,
      snapshot,
      creator: req.creator,
      params: req.params,
      closeTokenAccount: req.closeTokenAccount,
    });
    return this.submit(timer, {
      protocol: req.protocol,
      side,
      mint: req.mint,
      quote,
      minOut,
      instructions,
      recentBlockhash: req.recentBlockhash,
      priorityFee: req.priorityFee,
      useRelays: req.useRelays,
    });
  }

  private async resolveSnapshot<P extends ProtocolTag>(
    adapter: ProtocolAdapter<P>,
    req: TradeRequest<P>,
  ): Promise<SnapshotMap[P]> {
    if (req.snapshot) {
      if (!isSnapshotFor(req.protocol, req.snapshot)) {
        throw new ValidationError("snapshot", `${req.snapshot.protocol} snapshot supplied for a ${req.protocol} trade`);
      }
      return req.snapshot;
    }
    const accounts = await this.ctx.chain.getMultipleAccountsInfo(adapter.snapshotAccounts(req.mint, req.params));
    return adapter.decodeSnapshot(req.mint, accounts, req.params);
  }

  private async submit(timer: StageTimer, a: Assembly): Promise<TradeOutcome> {
    const fee = a.priorityFee ?? this.ctx.config.priorityFee;
    const useRelays = a.useRelays ?? true;
    const relays: readonly Relay[] = this.ctx.dispatcher.select(useRelays);
    if (useRelays) validatePriorityFee(fee, this.ctx.config.relays);

    const mctx: MiddlewareContext = { protocol: a.protocol, side: a.side, mint: a.mint, payer: this.payer };
    const body = applyMiddlewares(this.middlewares, "protocol", a.instructions, mctx);
    const tips = useRelays ? tipInstructions(this.payer, relays, fee.tipLamports) : [];
    const instructions = applyMiddlewares(
      this.middlewares,
      "full",
      [...computeBudgetInstructions(fee), ...body, ...tips],
      mctx,
    );

    timer.stage("sign");
    const recentBlockhash = a.recentBlockhash ?? (await this.ctx.chain.getLatestBlockhash()).blockhash;
    const tx = compileAndSign({
      payer: this.ctx.signer,
      instructions,
      recentBlockhash,
      lookupTables: await this.loadLookupTables(),
      extraSigners: a.extraSigners,
    });

    timer.stage("submit");
    const scope = `${a.protocol}_${a.side}`;
    const sent = await this.ctx.dispatcher.submit(tx, { relays, scope });
    const timings = timer.finish();
    log.log("submitted", {
      scope,
      mint: a.mint.toBase58(),
      signature: sent.signature,
      relay: sent.relay,
      amount_in: a.quote.amountIn,
      expected_out: a.quote.expectedOut,
      min_out: a.minOut,
    });
    return { signature: sent.signature, relay: sent.relay, quote: a.quote, minOut: a.minOut, timings };
  }

  private loadLookupTables(): Promise<AddressLookupTableAccount[]> {
    const address = this.ctx.config.lookupTable;
    if (!address) return Promise.resolve([]);
    if (!this.lookupTables) {
      const pending = this.ctx.chain.getAddressLookupTable(new PublicKey(address)).then((table) => {
        if (!table) throw new ValidationError("lookupTable", `lookup table ${address} not found`);
        return [table];
      });
      // a failed load is retried on the next trade
      void pending.catch(() => {
        this.lookupTables = undefined;
      });
      this.lookupTables = pending;
    }
    return this.lookupTables;
  }
}
