import { Connection } from "@solana/web3.js";
import type { AccountInfo, AddressLookupTableAccount, BlockhashWithExpiryBlockHeight, PublicKey } from "@solana/web3.js";
import { AccountLayout, getAssociatedTokenAddressSync } from "@solana/spl-token";
import { NetworkError, TradeKitError, errorMessage, logger, maskUrl, type Commitment } from "@tradewire/core";
import { Semaphore, backoffFromEnv, callWithRetry, type BackoffOptions, type ResolvedBackoff } from "./backoff.js";

export * from "./backoff.js";

/** The chain reads a trade needs. Everything else goes through relays. */
export interface ChainReader {
  getLatestBlockhash(): Promise<BlockhashWithExpiryBlockHeight>;
  getMultipleAccountsInfo(keys: readonly PublicKey[]): Promise<(AccountInfo<Buffer> | null)[]>;
  /** Raw token amount held in the owner's associated account; zero when it does not exist. */
  getTokenBalance(owner: PublicKey, mint: PublicKey): Promise<bigint>;
  getAddressLookupTable(address: PublicKey): Promise<AddressLookupTableAccount | null>;
}

export type RpcConnection = Pick<Connection, "getLatestBlockhash" | "getMultipleAccountsInfo" | "getAddressLookupTable"> & {
  readonly rpcEndpoint?: string;
};

const MULTIPLE_ACCOUNTS_CHUNK = 100;

const httpStatusOf = (msg: string): number | undefined => {
  const m = /\b([45]\d\d)\b/.exec(msg);
  return m ? Number(m[1]) : undefined;
};

/**
 * ChainReader over a Connection: every call goes through a concurrency gate and is
 * retried with jittered exponential backoff on rate limits and transient failures.
 */
export class BackoffChainReader implements ChainReader {
  private readonly sem: Semaphore;
  private readonly backoff: ResolvedBackoff;

  constructor(
    private readonly conn: RpcConnection,
    private readonly commitment: Commitment = "confirmed",
    opts: BackoffOptions = {},
  ) {
    this.backoff = { ...backoffFromEnv(), ...opts };
    this.sem = new Semaphore(this.backoff.maxConcurrency);
  }

  /** Transport failures left after retries surface as NetworkError; our own errors pass through. */
  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.sem.run(() => callWithRetry(fn, { ...this.backoff, label }));
    } catch (e) {
      if (e instanceof TradeKitError) throw e;
      const msg = errorMessage(e);
      const endpoint = this.conn.rpcEndpoint === undefined ? undefined : maskUrl(this.conn.rpcEndpoint);
      throw new NetworkError(`${label} failed: ${msg}`, { endpoint, status: httpStatusOf(msg), cause: e });
    }
  }

  getLatestBlockhash(): Promise<BlockhashWithExpiryBlockHeight> {
    return this.call(`getLatestBlockhash_${this.commitment}`, () => this.conn.getLatestBlockhash(this.commitment));
  }

  async getMultipleAccountsInfo(keys: readonly PublicKey[]): Promise<(AccountInfo<Buffer> | null)[]> {
    const out: (AccountInfo<Buffer> | null)[] = [];
    for (let i = 0; i < keys.length; i += MULTIPLE_ACCOUNTS_CHUNK) {
      const chunk = keys.slice(i, i + MULTIPLE_ACCOUNTS_CHUNK);
      const infos = await this.call(`getMultipleAccounts_${this.commitment}`, () =>
        this.conn.getMultipleAccountsInfo(chunk, { commitment: this.commitment }),
      );
      for (const info of infos) out.push(info ?? null);
    }
    return out;
  }

  async getTokenBalance(owner: PublicKey, mint: PublicKey): Promise<bigint> {
    const [info] = await this.getMultipleAccountsInfo([getAssociatedTokenAddressSync(mint, owner, true)]);
    if (!info) return 0n;
    return AccountLayout.decode(info.data).amount;
  }

  async getAddressLookupTable(address: PublicKey): Promise<AddressLookupTableAccount | null> {
    const res = await this.call("getAddressLookupTable", () => this.conn.getAddressLookupTable(address));
    return res.value;
  }
}

export function createChainReader(rpcUrl: string, commitment: Commitment = "confirmed", opts: BackoffOptions = {}): ChainReader {
  logger.scope("rpc").log("chain_reader_init", { endpoint: maskUrl(rpcUrl), commitment });
  return new BackoffChainReader(new Connection(rpcUrl, commitment), commitment, opts);
}
