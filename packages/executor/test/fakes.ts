import { PublicKey, type AccountInfo, type AddressLookupTableAccount, type VersionedTransaction } from "@solana/web3.js";
import type { ClientConfig } from "@tradewire/core";
import { BorshWriter, PUMPFUN } from "@tradewire/events";
import {
  transactionSignature,
  type DispatchOptions,
  type DispatchResult,
  type Relay,
  type TransactionDispatcher,
} from "@tradewire/relays";
import type { ChainReader } from "@tradewire/rpc-facade";

export const key = (n: number): PublicKey => new PublicKey(Buffer.alloc(32, n));
export const MINT = key(1);
export const CREATOR = key(3);
export const TIP_ACCOUNT = new PublicKey("96gYZGLnJYVFmbjzopPSU6QiEV5fGqZNyN9nmNhvrZU5");
export const BLOCKHASH = "11111111111111111111111111111111";

export const config: ClientConfig = {
  rpcUrl: "https://rpc.example.test",
  commitment: "processed",
  priorityFee: { unitLimit: 100_000, unitPrice: 1_000, tipLamports: [10_000n] },
  relays: [{ kind: "jito", endpoint: "https://jito.example.test" }],
  relayTimeoutMs: 1_000,
};

export class FakeChain implements ChainReader {
  readonly accounts = new Map<string, AccountInfo<Buffer>>();
  balance = 0n;
  reads = 0;
  lookupTable: AddressLookupTableAccount | null = null;

  async getLatestBlockhash(): Promise<{ blockhash: string; lastValidBlockHeight: number }> {
    return { blockhash: BLOCKHASH, lastValidBlockHeight: 1 };
  }

  async getMultipleAccountsInfo(keys: readonly PublicKey[]): Promise<(AccountInfo<Buffer> | null)[]> {
    this.reads++;
    return keys.map((k) => this.accounts.get(k.toBase58()) ?? null);
  }

  async getTokenBalance(): Promise<bigint> {
    return this.balance;
  }

  async getAddressLookupTable(): Promise<AddressLookupTableAccount | null> {
    return this.lookupTable;
  }

  put(address: PublicKey, data: Buffer, owner: PublicKey): void {
    this.accounts.set(address.toBase58(), { data, owner, lamports: 1, executable: false, rentEpoch: 0 });
  }
}

const relay = (name: string, kind: Relay["kind"], tip?: PublicKey): Relay => ({
  name,
  kind,
  tipAccount: () => tip,
  submit: async () => undefined,
});

export interface Submission {
  readonly tx: VersionedTransaction;
  readonly relays: readonly string[];
  readonly scope?: string;
}

export class FakeDispatcher implements TransactionDispatcher {
  readonly relays: Relay[] = [relay("jito#0", "jito", TIP_ACCOUNT), relay("rpc", "rpc")];
  readonly sent: Submission[] = [];

  select(useRelays: boolean): readonly Relay[] {
    return useRelays ? this.relays : this.relays.filter((r) => r.kind === "rpc");
  }

  async submit(tx: VersionedTransaction, opts: DispatchOptions = {}): Promise<DispatchResult> {
    const relays = opts.relays ?? this.relays;
    this.sent.push({ tx, relays: relays.map((r) => r.name), scope: opts.scope });
    return { signature: transactionSignature(tx), relay: relays[0].name, elapsedMs: 1 };
  }
}

/** Fresh curve state: initial reserves, creator set. */
export function bondingCurveData(creator: PublicKey): Buffer {
  return new BorshWriter()
    .raw(PUMPFUN.accounts.bondingCurve)
    .u64(1_073_000_000_000_000n)
    .u64(30_000_000_000n)
    .u64(793_100_000_000_000n)
    .u64(0n)
    .u64(1_000_000_000_000_000n)
    .bool(false)
    .pubkey(creator)
    .toBuffer();
}
