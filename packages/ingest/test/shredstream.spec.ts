import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  Keypair,
  SystemProgram,
  TransactionInstruction,
  TransactionMessage,
  VersionedTransaction,
} from "@solana/web3.js";
import bs58 from "bs58";
import { PROGRAM_IDS, type DecodeError } from "@tradewire/core";
import { BorshWriter, PUMPFUN, type TradeEvent } from "@tradewire/events";
import {
  ShredStreamEventClient,
  decodeEntryBatch,
  eventFilter,
  parseEntries,
  parseEntryBatch,
  type EntryBatch,
} from "../src/index.js";
import { CURVE, MINT, key } from "../../events/test/fixtures.js";
import { FakeFeed } from "./fakes.js";

const BLOCKHASH = "11111111111111111111111111111111";
const user = Keypair.generate();

function pumpfunBuy(tokenAmount: bigint, maxSol: bigint): TransactionInstruction {
  const accounts = [key(30), key(31), MINT, CURVE, key(32), key(33)];
  return new TransactionInstruction({
    programId: PROGRAM_IDS.pumpfun,
    keys: [
      ...accounts.map((pubkey) => ({ pubkey, isSigner: false, isWritable: true })),
      { pubkey: user.publicKey, isSigner: true, isWritable: true },
    ],
    data: new BorshWriter().raw(PUMPFUN.ix.buy).u64(tokenAmount).u64(maxSol).toBuffer(),
  });
}

function bonkNoise(): TransactionInstruction {
  return new TransactionInstruction({ programId: PROGRAM_IDS.bonk, keys: [], data: Buffer.alloc(16, 7) });
}

function signed(instructions: TransactionInstruction[], legacy = false): VersionedTransaction {
  const message = new TransactionMessage({ payerKey: user.publicKey, recentBlockhash: BLOCKHASH, instructions });
  const tx = new VersionedTransaction(legacy ? message.compileToLegacyMessage() : message.compileToV0Message());
  tx.sign([user]);
  return tx;
}

function entryBatch(slot: bigint, txs: VersionedTransaction[]): EntryBatch {
  const w = new BorshWriter().u64(1n).u64(12n).raw(Buffer.alloc(32, 1)).u64(BigInt(txs.length));
  for (const tx of txs) w.raw(tx.serialize());
  return { slot, entries: w.toBuffer() };
}

describe("parseEntries", () => {
  it("splits an entry into its legacy and versioned transactions", () => {
    const v0 = signed([pumpfunBuy(1n, 2n)]);
    const legacy = signed([SystemProgram.transfer({ fromPubkey: user.publicKey, toPubkey: key(40), lamports: 5 })], true);
    const [entry, ...rest] = parseEntries(entryBatch(1n, [v0, legacy]).entries);
    expect(rest).toEqual([]);
    expect(entry.numHashes).toBe(12n);
    expect(entry.transactions.map((t) => t.version)).toEqual([0, "legacy"]);
    expect(entry.transactions.map((t) => bs58.encode(t.signatures[0]))).toEqual([
      bs58.encode(v0.signatures[0]),
      bs58.encode(legacy.signatures[0]),
    ]);
  });

  it("rejects a batch cut short", () => {
    const { entries } = entryBatch(1n, [signed([pumpfunBuy(1n, 2n)])]);
    expect(() => parseEntries(entries.subarray(0, entries.length - 10))).toThrow(/need/);
  });

  it("rejects an entry count the bytes cannot hold", () => {
    expect(() => parseEntries(new BorshWriter().u64(1_000n).toBuffer())).toThrow("entry count 1000 exceeds the 0 bytes left");
  });
});

describe("decodeEntryBatch", () => {
  it("decodes top-level instructions of the selected programs", () => {
    const tx = signed([bonkNoise(), pumpfunBuy(5_000_000n, 1_000_000_000n)]);
    const events = decodeEntryBatch(entryBatch(77n, [tx]), eventFilter(["pumpfun"]));
    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event).toMatchObject({
      protocol: "pumpfun",
      kind: "buy",
      origin: "instruction",
      slot: 77n,
      signature: bs58.encode(tx.signatures[0]),
      tokenAmount: 5_000_000n,
      solAmount: 1_000_000_000n,
    });
    if (event.protocol !== "pumpfun" || event.kind !== "buy") return;
    expect(event.mint.equals(MINT)).toBe(true);
    expect(event.user.equals(user.publicKey)).toBe(true);
  });

  it("applies the signature filter", () => {
    const tx = signed([pumpfunBuy(1n, 1n)]);
    const batch = entryBatch(1n, [tx]);
    expect(decodeEntryBatch(batch, eventFilter(["pumpfun"], { signature: "other" }))).toEqual([]);
    expect(decodeEntryBatch(batch, eventFilter(["pumpfun"], { signature: bs58.encode(tx.signatures[0]) }))).toHaveLength(1);
  });

  it("reports a malformed batch as a decode error", () => {
    const errors: DecodeError[] = [];
    const events = decodeEntryBatch({ slot: 9n, entries: Uint8Array.from([1, 0, 0]) }, eventFilter(["pumpfun"]), {
      onError: (e) => errors.push(e),
    });
    expect(events).toEqual([]);
    expect(errors.map((e) => e.reason)).toEqual(["truncated"]);
    expect(errors[0].message).toMatch(/^slot 9 entries: /);
  });
});

describe("parseEntryBatch", () => {
  it("reads slot and entry bytes", () => {
    const batch = parseEntryBatch({ slot: "88", entries: Buffer.from([1, 2]) });
    expect(batch?.slot).toBe(88n);
    expect([...(batch?.entries ?? [])]).toEqual([1, 2]);
    expect(parseEntryBatch({ slot: "1" })).toBeUndefined();
  });
});

describe("ShredStreamEventClient", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });
  afterEach(() => {
    vi.useRealTimers();
  });

  it("streams pre-confirmation events until closed", async () => {
    const feed = new FakeFeed<EntryBatch>();
    const events: TradeEvent[] = [];
    const client = new ShredStreamEventClient({
      endpoint: "http://127.0.0.1:9999",
      transport: feed.open,
      reconnect: { maxRetries: 3, baseMs: 10, maxMs: 100, jitter: false },
    });
    const handle = client.subscribe(["pumpfun"], undefined, (e) => events.push(e));
    await vi.advanceTimersByTimeAsync(0);

    feed.emit(entryBatch(5n, [signed([pumpfunBuy(1n, 2n)])]));
    feed.emit(entryBatch(6n, [signed([bonkNoise()])]));
    handle.close();
    feed.emit(entryBatch(7n, [signed([pumpfunBuy(3n, 4n)])]));

    expect(events.map((e) => e.slot)).toEqual([5n]);
    expect(await handle.done).toEqual({ status: "closed" });
    expect(feed.closes).toBe(1);
  });

  it("never reports instructions of programs outside the selection", async () => {
    const feed = new FakeFeed<EntryBatch>();
    const events: TradeEvent[] = [];
    new ShredStreamEventClient({ endpoint: "http://127.0.0.1:9999", transport: feed.open }).subscribe(
      ["bonk"],
      undefined,
      (e) => events.push(e),
      { onDecodeError: () => {} },
    );
    await vi.advanceTimersByTimeAsync(0);
    feed.emit(entryBatch(5n, [signed([pumpfunBuy(1n, 2n)])]));
    expect(events).toEqual([]);
  });
});

