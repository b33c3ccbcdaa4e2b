import { VersionedTransaction } from "@solana/web3.js";
import { DecodeError } from "@tradewire/core";
import { BorshReader } from "@tradewire/events";

const SIGNATURE_BYTES = 64;
const KEY_BYTES = 32;
const ENTRY_MIN_BYTES = 8 + 32 + 8;

export interface Entry {
  readonly numHashes: bigint;
  readonly hash: Uint8Array;
  readonly transactions: VersionedTransaction[];
}

function compactU16(r: BorshReader): number {
  let value = 0;
  for (let i = 0; i < 3; i++) {
    const b = r.u8();
    value |= (b & 0x7f) << (7 * i);
    if ((b & 0x80) === 0) return value;
  }
  throw new DecodeError("malformed", `compact-u16 longer than 3 bytes at offset ${r.position}`);
}

function skipVec(r: BorshReader, itemBytes: number): void {
  r.skip(compactU16(r) * itemBytes);
}

/** Advances past one wire-format transaction, legacy or versioned. */
function skipTransaction(r: BorshReader): void {
  skipVec(r, SIGNATURE_BYTES);
  const versioned = (r.u8() & 0x80) !== 0;
  // header is 3 bytes; a legacy message's first header byte was just read
  r.skip(versioned ? 3 : 2);
  skipVec(r, KEY_BYTES);
  r.skip(32);
  const instructions = compactU16(r);
  for (let i = 0; i < instructions; i++) {
    r.skip(1);
    skipVec(r, 1);
    skipVec(r, 1);
  }
  if (!versioned) return;
  const lookups = compactU16(r);
  for (let i = 0; i < lookups; i++) {
    r.skip(KEY_BYTES);
    skipVec(r, 1);
    skipVec(r, 1);
  }
}

function length(r: BorshReader, minItemBytes: number, what: string): number {
  const n = r.u64();
  if (n * BigInt(minItemBytes) > BigInt(r.remaining)) {
    throw new DecodeError("malformed", `${what} count ${n} exceeds the ${r.remaining} bytes left`);
  }
  return Number(n);
}

/** Decodes a bincode `Vec<Entry>` as carried in a shredstream entry batch. */
export function parseEntries(data: Uint8Array): Entry[] {
  const r = new BorshReader(data);
  const count = length(r, ENTRY_MIN_BYTES, "entry");
  const entries: Entry[] = [];
  for (let e = 0; e < count; e++) {
    const numHashes = r.u64();
    const hash = r.bytes(32);
    const txCount = length(r, 1 + SIGNATURE_BYTES, "transaction");
    const transactions: VersionedTransaction[] = [];
    for (let t = 0; t < txCount; t++) {
      const start = r.position;
      skipTransaction(r);
      transactions.push(VersionedTransaction.deserialize(data.subarray(start, r.position)));
    }
    entries.push({ numHashes, hash, transactions });
  }
  return entries;
}
