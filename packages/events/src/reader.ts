import { PublicKey } from "@solana/web3.js";
import { DecodeError } from "@tradewire/core";

const MAX_STRING_BYTES = 1024;

/** Bounds-checked little-endian reader over borsh-encoded bytes. */
export class BorshReader {
  private readonly view: DataView;
  private offset: number;

  constructor(private readonly buf: Uint8Array, offset = 0) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  private need(n: number, what: string): number {
    if (this.offset + n > this.buf.length) {
      throw new DecodeError(
        "truncated",
        `${what}: need ${n} bytes at offset ${this.offset}, have ${this.remaining}`,
      );
    }
    const at = this.offset;
    this.offset += n;
    return at;
  }

  skip(n: number): this {
    this.need(n, "skip");
    return this;
  }

  u8(): number {
    return this.view.getUint8(this.need(1, "u8"));
  }

  bool(): boolean {
    const v = this.u8();
    if (v > 1) throw new DecodeError("malformed", `invalid bool byte ${v} at offset ${this.offset - 1}`);
    return v === 1;
  }

  u16(): number {
    return this.view.getUint16(this.need(2, "u16"), true);
  }

  u32(): number {
    return this.view.getUint32(this.need(4, "u32"), true);
  }

  u64(): bigint {
    return this.view.getBigUint64(this.need(8, "u64"), true);
  }

  i64(): bigint {
    return this.view.getBigInt64(this.need(8, "i64"), true);
  }

  bytes(n: number): Uint8Array {
    const at = this.need(n, "bytes");
    return this.buf.subarray(at, at + n);
  }

  pubkey(): PublicKey {
    return new PublicKey(this.bytes(32));
  }

  string(): string {
    const len = this.u32();
    if (len > MAX_STRING_BYTES) {
      throw new DecodeError("malformed", `string length ${len} exceeds ${MAX_STRING_BYTES}`);
    }
    return Buffer.from(this.bytes(len)).toString("utf8");
  }
}
