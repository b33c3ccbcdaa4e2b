/** Guards for messages decoded by proto-loader, which arrive as plain objects. */

export function field(obj: unknown, key: string): unknown {
  if (typeof obj !== "object" || obj === null || !(key in obj)) return undefined;
  return Reflect.get(obj, key);
}

export function bytes(v: unknown): Uint8Array | undefined {
  return v instanceof Uint8Array ? v : undefined;
}

/** uint64 fields come as decimal strings under `longs: String`. */
export function u64(v: unknown): bigint {
  if (typeof v === "bigint") return v;
  if (typeof v === "number" && Number.isInteger(v)) return BigInt(v);
  if (typeof v === "string" && /^\d+$/.test(v)) return BigInt(v);
  return 0n;
}
