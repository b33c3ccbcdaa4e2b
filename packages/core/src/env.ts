export type Env = Record<string, string | undefined>;

export function parseIntEnv(v: string | undefined, def: number, min?: number, max?: number): number {
  const n = Number(v);
  const base = v === undefined || v.trim() === "" || !Number.isFinite(n) ? def : Math.trunc(n);
  const lo = min ?? Number.MIN_SAFE_INTEGER;
  const hi = max ?? Number.MAX_SAFE_INTEGER;
  return Math.max(lo, Math.min(hi, base));
}

export function parseMsEnv(v: string | undefined, def = 5000, min = 50, max = 60_000): number {
  return parseIntEnv(v, def, min, max);
}

export function parseBoolEnv(v: string | undefined, def = false): boolean {
  if (v == null) return def;
  const s = v.trim().toLowerCase();
  if (s === "1" || s === "true" || s === "yes" || s === "on") return true;
  if (s === "0" || s === "false" || s === "no" || s === "off") return false;
  return def;
}

/** Comma separated non-negative integers, e.g. "1000, 2500". Blank entries are skipped. */
export function parseBigIntList(v: string | undefined): bigint[] {
  if (!v) return [];
  const out: bigint[] = [];
  for (const part of v.split(",")) {
    const s = part.trim();
    if (!s) continue;
    if (!/^\d+$/.test(s)) throw new TypeError(`not a non-negative integer: "${s}"`);
    out.push(BigInt(s));
  }
  return out;
}

export function maskUrl(u: string): string {
  try {
    const url = new URL(u);
    for (const key of ["api-key", "c", "token"]) {
      if (url.searchParams.has(key)) url.searchParams.set(key, "***");
    }
    return url.toString();
  } catch {
    return u;
  }
}
