import fs from "node:fs";
import path from "node:path";
import * as dotenv from "dotenv";
import { ValidationError } from "./errors.js";
import { parseBigIntList, parseIntEnv, parseMsEnv, type Env } from "./env.js";

export type Commitment = "processed" | "confirmed" | "finalized";

export const RELAY_KINDS = ["rpc", "jito", "nozomi", "node1", "nextblock", "zeroslot"] as const;
export type RelayKind = (typeof RELAY_KINDS)[number];

/**
 * Compute-unit budget and relay tips. The two are independent: the unit price buys
 * priority inside a block, tips buy a relay's attention. `tipLamports[i]` belongs to
 * the i-th tip-taking (non-rpc) relay in configuration order.
 */
export interface PriorityFeeConfig {
  readonly unitLimit: number;
  /** micro-lamports per compute unit */
  readonly unitPrice: number;
  readonly tipLamports: readonly bigint[];
}

export interface RelayConfig {
  readonly kind: RelayKind;
  readonly endpoint: string;
  readonly name?: string;
  readonly region?: string;
  readonly authToken?: string;
  /** Overrides the relay kind's published tip accounts. */
  readonly tipAccounts?: readonly string[];
  readonly timeoutMs?: number;
}

export interface ClientConfig {
  readonly rpcUrl: string;
  readonly commitment: Commitment;
  readonly priorityFee: PriorityFeeConfig;
  readonly relays: readonly RelayConfig[];
  /** Address lookup table applied to every trade transaction. */
  readonly lookupTable?: string;
  readonly relayTimeoutMs: number;
}

/** The one baseline: used whenever a trade call carries no fee config of its own. */
export const DEFAULT_PRIORITY_FEE: PriorityFeeConfig = {
  unitLimit: 68_000,
  unitPrice: 400_000,
  tipLamports: [],
};

export const DEFAULT_RELAY_TIMEOUT_MS = 5_000;
export const MAX_COMPUTE_UNIT_LIMIT = 1_400_000;

export function relayName(cfg: RelayConfig, index: number): string {
  return cfg.name ?? (cfg.region ? `${cfg.kind}:${cfg.region}` : `${cfg.kind}#${index}`);
}

export function isTipRelay(cfg: Pick<RelayConfig, "kind">): boolean {
  return cfg.kind !== "rpc";
}

export function validatePriorityFee(fee: PriorityFeeConfig, relays: readonly RelayConfig[]): void {
  if (!Number.isInteger(fee.unitLimit) || fee.unitLimit <= 0 || fee.unitLimit > MAX_COMPUTE_UNIT_LIMIT) {
    throw new ValidationError("priorityFee.unitLimit", `compute unit limit must be an integer in 1..${MAX_COMPUTE_UNIT_LIMIT}`);
  }
  if (!Number.isInteger(fee.unitPrice) || fee.unitPrice < 0) {
    throw new ValidationError("priorityFee.unitPrice", "compute unit price must be a non-negative integer");
  }
  if (fee.tipLamports.some((t) => t < 0n)) {
    throw new ValidationError("priorityFee.tipLamports", "tips must be non-negative");
  }
  const tipRelays = relays.filter(isTipRelay).length;
  if (fee.tipLamports.length !== tipRelays) {
    throw new ValidationError(
      "priorityFee.tipLamports",
      `${fee.tipLamports.length} tip amounts configured for ${tipRelays} tip-taking relays`,
    );
  }
}

export function validateConfig(cfg: ClientConfig): void {
  if (!cfg.rpcUrl.trim()) throw new ValidationError("rpcUrl", "rpc endpoint is required");
  const names = new Set<string>();
  cfg.relays.forEach((r, i) => {
    if (!r.endpoint.trim()) throw new ValidationError(`relays[${i}].endpoint`, `relay ${r.kind} has no endpoint`);
    const name = relayName(r, i);
    if (names.has(name)) throw new ValidationError(`relays[${i}].name`, `duplicate relay name ${name}`);
    names.add(name);
  });
  if (!(cfg.relayTimeoutMs > 0)) throw new ValidationError("relayTimeoutMs", "relay timeout must be positive");
  validatePriorityFee(cfg.priorityFee, cfg.relays);
}

function isRelayKind(v: unknown): v is RelayKind {
  return typeof v === "string" && (RELAY_KINDS as readonly string[]).includes(v);
}

function optString(o: Record<string, unknown>, key: string): string | undefined {
  const v = o[key];
  return typeof v === "string" && v.trim() ? v.trim() : undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function parseRelayConfigs(raw: unknown): RelayConfig[] {
  if (!Array.isArray(raw)) throw new ValidationError("relays", "relay list must be a JSON array");
  return raw.map((item, i): RelayConfig => {
    if (!isRecord(item)) throw new ValidationError(`relays[${i}]`, "relay entry must be an object");
    if (!isRelayKind(item.kind)) throw new ValidationError(`relays[${i}].kind`, `unknown relay kind ${String(item.kind)}`);
    const endpoint = optString(item, "endpoint");
    if (!endpoint) throw new ValidationError(`relays[${i}].endpoint`, `relay ${item.kind} has no endpoint`);
    const tips = item.tipAccounts;
    const tipAccounts = Array.isArray(tips) ? tips.filter((t): t is string => typeof t === "string") : undefined;
    const timeout = item.timeoutMs;
    return {
      kind: item.kind,
      endpoint,
      name: optString(item, "name"),
      region: optString(item, "region"),
      authToken: optString(item, "authToken"),
      tipAccounts,
      timeoutMs: typeof timeout === "number" && timeout > 0 ? timeout : undefined,
    };
  });
}

function parseCommitment(v: string | undefined): Commitment {
  const s = (v ?? "").trim().toLowerCase();
  if (s === "processed" || s === "confirmed" || s === "finalized") return s;
  return "confirmed";
}

/** Loads the first env file found (ENV_FILE, .env.local, .env) into process.env. */
export function loadEnvFiles(cwd: string = process.cwd()): string | undefined {
  const explicit = process.env.ENV_FILE?.trim();
  const candidates = [
    ...(explicit ? [path.isAbsolute(explicit) ? explicit : path.resolve(cwd, explicit)] : []),
    path.resolve(cwd, ".env.local"),
    path.resolve(cwd, ".env"),
  ];
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p });
      return p;
    }
  }
  return undefined;
}

function resolveRpc(env: Env): string {
  return env.RPC_URL?.trim() || env.RPC_PRIMARY?.trim() || "https://api.mainnet-beta.solana.com";
}

export function loadConfigFromEnv(env: Env = process.env, cwd: string = process.cwd()): ClientConfig {
  if (env === process.env) loadEnvFiles(cwd);
  const relaysPath = env.RELAYS_JSON?.trim();
  let relays: RelayConfig[] = [];
  if (relaysPath) {
    const file = path.isAbsolute(relaysPath) ? relaysPath : path.resolve(cwd, relaysPath);
    const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    relays = parseRelayConfigs(parsed);
  }
  const cfg: ClientConfig = {
    rpcUrl: resolveRpc(env),
    commitment: parseCommitment(env.COMMITMENT),
    priorityFee: {
      unitLimit: parseIntEnv(env.CU_LIMIT, DEFAULT_PRIORITY_FEE.unitLimit, 1, MAX_COMPUTE_UNIT_LIMIT),
      unitPrice: parseIntEnv(env.CU_PRICE_MICROLAMPORTS, DEFAULT_PRIORITY_FEE.unitPrice, 0),
      tipLamports: parseBigIntList(env.TIP_LAMPORTS),
    },
    relays,
    lookupTable: env.LOOKUP_TABLE?.trim() || undefined,
    relayTimeoutMs: parseMsEnv(env.RELAY_TIMEOUT_MS, DEFAULT_RELAY_TIMEOUT_MS),
  };
  validateConfig(cfg);
  return cfg;
}
