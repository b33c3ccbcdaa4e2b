import type { PublicKey } from "@solana/web3.js";
import { NetworkError, errorMessage, maskUrl, type RelayConfig, type RelayKind } from "@tradewire/core";
import type { Relay } from "./relay.js";
import { pickTipAccount } from "./tips.js";

export type HttpRelayKind = Exclude<RelayKind, "rpc">;

export interface HttpRequest {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: string;
}

function withPath(endpoint: string, path: string): URL {
  const url = new URL(endpoint);
  if (!url.pathname.endsWith(path)) url.pathname = url.pathname.replace(/\/+$/, "") + path;
  return url;
}

function withQuery(endpoint: string, key: string, value: string | undefined): URL {
  const url = new URL(endpoint);
  if (value) url.searchParams.set(key, value);
  return url;
}

function sendTransactionBody(encoded: string): string {
  return JSON.stringify({
    jsonrpc: "2.0",
    id: 1,
    method: "sendTransaction",
    params: [encoded, { encoding: "base64", skipPreflight: true }],
  });
}

const JSON_HEADERS = { "Content-Type": "application/json" };

/** Wire format of each relay kind. `encoded` is the base64 transaction. */
const REQUESTS: Record<HttpRelayKind, (cfg: RelayConfig, encoded: string) => HttpRequest> = {
  jito: (cfg, encoded) => ({
    url: withPath(cfg.endpoint, "/api/v1/transactions").toString(),
    headers: cfg.authToken ? { ...JSON_HEADERS, "x-jito-auth": cfg.authToken } : JSON_HEADERS,
    body: sendTransactionBody(encoded),
  }),
  nozomi: (cfg, encoded) => ({
    url: withQuery(cfg.endpoint, "c", cfg.authToken).toString(),
    headers: JSON_HEADERS,
    body: sendTransactionBody(encoded),
  }),
  node1: (cfg, encoded) => ({
    url: cfg.endpoint,
    headers: cfg.authToken ? { ...JSON_HEADERS, "api-key": cfg.authToken } : JSON_HEADERS,
    body: sendTransactionBody(encoded),
  }),
  nextblock: (cfg, encoded) => ({
    url: withPath(cfg.endpoint, "/api/v2/submit").toString(),
    headers: cfg.authToken ? { ...JSON_HEADERS, Authorization: cfg.authToken } : JSON_HEADERS,
    body: JSON.stringify({ transaction: { content: encoded }, frontRunningProtection: false }),
  }),
  zeroslot: (cfg, encoded) => ({
    url: withQuery(cfg.endpoint, "api-key", cfg.authToken).toString(),
    headers: JSON_HEADERS,
    body: sendTransactionBody(encoded),
  }),
};

export function buildRelayRequest(kind: HttpRelayKind, cfg: RelayConfig, raw: Uint8Array): HttpRequest {
  return REQUESTS[kind](cfg, Buffer.from(raw).toString("base64"));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** JSON-RPC `result`, or a top-level `signature` for relays with their own envelope. */
export function parseRelayResponse(name: string, body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;
  const err = parsed.error;
  if (err !== undefined && err !== null) {
    const message = isRecord(err) && typeof err.message === "string" ? err.message : JSON.stringify(err);
    throw new NetworkError(`${name} rejected the transaction: ${message}`);
  }
  if (typeof parsed.result === "string") return parsed.result;
  if (typeof parsed.signature === "string") return parsed.signature;
  return undefined;
}

export class HttpRelay implements Relay {
  constructor(
    readonly name: string,
    readonly kind: HttpRelayKind,
    private readonly cfg: RelayConfig,
    private readonly tipAccounts: readonly PublicKey[],
  ) {}

  tipAccount(): PublicKey | undefined {
    return pickTipAccount(this.tipAccounts);
  }

  async submit(raw: Uint8Array, signal: AbortSignal): Promise<string | undefined> {
    const req = buildRelayRequest(this.kind, this.cfg, raw);
    const endpoint = maskUrl(req.url);
    let res: Response;
    let body: string;
    try {
      res = await fetch(req.url, { method: "POST", headers: req.headers, body: req.body, signal });
      body = await res.text();
    } catch (e) {
      throw new NetworkError(`${this.name}: ${errorMessage(e)}`, { endpoint, cause: e });
    }
    if (!res.ok) {
      throw new NetworkError(`${this.name} responded ${res.status}: ${body.slice(0, 200)}`, {
        endpoint,
        status: res.status,
      });
    }
    return parseRelayResponse(this.name, body);
  }
}
