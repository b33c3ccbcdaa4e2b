import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { PublicKey } from "@solana/web3.js";
import { RELAY_KINDS, ValidationError, type RelayConfig, type RelayKind } from "@tradewire/core";

const TIP_ACCOUNTS_FILE = fileURLToPath(new URL("./tip_accounts.json", import.meta.url));

let published: Partial<Record<RelayKind, PublicKey[]>> | undefined;

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}

function load(): Partial<Record<RelayKind, PublicKey[]>> {
  if (published) return published;
  const raw: unknown = JSON.parse(fs.readFileSync(TIP_ACCOUNTS_FILE, "utf8"));
  const out: Partial<Record<RelayKind, PublicKey[]>> = {};
  if (typeof raw === "object" && raw !== null) {
    for (const [name, list] of Object.entries(raw)) {
      const kind = RELAY_KINDS.find((k) => k === name);
      if (kind && kind !== "rpc" && isStringArray(list)) out[kind] = list.map((s) => new PublicKey(s));
    }
  }
  published = out;
  return out;
}

/** Published tip accounts for a relay kind; empty when the kind publishes none. */
export function knownTipAccounts(kind: RelayKind): readonly PublicKey[] {
  return load()[kind] ?? [];
}

/** Configured tip accounts win over published ones. Tip-taking relays must end up with at least one. */
export function resolveTipAccounts(cfg: RelayConfig, name: string): PublicKey[] {
  if (cfg.kind === "rpc") return [];
  const accounts = cfg.tipAccounts?.length ? cfg.tipAccounts.map((s) => new PublicKey(s)) : [...knownTipAccounts(cfg.kind)];
  if (!accounts.length) {
    throw new ValidationError(`relays.${name}.tipAccounts`, `relay ${name} (${cfg.kind}) has no tip accounts; configure tipAccounts`);
  }
  return accounts;
}

export function pickTipAccount(accounts: readonly PublicKey[], random: () => number = Math.random): PublicKey | undefined {
  if (!accounts.length) return undefined;
  return accounts[Math.min(accounts.length - 1, Math.floor(random() * accounts.length))];
}
