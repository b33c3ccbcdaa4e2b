import { PublicKey } from "@solana/web3.js";

export const PROTOCOLS = ["pumpfun", "pumpswap", "bonk"] as const;
export type ProtocolTag = (typeof PROTOCOLS)[number];

export const PUMPFUN_PROGRAM_ID = new PublicKey("6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P");
export const PUMPSWAP_PROGRAM_ID = new PublicKey("pAMMBay6oceH9fJKBRHGP5D4bD4sWpmSwMn52FMfXEA");
export const BONK_PROGRAM_ID = new PublicKey("LanMV9sAd7wArD4vJFi2qDdfnVhFxYSUg6eADduJ3uj");

export const PROGRAM_IDS: Readonly<Record<ProtocolTag, PublicKey>> = {
  pumpfun: PUMPFUN_PROGRAM_ID,
  pumpswap: PUMPSWAP_PROGRAM_ID,
  bonk: BONK_PROGRAM_ID,
};

const BY_PROGRAM = new Map<string, ProtocolTag>(
  PROTOCOLS.map((p) => [PROGRAM_IDS[p].toBase58(), p]),
);

/** Protocol owning `programId`, or undefined for any other program. */
export function protocolForProgram(programId: PublicKey | string): ProtocolTag | undefined {
  const key = typeof programId === "string" ? programId : programId.toBase58();
  return BY_PROGRAM.get(key);
}

export function isProtocolTag(v: unknown): v is ProtocolTag {
  return typeof v === "string" && (PROTOCOLS as readonly string[]).includes(v);
}

export function parseProtocolTag(v: string): ProtocolTag {
  const s = v.trim().toLowerCase();
  if (isProtocolTag(s)) return s;
  throw new TypeError(`unknown protocol "${v}" (expected one of ${PROTOCOLS.join(", ")})`);
}
