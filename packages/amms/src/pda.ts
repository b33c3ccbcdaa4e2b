import { PublicKey } from "@solana/web3.js";
import { NATIVE_MINT, getAssociatedTokenAddressSync } from "@solana/spl-token";
import { BONK_PROGRAM_ID, PUMPFUN_PROGRAM_ID, PUMPSWAP_PROGRAM_ID } from "@tradewire/core";

const seed = (s: string): Buffer => Buffer.from(s, "utf8");
const pda = (seeds: Uint8Array[], program: PublicKey): PublicKey => PublicKey.findProgramAddressSync(seeds, program)[0];

export const WSOL_MINT = NATIVE_MINT;
export const MPL_TOKEN_METADATA_PROGRAM_ID = new PublicKey("metaqbxxUerdq28cj1RbAWkYQm3ybzjb6a8bt518x1s");

export function eventAuthority(program: PublicKey): PublicKey {
  return pda([seed("__event_authority")], program);
}

export function isSetKey(k: PublicKey | undefined): k is PublicKey {
  return k !== undefined && !k.equals(PublicKey.default);
}

// ── pumpfun ─────────────────────────────────────────────────────

export const PUMPFUN_FEE_RECIPIENT = new PublicKey("CebN5WGQ4jvEPvsVU4EoHEpgzq1VV7AbicfhtW4xC9iM");
export const pumpfunGlobal = (): PublicKey => pda([seed("global")], PUMPFUN_PROGRAM_ID);
export const pumpfunMintAuthority = (): PublicKey => pda([seed("mint-authority")], PUMPFUN_PROGRAM_ID);
export const bondingCurvePda = (mint: PublicKey): PublicKey =>
  pda([seed("bonding-curve"), mint.toBuffer()], PUMPFUN_PROGRAM_ID);
export const creatorVaultPda = (creator: PublicKey): PublicKey =>
  pda([seed("creator-vault"), creator.toBuffer()], PUMPFUN_PROGRAM_ID);
export const metadataPda = (mint: PublicKey): PublicKey =>
  pda([seed("metadata"), MPL_TOKEN_METADATA_PROGRAM_ID.toBuffer(), mint.toBuffer()], MPL_TOKEN_METADATA_PROGRAM_ID);

// ── pumpswap ────────────────────────────────────────────────────

export const PUMPSWAP_PROTOCOL_FEE_RECIPIENT = new PublicKey("62qc2CNXwrYqQScmEdiZFFAnJR262PxWEuNQtxfafNgV");
export const pumpswapGlobalConfig = (): PublicKey => pda([seed("global_config")], PUMPSWAP_PROGRAM_ID);
export const poolAuthorityPda = (mint: PublicKey): PublicKey =>
  pda([seed("pool-authority"), mint.toBuffer()], PUMPFUN_PROGRAM_ID);

/** Pool created when a pumpfun curve migrates: index 0, owned by the curve's pool authority. */
export function canonicalPoolPda(mint: PublicKey, quoteMint: PublicKey = WSOL_MINT): PublicKey {
  const index = Buffer.alloc(2);
  index.writeUInt16LE(0);
  return pda(
    [seed("pool"), index, poolAuthorityPda(mint).toBuffer(), mint.toBuffer(), quoteMint.toBuffer()],
    PUMPSWAP_PROGRAM_ID,
  );
}

export const coinCreatorVaultAuthority = (coinCreator: PublicKey): PublicKey =>
  pda([seed("creator_vault"), coinCreator.toBuffer()], PUMPSWAP_PROGRAM_ID);

export const poolTokenAccount = (pool: PublicKey, mint: PublicKey): PublicKey =>
  getAssociatedTokenAddressSync(mint, pool, true);

// ── bonk ────────────────────────────────────────────────────────

export const BONK_GLOBAL_CONFIG = new PublicKey("6s1xP3hpbAfFoNtUNF8mfHsjr2Bd97JxFJRWLbL6aHuX");
export const BONK_PLATFORM_CONFIG = new PublicKey("FfYek5vEz23cMkWsdJwG2oa6EphsvXSHrGpdALN4g6W1");
export const bonkAuthority = (): PublicKey => pda([seed("vault_auth_seed")], BONK_PROGRAM_ID);
export const bonkPoolPda = (baseMint: PublicKey, quoteMint: PublicKey = WSOL_MINT): PublicKey =>
  pda([seed("pool"), baseMint.toBuffer(), quoteMint.toBuffer()], BONK_PROGRAM_ID);
export const bonkVaultPda = (pool: PublicKey, mint: PublicKey): PublicKey =>
  pda([seed("pool_vault"), pool.toBuffer(), mint.toBuffer()], BONK_PROGRAM_ID);
