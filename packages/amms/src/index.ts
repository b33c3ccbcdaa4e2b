export * from "./math.js";
export * from "./pda.js";
export * from "./wsol.js";
export type { BuildRequest, FetchedAccounts, MarketParams, MarketParamsMap, ProtocolAdapter } from "./adapters/types.js";
export {
  PumpFunAdapter,
  createPumpFunAdapter,
  buildCreateInstruction,
  decodeBondingCurve,
  initialCurve,
  curveAfterBuy,
  curveAfterCreatorBuy,
  PUMPFUN_INITIAL_CURVE,
  PUMPFUN_FEE_BPS,
  PUMPFUN_CREATOR_FEE_BPS,
  type TokenMetadata,
} from "./adapters/pumpfun.js";
export {
  PumpSwapAdapter,
  createPumpSwapAdapter,
  decodePoolAccount,
  poolFeeBps,
  PUMPSWAP_LP_FEE_BPS,
  PUMPSWAP_PROTOCOL_FEE_BPS,
  PUMPSWAP_COIN_CREATOR_FEE_BPS,
  type PoolAccount,
} from "./adapters/pumpswap.js";
export {
  BonkAdapter,
  createBonkAdapter,
  decodePoolState,
  BONK_PROTOCOL_FEE_RATE,
  BONK_PLATFORM_FEE_RATE,
  BONK_SHARE_FEE_RATE,
} from "./adapters/bonk.js";
export { createAdapterRegistry, getAdapter, type AdapterRegistry } from "./adapters/registry.js";
export { snapshotFromEvent } from "./snapshot_from_event.js";
