export * from "./types.js";
export * from "./discriminators.js";
export { BorshReader } from "./reader.js";
export { BorshWriter } from "./writer.js";
export { RuleContext, type DecodeRule } from "./rule.js";
export {
  DiscriminatorRegistry,
  LAYOUT_VERSION,
  RULESETS,
  createDefaultRegistry,
  defaultRegistry,
} from "./registry.js";
export {
  classify,
  protocolFilter,
  stripEventTag,
  type ClassifyOptions,
  type ClassifyResult,
} from "./classify.js";
export { extractProgramData, type ProgramData } from "./logs.js";
export {
  decodeTransaction,
  markCreatorTrades,
  type PayloadRef,
  type TransactionDecodeOptions,
} from "./transaction.js";
export { poolStatusFromByte } from "./layouts/bonk.js";
