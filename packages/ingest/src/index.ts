export { type ExtraFilters, type EventFilter, eventFilter, matchesExtraFilters } from "./filters.js";
export {
  decodeErrorLogger,
  keepSubscribed,
  reconnectFromEnv,
  type EventCallback,
  type OpenStream,
  type ReconnectOptions,
  type StreamHandlers,
  type StreamOpener,
  type SubscriptionHandle,
  type SubscriptionHooks,
  type SubscriptionOutcome,
} from "./subscription.js";
export {
  YellowstoneEventClient,
  buildGeyserRequest,
  confirmedPayloads,
  grpcGeyserTransport,
  loadGeyserClient,
  parseGeyserUpdate,
  type CompiledInstruction,
  type ConfirmedTransaction,
  type GeyserCommitment,
  type GeyserRequest,
  type GeyserTransport,
  type GeyserUpdate,
  type GeyserUpdateFields,
  type YellowstoneOptions,
} from "./yellowstone.js";
export {
  ShredStreamEventClient,
  decodeEntryBatch,
  grpcShredTransport,
  instructionPayloads,
  parseEntryBatch,
  type EntryBatch,
  type ShredStreamOptions,
  type ShredTransport,
} from "./shredstream.js";
export { parseEntries, type Entry } from "./entries.js";
