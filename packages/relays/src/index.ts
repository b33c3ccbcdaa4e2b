export type { Relay } from "./relay.js";
export { HttpRelay, buildRelayRequest, parseRelayResponse, type HttpRelayKind, type HttpRequest } from "./http.js";
export { RpcRelay, abortable, type RawTransactionSender } from "./rpc.js";
export { knownTipAccounts, pickTipAccount, resolveTipAccounts } from "./tips.js";
export { firstSuccess, type RaceTask, type RaceWinner } from "./race.js";
export {
  RelayDispatcher,
  transactionSignature,
  type DispatchEntry,
  type DispatchOptions,
  type DispatchResult,
  type TransactionDispatcher,
} from "./dispatcher.js";
export { createDispatcher, createRelay, type RelayFactoryOptions } from "./factory.js";
