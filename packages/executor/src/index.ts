export {
  TradeEngine,
  type CreateAndBuyRequest,
  type SellPercentRequest,
  type TradeContext,
  type TradeOptions,
  type TradeOutcome,
  type TradeRequest,
} from "./engine.js";
export { createTradeClient, type TradeClientOptions } from "./client.js";
export { applyMiddlewares, type InstructionMiddleware, type MiddlewareContext } from "./middleware.js";
export { StageTimer, type StageTiming } from "./timer.js";
export { assertOnlyExpectedSigners, compileAndSign, computeBudgetInstructions, tipInstructions } from "./tx.js";
