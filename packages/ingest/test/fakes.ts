import { PROGRAM_IDS } from "@tradewire/core";
import type { ConfirmedTransaction, OpenStream, StreamHandlers, StreamOpener } from "../src/index.js";
import { USER, encodeBonkTrade, encodePumpFunTrade, pumpfunTrade } from "../../events/test/fixtures.js";

/** In-process stand-in for one gRPC feed; every open() replaces the handlers. */
export class FakeFeed<T> {
  opens = 0;
  closes = 0;
  private handlers: StreamHandlers<T> | undefined;

  readonly open: StreamOpener<T> = async (handlers) => {
    this.opens++;
    this.handlers = handlers;
    const stream: OpenStream = { close: () => void this.closes++ };
    return stream;
  };

  emit(message: T): void {
    this.handlers?.onMessage(message);
  }

  drop(error?: Error): void {
    this.handlers?.onClose(error);
  }
}

export const PF = PROGRAM_IDS.pumpfun.toBase58();
export const BONK = PROGRAM_IDS.bonk.toBase58();

const dataLine = (payload: Buffer): string => `Program data: ${payload.toString("base64")}`;

/** A transaction whose logs carry one pumpfun buy and one bonk buy. */
export function mixedTransaction(overrides: Partial<ConfirmedTransaction> = {}): ConfirmedTransaction {
  return {
    signature: "sig-1",
    slot: 42n,
    failed: false,
    accountKeys: [USER, PROGRAM_IDS.pumpfun, PROGRAM_IDS.bonk],
    instructions: [],
    innerInstructions: [],
    logMessages: [
      `Program ${PF} invoke [1]`,
      dataLine(encodePumpFunTrade(pumpfunTrade)),
      `Program ${PF} success`,
      `Program ${BONK} invoke [1]`,
      dataLine(encodeBonkTrade(0)),
      `Program ${BONK} success`,
    ],
    ...overrides,
  };
}
