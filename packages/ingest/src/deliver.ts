import { ValidationError, errorMessage, logger, type ProtocolTag } from "@tradewire/core";
import type { TradeEvent } from "@tradewire/events";
import type { EventCallback } from "./subscription.js";

const log = logger.scope("ingest");

export function requireProtocols(protocols: Iterable<ProtocolTag>): ProtocolTag[] {
  const list = [...protocols];
  if (list.length === 0) throw new ValidationError("protocols", "subscribe needs at least one protocol");
  return list;
}

/** Hands events to the caller in order; a throwing callback does not stop the stream. */
export function deliver(source: string, events: readonly TradeEvent[], callback: EventCallback): void {
  for (const event of events) {
    try {
      callback(event);
    } catch (e) {
      log.log("callback_error", { source, signature: event.signature, kind: event.kind, error: errorMessage(e) });
    }
  }
}
