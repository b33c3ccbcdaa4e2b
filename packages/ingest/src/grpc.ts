import { fileURLToPath } from "node:url";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import type { StreamHandlers } from "./subscription.js";

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export function protoPath(file: string): string {
  return fileURLToPath(new URL(`../proto/${file}`, import.meta.url));
}

/** Serializers of one rpc, read from a .proto file at run time. */
export function loadMethod(file: string, service: string, method: string): protoLoader.MethodDefinition<object, object> {
  const pkg = protoLoader.loadSync(protoPath(file), LOADER_OPTIONS);
  const def = pkg[service];
  if (!def || "format" in def) throw new Error(`${file}: service ${service} not found`);
  const m = def[method];
  if (!m) throw new Error(`${file}: ${service} has no method ${method}`);
  return m;
}

/** `https://host[:port]` → tls to host:port; anything else plaintext. */
export function grpcTarget(endpoint: string): { address: string; credentials: grpc.ChannelCredentials } {
  const url = new URL(endpoint.includes("://") ? endpoint : `http://${endpoint}`);
  const tls = url.protocol === "https:";
  const port = url.port || (tls ? "443" : "80");
  return {
    address: `${url.hostname}:${port}`,
    credentials: tls ? grpc.credentials.createSsl() : grpc.credentials.createInsecure(),
  };
}

export interface GrpcReadable<M = object> {
  on(event: "data", listener: (message: M) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "end", listener: () => void): unknown;
  cancel(): void;
}

/**
 * Routes a call's events into `handlers`. Messages `parse` maps to undefined are
 * dropped; an error after cancel() is reported like any other end.
 */
export function attachCall<M, T>(
  call: GrpcReadable<M>,
  handlers: StreamHandlers<T>,
  parse: (message: M) => T | undefined,
): { close(): void } {
  call.on("data", (message) => {
    const parsed = parse(message);
    if (parsed !== undefined) handlers.onMessage(parsed);
  });
  call.on("error", (error) => handlers.onClose(error));
  call.on("end", () => handlers.onClose());
  return { close: () => call.cancel() };
}
