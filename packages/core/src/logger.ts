import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

type Payload = unknown;

export interface ScopedLogger {
  log(event: string, payload?: Payload): void;
}

let fileReady: Promise<string | undefined> | undefined;

function logFile(): Promise<string | undefined> {
  if (!fileReady) {
    const raw = process.env.LOG_FILE?.trim();
    if (!raw) {
      fileReady = Promise.resolve(undefined);
    } else {
      const resolved = path.resolve(raw);
      fileReady = mkdir(path.dirname(resolved), { recursive: true }).then(
        () => resolved,
        () => undefined,
      );
    }
  }
  return fileReady;
}

function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function serialize(rec: Record<string, unknown>): string {
  try {
    return JSON.stringify(rec, replacer);
  } catch {
    return JSON.stringify({ t: rec.t, event: rec.event, warn: "logger_serialize_failed" });
  }
}

async function write(rec: Record<string, unknown>): Promise<void> {
  const file = await logFile();
  if (!file) return;
  try {
    await appendFile(file, serialize(rec) + "\n");
  } catch {
    // console stays the source of truth when the file sink is unavailable
  }
}

function quiet(): boolean {
  const v = String(process.env.LOG_QUIET ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

function emit(event: string, payload: Payload, scope?: string): void {
  const t = new Date().toISOString();
  const label = scope ? `${scope}_${event}` : event;
  if (!quiet()) {
    if (payload === undefined) {
      // eslint-disable-next-line no-console
      console.log(`${t} ${label}`);
    } else {
      // eslint-disable-next-line no-console
      console.log(`${t} ${label}`, payload);
    }
  }
  const rec: Record<string, unknown> = scope ? { t, scope, event } : { t, event };
  if (payload !== undefined) rec.data = payload;
  void write(rec);
}

export const logger = {
  log(event: string, payload?: Payload): void {
    emit(event, payload);
  },
  scope(scope: string): ScopedLogger {
    return {
      log(event: string, payload?: Payload): void {
        emit(event, payload, scope);
      },
    };
  },
};
