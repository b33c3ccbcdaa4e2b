const INVOKE = /^Program (\S+) invoke \[\d+\]$/;
const EXIT = /^Program (\S+) (success|failed)/;
const DATA_PREFIX = "Program data: ";

export interface ProgramData {
  readonly programId: string;
  readonly data: Buffer;
}

/**
 * Pulls `Program data:` payloads out of transaction logs, attributing each to the
 * program executing when it was logged.
 */
export function extractProgramData(logs: readonly string[]): ProgramData[] {
  const stack: string[] = [];
  const out: ProgramData[] = [];
  for (const line of logs) {
    const invoke = INVOKE.exec(line);
    if (invoke) {
      stack.push(invoke[1]);
      continue;
    }
    if (line.startsWith(DATA_PREFIX)) {
      const programId = stack.at(-1);
      if (programId) out.push({ programId, data: Buffer.from(line.slice(DATA_PREFIX.length).trim(), "base64") });
      continue;
    }
    const exit = EXIT.exec(line);
    if (exit && stack.at(-1) === exit[1]) stack.pop();
  }
  return out;
}
