import { appendFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

type DebugEnv = Readonly<Record<string, string | undefined>>;

export type DebugLog = Readonly<{
  enabled: boolean;
  path: string;
  /** Append one JSONL record unless it repeats the scope's previous payload. */
  snapshot: (scope: string, payload: Readonly<Record<string, unknown>>) => void;
}>;

export const DEBUG_ENV_FLAG = "AMORTIZED_GROWTH_DEBUG";
export const DEBUG_ENV_LOG = "AMORTIZED_GROWTH_DEBUG_LOG";

export function createDebugLog(env: DebugEnv): DebugLog {
  const enabled = env[DEBUG_ENV_FLAG] === "1";
  const path = env[DEBUG_ENV_LOG] ?? join(tmpdir(), "amortized-growth-debug.log");
  const lastByScope = new Map<string, string>();

  const snapshot = (scope: string, payload: Readonly<Record<string, unknown>>): void => {
    if (!enabled) return;

    const serialized = JSON.stringify(payload);
    if (lastByScope.get(scope) === serialized) return;
    lastByScope.set(scope, serialized);

    appendFileSync(
      path,
      `${JSON.stringify({
        ts: new Date().toISOString(),
        scope,
        ...payload,
      })}\n`,
    );
  };

  return Object.freeze({ enabled, path, snapshot });
}

const processLog = createDebugLog(process.env);

export function debugSnapshot(scope: string, payload: Readonly<Record<string, unknown>>): void {
  processLog.snapshot(scope, payload);
}

export function describeThrown(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
