import { closeSync, openSync, writeSync } from "node:fs";
import type { TickDriver, TickReport } from "@amortized-growth/model";

export type CaptureRecord = Readonly<
  {
    tick: number;
    outcome: TickReport["outcome"];
    operations: number;
    phase: TickReport["phase"];
  } & TickReport["snapshot"]
>;

/** Single-owner sink for per-tick snapshots. `close()` is safe to call more than once. */
export type FrameSink = Readonly<{
  /** Returns false once the sink is closed. */
  write: (report: TickReport) => boolean;
  close: () => void;
  isClosed: () => boolean;
  frames: () => number;
}>;

export type CaptureResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: unknown }>;

export function toCaptureRecord(report: TickReport): CaptureRecord {
  return {
    tick: report.tick,
    outcome: report.outcome,
    operations: report.operations,
    phase: report.phase,
    ...report.snapshot,
  };
}

/** NDJSON capture: one snapshot per line, written synchronously. */
export function createFrameCapture(path: string): FrameSink {
  let fd: number | null = openSync(path, "w");
  let frames = 0;

  return Object.freeze({
    write: (report: TickReport): boolean => {
      if (fd === null) return false;
      writeSync(fd, `${JSON.stringify(toCaptureRecord(report))}\n`);
      frames += 1;
      return true;
    },
    close: (): void => {
      if (fd === null) return;
      const open = fd;
      fd = null;
      closeSync(open);
    },
    isClosed: () => fd === null,
    frames: () => frames,
  });
}

export function openFrameCapture(path: string): CaptureResult<FrameSink> {
  try {
    return { ok: true, value: createFrameCapture(path) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Advance the driver once and record the report. Halted ticks are not
 * written. A failing sink is reported, not thrown, so the caller can shut down.
 */
export function tickWithCapture(
  driver: TickDriver,
  sink: FrameSink | null,
): CaptureResult<TickReport> {
  try {
    const report = driver.tick();
    if (report.outcome !== "halted") sink?.write(report);
    return { ok: true, value: report };
  } catch (error) {
    return { ok: false, error };
  }
}
