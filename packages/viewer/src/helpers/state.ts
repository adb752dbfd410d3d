import type { GrowthPhase, GrowthSnapshot } from "@amortized-growth/model";
import { cycleTheme } from "../theme.js";
import type { ViewerAction, ViewerState } from "../types.js";
import { createViewerStats, recordTick } from "./stats.js";
import { DEFAULT_TICK_MS, computeTickInterval } from "./tickTiming.js";

type Viewport = Readonly<{
  cols: number;
  rows: number;
}>;

export type InitialStateOptions = Readonly<{
  snapshot: GrowthSnapshot;
  phase?: GrowthPhase;
  tickMs?: number;
  viewport?: Viewport;
}>;

const DEFAULT_VIEWPORT: Viewport = Object.freeze({ cols: 120, rows: 40 });

function fitDimension(value: number, fallback: number, min: number, max: number): number {
  const whole = Number.isInteger(value) && value > 0 ? value : fallback;
  return Math.min(max, Math.max(min, whole));
}

/** Smallest layout that still fits the grid beside the statistics panel. */
function fitViewport(viewport: Viewport): Readonly<{ viewportCols: number; viewportRows: number }> {
  return Object.freeze({
    viewportCols: fitDimension(viewport.cols, DEFAULT_VIEWPORT.cols, 40, 500),
    viewportRows: fitDimension(viewport.rows, DEFAULT_VIEWPORT.rows, 16, 200),
  });
}

export function createInitialState(opts: InitialStateOptions): ViewerState {
  const layout = fitViewport(opts.viewport ?? DEFAULT_VIEWPORT);
  return Object.freeze({
    snapshot: opts.snapshot,
    tick: 0,
    lastOutcome: null,
    phase: opts.phase ?? "growing",
    limitReachedAtMs: null,
    stats: createViewerStats(),
    paused: false,
    tickMs: computeTickInterval(opts.tickMs ?? DEFAULT_TICK_MS),
    viewportCols: layout.viewportCols,
    viewportRows: layout.viewportRows,
    showHelp: false,
    themeName: "nord",
  });
}

function applyViewport(previous: ViewerState, cols: number, rows: number): ViewerState {
  const layout = fitViewport({ cols, rows });
  if (
    previous.viewportCols === layout.viewportCols &&
    previous.viewportRows === layout.viewportRows
  ) {
    return previous;
  }

  return Object.freeze({
    ...previous,
    viewportCols: layout.viewportCols,
    viewportRows: layout.viewportRows,
  });
}

export function reduceViewerState(previous: ViewerState, action: ViewerAction): ViewerState {
  if (action.type === "tick-report") {
    const { report, nowMs } = action;
    const limitReachedAtMs =
      previous.limitReachedAtMs ?? (report.outcome === "limit-reached" ? nowMs : null);
    return Object.freeze({
      ...previous,
      snapshot: report.snapshot,
      tick: report.tick,
      lastOutcome: report.outcome,
      phase: report.phase,
      limitReachedAtMs,
      stats: recordTick(previous.stats, report, nowMs),
    });
  }

  if (action.type === "toggle-pause") {
    return Object.freeze({ ...previous, paused: !previous.paused });
  }

  if (action.type === "toggle-help") {
    return Object.freeze({ ...previous, showHelp: !previous.showHelp });
  }

  if (action.type === "cycle-theme") {
    return Object.freeze({ ...previous, themeName: cycleTheme(previous.themeName) });
  }

  if (action.type === "set-tick-ms") {
    const tickMs = computeTickInterval(action.tickMs);
    if (tickMs === previous.tickMs) return previous;
    return Object.freeze({ ...previous, tickMs });
  }

  if (action.type === "apply-viewport") {
    return applyViewport(previous, action.cols, action.rows);
  }

  return previous;
}
