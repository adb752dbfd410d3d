import type { GrowthPhase, GrowthSnapshot, TickOutcome, TickReport } from "@amortized-growth/model";

export type ThemeName = "nord" | "dark" | "light";

export type FpsState = Readonly<{
  windowStartMs: number | null;
  framesInWindow: number;
  current: number;
  max: number;
  /** Last published minimum; refreshed every min-window. */
  min: number;
  /** Lowest window value seen since the last publish. */
  pendingMin: number | null;
  minWindowStartMs: number | null;
}>;

export type ViewerStats = Readonly<{
  fps: FpsState;
  efficiencySum: number;
  efficiencySamples: number;
  operationsPerAppend: number;
}>;

export type ViewerState = Readonly<{
  snapshot: GrowthSnapshot;
  tick: number;
  lastOutcome: TickOutcome | null;
  phase: GrowthPhase;
  limitReachedAtMs: number | null;
  stats: ViewerStats;
  paused: boolean;
  tickMs: number;
  viewportCols: number;
  viewportRows: number;
  showHelp: boolean;
  themeName: ThemeName;
}>;

export type ViewerAction =
  | Readonly<{ type: "tick-report"; report: TickReport; nowMs: number }>
  | Readonly<{ type: "toggle-pause" }>
  | Readonly<{ type: "toggle-help" }>
  | Readonly<{ type: "cycle-theme" }>
  | Readonly<{ type: "set-tick-ms"; tickMs: number }>
  | Readonly<{ type: "apply-viewport"; cols: number; rows: number }>;
