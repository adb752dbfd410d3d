import type { GrowthSnapshot, TickReport } from "@amortized-growth/model";
import type { FpsState, ViewerStats } from "../types.js";

const FPS_WINDOW_MS = 1000;
const MIN_PUBLISH_MS = 3000;

export function createFpsState(): FpsState {
  return Object.freeze({
    windowStartMs: null,
    framesInWindow: 0,
    current: 0,
    max: 0,
    min: 0,
    pendingMin: null,
    minWindowStartMs: null,
  });
}

/**
 * Count one frame. `current` is published at the end of every window of at
 * least one second; `min` is published from the lowest window every three.
 */
export function recordFrame(previous: FpsState, nowMs: number): FpsState {
  if (!Number.isFinite(nowMs)) return previous;
  if (previous.windowStartMs === null || previous.minWindowStartMs === null) {
    return Object.freeze({ ...previous, windowStartMs: nowMs, minWindowStartMs: nowMs });
  }

  const framesInWindow = previous.framesInWindow + 1;
  const elapsedMs = nowMs - previous.windowStartMs;
  if (elapsedMs < FPS_WINDOW_MS) {
    return Object.freeze({ ...previous, framesInWindow });
  }

  const current = framesInWindow / (elapsedMs / 1000);
  const max = Math.max(previous.max, current);
  const pendingMin = previous.pendingMin === null ? current : Math.min(previous.pendingMin, current);

  if (nowMs - previous.minWindowStartMs >= MIN_PUBLISH_MS) {
    return Object.freeze({
      windowStartMs: nowMs,
      framesInWindow: 0,
      current,
      max,
      min: pendingMin,
      pendingMin: null,
      minWindowStartMs: nowMs,
    });
  }

  return Object.freeze({
    ...previous,
    windowStartMs: nowMs,
    framesInWindow: 0,
    current,
    max,
    pendingMin,
  });
}

export function createViewerStats(): ViewerStats {
  return Object.freeze({
    fps: createFpsState(),
    efficiencySum: 0,
    efficiencySamples: 0,
    operationsPerAppend: 0,
  });
}

export function recordTick(previous: ViewerStats, report: TickReport, nowMs: number): ViewerStats {
  const fps = recordFrame(previous.fps, nowMs);
  // A halted model no longer changes; keep the running mean over live ticks only.
  if (report.outcome === "halted") {
    return Object.freeze({ ...previous, fps, operationsPerAppend: 0 });
  }
  return Object.freeze({
    fps,
    efficiencySum: previous.efficiencySum + report.snapshot.efficiency,
    efficiencySamples: previous.efficiencySamples + 1,
    operationsPerAppend: report.operations,
  });
}

export function averageEfficiency(stats: ViewerStats): number {
  if (stats.efficiencySamples === 0) return 0;
  return stats.efficiencySum / stats.efficiencySamples;
}

/** Raw fill, including old data that has not migrated yet. */
export function occupancy(snapshot: GrowthSnapshot): number {
  if (snapshot.capacity <= 0) return 0;
  return snapshot.size / snapshot.capacity;
}
