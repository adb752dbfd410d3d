import assert from "node:assert/strict";
import test from "node:test";
import {
  type TickReport,
  createGrowthModel,
  createTickDriver,
} from "@amortized-growth/model";
import {
  averageEfficiency,
  createFpsState,
  createViewerStats,
  occupancy,
  recordFrame,
  recordTick,
} from "../helpers/stats.js";
import type { FpsState } from "../types.js";

function framesAt(initial: FpsState, times: readonly number[]): FpsState {
  let state = initial;
  for (const nowMs of times) state = recordFrame(state, nowMs);
  return state;
}

function every(startMs: number, endMs: number, stepMs: number): number[] {
  const times: number[] = [];
  for (let t = startMs; t <= endMs; t += stepMs) times.push(t);
  return times;
}

test("first frame only opens the measurement window", () => {
  const state = recordFrame(createFpsState(), 500);
  assert.equal(state.windowStartMs, 500);
  assert.equal(state.minWindowStartMs, 500);
  assert.equal(state.framesInWindow, 0);
  assert.equal(state.current, 0);
});

test("current fps is published after one second", () => {
  const state = framesAt(createFpsState(), [0, ...every(100, 1000, 100)]);
  assert.equal(state.current, 10);
  assert.equal(state.max, 10);
  assert.equal(state.pendingMin, 10);
  assert.equal(state.min, 0);
  assert.equal(state.framesInWindow, 0);
  assert.equal(state.windowStartMs, 1000);
});

test("minimum fps is published from the lowest window every three seconds", () => {
  const state = framesAt(createFpsState(), [
    0,
    ...every(100, 1000, 100),
    ...every(1200, 2000, 200),
    ...every(2100, 3000, 100),
  ]);
  assert.equal(state.current, 10);
  assert.equal(state.max, 10);
  assert.equal(state.min, 5);
  assert.equal(state.pendingMin, null);
  assert.equal(state.minWindowStartMs, 3000);
});

test("recordTick averages settled efficiency over live ticks", () => {
  const driver = createTickDriver(createGrowthModel({ growthFactor: 2 }));
  let stats = createViewerStats();
  // efficiencies: 1, 1, 0.5
  for (let i = 0; i < 3; i++) stats = recordTick(stats, driver.tick(), i * 100);

  assert.equal(stats.efficiencySamples, 3);
  assert.equal(averageEfficiency(stats), 2.5 / 3);
  assert.equal(stats.operationsPerAppend, 3);
});

test("halted ticks do not move the efficiency mean", () => {
  const driver = createTickDriver(createGrowthModel({ growthFactor: 2, hardLimit: 1 }));
  const reports: TickReport[] = [driver.tick(), driver.tick(), driver.tick()];
  assert.equal(reports[2]?.outcome, "halted");

  let stats = createViewerStats();
  reports.forEach((report, i) => {
    stats = recordTick(stats, report, i * 100);
  });
  assert.equal(stats.efficiencySamples, 2);
  assert.equal(averageEfficiency(stats), 1);
  assert.equal(stats.operationsPerAppend, 0);
});

test("averageEfficiency is 0 before any tick", () => {
  assert.equal(averageEfficiency(createViewerStats()), 0);
});

test("occupancy counts pending old data", () => {
  const snapshot = createTickDriver(createGrowthModel({ growthFactor: 2 })).tick().snapshot;
  assert.equal(occupancy(snapshot), 1);
  assert.equal(occupancy({ ...snapshot, capacity: 4, size: 3 }), 0.75);
});
