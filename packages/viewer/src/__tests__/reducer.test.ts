import assert from "node:assert/strict";
import test from "node:test";
import { createGrowthModel, createTickDriver } from "@amortized-growth/model";
import { createInitialState, reduceViewerState } from "../helpers/state.js";

function freshState() {
  const driver = createTickDriver(createGrowthModel({ growthFactor: 2, hardLimit: 1 }));
  return { driver, state: createInitialState({ snapshot: driver.snapshot() }) };
}

test("initial state uses defaults and a clamped viewport", () => {
  const { state } = freshState();
  assert.equal(state.tick, 0);
  assert.equal(state.lastOutcome, null);
  assert.equal(state.tickMs, 30);
  assert.equal(state.viewportCols, 120);
  assert.equal(state.viewportRows, 40);
  assert.equal(state.themeName, "nord");
  assert.equal(Object.isFrozen(state), true);

  const tiny = createInitialState({
    snapshot: state.snapshot,
    tickMs: 0,
    viewport: { cols: 10, rows: 2 },
  });
  assert.equal(tiny.tickMs, 1);
  assert.equal(tiny.viewportCols, 40);
  assert.equal(tiny.viewportRows, 16);
});

test("growth reducer tick-report updates snapshot and records the limit once", () => {
  const { driver, state } = freshState();

  const first = reduceViewerState(state, { type: "tick-report", report: driver.tick(), nowMs: 100 });
  assert.equal(first.tick, 1);
  assert.equal(first.lastOutcome, "admitted");
  assert.equal(first.snapshot.size, 1);
  assert.equal(first.limitReachedAtMs, null);
  assert.equal(first.phase, "growing");

  const reached = reduceViewerState(first, {
    type: "tick-report",
    report: driver.tick(),
    nowMs: 200,
  });
  assert.equal(reached.lastOutcome, "limit-reached");
  assert.equal(reached.limitReachedAtMs, 200);
  assert.equal(reached.phase, "limit-reached");

  const halted = reduceViewerState(reached, {
    type: "tick-report",
    report: driver.tick(),
    nowMs: 300,
  });
  assert.equal(halted.lastOutcome, "halted");
  assert.equal(halted.tick, 3);
  assert.equal(halted.limitReachedAtMs, 200);
});

test("growth reducer toggles pause and help", () => {
  const { state } = freshState();
  const paused = reduceViewerState(state, { type: "toggle-pause" });
  assert.equal(paused.paused, true);
  assert.equal(reduceViewerState(paused, { type: "toggle-pause" }).paused, false);

  const help = reduceViewerState(state, { type: "toggle-help" });
  assert.equal(help.showHelp, true);
  assert.equal(reduceViewerState(help, { type: "toggle-help" }).showHelp, false);
});

test("growth reducer cycles themes in order", () => {
  const { state } = freshState();
  const dark = reduceViewerState(state, { type: "cycle-theme" });
  const light = reduceViewerState(dark, { type: "cycle-theme" });
  const nord = reduceViewerState(light, { type: "cycle-theme" });
  assert.deepEqual([dark.themeName, light.themeName, nord.themeName], ["dark", "light", "nord"]);
});

test("growth reducer clamps tick interval and keeps identity when unchanged", () => {
  const { state } = freshState();
  assert.equal(reduceViewerState(state, { type: "set-tick-ms", tickMs: 30 }), state);
  assert.equal(reduceViewerState(state, { type: "set-tick-ms", tickMs: 90000 }).tickMs, 5000);
});

test("growth reducer applies viewport changes", () => {
  const { state } = freshState();
  const resized = reduceViewerState(state, { type: "apply-viewport", cols: 90, rows: 300 });
  assert.equal(resized.viewportCols, 90);
  assert.equal(resized.viewportRows, 200);
  assert.equal(reduceViewerState(resized, { type: "apply-viewport", cols: 90, rows: 250 }), resized);
});

test("growth reducer takes the phase from each tick report", () => {
  const driver = createTickDriver(createGrowthModel({ growthFactor: 2 }));
  let state = createInitialState({ snapshot: driver.snapshot() });
  assert.equal(state.phase, "growing");

  // tick 3 expands to capacity 4 with one of two old elements migrated
  for (let i = 0; i < 3; i++) {
    state = reduceViewerState(state, { type: "tick-report", report: driver.tick(), nowMs: i });
  }
  assert.equal(state.phase, "migrating");

  state = reduceViewerState(state, { type: "tick-report", report: driver.tick(), nowMs: 3 });
  assert.equal(state.phase, "growing");
});
