#!/usr/bin/env -S node --import tsx
import { exit, stdout } from "node:process";
import {
  type TickReport,
  createGrowthModel,
  createTickDriver,
  shouldTerminate,
} from "@amortized-growth/model";
import { createNodeApp } from "@rezi-ui/node";
import { openFrameCapture, tickWithCapture } from "./helpers/capture.js";
import { type CliOptions, USAGE, parseCliArgs } from "./helpers/config.js";
import { debugSnapshot, describeThrown } from "./helpers/debug.js";
import { formatHeadlessSummary, runHeadless } from "./helpers/headless.js";
import { BOUND_KEYS, resolveGrowthCommand } from "./helpers/keybindings.js";
import { createInitialState, reduceViewerState } from "./helpers/state.js";
import { stepTickInterval } from "./helpers/tickTiming.js";
import { renderGrowthView } from "./screens/growth-view.js";
import { themeSpec } from "./theme.js";
import type { ViewerAction } from "./types.js";

function loadOptions(): CliOptions | null {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`amortized-growth: ${describeThrown(error)}`);
    stdout.write(`\n${USAGE}`);
    return null;
  }
}

const options = loadOptions();
if (options === null) process.exit(1);
const graceMs = options.graceMs;

if (options.help) {
  stdout.write(USAGE);
  exit(0);
}

const driver = createTickDriver(
  createGrowthModel(
    options.hardLimit === null
      ? { growthFactor: options.growthFactor }
      : { growthFactor: options.growthFactor, hardLimit: options.hardLimit },
  ),
);
const opened = options.capturePath === null ? null : openFrameCapture(options.capturePath);
if (opened !== null && !opened.ok) {
  console.error(`amortized-growth: cannot open capture file: ${describeThrown(opened.error)}`);
  process.exit(1);
}
const capture = opened === null ? null : opened.value;

debugSnapshot("runtime.bootstrap", {
  argv: process.argv.slice(2),
  pid: process.pid,
  node: process.version,
  growthFactor: options.growthFactor,
  hardLimit: options.hardLimit,
  tickMs: options.tickMs,
  headless: options.headless,
  capture: options.capturePath,
});

if (options.headless) {
  try {
    const summary = runHeadless(driver, {
      maxTicks: options.maxTicks,
      ...(capture === null ? {} : { sink: capture }),
    });
    stdout.write(`${formatHeadlessSummary(summary)}\n`);
  } catch (error) {
    console.error(`amortized-growth: headless run failed: ${describeThrown(error)}`);
    process.exitCode = 1;
  } finally {
    capture?.close();
  }
  exit(process.exitCode ?? 0);
}

const initialState = createInitialState({
  snapshot: driver.snapshot(),
  phase: driver.phase(),
  tickMs: options.tickMs,
  viewport: {
    cols: typeof process.stdout.columns === "number" ? process.stdout.columns : 120,
    rows: typeof process.stdout.rows === "number" ? process.stdout.rows : 40,
  },
});

const app = createNodeApp({
  initialState,
  config: { fpsCap: 30, executionMode: "inline" },
  theme: themeSpec(initialState.themeName).theme,
});

let stopping = false;
let paused = false;
let tickMs = initialState.tickMs;
let themeName = initialState.themeName;
let tickTimer: ReturnType<typeof setInterval> | null = null;

function dispatch(action: ViewerAction): void {
  let nextThemeName = themeName;
  app.update((previous) => {
    const next = reduceViewerState(previous, action);
    nextThemeName = next.themeName;
    return next;
  });
  if (nextThemeName !== themeName) {
    themeName = nextThemeName;
    app.setTheme(themeSpec(nextThemeName).theme);
  }
}

function logReport(report: TickReport): void {
  if (report.expanded) {
    debugSnapshot("model.expand", {
      tick: report.tick,
      capacity: report.snapshot.capacity,
      oldGenerationSize: report.snapshot.oldGenerationSize,
      resizeCount: report.snapshot.resizeCount,
    });
  }
  if (report.outcome === "limit-reached") {
    debugSnapshot("model.limit-reached", {
      tick: report.tick,
      capacity: report.snapshot.capacity,
      size: report.snapshot.size,
    });
  }
}

function advance(): void {
  const result = tickWithCapture(driver, capture);
  if (!result.ok) {
    console.error(`amortized-growth: tick failed: ${describeThrown(result.error)}`);
    void shutdown(1);
    return;
  }
  const report = result.value;
  logReport(report);
  dispatch({ type: "tick-report", report, nowMs: Date.now() });
}

function onTimer(): void {
  if (shouldTerminate(driver, Date.now(), graceMs)) {
    void shutdown(0);
    return;
  }
  if (paused) return;
  advance();
}

function stopTickTimer(): void {
  if (tickTimer !== null) {
    clearInterval(tickTimer);
    tickTimer = null;
  }
}

function startTickTimer(): void {
  stopTickTimer();
  tickTimer = setInterval(onTimer, tickMs);
}

async function shutdown(exitCode = 0): Promise<void> {
  if (stopping) return;
  stopping = true;
  stopTickTimer();
  capture?.close();
  debugSnapshot("runtime.shutdown", {
    exitCode,
    ticks: driver.ticks(),
    frames: capture?.frames() ?? 0,
  });

  try {
    await app.stop();
  } catch (error) {
    debugSnapshot("runtime.shutdown", { stopError: describeThrown(error) });
  }

  app.dispose();
  exit(exitCode);
}

function applyCommand(command: ReturnType<typeof resolveGrowthCommand>): void {
  if (!command) return;
  debugSnapshot("runtime.command", { command, tick: driver.ticks() });

  if (command === "quit") {
    void shutdown(0);
    return;
  }

  if (command === "toggle-pause") {
    paused = !paused;
    dispatch({ type: "toggle-pause" });
    return;
  }

  if (command === "step") {
    if (paused) advance();
    return;
  }

  if (command === "faster" || command === "slower") {
    tickMs = stepTickInterval(tickMs, command);
    dispatch({ type: "set-tick-ms", tickMs });
    startTickTimer();
    return;
  }

  if (command === "cycle-theme") {
    dispatch({ type: "cycle-theme" });
    return;
  }

  dispatch({ type: "toggle-help" });
}

app.view((state) =>
  renderGrowthView(state, {
    onTogglePause: () => applyCommand("toggle-pause"),
    onStep: () => applyCommand("step"),
    onToggleHelp: () => applyCommand("toggle-help"),
  }),
);

app.keys(
  Object.fromEntries(
    BOUND_KEYS.map((key) => [key, () => applyCommand(resolveGrowthCommand(key))] as const),
  ),
);

app.onEvent((event) => {
  if (event.kind === "engine") {
    const engineEvent = event.event;
    if (engineEvent.kind === "resize") {
      debugSnapshot("runtime.viewport", { cols: engineEvent.cols, rows: engineEvent.rows });
      dispatch({ type: "apply-viewport", cols: engineEvent.cols, rows: engineEvent.rows });
    }
    return;
  }

  if (event.kind !== "fatal") return;
  console.error(`fatal: ${event.code}: ${event.detail}`);
  void shutdown(1);
});

const onSignal = () => {
  void shutdown(0);
};

process.once("SIGINT", onSignal);
process.once("SIGTERM", onSignal);

startTickTimer();

try {
  await app.start();
} catch (error) {
  console.error(`Failed to start amortized-growth: ${describeThrown(error)}`);
  await shutdown(1);
} finally {
  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);
}
