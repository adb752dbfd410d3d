import type { GrowthSnapshot, TickDriver, TickOutcome } from "@amortized-growth/model";
import type { FrameSink } from "./capture.js";
import { debugSnapshot } from "./debug.js";
import { formatPercent } from "./formatters.js";

export type HeadlessOptions = Readonly<{
  maxTicks: number;
  sink?: FrameSink;
}>;

export type HeadlessSummary = Readonly<{
  ticks: number;
  finalOutcome: TickOutcome | null;
  snapshot: GrowthSnapshot;
  limitReached: boolean;
}>;

/** Tick until the limit is reached or `maxTicks` have run. */
export function runHeadless(driver: TickDriver, opts: HeadlessOptions): HeadlessSummary {
  const maxTicks = Number.isFinite(opts.maxTicks) ? Math.max(0, Math.floor(opts.maxTicks)) : 0;
  let finalOutcome: TickOutcome | null = null;
  let ticks = 0;

  while (ticks < maxTicks) {
    const report = driver.tick();
    ticks += 1;
    finalOutcome = report.outcome;
    opts.sink?.write(report);

    if (report.expanded) {
      debugSnapshot("model.expand", {
        tick: report.tick,
        capacity: report.snapshot.capacity,
        oldGenerationSize: report.snapshot.oldGenerationSize,
      });
    }
    if (report.outcome === "limit-reached") {
      debugSnapshot("model.limit-reached", { tick: report.tick, size: report.snapshot.size });
      break;
    }
  }

  return Object.freeze({
    ticks,
    finalOutcome,
    snapshot: driver.snapshot(),
    limitReached: driver.limitReachedAtMs() !== null,
  });
}

export function formatHeadlessSummary(summary: HeadlessSummary): string {
  const snap = summary.snapshot;
  return [
    `ticks: ${String(summary.ticks)}`,
    `outcome: ${summary.finalOutcome ?? "none"}`,
    `capacity: ${String(snap.capacity)}`,
    `size: ${String(snap.size)}`,
    `resizes: ${String(snap.resizeCount)}`,
    `migration ops: ${String(snap.migrationOpCount)}`,
    `settled efficiency: ${formatPercent(snap.efficiency)}`,
    `limit reached: ${summary.limitReached ? "yes" : "no"}`,
  ].join("\n");
}
