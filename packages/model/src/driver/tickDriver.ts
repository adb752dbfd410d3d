import type { GrowthModel } from "../model/growthModel.js";
import type { GrowthPhase, GrowthSnapshot, TickOutcome, TickReport } from "../types.js";

export type TickDriverOptions = Readonly<{
  /** Source of the limit-reached timestamp. Defaults to `Date.now`. */
  clock?: () => number;
}>;

export type TickDriver = Readonly<{
  /** Run one tick of the growth policy and report what happened. */
  tick: () => TickReport;
  phase: () => GrowthPhase;
  ticks: () => number;
  limitReachedAtMs: () => number | null;
  snapshot: () => GrowthSnapshot;
}>;

type GrowthStep = Readonly<{
  outcome: Exclude<TickOutcome, "halted">;
  admitted: boolean;
  expanded: boolean;
}>;

function runGrowthStep(model: GrowthModel): GrowthStep {
  if (model.tryGrow().ok) {
    return { outcome: "admitted", admitted: true, expanded: false };
  }

  // Expansion waits until the previous generation has fully migrated.
  if (!model.isMigrationComplete()) {
    return { outcome: "deferred", admitted: false, expanded: false };
  }

  model.expand();
  if (model.tryGrow().ok) {
    return { outcome: "expanded", admitted: true, expanded: true };
  }

  const after = model.snapshot();
  if (after.hardLimit !== null && after.capacity === after.hardLimit) {
    return { outcome: "limit-reached", admitted: false, expanded: true };
  }
  return { outcome: "stalled", admitted: false, expanded: true };
}

function operationsFor(step: GrowthStep, migratedUnit: boolean): number {
  let operations = 0;
  if (step.expanded && step.admitted) operations += 2;
  else if (step.admitted) operations += 1;
  if (migratedUnit) operations += 1;
  return operations;
}

export function createTickDriver(model: GrowthModel, opts: TickDriverOptions = {}): TickDriver {
  const clock = opts.clock ?? Date.now;
  let tickCount = 0;
  let limitReachedAt: number | null = null;

  const phase = (): GrowthPhase => {
    if (limitReachedAt !== null) return "limit-reached";
    return model.isMigrationComplete() ? "growing" : "migrating";
  };

  const tick = (): TickReport => {
    tickCount += 1;

    if (limitReachedAt !== null) {
      return Object.freeze({
        tick: tickCount,
        outcome: "halted",
        admitted: false,
        expanded: false,
        migratedUnit: false,
        operations: 0,
        phase: "limit-reached",
        snapshot: model.snapshot(),
      });
    }

    const step = runGrowthStep(model);
    if (step.outcome === "limit-reached") {
      limitReachedAt = clock();
    }

    // Migration is throttled to one unit per tick, whatever growth did.
    const migratedUnit = model.migrateOne().ok;

    return Object.freeze({
      tick: tickCount,
      outcome: step.outcome,
      admitted: step.admitted,
      expanded: step.expanded,
      migratedUnit,
      operations: operationsFor(step, migratedUnit),
      phase: phase(),
      snapshot: model.snapshot(),
    });
  };

  return Object.freeze({
    tick,
    phase,
    ticks: () => tickCount,
    limitReachedAtMs: () => limitReachedAt,
    snapshot: () => model.snapshot(),
  });
}

/** True once the grace period after reaching the limit has elapsed. */
export function shouldTerminate(driver: TickDriver, nowMs: number, graceMs: number): boolean {
  const reachedAt = driver.limitReachedAtMs();
  if (reachedAt === null) return false;
  return nowMs - reachedAt >= Math.max(0, graceMs);
}
