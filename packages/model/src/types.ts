/**
 * packages/model/src/types.ts: Shared types for the growth model and tick driver.
 */

/** Success carries a value; failure is a plain signal, never an exception. */
export type StepResult<T> = Readonly<{ ok: true; value: T }> | Readonly<{ ok: false }>;

export type GrowthModelConfig = Readonly<{
  /** Multiplier applied to capacity on expansion. Expected to be > 1. */
  growthFactor: number;
  /** Optional ceiling on capacity. */
  hardLimit?: number;
}>;

/** Read-only view of the model, captured once per tick for the harness. */
export type GrowthSnapshot = Readonly<{
  growthFactor: number;
  capacity: number;
  size: number;
  oldGenerationSize: number;
  migrated: number;
  hardLimit: number | null;
  resizeCount: number;
  migrationOpCount: number;
  efficiency: number;
}>;

export type GrowthPhase = "growing" | "migrating" | "limit-reached";

export type TickOutcome =
  /** `tryGrow()` succeeded on the first attempt. */
  | "admitted"
  /** Capacity expanded and the retried admission succeeded. */
  | "expanded"
  /** Admission blocked while the previous generation is still migrating. */
  | "deferred"
  /** Expansion did not free a slot and no hard limit caps capacity. */
  | "stalled"
  /** The retry after expansion failed at the hard limit. Entered once. */
  | "limit-reached"
  /** Tick after the limit was reached; nothing ran. */
  | "halted";

export type TickReport = Readonly<{
  /** 1-based index of this tick. */
  tick: number;
  outcome: TickOutcome;
  admitted: boolean;
  expanded: boolean;
  migratedUnit: boolean;
  /** Successful model mutations this tick. */
  operations: number;
  phase: GrowthPhase;
  snapshot: GrowthSnapshot;
}>;

export type CellKind = "fresh" | "migrated" | "pending" | "free" | "unallocated";

export type CellCounts = Readonly<Record<CellKind, number>>;
