import type { GrowthModelConfig, GrowthSnapshot, StepResult } from "../types.js";

/**
 * Synthetic growable array: tracks capacity, admitted elements and the
 * old generation still waiting to be migrated after the last expansion.
 *
 * Invariants after every operation:
 * - `size <= capacity`
 * - `migrated <= oldGenerationSize <= size`
 * - `capacity <= hardLimit` when a limit is set
 * - `capacity` never decreases
 */
export type GrowthModel = Readonly<{
  /** Admit one element. Fails without mutation when capacity is exhausted. */
  tryGrow: () => StepResult<number>;
  /**
   * Start a new generation and enlarge capacity by the growth factor.
   * Only meaningful after `tryGrow()` failed.
   */
  expand: () => void;
  /** Move one old-generation element into settled capacity. */
  migrateOne: () => StepResult<number>;
  /** Settled occupancy: fresh elements plus migrated old ones, over capacity. */
  efficiency: () => number;
  isMigrationComplete: () => boolean;
  snapshot: () => GrowthSnapshot;
}>;

type MutableGrowthState = {
  readonly growthFactor: number;
  readonly hardLimit: number | null;
  capacity: number;
  size: number;
  oldGenerationSize: number;
  migrated: number;
  resizeCount: number;
  migrationOpCount: number;
};

const FAILED: StepResult<never> = Object.freeze({ ok: false });

function computeEfficiency(state: MutableGrowthState): number {
  return (state.size - state.oldGenerationSize + state.migrated) / state.capacity;
}

export function createGrowthModel(config: GrowthModelConfig): GrowthModel {
  const state: MutableGrowthState = {
    growthFactor: config.growthFactor,
    hardLimit: config.hardLimit ?? null,
    capacity: 1,
    size: 0,
    oldGenerationSize: 0,
    migrated: 0,
    resizeCount: 0,
    migrationOpCount: 0,
  };

  const tryGrow = (): StepResult<number> => {
    const nextSize = state.size + 1;
    if (nextSize > state.capacity) return FAILED;
    state.size = nextSize;
    return { ok: true, value: nextSize };
  };

  const expand = (): void => {
    state.oldGenerationSize = state.size;
    let nextCapacity = Math.ceil(state.capacity * state.growthFactor);
    if (state.hardLimit !== null && nextCapacity > state.hardLimit) {
      nextCapacity = state.hardLimit;
    }
    // A factor below 1 must not shrink below what is already held.
    state.capacity = Math.max(state.capacity, nextCapacity);
    state.migrated = 0;
    state.resizeCount += 1;
  };

  const migrateOne = (): StepResult<number> => {
    if (state.migrated >= state.oldGenerationSize) return FAILED;
    state.migrated += 1;
    state.migrationOpCount += 1;
    return { ok: true, value: state.migrated };
  };

  return Object.freeze({
    tryGrow,
    expand,
    migrateOne,
    efficiency: () => computeEfficiency(state),
    isMigrationComplete: () => state.migrated === state.oldGenerationSize,
    snapshot: (): GrowthSnapshot =>
      Object.freeze({
        growthFactor: state.growthFactor,
        capacity: state.capacity,
        size: state.size,
        oldGenerationSize: state.oldGenerationSize,
        migrated: state.migrated,
        hardLimit: state.hardLimit,
        resizeCount: state.resizeCount,
        migrationOpCount: state.migrationOpCount,
        efficiency: computeEfficiency(state),
      }),
  });
}
