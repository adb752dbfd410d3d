/**
 * @amortized-growth/model: growable-array model with throttled migration.
 *
 * The model has no rendering or I/O dependencies; the viewer consumes
 * only `GrowthSnapshot` and `TickReport` values.
 */

export type {
  CellCounts,
  CellKind,
  GrowthModelConfig,
  GrowthPhase,
  GrowthSnapshot,
  StepResult,
  TickOutcome,
  TickReport,
} from "./types.js";

export { createGrowthModel, type GrowthModel } from "./model/growthModel.js";
export { classifyIndex, countCells, sampleCells } from "./model/cells.js";
export {
  createTickDriver,
  shouldTerminate,
  type TickDriver,
  type TickDriverOptions,
} from "./driver/tickDriver.js";
export {
  GrowthConfigError,
  validateGrowthConfig,
  type GrowthConfigErrorCode,
  type GrowthConfigInput,
  type GrowthConfigResult,
} from "./config.js";
