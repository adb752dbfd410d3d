import type { GrowthModelConfig } from "./types.js";

export type GrowthConfigErrorCode = "GROWTH_FACTOR_INVALID" | "HARD_LIMIT_INVALID";

/**
 * Raised by callers that build a model from untrusted input.
 * The model itself never validates its configuration.
 */
export class GrowthConfigError extends Error {
  override readonly name = "GrowthConfigError";
  readonly code: GrowthConfigErrorCode;

  constructor(code: GrowthConfigErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GrowthConfigError);
    }
  }
}

export type GrowthConfigInput = Readonly<{
  growthFactor: number;
  hardLimit?: number | null;
}>;

export type GrowthConfigResult =
  | Readonly<{ ok: true; value: GrowthModelConfig }>
  | Readonly<{ ok: false; error: GrowthConfigError }>;

export function validateGrowthConfig(input: GrowthConfigInput): GrowthConfigResult {
  const { growthFactor, hardLimit } = input;
  if (typeof growthFactor !== "number" || !Number.isFinite(growthFactor) || growthFactor <= 1) {
    return {
      ok: false,
      error: new GrowthConfigError(
        "GROWTH_FACTOR_INVALID",
        `growth factor must be a finite number greater than 1 (got ${String(growthFactor)})`,
      ),
    };
  }

  if (hardLimit === undefined || hardLimit === null) {
    return { ok: true, value: Object.freeze({ growthFactor }) };
  }

  if (!Number.isInteger(hardLimit) || hardLimit < 1) {
    return {
      ok: false,
      error: new GrowthConfigError(
        "HARD_LIMIT_INVALID",
        `hard limit must be an integer >= 1 (got ${String(hardLimit)})`,
      ),
    };
  }

  return { ok: true, value: Object.freeze({ growthFactor, hardLimit }) };
}
