const MIN_TICK_MS = 1;
const MAX_TICK_MS = 5000;
const DEFAULT_TICK_MS = 30;

/** Non-finite input falls back to the default; everything else is clamped. */
export function computeTickInterval(tickMs: number): number {
  if (!Number.isFinite(tickMs)) return DEFAULT_TICK_MS;
  return Math.min(MAX_TICK_MS, Math.max(MIN_TICK_MS, Math.floor(tickMs)));
}

/** `faster` halves the interval, `slower` doubles it, both within bounds. */
export function stepTickInterval(tickMs: number, direction: "faster" | "slower"): number {
  const current = computeTickInterval(tickMs);
  const next = direction === "faster" ? Math.floor(current / 2) : current * 2;
  return Math.min(MAX_TICK_MS, Math.max(MIN_TICK_MS, next));
}

export { DEFAULT_TICK_MS, MAX_TICK_MS, MIN_TICK_MS };
