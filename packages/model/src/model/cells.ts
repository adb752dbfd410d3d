import type { CellCounts, CellKind, GrowthSnapshot } from "../types.js";

type CellBounds = Pick<GrowthSnapshot, "capacity" | "size" | "oldGenerationSize" | "migrated">;

/**
 * Classify one element slot. The first `migrated` old-generation slots are
 * settled; the rest of the old generation is still pending.
 */
export function classifyIndex(snapshot: CellBounds, index: number): CellKind {
  if (index >= snapshot.capacity) return "unallocated";
  if (index >= snapshot.size) return "free";
  if (index >= snapshot.oldGenerationSize) return "fresh";
  if (index < snapshot.migrated) return "migrated";
  return "pending";
}

function toSpan(span: number): number {
  if (!Number.isFinite(span) || span < 1) return 1;
  return Math.floor(span);
}

/** Downsample the slot range: slot `i` shows element `i * span`. */
export function sampleCells(
  snapshot: CellBounds,
  slotCount: number,
  span: number,
): readonly CellKind[] {
  const count = Number.isFinite(slotCount) ? Math.max(0, Math.floor(slotCount)) : 0;
  const step = toSpan(span);
  const out = new Array<CellKind>(count);
  for (let i = 0; i < count; i++) {
    out[i] = classifyIndex(snapshot, i * step);
  }
  return Object.freeze(out);
}

export function countCells(snapshot: CellBounds): CellCounts {
  return Object.freeze({
    fresh: snapshot.size - snapshot.oldGenerationSize,
    migrated: snapshot.migrated,
    pending: snapshot.oldGenerationSize - snapshot.migrated,
    free: snapshot.capacity - snapshot.size,
    unallocated: 0,
  });
}
