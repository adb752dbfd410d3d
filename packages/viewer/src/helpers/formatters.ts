import type { CellKind, GrowthPhase, TickOutcome } from "@amortized-growth/model";
import type { BadgeVariant } from "@rezi-ui/core";

export function formatPercent(ratio: number): string {
  if (!Number.isFinite(ratio)) return "0.00%";
  return `${(ratio * 100).toFixed(2)}%`;
}

export function formatRate(value: number): string {
  if (!Number.isFinite(value)) return "0.00";
  return value.toFixed(2);
}

export function formatCount(value: number): string {
  return Math.trunc(value).toLocaleString("en-US");
}

export function phaseBadge(phase: GrowthPhase): Readonly<{ text: string; variant: BadgeVariant }> {
  if (phase === "growing") return { text: "Growing", variant: "success" };
  if (phase === "migrating") return { text: "Migrating", variant: "info" };
  return { text: "Limit reached", variant: "warning" };
}

export function outcomeLabel(outcome: TickOutcome | null): string {
  if (outcome === null) return "Idle";
  if (outcome === "admitted") return "Admitted";
  if (outcome === "expanded") return "Expanded";
  if (outcome === "deferred") return "Expansion deferred";
  if (outcome === "stalled") return "Stalled";
  if (outcome === "limit-reached") return "Limit reached";
  return "Halted";
}

export function cellGlyph(kind: CellKind): string {
  if (kind === "fresh") return "█";
  if (kind === "migrated") return "▓";
  if (kind === "pending") return "▒";
  if (kind === "free") return "·";
  return " ";
}

export function cellLabel(kind: CellKind): string {
  if (kind === "fresh") return "New";
  if (kind === "migrated") return "Migrated";
  if (kind === "pending") return "Old, pending";
  if (kind === "free") return "Free";
  return "Unallocated";
}
