import { type CellKind, type GrowthSnapshot, sampleCells } from "@amortized-growth/model";
import { type RichTextSpan, type TextStyle, type VNode, ui } from "@rezi-ui/core";
import {
  cellGlyph,
  cellLabel,
  formatCount,
  formatPercent,
  formatRate,
  outcomeLabel,
  phaseBadge,
} from "../helpers/formatters.js";
import { averageEfficiency, occupancy } from "../helpers/stats.js";
import { PRODUCT_NAME, PRODUCT_TAGLINE, themeSpec } from "../theme.js";
import type { ViewerState } from "../types.js";

type ScreenHandlers = Readonly<{
  onTogglePause: () => void;
  onStep: () => void;
  onToggleHelp: () => void;
}>;

export type GridLayout = Readonly<{
  cols: number;
  rows: number;
  /** Elements represented by one glyph. */
  span: number;
}>;

const SIDE_PANEL_WIDTH = 40;
const LEGEND_ORDER: readonly CellKind[] = Object.freeze([
  "fresh",
  "migrated",
  "pending",
  "free",
]);

export type CellPalette = Readonly<Record<CellKind, TextStyle>>;

function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Fit the grid beside the statistics panel. The scale is the hard limit when
 * one is set, so the allocated region visibly grows toward it.
 */
export function resolveGridLayout(
  snapshot: GrowthSnapshot,
  viewportCols: number,
  viewportRows: number,
): GridLayout {
  const cols = clamp(viewportCols - SIDE_PANEL_WIDTH - 8, 8, 160);
  const rows = clamp(viewportRows - 12, 4, 60);
  const scale = snapshot.hardLimit ?? snapshot.capacity;
  const span = Math.max(1, Math.ceil(scale / (cols * rows)));
  return Object.freeze({ cols, rows, span });
}

/** Sampled cell kinds, one array per grid row. */
export function sampleGridRows(
  snapshot: GrowthSnapshot,
  layout: GridLayout,
): readonly (readonly CellKind[])[] {
  const cells = sampleCells(snapshot, layout.cols * layout.rows, layout.span);
  const rows: (readonly CellKind[])[] = [];
  for (let row = 0; row < layout.rows; row++) {
    rows.push(cells.slice(row * layout.cols, (row + 1) * layout.cols));
  }
  return Object.freeze(rows);
}

/** Merge runs of equal kinds into one styled span each. */
export function gridRowSpans(
  cells: readonly CellKind[],
  palette: CellPalette,
): readonly RichTextSpan[] {
  const spans: RichTextSpan[] = [];
  let runKind: CellKind | null = null;
  let runText = "";
  for (const kind of cells) {
    if (kind !== runKind && runKind !== null) {
      spans.push({ text: runText, style: palette[runKind] });
      runText = "";
    }
    runKind = kind;
    runText += cellGlyph(kind);
  }
  if (runKind !== null) spans.push({ text: runText, style: palette[runKind] });
  return spans;
}

function renderGrid(snapshot: GrowthSnapshot, layout: GridLayout, palette: CellPalette): VNode {
  const rows = sampleGridRows(snapshot, layout).map((cells, row) =>
    ui.richText(gridRowSpans(cells, palette), { key: `grid-row-${String(row)}` }),
  );
  return ui.column({ key: "grid-rows", gap: 0 }, rows);
}

function statLine(label: string, value: string): VNode {
  return ui.text(`${label}: ${value}`, { key: `stat-${label}` });
}

function renderStats(state: ViewerState): VNode {
  const snap = state.snapshot;
  const fps = state.stats.fps;
  return ui.panel({ key: "stats-panel", title: "Statistics", gap: 0 }, [
    statLine("Settled efficiency", formatPercent(snap.efficiency)),
    statLine("Average efficiency", formatPercent(averageEfficiency(state.stats))),
    statLine("Occupancy", formatPercent(occupancy(snap))),
    statLine("Operations per append", formatRate(state.stats.operationsPerAppend)),
    statLine("Minimum FPS", formatRate(fps.min)),
    statLine("Maximum FPS", formatRate(fps.max)),
    statLine("Current FPS", formatRate(fps.current)),
    statLine("Capacity", formatCount(snap.capacity)),
    statLine("Size", formatCount(snap.size)),
    statLine("Old generation", formatCount(snap.oldGenerationSize)),
    statLine("Migrated", formatCount(snap.migrated)),
    statLine("Resizes", formatCount(snap.resizeCount)),
    statLine("Migration ops", formatCount(snap.migrationOpCount)),
    statLine("Growth factor", String(snap.growthFactor)),
    statLine("Hard limit", snap.hardLimit === null ? "none" : formatCount(snap.hardLimit)),
    ui.gauge(clamp(snap.efficiency, 0, 1), { key: "efficiency-gauge", label: "Settled" }),
  ]);
}

function renderLegend(span: number, palette: CellPalette): VNode {
  return ui.row({ key: "legend", gap: 2, wrap: true }, [
    ...LEGEND_ORDER.map((kind) =>
      ui.richText(
        [
          { text: cellGlyph(kind), style: palette[kind] },
          { text: ` ${cellLabel(kind)}` },
        ],
        { key: `legend-${kind}` },
      ),
    ),
    ui.text(`1 cell = ${formatCount(span)} element${span === 1 ? "" : "s"}`, {
      key: "legend-span",
    }),
  ]);
}

export function renderGrowthView(state: ViewerState, handlers: ScreenHandlers): VNode {
  const theme = themeSpec(state.themeName);
  const phase = phaseBadge(state.phase);
  const layout = resolveGridLayout(state.snapshot, state.viewportCols, state.viewportRows);

  const content = ui.page({
    p: 1,
    gap: 1,
    header: ui.column({ key: "header", gap: 0 }, [
      ui.row({ key: "brand-row", gap: 1, wrap: true }, [
        ui.text(PRODUCT_NAME, { key: "app-name", variant: "heading" }),
        ui.badge(phase.text, { variant: phase.variant }),
        ui.tag(`Theme ${theme.label}`, { variant: theme.badge }),
        state.paused ? ui.badge("Paused", { variant: "warning" }) : null,
      ]),
      ui.text(PRODUCT_TAGLINE, { key: "tagline", style: { dim: true } }),
    ]),
    body: ui.row({ key: "body", gap: 2 }, [
      ui.panel({ key: "grid-panel", title: "Capacity" }, [
        renderGrid(state.snapshot, layout, theme.cells),
        renderLegend(layout.span, theme.cells),
      ]),
      ui.column({ key: "side", gap: 1 }, [
        renderStats(state),
        ui.row({ key: "controls", gap: 1 }, [
          ui.button({
            id: "pause",
            label: state.paused ? "Resume" : "Pause",
            onPress: handlers.onTogglePause,
          }),
          ui.button({ id: "step", label: "Step", onPress: handlers.onStep }),
          ui.button({ id: "help", label: "Help", onPress: handlers.onToggleHelp }),
        ]),
      ]),
    ]),
    footer: ui.text(
      `tick=${String(state.tick)}  last=${outcomeLabel(state.lastOutcome)}  interval=${String(
        state.tickMs,
      )}ms  keys: q quit, space pause, enter step, +/- speed, t theme, h help`,
      { key: "footer", style: { dim: true } },
    ),
  });

  if (!state.showHelp) return content;

  return ui.layers([
    content,
    ui.modal({
      id: "growth-help-modal",
      title: `${PRODUCT_NAME} Help`,
      width: 64,
      backdrop: "none",
      returnFocusTo: "help",
      content: ui.column({ gap: 1 }, [
        ui.text("q, ctrl+c : quit"),
        ui.text("space, p : pause or resume ticking"),
        ui.text("enter, n : advance one tick"),
        ui.text("+, - : halve or double the tick interval"),
        ui.text("t : cycle theme"),
        ui.text("h, ? : toggle help"),
        ui.text("Old data migrates one element per tick after each expansion."),
      ]),
      actions: [
        ui.button({
          id: "growth-help-close",
          label: "Close",
          onPress: handlers.onToggleHelp,
        }),
      ],
      onClose: handlers.onToggleHelp,
    }),
  ]);
}
