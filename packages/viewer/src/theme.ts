import type { CellKind } from "@amortized-growth/model";
import type { BadgeVariant, TextStyle, ThemeDefinition } from "@rezi-ui/core";
import { darkTheme, lightTheme, nordTheme, rgb } from "@rezi-ui/core";
import type { ThemeName } from "./types.js";

type CellPalette = Readonly<Record<CellKind, TextStyle>>;

type GrowthTheme = Readonly<{
  label: string;
  badge: BadgeVariant;
  theme: ThemeDefinition;
  /** Grid glyph colors; light backgrounds need darker fills. */
  cells: CellPalette;
}>;

export const PRODUCT_NAME = "Amortized Growth Lab";
export const PRODUCT_TAGLINE = "Growable array with throttled old-generation migration";

const DARK_CELLS: CellPalette = Object.freeze({
  fresh: { fg: rgb(104, 214, 126) },
  migrated: { fg: rgb(98, 184, 232) },
  pending: { fg: rgb(92, 112, 224) },
  free: { fg: rgb(96, 102, 116) },
  unallocated: {},
});

const LIGHT_CELLS: CellPalette = Object.freeze({
  fresh: { fg: rgb(32, 138, 62) },
  migrated: { fg: rgb(24, 112, 168) },
  pending: { fg: rgb(48, 58, 170) },
  free: { fg: rgb(150, 154, 162) },
  unallocated: {},
});

const GROWTH_THEMES: Readonly<Record<ThemeName, GrowthTheme>> = Object.freeze({
  nord: { label: "Nord", badge: "info", theme: nordTheme, cells: DARK_CELLS },
  dark: { label: "Dark", badge: "default", theme: darkTheme, cells: DARK_CELLS },
  light: { label: "Light", badge: "success", theme: lightTheme, cells: LIGHT_CELLS },
});

const NEXT_THEME: Readonly<Record<ThemeName, ThemeName>> = Object.freeze({
  nord: "dark",
  dark: "light",
  light: "nord",
});

export function themeSpec(themeName: ThemeName): GrowthTheme {
  return GROWTH_THEMES[themeName];
}

export function cycleTheme(themeName: ThemeName): ThemeName {
  return NEXT_THEME[themeName];
}
