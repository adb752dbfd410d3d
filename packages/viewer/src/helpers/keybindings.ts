export type GrowthCommand =
  | "quit"
  | "toggle-pause"
  | "step"
  | "faster"
  | "slower"
  | "cycle-theme"
  | "toggle-help";

const COMMAND_BY_KEY: Readonly<Record<string, GrowthCommand>> = Object.freeze({
  q: "quit",
  "ctrl+c": "quit",
  space: "toggle-pause",
  p: "toggle-pause",
  enter: "step",
  n: "step",
  "+": "faster",
  "shift+=": "faster",
  "-": "slower",
  t: "cycle-theme",
  h: "toggle-help",
  "shift+/": "toggle-help",
});

export const BOUND_KEYS: readonly string[] = Object.freeze(Object.keys(COMMAND_BY_KEY));

export function resolveGrowthCommand(key: string): GrowthCommand | undefined {
  return COMMAND_BY_KEY[key.toLowerCase()];
}
