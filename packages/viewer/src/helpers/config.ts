import { validateGrowthConfig } from "@amortized-growth/model";
import { DEFAULT_TICK_MS, computeTickInterval } from "./tickTiming.js";

export const DEFAULT_GROWTH_FACTOR = 2.0;
export const DEFAULT_HARD_LIMIT = 512 * 512;
export const DEFAULT_GRACE_MS = 3000;
export const DEFAULT_MAX_TICKS = 100_000;

export type CliOptions = Readonly<{
  growthFactor: number;
  hardLimit: number | null;
  tickMs: number;
  graceMs: number;
  capturePath: string | null;
  headless: boolean;
  maxTicks: number;
  help: boolean;
}>;

type MutableCliOptions = {
  growthFactor: number;
  hardLimit: number | null;
  tickMs: number;
  graceMs: number;
  capturePath: string | null;
  headless: boolean;
  maxTicks: number;
  help: boolean;
};

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new Error(`Invalid number for ${flag}: ${raw}`);
  }
  return value;
}

function parseNonNegativeInt(flag: string, raw: string): number {
  const value = parseNumber(flag, raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${flag} must be a non-negative integer (got ${raw})`);
  }
  return value;
}

function splitInline(arg: string): Readonly<{ flag: string; inline: string | undefined }> {
  const eq = arg.indexOf("=");
  if (!arg.startsWith("--") || eq < 0) return { flag: arg, inline: undefined };
  return { flag: arg.slice(0, eq), inline: arg.slice(eq + 1) };
}

/**
 * Parse `amortized-growth [growthFactor] [options]`.
 * Throws on unknown flags, missing values and invalid growth settings.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: MutableCliOptions = {
    growthFactor: DEFAULT_GROWTH_FACTOR,
    hardLimit: DEFAULT_HARD_LIMIT,
    tickMs: DEFAULT_TICK_MS,
    graceMs: DEFAULT_GRACE_MS,
    capturePath: null,
    headless: false,
    maxTicks: DEFAULT_MAX_TICKS,
    help: false,
  };
  let sawPositional = false;

  for (let i = 0; i < argv.length; i++) {
    const { flag, inline } = splitInline(argv[i] ?? "");

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const value = argv[i + 1];
      if (value === undefined) throw new Error(`Missing value for ${flag}`);
      i++;
      return value;
    };

    if (flag === "--help" || flag === "-h") {
      options.help = true;
      continue;
    }
    if (flag === "--headless") {
      options.headless = true;
      continue;
    }
    if (flag === "--no-limit") {
      options.hardLimit = null;
      continue;
    }
    if (flag === "--growth" || flag === "-g") {
      options.growthFactor = parseNumber(flag, takeValue());
      continue;
    }
    if (flag === "--limit" || flag === "-l") {
      options.hardLimit = parseNumber(flag, takeValue());
      continue;
    }
    if (flag === "--tick-ms") {
      options.tickMs = computeTickInterval(parseNumber(flag, takeValue()));
      continue;
    }
    if (flag === "--grace-ms") {
      options.graceMs = parseNonNegativeInt(flag, takeValue());
      continue;
    }
    if (flag === "--max-ticks") {
      options.maxTicks = parseNonNegativeInt(flag, takeValue());
      continue;
    }
    if (flag === "--capture") {
      const path = takeValue().trim();
      if (!path) throw new Error("Missing value for --capture");
      options.capturePath = path;
      continue;
    }
    if (flag.startsWith("-") && Number.isNaN(Number(flag))) {
      throw new Error(`Unknown option: ${flag}`);
    }
    if (!sawPositional) {
      options.growthFactor = parseNumber("growth factor", flag);
      sawPositional = true;
      continue;
    }
    throw new Error(`Unexpected argument: ${flag}`);
  }

  // Usage wins over whatever else is on the command line.
  if (options.help) return Object.freeze({ ...options });

  const validated = validateGrowthConfig({
    growthFactor: options.growthFactor,
    hardLimit: options.hardLimit,
  });
  if (!validated.ok) throw validated.error;

  return Object.freeze({ ...options });
}

export const USAGE = [
  "amortized-growth [growthFactor] [options]",
  "",
  "Options:",
  "  --growth, -g <f>     growth factor, must be > 1 (default 2.0)",
  `  --limit, -l <n>      hard capacity limit (default ${String(DEFAULT_HARD_LIMIT)})`,
  "  --no-limit           grow without a hard limit",
  `  --tick-ms <n>        tick interval in ms (default ${String(DEFAULT_TICK_MS)})`,
  `  --grace-ms <n>       wait after the limit before exit (default ${String(DEFAULT_GRACE_MS)})`,
  "  --capture <path>     write one NDJSON snapshot per tick",
  "  --headless           run without the terminal UI",
  `  --max-ticks <n>      headless tick cap (default ${String(DEFAULT_MAX_TICKS)})`,
  "  --help, -h           show this help",
  "",
].join("\n");
