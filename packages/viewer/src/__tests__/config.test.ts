import assert from "node:assert/strict";
import test from "node:test";
import { GrowthConfigError } from "@amortized-growth/model";
import { DEFAULT_HARD_LIMIT, USAGE, parseCliArgs } from "../helpers/config.js";

function configCode(code: string) {
  return (error: unknown): boolean => error instanceof GrowthConfigError && error.code === code;
}

test("parseCliArgs returns defaults for an empty argv", () => {
  assert.deepEqual(parseCliArgs([]), {
    growthFactor: 2,
    hardLimit: DEFAULT_HARD_LIMIT,
    tickMs: 30,
    graceMs: 3000,
    capturePath: null,
    headless: false,
    maxTicks: 100000,
    help: false,
  });
  assert.equal(DEFAULT_HARD_LIMIT, 262144);
});

test("parseCliArgs reads the positional growth factor and flags", () => {
  const options = parseCliArgs([
    "1.5",
    "--limit",
    "64",
    "--tick-ms=10000",
    "--grace-ms",
    "0",
    "--headless",
    "--capture",
    "out.ndjson",
    "--max-ticks=500",
  ]);
  assert.equal(options.growthFactor, 1.5);
  assert.equal(options.hardLimit, 64);
  assert.equal(options.tickMs, 5000);
  assert.equal(options.graceMs, 0);
  assert.equal(options.headless, true);
  assert.equal(options.capturePath, "out.ndjson");
  assert.equal(options.maxTicks, 500);
});

test("parseCliArgs accepts short flags and --no-limit", () => {
  const options = parseCliArgs(["-g", "3", "-l", "10", "--no-limit", "-h"]);
  assert.equal(options.growthFactor, 3);
  assert.equal(options.hardLimit, null);
  assert.equal(options.help, true);
});

test("parseCliArgs rejects unknown and malformed arguments", () => {
  assert.throws(() => parseCliArgs(["--bogus"]), /Unknown option: --bogus/);
  assert.throws(() => parseCliArgs(["--limit"]), /Missing value for --limit/);
  assert.throws(() => parseCliArgs(["2", "3"]), /Unexpected argument: 3/);
  assert.throws(() => parseCliArgs(["--growth", "fast"]), /Invalid number for --growth: fast/);
  assert.throws(
    () => parseCliArgs(["--max-ticks", "1.5"]),
    /--max-ticks must be a non-negative integer \(got 1\.5\)/,
  );
});

test("parseCliArgs returns usage for --help before validating growth settings", () => {
  const options = parseCliArgs(["0.5", "--help"]);
  assert.equal(options.help, true);
  assert.equal(options.growthFactor, 0.5);
  assert.equal(parseCliArgs(["--limit", "0", "-h"]).help, true);
});

test("parseCliArgs rejects growth settings the model cannot use", () => {
  assert.throws(() => parseCliArgs(["1"]), configCode("GROWTH_FACTOR_INVALID"));
  assert.throws(() => parseCliArgs(["-2"]), configCode("GROWTH_FACTOR_INVALID"));
  assert.throws(() => parseCliArgs(["--limit", "0"]), configCode("HARD_LIMIT_INVALID"));
});

test("usage lists every option", () => {
  const flags = [
    "--growth",
    "--limit",
    "--no-limit",
    "--tick-ms",
    "--grace-ms",
    "--capture",
    "--headless",
    "--max-ticks",
    "--help",
  ];
  for (const flag of flags) {
    assert.ok(USAGE.includes(flag), flag);
  }
});
