import { RawValue, TrainingPackage } from "./types";

export interface TrackerConfig {
  failFast: boolean;   // stop at the first rejected package
  verbose: boolean;    // log a banner and per-package progress
}

export const DEFAULT_TRACKER_CONFIG: TrackerConfig = {
  failFast: false,
  verbose: false,
};

/**
 * Read tracker options from the environment (.env loaded by the caller) and CLI flags
 */
export function loadTrackerConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv
): TrackerConfig {
  return {
    failFast: env.TRACKER_FAIL_FAST === "true" || argv.includes("--fail-fast"),
    verbose: env.TRACKER_VERBOSE === "true" || argv.includes("--verbose"),
  };
}

const MISSING_VALUE_TOKENS = new Set(["null", "-"]);

// Number("") is 0, so blank arguments are mapped to NaN for the reader to reject
const parseRawValue = (arg: string): RawValue => {
  if (MISSING_VALUE_TOKENS.has(arg.toLowerCase())) return null;
  return arg.trim() === "" ? Number.NaN : Number(arg);
};

/**
 * Package given as positional arguments: `RUN 15000 1 75`
 * Returns undefined when no positional argument is present.
 */
export function getPackageFromArgs(argv: readonly string[] = process.argv): TrainingPackage | undefined {
  const args = argv.slice(2).filter((arg) => !arg.startsWith("--"));
  if (args.length === 0) return undefined;

  const [tag, ...values] = args;
  return [tag, values.map(parseRawValue)];
}
