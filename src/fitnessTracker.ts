import { computeSummary } from "./formulas";
import { readPackage } from "./packageReader";
import { formatSummary } from "./summaryFormatter";
import { DEFAULT_TRACKER_CONFIG, TrackerConfig } from "./shared/config";
import { InvalidPackageError, TrackerError } from "./shared/errors";
import { RawValue, TrainingPackage, WorkoutSummary } from "./shared/types";

export type PackageOutcome =
  | { status: "completed"; tag: string; summary: WorkoutSummary; message: string }
  | { status: "rejected"; tag: string; error: TrackerError; message: string };

/**
 * Readings the tracker processes when no package is supplied
 */
export const SAMPLE_PACKAGES: readonly TrainingPackage[] = [
  ["SWM", [720, 1, 80, 25, 40]],
  ["RUN", [15000, 1, 75]],
  ["WLK", [9000, 1, 75, 180]],
];

/**
 * Turns sensor packages into printed workout summaries
 */
export class FitnessTracker {
  private config: TrackerConfig;

  constructor(config: TrackerConfig = DEFAULT_TRACKER_CONFIG) {
    this.config = config;
  }

  /**
   * Read, compute and format a single package.
   * Rejections by the reader come back as outcomes, anything else is thrown.
   */
  processPackage(tag: string, values: readonly RawValue[]): PackageOutcome {
    try {
      const summary = computeSummary(readPackage(tag, values));
      return { status: "completed", tag, summary, message: formatSummary(summary) };
    } catch (error) {
      if (error instanceof TrackerError) {
        return { status: "rejected", tag, error, message: error.message };
      }
      throw error;
    }
  }

  /**
   * Process packages in order, printing one line per package
   */
  run(packages: readonly TrainingPackage[]): PackageOutcome[] {
    if (this.config.verbose) {
      console.log("🏃 Fitness Tracker");
      console.log("==================\n");
      console.log(`📦 Processing ${packages.length} package(s)\n`);
    }

    const outcomes: PackageOutcome[] = [];

    for (const [tag, values] of packages) {
      const outcome = this.processPackage(tag, values);
      outcomes.push(outcome);

      if (outcome.status === "rejected") {
        if (this.config.verbose) {
          const detail = outcome.error instanceof InvalidPackageError ? ` (${outcome.error.reason})` : "";
          console.error(`❌ Package ${tag} rejected${detail}`);
        }
        if (this.config.failFast) {
          throw outcome.error;
        }
      }

      console.log(outcome.message);
    }

    if (this.config.verbose) {
      const rejected = outcomes.filter((outcome) => outcome.status === "rejected").length;
      console.log(`\n✅ Processed ${outcomes.length - rejected} package(s), ${rejected} rejected`);
    }

    return outcomes;
  }
}

export default FitnessTracker;
