#!/usr/bin/env node
import * as dotenv from "dotenv";
import FitnessTracker, { SAMPLE_PACKAGES } from "./fitnessTracker";
import { getPackageFromArgs, loadTrackerConfig } from "./shared/config";
import { TrackerError } from "./shared/errors";

// Load environment variables
dotenv.config();

function main() {
  const config = loadTrackerConfig();
  const argPackage = getPackageFromArgs();
  const packages = argPackage ? [argPackage] : SAMPLE_PACKAGES;

  if (config.verbose && !argPackage) {
    console.log("📋 No package given, using sample readings\n");
  }

  const tracker = new FitnessTracker(config);
  const outcomes = tracker.run(packages);

  if (outcomes.some((outcome) => outcome.status === "rejected")) {
    process.exitCode = 1;
  }
}

try {
  main();
} catch (error) {
  if (error instanceof TrackerError) {
    // --fail-fast stops on the first rejected package
    console.error(`❌ ${error.tag}: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
}
