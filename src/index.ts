import FitnessTracker, { SAMPLE_PACKAGES } from "./fitnessTracker";
import { computeSummary, getDistance, getMeanSpeed, getSpentCalories } from "./formulas";
import { readPackage } from "./packageReader";
import { formatSummary } from "./summaryFormatter";

export * from "./shared/types";
export * from "./shared/errors";
export { loadTrackerConfig, getPackageFromArgs } from "./shared/config";
export type { TrackerConfig } from "./shared/config";
export {
  FitnessTracker,
  SAMPLE_PACKAGES,
  readPackage,
  computeSummary,
  getDistance,
  getMeanSpeed,
  getSpentCalories,
  formatSummary,
};
export default { FitnessTracker, readPackage, computeSummary, formatSummary };
