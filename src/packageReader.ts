import { InvalidPackageError, UnknownActivityError } from "./shared/errors";
import {
  ActivityKind,
  ActivityRecord,
  ActivityTag,
  RawValue,
  RunningRecord,
  SportsWalkingRecord,
  SwimmingRecord,
} from "./shared/types";

const CM_IN_M = 100;

/**
 * Record variant built for each sensor tag
 */
export const ACTIVITY_KINDS = {
  SWM: "Swimming",
  RUN: "Running",
  WLK: "SportsWalking",
} as const satisfies Readonly<Record<ActivityTag, ActivityKind>>;

/**
 * Number of values each package type must carry
 */
export const PACKAGE_ARITY: Readonly<Record<ActivityTag, number>> = {
  SWM: 5,
  RUN: 3,
  WLK: 4,
};

export const isActivityTag = (tag: string): tag is ActivityTag =>
  Object.prototype.hasOwnProperty.call(ACTIVITY_KINDS, tag);

const isComplete = (values: readonly RawValue[]): values is readonly number[] =>
  values.every((value) => value !== null && value !== undefined);

const requirePositive = (tag: ActivityTag, field: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidPackageError(tag, `${field} must be a positive number, got ${value}`);
  }
};

// Returns the count with -0 folded into 0
const requireCount = (tag: ActivityTag, field: string, value: number): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidPackageError(tag, `${field} must be a non-negative integer, got ${value}`);
  }
  return value + 0;
};

/**
 * Build the activity record for a sensor package.
 *
 * Checks run in order: known tag, no missing value, exact value count,
 * then the range of each field. Nothing is constructed until all pass.
 */
export function readPackage(tag: string, values: readonly RawValue[]): ActivityRecord {
  if (!isActivityTag(tag)) {
    throw new UnknownActivityError(tag);
  }

  if (!isComplete(values)) {
    throw new InvalidPackageError(tag, "package contains a missing value");
  }

  const expected = PACKAGE_ARITY[tag];
  if (values.length !== expected) {
    throw new InvalidPackageError(tag, `expected ${expected} values, got ${values.length}`);
  }

  const [rawActionCount, durationHours, weightKg] = values;
  const actionCount = requireCount(tag, "action count", rawActionCount);
  requirePositive(tag, "duration", durationHours);
  requirePositive(tag, "weight", weightKg);

  switch (tag) {
    case "RUN": {
      const record: RunningRecord = { kind: ACTIVITY_KINDS[tag], actionCount, durationHours, weightKg };
      return Object.freeze(record);
    }

    case "WLK": {
      const heightCm = values[3];
      requirePositive(tag, "height", heightCm);
      const record: SportsWalkingRecord = {
        kind: ACTIVITY_KINDS[tag],
        actionCount,
        durationHours,
        weightKg,
        heightM: heightCm / CM_IN_M,
      };
      return Object.freeze(record);
    }

    case "SWM": {
      const [poolLengthM, rawPoolLapCount] = values.slice(3);
      requirePositive(tag, "pool length", poolLengthM);
      const poolLapCount = requireCount(tag, "pool lap count", rawPoolLapCount);
      const record: SwimmingRecord = {
        kind: ACTIVITY_KINDS[tag],
        actionCount,
        durationHours,
        weightKg,
        poolLengthM,
        poolLapCount,
      };
      return Object.freeze(record);
    }
  }
}
