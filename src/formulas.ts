import {
  ActivityKind,
  ActivityRecord,
  ActivityRecordOf,
  RunningRecord,
  SportsWalkingRecord,
  SwimmingRecord,
  WorkoutSummary,
} from "./shared/types";

export const M_IN_KM = 1000;
export const MIN_IN_HOUR = 60;

/**
 * Distance covered by one step (running, walking) or one stroke (swimming), in meters
 */
export const STEP_LENGTH_M: Readonly<Record<ActivityKind, number>> = {
  Running: 0.65,
  SportsWalking: 0.65,
  Swimming: 1.38,
};

const RUN_CALORIES_SPEED_MULTIPLIER = 18;
const RUN_CALORIES_SPEED_SHIFT = 1.79;

const WALK_CALORIES_WEIGHT_FACTOR = 0.035;
const WALK_CALORIES_SPEED_HEIGHT_FACTOR = 0.029;
const KMH_TO_MS = 0.278;

const SWIM_CALORIES_SPEED_SHIFT = 1.1;
const SWIM_CALORIES_MULTIPLIER = 2;

/**
 * Calculations every activity variant provides
 */
export interface ActivityFormulas<R extends ActivityRecord> {
  getDistance(record: R): number;      // km
  getMeanSpeed(record: R): number;     // km/h
  getSpentCalories(record: R): number; // kcal
}

const distanceBySteps = (record: ActivityRecord): number =>
  (record.actionCount * STEP_LENGTH_M[record.kind]) / M_IN_KM;

const speedBySteps = (record: ActivityRecord): number =>
  distanceBySteps(record) / record.durationHours;

export const runningFormulas: ActivityFormulas<RunningRecord> = {
  getDistance: distanceBySteps,
  getMeanSpeed: speedBySteps,
  getSpentCalories(record) {
    return (
      ((RUN_CALORIES_SPEED_MULTIPLIER * speedBySteps(record) + RUN_CALORIES_SPEED_SHIFT) *
        record.weightKg) /
      M_IN_KM *
      (record.durationHours * MIN_IN_HOUR)
    );
  },
};

export const sportsWalkingFormulas: ActivityFormulas<SportsWalkingRecord> = {
  getDistance: distanceBySteps,
  getMeanSpeed: speedBySteps,
  getSpentCalories(record) {
    const speedMs = speedBySteps(record) * KMH_TO_MS;
    return (
      (WALK_CALORIES_WEIGHT_FACTOR * record.weightKg +
        (speedMs ** 2 / record.heightM) * WALK_CALORIES_SPEED_HEIGHT_FACTOR * record.weightKg) *
      record.durationHours *
      MIN_IN_HOUR
    );
  },
};

// Pool length and lap count decide the speed; stroke count only feeds the distance
const swimmingSpeed = (record: SwimmingRecord): number =>
  (record.poolLengthM * record.poolLapCount) / M_IN_KM / record.durationHours;

export const swimmingFormulas: ActivityFormulas<SwimmingRecord> = {
  getDistance: distanceBySteps,
  getMeanSpeed: swimmingSpeed,
  getSpentCalories(record) {
    return (
      (swimmingSpeed(record) + SWIM_CALORIES_SPEED_SHIFT) *
      SWIM_CALORIES_MULTIPLIER *
      record.weightKg *
      record.durationHours
    );
  },
};

export const ACTIVITY_FORMULAS: { readonly [K in ActivityKind]: ActivityFormulas<ActivityRecordOf<K>> } = {
  Running: runningFormulas,
  SportsWalking: sportsWalkingFormulas,
  Swimming: swimmingFormulas,
};

interface BoundFormulas {
  getDistance(): number;
  getMeanSpeed(): number;
  getSpentCalories(): number;
}

const bind = <R extends ActivityRecord>(formulas: ActivityFormulas<R>, record: R): BoundFormulas => ({
  getDistance: () => formulas.getDistance(record),
  getMeanSpeed: () => formulas.getMeanSpeed(record),
  getSpentCalories: () => formulas.getSpentCalories(record),
});

/**
 * Pick the formulas of the record's variant
 */
const formulasFor = (record: ActivityRecord): BoundFormulas => {
  switch (record.kind) {
    case "Running":
      return bind(ACTIVITY_FORMULAS.Running, record);
    case "SportsWalking":
      return bind(ACTIVITY_FORMULAS.SportsWalking, record);
    case "Swimming":
      return bind(ACTIVITY_FORMULAS.Swimming, record);
    default: {
      const unreachable: never = record;
      throw new Error(`Unhandled activity record: ${JSON.stringify(unreachable)}`);
    }
  }
};

export const getDistance = (record: ActivityRecord): number => formulasFor(record).getDistance();

export const getMeanSpeed = (record: ActivityRecord): number => formulasFor(record).getMeanSpeed();

export const getSpentCalories = (record: ActivityRecord): number =>
  formulasFor(record).getSpentCalories();

/**
 * Derive the display metrics of a workout. The record is only read.
 */
export function computeSummary(record: ActivityRecord): WorkoutSummary {
  const formulas = formulasFor(record);

  return Object.freeze({
    activityName: record.kind,
    durationHours: record.durationHours,
    distanceKm: formulas.getDistance(),
    meanSpeedKmh: formulas.getMeanSpeed(),
    calories: formulas.getSpentCalories(),
  });
}
