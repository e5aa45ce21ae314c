// Sensor tags as they arrive in a data package
export type ActivityTag = "SWM" | "RUN" | "WLK";

// Variant identifiers, also used as the display name of a workout
export type ActivityKind = "Running" | "SportsWalking" | "Swimming";

interface BaseActivityRecord {
  readonly actionCount: number;     // steps or strokes
  readonly durationHours: number;
  readonly weightKg: number;
}

export interface RunningRecord extends BaseActivityRecord {
  readonly kind: "Running";
}

export interface SportsWalkingRecord extends BaseActivityRecord {
  readonly kind: "SportsWalking";
  readonly heightM: number;         // converted from cm on read
}

export interface SwimmingRecord extends BaseActivityRecord {
  readonly kind: "Swimming";
  readonly poolLengthM: number;
  readonly poolLapCount: number;
}

export type ActivityRecord = RunningRecord | SportsWalkingRecord | SwimmingRecord;

export type ActivityRecordOf<K extends ActivityKind> = Extract<ActivityRecord, { kind: K }>;

export interface WorkoutSummary {
  readonly activityName: ActivityKind;
  readonly durationHours: number;
  readonly distanceKm: number;
  readonly meanSpeedKmh: number;
  readonly calories: number;
}

// A value missing from the sensor arrives as null or undefined
export type RawValue = number | null | undefined;

export type TrainingPackage = readonly [tag: string, values: readonly RawValue[]];
