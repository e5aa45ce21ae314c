import { WorkoutSummary } from "./shared/types";

const groupThousands = (digits: string): string => digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");

/**
 * toFixed rounds exact ties away from zero; summaries round them to even.
 * A double sits exactly halfway at three decimals only when it is an odd multiple of 1/16.
 */
const roundTiesToEven = (value: number): number => {
  if (!Number.isInteger(value * 16) || Number.isInteger(value * 8)) return value;

  const lower = Math.floor(value * 1000);
  return (lower % 2 === 0 ? lower : lower + 1) / 1000;
};

/**
 * Three decimals with comma grouping, e.g. 1234.5 -> "1,234.500"
 */
export const formatDecimal = (value: number): string => {
  const [whole, fraction] = roundTiesToEven(value).toFixed(3).split(".");
  return `${groupThousands(whole)}.${fraction}`;
};

/**
 * Render the workout summary line shown to the athlete
 */
export function formatSummary(summary: WorkoutSummary): string {
  return (
    `Тип тренировки: ${summary.activityName}; ` +
    `Длительность: ${formatDecimal(summary.durationHours)} ч.; ` +
    `Дистанция: ${formatDecimal(summary.distanceKm)} км; ` +
    `Ср. скорость: ${formatDecimal(summary.meanSpeedKmh)} км/ч; ` +
    `Потрачено ккал: ${formatDecimal(summary.calories)}.`
  );
}
