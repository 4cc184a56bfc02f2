/**
 * Change detection
 *
 * Decides whether a freshly fetched value is worth publishing, given the
 * value currently held for its source.
 */

import type { Departure, WeatherReading } from "./types";

export interface ChangeDetector<T> {
  /** True when `next` should replace `previous`. Always true without a previous value. */
  changed(previous: T | undefined, next: T): boolean;
}

/**
 * Comparison key of a departure.
 *
 * Leaves out the trip identifier, which the upstream may reassign to the
 * same trip between polls.
 */
export function departureKey(departure: Departure): string {
  return [
    departure.line,
    departure.time,
    departure.delayMinutes,
    departure.category,
  ].join("|");
}

/**
 * Whether two collections hold the same set of comparison keys,
 * regardless of order and duplicates.
 */
export function sameKeySet<T>(
  a: readonly T[],
  b: readonly T[],
  key: (item: T) => string
): boolean {
  const keysA = new Set(a.map(key));
  const keysB = new Set(b.map(key));
  if (keysA.size !== keysB.size) return false;
  for (const k of keysA) {
    if (!keysB.has(k)) return false;
  }
  return true;
}

/**
 * Departure lists compare as unordered sets under departureKey.
 * An empty list never replaces a displayed one.
 */
export const departuresDetector: ChangeDetector<readonly Departure[]> = {
  changed(previous, next) {
    if (previous === undefined) return true;
    if (next.length === 0) return false;
    return !sameKeySet(previous, next, departureKey);
  },
};

const WEATHER_FIELDS = [
  "timestamp",
  "temperature",
  "uvIndex",
  "temperatureDailyMin",
  "temperatureDailyMax",
  "uvIndexDailyMax",
] as const satisfies readonly (keyof WeatherReading)[];

/**
 * Weather readings compare field by field; any difference is a change.
 */
export const weatherDetector: ChangeDetector<WeatherReading> = {
  changed(previous, next) {
    if (previous === undefined) return true;
    return WEATHER_FIELDS.some((field) => previous[field] !== next[field]);
  },
};
