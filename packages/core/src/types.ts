/**
 * Core types for the departure board
 */

/** Identifier of a data source held in the shared state store */
export type SourceId = "trips" | "weather";

/** Transit service categories, as named by the departures API */
export const TRANSIT_CATEGORIES = [
  "suburban",
  "subway",
  "tram",
  "bus",
  "ferry",
  "express",
  "regional",
] as const;

export type TransitCategory = (typeof TRANSIT_CATEGORIES)[number];

export function isTransitCategory(value: unknown): value is TransitCategory {
  return TRANSIT_CATEGORIES.some((category) => category === value);
}

/** RGB color (0-255 per channel) */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** A single frame of pixel data */
export interface Frame {
  width: number;
  height: number;
  /** Flat array of RGB values: [r0,g0,b0, r1,g1,b1, ...] */
  pixels: Uint8Array;
}

/** A station whose departures are shown on the board */
export interface Station {
  name: string;
  /** Upstream stop identifier */
  id: string;
  /** Categories to request for this station */
  categories: TransitCategory[];
}

/** One departure row */
export interface Departure {
  /**
   * Upstream trip identifier. Not part of the comparison key: the same
   * physical trip may be reissued a new identifier between polls.
   */
  tripId: string;
  /** Line designator, e.g. "S41" or "M41" */
  line: string;
  destination: string;
  /** Departure time as shown on the board ("HH:MM", local time) */
  time: string;
  /** Signed delay in whole minutes */
  delayMinutes: number;
  category: TransitCategory;
  /** Unix timestamp of the (real-time) departure in milliseconds */
  departsAt: number;
}

/** Current and daily weather values */
export interface WeatherReading {
  /** Unix timestamp (ms) the upstream attributes to the current values */
  timestamp: number;
  temperature: number;
  uvIndex: number;
  temperatureDailyMin: number;
  temperatureDailyMax: number;
  uvIndexDailyMax: number;
}

/** Value type held per source */
export interface SourceValues {
  trips: readonly Departure[];
  weather: WeatherReading;
}

/** Point-in-time copy of every source's latest accepted value */
export type Snapshot<V = SourceValues> = Readonly<Partial<V>> & {
  /** Unix timestamp (ms) the snapshot was taken */
  readonly takenAt: number;
};
