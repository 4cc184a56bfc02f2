/**
 * Departures fetcher (BVG transport.rest API)
 *
 * Endpoint: GET {base}/stops/{stationId}/departures
 * One call per station; the board merges all stations' departures.
 */

import {
  FetchError,
  TRANSIT_CATEGORIES,
  departureKey,
  isTransitCategory,
  type Departure,
  type Station,
} from "@departure-board/core";
import { fixedDelay } from "../backoff";
import { isFiniteNumber, isRecord, isString } from "../guards";
import { fetchUntilSuccess } from "../retry";
import type { Sleep } from "../sleep";
import { getJson } from "./http";

const SOURCE = "trips";

export interface TripsFetchOptions {
  apiBase: string;
  timezone: string;
}

/**
 * Ring lines run in both directions around the city; the destination
 * alone doesn't say which way.
 */
const RING_PREFIXES: Record<string, string> = {
  S41: "⟳ ",
  S42: "⟲ ",
};

/**
 * Clean up a destination name for display
 */
export function formatDestination(line: string, destination: string): string {
  const name = destination.replace("(Berlin)", "").trim();
  return (RING_PREFIXES[line] ?? "") + name;
}

/**
 * "HH:MM" in the board's timezone
 */
export function formatClockTime(timestamp: number, timezone: string): string {
  return new Intl.DateTimeFormat("en-GB", {
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
    timeZone: timezone,
  }).format(timestamp);
}

/**
 * Build the request URL for one station
 */
export function departuresUrl(apiBase: string, station: Station): URL {
  const url = new URL(`${apiBase.replace(/\/+$/, "")}/stops/${station.id}/departures`);
  const params: Record<string, string> = {
    when: "now",
    duration: "600",
    results: "12",
    linesOfStops: "false",
    remarks: "true",
    language: "de",
  };
  for (const category of TRANSIT_CATEGORIES) {
    params[category] = String(station.categories.includes(category));
  }
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url;
}

/**
 * Parse one departure entry. Returns null for cancelled departures.
 */
export function parseDeparture(raw: unknown, timezone: string): Departure | null {
  if (!isRecord(raw)) {
    throw new FetchError(SOURCE, "Departure entry is not an object");
  }
  if (raw.cancelled === true) return null;

  const { tripId, line, destination, direction, delay } = raw;
  const when = isString(raw.when) ? raw.when : raw.plannedWhen;

  if (!isString(tripId) || !isRecord(line) || !isString(line.name) || !isString(when)) {
    throw new FetchError(SOURCE, "Departure entry is missing tripId, line or when");
  }
  if (!isTransitCategory(line.product)) {
    throw new FetchError(SOURCE, `Unknown product: ${String(line.product)}`);
  }

  const departsAt = Date.parse(when);
  if (Number.isNaN(departsAt)) {
    throw new FetchError(SOURCE, `Invalid departure time: ${when}`);
  }

  const destinationName =
    isRecord(destination) && isString(destination.name)
      ? destination.name
      : isString(direction)
        ? direction
        : "";

  const delaySeconds = isFiniteNumber(delay) ? delay : 0;

  return Object.freeze({
    tripId,
    line: line.name,
    destination: formatDestination(line.name, destinationName),
    time: formatClockTime(departsAt, timezone),
    delayMinutes: Math.floor(delaySeconds / 60),
    category: line.product,
    departsAt,
  });
}

/**
 * Keep the first departure per comparison key
 */
export function dropDuplicateDepartures(departures: readonly Departure[]): Departure[] {
  const seen = new Set<string>();
  return departures.filter((departure) => {
    const key = departureKey(departure);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function sortByDeparture(departures: readonly Departure[]): Departure[] {
  return [...departures].sort((a, b) => a.departsAt - b.departsAt);
}

/**
 * One fetch attempt for one station.
 * An empty result is an error: it must never blank a displayed list.
 */
export async function fetchStationDepartures(
  station: Station,
  options: TripsFetchOptions
): Promise<Departure[]> {
  const body = await getJson(SOURCE, departuresUrl(options.apiBase, station));

  if (!isRecord(body) || !Array.isArray(body.departures)) {
    throw new FetchError(SOURCE, `${station.name}: response has no departures array`);
  }

  const departures: Departure[] = [];
  for (const entry of body.departures) {
    const departure = parseDeparture(entry, options.timezone);
    if (departure) departures.push(departure);
  }

  const result = sortByDeparture(dropDuplicateDepartures(departures));
  if (result.length === 0) {
    throw new FetchError(SOURCE, `${station.name}: received empty departures list`);
  }
  return result;
}

/**
 * Fetch every station concurrently, each retried until it succeeds,
 * and merge the results. All station tasks finish before this returns.
 */
export async function fetchAllStations(
  stations: readonly Station[],
  options: TripsFetchOptions & {
    retryDelayMs: number;
    sleep?: Sleep;
    signal?: AbortSignal;
  }
): Promise<Departure[]> {
  const perStation = await Promise.all(
    stations.map((station) =>
      fetchUntilSuccess(() => fetchStationDepartures(station, options), {
        source: `${SOURCE}:${station.name}`,
        delay: fixedDelay(options.retryDelayMs),
        sleep: options.sleep,
        signal: options.signal,
      })
    )
  );

  const merged = sortByDeparture(perStation.flat());
  if (merged.length === 0) {
    throw new FetchError(SOURCE, "No stations configured");
  }
  return merged;
}
