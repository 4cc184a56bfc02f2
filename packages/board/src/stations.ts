/**
 * Station configuration
 * Loaded once at startup from a JSON file. Any failure falls back to a
 * single default station.
 */

import { readFileSync } from "fs";
import {
  ConfigLoadError,
  errorMessage,
  isTransitCategory,
  type Station,
} from "@departure-board/core";
import { isRecord } from "./guards";

export const DEFAULT_STATIONS: readonly Readonly<Station>[] = [
  { name: "Zoologischer Garten", id: "900023201", categories: ["bus"] },
];

function parseStation(raw: unknown, index: number): Station {
  if (!isRecord(raw)) {
    throw new ConfigLoadError(`stations[${index}] is not an object`);
  }

  const { name, id, categories } = raw;
  if (typeof name !== "string" || name.trim() === "") {
    throw new ConfigLoadError(`stations[${index}].name must be a non-empty string`);
  }
  if (typeof id !== "string" && typeof id !== "number") {
    throw new ConfigLoadError(`stations[${index}].id must be a string or number`);
  }
  if (!Array.isArray(categories) || categories.length === 0) {
    throw new ConfigLoadError(`stations[${index}].categories must be a non-empty array`);
  }

  const unknown = categories.filter((c) => !isTransitCategory(c));
  if (unknown.length > 0) {
    throw new ConfigLoadError(
      `stations[${index}].categories has unknown entries: ${unknown.map(String).join(", ")}`
    );
  }

  return {
    name: name.trim(),
    id: String(id),
    categories: categories.filter(isTransitCategory),
  };
}

/**
 * Validate parsed JSON of the form `{ "stations": [...] }`
 */
export function parseStations(raw: unknown): Station[] {
  if (!isRecord(raw) || !Array.isArray(raw.stations)) {
    throw new ConfigLoadError('Config must be an object with a "stations" array');
  }
  if (raw.stations.length === 0) {
    throw new ConfigLoadError("Config lists no stations");
  }
  return raw.stations.map(parseStation);
}

/**
 * Load stations from a JSON file, or the default station if that fails
 */
export function loadStations(path: string): Station[] {
  try {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigLoadError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
    }
    return parseStations(raw);
  } catch (error) {
    console.error(
      `[config] Failed to load stations, using default station ${DEFAULT_STATIONS[0].name}: ${errorMessage(error)}`
    );
    return DEFAULT_STATIONS.map((station) => ({
      ...station,
      categories: [...station.categories],
    }));
  }
}
