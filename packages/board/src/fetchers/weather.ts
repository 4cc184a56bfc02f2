/**
 * Weather fetcher (Open-Meteo forecast API)
 *
 * Requests unix timestamps so the reading's time is an absolute instant.
 * `current.time` is the upstream's own attribution of the current values and
 * drives the anchored weather schedule; wall-clock time does not.
 */

import { FetchError, type WeatherReading } from "@departure-board/core";
import { isFiniteNumber, isRecord } from "../guards";
import { getJson } from "./http";

const SOURCE = "weather";

export interface WeatherFetchOptions {
  apiUrl: string;
  latitude: number;
  longitude: number;
  timezone: string;
}

export function weatherUrl(options: WeatherFetchOptions): URL {
  const url = new URL(options.apiUrl);
  url.searchParams.set("latitude", String(options.latitude));
  url.searchParams.set("longitude", String(options.longitude));
  url.searchParams.set("timezone", options.timezone);
  url.searchParams.set("current", "temperature_2m,uv_index");
  url.searchParams.set("daily", "temperature_2m_min,temperature_2m_max,uv_index_max");
  url.searchParams.set("forecast_days", "1");
  url.searchParams.set("timeformat", "unixtime");
  return url;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function numberField(section: Record<string, unknown>, key: string): number {
  const value = section[key];
  if (!isFiniteNumber(value)) {
    throw new FetchError(SOURCE, `Missing or invalid field: ${key}`);
  }
  return value;
}

function firstOf(section: Record<string, unknown>, key: string): number {
  const values = section[key];
  if (!Array.isArray(values) || !isFiniteNumber(values[0])) {
    throw new FetchError(SOURCE, `Missing or invalid daily field: ${key}`);
  }
  return values[0];
}

/**
 * Parse an Open-Meteo response body
 */
export function parseWeather(body: unknown): WeatherReading {
  if (!isRecord(body) || !isRecord(body.current) || !isRecord(body.daily)) {
    throw new FetchError(SOURCE, "Response is missing current or daily data");
  }
  const { current, daily } = body;

  return Object.freeze({
    timestamp: numberField(current, "time") * 1000,
    temperature: round1(numberField(current, "temperature_2m")),
    uvIndex: round1(numberField(current, "uv_index")),
    temperatureDailyMin: round1(firstOf(daily, "temperature_2m_min")),
    temperatureDailyMax: round1(firstOf(daily, "temperature_2m_max")),
    uvIndexDailyMax: round1(firstOf(daily, "uv_index_max")),
  });
}

/**
 * One fetch attempt
 */
export async function fetchWeather(options: WeatherFetchOptions): Promise<WeatherReading> {
  const reading = parseWeather(await getJson(SOURCE, weatherUrl(options)));
  console.log(`[${SOURCE}] Fetched reading for ${new Date(reading.timestamp).toISOString()}`);
  return reading;
}
