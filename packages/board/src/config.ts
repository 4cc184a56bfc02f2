/**
 * Board configuration from environment variables
 * The CLI loads `.env` with dotenv before calling loadBoardConfig.
 */

export interface BoardConfig {
  timezone: string;
  stationsFile: string;
  framebuffer: string;
  latitude: number;
  longitude: number;
  transitApiBase: string;
  weatherApiUrl: string;
  /** NetworkManager connection to restart; looked up at startup when unset */
  wifiConnection?: string;
}

export const DEFAULT_CONFIG: BoardConfig = {
  timezone: "Europe/Berlin",
  stationsFile: "stations.json",
  framebuffer: "/dev/fb0",
  latitude: 52.5136,
  longitude: 13.3265,
  transitApiBase: "https://v6.bvg.transport.rest",
  weatherApiUrl: "https://api.open-meteo.com/v1/forecast",
};

/** Loop cadences, in milliseconds */
export const DEFAULT_TIMINGS = {
  /** Trips are polled on a fixed interval */
  tripsIntervalMs: 15_000,
  /** Delay between failed attempts for one station */
  tripsRetryMs: 5_000,
  /** The weather upstream refreshes every quarter hour */
  weatherRefreshMs: 15 * 60_000,
  /** Give the weather upstream a minute to publish */
  weatherOffsetMs: 60_000,
  weatherFallbackMs: 15 * 60_000,
  weatherRetryMs: 15_000,
  /** Longest pause between two renders */
  renderTimeoutMs: 15_000,
} as const;

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`[config] ${key}="${raw}" is not a number, using ${fallback}`);
    return fallback;
  }
  return value;
}

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function loadBoardConfig(env: NodeJS.ProcessEnv = process.env): BoardConfig {
  let timezone = env.BOARD_TIMEZONE || DEFAULT_CONFIG.timezone;
  if (!isValidTimezone(timezone)) {
    console.warn(`[config] Unknown timezone "${timezone}", using ${DEFAULT_CONFIG.timezone}`);
    timezone = DEFAULT_CONFIG.timezone;
  }

  return {
    timezone,
    stationsFile: env.BOARD_STATIONS_FILE || DEFAULT_CONFIG.stationsFile,
    framebuffer: env.BOARD_FRAMEBUFFER || DEFAULT_CONFIG.framebuffer,
    latitude: readNumber(env, "WEATHER_LATITUDE", DEFAULT_CONFIG.latitude),
    longitude: readNumber(env, "WEATHER_LONGITUDE", DEFAULT_CONFIG.longitude),
    transitApiBase: env.TRANSIT_API_BASE || DEFAULT_CONFIG.transitApiBase,
    weatherApiUrl: env.WEATHER_API_URL || DEFAULT_CONFIG.weatherApiUrl,
    wifiConnection: env.BOARD_WIFI_CONNECTION || undefined,
  };
}
