/**
 * Board application
 *
 * Starts every loop once and keeps them for the process lifetime:
 * one producer per source (trips, weather), the minute ticker, the
 * connectivity watchdog and the render consumer. Only a render failure
 * or exhausted reconnection ends the board; both get a best-effort
 * error screen first.
 */

import {
  UpdateSignal,
  createSourceStore,
  departuresDetector,
  errorMessage,
  weatherDetector,
  type Departure,
  type Snapshot,
  type SourceValues,
  type Station,
  type WeatherReading,
} from "@departure-board/core";
import { fixedDelay } from "./backoff";
import { runClockTicker } from "./clock-ticker";
import { DEFAULT_TIMINGS, type BoardConfig } from "./config";
import { fetchAllStations } from "./fetchers/trips";
import { fetchWeather } from "./fetchers/weather";
import { renderBoard, renderErrorFrame } from "./rendering/board-renderer";
import type { FrameSink } from "./rendering/sinks";
import { runRenderLoop, type RenderFn } from "./render-loop";
import { fetchUntilSuccess } from "./retry";
import { anchoredInterval, fixedInterval } from "./scheduler";
import { runSourceLoop } from "./source-loop";
import { sleep as defaultSleep, isShutdown, type Sleep } from "./sleep";
import { ConnectivityWatchdog, type ConnectivityProbe } from "./watchdog";

export type BoardTimings = { [K in keyof typeof DEFAULT_TIMINGS]: number };

export interface BoardFetchers {
  trips: () => Promise<readonly Departure[]>;
  weather: () => Promise<WeatherReading>;
}

export interface BoardOptions {
  config: BoardConfig;
  stations: readonly Station[];
  sink: FrameSink;
  /** Connectivity probe; the watchdog is disabled without one */
  probe?: ConnectivityProbe;
  /** Process shutdown */
  signal?: AbortSignal;
  timings?: Partial<BoardTimings>;
  /** Replaces the HTTP fetchers */
  fetchers?: Partial<BoardFetchers>;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Single-attempt fetchers for the configured upstreams
 */
export function createFetchers(
  options: Pick<BoardOptions, "config" | "stations" | "fetchers" | "sleep">,
  timings: BoardTimings,
  signal?: AbortSignal
): BoardFetchers {
  const { config, stations } = options;
  return {
    trips:
      options.fetchers?.trips ??
      (() =>
        fetchAllStations(stations, {
          apiBase: config.transitApiBase,
          timezone: config.timezone,
          retryDelayMs: timings.tripsRetryMs,
          sleep: options.sleep,
          signal,
        })),
    weather:
      options.fetchers?.weather ??
      (() =>
        fetchWeather({
          apiUrl: config.weatherApiUrl,
          latitude: config.latitude,
          longitude: config.longitude,
          timezone: config.timezone,
        })),
  };
}

/**
 * Best-effort error screen; its own failure is only logged
 */
export async function showErrorScreen(sink: FrameSink, error: unknown): Promise<void> {
  try {
    await sink(renderErrorFrame(errorMessage(error)));
  } catch (screenError) {
    console.error("[board] Failed to show error screen:", errorMessage(screenError));
  }
}

/**
 * Run the board. Resolves on shutdown; rejects with the fatal error
 * (RenderError or ReconnectExhaustedError) after the error screen.
 * Settles only once every loop has stopped.
 */
export async function startBoard(options: BoardOptions): Promise<void> {
  const timings: BoardTimings = { ...DEFAULT_TIMINGS, ...options.timings };
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  // Aborted on external shutdown or when a loop fails fatally
  const controller = new AbortController();
  const stop = controller.signal;
  const external = options.signal;
  if (external?.aborted) return;
  external?.addEventListener("abort", () => controller.abort(external.reason), { once: true });

  const store = createSourceStore(now);
  // Raised up front so the first frame renders without waiting
  const updates = new UpdateSignal(true);
  const fetchers = createFetchers(options, timings, stop);

  const render: RenderFn = (snapshot) =>
    options.sink(renderBoard(snapshot, options.config.timezone));

  // Producers: one loop per source, each with its own schedule
  const loops: Promise<unknown>[] = [
    runSourceLoop({
      source: "trips",
      fetch: fetchers.trips,
      retryDelay: fixedDelay(timings.tripsRetryMs),
      detector: departuresDetector,
      writer: store.claimWriter("trips"),
      updates,
      schedule: fixedInterval(timings.tripsIntervalMs),
      sleep,
      now,
      signal: stop,
    }),
    runSourceLoop({
      source: "weather",
      fetch: fetchers.weather,
      retryDelay: fixedDelay(timings.weatherRetryMs),
      detector: weatherDetector,
      writer: store.claimWriter("weather"),
      updates,
      schedule: anchoredInterval<WeatherReading>({
        source: "weather",
        timestampOf: (reading) => reading.timestamp,
        refreshPeriodMs: timings.weatherRefreshMs,
        safetyOffsetMs: timings.weatherOffsetMs,
        fallbackMs: timings.weatherFallbackMs,
      }),
      sleep,
      now,
      signal: stop,
    }),
    runClockTicker({ updates, sleep, now, signal: stop }),
    // Consumer: the only place frames are drawn
    runRenderLoop({
      store,
      updates,
      render,
      waitTimeoutMs: timings.renderTimeoutMs,
      signal: stop,
    }),
  ];

  // Watchdog only when a connectivity probe was given
  if (options.probe) {
    const watchdog = new ConnectivityWatchdog({ probe: options.probe, sleep, signal: stop });
    loops.push(watchdog.run());
  }

  console.log(`[board] Started with ${options.stations.length} station(s)`);

  // First non-shutdown failure; later ones are only logged
  const outcome: { fatal?: { error: unknown } } = {};
  await Promise.race(
    loops.map((loop) =>
      loop.then(
        () => controller.abort(),
        (error: unknown) => {
          if (!isShutdown(error, stop)) {
            console.error("[board] Fatal error:", errorMessage(error));
            outcome.fatal ??= { error };
          }
          controller.abort();
        }
      )
    )
  );

  // Wait for every loop to stop; the error screen must be the last frame
  await Promise.allSettled(loops);

  const { fatal } = outcome;
  if (!fatal) {
    console.log("[board] Stopped");
    return;
  }

  await showErrorScreen(options.sink, fatal.error);
  throw fatal.error;
}

/**
 * Fetch each source once (retrying until success) and render one frame
 */
export async function renderSnapshotOnce(
  options: Pick<BoardOptions, "config" | "stations" | "sink" | "fetchers" | "sleep" | "signal" | "now">
): Promise<Snapshot<SourceValues>> {
  const timings: BoardTimings = { ...DEFAULT_TIMINGS };
  const fetchers = createFetchers(options, timings, options.signal);
  const retry = { sleep: options.sleep, signal: options.signal };

  const [trips, weather] = await Promise.all([
    fetchUntilSuccess(fetchers.trips, {
      source: "trips",
      delay: fixedDelay(timings.tripsRetryMs),
      ...retry,
    }),
    fetchUntilSuccess(fetchers.weather, {
      source: "weather",
      delay: fixedDelay(timings.weatherRetryMs),
      ...retry,
    }),
  ]);

  const store = createSourceStore(options.now);
  store.claimWriter("trips").set(trips);
  store.claimWriter("weather").set(weather);
  const snapshot = store.snapshot();

  await options.sink(renderBoard(snapshot, options.config.timezone));
  return snapshot;
}
