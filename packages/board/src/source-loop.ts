/**
 * Producer loop for one source
 *
 * Each cycle: fetch until success, run the change detector against the
 * value currently held, publish and raise the update signal on a change,
 * then sleep as the schedule says.
 */

import type {
  CellWriter,
  ChangeDetector,
  UpdateSignal,
} from "@departure-board/core";
import type { DelayPolicy } from "./backoff";
import { fetchUntilSuccess } from "./retry";
import type { SchedulePolicy } from "./scheduler";
import { sleep as defaultSleep, type Sleep } from "./sleep";

export interface SourceLoopOptions<T> {
  source: string;
  /** One fetch attempt */
  fetch: () => Promise<T>;
  retryDelay: DelayPolicy;
  detector: ChangeDetector<T>;
  writer: CellWriter<T>;
  updates: UpdateSignal;
  schedule: SchedulePolicy<T>;
  sleep?: Sleep;
  now?: () => number;
  signal?: AbortSignal;
}

/**
 * One fetch-detect-publish pass. Returns the fetched value and whether it
 * was published.
 */
export async function runSourceCycle<T>(
  options: SourceLoopOptions<T>
): Promise<{ value: T; published: boolean }> {
  const { source, fetch, retryDelay, detector, writer, updates, signal } = options;

  const value = await fetchUntilSuccess(fetch, {
    source,
    delay: retryDelay,
    sleep: options.sleep,
    signal,
  });

  // Compare against what the board currently shows
  if (!detector.changed(writer.get(), value)) {
    return { value, published: false };
  }

  writer.set(value);
  updates.raise();
  console.log(`[${source}] Published new data`);
  return { value, published: true };
}

/**
 * Run cycles until the shutdown signal aborts. Never resolves otherwise.
 */
export async function runSourceLoop<T>(options: SourceLoopOptions<T>): Promise<never> {
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  for (;;) {
    const { value } = await runSourceCycle(options);
    // Schedule from the fetched value, published or not
    await sleep(options.schedule.nextDelay(value, now()), options.signal);
  }
}
