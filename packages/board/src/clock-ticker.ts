/**
 * Minute ticker
 * Raises the update signal at every wall-clock minute boundary so the
 * board's clock changes as soon as the minute does.
 */

import type { UpdateSignal } from "@departure-board/core";
import { sleep as defaultSleep, type Sleep } from "./sleep";

const MINUTE_MS = 60 * 1000;

/**
 * Milliseconds from `now` until the start of the next minute
 */
export function msUntilNextMinute(now: number): number {
  return MINUTE_MS - (now % MINUTE_MS);
}

export async function runClockTicker(options: {
  updates: UpdateSignal;
  sleep?: Sleep;
  now?: () => number;
  signal?: AbortSignal;
}): Promise<never> {
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  for (;;) {
    await sleep(msUntilNextMinute(now()), options.signal);
    options.updates.raise();
  }
}
