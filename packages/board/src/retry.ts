/**
 * Retry-until-success wrapper around a single fetch attempt
 */

import { FetchError, errorMessage } from "@departure-board/core";
import type { DelayPolicy } from "./backoff";
import { sleep as defaultSleep, isShutdown, type Sleep } from "./sleep";

export interface RetryOptions {
  /** Name used in log lines */
  source: string;
  /** Delay before the next attempt, by 1-based attempt number */
  delay: DelayPolicy;
  sleep?: Sleep;
  /** Process shutdown; the only way out besides success */
  signal?: AbortSignal;
}

/**
 * Call `fetch` until it succeeds.
 *
 * No attempt limit. FetchErrors are logged as warnings; anything else is
 * logged as an error and retried too.
 */
export async function fetchUntilSuccess<T>(
  fetch: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { source, delay, signal } = options;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fetch();
    } catch (error) {
      if (isShutdown(error, signal)) throw error;

      const waitMs = delay(attempt);
      if (error instanceof FetchError) {
        console.warn(
          `[${source}] Fetch failed (attempt ${attempt}): ${error.message}. Retrying in ${waitMs}ms...`
        );
      } else {
        console.error(
          `[${source}] Unexpected fetch error (attempt ${attempt}): ${errorMessage(error)}. Retrying in ${waitMs}ms...`
        );
      }
      await sleep(waitMs, signal);
    }
  }
}
