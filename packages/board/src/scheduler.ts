/**
 * Fetch scheduling policies
 *
 * A policy decides how long a source loop sleeps after a completed
 * fetch-and-publish cycle.
 */

export interface SchedulePolicy<T> {
  /** Milliseconds to sleep before the next fetch. Always positive. */
  nextDelay(value: T, now: number): number;
}

/**
 * Sleep a constant duration after every cycle
 */
export function fixedInterval<T>(intervalMs: number): SchedulePolicy<T> {
  return {
    nextDelay: () => intervalMs,
  };
}

export interface AnchoredIntervalOptions<T> {
  /** Upstream freshness timestamp (ms) carried by the value */
  timestampOf: (value: T) => number;
  /** How often the upstream refreshes its data */
  refreshPeriodMs: number;
  /** Extra wait so the upstream has published before we ask */
  safetyOffsetMs: number;
  /** Used when the anchored time is unusable */
  fallbackMs: number;
  /** Name used in log lines */
  source?: string;
}

/**
 * Anchor the next fetch to the upstream's own refresh cycle:
 * `timestamp + refreshPeriod + safetyOffset`.
 *
 * A timestamp in the future, or an anchored time that is already due, is
 * logged and replaced by the fallback interval.
 */
export function anchoredInterval<T>(
  options: AnchoredIntervalOptions<T>
): SchedulePolicy<T> {
  const { timestampOf, refreshPeriodMs, safetyOffsetMs, fallbackMs } = options;
  const tag = `[${options.source ?? "schedule"}]`;

  return {
    nextDelay(value, now) {
      const timestamp = timestampOf(value);

      if (!Number.isFinite(timestamp)) {
        console.warn(`${tag} Invalid upstream timestamp, next fetch in ${fallbackMs}ms`);
        return fallbackMs;
      }

      if (timestamp > now) {
        console.warn(
          `${tag} Upstream timestamp ${new Date(timestamp).toISOString()} is in the future, next fetch in ${fallbackMs}ms`
        );
        return fallbackMs;
      }

      const next = timestamp + refreshPeriodMs + safetyOffsetMs;
      const delay = next - now;

      if (delay <= 0) {
        console.warn(
          `${tag} Upstream data from ${new Date(timestamp).toISOString()} is stale, next fetch in ${fallbackMs}ms`
        );
        return fallbackMs;
      }

      console.log(`${tag} Next fetch scheduled for ${new Date(next).toISOString()}`);
      return delay;
    },
  };
}
