/**
 * Connectivity watchdog
 *
 * Polls network reachability on its own cadence and, when the link is
 * down, runs a bounded reconnection procedure. Giving up is fatal.
 */

import { ReconnectExhaustedError, errorMessage } from "@departure-board/core";
import { createBackoffController, steppedDelay, type DelayPolicy } from "./backoff";
import { sleep as defaultSleep, isShutdown, type Sleep } from "./sleep";

export interface ConnectivityProbe {
  /** Called once before the grace period, while the link is presumed up */
  prepare?(): Promise<void>;
  isConnected(): Promise<boolean>;
  /** Attempt to bring the link back up; throws on failure */
  reconnect(): Promise<void>;
}

export type ConnectivityState = "connected" | "disconnected";

export interface WatchdogOptions {
  probe: ConnectivityProbe;
  /** Poll interval while connected (default: 30s) */
  pollIntervalMs?: number;
  /** Delay before the first probe (default: 60s) */
  initialDelayMs?: number;
  /** Delay between reconnection attempts (default: 10s, 60s after attempt 10) */
  retryDelay?: DelayPolicy;
  /** Failed attempts tolerated before giving up (default: 20) */
  maxAttempts?: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  onStateChange?: (state: ConnectivityState) => void;
}

export const DEFAULT_RECONNECT_DELAY = steppedDelay({
  delay: 10_000,
  escalatedDelay: 60_000,
  escalateAfter: 10,
});

export class ConnectivityWatchdog {
  private state: ConnectivityState = "connected";
  private readonly probe: ConnectivityProbe;
  private readonly pollIntervalMs: number;
  private readonly initialDelayMs: number;
  private readonly retryDelay: DelayPolicy;
  private readonly maxAttempts: number;
  private readonly sleep: Sleep;
  private readonly signal?: AbortSignal;
  private readonly onStateChange?: (state: ConnectivityState) => void;

  constructor(options: WatchdogOptions) {
    this.probe = options.probe;
    this.pollIntervalMs = options.pollIntervalMs ?? 30_000;
    this.initialDelayMs = options.initialDelayMs ?? 60_000;
    this.retryDelay = options.retryDelay ?? DEFAULT_RECONNECT_DELAY;
    this.maxAttempts = options.maxAttempts ?? 20;
    this.sleep = options.sleep ?? defaultSleep;
    this.signal = options.signal;
    this.onStateChange = options.onStateChange;
  }

  getState(): ConnectivityState {
    return this.state;
  }

  /**
   * Poll forever. Rejects with ReconnectExhaustedError when recovery gives up.
   */
  async run(): Promise<never> {
    await this.prepareProbe();
    // Give the network time to come up after boot
    await this.sleep(this.initialDelayMs, this.signal);

    for (;;) {
      if (!(await this.checkConnected())) {
        console.error("[network] Connection lost, attempting to reconnect...");
        this.setState("disconnected");
        await this.recover();
      }
      await this.sleep(this.pollIntervalMs, this.signal);
    }
  }

  /**
   * Reconnect, wait, re-probe; repeat until connected or out of attempts
   */
  async recover(): Promise<void> {
    const backoff = createBackoffController(this.retryDelay, this.maxAttempts);

    for (;;) {
      const { attempt, nextDelay, exhausted } = backoff.next();

      // Restart the link, then give it time before re-probing
      try {
        await this.probe.reconnect();
      } catch (error) {
        if (isShutdown(error, this.signal)) throw error;
        console.error(`[network] Reconnect attempt ${attempt} failed: ${errorMessage(error)}`);
      }

      await this.sleep(nextDelay, this.signal);

      // Re-probe after the delay
      if (await this.checkConnected()) {
        console.log(`[network] Connection re-established after ${attempt} attempt(s)`);
        this.setState("connected");
        return;
      }

      if (exhausted) {
        throw new ReconnectExhaustedError(attempt);
      }
    }
  }

  private async prepareProbe(): Promise<void> {
    if (!this.probe.prepare) return;
    try {
      await this.probe.prepare();
    } catch (error) {
      if (isShutdown(error, this.signal)) throw error;
      console.error(`[network] Connectivity probe setup failed: ${errorMessage(error)}`);
    }
  }

  private async checkConnected(): Promise<boolean> {
    try {
      return await this.probe.isConnected();
    } catch (error) {
      if (isShutdown(error, this.signal)) throw error;
      console.error(`[network] Connectivity probe failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private setState(state: ConnectivityState): void {
    if (this.state === state) return;
    this.state = state;
    this.onStateChange?.(state);
  }
}
