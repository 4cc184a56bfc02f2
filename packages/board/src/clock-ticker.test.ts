import { describe, it, expect, vi } from "vitest";
import { UpdateSignal } from "@departure-board/core";
import { msUntilNextMinute, runClockTicker } from "./clock-ticker";
import type { Sleep } from "./sleep";

describe("msUntilNextMinute", () => {
  it("counts to the next minute boundary", () => {
    const tenPast = Date.UTC(2026, 9, 19, 10, 10, 0);
    expect(msUntilNextMinute(tenPast + 45_500)).toBe(14_500);
  });

  it("waits a full minute exactly on a boundary", () => {
    expect(msUntilNextMinute(Date.UTC(2026, 9, 19, 10, 10, 0))).toBe(60_000);
  });
});

describe("runClockTicker", () => {
  it("raises the update signal after each minute boundary", async () => {
    const controller = new AbortController();
    const shutdown = new Error("shutdown");
    const updates = new UpdateSignal();
    let clock = Date.UTC(2026, 9, 19, 10, 10, 20);
    const raisedBefore: boolean[] = [];

    const sleep = vi.fn<Sleep>(async (ms) => {
      raisedBefore.push(updates.drain());
      if (raisedBefore.length === 3) {
        controller.abort(shutdown);
        throw shutdown;
      }
      clock += ms;
    });

    await expect(
      runClockTicker({ updates, sleep, now: () => clock, signal: controller.signal })
    ).rejects.toBe(shutdown);

    expect(sleep.mock.calls.map((call) => call[0])).toEqual([40_000, 60_000, 60_000]);
    expect(raisedBefore).toEqual([false, true, true]);
  });
});
