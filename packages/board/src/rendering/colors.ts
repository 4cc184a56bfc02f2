/**
 * Shared color definitions for board rendering
 */

import type { Departure, RGB } from "@departure-board/core";

export const COLORS = {
  // Header
  clockTime: { r: 255, g: 255, b: 255 },
  clockSecondary: { r: 100, g: 100, b: 100 },
  weather: { r: 0, g: 200, b: 255 },
  uv: { r: 255, g: 200, b: 0 },

  // Line badges
  suburban: { r: 64, g: 131, b: 53 },
  metroBus: { r: 233, g: 208, b: 33 },
  bus: { r: 160, g: 1, b: 121 },
  otherLine: { r: 128, g: 128, b: 128 },

  // Departure text
  destination: { r: 255, g: 255, b: 255 },
  onTime: { r: 255, g: 255, b: 255 },
  late: { r: 255, g: 0, b: 0 },
  early: { r: 255, g: 255, b: 0 },

  // Error screen
  error: { r: 255, g: 0, b: 0 },

  // Background
  bg: { r: 0, g: 0, b: 0 },
  separator: { r: 40, g: 40, b: 40 },
  badgeTextDark: { r: 0, g: 0, b: 0 },
  badgeTextLight: { r: 255, g: 255, b: 255 },
} as const satisfies Record<string, RGB>;

/**
 * Badge background and text color for a departure's line.
 * Metro buses (M-lines) get the yellow metro color.
 */
export function getLineColors(departure: Pick<Departure, "line" | "category">): {
  background: RGB;
  text: RGB;
} {
  if (departure.category === "suburban") {
    return { background: COLORS.suburban, text: COLORS.badgeTextLight };
  }
  if (departure.category === "bus" && departure.line.startsWith("M")) {
    return { background: COLORS.metroBus, text: COLORS.badgeTextDark };
  }
  if (departure.category === "bus") {
    return { background: COLORS.bus, text: COLORS.badgeTextLight };
  }
  return { background: COLORS.otherLine, text: COLORS.badgeTextLight };
}

/**
 * Departure time color: red when late, yellow when early
 */
export function getDelayColor(delayMinutes: number): RGB {
  if (delayMinutes > 0) return COLORS.late;
  if (delayMinutes < 0) return COLORS.early;
  return COLORS.onTime;
}
