/**
 * Board renderer - lays a snapshot out on a 180x180 frame
 *
 * Layout:
 * ┌──────────────────────────────────────────────┐
 * │ MON OCT 19                           10:42   │  rows  1-5   (date/time)
 * │ 12.3° UV 1.5         8.1°/14.9° MAX UV 2.4   │  rows  8-12  (weather)
 * │ ──────────────────────────────────────────── │  row  15     (separator)
 * │ [M41] Hauptbahnhof                 +2 10:02  │  rows 18-178 (18 departures, 9px each)
 * └──────────────────────────────────────────────┘
 *
 * The frame is scaled up by the sink to the panel's resolution.
 */

import {
  createSolidFrame,
  fillRect,
  type Departure,
  type Frame,
  type Snapshot,
  type SourceValues,
  type WeatherReading,
} from "@departure-board/core";
import { COLORS, getDelayColor, getLineColors } from "./colors";
import { CHAR_HEIGHT, centerX, drawText, measureText, truncateText } from "./text";

export const BOARD_WIDTH = 180;
export const BOARD_HEIGHT = 180;
export const MAX_ROWS = 18;

const MARGIN = 2;
const HEADER_Y = 1;
const WEATHER_Y = 8;
const SEPARATOR_Y = 15;
const ROWS_START_Y = 18;
const ROW_HEIGHT = 9;
const BADGE_WIDTH = 19;
const BADGE_HEIGHT = CHAR_HEIGHT + 2;
const DESTINATION_X = MARGIN + BADGE_WIDTH + 3;
const TIME_WIDTH = measureText("00:00");
const DELAY_WIDTH = measureText("+99");

/**
 * Date and time for the header, e.g. { date: "MON OCT 19", time: "10:42" }
 */
export function formatHeader(now: number, timezone: string): { date: string; time: string } {
  const date = new Intl.DateTimeFormat("en-US", {
    weekday: "short",
    month: "short",
    day: "numeric",
    timeZone: timezone,
  })
    .format(now)
    .replace(/,/g, "")
    .toUpperCase();

  const time = new Intl.DateTimeFormat("en-GB", {
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
    timeZone: timezone,
  }).format(now);

  return { date, time };
}

/**
 * Current and daily weather as two short strings
 */
export function formatWeather(weather: WeatherReading): { current: string; daily: string } {
  const fmt = (value: number) => value.toFixed(1);
  return {
    current: `${fmt(weather.temperature)}° UV ${fmt(weather.uvIndex)}`,
    daily: `${fmt(weather.temperatureDailyMin)}°/${fmt(weather.temperatureDailyMax)}° MAX UV ${fmt(weather.uvIndexDailyMax)}`,
  };
}

/**
 * Delay label: "" when on time, "+2" late, "-1" early
 */
export function formatDelay(delayMinutes: number): string {
  if (delayMinutes === 0) return "";
  return delayMinutes > 0 ? `+${delayMinutes}` : String(delayMinutes);
}

function renderHeader(frame: Frame, now: number, timezone: string): void {
  const { date, time } = formatHeader(now, timezone);
  drawText(frame, date, MARGIN, HEADER_Y, COLORS.clockSecondary);
  drawText(frame, time, BOARD_WIDTH - MARGIN - measureText(time), HEADER_Y, COLORS.clockTime);
}

function renderWeather(frame: Frame, weather: WeatherReading | undefined): void {
  if (!weather) {
    drawText(frame, "WEATHER --", MARGIN, WEATHER_Y, COLORS.clockSecondary);
    return;
  }
  const { current, daily } = formatWeather(weather);
  drawText(frame, current, MARGIN, WEATHER_Y, COLORS.weather);
  drawText(frame, daily, BOARD_WIDTH - MARGIN - measureText(daily), WEATHER_Y, COLORS.uv);
}

function renderDepartureRow(frame: Frame, departure: Departure, y: number): void {
  const { background, text } = getLineColors(departure);
  fillRect(frame, MARGIN, y, BADGE_WIDTH, BADGE_HEIGHT, background);
  const line = truncateText(departure.line, BADGE_WIDTH - 2);
  drawText(frame, line, centerX(line, MARGIN, BADGE_WIDTH), y + 1, text);

  const timeX = BOARD_WIDTH - MARGIN - TIME_WIDTH;
  const delayColor = getDelayColor(departure.delayMinutes);
  drawText(frame, departure.time, timeX, y + 1, delayColor);

  const delay = formatDelay(departure.delayMinutes);
  if (delay) {
    drawText(frame, delay, timeX - 3 - measureText(delay), y + 1, delayColor);
  }

  const destinationWidth = timeX - DELAY_WIDTH - 6 - DESTINATION_X;
  drawText(
    frame,
    truncateText(departure.destination, destinationWidth),
    DESTINATION_X,
    y + 1,
    COLORS.destination
  );
}

function renderDepartures(frame: Frame, trips: readonly Departure[] | undefined): void {
  if (!trips || trips.length === 0) {
    const text = "WAITING FOR DEPARTURES";
    drawText(frame, text, centerX(text, 0, BOARD_WIDTH), ROWS_START_Y + ROW_HEIGHT, COLORS.clockSecondary);
    return;
  }

  trips.slice(0, MAX_ROWS).forEach((departure, row) => {
    renderDepartureRow(frame, departure, ROWS_START_Y + row * ROW_HEIGHT);
  });
}

/**
 * Render a snapshot. The header shows the snapshot's capture time.
 */
export function renderBoard(snapshot: Snapshot<SourceValues>, timezone: string): Frame {
  const frame = createSolidFrame(BOARD_WIDTH, BOARD_HEIGHT, COLORS.bg);

  renderHeader(frame, snapshot.takenAt, timezone);
  renderWeather(frame, snapshot.weather);
  fillRect(frame, MARGIN, SEPARATOR_Y, BOARD_WIDTH - 2 * MARGIN, 1, COLORS.separator);
  renderDepartures(frame, snapshot.trips);

  return frame;
}

/**
 * Split text into lines of at most `maxChars` characters at word boundaries
 */
export function wrapText(text: string, maxChars: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter(Boolean)) {
    let rest = word;
    while (rest.length > maxChars) {
      if (current) {
        lines.push(current);
        current = "";
      }
      lines.push(rest.slice(0, maxChars));
      rest = rest.slice(maxChars);
    }
    if (!current) {
      current = rest;
    } else if (current.length + 1 + rest.length <= maxChars) {
      current += ` ${rest}`;
    } else {
      lines.push(current);
      current = rest;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/**
 * Last-resort screen shown before the process exits on a fatal error
 */
export function renderErrorFrame(message: string): Frame {
  const frame = createSolidFrame(BOARD_WIDTH, BOARD_HEIGHT, COLORS.bg);

  const title = "I DIED :(";
  drawText(frame, title, centerX(title, 0, BOARD_WIDTH), 60, COLORS.error);

  const maxChars = Math.floor((BOARD_WIDTH - 2 * MARGIN + 1) / 4);
  wrapText(message, maxChars)
    .slice(0, 10)
    .forEach((line, i) => {
      drawText(frame, line, MARGIN, 75 + i * ROW_HEIGHT, COLORS.clockTime);
    });

  return frame;
}
