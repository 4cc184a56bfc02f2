/**
 * Tests for text rendering utilities
 */

import { describe, it, expect } from "vitest";
import { createSolidFrame, getPixel } from "@departure-board/core";
import { centerX, drawText, measureText, truncateText } from "./text";

const BLACK = { r: 0, g: 0, b: 0 };
const RED = { r: 255, g: 0, b: 0 };

describe("measureText", () => {
  it("returns 0 for empty string", () => {
    expect(measureText("")).toBe(0);
  });

  it("returns correct width for single character", () => {
    // 3px width, no spacing needed
    expect(measureText("0")).toBe(3);
  });

  it("returns correct width for longer strings", () => {
    // "10:42" = 5 chars = 5*4 - 1 = 19px
    expect(measureText("10:42")).toBe(19);
  });

  it("counts ring symbols as one character", () => {
    expect(measureText("⟳ S")).toBe(11);
  });
});

describe("truncateText", () => {
  it("leaves text that fits", () => {
    expect(truncateText("S5", 20)).toBe("S5");
  });

  it("cuts and marks text that is too wide", () => {
    // "Hau.." = 5 chars = 19px
    expect(truncateText("Hauptbahnhof", 20)).toBe("Hau..");
  });

  it("drops trailing spaces before the marker", () => {
    expect(truncateText("S Westkreuz", 15)).toBe("S..");
  });
});

describe("centerX", () => {
  it("centers text within a span", () => {
    // (180 - 3) / 2 = 88.5 -> 88
    expect(centerX("A", 0, 180)).toBe(88);
    expect(centerX("S5", 2, 19)).toBe(2 + 6);
  });
});

describe("drawText", () => {
  it("draws glyph pixels from the top-left corner", () => {
    const frame = createSolidFrame(8, 6, BLACK);

    drawText(frame, "A", 1, 0, RED);

    // Top row of "A" is .#.
    expect(getPixel(frame, 1, 0)).toEqual(BLACK);
    expect(getPixel(frame, 2, 0)).toEqual(RED);
    // Middle row is ###
    expect(getPixel(frame, 1, 2)).toEqual(RED);
    expect(getPixel(frame, 3, 2)).toEqual(RED);
  });

  it("matches lowercase to uppercase glyphs", () => {
    const upper = createSolidFrame(4, 5, BLACK);
    const lower = createSolidFrame(4, 5, BLACK);

    drawText(upper, "A", 0, 0, RED);
    drawText(lower, "a", 0, 0, RED);

    expect(lower.pixels).toEqual(upper.pixels);
  });

  it("advances past characters without a glyph", () => {
    const frame = createSolidFrame(8, 5, BLACK);

    drawText(frame, "~A", 0, 0, RED);

    expect(getPixel(frame, 1, 0)).toEqual(BLACK);
    expect(getPixel(frame, 5, 0)).toEqual(RED);
  });
});
