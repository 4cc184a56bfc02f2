import { describe, it, expect } from "vitest";
import {
  createSolidFrame,
  fillRect,
  frameToBgra,
  getPixel,
  scaleFrame,
  setPixel,
} from "./frame";

describe("createSolidFrame", () => {
  it("fills every pixel with the color", () => {
    const frame = createSolidFrame(2, 2, { r: 1, g: 2, b: 3 });
    expect(Array.from(frame.pixels)).toEqual([1, 2, 3, 1, 2, 3, 1, 2, 3, 1, 2, 3]);
  });
});

describe("setPixel / getPixel", () => {
  it("round-trips a color", () => {
    const frame = createSolidFrame(4, 4);
    setPixel(frame, 2, 1, { r: 255, g: 0, b: 10 });
    expect(getPixel(frame, 2, 1)).toEqual({ r: 255, g: 0, b: 10 });
  });

  it("ignores out-of-bounds writes", () => {
    const frame = createSolidFrame(2, 2);
    setPixel(frame, 5, 0, { r: 255, g: 255, b: 255 });
    expect(frame.pixels.every((v) => v === 0)).toBe(true);
    expect(getPixel(frame, -1, 0)).toBeNull();
  });
});

describe("fillRect", () => {
  it("fills only the rectangle", () => {
    const frame = createSolidFrame(4, 4);
    fillRect(frame, 1, 1, 2, 2, { r: 9, g: 9, b: 9 });
    expect(getPixel(frame, 1, 1)).toEqual({ r: 9, g: 9, b: 9 });
    expect(getPixel(frame, 2, 2)).toEqual({ r: 9, g: 9, b: 9 });
    expect(getPixel(frame, 3, 3)).toEqual({ r: 0, g: 0, b: 0 });
    expect(getPixel(frame, 0, 1)).toEqual({ r: 0, g: 0, b: 0 });
  });
});

describe("scaleFrame", () => {
  it("repeats each pixel factor x factor times", () => {
    const frame = createSolidFrame(2, 1);
    setPixel(frame, 1, 0, { r: 200, g: 100, b: 50 });

    const scaled = scaleFrame(frame, 2);

    expect(scaled.width).toBe(4);
    expect(scaled.height).toBe(2);
    expect(getPixel(scaled, 0, 1)).toEqual({ r: 0, g: 0, b: 0 });
    expect(getPixel(scaled, 2, 0)).toEqual({ r: 200, g: 100, b: 50 });
    expect(getPixel(scaled, 3, 1)).toEqual({ r: 200, g: 100, b: 50 });
  });

  it("rejects non-integer factors", () => {
    expect(() => scaleFrame(createSolidFrame(1, 1), 1.5)).toThrow(
      "Scale factor must be a positive integer, got 1.5"
    );
  });
});

describe("frameToBgra", () => {
  it("swaps red and blue and adds a zero alpha byte", () => {
    const frame = createSolidFrame(1, 1, { r: 10, g: 20, b: 30 });
    expect(Array.from(frameToBgra(frame))).toEqual([30, 20, 10, 0]);
  });
});
