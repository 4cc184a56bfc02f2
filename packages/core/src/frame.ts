/**
 * RGB frame buffer helpers
 *
 * Frames are rendered at a small logical resolution and scaled up by an
 * integer factor when written to the display. The Linux framebuffer of the
 * target panel expects 32-bit BGRA pixels.
 */

import type { Frame, RGB } from "./types";

/** Bytes per pixel (RGB) */
export const BYTES_PER_PIXEL = 3;

/**
 * Create an empty frame filled with a single color
 */
export function createSolidFrame(
  width: number,
  height: number,
  color: RGB = { r: 0, g: 0, b: 0 }
): Frame {
  const pixels = new Uint8Array(width * height * BYTES_PER_PIXEL);
  for (let i = 0; i < width * height; i++) {
    const offset = i * BYTES_PER_PIXEL;
    pixels[offset] = color.r;
    pixels[offset + 1] = color.g;
    pixels[offset + 2] = color.b;
  }
  return { width, height, pixels };
}

/**
 * Set a single pixel in a frame. Out-of-bounds coordinates are ignored.
 */
export function setPixel(frame: Frame, x: number, y: number, color: RGB): void {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return;
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  frame.pixels[offset] = color.r;
  frame.pixels[offset + 1] = color.g;
  frame.pixels[offset + 2] = color.b;
}

/**
 * Get a pixel color from a frame
 */
export function getPixel(frame: Frame, x: number, y: number): RGB | null {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return null;
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  return {
    r: frame.pixels[offset],
    g: frame.pixels[offset + 1],
    b: frame.pixels[offset + 2],
  };
}

/**
 * Fill an axis-aligned rectangle (inclusive of x/y, exclusive of x+width/y+height)
 */
export function fillRect(
  frame: Frame,
  x: number,
  y: number,
  width: number,
  height: number,
  color: RGB
): void {
  for (let row = y; row < y + height; row++) {
    for (let col = x; col < x + width; col++) {
      setPixel(frame, col, row, color);
    }
  }
}

/**
 * Nearest-neighbour upscale by an integer factor
 */
export function scaleFrame(frame: Frame, factor: number): Frame {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new Error(`Scale factor must be a positive integer, got ${factor}`);
  }
  if (factor === 1) return frame;

  const width = frame.width * factor;
  const height = frame.height * factor;
  const pixels = new Uint8Array(width * height * BYTES_PER_PIXEL);

  for (let y = 0; y < height; y++) {
    const srcRow = Math.floor(y / factor) * frame.width;
    for (let x = 0; x < width; x++) {
      const src = (srcRow + Math.floor(x / factor)) * BYTES_PER_PIXEL;
      const dst = (y * width + x) * BYTES_PER_PIXEL;
      pixels[dst] = frame.pixels[src];
      pixels[dst + 1] = frame.pixels[src + 1];
      pixels[dst + 2] = frame.pixels[src + 2];
    }
  }

  return { width, height, pixels };
}

/**
 * Convert RGB pixels to the BGRA byte order the framebuffer expects.
 * The alpha byte is left at zero.
 */
export function frameToBgra(frame: Frame): Uint8Array {
  const count = frame.width * frame.height;
  const out = new Uint8Array(count * 4);
  for (let i = 0; i < count; i++) {
    const src = i * BYTES_PER_PIXEL;
    const dst = i * 4;
    out[dst] = frame.pixels[src + 2];
    out[dst + 1] = frame.pixels[src + 1];
    out[dst + 2] = frame.pixels[src];
  }
  return out;
}
