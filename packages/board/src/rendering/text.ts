/**
 * Text rendering with the compact 3x5 bitmap font
 * Glyphs are looked up case-insensitively; unknown characters render as blanks.
 */

import type { Frame, RGB } from "@departure-board/core";
import { setPixel } from "@departure-board/core";
import font from "./tiny-font.json";

export const CHAR_WIDTH = font.width;
export const CHAR_HEIGHT = font.height;
/** Horizontal advance per character (glyph plus 1px spacing) */
export const CHAR_ADVANCE = CHAR_WIDTH + 1;

const GLYPHS: Record<string, number[] | undefined> = font.glyphs;

function glyphFor(char: string): number[] | undefined {
  return GLYPHS[char] ?? GLYPHS[char.toUpperCase()];
}

/**
 * Draw text with its top-left corner at (startX, startY)
 */
export function drawText(
  frame: Frame,
  text: string,
  startX: number,
  startY: number,
  color: RGB
): void {
  let cursorX = startX;

  for (const char of text) {
    const bitmap = glyphFor(char);
    if (bitmap) {
      for (let row = 0; row < CHAR_HEIGHT; row++) {
        for (let col = 0; col < CHAR_WIDTH; col++) {
          const bit = (bitmap[row] >> (CHAR_WIDTH - 1 - col)) & 1;
          if (bit) {
            setPixel(frame, cursorX + col, startY + row, color);
          }
        }
      }
    }
    // Always advance, even for missing characters
    cursorX += CHAR_ADVANCE;
  }
}

/**
 * Pixel width of a string (no trailing spacing)
 */
export function measureText(text: string): number {
  const length = [...text].length;
  if (length === 0) return 0;
  return length * CHAR_ADVANCE - 1;
}

/**
 * Shorten text to fit `maxWidth` pixels, marking the cut with ".."
 */
export function truncateText(text: string, maxWidth: number): string {
  if (measureText(text) <= maxWidth) return text;

  const chars = [...text];
  while (chars.length > 0 && measureText(chars.join("") + "..") > maxWidth) {
    chars.pop();
  }
  return chars.length > 0 ? chars.join("").trimEnd() + ".." : "";
}

/**
 * X position that centers text within [startX, startX + width)
 */
export function centerX(text: string, startX: number, width: number): number {
  return startX + Math.floor((width - measureText(text)) / 2);
}
