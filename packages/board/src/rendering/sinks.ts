/**
 * Frame sinks: where a rendered frame ends up
 */

import { writeFile } from "fs/promises";
import {
  RenderError,
  errorMessage,
  frameToBgra,
  scaleFrame,
  type Frame,
} from "@departure-board/core";

export type FrameSink = (frame: Frame) => Promise<void>;

/**
 * Write frames to a Linux framebuffer device as 32-bit BGRA,
 * upscaled to the panel resolution (180x180 x4 = 720x720)
 */
export function createFramebufferSink(path: string, scale = 4): FrameSink {
  return async (frame) => {
    const bytes = frameToBgra(scaleFrame(frame, scale));
    try {
      await writeFile(path, bytes);
    } catch (error) {
      throw new RenderError(`Failed to write framebuffer ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  };
}

/**
 * Convert a frame to ASCII art, one character per pixel by brightness
 */
export function frameToAscii(frame: Frame): string {
  const lines: string[] = [];

  for (let y = 0; y < frame.height; y++) {
    let line = "";
    for (let x = 0; x < frame.width; x++) {
      const idx = (y * frame.width + x) * 3;
      const brightness = (frame.pixels[idx] + frame.pixels[idx + 1] + frame.pixels[idx + 2]) / 3;

      if (brightness < 5) line += " ";
      else if (brightness < 50) line += ".";
      else if (brightness < 100) line += "+";
      else if (brightness < 150) line += "*";
      else if (brightness < 200) line += "#";
      else line += "@";
    }
    lines.push(line.trimEnd());
  }

  return lines.join("\n");
}

/**
 * Print frames to stdout, for development without a framebuffer
 */
export function createConsoleSink(write: (text: string) => void = console.log): FrameSink {
  return async (frame) => {
    write(frameToAscii(frame));
  };
}
