import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { RenderError, createSolidFrame, setPixel } from "@departure-board/core";
import { createConsoleSink, createFramebufferSink, frameToAscii } from "./sinks";

const BLACK = { r: 0, g: 0, b: 0 };
const WHITE = { r: 255, g: 255, b: 255 };

describe("frameToAscii", () => {
  it("maps brightness to characters and trims trailing blanks", () => {
    const frame = createSolidFrame(4, 2, BLACK);
    setPixel(frame, 0, 0, WHITE);
    setPixel(frame, 1, 0, { r: 120, g: 120, b: 120 });
    setPixel(frame, 1, 1, { r: 30, g: 30, b: 30 });

    expect(frameToAscii(frame)).toBe("@*\n .");
  });
});

describe("createConsoleSink", () => {
  it("writes the ASCII rendering", async () => {
    const write = vi.fn();
    const frame = createSolidFrame(2, 1, WHITE);

    await createConsoleSink(write)(frame);

    expect(write).toHaveBeenCalledWith("@@");
  });
});

describe("createFramebufferSink", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "fb-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the scaled frame as BGRA", async () => {
    const path = join(dir, "fb0");
    const frame = createSolidFrame(1, 1, { r: 10, g: 20, b: 30 });

    await createFramebufferSink(path, 2)(frame);

    const bytes = readFileSync(path);
    expect(bytes.length).toBe(2 * 2 * 4);
    expect([...bytes.subarray(0, 4)]).toEqual([30, 20, 10, 0]);
  });

  it("reports write failures as RenderError", async () => {
    const path = join(dir, "missing", "fb0");
    const frame = createSolidFrame(1, 1, BLACK);

    const error = await createFramebufferSink(path)(frame).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RenderError);
    expect(error).toMatchObject({
      message: expect.stringContaining(`Failed to write framebuffer ${path}: ENOENT`),
    });
  });
});
