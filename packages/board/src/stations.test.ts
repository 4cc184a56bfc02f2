import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigLoadError } from "@departure-board/core";
import { DEFAULT_STATIONS, loadStations, parseStations } from "./stations";

describe("parseStations", () => {
  it("accepts stations with numeric or string ids", () => {
    const stations = parseStations({
      stations: [
        { name: " Alexanderplatz ", id: 900100003, categories: ["subway", "tram"] },
        { name: "Ostkreuz", id: "900120003", categories: ["suburban"] },
      ],
    });

    expect(stations).toEqual([
      { name: "Alexanderplatz", id: "900100003", categories: ["subway", "tram"] },
      { name: "Ostkreuz", id: "900120003", categories: ["suburban"] },
    ]);
  });

  it("rejects a config without a stations array", () => {
    expect(() => parseStations({ station: [] })).toThrow(
      'Config must be an object with a "stations" array'
    );
  });

  it("rejects an empty station list", () => {
    expect(() => parseStations({ stations: [] })).toThrow("Config lists no stations");
  });

  it("rejects unknown categories", () => {
    expect(() =>
      parseStations({ stations: [{ name: "Ostkreuz", id: "1", categories: ["suburban", "zeppelin"] }] })
    ).toThrow("stations[0].categories has unknown entries: zeppelin");
  });

  it("rejects a station without a name", () => {
    expect(() => parseStations({ stations: [{ id: "1", categories: ["bus"] }] })).toThrow(
      ConfigLoadError
    );
  });
});

describe("loadStations", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stations-"));
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("reads stations from a JSON file", () => {
    const path = join(dir, "stations.json");
    writeFileSync(
      path,
      JSON.stringify({ stations: [{ name: "Ostkreuz", id: "900120003", categories: ["suburban"] }] })
    );

    expect(loadStations(path)).toEqual([
      { name: "Ostkreuz", id: "900120003", categories: ["suburban"] },
    ]);
    expect(console.error).not.toHaveBeenCalled();
  });

  it("falls back to the default station when the file is missing", () => {
    expect(loadStations(join(dir, "missing.json"))).toEqual(DEFAULT_STATIONS);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("returns a copy of the default station", () => {
    const stations = loadStations(join(dir, "missing.json"));
    stations[0].categories.push("tram");
    stations.push({ name: "Ostkreuz", id: "900120003", categories: ["suburban"] });

    expect(DEFAULT_STATIONS).toEqual([
      { name: "Zoologischer Garten", id: "900023201", categories: ["bus"] },
    ]);
  });

  it("falls back to the default station on invalid JSON", () => {
    const path = join(dir, "stations.json");
    writeFileSync(path, "{ stations: ");

    expect(loadStations(path)).toEqual(DEFAULT_STATIONS);
  });

  it("falls back to the default station on an invalid entry", () => {
    const path = join(dir, "stations.json");
    writeFileSync(path, JSON.stringify({ stations: [{ name: "Ostkreuz", categories: ["bus"] }] }));

    expect(loadStations(path)).toEqual(DEFAULT_STATIONS);
    expect(console.error).toHaveBeenCalledWith(
      "[config] Failed to load stations, using default station Zoologischer Garten: stations[0].id must be a string or number"
    );
  });
});
