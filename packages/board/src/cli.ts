#!/usr/bin/env tsx
/**
 * Departure Board CLI
 */

import { existsSync } from "fs";
import { program } from "commander";
import { config as loadEnv } from "dotenv";
import { errorMessage } from "@departure-board/core";
import { renderSnapshotOnce, startBoard } from "./app";
import { loadBoardConfig, type BoardConfig } from "./config";
import { NmcliConnectivity, runCommand } from "./network/nmcli";
import { createConsoleSink, createFramebufferSink, type FrameSink } from "./rendering/sinks";
import { loadStations } from "./stations";

loadEnv();

interface RunOptions {
  ascii?: boolean;
  watchdog: boolean;
  stations?: string;
  framebuffer?: string;
}

interface OnceOptions {
  stations?: string;
}

/**
 * Framebuffer if present, otherwise print frames to the console
 */
function chooseSink(config: BoardConfig, ascii: boolean | undefined): FrameSink {
  if (ascii) {
    return createConsoleSink();
  }
  if (!existsSync(config.framebuffer)) {
    console.log(`No framebuffer ${config.framebuffer} detected, printing frames to the console`);
    return createConsoleSink();
  }
  console.log(`Framebuffer ${config.framebuffer} found`);
  return createFramebufferSink(config.framebuffer);
}

/**
 * Abort on SIGINT/SIGTERM
 */
function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    console.log(`\nReceived ${signal}, stopping...`);
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  return controller.signal;
}

program
  .name("departure-board")
  .description("Show transit departures and weather on a framebuffer display")
  .version("0.1.0");

program
  .command("run", { isDefault: true })
  .description("Run the board until interrupted")
  .option("--ascii", "Print frames to the console instead of the framebuffer")
  .option("--no-watchdog", "Disable the wifi connectivity watchdog")
  .option("--stations <file>", "Stations JSON file")
  .option("--framebuffer <path>", "Framebuffer device")
  .action(async (options: RunOptions) => {
    const config = loadBoardConfig();
    if (options.stations) config.stationsFile = options.stations;
    if (options.framebuffer) config.framebuffer = options.framebuffer;

    const stations = loadStations(config.stationsFile);
    console.log("Starting departure board...");
    console.log(`  Stations: ${stations.map((s) => s.name).join(", ")}`);
    console.log(`  Timezone: ${config.timezone}`);
    console.log(`  Watchdog: ${options.watchdog ? "on" : "off"}`);
    console.log();

    try {
      await startBoard({
        config,
        stations,
        sink: chooseSink(config, options.ascii),
        probe: options.watchdog
          ? new NmcliConnectivity(runCommand, config.wifiConnection)
          : undefined,
        signal: shutdownSignal(),
      });
      process.exit(0);
    } catch (error) {
      console.error("Board stopped:", errorMessage(error));
      process.exit(1);
    }
  });

program
  .command("once")
  .description("Fetch every source once and print the board")
  .option("--stations <file>", "Stations JSON file")
  .action(async (options: OnceOptions) => {
    const config = loadBoardConfig();
    const stations = loadStations(options.stations ?? config.stationsFile);

    try {
      await renderSnapshotOnce({
        config,
        stations,
        sink: createConsoleSink(),
        signal: shutdownSignal(),
      });
    } catch (error) {
      console.error("Snapshot failed:", errorMessage(error));
      process.exit(1);
    }
  });

program
  .command("stations")
  .description("Show the configured stations")
  .option("--stations <file>", "Stations JSON file")
  .action((options: OnceOptions) => {
    const config = loadBoardConfig();
    const stations = loadStations(options.stations ?? config.stationsFile);
    stations.forEach((s) => console.log(`  - ${s.name} (${s.id}): ${s.categories.join(", ")}`));
  });

await program.parseAsync();
