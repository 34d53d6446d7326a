#!/usr/bin/env node
/**
 * CLI entry point for the cuesheet player.
 *
 * Usage:
 *   npm run play -- packages/player/scripts/relay.json
 *   npm run play -- packages/player/scripts/relay.json --fps 30 --every 10
 */

import { readFile } from "node:fs/promises";
import { ConfigError, parseConfig } from "./config.js";
import { preparePlayback } from "./playback.js";
import { runScene } from "./scene-runner.js";
import { parseScript } from "./script/build-scene.js";

const USAGE = "Usage: cuesheet <script.json> [--fps <n>] [--until <seconds>] [--every <n>] [--quiet]";

async function main(): Promise<void> {
  const config = parseConfig(process.argv, process.env);
  if (config.scriptPath === undefined) {
    throw new ConfigError(USAGE);
  }

  const text = await readFile(config.scriptPath, "utf-8");
  const script = parseScript(JSON.parse(text));

  const { scene, actors, clock, framerate, until } = preparePlayback(script, config);

  if (!config.quiet) {
    console.log(`cuesheet player`);
    console.log(`  script:   ${config.scriptPath}`);
    console.log(`  actors:   ${[...actors.keys()].join(", ")}`);
    console.log(`  phases:   ${script.phases.length}`);
    console.log(`  duration: ${until.toFixed(2)}s at ${framerate} fps`);
    console.log(``);
  }

  const handle = runScene(scene, clock, { until });
  process.on("SIGINT", () => {
    console.log("\nStopping...");
    handle.stop();
  });

  const frames = await handle.done;
  if (!config.quiet) {
    console.log(`\nPlayed ${frames} frames, scene time ${scene.time.toFixed(2)}s`);
  }
}

main().catch((error: unknown) => {
  process.stderr.write(
    `[cuesheet] ${error instanceof Error ? error.message : String(error)}\n`,
  );
  process.exit(1);
});
