/**
 * CLI argument parsing for the cuesheet player.
 *
 * Supports:
 *   cuesheet scripts/relay.json
 *   cuesheet scripts/relay.json --fps 30 --every 5
 *   cuesheet --until 2.5 --quiet scripts/relay.json
 *   CUESHEET_FPS=24 cuesheet scripts/relay.json
 */

/** Parsed configuration for a player session. */
export interface PlayerConfig {
  /** Path of the scene script to play. */
  scriptPath: string | undefined;
  /**
   * Frame rate from `--fps` or `CUESHEET_FPS`. Overrides the script's
   * `framerate`; `undefined` when neither is given.
   */
  fps: number | undefined;
  /** Scene time (seconds) to stop at. Defaults to the scene's end time. */
  until: number | undefined;
  /** Print every n-th frame. */
  every: number;
  /** Print nothing but errors. */
  quiet: boolean;
}

/** A command-line value could not be used. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function positiveNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${flag} expects a positive number, got "${raw}"`);
  }
  return value;
}

function positiveInteger(flag: string, raw: string): number {
  const value = positiveNumber(flag, raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${flag} expects a whole number, got "${raw}"`);
  }
  return value;
}

/**
 * Parses process.argv into a PlayerConfig.
 *
 * @param argv - The full process.argv array
 * @param env - Environment variables (reads `CUESHEET_FPS`)
 * @throws ConfigError for malformed values or unknown flags.
 */
export function parseConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): PlayerConfig {
  const args = argv.slice(2); // skip node + script

  const envFps = env["CUESHEET_FPS"];
  let fps = envFps !== undefined ? positiveNumber("CUESHEET_FPS", envFps) : undefined;
  let scriptPath: string | undefined;
  let until: number | undefined;
  let every = 1;
  let quiet = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === undefined) {
      continue;
    }

    if (arg === "--quiet") {
      quiet = true;
    } else if (arg === "--fps" || arg === "--until" || arg === "--every") {
      if (next === undefined) {
        throw new ConfigError(`${arg} expects a value`);
      }
      if (arg === "--fps") {
        fps = positiveNumber(arg, next);
      } else if (arg === "--until") {
        until = positiveNumber(arg, next);
      } else {
        every = positiveInteger(arg, next);
      }
      i++;
    } else if (arg.startsWith("--")) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else {
      scriptPath = arg;
    }
  }

  return { scriptPath, fps, until, every, quiet };
}
