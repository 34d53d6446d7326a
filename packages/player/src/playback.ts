/**
 * Playback setup: one frame rate paces the clock and sets the scene's
 * minimum tick, so scene time follows wall time.
 */

import { DEFAULT_FRAMERATE, SystemClock } from "@cuesheet/core";
import type { Actor, Clock, FrameSink, Scene } from "@cuesheet/core";
import type { PlayerConfig } from "./config.js";
import { ConsoleSink } from "./console-sink.js";
import { buildScene } from "./script/build-scene.js";
import type { SceneScript } from "./script/script-schema.js";

/** Overrides for {@link preparePlayback}, used by tests. */
export interface PlaybackOptions {
  /** Defaults to a SystemClock paced at the playback frame rate. */
  readonly clock?: Clock;
  /** Defaults to a ConsoleSink, or none when `config.quiet` is set. */
  readonly sink?: FrameSink;
}

/** Everything `runScene` and the CLI banner need. */
export interface Playback {
  readonly scene: Scene;
  readonly actors: ReadonlyMap<string, Actor>;
  readonly clock: Clock;
  /** Frames per second shared by the clock and the scene. */
  readonly framerate: number;
  /** Scene time (seconds) at which playback ends. */
  readonly until: number;
}

/** `--fps` / `CUESHEET_FPS`, then the script's own rate, then 60. */
export function playbackFramerate(script: SceneScript, config: PlayerConfig): number {
  return config.fps ?? script.framerate ?? DEFAULT_FRAMERATE;
}

export function preparePlayback(
  script: SceneScript,
  config: PlayerConfig,
  options: PlaybackOptions = {},
): Playback {
  const framerate = playbackFramerate(script, config);
  const clock = options.clock ?? new SystemClock(1000 / framerate);
  const sink = options.sink ?? (config.quiet ? undefined : new ConsoleSink({ every: config.every }));

  const { scene, actors } = buildScene({ ...script, framerate }, { clock, sink });
  return {
    scene,
    actors,
    clock,
    framerate: scene.framerate,
    until: config.until ?? scene.endTime,
  };
}
