/**
 * @cuesheet/player — loads scene scripts and plays them in Node.js.
 */

export { parseConfig, ConfigError } from "./config.js";
export type { PlayerConfig } from "./config.js";

export { ConsoleSink, formatActorFrame } from "./console-sink.js";
export type { ConsoleSinkOptions } from "./console-sink.js";

export { preparePlayback, playbackFramerate } from "./playback.js";
export type { Playback, PlaybackOptions } from "./playback.js";

export { runScene } from "./scene-runner.js";
export type { RunHandle, RunOptions } from "./scene-runner.js";

export { buildScene, parseScript, ScriptError } from "./script/build-scene.js";
export type { BuildOptions, BuiltScene } from "./script/build-scene.js";
export {
  SceneScriptSchema,
  StepSchema,
  ActorSchema,
  PhaseSchema,
  PositionSchema,
  ColorSchema,
} from "./script/script-schema.js";
export type {
  SceneScript,
  ScriptActor,
  ScriptPhase,
  ScriptStep,
} from "./script/script-schema.js";
