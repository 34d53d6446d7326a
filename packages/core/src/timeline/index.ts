/**
 * @cuesheet/core timeline module — public API exports.
 */

// Snapshots
export type { ActorState, Color, Position } from "./state.js";
export { DEFAULT_STATE, lerp, lerpColor, lerpPosition } from "./state.js";

// Actions
export type { ActionContext, ActionKind } from "./action-kinds.js";
export { move, rotate, recolor, stop } from "./action-kinds.js";
export { Action } from "./action.js";

// Timeline, actors, groups
export { Timeline } from "./timeline.js";
export type { ResolvedAction } from "./timeline.js";
export { Actor, resetActorIdCounter } from "./actor.js";
export type { ActorOptions } from "./actor.js";
export { ActorGroup } from "./actor-group.js";

// Scene
export { Scene, DEFAULT_GROUP, DEFAULT_FRAMERATE } from "./scene.js";
export type { SceneOptions } from "./scene.js";

// Clock
export type { Clock, CancelHandle, FrameCallback } from "./clock.js";
export { SystemClock, DEFAULT_FRAME_INTERVAL_MS } from "./system-clock.js";

// Sinks
export type { FrameSink, SceneFrame, ActorFrame } from "./frame-sink.js";

// Errors
export {
  TimelineError,
  InvalidDurationError,
  OutOfRangeQueryError,
  UnknownKeyError,
  InvalidFramerateError,
} from "./errors.js";
export type { TimelineErrorCode } from "./errors.js";

// Test utilities
export { TestClock } from "./test-clock.js";
export { RecordingSink } from "./recording-sink.js";
