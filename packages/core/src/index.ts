/**
 * @cuesheet/core — action timelines and scene clock for animated actors.
 *
 * Zero external dependencies. Framework-agnostic.
 * Runs in browser and Node.js environments.
 */

export {
  Action,
  Actor,
  ActorGroup,
  Scene,
  Timeline,
  TestClock,
  SystemClock,
  RecordingSink,
  resetActorIdCounter,
  move,
  rotate,
  recolor,
  stop,
  lerp,
  lerpColor,
  lerpPosition,
  DEFAULT_STATE,
  DEFAULT_GROUP,
  DEFAULT_FRAMERATE,
  DEFAULT_FRAME_INTERVAL_MS,
  TimelineError,
  InvalidDurationError,
  OutOfRangeQueryError,
  UnknownKeyError,
  InvalidFramerateError,
} from "./timeline/index.js";

export type {
  ActionContext,
  ActionKind,
  ActorFrame,
  ActorOptions,
  ActorState,
  CancelHandle,
  Clock,
  Color,
  FrameCallback,
  FrameSink,
  Position,
  ResolvedAction,
  SceneFrame,
  SceneOptions,
  TimelineErrorCode,
} from "./timeline/index.js";
