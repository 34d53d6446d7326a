/**
 * Frame sink — the boundary between a scene and whatever draws it.
 *
 * The scene pushes one frame per `update()`. A renderer implements
 * FrameSink and draws each actor from its snapshot; the scene never knows
 * what rendering library is used.
 */

import type { ActorState } from "./state.js";

/** One actor's state in a frame. */
export interface ActorFrame {
  readonly id: string;
  readonly state: ActorState;
}

/** Everything a renderer needs to draw one tick of a scene. */
export interface SceneFrame {
  /** Scene time in seconds. */
  readonly time: number;
  readonly width: number;
  readonly height: number;
  /** Every distinct actor in the scene, in group registration order. */
  readonly actors: readonly ActorFrame[];
}

/** The interface a renderer implements to receive scene frames. */
export interface FrameSink {
  onFrame(frame: SceneFrame): void;
}
