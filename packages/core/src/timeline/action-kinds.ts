/**
 * Action kinds — the behaviors an action can have.
 *
 * A kind maps a start snapshot, a destination and the elapsed time to a new
 * snapshot. Kinds are stateless: the same context always yields the same
 * snapshot, which is what lets a timeline answer queries at any time without
 * replaying earlier frames.
 *
 * The built-in kinds cover position, rotation and color. Any object
 * implementing {@link ActionKind} can be queued the same way.
 */

import { lerp, lerpColor, lerpPosition } from "./state.js";
import type { ActorState, Color, Position } from "./state.js";

/** Everything a kind needs to compute a snapshot. */
export interface ActionContext<D> {
  /** Snapshot captured when the action was queued. */
  readonly start: ActorState;
  /** Kind-specific target value. */
  readonly destination: D;
  /** Time into the action, already clamped to [0, duration]. */
  readonly elapsed: number;
  /** Total duration of the action. */
  readonly duration: number;
  /** `elapsed / duration`, or 1 for a zero-duration action. */
  readonly fraction: number;
}

/**
 * The capability every action kind implements.
 *
 * Custom kinds must return a full snapshot. Keys under `start.extra` must
 * survive into the result; add new ones freely.
 *
 * @example
 * ```ts
 * const pulse: ActionKind<number> = {
 *   name: "pulse",
 *   stateAfter: ({ start, destination, fraction }) => ({
 *     ...start,
 *     extra: { ...start.extra, scale: 1 + destination * fraction },
 *   }),
 * };
 * actor.act(pulse, 0.5, 2);
 * ```
 */
export interface ActionKind<D> {
  /** Reported as `Action.type`. */
  readonly name: string;
  stateAfter(context: ActionContext<D>): ActorState;
}

/** Moves linearly from the start position to the destination. */
export const move: ActionKind<Position> = {
  name: "move",
  stateAfter: ({ start, destination, fraction }) => ({
    ...start,
    position: lerpPosition(start.position, destination, fraction),
  }),
};

/** Rotates linearly from the start angle to the destination angle. */
export const rotate: ActionKind<number> = {
  name: "rotate",
  stateAfter: ({ start, destination, fraction }) => ({
    ...start,
    angle: lerp(start.angle, destination, fraction),
  }),
};

/** Fades linearly from the start color to the destination color. */
export const recolor: ActionKind<Color> = {
  name: "recolor",
  stateAfter: ({ start, destination, fraction }) => ({
    ...start,
    color: lerpColor(start.color, destination, fraction),
  }),
};

/**
 * Holds the start snapshot for the whole duration.
 * Also the implicit behavior past the end of every timeline.
 */
export const stop: ActionKind<undefined> = {
  name: "stop",
  stateAfter: ({ start }) => start,
};
