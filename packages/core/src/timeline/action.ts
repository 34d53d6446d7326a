/**
 * Action — one timed unit of behavior on a timeline.
 */

import type { ActionKind } from "./action-kinds.js";
import { InvalidDurationError, UnknownKeyError } from "./errors.js";
import type { ActorState } from "./state.js";

/**
 * A queued action: a kind, a duration, a destination and the snapshot the
 * timeline held when the action was appended.
 *
 * The start snapshot never changes after construction, so `stateAfter` is a
 * pure function of elapsed time. `Infinity` is a valid duration: it is how
 * a timeline holds its final state past the end.
 *
 * @throws InvalidDurationError when `duration` is negative or NaN.
 */
export class Action<D = unknown> {
  readonly kind: ActionKind<D>;
  readonly duration: number;
  readonly destination: D;
  readonly startState: ActorState;

  constructor(kind: ActionKind<D>, duration: number, destination: D, startState: ActorState) {
    if (Number.isNaN(duration) || duration < 0) {
      throw new InvalidDurationError(duration);
    }
    this.kind = kind;
    this.duration = duration;
    this.destination = destination;
    this.startState = startState;
  }

  /** Name of the action's kind ("move", "stop", ...). */
  get type(): string {
    return this.kind.name;
  }

  /**
   * Snapshot after `elapsed` time into this action.
   * Values beyond the duration yield the final snapshot.
   */
  stateAfter(elapsed: number): ActorState {
    const clamped = Math.min(Math.max(elapsed, 0), this.duration);
    const fraction = this.duration > 0 ? clamped / this.duration : 1;

    const result = this.kind.stateAfter({
      start: this.startState,
      destination: this.destination,
      elapsed: clamped,
      duration: this.duration,
      fraction,
    });

    for (const key of Object.keys(this.startState.extra)) {
      if (!(key in result.extra)) {
        throw new UnknownKeyError(this.type, key);
      }
    }
    return result;
  }

  /** Snapshot at the end of this action. */
  get endState(): ActorState {
    return this.stateAfter(this.duration);
  }
}
