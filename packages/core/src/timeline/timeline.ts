/**
 * Timeline — an actor's ordered, append-only sequence of actions.
 *
 * Actions sit back to back with no gaps: the k-th action starts at the sum
 * of the durations before it. Resolving an absolute time uses half-open
 * intervals `[start, start + duration)`, so at a boundary shared by two
 * actions the one that begins there wins, and zero-duration actions are
 * never resolved (their end state still becomes the next start state).
 */

import { Action } from "./action.js";
import { stop } from "./action-kinds.js";
import type { ActionKind } from "./action-kinds.js";
import { InvalidDurationError, OutOfRangeQueryError } from "./errors.js";
import type { ActorState } from "./state.js";

/** Result of {@link Timeline.resolve}. */
export interface ResolvedAction {
  /** The action covering the queried time. */
  readonly action: Action;
  /** Index in the timeline, or -1 for the terminal stop past the end. */
  readonly index: number;
  /** Absolute time at which the action starts. */
  readonly start: number;
  /** Time into the action (`t - start`). */
  readonly elapsed: number;
}

/**
 * The action sequence owned by one actor.
 *
 * `baseline` supplies the owner's live state. It is the start snapshot of
 * the first appended action and the state of an empty timeline.
 */
export class Timeline implements Iterable<Action> {
  private readonly actions: Action[] = [];
  private readonly starts: number[] = [];
  private readonly baseline: () => ActorState;
  private total = 0;

  constructor(baseline: () => ActorState) {
    this.baseline = baseline;
  }

  /** Sum of all action durations. */
  get endTime(): number {
    return this.total;
  }

  /** Number of stored actions (the terminal stop is not stored). */
  get length(): number {
    return this.actions.length;
  }

  /** The action at `index`, or `undefined` when out of bounds. */
  at(index: number): Action | undefined {
    return this.actions[index];
  }

  /** Absolute start time of the action at `index`. */
  startOf(index: number): number | undefined {
    return this.starts[index];
  }

  [Symbol.iterator](): Iterator<Action> {
    return this.actions[Symbol.iterator]();
  }

  /** Snapshot at `endTime`: where the next appended action starts from. */
  get finalState(): ActorState {
    const last = this.actions[this.actions.length - 1];
    return last ? last.endState : this.baseline();
  }

  /**
   * Append an action. Its start snapshot is the state at the current end
   * of the timeline.
   *
   * @throws InvalidDurationError when `duration` is negative or not finite.
   */
  append<D>(kind: ActionKind<D>, duration: number, destination: D): Action<D> {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new InvalidDurationError(duration);
    }
    const action = new Action(kind, duration, destination, this.finalState);
    this.actions.push(action);
    this.starts.push(this.total);
    this.total += duration;
    return action;
  }

  /**
   * Pad the timeline with a stop so that it ends exactly at `time`.
   * Does nothing when the timeline already ends at or after `time`.
   */
  extendTo(time: number): void {
    if (time <= this.total) {
      return;
    }
    this.append(stop, time - this.total, undefined);
    // The float sum can land an ulp away from `time`; callers rely on equality.
    this.total = time;
  }

  /**
   * Find the action covering absolute time `t`.
   *
   * @throws OutOfRangeQueryError when `t` is negative or NaN.
   */
  resolve(t: number): ResolvedAction {
    if (Number.isNaN(t) || t < 0) {
      throw new OutOfRangeQueryError(t);
    }

    if (t >= this.total) {
      const terminal = new Action(stop, Infinity, undefined, this.finalState);
      return { action: terminal, index: -1, start: this.total, elapsed: t - this.total };
    }

    // Last action starting at or before t. Zero-duration actions share their
    // start with the next one, which sorts after them and wins.
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if ((this.starts[mid] ?? Infinity) <= t) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    const action = this.actions[low];
    const start = this.starts[low];
    if (!action || start === undefined) {
      throw new OutOfRangeQueryError(t);
    }
    return { action, index: low, start, elapsed: t - start };
  }

  /** The action covering absolute time `t`. */
  actionAt(t: number): Action {
    return this.resolve(t).action;
  }

  /** Snapshot at absolute time `t`. Pure: never mutates the timeline. */
  stateAt(t: number): ActorState {
    const { action, elapsed } = this.resolve(t);
    return action.stateAfter(elapsed);
  }
}
