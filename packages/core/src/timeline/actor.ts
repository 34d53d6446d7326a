/**
 * Actor — a visual entity with live state and a timeline of actions.
 */

import type { Action } from "./action.js";
import { stop } from "./action-kinds.js";
import type { ActionKind } from "./action-kinds.js";
import { DEFAULT_STATE } from "./state.js";
import type { ActorState, Color, Position } from "./state.js";
import { Timeline } from "./timeline.js";

/** Internal counter for generating actor IDs. */
let actorIdCounter = 0;

function nextActorId(): string {
  return `actor-${++actorIdCounter}`;
}

/**
 * Reset the actor ID counter.
 * Only for tests — ensures deterministic IDs.
 */
export function resetActorIdCounter(): void {
  actorIdCounter = 0;
}

/** Options for creating an Actor. Omitted fields take {@link DEFAULT_STATE} values. */
export interface ActorOptions {
  /** Identifier reported to frame sinks. Defaults to `actor-<n>`. */
  readonly id?: string;
  readonly position?: Position;
  readonly color?: Color;
  readonly angle?: number;
}

/**
 * An entity whose visible state follows its timeline.
 *
 * Queue actions with `act`, then call `update(t)` with an absolute time to
 * move the live state to whatever the timeline says at `t`. Updates can go
 * backwards or repeat: the live state only depends on `t`.
 *
 * @example
 * ```ts
 * const actor = new Actor();
 * actor.act(move, 2, { x: 100, y: 200 });
 * actor.update(1);
 * actor.position; // { x: 50, y: 100 }
 * ```
 */
export class Actor {
  readonly id: string;
  readonly timeline: Timeline;
  private live: ActorState;
  private currentTime = 0;

  constructor(options: ActorOptions = {}) {
    this.id = options.id ?? nextActorId();
    this.live = {
      ...DEFAULT_STATE,
      position: options.position ?? DEFAULT_STATE.position,
      color: options.color ?? DEFAULT_STATE.color,
      angle: options.angle ?? DEFAULT_STATE.angle,
    };
    this.timeline = new Timeline(() => this.live);
  }

  /** Absolute time of the last `update`. */
  get time(): number {
    return this.currentTime;
  }

  /** Current live snapshot — what a renderer draws. */
  get state(): ActorState {
    return this.live;
  }

  get position(): Position {
    return this.live.position;
  }

  set position(position: Position) {
    this.live = { ...this.live, position };
  }

  get color(): Color {
    return this.live.color;
  }

  set color(color: Color) {
    this.live = { ...this.live, color };
  }

  get angle(): number {
    return this.live.angle;
  }

  set angle(angle: number) {
    this.live = { ...this.live, angle };
  }

  /** Total duration of the queued actions. */
  get endTime(): number {
    return this.timeline.endTime;
  }

  /**
   * Queue an action at the end of the timeline.
   * Does not advance time.
   *
   * @throws InvalidDurationError when `duration` is negative or not finite.
   */
  act<D>(kind: ActionKind<D>, duration: number, destination: D): Action<D> {
    return this.timeline.append(kind, duration, destination);
  }

  /** Queue a stop: hold the current end state for `duration`. */
  pause(duration: number): Action<undefined> {
    return this.timeline.append(stop, duration, undefined);
  }

  /** Move the live state to the timeline's state at absolute time `t`. */
  update(t: number): void {
    const next = this.timeline.stateAt(t);
    this.currentTime = t;
    this.live = next;
  }

  /** Snapshot at absolute time `t`, without touching the live state. */
  stateAt(t: number): ActorState {
    return this.timeline.stateAt(t);
  }

  /** The action covering absolute time `t`. */
  actionAt(t: number): Action {
    return this.timeline.actionAt(t);
  }
}
