/**
 * Scene — owns the global clock and the actor groups.
 *
 * Each `update()` advances scene time and pushes it into every actor.
 * `sync()` pads shorter timelines so that actions queued next on every
 * actor start, and finish, together.
 */

import type { Actor } from "./actor.js";
import { ActorGroup } from "./actor-group.js";
import type { Clock } from "./clock.js";
import { InvalidFramerateError } from "./errors.js";
import type { FrameSink } from "./frame-sink.js";
import { SystemClock } from "./system-clock.js";

/** Name of the group actors join when none is given. */
export const DEFAULT_GROUP = "default";

/** Frame-rate target of a new scene. */
export const DEFAULT_FRAMERATE = 60;

/** Options for creating a Scene. */
export interface SceneOptions {
  /** Scene width, passed through to the sink. */
  readonly width: number;
  /** Scene height, passed through to the sink. */
  readonly height: number;
  /** Frame-rate target; sets the minimum tick. Defaults to 60. */
  readonly framerate?: number;
  /** Time source. Defaults to a {@link SystemClock}. */
  readonly clock?: Clock;
  /** Receives a frame after every `update()`. */
  readonly sink?: FrameSink;
}

/**
 * A set of named actor groups driven by one clock.
 *
 * @example
 * ```ts
 * const scene = new Scene({ width: 600, height: 400 });
 * scene.addActors([walker, spinner]);
 * scene.sync();
 * walker.act(move, 1, { x: 10, y: 0 });
 * spinner.act(rotate, 1, 90);
 * // both actions now start at the same scene time
 * ```
 */
export class Scene {
  readonly width: number;
  readonly height: number;
  private readonly clock: Clock;
  private readonly sink: FrameSink | undefined;
  private readonly groupMap = new Map<string, ActorGroup>();
  private fps: number = DEFAULT_FRAMERATE;
  private currentTime = 0;
  private lastTick: number;

  constructor(options: SceneOptions) {
    this.width = options.width;
    this.height = options.height;
    this.clock = options.clock ?? new SystemClock();
    this.sink = options.sink;
    if (options.framerate !== undefined) {
      this.setFramerate(options.framerate);
    }
    this.groupMap.set(DEFAULT_GROUP, new ActorGroup());
    this.lastTick = this.clock.now();
  }

  /** Scene time in seconds. Starts at 0, never decreases. */
  get time(): number {
    return this.currentTime;
  }

  get framerate(): number {
    return this.fps;
  }

  /** Registered groups by name. The default group is always present. */
  get groups(): ReadonlyMap<string, ActorGroup> {
    return this.groupMap;
  }

  group(name: string): ActorGroup | undefined {
    return this.groupMap.get(name);
  }

  /**
   * Set the frame-rate target. Every `update()` advances time by at least
   * one frame at this rate.
   *
   * @throws InvalidFramerateError when `fps` is not a positive finite number.
   */
  setFramerate(fps: number): void {
    if (!Number.isFinite(fps) || fps <= 0) {
      throw new InvalidFramerateError(fps);
    }
    this.fps = fps;
  }

  /**
   * Add actors to a group, creating the group when needed.
   *
   * @returns The group the actors were added to.
   */
  addActors(actors: Actor | readonly Actor[], groupName: string = DEFAULT_GROUP): ActorGroup {
    let group = this.groupMap.get(groupName);
    if (!group) {
      group = new ActorGroup();
      this.groupMap.set(groupName, group);
    }
    group.add(actors);
    return group;
  }

  /**
   * Register an existing group under `groupName`. The group is shared, not
   * copied: later additions through either handle are visible to both.
   * Replaces any group already registered under that name.
   */
  addActorGroup(group: ActorGroup, groupName: string): void {
    this.groupMap.set(groupName, group);
  }

  /** Distinct actors across all groups, in first-seen order. */
  actors(): Actor[] {
    const seen = new Set<Actor>();
    for (const group of this.groupMap.values()) {
      for (const actor of group) {
        seen.add(actor);
      }
    }
    return [...seen];
  }

  /** Longest timeline end time across all actors, 0 for an empty scene. */
  get endTime(): number {
    let max = 0;
    for (const actor of this.actors()) {
      max = Math.max(max, actor.endTime);
    }
    return max;
  }

  /**
   * Advance scene time and update every actor.
   *
   * The tick is the wall-clock time since the previous update, but never
   * less than one frame at the configured framerate.
   *
   * @returns The tick length in seconds.
   */
  update(): number {
    const now = this.clock.now();
    const elapsedMs = Math.max(now - this.lastTick, 1000 / this.fps);
    this.lastTick = now;
    this.currentTime += elapsedMs / 1000;

    const actors = this.actors();
    for (const actor of actors) {
      actor.update(this.currentTime);
    }

    this.sink?.onFrame({
      time: this.currentTime,
      width: this.width,
      height: this.height,
      actors: actors.map((actor) => ({ id: actor.id, state: actor.state })),
    });

    return elapsedMs / 1000;
  }

  /**
   * Pad every timeline with a stop up to the longest end time.
   * Timelines already at the maximum are untouched.
   */
  sync(): void {
    const actors = this.actors();
    const max = this.endTime;
    for (const actor of actors) {
      if (actor.endTime < max) {
        actor.timeline.extendTo(max);
      }
    }
  }
}
