/**
 * Actor state snapshots — the values a timeline interpolates.
 *
 * A snapshot is immutable: actions never mutate the snapshot they receive,
 * they return a new one.
 */

/** A 2D position in scene coordinates. */
export interface Position {
  /** Horizontal position. */
  readonly x: number;
  /** Vertical position. */
  readonly y: number;
}

/** An RGB color. Channels are plain numbers, typically in [0, 255]. */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/**
 * The interpolatable state of an actor at one instant.
 *
 * The fixed keys cover what every renderer needs. Custom action kinds
 * store anything else under `extra`.
 */
export interface ActorState {
  readonly position: Position;
  readonly color: Color;
  /** Rotation in degrees. */
  readonly angle: number;
  /** Caller-defined keys produced by custom action kinds. */
  readonly extra: Readonly<Record<string, unknown>>;
}

/** Live state of a freshly created actor. */
export const DEFAULT_STATE: ActorState = Object.freeze({
  position: Object.freeze({ x: 0, y: 0 }),
  color: Object.freeze({ r: 255, g: 255, b: 255 }),
  angle: 0,
  extra: Object.freeze({}),
});

/** Linear interpolation between `from` and `to` at `fraction` ∈ [0, 1]. */
export function lerp(from: number, to: number, fraction: number): number {
  return from + (to - from) * fraction;
}

/** Componentwise {@link lerp} of two positions. */
export function lerpPosition(from: Position, to: Position, fraction: number): Position {
  return {
    x: lerp(from.x, to.x, fraction),
    y: lerp(from.y, to.y, fraction),
  };
}

/** Componentwise {@link lerp} of two colors. */
export function lerpColor(from: Color, to: Color, fraction: number): Color {
  return {
    r: lerp(from.r, to.r, fraction),
    g: lerp(from.g, to.g, fraction),
    b: lerp(from.b, to.b, fraction),
  };
}
