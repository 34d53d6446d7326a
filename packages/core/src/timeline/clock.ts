/**
 * Time source shared by a scene and whatever plays it.
 *
 * Clocks count milliseconds; scenes and timelines count seconds.
 */

/** Receives the clock reading (ms) at which the frame fired. */
export type FrameCallback = (nowMs: number) => void;

/** Returned by {@link Clock.requestFrame}. */
export interface CancelHandle {
  cancel(): void;
}

export interface Clock {
  /** Monotonic reading in milliseconds. */
  now(): number;
  /** Run `callback` once, on the next frame. */
  requestFrame(callback: FrameCallback): CancelHandle;
}
