/**
 * SystemClock — real-time clock for Node.js and browsers.
 *
 * Uses `performance.now()` for timestamps and `setTimeout` to pace frames
 * at a fixed interval. See `TestClock` for tests.
 */

import type { CancelHandle, Clock, FrameCallback } from "./clock.js";

/** Frame interval of a 60 fps loop, in milliseconds. */
export const DEFAULT_FRAME_INTERVAL_MS = 1000 / 60;

/**
 * @example
 * ```ts
 * const clock = new SystemClock(1000 / 30);
 * const scene = new Scene({ width: 600, height: 400, clock });
 * ```
 */
export class SystemClock implements Clock {
  readonly frameIntervalMs: number;

  constructor(frameIntervalMs: number = DEFAULT_FRAME_INTERVAL_MS) {
    this.frameIntervalMs = frameIntervalMs;
  }

  now(): number {
    return performance.now();
  }

  /** Fires `callback` one frame interval from now. */
  requestFrame(callback: FrameCallback): CancelHandle {
    const id = setTimeout(() => callback(this.now()), this.frameIntervalMs);
    return { cancel: () => clearTimeout(id) };
  }
}
