/**
 * TestClock — manually stepped clock for scene and player tests.
 */

import type { CancelHandle, Clock, FrameCallback } from "./clock.js";

interface QueuedFrame {
  readonly callback: FrameCallback;
  cancelled: boolean;
}

/**
 * A clock whose reading only moves when a test steps it.
 *
 * Each step fires the frames queued before it, in request order. Frames
 * requested from inside a callback wait for the following step, which is
 * how a playback loop re-arms itself one frame at a time.
 *
 * @example
 * ```ts
 * const clock = new TestClock();
 * const scene = new Scene({ width: 600, height: 400, clock, framerate: 30 });
 * runScene(scene, clock, { until: 1 });
 * clock.advanceFrames(30, scene.framerate); // one second of playback
 * ```
 */
export class TestClock implements Clock {
  private elapsedMs = 0;
  private queue: QueuedFrame[] = [];

  now(): number {
    return this.elapsedMs;
  }

  requestFrame(callback: FrameCallback): CancelHandle {
    const frame: QueuedFrame = { callback, cancelled: false };
    this.queue.push(frame);
    return {
      cancel: () => {
        frame.cancelled = true;
        this.queue = this.queue.filter((queued) => queued !== frame);
      },
    };
  }

  /** Move the reading forward by `ms` and fire the queued frames once. */
  advance(ms: number): void {
    this.elapsedMs += ms;
    const due = this.queue;
    this.queue = [];
    for (const frame of due) {
      if (!frame.cancelled) {
        frame.callback(this.elapsedMs);
      }
    }
  }

  /** Step `count` frames of `1000 / framerate` ms each. */
  advanceFrames(count: number, framerate: number): void {
    const intervalMs = 1000 / framerate;
    for (let i = 0; i < count; i++) {
      this.advance(intervalMs);
    }
  }

  /** Frames requested and not yet fired or cancelled. */
  get pendingCount(): number {
    return this.queue.length;
  }
}
