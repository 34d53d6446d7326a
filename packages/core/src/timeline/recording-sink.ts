/**
 * RecordingSink — captures scene frames for test assertions.
 */

import type { FrameSink, SceneFrame } from "./frame-sink.js";

/**
 * A FrameSink that records every frame for later inspection.
 *
 * @example
 * ```ts
 * const sink = new RecordingSink();
 * const scene = new Scene({ width: 600, height: 400, clock, sink });
 * scene.update();
 *
 * expect(sink.frames).toHaveLength(1);
 * expect(sink.last?.actors[0]?.state.position).toEqual({ x: 0, y: 0 });
 * ```
 */
export class RecordingSink implements FrameSink {
  /** All frames in emission order. */
  readonly frames: SceneFrame[] = [];

  onFrame(frame: SceneFrame): void {
    this.frames.push(frame);
  }

  /** The most recent frame, if any. */
  get last(): SceneFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  /** Clear all recorded frames. */
  clear(): void {
    this.frames.length = 0;
  }
}
