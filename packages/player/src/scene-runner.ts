/**
 * Scene runner — drives a scene from a clock's frame callbacks.
 *
 * Decoupled from output: whatever the scene's sink does with each frame is
 * up to the sink.
 */

import type { CancelHandle, Clock, Scene } from "@cuesheet/core";

/** Options for running a scene. */
export interface RunOptions {
  /** Stop once scene time reaches this many seconds. */
  readonly until: number;
}

/** Handle returned by `runScene` to control playback. */
export interface RunHandle {
  /** Stops playback. The pending frame is cancelled. */
  stop: () => void;
  /** Resolves with the number of frames played once playback ends. */
  done: Promise<number>;
}

/**
 * Play a scene: call `scene.update()` on every frame until scene time
 * reaches `options.until` or `stop()` is called.
 *
 * The clock should be the one the scene was built with, so that each
 * update measures the time between frames.
 */
export function runScene(scene: Scene, clock: Clock, options: RunOptions): RunHandle {
  let frames = 0;
  let pending: CancelHandle | null = null;
  let finish: (() => void) | undefined;

  const done = new Promise<number>((resolve, reject) => {
    finish = () => resolve(frames);

    const frame = (): void => {
      pending = null;
      try {
        scene.update();
      } catch (error: unknown) {
        reject(error);
        return;
      }
      frames++;
      if (scene.time >= options.until) {
        resolve(frames);
        return;
      }
      pending = clock.requestFrame(frame);
    };

    if (scene.time >= options.until) {
      resolve(frames);
      return;
    }
    pending = clock.requestFrame(frame);
  });

  const stop = (): void => {
    if (pending) {
      pending.cancel();
      pending = null;
    }
    finish?.();
  };

  return { stop, done };
}
