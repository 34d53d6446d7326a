/**
 * ConsoleSink — prints scene frames as text, one line per actor.
 */

import type { ActorFrame, FrameSink, SceneFrame } from "@cuesheet/core";

/** Options for creating a ConsoleSink. */
export interface ConsoleSinkOptions {
  /** Print every n-th frame. Defaults to 1 (every frame). */
  readonly every?: number;
  /** Line writer. Defaults to `console.log`. */
  readonly write?: (line: string) => void;
}

const fixed = (value: number): string => value.toFixed(2);

/** Format one actor of a frame: `t=0.50 dot pos=(5.00, 0.00) angle=0.00 color=(255.00, 255.00, 255.00)`. */
export function formatActorFrame(time: number, frame: ActorFrame): string {
  const { position, color, angle } = frame.state;
  return (
    `t=${fixed(time)} ${frame.id}` +
    ` pos=(${fixed(position.x)}, ${fixed(position.y)})` +
    ` angle=${fixed(angle)}` +
    ` color=(${fixed(color.r)}, ${fixed(color.g)}, ${fixed(color.b)})`
  );
}

export class ConsoleSink implements FrameSink {
  private readonly every: number;
  private readonly write: (line: string) => void;
  private count = 0;

  constructor(options: ConsoleSinkOptions = {}) {
    this.every = options.every ?? 1;
    this.write = options.write ?? ((line) => console.log(line));
  }

  onFrame(frame: SceneFrame): void {
    const index = this.count++;
    if (index % this.every !== 0) {
      return;
    }
    for (const actor of frame.actors) {
      this.write(formatActorFrame(frame.time, actor));
    }
  }
}
