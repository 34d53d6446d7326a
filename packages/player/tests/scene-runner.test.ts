import { describe, it, expect, beforeEach } from "vitest";
import { Actor, RecordingSink, Scene, TestClock, move } from "@cuesheet/core";
import { runScene } from "../src/scene-runner.js";

describe("runScene", () => {
  let clock: TestClock;
  let sink: RecordingSink;
  let scene: Scene;

  beforeEach(() => {
    clock = new TestClock();
    sink = new RecordingSink();
    scene = new Scene({ width: 100, height: 100, clock, sink, framerate: 10 });
    const actor = new Actor({ id: "dot" });
    actor.act(move, 0.3, { x: 30, y: 0 });
    scene.addActors(actor);
  });

  it("updates the scene on every frame until the end time", async () => {
    const handle = runScene(scene, clock, { until: 0.3 });

    clock.advanceFrames(2, scene.framerate);
    expect(sink.frames).toHaveLength(2);
    clock.advanceFrames(1, scene.framerate);

    await expect(handle.done).resolves.toBe(3);
    expect(clock.pendingCount).toBe(0);
    expect(sink.last?.actors[0]?.state.position).toEqual({ x: 30, y: 0 });
  });

  it("can be stopped mid-playback", async () => {
    const handle = runScene(scene, clock, { until: 10 });

    clock.advanceFrames(2, scene.framerate);
    handle.stop();
    clock.advanceFrames(1, scene.framerate);

    await expect(handle.done).resolves.toBe(2);
    expect(clock.pendingCount).toBe(0);
    expect(scene.time).toBe(0.2);
  });

  it("finishes immediately when the scene is already past the end", async () => {
    const handle = runScene(scene, clock, { until: 0 });

    await expect(handle.done).resolves.toBe(0);
    expect(clock.pendingCount).toBe(0);
    expect(sink.frames).toHaveLength(0);
  });
});
