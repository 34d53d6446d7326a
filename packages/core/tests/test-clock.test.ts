import { describe, it, expect, beforeEach } from "vitest";
import { Actor, Scene, TestClock, move } from "../src/timeline/index.js";
import type { CancelHandle } from "../src/timeline/index.js";

describe("TestClock", () => {
  let clock: TestClock;

  beforeEach(() => {
    clock = new TestClock();
  });

  it("only moves when stepped", () => {
    expect(clock.now()).toBe(0);
    clock.advance(40);
    clock.advance(60);
    expect(clock.now()).toBe(100);
  });

  it("fires queued frames in request order with the new reading", () => {
    const fired: string[] = [];
    clock.requestFrame((now) => fired.push(`a@${now}`));
    clock.requestFrame((now) => fired.push(`b@${now}`));

    clock.advance(25);

    expect(fired).toEqual(["a@25", "b@25"]);
    expect(clock.pendingCount).toBe(0);
  });

  it("holds frames requested during a step until the next one", () => {
    const fired: number[] = [];
    const loop = (now: number): void => {
      fired.push(now);
      clock.requestFrame(loop);
    };
    clock.requestFrame(loop);

    clock.advance(10);
    expect(fired).toEqual([10]);
    expect(clock.pendingCount).toBe(1);

    clock.advance(10);
    expect(fired).toEqual([10, 20]);
  });

  it("skips cancelled frames", () => {
    const fired: string[] = [];
    const dropped = clock.requestFrame(() => fired.push("dropped"));
    clock.requestFrame(() => fired.push("kept"));
    dropped.cancel();

    clock.advance(5);

    expect(fired).toEqual(["kept"]);
    expect(clock.pendingCount).toBe(0);
  });

  it("skips a frame cancelled by an earlier frame of the same step", () => {
    const fired: string[] = [];
    let second: CancelHandle | undefined;
    clock.requestFrame(() => {
      fired.push("first");
      second?.cancel();
    });
    second = clock.requestFrame(() => fired.push("second"));

    clock.advance(5);

    expect(fired).toEqual(["first"]);
  });

  describe("advanceFrames", () => {
    it("steps whole frames at the given framerate", () => {
      const fired: number[] = [];
      const loop = (now: number): void => {
        fired.push(now);
        clock.requestFrame(loop);
      };
      clock.requestFrame(loop);

      clock.advanceFrames(3, 10);

      expect(fired).toEqual([100, 200, 300]);
      expect(clock.now()).toBe(300);
    });

    it("advances a scene one minimum tick per frame", () => {
      const scene = new Scene({ width: 10, height: 10, clock, framerate: 4 });
      const actor = new Actor();
      actor.act(move, 1, { x: 8, y: 0 });
      scene.addActors(actor);

      clock.advanceFrames(2, scene.framerate);
      scene.update();

      expect(scene.time).toBe(0.5);
      expect(actor.position).toEqual({ x: 4, y: 0 });
    });
  });
});
