import { describe, it, expect, beforeEach } from "vitest";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { RecordingSink, SystemClock, TestClock } from "@cuesheet/core";
import { parseConfig } from "../src/config.js";
import { playbackFramerate, preparePlayback } from "../src/playback.js";
import { runScene } from "../src/scene-runner.js";
import { parseScript } from "../src/script/build-scene.js";
import type { SceneScript } from "../src/script/script-schema.js";

async function loadRelay(): Promise<SceneScript> {
  const path = fileURLToPath(new URL("../scripts/relay.json", import.meta.url));
  return parseScript(JSON.parse(await readFile(path, "utf-8")));
}

function argv(...args: string[]): string[] {
  return ["node", "cli.js", "relay.json", ...args];
}

describe("playbackFramerate", () => {
  let relay: SceneScript;

  beforeEach(async () => {
    relay = await loadRelay();
  });

  it("uses the script's framerate when none is configured", () => {
    expect(playbackFramerate(relay, parseConfig(argv()))).toBe(30);
  });

  it("lets --fps and CUESHEET_FPS override the script", () => {
    expect(playbackFramerate(relay, parseConfig(argv("--fps", "60")))).toBe(60);
    expect(playbackFramerate(relay, parseConfig(argv(), { CUESHEET_FPS: "24" }))).toBe(24);
  });

  it("falls back to 60 fps", () => {
    const script: SceneScript = { ...relay, framerate: undefined };
    expect(playbackFramerate(script, parseConfig(argv()))).toBe(60);
  });
});

describe("preparePlayback", () => {
  let relay: SceneScript;
  let clock: TestClock;
  let sink: RecordingSink;

  beforeEach(async () => {
    relay = await loadRelay();
    clock = new TestClock();
    sink = new RecordingSink();
  });

  it("paces the default clock at the scene's framerate", () => {
    const playback = preparePlayback(relay, parseConfig(argv()), { sink });

    expect(playback.framerate).toBe(30);
    expect(playback.scene.framerate).toBe(30);
    expect(playback.clock).toBeInstanceOf(SystemClock);
    if (playback.clock instanceof SystemClock) {
      expect(playback.clock.frameIntervalMs).toBe(1000 / 30);
    }
  });

  it("plays until the scene's end time unless --until is given", () => {
    expect(preparePlayback(relay, parseConfig(argv()), { clock, sink }).until).toBe(3.25);
    expect(
      preparePlayback(relay, parseConfig(argv("--until", "1.5")), { clock, sink }).until,
    ).toBe(1.5);
  });

  it("keeps scene time in step with the clock at the script's rate", () => {
    const playback = preparePlayback(relay, parseConfig(argv()), { clock, sink });
    runScene(playback.scene, clock, { until: playback.until });

    clock.advanceFrames(30, playback.framerate);

    expect(sink.frames).toHaveLength(30);
    expect(playback.scene.time).toBeCloseTo(clock.now() / 1000, 6);
    expect(playback.scene.time).toBeCloseTo(1, 6);
  });

  it("keeps scene time in step with the clock at an overridden rate", () => {
    const playback = preparePlayback(relay, parseConfig(argv("--fps", "60")), { clock, sink });
    runScene(playback.scene, clock, { until: playback.until });

    clock.advanceFrames(60, playback.framerate);

    expect(playback.scene.framerate).toBe(60);
    expect(playback.scene.time).toBeCloseTo(1, 6);
  });

  it("plays the relay to its end", async () => {
    const playback = preparePlayback(relay, parseConfig(argv()), { clock, sink });
    const handle = runScene(playback.scene, clock, { until: playback.until });

    // 3.25s at 30 fps ends on the 98th frame
    clock.advanceFrames(98, playback.framerate);

    await expect(handle.done).resolves.toBe(98);
    expect(clock.pendingCount).toBe(0);
    expect(playback.actors.get("runner")?.position).toEqual({ x: 560, y: 200 });
    expect(playback.actors.get("flag")?.angle).toBe(0);
  });
});
