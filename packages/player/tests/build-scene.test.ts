import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { RecordingSink, TestClock } from "@cuesheet/core";
import { buildScene, parseScript, ScriptError } from "../src/script/build-scene.js";
import type { SceneScript } from "../src/script/script-schema.js";

async function loadRelay(): Promise<SceneScript> {
  const path = fileURLToPath(new URL("../scripts/relay.json", import.meta.url));
  return parseScript(JSON.parse(await readFile(path, "utf-8")));
}

function issuesOf(run: () => unknown): readonly string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ScriptError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected a ScriptError");
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("parseScript", () => {
  it("accepts the bundled relay script", async () => {
    const script = await loadRelay();
    expect(script.actors.map((actor) => actor.id)).toEqual(["runner", "lamp", "flag"]);
    expect(script.phases.map((phase) => phase.name)).toEqual(["sprint", "handoff", "finish"]);
  });

  it("reports missing fields with their path", () => {
    const issues = issuesOf(() =>
      parseScript({ height: 400, actors: [{ id: "a" }], phases: [] }),
    );
    expect(issues).toEqual(["width: Required"]);
  });

  it("rejects negative durations", () => {
    const issues = issuesOf(() =>
      parseScript({
        width: 10,
        height: 10,
        actors: [{ id: "a" }],
        phases: [{ steps: [{ actor: "a", action: "stop", duration: -1 }] }],
      }),
    );
    expect(issues).toEqual([
      "phases.0.steps.0.duration: Number must be greater than or equal to 0",
    ]);
  });

  it("rejects unknown actions", () => {
    const issues = issuesOf(() =>
      parseScript({
        width: 10,
        height: 10,
        actors: [{ id: "a" }],
        phases: [{ steps: [{ actor: "a", action: "teleport", duration: 1 }] }],
      }),
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith("phases.0.steps.0.action: Invalid discriminator value")).toBe(true);
  });

  it("requires at least one actor", () => {
    const issues = issuesOf(() => parseScript({ width: 10, height: 10, actors: [], phases: [] }));
    expect(issues).toEqual(["actors: Array must contain at least 1 element(s)"]);
  });

  it("puts every issue in the error message", () => {
    expect(() => parseScript({})).toThrow(/Invalid scene script:\n {2}width: Required/);
  });
});

// ---------------------------------------------------------------------------
// Building
// ---------------------------------------------------------------------------

describe("buildScene", () => {
  it("creates actors in their groups with their initial state", async () => {
    const { scene, actors } = buildScene(await loadRelay(), { clock: new TestClock() });

    expect(scene.width).toBe(600);
    expect(scene.framerate).toBe(30);
    expect(scene.group("default")?.toArray().map((actor) => actor.id)).toEqual(["runner"]);
    expect(scene.group("props")?.toArray().map((actor) => actor.id)).toEqual(["lamp", "flag"]);
    expect(actors.get("lamp")?.color).toEqual({ r: 40, g: 40, b: 40 });
    expect(actors.get("runner")?.position).toEqual({ x: 20, y: 200 });
  });

  it("syncs after every phase", async () => {
    const { scene, actors } = buildScene(await loadRelay(), { clock: new TestClock() });
    const runner = actors.get("runner");
    const lamp = actors.get("lamp");
    const flag = actors.get("flag");

    expect(scene.endTime).toBe(3.25);
    expect(runner?.endTime).toBe(3.25);
    expect(lamp?.endTime).toBe(3.25);
    expect(flag?.endTime).toBe(3.25);

    // handoff starts at 1.5 for everyone, after the runner's sprint
    expect(flag?.actionAt(1.5).type).toBe("rotate");
    expect(runner?.stateAt(2.25).position).toEqual({ x: 430, y: 200 });
    // finish starts at 2.75, after the runner's handoff
    expect(flag?.stateAt(3).angle).toBe(45);
    expect(lamp?.stateAt(0.25).color).toEqual({ r: 147.5, g: 130, b: 80 });
  });

  it("wires the clock and sink into the scene", async () => {
    const clock = new TestClock();
    const sink = new RecordingSink();
    const { scene } = buildScene(await loadRelay(), { clock, sink });

    clock.advance(750);
    scene.update();

    expect(sink.last?.time).toBe(0.75);
    expect(sink.last?.actors.map((frame) => frame.id)).toEqual(["runner", "lamp", "flag"]);
    expect(sink.last?.actors[0]?.state.position).toEqual({ x: 160, y: 200 });
  });

  it("rejects duplicate ids and unknown actors", () => {
    const script: SceneScript = {
      width: 10,
      height: 10,
      actors: [{ id: "a" }, { id: "a" }],
      phases: [{ steps: [{ actor: "ghost", action: "stop", duration: 1 }] }],
    };
    expect(issuesOf(() => buildScene(script))).toEqual([
      'actors: Duplicate actor id "a"',
      'phases.0.steps.0.actor: Unknown actor "ghost"',
    ]);
  });
});
