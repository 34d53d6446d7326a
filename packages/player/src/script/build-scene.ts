/**
 * Turns a scene script into a live Scene.
 *
 * Each phase queues its steps, then the scene is synced, so every phase
 * starts at the same scene time on all actors regardless of how long each
 * actor's previous phase was.
 */

import { Actor, Scene, move, recolor, rotate } from "@cuesheet/core";
import type { Clock, FrameSink } from "@cuesheet/core";
import type { z } from "zod";
import { SceneScriptSchema } from "./script-schema.js";
import type { SceneScript, ScriptActor, ScriptPhase, ScriptStep } from "./script-schema.js";

/** A script failed validation or references something it never declared. */
export class ScriptError extends Error {
  /** One `path: message` line per problem. */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid scene script:\n  ${issues.join("\n  ")}`);
    this.name = "ScriptError";
    this.issues = issues;
  }
}

/** Options for {@link buildScene}. */
export interface BuildOptions {
  /** Clock driving the scene. Defaults to the scene's system clock. */
  readonly clock?: Clock;
  /** Receives a frame after every scene update. */
  readonly sink?: FrameSink;
}

/** A scene built from a script, with its actors by ID. */
export interface BuiltScene {
  readonly scene: Scene;
  readonly actors: ReadonlyMap<string, Actor>;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Validate untyped input (usually parsed JSON) against the script schema.
 *
 * @throws ScriptError listing every validation issue.
 */
export function parseScript(input: unknown): SceneScript {
  const result = SceneScriptSchema.safeParse(input);
  if (!result.success) {
    throw new ScriptError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

function createActor(entry: ScriptActor): Actor {
  return new Actor({
    id: entry.id,
    position: entry.position,
    color: entry.color,
    angle: entry.angle,
  });
}

function queueStep(actor: Actor, step: ScriptStep): void {
  switch (step.action) {
    case "move":
      actor.act(move, step.duration, step.to);
      break;
    case "rotate":
      actor.act(rotate, step.duration, step.to);
      break;
    case "recolor":
      actor.act(recolor, step.duration, step.to);
      break;
    case "stop":
      actor.pause(step.duration);
      break;
  }
}

function queuePhase(phase: ScriptPhase, actors: ReadonlyMap<string, Actor>): void {
  for (const step of phase.steps) {
    const actor = actors.get(step.actor);
    if (actor) {
      queueStep(actor, step);
    }
  }
}

/**
 * Create the scene, its actors and their timelines from a validated script.
 *
 * @throws ScriptError on duplicate actor IDs or steps naming unknown actors.
 */
export function buildScene(script: SceneScript, options: BuildOptions = {}): BuiltScene {
  const duplicates = new Set<string>();
  const seen = new Set<string>();
  for (const { id } of script.actors) {
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }

  const unknown: string[] = [];
  script.phases.forEach((phase, p) => {
    phase.steps.forEach((step, s) => {
      if (!seen.has(step.actor)) {
        unknown.push(`phases.${p}.steps.${s}.actor: Unknown actor "${step.actor}"`);
      }
    });
  });

  const issues = [
    ...[...duplicates].map((id) => `actors: Duplicate actor id "${id}"`),
    ...unknown,
  ];
  if (issues.length > 0) {
    throw new ScriptError(issues);
  }

  const scene = new Scene({
    width: script.width,
    height: script.height,
    framerate: script.framerate,
    clock: options.clock,
    sink: options.sink,
  });

  const actors = new Map<string, Actor>();
  for (const entry of script.actors) {
    const actor = createActor(entry);
    actors.set(entry.id, actor);
    scene.addActors(actor, entry.group);
  }

  for (const phase of script.phases) {
    queuePhase(phase, actors);
    scene.sync();
  }

  return { scene, actors };
}
