/**
 * Scene script format — a JSON description of actors and the actions they
 * perform, phase by phase.
 *
 * The zod schema is the source of truth; TypeScript types are inferred
 * from it.
 *
 * @example
 * ```json
 * {
 *   "width": 600,
 *   "height": 400,
 *   "actors": [{ "id": "runner" }, { "id": "lamp", "color": { "r": 0, "g": 0, "b": 0 } }],
 *   "phases": [
 *     { "steps": [{ "actor": "runner", "action": "move", "duration": 2, "to": { "x": 100, "y": 0 } }] },
 *     { "steps": [{ "actor": "lamp", "action": "recolor", "duration": 1, "to": { "r": 255, "g": 200, "b": 0 } }] }
 *   ]
 * }
 * ```
 */

import { z } from "zod";

export const PositionSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const ColorSchema = z.object({
  r: z.number(),
  g: z.number(),
  b: z.number(),
});

const DurationSchema = z
  .number()
  .finite()
  .nonnegative()
  .describe("Duration in seconds.");

const StepBase = {
  actor: z.string().min(1).describe("ID of the actor performing the step."),
  duration: DurationSchema,
};

export const StepSchema = z.discriminatedUnion("action", [
  z.object({ ...StepBase, action: z.literal("move"), to: PositionSchema }),
  z.object({ ...StepBase, action: z.literal("rotate"), to: z.number().describe("Angle in degrees.") }),
  z.object({ ...StepBase, action: z.literal("recolor"), to: ColorSchema }),
  z.object({ ...StepBase, action: z.literal("stop") }),
]);

export const ActorSchema = z.object({
  id: z.string().min(1),
  group: z.string().min(1).optional(),
  position: PositionSchema.optional(),
  color: ColorSchema.optional(),
  angle: z.number().optional(),
});

export const PhaseSchema = z.object({
  name: z.string().optional(),
  steps: z.array(StepSchema),
});

export const SceneScriptSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  framerate: z.number().finite().positive().optional(),
  actors: z.array(ActorSchema).min(1),
  phases: z.array(PhaseSchema),
});

export type ScriptStep = z.infer<typeof StepSchema>;
export type ScriptActor = z.infer<typeof ActorSchema>;
export type ScriptPhase = z.infer<typeof PhaseSchema>;
export type SceneScript = z.infer<typeof SceneScriptSchema>;
