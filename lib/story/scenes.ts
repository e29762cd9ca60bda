import { z } from "zod";

export const MAX_SCENES = 100;

const SCENE_KEY = /^scene\s*(\d+)$/i;

const sceneText = z.string().trim().min(1, "Scene prompts must not be empty");

/**
 * Accepts either an ordered list of prompts or the `{ Scene1: ..., Scene2: ... }`
 * map the scene editor sends, and yields the prompts in scene-number order.
 */
export const scenesSchema = z
  .union([z.array(sceneText), z.record(sceneText)])
  .transform((value, ctx): string[] => {
    if (Array.isArray(value)) return value;

    const numbered: Array<{ number: number; text: string }> = [];
    for (const [key, text] of Object.entries(value)) {
      const match = SCENE_KEY.exec(key);
      if (!match) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unexpected scene key: ${key}` });
        return z.NEVER;
      }
      const number = Number(match[1]);
      if (numbered.some((entry) => entry.number === number)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate scene number: ${number}` });
        return z.NEVER;
      }
      numbered.push({ number, text });
    }
    return numbered.sort((a, b) => a.number - b.number).map((entry) => entry.text);
  })
  .pipe(
    z
      .array(z.string())
      .min(1, "At least one scene is required")
      .max(MAX_SCENES, `At most ${MAX_SCENES} scenes are accepted`),
  );

export const startStoryBodySchema = z.object({
  scenes: scenesSchema,
  answers: z.record(z.unknown()).optional(),
});
