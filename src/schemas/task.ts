/**
 * Task Schemas — The static task definition the environment is built from.
 * Loaded from a JSON task file by the CLI.
 */
import { z } from "zod/v4";
import { DType, Shape } from "./array.js";

/** Declares one named task extra reported by the task manager. */
export const ExtraSpec = z.object({
    name: z.string().min(1),
    dtype: DType,
    /** Shape of a single reported value; the accumulated sequence adds no dimension. */
    shape: Shape.default([]),
});
export type ExtraSpec = z.infer<typeof ExtraSpec>;

export const TaskDefinition = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().default(""),
    /** Steps after which the task manager ends the episode. 0 means unlimited. */
    max_episode_steps: z.number().int().nonnegative().default(0),
    extras_spec: z.array(ExtraSpec)
        .superRefine((extras, ctx) => {
            const seen = new Set<string>();
            for (let i = 0; i < extras.length; i++) {
                const name = extras[i].name;
                if (seen.has(name)) {
                    ctx.addIssue({
                        code: "custom",
                        message: `Duplicate extra name: ${name}`,
                        path: [i, "name"],
                    });
                }
                seen.add(name);
            }
        })
        .default([]),
});
export type TaskDefinition = z.infer<typeof TaskDefinition>;
export type TaskDefinitionInput = z.input<typeof TaskDefinition>;
