import fs from "fs/promises";
import path from "path";
import { TaskDefinition } from "../../schemas/task.js";

/** Resolve the task path from the option or `SIMENV_TASK`. */
export function resolveTaskPath(option: string | undefined): string {
    const taskPath = option ?? process.env.SIMENV_TASK;
    if (!taskPath) {
        throw new Error("No task file given. Pass --task <path> or set SIMENV_TASK.");
    }
    return path.resolve(process.cwd(), taskPath);
}

export async function loadTaskFromFile(filePath: string): Promise<TaskDefinition> {
    const content = await fs.readFile(filePath, "utf-8");
    return TaskDefinition.parse(JSON.parse(content));
}

/** Parse an integer option, falling back to an environment variable, then to `fallback`. */
export function parseIntegerOption(
    name: string,
    value: string | undefined,
    envValue: string | undefined,
    fallback: number,
): number {
    const raw = value ?? envValue;
    if (raw === undefined || raw === "") return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) {
        throw new Error(`Invalid ${name} value: ${raw}`);
    }
    return parsed;
}

/**
 * Refuse a run whose episodes could never end: without a step limit, only an
 * injected restart or timeout produces a LAST step.
 */
export function assertEpisodesBounded(
    task: TaskDefinition,
    faults: { restartEvery: number; timeoutEvery: number },
): void {
    if (task.max_episode_steps > 0 || faults.restartEvery > 0 || faults.timeoutEvery > 0) return;
    throw new Error(
        "The task sets no max_episode_steps. Pass --restart-every or --timeout-every to bound its episodes.",
    );
}
