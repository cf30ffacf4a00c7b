/**
 * Test collaborators: a scripted backend coordinator and task manager built
 * from vi.fn() so each test can override single answers.
 */
import { vi } from "vitest";
import { ndarray, scalar } from "../../schemas/array.js";
import type { ArrayMap, ExtrasMap } from "../../schemas/array.js";
import type { Action } from "../../schemas/actions.js";
import type { TaskDefinitionInput } from "../../schemas/task.js";
import type { BackendCoordinator, TaskManager } from "../collaborators.js";
import { EpisodeEnvironment } from "../environment.js";
import type { EnvironmentConfigInput } from "../../schemas/config.js";

export const SCORE_TASK: TaskDefinitionInput = {
    id: "score_task",
    name: "Score task",
    extras_spec: [{ name: "score", dtype: "float32", shape: [] }],
};

/** An 84x84x3 observation whose `timedelta` is the frame number. */
export function observationAt(frame: number): ArrayMap {
    return {
        pixels: ndarray("uint8", [84, 84, 3], new Uint8Array(84 * 84 * 3).fill(frame % 256)),
        timedelta: scalar("int64", frame),
        orientation: ndarray("uint8", [4], [1, 0, 0, 0]),
    };
}

export function makeCoordinator() {
    let frame = 0;
    return {
        screenDimensions: vi.fn(() => ({ height: 84, width: 84, channels: 3 })),
        reset: vi.fn(() => {}),
        executeAction: vi.fn((_action: Action | null): ArrayMap | null => observationAt(frame++)),
        shouldRestart: vi.fn(() => false),
        restartSimulator: vi.fn(() => {}),
        checkTimeout: vi.fn(() => false),
        logDict: vi.fn((): Record<string, number> => ({ backend_steps: 7 })),
        close: vi.fn((): void => {}),
    } satisfies BackendCoordinator;
}

/**
 * Reward 0.5 per step; `score` reports the number of steps taken so far.
 * With `endAfter`, the episode ends once that many steps were taken.
 */
export function makeTaskManager(endAfter?: number) {
    let steps = 0;
    return {
        getCurrentReward: vi.fn(() => 0.5),
        getCurrentExtras: vi.fn((): ExtrasMap => ({ score: [scalar("float32", steps)] })),
        incrementSteps: vi.fn(() => {
            steps += 1;
        }),
        checkIfEpisodeEnded: vi.fn(() => endAfter !== undefined && steps >= endAfter),
    } satisfies TaskManager;
}

export async function makeEnv(options: { endAfter?: number; config?: EnvironmentConfigInput } = {}) {
    const coordinator = makeCoordinator();
    const taskManager = makeTaskManager(options.endAfter);
    const env = await EpisodeEnvironment.create({
        coordinator,
        taskManager,
        task: SCORE_TASK,
        config: options.config,
    });
    return { env, coordinator, taskManager };
}
