/**
 * Collaborators — The narrow interfaces the environment drives.
 *
 * Implementations may answer synchronously or with a Promise; the environment
 * awaits every call and never issues two of them at once.
 */
import type { Action } from "../schemas/actions.js";
import type { ArrayMap, ExtrasMap } from "../schemas/array.js";
import type { ScreenDimensionsInput } from "../schemas/device.js";

export type MaybePromise<T> = T | Promise<T>;

/**
 * Controls the simulated device: executes actions, watches its health and
 * reports how long the last step took.
 */
export interface BackendCoordinator {
    /** Queried once, when the environment is created. */
    screenDimensions(): MaybePromise<ScreenDimensionsInput>;
    /** Start a new episode on the device. Retries are the coordinator's concern. */
    reset(): MaybePromise<void>;
    /**
     * Run `action` (or nothing, for `null`) and return the resulting
     * observation, or `null` when no new observation is available.
     */
    executeAction(action: Action | null): MaybePromise<ArrayMap | null>;
    shouldRestart(): MaybePromise<boolean>;
    restartSimulator(): MaybePromise<void>;
    /** Whether the last step took longer than the coordinator allows. */
    checkTimeout(): MaybePromise<boolean>;
    /** Backend counters merged into the environment's telemetry export. */
    logDict(): MaybePromise<Readonly<Record<string, number>>>;
    close(): MaybePromise<void>;
}

/**
 * Computes rewards, extras and episode ends for the current task.
 */
export interface TaskManager {
    getCurrentReward(): MaybePromise<number>;
    getCurrentExtras(): MaybePromise<ExtrasMap>;
    incrementSteps(): MaybePromise<void>;
    checkIfEpisodeEnded(): MaybePromise<boolean>;
}
