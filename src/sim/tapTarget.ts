/**
 * TapTargetTask — A task manager rewarding touches on the device's target square.
 *
 * Reward is 1.0 for a TOUCH inside the target and 0.0 otherwise. Extras:
 *   - `score`: float32, the episode's cumulative reward after each step
 *   - `hits`: int32, the episode's number of rewarded touches after each step
 * Both accumulate one value per step and are cleared when fetched.
 */
import { scalar } from "../schemas/array.js";
import type { ExtrasMap, NDArray } from "../schemas/array.js";
import { TaskDefinition } from "../schemas/task.js";
import type { TaskDefinitionInput } from "../schemas/task.js";
import type { TaskManager } from "../core/collaborators.js";
import type { SimulatedDevice } from "./device.js";

export class TapTargetTask implements TaskManager {
    public readonly task: TaskDefinition;

    private readonly device: SimulatedDevice;
    private steps = 0;
    private score = 0;
    private hits = 0;
    private pendingScore: NDArray[] = [];
    private pendingHits: NDArray[] = [];

    constructor(task: TaskDefinitionInput, device: SimulatedDevice) {
        this.task = TaskDefinition.parse(task);
        this.device = device;
        device.on("reset", () => this.resetEpisode());
    }

    incrementSteps(): void {
        this.steps += 1;
    }

    /** Score the action the device just executed. Call once per step. */
    getCurrentReward(): number {
        const reward = this.device.lastActionHitTarget ? 1.0 : 0.0;
        this.score += reward;
        if (reward > 0) this.hits += 1;
        this.pendingScore.push(scalar("float32", this.score));
        this.pendingHits.push(scalar("int32", this.hits));
        return reward;
    }

    getCurrentExtras(): ExtrasMap {
        const extras = { score: this.pendingScore, hits: this.pendingHits };
        this.pendingScore = [];
        this.pendingHits = [];
        return extras;
    }

    checkIfEpisodeEnded(): boolean {
        return this.task.max_episode_steps > 0 && this.steps >= this.task.max_episode_steps;
    }

    private resetEpisode(): void {
        this.steps = 0;
        this.score = 0;
        this.hits = 0;
        this.pendingScore = [];
        this.pendingHits = [];
    }
}
