/**
 * TimeStep Schemas — Step types, lifecycle phases and the record returned by
 * every `reset()` and `step()` call.
 */
import { z } from "zod/v4";
import type { ArrayMap } from "./array.js";

/** Position of a TimeStep within an episode. */
export const StepType = z.enum(["FIRST", "MID", "LAST"]);
export type StepType = z.infer<typeof StepType>;

/** Why an episode produced its LAST TimeStep. */
export const TerminationReason = z.enum(["episode_end", "restart", "timeout"]);
export type TerminationReason = z.infer<typeof TerminationReason>;

/**
 * UNINITIALIZED until the first reset; ACTIVE while FIRST/MID steps are being
 * produced; TERMINATED after a LAST step, until the next reset.
 */
export const LifecyclePhase = z.enum(["UNINITIALIZED", "ACTIVE", "TERMINATED"]);
export type LifecyclePhase = z.infer<typeof LifecyclePhase>;

export interface TimeStep {
    readonly stepType: StepType;
    readonly observation: ArrayMap;
    readonly reward: number;
    readonly discount: number;
}

/** Build a frozen TimeStep. The discount is 1.0 on MID and 0.0 otherwise. */
export function timeStep(stepType: StepType, observation: ArrayMap, reward: number): TimeStep {
    return Object.freeze({
        stepType,
        observation,
        reward,
        discount: stepType === "MID" ? 1.0 : 0.0,
    });
}

export function isFirst(step: TimeStep): boolean {
    return step.stepType === "FIRST";
}

export function isLast(step: TimeStep): boolean {
    return step.stepType === "LAST";
}
