/**
 * Action Schemas — The fixed action-type enumeration and action constructors.
 *
 * An action is an `ArrayMap` with two entries:
 *   - `action_type`: int32 scalar holding the index of an `ActionType`
 *   - `touch_position`: float32 `[x, y]`, both normalized to `[0, 1]`
 */
import { z } from "zod/v4";
import { ndarray, scalar } from "./array.js";
import type { ArrayMap } from "./array.js";

/** Action types in id order: the id of an action type is its index. */
export const ACTION_TYPES = ["TOUCH", "LIFT", "REPEAT"] as const;

export const ActionType = z.enum(ACTION_TYPES);
export type ActionType = z.infer<typeof ActionType>;

export type Action = ArrayMap;

/** Resolve a numeric action-type id. Returns `undefined` for ids outside the enumeration. */
export function actionTypeFromId(id: number): ActionType | undefined {
    if (!Number.isInteger(id) || id < 0 || id >= ACTION_TYPES.length) return undefined;
    return ACTION_TYPES[id];
}

export function actionTypeId(type: ActionType): number {
    return ACTION_TYPES.indexOf(type);
}

/**
 * Build an action. The position is ignored by the device for LIFT and REPEAT
 * but is always present so every action conforms to the action spec.
 */
export function makeAction(type: ActionType, x = 0, y = 0): Action {
    return {
        action_type: scalar("int32", actionTypeId(type)),
        touch_position: ndarray("float32", [2], [Math.fround(x), Math.fround(y)]),
    };
}
