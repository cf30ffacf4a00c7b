/**
 * Uniform random policy over the action spec.
 */
import { ACTION_TYPES, makeAction } from "../schemas/actions.js";
import type { Action } from "../schemas/actions.js";
import { randomInt } from "./random.js";

export function randomAction(random: () => number): Action {
    const type = ACTION_TYPES[randomInt(random, 0, ACTION_TYPES.length - 1)];
    return makeAction(type, random(), random());
}
