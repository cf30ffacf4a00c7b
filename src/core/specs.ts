/**
 * Specs — Construction and validation of the action, observation and
 * task-extras contracts.
 *
 * The spec maps are built once, from the action-type enumeration, the screen
 * dimensions reported by the backend and the static task definition. They are
 * frozen and never change afterwards.
 */
import { z } from "zod/v4";
import { ACTION_TYPES } from "../schemas/actions.js";
import { sizeOf } from "../schemas/array.js";
import type { ArraySpec, DType, NDArray, SpecMap } from "../schemas/array.js";
import type { ScreenDimensions } from "../schemas/device.js";
import type { TaskDefinition } from "../schemas/task.js";
import { SchemaViolationError } from "../errors/index.js";

interface DTypeRange {
    integer: boolean;
    min: number;
    max: number;
}

const FLOAT32_MAX = 3.4028234663852886e38;

const DTYPE_RANGES: Record<DType, DTypeRange> = {
    bool: { integer: true, min: 0, max: 1 },
    uint8: { integer: true, min: 0, max: 255 },
    int32: { integer: true, min: -2147483648, max: 2147483647 },
    int64: { integer: true, min: Number.MIN_SAFE_INTEGER, max: Number.MAX_SAFE_INTEGER },
    float32: { integer: false, min: -FLOAT32_MAX, max: FLOAT32_MAX },
    float64: { integer: false, min: -Number.MAX_VALUE, max: Number.MAX_VALUE },
};

function freezeSpec(spec: ArraySpec): ArraySpec {
    Object.freeze(spec.shape);
    return Object.freeze(spec);
}

function freezeSpecs(specs: ArraySpec[]): SpecMap {
    const map: Record<string, ArraySpec> = {};
    for (const spec of specs) {
        map[spec.name] = freezeSpec(spec);
    }
    return Object.freeze(map);
}

/**
 * The action contract: a discrete action type plus a normalized touch position.
 */
export function actionSpec(): SpecMap {
    return freezeSpecs([
        { name: "action_type", dtype: "int32", shape: [], numValues: ACTION_TYPES.length },
        { name: "touch_position", dtype: "float32", shape: [2], minimum: 0, maximum: 1 },
    ]);
}

/**
 * The observation contract for a device screen of the given size.
 *
 * `timedelta` is the simulated time, in microseconds, since the previous
 * observation. `orientation` is a one-hot vector over the four rotations.
 */
export function observationSpec(screen: ScreenDimensions): SpecMap {
    return freezeSpecs([
        {
            name: "pixels",
            dtype: "uint8",
            shape: [screen.height, screen.width, screen.channels],
            minimum: 0,
            maximum: 255,
        },
        { name: "timedelta", dtype: "int64", shape: [] },
        { name: "orientation", dtype: "uint8", shape: [4], minimum: 0, maximum: 1 },
    ]);
}

/**
 * One spec per extra declared by the task. Empty when the task declares none.
 */
export function taskExtrasSpec(task: TaskDefinition): SpecMap {
    return freezeSpecs(
        task.extras_spec.map((extra) => ({
            name: extra.name,
            dtype: extra.dtype,
            shape: [...extra.shape],
        })),
    );
}

function isNumericArrayLike(value: unknown): value is ArrayLike<number> {
    if (Array.isArray(value)) return value.every((x) => typeof x === "number");
    return (
        ArrayBuffer.isView(value) &&
        !(value instanceof DataView) &&
        !(value instanceof BigInt64Array) &&
        !(value instanceof BigUint64Array)
    );
}

function sameShape(actual: readonly number[], expected: readonly number[]): boolean {
    return actual.length === expected.length && actual.every((dim, i) => dim === expected[i]);
}

function formatShape(shape: readonly number[]): string {
    return `[${shape.join(", ")}]`;
}

/** Describe why a single element breaks the spec, or `undefined` if it conforms. */
function elementProblem(x: number, spec: ArraySpec): string | undefined {
    const range = DTYPE_RANGES[spec.dtype];
    if (range.integer && !Number.isInteger(x)) return `${x} is not an integer`;
    if (Number.isFinite(x) && (x < range.min || x > range.max)) {
        return `${x} is outside the ${spec.dtype} range`;
    }
    if (spec.minimum !== undefined && x < spec.minimum) return `${x} is below the minimum ${spec.minimum}`;
    if (spec.maximum !== undefined && x > spec.maximum) return `${x} is above the maximum ${spec.maximum}`;
    if (spec.numValues !== undefined && (x < 0 || x >= spec.numValues)) {
        return `${x} is not one of the ${spec.numValues} discrete values`;
    }
    return undefined;
}

/**
 * Build the zod schema enforcing `spec`. Element checks stop at the first
 * offending element so a bad screen does not produce one issue per pixel.
 */
function arraySchema(spec: ArraySpec) {
    const size = sizeOf(spec.shape);
    return z
        .object(
            {
                dtype: z.literal(spec.dtype, `Expected dtype ${spec.dtype}`),
                shape: z
                    .array(z.number(), `Expected shape ${formatShape(spec.shape)}`)
                    .refine(
                        (shape) => sameShape(shape, spec.shape),
                        `Expected shape ${formatShape(spec.shape)}`,
                    ),
                data: z.custom<ArrayLike<number>>(isNumericArrayLike, "Expected a list of numbers"),
            },
            "Expected an array value",
        )
        .superRefine((value, ctx) => {
            if (!isNumericArrayLike(value.data)) return;
            if (value.data.length !== size) {
                ctx.addIssue({
                    code: "custom",
                    message: `Expected ${size} elements, got ${value.data.length}`,
                    path: ["data"],
                });
                return;
            }
            for (let i = 0; i < value.data.length; i++) {
                const problem = elementProblem(value.data[i], spec);
                if (problem) {
                    ctx.addIssue({
                        code: "custom",
                        message: `Element ${i}: ${problem}`,
                        path: ["data", i],
                    });
                    return;
                }
            }
        });
}

/**
 * Check `value` against `spec` and return it as an `NDArray`.
 * @throws SchemaViolationError listing every failed check.
 */
export function validate(value: unknown, spec: ArraySpec): NDArray {
    const result = arraySchema(spec).safeParse(value);
    if (!result.success) {
        throw new SchemaViolationError(
            spec.name,
            result.error.issues.map((issue) => issue.message),
        );
    }
    return result.data;
}

/**
 * Validate every entry of a spec map. A name missing from `values` is a
 * violation; names without a spec are ignored.
 */
export function validateAll(
    values: Readonly<Record<string, unknown>>,
    specs: SpecMap,
): Record<string, NDArray> {
    const validated: Record<string, NDArray> = {};
    for (const [name, spec] of Object.entries(specs)) {
        if (!Object.hasOwn(values, name)) {
            throw new SchemaViolationError(name, ["Missing value"]);
        }
        validated[name] = validate(values[name], spec);
    }
    return validated;
}
