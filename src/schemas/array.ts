/**
 * Array Schemas — Typed n-dimensional values and the specs that describe them.
 *
 * Every observation, action and task extra crossing the environment boundary
 * is an `NDArray`: a flat, row-major list of numbers tagged with a dtype and a
 * shape. An `ArraySpec` is the contract such a value is validated against.
 */
import { z } from "zod/v4";

/** Element types an `NDArray` may carry. `int64` values must be safe integers. */
export const DType = z.enum(["bool", "uint8", "int32", "int64", "float32", "float64"]);
export type DType = z.infer<typeof DType>;

/** Dimensions of an array. `[]` is a scalar. */
export const Shape = z.array(z.number().int().nonnegative());
export type Shape = z.infer<typeof Shape>;

/**
 * The declared contract for a named value.
 * `numValues` marks a discrete array whose elements lie in `[0, numValues)`.
 */
export const ArraySpec = z.object({
    name: z.string().min(1),
    dtype: DType,
    shape: Shape,
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    numValues: z.number().int().positive().optional(),
});
export type ArraySpec = z.infer<typeof ArraySpec>;

export interface NDArray {
    readonly dtype: DType;
    readonly shape: readonly number[];
    readonly data: ArrayLike<number>;
}

/** A named set of arrays, e.g. one observation or one action. */
export type ArrayMap = Readonly<Record<string, NDArray>>;

/** A named set of specs, e.g. the observation spec. */
export type SpecMap = Readonly<Record<string, ArraySpec>>;

/** Task extras: every value reported for a key since the previous fetch, oldest first. */
export type ExtrasMap = Readonly<Record<string, readonly NDArray[]>>;

/** Number of elements held by an array of the given shape. */
export function sizeOf(shape: readonly number[]): number {
    return shape.reduce((size, dim) => size * dim, 1);
}

export function ndarray(dtype: DType, shape: readonly number[], data: ArrayLike<number>): NDArray {
    return { dtype, shape: [...shape], data };
}

export function scalar(dtype: DType, value: number): NDArray {
    return ndarray(dtype, [], [value]);
}

/** The single element of a scalar (or the first element of any array). */
export function item(array: NDArray): number | undefined {
    return array.data.length > 0 ? array.data[0] : undefined;
}

/** An array conforming to `spec`, filled with the lowest value the spec allows. */
export function zeros(spec: ArraySpec): NDArray {
    const fill = spec.minimum !== undefined && spec.minimum > 0 ? spec.minimum : 0;
    return ndarray(spec.dtype, spec.shape, new Array<number>(sizeOf(spec.shape)).fill(fill));
}
