/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Arrays
export { DType, Shape, ArraySpec, sizeOf, ndarray, scalar, item, zeros } from "./array.js";
export type { NDArray, ArrayMap, SpecMap, ExtrasMap } from "./array.js";

// Actions
export { ACTION_TYPES, ActionType, actionTypeFromId, actionTypeId, makeAction } from "./actions.js";
export type { Action } from "./actions.js";

// TimeSteps
export { StepType, TerminationReason, LifecyclePhase, timeStep, isFirst, isLast } from "./timestep.js";
export type { TimeStep } from "./timestep.js";

// Task definition
export { ExtraSpec, TaskDefinition } from "./task.js";
export type { TaskDefinitionInput } from "./task.js";

// Device
export { ScreenDimensions } from "./device.js";
export type { ScreenDimensionsInput } from "./device.js";

// Configuration
export { EnvironmentConfig, SimulationConfig } from "./config.js";
export type { EnvironmentConfigInput, SimulationConfigInput } from "./config.js";
