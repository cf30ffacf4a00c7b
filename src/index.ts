/**
 * simdevice-env — Public API
 *
 * An episode environment driving a simulated device through a reset/step
 * loop, with schema-checked actions, observations and task extras.
 */

// Core
export { EpisodeEnvironment, withEnvironment, EpisodeTelemetry, TELEMETRY_SCOPES } from "./core/index.js";
export { actionSpec, observationSpec, taskExtrasSpec, validate, validateAll } from "./core/index.js";
export type {
    EnvironmentEvents,
    EnvironmentDescription,
    EpisodeEnvironmentOptions,
    TelemetryScope,
    ScopeCounters,
    LifetimeCounters,
    TelemetryEvents,
    BackendCoordinator,
    TaskManager,
    MaybePromise,
} from "./core/index.js";

// Schemas
export {
    // Arrays
    DType,
    Shape,
    ArraySpec,
    sizeOf,
    ndarray,
    scalar,
    item,
    zeros,
    // Actions
    ACTION_TYPES,
    ActionType,
    actionTypeFromId,
    actionTypeId,
    makeAction,
    // TimeSteps
    StepType,
    TerminationReason,
    LifecyclePhase,
    timeStep,
    isFirst,
    isLast,
    // Task
    ExtraSpec,
    TaskDefinition,
    // Device
    ScreenDimensions,
    // Config
    EnvironmentConfig,
    SimulationConfig,
} from "./schemas/index.js";
export type {
    NDArray,
    ArrayMap,
    SpecMap,
    ExtrasMap,
    Action,
    TimeStep,
    TaskDefinitionInput,
    ScreenDimensionsInput,
    EnvironmentConfigInput,
    SimulationConfigInput,
} from "./schemas/index.js";

// Simulation
export { SimulatedDevice, TapTargetTask, randomAction, createRandom, randomInt } from "./sim/index.js";
export type { DeviceEvents, TargetSquare } from "./sim/index.js";

// Errors
export {
    SchemaViolationError,
    ConcurrentCallError,
    EnvironmentClosedError,
} from "./errors/index.js";
