export { EpisodeEnvironment } from "./environment.js";
export type { EnvironmentEvents, EnvironmentDescription, EpisodeEnvironmentOptions } from "./environment.js";
export { withEnvironment } from "./scope.js";
export { EpisodeTelemetry, TELEMETRY_SCOPES } from "./telemetry.js";
export type { TelemetryScope, ScopeCounters, LifetimeCounters, TelemetryEvents } from "./telemetry.js";
export { actionSpec, observationSpec, taskExtrasSpec, validate, validateAll } from "./specs.js";
export type { BackendCoordinator, TaskManager, MaybePromise } from "./collaborators.js";
