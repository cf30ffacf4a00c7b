/**
 * EpisodeEnvironment — The episode lifecycle state machine.
 *
 * Drives the reset/step loop between an agent and the simulated device,
 * decides how each step ends, keeps the latest action/observation/extras,
 * counts steps in the telemetry ledger and emits events for logging.
 *
 * Backend restarts and step timeouts end the episode with a zero-reward LAST
 * TimeStep instead of throwing, so an agent loop only has to handle the
 * contract violations it caused itself.
 */
import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import { actionTypeFromId, ACTION_TYPES } from "../schemas/actions.js";
import type { Action, ActionType } from "../schemas/actions.js";
import type { ArrayMap, ExtrasMap, NDArray, SpecMap } from "../schemas/array.js";
import { EnvironmentConfig } from "../schemas/config.js";
import type { EnvironmentConfigInput } from "../schemas/config.js";
import { ScreenDimensions } from "../schemas/device.js";
import { TaskDefinition } from "../schemas/task.js";
import type { TaskDefinitionInput } from "../schemas/task.js";
import { timeStep } from "../schemas/timestep.js";
import type { LifecyclePhase, StepType, TerminationReason, TimeStep } from "../schemas/timestep.js";
import type { BackendCoordinator, TaskManager } from "./collaborators.js";
import { actionSpec, observationSpec, taskExtrasSpec, validate, validateAll } from "./specs.js";
import { EpisodeTelemetry } from "./telemetry.js";
import type { LifetimeCounters, ScopeCounters, TelemetryScope } from "./telemetry.js";
import {
    ConcurrentCallError,
    EnvironmentClosedError,
    SchemaViolationError,
} from "../errors/index.js";

/** Supported events emitted by the EpisodeEnvironment. */
export interface EnvironmentEvents {
    "env:init": [EnvironmentDescription];
    "episode:start": [{ episodeId: string; episode: number }];
    "episode:complete": [{ episodeId: string | null; reason: TerminationReason; steps: number }];
    "telemetry:ratios-skipped": [{ scope: TelemetryScope }];
    "env:close": [];
    "close:failed": [{ error: unknown }];
}

export interface EnvironmentDescription {
    task: TaskDefinition;
    actionSpec: SpecMap;
    observationSpec: SpecMap;
    taskExtrasSpec: SpecMap;
}

export interface EpisodeEnvironmentOptions {
    coordinator: BackendCoordinator;
    taskManager: TaskManager;
    task: TaskDefinitionInput;
    config?: EnvironmentConfigInput;
}

/**
 * The latest values seen by the environment. Each map is a frozen shallow
 * copy, replaced as a whole and never edited in place.
 */
interface LatestState {
    action: Action;
    observation: ArrayMap;
    extras: ExtrasMap;
    stepType: StepType;
}

const EMPTY: Readonly<Record<string, never>> = Object.freeze({});

export class EpisodeEnvironment extends EventEmitter {
    public readonly task: TaskDefinition;
    public readonly config: EnvironmentConfig;

    private readonly coordinator: BackendCoordinator;
    private readonly taskManager: TaskManager;
    private readonly ledger: EpisodeTelemetry;

    private readonly specs: {
        action: SpecMap;
        observation: SpecMap;
        taskExtras: SpecMap;
    };

    private latest: LatestState = {
        action: EMPTY,
        observation: EMPTY,
        extras: EMPTY,
        stepType: "LAST",
    };

    /** When set, the next step() performs a reset instead. */
    private resetPending = true;

    private phase: LifecyclePhase = "UNINITIALIZED";
    private lastTermination: TerminationReason | null = null;
    private currentEpisodeId: string | null = null;
    private episodeCount = 0;

    /** Name of the reset()/step() call that has not settled yet. */
    private inFlight: string | null = null;
    private closed = false;
    private announced = false;

    /**
     * Query the backend for the screen size and build the environment.
     * A backend that cannot report its screen makes this reject.
     */
    static async create(options: EpisodeEnvironmentOptions): Promise<EpisodeEnvironment> {
        const screen = ScreenDimensions.parse(await options.coordinator.screenDimensions());
        return new EpisodeEnvironment(options, screen);
    }

    constructor(options: EpisodeEnvironmentOptions, screen: ScreenDimensions) {
        super();
        this.coordinator = options.coordinator;
        this.taskManager = options.taskManager;
        this.task = TaskDefinition.parse(options.task);
        this.config = EnvironmentConfig.parse(options.config ?? {});
        this.specs = {
            action: actionSpec(),
            observation: observationSpec(screen),
            taskExtras: taskExtrasSpec(this.task),
        };
        this.ledger = new EpisodeTelemetry(this.config.telemetry_prefix);
        this.ledger.on("ratios:skipped", (event: { scope: TelemetryScope }) => {
            this.emit("telemetry:ratios-skipped", event);
        });
    }

    actionSpec(): SpecMap {
        return this.specs.action;
    }

    observationSpec(): SpecMap {
        return this.specs.observation;
    }

    taskExtrasSpec(): SpecMap {
        return this.specs.taskExtras;
    }

    describe(): EnvironmentDescription {
        return {
            task: this.task,
            actionSpec: this.specs.action,
            observationSpec: this.specs.observation,
            taskExtrasSpec: this.specs.taskExtras,
        };
    }

    /** The last processed action. Read-only view; empty after a reset. */
    get rawAction(): Action {
        return this.latest.action;
    }

    /** The last observation received from the backend. Read-only view; may be stale. */
    get rawObservation(): ArrayMap {
        return this.latest.observation;
    }

    get lifecycle(): LifecyclePhase {
        return this.phase;
    }

    get stepType(): StepType {
        return this.latest.stepType;
    }

    /** Why the most recent episode ended, or `null` if none has ended yet. */
    get terminationReason(): TerminationReason | null {
        return this.lastTermination;
    }

    get episodeId(): string | null {
        return this.currentEpisodeId;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Start a new episode.
     * Backend failures during the reset are left to the coordinator's retry policy.
     */
    async reset(): Promise<TimeStep> {
        return this.exclusive("reset", () => this.beginEpisode());
    }

    /**
     * Advance the episode by one action.
     *
     * The first matching rule decides the outcome:
     *   1. the backend needs a restart → restart it, end the episode
     *   2. the step timed out → end the episode
     *   3. a reset is pending → reset and return its TimeStep; `action` is discarded
     *   4. otherwise → execute `action` and ask the task manager whether the episode ended
     *
     * Rules 1 and 2 return the previous observation with reward 0.0 and never
     * count the action. Under rule 4 the action is checked against the action
     * spec before anything is recorded; the backend receives the checked copy.
     *
     * @throws SchemaViolationError when rule 4 applies and the action breaks the action spec.
     */
    async step(action: Action): Promise<TimeStep> {
        return this.exclusive("step", () => this.advance(action));
    }

    /**
     * Latest task extras, validated against the task-extras spec.
     * With `latestOnly` each key maps to its most recent value, otherwise to
     * every value reported since the previous fetch. Keys without values are omitted.
     *
     * @throws SchemaViolationError if any reported value breaks its spec.
     */
    taskExtras(latestOnly?: true): Record<string, NDArray>;
    taskExtras(latestOnly: false): Record<string, NDArray[]>;
    taskExtras(latestOnly: boolean): Record<string, NDArray> | Record<string, NDArray[]>;
    taskExtras(latestOnly = true): Record<string, NDArray> | Record<string, NDArray[]> {
        const latestValues: Record<string, NDArray> = {};
        const sequences: Record<string, NDArray[]> = {};
        for (const [key, spec] of Object.entries(this.specs.taskExtras)) {
            if (!Object.hasOwn(this.latest.extras, key)) continue;
            const values = this.latest.extras[key].map((value) => validate(value, spec));
            if (values.length === 0) continue;
            latestValues[key] = values[values.length - 1];
            sequences[key] = values;
        }
        return latestOnly ? latestValues : sequences;
    }

    /**
     * Export telemetry: lifetime and episode counters, the backend's counters
     * and per-action-type ratios. The returned map is never shared with the ledger.
     */
    async telemetry(): Promise<Record<string, number>> {
        const backendLog = await this.coordinator.logDict();
        return this.ledger.flush(backendLog);
    }

    /** Copy of one scope's step counters, without the backend merge. */
    counters(scope: TelemetryScope): ScopeCounters {
        return this.ledger.counters(scope);
    }

    lifetimeCounters(): LifetimeCounters {
        return this.ledger.lifetime();
    }

    /**
     * Release the backend. Safe to call any number of times; the coordinator
     * is closed once. Never rejects: a failing close is reported as `close:failed`.
     */
    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        try {
            await this.coordinator.close();
            this.emit("env:close");
        } catch (error) {
            this.emit("close:failed", { error });
        }
    }

    private async exclusive(operation: string, body: () => Promise<TimeStep>): Promise<TimeStep> {
        if (this.closed) throw new EnvironmentClosedError(operation);
        if (this.inFlight) throw new ConcurrentCallError(operation, this.inFlight);
        this.inFlight = operation;
        try {
            return await body();
        } finally {
            this.inFlight = null;
        }
    }

    private async beginEpisode(): Promise<TimeStep> {
        if (!this.announced) {
            this.announced = true;
            this.emit("env:init", this.describe());
        }

        // 1. Backend reset
        await this.coordinator.reset();

        // 2. Clear per-episode values
        this.latest.action = EMPTY;
        this.ledger.beginEpisode();

        // 3. Initial observation and extras
        const observation = await this.coordinator.executeAction(null);
        const extras = await this.taskManager.getCurrentExtras();
        if (observation !== null) {
            this.latest.observation = Object.freeze({ ...observation });
        }
        this.latest.extras = Object.freeze({ ...extras });

        // 4. New episode
        this.resetPending = false;
        this.latest.stepType = "FIRST";
        this.phase = "ACTIVE";
        this.currentEpisodeId = uuidv4();
        this.episodeCount += 1;
        this.emit("episode:start", { episodeId: this.currentEpisodeId, episode: this.episodeCount });

        return timeStep("FIRST", this.latest.observation, 0.0);
    }

    private async advance(action: Action): Promise<TimeStep> {
        // 1. Unhealthy backend
        if (await this.coordinator.shouldRestart()) {
            await this.coordinator.restartSimulator();
            this.ledger.recordRestart();
            return this.terminate("restart");
        }

        // 2. Step timeout
        if (await this.coordinator.checkTimeout()) {
            this.ledger.recordTimeoutReset();
            return this.terminate("timeout");
        }

        // 3. Stale step after a terminal TimeStep
        if (this.resetPending) {
            return this.beginEpisode();
        }

        // 4. Regular step
        const actionType = this.actionTypeOf(action);
        const validated = validateAll(action, this.specs.action);
        this.latest.action = Object.freeze(validated);
        this.ledger.recordStep(actionType);
        await this.taskManager.incrementSteps();

        const observation = await this.coordinator.executeAction(this.latest.action);
        const reward = await this.taskManager.getCurrentReward();
        const extras = await this.taskManager.getCurrentExtras();
        if (observation !== null) {
            this.latest.observation = Object.freeze({ ...observation });
        }
        this.latest.extras = Object.freeze({ ...extras });

        const ended = await this.taskManager.checkIfEpisodeEnded();
        this.resetPending = ended;
        this.latest.stepType = ended ? "LAST" : "MID";
        if (ended) {
            this.finishEpisode("episode_end");
        }

        return timeStep(this.latest.stepType, this.latest.observation, reward);
    }

    /** End the episode without touching the device; the previous observation is reused. */
    private terminate(reason: TerminationReason): TimeStep {
        this.resetPending = true;
        this.latest.stepType = "LAST";
        this.finishEpisode(reason);
        return timeStep("LAST", this.latest.observation, 0.0);
    }

    private finishEpisode(reason: TerminationReason): void {
        this.phase = "TERMINATED";
        this.lastTermination = reason;
        this.emit("episode:complete", {
            episodeId: this.currentEpisodeId,
            reason,
            steps: this.ledger.counters("episode").steps,
        });
    }

    private actionTypeOf(action: Action): ActionType {
        const raw: NDArray | undefined = Object.hasOwn(action, "action_type")
            ? action.action_type
            : undefined;
        const id = raw !== undefined && raw.data.length === 1 ? raw.data[0] : undefined;
        const type = id === undefined ? undefined : actionTypeFromId(id);
        if (type === undefined) {
            throw new SchemaViolationError("action_type", [
                `Expected one of ${ACTION_TYPES.map((name, i) => `${i} (${name})`).join(", ")}`,
            ]);
        }
        return type;
    }
}
