/**
 * EpisodeTelemetry — Lifetime and per-episode step counters.
 *
 * Counters are held per scope ("total" is never reset, "episode" is zeroed at
 * every reset) and per action type. Flat, prefixed counter names exist only
 * in the map returned by `flush()`.
 */
import { EventEmitter } from "events";
import { z } from "zod/v4";
import { ACTION_TYPES, ActionType } from "../schemas/actions.js";

export const TELEMETRY_SCOPES = ["total", "episode"] as const;
export type TelemetryScope = (typeof TELEMETRY_SCOPES)[number];

export interface ScopeCounters {
    steps: number;
    actionTypes: Record<ActionType, number>;
}

/** Counters that only exist in the lifetime scope. */
export interface LifetimeCounters {
    restartCount: number;
    timeoutResetCount: number;
}

/** Supported events emitted by EpisodeTelemetry. */
export interface TelemetryEvents {
    "ratios:skipped": [{ scope: TelemetryScope }];
}

/** One counter per member of the action-type enumeration. */
const ActionTypeCounts = z.record(ActionType, z.number().int().nonnegative());

function emptyScope(): ScopeCounters {
    return {
        steps: 0,
        actionTypes: ActionTypeCounts.parse(Object.fromEntries(ACTION_TYPES.map((type) => [type, 0]))),
    };
}

export class EpisodeTelemetry extends EventEmitter {
    private readonly prefix: string;
    private readonly scopes: Record<TelemetryScope, ScopeCounters> = {
        total: emptyScope(),
        episode: emptyScope(),
    };
    private restartCount = 0;
    private timeoutResetCount = 0;

    constructor(prefix: string) {
        super();
        this.prefix = prefix;
    }

    /** Count one processed step of the given action type, in both scopes. */
    recordStep(actionType: ActionType): void {
        for (const scope of TELEMETRY_SCOPES) {
            const counters = this.scopes[scope];
            counters.steps += 1;
            counters.actionTypes[actionType] += 1;
        }
    }

    /** Count an unexpected simulator restart. */
    recordRestart(): void {
        this.restartCount += 1;
    }

    /** Count an episode ended by a step timeout. */
    recordTimeoutReset(): void {
        this.timeoutResetCount += 1;
    }

    /** Zero every episode-scoped counter. Lifetime counters are untouched. */
    beginEpisode(): void {
        this.scopes.episode = emptyScope();
    }

    counters(scope: TelemetryScope): ScopeCounters {
        const counters = this.scopes[scope];
        return { steps: counters.steps, actionTypes: { ...counters.actionTypes } };
    }

    lifetime(): LifetimeCounters {
        return { restartCount: this.restartCount, timeoutResetCount: this.timeoutResetCount };
    }

    /**
     * Export all counters as a fresh flat map, merged with the backend's own
     * counters, plus the ratio of each action type to the scope's steps.
     *
     * Ratios of a scope with no steps are skipped and reported through a
     * `ratios:skipped` event.
     */
    flush(backendLog: Readonly<Record<string, number>> = {}): Record<string, number> {
        const log: Record<string, number> = {
            restart_count: this.restartCount,
            reset_count_step_timeout: this.timeoutResetCount,
        };
        for (const scope of TELEMETRY_SCOPES) {
            const counters = this.scopes[scope];
            log[`${this.prefix}_${scope}_steps`] = counters.steps;
            for (const type of ACTION_TYPES) {
                log[`${this.prefix}_${scope}_action_type_${type}`] = counters.actionTypes[type];
            }
        }

        Object.assign(log, backendLog);

        for (const scope of TELEMETRY_SCOPES) {
            const counters = this.scopes[scope];
            if (counters.steps === 0) {
                this.emit("ratios:skipped", { scope });
                continue;
            }
            for (const type of ACTION_TYPES) {
                log[`${this.prefix}_${scope}_action_type_ratio_${type}`] =
                    counters.actionTypes[type] / counters.steps;
            }
        }
        return log;
    }
}
