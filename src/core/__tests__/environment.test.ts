/**
 * EpisodeEnvironment Core Tests — Validate the reset/step state machine.
 *
 * The backend and the task manager are scripted fakes, so every termination
 * path can be triggered on a chosen call.
 */
import { describe, it, expect, vi } from "vitest";
import { EpisodeEnvironment } from "../../core/environment.js";
import { makeAction } from "../../schemas/actions.js";
import { scalar } from "../../schemas/array.js";
import type { StepType } from "../../schemas/timestep.js";
import { createRandom } from "../../sim/random.js";
import {
    ConcurrentCallError,
    EnvironmentClosedError,
    SchemaViolationError,
} from "../../errors/index.js";
import { makeCoordinator, makeEnv, makeTaskManager, observationAt, SCORE_TASK } from "./helpers.js";

const TOUCH = makeAction("TOUCH", 0.5, 0.5);
const LIFT = makeAction("LIFT");
const REPEAT = makeAction("REPEAT");

describe("EpisodeEnvironment.create()", () => {
    it("builds the specs from the reported screen and the task", async () => {
        const { env, coordinator } = await makeEnv();

        expect(coordinator.screenDimensions).toHaveBeenCalledTimes(1);
        expect(env.observationSpec().pixels.shape).toEqual([84, 84, 3]);
        expect(Object.keys(env.actionSpec())).toEqual(["action_type", "touch_position"]);
        expect(env.taskExtrasSpec().score).toEqual({ name: "score", dtype: "float32", shape: [] });
        expect(env.lifecycle).toBe("UNINITIALIZED");
    });

    it("propagates a backend that cannot report its screen", async () => {
        const coordinator = makeCoordinator();
        coordinator.screenDimensions.mockImplementation(() => {
            throw new Error("device offline");
        });

        await expect(
            EpisodeEnvironment.create({ coordinator, taskManager: makeTaskManager(), task: SCORE_TASK }),
        ).rejects.toThrow("device offline");
    });

    it("rejects invalid screen dimensions", async () => {
        const coordinator = makeCoordinator();
        coordinator.screenDimensions.mockReturnValue({ height: 0, width: 84, channels: 3 });

        await expect(
            EpisodeEnvironment.create({ coordinator, taskManager: makeTaskManager(), task: SCORE_TASK }),
        ).rejects.toThrow();
    });
});

describe("EpisodeEnvironment.reset()", () => {
    it("returns FIRST with zero reward and discount", async () => {
        const { env, coordinator } = await makeEnv();

        const timestep = await env.reset();

        expect(timestep.stepType).toBe("FIRST");
        expect(timestep.reward).toBe(0.0);
        expect(timestep.discount).toBe(0.0);
        expect(timestep.observation).toEqual(observationAt(0));
        expect(coordinator.reset).toHaveBeenCalledTimes(1);
        expect(coordinator.executeAction).toHaveBeenCalledWith(null);
        expect(env.lifecycle).toBe("ACTIVE");
        expect(Object.isFrozen(timestep)).toBe(true);
    });

    it("keeps an empty observation when the backend returns none on the first reset", async () => {
        const { env, coordinator } = await makeEnv();
        coordinator.executeAction.mockReturnValueOnce(null);

        const timestep = await env.reset();

        expect(timestep.observation).toEqual({});
    });

    it("clears the cached action", async () => {
        const { env } = await makeEnv();
        await env.reset();
        await env.step(TOUCH);
        expect(env.rawAction.action_type).toEqual(TOUCH.action_type);

        await env.reset();

        expect(env.rawAction).toEqual({});
    });
});

describe("EpisodeEnvironment.step()", () => {
    it("runs an episode that ends on the third step", async () => {
        const { env, taskManager } = await makeEnv({ endAfter: 3 });
        await env.reset();

        const steps = [await env.step(TOUCH), await env.step(TOUCH), await env.step(TOUCH)];

        expect(steps.map((s) => s.stepType)).toEqual(["MID", "MID", "LAST"]);
        expect(steps.map((s) => s.discount)).toEqual([1.0, 1.0, 0.0]);
        expect(steps.map((s) => s.reward)).toEqual([0.5, 0.5, 0.5]);
        expect(steps.map((s) => s.observation.timedelta.data[0])).toEqual([1, 2, 3]);
        expect(taskManager.incrementSteps).toHaveBeenCalledTimes(3);
        expect(env.terminationReason).toBe("episode_end");
        expect(env.lifecycle).toBe("TERMINATED");
    });

    it("ends the episode on a backend restart and reuses the previous observation", async () => {
        const { env, coordinator, taskManager } = await makeEnv();
        await env.reset();
        const previous = await env.step(TOUCH);
        coordinator.shouldRestart.mockReturnValueOnce(true);

        const timestep = await env.step(TOUCH);

        expect(timestep.stepType).toBe("LAST");
        expect(timestep.reward).toBe(0.0);
        expect(timestep.discount).toBe(0.0);
        expect(timestep.observation).toBe(previous.observation);
        expect(coordinator.restartSimulator).toHaveBeenCalledTimes(1);
        expect(coordinator.executeAction).toHaveBeenCalledTimes(2);
        expect(taskManager.getCurrentReward).toHaveBeenCalledTimes(1);
        expect(env.lifetimeCounters().restartCount).toBe(1);
        expect(env.counters("total").steps).toBe(1);
        expect(env.terminationReason).toBe("restart");
    });

    it("ends the episode on a step timeout", async () => {
        const { env, coordinator } = await makeEnv();
        await env.reset();
        const previous = await env.step(LIFT);
        coordinator.checkTimeout.mockReturnValueOnce(true);

        const timestep = await env.step(TOUCH);
        const telemetry = await env.telemetry();

        expect(timestep.stepType).toBe("LAST");
        expect(timestep.reward).toBe(0.0);
        expect(timestep.observation).toBe(previous.observation);
        expect(telemetry.reset_count_step_timeout).toBe(1);
        expect(telemetry.restart_count).toBe(0);
        expect(env.terminationReason).toBe("timeout");

        const next = await env.step(TOUCH);
        expect(next.stepType).toBe("FIRST");
    });

    it("checks for a restart before the timeout", async () => {
        const { env, coordinator } = await makeEnv();
        await env.reset();
        coordinator.shouldRestart.mockReturnValueOnce(true);
        coordinator.checkTimeout.mockReturnValue(true);

        await env.step(TOUCH);

        expect(coordinator.checkTimeout).not.toHaveBeenCalled();
        expect(env.terminationReason).toBe("restart");
        expect(env.lifetimeCounters()).toEqual({ restartCount: 1, timeoutResetCount: 0 });
    });

    it("terminates even before the first reset when the backend needs a restart", async () => {
        const { env, coordinator } = await makeEnv();
        coordinator.shouldRestart.mockReturnValueOnce(true);

        const timestep = await env.step(TOUCH);

        expect(timestep.stepType).toBe("LAST");
        expect(timestep.observation).toEqual({});
        expect(coordinator.reset).not.toHaveBeenCalled();
    });

    it("resets instead of stepping while a reset is pending", async () => {
        const stale = await makeEnv();
        const direct = await makeEnv();

        const redirected = await stale.env.step(TOUCH);
        const reset = await direct.env.reset();

        expect(redirected).toEqual(reset);
        expect(stale.coordinator.reset).toHaveBeenCalledTimes(1);
        expect(stale.coordinator.executeAction).toHaveBeenCalledTimes(1);
        expect(stale.coordinator.executeAction).toHaveBeenCalledWith(null);
        expect(stale.taskManager.incrementSteps).not.toHaveBeenCalled();
        expect(stale.env.counters("total").steps).toBe(0);
        expect(stale.env.rawAction).toEqual({});
    });

    it("discards the action of the step following an episode end", async () => {
        const { env } = await makeEnv({ endAfter: 1 });
        await env.reset();
        expect((await env.step(TOUCH)).stepType).toBe("LAST");

        const timestep = await env.step(LIFT);

        expect(timestep.stepType).toBe("FIRST");
        expect(env.counters("total").actionTypes).toEqual({ TOUCH: 1, LIFT: 0, REPEAT: 0 });
        expect(env.rawAction).toEqual({});
    });

    it("keeps the previous observation when the backend returns none", async () => {
        const { env, coordinator } = await makeEnv();
        const first = await env.reset();
        coordinator.executeAction.mockReturnValueOnce(null);

        const timestep = await env.step(TOUCH);

        expect(timestep.stepType).toBe("MID");
        expect(timestep.observation).toBe(first.observation);
        expect(env.rawObservation).toBe(first.observation);
    });

    it("rejects an unknown action type without changing any state", async () => {
        const { env, coordinator } = await makeEnv();
        await env.reset();
        const bogus = { ...TOUCH, action_type: scalar("int32", 7) };

        await expect(env.step(bogus)).rejects.toThrow(SchemaViolationError);
        await expect(env.step({})).rejects.toThrow(SchemaViolationError);

        expect(coordinator.executeAction).toHaveBeenCalledTimes(1);
        expect(env.counters("total").steps).toBe(0);
        expect(env.rawAction).toEqual({});
        expect((await env.step(TOUCH)).stepType).toBe("MID");
    });

    it("rejects an action without a touch position before recording it", async () => {
        const { env, coordinator, taskManager } = await makeEnv();
        await env.reset();

        await expect(env.step({ action_type: scalar("int32", 0) })).rejects.toThrow(SchemaViolationError);

        expect(env.counters("total")).toEqual({ steps: 0, actionTypes: { TOUCH: 0, LIFT: 0, REPEAT: 0 } });
        expect(taskManager.incrementSteps).not.toHaveBeenCalled();
        expect(coordinator.executeAction).toHaveBeenCalledTimes(1);
        expect(env.rawAction).toEqual({});
    });

    it("rejects a touch position outside its bounds instead of clamping it", async () => {
        const { env, coordinator } = await makeEnv();
        await env.reset();

        const outside = env.step(makeAction("TOUCH", 7, -3));

        await expect(outside).rejects.toThrow(SchemaViolationError);
        await expect(outside).rejects.toThrow("Element 0: 7 is above the maximum 1");
        expect(env.counters("total")).toEqual({ steps: 0, actionTypes: { TOUCH: 0, LIFT: 0, REPEAT: 0 } });
        expect(coordinator.executeAction).toHaveBeenCalledTimes(1);
    });

    it("hands the backend the checked action without unknown keys", async () => {
        const { env, coordinator } = await makeEnv();
        await env.reset();

        await env.step({ ...TOUCH, extra: scalar("bool", 1) });

        expect(coordinator.executeAction).toHaveBeenLastCalledWith(TOUCH);
        expect(Object.keys(env.rawAction)).toEqual(["action_type", "touch_position"]);
    });

    it("never yields two LASTs in a row or a LAST not followed by FIRST", async () => {
        const random = createRandom(42);
        const { env, taskManager } = await makeEnv();
        taskManager.checkIfEpisodeEnded.mockImplementation(() => random() < 0.3);

        const types: StepType[] = [];
        for (let i = 0; i < 200; i++) {
            types.push((await env.step(i % 2 === 0 ? TOUCH : REPEAT)).stepType);
        }

        expect(types[0]).toBe("FIRST");
        for (let i = 0; i < types.length - 1; i++) {
            if (types[i] === "LAST") expect(types[i + 1]).toBe("FIRST");
        }
        let lastsSinceFirst = 0;
        for (const type of types) {
            if (type === "FIRST") lastsSinceFirst = 0;
            if (type === "LAST") lastsSinceFirst += 1;
            expect(lastsSinceFirst).toBeLessThanOrEqual(1);
        }
    });

    it("rejects overlapping calls", async () => {
        const { env } = await makeEnv();
        await env.reset();

        const results = await Promise.allSettled([env.step(TOUCH), env.step(TOUCH), env.reset()]);

        expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected", "rejected"]);
        const [first, ...overlapping] = results;
        expect(first.status === "fulfilled" ? first.value.stepType : undefined).toBe("MID");
        expect(overlapping.map((result) => (result.status === "rejected" ? result.reason : undefined)))
            .toEqual([expect.any(ConcurrentCallError), expect.any(ConcurrentCallError)]);
        expect((await env.step(TOUCH)).stepType).toBe("MID");
    });
});

describe("Latest state", () => {
    it("stores frozen shallow copies of the action and observation", async () => {
        const { env } = await makeEnv();
        await env.reset();
        const action = makeAction("TOUCH", 0.25, 0.75);

        await env.step(action);

        expect(env.rawAction).not.toBe(action);
        expect(env.rawAction).toEqual(action);
        expect(Object.isFrozen(env.rawAction)).toBe(true);
        expect(Object.isFrozen(env.rawObservation)).toBe(true);
        expect(env.rawObservation.timedelta.data[0]).toBe(1);
    });
});

describe("EpisodeEnvironment.taskExtras()", () => {
    it("returns the same latest value on repeated reads", async () => {
        const { env } = await makeEnv();
        await env.reset();
        await env.step(TOUCH);

        const first = env.taskExtras();
        const second = env.taskExtras(true);

        expect(first).toEqual({ score: { dtype: "float32", shape: [], data: [1] } });
        expect(second).toEqual(first);
    });

    it("returns the full sequence when latestOnly is false", async () => {
        const { env, taskManager } = await makeEnv();
        taskManager.getCurrentExtras.mockReturnValueOnce({
            score: [scalar("float32", 1), scalar("float32", 2)],
        });
        await env.reset();

        expect(env.taskExtras(false).score.map((value) => value.data[0])).toEqual([1, 2]);
        expect(env.taskExtras().score.data[0]).toBe(2);
    });

    it("accepts a latestOnly flag only known at run time", async () => {
        const { env } = await makeEnv();
        await env.reset();
        await env.step(TOUCH);

        const flags: boolean[] = [true, false];
        const [latest, sequences] = flags.map((latestOnly) => env.taskExtras(latestOnly));

        expect(latest).toEqual({ score: { dtype: "float32", shape: [], data: [1] } });
        expect(sequences).toEqual({ score: [{ dtype: "float32", shape: [], data: [1] }] });
    });

    it("omits keys without a spec or without values", async () => {
        const { env, taskManager } = await makeEnv();
        taskManager.getCurrentExtras.mockReturnValueOnce({
            score: [],
            undeclared: [scalar("int32", 3)],
        });
        await env.reset();

        expect(env.taskExtras()).toEqual({});
    });

    it("throws instead of coercing a value that breaks its spec", async () => {
        const { env, taskManager } = await makeEnv();
        taskManager.getCurrentExtras.mockReturnValueOnce({ score: [scalar("int32", 3)] });
        await env.reset();

        expect(() => env.taskExtras()).toThrow(SchemaViolationError);
    });
});

describe("EpisodeEnvironment.telemetry()", () => {
    it("counts steps and action-type ratios for both scopes", async () => {
        const { env } = await makeEnv();
        await env.reset();
        for (const action of [TOUCH, TOUCH, LIFT, REPEAT]) {
            await env.step(action);
        }

        const telemetry = await env.telemetry();

        expect(telemetry.simenv_episode_steps).toBe(4);
        expect(telemetry.simenv_total_action_type_TOUCH).toBe(2);
        expect(telemetry.simenv_episode_action_type_ratio_TOUCH).toBe(0.5);
        expect(telemetry.simenv_episode_action_type_ratio_LIFT).toBe(0.25);
        expect(telemetry.simenv_episode_action_type_ratio_REPEAT).toBe(0.25);
        expect(telemetry.backend_steps).toBe(7);
        const ratioSum =
            telemetry.simenv_total_action_type_ratio_TOUCH +
            telemetry.simenv_total_action_type_ratio_LIFT +
            telemetry.simenv_total_action_type_ratio_REPEAT;
        expect(ratioSum).toBeCloseTo(1.0);
    });

    it("zeroes episode counters on reset and skips their ratios", async () => {
        const { env } = await makeEnv();
        const skipped = vi.fn();
        env.on("telemetry:ratios-skipped", skipped);
        await env.reset();
        await env.step(TOUCH);
        await env.step(LIFT);

        await env.reset();
        const telemetry = await env.telemetry();

        expect(telemetry.simenv_episode_steps).toBe(0);
        expect(telemetry.simenv_episode_action_type_TOUCH).toBe(0);
        expect(telemetry.simenv_total_steps).toBe(2);
        expect(telemetry.simenv_total_action_type_ratio_LIFT).toBe(0.5);
        expect("simenv_episode_action_type_ratio_TOUCH" in telemetry).toBe(false);
        expect(skipped).toHaveBeenCalledWith({ scope: "episode" });
    });

    it("returns a copy the caller may change", async () => {
        const { env } = await makeEnv();
        await env.reset();
        await env.step(TOUCH);

        const telemetry = await env.telemetry();
        telemetry.simenv_total_steps = 100;

        expect((await env.telemetry()).simenv_total_steps).toBe(1);
    });

    it("uses the configured counter prefix", async () => {
        const { env } = await makeEnv({ config: { telemetry_prefix: "device" } });
        await env.reset();
        await env.step(TOUCH);

        const telemetry = await env.telemetry();

        expect(telemetry.device_total_steps).toBe(1);
        expect(telemetry.simenv_total_steps).toBeUndefined();
    });
});

describe("Events", () => {
    it("announces the environment once and reports every episode", async () => {
        const { env } = await makeEnv({ endAfter: 2 });
        const init = vi.fn();
        const start = vi.fn();
        const complete = vi.fn();
        env.on("env:init", init);
        env.on("episode:start", start);
        env.on("episode:complete", complete);

        await env.reset();
        await env.step(TOUCH);
        await env.step(TOUCH);
        await env.reset();

        expect(init).toHaveBeenCalledTimes(1);
        expect(init.mock.calls[0][0].task.id).toBe("score_task");
        expect(start.mock.calls.map((call) => call[0].episode)).toEqual([1, 2]);
        expect(complete).toHaveBeenCalledWith({
            episodeId: start.mock.calls[0][0].episodeId,
            reason: "episode_end",
            steps: 2,
        });
        expect(env.episodeId).toBe(start.mock.calls[1][0].episodeId);
    });
});

describe("EpisodeEnvironment.close()", () => {
    it("closes the backend once however often it is called", async () => {
        const { env, coordinator } = await makeEnv();
        const closed = vi.fn();
        env.on("env:close", closed);

        await env.close();
        await env.close();

        expect(coordinator.close).toHaveBeenCalledTimes(1);
        expect(closed).toHaveBeenCalledTimes(1);
        expect(env.isClosed).toBe(true);
    });

    it("refuses reset and step once closed", async () => {
        const { env } = await makeEnv();
        await env.close();

        await expect(env.reset()).rejects.toThrow(EnvironmentClosedError);
        await expect(env.step(TOUCH)).rejects.toThrow(EnvironmentClosedError);
    });

    it("never rejects when the backend fails to close", async () => {
        const { env, coordinator } = await makeEnv();
        const failure = new Error("already gone");
        coordinator.close.mockImplementation(() => {
            throw failure;
        });
        const failed = vi.fn();
        env.on("close:failed", failed);

        await expect(env.close()).resolves.toBeUndefined();

        expect(failed).toHaveBeenCalledWith({ error: failure });
        expect(coordinator.close).toHaveBeenCalledTimes(1);
    });
});
