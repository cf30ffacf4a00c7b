/**
 * SimulatedDevice — An in-process backend coordinator.
 *
 * Renders a blank screen with one bright square on it and reports whether the
 * last TOUCH landed on the square. Restarts and step timeouts can be injected
 * every N actions to exercise the environment's termination paths.
 */
import { EventEmitter } from "events";
import { actionTypeFromId } from "../schemas/actions.js";
import type { Action } from "../schemas/actions.js";
import { item, ndarray, scalar } from "../schemas/array.js";
import type { ArrayMap } from "../schemas/array.js";
import { SimulationConfig } from "../schemas/config.js";
import type { SimulationConfigInput } from "../schemas/config.js";
import type { ScreenDimensions } from "../schemas/device.js";
import type { BackendCoordinator } from "../core/collaborators.js";
import { createRandom, randomInt } from "./random.js";

/** Supported events emitted by the SimulatedDevice. */
export interface DeviceEvents {
    reset: [];
    restart: [{ restarts: number }];
}

/** Top-left corner and side length of the target square, in pixels. */
export interface TargetSquare {
    row: number;
    col: number;
    size: number;
}

const TARGET_VALUE = 255;

export class SimulatedDevice extends EventEmitter implements BackendCoordinator {
    public readonly config: SimulationConfig;

    private readonly random: () => number;
    private target: TargetSquare;
    private lastHit = false;

    private actionsSinceRestart = 0;
    private actionsThisEpisode = 0;
    private restartRequested = false;
    private timedOut = false;

    private restarts = 0;
    private actions = 0;
    private closed = false;

    constructor(config: SimulationConfigInput = {}) {
        super();
        this.config = SimulationConfig.parse(config);
        this.random = createRandom(this.config.seed);
        const size = Math.min(this.config.target_size, this.config.screen_height, this.config.screen_width);
        this.target = { row: 0, col: 0, size };
    }

    screenDimensions(): ScreenDimensions {
        return {
            height: this.config.screen_height,
            width: this.config.screen_width,
            channels: this.config.screen_channels,
        };
    }

    get targetSquare(): TargetSquare {
        return { ...this.target };
    }

    /** Whether the most recent action was a TOUCH inside the target square. */
    get lastActionHitTarget(): boolean {
        return this.lastHit;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    reset(): void {
        this.assertOpen();
        this.actionsThisEpisode = 0;
        this.timedOut = false;
        this.lastHit = false;
        this.placeTarget();
        this.emit("reset");
    }

    executeAction(action: Action | null): ArrayMap {
        this.assertOpen();
        if (action === null) return this.render(0);

        const type = actionTypeFromId(item(action.action_type) ?? -1);
        const position = action.touch_position.data;
        this.lastHit = type === "TOUCH" && this.hits(position[0], position[1]);

        this.actions += 1;
        this.actionsSinceRestart += 1;
        this.actionsThisEpisode += 1;
        const { restart_every_steps, timeout_every_steps } = this.config;
        if (restart_every_steps > 0 && this.actionsSinceRestart >= restart_every_steps) {
            this.restartRequested = true;
        }
        if (timeout_every_steps > 0 && this.actionsThisEpisode % timeout_every_steps === 0) {
            this.timedOut = true;
        }
        return this.render(this.config.frame_interval_us);
    }

    shouldRestart(): boolean {
        return this.restartRequested;
    }

    restartSimulator(): void {
        this.assertOpen();
        this.restartRequested = false;
        this.actionsSinceRestart = 0;
        this.restarts += 1;
        this.emit("restart", { restarts: this.restarts });
    }

    /** Reports a pending timeout once, then clears it. */
    checkTimeout(): boolean {
        const timedOut = this.timedOut;
        this.timedOut = false;
        return timedOut;
    }

    logDict(): Record<string, number> {
        return {
            simulator_restarts: this.restarts,
            device_actions: this.actions,
        };
    }

    close(): void {
        this.closed = true;
    }

    private assertOpen(): void {
        if (this.closed) throw new Error("Simulated device is closed.");
    }

    private placeTarget(): void {
        const { size } = this.target;
        this.target = {
            row: randomInt(this.random, 0, this.config.screen_height - size),
            col: randomInt(this.random, 0, this.config.screen_width - size),
            size,
        };
    }

    /** Map a normalized `[x, y]` position to a pixel and test it against the target. */
    private hits(x: number, y: number): boolean {
        const col = Math.min(this.config.screen_width - 1, Math.floor(x * this.config.screen_width));
        const row = Math.min(this.config.screen_height - 1, Math.floor(y * this.config.screen_height));
        const { row: top, col: left, size } = this.target;
        return row >= top && row < top + size && col >= left && col < left + size;
    }

    private render(timedeltaUs: number): ArrayMap {
        const { screen_height: height, screen_width: width, screen_channels: channels } = this.config;
        const pixels = new Uint8Array(height * width * channels);
        const { row: top, col: left, size } = this.target;
        for (let row = top; row < top + size; row++) {
            for (let col = left; col < left + size; col++) {
                const offset = (row * width + col) * channels;
                pixels.fill(TARGET_VALUE, offset, offset + channels);
            }
        }
        return {
            pixels: ndarray("uint8", [height, width, channels], pixels),
            timedelta: scalar("int64", timedeltaUs),
            orientation: ndarray("uint8", [4], [1, 0, 0, 0]),
        };
    }
}
