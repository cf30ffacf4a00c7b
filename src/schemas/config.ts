/**
 * Configuration — Tunable parameters for the environment and the simulated device.
 */
import { z } from "zod/v4";

/**
 * Options accepted by `EpisodeEnvironment`.
 */
export const EnvironmentConfig = z.object({
    /** Prefix of the step and action-type counters in the telemetry export. */
    telemetry_prefix: z.string().min(1).default("simenv"),
});
export type EnvironmentConfig = z.infer<typeof EnvironmentConfig>;
export type EnvironmentConfigInput = z.input<typeof EnvironmentConfig>;

/**
 * Options for the in-process `SimulatedDevice`.
 */
export const SimulationConfig = z.object({
    // --- Screen ---
    screen_height: z.number().int().positive().default(84),
    screen_width: z.number().int().positive().default(84),
    screen_channels: z.number().int().positive().default(3),
    /** Side length, in pixels, of the square the agent has to touch. */
    target_size: z.number().int().positive().default(12),
    /** Simulated time between two observations, in microseconds. */
    frame_interval_us: z.number().int().positive().default(100000),

    // --- Fault injection ---
    /** Ask for a simulator restart after this many executed actions. 0 disables. */
    restart_every_steps: z.number().int().nonnegative().default(0),
    /** Report a step timeout after this many actions within an episode. 0 disables. */
    timeout_every_steps: z.number().int().nonnegative().default(0),

    /** Seed for target placement. */
    seed: z.number().int().default(1),
});
export type SimulationConfig = z.infer<typeof SimulationConfig>;
export type SimulationConfigInput = z.input<typeof SimulationConfig>;
