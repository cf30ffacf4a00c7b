import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import type { EnvironmentDescription } from "../../core/environment.js";
import { withEnvironment } from "../../core/scope.js";
import { validateAll } from "../../core/specs.js";
import type { TelemetryScope } from "../../core/telemetry.js";
import type { TerminationReason } from "../../schemas/timestep.js";
import { SimulatedDevice } from "../../sim/device.js";
import { TapTargetTask } from "../../sim/tapTarget.js";
import { randomAction } from "../../sim/policy.js";
import { createRandom } from "../../sim/random.js";
import { assertEpisodesBounded, loadTaskFromFile, parseIntegerOption, resolveTaskPath } from "./task.js";

interface SimulateOptions {
    task?: string;
    episodes?: string;
    seed?: string;
    restartEvery?: string;
    timeoutEvery?: string;
}

const REASON_COLORS: Record<TerminationReason, (text: string) => string> = {
    episode_end: chalk.green,
    restart: chalk.red,
    timeout: chalk.yellow,
};

export async function simulateCommand(options: SimulateOptions) {
    p.intro(chalk.bgCyan.black(" simenv - Simulation "));
    const spinner = ora();

    try {
        const task = await loadTaskFromFile(resolveTaskPath(options.task));
        const episodes = parseIntegerOption("--episodes", options.episodes, process.env.SIMENV_EPISODES, 3);
        const seed = parseIntegerOption("--seed", options.seed, process.env.SIMENV_SEED, 1);
        if (episodes < 1) throw new Error(`Invalid --episodes value: ${episodes}`);

        const restartEvery = parseIntegerOption("--restart-every", options.restartEvery, undefined, 0);
        const timeoutEvery = parseIntegerOption("--timeout-every", options.timeoutEvery, undefined, 0);
        assertEpisodesBounded(task, { restartEvery, timeoutEvery });

        const device = new SimulatedDevice({
            seed,
            restart_every_steps: restartEvery,
            timeout_every_steps: timeoutEvery,
        });
        const taskManager = new TapTargetTask(task, device);

        p.log.info(chalk.bold(`Task: ${task.name}`));
        spinner.start("Starting environment...");
        const summaries: string[] = [];

        const telemetry = await withEnvironment({ coordinator: device, taskManager, task }, async (env) => {
            env.on("env:init", ({ observationSpec, taskExtrasSpec }: EnvironmentDescription) => {
                const pixels = observationSpec.pixels;
                summaries.push(chalk.dim(`Screen ${pixels.shape.join("x")}, ${Object.keys(taskExtrasSpec).length} task extras`));
            });
            env.on("episode:start", ({ episode }: { episode: number }) => {
                spinner.text = `Episode ${episode}/${episodes}...`;
            });
            env.on("telemetry:ratios-skipped", ({ scope }: { scope: TelemetryScope }) => {
                summaries.push(chalk.yellow(`${scope}_steps is 0. Skipping ratio logs.`));
            });
            env.on("close:failed", ({ error }: { error: unknown }) => {
                summaries.push(chalk.yellow(`Failed to close the device: ${error instanceof Error ? error.message : String(error)}`));
            });

            const random = createRandom(seed);
            for (let episode = 1; episode <= episodes; episode++) {
                let timestep = await env.reset();
                let episodeReturn = 0;
                while (timestep.stepType !== "LAST") {
                    const action = validateAll(randomAction(random), env.actionSpec());
                    timestep = await env.step(action);
                    episodeReturn += timestep.reward;
                }

                const reason = env.terminationReason ?? "episode_end";
                const steps = env.counters("episode").steps;
                const extras = env.taskExtras();
                const hits = extras.hits ? extras.hits.data[0] : 0;
                summaries.push(
                    `Episode ${episode}: ${REASON_COLORS[reason](reason)}  steps=${steps}  return=${episodeReturn.toFixed(1)}  hits=${hits}`,
                );
            }

            return env.telemetry();
        });

        spinner.succeed(chalk.green(`Ran ${episodes} episode(s).`));
        for (const summary of summaries) p.log.message(summary);

        const lines = Object.entries(telemetry)
            .map(([name, value]) => `${name}: ${Number.isInteger(value) ? value : value.toFixed(3)}`);
        p.note(lines.join("\n"), "Telemetry");
        p.outro(chalk.green("Simulation completed."));
    } catch (err) {
        if (spinner.isSpinning) spinner.fail(chalk.red("Simulation failed."));
        p.log.error(chalk.red("Simulation error:"));
        p.log.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }
}
