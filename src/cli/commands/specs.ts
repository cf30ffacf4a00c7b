import * as p from "@clack/prompts";
import chalk from "chalk";
import { actionSpec, observationSpec, taskExtrasSpec } from "../../core/specs.js";
import type { ArraySpec, SpecMap } from "../../schemas/array.js";
import { SimulationConfig } from "../../schemas/config.js";
import { loadTaskFromFile, resolveTaskPath } from "./task.js";

interface SpecsOptions {
    task?: string;
}

function formatSpec(spec: ArraySpec): string {
    const parts = [`${spec.dtype}[${spec.shape.join(", ")}]`];
    if (spec.minimum !== undefined || spec.maximum !== undefined) {
        parts.push(`bounds [${spec.minimum ?? "-inf"}, ${spec.maximum ?? "inf"}]`);
    }
    if (spec.numValues !== undefined) parts.push(`${spec.numValues} values`);
    return parts.join("  ");
}

function printSpecs(title: string, specs: SpecMap): void {
    const lines = Object.values(specs).map((spec) => `${chalk.cyan(spec.name)}  ${formatSpec(spec)}`);
    p.note(lines.length > 0 ? lines.join("\n") : chalk.dim("(none)"), title);
}

export async function specsCommand(options: SpecsOptions) {
    p.intro(chalk.bgCyan.black(" simenv - Specs "));

    try {
        const task = await loadTaskFromFile(resolveTaskPath(options.task));
        const simulation = SimulationConfig.parse({});

        p.log.info(chalk.bold(`Task: ${task.name}`));
        if (task.description) p.log.info(chalk.dim(task.description));

        printSpecs("Action spec", actionSpec());
        printSpecs("Observation spec", observationSpec({
            height: simulation.screen_height,
            width: simulation.screen_width,
            channels: simulation.screen_channels,
        }));
        printSpecs("Task extras spec", taskExtrasSpec(task));

        p.outro("Done.");
    } catch (err) {
        p.log.error(chalk.red("Failed to load task:"));
        p.log.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }
}
