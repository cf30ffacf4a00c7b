#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();


import { Command } from "commander";
import { simulateCommand, specsCommand } from "./commands/index.js";

const program = new Command();

program
    .name("simenv")
    .description("Episode environment for a simulated device - CLI")
    .version("1.0.0");

program
    .command("specs")
    .description("Print the action, observation and task-extras specs for a task")
    .option("-t, --task <path>", "Path to the task JSON file (default: $SIMENV_TASK)")
    .action(specsCommand);

program
    .command("simulate")
    .description("Run a random policy against the simulated device and report telemetry")
    .option("-t, --task <path>", "Path to the task JSON file (default: $SIMENV_TASK)")
    .option("-e, --episodes <number>", "Number of episodes to run (default: $SIMENV_EPISODES or 3)")
    .option("--seed <number>", "Seed for the device and the policy (default: $SIMENV_SEED or 1)")
    .option("--restart-every <number>", "Inject a simulator restart every N actions")
    .option("--timeout-every <number>", "Inject a step timeout every N actions of an episode")
    .action(simulateCommand);

program.parse(process.argv);
