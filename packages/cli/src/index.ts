#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { resolve } from "node:path";
import { loadTasks } from "@patchloop/core";
import { batchCommand, consoleOutput, runCommand, selectTask, showCommand, usageCommand } from "./commands.js";
import { resolveRunConfig } from "./config.js";

async function main() {
    const controller = new AbortController();
    let interrupted = false;
    process.on("SIGINT", () => {
        if (interrupted) process.exit(130);
        interrupted = true;
        consoleOutput.error(chalk.yellow("Interrupted; finishing the current step. Press Ctrl-C again to exit now."));
        controller.abort(new Error("interrupted"));
    });

    await yargs(hideBin(process.argv))
        .scriptName("patchloop")
        .option("config", { type: "string", alias: "c", description: "Run config (YAML)" })
        .option("model", { type: "string", description: "Model name; overrides model.name" })
        .option("provider", { type: "string", description: "Model provider (openai, anthropic, auto); overrides model.provider" })
        .option("sandbox", { type: "string", choices: ["local", "docker"] as const, description: "Sandbox provider" })
        .option("trajectory-dir", { type: "string", description: "Where trajectories are written" })
        .option("log-level", {
            type: "string",
            choices: ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const,
            description: "Log level for the stderr log",
        })
        .command(
            "run <tasks>",
            "Run one task until it is done or a limit is reached",
            (y) =>
                y
                    .positional("tasks", { type: "string", demandOption: true, description: "Task file (YAML or JSON)" })
                    .option("task-id", { type: "string", description: "Task to run when the file holds several" })
                    .option("resume", { type: "boolean", default: false, description: "Continue an interrupted trajectory" })
                    .option("replay", { type: "string", description: "Answer model calls from a recorded trajectory" }),
            async (argv) => {
                const config = await resolveRunConfig(argv);
                const task = selectTask(await loadTasks(resolve(argv.tasks)), argv.taskId);
                const result = await runCommand(
                    { config, task, resume: argv.resume },
                    { signal: controller.signal, overrides: { replay: argv.replay ? resolve(argv.replay) : undefined } }
                );
                process.exitCode = result.outcome.state === "DONE" ? 0 : 1;
            }
        )
        .command(
            "batch <tasks>",
            "Run every task in a file through a worker pool",
            (y) =>
                y
                    .positional("tasks", { type: "string", demandOption: true, description: "Task file (YAML or JSON)" })
                    .option("concurrency", { type: "number", description: "Tasks run at once; overrides batch.concurrency" })
                    .option("resume", { type: "boolean", default: false, description: "Skip finished tasks and continue interrupted ones" }),
            async (argv) => {
                const config = await resolveRunConfig(argv);
                const tasks = await loadTasks(resolve(argv.tasks));
                const summary = await batchCommand(
                    { config, tasks, concurrency: argv.concurrency, resume: argv.resume },
                    { signal: controller.signal }
                );
                process.exitCode = summary.counts.FAILED > 0 ? 1 : 0;
            }
        )
        .command(
            "show <trajectory>",
            "Render a recorded trajectory",
            (y) =>
                y
                    .positional("trajectory", { type: "string", demandOption: true, description: "Trajectory file (.jsonl)" })
                    .option("format", {
                        type: "string",
                        choices: ["markdown", "cost", "json"] as const,
                        default: "markdown" as const,
                        description: "markdown transcript, cost summary, or parsed records",
                    })
                    .option("out", { type: "string", alias: "o", description: "Write to this file instead of stdout" }),
            async (argv) => {
                await showCommand({ trajectory: argv.trajectory, format: argv.format, out: argv.out });
            }
        )
        .command(
            "usage",
            "Print token usage recorded in the usage ledger",
            (y) => y,
            async (argv) => {
                await usageCommand(await resolveRunConfig(argv));
            }
        )
        .demandCommand(1)
        .strict()
        .help()
        .parseAsync();
}

main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    consoleOutput.error(`${chalk.red("\nFatal Error:")} ${message}`);
    process.exit(1);
});
