import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import chalk, { type ChalkInstance } from "chalk";
import {
    ConfigError,
    createSilentLogger,
    findResumePoint,
    readTrajectory,
    recoveryHint,
    runBatch,
    summarizeTrajectoryCost,
    trajectoryToMarkdown,
    type BatchSummary,
    type ResumePoint,
    type RunConfig,
    type TaskResult,
    type TaskSpec,
    type UsageStats,
} from "@patchloop/core";
import { createController, createRuntime, openUsageLedger, shutdownRuntime, type RuntimeOverrides } from "./runtime.js";

export interface CommandOutput {
    log(line: string): void;
    error(line: string): void;
}

export const consoleOutput: CommandOutput = {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
};

export interface CommandContext {
    output?: CommandOutput;
    colors?: ChalkInstance;
    overrides?: RuntimeOverrides;
    signal?: AbortSignal;
}

const STATE_COLORS: Record<TaskResult["outcome"]["state"], "green" | "red" | "yellow" | "magenta"> = {
    DONE: "green",
    FAILED: "red",
    BUDGET_EXCEEDED: "yellow",
    MAX_TURNS: "magenta",
};

export function formatResult(result: TaskResult, colors: ChalkInstance = chalk): string {
    const state = colors[STATE_COLORS[result.outcome.state]](result.outcome.state.padEnd(15));
    const cost = `$${result.budget.costUsd.toFixed(4)}`;
    const tokens = result.budget.tokensSent + result.budget.tokensReceived;
    return `${state} ${result.taskId}  turns=${result.turns} tokens=${tokens} cost=${cost}  ${colors.gray(result.outcome.reason)}`;
}

export function formatCounts(summary: BatchSummary, colors: ChalkInstance = chalk): string {
    const parts = Object.entries(summary.counts).map(([state, count]) => `${state}=${count}`);
    const spent = summary.budget ? ` shared cost=$${summary.budget.costUsd.toFixed(4)}` : "";
    return colors.bold(`${summary.results.length} task(s): ${parts.join(" ")}${spent}`);
}

export function selectTask(tasks: TaskSpec[], taskId?: string): TaskSpec {
    if (taskId) {
        const task = tasks.find((candidate) => candidate.id === taskId);
        if (!task) throw new Error(`Task "${taskId}" not found (available: ${tasks.map((t) => t.id).join(", ")})`);
        return task;
    }
    const [only, ...rest] = tasks;
    if (!only) throw new Error("The task file contains no tasks");
    if (rest.length > 0) throw new Error(`The task file contains ${tasks.length} tasks; pick one with --task-id`);
    return only;
}

export interface RunCommandOptions {
    config: RunConfig;
    task: TaskSpec;
    resume?: boolean;
}

export async function runCommand(options: RunCommandOptions, ctx: CommandContext = {}): Promise<TaskResult> {
    const output = ctx.output ?? consoleOutput;
    const colors = ctx.colors ?? chalk;
    const runtime = await createRuntime(options.config, ctx.overrides);
    try {
        let resume: ResumePoint | undefined;
        if (options.resume) {
            resume = await findResumePoint(options.config.trajectory.dir, options.task);
            if (resume) output.log(colors.gray(`Resuming ${options.task.id} after turn ${resume.state.turns}`));
        }
        const result = await createController(runtime, options.task, { resume, signal: ctx.signal }).run();
        output.log(formatResult(result, colors));
        if (result.outcome.fault) {
            output.log(colors.yellow(`Hint: ${recoveryHint(result.outcome.fault.kind)}`));
        }
        if (result.outcome.submission) {
            output.log(colors.bold("Submission:"));
            output.log(result.outcome.submission);
        }
        output.log(colors.gray(`Trajectory: ${result.trajectoryPath}`));
        return result;
    } finally {
        await shutdownRuntime(runtime);
    }
}

export interface BatchCommandOptions {
    config: RunConfig;
    tasks: TaskSpec[];
    concurrency?: number;
    resume?: boolean;
}

export async function batchCommand(options: BatchCommandOptions, ctx: CommandContext = {}): Promise<BatchSummary> {
    const output = ctx.output ?? consoleOutput;
    const colors = ctx.colors ?? chalk;
    const runtime = await createRuntime(options.config, ctx.overrides);
    try {
        const summary = await runBatch(options.tasks, {
            concurrency: options.concurrency ?? options.config.batch.concurrency,
            trajectoryDir: options.config.trajectory.dir,
            logger: runtime.logger,
            sharedBudget: runtime.sharedBudget,
            resume: options.resume,
            signal: ctx.signal,
            createRunner: (task, resume) => createController(runtime, task, { resume, signal: ctx.signal }),
            onResult: (result) => output.log(formatResult(result, colors)),
        });
        output.log(formatCounts(summary, colors));
        return summary;
    } finally {
        await shutdownRuntime(runtime);
    }
}

export type ShowFormat = "markdown" | "cost" | "json";

export interface ShowCommandOptions {
    trajectory: string;
    format: ShowFormat;
    /** Written to stdout when absent */
    out?: string;
}

export async function renderTrajectory(filePath: string, format: ShowFormat): Promise<string> {
    const { lines, partial } = await readTrajectory(filePath);
    switch (format) {
        case "markdown": {
            const markdown = trajectoryToMarkdown(lines);
            return partial ? `${markdown}\n_The last line of this trajectory is incomplete and was skipped._\n` : markdown;
        }
        case "cost":
            return JSON.stringify(summarizeTrajectoryCost(lines), null, 2);
        case "json":
            return JSON.stringify(lines, null, 2);
    }
}

export async function showCommand(options: ShowCommandOptions, ctx: CommandContext = {}): Promise<void> {
    const output = ctx.output ?? consoleOutput;
    const rendered = await renderTrajectory(resolve(options.trajectory), options.format);
    if (!options.out) {
        output.log(rendered);
        return;
    }
    const target = resolve(options.out);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, rendered, "utf8");
    output.log(`Wrote ${options.format} view to ${target}`);
}

export function formatUsage(stats: UsageStats, colors: ChalkInstance = chalk): string[] {
    const limit = (value: number, ceiling?: number) => (ceiling === undefined ? `${value}` : `${value}/${ceiling}`);
    const lines = [
        colors.bold(
            `hour=${limit(stats.hourTokens, stats.ceilings.hourlyTokens)} ` +
                `day=${limit(stats.dayTokens, stats.ceilings.dailyTokens)} ` +
                `total=${limit(stats.totalTokens, stats.ceilings.totalTokens)} ` +
                `cost=$${stats.totalCostUsd.toFixed(4)}`
        ),
    ];
    for (const [model, tokens] of Object.entries(stats.byModel)) {
        lines.push(`  ${model}: ${tokens} tokens`);
    }
    return lines;
}

export async function usageCommand(config: RunConfig, ctx: CommandContext = {}): Promise<UsageStats> {
    const output = ctx.output ?? consoleOutput;
    const ledger = await openUsageLedger(config, ctx.overrides?.logger ?? createSilentLogger());
    if (!ledger) {
        throw new ConfigError("No usage ledger configured; set usage.ledger in the run config");
    }
    const stats = ledger.stats();
    for (const line of formatUsage(stats, ctx.colors ?? chalk)) {
        output.log(line);
    }
    return stats;
}
