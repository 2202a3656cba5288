import * as fs from "node:fs/promises";
import { dirname, resolve } from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { TaskSpecSchema } from "../events/trajectory-schema.js";
import type { TaskSpec } from "../types/task.js";

const BackoffRuleSchema = z.object({
    maxAttempts: z.number().int().positive(),
    baseDelayMs: z.number().nonnegative(),
});

const RetrySettingsSchema = z.object({
    transient: BackoffRuleSchema.default({ maxAttempts: 3, baseDelayMs: 1_000 }),
    rateLimit: BackoffRuleSchema.default({ maxAttempts: 5, baseDelayMs: 5_000 }),
    multiplier: z.number().min(1).default(2),
    maxDelayMs: z.number().positive().default(60_000),
    jitterRatio: z.number().min(0).max(1).default(0.1),
});

const TemplatesSchema = z.object({
    system: z.string().optional(),
    instance: z.string().optional(),
    observation: z.string().optional(),
    emptyOutput: z.string().optional(),
    fault: z.string().optional(),
    formatError: z.string().optional(),
    submitted: z.string().optional(),
    sessionReset: z.string().optional(),
});

export const RunConfigSchema = z.object({
    model: z.object({
        provider: z.string().min(1),
        name: z.string().min(1),
        baseURL: z.string().url().optional(),
        temperature: z.number().min(0).max(2).optional(),
        maxOutputTokens: z.number().int().positive().optional(),
        timeoutMs: z.number().int().positive().default(300_000),
        cache: z
            .object({
                enabled: z.boolean().default(false),
                ttlMs: z.number().int().positive().default(3_600_000),
                maxEntries: z.number().int().positive().default(1_000),
                /** Keeps entries across runs as one JSON file per entry */
                dir: z.string().optional(),
            })
            .default({}),
        rates: z
            .object({
                inputUsdPerMillion: z.number().nonnegative(),
                outputUsdPerMillion: z.number().nonnegative(),
            })
            .optional(),
    }),
    sandbox: z
        .object({
            provider: z.enum(["local", "docker"]).default("docker"),
            executeTimeoutMs: z.number().int().positive().default(120_000),
            closeGraceMs: z.number().int().positive().default(10_000),
        })
        .default({}),
    limits: z
        .object({
            maxTurns: z.number().int().positive().default(50),
            maxFormatRetries: z.number().int().nonnegative().default(3),
            maxTokens: z.number().int().positive().optional(),
            maxCostUsd: z.number().positive().optional(),
            globalMaxTokens: z.number().int().positive().optional(),
            globalMaxCostUsd: z.number().positive().optional(),
        })
        .default({}),
    history: z
        .object({
            contextBudgetTokens: z.number().int().positive().default(100_000),
            keepRecent: z.number().int().nonnegative().default(6),
            tightenRatio: z.number().gt(0).lt(1).default(0.75),
        })
        .default({}),
    retry: z
        .object({
            model: RetrySettingsSchema.default({}),
            sandbox: RetrySettingsSchema.default({}),
        })
        .default({}),
    parser: z.object({ format: z.enum(["fenced", "json"]).default("fenced") }).default({}),
    output: z
        .object({
            maxLines: z.number().int().positive().default(400),
            maxBytes: z.number().int().positive().default(32 * 1024),
        })
        .default({}),
    tools: z.object({ bundle: z.string().optional() }).default({}),
    trajectory: z.object({ dir: z.string().default("trajectories") }).default({}),
    activityLog: z.string().optional(),
    usage: z
        .object({
            ledger: z.string().optional(),
            hourlyTokens: z.number().int().positive().optional(),
            dailyTokens: z.number().int().positive().optional(),
            totalTokens: z.number().int().positive().optional(),
        })
        .default({}),
    logging: z
        .object({ level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info") })
        .default({}),
    templates: TemplatesSchema.default({}),
    batch: z.object({ concurrency: z.number().int().positive().default(4) }).default({}),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function parseYaml(text: string, source: string): unknown {
    try {
        return yaml.load(text);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`${source} is not valid YAML: ${detail}`);
    }
}

export function parseRunConfig(text: string, source = "run config"): RunConfig {
    const parsed = RunConfigSchema.safeParse(parseYaml(text, source) ?? {});
    if (!parsed.success) {
        throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Relative paths inside the file (trajectory dir, tool bundle, activity
 * log, usage ledger, cache dir) are resolved against the file's directory.
 */
export async function loadRunConfig(filePath: string): Promise<RunConfig> {
    const config = parseRunConfig(await fs.readFile(filePath, "utf8"), filePath);
    const base = dirname(resolve(filePath));
    return {
        ...config,
        tools: { bundle: config.tools.bundle ? resolve(base, config.tools.bundle) : undefined },
        trajectory: { dir: resolve(base, config.trajectory.dir) },
        activityLog: config.activityLog ? resolve(base, config.activityLog) : undefined,
        usage: { ...config.usage, ledger: config.usage.ledger ? resolve(base, config.usage.ledger) : undefined },
        model: {
            ...config.model,
            cache: { ...config.model.cache, dir: config.model.cache.dir ? resolve(base, config.model.cache.dir) : undefined },
        },
    };
}

const TaskFileSchema = z.union([z.array(TaskSpecSchema), z.object({ tasks: z.array(TaskSpecSchema) }), TaskSpecSchema]);

/**
 * Accepts a single task, a list of tasks, or `{ tasks: [...] }`.
 */
export function parseTasks(text: string, source = "task file"): TaskSpec[] {
    const parsed = TaskFileSchema.safeParse(parseYaml(text, source));
    if (!parsed.success) {
        throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
    }
    const data = parsed.data;
    const tasks = Array.isArray(data) ? data : "tasks" in data ? data.tasks : [data];
    const seen = new Set<string>();
    for (const task of tasks) {
        if (seen.has(task.id)) {
            throw new ConfigError(`Duplicate task id "${task.id}" in ${source}`);
        }
        seen.add(task.id);
    }
    return tasks;
}

export async function loadTasks(filePath: string): Promise<TaskSpec[]> {
    return parseTasks(await fs.readFile(filePath, "utf8"), filePath);
}
