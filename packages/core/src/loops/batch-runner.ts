import * as fs from "node:fs/promises";
import type { Logger } from "pino";
import { trajectoryPath } from "../events/trajectory-recorder.js";
import { readTrajectory, replayTrajectory, type ReplayState } from "../events/trajectory-reader.js";
import { asError } from "../faults/fault-error.js";
import type { SharedBudget } from "../state/budget-tracker.js";
import type { BudgetState } from "../types/messages.js";
import type { TaskResult, TaskSpec } from "../types/task.js";

export interface ResumePoint {
    state: ReplayState;
    validBytes: number;
}

export interface TaskRunner {
    run(): Promise<TaskResult>;
}

export interface BatchOptions {
    concurrency: number;
    trajectoryDir: string;
    logger: Logger;
    createRunner: (task: TaskSpec, resume?: ResumePoint) => TaskRunner;
    sharedBudget?: SharedBudget;
    /** Continue unfinished trajectories instead of starting over */
    resume?: boolean;
    signal?: AbortSignal;
    onResult?: (result: TaskResult) => void;
}

export interface BatchSummary {
    results: TaskResult[];
    counts: Record<TaskResult["outcome"]["state"], number>;
    budget?: BudgetState;
}

function emptyBudget(): BudgetState {
    return { tokensSent: 0, tokensReceived: 0, costUsd: 0, calls: 0, ceilings: {} };
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Looks for an earlier trajectory of `task`. A file with an outcome line is
 * returned as-is so the batch can skip it; a file without one is a resume
 * point.
 */
export async function findResumePoint(trajectoryDir: string, task: TaskSpec): Promise<ResumePoint | undefined> {
    const filePath = trajectoryPath(trajectoryDir, task.id);
    if (!(await exists(filePath))) return undefined;
    const { lines, validBytes } = await readTrajectory(filePath);
    if (lines.length === 0) return undefined;
    const state = replayTrajectory(lines);
    if (state.header.task.id !== task.id) {
        throw new Error(`Trajectory ${filePath} belongs to task ${state.header.task.id}`);
    }
    return { state, validBytes };
}

/**
 * Runs tasks through a fixed pool of workers. Results come back in input
 * order. Once the shared budget is spent, tasks that have not started are
 * reported as BUDGET_EXCEEDED without running.
 */
export async function runBatch(tasks: TaskSpec[], options: BatchOptions): Promise<BatchSummary> {
    const logger = options.logger.child({ component: "batch" });
    const results: TaskResult[] = new Array<TaskResult>(tasks.length);
    let cursor = 0;

    const skipped = (task: TaskSpec, reason: string, state: "BUDGET_EXCEEDED" | "FAILED"): TaskResult => ({
        taskId: task.id,
        outcome: { state, reason },
        turns: 0,
        budget: emptyBudget(),
        trajectoryPath: trajectoryPath(options.trajectoryDir, task.id),
    });

    const runOne = async (task: TaskSpec): Promise<TaskResult> => {
        if (options.signal?.aborted) {
            return skipped(task, "cancelled", "FAILED");
        }
        const breach = options.sharedBudget?.breach();
        if (breach) {
            return skipped(task, `${breach} before the task started`, "BUDGET_EXCEEDED");
        }

        let resume: ResumePoint | undefined;
        if (options.resume) {
            try {
                resume = await findResumePoint(options.trajectoryDir, task);
            } catch (error) {
                logger.warn({ taskId: task.id, err: asError(error) }, "Ignoring unreadable trajectory");
            }
            if (resume?.state.outcome) {
                logger.info({ taskId: task.id, state: resume.state.outcome.state }, "Task already finished, skipping");
            }
        }

        try {
            return await options.createRunner(task, resume).run();
        } catch (error) {
            const err = asError(error);
            logger.error({ taskId: task.id, err }, "Task runner crashed");
            return skipped(task, `unexpected error: ${err.message}`, "FAILED");
        }
    };

    const worker = async (): Promise<void> => {
        while (cursor < tasks.length) {
            const index = cursor++;
            const task = tasks[index];
            if (!task) continue;
            const result = await runOne(task);
            results[index] = result;
            options.onResult?.(result);
        }
    };

    const workers = Math.max(1, Math.min(options.concurrency, tasks.length));
    logger.info({ tasks: tasks.length, workers }, "Starting batch");
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const counts = { DONE: 0, FAILED: 0, BUDGET_EXCEEDED: 0, MAX_TURNS: 0 };
    for (const result of results) {
        counts[result.outcome.state] += 1;
    }
    logger.info(counts, "Batch finished");
    return { results, counts, budget: options.sharedBudget?.snapshot() };
}
