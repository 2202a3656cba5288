import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { TaskOutcome } from "../types/task.js";
import { EventLogStore } from "./event-log-store.js";
import type { AgentHook, HookContext, TurnSummary } from "./hook-manager.js";

export interface ActivityRecord {
    ts: string;
    agentId: string;
    taskId: string;
    event: "turn" | "task";
    turn: number;
    status: "success" | "failure" | "budget_exceeded" | "max_turns" | "in_progress";
    model: string;
    tokensUsed: number;
    costUsd: number;
    executionTimeMs: number;
    command?: string;
    error?: string;
}

export interface ActivityHookOptions {
    filePath: string;
    agentId?: string;
    logger: Logger;
    batchSize?: number;
    flushIntervalMs?: number;
}

const OUTCOME_STATUS: Record<TaskOutcome["state"], ActivityRecord["status"]> = {
    DONE: "success",
    FAILED: "failure",
    BUDGET_EXCEEDED: "budget_exceeded",
    MAX_TURNS: "max_turns",
};

/**
 * Feeds a JSONL activity log that dashboards tail: one line per turn and
 * one per finished task.
 */
export class ActivityHook implements AgentHook {
    readonly name = "activity";
    readonly agentId: string;
    private readonly store: EventLogStore<ActivityRecord>;
    private readonly executionMs = new Map<string, number>();

    constructor(options: ActivityHookOptions) {
        this.agentId = options.agentId ?? `agent-${randomUUID().slice(0, 8)}`;
        this.store = new EventLogStore<ActivityRecord>({
            filePath: options.filePath,
            batchSize: options.batchSize,
            flushIntervalMs: options.flushIntervalMs,
            onError: (error) => options.logger.error({ err: error, file: options.filePath }, "Activity log flush failed"),
        });
    }

    onTurnStart(): void {}

    async onTurnEnd(ctx: HookContext, summary: TurnSummary): Promise<void> {
        this.executionMs.set(ctx.taskId, (this.executionMs.get(ctx.taskId) ?? 0) + summary.result.elapsedMs);
        const record: ActivityRecord = {
            ts: new Date().toISOString(),
            agentId: this.agentId,
            taskId: ctx.taskId,
            event: "turn",
            turn: summary.turn,
            status: summary.result.fault ? "failure" : summary.terminal ? "success" : "in_progress",
            model: ctx.model,
            tokensUsed: summary.usage.promptTokens + summary.usage.completionTokens,
            costUsd: summary.budget.costUsd,
            executionTimeMs: summary.result.elapsedMs,
            command: summary.action.command,
        };
        if (summary.result.fault) record.error = summary.result.fault.message;
        await this.store.append(record);
    }

    async onTaskEnd(ctx: HookContext, outcome: TaskOutcome): Promise<void> {
        const record: ActivityRecord = {
            ts: new Date().toISOString(),
            agentId: this.agentId,
            taskId: ctx.taskId,
            event: "task",
            turn: ctx.turn,
            status: OUTCOME_STATUS[outcome.state],
            model: ctx.model,
            tokensUsed: ctx.budget.tokensSent + ctx.budget.tokensReceived,
            costUsd: ctx.budget.costUsd,
            executionTimeMs: this.executionMs.get(ctx.taskId) ?? 0,
        };
        if (outcome.state !== "DONE") record.error = outcome.reason;
        this.executionMs.delete(ctx.taskId);
        await this.store.append(record);
        await this.store.flush();
    }

    shutdown(): Promise<void> {
        return this.store.shutdown();
    }
}
