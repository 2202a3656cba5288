import type { Logger } from "pino";
import type { TaskOutcome } from "../types/task.js";
import type { AgentHook, HookContext, TurnSummary } from "./hook-manager.js";

export class LoggingHook implements AgentHook {
    readonly name = "logging";

    constructor(private readonly logger: Logger) {}

    onTurnStart(ctx: HookContext): void {
        this.logger.debug({ taskId: ctx.taskId, turn: ctx.turn }, "Turn started");
    }

    onTurnEnd(ctx: HookContext, summary: TurnSummary): void {
        this.logger.info(
            {
                taskId: ctx.taskId,
                turn: summary.turn,
                command: summary.action.command,
                exitStatus: summary.result.exitStatus,
                fault: summary.result.fault?.kind,
                tokens: summary.usage.promptTokens + summary.usage.completionTokens,
                costUsd: Number(summary.budget.costUsd.toFixed(6)),
                elided: summary.elided,
                elapsedMs: summary.elapsedMs,
            },
            "Turn completed"
        );
    }

    onTaskEnd(ctx: HookContext, outcome: TaskOutcome): void {
        const level = outcome.state === "FAILED" ? "warn" : "info";
        this.logger[level](
            { taskId: ctx.taskId, state: outcome.state, reason: outcome.reason, turns: ctx.turn, fault: outcome.fault?.kind },
            "Task finished"
        );
    }
}
