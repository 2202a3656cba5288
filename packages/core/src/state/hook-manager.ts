import type { Logger } from "pino";
import { asError } from "../faults/fault-error.js";
import type { Action, BudgetState, ExecutionResult, TokenUsage } from "../types/messages.js";
import type { ControllerState, TaskOutcome } from "../types/task.js";

export interface HookContext {
    taskId: string;
    turn: number;
    state: ControllerState;
    budget: BudgetState;
    model: string;
}

export interface TurnSummary {
    turn: number;
    action: Action;
    result: ExecutionResult;
    usage: TokenUsage;
    budget: BudgetState;
    elided: number;
    /** Wall time of the whole turn, model call included */
    elapsedMs: number;
    terminal: boolean;
}

export interface AgentHook {
    readonly name: string;
    onTurnStart(ctx: HookContext): void | Promise<void>;
    onTurnEnd(ctx: HookContext, summary: TurnSummary): void | Promise<void>;
    onTaskEnd(ctx: HookContext, outcome: TaskOutcome): void | Promise<void>;
}

export type HookEvent = "turnStart" | "turnEnd" | "taskEnd";

export interface HookFailure {
    hook: string;
    event: HookEvent;
    error: Error;
}

/**
 * HookManager
 * Invokes observers in registration order. A failing hook is logged and
 * reported; it never stops the remaining hooks or the loop.
 */
export class HookManager {
    private readonly hooks: AgentHook[] = [];

    constructor(private readonly logger: Logger) {}

    register(hook: AgentHook): void {
        this.hooks.push(hook);
    }

    list(): AgentHook[] {
        return [...this.hooks];
    }

    turnStart(ctx: HookContext): Promise<HookFailure[]> {
        return this.emit("turnStart", (hook) => hook.onTurnStart(ctx));
    }

    turnEnd(ctx: HookContext, summary: TurnSummary): Promise<HookFailure[]> {
        return this.emit("turnEnd", (hook) => hook.onTurnEnd(ctx, summary));
    }

    taskEnd(ctx: HookContext, outcome: TaskOutcome): Promise<HookFailure[]> {
        return this.emit("taskEnd", (hook) => hook.onTaskEnd(ctx, outcome));
    }

    private async emit(event: HookEvent, invoke: (hook: AgentHook) => void | Promise<void>): Promise<HookFailure[]> {
        const failures: HookFailure[] = [];
        for (const hook of this.hooks) {
            try {
                await invoke(hook);
            } catch (caught) {
                const error = asError(caught);
                failures.push({ hook: hook.name, event, error });
                this.logger.error({ hook: hook.name, event, err: error }, "Hook execution failed");
            }
        }
        return failures;
    }
}
