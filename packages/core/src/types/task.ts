import type { BudgetCeilings, BudgetState, FaultRecord } from "./messages.js";

export interface EnvironmentSpec {
    image?: string;
    repo?: string;
    commit?: string;
    workdir?: string;
    shell?: string[];
    setupCommands?: string[];
    env?: Record<string, string>;
}

export interface TaskSpec {
    id: string;
    problemStatement: string;
    environment: EnvironmentSpec;
    maxTurns?: number;
    ceilings?: BudgetCeilings;
    submitCommand?: string;
}

export type TerminalState = "DONE" | "FAILED" | "BUDGET_EXCEEDED" | "MAX_TURNS";

export type ControllerState =
    | "INIT"
    | "AWAITING_MODEL"
    | "PARSING"
    | "EXECUTING"
    | "RECORDING"
    | TerminalState;

export interface TaskOutcome {
    state: TerminalState;
    reason: string;
    fault?: FaultRecord;
    submission?: string;
}

export interface TaskResult {
    taskId: string;
    outcome: TaskOutcome;
    turns: number;
    budget: BudgetState;
    trajectoryPath: string;
}
