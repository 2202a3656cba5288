import { z } from "zod";
import type {
    Action,
    BudgetCeilings,
    BudgetState,
    ExecutionResult,
    FaultRecord,
    HistoryEntry,
    MessagePart,
    TokenUsage,
} from "../types/messages.js";
import type { EnvironmentSpec, TaskOutcome, TaskSpec } from "../types/task.js";

export const TRAJECTORY_VERSION = 1;

export const ActionSchema: z.ZodType<Action> = z.object({
    command: z.string(),
    args: z.array(z.string()),
    raw: z.string(),
    thought: z.string(),
});

const MessagePartSchema: z.ZodType<MessagePart> = z.discriminatedUnion("type", [
    z.object({ type: z.literal("text"), text: z.string() }),
    z.object({ type: z.literal("image"), mediaType: z.string(), data: z.string() }),
]);

export const HistoryEntrySchema: z.ZodType<HistoryEntry> = z.object({
    index: z.number().int(),
    turn: z.number().int().nonnegative(),
    role: z.enum(["system", "user", "assistant", "tool-observation"]),
    kind: z.enum(["prompt", "response", "observation", "corrective", "elision"]),
    content: z.union([z.string(), z.array(MessagePartSchema)]),
    action: ActionSchema.optional(),
    tokens: z.number().nonnegative(),
    pinned: z.boolean().optional(),
});

export const FaultRecordSchema: z.ZodType<FaultRecord> = z.object({
    kind: z.enum([
        "transient-network",
        "rate-limit",
        "context-too-large",
        "content-policy",
        "invalid-request",
        "session-fatal",
        "malformed-action",
    ]),
    message: z.string(),
    retryAfterMs: z.number().optional(),
    status: z.number().optional(),
    code: z.string().optional(),
    causeMessage: z.string().optional(),
});

export const ExecutionResultSchema: z.ZodType<ExecutionResult> = z.object({
    action: ActionSchema,
    output: z.string(),
    exitStatus: z.number().int().nullable(),
    elapsedMs: z.number().nonnegative(),
    truncated: z.boolean(),
    fault: FaultRecordSchema.optional(),
});

export const TokenUsageSchema: z.ZodType<TokenUsage> = z.object({
    promptTokens: z.number().nonnegative(),
    completionTokens: z.number().nonnegative(),
});

export const BudgetCeilingsSchema: z.ZodType<BudgetCeilings> = z.object({
    maxTokens: z.number().positive().optional(),
    maxCostUsd: z.number().positive().optional(),
});

export const BudgetStateSchema: z.ZodType<BudgetState> = z.object({
    tokensSent: z.number().nonnegative(),
    tokensReceived: z.number().nonnegative(),
    costUsd: z.number().nonnegative(),
    calls: z.number().int().nonnegative(),
    ceilings: BudgetCeilingsSchema,
});

export const EnvironmentSpecSchema: z.ZodType<EnvironmentSpec> = z.object({
    image: z.string().min(1).optional(),
    repo: z.string().min(1).optional(),
    commit: z.string().min(1).optional(),
    workdir: z.string().min(1).optional(),
    shell: z.array(z.string()).min(1).optional(),
    setupCommands: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
});

export const TaskSpecSchema: z.ZodType<TaskSpec> = z.object({
    id: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "task ids must be usable as file names"),
    problemStatement: z.string().min(1),
    environment: EnvironmentSpecSchema,
    maxTurns: z.number().int().positive().optional(),
    ceilings: BudgetCeilingsSchema.optional(),
    submitCommand: z.string().min(1).optional(),
});

export const TaskOutcomeSchema: z.ZodType<TaskOutcome> = z.object({
    state: z.enum(["DONE", "FAILED", "BUDGET_EXCEEDED", "MAX_TURNS"]),
    reason: z.string(),
    fault: FaultRecordSchema.optional(),
    submission: z.string().optional(),
});

export interface TaskHeaderRecord {
    type: "task";
    version: number;
    task: TaskSpec;
    model: { provider: string; name: string };
    seed: HistoryEntry[];
    ts: string;
}

export interface TurnRecord {
    type: "turn";
    turn: number;
    modelInput: HistoryEntry[];
    elided: number;
    modelOutput: string;
    action: Action;
    result: ExecutionResult;
    usage: TokenUsage;
    budget: BudgetState;
    /** Entries this turn appended to the history */
    entries: HistoryEntry[];
    ts: string;
}

export interface FormatErrorRecord {
    type: "format_error";
    turn: number;
    attempt: number;
    outcome: "none" | "multiple" | "invalid";
    reason: string;
    modelOutput: string;
    usage: TokenUsage;
    budget: BudgetState;
    entries: HistoryEntry[];
    ts: string;
}

export interface ResumeRecord {
    type: "resume";
    turn: number;
    ts: string;
}

export interface OutcomeRecord {
    type: "outcome";
    outcome: TaskOutcome;
    turns: number;
    budget: BudgetState;
    ts: string;
}

export type TrajectoryLine = TaskHeaderRecord | TurnRecord | FormatErrorRecord | ResumeRecord | OutcomeRecord;

export const TrajectoryLineSchema: z.ZodType<TrajectoryLine> = z.discriminatedUnion("type", [
    z.object({
        type: z.literal("task"),
        version: z.number().int(),
        task: TaskSpecSchema,
        model: z.object({ provider: z.string(), name: z.string() }),
        seed: z.array(HistoryEntrySchema),
        ts: z.string(),
    }),
    z.object({
        type: z.literal("turn"),
        turn: z.number().int().positive(),
        modelInput: z.array(HistoryEntrySchema),
        elided: z.number().int().nonnegative(),
        modelOutput: z.string(),
        action: ActionSchema,
        result: ExecutionResultSchema,
        usage: TokenUsageSchema,
        budget: BudgetStateSchema,
        entries: z.array(HistoryEntrySchema),
        ts: z.string(),
    }),
    z.object({
        type: z.literal("format_error"),
        turn: z.number().int().positive(),
        attempt: z.number().int().positive(),
        outcome: z.enum(["none", "multiple", "invalid"]),
        reason: z.string(),
        modelOutput: z.string(),
        usage: TokenUsageSchema,
        budget: BudgetStateSchema,
        entries: z.array(HistoryEntrySchema),
        ts: z.string(),
    }),
    z.object({ type: z.literal("resume"), turn: z.number().int().nonnegative(), ts: z.string() }),
    z.object({
        type: z.literal("outcome"),
        outcome: TaskOutcomeSchema,
        turns: z.number().int().nonnegative(),
        budget: BudgetStateSchema,
        ts: z.string(),
    }),
]);
