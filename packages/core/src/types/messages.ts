/**
 * Conversation and execution records shared by every part of the loop.
 * Provider packages map these to their own wire formats.
 */

export type Role = "system" | "user" | "assistant" | "tool-observation";

export interface TextPart {
    type: "text";
    text: string;
}

export interface ImagePart {
    type: "image";
    mediaType: string;
    data: string; // base64
}

export type MessagePart = TextPart | ImagePart;

export type EntryKind = "prompt" | "response" | "observation" | "corrective" | "elision";

/**
 * A single command extracted from a model reply.
 */
export interface Action {
    command: string;
    args: string[];
    raw: string;
    thought: string;
}

export interface HistoryEntry {
    index: number;
    turn: number;
    role: Role;
    kind: EntryKind;
    content: string | MessagePart[];
    action?: Action;
    tokens: number;
    pinned?: boolean;
}

export type FaultKind =
    | "transient-network"
    | "rate-limit"
    | "context-too-large"
    | "content-policy"
    | "invalid-request"
    | "session-fatal"
    | "malformed-action";

/**
 * Fault as it is persisted in trajectories and hook payloads.
 */
export interface FaultRecord {
    kind: FaultKind;
    message: string;
    retryAfterMs?: number;
    status?: number;
    code?: string;
    causeMessage?: string;
}

export interface ExecutionResult {
    action: Action;
    output: string;
    exitStatus: number | null;
    elapsedMs: number;
    truncated: boolean;
    fault?: FaultRecord;
}

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
}

export interface BudgetCeilings {
    maxTokens?: number;
    maxCostUsd?: number;
}

export interface BudgetState {
    tokensSent: number;
    tokensReceived: number;
    costUsd: number;
    calls: number;
    ceilings: BudgetCeilings;
}

export function textOf(content: string | MessagePart[]): string {
    if (typeof content === "string") return content;
    return content
        .map((part) => (part.type === "text" ? part.text : `[image ${part.mediaType}]`))
        .join("\n");
}
