import type { ToolSpec } from "../parser/tool-schema.js";
import type { HistoryEntry, TokenUsage } from "../types/messages.js";

export interface ModelRequest {
    entries: HistoryEntry[];
    tools: ToolSpec[];
    signal?: AbortSignal;
}

export interface ModelResponse {
    text: string;
    /** Absent when the endpoint reports no usage; the caller estimates it */
    usage?: TokenUsage;
    model?: string;
}

export interface ModelClient {
    /** Provider name, used to look up the cost rate */
    readonly name: string;
    readonly model: string;
    complete(request: ModelRequest): Promise<ModelResponse>;
    estimateTokens?(text: string): number;
}
