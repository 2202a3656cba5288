import type { HistoryEntry, MessagePart } from "@patchloop/core";

export interface ChatTurn {
    role: "user" | "assistant";
    parts: MessagePart[];
}

export interface ChatTranscript {
    system: string;
    turns: ChatTurn[];
}

function partsOf(content: string | MessagePart[]): MessagePart[] {
    return typeof content === "string" ? [{ type: "text", text: content }] : content;
}

function textOnly(parts: MessagePart[]): string {
    return parts
        .filter((part): part is Extract<MessagePart, { type: "text" }> => part.type === "text")
        .map((part) => part.text)
        .join("\n\n");
}

/**
 * Folds history entries into the alternating user/assistant shape chat APIs
 * expect. System entries are collected separately, observations are sent as
 * user messages, and consecutive messages of one role are merged.
 */
export function toChatTranscript(entries: HistoryEntry[]): ChatTranscript {
    const system: string[] = [];
    const turns: ChatTurn[] = [];

    for (const entry of entries) {
        if (entry.role === "system") {
            system.push(textOnly(partsOf(entry.content)));
            continue;
        }
        const role = entry.role === "assistant" ? "assistant" : "user";
        const parts = partsOf(entry.content);
        const last = turns[turns.length - 1];
        if (last && last.role === role) {
            last.parts = [...last.parts, { type: "text", text: "\n\n" }, ...parts];
        } else {
            turns.push({ role, parts: [...parts] });
        }
    }

    return { system: system.join("\n\n"), turns: turns.map((turn) => ({ ...turn, parts: mergeText(turn.parts) })) };
}

function mergeText(parts: MessagePart[]): MessagePart[] {
    const merged: MessagePart[] = [];
    for (const part of parts) {
        const last = merged[merged.length - 1];
        if (part.type === "text" && last?.type === "text") {
            merged[merged.length - 1] = { type: "text", text: last.text + part.text };
        } else {
            merged.push(part);
        }
    }
    return merged;
}

export function turnText(turn: ChatTurn): string {
    return textOnly(turn.parts);
}
