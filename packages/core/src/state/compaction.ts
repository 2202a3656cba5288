import type { HistoryEntry, MessagePart } from "../types/messages.js";

export type TokenEstimator = (text: string) => number;

/**
 * Heuristic used when the model client has no tokenizer of its own.
 */
export function estimateTextTokens(text: string): number {
    return Math.ceil(text.length / 4);
}

export function estimateContentTokens(content: string | MessagePart[], estimator: TokenEstimator = estimateTextTokens): number {
    // role header
    let tokens = 4;
    if (typeof content === "string") {
        return tokens + estimator(content);
    }
    for (const part of content) {
        tokens += part.type === "text" ? estimator(part.text) : 170;
    }
    return tokens;
}

export function sumTokens(entries: HistoryEntry[]): number {
    return entries.reduce((acc, entry) => acc + entry.tokens, 0);
}

export interface WindowSettings {
    budgetTokens: number;
    /** The newest entries that are never elided */
    keepRecent: number;
    estimator?: TokenEstimator;
}

export interface WindowResult {
    entries: HistoryEntry[];
    elided: number;
    tokens: number;
}

export function elisionMarkerText(count: number): string {
    return `[${count} earlier ${count === 1 ? "entry" : "entries"} elided to fit the context window]`;
}

/**
 * Projects `entries` into at most `budgetTokens`. Pinned entries and the
 * newest `keepRecent` entries always survive; the oldest of the rest are
 * replaced by one marker entry. If the survivors alone exceed the budget the
 * projection is still returned, over budget, with every elidable entry gone.
 */
export function projectWindow(entries: HistoryEntry[], settings: WindowSettings): WindowResult {
    const total = sumTokens(entries);
    if (total <= settings.budgetTokens) {
        return { entries: [...entries], elided: 0, tokens: total };
    }

    const estimator = settings.estimator ?? estimateTextTokens;
    const unpinned = entries.filter((entry) => !entry.pinned);
    const protectedCount = Math.min(settings.keepRecent, unpinned.length);
    const candidates = unpinned.slice(0, unpinned.length - protectedCount);
    const dropped = new Set<HistoryEntry>();

    let remaining = total;
    let markerTokens = 0;
    for (const candidate of candidates) {
        if (dropped.size > 0 && remaining + markerTokens <= settings.budgetTokens) break;
        dropped.add(candidate);
        remaining -= candidate.tokens;
        markerTokens = estimateContentTokens(elisionMarkerText(dropped.size), estimator);
    }

    if (dropped.size === 0) {
        return { entries: [...entries], elided: 0, tokens: total };
    }

    const result: HistoryEntry[] = [];
    let markerPlaced = false;
    for (const entry of entries) {
        if (!dropped.has(entry)) {
            result.push(entry);
            continue;
        }
        if (!markerPlaced) {
            markerPlaced = true;
            result.push({
                index: -1,
                turn: entry.turn,
                role: "user",
                kind: "elision",
                content: elisionMarkerText(dropped.size),
                tokens: markerTokens,
            });
        }
    }
    return { entries: result, elided: dropped.size, tokens: remaining + markerTokens };
}
