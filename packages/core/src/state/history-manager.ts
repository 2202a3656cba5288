import type { Action, EntryKind, HistoryEntry, MessagePart, Role } from "../types/messages.js";
import { estimateContentTokens, estimateTextTokens, projectWindow, sumTokens, type TokenEstimator, type WindowResult } from "./compaction.js";

export interface HistoryOptions {
    contextBudgetTokens: number;
    keepRecent?: number;
    /** Fraction of the current budget kept after a context-too-large fault */
    tightenRatio?: number;
    estimator?: TokenEstimator;
}

export interface NewEntry {
    turn: number;
    role: Role;
    kind: EntryKind;
    content: string | MessagePart[];
    action?: Action;
    pinned?: boolean;
}

/**
 * Append-only conversation log. Windowing happens in `project()` and never
 * touches the stored entries, so a trajectory always holds the full history.
 */
export class HistoryManager {
    private readonly entries: HistoryEntry[] = [];
    private readonly keepRecent: number;
    private readonly tightenRatio: number;
    private readonly estimator: TokenEstimator;
    private budgetTokens: number;

    constructor(options: HistoryOptions) {
        this.budgetTokens = options.contextBudgetTokens;
        this.keepRecent = options.keepRecent ?? 4;
        this.tightenRatio = options.tightenRatio ?? 0.75;
        this.estimator = options.estimator ?? estimateTextTokens;
    }

    append(entry: NewEntry): HistoryEntry {
        const last = this.entries[this.entries.length - 1];
        if (last && entry.turn < last.turn) {
            throw new Error(`History entry for turn ${entry.turn} cannot follow turn ${last.turn}`);
        }
        const stored: HistoryEntry = {
            ...entry,
            index: this.entries.length,
            tokens: estimateContentTokens(entry.content, this.estimator),
        };
        this.entries.push(stored);
        return stored;
    }

    /**
     * Re-adds entries read back from a trajectory, keeping their indices.
     */
    restore(entries: HistoryEntry[]): void {
        for (const entry of entries) {
            if (entry.index !== this.entries.length) {
                throw new Error(`History restore expected index ${this.entries.length}, got ${entry.index}`);
            }
            this.entries.push({ ...entry });
        }
    }

    all(): HistoryEntry[] {
        return [...this.entries];
    }

    get length(): number {
        return this.entries.length;
    }

    get budget(): number {
        return this.budgetTokens;
    }

    totalTokens(): number {
        return sumTokens(this.entries);
    }

    project(): WindowResult {
        return projectWindow(this.entries, {
            budgetTokens: this.budgetTokens,
            keepRecent: this.keepRecent,
            estimator: this.estimator,
        });
    }

    /**
     * Shrinks the budget below what was last sent, so the next projection is
     * strictly smaller even when the old budget was not reached.
     */
    tighten(): number {
        const current = Math.min(this.budgetTokens, this.project().tokens);
        this.budgetTokens = Math.max(1, Math.floor(current * this.tightenRatio));
        return this.budgetTokens;
    }
}
