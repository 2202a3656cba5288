import type { BudgetCeilings, BudgetState, TokenUsage } from "../types/messages.js";
import { estimateUsageCostUsd, type CostRate } from "../events/cost-analytics.js";
import type { UsageLedger } from "./usage-ledger.js";

function overCeilings(state: Omit<BudgetState, "ceilings">, ceilings: BudgetCeilings): boolean {
    const tokens = state.tokensSent + state.tokensReceived;
    if (ceilings.maxTokens !== undefined && tokens > ceilings.maxTokens) return true;
    if (ceilings.maxCostUsd !== undefined && state.costUsd > ceilings.maxCostUsd) return true;
    return false;
}

/** A single call whose prompt alone crosses a ceiling can never fit. */
function callOverCeilings(promptTokens: number, costUsd: number, ceilings: BudgetCeilings): boolean {
    if (ceilings.maxTokens !== undefined && promptTokens > ceilings.maxTokens) return true;
    if (ceilings.maxCostUsd !== undefined && costUsd > ceilings.maxCostUsd) return true;
    return false;
}

function clampUsage(usage: TokenUsage): TokenUsage {
    return {
        promptTokens: Math.max(0, Math.floor(usage.promptTokens)),
        completionTokens: Math.max(0, Math.floor(usage.completionTokens)),
    };
}

/**
 * Budget shared by every controller in a batch. `charge` is synchronous, so
 * each increment runs to completion on the event loop before any other
 * controller can observe or modify the totals. With a usage ledger attached,
 * charges are also persisted and its hourly, daily and total ceilings count
 * as this budget's own.
 */
export class SharedBudget {
    private tokensSent = 0;
    private tokensReceived = 0;
    private costUsd = 0;
    private calls = 0;
    readonly ledger?: UsageLedger;

    constructor(
        public readonly ceilings: BudgetCeilings,
        options: { ledger?: UsageLedger } = {}
    ) {
        this.ledger = options.ledger;
    }

    charge(usage: TokenUsage, costUsd: number, model = "unknown"): void {
        const clamped = clampUsage(usage);
        this.tokensSent += clamped.promptTokens;
        this.tokensReceived += clamped.completionTokens;
        this.costUsd += Math.max(0, costUsd);
        this.calls += 1;
        this.ledger?.record(model, clamped.promptTokens + clamped.completionTokens, Math.max(0, costUsd));
    }

    wouldExceed(projectedTokens: number, projectedCostUsd: number): boolean {
        return this.exceeded() || callOverCeilings(projectedTokens, projectedCostUsd, this.ceilings);
    }

    exceeded(): boolean {
        return this.breach() !== undefined;
    }

    breach(): string | undefined {
        if (overCeilings(this.snapshot(), this.ceilings)) return "shared batch budget exceeded";
        const ledger = this.ledger?.breach();
        return ledger ? `usage ledger ceiling exceeded: ${ledger}` : undefined;
    }

    snapshot(): BudgetState {
        return {
            tokensSent: this.tokensSent,
            tokensReceived: this.tokensReceived,
            costUsd: this.costUsd,
            calls: this.calls,
            ceilings: { ...this.ceilings },
        };
    }
}

export interface BudgetTrackerOptions {
    ceilings?: BudgetCeilings;
    rate?: CostRate;
    shared?: SharedBudget;
    /** Recorded with each shared charge */
    model?: string;
}

/**
 * Per-task token and cost accounting. Totals only grow; every charge is
 * forwarded to the shared budget when one is attached.
 */
export class BudgetTracker {
    private state: BudgetState;
    private readonly rate?: CostRate;
    private readonly shared?: SharedBudget;
    private readonly model?: string;

    constructor(options: BudgetTrackerOptions = {}) {
        this.state = { tokensSent: 0, tokensReceived: 0, costUsd: 0, calls: 0, ceilings: { ...options.ceilings } };
        this.rate = options.rate;
        this.shared = options.shared;
        this.model = options.model;
    }

    /**
     * Adds one model exchange and returns its cost.
     */
    record(usage: TokenUsage): number {
        const clamped = clampUsage(usage);
        const cost = estimateUsageCostUsd(clamped, this.rate);
        this.state = {
            ...this.state,
            tokensSent: this.state.tokensSent + clamped.promptTokens,
            tokensReceived: this.state.tokensReceived + clamped.completionTokens,
            costUsd: this.state.costUsd + cost,
            calls: this.state.calls + 1,
        };
        this.shared?.charge(clamped, cost, this.model);
        return cost;
    }

    /**
     * True when a call sending `projectedPromptTokens` is obviously over
     * budget: a task or shared ceiling is already crossed, or the prompt
     * alone crosses one. A call that merely might cross a ceiling is let
     * through; the check after RECORDING stops the task once it has.
     */
    wouldExceed(projectedPromptTokens: number): boolean {
        const projectedCost = estimateUsageCostUsd({ promptTokens: projectedPromptTokens, completionTokens: 0 }, this.rate);
        const task = this.exceeded() || callOverCeilings(projectedPromptTokens, projectedCost, this.state.ceilings);
        return task || (this.shared?.wouldExceed(projectedPromptTokens, projectedCost) ?? false);
    }

    exceeded(): boolean {
        return overCeilings(this.state, this.state.ceilings);
    }

    sharedExceeded(): boolean {
        return this.shared?.exceeded() ?? false;
    }

    /** Why the shared budget is exhausted, if it is. */
    sharedBreach(): string | undefined {
        return this.shared?.breach();
    }

    snapshot(): BudgetState {
        return { ...this.state, ceilings: { ...this.state.ceilings } };
    }

    /**
     * Resumes from a recorded state. The task's configured ceilings win over
     * the recorded ones.
     */
    restore(recorded: BudgetState): void {
        if (recorded.tokensSent < this.state.tokensSent || recorded.costUsd < this.state.costUsd) {
            throw new Error("Budget restore would move totals backwards");
        }
        this.state = { ...recorded, ceilings: this.state.ceilings };
    }
}
