import type { TokenUsage } from "../types/messages.js";
import type { TrajectoryLine } from "./trajectory-schema.js";
import { DEFAULT_RATE_CARD_RULES } from "./default-rate-card.js";

export interface CostRate {
    inputUsdPerMillion: number;
    outputUsdPerMillion: number;
}

export interface CostRateRule {
    provider: string;
    model?: string;
    rate: CostRate;
}

export interface RateCard {
    defaultRate?: CostRate;
    rules?: CostRateRule[];
}

export const DEFAULT_RATE: CostRate = {
    inputUsdPerMillion: 3,
    outputUsdPerMillion: 15,
};

/**
 * Exact provider/model rule first, then the provider's wildcard, then the
 * provider-only rule, then the card's default.
 */
export function resolveRate(
    provider: string | undefined,
    model: string | undefined,
    card: RateCard = {}
): { rate: CostRate; source: "rule" | "default" } {
    const rules = card.rules ?? DEFAULT_RATE_CARD_RULES;
    if (provider) {
        const exact = rules.find((rule) => rule.provider === provider && rule.model === model);
        if (exact) return { rate: exact.rate, source: "rule" };

        const wildcardModel = rules.find((rule) => rule.provider === provider && rule.model === "*");
        if (wildcardModel) return { rate: wildcardModel.rate, source: "rule" };

        const providerOnly = rules.find((rule) => rule.provider === provider && !rule.model);
        if (providerOnly) return { rate: providerOnly.rate, source: "rule" };
    }
    return { rate: card.defaultRate ?? DEFAULT_RATE, source: "default" };
}

export function estimateUsageCostUsd(usage: TokenUsage, rate: CostRate = DEFAULT_RATE): number {
    return (
        (Math.max(0, usage.promptTokens) / 1_000_000) * rate.inputUsdPerMillion +
        (Math.max(0, usage.completionTokens) / 1_000_000) * rate.outputUsdPerMillion
    );
}

export interface TrajectoryCostSummary {
    provider: string;
    model: string;
    pricingSource: "rule" | "default";
    modelCalls: number;
    completedTurns: number;
    formatErrors: number;
    promptTokens: number;
    completionTokens: number;
    estimatedCostUsd: number;
    perTurn: Array<{ turn: number; promptTokens: number; completionTokens: number; costUsd: number }>;
}

/**
 * Re-prices a trajectory from its recorded usage, so runs can be compared
 * under a different rate card than the one they ran with.
 */
export function summarizeTrajectoryCost(lines: TrajectoryLine[], card: RateCard = {}): TrajectoryCostSummary {
    const header = lines.find((line) => line.type === "task");
    const provider = header?.type === "task" ? header.model.provider : "unknown";
    const model = header?.type === "task" ? header.model.name : "unknown";
    const { rate, source } = resolveRate(provider, model, card);

    const summary: TrajectoryCostSummary = {
        provider,
        model,
        pricingSource: source,
        modelCalls: 0,
        completedTurns: 0,
        formatErrors: 0,
        promptTokens: 0,
        completionTokens: 0,
        estimatedCostUsd: 0,
        perTurn: [],
    };
    for (const line of lines) {
        if (line.type !== "turn" && line.type !== "format_error") continue;
        const cost = estimateUsageCostUsd(line.usage, rate);
        summary.modelCalls += 1;
        summary.promptTokens += line.usage.promptTokens;
        summary.completionTokens += line.usage.completionTokens;
        summary.estimatedCostUsd += cost;
        if (line.type === "format_error") {
            summary.formatErrors += 1;
            continue;
        }
        summary.completedTurns += 1;
        summary.perTurn.push({ turn: line.turn, ...line.usage, costUsd: cost });
    }
    return summary;
}
