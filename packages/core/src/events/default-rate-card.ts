import type { CostRateRule } from "./cost-analytics.js";

export const DEFAULT_RATE_CARD_VERSION = "2026-09-01";

export const DEFAULT_RATE_CARD_RULES: CostRateRule[] = [
    { provider: "openai", model: "gpt-4o", rate: { inputUsdPerMillion: 2.5, outputUsdPerMillion: 10 } },
    { provider: "openai", model: "gpt-4o-mini", rate: { inputUsdPerMillion: 0.15, outputUsdPerMillion: 0.6 } },
    { provider: "openai", model: "*", rate: { inputUsdPerMillion: 3, outputUsdPerMillion: 12 } },
    { provider: "anthropic", model: "*", rate: { inputUsdPerMillion: 3, outputUsdPerMillion: 15 } },
    { provider: "replay", model: "*", rate: { inputUsdPerMillion: 0, outputUsdPerMillion: 0 } },
];
