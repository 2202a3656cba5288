import test from "node:test";
import assert from "node:assert/strict";
import { estimateUsageCostUsd, resolveRate, summarizeTrajectoryCost } from "./cost-analytics.js";
import type { TrajectoryLine } from "./trajectory-schema.js";

const action = { command: "bash", args: ["ls"], raw: "ls", thought: "" };
const budget = { tokensSent: 0, tokensReceived: 0, costUsd: 0, calls: 0, ceilings: {} };

const lines: TrajectoryLine[] = [
    {
        type: "task",
        version: 1,
        task: { id: "t", problemStatement: "p", environment: {} },
        model: { provider: "openai", name: "gpt-4o" },
        seed: [],
        ts: "2026-01-01T00:00:00.000Z",
    },
    {
        type: "format_error",
        turn: 1,
        attempt: 1,
        outcome: "none",
        reason: "no fenced code block found",
        modelOutput: "",
        usage: { promptTokens: 200_000, completionTokens: 0 },
        budget,
        entries: [],
        ts: "2026-01-01T00:00:01.000Z",
    },
    {
        type: "turn",
        turn: 1,
        modelInput: [],
        elided: 0,
        modelOutput: "",
        action,
        result: { action, output: "", exitStatus: 0, elapsedMs: 1, truncated: false },
        usage: { promptTokens: 800_000, completionTokens: 100_000 },
        budget,
        entries: [],
        ts: "2026-01-01T00:00:02.000Z",
    },
];

test("estimateUsageCostUsd prices prompt and completion tokens separately", () => {
    const cost = estimateUsageCostUsd({ promptTokens: 1_000_000, completionTokens: 500_000 }, { inputUsdPerMillion: 2, outputUsdPerMillion: 8 });
    assert.equal(cost, 6);
});

test("resolveRate prefers exact rules, then the provider wildcard, then the default", () => {
    assert.deepEqual(resolveRate("openai", "gpt-4o-mini"), { rate: { inputUsdPerMillion: 0.15, outputUsdPerMillion: 0.6 }, source: "rule" });
    assert.deepEqual(resolveRate("anthropic", "claude-x"), { rate: { inputUsdPerMillion: 3, outputUsdPerMillion: 15 }, source: "rule" });
    assert.deepEqual(resolveRate("acme", "m1", { defaultRate: { inputUsdPerMillion: 1, outputUsdPerMillion: 1 } }), {
        rate: { inputUsdPerMillion: 1, outputUsdPerMillion: 1 },
        source: "default",
    });
});

test("summarizeTrajectoryCost counts format errors as model calls but not as turns", () => {
    const summary = summarizeTrajectoryCost(lines);

    assert.equal(summary.provider, "openai");
    assert.equal(summary.model, "gpt-4o");
    assert.equal(summary.pricingSource, "rule");
    assert.equal(summary.modelCalls, 2);
    assert.equal(summary.completedTurns, 1);
    assert.equal(summary.formatErrors, 1);
    assert.equal(summary.promptTokens, 1_000_000);
    assert.equal(summary.completionTokens, 100_000);
    assert.equal(summary.estimatedCostUsd, 3.5);
    assert.deepEqual(summary.perTurn, [{ turn: 1, promptTokens: 800_000, completionTokens: 100_000, costUsd: 3 }]);
});
