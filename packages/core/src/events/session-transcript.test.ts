import test from "node:test";
import assert from "node:assert/strict";
import { trajectoryToMarkdown } from "./session-transcript.js";
import type { TrajectoryLine } from "./trajectory-schema.js";

const action = { command: "bash", args: ["cat a.md"], raw: "cat a.md", thought: "Read the notes." };

test("markdown view lists the problem, each turn and the outcome", () => {
    const lines: TrajectoryLine[] = [
        {
            type: "task",
            version: 1,
            task: { id: "t-1", problemStatement: "Fix the parser\n", environment: { repo: "https://example.test/r.git", commit: "abc123" } },
            model: { provider: "openai", name: "gpt-4o" },
            seed: [],
            ts: "2026-01-01T00:00:00.000Z",
        },
        {
            type: "turn",
            turn: 1,
            modelInput: [],
            elided: 2,
            modelOutput: "",
            action,
            result: { action, output: "```js\nx\n```", exitStatus: 0, elapsedMs: 12, truncated: false },
            usage: { promptTokens: 10, completionTokens: 5 },
            budget: { tokensSent: 10, tokensReceived: 5, costUsd: 0.5, calls: 1, ceilings: {} },
            entries: [],
            ts: "2026-01-01T00:00:01.000Z",
        },
        {
            type: "outcome",
            outcome: { state: "DONE", reason: "submit issued", submission: "diff" },
            turns: 1,
            budget: { tokensSent: 10, tokensReceived: 5, costUsd: 0.5, calls: 1, ceilings: {} },
            ts: "2026-01-01T00:00:02.000Z",
        },
    ];

    assert.equal(
        trajectoryToMarkdown(lines),
        [
            "# Trajectory t-1",
            "",
            "- model: openai/gpt-4o",
            "- started: 2026-01-01T00:00:00.000Z",
            "- repo: https://example.test/r.git@abc123",
            "",
            "## Problem",
            "",
            "Fix the parser",
            "",
            "## Turn 1",
            "",
            "Read the notes.",
            "",
            "```",
            "cat a.md",
            "```",
            "",
            "- bash exit=0 elapsed=12ms",
            "- context: 2 entries elided",
            "",
            "````",
            "```js\nx\n```",
            "````",
            "",
            "## Outcome",
            "",
            "- state: DONE",
            "- reason: submit issued",
            "- turns: 1",
            "- tokens: 10 sent, 5 received",
            "- cost: $0.5000",
            "",
            "### Submission",
            "",
            "```",
            "diff",
            "```",
            "",
        ].join("\n")
    );
});
