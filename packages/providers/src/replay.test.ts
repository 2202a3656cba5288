import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
    FakeSandboxProvider,
    RetryPolicy,
    ScriptedModelClient,
    ToolSchema,
    TurnController,
    createSilentLogger,
    type ModelClient,
} from "@patchloop/core";
import { ReplayModelClient } from "./replay.js";

const tools = new ToolSchema([
    { name: "bash", description: "Run a shell script", rawInput: true, fallback: true, arguments: [{ name: "script" }] },
    { name: "submit", description: "Finish the task", terminal: true },
]);

function run(dir: string, model: ModelClient, provider: FakeSandboxProvider) {
    return new TurnController({
        task: { id: "replayed", problemStatement: "Fix it", environment: {} },
        model,
        sandboxProvider: provider,
        tools,
        trajectoryDir: dir,
        logger: createSilentLogger(),
        modelRetry: new RetryPolicy({ sleep: async () => {} }),
        templates: { system: "sys", instance: "{{problem_statement}}" },
    }).run();
}

test("a recorded trajectory replays the same replies, format errors included", async () => {
    const dir = await mkdtemp(join(tmpdir(), "patchloop-replay-"));
    try {
        const script = ["thinking out loud", "Look.\n```\nls\n```", "Done.\n```\nsubmit\n```"];
        const original = await run(dir, new ScriptedModelClient(script, { model: "gpt-4o" }), new FakeSandboxProvider());
        assert.equal(original.outcome.state, "DONE");

        const replay = await ReplayModelClient.fromFile(original.trajectoryPath);
        assert.equal(replay.model, "gpt-4o");
        assert.equal(replay.remaining, 3);

        const provider = new FakeSandboxProvider();
        const replayed = await run(join(dir, "again"), replay, provider);

        assert.equal(replayed.outcome.state, "DONE");
        assert.equal(replayed.turns, 2);
        assert.equal(replayed.budget.tokensSent, 0);
        assert.deepEqual(provider.sandboxes[0]?.commands, ["ls"]);
        assert.equal(replay.remaining, 0);
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
});

test("replay fails once the recording runs out", async () => {
    const replay = new ReplayModelClient([]);
    await assert.rejects(replay.complete({ entries: [], tools: [] }), /no reply for call 1/);
});
