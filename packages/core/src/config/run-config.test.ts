import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, loadRunConfig, parseRunConfig, parseTasks } from "./run-config.js";

test("a minimal run config is filled with defaults", () => {
    const config = parseRunConfig("model:\n  provider: openai\n  name: gpt-4o\n");

    assert.equal(config.model.timeoutMs, 300_000);
    assert.equal(config.model.cache.enabled, false);
    assert.equal(config.sandbox.provider, "docker");
    assert.deepEqual(config.limits, { maxTurns: 50, maxFormatRetries: 3 });
    assert.deepEqual(config.history, { contextBudgetTokens: 100_000, keepRecent: 6, tightenRatio: 0.75 });
    assert.deepEqual(config.retry.model.rateLimit, { maxAttempts: 5, baseDelayMs: 5_000 });
    assert.equal(config.parser.format, "fenced");
    assert.equal(config.trajectory.dir, "trajectories");
    assert.equal(config.batch.concurrency, 4);
});

test("invalid values are reported with their path", () => {
    assert.throws(
        () => parseRunConfig("model:\n  provider: openai\n  name: gpt-4o\nlimits:\n  maxTurns: 0\n"),
        (error: unknown) => {
            assert.ok(error instanceof ConfigError);
            assert.match(error.message, /^Invalid run config: limits\.maxTurns: /);
            return true;
        }
    );
    assert.throws(() => parseRunConfig("model: [unclosed"), /run config is not valid YAML/);
});

test("relative paths in a config file resolve against the file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "patchloop-config-"));
    try {
        const file = join(dir, "run.yaml");
        await writeFile(
            file,
            [
                "model:",
                "  provider: anthropic",
                "  name: claude-x",
                "  cache:",
                "    enabled: true",
                "    dir: cache",
                "trajectory:",
                "  dir: out",
                "activityLog: logs/activity.jsonl",
                "usage:",
                "  ledger: usage.jsonl",
                "  dailyTokens: 100000",
                "",
            ].join("\n")
        );

        const config = await loadRunConfig(file);

        assert.equal(config.trajectory.dir, join(dir, "out"));
        assert.equal(config.activityLog, join(dir, "logs", "activity.jsonl"));
        assert.equal(config.tools.bundle, undefined);
        assert.equal(config.model.cache.dir, join(dir, "cache"));
        assert.deepEqual(config.usage, { ledger: join(dir, "usage.jsonl"), dailyTokens: 100000 });
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
});

test("task files hold one task, a list, or a tasks key", () => {
    const single = parseTasks("id: t-1\nproblemStatement: Fix it\nenvironment:\n  image: python:3.11\n");
    assert.deepEqual(single, [{ id: "t-1", problemStatement: "Fix it", environment: { image: "python:3.11" } }]);

    const listed = parseTasks("tasks:\n  - id: a\n    problemStatement: A\n    environment: {}\n  - id: b\n    problemStatement: B\n    environment: {}\n");
    assert.deepEqual(
        listed.map((task) => task.id),
        ["a", "b"]
    );

    assert.throws(
        () => parseTasks("- id: a\n  problemStatement: A\n  environment: {}\n- id: a\n  problemStatement: B\n  environment: {}\n"),
        /Duplicate task id "a"/
    );
});
