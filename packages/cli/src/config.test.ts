import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigError } from "@patchloop/core";
import { resolveRunConfig } from "./config.js";

test("flags alone build a config with defaults", async () => {
    const config = await resolveRunConfig({ model: "gpt-4o-mini", sandbox: "local", logLevel: "warn" });

    assert.deepEqual(config.model.provider, "auto");
    assert.equal(config.model.name, "gpt-4o-mini");
    assert.equal(config.sandbox.provider, "local");
    assert.equal(config.logging.level, "warn");
    assert.equal(config.trajectory.dir, resolve("trajectories"));
    assert.equal(config.limits.maxTurns, 50);
});

test("flags override the config file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "patchloop-config-"));
    try {
        const file = join(dir, "run.yaml");
        await writeFile(file, "model:\n  provider: openai\n  name: gpt-4o\nsandbox:\n  provider: local\ntrajectory:\n  dir: runs\n");

        const config = await resolveRunConfig({ config: file, model: "gpt-4o-mini" });

        assert.equal(config.model.provider, "openai");
        assert.equal(config.model.name, "gpt-4o-mini");
        assert.equal(config.sandbox.provider, "local");
        assert.equal(config.trajectory.dir, join(dir, "runs"));
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
});

test("a config file or a model is required", async () => {
    await assert.rejects(resolveRunConfig({}), (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.equal(error.message, "Pass --config or at least --model");
        return true;
    });
});
