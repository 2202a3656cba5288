import test from "node:test";
import assert from "node:assert/strict";
import { ModelClientRegistry } from "./registry.js";

test("registry creates clients by name and resolves providers from model names", async () => {
    const registry = new ModelClientRegistry();
    registry.register({
        name: "echo",
        modelPatterns: [/^echo-/],
        create: (options) => ({
            name: "echo",
            model: options.model,
            complete: async () => ({ text: `model=${options.model}` }),
        }),
    });

    const client = registry.create("echo", { model: "echo-1" });
    assert.equal(client.model, "echo-1");
    assert.deepEqual(await client.complete({ entries: [], tools: [] }), { text: "model=echo-1" });
    assert.equal(registry.resolveProviderNameForModel("echo-2"), "echo");
    assert.equal(registry.resolveProviderNameForModel("other"), null);
    assert.throws(() => registry.create("missing", { model: "x" }), /Model provider not registered: missing/);
});
