import test from "node:test";
import assert from "node:assert/strict";
import { HookManager, type AgentHook, type HookContext } from "./hook-manager.js";
import { createSilentLogger } from "../utils/logger.js";

const ctx: HookContext = {
    taskId: "task-1",
    turn: 1,
    state: "RECORDING",
    budget: { tokensSent: 0, tokensReceived: 0, costUsd: 0, calls: 0, ceilings: {} },
    model: "test-model",
};

function hook(name: string, calls: string[], fail = false): AgentHook {
    return {
        name,
        onTurnStart() {
            calls.push(`${name}:start`);
            if (fail) throw new Error(`${name} broke`);
        },
        async onTurnEnd() {
            calls.push(`${name}:end`);
        },
        onTaskEnd() {
            calls.push(`${name}:task`);
        },
    };
}

test("hooks run in registration order", async () => {
    const calls: string[] = [];
    const manager = new HookManager(createSilentLogger());
    manager.register(hook("first", calls));
    manager.register(hook("second", calls));

    await manager.turnStart(ctx);
    await manager.taskEnd(ctx, { state: "DONE", reason: "submit issued" });

    assert.deepEqual(calls, ["first:start", "second:start", "first:task", "second:task"]);
    assert.deepEqual(
        manager.list().map((item) => item.name),
        ["first", "second"]
    );
});

test("a failing hook is reported and the rest still run", async () => {
    const calls: string[] = [];
    const manager = new HookManager(createSilentLogger());
    manager.register(hook("broken", calls, true));
    manager.register(hook("healthy", calls));

    const failures = await manager.turnStart(ctx);

    assert.deepEqual(calls, ["broken:start", "healthy:start"]);
    assert.equal(failures.length, 1);
    assert.equal(failures[0]?.hook, "broken");
    assert.equal(failures[0]?.event, "turnStart");
    assert.equal(failures[0]?.error.message, "broken broke");
});
