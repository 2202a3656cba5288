import test from "node:test";
import assert from "node:assert/strict";
import { withTimeout } from "./timeout.js";
import { FaultError } from "./fault-error.js";

test("a call that finishes in time returns its value", async () => {
    assert.equal(await withTimeout(async () => 42, 1_000, "quick"), 42);
});

test("an expired call rejects with a transient fault and aborts its signal", async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
        (signal) => {
            seen = signal;
            return new Promise<never>(() => {});
        },
        20,
        "probe"
    );

    await assert.rejects(pending, (error: unknown) => {
        assert.ok(error instanceof FaultError);
        assert.equal(error.kind, "transient-network");
        assert.equal(error.message, "probe timed out after 20ms");
        return true;
    });
    assert.equal(seen?.aborted, true);
});

test("aborting the parent aborts the operation's signal", async () => {
    const parent = new AbortController();
    const pending = withTimeout(
        (signal) =>
            new Promise<string>((_, reject) => {
                signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
            }),
        1_000,
        "child",
        parent.signal
    );
    parent.abort();
    await assert.rejects(pending, /aborted/);
});
