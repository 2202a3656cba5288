import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, readFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { EventLogStore } from "./event-log-store.js";

test("event log store writes a batch once it is full", async () => {
    const dir = await mkdtemp(join(tmpdir(), "patchloop-event-log-"));
    try {
        const filePath = join(dir, "nested", "events.jsonl");
        const store = new EventLogStore<{ n: number }>({ filePath, batchSize: 2, flushIntervalMs: 10_000, onError: () => {} });
        await store.append({ n: 1 });
        await store.append({ n: 2 });
        assert.equal(await readFile(filePath, "utf8"), '{"n":1}\n{"n":2}\n');
        await store.shutdown();
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
});

test("shutdown writes a partial batch", async () => {
    const dir = await mkdtemp(join(tmpdir(), "patchloop-event-log-"));
    try {
        const filePath = join(dir, "events.jsonl");
        const store = new EventLogStore<{ n: number }>({ filePath, batchSize: 10, flushIntervalMs: 10_000, onError: () => {} });
        await store.append({ n: 1 });
        await store.shutdown();
        assert.equal(await readFile(filePath, "utf8"), '{"n":1}\n');
        assert.equal(store.path, filePath);
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
});
