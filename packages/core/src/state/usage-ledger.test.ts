import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { UsageLedger } from "./usage-ledger.js";
import { BudgetTracker, SharedBudget } from "./budget-tracker.js";
import { createSilentLogger } from "../utils/logger.js";

const logger = createSilentLogger();

async function withDir(fn: (dir: string) => Promise<void>): Promise<void> {
    const dir = await mkdtemp(join(tmpdir(), "patchloop-usage-"));
    try {
        await fn(dir);
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
}

test("usage survives reopening the ledger", async () => {
    await withDir(async (dir) => {
        const filePath = join(dir, "usage.jsonl");
        const first = await UsageLedger.open({ filePath, logger });
        first.record("gpt-4o", 300, 0.01);
        first.record("claude-3-5-sonnet", 200, 0.02);
        await first.flush();

        const second = await UsageLedger.open({ filePath, logger });
        const stats = second.stats();
        assert.equal(stats.totalTokens, 500);
        assert.deepEqual(stats.byModel, { "gpt-4o": 300, "claude-3-5-sonnet": 200 });
        assert.equal((await readFile(filePath, "utf8")).trim().split("\n").length, 2);
    });
});

test("hourly and daily windows follow the local clock", async () => {
    await withDir(async (dir) => {
        let now = new Date(2026, 2, 10, 9, 30);
        const ledger = await UsageLedger.open({
            filePath: join(dir, "usage.jsonl"),
            ceilings: { hourlyTokens: 500, dailyTokens: 800 },
            logger,
            now: () => now,
        });

        ledger.record("m", 400, 0);
        assert.equal(ledger.exceeded(), false);
        ledger.record("m", 200, 0);
        assert.equal(ledger.breach(), "hourly usage 600/500 tokens");

        now = new Date(2026, 2, 10, 10, 5);
        assert.equal(ledger.exceeded(), false);
        ledger.record("m", 300, 0);
        assert.equal(ledger.breach(), "daily usage 900/800 tokens");

        now = new Date(2026, 2, 11, 0, 1);
        assert.deepEqual(
            { hour: ledger.stats().hourTokens, day: ledger.stats().dayTokens, total: ledger.stats().totalTokens },
            { hour: 0, day: 0, total: 900 }
        );
        assert.equal(ledger.exceeded(), false);
        await ledger.flush();
    });
});

test("a total ceiling carried over from earlier runs stops the shared budget", async () => {
    await withDir(async (dir) => {
        const filePath = join(dir, "usage.jsonl");
        await writeFile(
            filePath,
            '{"ts":"2020-01-01T00:00:00.000Z","model":"m","tokens":950,"costUsd":0}\nnot json\n',
            "utf8"
        );
        const ledger = await UsageLedger.open({ filePath, ceilings: { totalTokens: 1000 }, logger });
        const shared = new SharedBudget({}, { ledger });
        const budget = new BudgetTracker({ shared, model: "scripted-model" });

        assert.equal(shared.exceeded(), false);
        budget.record({ promptTokens: 40, completionTokens: 20 });

        assert.equal(budget.sharedBreach(), "usage ledger ceiling exceeded: total usage 1010/1000 tokens");
        assert.equal(budget.wouldExceed(1), true);
        assert.deepEqual(ledger.stats().byModel, { m: 950, "scripted-model": 60 });
        await ledger.flush();
    });
});
