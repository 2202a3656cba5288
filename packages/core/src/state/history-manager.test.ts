import test from "node:test";
import assert from "node:assert/strict";
import { HistoryManager } from "./history-manager.js";
import { elisionMarkerText } from "./compaction.js";

// 40 characters -> 10 tokens + 4 for the role header
const BODY = "x".repeat(40);

function seeded(budget: number, keepRecent = 2): HistoryManager {
    const history = new HistoryManager({ contextBudgetTokens: budget, keepRecent, estimator: (text) => Math.ceil(text.length / 4) });
    history.append({ turn: 0, role: "system", kind: "prompt", content: BODY, pinned: true });
    history.append({ turn: 0, role: "user", kind: "prompt", content: BODY, pinned: true });
    return history;
}

test("entries get sequential indices and token estimates", () => {
    const history = seeded(1000);
    const entry = history.append({ turn: 1, role: "assistant", kind: "response", content: "abcd" });
    assert.equal(entry.index, 2);
    assert.equal(entry.tokens, 5);
    assert.equal(history.totalTokens(), 33);
});

test("appending an older turn is rejected", () => {
    const history = seeded(1000);
    history.append({ turn: 2, role: "assistant", kind: "response", content: "a" });
    assert.throws(() => history.append({ turn: 1, role: "assistant", kind: "response", content: "b" }), /cannot follow/);
});

test("projection under budget returns every entry unchanged", () => {
    const history = seeded(1000);
    history.append({ turn: 1, role: "assistant", kind: "response", content: BODY });
    const window = history.project();
    assert.equal(window.elided, 0);
    assert.equal(window.entries.length, 3);
    assert.equal(window.tokens, 42);
});

test("projection elides the oldest unpinned entries behind a single marker", () => {
    const history = seeded(100, 2);
    for (let turn = 1; turn <= 4; turn++) {
        history.append({ turn, role: "assistant", kind: "response", content: BODY });
        history.append({ turn, role: "tool-observation", kind: "observation", content: BODY });
    }
    // 10 entries * 14 tokens = 140 > 100
    const window = history.project();

    const markers = window.entries.filter((entry) => entry.kind === "elision");
    assert.equal(markers.length, 1);
    assert.ok(window.tokens <= 100);
    assert.equal(window.entries[0].role, "system");
    assert.equal(window.entries[1].role, "user");
    assert.equal(window.entries[2].kind, "elision");
    assert.equal(window.entries[2].content, elisionMarkerText(window.elided));
    const all = history.all();
    assert.deepEqual(window.entries.slice(-2), all.slice(-2));
    // the marker costs 17 tokens; 5 elided entries leave 70 + 17
    assert.equal(window.elided, 5);
    assert.equal(window.tokens, 87);
    assert.equal(window.entries.length, 6);
    assert.equal(history.length, 10);
});

test("tighten shrinks the budget below the last projection", () => {
    const history = seeded(1000);
    history.append({ turn: 1, role: "assistant", kind: "response", content: BODY });
    // projection is 42 tokens; 0.75 of that
    assert.equal(history.tighten(), 31);
    assert.equal(history.budget, 31);
});
