import test from "node:test";
import assert from "node:assert/strict";
import { elisionMarkerText, estimateContentTokens, projectWindow } from "./compaction.js";
import type { HistoryEntry } from "../types/messages.js";

function entry(index: number, tokens: number, pinned = false): HistoryEntry {
    return { index, turn: index, role: index === 0 ? "system" : "user", kind: "prompt", content: `entry ${index}`, tokens, pinned };
}

const history = [entry(0, 10, true), ...[1, 2, 3, 4, 5, 6].map((index) => entry(index, 20))];

test("content tokens count a role header, text and a flat cost per image", () => {
    assert.equal(estimateContentTokens("abcdefgh"), 6);
    assert.equal(
        estimateContentTokens([
            { type: "text", text: "abcd" },
            { type: "image", mediaType: "image/png", data: "AAAA" },
        ]),
        175
    );
});

test("a history under budget is projected unchanged", () => {
    const window = projectWindow(history, { budgetTokens: 200, keepRecent: 2 });
    assert.equal(window.elided, 0);
    assert.equal(window.tokens, 130);
    assert.deepEqual(window.entries, history);
});

test("oldest unpinned entries are replaced by one marker", () => {
    const window = projectWindow(history, { budgetTokens: 80, keepRecent: 2 });

    assert.equal(window.elided, 4);
    assert.equal(window.tokens, 67);
    assert.deepEqual(
        window.entries.map((item) => item.index),
        [0, -1, 5, 6]
    );
    assert.equal(window.entries[1]?.kind, "elision");
    assert.equal(window.entries[1]?.content, elisionMarkerText(4));
    assert.equal(elisionMarkerText(4), "[4 earlier entries elided to fit the context window]");
});

test("pinned and recent entries survive even when they exceed the budget", () => {
    const window = projectWindow(history, { budgetTokens: 10, keepRecent: 2 });
    assert.equal(window.elided, 4);
    assert.equal(window.tokens, 67);
    assert.equal(window.entries[0]?.pinned, true);
});
