import test from "node:test";
import assert from "node:assert/strict";
import type { HistoryEntry } from "@patchloop/core";
import { toAnthropicRequest } from "./anthropic.js";

function entry(index: number, role: HistoryEntry["role"], content: HistoryEntry["content"]): HistoryEntry {
    return { index, turn: 0, role, kind: "prompt", content, tokens: 1 };
}

test("system text is lifted out and images become base64 blocks", () => {
    const request = toAnthropicRequest({
        entries: [
            entry(0, "system", "sys"),
            entry(1, "user", "Issue"),
            entry(2, "assistant", "look"),
            entry(3, "tool-observation", [
                { type: "image", mediaType: "image/png", data: "AAAA" },
                { type: "image", mediaType: "image/bmp", data: "BBBB" },
            ]),
        ],
    });

    assert.equal(request.system, "sys");
    assert.deepEqual(request.messages, [
        { role: "user", content: [{ type: "text", text: "Issue" }] },
        { role: "assistant", content: [{ type: "text", text: "look" }] },
        {
            role: "user",
            content: [
                { type: "image", source: { type: "base64", media_type: "image/png", data: "AAAA" } },
                { type: "text", text: "[unsupported image type image/bmp]" },
            ],
        },
    ]);
});

test("an empty history entry still produces a content block", () => {
    const request = toAnthropicRequest({ entries: [entry(0, "user", "")] });

    assert.equal(request.system, undefined);
    assert.deepEqual(request.messages, [{ role: "user", content: [{ type: "text", text: "(empty)" }] }]);
});
