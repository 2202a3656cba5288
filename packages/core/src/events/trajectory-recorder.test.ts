import test from "node:test";
import assert from "node:assert/strict";
import { appendFile, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TrajectoryRecorder, trajectoryPath } from "./trajectory-recorder.js";
import { parseTrajectory, readTrajectory, replayTrajectory } from "./trajectory-reader.js";
import type { HistoryEntry, TokenUsage } from "../types/messages.js";

const budget = (tokens: number) => ({ tokensSent: tokens, tokensReceived: 0, costUsd: 0, calls: tokens / 100, ceilings: {} });
const usage: TokenUsage = { promptTokens: 100, completionTokens: 0 };
const action = { command: "bash", args: ["ls"], raw: "ls", thought: "look" };

function entry(index: number, turn: number, role: HistoryEntry["role"], kind: HistoryEntry["kind"], content: string): HistoryEntry {
    return { index, turn, role, kind, content, tokens: 5 };
}

const seed = [entry(0, 0, "system", "prompt", "sys"), entry(1, 0, "user", "prompt", "fix it")];

async function recordTurn(recorder: TrajectoryRecorder, turn: number, firstIndex: number): Promise<void> {
    await recorder.appendTurn({
        turn,
        modelInput: [],
        elided: 0,
        modelOutput: "```\nls\n```",
        action,
        result: { action, output: "a.py", exitStatus: 0, elapsedMs: 3, truncated: false },
        usage,
        budget: budget(turn * 100),
        entries: [
            entry(firstIndex, turn, "assistant", "response", "```\nls\n```"),
            entry(firstIndex + 1, turn, "tool-observation", "observation", "a.py"),
        ],
    });
}

async function withDir(fn: (dir: string) => Promise<void>): Promise<void> {
    const dir = await mkdtemp(join(tmpdir(), "patchloop-traj-"));
    try {
        await fn(dir);
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
}

test("trajectory files are named after the task id", () => {
    assert.equal(trajectoryPath("/runs", "django-1234"), join("/runs", "django-1234.traj.jsonl"));
});

test("a finalized trajectory replays to the recorded history, budget and outcome", async () => {
    await withDir(async (dir) => {
        const recorder = new TrajectoryRecorder(trajectoryPath(dir, "task-1"));
        await recorder.begin({
            task: { id: "task-1", problemStatement: "fix it", environment: {} },
            model: { provider: "scripted", name: "m" },
            seed,
        });
        await recorder.appendFormatError({
            turn: 1,
            attempt: 1,
            outcome: "none",
            reason: "no fenced code block found",
            modelOutput: "hmm",
            usage,
            budget: budget(100),
            entries: [entry(2, 1, "user", "corrective", "try again")],
        });
        await recordTurn(recorder, 1, 3);
        await recorder.finalize({ state: "DONE", reason: "submit issued" }, budget(200));
        await recorder.finalize({ state: "FAILED", reason: "ignored" }, budget(200));

        assert.equal(recorder.isFinalized, true);
        const { lines, partial } = await readTrajectory(recorder.filePath);
        assert.equal(partial, false);
        assert.deepEqual(
            lines.map((line) => line.type),
            ["task", "format_error", "turn", "outcome"]
        );

        const state = replayTrajectory(lines);
        assert.equal(state.turns, 1);
        assert.equal(state.formatErrors, 1);
        assert.deepEqual(
            state.history.map((item) => item.kind),
            ["prompt", "prompt", "corrective", "response", "observation"]
        );
        assert.equal(state.budget.tokensSent, 200);
        assert.deepEqual(state.outcome, { state: "DONE", reason: "submit issued" });
    });
});

test("turns must be appended without gaps", async () => {
    await withDir(async (dir) => {
        const recorder = new TrajectoryRecorder(join(dir, "t.traj.jsonl"));
        await recorder.begin({ task: { id: "t", problemStatement: "p", environment: {} }, model: { provider: "p", name: "m" }, seed });
        await assert.rejects(recordTurn(recorder, 2, 2), /expected turn 1, got 2/);
        await recorder.close();
    });
});

test("a partial trailing line is ignored and cut off on resume", async () => {
    await withDir(async (dir) => {
        const filePath = join(dir, "t.traj.jsonl");
        const recorder = new TrajectoryRecorder(filePath);
        await recorder.begin({ task: { id: "t", problemStatement: "p", environment: {} }, model: { provider: "p", name: "m" }, seed });
        await recordTurn(recorder, 1, 2);
        await recorder.close();
        await appendFile(filePath, '{"type":"turn","tu');

        const read = await readTrajectory(filePath);
        assert.equal(read.partial, true);
        assert.equal(read.lines.length, 2);

        const resumed = new TrajectoryRecorder(filePath);
        await resumed.resume(1, read.validBytes);
        await recordTurn(resumed, 2, 4);
        await resumed.finalize({ state: "MAX_TURNS", reason: "reached the limit of 2 turns" }, budget(200));

        const after = parseTrajectory(await readFile(filePath, "utf8"));
        assert.equal(after.partial, false);
        assert.deepEqual(
            after.lines.map((line) => line.type),
            ["task", "turn", "resume", "turn", "outcome"]
        );
        assert.equal(replayTrajectory(after.lines).history.length, 6);
    });
});

test("a corrupt complete line is an error", () => {
    assert.throws(() => parseTrajectory('{"type":"resume","turn":0,"ts":"x"}\nnot json\n'), /Corrupt trajectory line 2/);
});

test("replay rejects lines out of order", () => {
    assert.throws(() => replayTrajectory([]), /does not start with a task header/);
});
