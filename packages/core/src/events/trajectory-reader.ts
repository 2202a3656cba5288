import * as fs from "node:fs/promises";
import type { BudgetState, HistoryEntry } from "../types/messages.js";
import type { TaskOutcome } from "../types/task.js";
import { TrajectoryLineSchema, type TaskHeaderRecord, type TrajectoryLine, type TurnRecord } from "./trajectory-schema.js";

export interface TrajectoryReadResult {
    lines: TrajectoryLine[];
    /** A trailing line without a newline was found and ignored */
    partial: boolean;
    /** Byte length of the complete lines */
    validBytes: number;
}

export function parseTrajectory(content: string): TrajectoryReadResult {
    const segments = content.split("\n");
    const trailing = segments.pop() ?? "";
    const lines: TrajectoryLine[] = [];
    let validBytes = 0;

    segments.forEach((segment, index) => {
        validBytes += Buffer.byteLength(segment, "utf8") + 1;
        if (segment.trim() === "") return;
        let json: unknown;
        try {
            json = JSON.parse(segment);
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            throw new Error(`Corrupt trajectory line ${index + 1}: ${detail}`);
        }
        const parsed = TrajectoryLineSchema.safeParse(json);
        if (!parsed.success) {
            throw new Error(`Invalid trajectory line ${index + 1}: ${parsed.error.issues[0]?.message ?? "schema mismatch"}`);
        }
        lines.push(parsed.data);
    });

    return { lines, partial: trailing.trim() !== "", validBytes };
}

export async function readTrajectory(filePath: string): Promise<TrajectoryReadResult> {
    return parseTrajectory(await fs.readFile(filePath, "utf8"));
}

export interface ReplayState {
    header: TaskHeaderRecord;
    history: HistoryEntry[];
    budget: BudgetState;
    turns: number;
    formatErrors: number;
    lastTurn?: TurnRecord;
    outcome?: TaskOutcome;
}

/**
 * Folds recorded lines back into the state the controller had after the
 * last completed turn.
 */
export function replayTrajectory(lines: TrajectoryLine[]): ReplayState {
    const [first, ...rest] = lines;
    if (!first || first.type !== "task") {
        throw new Error("Trajectory does not start with a task header");
    }
    const history: HistoryEntry[] = [];
    const appendEntries = (entries: HistoryEntry[]) => {
        for (const entry of entries) {
            if (entry.index !== history.length) {
                throw new Error(`Trajectory history index ${entry.index} out of order (expected ${history.length})`);
            }
            history.push(entry);
        }
    };
    appendEntries(first.seed);

    const state: ReplayState = {
        header: first,
        history,
        budget: { tokensSent: 0, tokensReceived: 0, costUsd: 0, calls: 0, ceilings: { ...first.task.ceilings } },
        turns: 0,
        formatErrors: 0,
    };

    for (const line of rest) {
        if (state.outcome) {
            throw new Error(`Trajectory has a ${line.type} line after its outcome`);
        }
        switch (line.type) {
            case "task":
                throw new Error("Trajectory has more than one task header");
            case "resume":
                if (line.turn !== state.turns) {
                    throw new Error(`Resume at turn ${line.turn} does not match ${state.turns} completed turns`);
                }
                break;
            case "format_error":
                if (line.turn !== state.turns + 1) {
                    throw new Error(`Format error recorded for turn ${line.turn} while turn ${state.turns + 1} was pending`);
                }
                appendEntries(line.entries);
                state.budget = line.budget;
                state.formatErrors += 1;
                break;
            case "turn":
                if (line.turn !== state.turns + 1) {
                    throw new Error(`Turn ${line.turn} follows turn ${state.turns}`);
                }
                appendEntries(line.entries);
                state.budget = line.budget;
                state.turns = line.turn;
                state.lastTurn = line;
                break;
            case "outcome":
                state.outcome = line.outcome;
                state.budget = line.budget;
                break;
        }
    }
    return state;
}
