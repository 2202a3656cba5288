import * as fs from "node:fs/promises";
import { dirname, join } from "node:path";
import type { BudgetState } from "../types/messages.js";
import type { TaskOutcome } from "../types/task.js";
import {
    TRAJECTORY_VERSION,
    type FormatErrorRecord,
    type TaskHeaderRecord,
    type TrajectoryLine,
    type TurnRecord,
} from "./trajectory-schema.js";

type Body<T> = Omit<T, "type" | "ts">;

export function trajectoryPath(dir: string, taskId: string): string {
    return join(dir, `${taskId}.traj.jsonl`);
}

/**
 * Append-only JSONL writer. Every line is synced to disk before the call
 * resolves, so after a crash the file holds every completed turn and at most
 * one partial trailing line.
 */
export class TrajectoryRecorder {
    private handle?: fs.FileHandle;
    private turns = 0;
    private finalized = false;

    constructor(public readonly filePath: string) {}

    get completedTurns(): number {
        return this.turns;
    }

    get isFinalized(): boolean {
        return this.finalized;
    }

    async begin(header: Omit<Body<TaskHeaderRecord>, "version">): Promise<void> {
        await this.open("w");
        await this.write({ type: "task", version: TRAJECTORY_VERSION, ...header, ts: new Date().toISOString() });
    }

    /**
     * Continues an existing file. `validBytes` drops a partial trailing line
     * left by a crash.
     */
    async resume(completedTurns: number, validBytes: number): Promise<void> {
        await this.open("r+");
        await this.handle?.truncate(validBytes);
        this.turns = completedTurns;
        await this.write({ type: "resume", turn: completedTurns, ts: new Date().toISOString() });
    }

    async appendTurn(record: Body<TurnRecord>): Promise<void> {
        if (record.turn !== this.turns + 1) {
            throw new Error(`Trajectory expected turn ${this.turns + 1}, got ${record.turn}`);
        }
        await this.write({ type: "turn", ...record, ts: new Date().toISOString() });
        this.turns = record.turn;
    }

    async appendFormatError(record: Body<FormatErrorRecord>): Promise<void> {
        await this.write({ type: "format_error", ...record, ts: new Date().toISOString() });
    }

    async finalize(outcome: TaskOutcome, budget: BudgetState): Promise<void> {
        if (this.finalized) return;
        await this.write({ type: "outcome", outcome, turns: this.turns, budget, ts: new Date().toISOString() });
        this.finalized = true;
        await this.close();
    }

    async close(): Promise<void> {
        const handle = this.handle;
        this.handle = undefined;
        await handle?.close();
    }

    private async open(flags: "w" | "r+"): Promise<void> {
        if (this.handle) {
            throw new Error(`Trajectory ${this.filePath} is already open`);
        }
        await fs.mkdir(dirname(this.filePath), { recursive: true });
        this.handle = await fs.open(this.filePath, flags);
    }

    private async write(line: TrajectoryLine): Promise<void> {
        if (!this.handle || this.finalized) {
            throw new Error(`Trajectory ${this.filePath} is not open for writing`);
        }
        const { size } = await this.handle.stat();
        await this.handle.write(`${JSON.stringify(line)}\n`, size);
        await this.handle.sync();
    }
}
