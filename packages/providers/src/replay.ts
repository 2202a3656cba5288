import { readTrajectory, type ModelClient, type ModelRequest, type ModelResponse, type TrajectoryLine } from "@patchloop/core";

/**
 * Replies recorded in a trajectory, in the order the model produced them.
 * Format errors count: their replies were model output too.
 */
export function recordedReplies(lines: TrajectoryLine[]): string[] {
    const replies: string[] = [];
    for (const line of lines) {
        if (line.type === "turn" || line.type === "format_error") {
            replies.push(line.modelOutput);
        }
    }
    return replies;
}

/**
 * Plays back the model side of a recorded trajectory. Useful for re-running
 * a task against a changed sandbox or tool bundle without paying for
 * completions.
 */
export class ReplayModelClient implements ModelClient {
    readonly name = "replay";
    readonly model: string;
    private cursor = 0;

    constructor(
        private readonly replies: string[],
        model = "replay"
    ) {
        this.model = model;
    }

    static async fromFile(filePath: string): Promise<ReplayModelClient> {
        const { lines } = await readTrajectory(filePath);
        const header = lines.find((line) => line.type === "task");
        const model = header?.type === "task" ? header.model.name : "replay";
        return new ReplayModelClient(recordedReplies(lines), model);
    }

    get remaining(): number {
        return this.replies.length - this.cursor;
    }

    async complete(_request: ModelRequest): Promise<ModelResponse> {
        const reply = this.replies[this.cursor];
        if (reply === undefined) {
            throw new Error(`Recorded trajectory has no reply for call ${this.cursor + 1}`);
        }
        this.cursor += 1;
        return { text: reply, usage: { promptTokens: 0, completionTokens: 0 }, model: this.model };
    }
}
