import type { TrajectoryLine } from "./trajectory-schema.js";

function fence(text: string): string[] {
    const longest = Math.max(2, ...(text.match(/`+/g) ?? []).map((run) => run.length));
    const ticks = "`".repeat(longest + 1);
    return [ticks, text, ticks];
}

/**
 * Human-readable audit view of a trajectory.
 */
export function trajectoryToMarkdown(lines: TrajectoryLine[]): string {
    const out: string[] = [];
    for (const line of lines) {
        switch (line.type) {
            case "task":
                out.push(`# Trajectory ${line.task.id}`, "");
                out.push(`- model: ${line.model.provider}/${line.model.name}`);
                out.push(`- started: ${line.ts}`);
                if (line.task.environment.image) out.push(`- image: ${line.task.environment.image}`);
                if (line.task.environment.repo) {
                    out.push(`- repo: ${line.task.environment.repo}${line.task.environment.commit ? `@${line.task.environment.commit}` : ""}`);
                }
                out.push("", "## Problem", "", line.task.problemStatement.trim(), "");
                break;
            case "resume":
                out.push(`_Resumed after turn ${line.turn} at ${line.ts}_`, "");
                break;
            case "format_error":
                out.push(`- [format_error] turn ${line.turn} attempt ${line.attempt} (${line.outcome}): ${line.reason}`, "");
                break;
            case "turn": {
                out.push(`## Turn ${line.turn}`, "");
                if (line.action.thought) out.push(line.action.thought, "");
                out.push(...fence(line.action.raw), "");
                const status = line.result.fault
                    ? `fault=${line.result.fault.kind}`
                    : `exit=${line.result.exitStatus ?? "none"}`;
                out.push(`- ${line.action.command} ${status} elapsed=${line.result.elapsedMs}ms${line.result.truncated ? " truncated" : ""}`);
                if (line.elided > 0) out.push(`- context: ${line.elided} entries elided`);
                if (line.result.output) out.push("", ...fence(line.result.output));
                out.push("");
                break;
            }
            case "outcome":
                out.push("## Outcome", "");
                out.push(`- state: ${line.outcome.state}`);
                out.push(`- reason: ${line.outcome.reason}`);
                out.push(`- turns: ${line.turns}`);
                out.push(`- tokens: ${line.budget.tokensSent} sent, ${line.budget.tokensReceived} received`);
                out.push(`- cost: $${line.budget.costUsd.toFixed(4)}`);
                if (line.outcome.fault) out.push(`- fault: ${line.outcome.fault.kind}: ${line.outcome.fault.message}`);
                if (line.outcome.submission) out.push("", "### Submission", "", ...fence(line.outcome.submission));
                out.push("");
                break;
        }
    }
    return `${out.join("\n").trimEnd()}\n`;
}
