import { spawn } from "node:child_process";
import { constants } from "node:os";
import { FaultError } from "../faults/fault-error.js";
import type { SandboxExecutionResult } from "./sandbox.js";

export interface ProcessOptions {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    timeoutMs: number;
    signal?: AbortSignal;
    /** Bytes kept from the end of each stream */
    maxTailBytes?: number;
}

const DEFAULT_MAX_TAIL_BYTES = 8 * 1024 * 1024;

/**
 * Keeps the last `limit` bytes written to a stream and counts the rest.
 */
export class TailBuffer {
    private chunks: Buffer[] = [];
    private size = 0;
    dropped = 0;

    constructor(private readonly limit: number) {}

    push(chunk: Buffer): void {
        this.chunks.push(chunk);
        this.size += chunk.length;
        while (this.size > this.limit) {
            const head = this.chunks[0];
            if (!head) break;
            const excess = this.size - this.limit;
            if (head.length <= excess) {
                this.chunks.shift();
                this.size -= head.length;
                this.dropped += head.length;
            } else {
                this.chunks[0] = head.subarray(excess);
                this.size -= excess;
                this.dropped += excess;
            }
        }
    }

    toString(): string {
        return Buffer.concat(this.chunks).toString("utf8");
    }
}

/** Shell convention for a process ended by a signal: 128 plus its number. */
export function signalExitCode(signal: NodeJS.Signals): number {
    const entry = Object.entries(constants.signals).find(([name]) => name === signal);
    return 128 + (entry?.[1] ?? 0);
}

/**
 * Runs a process without a shell and resolves with its exit code. Output
 * past `maxTailBytes` is dropped from the front of each stream. A process
 * ended by a signal resolves with `128 + signo`. Rejects only when the
 * process could not be started, timed out, or was aborted.
 */
export function runProcess(file: string, args: string[], options: ProcessOptions): Promise<SandboxExecutionResult> {
    return new Promise((resolve, reject) => {
        if (options.signal?.aborted) {
            reject(new Error(`${file} aborted before it started`));
            return;
        }
        const limit = options.maxTailBytes ?? DEFAULT_MAX_TAIL_BYTES;
        const stdout = new TailBuffer(limit);
        const stderr = new TailBuffer(limit);
        const child = spawn(file, args, { cwd: options.cwd, env: options.env, stdio: ["ignore", "pipe", "pipe"] });

        let settled = false;
        let stopped: "timeout" | "abort" | undefined;
        const settle = (finish: () => void) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            options.signal?.removeEventListener("abort", onAbort);
            finish();
        };
        const timer = setTimeout(() => {
            stopped = "timeout";
            child.kill("SIGKILL");
        }, options.timeoutMs);
        const onAbort = () => {
            stopped = "abort";
            child.kill("SIGKILL");
        };
        options.signal?.addEventListener("abort", onAbort, { once: true });

        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
        child.on("error", (error) => settle(() => reject(error)));
        child.on("close", (code, signal) => {
            settle(() => {
                if (stopped === "timeout") {
                    reject(
                        new FaultError({
                            kind: "transient-network",
                            code: "ETIMEDOUT",
                            message: `${file} timed out after ${options.timeoutMs}ms`,
                        })
                    );
                    return;
                }
                if (stopped === "abort") {
                    reject(new Error(`${file} aborted`));
                    return;
                }
                const exitCode = code ?? (signal ? signalExitCode(signal) : 1);
                resolve({ stdout: stdout.toString(), stderr: stderr.toString(), exitCode });
            });
        });
    });
}
