import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { FaultError } from "../faults/fault-error.js";
import type { EnvironmentSpec } from "../types/task.js";
import { runProcess } from "./process-runner.js";
import type { Sandbox, SandboxExecutionResult, SandboxFile, SandboxProvider, SandboxRunOptions } from "./sandbox.js";

const CONTROL_TIMEOUT_MS = 120_000;
const GONE = /No such container|is not running/;
/** Time the in-container `timeout` gets to take the command down before the client gives up */
const KILL_GRACE_SECONDS = 5;
const TIMEOUT_EXIT_CODES = new Set([124, 137]);

/**
 * Wraps a command in coreutils `timeout` so it is stopped inside the
 * container too, not only the `docker exec` client.
 */
export function withContainerTimeout(argv: string[], timeoutMs: number): string[] {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    return ["timeout", "--kill-after", `${KILL_GRACE_SECONDS}`, `${seconds}`, ...argv];
}

async function docker(args: string[], timeoutMs = CONTROL_TIMEOUT_MS): Promise<string> {
    const result = await runProcess("docker", args, { timeoutMs });
    if (result.exitCode !== 0) {
        throw new Error(`docker ${args[0]} failed (exit ${result.exitCode}): ${result.stderr.trim() || result.stdout.trim()}`);
    }
    return result.stdout;
}

/**
 * DockerSandbox
 * A long-lived container driven through the docker CLI.
 */
export class DockerSandbox implements Sandbox {
    constructor(
        public readonly id: string,
        public readonly workdir: string
    ) {}

    async exec(argv: string[], options: SandboxRunOptions): Promise<SandboxExecutionResult> {
        const started = Date.now();
        const command = withContainerTimeout(argv, options.timeoutMs);
        const result = await runProcess("docker", ["exec", "-i", "-w", this.workdir, this.id, ...command], {
            timeoutMs: options.timeoutMs + (KILL_GRACE_SECONDS + 5) * 1000,
            signal: options.signal,
        });
        if (result.exitCode !== 0 && GONE.test(result.stderr)) {
            throw new Error(result.stderr.trim());
        }
        if (TIMEOUT_EXIT_CODES.has(result.exitCode) && Date.now() - started >= options.timeoutMs) {
            throw new FaultError({
                kind: "transient-network",
                code: "ETIMEDOUT",
                message: `command timed out after ${options.timeoutMs}ms in ${this.id}`,
            });
        }
        return result;
    }

    async upload(files: SandboxFile[]): Promise<void> {
        const staging = await fs.mkdtemp(path.join(os.tmpdir(), "patchloop-upload-"));
        try {
            for (const file of files) {
                const target = path.join(staging, file.path);
                await fs.mkdir(path.dirname(target), { recursive: true });
                await fs.writeFile(target, file.content, "utf-8");
                if (file.mode !== undefined) {
                    await fs.chmod(target, file.mode);
                }
            }
            await docker(["cp", `${staging}/.`, `${this.id}:${this.workdir}`]);
        } finally {
            await fs.rm(staging, { recursive: true, force: true });
        }
    }

    async destroy(): Promise<void> {
        await docker(["rm", "-f", this.id]);
    }
}

export class DockerSandboxProvider implements SandboxProvider {
    readonly name = "docker";

    async createSandbox(environment: EnvironmentSpec): Promise<Sandbox> {
        if (!environment.image) {
            throw new Error("The docker sandbox needs environment.image");
        }
        const workdir = environment.workdir ?? "/workspace";
        const envArgs = Object.entries(environment.env ?? {}).flatMap(([key, value]) => ["-e", `${key}=${value}`]);
        const stdout = await docker(["run", "-d", "--rm", "-w", workdir, ...envArgs, environment.image, "sleep", "infinity"]);
        return new DockerSandbox(stdout.trim(), workdir);
    }
}
