import type { EnvironmentSpec } from "../types/task.js";

export interface SandboxExecutionResult {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface SandboxRunOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface SandboxFile {
    /** Relative to the sandbox working directory */
    path: string;
    content: string;
    mode?: number;
}

/**
 * A live execution environment. A non-zero exit code is a normal result;
 * implementations throw only when the sandbox itself could not run the
 * command.
 */
export interface Sandbox {
    readonly id: string;
    /** Absolute working directory inside the sandbox */
    readonly workdir: string;

    exec(argv: string[], options: SandboxRunOptions): Promise<SandboxExecutionResult>;

    upload(files: SandboxFile[]): Promise<void>;

    destroy(): Promise<void>;
}

export interface SandboxProvider {
    readonly name: string;
    createSandbox(environment: EnvironmentSpec): Promise<Sandbox>;
}
