import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { EnvironmentSpec } from "../types/task.js";
import { runProcess } from "./process-runner.js";
import type { Sandbox, SandboxExecutionResult, SandboxFile, SandboxProvider, SandboxRunOptions } from "./sandbox.js";

/**
 * Runs commands as child processes of this one, rooted at a workspace
 * directory. No isolation beyond the directory.
 */
export class LocalSandbox implements Sandbox {
    public readonly id: string;

    constructor(
        public readonly workdir: string,
        private readonly env: Record<string, string> = {},
        private readonly ownsWorkdir = false
    ) {
        this.id = `local:${workdir}`;
    }

    private validatePath(filePath: string): string {
        const fullPath = path.resolve(this.workdir, filePath);
        if (fullPath !== this.workdir && !fullPath.startsWith(this.workdir + path.sep)) {
            throw new Error(`Access denied: Path ${filePath} is outside the sandbox.`);
        }
        return fullPath;
    }

    async exec(argv: string[], options: SandboxRunOptions): Promise<SandboxExecutionResult> {
        const [file, ...args] = argv;
        if (!file) {
            throw new Error("Cannot execute an empty command");
        }
        return runProcess(file, args, {
            cwd: this.workdir,
            env: { ...process.env, ...this.env },
            timeoutMs: options.timeoutMs,
            signal: options.signal,
        });
    }

    async upload(files: SandboxFile[]): Promise<void> {
        for (const file of files) {
            const fullPath = this.validatePath(file.path);
            await fs.mkdir(path.dirname(fullPath), { recursive: true });
            await fs.writeFile(fullPath, file.content, "utf-8");
            if (file.mode !== undefined) {
                await fs.chmod(fullPath, file.mode);
            }
        }
    }

    async destroy(): Promise<void> {
        if (this.ownsWorkdir) {
            await fs.rm(this.workdir, { recursive: true, force: true });
        }
    }
}

export class LocalSandboxProvider implements SandboxProvider {
    readonly name = "local";

    async createSandbox(environment: EnvironmentSpec): Promise<Sandbox> {
        if (environment.workdir) {
            const workdir = path.resolve(environment.workdir);
            await fs.mkdir(workdir, { recursive: true });
            return new LocalSandbox(workdir, environment.env);
        }
        const workdir = await fs.mkdtemp(path.join(os.tmpdir(), "patchloop-"));
        return new LocalSandbox(await fs.realpath(workdir), environment.env, true);
    }
}
