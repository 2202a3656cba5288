import type { ModelClient, ModelRequest, ModelResponse } from "../providers/model-client.js";
import type { Sandbox, SandboxExecutionResult, SandboxFile, SandboxProvider, SandboxRunOptions } from "../security/sandbox.js";
import type { EnvironmentSpec } from "../types/task.js";

export type FakeCommandHandler = (
    command: string,
    sandbox: FakeSandbox
) => SandboxExecutionResult | Promise<SandboxExecutionResult>;

/** Drops the PATH line the execution session prepends once tools are installed */
export function stripToolPath(script: string): string {
    return script.replace(/^export PATH=[^\n]*\n/, "");
}

export function ok(stdout = ""): SandboxExecutionResult {
    return { stdout, stderr: "", exitCode: 0 };
}

/**
 * In-process sandbox: commands go to a handler instead of a shell, uploads
 * land in a map keyed by relative path.
 */
export class FakeSandbox implements Sandbox {
    readonly commands: string[] = [];
    readonly scripts: string[] = [];
    readonly files = new Map<string, SandboxFile>();
    destroyed = false;

    constructor(
        readonly id: string,
        readonly workdir: string,
        private readonly handler: FakeCommandHandler
    ) {}

    async exec(argv: string[], _options: SandboxRunOptions): Promise<SandboxExecutionResult> {
        if (this.destroyed) {
            throw new Error(`No such container: ${this.id}`);
        }
        const script = argv[argv.length - 1] ?? "";
        const command = stripToolPath(script);
        this.scripts.push(script);
        this.commands.push(command);
        return this.handler(command, this);
    }

    async upload(files: SandboxFile[]): Promise<void> {
        for (const file of files) {
            this.files.set(file.path, file);
        }
    }

    async destroy(): Promise<void> {
        this.destroyed = true;
    }
}

export class FakeSandboxProvider implements SandboxProvider {
    readonly name = "fake";
    readonly sandboxes: FakeSandbox[] = [];
    readonly environments: EnvironmentSpec[] = [];

    constructor(private readonly handler: FakeCommandHandler = (command) => ok(`ran: ${command}`)) {}

    async createSandbox(environment: EnvironmentSpec): Promise<FakeSandbox> {
        this.environments.push(environment);
        const sandbox = new FakeSandbox(`fake-${this.sandboxes.length + 1}`, environment.workdir ?? "/workspace", this.handler);
        this.sandboxes.push(sandbox);
        return sandbox;
    }
}

export type ScriptStep = string | ModelResponse | Error | ((request: ModelRequest) => ModelResponse | Promise<ModelResponse>);

/**
 * Model client that answers from a fixed script, one step per call. A step
 * that is an Error is thrown.
 */
export class ScriptedModelClient implements ModelClient {
    readonly name: string;
    readonly model: string;
    readonly requests: ModelRequest[] = [];
    private cursor = 0;

    constructor(
        private readonly script: ScriptStep[],
        options: { name?: string; model?: string } = {}
    ) {
        this.name = options.name ?? "scripted";
        this.model = options.model ?? "scripted-model";
    }

    get calls(): number {
        return this.requests.length;
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        this.requests.push(request);
        const step = this.script[this.cursor];
        this.cursor += 1;
        if (step === undefined) {
            throw new Error(`Model script exhausted after ${this.script.length} steps`);
        }
        if (step instanceof Error) throw step;
        if (typeof step === "string") return { text: step };
        if (typeof step === "function") return step(request);
        return step;
    }
}
