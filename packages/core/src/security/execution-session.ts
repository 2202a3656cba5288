import type { Logger } from "pino";
import { classifyError } from "../faults/classifier.js";
import { FaultError, asError, faultLogFields, serializeFault } from "../faults/fault-error.js";
import type { RetryEvent, RetryPolicy } from "../faults/retry-policy.js";
import { quoteShellWord } from "../parser/shell-words.js";
import type { Action, ExecutionResult } from "../types/messages.js";
import type { EnvironmentSpec } from "../types/task.js";
import { truncateTail, truncationNotice, type TruncationOptions } from "../utils/truncate.js";
import type { Sandbox, SandboxFile, SandboxProvider } from "./sandbox.js";

export interface ExecutionSessionOptions {
    retry: RetryPolicy;
    logger: Logger;
    executeTimeoutMs?: number;
    closeGraceMs?: number;
    output?: TruncationOptions;
}

export interface ExecuteOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

const DEFAULT_EXECUTE_TIMEOUT_MS = 120_000;
const DEFAULT_CLOSE_GRACE_MS = 10_000;
const DEFAULT_SHELL = ["bash", "-c"];

function combineOutput(stdout: string, stderr: string): string {
    if (!stderr) return stdout.trimEnd();
    if (!stdout) return stderr.trimEnd();
    const separator = stdout.endsWith("\n") ? "" : "\n";
    return `${stdout}${separator}${stderr}`.trimEnd();
}

/**
 * Setup script derived from the environment: clone, checkout, then the
 * environment's own commands.
 */
export function setupCommandsFor(environment: EnvironmentSpec): string[] {
    const commands: string[] = [];
    if (environment.repo) {
        commands.push(`[ -d .git ] || git clone --quiet ${quoteShellWord(environment.repo)} .`);
    }
    if (environment.commit) {
        commands.push(`git checkout --quiet --force ${quoteShellWord(environment.commit)} && git clean -fdq`);
    }
    commands.push(...(environment.setupCommands ?? []));
    return commands;
}

/**
 * One open sandbox for one task. Transient faults are retried here; after the
 * retries run out the result carries the fault so the model sees it. Any
 * other sandbox fault is raised as session-fatal.
 */
export class ExecutionSession {
    private readonly logger: Logger;
    private readonly executeTimeoutMs: number;
    private readonly closeGraceMs: number;
    private toolPath?: string;
    private closing?: Promise<void>;

    private constructor(
        private readonly sandbox: Sandbox,
        private readonly environment: EnvironmentSpec,
        private readonly options: ExecutionSessionOptions
    ) {
        this.logger = options.logger.child({ sandbox: sandbox.id });
        this.executeTimeoutMs = options.executeTimeoutMs ?? DEFAULT_EXECUTE_TIMEOUT_MS;
        this.closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
    }

    static async open(
        provider: SandboxProvider,
        environment: EnvironmentSpec,
        options: ExecutionSessionOptions
    ): Promise<ExecutionSession> {
        try {
            const { value, attempts } = await options.retry.run(() => provider.createSandbox(environment), {
                boundary: "sandbox",
                onRetry: (event) => logRetry(options.logger, "open", event),
            });
            options.logger.info({ sandbox: value.id, provider: provider.name, attempts }, "Sandbox opened");
            return new ExecutionSession(value, environment, options);
        } catch (error) {
            const fault = classifyError(error, "sandbox");
            throw new FaultError(
                { kind: "session-fatal", message: `Could not open ${provider.name} sandbox: ${fault.message}`, cause: error },
                { attempts: error instanceof FaultError ? error.attempts : 1 }
            );
        }
    }

    get id(): string {
        return this.sandbox.id;
    }

    get isClosed(): boolean {
        return this.closing !== undefined;
    }

    /**
     * Brings the working copy to the task's starting state.
     */
    async reset(): Promise<void> {
        for (const command of setupCommandsFor(this.environment)) {
            const result = await this.run(command, { timeoutMs: Math.max(this.executeTimeoutMs, 600_000) });
            if (result.fault || result.exitStatus !== 0) {
                throw new FaultError({
                    kind: "session-fatal",
                    message: `Setup command failed (${result.fault?.message ?? `exit ${result.exitStatus}`}): ${command}\n${result.output}`,
                });
            }
        }
    }

    async upload(files: SandboxFile[]): Promise<void> {
        this.assertOpen();
        try {
            await this.options.retry.run(() => this.sandbox.upload(files), {
                boundary: "sandbox",
                onRetry: (event) => logRetry(this.logger, "upload", event),
            });
        } catch (error) {
            throw toSessionFatal(error);
        }
    }

    /**
     * Uploads tool scripts and puts `binDir` (relative to the working
     * directory) on the PATH of every later command.
     */
    async installTools(files: SandboxFile[], binDir: string): Promise<void> {
        await this.upload(files);
        this.toolPath = `${this.sandbox.workdir.replace(/\/$/, "")}/${binDir}`;
    }

    async execute(action: Action, command: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
        const result = await this.run(command, options);
        return { ...result, action };
    }

    private async run(command: string, options: ExecuteOptions): Promise<Omit<ExecutionResult, "action">> {
        this.assertOpen();
        const started = Date.now();
        const script = this.toolPath ? `export PATH=${quoteShellWord(this.toolPath)}:"$PATH"\n${command}` : command;
        const argv = [...(this.environment.shell ?? DEFAULT_SHELL), script];
        try {
            const { value } = await this.options.retry.run(
                () => this.sandbox.exec(argv, { timeoutMs: options.timeoutMs ?? this.executeTimeoutMs, signal: options.signal }),
                {
                    boundary: "sandbox",
                    signal: options.signal,
                    onRetry: (event) => logRetry(this.logger, "execute", event),
                }
            );
            const truncation = truncateTail(combineOutput(value.stdout, value.stderr), this.options.output);
            return {
                output: truncation.truncated ? `${truncationNotice(truncation)}\n${truncation.content}` : truncation.content,
                exitStatus: value.exitCode,
                elapsedMs: Date.now() - started,
                truncated: truncation.truncated,
            };
        } catch (error) {
            const fault = classifyError(error, "sandbox");
            if (fault.kind === "session-fatal") {
                throw toSessionFatal(error);
            }
            this.logger.warn(faultLogFields(fault), "Command failed after retries");
            return {
                output: "",
                exitStatus: null,
                elapsedMs: Date.now() - started,
                truncated: false,
                fault: serializeFault(fault),
            };
        }
    }

    /**
     * Idempotent. Never rejects: teardown problems are logged, and a sandbox
     * that does not go away within the grace period is abandoned.
     */
    close(): Promise<void> {
        if (!this.closing) {
            this.closing = this.teardown();
        }
        return this.closing;
    }

    private async teardown(): Promise<void> {
        let timer: NodeJS.Timeout | undefined;
        const grace = new Promise<"timeout">((resolve) => {
            timer = setTimeout(() => resolve("timeout"), this.closeGraceMs);
        });
        try {
            const result = await Promise.race([this.sandbox.destroy().then(() => "closed" as const), grace]);
            if (result === "timeout") {
                this.logger.warn({ graceMs: this.closeGraceMs }, "Sandbox teardown exceeded grace period");
            } else {
                this.logger.info("Sandbox closed");
            }
        } catch (error) {
            this.logger.warn({ err: asError(error) }, "Sandbox teardown failed");
        } finally {
            clearTimeout(timer);
        }
    }

    private assertOpen(): void {
        if (this.closing) {
            throw new FaultError({ kind: "session-fatal", message: "Execution session is closed" });
        }
    }
}

function toSessionFatal(error: unknown): FaultError {
    if (error instanceof FaultError && error.kind === "session-fatal") return error;
    const fault = classifyError(error, "sandbox");
    return new FaultError({ kind: "session-fatal", message: fault.message, cause: error });
}

function logRetry(logger: Logger, operation: string, event: RetryEvent): void {
    logger.warn({ operation, attempt: event.attempt, delayMs: event.delayMs, ...faultLogFields(event.fault) }, "Retrying sandbox call");
}
