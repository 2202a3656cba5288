import type { Logger } from "pino";
import { TaskSpecSchema } from "../events/trajectory-schema.js";
import { TrajectoryRecorder, trajectoryPath } from "../events/trajectory-recorder.js";
import type { ReplayState } from "../events/trajectory-reader.js";
import type { CostRate } from "../events/cost-analytics.js";
import { FaultError, asError, faultLogFields, serializeFault } from "../faults/fault-error.js";
import { RetryPolicy } from "../faults/retry-policy.js";
import { withTimeout } from "../faults/timeout.js";
import { ActionParser, type ActionFormat } from "../parser/action-parser.js";
import type { ToolSchema } from "../parser/tool-schema.js";
import type { ModelClient, ModelResponse } from "../providers/model-client.js";
import { ExecutionSession } from "../security/execution-session.js";
import type { SandboxFile, SandboxProvider } from "../security/sandbox.js";
import { BudgetTracker, type SharedBudget } from "../state/budget-tracker.js";
import { estimateTextTokens, type WindowResult } from "../state/compaction.js";
import { HistoryManager } from "../state/history-manager.js";
import { HookManager, type AgentHook, type HookContext } from "../state/hook-manager.js";
import type { Action, BudgetCeilings, ExecutionResult, HistoryEntry, TokenUsage } from "../types/messages.js";
import type { ControllerState, TaskOutcome, TaskResult, TaskSpec } from "../types/task.js";
import { renderTemplate } from "../utils/template.js";
import type { TruncationOptions } from "../utils/truncate.js";
import { DEFAULT_TEMPLATES, FORMAT_INSTRUCTIONS, type PromptTemplates } from "./prompts.js";

export interface ToolInstallation {
    files: SandboxFile[];
    /** Directory, relative to the sandbox working directory, put on PATH */
    binDir: string;
}

export interface TurnControllerOptions {
    task: TaskSpec;
    model: ModelClient;
    sandboxProvider: SandboxProvider;
    tools: ToolSchema;
    toolInstallation?: ToolInstallation;
    trajectoryDir: string;
    logger: Logger;
    parserFormat?: ActionFormat;
    maxTurns?: number;
    maxFormatRetries?: number;
    modelTimeoutMs?: number;
    executeTimeoutMs?: number;
    closeGraceMs?: number;
    history?: { contextBudgetTokens: number; keepRecent?: number; tightenRatio?: number };
    /** Defaults for tasks that set no ceilings of their own */
    ceilings?: BudgetCeilings;
    rate?: CostRate;
    sharedBudget?: SharedBudget;
    modelRetry?: RetryPolicy;
    sandboxRetry?: RetryPolicy;
    hooks?: AgentHook[];
    templates?: Partial<PromptTemplates>;
    output?: TruncationOptions;
    signal?: AbortSignal;
    resume?: { state: ReplayState; validBytes: number };
}

type ActionStep =
    | { kind: "action"; action: Action; text: string; window: WindowResult; usage: TokenUsage }
    | { kind: "stop"; outcome: TaskOutcome };

const DEFAULT_MAX_TURNS = 50;
const DEFAULT_MAX_FORMAT_RETRIES = 3;
const DEFAULT_MODEL_TIMEOUT_MS = 300_000;
const DEFAULT_CONTEXT_BUDGET = 100_000;

/**
 * Drives one task through INIT, AWAITING_MODEL, PARSING, EXECUTING and
 * RECORDING until it reaches DONE, FAILED, BUDGET_EXCEEDED or MAX_TURNS.
 *
 * Malformed replies are answered with a corrective message and do not count
 * as turns; `maxFormatRetries` bounds them per turn. A session-fatal fault
 * gets one fresh session per task. The session is closed and the trajectory
 * finalized whatever the outcome.
 */
export class TurnController {
    private readonly task: TaskSpec;
    private readonly model: ModelClient;
    private readonly tools: ToolSchema;
    private readonly logger: Logger;
    private readonly parser: ActionParser;
    private readonly parserFormat: ActionFormat;
    private readonly history: HistoryManager;
    private readonly budget: BudgetTracker;
    private readonly recorder: TrajectoryRecorder;
    private readonly hooks: HookManager;
    private readonly templates: PromptTemplates;
    private readonly modelRetry: RetryPolicy;
    private readonly sandboxRetry: RetryPolicy;
    private readonly maxTurns: number;
    private readonly maxFormatRetries: number;
    private readonly modelTimeoutMs: number;

    private state: ControllerState = "INIT";
    private turn = 0;
    private session?: ExecutionSession;
    private sessionRecreated = false;
    private recording = false;

    constructor(private readonly options: TurnControllerOptions) {
        this.task = options.task;
        this.model = options.model;
        this.tools = options.tools;
        this.logger = options.logger.child({ taskId: options.task.id });
        this.parserFormat = options.parserFormat ?? "fenced";
        this.parser = new ActionParser(options.tools, this.parserFormat);
        this.history = new HistoryManager({
            contextBudgetTokens: options.history?.contextBudgetTokens ?? DEFAULT_CONTEXT_BUDGET,
            keepRecent: options.history?.keepRecent,
            tightenRatio: options.history?.tightenRatio,
            estimator: (text) => this.estimateTokens(text),
        });
        this.budget = new BudgetTracker({
            ceilings: options.task.ceilings ?? options.ceilings,
            rate: options.rate,
            shared: options.sharedBudget,
            model: options.model.model,
        });
        this.recorder = new TrajectoryRecorder(trajectoryPath(options.trajectoryDir, options.task.id));
        this.hooks = new HookManager(this.logger);
        for (const hook of options.hooks ?? []) {
            this.hooks.register(hook);
        }
        this.templates = { ...DEFAULT_TEMPLATES, ...options.templates };
        this.modelRetry = options.modelRetry ?? new RetryPolicy();
        this.sandboxRetry = options.sandboxRetry ?? new RetryPolicy();
        this.maxTurns = options.task.maxTurns ?? options.maxTurns ?? DEFAULT_MAX_TURNS;
        this.maxFormatRetries = options.maxFormatRetries ?? DEFAULT_MAX_FORMAT_RETRIES;
        this.modelTimeoutMs = options.modelTimeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    }

    get currentState(): ControllerState {
        return this.state;
    }

    get trajectoryPath(): string {
        return this.recorder.filePath;
    }

    async run(): Promise<TaskResult> {
        const finished = this.options.resume?.state.outcome;
        if (finished) {
            this.turn = this.options.resume?.state.turns ?? 0;
            this.state = finished.state;
            return this.result(finished);
        }

        let outcome: TaskOutcome;
        try {
            outcome = await this.drive();
        } catch (error) {
            outcome = this.failure(error);
        } finally {
            await this.session?.close();
            this.session = undefined;
        }

        this.transition(outcome.state);
        await this.finalize(outcome);
        await this.hooks.taskEnd(this.context(), outcome);
        return this.result(outcome);
    }

    private async drive(): Promise<TaskOutcome> {
        const valid = TaskSpecSchema.safeParse(this.task);
        if (!valid.success) {
            const message = `Invalid task: ${valid.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`;
            return { state: "FAILED", reason: message, fault: serializeFault({ kind: "invalid-request", message }) };
        }

        const resume = this.options.resume;
        if (resume) {
            this.history.restore(resume.state.history);
            this.budget.restore(resume.state.budget);
            this.turn = resume.state.turns;
            await this.recorder.resume(resume.state.turns, resume.validBytes);
            this.recording = true;
            this.logger.info({ turns: this.turn }, "Resuming task");
        } else {
            const seed = this.seedHistory();
            await this.recorder.begin({
                task: this.task,
                model: { provider: this.model.name, name: this.model.model },
                seed,
            });
            this.recording = true;
        }

        await this.openSession();
        if (this.turn >= this.maxTurns) {
            return { state: "MAX_TURNS", reason: `reached the limit of ${this.maxTurns} turns` };
        }

        for (;;) {
            const next = this.turn + 1;
            const started = Date.now();
            const step = await this.requestAction(next);
            if (step.kind === "stop") return step.outcome;
            const { action, window, usage } = step;

            this.transition("EXECUTING");
            const terminal = this.tools.isTerminal(action.command);
            const { result, reset }: { result: ExecutionResult; reset: boolean } = terminal
                ? { result: { action, output: "", exitStatus: 0, elapsedMs: 0, truncated: false }, reset: false }
                : await this.executeAction(action);

            this.transition("RECORDING");
            const entries = [
                this.history.append({ turn: next, role: "assistant", kind: "response", content: step.text, action }),
                this.history.append({
                    turn: next,
                    role: "tool-observation",
                    kind: "observation",
                    content: terminal ? this.templates.submitted : this.observe(result, reset),
                }),
            ];
            const budget = this.budget.snapshot();
            await this.recorder.appendTurn({
                turn: next,
                modelInput: window.entries,
                elided: window.elided,
                modelOutput: step.text,
                action,
                result,
                usage,
                budget,
                entries,
            });
            this.turn = next;
            await this.hooks.turnEnd(this.context(), {
                turn: next,
                action,
                result,
                usage,
                budget,
                elided: window.elided,
                elapsedMs: Date.now() - started,
                terminal,
            });

            if (terminal) return this.complete(action);
            if (this.budget.exceeded()) return { state: "BUDGET_EXCEEDED", reason: "task budget exceeded" };
            const shared = this.budget.sharedBreach();
            if (shared) return { state: "BUDGET_EXCEEDED", reason: shared };
            if (this.turn >= this.maxTurns) return { state: "MAX_TURNS", reason: `reached the limit of ${this.maxTurns} turns` };
            if (this.options.signal?.aborted) return { state: "FAILED", reason: "cancelled" };
        }
    }

    private seedHistory(): HistoryEntry[] {
        const formatInstructions = FORMAT_INSTRUCTIONS[this.parserFormat];
        return [
            this.history.append({
                turn: 0,
                role: "system",
                kind: "prompt",
                pinned: true,
                content: renderTemplate(this.templates.system, {
                    tool_docs: this.tools.renderDocs(),
                    format_instructions: formatInstructions,
                }),
            }),
            this.history.append({
                turn: 0,
                role: "user",
                kind: "prompt",
                pinned: true,
                content: renderTemplate(this.templates.instance, {
                    problem_statement: this.task.problemStatement.trim(),
                    task_id: this.task.id,
                }),
            }),
        ];
    }

    /**
     * AWAITING_MODEL and PARSING for one turn, including corrective re-asks
     * and one tightened retry after a context-too-large fault. The turn-start
     * hook fires once the first model call of the turn passes the budget
     * pre-check; a turn that then fails or stops before RECORDING gets no
     * turn-end, only the task-end.
     */
    private async requestAction(turn: number): Promise<ActionStep> {
        let malformed = 0;
        let tightened = false;
        let announced = false;
        for (;;) {
            const window = this.history.project();
            if (this.budget.wouldExceed(window.tokens)) {
                return { kind: "stop", outcome: { state: "BUDGET_EXCEEDED", reason: "the next model call would exceed the budget" } };
            }
            if (!announced) {
                announced = true;
                await this.hooks.turnStart(this.context(turn));
            }

            this.transition("AWAITING_MODEL");
            let response: ModelResponse;
            try {
                response = await this.callModel(window.entries);
            } catch (error) {
                if (error instanceof FaultError && error.kind === "context-too-large" && !tightened) {
                    tightened = true;
                    const budget = this.history.tighten();
                    this.logger.warn({ contextBudgetTokens: budget }, "Context too large, retrying with a tighter window");
                    continue;
                }
                throw error;
            }

            const usage = response.usage ?? {
                promptTokens: window.tokens,
                completionTokens: this.estimateTokens(response.text),
            };
            this.budget.record(usage);

            this.transition("PARSING");
            const parsed = this.parser.parse(response.text);
            if (parsed.kind === "action") {
                return { kind: "action", action: parsed.action, text: response.text, window, usage };
            }

            malformed += 1;
            const retrying = malformed <= this.maxFormatRetries;
            const corrective = retrying
                ? [
                      this.history.append({
                          turn,
                          role: "user",
                          kind: "corrective",
                          content: renderTemplate(this.templates.formatError, {
                              reason: parsed.reason,
                              format_instructions: FORMAT_INSTRUCTIONS[this.parserFormat],
                          }),
                      }),
                  ]
                : [];
            await this.recorder.appendFormatError({
                turn,
                attempt: malformed,
                outcome: parsed.kind,
                reason: parsed.reason,
                modelOutput: response.text,
                usage,
                budget: this.budget.snapshot(),
                entries: corrective,
            });
            this.logger.warn({ turn, attempt: malformed, outcome: parsed.kind, reason: parsed.reason }, "Malformed model response");
            if (!retrying) {
                throw new FaultError({
                    kind: "malformed-action",
                    consecutive: malformed,
                    message: `${malformed} consecutive malformed responses; last: ${parsed.reason}`,
                });
            }
        }
    }

    private async callModel(entries: HistoryEntry[]): Promise<ModelResponse> {
        const { value } = await this.modelRetry.run(
            () =>
                withTimeout(
                    (signal) => this.model.complete({ entries, tools: this.tools.list(), signal }),
                    this.modelTimeoutMs,
                    `${this.model.name} completion`,
                    this.options.signal
                ),
            {
                boundary: "model",
                signal: this.options.signal,
                onRetry: (event) =>
                    this.logger.warn(
                        { attempt: event.attempt, delayMs: event.delayMs, ...faultLogFields(event.fault) },
                        "Retrying model call"
                    ),
            }
        );
        return value;
    }

    /**
     * Runs the action, replacing a lost session once. `reset` tells the
     * caller the result came from a fresh environment.
     */
    private async executeAction(action: Action): Promise<{ result: ExecutionResult; reset: boolean }> {
        const command = this.tools.renderCommand(action);
        try {
            return { result: await this.requireSession().execute(action, command, { signal: this.options.signal }), reset: false };
        } catch (error) {
            if (!(error instanceof FaultError) || error.kind !== "session-fatal" || this.sessionRecreated) {
                throw error;
            }
            this.sessionRecreated = true;
            this.logger.warn(faultLogFields(error.fault), "Session lost, opening a fresh one");
            await this.session?.close();
            this.session = undefined;
            await this.openSession();
            const result = await this.requireSession().execute(action, command, { signal: this.options.signal });
            return { result, reset: true };
        }
    }

    private async openSession(): Promise<void> {
        const session = await ExecutionSession.open(this.options.sandboxProvider, this.task.environment, {
            retry: this.sandboxRetry,
            logger: this.logger,
            executeTimeoutMs: this.options.executeTimeoutMs,
            closeGraceMs: this.options.closeGraceMs,
            output: this.options.output,
        });
        this.session = session;
        await session.reset();
        if (this.options.toolInstallation) {
            await session.installTools(this.options.toolInstallation.files, this.options.toolInstallation.binDir);
        }
    }

    private requireSession(): ExecutionSession {
        if (!this.session) {
            throw new FaultError({ kind: "session-fatal", message: "No open execution session" });
        }
        return this.session;
    }

    private async complete(action: Action): Promise<TaskOutcome> {
        const command = this.task.submitCommand;
        if (!command) {
            return { state: "DONE", reason: `${action.command} issued` };
        }
        let result: ExecutionResult;
        try {
            result = await this.requireSession().execute(action, command);
        } catch (error) {
            const detail = error instanceof FaultError ? `${error.kind}: ${error.message}` : asError(error).message;
            this.logger.warn({ command, detail }, "Submission command could not run");
            return { state: "DONE", reason: `${action.command} issued; submission command failed (${detail})` };
        }
        if (result.fault || result.exitStatus !== 0) {
            const detail = result.fault ? result.fault.message : `exit ${result.exitStatus}`;
            this.logger.warn({ command, detail }, "Submission command failed");
            return { state: "DONE", reason: `${action.command} issued; submission command failed (${detail})` };
        }
        return { state: "DONE", reason: `${action.command} issued`, submission: result.output };
    }

    private observe(result: ExecutionResult, reset = false): string {
        const observation = this.describe(result);
        return reset ? `${this.templates.sessionReset}\n\n${observation}` : observation;
    }

    private describe(result: ExecutionResult): string {
        if (result.fault) {
            return renderTemplate(this.templates.fault, { kind: result.fault.kind, message: result.fault.message });
        }
        if (result.output === "" && result.exitStatus === 0) {
            return this.templates.emptyOutput;
        }
        return renderTemplate(this.templates.observation, {
            exit_status: result.exitStatus ?? "unknown",
            output: result.output,
        });
    }

    private failure(error: unknown): TaskOutcome {
        if (this.options.signal?.aborted) {
            return { state: "FAILED", reason: "cancelled" };
        }
        if (error instanceof FaultError) {
            this.logger.error(faultLogFields(error.fault), "Task failed");
            return { state: "FAILED", reason: error.message, fault: serializeFault(error.fault) };
        }
        const err = asError(error);
        this.logger.error({ err }, "Task aborted by an unexpected error");
        return { state: "FAILED", reason: `unexpected error: ${err.message}` };
    }

    private async finalize(outcome: TaskOutcome): Promise<void> {
        if (!this.recording) {
            this.logger.warn({ state: outcome.state, reason: outcome.reason }, "Task ended before its trajectory was opened");
            return;
        }
        try {
            await this.recorder.finalize(outcome, this.budget.snapshot());
        } catch (error) {
            this.logger.error({ err: asError(error), file: this.recorder.filePath }, "Could not finalize trajectory");
            await this.recorder.close();
        }
    }

    private transition(next: ControllerState): void {
        this.logger.debug({ from: this.state, to: next, turn: this.turn }, "State transition");
        this.state = next;
    }

    private context(turn = this.turn): HookContext {
        return {
            taskId: this.task.id,
            turn,
            state: this.state,
            budget: this.budget.snapshot(),
            model: this.model.model,
        };
    }

    private estimateTokens(text: string): number {
        return this.model.estimateTokens?.(text) ?? estimateTextTokens(text);
    }

    private result(outcome: TaskOutcome): TaskResult {
        return {
            taskId: this.task.id,
            outcome,
            turns: this.turn,
            budget: this.budget.snapshot(),
            trajectoryPath: this.recorder.filePath,
        };
    }
}
