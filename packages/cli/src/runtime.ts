import {
    ActivityHook,
    DockerSandboxProvider,
    LocalSandboxProvider,
    LoggingHook,
    RetryPolicy,
    SharedBudget,
    TurnController,
    UsageLedger,
    createLogger,
    resolveRate,
    type AgentHook,
    type CostRate,
    type Logger,
    type ModelClient,
    type ModelClientRegistry,
    type ResumePoint,
    type RetrySettings,
    type RunConfig,
    type SandboxProvider,
    type TaskSpec,
} from "@patchloop/core";
import { CachingModelClient, ReplayModelClient, createDefaultModelClientRegistry } from "@patchloop/providers";
import { loadToolBundle, type ToolBundle } from "@patchloop/tools";

export interface RuntimeOverrides {
    model?: ModelClient;
    sandboxProvider?: SandboxProvider;
    logger?: Logger;
    registry?: ModelClientRegistry;
    /** Trajectory whose recorded replies stand in for the model */
    replay?: string;
}

export interface Runtime {
    config: RunConfig;
    logger: Logger;
    model: ModelClient;
    sandboxProvider: SandboxProvider;
    bundle: ToolBundle;
    rate: CostRate;
    hooks: AgentHook[];
    activity?: ActivityHook;
    modelRetry: RetryPolicy;
    sandboxRetry: RetryPolicy;
    sharedBudget?: SharedBudget;
}

export function retryPolicyFrom(settings: RetrySettings): RetryPolicy {
    return new RetryPolicy({
        rules: {
            "transient-network": settings.transient,
            "rate-limit": settings.rateLimit,
        },
        multiplier: settings.multiplier,
        maxDelayMs: settings.maxDelayMs,
        jitterRatio: settings.jitterRatio,
    });
}

/**
 * `provider: auto` picks the provider whose model patterns match the model
 * name.
 */
export function createModelClient(
    config: RunConfig,
    registry: ModelClientRegistry = createDefaultModelClientRegistry(),
    logger?: Logger
): ModelClient {
    const { model } = config;
    let provider = model.provider;
    if (provider === "auto") {
        const resolved = registry.resolveProviderNameForModel(model.name);
        if (!resolved) {
            throw new Error(`No provider matches model "${model.name}"; set model.provider`);
        }
        provider = resolved;
    }
    if (!registry.has(provider)) {
        const known = registry.list().map((registration) => registration.name).join(", ");
        throw new Error(`Unknown model provider "${provider}" (known: ${known})`);
    }
    const client = registry.create(provider, {
        model: model.name,
        baseURL: model.baseURL,
        temperature: model.temperature,
        maxOutputTokens: model.maxOutputTokens,
    });
    if (!model.cache.enabled) return client;
    return new CachingModelClient(client, {
        ttlMs: model.cache.ttlMs,
        maxEntries: model.cache.maxEntries,
        dir: model.cache.dir,
        ...(logger ? { logger } : {}),
    });
}

export function createSandboxProvider(config: RunConfig): SandboxProvider {
    return config.sandbox.provider === "local" ? new LocalSandboxProvider() : new DockerSandboxProvider();
}

export function openUsageLedger(config: RunConfig, logger: Logger): Promise<UsageLedger | undefined> {
    const { ledger, hourlyTokens, dailyTokens, totalTokens } = config.usage;
    if (!ledger) return Promise.resolve(undefined);
    return UsageLedger.open({ filePath: ledger, ceilings: { hourlyTokens, dailyTokens, totalTokens }, logger });
}

async function sharedBudgetFrom(config: RunConfig, logger: Logger): Promise<SharedBudget | undefined> {
    const { globalMaxTokens, globalMaxCostUsd } = config.limits;
    const ledger = await openUsageLedger(config, logger);
    if (globalMaxTokens === undefined && globalMaxCostUsd === undefined && !ledger) return undefined;
    return new SharedBudget({ maxTokens: globalMaxTokens, maxCostUsd: globalMaxCostUsd }, { ledger });
}

export async function createRuntime(config: RunConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
    const logger = overrides.logger ?? createLogger({ level: config.logging.level });
    const model =
        overrides.model ??
        (overrides.replay
            ? await ReplayModelClient.fromFile(overrides.replay)
            : createModelClient(config, overrides.registry, logger));
    const bundle = await loadToolBundle(config.tools.bundle);
    const rate = config.model.rates ?? resolveRate(model.name, model.model).rate;

    const hooks: AgentHook[] = [new LoggingHook(logger)];
    let activity: ActivityHook | undefined;
    if (config.activityLog) {
        activity = new ActivityHook({ filePath: config.activityLog, logger });
        hooks.push(activity);
    }

    logger.debug(
        { provider: model.name, model: model.model, bundle: bundle.name, sandbox: config.sandbox.provider },
        "Runtime ready"
    );

    return {
        config,
        logger,
        model,
        sandboxProvider: overrides.sandboxProvider ?? createSandboxProvider(config),
        bundle,
        rate,
        hooks,
        activity,
        modelRetry: retryPolicyFrom(config.retry.model),
        sandboxRetry: retryPolicyFrom(config.retry.sandbox),
        sharedBudget: await sharedBudgetFrom(config, logger),
    };
}

export function createController(
    runtime: Runtime,
    task: TaskSpec,
    options: { resume?: ResumePoint; signal?: AbortSignal } = {}
): TurnController {
    const { config } = runtime;
    return new TurnController({
        task,
        model: runtime.model,
        sandboxProvider: runtime.sandboxProvider,
        tools: runtime.bundle.schema,
        toolInstallation: runtime.bundle,
        trajectoryDir: config.trajectory.dir,
        logger: runtime.logger,
        parserFormat: config.parser.format,
        maxTurns: config.limits.maxTurns,
        maxFormatRetries: config.limits.maxFormatRetries,
        modelTimeoutMs: config.model.timeoutMs,
        executeTimeoutMs: config.sandbox.executeTimeoutMs,
        closeGraceMs: config.sandbox.closeGraceMs,
        history: config.history,
        ceilings: { maxTokens: config.limits.maxTokens, maxCostUsd: config.limits.maxCostUsd },
        rate: runtime.rate,
        sharedBudget: runtime.sharedBudget,
        modelRetry: runtime.modelRetry,
        sandboxRetry: runtime.sandboxRetry,
        hooks: runtime.hooks,
        templates: config.templates,
        output: config.output,
        signal: options.signal,
        resume: options.resume,
    });
}

export async function shutdownRuntime(runtime: Runtime): Promise<void> {
    await runtime.activity?.shutdown();
    await runtime.sharedBudget?.ledger?.flush();
    runtime.logger.flush();
}
