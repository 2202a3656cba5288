import { resolve } from "node:path";
import { ConfigError, RunConfigSchema, loadRunConfig, type RunConfig } from "@patchloop/core";

export interface ConfigFlags {
    config?: string;
    model?: string;
    provider?: string;
    sandbox?: "local" | "docker";
    trajectoryDir?: string;
    logLevel?: RunConfig["logging"]["level"];
}

/**
 * Config file first, then command-line flags on top. Without a file the
 * model flag is required and every other setting takes its default.
 */
export async function resolveRunConfig(flags: ConfigFlags): Promise<RunConfig> {
    let config: RunConfig;
    if (flags.config) {
        config = await loadRunConfig(resolve(flags.config));
    } else {
        if (!flags.model) {
            throw new ConfigError("Pass --config or at least --model");
        }
        config = RunConfigSchema.parse({ model: { provider: flags.provider ?? "auto", name: flags.model } });
        config = { ...config, trajectory: { dir: resolve(config.trajectory.dir) } };
    }

    return {
        ...config,
        model: {
            ...config.model,
            name: flags.model ?? config.model.name,
            provider: flags.provider ?? config.model.provider,
        },
        sandbox: { ...config.sandbox, provider: flags.sandbox ?? config.sandbox.provider },
        trajectory: { dir: flags.trajectoryDir ? resolve(flags.trajectoryDir) : config.trajectory.dir },
        logging: { level: flags.logLevel ?? config.logging.level },
    };
}
