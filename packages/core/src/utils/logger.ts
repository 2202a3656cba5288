import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
    level?: LogLevel;
    /** Bindings included on every line */
    base?: Record<string, unknown>;
    /** Defaults to stderr so stdout stays free for command output */
    destination?: DestinationStream;
}

const DEFAULT_LEVEL: LogLevel = process.env.PATCHLOOP_LOG_LEVEL === "debug" ? "debug" : "info";

export function createLogger(config: LoggerConfig = {}): Logger {
    const options: LoggerOptions = {
        level: config.level ?? DEFAULT_LEVEL,
        base: { service: "patchloop", ...config.base },
    };
    return pino(options, config.destination ?? pino.destination(2));
}

export function createSilentLogger(): Logger {
    return pino({ level: "silent" });
}
