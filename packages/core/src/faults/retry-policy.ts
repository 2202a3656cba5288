import { classifyError, type FaultBoundary } from "./classifier.js";
import { FaultError, type Fault, type FaultKind } from "./fault-error.js";

export interface BackoffRule {
    /** Total attempts, including the first one */
    maxAttempts: number;
    baseDelayMs: number;
}

export interface RetryPolicyConfig {
    rules: Partial<Record<FaultKind, BackoffRule>>;
    multiplier: number;
    maxDelayMs: number;
    /** Jitter adds up to this fraction of the computed delay */
    jitterRatio: number;
    random: () => number;
    sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryEvent {
    attempt: number;
    delayMs: number;
    fault: Fault;
}

export interface RetryRunOptions {
    boundary: FaultBoundary;
    signal?: AbortSignal;
    onRetry?: (event: RetryEvent) => void;
}

export interface RetryRunResult<T> {
    value: T;
    attempts: number;
    delays: number[];
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
    rules: {
        "transient-network": { maxAttempts: 3, baseDelayMs: 1_000 },
        "rate-limit": { maxAttempts: 5, baseDelayMs: 5_000 },
    },
    multiplier: 2,
    maxDelayMs: 60_000,
    jitterRatio: 0.1,
    random: Math.random,
    sleep,
};

/**
 * Exponential backoff keyed by fault kind. Kinds without a rule are never
 * retried. Within one `run` the delays never decrease, and a provider's
 * retry-after hint is treated as a floor.
 */
export class RetryPolicy {
    private readonly config: RetryPolicyConfig;

    constructor(config: Partial<RetryPolicyConfig> = {}) {
        this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    }

    ruleFor(kind: FaultKind): BackoffRule | undefined {
        return this.config.rules[kind];
    }

    /**
     * Delay before retry number `attempt` (1 for the first retry).
     */
    delayFor(fault: Fault, attempt: number, previousDelayMs = 0): number {
        const rule = this.ruleFor(fault.kind);
        if (!rule) return previousDelayMs;
        const exponential = rule.baseDelayMs * Math.pow(this.config.multiplier, attempt - 1);
        const jittered = exponential + exponential * this.config.jitterRatio * this.config.random();
        let delay = Math.min(jittered, this.config.maxDelayMs);
        if (fault.kind === "rate-limit" && fault.retryAfterMs !== undefined) {
            delay = Math.max(delay, fault.retryAfterMs);
        }
        return Math.round(Math.max(delay, previousDelayMs));
    }

    async run<T>(operation: (attempt: number) => Promise<T>, options: RetryRunOptions): Promise<RetryRunResult<T>> {
        const delays: number[] = [];
        let previousDelay = 0;
        for (let attempt = 1; ; attempt++) {
            try {
                const value = await operation(attempt);
                return { value, attempts: attempt, delays };
            } catch (error) {
                const fault = classifyError(error, options.boundary);
                const rule = this.ruleFor(fault.kind);
                if (!rule || attempt >= rule.maxAttempts || options.signal?.aborted) {
                    throw new FaultError(fault, { attempts: attempt });
                }
                const delayMs = this.delayFor(fault, attempt, previousDelay);
                previousDelay = delayMs;
                delays.push(delayMs);
                options.onRetry?.({ attempt, delayMs, fault });
                await this.config.sleep(delayMs, options.signal);
            }
        }
    }
}
