import { asError, isFaultError, type Fault, type FaultKind } from "./fault-error.js";

export type FaultBoundary = "model" | "sandbox";

export type Recovery =
    | { action: "retry"; backoff: "standard" | "rate-limit" }
    | { action: "tighten-context" }
    | { action: "recreate-session" }
    | { action: "correct-format" }
    | { action: "fail" };

const TRANSIENT_CODES = new Set([
    "ECONNRESET",
    "ECONNREFUSED",
    "ECONNABORTED",
    "ETIMEDOUT",
    "EPIPE",
    "EAI_AGAIN",
    "ENETUNREACH",
    "EHOSTUNREACH",
    "UND_ERR_SOCKET",
    "UND_ERR_CONNECT_TIMEOUT",
]);

const CONTEXT_PATTERN = /context[\s_-]*(length|window)|maximum context|too many tokens|prompt is too long|context_length_exceeded/;
const POLICY_PATTERN = /content[\s_-]*(policy|filter|management)|safety system|flagged/;
const RATE_PATTERN = /rate[\s_-]*limit|too many requests|quota exceeded|overloaded/;
const TRANSIENT_PATTERN = /timed? ?out|socket hang up|network|connection (reset|refused|closed)|fetch failed|temporarily unavailable/;
const SANDBOX_GONE_PATTERN = /no such container|is not running|container .* (removed|dead)|unauthori[sz]ed|permission denied while trying to connect/;

function field(value: unknown, key: string): unknown {
    if (typeof value !== "object" || value === null) return undefined;
    const read: unknown = Reflect.get(value, key);
    return read;
}

function readStatus(error: unknown): number | undefined {
    const candidates = [field(error, "status"), field(error, "statusCode"), field(field(error, "response"), "status")];
    for (const candidate of candidates) {
        const status = Number(candidate);
        if (Number.isInteger(status) && status > 0) return status;
    }
    return undefined;
}

function readCode(error: unknown): string | undefined {
    for (let current: unknown = error, depth = 0; current !== undefined && depth < 4; depth++) {
        const code = field(current, "code");
        if (typeof code === "string") return code;
        current = field(current, "cause");
    }
    return undefined;
}

function readHeader(headers: unknown, name: string): string | undefined {
    if (typeof headers !== "object" || headers === null) return undefined;
    const getter = field(headers, "get");
    if (typeof getter === "function") {
        const value: unknown = Reflect.apply(getter, headers, [name]);
        return typeof value === "string" ? value : undefined;
    }
    const value = field(headers, name) ?? field(headers, name.toLowerCase());
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
    return undefined;
}

/**
 * Reads a provider's back-off hint from `retry-after-ms`, `retry-after`
 * (seconds or an HTTP date) or a numeric `retryAfter` property.
 */
export function extractRetryAfterMs(error: unknown, now = Date.now()): number | undefined {
    const headers = field(error, "headers") ?? field(field(error, "response"), "headers");
    const ms = readHeader(headers, "retry-after-ms");
    if (ms !== undefined && Number.isFinite(Number(ms))) {
        return Math.max(0, Number(ms));
    }
    const raw = readHeader(headers, "retry-after") ?? field(error, "retryAfter");
    if (typeof raw === "number" && Number.isFinite(raw)) {
        return Math.max(0, raw * 1000);
    }
    if (typeof raw === "string" && raw.trim() !== "") {
        const seconds = Number(raw);
        if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
        const date = Date.parse(raw);
        if (!Number.isNaN(date)) return Math.max(0, date - now);
    }
    return undefined;
}

function messageOf(error: unknown): string {
    return asError(error).message;
}

/**
 * Maps a thrown value to a fault kind. The same error means different things
 * at the two boundaries: an unexplained sandbox failure is fatal to the
 * session, an unexplained model failure is a bad request.
 */
export function classifyError(error: unknown, boundary: FaultBoundary): Fault {
    if (isFaultError(error)) return error.fault;

    const message = messageOf(error);
    const lowered = message.toLowerCase();
    const status = readStatus(error);
    const code = readCode(error);
    const name = error instanceof Error ? error.name : "";

    if (status === 429 || (boundary === "model" && RATE_PATTERN.test(lowered))) {
        return { kind: "rate-limit", message, retryAfterMs: extractRetryAfterMs(error), cause: error };
    }
    if ((code !== undefined && TRANSIENT_CODES.has(code)) || name === "TimeoutError" || name === "APIConnectionError" || name === "APIConnectionTimeoutError") {
        return { kind: "transient-network", message, code, cause: error };
    }

    if (boundary === "sandbox") {
        if (status === 401 || status === 403 || SANDBOX_GONE_PATTERN.test(lowered)) {
            return { kind: "session-fatal", message, cause: error };
        }
        if ((status !== undefined && status >= 500) || TRANSIENT_PATTERN.test(lowered)) {
            return { kind: "transient-network", message, code, cause: error };
        }
        return { kind: "session-fatal", message, cause: error };
    }

    if (status === 413 || CONTEXT_PATTERN.test(lowered)) {
        return { kind: "context-too-large", message, cause: error };
    }
    if (POLICY_PATTERN.test(lowered)) {
        return { kind: "content-policy", message, cause: error };
    }
    if (status === 408 || status === 409 || (status !== undefined && status >= 500) || TRANSIENT_PATTERN.test(lowered)) {
        return { kind: "transient-network", message, code, cause: error };
    }
    return { kind: "invalid-request", message, status, cause: error };
}

export function recoveryFor(fault: Fault): Recovery {
    switch (fault.kind) {
        case "transient-network":
            return { action: "retry", backoff: "standard" };
        case "rate-limit":
            return { action: "retry", backoff: "rate-limit" };
        case "context-too-large":
            return { action: "tighten-context" };
        case "session-fatal":
            return { action: "recreate-session" };
        case "malformed-action":
            return { action: "correct-format" };
        case "content-policy":
        case "invalid-request":
            return { action: "fail" };
        default: {
            const unreachable: never = fault;
            return unreachable;
        }
    }
}

export function recoveryHint(kind: FaultKind): string {
    switch (kind) {
        case "transient-network":
            return "Check network connectivity to the model endpoint and sandbox host, then resume the task.";
        case "rate-limit":
            return "The provider is throttling requests. Lower batch concurrency or wait before resuming.";
        case "context-too-large":
            return "Reduce history.contextBudgetTokens or history.keepRecent, or use a model with a larger context window.";
        case "content-policy":
            return "The provider refused the request. Review the problem statement and repository content for flagged material.";
        case "invalid-request":
            return "Verify the model name, API key and request options in the run configuration.";
        case "session-fatal":
            return "The sandbox became unusable. Check that the container runtime is healthy and the image exists.";
        case "malformed-action":
            return "The model repeatedly failed to produce a valid command. Review the prompt templates and tool documentation.";
        default: {
            const unreachable: never = kind;
            return unreachable;
        }
    }
}
