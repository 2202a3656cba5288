import type { FaultKind, FaultRecord } from "../types/messages.js";

export type { FaultKind };

interface FaultBase {
    message: string;
    cause?: unknown;
}

export type Fault =
    | (FaultBase & { kind: "transient-network"; code?: string })
    | (FaultBase & { kind: "rate-limit"; retryAfterMs?: number })
    | (FaultBase & { kind: "context-too-large" })
    | (FaultBase & { kind: "content-policy" })
    | (FaultBase & { kind: "invalid-request"; status?: number })
    | (FaultBase & { kind: "session-fatal" })
    | (FaultBase & { kind: "malformed-action"; consecutive: number });

export interface FaultErrorOptions {
    attempts?: number;
}

/**
 * Carries a classified fault across async boundaries. Anything caught by the
 * loop is either already a FaultError or gets classified into one.
 */
export class FaultError extends Error {
    public readonly fault: Fault;
    public readonly attempts: number;

    constructor(fault: Fault, options: FaultErrorOptions = {}) {
        super(fault.message);
        this.name = "FaultError";
        this.fault = fault;
        this.attempts = options.attempts ?? 1;
        if (fault.cause !== undefined) {
            this.cause = fault.cause;
        }

        Object.setPrototypeOf(this, FaultError.prototype);
    }

    get kind(): FaultKind {
        return this.fault.kind;
    }
}

export function isFaultError(error: unknown): error is FaultError {
    return error instanceof FaultError;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(error: unknown): Error {
    if (error instanceof Error) return error;
    if (typeof error === "string") return new Error(error);
    if (error === null || error === undefined) return new Error("Unknown error");
    return new Error(String(error));
}

export function serializeFault(fault: Fault): FaultRecord {
    const record: FaultRecord = { kind: fault.kind, message: fault.message };
    if (fault.kind === "rate-limit" && fault.retryAfterMs !== undefined) {
        record.retryAfterMs = fault.retryAfterMs;
    }
    if (fault.kind === "invalid-request" && fault.status !== undefined) {
        record.status = fault.status;
    }
    if (fault.kind === "transient-network" && fault.code !== undefined) {
        record.code = fault.code;
    }
    if (fault.cause !== undefined) {
        const cause = asError(fault.cause);
        if (cause.message !== fault.message) {
            record.causeMessage = cause.message;
        }
    }
    return record;
}

export function faultLogFields(fault: Fault): Record<string, unknown> {
    return { ...serializeFault(fault) };
}
