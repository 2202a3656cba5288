import { FaultError } from "./fault-error.js";

/**
 * Runs `operation` with a deadline. On expiry the operation's signal is
 * aborted and the call rejects with a transient-network fault.
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
    parent?: AbortSignal
): Promise<T> {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);
    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const fault = new FaultError({
                kind: "transient-network",
                code: "ETIMEDOUT",
                message: `${label} timed out after ${timeoutMs}ms`,
            });
            controller.abort(fault);
            reject(fault);
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
        parent?.removeEventListener("abort", onParentAbort);
    }
}
