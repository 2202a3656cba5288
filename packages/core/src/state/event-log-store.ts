import * as fs from "node:fs/promises";
import { dirname } from "node:path";

export interface EventLogStoreOptions {
    filePath: string;
    batchSize?: number;
    flushIntervalMs?: number;
    /** Receives failures of background flushes */
    onError: (error: unknown) => void;
}

/**
 * Buffered JSONL appender. Entries are written in batches or after a short
 * delay; `shutdown` writes whatever is left.
 */
export class EventLogStore<TEntry extends object> {
    private readonly filePath: string;
    private readonly batchSize: number;
    private readonly flushIntervalMs: number;
    private readonly onError: (error: unknown) => void;
    private buffer: TEntry[] = [];
    private flushTimer?: NodeJS.Timeout;
    private flushing?: Promise<void>;

    constructor(options: EventLogStoreOptions) {
        this.filePath = options.filePath;
        this.batchSize = options.batchSize ?? 64;
        this.flushIntervalMs = options.flushIntervalMs ?? 250;
        this.onError = options.onError;
    }

    get path(): string {
        return this.filePath;
    }

    public async append(entry: TEntry): Promise<void> {
        this.buffer.push(entry);
        if (this.buffer.length >= this.batchSize) {
            await this.flush();
            return;
        }
        this.ensureTimer();
    }

    public async flush(): Promise<void> {
        while (this.flushing) {
            await this.flushing;
        }
        if (this.buffer.length === 0) return;
        const pending = this.buffer.splice(0, this.buffer.length);
        this.flushing = (async () => {
            await fs.mkdir(dirname(this.filePath), { recursive: true });
            const payload = pending.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
            await fs.appendFile(this.filePath, payload, "utf8");
        })();
        try {
            await this.flushing;
        } finally {
            this.flushing = undefined;
        }
    }

    public async shutdown(): Promise<void> {
        if (this.flushTimer) {
            clearTimeout(this.flushTimer);
            this.flushTimer = undefined;
        }
        await this.flush();
    }

    private ensureTimer(): void {
        if (this.flushTimer) return;
        this.flushTimer = setTimeout(() => {
            this.flushTimer = undefined;
            this.flush().catch(this.onError);
        }, this.flushIntervalMs);
        this.flushTimer.unref();
    }
}
