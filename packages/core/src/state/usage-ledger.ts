import * as fs from "node:fs/promises";
import type { Logger } from "pino";
import { z } from "zod";
import { asError } from "../faults/fault-error.js";
import { EventLogStore } from "./event-log-store.js";

export interface UsageCeilings {
    hourlyTokens?: number;
    dailyTokens?: number;
    totalTokens?: number;
}

const UsageEntrySchema = z.object({
    ts: z.string(),
    model: z.string(),
    tokens: z.number().int().nonnegative(),
    costUsd: z.number().nonnegative(),
});

export type UsageEntry = z.infer<typeof UsageEntrySchema>;

export interface UsageStats {
    hourTokens: number;
    dayTokens: number;
    totalTokens: number;
    totalCostUsd: number;
    byModel: Record<string, number>;
    ceilings: UsageCeilings;
}

export interface UsageLedgerOptions {
    filePath: string;
    ceilings?: UsageCeilings;
    logger: Logger;
    now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function startOfHour(now: Date): number {
    const start = new Date(now);
    start.setMinutes(0, 0, 0);
    return start.getTime();
}

function startOfDay(now: Date): number {
    const start = new Date(now);
    start.setHours(0, 0, 0, 0);
    return start.getTime();
}

/**
 * UsageLedger
 * Token usage that outlives a single run. Every charge is appended to a JSONL
 * file; opening the ledger folds the file back into totals. Hourly and daily
 * windows follow the local clock.
 */
export class UsageLedger {
    private readonly store: EventLogStore<UsageEntry>;
    private readonly now: () => Date;
    private readonly logger: Logger;
    readonly ceilings: UsageCeilings;
    /** Entries of the last day; older ones only count towards the totals */
    private recent: Array<{ at: number; tokens: number }> = [];
    private totalTokens = 0;
    private totalCostUsd = 0;
    private readonly byModel = new Map<string, number>();

    private constructor(options: UsageLedgerOptions) {
        this.ceilings = { ...options.ceilings };
        this.now = options.now ?? (() => new Date());
        this.logger = options.logger;
        this.store = new EventLogStore<UsageEntry>({
            filePath: options.filePath,
            batchSize: 1,
            onError: (error) => options.logger.error({ err: error, file: options.filePath }, "Usage ledger write failed"),
        });
    }

    static async open(options: UsageLedgerOptions): Promise<UsageLedger> {
        const ledger = new UsageLedger(options);
        let text = "";
        try {
            text = await fs.readFile(options.filePath, "utf8");
        } catch (error) {
            if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) throw error;
        }
        let skipped = 0;
        for (const line of text.split("\n")) {
            if (line.trim() === "") continue;
            const parsed = safeJson(line);
            const entry = UsageEntrySchema.safeParse(parsed);
            if (!entry.success) {
                skipped += 1;
                continue;
            }
            ledger.apply(entry.data);
        }
        if (skipped > 0) {
            options.logger.warn({ file: options.filePath, skipped }, "Skipped unreadable usage ledger lines");
        }
        return ledger;
    }

    get path(): string {
        return this.store.path;
    }

    record(model: string, tokens: number, costUsd: number): void {
        const entry: UsageEntry = {
            ts: this.now().toISOString(),
            model,
            tokens: Math.max(0, Math.floor(tokens)),
            costUsd: Math.max(0, costUsd),
        };
        this.apply(entry);
        const cutoff = this.now().getTime() - DAY_MS;
        this.recent = this.recent.filter((item) => item.at >= cutoff);
        this.store.append(entry).catch((error: unknown) => {
            this.logger.error({ err: asError(error), file: this.store.path }, "Usage ledger write failed");
        });
        const breach = this.breach();
        if (breach) this.logger.warn({ breach }, "Usage ledger ceiling exceeded");
    }

    /** Describes the first ceiling the recorded usage is over, if any. */
    breach(): string | undefined {
        const stats = this.stats();
        const { hourlyTokens, dailyTokens, totalTokens } = this.ceilings;
        if (totalTokens !== undefined && stats.totalTokens > totalTokens) {
            return `total usage ${stats.totalTokens}/${totalTokens} tokens`;
        }
        if (dailyTokens !== undefined && stats.dayTokens > dailyTokens) {
            return `daily usage ${stats.dayTokens}/${dailyTokens} tokens`;
        }
        if (hourlyTokens !== undefined && stats.hourTokens > hourlyTokens) {
            return `hourly usage ${stats.hourTokens}/${hourlyTokens} tokens`;
        }
        return undefined;
    }

    exceeded(): boolean {
        return this.breach() !== undefined;
    }

    stats(): UsageStats {
        const now = this.now();
        const hour = startOfHour(now);
        const day = startOfDay(now);
        let hourTokens = 0;
        let dayTokens = 0;
        for (const entry of this.recent) {
            if (entry.at >= day) dayTokens += entry.tokens;
            if (entry.at >= hour) hourTokens += entry.tokens;
        }
        return {
            hourTokens,
            dayTokens,
            totalTokens: this.totalTokens,
            totalCostUsd: this.totalCostUsd,
            byModel: Object.fromEntries(this.byModel),
            ceilings: { ...this.ceilings },
        };
    }

    flush(): Promise<void> {
        return this.store.shutdown();
    }

    private apply(entry: UsageEntry): void {
        this.totalTokens += entry.tokens;
        this.totalCostUsd += entry.costUsd;
        this.byModel.set(entry.model, (this.byModel.get(entry.model) ?? 0) + entry.tokens);
        const at = Date.parse(entry.ts);
        const cutoff = this.now().getTime() - DAY_MS;
        if (Number.isFinite(at) && at >= cutoff) {
            this.recent.push({ at, tokens: entry.tokens });
        }
    }
}

function safeJson(line: string): unknown {
    try {
        return JSON.parse(line);
    } catch {
        return undefined;
    }
}
