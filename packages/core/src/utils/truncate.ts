export const DEFAULT_MAX_LINES = 400;
export const DEFAULT_MAX_BYTES = 32 * 1024;

export interface TruncationOptions {
    maxLines?: number;
    maxBytes?: number;
}

export interface TruncationResult {
    content: string;
    truncated: boolean;
    totalLines: number;
    totalBytes: number;
    keptLines: number;
}

export function formatSize(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

function tailBytes(line: string, maxBytes: number): string {
    const buf = Buffer.from(line, "utf-8");
    if (buf.length <= maxBytes) return line;
    let start = buf.length - maxBytes;
    // skip UTF-8 continuation bytes
    while (start < buf.length && (buf[start] & 0xc0) === 0x80) start++;
    return buf.subarray(start).toString("utf-8");
}

/**
 * Keeps the end of `content`: command output usually ends with the part
 * that matters (the error, the test summary).
 */
export function truncateTail(content: string, options: TruncationOptions = {}): TruncationResult {
    const maxLines = options.maxLines ?? DEFAULT_MAX_LINES;
    const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    const totalBytes = Buffer.byteLength(content, "utf-8");
    const lines = content.split("\n");

    if (lines.length <= maxLines && totalBytes <= maxBytes) {
        return { content, truncated: false, totalLines: lines.length, totalBytes, keptLines: lines.length };
    }

    const kept: string[] = [];
    let bytes = 0;
    for (let i = lines.length - 1; i >= 0 && kept.length < maxLines; i--) {
        const lineBytes = Buffer.byteLength(lines[i], "utf-8") + (kept.length > 0 ? 1 : 0);
        if (bytes + lineBytes > maxBytes) {
            if (kept.length === 0) {
                kept.unshift(tailBytes(lines[i], maxBytes));
            }
            break;
        }
        kept.unshift(lines[i]);
        bytes += lineBytes;
    }

    return {
        content: kept.join("\n"),
        truncated: true,
        totalLines: lines.length,
        totalBytes,
        keptLines: kept.length,
    };
}

export function truncationNotice(result: TruncationResult): string {
    return `[output truncated: showing the last ${result.keptLines} of ${result.totalLines} lines (${formatSize(result.totalBytes)} total)]`;
}
