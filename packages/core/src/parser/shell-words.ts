export type SplitResult = { ok: true; words: string[] } | { ok: false; reason: string };

/**
 * Splits a command line the way a POSIX shell splits words: single quotes are
 * literal, double quotes allow `\"`, `\\`, `\$` and `` \` `` escapes, and an
 * unquoted backslash escapes the next character.
 */
export function splitShellWords(line: string): SplitResult {
    const words: string[] = [];
    let current = "";
    let inWord = false;
    let quote: "'" | '"' | null = null;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (quote === "'") {
            if (ch === "'") quote = null;
            else current += ch;
            continue;
        }
        if (quote === '"') {
            if (ch === '"') {
                quote = null;
            } else if (ch === "\\" && i + 1 < line.length && '"\\$`'.includes(line[i + 1])) {
                current += line[++i];
            } else {
                current += ch;
            }
            continue;
        }
        if (ch === "'" || ch === '"') {
            quote = ch;
            inWord = true;
        } else if (ch === "\\") {
            if (i + 1 >= line.length) {
                return { ok: false, reason: "trailing backslash" };
            }
            current += line[++i];
            inWord = true;
        } else if (ch === " " || ch === "\t") {
            if (inWord) {
                words.push(current);
                current = "";
                inWord = false;
            }
        } else {
            current += ch;
            inWord = true;
        }
    }

    if (quote) {
        return { ok: false, reason: `unterminated ${quote === "'" ? "single" : "double"} quote` };
    }
    if (inWord) words.push(current);
    return { ok: true, words };
}

export function quoteShellWord(word: string): string {
    if (word !== "" && /^[A-Za-z0-9_\-./:=@%+,]+$/.test(word)) return word;
    return `'${word.replace(/'/g, `'\\''`)}'`;
}
