import type { Action } from "../types/messages.js";
import { splitShellWords } from "./shell-words.js";
import type { ToolSchema, ToolSpec } from "./tool-schema.js";

export type ActionFormat = "fenced" | "json";

export type ParseOutcome =
    | { kind: "action"; action: Action }
    | { kind: "none"; reason: string }
    | { kind: "multiple"; count: number; reason: string }
    | { kind: "invalid"; reason: string; command?: string };

export type MalformedOutcome = Exclude<ParseOutcome, { kind: "action" }>;

const FENCE = /^```[^\n]*\n([\s\S]*?)^```[ \t]*$/gm;

function stripBlankEdges(lines: string[]): string[] {
    let start = 0;
    let end = lines.length;
    while (start < end && lines[start].trim() === "") start++;
    while (end > start && lines[end - 1].trim() === "") end--;
    return lines.slice(start, end);
}

function toArgString(value: unknown): string {
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    return JSON.stringify(value);
}

function toRecord(value: unknown): Record<string, unknown> | undefined {
    if (value && typeof value === "object" && !Array.isArray(value)) {
        return Object.fromEntries(Object.entries(value));
    }
    return undefined;
}

/**
 * Extracts exactly one action from a model reply. Anything else (no action,
 * several actions, or an action the tool schema rejects) is reported as a
 * distinct malformed outcome; the parser never guesses.
 */
export class ActionParser {
    constructor(
        private readonly schema: ToolSchema,
        private readonly format: ActionFormat = "fenced"
    ) {}

    parse(rawText: string): ParseOutcome {
        return this.format === "json" ? this.parseJson(rawText) : this.parseFenced(rawText);
    }

    private parseFenced(text: string): ParseOutcome {
        const blocks = [...text.matchAll(FENCE)];
        if (blocks.length === 0) {
            return { kind: "none", reason: "no fenced code block found" };
        }
        if (blocks.length > 1) {
            return { kind: "multiple", count: blocks.length, reason: `found ${blocks.length} code blocks` };
        }
        const block = blocks[0];
        const thought = (text.slice(0, block.index) + text.slice((block.index ?? 0) + block[0].length)).trim();
        const lines = stripBlankEdges(block[1].split("\n"));
        if (lines.length === 0) {
            return { kind: "none", reason: "the code block is empty" };
        }
        const body = lines.join("\n");
        const name = lines[0].trim().split(/\s+/)[0];
        const spec = this.schema.get(name);

        if (!spec) {
            const fallback = this.schema.fallback();
            if (fallback) {
                return this.accept(fallback.name, [body], body, thought);
            }
            return { kind: "invalid", reason: `unknown command "${name}"`, command: name };
        }
        if (spec.rawInput) {
            const rest = body.slice(body.indexOf(name) + name.length).trim();
            return this.accept(spec.name, rest === "" ? [] : [rest], body, thought);
        }
        if (spec.endMarker) {
            return this.parseWithBody(spec, lines, body, thought);
        }

        const commandLines = lines.filter((line) => line.trim() !== "");
        if (commandLines.length > 1) {
            return { kind: "multiple", count: commandLines.length, reason: `found ${commandLines.length} commands in one block` };
        }
        const split = splitShellWords(lines[0].trim());
        if (!split.ok) {
            return { kind: "invalid", reason: split.reason, command: name };
        }
        return this.accept(spec.name, split.words.slice(1), body, thought);
    }

    private parseWithBody(spec: ToolSpec, lines: string[], body: string, thought: string): ParseOutcome {
        const marker = spec.endMarker ?? "";
        const end = lines.findIndex((line, index) => index > 0 && line.trim() === marker);
        if (end < 0) {
            return { kind: "invalid", reason: `${spec.name} body is not terminated by ${marker}`, command: spec.name };
        }
        const trailing = lines.slice(end + 1).filter((line) => line.trim() !== "");
        if (trailing.length > 0) {
            const count = 1 + trailing.length;
            return { kind: "multiple", count, reason: `found ${count} commands in one block` };
        }
        const split = splitShellWords(lines[0].trim());
        if (!split.ok) {
            return { kind: "invalid", reason: split.reason, command: spec.name };
        }
        const content = lines.slice(1, end).join("\n");
        return this.accept(spec.name, [...split.words.slice(1), content], body, thought);
    }

    private parseJson(text: string): ParseOutcome {
        const blocks = [...text.matchAll(FENCE)];
        if (blocks.length > 1) {
            return { kind: "multiple", count: blocks.length, reason: `found ${blocks.length} code blocks` };
        }
        const source = blocks.length === 1 ? blocks[0][1].trim() : text.trim();
        const thought =
            blocks.length === 1
                ? (text.slice(0, blocks[0].index) + text.slice((blocks[0].index ?? 0) + blocks[0][0].length)).trim()
                : "";

        let parsed: unknown;
        try {
            parsed = JSON.parse(source);
        } catch (error) {
            if (blocks.length === 0) {
                return { kind: "none", reason: "no JSON tool call found" };
            }
            const detail = error instanceof Error ? error.message : String(error);
            return { kind: "invalid", reason: `tool call is not valid JSON: ${detail}` };
        }

        if (Array.isArray(parsed)) {
            if (parsed.length === 0) return { kind: "none", reason: "empty tool call list" };
            if (parsed.length > 1) {
                return { kind: "multiple", count: parsed.length, reason: `found ${parsed.length} tool calls` };
            }
            parsed = parsed[0];
        }

        const call = toRecord(parsed);
        const name = call?.name;
        if (!call || typeof name !== "string") {
            return { kind: "invalid", reason: 'a tool call needs a string "name"' };
        }
        const spec = this.schema.get(name);
        if (!spec) {
            return { kind: "invalid", reason: `unknown command "${name}"`, command: name };
        }
        const callThought = typeof call.thought === "string" ? call.thought : thought;
        const mapped = this.mapJsonArguments(spec, call.arguments);
        if (typeof mapped === "string") {
            return { kind: "invalid", reason: mapped, command: name };
        }
        return this.accept(spec.name, mapped, source, callThought);
    }

    private mapJsonArguments(spec: ToolSpec, raw: unknown): string[] | string {
        if (raw === undefined || raw === null) return [];
        if (typeof raw === "string") {
            const trimmed = raw.trim();
            if (trimmed === "") return [];
            try {
                return this.mapJsonArguments(spec, JSON.parse(trimmed));
            } catch {
                return spec.arguments.length === 1 ? [raw] : `arguments for ${spec.name} must be an object`;
            }
        }
        if (Array.isArray(raw)) {
            return raw.map(toArgString);
        }
        const record = toRecord(raw);
        if (!record) {
            return `arguments for ${spec.name} must be an object`;
        }
        const known = new Set(spec.arguments.map((arg) => arg.name));
        const unknown = Object.keys(record).filter((key) => !known.has(key));
        if (unknown.length > 0) {
            return `${spec.name} does not take argument(s): ${unknown.join(", ")}`;
        }
        const args: string[] = [];
        for (const arg of spec.arguments) {
            const value = record[arg.name];
            if (value === undefined) {
                if (arg.required) return `${spec.name} is missing required argument(s): ${arg.name}`;
                break;
            }
            if (arg.variadic && Array.isArray(value)) {
                args.push(...value.map(toArgString));
            } else {
                args.push(toArgString(value));
            }
        }
        return args;
    }

    private accept(command: string, args: string[], raw: string, thought: string): ParseOutcome {
        const problem = this.schema.validate(command, args);
        if (problem) {
            return { kind: "invalid", reason: problem, command };
        }
        return { kind: "action", action: { command, args, raw, thought } };
    }
}
