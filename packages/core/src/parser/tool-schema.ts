import { z } from "zod";
import type { Action } from "../types/messages.js";
import { quoteShellWord } from "./shell-words.js";

export const ToolArgumentSchema = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    required: z.boolean().default(true),
    variadic: z.boolean().optional(),
});

export const ToolSpecSchema = z
    .object({
        name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, "tool names are single words"),
        description: z.string(),
        signature: z.string().optional(),
        arguments: z.array(ToolArgumentSchema).default([]),
        terminal: z.boolean().optional(),
        rawInput: z.boolean().optional(),
        fallback: z.boolean().optional(),
        endMarker: z.string().min(1).optional(),
    })
    .superRefine((spec, ctx) => {
        spec.arguments.forEach((arg, index) => {
            if (arg.variadic && index !== spec.arguments.length - 1) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${spec.name}: only the last argument may be variadic` });
            }
        });
        if (spec.fallback && !spec.rawInput) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${spec.name}: a fallback tool must take raw input` });
        }
        if (spec.endMarker && spec.arguments.length === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${spec.name}: an end marker needs a body argument` });
        }
    });

export type ToolArgument = z.infer<typeof ToolArgumentSchema>;
export type ToolSpec = z.infer<typeof ToolSpecSchema>;
export type ToolSpecInput = z.input<typeof ToolSpecSchema>;

/**
 * The set of commands the model may issue, with the arity rules the parser
 * enforces and the documentation shown in the system prompt.
 */
export class ToolSchema {
    private readonly tools = new Map<string, ToolSpec>();

    constructor(specs: ToolSpecInput[]) {
        const parsed = z.array(ToolSpecSchema).parse(specs);
        let fallbacks = 0;
        for (const spec of parsed) {
            if (this.tools.has(spec.name)) {
                throw new Error(`Duplicate tool "${spec.name}" in tool schema`);
            }
            if (spec.fallback) fallbacks++;
            this.tools.set(spec.name, spec);
        }
        if (fallbacks > 1) {
            throw new Error("At most one tool may be the fallback");
        }
    }

    list(): ToolSpec[] {
        return [...this.tools.values()];
    }

    get(name: string): ToolSpec | undefined {
        return this.tools.get(name);
    }

    fallback(): ToolSpec | undefined {
        return this.list().find((spec) => spec.fallback);
    }

    isTerminal(command: string): boolean {
        return this.tools.get(command)?.terminal === true;
    }

    /**
     * Returns why `args` do not fit `command`, or null when they do.
     */
    validate(command: string, args: string[]): string | null {
        const spec = this.tools.get(command);
        if (!spec) {
            return `unknown command "${command}"`;
        }
        const required = spec.arguments.filter((arg) => arg.required).length;
        const variadic = spec.arguments.some((arg) => arg.variadic);
        if (args.length < required) {
            const missing = spec.arguments.slice(args.length).filter((arg) => arg.required).map((arg) => arg.name);
            return `${command} is missing required argument(s): ${missing.join(", ")}`;
        }
        if (!variadic && args.length > spec.arguments.length) {
            return `${command} takes at most ${spec.arguments.length} argument(s), got ${args.length}`;
        }
        return null;
    }

    /**
     * Turns an action back into the shell text that runs it in the sandbox.
     * Bodies of end-marker tools are fed on stdin through a quoted heredoc.
     */
    renderCommand(action: Action): string {
        const spec = this.tools.get(action.command);
        if (spec?.rawInput) {
            return spec.fallback ? action.args.join(" ") : `${action.command} ${action.args.join(" ")}`;
        }
        if (spec?.endMarker && action.args.length > 0) {
            const head = action.args.slice(0, -1).map(quoteShellWord);
            const body = action.args[action.args.length - 1];
            const marker = spec.endMarker;
            return `${[action.command, ...head].join(" ")} <<'${marker}'\n${body}\n${marker}`;
        }
        return [action.command, ...action.args.map(quoteShellWord)].join(" ");
    }

    renderDocs(): string {
        return this.list()
            .map((spec) => {
                const signature =
                    spec.signature ??
                    [
                        spec.name,
                        ...spec.arguments.map((arg) => {
                            const label = arg.variadic ? `${arg.name}...` : arg.name;
                            return arg.required ? `<${label}>` : `[<${label}>]`;
                        }),
                    ].join(" ");
                const lines = [`${signature}`, `  ${spec.description.trim()}`];
                if (spec.endMarker) {
                    lines.push(`  The body follows on the next lines and ends with a line containing only ${spec.endMarker}.`);
                }
                return lines.join("\n");
            })
            .join("\n\n");
    }
}
