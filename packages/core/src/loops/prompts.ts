import type { ActionFormat } from "../parser/action-parser.js";

export interface PromptTemplates {
    system: string;
    instance: string;
    observation: string;
    emptyOutput: string;
    fault: string;
    formatError: string;
    submitted: string;
    sessionReset: string;
}

export const FORMAT_INSTRUCTIONS: Record<ActionFormat, string> = {
    fenced: [
        "Every response must contain a short explanation of your reasoning followed by exactly one command",
        "in a single fenced code block, for example:",
        "",
        "```",
        "find_file setup.py",
        "```",
        "",
        "You will see the output of the command before you issue the next one.",
    ].join("\n"),
    json: [
        "Every response must be exactly one JSON tool call and nothing else, for example:",
        "",
        '{"name": "find_file", "arguments": {"file_name": "setup.py"}}',
        "",
        "You will see the output of the call before you issue the next one.",
    ].join("\n"),
};

export const DEFAULT_TEMPLATES: PromptTemplates = {
    system: [
        "You are an autonomous software engineer working inside a sandboxed checkout of a repository.",
        "You solve the task by issuing one command at a time and reading its output.",
        "Interactive programs (editors, pagers, prompts) are not available.",
        "",
        "COMMANDS:",
        "{{tool_docs}}",
        "",
        "RESPONSE FORMAT:",
        "{{format_instructions}}",
    ].join("\n"),
    instance: [
        "Solve the following issue in the repository.",
        "",
        "ISSUE:",
        "{{problem_statement}}",
        "",
        "Reproduce the problem first, then edit the source to fix it and confirm the fix.",
        "When you are done, use the submit command.",
    ].join("\n"),
    observation: "OBSERVATION (exit status {{exit_status}}):\n{{output}}",
    emptyOutput: "Your command ran successfully and did not produce any output.",
    fault: "The command could not be executed ({{kind}}): {{message}}\nThe environment is still available; retry or try a different command.",
    formatError: "Your response was not accepted: {{reason}}.\n\n{{format_instructions}}",
    submitted: "Submission received.",
    sessionReset:
        "NOTE: the environment was lost and has been recreated from a fresh checkout. Changes made by earlier commands are gone; the last command was run again in the new environment.",
};
