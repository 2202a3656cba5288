import { OpenAI } from "openai";
import type { ModelClient, ModelRequest, ModelResponse, MessagePart } from "@patchloop/core";
import { toChatTranscript, turnText } from "./utils/message-transformer.js";

export interface OpenAIModelClientOptions {
    apiKey?: string;
    model?: string;
    baseURL?: string;
    defaultHeaders?: Record<string, string>;
    temperature?: number;
    maxOutputTokens?: number;
    /** Injected in tests */
    client?: OpenAI;
}

type UserContent = OpenAI.Chat.ChatCompletionUserMessageParam["content"];

function userContent(parts: MessagePart[]): UserContent {
    if (parts.every((part) => part.type === "text")) {
        return parts.map((part) => (part.type === "text" ? part.text : "")).join("");
    }
    return parts.map((part): OpenAI.Chat.ChatCompletionContentPart =>
        part.type === "text"
            ? { type: "text", text: part.text }
            : { type: "image_url", image_url: { url: `data:${part.mediaType};base64,${part.data}` } }
    );
}

export function toOpenAIMessages(request: Pick<ModelRequest, "entries">): OpenAI.Chat.ChatCompletionMessageParam[] {
    const transcript = toChatTranscript(request.entries);
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (transcript.system) {
        messages.push({ role: "system", content: transcript.system });
    }
    for (const turn of transcript.turns) {
        if (turn.role === "assistant") {
            messages.push({ role: "assistant", content: turnText(turn) });
        } else {
            messages.push({ role: "user", content: userContent(turn.parts) });
        }
    }
    return messages;
}

/**
 * Chat Completions client. Also serves OpenAI-compatible endpoints through
 * `baseURL`. Retries are left to the caller's retry policy.
 */
export class OpenAIModelClient implements ModelClient {
    public readonly name = "openai";
    public readonly model: string;
    protected client: OpenAI;
    protected options: OpenAIModelClientOptions;

    constructor(options: OpenAIModelClientOptions = {}) {
        this.options = { model: "gpt-4o", ...options };
        this.model = this.options.model ?? "gpt-4o";
        const apiKey = this.options.apiKey || process.env.OPENAI_API_KEY || "";

        this.client =
            options.client ??
            new OpenAI({
                apiKey,
                baseURL: this.options.baseURL,
                defaultHeaders: this.options.defaultHeaders,
                maxRetries: 0,
            });
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const response = await this.client.chat.completions.create(
            {
                model: this.model,
                messages: toOpenAIMessages(request),
                temperature: this.options.temperature,
                max_tokens: this.options.maxOutputTokens,
            },
            { signal: request.signal }
        );

        const choice = response.choices[0];
        return {
            text: choice?.message.content ?? "",
            model: response.model,
            usage: response.usage
                ? { promptTokens: response.usage.prompt_tokens, completionTokens: response.usage.completion_tokens }
                : undefined,
        };
    }
}
