import { Anthropic } from "@anthropic-ai/sdk";
import type { ModelClient, ModelRequest, ModelResponse, MessagePart } from "@patchloop/core";
import { toChatTranscript } from "./utils/message-transformer.js";

type MessageParam = Anthropic.MessageParam;
type ContentBlock = Anthropic.TextBlockParam | Anthropic.ImageBlockParam;
type ImageMediaType = Anthropic.ImageBlockParam["source"]["media_type"];

export interface AnthropicModelClientOptions {
    apiKey?: string;
    model?: string;
    baseURL?: string;
    maxTokens?: number;
    temperature?: number;
    client?: Anthropic;
}

const IMAGE_MEDIA_TYPES: readonly ImageMediaType[] = ["image/jpeg", "image/png", "image/gif", "image/webp"];

function imageMediaType(mediaType: string): ImageMediaType | undefined {
    return IMAGE_MEDIA_TYPES.find((candidate) => candidate === mediaType);
}

function toBlocks(parts: MessagePart[]): ContentBlock[] {
    const blocks: ContentBlock[] = [];
    for (const part of parts) {
        if (part.type === "text") {
            if (part.text) blocks.push({ type: "text", text: part.text });
            continue;
        }
        const mediaType = imageMediaType(part.mediaType);
        if (mediaType) {
            blocks.push({ type: "image", source: { type: "base64", media_type: mediaType, data: part.data } });
        } else {
            blocks.push({ type: "text", text: `[unsupported image type ${part.mediaType}]` });
        }
    }
    return blocks.length > 0 ? blocks : [{ type: "text", text: "(empty)" }];
}

export function toAnthropicRequest(request: Pick<ModelRequest, "entries">): { system?: string; messages: MessageParam[] } {
    const transcript = toChatTranscript(request.entries);
    return {
        system: transcript.system.trim() ? transcript.system.trim() : undefined,
        messages: transcript.turns.map((turn) => ({ role: turn.role, content: toBlocks(turn.parts) })),
    };
}

export class AnthropicModelClient implements ModelClient {
    public readonly name = "anthropic";
    public readonly model: string;
    private client: Anthropic;
    private options: AnthropicModelClientOptions;

    constructor(options: AnthropicModelClientOptions = {}) {
        this.options = {
            model: "claude-3-5-sonnet-latest",
            maxTokens: 4096,
            temperature: 0,
            ...options,
        };
        this.model = this.options.model ?? "claude-3-5-sonnet-latest";
        if (options.client) {
            this.client = options.client;
            return;
        }
        const apiKey = this.options.apiKey || process.env.ANTHROPIC_API_KEY;
        if (!apiKey) {
            throw new Error("Anthropic API key is required. Set ANTHROPIC_API_KEY env var or pass in options.");
        }
        this.client = new Anthropic({ apiKey, baseURL: this.options.baseURL, maxRetries: 0 });
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const { system, messages } = toAnthropicRequest(request);
        const response = await this.client.messages.create(
            {
                model: this.model,
                max_tokens: this.options.maxTokens ?? 4096,
                temperature: this.options.temperature,
                system,
                messages,
            },
            { signal: request.signal }
        );

        let text = "";
        for (const block of response.content) {
            if (block.type === "text") {
                text += block.text;
            }
        }

        return {
            text,
            model: response.model,
            usage: { promptTokens: response.usage.input_tokens, completionTokens: response.usage.output_tokens },
        };
    }
}
