import { ModelClientRegistry } from "@patchloop/core";
import { AnthropicModelClient } from "./anthropic.js";
import { OpenAIModelClient } from "./openai.js";

export function createDefaultModelClientRegistry(): ModelClientRegistry {
    const registry = new ModelClientRegistry();

    registry.register({
        name: "anthropic",
        create: (options) =>
            new AnthropicModelClient({
                model: options.model,
                apiKey: options.apiKey,
                baseURL: options.baseURL,
                temperature: options.temperature,
                maxTokens: options.maxOutputTokens,
            }),
        modelPatterns: [/^claude-/i],
    });

    registry.register({
        name: "openai",
        create: (options) =>
            new OpenAIModelClient({
                model: options.model,
                apiKey: options.apiKey,
                baseURL: options.baseURL,
                temperature: options.temperature,
                maxOutputTokens: options.maxOutputTokens,
            }),
        modelPatterns: [/^gpt-/i, /^o[1-9]/i],
    });

    return registry;
}
