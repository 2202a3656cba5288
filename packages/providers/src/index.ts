export * from "./openai.js";
export * from "./anthropic.js";
export * from "./registry.js";
export * from "./response-cache.js";
export * from "./replay.js";
export * from "./utils/message-transformer.js";
