// Core Types
export * from "./types/messages.js";
export * from "./types/task.js";

// Core Loops
export * from "./loops/agent-loop.js";
export * from "./loops/batch-runner.js";
export * from "./loops/prompts.js";

// Core Parser
export * from "./parser/tool-schema.js";
export * from "./parser/action-parser.js";
export * from "./parser/shell-words.js";

// Core State
export * from "./state/compaction.js";
export * from "./state/history-manager.js";
export * from "./state/budget-tracker.js";
export * from "./state/hook-manager.js";
export * from "./state/event-log-store.js";
export * from "./state/activity-hook.js";
export * from "./state/logging-hook.js";
export * from "./state/usage-ledger.js";

// Faults
export * from "./faults/fault-error.js";
export * from "./faults/classifier.js";
export * from "./faults/retry-policy.js";
export * from "./faults/timeout.js";

// Sandboxes
export * from "./security/sandbox.js";
export * from "./security/process-runner.js";
export * from "./security/local-provider.js";
export * from "./security/docker-provider.js";
export * from "./security/execution-session.js";

// Core Events
export * from "./events/trajectory-schema.js";
export * from "./events/trajectory-recorder.js";
export * from "./events/trajectory-reader.js";
export * from "./events/default-rate-card.js";
export * from "./events/cost-analytics.js";
export * from "./events/session-transcript.js";

// Model clients
export * from "./providers/model-client.js";
export * from "./providers/registry.js";

// Config & utils
export * from "./config/run-config.js";
export * from "./utils/logger.js";
export * from "./utils/truncate.js";
export * from "./utils/template.js";

// Testing
export * from "./testing/fakes.js";
