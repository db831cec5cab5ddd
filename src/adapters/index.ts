export { ClaudeAdapter } from "./claude-adapter";
export { CodexAdapter } from "./codex-adapter";
export { createAdapter, createAdapterFromSettings } from "./factory";
export {
  AGENT_FAILURE_KINDS,
  classifyAgentFailure,
  isRetryableFailure,
  type AgentFailureKind,
} from "./failure-taxonomy";
export { GeminiAdapter } from "./gemini-adapter";
export { MockCLIAdapter } from "./mock-adapter";
export {
  assertNonInteractive,
  BaseCliAdapter,
  InteractiveModeError,
  type AdapterRunInput,
  type AgentAdapter,
  type AgentAdapterOptions,
  type AgentInvocation,
  type NonInteractiveConfig,
} from "./types";
