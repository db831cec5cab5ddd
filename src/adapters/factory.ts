import type { ProcessRunner } from "../process";
import type { AgentAdapterId, AgentSettings } from "../types";

import { ClaudeAdapter } from "./claude-adapter";
import { CodexAdapter } from "./codex-adapter";
import { GeminiAdapter } from "./gemini-adapter";
import { MockCLIAdapter } from "./mock-adapter";
import type { AgentAdapter, AgentAdapterOptions } from "./types";

export function createAdapter(
  adapterId: AgentAdapterId,
  runner: ProcessRunner,
  options: AgentAdapterOptions = {},
): AgentAdapter {
  switch (adapterId) {
    case "MOCK_CLI":
      return new MockCLIAdapter(runner, options);
    case "CLAUDE_CLI":
      return new ClaudeAdapter(runner, options);
    case "GEMINI_CLI":
      return new GeminiAdapter(runner, options);
    case "CODEX_CLI":
      return new CodexAdapter(runner, options);
    default: {
      const unreachable: never = adapterId;
      throw new Error(`Unsupported adapter: ${String(unreachable)}`);
    }
  }
}

export function createAdapterFromSettings(
  settings: AgentSettings,
  runner: ProcessRunner,
): AgentAdapter {
  return createAdapter(settings.adapter, runner, {
    command: settings.command,
    model: settings.model,
    extraArgs: settings.extraArgs,
    skipPermissions: settings.skipPermissions,
  });
}
