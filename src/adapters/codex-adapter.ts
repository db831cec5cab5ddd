import type { ProcessRunner } from "../process";

import {
  BaseCliAdapter,
  modelArgs,
  type AgentAdapterOptions,
  type NonInteractiveConfig,
} from "./types";

const CODEX_EXEC_SUBCOMMAND = "exec";
const CODEX_BYPASS_FLAG = "--dangerously-bypass-approvals-and-sandbox";

// `exec` is the batch subcommand; `chat` and `interactive` open a session
// that waits for keyboard input.
const CODEX_NON_INTERACTIVE_CONFIG: NonInteractiveConfig = {
  requiredArgs: [CODEX_EXEC_SUBCOMMAND],
  forbiddenArgs: ["chat", "interactive"],
};

export class CodexAdapter extends BaseCliAdapter {
  constructor(runner: ProcessRunner, options: AgentAdapterOptions = {}) {
    super({
      id: "CODEX_CLI",
      command: options.command ?? "codex",
      baseArgs: [
        CODEX_EXEC_SUBCOMMAND,
        ...(options.skipPermissions === false ? [] : [CODEX_BYPASS_FLAG]),
        ...modelArgs("--model", options.model),
        ...(options.extraArgs ?? []),
      ],
      nonInteractiveConfig: CODEX_NON_INTERACTIVE_CONFIG,
      runner,
    });
  }
}
