import type { ProcessRunner } from "../process";

import {
  BaseCliAdapter,
  modelArgs,
  type AgentAdapterOptions,
  type NonInteractiveConfig,
} from "./types";

const CLAUDE_PRINT_FLAG = "--print";
const CLAUDE_SKIP_PERMISSIONS_FLAG = "--dangerously-skip-permissions";

// `--print` puts claude into batch mode; there is no flag that explicitly
// requests interactive mode, so only the required side is enforced.
const CLAUDE_NON_INTERACTIVE_CONFIG: NonInteractiveConfig = {
  requiredArgs: [CLAUDE_PRINT_FLAG],
  forbiddenArgs: [],
};

export class ClaudeAdapter extends BaseCliAdapter {
  constructor(runner: ProcessRunner, options: AgentAdapterOptions = {}) {
    super({
      id: "CLAUDE_CLI",
      command: options.command ?? "claude",
      baseArgs: [
        CLAUDE_PRINT_FLAG,
        ...(options.skipPermissions === false ? [] : [CLAUDE_SKIP_PERMISSIONS_FLAG]),
        ...modelArgs("--model", options.model),
        ...(options.extraArgs ?? []),
      ],
      nonInteractiveConfig: CLAUDE_NON_INTERACTIVE_CONFIG,
      runner,
    });
  }
}
