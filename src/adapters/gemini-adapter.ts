import type { ProcessRunner } from "../process";

import {
  BaseCliAdapter,
  modelArgs,
  type AgentAdapterOptions,
  type NonInteractiveConfig,
} from "./types";

const GEMINI_YOLO_FLAG = "--yolo";
const GEMINI_PROMPT_FLAG = "--prompt";

// The prompt is passed through `--prompt`, which is what keeps gemini out of
// its interactive shell; `--prompt-interactive` would reopen it.
const GEMINI_NON_INTERACTIVE_CONFIG: NonInteractiveConfig = {
  requiredArgs: [],
  forbiddenArgs: ["--prompt-interactive", "-i"],
};

export class GeminiAdapter extends BaseCliAdapter {
  constructor(runner: ProcessRunner, options: AgentAdapterOptions = {}) {
    super({
      id: "GEMINI_CLI",
      command: options.command ?? "gemini",
      baseArgs: [
        ...(options.skipPermissions === false ? [] : [GEMINI_YOLO_FLAG]),
        ...modelArgs("--model", options.model),
        ...(options.extraArgs ?? []),
      ],
      nonInteractiveConfig: GEMINI_NON_INTERACTIVE_CONFIG,
      runner,
    });
  }

  protected override promptArgs(prompt: string): string[] {
    return [GEMINI_PROMPT_FLAG, prompt];
  }
}
