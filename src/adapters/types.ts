import type {
  OutputStream,
  ProcessRunResult,
  ProcessRunner,
} from "../process";
import {
  AgentContractSchema,
  type AgentAdapterId,
  type AgentContract,
} from "../types";

export type AdapterRunInput = {
  prompt: string;
  cwd: string;
  env?: NodeJS.ProcessEnv;
  idleTimeoutMs?: number;
  idleCheckIntervalMs?: number;
  killGraceMs?: number;
  signal?: AbortSignal;
  onOutput?: (chunk: string, stream: OutputStream) => void;
};

export type AgentInvocation = {
  command: string;
  args: string[];
};

export interface AgentAdapter {
  readonly id: AgentAdapterId;
  readonly contract: AgentContract;
  buildInvocation(prompt: string): AgentInvocation;
  run(input: AdapterRunInput): Promise<ProcessRunResult>;
}

/**
 * Declares which args must be present (non-interactive enforcement) and which
 * must be absent (interactive-mode detection) for a given adapter.
 */
export type NonInteractiveConfig = {
  /** Args that MUST appear in baseArgs; absence means the adapter would run interactively. */
  requiredArgs: readonly string[];
  /** Args that MUST NOT appear in baseArgs; their presence explicitly requests interactive mode. */
  forbiddenArgs: readonly string[];
};

/**
 * An agent waiting for keyboard input would sit idle until the idle timeout
 * fires, so every adapter must run in batch/print mode.
 */
export class InteractiveModeError extends Error {
  constructor(adapterId: string, reason: string) {
    super(`[${adapterId}] Interactive mode rejected: ${reason}`);
    this.name = "InteractiveModeError";
  }
}

export function assertNonInteractive(
  adapterId: string,
  args: readonly string[],
  config: NonInteractiveConfig,
): void {
  for (const required of config.requiredArgs) {
    if (!args.includes(required)) {
      throw new InteractiveModeError(
        adapterId,
        `required non-interactive flag "${required}" is missing from args`,
      );
    }
  }
  for (const forbidden of config.forbiddenArgs) {
    if (args.includes(forbidden)) {
      throw new InteractiveModeError(
        adapterId,
        `interactive flag "${forbidden}" is not permitted; only non-interactive (batch) execution is allowed`,
      );
    }
  }
}

/** Options every adapter accepts; mapped from the `agent` settings block. */
export type AgentAdapterOptions = {
  command?: string;
  model?: string;
  extraArgs?: string[];
  skipPermissions?: boolean;
};

type BaseAdapterInit = {
  id: AgentAdapterId;
  command: string;
  baseArgs: string[];
  runner: ProcessRunner;
  nonInteractiveConfig?: NonInteractiveConfig;
};

export abstract class BaseCliAdapter implements AgentAdapter {
  readonly id: AgentAdapterId;
  readonly contract: AgentContract;

  protected readonly command: string;
  protected readonly baseArgs: string[];
  protected readonly runner: ProcessRunner;
  protected readonly nonInteractiveConfig: NonInteractiveConfig | undefined;

  constructor(init: BaseAdapterInit) {
    this.id = init.id;
    this.command = init.command.trim();
    this.baseArgs = [...init.baseArgs];
    this.runner = init.runner;
    this.nonInteractiveConfig = init.nonInteractiveConfig;

    if (this.nonInteractiveConfig) {
      assertNonInteractive(this.id, this.baseArgs, this.nonInteractiveConfig);
    }

    this.contract = AgentContractSchema.parse({
      id: this.id,
      command: this.command,
      baseArgs: this.baseArgs,
    });
  }

  /** How the prompt is appended to the base args; a bare trailing arg by default. */
  protected promptArgs(prompt: string): string[] {
    return [prompt];
  }

  buildInvocation(prompt: string): AgentInvocation {
    return {
      command: this.command,
      args: [...this.baseArgs, ...this.promptArgs(prompt)],
    };
  }

  async run(input: AdapterRunInput): Promise<ProcessRunResult> {
    if (!input.prompt.trim()) {
      throw new Error("prompt must not be empty.");
    }
    if (!input.cwd.trim()) {
      throw new Error("cwd must not be empty.");
    }

    if (this.nonInteractiveConfig) {
      assertNonInteractive(this.id, this.baseArgs, this.nonInteractiveConfig);
    }

    const invocation = this.buildInvocation(input.prompt);
    return this.runner.run({
      command: invocation.command,
      args: invocation.args,
      cwd: input.cwd,
      env: input.env,
      idleTimeoutMs: input.idleTimeoutMs,
      idleCheckIntervalMs: input.idleCheckIntervalMs,
      killGraceMs: input.killGraceMs,
      signal: input.signal,
      onOutput: input.onOutput,
    });
  }
}

export function modelArgs(flag: string, model: string | undefined): string[] {
  const trimmed = model?.trim();
  return trimmed ? [flag, trimmed] : [];
}
