export type TaskloopErrorCode =
  | "INPUT_INVALID"
  | "CORRUPT_STATE"
  | "LOCK_HELD"
  | "STORE_WRITE_FAILED"
  | "AGENT_TIMEOUT"
  | "AGENT_FAILED"
  | "CONFIGURATION";

export abstract class TaskloopError extends Error {
  abstract readonly code: TaskloopErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export type GraphIssue = {
  kind:
    | "EMPTY_PROJECT"
    | "DUPLICATE_PHASE_ID"
    | "DUPLICATE_TASK_ID"
    | "SELF_DEPENDENCY"
    | "PHASE_MISMATCH";
  message: string;
  taskId?: string;
  phaseId?: string;
};

/**
 * The task graph handed in by an input source cannot be executed.  Raised
 * before any iteration starts; nothing has been persisted when it surfaces.
 */
export class InputInvalidError extends TaskloopError {
  readonly code = "INPUT_INVALID";
  readonly issues: GraphIssue[];

  constructor(issues: GraphIssue[], message?: string) {
    super(
      message ??
        `Task graph is invalid (${issues.length} issue${issues.length === 1 ? "" : "s"}): ${issues
          .map((issue) => issue.message)
          .join("; ")}`,
    );
    this.issues = issues;
  }
}

/**
 * Persisted state exists but cannot be trusted.  Never deleted automatically;
 * `taskloop reset` is the only way out.
 */
export class CorruptStateError extends TaskloopError {
  readonly code = "CORRUPT_STATE";
  readonly identity: string;
  readonly path: string;

  constructor(input: {
    identity: string;
    path: string;
    reason: string;
    cause?: unknown;
  }) {
    super(
      `State for project ${input.identity} is corrupt (${input.path}): ${input.reason}. ` +
        "Inspect the file or run 'taskloop reset' to discard it.",
      { cause: input.cause },
    );
    this.identity = input.identity;
    this.path = input.path;
  }
}

export type LockHolder = {
  pid: number;
  owner: string;
  acquiredAt: string;
};

export class LockHeldError extends TaskloopError {
  readonly code = "LOCK_HELD";
  readonly identity: string;
  readonly holder: LockHolder | undefined;

  constructor(identity: string, holder?: LockHolder, detail?: string) {
    super(
      detail ??
        (holder
          ? `Project ${identity} is already being run (owner: ${holder.owner}, pid: ${holder.pid}, acquiredAt: ${holder.acquiredAt}). Try again once it finishes.`
          : `Project ${identity} is locked by another process.`),
    );
    this.identity = identity;
    this.holder = holder;
  }
}

export class StoreWriteError extends TaskloopError {
  readonly code = "STORE_WRITE_FAILED";
  readonly identity: string;

  constructor(identity: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to persist state for project ${identity} at ${path}: ${reason}`, {
      cause,
    });
    this.identity = identity;
  }
}

export class AgentTimeoutError extends TaskloopError {
  readonly code = "AGENT_TIMEOUT";
  readonly idleTimeoutMs: number;

  constructor(idleTimeoutMs: number, command: string) {
    super(`Agent produced no output for ${idleTimeoutMs}ms: ${command}`);
    this.idleTimeoutMs = idleTimeoutMs;
  }
}

export class AgentFailedError extends TaskloopError {
  readonly code = "AGENT_FAILED";
  readonly exitCode: number;

  constructor(exitCode: number, detail: string) {
    super(`Agent exited with code ${exitCode}: ${detail}`);
    this.exitCode = exitCode;
  }
}

export class ConfigurationError extends TaskloopError {
  readonly code = "CONFIGURATION";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
