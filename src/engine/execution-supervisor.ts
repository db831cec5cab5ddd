import { readFile, rm } from "node:fs/promises";

import {
  classifyAgentFailure,
  isRetryableFailure,
  type AgentAdapter,
} from "../adapters";
import {
  AgentFailedError,
  AgentTimeoutError,
  ConfigurationError,
  toErrorMessage,
} from "../errors";
import {
  ProcessCancelledError,
  ProcessExecutionError,
  ProcessIdleTimeoutError,
  type OutputStream,
  type ProcessRunResult,
} from "../process";
import type { ArtifactWriter } from "../state/artifacts";
import {
  AgentStatusFileSchema,
  type AgentStatusFile,
  type ExecutionSettings,
  type IterationOutcome,
  type Project,
  type Task,
} from "../types";
import type { SupervisorState } from "../types/runtime-events";
import {
  classifyTranscript,
  collectPromptLines,
  isCompletionStatus,
  isTerminalMarker,
  parseMarkerLine,
  tailOf,
  type Classification,
} from "./output-classifier";
import { buildIterationPrompt } from "./prompt-builder";
import { sleepWithSignal, type RetryPolicy } from "./retry";

export type SupervisorResultKind =
  | "completed"
  | "all-complete"
  | "failed"
  | "blocked"
  | "inconclusive"
  | "cancelled";

export type AttemptSummary = {
  attempt: number;
  outcome: IterationOutcome;
  exitCode: number | null;
  durationMs: number;
  error?: string;
  promptPath?: string;
  transcriptPath?: string;
  transcriptTail: string;
};

export type SupervisorResult = {
  kind: SupervisorResultKind;
  /** The dispatched task with attempt bookkeeping applied; never marked completed here. */
  task: Task;
  attempts: AttemptSummary[];
  transcriptTail: string;
  lastOutcome: IterationOutcome;
  reason?: string;
};

export type TransitionListener = (
  from: SupervisorState | undefined,
  to: SupervisorState,
  attempt: number,
) => void;

export type RunTaskInput = {
  project: Project;
  task: Task;
  iteration: number;
  signal?: AbortSignal;
  onTransition?: TransitionListener;
  onOutput?: (chunk: string, stream: OutputStream) => void;
  /** Called after every finished attempt so the caller can persist counters. */
  onAttemptFinished?: (summary: AttemptSummary, task: Task) => Promise<void> | void;
};

export type ExecutionSupervisorOptions = {
  adapter: AgentAdapter;
  cwd: string;
  execution: ExecutionSettings;
  retry: RetryPolicy;
  artifacts?: ArtifactWriter;
  /** File the agent may write instead of printing markers; cleared before each attempt. */
  statusFilePath?: string;
  env?: NodeJS.ProcessEnv;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

type AgentRunEnding = "exited" | "stopped-after-marker" | "timed-out" | "failed" | "cancelled";

type AgentRun = {
  ending: AgentRunEnding;
  result?: ProcessRunResult;
  error?: unknown;
};

type AttemptVerdict = {
  outcome: IterationOutcome;
  kind: SupervisorResultKind;
  retryable: boolean;
  error?: string;
};

const ENDING_STATE: Record<Exclude<AgentRunEnding, "cancelled">, SupervisorState> = {
  exited: "COMPLETED",
  "stopped-after-marker": "COMPLETED",
  "timed-out": "TIMED_OUT",
  failed: "FAILED",
};

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1]?.trim() ?? "";
}

/**
 * Runs one dispatched task: builds the prompt, drives the agent, classifies
 * the transcript and retries with backoff.  Never persists; every finished
 * attempt is reported through `onAttemptFinished`.
 */
export class ExecutionSupervisor {
  private readonly options: ExecutionSupervisorOptions;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: ExecutionSupervisorOptions) {
    if (!options.cwd.trim()) {
      throw new Error("cwd must not be empty.");
    }

    this.options = options;
    this.sleep = options.sleep ?? sleepWithSignal;
  }

  async runTask(input: RunTaskInput): Promise<SupervisorResult> {
    const { execution, retry } = this.options;
    const attempts: AttemptSummary[] = [];
    let task = input.task;
    let state: SupervisorState | undefined;

    const transition = (to: SupervisorState, attempt: number): void => {
      const from = state;
      state = to;
      input.onTransition?.(from, to, attempt);
    };

    const cancelled = (attempt: number, transcriptTail: string): SupervisorResult => {
      transition("CANCELLED", attempt);
      return {
        kind: "cancelled",
        task: { ...task, status: "pending" },
        attempts,
        transcriptTail,
        lastOutcome: "cancelled",
      };
    };

    for (;;) {
      const attempt = task.attempts + 1;
      state = undefined;
      transition("BUILDING", attempt);
      const prompt = buildIterationPrompt({
        project: input.project,
        task,
        iteration: input.iteration,
        attempt,
        settings: execution,
        statusFilePath: this.options.statusFilePath,
      });
      await this.clearStatusFile();
      const promptPath = await this.writeArtifact(() =>
        this.options.artifacts?.writePrompt({ iteration: input.iteration, attempt, prompt }),
      );

      if (input.signal?.aborted) {
        return cancelled(attempt, "");
      }

      transition("RUNNING", attempt);
      const run = await this.runAgent({
        prompt,
        taskId: task.id,
        signal: input.signal,
        onOutput: input.onOutput,
      });
      const output = run.result?.output ?? "";
      const transcriptPath = await this.writeArtifact(() =>
        this.options.artifacts?.writeTranscript({
          iteration: input.iteration,
          attempt,
          command: run.result?.command ?? this.options.adapter.contract.command,
          args: run.result?.args ?? [],
          durationMs: run.result?.durationMs,
          exitCode: run.result ? run.result.exitCode : undefined,
          stdout: run.result?.stdout,
          stderr: run.result?.stderr,
          errorMessage: run.error === undefined ? undefined : toErrorMessage(run.error),
        }),
      );

      if (run.ending === "cancelled") {
        return cancelled(attempt, tailOf(output, execution.transcriptTailChars));
      }
      if (run.ending === "failed" && classifyAgentFailure(run.error) === "missing-binary") {
        throw new ConfigurationError(
          `Agent command "${this.options.adapter.contract.command}" could not be started: ${toErrorMessage(run.error)}. ` +
            "Install it or set agent.command in settings.",
          { cause: run.error },
        );
      }

      transition(ENDING_STATE[run.ending], attempt);
      const classification = classifyTranscript(output, {
        expectedTaskId: task.id,
        statusFile: await this.readStatusFile(),
        tailChars: execution.transcriptTailChars,
        prompt,
      });
      transition("CLASSIFIED", attempt);

      const verdict = this.judge(run, classification);
      const transcriptTail =
        classification.kind === "no-marker"
          ? classification.tail
          : tailOf(output, execution.transcriptTailChars);
      task = {
        ...task,
        attempts: attempt,
        notes: classification.status ?? task.notes,
        lastError: verdict.error ?? task.lastError,
      };

      const summary: AttemptSummary = {
        attempt,
        outcome: verdict.outcome,
        exitCode: run.result ? run.result.exitCode : null,
        durationMs: run.result?.durationMs ?? 0,
        error: verdict.error,
        promptPath,
        transcriptPath,
        transcriptTail,
      };
      attempts.push(summary);

      const canRetry = verdict.retryable && retry.shouldRetry(attempt);
      // A silent clean exit is not retried here, but it still uses up an attempt.
      const kind: SupervisorResultKind =
        verdict.kind === "inconclusive" && !retry.shouldRetry(attempt) ? "failed" : verdict.kind;
      const failed = kind === "failed" && !canRetry;
      if (failed) {
        task = { ...task, status: "failed" };
      } else if (verdict.kind === "blocked") {
        task = { ...task, status: "blocked" };
      } else if (verdict.kind === "inconclusive") {
        task = { ...task, status: "pending" };
      }

      await input.onAttemptFinished?.(summary, task);
      transition("APPLIED", attempt);

      if (canRetry) {
        const delayMs = retry.delayFor(attempt);
        console.warn(
          `Execution supervisor: ${task.id} attempt ${attempt}/${retry.maxAttempts} ended with ${verdict.outcome}; retrying in ${delayMs}ms.`,
        );
        await this.sleep(delayMs, input.signal);
        if (input.signal?.aborted) {
          return cancelled(attempt + 1, transcriptTail);
        }
        continue;
      }

      if (failed) {
        console.warn(
          `Execution supervisor: ${task.id} failed after ${attempt} attempt${attempt === 1 ? "" : "s"}: ${task.lastError ?? verdict.outcome}`,
        );
      }

      return {
        kind,
        task,
        attempts,
        transcriptTail,
        lastOutcome: verdict.outcome,
        reason:
          classification.kind === "reported" ? classification.reason : verdict.error,
      };
    }
  }

  private judge(run: AgentRun, classification: Classification): AttemptVerdict {
    switch (classification.kind) {
      case "completed":
        return { outcome: "success", kind: "completed", retryable: false };
      case "all-complete":
        return { outcome: "success", kind: "all-complete", retryable: false };
      case "reported":
        return classification.verdict === "blocked"
          ? {
              outcome: "blocked",
              kind: "blocked",
              retryable: false,
              error: `Agent reported the task blocked: ${classification.reason}`,
            }
          : {
              outcome: "failure",
              kind: "failed",
              retryable: true,
              error: `Agent reported the task failed: ${classification.reason}`,
            };
      case "no-marker":
        break;
    }

    const command = this.options.adapter.contract.command;
    switch (run.ending) {
      case "exited":
      case "stopped-after-marker":
        return {
          outcome: "inconclusive",
          kind: "inconclusive",
          retryable: false,
          error: "Agent exited without reporting a completion marker.",
        };
      case "timed-out":
        return {
          outcome: "timeout",
          kind: "failed",
          retryable: true,
          error: new AgentTimeoutError(this.options.execution.idleTimeoutMs, command).message,
        };
      case "failed":
      case "cancelled": {
        const kind = classifyAgentFailure(run.error);
        const detail = run.result
          ? lastLine(run.result.stderr) || `${kind} failure`
          : toErrorMessage(run.error);
        return {
          outcome: "failure",
          kind: "failed",
          retryable: isRetryableFailure(kind),
          error: new AgentFailedError(run.result?.exitCode ?? -1, detail).message,
        };
      }
    }
  }

  private async runAgent(input: {
    prompt: string;
    taskId: string;
    signal?: AbortSignal;
    onOutput?: (chunk: string, stream: OutputStream) => void;
  }): Promise<AgentRun> {
    const { execution } = this.options;
    const local = new AbortController();
    const onUserAbort = (): void => local.abort();
    if (input.signal?.aborted) {
      local.abort();
    } else {
      input.signal?.addEventListener("abort", onUserAbort, { once: true });
    }

    const pending: Record<OutputStream, string> = { stdout: "", stderr: "" };
    const promptLines = collectPromptLines(input.prompt);
    let completionSeen = false;
    let settled = false;
    let graceHandle: NodeJS.Timeout | undefined;
    let capHandle: NodeJS.Timeout | undefined;
    let pollHandle: NodeJS.Timeout | undefined;
    // Once the agent has reported completion, only a short silence is tolerated.
    const armGrace = (): void => {
      clearTimeout(graceHandle);
      graceHandle = setTimeout(() => local.abort(), execution.postCompletionGraceMs);
    };
    const enterCompletion = (source: string): void => {
      if (completionSeen || settled) {
        return;
      }
      completionSeen = true;
      clearInterval(pollHandle);
      console.info(
        `Execution supervisor: ${input.taskId} reported completion through ${source}; stopping the agent after ${execution.postCompletionGraceMs}ms of silence or ${execution.postCompletionMaxWaitMs}ms in total.`,
      );
      armGrace();
      capHandle = setTimeout(() => local.abort(), execution.postCompletionMaxWaitMs);
    };

    const onOutput = (chunk: string, stream: OutputStream): void => {
      input.onOutput?.(chunk, stream);
      if (completionSeen) {
        armGrace();
      }

      const lines = `${pending[stream]}${chunk}`.split(/\r?\n/);
      pending[stream] = lines.pop() ?? "";
      if (
        !completionSeen &&
        lines.some((line) => isTerminalMarker(parseMarkerLine(line, promptLines), input.taskId))
      ) {
        enterCompletion("its output");
      }
    };

    if (this.options.statusFilePath) {
      let polling = false;
      pollHandle = setInterval(() => {
        if (polling || completionSeen) {
          return;
        }
        polling = true;
        void this.readStatusFile({ quiet: true })
          .then((statusFile) => {
            if (statusFile && isCompletionStatus(statusFile, input.taskId)) {
              enterCompletion("the status file");
            }
          })
          .catch((error: unknown) => {
            console.warn(`Execution supervisor: could not read the status file: ${toErrorMessage(error)}`);
          })
          .finally(() => {
            polling = false;
          });
      }, execution.idleCheckIntervalMs);
    }

    try {
      const result = await this.options.adapter.run({
        prompt: input.prompt,
        cwd: this.options.cwd,
        env: this.options.env,
        idleTimeoutMs: execution.idleTimeoutMs,
        idleCheckIntervalMs: execution.idleCheckIntervalMs,
        killGraceMs: execution.killGraceMs,
        signal: local.signal,
        onOutput,
      });
      return { ending: "exited", result };
    } catch (error) {
      if (error instanceof ProcessCancelledError) {
        return input.signal?.aborted
          ? { ending: "cancelled", result: error.result, error }
          : { ending: "stopped-after-marker", result: error.result };
      }
      if (error instanceof ProcessIdleTimeoutError) {
        return { ending: "timed-out", result: error.result, error };
      }
      if (error instanceof ProcessExecutionError) {
        return { ending: "failed", result: error.result, error };
      }
      return { ending: "failed", error };
    } finally {
      settled = true;
      clearTimeout(graceHandle);
      clearTimeout(capHandle);
      clearInterval(pollHandle);
      input.signal?.removeEventListener("abort", onUserAbort);
    }
  }

  private async clearStatusFile(): Promise<void> {
    if (this.options.statusFilePath) {
      await rm(this.options.statusFilePath, { force: true });
    }
  }

  /** `quiet` skips the warnings for a file the agent may still be writing. */
  private async readStatusFile(options: { quiet?: boolean } = {}): Promise<AgentStatusFile | undefined> {
    const filePath = this.options.statusFilePath;
    if (!filePath) {
      return undefined;
    }

    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return undefined;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      if (!options.quiet) {
        console.warn(`Execution supervisor: ignoring status file with invalid JSON at ${filePath}.`);
      }
      return undefined;
    }
    const result = AgentStatusFileSchema.safeParse(parsed);
    if (!result.success) {
      if (!options.quiet) {
        console.warn(`Execution supervisor: ignoring status file with unexpected shape at ${filePath}.`);
      }
      return undefined;
    }
    return result.data;
  }

  private async writeArtifact(
    write: () => Promise<string> | undefined,
  ): Promise<string | undefined> {
    try {
      return await write();
    } catch (error) {
      console.warn(`Execution supervisor: could not write attempt artifact: ${toErrorMessage(error)}`);
      return undefined;
    }
  }
}
