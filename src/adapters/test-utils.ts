import {
  ProcessCancelledError,
  ProcessExecutionError,
  ProcessIdleTimeoutError,
  type OutputStream,
  type ProcessRunOptions,
  type ProcessRunResult,
  type ProcessRunner,
} from "../process";

export type ScriptedChunk =
  | string
  | { text: string; stream?: OutputStream; delayMs?: number };

export type ScriptedRun = {
  chunks?: ScriptedChunk[];
  exitCode?: number;
  /** `hang` keeps the run open until its signal aborts. */
  ending?: "exit" | "idle-timeout" | "hang";
  spawnError?: Error;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function waitForAbort(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * In-process stand-in for {@link ProcessManager}: replays one scripted run per
 * call, streaming chunks through `onOutput` and honouring the abort signal.
 */
export class MockProcessRunner implements ProcessRunner {
  readonly calls: ProcessRunOptions[] = [];
  private readonly script: ScriptedRun[];

  constructor(script: ScriptedRun[] = []) {
    this.script = [...script];
  }

  async run(options: ProcessRunOptions): Promise<ProcessRunResult> {
    this.calls.push(options);
    const step = this.script.shift() ?? {};
    const startedAt = Date.now();
    let stdout = "";
    let stderr = "";
    let output = "";

    const buildResult = (exitCode: number): ProcessRunResult => ({
      command: options.command,
      args: options.args ?? [],
      cwd: options.cwd,
      exitCode,
      signal: null,
      stdout,
      stderr,
      output,
      durationMs: Date.now() - startedAt,
    });

    if (step.spawnError) {
      throw step.spawnError;
    }

    for (const chunk of step.chunks ?? []) {
      const normalized = typeof chunk === "string" ? { text: chunk } : chunk;
      if (normalized.delayMs) {
        await sleep(normalized.delayMs);
      }
      if (options.signal?.aborted) {
        throw new ProcessCancelledError(buildResult(-1));
      }
      const stream = normalized.stream ?? "stdout";
      if (stream === "stdout") {
        stdout += normalized.text;
      } else {
        stderr += normalized.text;
      }
      output += normalized.text;
      options.onOutput?.(normalized.text, stream);
    }

    switch (step.ending ?? "exit") {
      case "hang":
        await waitForAbort(options.signal);
        throw new ProcessCancelledError(buildResult(-1));
      case "idle-timeout":
        throw new ProcessIdleTimeoutError(options.idleTimeoutMs ?? 1, buildResult(-1));
      case "exit": {
        const result = buildResult(step.exitCode ?? 0);
        if (result.exitCode !== 0) {
          throw new ProcessExecutionError(
            `Command failed with exit code ${result.exitCode}: ${options.command}`,
            result,
          );
        }
        return result;
      }
    }
  }
}
