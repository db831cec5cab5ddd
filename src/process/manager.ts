import { spawn } from "node:child_process";

import { resolveCommandForSpawn } from "./command-resolver";
import type {
  OutputStream,
  ProcessRunOptions,
  ProcessRunResult,
  SpawnFn,
} from "./types";

export const DEFAULT_IDLE_CHECK_INTERVAL_MS = 1_000;
export const DEFAULT_KILL_GRACE_MS = 5_000;

export class ProcessExecutionError extends Error {
  readonly result: ProcessRunResult;

  constructor(message: string, result: ProcessRunResult) {
    super(message);
    this.name = "ProcessExecutionError";
    this.result = result;
  }
}

export class ProcessIdleTimeoutError extends Error {
  readonly result: ProcessRunResult;
  readonly idleTimeoutMs: number;

  constructor(idleTimeoutMs: number, result: ProcessRunResult) {
    super(
      `Command produced no output for ${idleTimeoutMs}ms: ${result.command}`,
    );
    this.name = "ProcessIdleTimeoutError";
    this.result = result;
    this.idleTimeoutMs = idleTimeoutMs;
  }
}

export class ProcessCancelledError extends Error {
  readonly result: ProcessRunResult;

  constructor(result: ProcessRunResult) {
    super(`Command was cancelled: ${result.command}`);
    this.name = "ProcessCancelledError";
    this.result = result;
  }
}

/** Every rejection of {@link ProcessManager.run} that still carries output. */
export type ProcessFailure =
  | ProcessExecutionError
  | ProcessIdleTimeoutError
  | ProcessCancelledError;

export function isProcessFailure(error: unknown): error is ProcessFailure {
  return (
    error instanceof ProcessExecutionError ||
    error instanceof ProcessIdleTimeoutError ||
    error instanceof ProcessCancelledError
  );
}

type StopReason = "idle-timeout" | "cancelled";

export class ProcessManager {
  private readonly spawnFn: SpawnFn;

  constructor(spawnFn: SpawnFn = spawn) {
    this.spawnFn = spawnFn;
  }

  async run(options: ProcessRunOptions): Promise<ProcessRunResult> {
    const command = options.command.trim();
    const args = options.args ?? [];

    if (!command) {
      throw new Error("command must not be empty.");
    }
    if (options.idleTimeoutMs !== undefined && options.idleTimeoutMs <= 0) {
      throw new Error("idleTimeoutMs must be > 0.");
    }

    return new Promise<ProcessRunResult>((resolve, reject) => {
      const startedAt = Date.now();
      const env = options.env ?? process.env;
      const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

      let stdout = "";
      let stderr = "";
      let output = "";
      let lastOutputAt = startedAt;
      let settled = false;
      let stopReason: StopReason | undefined;
      let heartbeatHandle: NodeJS.Timeout | undefined;
      let killHandle: NodeJS.Timeout | undefined;

      const buildResult = (
        exitCode: number,
        signal: NodeJS.Signals | null,
      ): ProcessRunResult => ({
        command,
        args,
        cwd: options.cwd,
        exitCode,
        signal,
        stdout,
        stderr,
        output,
        durationMs: Date.now() - startedAt,
      });

      if (options.signal?.aborted) {
        reject(new ProcessCancelledError(buildResult(-1, null)));
        return;
      }

      const child = this.spawnFn(resolveCommandForSpawn(command, env), args, {
        cwd: options.cwd,
        env,
        stdio: "pipe",
        shell: false,
        windowsHide: true,
      });

      const cleanup = (): void => {
        clearInterval(heartbeatHandle);
        clearTimeout(killHandle);
        options.signal?.removeEventListener("abort", onAbort);
      };

      const stop = (reason: StopReason): void => {
        if (settled || stopReason) {
          return;
        }

        stopReason = reason;
        clearInterval(heartbeatHandle);
        child.kill("SIGTERM");
        killHandle = setTimeout(() => {
          if (!settled) {
            child.kill("SIGKILL");
          }
        }, killGraceMs);
      };

      const onAbort = (): void => stop("cancelled");

      const record =
        (stream: OutputStream) =>
        (chunk: Buffer | string): void => {
          const text = chunk.toString();
          if (stream === "stdout") {
            stdout += text;
          } else {
            stderr += text;
          }
          output += text;
          lastOutputAt = Date.now();
          options.onOutput?.(text, stream);
        };

      child.stdout?.on("data", record("stdout"));
      child.stderr?.on("data", record("stderr"));

      child.on("error", (error) => {
        if (settled) {
          return;
        }

        settled = true;
        cleanup();
        reject(error);
      });

      child.on("close", (exitCode, signal) => {
        if (settled) {
          return;
        }

        settled = true;
        cleanup();

        const result = buildResult(exitCode ?? -1, signal);
        if (stopReason === "idle-timeout" && options.idleTimeoutMs !== undefined) {
          reject(new ProcessIdleTimeoutError(options.idleTimeoutMs, result));
          return;
        }
        if (stopReason === "cancelled") {
          reject(new ProcessCancelledError(result));
          return;
        }
        if (result.exitCode !== 0) {
          reject(
            new ProcessExecutionError(
              `Command failed with exit code ${result.exitCode}: ${command} ${args.join(" ")}`.trim(),
              result,
            ),
          );
          return;
        }

        resolve(result);
      });

      options.signal?.addEventListener("abort", onAbort, { once: true });

      const idleTimeoutMs = options.idleTimeoutMs;
      if (idleTimeoutMs !== undefined) {
        heartbeatHandle = setInterval(
          () => {
            if (Date.now() - lastOutputAt >= idleTimeoutMs) {
              stop("idle-timeout");
            }
          },
          Math.min(
            options.idleCheckIntervalMs ?? DEFAULT_IDLE_CHECK_INTERVAL_MS,
            idleTimeoutMs,
          ),
        );
      }

      if (options.stdin !== undefined) {
        child.stdin?.write(options.stdin);
      }
      child.stdin?.end();
    });
  }
}
