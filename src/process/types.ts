import type { ChildProcess, SpawnOptions } from "node:child_process";

export type OutputStream = "stdout" | "stderr";

export type ProcessRunOptions = {
  command: string;
  args?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdin?: string;
  /**
   * Maximum silence tolerated on stdout and stderr.  Total duration is never
   * limited; only a gap between two chunks longer than this stops the child.
   */
  idleTimeoutMs?: number;
  idleCheckIntervalMs?: number;
  /** Delay between SIGTERM and SIGKILL when the child has to be stopped. */
  killGraceMs?: number;
  signal?: AbortSignal;
  onOutput?: (chunk: string, stream: OutputStream) => void;
};

export type ProcessRunResult = {
  command: string;
  args: string[];
  cwd?: string;
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
  durationMs: number;
};

export interface ProcessRunner {
  run(options: ProcessRunOptions): Promise<ProcessRunResult>;
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: SpawnOptions,
) => ChildProcess;
