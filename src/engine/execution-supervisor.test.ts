import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { MockCLIAdapter } from "../adapters";
import { MockProcessRunner, type ScriptedRun } from "../adapters/test-utils";
import { ConfigurationError } from "../errors";
import { makeProject } from "../model/test-helpers";
import {
  ProcessCancelledError,
  type ProcessRunOptions,
  type ProcessRunResult,
  type ProcessRunner,
} from "../process";
import type { ArtifactWriter, AttemptKey, TranscriptArtifactInput } from "../state/artifacts";
import {
  ExecutionSettingsSchema,
  RetrySettingsSchema,
  type ExecutionSettings,
  type Task,
} from "../types";
import type { SupervisorState } from "../types/runtime-events";
import { ExecutionSupervisor, type AttemptSummary } from "./execution-supervisor";
import { RetryPolicy } from "./retry";

const execution = ExecutionSettingsSchema.parse({
  idleTimeoutMs: 1_000,
  postCompletionGraceMs: 20,
});

function setup<R extends ProcessRunner = MockProcessRunner>(options: {
  script?: ScriptedRun[];
  runner?: R;
  maxAttempts?: number;
  taskAttempts?: number;
  statusFilePath?: string;
  artifacts?: ArtifactWriter;
  execution?: ExecutionSettings;
  description?: string;
}) {
  const runner = options.runner ?? new MockProcessRunner(options.script ?? []);
  const delays: number[] = [];
  const supervisor = new ExecutionSupervisor({
    adapter: new MockCLIAdapter(runner),
    cwd: "/repo",
    execution: options.execution ?? execution,
    retry: new RetryPolicy(
      RetrySettingsSchema.parse({ maxAttempts: options.maxAttempts ?? 3, jitter: false }),
    ),
    statusFilePath: options.statusFilePath,
    artifacts: options.artifacts,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  const project = makeProject({
    phases: [
      {
        id: "P1",
        tasks: [
          {
            id: "T1",
            status: "in_progress",
            attempts: options.taskAttempts ?? 0,
            description: options.description ?? "",
            startedAt: "2026-01-05T10:00:00.000Z",
          },
        ],
      },
    ],
  });
  const task = project.phases[0]?.tasks[0];
  if (!task) {
    throw new Error("missing task");
  }

  const transitions: SupervisorState[] = [];
  const finished: Array<{ summary: AttemptSummary; task: Task }> = [];
  const run = (signal?: AbortSignal) =>
    supervisor.runTask({
      project,
      task,
      iteration: 1,
      signal,
      onTransition: (_from, to) => transitions.push(to),
      onAttemptFinished: (summary, updated) => {
        finished.push({ summary, task: updated });
      },
    });

  return { runner, delays, transitions, finished, run };
}

describe("ExecutionSupervisor", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("completes the task when the agent prints its marker", async () => {
    const { run, transitions, finished, runner } = setup({
      script: [{ chunks: ["working\n", "STATUS: done\n", "TASK_COMPLETE: T1\n"] }],
    });

    const result = await run();

    expect(result.kind).toBe("completed");
    expect(result.task).toMatchObject({ status: "in_progress", attempts: 1, notes: "done" });
    expect(result.lastOutcome).toBe("success");
    expect(transitions).toEqual(["BUILDING", "RUNNING", "COMPLETED", "CLASSIFIED", "APPLIED"]);
    expect(finished.map((entry) => entry.summary.outcome)).toEqual(["success"]);
    expect(runner.calls[0]?.args?.at(-1)).toContain("- done: TASK_COMPLETE: <id>");
  });

  test("fails the task after every attempt times out", async () => {
    const { run, delays, finished } = setup({
      script: [{ ending: "idle-timeout" }, { ending: "idle-timeout" }, { ending: "idle-timeout" }],
    });

    const result = await run();

    expect(result.kind).toBe("failed");
    expect(result.task).toMatchObject({
      status: "failed",
      attempts: 3,
      lastError: "Agent produced no output for 1000ms: mock-cli",
    });
    expect(result.attempts.map((attempt) => attempt.outcome)).toEqual([
      "timeout",
      "timeout",
      "timeout",
    ]);
    expect(delays).toEqual([1_000, 2_000]);
    expect(finished.map((entry) => entry.task.attempts)).toEqual([1, 2, 3]);
  });

  test("retries a failed exit and passes the error into the next prompt", async () => {
    const { run, runner } = setup({
      script: [
        { chunks: [{ text: "boom\n", stream: "stderr" }], exitCode: 1 },
        { chunks: ["TASK_COMPLETE: T1\n"] },
      ],
    });

    const result = await run();

    expect(result.kind).toBe("completed");
    expect(result.task.attempts).toBe(2);
    expect(result.attempts[0]?.error).toBe("Agent exited with code 1: boom");
    expect(runner.calls[1]?.args?.at(-1)).toContain(
      "The previous attempt did not finish: Agent exited with code 1: boom",
    );
  });

  test("counts a completion marker even when the agent exits non-zero", async () => {
    const { run } = setup({ script: [{ chunks: ["TASK_COMPLETE: T1\n"], exitCode: 2 }] });

    const result = await run();

    expect(result.kind).toBe("completed");
    expect(result.attempts).toHaveLength(1);
  });

  test("stops an agent that lingers after reporting completion", async () => {
    const { run, transitions } = setup({
      script: [{ chunks: ["TASK_COMPLETE: T1\n"], ending: "hang" }],
    });

    const result = await run();

    expect(result.kind).toBe("completed");
    expect(transitions).toContain("COMPLETED");
  });

  test("treats a clean exit without markers as inconclusive", async () => {
    const { run, runner } = setup({ script: [{ chunks: ["just chatting\n"] }] });

    const result = await run();

    expect(result.kind).toBe("inconclusive");
    expect(result.task).toMatchObject({
      status: "pending",
      attempts: 1,
      lastError: "Agent exited without reporting a completion marker.",
    });
    expect(result.transcriptTail).toBe("just chatting");
    expect(runner.calls).toHaveLength(1);
  });

  test("fails an inconclusive attempt that uses up the last try", async () => {
    const { run } = setup({ script: [{ chunks: ["hmm\n"] }], taskAttempts: 2 });

    const result = await run();

    expect(result.kind).toBe("failed");
    expect(result.task).toMatchObject({ status: "failed", attempts: 3 });
  });

  test("ignores markers an agent prints back from its own prompt", async () => {
    const { run } = setup({
      runner: new EchoRunner(),
      description: "When you are done, print:\nTASK_COMPLETE: T1",
    });

    const result = await run();

    expect(result.kind).toBe("inconclusive");
    expect(result.task.lastError).toBe("Agent exited without reporting a completion marker.");
  });

  test("marks the task blocked when the agent says so", async () => {
    const { run } = setup({ script: [{ chunks: ["TASK_BLOCKED: T1 needs an API key\n"] }] });

    const result = await run();

    expect(result.kind).toBe("blocked");
    expect(result.reason).toBe("needs an API key");
    expect(result.task).toMatchObject({
      status: "blocked",
      lastError: "Agent reported the task blocked: needs an API key",
    });
  });

  test("returns the task to pending when cancelled mid-run", async () => {
    const controller = new AbortController();
    const { run, transitions, finished } = setup({
      script: [{ chunks: ["working\n"], ending: "hang" }],
    });
    setTimeout(() => controller.abort(), 10);

    const result = await run(controller.signal);

    expect(result.kind).toBe("cancelled");
    expect(result.task).toMatchObject({ status: "pending", attempts: 0 });
    expect(result.attempts).toEqual([]);
    expect(finished).toEqual([]);
    expect(transitions.at(-1)).toBe("CANCELLED");
  });

  test("reports a missing agent binary as a configuration error", async () => {
    const spawnError = Object.assign(new Error("spawn mock-cli ENOENT"), { code: "ENOENT" });
    const { run } = setup({ script: [{ spawnError }] });

    await expect(run()).rejects.toBeInstanceOf(ConfigurationError);
  });

  test("hands every attempt to the artifact writer", async () => {
    const prompts: AttemptKey[] = [];
    const transcripts: TranscriptArtifactInput[] = [];
    const artifacts: ArtifactWriter = {
      writePrompt: async (input) => {
        prompts.push({ iteration: input.iteration, attempt: input.attempt });
        return `/t/iteration-${input.iteration}-attempt-${input.attempt}-prompt.txt`;
      },
      writeTranscript: async (input) => {
        transcripts.push(input);
        return `/t/iteration-${input.iteration}-attempt-${input.attempt}.log`;
      },
    };
    const { run } = setup({ script: [{ chunks: ["TASK_COMPLETE: T1\n"] }], artifacts });

    const result = await run();

    expect(prompts).toEqual([{ iteration: 1, attempt: 1 }]);
    expect(transcripts[0]).toMatchObject({ command: "mock-cli", exitCode: 0, stdout: "TASK_COMPLETE: T1\n" });
    expect(result.attempts[0]).toMatchObject({
      promptPath: "/t/iteration-1-attempt-1-prompt.txt",
      transcriptPath: "/t/iteration-1-attempt-1.log",
    });
  });
});

function resultFor(options: ProcessRunOptions, output: string, exitCode: number): ProcessRunResult {
  return {
    command: options.command,
    args: options.args ?? [],
    cwd: options.cwd,
    exitCode,
    signal: null,
    stdout: "",
    stderr: output,
    output,
    durationMs: 1,
  };
}

/** Prints its prompt back on stderr, the way `codex exec` does, then exits cleanly. */
class EchoRunner implements ProcessRunner {
  async run(options: ProcessRunOptions): Promise<ProcessRunResult> {
    const output = `user\n${options.args?.at(-1) ?? ""}\n`;
    options.onOutput?.(output, "stderr");
    return resultFor(options, output, 0);
  }
}

/** Writes a completion status file, then keeps printing until it is stopped. */
class LingeringStatusRunner implements ProcessRunner {
  private readonly statusFilePath: string;

  constructor(statusFilePath: string) {
    this.statusFilePath = statusFilePath;
  }

  async run(options: ProcessRunOptions): Promise<ProcessRunResult> {
    await writeFile(this.statusFilePath, JSON.stringify({ status: "COMPLETED", task_id: "T1" }), "utf8");
    let output = "";
    for (let tick = 0; tick < 150; tick += 1) {
      await new Promise((resolve) => setTimeout(resolve, 20));
      if (options.signal?.aborted) {
        throw new ProcessCancelledError(resultFor(options, output, -1));
      }
      output += "still tidying up\n";
      options.onOutput?.("still tidying up\n", "stderr");
    }
    return resultFor(options, output, 0);
  }
}

class StatusFileRunner implements ProcessRunner {
  private readonly statusFilePath: string;
  private readonly body: string;

  constructor(statusFilePath: string, body: string) {
    this.statusFilePath = statusFilePath;
    this.body = body;
  }

  async run(options: ProcessRunOptions): Promise<ProcessRunResult> {
    await writeFile(this.statusFilePath, this.body, "utf8");
    return {
      command: options.command,
      args: options.args ?? [],
      cwd: options.cwd,
      exitCode: 0,
      signal: null,
      stdout: "TASK_COMPLETE: T1\n",
      stderr: "",
      output: "TASK_COMPLETE: T1\n",
      durationMs: 1,
    };
  }
}

describe("ExecutionSupervisor status file", () => {
  let sandboxDir: string;

  beforeEach(async () => {
    sandboxDir = await mkdtemp(join(tmpdir(), "taskloop-supervisor-"));
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(sandboxDir, { recursive: true, force: true });
  });

  test("prefers the status file over transcript markers", async () => {
    const statusFilePath = join(sandboxDir, "agent-status.json");
    const { run } = setup({
      runner: new StatusFileRunner(
        statusFilePath,
        JSON.stringify({ status: "blocked", task_id: "T1", reason: "waiting on review" }),
      ),
      statusFilePath,
    });

    const result = await run();

    expect(result.kind).toBe("blocked");
    expect(result.reason).toBe("waiting on review");
  });

  test("clears a stale status file before each attempt", async () => {
    const statusFilePath = join(sandboxDir, "agent-status.json");
    await writeFile(statusFilePath, JSON.stringify({ status: "COMPLETED", task_id: "T1" }), "utf8");
    const { run } = setup({ script: [{ chunks: ["nothing to report\n"] }], statusFilePath });

    const result = await run();

    expect(result.kind).toBe("inconclusive");
    await expect(readFile(statusFilePath, "utf8")).rejects.toMatchObject({ code: "ENOENT" });
  });

  test("stops an agent that keeps talking after writing a completion status", async () => {
    const statusFilePath = join(sandboxDir, "agent-status.json");
    const { run, transitions } = setup({
      runner: new LingeringStatusRunner(statusFilePath),
      statusFilePath,
      execution: ExecutionSettingsSchema.parse({
        idleTimeoutMs: 1_000,
        idleCheckIntervalMs: 10,
        postCompletionGraceMs: 50,
        postCompletionMaxWaitMs: 200,
      }),
    });
    const startedAt = Date.now();

    const result = await run();

    expect(result.kind).toBe("completed");
    expect(transitions).toEqual(["BUILDING", "RUNNING", "COMPLETED", "CLASSIFIED", "APPLIED"]);
    expect(Date.now() - startedAt).toBeLessThan(1_500);
  });

  test("ignores a malformed status file", async () => {
    const statusFilePath = join(sandboxDir, "agent-status.json");
    const { run } = setup({
      runner: new StatusFileRunner(statusFilePath, "{not json"),
      statusFilePath,
    });

    const result = await run();

    expect(result.kind).toBe("completed");
  });
});
