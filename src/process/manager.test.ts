import type { ChildProcess, SpawnOptions } from "node:child_process";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";

import { describe, expect, test } from "vitest";

import { resolveCommandForSpawn } from "./command-resolver";
import {
  ProcessCancelledError,
  ProcessExecutionError,
  ProcessIdleTimeoutError,
  ProcessManager,
} from "./manager";
import type { SpawnFn } from "./types";

type FakeChildProcess = ChildProcess & {
  stdout: PassThrough;
  stderr: PassThrough;
  stdin: PassThrough;
  killSignals: Array<NodeJS.Signals | number | undefined>;
};

function createFakeChild(options: { ignoreSigterm?: boolean } = {}): FakeChildProcess {
  const emitter = new EventEmitter() as ChildProcess;
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const stdin = new PassThrough();
  const killSignals: Array<NodeJS.Signals | number | undefined> = [];

  const child = Object.assign(emitter, {
    stdout,
    stderr,
    stdin,
    killSignals,
    kill: (signal?: NodeJS.Signals | number) => {
      killSignals.push(signal);
      if (signal === "SIGTERM" && options.ignoreSigterm) {
        return true;
      }
      setTimeout(() => emitter.emit("close", null, signal ?? "SIGTERM"), 0);
      return true;
    },
  }) as FakeChildProcess;

  return child;
}

describe("ProcessManager", () => {
  test("runs a command and collects stdout/stderr", async () => {
    const child = createFakeChild();
    const spawnCalls: Array<{
      command: string;
      args: string[];
      options: SpawnOptions;
    }> = [];

    const spawnFn: SpawnFn = (command, args, options) => {
      spawnCalls.push({ command, args, options });
      setTimeout(() => {
        child.stdout.write("ok");
        child.stderr.write("warn");
        setTimeout(() => child.emit("close", 0, null), 5);
      }, 0);
      return child;
    };

    const manager = new ProcessManager(spawnFn);
    const result = await manager.run({ command: "claude", args: ["--print"] });

    expect(spawnCalls).toHaveLength(1);
    expect(spawnCalls[0]?.command).toBe(resolveCommandForSpawn("claude", process.env));
    expect(spawnCalls[0]?.args).toEqual(["--print"]);
    expect(result.stdout).toBe("ok");
    expect(result.stderr).toBe("warn");
    expect(result.output).toBe("okwarn");
    expect(result.exitCode).toBe(0);
  });

  test("streams output chunks as they arrive", async () => {
    const child = createFakeChild();
    const chunks: string[] = [];
    const spawnFn: SpawnFn = () => {
      setTimeout(() => {
        child.stdout.write("first\n");
        child.stderr.write("second\n");
        setTimeout(() => child.emit("close", 0, null), 5);
      }, 0);
      return child;
    };

    await new ProcessManager(spawnFn).run({
      command: "agent",
      onOutput: (chunk, stream) => chunks.push(`${stream}:${chunk}`),
    });

    expect(chunks).toEqual(["stdout:first\n", "stderr:second\n"]);
  });

  test("writes stdin and closes it", async () => {
    const child = createFakeChild();
    let received = "";
    child.stdin.on("data", (chunk: Buffer) => {
      received += chunk.toString();
    });
    const spawnFn: SpawnFn = () => {
      child.stdin.on("finish", () => child.emit("close", 0, null));
      return child;
    };

    await new ProcessManager(spawnFn).run({ command: "agent", stdin: "do the task" });

    expect(received).toBe("do the task");
  });

  test("throws ProcessExecutionError for non-zero exit code", async () => {
    const child = createFakeChild();
    const spawnFn: SpawnFn = () => {
      setTimeout(() => {
        child.stderr.write("fatal");
        setTimeout(() => child.emit("close", 3, null), 5);
      }, 0);
      return child;
    };

    const error = await new ProcessManager(spawnFn)
      .run({ command: "agent" })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProcessExecutionError);
    if (error instanceof ProcessExecutionError) {
      expect(error.result.exitCode).toBe(3);
      expect(error.result.stderr).toBe("fatal");
    }
  });

  test("stops a silent child after the idle timeout", async () => {
    const child = createFakeChild();
    const spawnFn: SpawnFn = () => {
      setTimeout(() => child.stdout.write("starting\n"), 0);
      return child;
    };

    const error = await new ProcessManager(spawnFn)
      .run({ command: "agent", idleTimeoutMs: 40, idleCheckIntervalMs: 10 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProcessIdleTimeoutError);
    if (error instanceof ProcessIdleTimeoutError) {
      expect(error.idleTimeoutMs).toBe(40);
      expect(error.result.output).toBe("starting\n");
    }
    expect(child.killSignals).toEqual(["SIGTERM"]);
  });

  test("does not time out a child that keeps producing output", async () => {
    const child = createFakeChild();
    const spawnFn: SpawnFn = () => {
      let ticks = 0;
      const handle = setInterval(() => {
        ticks += 1;
        child.stdout.write(`tick ${ticks}\n`);
        if (ticks === 8) {
          clearInterval(handle);
          child.emit("close", 0, null);
        }
      }, 15);
      return child;
    };

    const result = await new ProcessManager(spawnFn).run({
      command: "agent",
      idleTimeoutMs: 60,
      idleCheckIntervalMs: 10,
    });

    expect(result.exitCode).toBe(0);
    expect(child.killSignals).toEqual([]);
  });

  test("escalates to SIGKILL when the child ignores SIGTERM", async () => {
    const child = createFakeChild({ ignoreSigterm: true });
    const controller = new AbortController();
    const spawnFn: SpawnFn = () => {
      setTimeout(() => controller.abort(), 5);
      return child;
    };

    const error = await new ProcessManager(spawnFn)
      .run({ command: "agent", signal: controller.signal, killGraceMs: 20 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProcessCancelledError);
    expect(child.killSignals).toEqual(["SIGTERM", "SIGKILL"]);
  });

  test("rejects immediately when the signal is already aborted", async () => {
    let spawned = false;
    const spawnFn: SpawnFn = () => {
      spawned = true;
      return createFakeChild();
    };
    const controller = new AbortController();
    controller.abort();

    await expect(
      new ProcessManager(spawnFn).run({ command: "agent", signal: controller.signal }),
    ).rejects.toBeInstanceOf(ProcessCancelledError);
    expect(spawned).toBe(false);
  });

  test("rejects on spawn errors", async () => {
    const child = createFakeChild();
    const spawnFn: SpawnFn = () => {
      setTimeout(() => child.emit("error", new Error("spawn agent ENOENT")), 0);
      return child;
    };

    await expect(new ProcessManager(spawnFn).run({ command: "agent" })).rejects.toThrow(
      "spawn agent ENOENT",
    );
  });

  test("rejects an empty command", async () => {
    await expect(new ProcessManager().run({ command: "  " })).rejects.toThrow(
      "command must not be empty.",
    );
  });
});
