import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { CommandRegistry, type CommandDefinition } from "./command-registry";
import { ValidationError } from "./validation";

describe("CommandRegistry", () => {
  let infoOutput: string[];

  beforeEach(() => {
    infoOutput = [];
    vi.spyOn(console, "info").mockImplementation((...args: unknown[]) => {
      infoOutput.push(args.join(" "));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const received: string[][] = [];
  const testCommands: CommandDefinition[] = [
    {
      name: "run",
      usage: "run [source]",
      description: "Run a plan",
      action: async (ctx) => {
        received.push(ctx.args);
        return 3;
      },
    },
    {
      name: "projects",
      description: "List projects",
      action: async () => {
        console.info("listing");
      },
    },
  ];

  test("passes the remaining args to the action and returns its exit code", async () => {
    const registry = new CommandRegistry(testCommands);

    await expect(registry.run(["run", "plan.md", "--max", "2"])).resolves.toBe(3);
    expect(received.at(-1)).toEqual(["plan.md", "--max", "2"]);
  });

  test("treats an action without a return value as success", async () => {
    const registry = new CommandRegistry(testCommands);

    await expect(registry.run(["projects"])).resolves.toBe(0);
    expect(infoOutput).toEqual(["listing"]);
  });

  test("prints global help without arguments", async () => {
    const registry = new CommandRegistry(testCommands);

    await expect(registry.run([])).resolves.toBe(0);
    expect(infoOutput).toEqual([
      "taskloop: drive a coding agent through a task plan",
      "",
      "Usage:",
      "  taskloop run [source]   Run a plan",
      "  taskloop projects       List projects",
      "  taskloop help           Show this help",
      "",
      "Run 'taskloop <command> help' for command details.",
    ]);
  });

  test("prints command help instead of running the command", async () => {
    const registry = new CommandRegistry(testCommands);
    const before = received.length;

    await expect(registry.run(["run", "--help"])).resolves.toBe(0);
    expect(received.length).toBe(before);
    expect(infoOutput).toEqual(["taskloop run [source]", "", "  Run a plan"]);
  });

  test("rejects unknown commands with a hint", async () => {
    const registry = new CommandRegistry(testCommands);

    const error = await registry.run(["deploy"]).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.format()).toBe(
        "Error: Unknown command: 'deploy'\n  Hint:  Run 'taskloop help' to list the available commands.",
      );
    }
  });

  test("register appends a command", async () => {
    const registry = new CommandRegistry();
    registry.register({ name: "ping", description: "Ping", action: async () => 7 });

    await expect(registry.run(["ping"])).resolves.toBe(7);
  });
});
