import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { ConfigurationError } from "../errors";
import {
  applyRunOverrides,
  loadSettings,
  resolveSettingsFilePath,
  resolveStateRoot,
} from "./settings";
import { TestSandbox } from "./test-helpers";

describe("cli settings", () => {
  let sandbox: TestSandbox;
  const originalStateDir = process.env.TASKLOOP_STATE_DIR;
  const originalSettingsFile = process.env.TASKLOOP_SETTINGS_FILE;

  beforeEach(async () => {
    sandbox = await TestSandbox.create("taskloop-settings-");
    delete process.env.TASKLOOP_STATE_DIR;
    delete process.env.TASKLOOP_SETTINGS_FILE;
  });

  afterEach(async () => {
    if (originalStateDir === undefined) {
      delete process.env.TASKLOOP_STATE_DIR;
    } else {
      process.env.TASKLOOP_STATE_DIR = originalStateDir;
    }
    if (originalSettingsFile === undefined) {
      delete process.env.TASKLOOP_SETTINGS_FILE;
    } else {
      process.env.TASKLOOP_SETTINGS_FILE = originalSettingsFile;
    }
    await sandbox.cleanup();
  });

  test("state root defaults to .taskloop under the working directory", () => {
    expect(resolveStateRoot(sandbox.projectDir)).toBe(join(sandbox.projectDir, ".taskloop"));
  });

  test("TASKLOOP_STATE_DIR is resolved against the working directory", () => {
    process.env.TASKLOOP_STATE_DIR = "state/custom";
    expect(resolveStateRoot(sandbox.projectDir)).toBe(join(sandbox.projectDir, "state", "custom"));
  });

  test("settings file lives in the state root unless overridden", () => {
    expect(resolveSettingsFilePath(sandbox.stateRoot)).toBe(sandbox.settingsFilePath);

    const custom = join(sandbox.projectDir, "other.json");
    process.env.TASKLOOP_SETTINGS_FILE = custom;
    expect(resolveSettingsFilePath(sandbox.stateRoot)).toBe(custom);
  });

  test("missing settings file yields defaults", async () => {
    const settings = await loadSettings(sandbox.settingsFilePath);

    expect(settings.agent.adapter).toBe("CLAUDE_CLI");
    expect(settings.execution.maxIterations).toBe(50);
    expect(settings.execution.idleTimeoutMs).toBe(60_000);
    expect(settings.retry.maxAttempts).toBe(3);
  });

  test("file values are merged over defaults", async () => {
    await sandbox.writeSettings({
      agent: { adapter: "CODEX_CLI", model: "test-model" },
      execution: { maxIterations: 7 },
    });

    const settings = await loadSettings(sandbox.settingsFilePath);

    expect(settings.agent.adapter).toBe("CODEX_CLI");
    expect(settings.agent.model).toBe("test-model");
    expect(settings.execution.maxIterations).toBe(7);
    expect(settings.execution.sleepBetweenMs).toBe(2_000);
  });

  test("invalid JSON is a configuration error", async () => {
    await sandbox.writeFile(".taskloop/settings.json", "{ not json");

    await expect(loadSettings(sandbox.settingsFilePath)).rejects.toThrow(
      `Settings file contains invalid JSON: ${sandbox.settingsFilePath}`,
    );
  });

  test("schema violations name the offending path", async () => {
    await sandbox.writeSettings({ execution: { maxIterations: 0 } });

    const error = await loadSettings(sandbox.settingsFilePath).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof Error ? error.message : "").toContain(
      `Settings in ${sandbox.settingsFilePath} are invalid: execution.maxIterations:`,
    );
  });

  test("command-line overrides win and clamp the idle check interval", async () => {
    const settings = await loadSettings(sandbox.settingsFilePath);

    const overridden = applyRunOverrides(settings, {
      maxIterations: 3,
      idleTimeoutMs: 500,
      maxAttempts: 1,
      adapter: "MOCK_CLI",
      updateSource: false,
      continueOnTaskFailure: false,
    });

    expect(overridden.execution.maxIterations).toBe(3);
    expect(overridden.execution.idleTimeoutMs).toBe(500);
    expect(overridden.execution.idleCheckIntervalMs).toBe(500);
    expect(overridden.execution.updateSource).toBe(false);
    expect(overridden.execution.continueOnTaskFailure).toBe(false);
    expect(overridden.retry.maxAttempts).toBe(1);
    expect(overridden.agent.adapter).toBe("MOCK_CLI");
  });

  test("overrides are re-validated", async () => {
    const settings = await loadSettings(sandbox.settingsFilePath);

    expect(() => applyRunOverrides(settings, { maxAttempts: 0 })).toThrow(
      "Settings in command-line flags are invalid: retry.maxAttempts:",
    );
  });
});
