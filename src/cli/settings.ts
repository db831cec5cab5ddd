import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";

import { ConfigurationError } from "../errors";
import {
  TaskloopSettingsSchema,
  type AgentAdapterId,
  type TaskloopSettings,
} from "../types";

const DEFAULT_STATE_DIR = ".taskloop";
const DEFAULT_SETTINGS_FILE = "settings.json";

/** Per-invocation overrides taken from `run`/`resume` flags. */
export type RunOverrides = {
  maxIterations?: number;
  idleTimeoutMs?: number;
  maxAttempts?: number;
  sleepBetweenMs?: number;
  model?: string;
  adapter?: AgentAdapterId;
  updateSource?: boolean;
  continueOnTaskFailure?: boolean;
};

export function resolveStateRoot(cwd = process.cwd()): string {
  const configured = process.env.TASKLOOP_STATE_DIR?.trim();
  if (configured) {
    return resolve(cwd, configured);
  }

  return resolve(cwd, DEFAULT_STATE_DIR);
}

export function resolveSettingsFilePath(stateRoot: string): string {
  const configured = process.env.TASKLOOP_SETTINGS_FILE?.trim();
  if (configured) {
    return resolve(configured);
  }

  return join(stateRoot, DEFAULT_SETTINGS_FILE);
}

export function parseSettings(value: unknown, source: string): TaskloopSettings {
  const result = TaskloopSettingsSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Settings in ${source} are invalid: ${details}`);
  }
  return result.data;
}

export async function loadSettings(settingsFilePath: string): Promise<TaskloopSettings> {
  let raw: string;
  try {
    raw = await readFile(settingsFilePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return TaskloopSettingsSchema.parse({});
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Settings file contains invalid JSON: ${settingsFilePath}`);
  }

  return parseSettings(parsed, settingsFilePath);
}

/** Applies CLI flags on top of the file settings and re-validates the result. */
export function applyRunOverrides(
  settings: TaskloopSettings,
  overrides: RunOverrides,
): TaskloopSettings {
  return parseSettings(
    {
      agent: {
        ...settings.agent,
        adapter: overrides.adapter ?? settings.agent.adapter,
        model: overrides.model ?? settings.agent.model,
      },
      execution: {
        ...settings.execution,
        maxIterations: overrides.maxIterations ?? settings.execution.maxIterations,
        idleTimeoutMs: overrides.idleTimeoutMs ?? settings.execution.idleTimeoutMs,
        idleCheckIntervalMs: Math.min(
          settings.execution.idleCheckIntervalMs,
          overrides.idleTimeoutMs ?? settings.execution.idleTimeoutMs,
        ),
        sleepBetweenMs: overrides.sleepBetweenMs ?? settings.execution.sleepBetweenMs,
        updateSource: overrides.updateSource ?? settings.execution.updateSource,
        continueOnTaskFailure:
          overrides.continueOnTaskFailure ?? settings.execution.continueOnTaskFailure,
      },
      retry: {
        ...settings.retry,
        maxAttempts: overrides.maxAttempts ?? settings.retry.maxAttempts,
      },
    },
    "command-line flags",
  );
}
