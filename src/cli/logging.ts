import { appendFileSync, mkdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { inspect } from "node:util";

const DEFAULT_CLI_LOG_FILE = "cli.log";

let activeLogFilePath: string | undefined;
let consoleTeed = false;

function formatLogArg(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }

  return inspect(value, {
    depth: 6,
    colors: false,
    breakLength: 120,
    compact: true,
  });
}

export function formatLogLine(level: string, args: unknown[], now = new Date()): string {
  return `[${now.toISOString()}] [${level}] ${args.map(formatLogArg).join(" ")}\n`;
}

function appendLogLine(level: string, args: unknown[]): void {
  if (!activeLogFilePath) {
    return;
  }
  appendFileSync(activeLogFilePath, formatLogLine(level, args), "utf8");
}

function createLogPathError(logFilePath: string, error: unknown, override: boolean): Error {
  const cause = error instanceof Error ? error : new Error(String(error));
  const reason = cause.message || String(error);
  const hint = override
    ? "Set TASKLOOP_CLI_LOG_FILE to a writable file path."
    : "Ensure the state directory is writable or set TASKLOOP_CLI_LOG_FILE to a writable file path.";
  return new Error(`Failed to initialize CLI logging at "${logFilePath}": ${reason}. ${hint}`, {
    cause,
  });
}

function ensureWritableLogPath(logFilePath: string, override: boolean): void {
  try {
    mkdirSync(dirname(logFilePath), { recursive: true });
    appendFileSync(logFilePath, "", "utf8");
  } catch (error) {
    throw createLogPathError(logFilePath, error, override);
  }
}

export function resolveCliLogFilePath(stateRoot: string): string {
  const configuredPath = process.env.TASKLOOP_CLI_LOG_FILE?.trim();
  if (configuredPath) {
    return resolve(configuredPath);
  }

  return join(stateRoot, DEFAULT_CLI_LOG_FILE);
}

/**
 * Tees every console line into the CLI log file.  Calling it again only
 * redirects the tee to the newly resolved path.
 */
export function initializeCliLogging(stateRoot: string): string {
  const logFilePath = resolveCliLogFilePath(stateRoot);
  const hasExplicitOverride = Boolean(process.env.TASKLOOP_CLI_LOG_FILE?.trim());
  ensureWritableLogPath(logFilePath, hasExplicitOverride);

  if (!consoleTeed) {
    consoleTeed = true;
    const originalLog = console.log.bind(console);
    const originalInfo = console.info.bind(console);
    const originalWarn = console.warn.bind(console);
    const originalError = console.error.bind(console);

    console.log = (...args: unknown[]) => {
      originalLog(...args);
      appendLogLine("LOG", args);
    };
    console.info = (...args: unknown[]) => {
      originalInfo(...args);
      appendLogLine("INFO", args);
    };
    console.warn = (...args: unknown[]) => {
      originalWarn(...args);
      appendLogLine("WARN", args);
    };
    console.error = (...args: unknown[]) => {
      originalError(...args);
      appendLogLine("ERROR", args);
    };
  }

  activeLogFilePath = logFilePath;
  appendLogLine("INFO", ["taskloop CLI logging initialized."]);
  return logFilePath;
}

/** Stops writing to the log file; console output itself stays teed. */
export function stopCliLogging(): void {
  activeLogFilePath = undefined;
}
