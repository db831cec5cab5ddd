import { existsSync } from "node:fs";
import { delimiter, extname, isAbsolute, join } from "node:path";

const DEFAULT_WINDOWS_PATHEXT = [".COM", ".EXE", ".BAT", ".CMD"];

type ExistsFn = (path: string) => boolean;

export type CommandLookupContext = {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  exists?: ExistsFn;
};

function listSearchDirs(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string[] {
  const pathValue = env.Path ?? env.PATH ?? "";
  const separator = platform === "win32" ? ";" : delimiter;
  return pathValue
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function listCandidateNames(
  command: string,
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform,
): string[] {
  if (platform !== "win32" || extname(command)) {
    return [command];
  }

  return (env.PATHEXT ?? DEFAULT_WINDOWS_PATHEXT.join(";"))
    .split(";")
    .map((ext) => ext.trim().toUpperCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => `${command}${ext.startsWith(".") ? ext : `.${ext}`}`);
}

/**
 * Looks a bare command name up on PATH.  Returns the first existing
 * candidate, the command itself when it already is a path that exists, or
 * `undefined` when nothing matches.
 */
export function findExecutable(
  command: string,
  context: CommandLookupContext = {},
): string | undefined {
  const env = context.env ?? process.env;
  const platform = context.platform ?? process.platform;
  const exists = context.exists ?? existsSync;
  const trimmed = command.trim();
  if (!trimmed) {
    return undefined;
  }

  if (isAbsolute(trimmed) || trimmed.includes("/") || trimmed.includes("\\")) {
    return exists(trimmed) ? trimmed : undefined;
  }

  for (const dir of listSearchDirs(env, platform)) {
    for (const name of listCandidateNames(trimmed, env, platform)) {
      const candidate = join(dir, name);
      if (exists(candidate)) {
        return candidate;
      }
    }
  }

  return undefined;
}

// Windows cannot spawn `.cmd` shims by bare name without a shell.
export function resolveCommandForSpawn(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  exists: ExistsFn = existsSync,
): string {
  const trimmed = command.trim();
  if (!trimmed || platform !== "win32") {
    return trimmed || command;
  }

  if (trimmed.includes("/") || trimmed.includes("\\") || extname(trimmed)) {
    return trimmed;
  }

  return findExecutable(trimmed, { env, platform, exists }) ?? trimmed;
}
