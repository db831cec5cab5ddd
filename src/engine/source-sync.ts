import { readFile, rename, writeFile } from "node:fs/promises";

import type { Task } from "../types";

export type SyncResult =
  | { kind: "updated"; file: string; line: number }
  | { kind: "unchanged"; file: string; line: number }
  | { kind: "skipped"; reason: string };

export type ContentSyncResult =
  | { kind: "updated"; content: string; line: number }
  | { kind: "unchanged"; line: number }
  | { kind: "skipped"; reason: string };

export interface SyncFileSystem {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
}

export const nodeSyncFileSystem: SyncFileSystem = {
  readFile: (filePath) => readFile(filePath, "utf8"),
  async writeFile(filePath, content) {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, content, "utf8");
    await rename(tmpPath, filePath);
  },
};

/** How far below a story heading its status line may sit. */
export const STATUS_LINE_WINDOW = 8;

const CHECKBOX_PATTERN = /^(\s*[-*+]\s+\[)([ xX])(\].*)$/;
const STATUS_PATTERN =
  /^(\s*[-*]?\s*(?:\*\*)?Status:(?:\*\*)?\s*)(PENDING|IN[_ ]PROGRESS|COMPLETED|BLOCKED|FAILED)\b/i;

type SplitLine = { body: string; ending: string };

function splitLines(content: string): SplitLine[] {
  return content.split(/(?<=\n)/).map((raw) => {
    const ending = raw.endsWith("\r\n") ? "\r\n" : raw.endsWith("\n") ? "\n" : "";
    return { body: raw.slice(0, raw.length - ending.length), ending };
  });
}

function joinLines(lines: SplitLine[]): string {
  return lines.map((line) => `${line.body}${line.ending}`).join("");
}

function completedKeyword(current: string): string {
  if (current === current.toUpperCase()) {
    return "COMPLETED";
  }
  return current === current.toLowerCase() ? "completed" : "Completed";
}

/**
 * Marks the task's source line done: ticks a checkbox on the locator line, or
 * rewrites a `Status:` keyword a few lines below it.  Every other byte,
 * line endings included, is kept.  Applying it twice changes nothing.
 */
export function applyCompletionToContent(
  content: string,
  task: Pick<Task, "id" | "name" | "source">,
): ContentSyncResult {
  if (!task.source) {
    return { kind: "skipped", reason: `task ${task.id} has no source locator` };
  }

  const lines = splitLines(content);
  const index = task.source.line - 1;
  const locatorLine = lines[index];
  if (!locatorLine) {
    return {
      kind: "skipped",
      reason: `line ${task.source.line} is out of range (${lines.length} lines)`,
    };
  }
  if (!locatorLine.body.includes(task.id) && !locatorLine.body.includes(task.name)) {
    return {
      kind: "skipped",
      reason: `line ${task.source.line} no longer mentions ${task.id}`,
    };
  }

  const checkbox = CHECKBOX_PATTERN.exec(locatorLine.body);
  if (checkbox) {
    const [, head, mark, tail] = checkbox;
    if (mark?.toLowerCase() === "x") {
      return { kind: "unchanged", line: task.source.line };
    }
    lines[index] = { ...locatorLine, body: `${head ?? ""}x${tail ?? ""}` };
    return { kind: "updated", content: joinLines(lines), line: task.source.line };
  }

  const last = Math.min(lines.length - 1, index + STATUS_LINE_WINDOW);
  for (let cursor = index + 1; cursor <= last; cursor += 1) {
    const line = lines[cursor];
    if (!line || /^\s*#/.test(line.body)) {
      break;
    }
    const status = STATUS_PATTERN.exec(line.body);
    if (!status) {
      continue;
    }

    const [matched, prefix = "", keyword = ""] = status;
    if (keyword.toUpperCase() === "COMPLETED") {
      return { kind: "unchanged", line: cursor + 1 };
    }
    lines[cursor] = {
      ...line,
      body: `${prefix}${completedKeyword(keyword)}${line.body.slice(matched.length)}`,
    };
    return { kind: "updated", content: joinLines(lines), line: cursor + 1 };
  }

  return {
    kind: "skipped",
    reason: `no checkbox or status line for ${task.id} near line ${task.source.line}`,
  };
}

export async function applyCompletion(
  task: Pick<Task, "id" | "name" | "source">,
  fileSystem: SyncFileSystem = nodeSyncFileSystem,
): Promise<SyncResult> {
  if (!task.source) {
    return { kind: "skipped", reason: `task ${task.id} has no source locator` };
  }

  const file = task.source.file;
  let content: string;
  try {
    content = await fileSystem.readFile(file);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return { kind: "skipped", reason: `source file ${file} no longer exists` };
    }
    throw error;
  }

  const result = applyCompletionToContent(content, task);
  switch (result.kind) {
    case "skipped":
      return result;
    case "unchanged":
      return { kind: "unchanged", file, line: result.line };
    case "updated":
      await fileSystem.writeFile(file, result.content);
      return { kind: "updated", file, line: result.line };
  }
}
