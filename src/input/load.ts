import type { Stats } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";

import { ConfigurationError, toErrorMessage } from "../errors";
import {
  ProjectInputSchema,
  type Phase,
  type ProjectDraft,
  type ProjectInput,
  type SourceDescriptor,
} from "../types";
import {
  defaultTaskId,
  detectMarkdownFormat,
  parseMarkdown,
  parsePlanPhases,
  parsePrdPhases,
} from "./markdown";

export const MARKDOWN_EXTENSIONS = [".md", ".markdown"];
export const PROMPT_PHASE_ID = "prompt";
export const PROMPT_TASK_ID = "TASK-101";

const PROMPT_NAME_MAX_CHARS = 60;

function firstLine(text: string): string {
  return text.trim().split(/\r?\n/)[0]?.trim() ?? "";
}

function clip(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars - 1)}…` : text;
}

/** A free-text prompt becomes a single task in a single phase. */
export function draftFromPrompt(text: string): ProjectDraft {
  const prompt = text.trim();
  if (!prompt) {
    throw new ConfigurationError("Prompt must not be empty.");
  }

  const name = clip(firstLine(prompt), PROMPT_NAME_MAX_CHARS);
  return {
    name,
    description: prompt,
    phases: [
      {
        id: PROMPT_PHASE_ID,
        name: "Prompt",
        priority: 0,
        tasks: [
          {
            id: PROMPT_TASK_ID,
            name,
            description: prompt,
            status: "pending",
            priority: 0,
            dependencies: [],
            phaseId: PROMPT_PHASE_ID,
            attempts: 0,
          },
        ],
      },
    ],
  };
}

export function draftFromJson(input: ProjectInput): ProjectDraft {
  return {
    name: input.name,
    description: input.description ?? "",
    phases: input.phases.map((phase, phaseIndex): Phase => {
      const phaseId = phase.id ?? `phase-${phaseIndex + 1}`;
      return {
        id: phaseId,
        name: phase.name,
        priority: phase.priority ?? phaseIndex,
        tasks: phase.tasks.map((task, taskIndex) => ({
          id: task.id ?? defaultTaskId(phaseIndex + 1, taskIndex + 1),
          name: task.name,
          description: task.description ?? "",
          status: task.status ?? "pending",
          priority: task.priority ?? taskIndex,
          dependencies: task.dependencies ?? [],
          phaseId,
          attempts: 0,
        })),
      };
    }),
  };
}

export function parseJsonInput(raw: string, filePath: string): ProjectDraft {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Task file ${filePath} is not valid JSON: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }

  const result = ProjectInputSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Task file ${filePath} is invalid: ${details}`);
  }
  return draftFromJson(result.data);
}

async function readSourceFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Could not read ${filePath}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Every markdown file in the directory, in name order, contributes its phases.
 * Phase numbering continues across files so earlier files run first; a phase
 * id another file already used is qualified with the file's stem.
 */
export async function loadDirectory(dirPath: string): Promise<ProjectDraft> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && MARKDOWN_EXTENSIONS.includes(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort();
  if (files.length === 0) {
    throw new ConfigurationError(`No markdown files found in ${dirPath}.`);
  }

  const phases: Phase[] = [];
  const phaseIds = new Set<string>();
  for (const file of files) {
    const filePath = join(dirPath, file);
    const content = await readSourceFile(filePath);
    const parsed =
      detectMarkdownFormat(content) === "prd"
        ? parsePrdPhases(content, filePath, phases.length)
        : parsePlanPhases(content, filePath, phases.length);
    for (const phase of parsed) {
      const id = phaseIds.has(phase.id) ? `${phase.id}-${basename(file, extname(file))}` : phase.id;
      phaseIds.add(id);
      phases.push({
        ...phase,
        id,
        priority: phases.length,
        tasks: phase.tasks.map((task) => ({ ...task, phaseId: id })),
      });
    }
  }

  return { name: basename(dirPath), description: "", phases };
}

export async function loadProjectInput(source: SourceDescriptor): Promise<ProjectDraft> {
  if (source.kind === "prompt") {
    return draftFromPrompt(source.text);
  }

  const target = resolve(source.path);
  let info: Stats;
  try {
    info = await stat(target);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigurationError(`Input source ${target} does not exist.`);
    }
    throw error;
  }

  if (info.isDirectory()) {
    return loadDirectory(target);
  }

  const extension = extname(target).toLowerCase();
  if (extension === ".json") {
    return parseJsonInput(await readSourceFile(target), target);
  }
  if (MARKDOWN_EXTENSIONS.includes(extension)) {
    return parseMarkdown(await readSourceFile(target), target);
  }
  throw new ConfigurationError(
    `Unsupported input ${target}: expected a markdown file, a JSON task file or a directory of plans.`,
  );
}
