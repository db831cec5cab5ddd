import type { Phase, ProjectDraft, SourceLocator, Task, TaskStatus } from "../types";

export type MarkdownFormat = "prd" | "plan" | "unknown";

export const UNNAMED_PROJECT = "Unnamed Project";

const TITLE_PATTERN = /^#\s+(?:Project:\s*)?(.+?)\s*$/m;
const SECTION_PATTERN = /^##\s+(.+?)\s*$/;
const NUMBERED_PHASE_PATTERN = /^Phase\s+(\d+)[:\s]*(.*)$/;
const TASK_ID_PATTERN = "([A-Z][A-Z0-9]*-\\d+)";
const CHECKBOX_TASK_PATTERN = new RegExp(
  `^(\\s*)[-*+]\\s+\\[([ xX])\\]\\s+(?:${TASK_ID_PATTERN}[:\\s]+)?(.+?)\\s*$`,
);
const STORY_PATTERN = new RegExp(`^###\\s+(?:${TASK_ID_PATTERN}[:\\s]+)?(.+?)\\s*$`);
const ACCEPTANCE_CRITERIA_PATTERN = /^####\s+Acceptance\s+Criteria/i;
const CRITERION_PATTERN = /^\s*[-*+]\s+\[([ xX])\]\s+(.+?)\s*$/;

const PLAN_PRIORITY_PATTERN = /^\s*-?\s*Priority:\s*(\d+|high|medium|low)\s*$/i;
const PLAN_DEPENDENCIES_PATTERN = /^\s*-?\s*Dependenc(?:y|ies):\s*(.+?)\s*$/i;
const PLAN_DESCRIPTION_PATTERN = /^\s*-?\s*Description:\s*(.+?)\s*$/;

const PRD_STATUS_PATTERN = /^\*\*Status:\*\*\s*(Pending|In[ _]Progress|Completed|Blocked|Failed)\b/i;
const PRD_PRIORITY_PATTERN = /^\*\*Priority:\*\*\s*(High|Medium|Low|\d+)\b/i;
const PRD_DEPENDENCIES_PATTERN = /^\*\*Dependenc(?:y|ies):\*\*\s*(.+?)\s*$/i;

const NAMED_PRIORITIES: Record<string, number> = { high: 1, medium: 2, low: 3 };

function parsePriority(value: string): number {
  return NAMED_PRIORITIES[value.toLowerCase()] ?? Number.parseInt(value, 10);
}

function parseDependencyList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0 && entry.toLowerCase() !== "none");
}

function parseStoryStatus(value: string): TaskStatus {
  const normalized = value.toLowerCase().replace(/\s+/g, "_");
  switch (normalized) {
    case "in_progress":
    case "completed":
    case "blocked":
    case "failed":
      return normalized;
    default:
      return "pending";
  }
}

/** Ids for tasks the document leaves unnamed: phase ordinal then a two-digit sequence. */
export function defaultTaskId(phaseOrdinal: number, sequence: number): string {
  return `TASK-${phaseOrdinal}${String(sequence).padStart(2, "0")}`;
}

function splitContentLines(content: string): string[] {
  return content.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

function locate(sourceFile: string | undefined, line: number): SourceLocator | undefined {
  return sourceFile ? { file: sourceFile, line } : undefined;
}

export function extractTitle(content: string): string | undefined {
  return TITLE_PATTERN.exec(content)?.[1];
}

export function detectMarkdownFormat(content: string): MarkdownFormat {
  const lines = splitContentLines(content);
  if (lines.some((line) => STORY_PATTERN.test(line))) {
    return "prd";
  }
  if (lines.some((line) => CHECKBOX_TASK_PATTERN.test(line))) {
    return "plan";
  }
  return "unknown";
}

/**
 * Plan format: `## Phase N: Name` headings hold checkbox tasks.  A checkbox
 * indented deeper than two spaces depends on the task above it, and
 * `Priority:`, `Dependencies:` and `Description:` lines annotate the latest
 * task.
 */
export function parsePlanPhases(
  content: string,
  sourceFile?: string,
  phaseOffset = 0,
): Phase[] {
  const phases: Phase[] = [];
  let phase: Phase | undefined;
  let task: Task | undefined;

  for (const [index, line] of splitContentLines(content).entries()) {
    const lineNumber = index + 1;

    const section = SECTION_PATTERN.exec(line);
    if (section) {
      if (phase) {
        phases.push(phase);
      }
      const heading = section[1] ?? "";
      const numbered = NUMBERED_PHASE_PATTERN.exec(heading);
      phase = {
        id: numbered ? `phase-${numbered[1]}` : `phase-${phaseOffset + phases.length + 1}`,
        name: numbered ? numbered[2]?.trim() || `Phase ${numbered[1]}` : heading,
        priority: phaseOffset + phases.length,
        tasks: [],
        source: locate(sourceFile, lineNumber),
      };
      task = undefined;
      continue;
    }

    const checkbox = CHECKBOX_TASK_PATTERN.exec(line);
    if (checkbox && phase) {
      const [, indent = "", mark = " ", explicitId, name = ""] = checkbox;
      const next: Task = {
        id: explicitId ?? defaultTaskId(phaseOffset + phases.length + 1, phase.tasks.length + 1),
        name,
        description: "",
        status: mark.toLowerCase() === "x" ? "completed" : "pending",
        priority: phase.tasks.length,
        dependencies: indent.length > 2 && task ? [task.id] : [],
        phaseId: phase.id,
        attempts: 0,
        source: locate(sourceFile, lineNumber),
      };
      phase.tasks.push(next);
      task = next;
      continue;
    }

    if (!task) {
      continue;
    }

    const priority = PLAN_PRIORITY_PATTERN.exec(line);
    if (priority?.[1]) {
      task.priority = parsePriority(priority[1]);
      continue;
    }
    const dependencies = PLAN_DEPENDENCIES_PATTERN.exec(line);
    if (dependencies?.[1]) {
      task.dependencies.push(...parseDependencyList(dependencies[1]));
      continue;
    }
    const description = PLAN_DESCRIPTION_PATTERN.exec(line);
    if (description?.[1]) {
      task.description = description[1];
    }
  }

  if (phase) {
    phases.push(phase);
  }
  return phases;
}

/**
 * PRD format: `## Section` headings hold `### US-001: Story` tasks with bold
 * `Status`, `Priority` and `Dependencies` fields.  Acceptance criteria are
 * appended to the story description; an unchecked criterion keeps the story
 * pending.  Sections without stories are dropped.
 */
export function parsePrdPhases(
  content: string,
  sourceFile?: string,
  phaseOffset = 0,
): Phase[] {
  const phases: Phase[] = [];
  let phase: Phase | undefined;
  let task: Task | undefined;
  let inAcceptanceCriteria = false;

  const closePhase = (): void => {
    if (phase && phase.tasks.length > 0) {
      phases.push(phase);
    }
  };

  for (const [index, line] of splitContentLines(content).entries()) {
    const lineNumber = index + 1;

    const section = SECTION_PATTERN.exec(line);
    if (section) {
      closePhase();
      phase = {
        id: `phase-${phaseOffset + phases.length + 1}`,
        name: section[1] ?? "",
        priority: phaseOffset + phases.length,
        tasks: [],
        source: locate(sourceFile, lineNumber),
      };
      task = undefined;
      inAcceptanceCriteria = false;
      continue;
    }

    const story = STORY_PATTERN.exec(line);
    if (story && phase) {
      const [, explicitId, name = ""] = story;
      task = {
        id: explicitId ?? defaultTaskId(phaseOffset + phases.length + 1, phase.tasks.length + 1),
        name,
        description: "",
        status: "pending",
        priority: phase.tasks.length,
        dependencies: [],
        phaseId: phase.id,
        attempts: 0,
        source: locate(sourceFile, lineNumber),
      };
      phase.tasks.push(task);
      inAcceptanceCriteria = false;
      continue;
    }

    if (ACCEPTANCE_CRITERIA_PATTERN.test(line)) {
      inAcceptanceCriteria = true;
      continue;
    }
    if (!task) {
      continue;
    }

    const status = PRD_STATUS_PATTERN.exec(line);
    if (status?.[1]) {
      task.status = parseStoryStatus(status[1]);
      continue;
    }
    const priority = PRD_PRIORITY_PATTERN.exec(line);
    if (priority?.[1]) {
      task.priority = parsePriority(priority[1]);
      continue;
    }
    const dependencies = PRD_DEPENDENCIES_PATTERN.exec(line);
    if (dependencies?.[1]) {
      task.dependencies.push(...parseDependencyList(dependencies[1]));
      continue;
    }

    const criterion = inAcceptanceCriteria ? CRITERION_PATTERN.exec(line) : null;
    if (criterion) {
      const [, mark = " ", text = ""] = criterion;
      const entry = `- [${mark}] ${text}`;
      task.description = task.description ? `${task.description}\n${entry}` : entry;
      if (mark === " ") {
        task.status = "pending";
      }
    }
  }

  closePhase();
  return phases;
}

export function parseMarkdown(content: string, sourceFile?: string): ProjectDraft {
  const phases =
    detectMarkdownFormat(content) === "prd"
      ? parsePrdPhases(content, sourceFile)
      : parsePlanPhases(content, sourceFile);

  return {
    name: extractTitle(content) ?? UNNAMED_PROJECT,
    description: "",
    phases,
  };
}

/** Format problems a plan or PRD document has before it is ever run. */
export function validateMarkdownFormat(content: string): string[] {
  const lines = splitContentLines(content);
  const errors: string[] = [];

  if (!lines.some((line) => /^#\s+\S/.test(line))) {
    errors.push("Missing project title (# heading)");
  }
  if (!lines.some((line) => SECTION_PATTERN.test(line))) {
    errors.push("No phase headers found (## headings)");
  }

  const format = detectMarkdownFormat(content);
  if (format === "unknown") {
    errors.push("No tasks found (checkbox items or user stories)");
  }

  const seenTaskIds = new Set<string>();
  for (const line of lines) {
    const taskId = CHECKBOX_TASK_PATTERN.exec(line)?.[3];
    if (!taskId) {
      continue;
    }
    if (seenTaskIds.has(taskId)) {
      errors.push(`Duplicate task ID: ${taskId}`);
    }
    seenTaskIds.add(taskId);
  }

  if (format === "prd") {
    if (!lines.some((line) => /^##\s+User\s+Stories/i.test(line))) {
      errors.push("PRD missing 'User Stories' section");
    }
    const seenStoryIds = new Set<string>();
    for (const line of lines) {
      const storyId = STORY_PATTERN.exec(line)?.[1];
      if (!storyId) {
        continue;
      }
      if (seenStoryIds.has(storyId)) {
        errors.push(`Duplicate user story ID: ${storyId}`);
      }
      seenStoryIds.add(storyId);
    }
  }

  return errors;
}
