import { computeProgress, summarizePhases } from "../model/project-view";
import type { ExecutionSettings, Project, Task } from "../types";

export const TRUNCATION_SUFFIX = "… (truncated)";

export type IterationPromptInput = {
  project: Project;
  task: Task;
  iteration: number;
  attempt: number;
  settings: Pick<
    ExecutionSettings,
    "commitPrefix" | "customInstructions" | "maxPromptChars" | "updateSource"
  >;
  /** Where the agent may write its structured status instead of printing markers. */
  statusFilePath?: string;
};

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  if (maxChars <= TRUNCATION_SUFFIX.length) {
    return "";
  }
  return `${text.slice(0, maxChars - TRUNCATION_SUFFIX.length)}${TRUNCATION_SUFFIX}`;
}

/**
 * Describes the outcome markers without writing any of them as a line of its
 * own, so an agent that prints its prompt back never reports an outcome.
 */
export function buildMarkerProtocol(taskId: string, statusFilePath?: string): string {
  const lines = [
    `When you stop, print one outcome line on its own, with <id> replaced by ${taskId}:`,
    "- done: TASK_COMPLETE: <id>",
    "- cannot proceed without outside help: TASK_BLOCKED: <id> <reason>",
    "- cannot be done: TASK_FAILED: <id> <reason>",
    "- every task in the project is done: PROJECT_COMPLETE",
    "You may print STATUS: <one line summary> before the outcome line.",
  ];
  if (statusFilePath) {
    lines.push(
      `Instead of printing, you may write {"status": "COMPLETED" | "BLOCKED" | "FAILED", "task_id": "${taskId}", "reason": "..."} to ${statusFilePath}.`,
    );
  }
  return lines.join("\n");
}

function formatPhaseOverview(project: Project): string {
  return summarizePhases(project)
    .map(
      (phase) =>
        `- [${phase.status}] ${phase.name} (${phase.tasksCompleted}/${phase.tasksTotal})`,
    )
    .join("\n");
}

type PromptParts = {
  overview: string;
  description: string;
  instructions: string;
  lastError: string;
  name: string;
};

// Shortened in this order until the prompt fits.
const SHRINKABLE_PARTS = ["overview", "description", "instructions", "lastError", "name"] as const;

function assemble(input: IterationPromptInput, parts: PromptParts): string {
  const { project, task, iteration, attempt, settings } = input;
  const progress = computeProgress(project);
  const percent = Math.round(progress.progress * 100);

  const sections = [
    `You are an autonomous coding agent working on the ${project.name} project. ` +
      `This is iteration ${iteration}, attempt ${attempt}.`,
    `Progress: ${progress.completedTasks}/${progress.totalTasks} tasks completed (${percent}%).`,
    parts.overview ? `Phases:\n${parts.overview}` : "",
    [
      "Current task:",
      `ID: ${task.id}`,
      `Name: ${parts.name}`,
      `Dependencies: ${task.dependencies.length > 0 ? task.dependencies.join(", ") : "none"}`,
      ...(parts.description ? ["Description:", parts.description] : []),
    ].join("\n"),
    attempt > 1 && parts.lastError
      ? `The previous attempt did not finish: ${parts.lastError}`
      : "",
    "Requirements:\n" +
      [
        `- Work on ${task.id} only; do not start other tasks.`,
        "- Run the relevant tests before declaring the task done.",
        ...(settings.commitPrefix.trim()
          ? [
              `- Commit your changes with a message starting with "${settings.commitPrefix.trim()}" that mentions ${task.id}.`,
            ]
          : []),
        ...(settings.updateSource
          ? ["- Do not tick checkboxes in the plan; completion is recorded for you."]
          : []),
      ].join("\n"),
    parts.instructions ? `Additional instructions:\n${parts.instructions}` : "",
    buildMarkerProtocol(task.id, input.statusFilePath),
  ];

  return sections.filter((section) => section.length > 0).join("\n\n");
}

/**
 * Builds the instruction payload for one attempt.  When the result would
 * exceed `maxPromptChars`, the phase overview, task description, custom
 * instructions, previous error and task name are shortened in that order; the
 * marker protocol is always kept whole.  The fixed wording around them is not
 * shortened, so a budget below it still yields a longer prompt.
 */
export function buildIterationPrompt(input: IterationPromptInput): string {
  const maxChars = input.settings.maxPromptChars;
  let parts: PromptParts = {
    overview: formatPhaseOverview(input.project),
    description: input.task.description.trim(),
    instructions: input.settings.customInstructions.trim(),
    lastError: input.task.lastError?.trim() ?? "",
    name: input.task.name,
  };

  let prompt = assemble(input, parts);
  for (const key of SHRINKABLE_PARTS) {
    const overflow = prompt.length - maxChars;
    if (overflow <= 0) {
      break;
    }
    parts = {
      ...parts,
      [key]: truncateText(parts[key], Math.max(0, parts[key].length - overflow)),
    };
    prompt = assemble(input, parts);
  }

  return prompt;
}
