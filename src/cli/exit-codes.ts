import type { LoopOutcome } from "../engine/orchestration-loop";
import { ConfigurationError, InputInvalidError } from "../errors";
import { listTasks } from "../model/project-view";

export const EXIT_CODES = {
  COMPLETE: 0,
  FATAL: 1,
  BLOCKED: 2,
  TASK_FAILED: 3,
  CONFIGURATION: 4,
  ITERATION_CAP: 5,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForOutcome(outcome: Pick<LoopOutcome, "kind" | "project">): ExitCode {
  const hasFailedTasks = listTasks(outcome.project).some((task) => task.status === "failed");

  switch (outcome.kind) {
    case "completed":
      return EXIT_CODES.COMPLETE;
    case "cancelled":
      return EXIT_CODES.INTERRUPTED;
    case "task-failed":
      return EXIT_CODES.TASK_FAILED;
    case "blocked":
      return hasFailedTasks ? EXIT_CODES.TASK_FAILED : EXIT_CODES.BLOCKED;
    case "iteration-cap":
      return hasFailedTasks ? EXIT_CODES.TASK_FAILED : EXIT_CODES.ITERATION_CAP;
  }
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigurationError || error instanceof InputInvalidError) {
    return EXIT_CODES.CONFIGURATION;
  }
  return EXIT_CODES.FATAL;
}
