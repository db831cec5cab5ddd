import { buildTaskIndex, deriveProjectStatus } from "../model/project-view";
import type { Project, Task } from "../types";

export type MergeReport = {
  keptTaskIds: string[];
  addedTaskIds: string[];
  removedTaskIds: string[];
  /** Pending in state but already checked off in the source document. */
  completedFromSourceIds: string[];
};

export type MergeResult = {
  project: Project;
  report: MergeReport;
};

function mergeTask(parsed: Task, persisted: Task): { task: Task; completedFromSource: boolean } {
  const completedFromSource =
    parsed.status === "completed" && persisted.status === "pending";

  return {
    completedFromSource,
    task: {
      ...parsed,
      status: completedFromSource ? "completed" : persisted.status,
      startedAt: persisted.startedAt,
      completedAt: persisted.completedAt,
      iteration: persisted.iteration,
      attempts: persisted.attempts,
      lastError: persisted.lastError,
      notes: persisted.notes,
    },
  };
}

/**
 * Reconciles a freshly parsed tree with persisted state.  Structure and order
 * come from the parsed input; execution progress comes from state.  Tasks the
 * input no longer mentions are dropped.
 */
export function mergeWithExisting(
  existing: Project,
  parsed: Pick<Project, "name" | "description" | "phases">,
): MergeResult {
  const persistedTasks = buildTaskIndex(existing);
  const report: MergeReport = {
    keptTaskIds: [],
    addedTaskIds: [],
    removedTaskIds: [],
    completedFromSourceIds: [],
  };
  const seen = new Set<string>();

  const phases = parsed.phases.map((phase) => ({
    ...phase,
    tasks: phase.tasks.map((task) => {
      seen.add(task.id);
      const persisted = persistedTasks.get(task.id);
      if (!persisted) {
        report.addedTaskIds.push(task.id);
        return task;
      }

      report.keptTaskIds.push(task.id);
      const merged = mergeTask(task, persisted);
      if (merged.completedFromSource) {
        report.completedFromSourceIds.push(task.id);
      }
      return merged.task;
    }),
  }));

  for (const taskId of persistedTasks.keys()) {
    if (!seen.has(taskId)) {
      report.removedTaskIds.push(taskId);
    }
  }

  const merged: Project = {
    ...existing,
    name: parsed.name,
    description: parsed.description,
    phases,
  };

  return {
    project: { ...merged, status: deriveProjectStatus(merged) },
    report,
  };
}

export function hasChanges(report: MergeReport): boolean {
  return (
    report.addedTaskIds.length > 0 ||
    report.removedTaskIds.length > 0 ||
    report.completedFromSourceIds.length > 0
  );
}
