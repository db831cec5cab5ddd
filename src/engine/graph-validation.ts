import { InputInvalidError, type GraphIssue } from "../errors";
import { listTasks } from "../model/project-view";
import type { Project } from "../types";

export type GraphWarning = {
  kind: "UNKNOWN_DEPENDENCY";
  message: string;
  taskId: string;
  dependencyId: string;
};

export type GraphValidationReport = {
  issues: GraphIssue[];
  warnings: GraphWarning[];
};

export function validateProjectGraph(
  project: Pick<Project, "phases">,
): GraphValidationReport {
  const issues: GraphIssue[] = [];
  const warnings: GraphWarning[] = [];

  if (listTasks(project).length === 0) {
    issues.push({ kind: "EMPTY_PROJECT", message: "Project has no tasks." });
  }

  const phaseIds = new Set<string>();
  const taskIds = new Set<string>();
  for (const phase of project.phases) {
    if (phaseIds.has(phase.id)) {
      issues.push({
        kind: "DUPLICATE_PHASE_ID",
        message: `Duplicate phase id ${phase.id}.`,
        phaseId: phase.id,
      });
    }
    phaseIds.add(phase.id);

    for (const task of phase.tasks) {
      if (taskIds.has(task.id)) {
        issues.push({
          kind: "DUPLICATE_TASK_ID",
          message: `Duplicate task id ${task.id}.`,
          taskId: task.id,
          phaseId: phase.id,
        });
      }
      taskIds.add(task.id);

      if (task.dependencies.includes(task.id)) {
        issues.push({
          kind: "SELF_DEPENDENCY",
          message: `Task ${task.id} depends on itself.`,
          taskId: task.id,
          phaseId: phase.id,
        });
      }
      if (task.phaseId !== phase.id) {
        issues.push({
          kind: "PHASE_MISMATCH",
          message: `Task ${task.id} claims phase ${task.phaseId} but belongs to ${phase.id}.`,
          taskId: task.id,
          phaseId: phase.id,
        });
      }
    }
  }

  for (const task of listTasks(project)) {
    for (const dependencyId of task.dependencies) {
      if (!taskIds.has(dependencyId)) {
        warnings.push({
          kind: "UNKNOWN_DEPENDENCY",
          message: `Task ${task.id} depends on unknown task ${dependencyId}; it can never be scheduled.`,
          taskId: task.id,
          dependencyId,
        });
      }
    }
  }

  return { issues, warnings };
}

/** Throws {@link InputInvalidError} when the graph cannot be run at all. */
export function assertValidProjectGraph(
  project: Pick<Project, "phases">,
): GraphWarning[] {
  const report = validateProjectGraph(project);
  if (report.issues.length > 0) {
    throw new InputInvalidError(report.issues);
  }
  return report.warnings;
}
