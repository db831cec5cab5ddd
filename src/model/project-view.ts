import type {
  Phase,
  PhaseStatus,
  Project,
  ProjectStatus,
  Task,
} from "../types";

export type PhaseSummary = {
  id: string;
  name: string;
  status: PhaseStatus;
  tasksCompleted: number;
  tasksTotal: number;
};

export type ProgressSnapshot = {
  totalTasks: number;
  completedTasks: number;
  progress: number;
};

export function derivePhaseStatus(phase: Pick<Phase, "tasks">): PhaseStatus {
  if (phase.tasks.every((task) => task.status === "completed")) {
    return "completed";
  }
  if (phase.tasks.some((task) => task.status !== "pending")) {
    return "in_progress";
  }
  return "pending";
}

export function listTasks(project: Pick<Project, "phases">): Task[] {
  return project.phases.flatMap((phase) => phase.tasks);
}

export function buildTaskIndex(
  project: Pick<Project, "phases">,
): Map<string, Task> {
  const index = new Map<string, Task>();
  for (const task of listTasks(project)) {
    if (!index.has(task.id)) {
      index.set(task.id, task);
    }
  }
  return index;
}

export function findTask(
  project: Pick<Project, "phases">,
  taskId: string,
): Task | undefined {
  return listTasks(project).find((task) => task.id === taskId);
}

export function computeProgress(
  project: Pick<Project, "phases">,
): ProgressSnapshot {
  const tasks = listTasks(project);
  const completedTasks = tasks.filter((task) => task.status === "completed").length;
  return {
    totalTasks: tasks.length,
    completedTasks,
    progress: tasks.length === 0 ? 0 : completedTasks / tasks.length,
  };
}

export function summarizePhases(project: Pick<Project, "phases">): PhaseSummary[] {
  return project.phases.map((phase) => ({
    id: phase.id,
    name: phase.name,
    status: derivePhaseStatus(phase),
    tasksCompleted: phase.tasks.filter((task) => task.status === "completed").length,
    tasksTotal: phase.tasks.length,
  }));
}

/**
 * Aggregates phase statuses into the project status.  Terminal verdicts that
 * cannot be derived from the tree (`blocked`, `failed`) are set on top of
 * this by the orchestration loop.
 */
export function deriveProjectStatus(
  project: Pick<Project, "phases">,
): ProjectStatus {
  const tasks = listTasks(project);
  if (tasks.length > 0 && tasks.every((task) => task.status === "completed")) {
    return "completed";
  }
  if (project.phases.some((phase) => derivePhaseStatus(phase) !== "pending")) {
    return "in_progress";
  }
  return "pending";
}

export function isProjectComplete(project: Pick<Project, "phases">): boolean {
  return deriveProjectStatus(project) === "completed";
}

export function mapTasks(
  project: Project,
  mapper: (task: Task, phase: Phase) => Task,
): Project {
  return {
    ...project,
    phases: project.phases.map((phase) => ({
      ...phase,
      tasks: phase.tasks.map((task) => mapper(task, phase)),
    })),
  };
}

export function updateTask(
  project: Project,
  taskId: string,
  update: (task: Task) => Task,
): Project {
  return mapTasks(project, (task) => (task.id === taskId ? update(task) : task));
}

export type TaskCompletionResult =
  | { kind: "completed"; project: Project; task: Task }
  | { kind: "dependencies-unmet"; project: Project; unmet: string[] }
  | { kind: "unknown-task"; project: Project };

/**
 * Marks a task completed, refusing when any dependency is not completed yet.
 * `completedAt` is clamped so it never precedes `startedAt`.
 */
export function completeTask(
  project: Project,
  taskId: string,
  input: { iteration: number; now: Date },
): TaskCompletionResult {
  const index = buildTaskIndex(project);
  const task = index.get(taskId);
  if (!task) {
    return { kind: "unknown-task", project };
  }

  const unmet = task.dependencies.filter(
    (dependencyId) => index.get(dependencyId)?.status !== "completed",
  );
  if (unmet.length > 0) {
    return { kind: "dependencies-unmet", project, unmet };
  }

  const nowIso = input.now.toISOString();
  const startedAt = task.startedAt ?? nowIso;
  const completedAt =
    Date.parse(nowIso) < Date.parse(startedAt) ? startedAt : nowIso;
  const completed: Task = {
    ...task,
    status: "completed",
    startedAt,
    completedAt,
    iteration: input.iteration,
    lastError: undefined,
  };
  const next = updateTask(project, taskId, () => completed);
  return {
    kind: "completed",
    project: { ...next, status: deriveProjectStatus(next) },
    task: completed,
  };
}
