import { buildTaskIndex, listTasks, mapTasks } from "../model/project-view";
import type { Phase, Project, Task, TaskStatus } from "../types";

export type UnmetReason =
  | "missing"
  | "failed"
  | "blocked"
  | "skipped"
  | "in_progress"
  | "cycle"
  | "pending";

export type UnmetDependency = {
  dependencyId: string;
  reason: UnmetReason;
};

export type BlockedTask = {
  taskId: string;
  unmet: UnmetDependency[];
};

export type ScheduleDiagnosis =
  | { kind: "done" }
  | { kind: "eligible"; task: Task }
  | {
      kind: "blocked";
      /** Pending tasks that can never become eligible as things stand. */
      tasks: BlockedTask[];
      cycles: string[][];
      /** Tasks that ended `failed` or `blocked` and hold the project open. */
      stuckTaskIds: string[];
    };

const SETTLED_STATUSES: readonly TaskStatus[] = ["completed", "skipped"];

function byPriorityThenDeclaration<T extends { priority: number }>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((left, right) => left.item.priority - right.item.priority || left.index - right.index)
    .map(({ item }) => item);
}

/** Tasks in the order the scheduler considers them. */
export function orderTasksForScheduling(project: Pick<Project, "phases">): Task[] {
  return byPriorityThenDeclaration<Phase>(project.phases).flatMap((phase) =>
    byPriorityThenDeclaration(phase.tasks),
  );
}

function dependenciesMet(task: Task, index: Map<string, Task>): boolean {
  return task.dependencies.every(
    (dependencyId) => index.get(dependencyId)?.status === "completed",
  );
}

/**
 * Picks the next task to dispatch: the first `pending` task, in phase then
 * task priority order, whose dependencies are all `completed`.  A dependency
 * id that resolves to no task is never satisfied.
 */
export function selectNext(project: Pick<Project, "phases">): Task | undefined {
  const index = buildTaskIndex(project);
  return orderTasksForScheduling(project).find(
    (task) => task.status === "pending" && dependenciesMet(task, index),
  );
}

// Tarjan's strongly connected components over pending -> pending edges.
function findCycles(pending: Task[], index: Map<string, Task>): string[][] {
  const order = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];
  let counter = 0;

  const pendingDeps = (task: Task): string[] =>
    task.dependencies.filter((id) => index.get(id)?.status === "pending");

  const visit = (taskId: string): void => {
    order.set(taskId, counter);
    lowLink.set(taskId, counter);
    counter += 1;
    stack.push(taskId);
    onStack.add(taskId);

    const task = index.get(taskId);
    for (const dependencyId of task ? pendingDeps(task) : []) {
      if (!order.has(dependencyId)) {
        visit(dependencyId);
        lowLink.set(
          taskId,
          Math.min(lowLink.get(taskId) ?? 0, lowLink.get(dependencyId) ?? 0),
        );
      } else if (onStack.has(dependencyId)) {
        lowLink.set(
          taskId,
          Math.min(lowLink.get(taskId) ?? 0, order.get(dependencyId) ?? 0),
        );
      }
    }

    if (lowLink.get(taskId) !== order.get(taskId)) {
      return;
    }

    const component: string[] = [];
    let member: string | undefined;
    do {
      member = stack.pop();
      if (member !== undefined) {
        onStack.delete(member);
        component.push(member);
      }
    } while (member !== undefined && member !== taskId);

    const selfLoop = task?.dependencies.includes(taskId) ?? false;
    if (component.length > 1 || selfLoop) {
      cycles.push(component);
    }
  };

  for (const task of pending) {
    if (!order.has(task.id)) {
      visit(task.id);
    }
  }

  const declarationOrder = new Map(pending.map((task, position) => [task.id, position]));
  return cycles.map((cycle) =>
    [...cycle].sort(
      (left, right) => (declarationOrder.get(left) ?? 0) - (declarationOrder.get(right) ?? 0),
    ),
  );
}

/**
 * Explains why {@link selectNext} came back empty: either every task is
 * settled, or the remaining work is stuck on failed, missing or cyclic
 * dependencies.
 */
export function diagnoseBlocked(project: Pick<Project, "phases">): ScheduleDiagnosis {
  const next = selectNext(project);
  if (next) {
    return { kind: "eligible", task: next };
  }

  const tasks = listTasks(project);
  if (tasks.every((task) => SETTLED_STATUSES.includes(task.status))) {
    return { kind: "done" };
  }

  const index = buildTaskIndex(project);
  const pending = orderTasksForScheduling(project).filter((task) => task.status === "pending");
  const cycles = findCycles(pending, index);
  const onCycle = new Set(cycles.flat());

  const blocked = pending.map<BlockedTask>((task) => ({
    taskId: task.id,
    unmet: task.dependencies
      .map<UnmetDependency | undefined>((dependencyId) => {
        const dependency = index.get(dependencyId);
        if (!dependency) {
          return { dependencyId, reason: "missing" };
        }
        switch (dependency.status) {
          case "completed":
            return undefined;
          case "pending":
            return {
              dependencyId,
              reason: onCycle.has(dependencyId) && onCycle.has(task.id) ? "cycle" : "pending",
            };
          default:
            return { dependencyId, reason: dependency.status };
        }
      })
      .filter((entry): entry is UnmetDependency => entry !== undefined),
  }));

  return {
    kind: "blocked",
    tasks: blocked,
    cycles,
    stuckTaskIds: tasks
      .filter((task) => task.status === "failed" || task.status === "blocked")
      .map((task) => task.id),
  };
}

export function formatDiagnosis(diagnosis: ScheduleDiagnosis): string[] {
  if (diagnosis.kind !== "blocked") {
    return [];
  }

  const lines = diagnosis.tasks.map((entry) => {
    const reasons = entry.unmet
      .map((unmet) => `${unmet.dependencyId} (${unmet.reason})`)
      .join(", ");
    return `${entry.taskId} waits on ${reasons || "nothing"}`;
  });
  for (const cycle of diagnosis.cycles) {
    lines.push(`Dependency cycle: ${[...cycle, cycle[0]].join(" -> ")}`);
  }
  if (diagnosis.stuckTaskIds.length > 0) {
    lines.push(`Failed or blocked: ${diagnosis.stuckTaskIds.join(", ")}`);
  }
  return lines;
}

/**
 * Returns tasks left `in_progress` by an interrupted run to `pending`.
 * Attempt counters are kept so the retry cap still applies across runs.
 */
export function reconcileInterrupted(project: Project): {
  project: Project;
  reconciledTaskIds: string[];
} {
  const reconciledTaskIds: string[] = [];
  const next = mapTasks(project, (task) => {
    if (task.status !== "in_progress") {
      return task;
    }
    reconciledTaskIds.push(task.id);
    return { ...task, status: "pending" };
  });

  return { project: reconciledTaskIds.length > 0 ? next : project, reconciledTaskIds };
}
