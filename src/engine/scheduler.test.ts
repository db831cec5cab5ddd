import { describe, expect, test } from "vitest";

import { completeTask } from "../model/project-view";
import { makeProject, type PhaseFixture } from "../model/test-helpers";
import type { Project } from "../types";
import {
  diagnoseBlocked,
  formatDiagnosis,
  orderTasksForScheduling,
  reconcileInterrupted,
  selectNext,
} from "./scheduler";

function complete(project: Project, taskId: string): Project {
  const result = completeTask(project, taskId, { iteration: 1, now: new Date() });
  if (result.kind !== "completed") {
    throw new Error(`could not complete ${taskId}: ${result.kind}`);
  }
  return result.project;
}

// Deterministic pseudo-random sequence so failures are reproducible.
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1_664_525 + 1_013_904_223) >>> 0;
    return state / 0x1_0000_0000;
  };
}

function randomDag(seed: number): Project {
  const random = seededRandom(seed);
  const taskCount = 3 + Math.floor(random() * 10);
  const phaseCount = 1 + Math.floor(random() * 3);
  const phases: PhaseFixture[] = Array.from({ length: phaseCount }, (_, index) => ({
    id: `phase-${index + 1}`,
    priority: Math.floor(random() * 3),
    tasks: [],
  }));
  for (let index = 0; index < taskCount; index += 1) {
    // Dependencies only point at lower indices, so the graph is acyclic.
    const dependencies = Array.from({ length: index }, (_, candidate) => `T${candidate}`).filter(
      () => random() < 0.3,
    );
    const phase = phases[Math.floor(random() * phaseCount)];
    phase?.tasks.push({
      id: `T${index}`,
      priority: Math.floor(random() * 3),
      dependencies,
    });
  }
  return makeProject({ phases });
}

describe("selectNext", () => {
  test("selects a task before the task that depends on it", () => {
    let project = makeProject({
      phases: [
        {
          id: "p1",
          tasks: [
            { id: "T2", priority: 1, dependencies: ["T1"] },
            { id: "T1", priority: 1 },
          ],
        },
      ],
    });

    expect(selectNext(project)?.id).toBe("T1");
    project = complete(project, "T1");
    expect(selectNext(project)?.id).toBe("T2");
    project = complete(project, "T2");
    expect(selectNext(project)).toBeUndefined();
  });

  test("breaks priority ties by declaration order", () => {
    const project = makeProject({
      phases: [{ id: "p1", tasks: [{ id: "T1", priority: 1 }, { id: "T2", priority: 1 }] }],
    });

    expect(selectNext(project)?.id).toBe("T1");
  });

  test("orders phases by priority before tasks", () => {
    const project = makeProject({
      phases: [
        { id: "late", priority: 2, tasks: [{ id: "A", priority: 0 }] },
        { id: "early", priority: 1, tasks: [{ id: "C", priority: 5 }, { id: "B", priority: 3 }] },
      ],
    });

    expect(orderTasksForScheduling(project).map((task) => task.id)).toEqual(["B", "C", "A"]);
    expect(selectNext(project)?.id).toBe("B");
  });

  test("never selects a task whose status is not pending", () => {
    const project = makeProject({
      phases: [
        {
          id: "p1",
          tasks: [
            { id: "A", status: "in_progress" },
            { id: "B", status: "failed" },
            { id: "C", status: "blocked" },
            { id: "D", status: "skipped" },
            { id: "E", status: "completed" },
            { id: "F" },
          ],
        },
      ],
    });

    expect(selectNext(project)?.id).toBe("F");
  });

  test("treats an unknown dependency as unmet", () => {
    const project = makeProject({
      phases: [{ id: "p1", tasks: [{ id: "A", dependencies: ["ghost"] }] }],
    });

    expect(selectNext(project)).toBeUndefined();
  });

  test("respects a topological order on random dependency graphs", () => {
    for (let seed = 1; seed <= 60; seed += 1) {
      let project = randomDag(seed);
      const completed = new Set<string>();
      let guard = 0;

      for (let next = selectNext(project); next; next = selectNext(project)) {
        for (const dependencyId of next.dependencies) {
          expect(completed.has(dependencyId)).toBe(true);
        }
        expect(next.status).toBe("pending");
        completed.add(next.id);
        project = complete(project, next.id);
        guard += 1;
        expect(guard).toBeLessThan(100);
      }

      expect(diagnoseBlocked(project)).toEqual({ kind: "done" });
    }
  });
});

describe("diagnoseBlocked", () => {
  test("reports an eligible task when one exists", () => {
    const project = makeProject({ phases: [{ id: "p1", tasks: [{ id: "A" }] }] });

    expect(diagnoseBlocked(project)).toMatchObject({ kind: "eligible", task: { id: "A" } });
  });

  test("treats skipped tasks as settled", () => {
    const project = makeProject({
      phases: [{ id: "p1", tasks: [{ id: "A", status: "completed" }, { id: "B", status: "skipped" }] }],
    });

    expect(diagnoseBlocked(project)).toEqual({ kind: "done" });
  });

  test("finds cycles among the remaining pending tasks", () => {
    const project = makeProject({
      phases: [
        {
          id: "p1",
          tasks: [
            { id: "A", dependencies: ["C"] },
            { id: "B", dependencies: ["A"] },
            { id: "C", dependencies: ["B"] },
            { id: "D", dependencies: ["A"] },
          ],
        },
      ],
    });

    const diagnosis = diagnoseBlocked(project);

    expect(diagnosis).toEqual({
      kind: "blocked",
      cycles: [["A", "B", "C"]],
      stuckTaskIds: [],
      tasks: [
        { taskId: "A", unmet: [{ dependencyId: "C", reason: "cycle" }] },
        { taskId: "B", unmet: [{ dependencyId: "A", reason: "cycle" }] },
        { taskId: "C", unmet: [{ dependencyId: "B", reason: "cycle" }] },
        { taskId: "D", unmet: [{ dependencyId: "A", reason: "pending" }] },
      ],
    });
    expect(formatDiagnosis(diagnosis)).toEqual([
      "A waits on C (cycle)",
      "B waits on A (cycle)",
      "C waits on B (cycle)",
      "D waits on A (pending)",
      "Dependency cycle: A -> B -> C -> A",
    ]);
  });

  test("explains missing and failed dependencies", () => {
    const project = makeProject({
      phases: [
        {
          id: "p1",
          tasks: [
            { id: "A", status: "failed" },
            { id: "B", dependencies: ["A", "ghost"] },
          ],
        },
      ],
    });

    expect(diagnoseBlocked(project)).toEqual({
      kind: "blocked",
      cycles: [],
      stuckTaskIds: ["A"],
      tasks: [
        {
          taskId: "B",
          unmet: [
            { dependencyId: "A", reason: "failed" },
            { dependencyId: "ghost", reason: "missing" },
          ],
        },
      ],
    });
  });

  test("reports failed tasks when nothing is pending", () => {
    const project = makeProject({
      phases: [{ id: "p1", tasks: [{ id: "A", status: "completed" }, { id: "B", status: "failed" }] }],
    });

    expect(diagnoseBlocked(project)).toEqual({
      kind: "blocked",
      cycles: [],
      stuckTaskIds: ["B"],
      tasks: [],
    });
  });
});

describe("reconcileInterrupted", () => {
  test("returns in-progress tasks to pending and keeps attempts", () => {
    const project = makeProject({
      phases: [
        {
          id: "p1",
          tasks: [
            { id: "A", status: "in_progress", attempts: 2 },
            { id: "B", status: "completed" },
          ],
        },
      ],
    });

    const result = reconcileInterrupted(project);

    expect(result.reconciledTaskIds).toEqual(["A"]);
    expect(result.project.phases[0]?.tasks[0]).toMatchObject({ status: "pending", attempts: 2 });
    expect(result.project.phases[0]?.tasks[1]?.status).toBe("completed");
  });

  test("returns the same project when nothing was interrupted", () => {
    const project = makeProject({ phases: [{ id: "p1", tasks: [{ id: "A" }] }] });

    expect(reconcileInterrupted(project).project).toBe(project);
  });
});
