import { describe, expect, test } from "vitest";

import { InputInvalidError } from "../errors";
import { makeProject, makeTask } from "../model/test-helpers";
import { assertValidProjectGraph, validateProjectGraph } from "./graph-validation";

describe("validateProjectGraph", () => {
  test("accepts a well-formed graph", () => {
    const project = makeProject({
      phases: [
        { id: "P1", tasks: [{ id: "A" }, { id: "B", dependencies: ["A"] }] },
        { id: "P2", tasks: [{ id: "C", dependencies: ["B"] }] },
      ],
    });

    expect(validateProjectGraph(project)).toEqual({ issues: [], warnings: [] });
  });

  test("rejects an empty project", () => {
    const report = validateProjectGraph(makeProject({ phases: [{ id: "P1", tasks: [] }] }));

    expect(report.issues).toEqual([{ kind: "EMPTY_PROJECT", message: "Project has no tasks." }]);
  });

  test("reports duplicate ids, self dependencies and misplaced tasks", () => {
    const project = makeProject({
      phases: [
        { id: "P1", tasks: [{ id: "A" }, { id: "B", dependencies: ["B"] }] },
        { id: "P1", tasks: [{ id: "A" }] },
      ],
    });
    const first = project.phases[0];
    if (!first) {
      throw new Error("missing phase");
    }
    first.tasks.push(makeTask("P9", { id: "C" }));

    expect(validateProjectGraph(project).issues.map((issue) => issue.kind)).toEqual([
      "SELF_DEPENDENCY",
      "PHASE_MISMATCH",
      "DUPLICATE_PHASE_ID",
      "DUPLICATE_TASK_ID",
    ]);
  });

  test("warns about dependencies on unknown tasks", () => {
    const project = makeProject({
      phases: [{ id: "P1", tasks: [{ id: "A", dependencies: ["GHOST"] }] }],
    });

    expect(validateProjectGraph(project)).toEqual({
      issues: [],
      warnings: [
        {
          kind: "UNKNOWN_DEPENDENCY",
          message: "Task A depends on unknown task GHOST; it can never be scheduled.",
          taskId: "A",
          dependencyId: "GHOST",
        },
      ],
    });
  });
});

describe("assertValidProjectGraph", () => {
  test("throws InputInvalidError listing every issue", () => {
    const project = makeProject({
      phases: [{ id: "P1", tasks: [{ id: "A", dependencies: ["A"] }] }],
    });

    expect(() => assertValidProjectGraph(project)).toThrow(InputInvalidError);
    expect(() => assertValidProjectGraph(project)).toThrow(
      "Task graph is invalid (1 issue): Task A depends on itself.",
    );
  });

  test("returns warnings for a runnable graph", () => {
    const project = makeProject({
      phases: [{ id: "P1", tasks: [{ id: "A", dependencies: ["Z"] }] }],
    });

    expect(assertValidProjectGraph(project)).toHaveLength(1);
  });
});
