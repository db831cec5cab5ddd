import type { Phase, Project, SourceDescriptor, Task } from "../types";

export const FIXED_NOW = "2026-01-05T10:00:00.000Z";

export type TaskFixture = Partial<Omit<Task, "id">> & { id: string };

export type PhaseFixture = {
  id: string;
  name?: string;
  priority?: number;
  tasks: TaskFixture[];
};

export function makeTask(phaseId: string, fixture: TaskFixture): Task {
  return {
    name: `Task ${fixture.id}`,
    description: "",
    status: "pending",
    priority: 0,
    dependencies: [],
    attempts: 0,
    ...fixture,
    phaseId,
  };
}

export function makePhase(fixture: PhaseFixture): Phase {
  return {
    id: fixture.id,
    name: fixture.name ?? `Phase ${fixture.id}`,
    priority: fixture.priority ?? 0,
    tasks: fixture.tasks.map((task) => makeTask(fixture.id, task)),
  };
}

export function makeProject(input: {
  phases: PhaseFixture[];
  identity?: string;
  name?: string;
  source?: SourceDescriptor;
}): Project {
  return {
    identity: input.identity ?? "0123456789abcdef",
    source: input.source ?? { kind: "path", path: "/work/plan.md" },
    name: input.name ?? "Demo project",
    description: "",
    status: "pending",
    phases: input.phases.map(makePhase),
    iterations: [],
    currentIteration: 0,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
  };
}
