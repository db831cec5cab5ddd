import { randomUUID } from "node:crypto";
import { z } from "zod";

import {
  AgentAdapterIdSchema,
  IterationOutcomeSchema,
  TaskStatusSchema,
} from "./index";

export const RuntimeEventSourceSchema = z.enum([
  "ORCHESTRATION_LOOP",
  "EXECUTION_SUPERVISOR",
  "CLI",
]);
export type RuntimeEventSource = z.infer<typeof RuntimeEventSourceSchema>;

export const SupervisorStateSchema = z.enum([
  "BUILDING",
  "RUNNING",
  "COMPLETED",
  "TIMED_OUT",
  "FAILED",
  "CLASSIFIED",
  "APPLIED",
  "CANCELLED",
]);
export type SupervisorState = z.infer<typeof SupervisorStateSchema>;

export const LoopOutcomeKindSchema = z.enum([
  "completed",
  "blocked",
  "iteration-cap",
  "task-failed",
  "cancelled",
]);
export type LoopOutcomeKind = z.infer<typeof LoopOutcomeKindSchema>;

const RuntimeEventBaseSchema = z.object({
  version: z.literal(1),
  eventId: z.string().uuid(),
  occurredAt: z.string().datetime(),
  source: RuntimeEventSourceSchema,
  projectName: z.string().min(1).optional(),
  identity: z.string().min(1).optional(),
  phaseId: z.string().optional(),
  taskId: z.string().optional(),
  taskTitle: z.string().min(1).optional(),
  iteration: z.number().int().positive().optional(),
  adapterId: AgentAdapterIdSchema.optional(),
});

export const IterationStartEventSchema = RuntimeEventBaseSchema.extend({
  family: z.literal("iteration"),
  type: z.literal("iteration.start"),
  payload: z.object({
    message: z.string().min(1),
  }),
});

export const IterationFinishEventSchema = RuntimeEventBaseSchema.extend({
  family: z.literal("iteration"),
  type: z.literal("iteration.finish"),
  payload: z.object({
    outcome: IterationOutcomeSchema,
    tasksCompleted: z.array(z.string()),
    message: z.string().min(1),
  }),
});

export const TaskLifecycleStartEventSchema = RuntimeEventBaseSchema.extend({
  family: z.literal("task-lifecycle"),
  type: z.literal("task.lifecycle.start"),
  payload: z.object({
    attempt: z.number().int().positive(),
    message: z.string().min(1),
  }),
});

export const TaskLifecycleFinishEventSchema = RuntimeEventBaseSchema.extend({
  family: z.literal("task-lifecycle"),
  type: z.literal("task.lifecycle.finish"),
  payload: z.object({
    status: TaskStatusSchema,
    message: z.string().min(1),
  }),
});

export const SupervisorTransitionEventSchema = RuntimeEventBaseSchema.extend({
  family: z.literal("supervisor"),
  type: z.literal("supervisor.transition"),
  payload: z.object({
    from: SupervisorStateSchema.optional(),
    to: SupervisorStateSchema,
    attempt: z.number().int().positive(),
  }),
});

export const AdapterOutputEventSchema = RuntimeEventBaseSchema.extend({
  family: z.literal("adapter-output"),
  type: z.literal("adapter.output"),
  payload: z.object({
    stream: z.enum(["stdout", "stderr"]),
    line: z.string(),
  }),
});

export const TerminalOutcomeEventSchema = RuntimeEventBaseSchema.extend({
  family: z.literal("terminal-outcome"),
  type: z.literal("terminal.outcome"),
  payload: z.object({
    outcome: LoopOutcomeKindSchema,
    summary: z.string().min(1),
    iterationsRun: z.number().int().nonnegative(),
  }),
});

export const RuntimeEventSchema = z.discriminatedUnion("type", [
  IterationStartEventSchema,
  IterationFinishEventSchema,
  TaskLifecycleStartEventSchema,
  TaskLifecycleFinishEventSchema,
  SupervisorTransitionEventSchema,
  AdapterOutputEventSchema,
  TerminalOutcomeEventSchema,
]);
export type RuntimeEvent = z.infer<typeof RuntimeEventSchema>;

export type RuntimeEventContext = {
  source: RuntimeEventSource;
  projectName?: string;
  identity?: string;
  phaseId?: string;
  taskId?: string;
  taskTitle?: string;
  iteration?: number;
  adapterId?: z.infer<typeof AgentAdapterIdSchema>;
};

export type RuntimeEventListener = (event: RuntimeEvent) => void;

export function createRuntimeEvent<T extends RuntimeEvent["type"]>(input: {
  type: T;
  family: Extract<RuntimeEvent, { type: T }>["family"];
  payload: Extract<RuntimeEvent, { type: T }>["payload"];
  context: RuntimeEventContext;
}): Extract<RuntimeEvent, { type: T }> {
  return RuntimeEventSchema.parse({
    version: 1,
    eventId: randomUUID(),
    occurredAt: new Date().toISOString(),
    source: input.context.source,
    projectName: input.context.projectName,
    identity: input.context.identity,
    phaseId: input.context.phaseId,
    taskId: input.context.taskId,
    taskTitle: input.context.taskTitle,
    iteration: input.context.iteration,
    adapterId: input.context.adapterId,
    family: input.family,
    type: input.type,
    payload: input.payload,
  }) as Extract<RuntimeEvent, { type: T }>;
}

export function formatRuntimeEventForCli(event: RuntimeEvent): string {
  switch (event.type) {
    case "iteration.start":
    case "iteration.finish":
    case "task.lifecycle.start":
    case "task.lifecycle.finish":
      return event.payload.message;
    case "supervisor.transition":
      return `${event.taskId ?? "agent"} attempt ${event.payload.attempt}: ${event.payload.from ?? "START"} -> ${event.payload.to}`;
    case "adapter.output":
      return event.payload.line;
    case "terminal.outcome":
      return event.payload.summary;
  }
}
