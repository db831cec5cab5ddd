import { z } from "zod";

// 1. Supported agent adapters
export const AgentAdapterIdSchema = z.enum([
  "CLAUDE_CLI",
  "CODEX_CLI",
  "GEMINI_CLI",
  "MOCK_CLI",
]);
export type AgentAdapterId = z.infer<typeof AgentAdapterIdSchema>;
export const AGENT_ADAPTER_IDS: AgentAdapterId[] = [
  "CLAUDE_CLI",
  "CODEX_CLI",
  "GEMINI_CLI",
  "MOCK_CLI",
];

export const AgentContractSchema = z.object({
  id: AgentAdapterIdSchema,
  command: z.string().min(1),
  baseArgs: z.array(z.string()),
});
export type AgentContract = z.infer<typeof AgentContractSchema>;

// 2. Source descriptors (what a project was built from)
export const SourceDescriptorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("path"), path: z.string().min(1) }),
  z.object({ kind: z.literal("prompt"), text: z.string().min(1) }),
]);
export type SourceDescriptor = z.infer<typeof SourceDescriptorSchema>;

export const SourceLocatorSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().positive(),
});
export type SourceLocator = z.infer<typeof SourceLocatorSchema>;

// 3. Task statuses
export const TaskStatusSchema = z.enum([
  "pending",
  "in_progress",
  "completed",
  "blocked",
  "failed",
  "skipped",
]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

// 4. A single unit of work
export const TaskSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  status: TaskStatusSchema.default("pending"),
  priority: z.number().int().default(0),
  dependencies: z.array(z.string().min(1)).default([]),
  phaseId: z.string().min(1),
  startedAt: z.string().datetime().optional(),
  completedAt: z.string().datetime().optional(),
  iteration: z.number().int().positive().optional(),
  attempts: z.number().int().nonnegative().default(0),
  lastError: z.string().optional(),
  notes: z.string().optional(),
  source: SourceLocatorSchema.optional(),
});
export type Task = z.infer<typeof TaskSchema>;

// 5. Phases own their tasks; status is derived, never stored
export const PhaseStatusSchema = z.enum(["pending", "in_progress", "completed"]);
export type PhaseStatus = z.infer<typeof PhaseStatusSchema>;

export const PhaseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  priority: z.number().int().default(0),
  tasks: z.array(TaskSchema),
  source: SourceLocatorSchema.optional(),
});
export type Phase = z.infer<typeof PhaseSchema>;

// 6. Iteration history (append-only)
export const IterationOutcomeSchema = z.enum([
  "success",
  "failure",
  "timeout",
  "blocked",
  "inconclusive",
  "cancelled",
]);
export type IterationOutcome = z.infer<typeof IterationOutcomeSchema>;

export const IterationRecordSchema = z.object({
  number: z.number().int().positive(),
  startedAt: z.string().datetime(),
  endedAt: z.string().datetime(),
  taskId: z.string().min(1),
  tasksCompleted: z.array(z.string().min(1)).default([]),
  outcome: IterationOutcomeSchema,
  attempts: z.number().int().nonnegative().default(0),
  error: z.string().optional(),
  transcriptPath: z.string().optional(),
  transcriptTail: z.string().optional(),
});
export type IterationRecord = z.infer<typeof IterationRecordSchema>;

// 7. Complete project tree
export const ProjectStatusSchema = z.enum([
  "pending",
  "in_progress",
  "completed",
  "blocked",
  "failed",
]);
export type ProjectStatus = z.infer<typeof ProjectStatusSchema>;

export const ProjectSchema = z.object({
  identity: z.string().min(1),
  source: SourceDescriptorSchema,
  name: z.string().min(1),
  description: z.string().default(""),
  status: ProjectStatusSchema.default("pending"),
  phases: z.array(PhaseSchema),
  iterations: z.array(IterationRecordSchema).default([]),
  currentIteration: z.number().int().nonnegative().default(0),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});
export type Project = z.infer<typeof ProjectSchema>;

/** What an input source produces before a project has an identity or history. */
export type ProjectDraft = Pick<Project, "name" | "description" | "phases">;

// 8. JSON task files accepted as input
export const TaskInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  description: z.string().optional(),
  priority: z.number().int().optional(),
  dependencies: z.array(z.string().min(1)).optional(),
  status: TaskStatusSchema.optional(),
});
export type TaskInput = z.infer<typeof TaskInputSchema>;

export const PhaseInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  priority: z.number().int().optional(),
  tasks: z.array(TaskInputSchema),
});
export type PhaseInput = z.infer<typeof PhaseInputSchema>;

export const ProjectInputSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  phases: z.array(PhaseInputSchema),
});
export type ProjectInput = z.infer<typeof ProjectInputSchema>;

// 9. Persisted documents
export const STATE_SCHEMA_VERSION = "1";

export const StateDocumentSchema = z.object({
  schemaVersion: z.string().min(1),
  identity: z.string().min(1),
  source: SourceDescriptorSchema,
  savedAt: z.string().datetime(),
  project: ProjectSchema,
});
export type StateDocument = z.infer<typeof StateDocumentSchema>;

export const StatusSummarySchema = z.object({
  identity: z.string().min(1),
  projectName: z.string().min(1),
  status: ProjectStatusSchema,
  progress: z.number().min(0).max(1),
  totalTasks: z.number().int().nonnegative(),
  completedTasks: z.number().int().nonnegative(),
  currentTaskId: z.string().optional(),
  iteration: z.number().int().nonnegative(),
  source: SourceDescriptorSchema,
  updatedAt: z.string().datetime(),
});
export type StatusSummary = z.infer<typeof StatusSummarySchema>;

// 10. Status file an agent may write instead of printing markers
export const AgentStatusFileSchema = z.object({
  status: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(["COMPLETED", "BLOCKED", "FAILED", "PROJECT_COMPLETE"])),
  task_id: z.string().min(1).optional(),
  reason: z.string().optional(),
});
export type AgentStatusFile = z.infer<typeof AgentStatusFileSchema>;

// 11. Settings
export const AgentSettingsSchema = z.object({
  adapter: AgentAdapterIdSchema.default("CLAUDE_CLI"),
  command: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  extraArgs: z.array(z.string()).default([]),
  skipPermissions: z.boolean().default(true),
});
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;

export const ExecutionSettingsSchema = z.object({
  maxIterations: z.number().int().positive().default(50),
  idleTimeoutMs: z.number().int().positive().default(60_000),
  idleCheckIntervalMs: z.number().int().positive().default(1_000),
  postCompletionGraceMs: z.number().int().nonnegative().default(3_000),
  postCompletionMaxWaitMs: z.number().int().nonnegative().default(10_000),
  killGraceMs: z.number().int().nonnegative().default(5_000),
  sleepBetweenMs: z.number().int().nonnegative().default(2_000),
  continueOnTaskFailure: z.boolean().default(true),
  updateSource: z.boolean().default(true),
  commitPrefix: z.string().default("feat:"),
  customInstructions: z.string().default(""),
  transcriptTailChars: z.number().int().positive().default(2_000),
  maxPromptChars: z.number().int().min(1_000).default(12_000),
});
export type ExecutionSettings = z.infer<typeof ExecutionSettingsSchema>;

export const RetrySettingsSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().nonnegative().default(1_000),
  maxDelayMs: z.number().int().nonnegative().default(60_000),
  exponentialBase: z.number().min(1).default(2),
  jitter: z.boolean().default(true),
  jitterFactor: z.number().min(0).max(1).default(0.1),
});
export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

export const TaskloopSettingsSchema = z
  .object({
    agent: AgentSettingsSchema.default({}),
    execution: ExecutionSettingsSchema.default({}),
    retry: RetrySettingsSchema.default({}),
  })
  .superRefine((value, context) => {
    if (value.retry.maxDelayMs < value.retry.baseDelayMs) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "retry.maxDelayMs must not be smaller than retry.baseDelayMs.",
        path: ["retry", "maxDelayMs"],
      });
    }
    if (value.execution.idleCheckIntervalMs > value.execution.idleTimeoutMs) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "execution.idleCheckIntervalMs must not exceed execution.idleTimeoutMs.",
        path: ["execution", "idleCheckIntervalMs"],
      });
    }
  });
export type TaskloopSettings = z.infer<typeof TaskloopSettingsSchema>;
