import { ConfigurationError, StoreWriteError, toErrorMessage } from "../errors";
import {
  completeTask,
  deriveProjectStatus,
  findTask,
  isProjectComplete,
  listTasks,
  updateTask,
} from "../model/project-view";
import { hasChanges, mergeWithExisting, type MergeReport } from "../state/merge";
import type { LockOwner } from "../state/project-lock";
import type { StateStore } from "../state/store";
import type {
  ExecutionSettings,
  IterationRecord,
  Project,
  ProjectDraft,
  SourceDescriptor,
  Task,
} from "../types";
import {
  createRuntimeEvent,
  type LoopOutcomeKind,
  type RuntimeEvent,
  type RuntimeEventContext,
  type RuntimeEventListener,
} from "../types/runtime-events";
import type { RunTaskInput, SupervisorResult } from "./execution-supervisor";
import { assertValidProjectGraph, type GraphWarning } from "./graph-validation";
import { sleepWithSignal } from "./retry";
import { diagnoseBlocked, formatDiagnosis, reconcileInterrupted, type ScheduleDiagnosis } from "./scheduler";
import { applyCompletion, type SyncResult } from "./source-sync";

/** The slice of {@link ExecutionSupervisor} the loop depends on. */
export interface TaskRunner {
  runTask(input: RunTaskInput): Promise<SupervisorResult>;
}

export type SupervisorPaths = {
  statusFilePath: string;
  transcriptsDir: string;
};

export type OrchestrationLoopOptions = {
  store: StateStore;
  execution: ExecutionSettings;
  createRunner: (paths: SupervisorPaths) => TaskRunner;
  owner?: LockOwner;
  syncSource?: (task: Task) => Promise<SyncResult>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
  onEvent?: RuntimeEventListener;
};

export type LoopRunInput = {
  identity: string;
  source: SourceDescriptor;
  /** Freshly parsed input; omitted when resuming from saved state alone. */
  draft?: ProjectDraft;
  signal?: AbortSignal;
};

export type LoopOutcome = {
  kind: LoopOutcomeKind;
  project: Project;
  iterationsRun: number;
  failedTaskIds: string[];
  warnings: GraphWarning[];
  diagnosis?: Extract<ScheduleDiagnosis, { kind: "blocked" }>;
  mergeReport?: MergeReport;
};

function splitOutputLines(chunk: string): string[] {
  return chunk
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}

/**
 * Drives one project to a terminal state: select, dispatch, apply, persist,
 * synchronize, repeat.  The only component that writes state; the store lock
 * is held for the whole run and always released.
 */
export class OrchestrationLoop {
  private readonly options: OrchestrationLoopOptions;
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly syncSource: (task: Task) => Promise<SyncResult>;

  constructor(options: OrchestrationLoopOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleepWithSignal;
    this.syncSource = options.syncSource ?? ((task) => applyCompletion(task));
  }

  async run(input: LoopRunInput): Promise<LoopOutcome> {
    const { store } = this.options;
    await store.acquireLock(input.identity, this.options.owner ?? "CLI_RUN");
    try {
      return await this.runLocked(input);
    } finally {
      await store.releaseLock(input.identity);
    }
  }

  private async runLocked(input: LoopRunInput): Promise<LoopOutcome> {
    const { store, execution } = this.options;
    const prepared = await this.prepare(input);
    let project = prepared.project;
    const failedTaskIds: string[] = [];
    let iterationsRun = 0;

    const finish = (
      kind: LoopOutcomeKind,
      summary: string,
      diagnosis?: Extract<ScheduleDiagnosis, { kind: "blocked" }>,
    ): LoopOutcome => {
      this.emit(
        {
          family: "terminal-outcome",
          type: "terminal.outcome",
          payload: { outcome: kind, summary, iterationsRun },
        },
        this.contextFor(project),
      );
      return {
        kind,
        project,
        iterationsRun,
        failedTaskIds,
        warnings: prepared.warnings,
        diagnosis,
        mergeReport: prepared.mergeReport,
      };
    };

    if (project.status === "completed" && !prepared.changed) {
      return finish("completed", `Project ${project.name} is already complete.`);
    }
    project = await store.save({ ...project, status: deriveProjectStatus(project) }, this.now());

    for (;;) {
      if (input.signal?.aborted) {
        return finish("cancelled", "Run cancelled before the next iteration.");
      }

      const diagnosis = diagnoseBlocked(project);
      if (diagnosis.kind === "done") {
        project = await store.save({ ...project, status: "completed" }, this.now());
        return finish("completed", `All ${listTasks(project).length} tasks completed.`);
      }
      if (diagnosis.kind === "blocked") {
        for (const line of formatDiagnosis(diagnosis)) {
          console.warn(`Execution loop: ${line}`);
        }
        project = await store.save({ ...project, status: "blocked" }, this.now());
        return finish(
          "blocked",
          diagnosis.tasks.length > 0
            ? `Blocked: ${diagnosis.tasks.length} pending task(s) can never become eligible.`
            : `No runnable tasks remain; failed or blocked: ${diagnosis.stuckTaskIds.join(", ")}.`,
          diagnosis,
        );
      }
      if (iterationsRun >= execution.maxIterations) {
        return finish(
          "iteration-cap",
          `Stopped after ${iterationsRun} iteration(s); the cap is ${execution.maxIterations}.`,
        );
      }

      const step = await this.runIteration(project, diagnosis.task, input.signal);
      project = step.project;
      iterationsRun += 1;

      switch (step.result.kind) {
        case "cancelled":
          return finish("cancelled", `Run cancelled during ${diagnosis.task.id}.`);
        case "all-complete":
          return finish("completed", "Agent reported the whole project complete.");
        case "failed":
          failedTaskIds.push(diagnosis.task.id);
          if (!execution.continueOnTaskFailure) {
            return finish("task-failed", `Task ${diagnosis.task.id} failed; stopping as configured.`);
          }
          break;
        default:
          break;
      }

      if (execution.sleepBetweenMs > 0) {
        await this.sleep(execution.sleepBetweenMs, input.signal);
      }
    }
  }

  private async prepare(input: LoopRunInput): Promise<{
    project: Project;
    warnings: GraphWarning[];
    mergeReport?: MergeReport;
    changed: boolean;
  }> {
    const existing = await this.options.store.load(input.identity);
    let project: Project;
    let mergeReport: MergeReport | undefined;

    if (existing && input.draft) {
      const merged = mergeWithExisting(existing, input.draft);
      project = merged.project;
      mergeReport = merged.report;
      if (hasChanges(merged.report)) {
        console.info(
          `Execution loop: merged input into saved state (${merged.report.addedTaskIds.length} added, ${merged.report.removedTaskIds.length} removed, ${merged.report.completedFromSourceIds.length} completed in source).`,
        );
      }
    } else if (existing) {
      project = existing;
    } else if (input.draft) {
      const createdAt = this.now().toISOString();
      project = {
        identity: input.identity,
        source: input.source,
        name: input.draft.name,
        description: input.draft.description,
        status: deriveProjectStatus(input.draft),
        phases: input.draft.phases,
        iterations: [],
        currentIteration: 0,
        createdAt,
        updatedAt: createdAt,
      };
    } else {
      throw new ConfigurationError(
        `No saved state for project ${input.identity}; run it with its source first.`,
      );
    }

    const warnings = assertValidProjectGraph(project);
    for (const warning of warnings) {
      console.warn(`Execution loop: ${warning.message}`);
    }

    const reconciled = reconcileInterrupted(project);
    if (reconciled.reconciledTaskIds.length > 0) {
      console.info(
        `Execution loop: returned interrupted task(s) to pending: ${reconciled.reconciledTaskIds.join(", ")}.`,
      );
    }

    return {
      project: reconciled.project,
      warnings,
      mergeReport,
      changed:
        !existing ||
        (mergeReport !== undefined && hasChanges(mergeReport)) ||
        reconciled.reconciledTaskIds.length > 0,
    };
  }

  private async runIteration(
    initial: Project,
    selected: Task,
    signal: AbortSignal | undefined,
  ): Promise<{ project: Project; result: SupervisorResult }> {
    const { store, execution } = this.options;
    const identity = initial.identity;
    const iteration = initial.currentIteration + 1;
    const startedAt = this.now().toISOString();

    let project = updateTask(
      { ...initial, currentIteration: iteration, status: "in_progress" },
      selected.id,
      (task) => ({ ...task, status: "in_progress", startedAt: task.startedAt ?? startedAt }),
    );
    project = await store.save(project, this.now());
    const dispatched = findTask(project, selected.id) ?? selected;
    const context = { ...this.contextFor(project, dispatched), iteration };

    this.emit(
      {
        family: "iteration",
        type: "iteration.start",
        payload: { message: `Iteration ${iteration}: ${dispatched.id} ${dispatched.name}` },
      },
      context,
    );
    this.emit(
      {
        family: "task-lifecycle",
        type: "task.lifecycle.start",
        payload: {
          attempt: dispatched.attempts + 1,
          message: `Starting ${dispatched.id} (attempt ${dispatched.attempts + 1}).`,
        },
      },
      context,
    );

    const runner = this.options.createRunner({
      statusFilePath: store.agentStatusFilePath(identity),
      transcriptsDir: store.transcriptsDir(identity),
    });

    let result: SupervisorResult;
    try {
      result = await runner.runTask({
        project,
        task: dispatched,
        iteration,
        signal,
        onTransition: (from, to, attempt) =>
          this.emit(
            {
              family: "supervisor",
              type: "supervisor.transition",
              payload: { from, to, attempt },
            },
            context,
          ),
        onOutput: (chunk, stream) => {
          for (const line of splitOutputLines(chunk)) {
            this.emit(
              { family: "adapter-output", type: "adapter.output", payload: { stream, line } },
              context,
            );
          }
        },
        onAttemptFinished: async (_summary, task) => {
          project = await store.save(updateTask(project, task.id, () => task), this.now());
        },
      });
    } catch (error) {
      if (!(error instanceof StoreWriteError)) {
        await store.save(
          updateTask(project, dispatched.id, (task) => ({ ...task, status: "pending" })),
          this.now(),
        );
      }
      throw error;
    }

    project = updateTask(project, dispatched.id, () => result.task);
    const tasksCompleted: string[] = [];
    let finalTask = result.task;

    if (result.kind === "completed" || result.kind === "all-complete") {
      const completion = completeTask(project, dispatched.id, { iteration, now: this.now() });
      if (completion.kind === "completed") {
        project = completion.project;
        finalTask = completion.task;
        tasksCompleted.push(dispatched.id);
      } else {
        console.warn(
          `Execution loop: ${dispatched.id} reported done but cannot be completed (${completion.kind}); returning it to pending.`,
        );
        finalTask = { ...result.task, status: "pending" };
        project = updateTask(project, dispatched.id, () => finalTask);
      }
    }

    let status = deriveProjectStatus(project);
    if (result.kind === "all-complete") {
      status = "completed";
      if (!isProjectComplete(project)) {
        const open = listTasks(project).filter((task) => task.status !== "completed").length;
        console.warn(
          `Execution loop: agent reported the project complete but ${open} task(s) are not completed.`,
        );
      }
    }

    const lastAttempt = result.attempts[result.attempts.length - 1];
    const record: IterationRecord = {
      number: iteration,
      startedAt,
      endedAt: this.now().toISOString(),
      taskId: dispatched.id,
      tasksCompleted,
      outcome: result.lastOutcome,
      attempts: result.attempts.length,
      error: tasksCompleted.length > 0 ? undefined : (result.reason ?? finalTask.lastError),
      transcriptPath: lastAttempt?.transcriptPath,
      transcriptTail: result.transcriptTail || undefined,
    };

    project = await store.save(
      { ...project, status, iterations: [...project.iterations, record] },
      this.now(),
    );
    await store.appendIteration(identity, record);

    this.emit(
      {
        family: "task-lifecycle",
        type: "task.lifecycle.finish",
        payload: { status: finalTask.status, message: `${dispatched.id} is now ${finalTask.status}.` },
      },
      context,
    );
    this.emit(
      {
        family: "iteration",
        type: "iteration.finish",
        payload: {
          outcome: record.outcome,
          tasksCompleted,
          message: `Iteration ${iteration} finished: ${record.outcome}.`,
        },
      },
      context,
    );

    if (tasksCompleted.length > 0 && execution.updateSource) {
      await this.synchronize(finalTask);
    }

    return { project, result };
  }

  private async synchronize(task: Task): Promise<void> {
    let result: SyncResult;
    try {
      result = await this.syncSource(task);
    } catch (error) {
      console.warn(`Source sync: could not update ${task.id}: ${toErrorMessage(error)}`);
      return;
    }

    if (result.kind === "skipped") {
      console.warn(`Source sync: skipped ${task.id}: ${result.reason}`);
    } else if (result.kind === "updated") {
      console.info(`Source sync: marked ${task.id} done in ${result.file}:${result.line}.`);
    }
  }

  private contextFor(project: Project, task?: Task): RuntimeEventContext {
    return {
      source: "ORCHESTRATION_LOOP",
      projectName: project.name,
      identity: project.identity,
      phaseId: task?.phaseId,
      taskId: task?.id,
      taskTitle: task?.name,
    };
  }

  private emit<T extends RuntimeEvent["type"]>(
    event: Omit<Parameters<typeof createRuntimeEvent<T>>[0], "context">,
    context: RuntimeEventContext,
  ): void {
    if (!this.options.onEvent) {
      return;
    }
    this.options.onEvent(createRuntimeEvent({ ...event, context }));
  }
}
