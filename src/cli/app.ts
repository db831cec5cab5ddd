import { access, readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";

import { createAdapterFromSettings } from "../adapters";
import {
  ExecutionSupervisor,
  OrchestrationLoop,
  RetryPolicy,
  validateProjectGraph,
  type LoopOutcome,
} from "../engine";
import { ConfigurationError } from "../errors";
import { loadProjectInput, parseJsonInput, parseMarkdown, validateMarkdownFormat } from "../input";
import { computeProgress, listTasks, summarizePhases } from "../model/project-view";
import { ProcessManager, type ProcessRunner } from "../process";
import { FileArtifactWriter } from "../state/artifacts";
import { canonicalizeSource, describeSource, resolveIdentity } from "../state/identity";
import type { LockOwner } from "../state/project-lock";
import { buildStatusSummary, StateStore } from "../state/store";
import {
  AgentAdapterIdSchema,
  TaskStatusSchema,
  type IterationRecord,
  type PhaseStatus,
  type ProjectDraft,
  type SourceDescriptor,
  type TaskloopSettings,
  type TaskStatus,
} from "../types";
import { formatRuntimeEventForCli, type RuntimeEvent } from "../types/runtime-events";
import { CLI_NAME, CommandRegistry, type CommandDefinition } from "./command-registry";
import { exitCodeForOutcome, EXIT_CODES } from "./exit-codes";
import { applyRunOverrides, loadSettings, type RunOverrides } from "./settings";
import { ValidationError } from "./validation";

export const DEFAULT_SOURCE_DIR = "plans";
const DEFAULT_HISTORY_LIMIT = 10;
const VALIDATE_PREVIEW_TASKS = 5;

export type CliEnvironment = {
  cwd: string;
  stateRoot: string;
  settingsFilePath: string;
  signal?: AbortSignal;
  createProcessRunner?: () => ProcessRunner;
  confirm?: (question: string) => Promise<boolean>;
};

const RUN_USAGE =
  "run [source] [--prompt <text>] [--max <n>] [--timeout <seconds>] [--retry <n>] [--sleep <seconds>] [--model <name>] [--agent <id>] [--no-sync] [--stop-on-failure]";
const RESUME_USAGE =
  "resume [source|identity] [--max <n>] [--timeout <seconds>] [--retry <n>] [--sleep <seconds>] [--model <name>] [--agent <id>] [--no-sync] [--stop-on-failure]";

const RUN_FLAG_OPTIONS = {
  max: { type: "string" },
  timeout: { type: "string" },
  retry: { type: "string" },
  sleep: { type: "string" },
  model: { type: "string" },
  agent: { type: "string" },
  "no-sync": { type: "boolean" },
  "stop-on-failure": { type: "boolean" },
} as const;

const PHASE_ICONS: Record<PhaseStatus, string> = {
  completed: "✓",
  in_progress: "→",
  pending: "○",
};

const TASK_ICONS: Record<TaskStatus, string> = {
  completed: "✓",
  in_progress: "→",
  pending: "○",
  blocked: "!",
  failed: "✗",
  skipped: "-",
};

function withUsage<T>(usage: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(message, { usage: `${CLI_NAME} ${usage}` });
  }
}

function parseCount(
  value: string | undefined,
  flag: string,
  usage: string,
  min: number,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ValidationError(`${flag} must be an integer of at least ${min}, got '${value}'.`, {
      usage: `${CLI_NAME} ${usage}`,
    });
  }
  return parsed;
}

function parseRunOverrides(
  values: {
    max?: string;
    timeout?: string;
    retry?: string;
    sleep?: string;
    model?: string;
    agent?: string;
    "no-sync"?: boolean;
    "stop-on-failure"?: boolean;
  },
  usage: string,
): RunOverrides {
  const timeoutSeconds = parseCount(values.timeout, "--timeout", usage, 1);
  const sleepSeconds = parseCount(values.sleep, "--sleep", usage, 0);
  let adapter: RunOverrides["adapter"];
  if (values.agent !== undefined) {
    const parsed = AgentAdapterIdSchema.safeParse(values.agent.trim().toUpperCase());
    if (!parsed.success) {
      throw new ValidationError(`Unknown agent '${values.agent}'.`, {
        hint: `Use one of ${AgentAdapterIdSchema.options.join(", ")}.`,
      });
    }
    adapter = parsed.data;
  }

  return {
    maxIterations: parseCount(values.max, "--max", usage, 1),
    idleTimeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1_000,
    maxAttempts: parseCount(values.retry, "--retry", usage, 1),
    sleepBetweenMs: sleepSeconds === undefined ? undefined : sleepSeconds * 1_000,
    model: values.model,
    adapter,
    updateSource: values["no-sync"] ? false : undefined,
    continueOnTaskFailure: values["stop-on-failure"] ? false : undefined,
  };
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function formatPercent(progress: number): string {
  return `${Math.round(progress * 100)}%`;
}

function formatDuration(record: IterationRecord): string {
  const ms = Date.parse(record.endedAt) - Date.parse(record.startedAt);
  return Number.isFinite(ms) ? `${(ms / 1_000).toFixed(1)}s` : "-";
}

async function askForConfirmation(question: string): Promise<boolean> {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return ["y", "yes"].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

function printRuntimeEvent(event: RuntimeEvent): void {
  switch (event.type) {
    case "adapter.output":
      console.info(`  ${event.payload.line}`);
      return;
    case "supervisor.transition":
    case "terminal.outcome":
      return;
    default:
      console.info(formatRuntimeEventForCli(event));
  }
}

function printOutcome(outcome: LoopOutcome): void {
  const progress = computeProgress(outcome.project);
  console.info("");
  console.info(`Outcome: ${outcome.kind}`);
  console.info(
    `Progress: ${progress.completedTasks}/${progress.totalTasks} tasks (${formatPercent(progress.progress)})`,
  );
  console.info(`Iterations this run: ${outcome.iterationsRun}`);
  if (outcome.failedTaskIds.length > 0) {
    console.info(`Failed tasks: ${outcome.failedTaskIds.join(", ")}`);
  }
}

/**
 * Builds the `taskloop` command set over one state root.  Every action
 * resolves to the process exit code.
 */
export function createCommandRegistry(env: CliEnvironment): CommandRegistry {
  const store = new StateStore(env.stateRoot);

  const createLoop = (settings: TaskloopSettings, owner: LockOwner): OrchestrationLoop => {
    const runner = env.createProcessRunner?.() ?? new ProcessManager();
    const adapter = createAdapterFromSettings(settings.agent, runner);
    const retry = new RetryPolicy(settings.retry);
    return new OrchestrationLoop({
      store,
      execution: settings.execution,
      owner,
      createRunner: (paths) =>
        new ExecutionSupervisor({
          adapter,
          cwd: env.cwd,
          execution: settings.execution,
          retry,
          artifacts: new FileArtifactWriter(paths.transcriptsDir),
          statusFilePath: paths.statusFilePath,
        }),
      onEvent: printRuntimeEvent,
    });
  };

  const runLoop = async (
    input: { identity: string; source: SourceDescriptor; draft?: ProjectDraft },
    settings: TaskloopSettings,
    owner: LockOwner,
  ): Promise<number> => {
    const outcome = await createLoop(settings, owner).run({ ...input, signal: env.signal });
    printOutcome(outcome);
    return exitCodeForOutcome(outcome);
  };

  /**
   * A source argument may be a path or an identity prefix shown by
   * `projects`.  Without one, `./plans` is used when it exists, otherwise the
   * most recently updated project.
   */
  const resolveProjectIdentity = async (
    arg: string | undefined,
    usage: string,
  ): Promise<string> => {
    if (arg === undefined) {
      const defaultDir = resolve(env.cwd, DEFAULT_SOURCE_DIR);
      if (await pathExists(defaultDir)) {
        return resolveIdentity({ kind: "path", path: defaultDir }, env.cwd);
      }
      const latest = (await store.list())
        .flatMap((listing) => (listing.kind === "ok" ? [listing] : []))
        .sort((left, right) => right.updatedAt.localeCompare(left.updatedAt))[0];
      if (!latest) {
        throw new ValidationError("No projects found.", {
          usage: `${CLI_NAME} ${usage}`,
          hint: `Start one with '${CLI_NAME} run <source>'.`,
        });
      }
      return latest.identity;
    }

    const candidatePath = resolve(env.cwd, arg);
    if (/^[0-9a-f]{4,16}$/.test(arg) && !(await pathExists(candidatePath))) {
      const matches = (await store.list()).filter((listing) => listing.identity.startsWith(arg));
      if (matches.length > 1) {
        throw new ValidationError(`Identity prefix '${arg}' is ambiguous.`, {
          hint: `Matches: ${matches.map((listing) => listing.identity).join(", ")}`,
        });
      }
      if (matches[0]) {
        return matches[0].identity;
      }
    }
    return resolveIdentity({ kind: "path", path: candidatePath }, env.cwd);
  };

  const loadExisting = async (identity: string) => {
    const project = await store.load(identity);
    if (!project) {
      console.info(`No saved state for project ${identity}.`);
    }
    return project;
  };

  const commands: CommandDefinition[] = [
    {
      name: "run",
      usage: RUN_USAGE,
      description: "Run a plan, PRD, task file, plan directory or prompt until done",
      action: async ({ args }) => {
        const { values, positionals } = withUsage(RUN_USAGE, () =>
          parseArgs({
            args,
            allowPositionals: true,
            options: { ...RUN_FLAG_OPTIONS, prompt: { type: "string" } },
          }),
        );
        if (positionals.length > 1 || (values.prompt !== undefined && positionals.length > 0)) {
          throw new ValidationError("Give either one source or --prompt.", {
            usage: `${CLI_NAME} ${RUN_USAGE}`,
          });
        }

        let source: SourceDescriptor;
        if (values.prompt !== undefined) {
          source = { kind: "prompt", text: values.prompt };
        } else {
          const path = resolve(env.cwd, positionals[0] ?? DEFAULT_SOURCE_DIR);
          if (positionals[0] === undefined && !(await pathExists(path))) {
            throw new ValidationError(`No source given and ${path} does not exist.`, {
              usage: `${CLI_NAME} ${RUN_USAGE}`,
            });
          }
          source = { kind: "path", path };
        }

        const settings = applyRunOverrides(
          await loadSettings(env.settingsFilePath),
          parseRunOverrides(values, RUN_USAGE),
        );
        const canonical = canonicalizeSource(source, env.cwd);
        const identity = resolveIdentity(canonical, env.cwd);
        const draft = await loadProjectInput(canonical);
        console.info(`Running ${draft.name} (${identity}) from ${describeSource(canonical)}.`);
        return runLoop({ identity, source: canonical, draft }, settings, "CLI_RUN");
      },
    },
    {
      name: "resume",
      usage: RESUME_USAGE,
      description: "Continue a project from its saved state without re-reading its source",
      action: async ({ args }) => {
        const { values, positionals } = withUsage(RESUME_USAGE, () =>
          parseArgs({ args, allowPositionals: true, options: RUN_FLAG_OPTIONS }),
        );
        const identity = await resolveProjectIdentity(positionals[0], RESUME_USAGE);
        const settings = applyRunOverrides(
          await loadSettings(env.settingsFilePath),
          parseRunOverrides(values, RESUME_USAGE),
        );
        const project = await store.load(identity);
        if (!project) {
          throw new ConfigurationError(
            `No saved state for project ${identity}; run it with its source first.`,
          );
        }
        console.info(`Resuming ${project.name} (${identity}).`);
        return runLoop({ identity, source: project.source }, settings, "CLI_RESUME");
      },
    },
    {
      name: "status",
      usage: "status [source|identity] [--json]",
      description: "Show progress of a project",
      action: async ({ args }) => {
        const { values, positionals } = withUsage("status [source|identity] [--json]", () =>
          parseArgs({ args, allowPositionals: true, options: { json: { type: "boolean" } } }),
        );
        const identity = await resolveProjectIdentity(positionals[0], "status");
        const project = await loadExisting(identity);
        if (!project) {
          return EXIT_CODES.COMPLETE;
        }

        const summary = buildStatusSummary(project);
        if (values.json) {
          console.log(JSON.stringify(summary, null, 2));
          return EXIT_CODES.COMPLETE;
        }

        console.info(`Project: ${project.name}`);
        console.info(`Identity: ${identity}`);
        console.info(`Source: ${describeSource(project.source)}`);
        console.info(`Status: ${project.status.toUpperCase()}`);
        console.info(
          `Progress: ${summary.completedTasks}/${summary.totalTasks} tasks (${formatPercent(summary.progress)})`,
        );
        console.info(`Iterations: ${project.currentIteration}`);
        console.info("Phases:");
        for (const phase of summarizePhases(project)) {
          console.info(
            `  ${PHASE_ICONS[phase.status]} ${phase.name}: ${phase.tasksCompleted}/${phase.tasksTotal}`,
          );
        }
        return EXIT_CODES.COMPLETE;
      },
    },
    {
      name: "history",
      usage: "history [source|identity] [--limit <n>]",
      description: "Show recent iterations",
      action: async ({ args }) => {
        const usage = "history [source|identity] [--limit <n>]";
        const { values, positionals } = withUsage(usage, () =>
          parseArgs({ args, allowPositionals: true, options: { limit: { type: "string" } } }),
        );
        const limit = parseCount(values.limit, "--limit", usage, 1) ?? DEFAULT_HISTORY_LIMIT;
        const identity = await resolveProjectIdentity(positionals[0], usage);
        const log = await store.readIterationLog(identity);
        if (log.skippedLines > 0) {
          console.warn(`Skipped ${log.skippedLines} unreadable line(s) in the iteration log.`);
        }

        console.info(`Iteration history (${log.records.length} total)`);
        if (log.records.length === 0) {
          console.info("none");
          return EXIT_CODES.COMPLETE;
        }
        for (const record of log.records.slice(-limit)) {
          const completed = record.tasksCompleted.join(", ") || "-";
          console.info(
            `#${record.number} ${record.taskId} ${record.outcome} ${formatDuration(record)} completed: ${completed}`,
          );
          if (record.error) {
            console.info(`    ${record.error}`);
          }
        }
        return EXIT_CODES.COMPLETE;
      },
    },
    {
      name: "tasks",
      usage: "tasks [source|identity] [--status <status>]",
      description: "List tasks with their status",
      action: async ({ args }) => {
        const usage = "tasks [source|identity] [--status <status>]";
        const { values, positionals } = withUsage(usage, () =>
          parseArgs({ args, allowPositionals: true, options: { status: { type: "string" } } }),
        );
        let filter: TaskStatus | undefined;
        if (values.status !== undefined) {
          const parsed = TaskStatusSchema.safeParse(values.status.trim().toLowerCase());
          if (!parsed.success) {
            throw new ValidationError(`Invalid status: ${values.status}`, {
              hint: `Use one of ${TaskStatusSchema.options.join(", ")}.`,
            });
          }
          filter = parsed.data;
        }

        const identity = await resolveProjectIdentity(positionals[0], usage);
        const project = await loadExisting(identity);
        if (!project) {
          return EXIT_CODES.COMPLETE;
        }

        for (const phase of project.phases) {
          const tasks = phase.tasks.filter((task) => !filter || task.status === filter);
          if (tasks.length === 0) {
            continue;
          }
          console.info(`${phase.name}:`);
          for (const task of tasks) {
            const attempts = task.attempts > 0 ? ` (attempts: ${task.attempts})` : "";
            console.info(`  ${TASK_ICONS[task.status]} ${task.id}: ${task.name} [${task.status}]${attempts}`);
            if (task.lastError && task.status !== "completed") {
              console.info(`      ${task.lastError}`);
            }
          }
        }
        return EXIT_CODES.COMPLETE;
      },
    },
    {
      name: "validate",
      usage: "validate <file>",
      description: "Check a plan, PRD or task file without running it",
      action: async ({ args }) => {
        const filePath = args[0];
        if (!filePath) {
          throw new ValidationError("Missing file to validate.", {
            usage: `${CLI_NAME} validate <file>`,
          });
        }
        const target = resolve(env.cwd, filePath);
        let content: string;
        try {
          content = await readFile(target, "utf8");
        } catch (error) {
          if ((error as NodeJS.ErrnoException).code === "ENOENT") {
            throw new ConfigurationError(`File not found: ${target}`);
          }
          throw error;
        }

        const isJson = extname(target).toLowerCase() === ".json";
        const formatErrors = isJson ? [] : validateMarkdownFormat(content);
        const draft = isJson ? parseJsonInput(content, target) : parseMarkdown(content, target);
        const report = validateProjectGraph(draft);
        const problems = [...formatErrors, ...report.issues.map((issue) => issue.message)];

        if (problems.length > 0) {
          console.error(`Invalid: ${target}`);
          for (const problem of problems) {
            console.error(`  - ${problem}`);
          }
          return EXIT_CODES.CONFIGURATION;
        }

        console.info(`Valid: ${target}`);
        console.info(`Project: ${draft.name}`);
        console.info(`Phases: ${draft.phases.length}`);
        console.info(`Tasks: ${listTasks(draft).length}`);
        for (const warning of report.warnings) {
          console.warn(`Warning: ${warning.message}`);
        }
        for (const phase of draft.phases) {
          console.info(`  ${phase.name} (${phase.tasks.length} tasks)`);
          for (const task of phase.tasks.slice(0, VALIDATE_PREVIEW_TASKS)) {
            console.info(`    ${TASK_ICONS[task.status]} ${task.id}: ${task.name}`);
          }
          if (phase.tasks.length > VALIDATE_PREVIEW_TASKS) {
            console.info(`    ... and ${phase.tasks.length - VALIDATE_PREVIEW_TASKS} more`);
          }
        }
        return EXIT_CODES.COMPLETE;
      },
    },
    {
      name: "reset",
      usage: "reset [source|identity] [--yes]",
      description: "Discard the saved state of a project (a backup is kept)",
      action: async ({ args }) => {
        const usage = "reset [source|identity] [--yes]";
        const { values, positionals } = withUsage(usage, () =>
          parseArgs({
            args,
            allowPositionals: true,
            options: { yes: { type: "boolean", short: "y" } },
          }),
        );
        const identity = await resolveProjectIdentity(positionals[0], usage);
        if (!values.yes) {
          const confirm = env.confirm ?? askForConfirmation;
          if (!(await confirm(`Reset all progress for project ${identity}?`))) {
            console.info("Reset cancelled.");
            return EXIT_CODES.COMPLETE;
          }
        }

        const result = await store.reset(identity);
        if (!result.removed) {
          console.info(`No saved state for project ${identity}.`);
          return EXIT_CODES.COMPLETE;
        }
        console.info(`State for project ${identity} reset.`);
        if (result.backupFilePath) {
          console.info(`Backup saved: ${result.backupFilePath}`);
        }
        return EXIT_CODES.COMPLETE;
      },
    },
    {
      name: "projects",
      description: "List every project with saved state",
      action: async () => {
        const listings = await store.list();
        if (listings.length === 0) {
          console.info("No projects yet.");
          return EXIT_CODES.COMPLETE;
        }
        for (const listing of listings) {
          if (listing.kind === "corrupt") {
            console.info(`${listing.identity}  CORRUPT  ${listing.reason}`);
            continue;
          }
          console.info(
            `${listing.identity}  ${listing.status.toUpperCase()}  ${listing.completedTasks}/${listing.totalTasks}  ${listing.name}  (${describeSource(listing.source)})`,
          );
        }
        return EXIT_CODES.COMPLETE;
      },
    },
  ];

  return new CommandRegistry(commands);
}

export function runCli(args: string[], env: CliEnvironment): Promise<number> {
  return createCommandRegistry(env).run(args);
}
