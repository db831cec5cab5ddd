import {
  appendFile,
  copyFile,
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  writeFile,
} from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import type { ZodError } from "zod";

import {
  CorruptStateError,
  LockHeldError,
  StoreWriteError,
} from "../errors";
import { computeProgress, listTasks } from "../model/project-view";
import {
  IterationRecordSchema,
  ProjectSchema,
  STATE_SCHEMA_VERSION,
  StateDocumentSchema,
  StatusSummarySchema,
  type IterationRecord,
  type Project,
  type ProjectStatus,
  type SourceDescriptor,
  type StatusSummary,
} from "../types";
import { isIdentity } from "./identity";
import { inspectLock, ProjectLock, type LockOwner } from "./project-lock";

export const STATE_FILE_NAME = "state.json";
export const STATUS_FILE_NAME = "status.json";
export const ITERATION_LOG_FILE_NAME = "iterations.jsonl";
export const LOCK_FILE_NAME = "lock.json";
export const AGENT_STATUS_FILE_NAME = "agent-status.json";

export type ProjectListing =
  | {
      kind: "ok";
      identity: string;
      name: string;
      status: ProjectStatus;
      progress: number;
      totalTasks: number;
      completedTasks: number;
      source: SourceDescriptor;
      updatedAt: string;
    }
  | { kind: "corrupt"; identity: string; reason: string };

export type IterationLog = {
  records: IterationRecord[];
  skippedLines: number;
};

export type ResetResult = {
  removed: boolean;
  backupFilePath?: string;
};

function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

function toTimestamp(now: Date): string {
  return now.toISOString().replace(/[:.]/g, "-");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function buildStatusSummary(project: Project): StatusSummary {
  const progress = computeProgress(project);
  const current = listTasks(project).find((task) => task.status === "in_progress");

  return StatusSummarySchema.parse({
    identity: project.identity,
    projectName: project.name,
    status: project.status,
    progress: progress.progress,
    totalTasks: progress.totalTasks,
    completedTasks: progress.completedTasks,
    currentTaskId: current?.id,
    iteration: project.currentIteration,
    source: project.source,
    updatedAt: project.updatedAt,
  });
}

export class StateStore {
  readonly stateRoot: string;
  private readonly locks = new Map<string, ProjectLock>();

  constructor(stateRoot: string) {
    if (!stateRoot.trim()) {
      throw new Error("stateRoot must not be empty.");
    }

    this.stateRoot = resolve(stateRoot);
  }

  get projectsDir(): string {
    return join(this.stateRoot, "projects");
  }

  get backupsDir(): string {
    return join(this.stateRoot, "backups");
  }

  projectDir(identity: string): string {
    return join(this.projectsDir, identity);
  }

  stateFilePath(identity: string): string {
    return join(this.projectDir(identity), STATE_FILE_NAME);
  }

  statusFilePath(identity: string): string {
    return join(this.projectDir(identity), STATUS_FILE_NAME);
  }

  iterationLogPath(identity: string): string {
    return join(this.projectDir(identity), ITERATION_LOG_FILE_NAME);
  }

  lockFilePath(identity: string): string {
    return join(this.projectDir(identity), LOCK_FILE_NAME);
  }

  transcriptsDir(identity: string): string {
    return join(this.projectDir(identity), "transcripts");
  }

  agentStatusFilePath(identity: string): string {
    return join(this.projectDir(identity), AGENT_STATUS_FILE_NAME);
  }

  async load(identity: string): Promise<Project | undefined> {
    const stateFilePath = this.stateFilePath(identity);
    let raw: string;
    try {
      raw = await readFile(stateFilePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return undefined;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CorruptStateError({
        identity,
        path: stateFilePath,
        reason: "state file contains invalid JSON",
        cause: error,
      });
    }

    if (isRecord(parsed) && parsed.schemaVersion !== STATE_SCHEMA_VERSION) {
      throw new CorruptStateError({
        identity,
        path: stateFilePath,
        reason: `unsupported schema version ${JSON.stringify(parsed.schemaVersion)} (expected "${STATE_SCHEMA_VERSION}")`,
      });
    }

    const result = StateDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptStateError({
        identity,
        path: stateFilePath,
        reason: `schema validation failed: ${formatZodIssues(result.error)}`,
        cause: result.error,
      });
    }

    const document = result.data;
    if (document.identity !== identity || document.project.identity !== identity) {
      throw new CorruptStateError({
        identity,
        path: stateFilePath,
        reason: `state belongs to identity ${document.project.identity}`,
      });
    }

    return document.project;
  }

  /**
   * Persists the full project tree and its status summary.  Returns the saved
   * value, whose `updatedAt` has been bumped.
   */
  async save(project: Project, now = new Date()): Promise<Project> {
    const identity = project.identity;
    await this.assertWritable(identity);

    const next = ProjectSchema.parse({
      ...project,
      updatedAt: now.toISOString(),
    });
    const document = StateDocumentSchema.parse({
      schemaVersion: STATE_SCHEMA_VERSION,
      identity,
      source: next.source,
      savedAt: now.toISOString(),
      project: next,
    });

    await this.writeJsonAtomic(identity, this.stateFilePath(identity), document);
    await this.writeJsonAtomic(
      identity,
      this.statusFilePath(identity),
      buildStatusSummary(next),
    );
    return next;
  }

  async readStatusSummary(identity: string): Promise<StatusSummary | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.statusFilePath(identity), "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return undefined;
      }
      throw error;
    }

    try {
      const result = StatusSummarySchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : undefined;
    } catch {
      return undefined;
    }
  }

  async appendIteration(identity: string, record: IterationRecord): Promise<void> {
    await this.assertWritable(identity);
    const logPath = this.iterationLogPath(identity);
    const line = `${JSON.stringify(IterationRecordSchema.parse(record))}\n`;
    try {
      await mkdir(dirname(logPath), { recursive: true });
      await appendFile(logPath, line, "utf8");
    } catch (error) {
      throw new StoreWriteError(identity, logPath, error);
    }
  }

  async readIterationLog(identity: string): Promise<IterationLog> {
    let raw: string;
    try {
      raw = await readFile(this.iterationLogPath(identity), "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return { records: [], skippedLines: 0 };
      }
      throw error;
    }

    const records: IterationRecord[] = [];
    let skippedLines = 0;
    for (const line of raw.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      try {
        const result = IterationRecordSchema.safeParse(JSON.parse(line));
        if (result.success) {
          records.push(result.data);
        } else {
          skippedLines += 1;
        }
      } catch {
        skippedLines += 1;
      }
    }

    return { records, skippedLines };
  }

  async list(): Promise<ProjectListing[]> {
    let entries: string[];
    try {
      entries = await readdir(this.projectsDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const listings: ProjectListing[] = [];
    for (const identity of entries.filter(isIdentity)) {
      try {
        const project = await this.load(identity);
        if (!project) {
          continue;
        }
        const progress = computeProgress(project);
        listings.push({
          kind: "ok",
          identity,
          name: project.name,
          status: project.status,
          progress: progress.progress,
          totalTasks: progress.totalTasks,
          completedTasks: progress.completedTasks,
          source: project.source,
          updatedAt: project.updatedAt,
        });
      } catch (error) {
        if (!(error instanceof CorruptStateError)) {
          throw error;
        }
        listings.push({ kind: "corrupt", identity, reason: error.message });
      }
    }

    // Corrupt entries have no name and sort after the readable ones.
    return listings.sort((left, right) => {
      const leftName = left.kind === "ok" ? left.name : undefined;
      const rightName = right.kind === "ok" ? right.name : undefined;
      if (leftName !== rightName) {
        if (leftName === undefined) return 1;
        if (rightName === undefined) return -1;
        return leftName.localeCompare(rightName);
      }
      return left.identity.localeCompare(right.identity);
    });
  }

  /**
   * Removes all persisted state for one identity after copying `state.json`
   * into the backups directory.  Refuses while another process runs it.
   */
  async reset(identity: string, now = new Date()): Promise<ResetResult> {
    if (!this.locks.has(identity)) {
      const holder = await inspectLock(this.lockFilePath(identity));
      if (holder) {
        throw new LockHeldError(identity, holder);
      }
    }

    const projectDir = this.projectDir(identity);
    let backupFilePath: string | undefined;
    try {
      await readdir(projectDir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return { removed: false };
      }
      throw error;
    }

    try {
      const candidate = join(
        this.backupsDir,
        `${identity}-state-${toTimestamp(now)}.json`,
      );
      await mkdir(this.backupsDir, { recursive: true });
      await copyFile(this.stateFilePath(identity), candidate);
      backupFilePath = candidate;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
        throw new StoreWriteError(identity, this.backupsDir, error);
      }
    }

    await rm(projectDir, { recursive: true, force: true });
    return { removed: true, backupFilePath };
  }

  async acquireLock(identity: string, owner: LockOwner): Promise<ProjectLock> {
    const lock = new ProjectLock({
      lockFilePath: this.lockFilePath(identity),
      identity,
      owner,
    });
    await lock.acquire();
    this.locks.set(identity, lock);
    return lock;
  }

  async releaseLock(identity: string): Promise<void> {
    const lock = this.locks.get(identity);
    if (!lock) {
      return;
    }
    this.locks.delete(identity);
    await lock.release();
  }

  private async assertWritable(identity: string): Promise<void> {
    const lock = this.locks.get(identity);
    if (lock) {
      await lock.ensureHeld();
      return;
    }

    const holder = await inspectLock(this.lockFilePath(identity));
    if (holder) {
      throw new LockHeldError(identity, holder);
    }
  }

  private async writeJsonAtomic(
    identity: string,
    filePath: string,
    value: unknown,
  ): Promise<void> {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
      await rename(tmpPath, filePath);
    } catch (error) {
      throw new StoreWriteError(identity, filePath, error);
    }
  }
}
