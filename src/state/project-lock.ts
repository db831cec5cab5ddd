import { mkdir, open, readFile, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import { LockHeldError, type LockHolder } from "../errors";

export const LockOwnerSchema = z.enum(["CLI_RUN", "CLI_RESUME"]);
export type LockOwner = z.infer<typeof LockOwnerSchema>;

const LockRecordSchema = z.object({
  pid: z.number().int().positive(),
  owner: LockOwnerSchema,
  identity: z.string().min(1),
  acquiredAt: z.string().min(1),
});
type LockRecord = z.infer<typeof LockRecordSchema>;

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ESRCH") {
      return false;
    }
    if (code === "EPERM") {
      return true;
    }

    throw error;
  }
}

function parseLockRecord(raw: string): LockRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = LockRecordSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

async function readLockRecord(lockFilePath: string): Promise<LockRecord | null> {
  let raw: string;
  try {
    raw = await readFile(lockFilePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }

  return parseLockRecord(raw);
}

function toHolder(record: LockRecord): LockHolder {
  return {
    pid: record.pid,
    owner: record.owner,
    acquiredAt: record.acquiredAt,
  };
}

/**
 * Returns the live holder of a lock file, or `undefined` when the file is
 * absent, unreadable as a lock record, or left behind by a dead process.
 */
export async function inspectLock(
  lockFilePath: string,
): Promise<LockHolder | undefined> {
  const record = await readLockRecord(lockFilePath);
  if (!record || !isProcessRunning(record.pid)) {
    return undefined;
  }
  return toHolder(record);
}

export class ProjectLock {
  private readonly lockFilePath: string;
  private readonly identity: string;
  private readonly owner: LockOwner;
  private acquired = false;
  private record: LockRecord | undefined;

  constructor(input: { lockFilePath: string; identity: string; owner: LockOwner }) {
    if (!input.lockFilePath.trim()) {
      throw new Error("lockFilePath must not be empty.");
    }
    if (!input.identity.trim()) {
      throw new Error("identity must not be empty.");
    }

    this.lockFilePath = input.lockFilePath;
    this.identity = input.identity.trim();
    this.owner = input.owner;
  }

  get isAcquired(): boolean {
    return this.acquired;
  }

  async acquire(): Promise<void> {
    if (this.acquired) {
      throw new Error("Project lock is already acquired by this process.");
    }

    const record: LockRecord = {
      pid: process.pid,
      owner: this.owner,
      identity: this.identity,
      acquiredAt: new Date().toISOString(),
    };

    for (let attempt = 0; attempt < 2; attempt += 1) {
      if (await this.tryCreate(record)) {
        this.acquired = true;
        this.record = record;
        return;
      }

      const existing = await readLockRecord(this.lockFilePath);
      if (existing && isProcessRunning(existing.pid)) {
        throw new LockHeldError(this.identity, toHolder(existing));
      }

      await rm(this.lockFilePath, { force: true });
    }

    throw new LockHeldError(
      this.identity,
      undefined,
      `Failed to acquire lock for project ${this.identity} after removing a stale lock file.`,
    );
  }

  /**
   * Verifies the lock is still ours before a write.  A lock file that vanished
   * together with its directory is recreated; one taken over by another live
   * process is reported as `LockHeldError`.
   */
  async ensureHeld(): Promise<void> {
    if (!this.acquired || !this.record) {
      throw new Error("Project lock has not been acquired.");
    }

    const existing = await readLockRecord(this.lockFilePath);
    if (existing && existing.pid === this.record.pid && existing.owner === this.owner) {
      return;
    }
    if (existing && isProcessRunning(existing.pid)) {
      this.acquired = false;
      throw new LockHeldError(this.identity, toHolder(existing));
    }

    await rm(this.lockFilePath, { force: true });
    if (!(await this.tryCreate(this.record))) {
      const contender = await readLockRecord(this.lockFilePath);
      this.acquired = false;
      throw new LockHeldError(
        this.identity,
        contender ? toHolder(contender) : undefined,
      );
    }
    console.warn(
      `State store: lock file for project ${this.identity} disappeared and was recreated.`,
    );
  }

  async release(): Promise<void> {
    if (!this.acquired) {
      return;
    }

    const existing = await readLockRecord(this.lockFilePath);
    if (
      !existing ||
      (existing.pid === process.pid &&
        existing.owner === this.owner &&
        existing.identity === this.identity)
    ) {
      await rm(this.lockFilePath, { force: true });
    }

    this.acquired = false;
    this.record = undefined;
  }

  private async tryCreate(record: LockRecord): Promise<boolean> {
    await mkdir(dirname(this.lockFilePath), { recursive: true });
    try {
      const fileHandle = await open(this.lockFilePath, "wx");
      try {
        await fileHandle.writeFile(`${JSON.stringify(record, null, 2)}\n`);
      } finally {
        await fileHandle.close();
      }
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "EEXIST") {
        return false;
      }
      throw error;
    }
  }
}
