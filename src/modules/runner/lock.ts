/**
 * Run Lock
 *
 * Process-external exclusive lock held for the duration of one run. The
 * holder record is written to a private temp file and hard-linked into
 * place, so the lock file never exists half-written and only one process
 * can create it. A lock whose owner is gone, or that outlived the stale
 * threshold, is taken over.
 */

import { link, mkdir, readFile, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { LockContentionError } from '../errors/index.js';

export interface RunLock {
  /** @throws LockContentionError when another run holds the lock */
  acquire(runId: string): Promise<LockHandle>;
}

export interface LockHandle {
  release(): Promise<void>;
}

export interface FileRunLockConfig {
  path: string;
  staleAfterMs: number;
}

const lockContentSchema = z.object({
  pid: z.number().int(),
  runId: z.string(),
  acquiredAt: z.string(),
});

type LockContent = z.infer<typeof lockContentSchema>;

/**
 * The lock file as seen at one moment
 */
interface LockSnapshot {
  raw: string;
  modifiedAt: number;
  /** Undefined when the content is not a holder record */
  holder?: LockContent;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return hasCode(error, 'EPERM');
  }
}

function parseHolder(raw: string): LockContent | undefined {
  try {
    const parsed = lockContentSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

function sameSnapshot(a: LockSnapshot, b: LockSnapshot): boolean {
  return a.raw === b.raw && a.modifiedAt === b.modifiedAt;
}

export class FileRunLock implements RunLock {
  constructor(
    private readonly config: FileRunLockConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async acquire(runId: string): Promise<LockHandle> {
    await mkdir(dirname(this.config.path), { recursive: true });

    if (await this.tryCreate(runId)) {
      return this.handle(runId);
    }

    const snapshot = await this.snapshot();
    if (snapshot) {
      if (!this.isStale(snapshot)) {
        throw new LockContentionError(this.config.path);
      }

      const { holder } = snapshot;
      console.warn(
        `[Lock] Removing stale lock ${this.config.path}` +
          (holder ? ` (run ${holder.runId}, pid ${holder.pid}, since ${holder.acquiredAt})` : ' (unreadable)')
      );
      await this.removeIfUnchanged(snapshot);
    }

    // Another process may win the race for the freed lock
    if (await this.tryCreate(runId)) {
      return this.handle(runId);
    }
    throw new LockContentionError(this.config.path);
  }

  private async tryCreate(runId: string): Promise<boolean> {
    const content: LockContent = {
      pid: process.pid,
      runId,
      acquiredAt: this.clock().toISOString(),
    };
    const tempPath = `${this.config.path}.${process.pid}.${runId}.tmp`;

    await writeFile(tempPath, JSON.stringify(content));
    try {
      await link(tempPath, this.config.path);
      return true;
    } catch (error) {
      if (hasCode(error, 'EEXIST')) return false;
      throw error;
    } finally {
      await this.unlinkQuietly(tempPath);
    }
  }

  /**
   * Current lock file, or undefined when there is none
   */
  private async snapshot(): Promise<LockSnapshot | undefined> {
    try {
      const [raw, info] = await Promise.all([readFile(this.config.path, 'utf8'), stat(this.config.path)]);
      return { raw, modifiedAt: info.mtimeMs, holder: parseHolder(raw) };
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return undefined;
      throw error;
    }
  }

  /**
   * A holder record is stale when it is too old or its process is gone.
   * A file without one is aged by its modification time, since its writer
   * may still be running.
   */
  private isStale(snapshot: LockSnapshot): boolean {
    const now = this.clock().getTime();
    const { holder } = snapshot;

    if (!holder) {
      console.warn(`[Lock] Unreadable lock file ${this.config.path}`);
      return now - snapshot.modifiedAt > this.config.staleAfterMs;
    }

    const acquiredAt = Date.parse(holder.acquiredAt);
    if (Number.isNaN(acquiredAt)) return true;
    if (now - acquiredAt > this.config.staleAfterMs) return true;
    return !isProcessAlive(holder.pid);
  }

  /**
   * Delete the lock file only if it is still the one judged stale
   */
  private async removeIfUnchanged(judged: LockSnapshot): Promise<void> {
    const current = await this.snapshot();
    if (!current) return;
    if (!sameSnapshot(judged, current)) {
      throw new LockContentionError(this.config.path);
    }
    await this.unlinkQuietly(this.config.path);
  }

  private async unlinkQuietly(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      if (!hasCode(error, 'ENOENT')) throw error;
    }
  }

  private handle(runId: string): LockHandle {
    let released = false;
    return {
      release: async () => {
        if (released) return;
        released = true;

        // Only remove the file if it is still ours
        const current = await this.snapshot();
        if (!current) return;
        if (current.holder?.runId !== runId) {
          console.warn(
            `[Lock] Lock now held by ${current.holder ? `run ${current.holder.runId}` : 'an unknown writer'}, leaving it in place`
          );
          return;
        }
        await this.unlinkQuietly(this.config.path);
      },
    };
  }
}
