/**
 * PID lock file held for the duration of a sync or snapshot run
 */

import * as fs from "node:fs/promises";
import type { Logger } from "./logger";
import { errorMessage, LockError } from "./errors";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Whether a process with this id exists. EPERM means it exists but belongs to
 * another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoException(error) && error.code === "EPERM";
  }
}

async function readLockPid(lockfile: string): Promise<number | null> {
  try {
    const content = await fs.readFile(lockfile, "utf8");
    const pid = Number.parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  }
}

async function tryCreate(lockfile: string, pid: number): Promise<boolean> {
  try {
    await fs.writeFile(lockfile, `${pid}\n`, { flag: "wx" });
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") return false;
    throw error;
  }
}

export async function acquireLock(
  lockfile: string,
  logger: Logger,
  pid: number = process.pid,
): Promise<void> {
  if (await tryCreate(lockfile, pid)) {
    logger.debug(`Acquired lock ${lockfile} (pid ${pid})`);
    return;
  }

  const holder = await readLockPid(lockfile);
  if (holder !== null && holder !== pid && isProcessAlive(holder)) {
    throw new LockError(`Another backupz process (pid ${holder}) holds ${lockfile}`, lockfile);
  }

  logger.warn(`Removing stale lock ${lockfile}${holder === null ? "" : ` (pid ${holder})`}`);
  await fs.rm(lockfile, { force: true });

  if (!(await tryCreate(lockfile, pid))) {
    throw new LockError(`Could not acquire ${lockfile}`, lockfile);
  }
  logger.debug(`Acquired lock ${lockfile} (pid ${pid})`);
}

/**
 * Remove the lock file. Failures are logged, never thrown.
 */
export async function releaseLock(lockfile: string, logger: Logger): Promise<void> {
  try {
    await fs.unlink(lockfile);
    logger.debug(`Released lock ${lockfile}`);
  } catch (error) {
    logger.warn(`Failed to remove lock ${lockfile}: ${errorMessage(error)}`);
  }
}

/**
 * Run `fn` while holding the lock; the lock is released on every exit path
 */
export async function withLock<T>(
  lockfile: string,
  logger: Logger,
  fn: () => Promise<T>,
): Promise<T> {
  await acquireLock(lockfile, logger);
  try {
    return await fn();
  } finally {
    await releaseLock(lockfile, logger);
  }
}
