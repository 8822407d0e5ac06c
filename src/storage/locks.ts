import * as fs from 'fs-extra';
import * as path from 'path';
import { StoreLockTimeoutError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface LockOptions {
  /** A lock file older than this is assumed abandoned by a crashed process. */
  staleMs?: number;
  pollMs?: number;
  timeoutMs?: number;
}

interface LockOwner {
  pid: number;
  token: string;
  createdAt: number;
}

let tokenCounter = 0;

/**
 * Runs `fn` while holding `lockPath`, so a second process pointed at the
 * same data directory waits instead of interleaving writes.
 */
export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>, options: LockOptions = {}): Promise<T> {
  const { staleMs = 60_000, pollMs = 50, timeoutMs = 30_000 } = options;
  await fs.ensureDir(path.dirname(lockPath));

  const owner: LockOwner = { pid: process.pid, token: `${process.pid}-${++tokenCounter}`, createdAt: Date.now() };
  const deadline = Date.now() + timeoutMs;

  while (!(await tryAcquire(lockPath, owner, staleMs))) {
    if (Date.now() >= deadline) {
      throw new StoreLockTimeoutError(lockPath, timeoutMs);
    }
    await new Promise((resolve) => setTimeout(resolve, pollMs));
  }

  try {
    return await fn();
  } finally {
    await release(lockPath, owner);
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function tryAcquire(lockPath: string, owner: LockOwner, staleMs: number): Promise<boolean> {
  try {
    await fs.writeFile(lockPath, JSON.stringify({ ...owner, createdAt: Date.now() }), { flag: 'wx' });
    return true;
  } catch (error) {
    if (errorCode(error) !== 'EEXIST') {
      throw error;
    }
  }

  try {
    const { mtimeMs } = await fs.stat(lockPath);
    if (Date.now() - mtimeMs > staleMs) {
      logger.warn(`Breaking stale lock ${lockPath}`);
      await fs.remove(lockPath);
    }
  } catch (statError) {
    // Released between the failed open and the stat
    logger.debug(`Lock ${lockPath} went away while checking it: ${statError}`);
  }
  return false;
}

async function release(lockPath: string, owner: LockOwner): Promise<void> {
  try {
    const held: unknown = await fs.readJson(lockPath);
    const stillOurs = typeof held === 'object' && held !== null && 'token' in held && held.token === owner.token;
    if (stillOurs) {
      await fs.remove(lockPath);
    } else {
      logger.warn(`Lock ${lockPath} was taken over while held; leaving it in place`);
    }
  } catch (error) {
    logger.error(`Failed to release lock ${lockPath}: ${error}`);
  }
}

/**
 * In-process FIFO mutex keyed by name. Callers for the same key run one at a
 * time in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
