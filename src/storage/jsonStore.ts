import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';

const STALE_TEMP_AGE_MS = 60 * 60 * 1000;
const TEMP_SUFFIX = /\.tmp\.\d+\.\d+$/; // <file>.tmp.<pid>.<timestamp>

/** Shape check run on every document read back from disk. */
export type DocumentGuard<T> = (data: unknown) => data is T;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Records keyed by id, each carrying that `id` as a string. */
export function keyedCollection<T extends { id: string }>(): DocumentGuard<Record<string, T>> {
  return (data: unknown): data is Record<string, T> =>
    isPlainObject(data) &&
    Object.entries(data).every(([key, record]) => isPlainObject(record) && record.id === key);
}

export function listOf<T>(isItem: (item: unknown) => item is T): DocumentGuard<T[]> {
  return (data: unknown): data is T[] => Array.isArray(data) && data.every(isItem);
}

export function plainObject<T extends object>(): DocumentGuard<Partial<T>> {
  return (data: unknown): data is Partial<T> => isPlainObject(data);
}

/**
 * Loads a collection document. A missing or empty file yields `empty`; a
 * file that fails to parse or fails `guard` is copied aside as
 * `<file>.corrupt.<timestamp>` and `empty` is returned in its place.
 */
export async function readDocument<T>(filePath: string, empty: T, guard: DocumentGuard<T>): Promise<T> {
  try {
    if (!(await fs.pathExists(filePath))) {
      return empty;
    }
    const content = await fs.readFile(filePath, 'utf-8');
    if (!content.trim()) {
      return empty;
    }

    const data: unknown = JSON.parse(content);
    if (!guard(data)) {
      throw new Error(`unexpected document shape in ${path.basename(filePath)}`);
    }
    return data;
  } catch (error) {
    logger.warn(`Unreadable document ${filePath}: ${error}. Starting from an empty one.`);
    await setAsideCorrupt(filePath);
    return empty;
  }
}

/**
 * Replaces a document in one step: write a sibling temp file, fsync it,
 * rename over the target.
 */
export async function writeDocument<T>(filePath: string, data: T): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

  try {
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    const fd = await fs.open(tempPath, 'r+');
    try {
      await fs.fsync(fd);
    } finally {
      await fs.close(fd);
    }
    await fs.rename(tempPath, filePath);
  } catch (error) {
    logger.error(`Failed to write ${filePath}: ${error}`);
    await fs.remove(tempPath).catch((removeError: unknown) => {
      logger.debug(`Could not remove temp file ${tempPath}: ${removeError}`);
    });
    throw error;
  }
}

async function setAsideCorrupt(filePath: string): Promise<void> {
  try {
    if (await fs.pathExists(filePath)) {
      const asidePath = `${filePath}.corrupt.${Date.now()}`;
      await fs.copy(filePath, asidePath);
      logger.info(`Corrupt document kept at ${asidePath}`);
    }
  } catch (copyError) {
    logger.error(`Could not keep a copy of corrupt document ${filePath}: ${copyError}`);
  }
}

/**
 * Deletes temp files a crashed write left in the data directory.
 *
 * @returns how many were removed
 */
export async function sweepStaleTempFiles(dataDir: string, maxAgeMs: number = STALE_TEMP_AGE_MS): Promise<number> {
  if (!(await fs.pathExists(dataDir))) {
    return 0;
  }

  const now = Date.now();
  let removed = 0;
  for (const name of await fs.readdir(dataDir)) {
    if (!TEMP_SUFFIX.test(name)) continue;
    const fullPath = path.join(dataDir, name);
    try {
      const { mtimeMs } = await fs.stat(fullPath);
      if (now - mtimeMs > maxAgeMs) {
        await fs.remove(fullPath);
        removed++;
      }
    } catch (statError) {
      // Another process finished or removed it first
      logger.debug(`Skipping temp file ${fullPath}: ${statError}`);
    }
  }
  return removed;
}
