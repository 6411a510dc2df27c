import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';

const TEMP_FILE_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour
const TEMP_FILE_PATTERN = /\.tmp\.\d+\.\d+$/; // Matches .tmp.{pid}.{timestamp}

/**
 * Reads a JSON file safely.
 * If the file doesn't exist or fails validation, returns the defaultValue
 * and backs up the corrupt file.
 */
export function readJsonSafe<T>(
  filePath: string,
  defaultValue: T,
  validateFn: (data: unknown) => data is T
): T {
  try {
    if (!fs.existsSync(filePath)) {
      return defaultValue;
    }

    const content = fs.readFileSync(filePath, 'utf-8');
    if (!content.trim()) {
      return defaultValue;
    }

    const data: unknown = JSON.parse(content);
    if (!validateFn(data)) {
      throw new Error('Schema validation failed');
    }

    return data;
  } catch (error) {
    logger.warn(`Failed to read JSON at ${filePath}: ${error}. Backing up and returning default.`);
    backupCorruptFileSync(filePath);
    return defaultValue;
  }
}

/**
 * Writes text to a file atomically.
 * 1) Write to temp file
 * 2) fsync (best effort)
 * 3) Rename to target
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.ensureDir(dir);

  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

  try {
    await fs.writeFile(tempPath, content, 'utf-8');

    const fd = await fs.open(tempPath, 'r+');
    try {
      await fs.fsync(fd);
    } finally {
      await fs.close(fd);
    }

    await fs.rename(tempPath, filePath);
  } catch (error) {
    logger.error(`Failed to write ${filePath} atomically: ${error}`);
    if (await fs.pathExists(tempPath)) {
      await fs.remove(tempPath).catch((removeError: unknown) => {
        logger.debug(`Could not remove temp file ${tempPath}: ${removeError}`);
      });
    }
    throw error;
  }
}

export async function writeJsonAtomic<T>(filePath: string, data: T): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2));
}

function backupCorruptFileSync(filePath: string): void {
  try {
    if (fs.existsSync(filePath)) {
      const backupPath = `${filePath}.corrupt.${Date.now()}`;
      fs.copySync(filePath, backupPath);
      logger.info(`Corrupt file backed up to ${backupPath}`);
    }
  } catch (backupError) {
    logger.error(`Failed to backup corrupt file ${filePath}: ${backupError}`);
  }
}

/**
 * Removes temp files left behind by interrupted atomic writes.
 *
 * @param directory - Directory to scan recursively
 * @param maxAgeMs - Age after which a temp file is considered orphaned
 * @returns Number of files removed
 */
export async function cleanupOrphanedTempFiles(
  directory: string,
  maxAgeMs: number = TEMP_FILE_MAX_AGE_MS
): Promise<number> {
  let cleanedCount = 0;
  const now = Date.now();

  try {
    if (!(await fs.pathExists(directory))) {
      return 0;
    }

    const entries = await fs.readdir(directory, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        cleanedCount += await cleanupOrphanedTempFiles(fullPath, maxAgeMs);
      } else if (entry.isFile() && TEMP_FILE_PATTERN.test(entry.name)) {
        try {
          const stat = await fs.stat(fullPath);
          const fileAge = now - stat.mtimeMs;

          if (fileAge > maxAgeMs) {
            await fs.remove(fullPath);
            cleanedCount++;
            logger.debug(`Cleaned up orphaned temp file: ${fullPath} (age: ${Math.round(fileAge / 1000)}s)`);
          }
        } catch (statError) {
          // Removed by another process between readdir and stat
          logger.debug(`Could not stat temp file ${fullPath}: ${statError}`);
        }
      }
    }
  } catch (error) {
    logger.warn(`Error during orphaned temp file cleanup in ${directory}: ${error}`);
  }

  return cleanedCount;
}
