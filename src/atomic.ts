import { promises as fs } from 'node:fs';
import { join, dirname, basename } from 'node:path';
import { randomBytes } from 'node:crypto';
import { GenerationError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { ErrorCode } from './types.js';

const RETRY_DELAYS = [100, 500, 1000, 2000, 5000];
const NON_RETRYABLE_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'EACCES', 'EPERM', 'EROFS', 'ENOSPC', 'EEXIST']);

function isNonRetryable(error: unknown): boolean {
  return error instanceof Error && 'code' in error &&
    typeof error.code === 'string' && NON_RETRYABLE_CODES.has(error.code);
}

export async function withRetry<T>(operation: () => Promise<T>, context: string): Promise<T> {
  let lastError: unknown;

  for (let i = 0; i <= RETRY_DELAYS.length; i++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      const delay = RETRY_DELAYS[i];
      if (delay === undefined || isNonRetryable(error)) break;

      logger.debug(`${context} failed, retrying`, { attempt: i + 1, delay, error: errorMessage(error) });
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw new GenerationError(
    `${context} failed: ${errorMessage(lastError)}`,
    ErrorCode.FILE_WRITE_FAILED,
    { cause: lastError }
  );
}

async function ensureDir(dir: string): Promise<void> {
  await withRetry(async () => {
    await fs.mkdir(dir, { recursive: true });
  }, `creating directory ${dir}`);
}

/** Writes through a sibling temp file and renames it over the target. */
export async function atomicWrite(targetPath: string, content: Uint8Array): Promise<void> {
  const dir = dirname(targetPath);
  const tempPath = join(dir, `.${basename(targetPath)}.${randomBytes(8).toString('hex')}.tmp`);

  await ensureDir(dir);

  try {
    await withRetry(async () => {
      await fs.writeFile(tempPath, content);
      await fs.rename(tempPath, targetPath);
    }, `writing ${targetPath}`);
  } finally {
    await fs.rm(tempPath, { force: true }).catch((error: unknown) => {
      logger.debug('Failed to remove temp file', { path: tempPath, error: errorMessage(error) });
    });
  }
}

export async function appendBytes(targetPath: string, content: Uint8Array): Promise<void> {
  await ensureDir(dirname(targetPath));

  await withRetry(async () => {
    await fs.appendFile(targetPath, content);
  }, `appending to ${targetPath}`);
}
