import { open, stat, unlink, mkdir, type FileHandle } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname } from 'node:path';
import { LockTimeoutError } from '@/errors';
import { logger } from '@/ui/logger';
import type { LockOptions } from './documentStore';
import { delay } from '@/utils/delay';

const DEFAULT_RETRY_INTERVAL_MS = 100;
const DEFAULT_STALE_LOCK_MS = 60_000;

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Run `fn` while holding an exclusive lock file.
 *
 * The lock is a file created with O_EXCL, so it works across processes.
 * Waits at most `lockTimeoutMs`, then throws LockTimeoutError without calling `fn`.
 */
export async function withFileLock<T>(
    lockFile: string,
    options: LockOptions,
    fn: () => Promise<T>
): Promise<T> {
    const retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
    const staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
    const deadline = Date.now() + options.lockTimeoutMs;

    let fileHandle: FileHandle | undefined;
    while (!fileHandle) {
        try {
            // O_CREAT | O_EXCL | O_WRONLY = create exclusively, fail if exists
            fileHandle = await open(lockFile, constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY);
        } catch (err) {
            if (!isErrnoException(err)) {
                throw err;
            }
            if (err.code === 'ENOENT') {
                await mkdir(dirname(lockFile), { recursive: true });
                continue;
            }
            if (err.code !== 'EEXIST') {
                throw err;
            }

            await breakStaleLock(lockFile, staleLockMs);

            if (Date.now() >= deadline) {
                throw new LockTimeoutError(lockFile, options.lockTimeoutMs);
            }
            await delay(Math.min(retryIntervalMs, Math.max(0, deadline - Date.now())));
        }
    }

    try {
        await fileHandle.writeFile(String(process.pid));
        return await fn();
    } finally {
        await fileHandle.close();
        await unlink(lockFile).catch((error: unknown) => {
            logger.debug(`[LOCK] Failed to remove ${lockFile}:`, error);
        });
    }
}

async function breakStaleLock(lockFile: string, staleLockMs: number): Promise<void> {
    try {
        const stats = await stat(lockFile);
        if (Date.now() - stats.mtimeMs > staleLockMs) {
            logger.debug(`[LOCK] Breaking stale lock ${lockFile}`);
            await unlink(lockFile);
        }
    } catch (error) {
        // The holder released it between our open and stat
        if (!isErrnoException(error) || error.code !== 'ENOENT') {
            throw error;
        }
    }
}
