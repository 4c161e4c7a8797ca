/**
 * Keyed document storage used by the mailboxes, the task registry and the
 * per-worker runtime state.
 *
 * One document per key (a worker id). Every mutation goes through `update`,
 * which holds a lock scoped to that single key for the whole
 * read-modify-write and replaces the document atomically. Reads take no lock
 * and may observe a state a concurrent writer is about to change.
 */

export type DocumentUpdater<T> = (current: T | null) => T | Promise<T>;

export interface DocumentStore<T> {
    /** Lock-free snapshot, null when the document does not exist yet */
    read(key: string): Promise<T | null>;

    /**
     * Locked read-modify-write. Throws LockTimeoutError when the lock cannot
     * be taken in time; in that case, and when the updater or the write
     * fails, the stored document is left untouched.
     */
    update(key: string, updater: DocumentUpdater<T>): Promise<T>;

    /** Keys of every stored document, sorted */
    keys(): Promise<string[]>;

    /** Human readable location of a document, used in messages */
    locate(key: string): string;
}

export interface LockOptions {
    /** Bounded wait for the lock before giving up */
    lockTimeoutMs: number;
    /** Delay between lock attempts */
    retryIntervalMs?: number;
    /** A lock older than this is considered abandoned and broken */
    staleLockMs?: number;
}

const KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function assertValidKey(key: string): void {
    if (!KEY_PATTERN.test(key) || key.includes('..')) {
        throw new Error(`Invalid document key: ${JSON.stringify(key)}`);
    }
}
