import { LockTimeoutError } from '@/errors';
import { delay } from '@/utils/delay';
import { assertValidKey, type DocumentStore, type DocumentUpdater, type LockOptions } from './documentStore';

/**
 * In-process DocumentStore with the same locking contract as the file store.
 * Documents are deep-copied on the way in and out.
 */
export class MemoryDocumentStore<T> implements DocumentStore<T> {
    private readonly documents = new Map<string, T>();
    private readonly held = new Set<string>();

    constructor(
        private readonly lockOptions: LockOptions = { lockTimeoutMs: 1_000, retryIntervalMs: 5 }
    ) {}

    locate(key: string): string {
        assertValidKey(key);
        return `memory://${key}`;
    }

    async read(key: string): Promise<T | null> {
        assertValidKey(key);
        const document = this.documents.get(key);
        return document === undefined ? null : structuredClone(document);
    }

    async update(key: string, updater: DocumentUpdater<T>): Promise<T> {
        assertValidKey(key);
        await this.acquire(key);
        try {
            const next = await updater(await this.read(key));
            this.documents.set(key, structuredClone(next));
            return structuredClone(next);
        } finally {
            this.held.delete(key);
        }
    }

    async keys(): Promise<string[]> {
        return [...this.documents.keys()].sort();
    }

    private async acquire(key: string): Promise<void> {
        const retryIntervalMs = this.lockOptions.retryIntervalMs ?? 5;
        const deadline = Date.now() + this.lockOptions.lockTimeoutMs;

        while (this.held.has(key)) {
            if (Date.now() >= deadline) {
                throw new LockTimeoutError(this.locate(key), this.lockOptions.lockTimeoutMs);
            }
            await delay(retryIntervalMs);
        }
        this.held.add(key);
    }
}
