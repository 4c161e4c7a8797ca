import { readFile, writeFile, rename, unlink, mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type * as z from 'zod';
import { CorruptDocumentError } from '@/errors';
import { logger } from '@/ui/logger';
import { assertValidKey, type DocumentStore, type DocumentUpdater, type LockOptions } from './documentStore';
import { isErrnoException, withFileLock } from './fileLock';

/**
 * One pretty-printed JSON file per key inside `directory`.
 *
 * Writes go to a temporary file in the same directory and are renamed over
 * the target, so a reader sees either the old or the new document, never a
 * partial one.
 */
export class FileDocumentStore<T> implements DocumentStore<T> {
    constructor(
        private readonly directory: string,
        private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        private readonly lockOptions: LockOptions
    ) {}

    locate(key: string): string {
        assertValidKey(key);
        return join(this.directory, `${key}.json`);
    }

    async read(key: string): Promise<T | null> {
        const file = this.locate(key);

        let content: string;
        try {
            content = await readFile(file, 'utf8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            throw error;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            throw new CorruptDocumentError(file, error instanceof Error ? error.message : String(error));
        }

        const parsed = this.schema.safeParse(raw);
        if (!parsed.success) {
            throw new CorruptDocumentError(file, parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
        }
        return parsed.data;
    }

    async update(key: string, updater: DocumentUpdater<T>): Promise<T> {
        const file = this.locate(key);
        await mkdir(this.directory, { recursive: true });

        return withFileLock(`${file}.lock`, this.lockOptions, async () => {
            const current = await this.read(key);
            const next = await updater(current);
            await this.writeAtomically(file, next);
            return next;
        });
    }

    async keys(): Promise<string[]> {
        let entries: string[];
        try {
            entries = await readdir(this.directory);
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return [];
            }
            throw error;
        }

        return entries
            .filter(name => name.endsWith('.json'))
            .map(name => name.slice(0, -'.json'.length))
            .sort();
    }

    private async writeAtomically(file: string, document: T): Promise<void> {
        const tmpFile = `${file}.${process.pid}.${randomUUID()}.tmp`;
        try {
            await writeFile(tmpFile, JSON.stringify(document, null, 2) + '\n');
            await rename(tmpFile, file); // Atomic on POSIX
        } catch (error) {
            await unlink(tmpFile).catch((cleanupError: unknown) => {
                logger.debug(`[STORE] Could not remove ${tmpFile}:`, cleanupError);
            });
            throw error;
        }
    }
}
