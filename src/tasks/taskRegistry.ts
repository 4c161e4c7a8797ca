import { configuration } from '@/configuration';
import { CorruptDocumentError, InvalidTransitionError, StillBlockedError, WorkerBusyError } from '@/errors';
import type { DocumentStore } from '@/persistence/documentStore';
import { FileDocumentStore } from '@/persistence/fileDocumentStore';
import { assertBloomLevel } from '@/routing/capabilityRouter';
import { logger } from '@/ui/logger';
import { TaskDocumentSchema, type DeliveryMarker, type LocatedTask, type NewTask, type Task, type TaskDocument, type TaskStatus } from './types';

const EMPTY_DOCUMENT: TaskDocument = { task: null, history: [] };

function isOpen(task: Task | null): task is Task {
    return task !== null && task.status !== 'done';
}

function sameIds(a: string[] = [], b: string[] = []): boolean {
    return a.length === b.length && a.every((id, i) => id === b[i]);
}

/**
 * Holds the single active task of every worker.
 *
 * Each worker's document is mutated under its own lock. Dependency checks
 * read the other workers' documents without locking: a predecessor can only
 * move towards done, so a done seen in a snapshot stays done.
 */
export class TaskRegistry {
    constructor(private readonly store: DocumentStore<TaskDocument>) {}

    static open(directory: string = configuration.tasksDir): TaskRegistry {
        return new TaskRegistry(new FileDocumentStore(directory, TaskDocumentSchema, {
            lockTimeoutMs: configuration.lockTimeoutMs,
            staleLockMs: configuration.staleLockMs,
        }));
    }

    locate(workerId: string): string {
        return this.store.locate(workerId);
    }

    async get(workerId: string): Promise<Task | null> {
        const document = await this.store.read(workerId);
        return document?.task ?? null;
    }

    async history(workerId: string): Promise<Task[]> {
        const document = await this.store.read(workerId);
        return document?.history ?? [];
    }

    /**
     * Writes the worker's task. A finished task being replaced moves to the
     * history; an open task can only be overwritten by itself. Rewriting the
     * current task keeps its status and lineage: status changes go through
     * `transition`, replacements of a finished task through `redo`.
     */
    async set(workerId: string, task: Task): Promise<Task> {
        const snapshot = await this.get(workerId);
        const replacing = snapshot === null || snapshot.task_id !== task.task_id;
        if (replacing) {
            if (task.redo_of !== undefined) {
                throw new InvalidTransitionError(`Task ${task.task_id} carries redo_of; use redo() to replace a finished task`);
            }
            await this.checkNewTask(task);
            const expected = (task.blocked_by ?? []).length > 0 ? 'blocked' : 'assigned';
            if (task.status !== expected) {
                throw new InvalidTransitionError(`Task ${task.task_id} must start as ${expected}, not ${task.status}`);
            }
        }
        await this.write(workerId, task, replacing);
        return task;
    }

    /** New work for a worker: blocked when it has predecessors, assigned otherwise */
    async create(workerId: string, input: NewTask): Promise<Task> {
        if (input.redo_of !== undefined) {
            throw new InvalidTransitionError(`Task ${input.task_id} carries redo_of; use redo() to replace a finished task`);
        }
        const task = await this.buildTask(input);
        await this.write(workerId, task, true);
        logger.debug(`[TASKS] Created ${task.task_id} for ${workerId} as ${task.status}`);
        return task;
    }

    async transition(workerId: string, status: TaskStatus): Promise<Task> {
        const snapshot = await this.get(workerId);
        if (!snapshot) {
            throw new InvalidTransitionError(`Worker ${workerId} has no task`);
        }

        if (snapshot.status === 'blocked' && status === 'assigned') {
            const pending = await this.pendingPredecessors(snapshot);
            if (pending.length > 0) {
                throw new StillBlockedError(snapshot.task_id, pending);
            }
        } else if (!(snapshot.status === 'assigned' && status === 'done')) {
            throw new InvalidTransitionError(`Task ${snapshot.task_id} cannot go from ${snapshot.status} to ${status}`);
        }

        const document = await this.store.update(workerId, current => {
            const existing = current ?? EMPTY_DOCUMENT;
            // Someone else moved the task while we were checking its predecessors
            if (!existing.task || existing.task.task_id !== snapshot.task_id || existing.task.status !== snapshot.status) {
                throw new InvalidTransitionError(`Task of ${workerId} changed during transition to ${status}`);
            }
            return { ...existing, task: { ...existing.task, status, timestamp: new Date().toISOString() } };
        });

        const updated = document.task;
        if (!updated) {
            throw new InvalidTransitionError(`Transition of ${snapshot.task_id} was not applied`);
        }
        logger.debug(`[TASKS] ${updated.task_id} (${workerId}) ${snapshot.status} -> ${status}`);
        return updated;
    }

    /**
     * Replaces the worker's finished task with a corrected successor. The
     * successor points back at it through redo_of; the old task is kept in
     * the history, marked as superseded.
     */
    async redo(workerId: string, input: NewTask): Promise<Task> {
        const { previous, task } = await this.prepareRedo(workerId, input);

        await this.store.update(workerId, current => {
            const document = current ?? EMPTY_DOCUMENT;
            if (!document.task || document.task.task_id !== previous.task_id || document.task.status !== 'done') {
                throw new InvalidTransitionError(`Task of ${workerId} changed before redo of ${previous.task_id}`);
            }
            return {
                task,
                history: [...document.history, { ...document.task, superseded_by: task.task_id }],
            };
        });

        logger.debug(`[TASKS] ${task.task_id} redoes ${previous.task_id} on ${workerId}`);
        return task;
    }

    /** Throws what `redo` would throw for this input, without writing anything */
    async checkRedo(workerId: string, input: NewTask): Promise<void> {
        await this.prepareRedo(workerId, input);
    }

    /** Records that a notice about the worker's current task was delivered */
    async mark(workerId: string, taskId: string, marker: DeliveryMarker, at: string = new Date().toISOString()): Promise<Task> {
        const document = await this.store.update(workerId, current => {
            const existing = current ?? EMPTY_DOCUMENT;
            if (!existing.task || existing.task.task_id !== taskId) {
                throw new InvalidTransitionError(`Task ${taskId} is no longer current on ${workerId}`);
            }
            const task = marker === 'announced_at'
                ? { ...existing.task, announced_at: at }
                : { ...existing.task, reported_at: at };
            return { ...existing, task };
        });

        const marked = document.task;
        if (!marked) {
            throw new InvalidTransitionError(`Marking ${taskId} was not applied`);
        }
        return marked;
    }

    /** Predecessors that are not done anywhere in the registry. Unknown ids count as pending */
    async pendingPredecessors(task: Task): Promise<string[]> {
        const predecessors = task.blocked_by ?? [];
        if (predecessors.length === 0) {
            return [];
        }

        const index = await this.index();
        return predecessors.filter(id => index.get(id)?.task.status !== 'done');
    }

    async findTask(taskId: string): Promise<LocatedTask | null> {
        return (await this.index()).get(taskId) ?? null;
    }

    /** Current task of every worker that has one */
    async list(): Promise<Array<{ workerId: string; task: Task }>> {
        const result: Array<{ workerId: string; task: Task }> = [];
        for (const { workerId, document } of await this.readAll()) {
            if (document.task) {
                result.push({ workerId, task: document.task });
            }
        }
        return result;
    }

    /** The redo chain ending at `taskId`, newest first */
    async lineage(taskId: string): Promise<Task[]> {
        const index = await this.index();
        const chain: Task[] = [];
        const seen = new Set<string>();

        let cursor: string | undefined = taskId;
        while (cursor !== undefined && !seen.has(cursor)) {
            seen.add(cursor);
            const located = index.get(cursor);
            if (!located) break;
            chain.push(located.task);
            cursor = located.task.redo_of;
        }
        return chain;
    }

    private async index(): Promise<Map<string, LocatedTask>> {
        const index = new Map<string, LocatedTask>();
        for (const { workerId, document } of await this.readAll()) {
            for (const task of document.history) {
                index.set(task.task_id, { workerId, task, current: false });
            }
            if (document.task) {
                index.set(document.task.task_id, { workerId, task: document.task, current: true });
            }
        }
        return index;
    }

    /** Every readable document. An unreadable one is skipped, so its tasks count as unknown */
    private async readAll(): Promise<Array<{ workerId: string; document: TaskDocument }>> {
        const documents: Array<{ workerId: string; document: TaskDocument }> = [];
        for (const workerId of await this.store.keys()) {
            try {
                const document = await this.store.read(workerId);
                if (document) {
                    documents.push({ workerId, document });
                }
            } catch (error) {
                if (!(error instanceof CorruptDocumentError)) {
                    throw error;
                }
                logger.warn(`[TASKS] Skipping tasks of ${workerId}: ${error.message}`);
            }
        }
        return documents;
    }

    private async prepareRedo(workerId: string, input: NewTask): Promise<{ previous: Task; task: Task }> {
        const previous = await this.get(workerId);
        if (!previous || previous.status !== 'done') {
            throw new InvalidTransitionError(`Worker ${workerId} has no finished task to redo`);
        }
        if (input.redo_of !== undefined && input.redo_of !== previous.task_id) {
            throw new InvalidTransitionError(`redo_of must be ${previous.task_id}, got ${input.redo_of}`);
        }
        const task = await this.buildTask({ ...input, redo_of: previous.task_id });
        return { previous, task };
    }

    private async checkNewTask(task: Pick<Task, 'task_id' | 'bloom_level' | 'blocked_by'>): Promise<void> {
        if (task.bloom_level !== undefined) {
            assertBloomLevel(task.bloom_level);
        }
        if (task.blocked_by?.includes(task.task_id)) {
            throw new InvalidTransitionError(`Task ${task.task_id} cannot block itself`);
        }
        if (await this.findTask(task.task_id)) {
            throw new InvalidTransitionError(`Task id ${task.task_id} is already in use`);
        }
    }

    private async buildTask(input: NewTask): Promise<Task> {
        await this.checkNewTask(input);

        const blockedBy = input.blocked_by ?? [];
        return {
            task_id: input.task_id,
            parent_id: input.parent_id,
            type: input.type,
            description: input.description,
            ...(input.bloom_level !== undefined ? { bloom_level: input.bloom_level } : {}),
            ...(blockedBy.length > 0 ? { blocked_by: [...blockedBy] } : {}),
            ...(input.redo_of !== undefined ? { redo_of: input.redo_of } : {}),
            status: blockedBy.length > 0 ? 'blocked' : 'assigned',
            timestamp: new Date().toISOString(),
        };
    }

    private async write(workerId: string, task: Task, replacing: boolean): Promise<void> {
        await this.store.update(workerId, current => this.replace(workerId, current ?? EMPTY_DOCUMENT, task, replacing));
    }

    private replace(workerId: string, document: TaskDocument, task: Task, replacing: boolean): TaskDocument {
        const current = document.task;
        if (current && current.task_id === task.task_id) {
            if (task.status !== current.status) {
                throw new InvalidTransitionError(`Task ${task.task_id} is ${current.status}; use transition() to change its status`);
            }
            if (task.redo_of !== current.redo_of) {
                throw new InvalidTransitionError(`redo_of of ${task.task_id} cannot change`);
            }
            if (!sameIds(task.blocked_by, current.blocked_by)) {
                throw new InvalidTransitionError(`blocked_by of ${task.task_id} cannot change`);
            }
            return { ...document, task };
        }
        if (!replacing) {
            throw new InvalidTransitionError(`Task of ${workerId} changed while writing ${task.task_id}`);
        }
        if (!current) {
            return { ...document, task };
        }
        if (isOpen(current)) {
            throw new WorkerBusyError(workerId, current.task_id);
        }
        return { task, history: [...document.history, current] };
    }
}
