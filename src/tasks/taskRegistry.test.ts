import { beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TaskRegistry } from './taskRegistry';
import { TaskDocumentSchema, type NewTask, type TaskDocument } from './types';
import { InvalidBloomLevelError, InvalidTransitionError, StillBlockedError, WorkerBusyError } from '@/errors';
import { FileDocumentStore } from '@/persistence/fileDocumentStore';
import { MemoryDocumentStore } from '@/persistence/memoryDocumentStore';
import { logger } from '@/ui/logger';

vi.mock('@/ui/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

function input(taskId: string, extra: Partial<NewTask> = {}): NewTask {
    return { task_id: taskId, parent_id: 'cmd_007', type: 'implement', description: `work on ${taskId}`, ...extra };
}

describe('TaskRegistry', () => {
    let registry: TaskRegistry;

    beforeEach(() => {
        registry = new TaskRegistry(new MemoryDocumentStore<TaskDocument>());
    });

    describe('create', () => {
        it('assigns a task without predecessors', async () => {
            const task = await registry.create('worker1', input('A', { bloom_level: 3 }));

            expect(task).toMatchObject({ task_id: 'A', status: 'assigned', bloom_level: 3 });
            expect(task.blocked_by).toBeUndefined();
            expect(await registry.get('worker1')).toEqual(task);
        });

        it('blocks a task with predecessors', async () => {
            const task = await registry.create('worker1', input('B', { blocked_by: ['A'] }));
            expect(task.status).toBe('blocked');
            expect(task.blocked_by).toEqual(['A']);
        });

        it('treats an empty predecessor list as none', async () => {
            const task = await registry.create('worker1', input('B', { blocked_by: [] }));
            expect(task.status).toBe('assigned');
            expect(task.blocked_by).toBeUndefined();
        });

        it('rejects a second open task for the same worker', async () => {
            await registry.create('worker1', input('A'));
            await expect(registry.create('worker1', input('B'))).rejects.toThrow(WorkerBusyError);
            expect((await registry.get('worker1'))?.task_id).toBe('A');
        });

        it('archives a finished task when new work arrives', async () => {
            await registry.create('worker1', input('A'));
            await registry.transition('worker1', 'done');
            await registry.create('worker1', input('B'));

            expect((await registry.get('worker1'))?.task_id).toBe('B');
            expect((await registry.history('worker1')).map(t => [t.task_id, t.status])).toEqual([['A', 'done']]);
        });

        it('rejects reused ids, self-blocking, redo_of and bad bloom levels', async () => {
            await registry.create('worker1', input('A'));
            await expect(registry.create('worker2', input('A'))).rejects.toThrow(InvalidTransitionError);
            await expect(registry.create('worker2', input('C', { blocked_by: ['C'] }))).rejects.toThrow(InvalidTransitionError);
            await expect(registry.create('worker2', input('D', { redo_of: 'A' }))).rejects.toThrow(InvalidTransitionError);
            await expect(registry.create('worker2', input('E', { bloom_level: 7 }))).rejects.toThrow(InvalidBloomLevelError);
            expect(await registry.get('worker2')).toBeNull();
        });
    });

    describe('set', () => {
        it('refuses to reopen a finished redo or drop its lineage', async () => {
            await registry.create('worker1', input('A'));
            await registry.transition('worker1', 'done');
            await registry.redo('worker1', input('B'));
            const doneB = await registry.transition('worker1', 'done');

            await expect(registry.set('worker1', { ...doneB, status: 'assigned' }))
                .rejects.toThrow('Task B is done; use transition() to change its status');
            await expect(registry.set('worker1', { ...doneB, redo_of: undefined }))
                .rejects.toThrow('redo_of of B cannot change');
            expect(await registry.get('worker1')).toMatchObject({ task_id: 'B', status: 'done', redo_of: 'A' });
        });

        it('refuses to change the predecessors of the current task', async () => {
            const blocked = await registry.create('worker1', input('B', { blocked_by: ['X'] }));

            await expect(registry.set('worker1', { ...blocked, blocked_by: undefined }))
                .rejects.toThrow('blocked_by of B cannot change');
            await expect(registry.set('worker1', { ...blocked, blocked_by: ['Y'] }))
                .rejects.toThrow('blocked_by of B cannot change');
            expect((await registry.get('worker1'))?.blocked_by).toEqual(['X']);
        });

        it('rewrites other fields of the current task', async () => {
            const task = await registry.create('worker1', input('A'));

            await registry.set('worker1', { ...task, description: 'narrowed scope' });

            expect(await registry.get('worker1')).toEqual({ ...task, description: 'narrowed scope' });
        });

        it('checks a new task like create does', async () => {
            const a = await registry.create('worker1', input('A'));
            const base = { parent_id: 'cmd_007', type: 'implement', description: 'work', timestamp: a.timestamp };

            await expect(registry.set('worker2', a)).rejects.toThrow('Task id A is already in use');
            await expect(registry.set('worker2', { ...base, task_id: 'C', blocked_by: ['A'], status: 'assigned' }))
                .rejects.toThrow('Task C must start as blocked, not assigned');
            await expect(registry.set('worker2', { ...base, task_id: 'D', status: 'done' }))
                .rejects.toThrow('Task D must start as assigned, not done');
            await expect(registry.set('worker2', { ...base, task_id: 'E', redo_of: 'A', status: 'assigned' }))
                .rejects.toThrow(InvalidTransitionError);
            expect(await registry.get('worker2')).toBeNull();
        });

        it('archives a finished task it replaces', async () => {
            const a = await registry.create('worker1', input('A'));
            await registry.transition('worker1', 'done');

            await registry.set('worker1', { ...a, task_id: 'B', status: 'assigned' });

            expect((await registry.get('worker1'))?.task_id).toBe('B');
            expect((await registry.history('worker1')).map(t => t.task_id)).toEqual(['A']);
        });
    });

    describe('mark', () => {
        it('stamps the current task and refuses a task that moved on', async () => {
            await registry.create('worker1', input('A'));

            const marked = await registry.mark('worker1', 'A', 'announced_at', '2026-03-01T09:00:00.000Z');
            expect(marked.announced_at).toBe('2026-03-01T09:00:00.000Z');
            expect((await registry.get('worker1'))?.announced_at).toBe('2026-03-01T09:00:00.000Z');

            await expect(registry.mark('worker1', 'Z', 'reported_at')).rejects.toThrow('Task Z is no longer current on worker1');
        });
    });

    describe('transition', () => {
        it('keeps a task blocked until a predecessor on another worker is done', async () => {
            await registry.create('worker1', input('A'));
            await registry.create('worker2', input('B', { blocked_by: ['A'] }));

            const attempt = registry.transition('worker2', 'assigned');
            await expect(attempt).rejects.toThrow(StillBlockedError);
            await expect(attempt).rejects.toMatchObject({ taskId: 'B', pending: ['A'] });
            expect((await registry.get('worker2'))?.status).toBe('blocked');

            await registry.transition('worker1', 'done');
            const released = await registry.transition('worker2', 'assigned');

            expect(released.status).toBe('assigned');
        });

        it('finds predecessors in a worker history', async () => {
            await registry.create('worker1', input('A'));
            await registry.transition('worker1', 'done');
            await registry.create('worker1', input('A2'));
            const blocked = await registry.create('worker2', input('B', { blocked_by: ['A', 'A2', 'ghost'] }));

            expect(await registry.pendingPredecessors(blocked)).toEqual(['A2', 'ghost']);
        });

        it('allows only blocked to assigned and assigned to done', async () => {
            await expect(registry.transition('worker1', 'done')).rejects.toThrow(InvalidTransitionError);

            await registry.create('worker1', input('A'));
            await expect(registry.transition('worker1', 'blocked')).rejects.toThrow(InvalidTransitionError);
            await expect(registry.transition('worker1', 'assigned')).rejects.toThrow(InvalidTransitionError);

            await registry.transition('worker1', 'done');
            await expect(registry.transition('worker1', 'assigned')).rejects.toThrow(InvalidTransitionError);
            await expect(registry.transition('worker1', 'done')).rejects.toThrow(InvalidTransitionError);

            await registry.create('worker2', input('B', { blocked_by: ['A'] }));
            await expect(registry.transition('worker2', 'done')).rejects.toThrow(InvalidTransitionError);
        });

        it('updates the timestamp on every transition', async () => {
            vi.useFakeTimers();
            try {
                vi.setSystemTime(new Date('2026-03-01T09:00:00.000Z'));
                await registry.create('worker1', input('A'));
                vi.setSystemTime(new Date('2026-03-01T09:30:00.000Z'));
                const done = await registry.transition('worker1', 'done');
                expect(done.timestamp).toBe('2026-03-01T09:30:00.000Z');
            } finally {
                vi.useRealTimers();
            }
        });
    });

    describe('redo', () => {
        it('chains A <- B <- C with queryable lineage', async () => {
            await registry.create('worker1', input('A'));
            await registry.transition('worker1', 'done');

            const b = await registry.redo('worker1', input('B'));
            expect(b).toMatchObject({ task_id: 'B', redo_of: 'A', status: 'assigned' });
            await registry.transition('worker1', 'done');

            const c = await registry.redo('worker1', input('C', { redo_of: 'B' }));
            expect(c.redo_of).toBe('B');

            expect((await registry.lineage('C')).map(t => t.task_id)).toEqual(['C', 'B', 'A']);
            expect((await registry.history('worker1')).map(t => [t.task_id, t.superseded_by])).toEqual([
                ['A', 'B'],
                ['B', 'C'],
            ]);
            expect(await registry.findTask('A')).toMatchObject({ workerId: 'worker1', current: false });
            expect(await registry.findTask('C')).toMatchObject({ workerId: 'worker1', current: true });
        });

        it('needs a finished task to replace', async () => {
            await expect(registry.redo('worker1', input('B'))).rejects.toThrow(InvalidTransitionError);

            await registry.create('worker1', input('A'));
            await expect(registry.redo('worker1', input('B'))).rejects.toThrow(InvalidTransitionError);
            expect((await registry.get('worker1'))?.task_id).toBe('A');
        });

        it('rejects a redo_of that names another task', async () => {
            await registry.create('worker1', input('A'));
            await registry.transition('worker1', 'done');

            await expect(registry.redo('worker1', input('B', { redo_of: 'Z' }))).rejects.toThrow('redo_of must be A, got Z');
        });

        it('checks its input without writing', async () => {
            await registry.create('worker1', input('A'));
            await registry.transition('worker1', 'done');

            await expect(registry.checkRedo('worker1', input('A'))).rejects.toThrow('Task id A is already in use');
            await expect(registry.checkRedo('worker1', input('B', { bloom_level: 9 }))).rejects.toThrow(InvalidBloomLevelError);
            await expect(registry.checkRedo('worker1', input('B'))).resolves.toBeUndefined();
            expect((await registry.get('worker1'))?.task_id).toBe('A');
        });

        it('can be blocked like any new task', async () => {
            await registry.create('worker1', input('A'));
            await registry.transition('worker1', 'done');
            await registry.create('worker2', input('X'));

            const b = await registry.redo('worker1', input('B', { blocked_by: ['X'] }));

            expect(b).toMatchObject({ status: 'blocked', redo_of: 'A' });
        });
    });

    it('lists current tasks per worker', async () => {
        await registry.create('worker2', input('B'));
        await registry.create('worker1', input('A'));

        expect((await registry.list()).map(entry => [entry.workerId, entry.task.task_id])).toEqual([
            ['worker1', 'A'],
            ['worker2', 'B'],
        ]);
    });

    describe('on disk', () => {
        it('keeps current task and history in the worker file', async () => {
            const directory = await mkdtemp(join(tmpdir(), 'fleet-tasks-'));
            try {
                const onDisk = new TaskRegistry(new FileDocumentStore(directory, TaskDocumentSchema, { lockTimeoutMs: 1_000 }));
                await onDisk.create('worker1', input('A'));
                await onDisk.transition('worker1', 'done');
                await onDisk.redo('worker1', input('B'));

                const document = TaskDocumentSchema.parse(JSON.parse(await readFile(join(directory, 'worker1.json'), 'utf-8')));
                expect(document.task?.task_id).toBe('B');
                expect(document.history.map(t => t.task_id)).toEqual(['A']);
                expect(onDisk.locate('worker1')).toBe(join(directory, 'worker1.json'));
            } finally {
                await rm(directory, { recursive: true, force: true });
            }
        });

        it('skips an unreadable worker file instead of failing every lookup', async () => {
            const directory = await mkdtemp(join(tmpdir(), 'fleet-tasks-'));
            try {
                const onDisk = new TaskRegistry(new FileDocumentStore(directory, TaskDocumentSchema, { lockTimeoutMs: 1_000 }));
                await onDisk.create('worker1', input('A'));
                await onDisk.transition('worker1', 'done');
                await writeFile(join(directory, 'worker9.json'), '{ nope');

                const blocked = await onDisk.create('worker2', input('B', { blocked_by: ['A', 'Z9'] }));

                expect(await onDisk.pendingPredecessors(blocked)).toEqual(['Z9']);
                expect((await onDisk.list()).map(entry => [entry.workerId, entry.task.task_id])).toEqual([
                    ['worker1', 'A'],
                    ['worker2', 'B'],
                ]);
                expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('Skipping tasks of worker9'));
            } finally {
                await rm(directory, { recursive: true, force: true });
            }
        });
    });
});
