import { describe, expect, it } from 'vitest';
import { WorkerStateStore, type WorkerState } from './workerState';
import { MemoryDocumentStore } from '@/persistence/memoryDocumentStore';

describe('WorkerStateStore', () => {
    it('starts from an empty state', async () => {
        const states = new WorkerStateStore(new MemoryDocumentStore<WorkerState>());
        expect(await states.get('worker1')).toEqual({ deferredOnce: false });
        expect(await states.activeModel('worker1', 'spark')).toBe('spark');
    });

    it('merges patches and tracks the active model', async () => {
        const states = new WorkerStateStore(new MemoryDocumentStore<WorkerState>());

        await states.patch('worker1', { deferredOnce: true });
        await states.patch('worker1', { model: 'codex' });

        expect(await states.get('worker1')).toEqual({ deferredOnce: true, model: 'codex' });
        expect(await states.activeModel('worker1', 'spark')).toBe('codex');
        expect(await states.activeModel('worker2', 'spark')).toBe('spark');
    });
});
