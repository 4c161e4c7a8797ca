import { describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findWorker, FleetConfigError, loadFleetConfig, parseFleetConfig } from './fleetConfig';
import { UnknownWorkerError } from '@/errors';

vi.mock('@/ui/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

const workers = [
    { id: 'worker1', pane: 'fleet:agents.1', cli: 'codex', model: 'spark' },
    { id: 'worker2', pane: 'fleet:agents.2', cli: 'claude', model: 'sonnet' },
];

describe('parseFleetConfig', () => {
    it('reads workers and the routing table', () => {
        const config = parseFleetConfig({
            workers,
            capability_tiers: { spark: { max_bloom: 3, cli: 'codex' } },
            routing: { mode: 'manual' },
        });

        expect(config.workers.map(w => w.id)).toEqual(['worker1', 'worker2']);
        expect(config.capabilities).toEqual({
            tiers: [{ modelId: 'spark', max_bloom: 3, cost_group: 'default', cli: 'codex' }],
            mode: 'manual',
            costGroupOrder: ['default'],
        });
    });

    it('disables routing when the table is broken but keeps the workers', () => {
        const config = parseFleetConfig({ workers, capability_tiers: { spark: { max_bloom: 9 } } });

        expect(config.workers).toHaveLength(2);
        expect(config.capabilities).toBeNull();
    });

    it('rejects duplicate ids and unknown CLI families', () => {
        expect(() => parseFleetConfig({ workers: [workers[0], workers[0]] })).toThrow('duplicate worker id worker1');
        expect(() => parseFleetConfig({ workers: [{ ...workers[0], cli: 'gemini' }] }, 'fleet.json')).toThrow(FleetConfigError);
        expect(() => parseFleetConfig({})).toThrow('Invalid fleet config: workers: Required');
    });
});

describe('loadFleetConfig', () => {
    it('loads a file and reports unreadable ones', async () => {
        const directory = await mkdtemp(join(tmpdir(), 'fleet-config-'));
        try {
            const file = join(directory, 'fleet.json');
            await writeFile(file, JSON.stringify({ workers }));
            expect((await loadFleetConfig(file)).capabilities).toBeNull();

            await writeFile(file, '{ nope');
            await expect(loadFleetConfig(file)).rejects.toThrow(FleetConfigError);
            await expect(loadFleetConfig(join(directory, 'missing.json'))).rejects.toThrow(/^Cannot read /);
        } finally {
            await rm(directory, { recursive: true, force: true });
        }
    });
});

describe('findWorker', () => {
    it('throws for unknown ids', () => {
        const config = parseFleetConfig({ workers });
        expect(findWorker(config, 'worker2').cli).toBe('claude');
        expect(() => findWorker(config, 'worker3')).toThrow(UnknownWorkerError);
    });
});
