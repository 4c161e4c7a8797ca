/**
 * fleet.json: the workers we drive and, optionally, the routing table.
 *
 * {
 *   "workers": [{ "id": "worker1", "pane": "fleet:agents.1", "cli": "codex", "model": "spark" }],
 *   "capability_tiers": { "spark": { "max_bloom": 3, "cost_group": "chatgpt_pro", "cli": "codex" } },
 *   "routing": { "mode": "auto" }
 * }
 *
 * The worker list is required. The routing part is parsed separately and
 * degrades to "routing disabled" on any problem.
 */

import { readFile } from 'node:fs/promises';
import * as z from 'zod';
import { CLI_FAMILIES } from '@/agent/cliFamilies';
import { parseCapabilityConfig, type CapabilityConfig } from '@/routing/capabilityConfig';
import { UnknownWorkerError } from '@/errors';

export const WorkerSchema = z.object({
    id: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'worker id may only contain letters, digits, dot, dash and underscore'),
    /** tmux target of the pane the worker's CLI runs in, e.g. fleet:agents.1 */
    pane: z.string().min(1),
    cli: z.enum(CLI_FAMILIES),
    /** Model the worker starts with */
    model: z.string().min(1),
});

export type Worker = z.infer<typeof WorkerSchema>;

const WorkersSectionSchema = z.object({
    workers: z.array(WorkerSchema).superRefine((workers, ctx) => {
        const seen = new Set<string>();
        workers.forEach((worker, index) => {
            if (seen.has(worker.id)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `duplicate worker id ${worker.id}` });
            }
            seen.add(worker.id);
        });
    }),
});

export interface FleetConfig {
    workers: Worker[];
    capabilities: CapabilityConfig | null;
}

export class FleetConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FleetConfigError';
    }
}

export function parseFleetConfig(raw: unknown, source = 'fleet config'): FleetConfig {
    const parsed = WorkersSectionSchema.safeParse(raw);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
        throw new FleetConfigError(`Invalid ${source}: ${detail}`);
    }

    return {
        workers: parsed.data.workers,
        capabilities: parseCapabilityConfig(raw),
    };
}

export async function loadFleetConfig(file: string): Promise<FleetConfig> {
    let content: string;
    try {
        content = await readFile(file, 'utf-8');
    } catch (error) {
        throw new FleetConfigError(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new FleetConfigError(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return parseFleetConfig(raw, file);
}

export function findWorker(config: FleetConfig, workerId: string): Worker {
    const worker = config.workers.find(w => w.id === workerId);
    if (!worker) {
        throw new UnknownWorkerError(workerId);
    }
    return worker;
}
