import * as z from 'zod';
import { configuration } from '@/configuration';
import type { DocumentStore } from '@/persistence/documentStore';
import { FileDocumentStore } from '@/persistence/fileDocumentStore';

/**
 * Runtime facts about a worker that change while it runs, kept apart from
 * the static fleet file.
 */
export const WorkerStateSchema = z.object({
    /** Model currently active in the CLI, once the dispatcher has switched it */
    model: z.string().min(1).optional(),
    /** The turn-completion hook already held this turn back once */
    deferredOnce: z.boolean().default(false),
    lastNudgeAt: z.string().optional(),
    /** Unread count the last nudge was about */
    lastNudgeUnread: z.number().int().nonnegative().optional(),
});

export type WorkerState = z.infer<typeof WorkerStateSchema>;

const EMPTY_STATE: WorkerState = { deferredOnce: false };

export class WorkerStateStore {
    constructor(private readonly store: DocumentStore<WorkerState>) {}

    static open(directory: string = configuration.workerStateDir): WorkerStateStore {
        return new WorkerStateStore(new FileDocumentStore(directory, WorkerStateSchema, {
            lockTimeoutMs: configuration.lockTimeoutMs,
            staleLockMs: configuration.staleLockMs,
        }));
    }

    async get(workerId: string): Promise<WorkerState> {
        return (await this.store.read(workerId)) ?? { ...EMPTY_STATE };
    }

    async patch(workerId: string, changes: Partial<WorkerState>): Promise<WorkerState> {
        return this.store.update(workerId, current => ({ ...(current ?? EMPTY_STATE), ...changes }));
    }

    /** Model the worker is running right now: the last switch, or its configured model */
    async activeModel(workerId: string, configuredModel: string): Promise<string> {
        return (await this.get(workerId)).model ?? configuredModel;
    }
}
