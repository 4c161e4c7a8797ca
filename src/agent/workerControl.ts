import type { Worker } from '@/fleet/fleetConfig';

/**
 * What the dispatcher needs from whatever hosts the workers' CLIs.
 * All three are best effort: they report failure instead of throwing.
 */
export interface WorkerControl {
    /** Recent output of the worker, null when it cannot be observed */
    capture(worker: Worker): Promise<string | null>;
    /** Types a short line into the worker's input so it re-checks its inbox */
    nudge(worker: Worker, text: string): Promise<boolean>;
    /** Drops the worker's conversation so the next task starts from a clean context */
    reset(worker: Worker): Promise<boolean>;
}
