/**
 * Error types shared by the stores, the registry and the router.
 *
 * Callers distinguish them with `instanceof`; none of them is fatal to the
 * dispatcher, which records the failure and retries on the next tick.
 */

export class LockTimeoutError extends Error {
    constructor(
        public readonly resource: string,
        public readonly waitedMs: number
    ) {
        super(`Failed to acquire lock on ${resource} after ${waitedMs}ms`);
        this.name = 'LockTimeoutError';
    }
}

export class CorruptDocumentError extends Error {
    constructor(
        public readonly resource: string,
        detail: string
    ) {
        super(`Document ${resource} is unreadable: ${detail}`);
        this.name = 'CorruptDocumentError';
    }
}

/** A dependency is not done yet. Expected during normal scheduling. */
export class StillBlockedError extends Error {
    constructor(
        public readonly taskId: string,
        public readonly pending: string[]
    ) {
        super(`Task ${taskId} is still blocked by ${pending.join(', ')}`);
        this.name = 'StillBlockedError';
    }
}

export class InvalidTransitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidTransitionError';
    }
}

export class WorkerBusyError extends Error {
    constructor(
        public readonly workerId: string,
        public readonly activeTaskId: string
    ) {
        super(`Worker ${workerId} already has an open task (${activeTaskId})`);
        this.name = 'WorkerBusyError';
    }
}

export class InvalidBloomLevelError extends Error {
    constructor(public readonly level: unknown) {
        super(`Bloom level must be an integer between 1 and 6, got ${String(level)}`);
        this.name = 'InvalidBloomLevelError';
    }
}

export class UnknownWorkerError extends Error {
    constructor(public readonly workerId: string) {
        super(`Unknown worker: ${workerId}`);
        this.name = 'UnknownWorkerError';
    }
}

/** The execution-context collaborator did not carry out a control action */
export class WorkerControlError extends Error {
    constructor(
        public readonly workerId: string,
        public readonly action: 'nudge' | 'reset'
    ) {
        super(`Could not ${action} worker ${workerId}`);
        this.name = 'WorkerControlError';
    }
}
