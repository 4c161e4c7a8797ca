/**
 * The scheduling core. One tick walks the fleet once: it releases blocked
 * tasks whose predecessors are done, routes them to a capable model, and
 * nudges idle workers that have unread mail. Busy workers are never
 * interrupted; their turn-completion hook picks the mail up instead.
 *
 * Every failure is local to one worker. It ends up in the tick report and the
 * worker is looked at again on the next tick.
 */

import { configuration } from '@/configuration';
import { CLI_FAMILY_PROFILES } from '@/agent/cliFamilies';
import { classifyWorkerActivity, type WorkerActivity } from '@/agent/workerActivity';
import type { WorkerControl } from '@/agent/workerControl';
import { WorkerControlError } from '@/errors';
import { findWorker, type FleetConfig, type Worker } from '@/fleet/fleetConfig';
import type { WorkerState, WorkerStateStore } from '@/fleet/workerState';
import type { MailboxStore } from '@/mailbox/mailboxStore';
import { capability, findTier, recommend } from '@/routing/capabilityRouter';
import type { TaskRegistry } from '@/tasks/taskRegistry';
import type { NewTask, Task } from '@/tasks/types';
import { logger } from '@/ui/logger';
import { delay } from '@/utils/delay';

/** Sender of the notices the dispatcher writes into worker mailboxes */
export const DISPATCHER_ID = 'dispatcher';

export type WorkerPhase =
    | 'blocked'
    | 'ready_no_task'
    | 'assigned_idle_unnotified'
    | 'assigned_busy'
    | 'assigned_idle_notified';

export interface PhaseInput {
    task: Task | null;
    activity: WorkerActivity;
    unreadCount: number;
    /** A nudge about this same unread count went out within the cooldown */
    recentlyNudged: boolean;
}

/**
 * Where a worker stands. A pane that cannot be observed is treated like a
 * busy one: nothing may be typed into it.
 */
export function workerPhase({ task, activity, unreadCount, recentlyNudged }: PhaseInput): WorkerPhase {
    if (!task || task.status === 'done') {
        return 'ready_no_task';
    }
    if (task.status === 'blocked') {
        return 'blocked';
    }
    if (activity !== 'idle') {
        return 'assigned_busy';
    }
    if (unreadCount > 0 && !recentlyNudged) {
        return 'assigned_idle_unnotified';
    }
    return 'assigned_idle_notified';
}

export type RoutingOutcome =
    | { kind: 'unchanged' }
    | { kind: 'switched'; from: string; to: string }
    | { kind: 'suggested'; model: string }
    | { kind: 'incompatible'; model: string };

export interface TickReport {
    unblocked: Array<{ workerId: string; taskId: string }>;
    nudged: Array<{ workerId: string; unread: number }>;
    deferred: string[];
    absent: string[];
    switched: Array<{ workerId: string; from: string; to: string }>;
    errors: Array<{ workerId: string; error: Error }>;
}

export type NudgeOutcome =
    | { kind: 'nudged'; unreadCount: number }
    | { kind: 'deferred' | 'absent' | 'not_needed' };

export interface DispatcherOptions {
    registry: TaskRegistry;
    mailboxes: MailboxStore;
    workerStates: WorkerStateStore;
    control: WorkerControl;
    fleet: FleetConfig;
    ownerId?: string;
    nudgeCooldownMs?: number;
    now?: () => Date;
}

function emptyReport(): TickReport {
    return { unblocked: [], nudged: [], deferred: [], absent: [], switched: [], errors: [] };
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

export function nudgeText(unreadCount: number): string {
    return `inbox${unreadCount}`;
}

export class Dispatcher {
    private readonly registry: TaskRegistry;
    private readonly mailboxes: MailboxStore;
    private readonly workerStates: WorkerStateStore;
    private readonly control: WorkerControl;
    private readonly fleet: FleetConfig;
    private readonly ownerId: string;
    private readonly nudgeCooldownMs: number;
    private readonly now: () => Date;

    constructor(options: DispatcherOptions) {
        this.registry = options.registry;
        this.mailboxes = options.mailboxes;
        this.workerStates = options.workerStates;
        this.control = options.control;
        this.fleet = options.fleet;
        this.ownerId = options.ownerId ?? configuration.ownerId;
        this.nudgeCooldownMs = options.nudgeCooldownMs ?? configuration.nudgeCooldownMs;
        this.now = options.now ?? (() => new Date());
    }

    async tick(): Promise<TickReport> {
        const report = emptyReport();
        for (const worker of this.fleet.workers) {
            try {
                await this.tickWorker(worker, report);
            } catch (error) {
                const failure = toError(error);
                logger.warn(`[DISPATCH] ${worker.id}: ${failure.message} (retrying next tick)`);
                report.errors.push({ workerId: worker.id, error: failure });
            }
        }
        return report;
    }

    private async tickWorker(worker: Worker, report: TickReport): Promise<void> {
        let task = await this.registry.get(worker.id);

        if (task?.status === 'blocked') {
            const pending = await this.registry.pendingPredecessors(task);
            if (pending.length > 0) {
                logger.debug(`[DISPATCH] ${worker.id}: ${task.task_id} waits on ${pending.join(', ')}`);
                return;
            }
            task = await this.registry.transition(worker.id, 'assigned');
            report.unblocked.push({ workerId: worker.id, taskId: task.task_id });
            logger.info(`[DISPATCH] ${worker.id}: ${task.task_id} unblocked`);
        }

        // A notice that failed to go out earlier is sent again until it is marked delivered
        if (task?.status === 'assigned' && task.announced_at === undefined) {
            const routing = await this.announce(worker, task);
            if (routing.kind === 'switched') {
                report.switched.push({ workerId: worker.id, from: routing.from, to: routing.to });
            }
        }
        if (task?.status === 'done' && task.reported_at === undefined) {
            await this.report(worker, task);
        }

        if (task?.status !== 'assigned') {
            return;
        }

        const outcome = await this.nudgeIfIdle(worker, task);
        switch (outcome.kind) {
            case 'nudged':
                report.nudged.push({ workerId: worker.id, unread: outcome.unreadCount });
                break;
            case 'deferred':
                report.deferred.push(worker.id);
                break;
            case 'absent':
                report.absent.push(worker.id);
                break;
            case 'not_needed':
                break;
        }
    }

    /**
     * Makes sure an assigned worker with unread mail hears about it: idle
     * workers get nudged once per unread count and cooldown, busy ones are
     * left to their hook.
     */
    async nudgeIfIdle(worker: Worker, task: Task): Promise<NudgeOutcome> {
        const unreadCount = await this.mailboxes.unreadCount(worker.id);
        if (unreadCount === 0) {
            return { kind: 'not_needed' };
        }

        const activity = classifyWorkerActivity(await this.control.capture(worker));
        const state = await this.workerStates.get(worker.id);
        const phase = workerPhase({
            task,
            activity,
            unreadCount,
            recentlyNudged: this.recentlyNudged(state, unreadCount),
        });

        if (phase === 'assigned_busy') {
            logger.debug(`[DISPATCH] ${worker.id}: ${unreadCount} unread, pane ${activity}, not nudging`);
            return { kind: activity === 'absent' ? 'absent' : 'deferred' };
        }
        if (phase !== 'assigned_idle_unnotified') {
            return { kind: 'not_needed' };
        }

        if (!(await this.control.nudge(worker, nudgeText(unreadCount)))) {
            throw new WorkerControlError(worker.id, 'nudge');
        }
        // A nudge starts a new turn, so the hook may hold it back once again
        await this.workerStates.patch(worker.id, {
            lastNudgeAt: this.now().toISOString(),
            lastNudgeUnread: unreadCount,
            deferredOnce: false,
        });
        logger.debug(`[DISPATCH] ${worker.id}: nudged about ${unreadCount} unread`);
        return { kind: 'nudged', unreadCount };
    }

    private recentlyNudged(state: WorkerState, unreadCount: number): boolean {
        if (state.lastNudgeAt === undefined || state.lastNudgeUnread !== unreadCount) {
            return false;
        }
        const elapsed = this.now().getTime() - Date.parse(state.lastNudgeAt);
        return Number.isFinite(elapsed) && elapsed < this.nudgeCooldownMs;
    }

    /**
     * Switches the worker to a stronger model when the task needs one. The
     * switch notice is appended before the task notice, so the worker reads
     * them in that order.
     */
    async route(worker: Worker, task: Task): Promise<RoutingOutcome> {
        const capabilities = this.fleet.capabilities;
        if (task.bloom_level === undefined || !capabilities || capabilities.mode === 'off') {
            return { kind: 'unchanged' };
        }

        const current = await this.workerStates.activeModel(worker.id, worker.model);
        if (task.bloom_level <= capability(capabilities, current)) {
            return { kind: 'unchanged' };
        }

        const target = recommend(capabilities, task.bloom_level);
        if (target === null || target === current) {
            return { kind: 'unchanged' };
        }

        if (capabilities.mode === 'manual') {
            logger.info(`[ROUTING] ${task.task_id} (bloom ${task.bloom_level}) on ${worker.id}: ${target} recommended over ${current}`);
            return { kind: 'suggested', model: target };
        }

        const family = findTier(capabilities, target)?.cli;
        if (family !== worker.cli) {
            logger.warn(`[ROUTING] ${target} does not run on ${worker.cli} (${worker.id}), keeping ${current}`);
            return { kind: 'incompatible', model: target };
        }

        await this.mailboxes.append(worker.id, {
            from: DISPATCHER_ID,
            type: 'model_switch',
            content: CLI_FAMILY_PROFILES[worker.cli].modelSwitchCommand(target),
        });
        await this.workerStates.patch(worker.id, { model: target });
        logger.info(`[ROUTING] ${worker.id}: ${current} -> ${target} for ${task.task_id}`);
        return { kind: 'switched', from: current, to: target };
    }

    private async announce(worker: Worker, task: Task): Promise<RoutingOutcome> {
        const routing = await this.route(worker, task);
        await this.mailboxes.append(worker.id, {
            from: DISPATCHER_ID,
            type: 'task_assigned',
            content: `${task.task_id}: ${task.description}`,
        });
        await this.registry.mark(worker.id, task.task_id, 'announced_at', this.now().toISOString());
        return routing;
    }

    private async report(worker: Worker, task: Task): Promise<void> {
        await this.mailboxes.append(this.ownerId, {
            from: worker.id,
            type: 'report_received',
            content: `${task.task_id} done`,
        });
        await this.registry.mark(worker.id, task.task_id, 'reported_at', this.now().toISOString());
        logger.info(`[DISPATCH] ${worker.id}: ${task.task_id} done`);
    }

    /**
     * Hands a new task to a worker. A task with predecessors stays blocked and
     * is announced by the tick that releases it. If the notice cannot be
     * delivered now, the next tick sends it.
     */
    async assign(workerId: string, input: NewTask): Promise<Task> {
        const worker = findWorker(this.fleet, workerId);
        const task = await this.registry.create(worker.id, input);
        if (task.status === 'assigned') {
            await this.announce(worker, task);
            await this.nudgeIfIdle(worker, task);
        }
        return task;
    }

    /**
     * Replaces the worker's finished task with a corrected one. The input is
     * checked before the worker's context is reset; if either fails nothing
     * changes.
     */
    async redo(workerId: string, input: NewTask): Promise<Task> {
        const worker = findWorker(this.fleet, workerId);
        await this.registry.checkRedo(worker.id, input);

        if (!(await this.control.reset(worker))) {
            throw new WorkerControlError(worker.id, 'reset');
        }

        const task = await this.registry.redo(worker.id, input);
        if (task.status === 'assigned') {
            await this.announce(worker, task);
            await this.nudgeIfIdle(worker, task);
        }
        logger.info(`[DISPATCH] ${worker.id}: ${task.task_id} redoes ${task.redo_of}`);
        return task;
    }

    /**
     * Marks the worker's task done and tells the owner. Calling it again on a
     * done task whose report never went out sends the report.
     */
    async complete(workerId: string): Promise<Task> {
        const worker = findWorker(this.fleet, workerId);
        const current = await this.registry.get(worker.id);
        const task = current?.status === 'done' && current.reported_at === undefined
            ? current
            : await this.registry.transition(worker.id, 'done');
        await this.report(worker, task);
        return task;
    }

    /** Ticks every `intervalMs` until `signal` aborts */
    async watch(intervalMs: number, signal: AbortSignal, onReport?: (report: TickReport) => void): Promise<void> {
        logger.debug(`[DISPATCH] Watching ${this.fleet.workers.length} worker(s) every ${intervalMs}ms`);
        while (!signal.aborted) {
            const report = await this.tick();
            onReport?.(report);
            await delay(intervalMs, signal);
        }
        logger.debug('[DISPATCH] Watch stopped');
    }
}
