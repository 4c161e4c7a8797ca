/**
 * Worker-side half of deferred delivery.
 *
 * The dispatcher never interrupts a busy worker. Instead the CLI runs this
 * hook when a turn is about to end: if mail arrived meanwhile, the stop is
 * blocked and the unread summary is handed back as the next thing to do.
 *
 * A turn is held back at most once. The second invocation (flagged by the CLI
 * itself through `stop_hook_active`, or by our own persisted `deferredOnce`)
 * always lets the turn end, whatever the unread count.
 */

import * as z from 'zod';
import type { WorkerStateStore } from '@/fleet/workerState';
import { logger } from '@/ui/logger';
import type { MailboxStore } from './mailboxStore';
import type { Message } from './types';

export const MAX_SUMMARY_MESSAGES = 5;
export const MAX_SUMMARY_CONTENT = 80;

export const StopHookInputSchema = z.object({
    stop_hook_active: z.boolean().optional(),
}).passthrough();

export interface StopHookDecision {
    decision: 'block';
    reason: string;
}

export interface StopHookContext {
    mailboxes: MailboxStore;
    workerStates: WorkerStateStore;
    /** Worker ids the hook applies to */
    workerIds: readonly string[];
}

export function summarizeUnread(messages: readonly Message[]): string {
    return messages
        .slice(0, MAX_SUMMARY_MESSAGES)
        .map(message => `[${message.from}/${message.type}] ${message.content.slice(0, MAX_SUMMARY_CONTENT)}`)
        .join(' | ');
}

export async function evaluateStopHook(
    context: StopHookContext,
    request: { workerId: string | null; stopHookActive: boolean }
): Promise<StopHookDecision | null> {
    const { workerId } = request;

    // Unidentified panes and the owner's own session are never held back
    if (!workerId || !context.workerIds.includes(workerId)) {
        return null;
    }

    const state = await context.workerStates.get(workerId);
    if (request.stopHookActive || state.deferredOnce) {
        if (state.deferredOnce) {
            await context.workerStates.patch(workerId, { deferredOnce: false });
        }
        logger.debug(`[HOOK] ${workerId} already deferred once, letting the turn end`);
        return null;
    }

    const unread = await context.mailboxes.unread(workerId);
    if (unread.length === 0) {
        return null;
    }

    await context.workerStates.patch(workerId, { deferredOnce: true });
    logger.debug(`[HOOK] Holding ${workerId} back for ${unread.length} unread message(s)`);

    return {
        decision: 'block',
        reason: `${unread.length} unread message(s) in your inbox. Read ${context.mailboxes.locate(workerId)} and handle them. Summary: ${summarizeUnread(unread)}`,
    };
}
