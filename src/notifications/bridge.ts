import type { MailboxStore } from '@/mailbox/mailboxStore';
import { logger } from '@/ui/logger';
import { OUTBOUND_TAG, type ExternalEvent, type NotificationTransport } from './types';

export const ACK_PREFIX = 'Received: ';

export type BridgeResult =
    | { status: 'delivered'; messageId: string; acknowledged: boolean }
    | { status: 'ignored'; reason: 'not_a_message' | 'empty' | 'outbound' }
    | { status: 'failed'; error: Error };

/**
 * Turns inbound notifications into mail for the owner.
 *
 * Our acknowledgments travel over the same topic we listen to, so anything
 * tagged outbound is our own echo and is dropped before it reaches the
 * mailbox. The acknowledgment is only sent once the mailbox write succeeded,
 * and a failed acknowledgment does not undo the delivery.
 */
export class NotificationBridge {
    constructor(
        private readonly mailboxes: MailboxStore,
        private readonly transport: NotificationTransport,
        private readonly ownerId: string
    ) {}

    async onExternalEvent(event: ExternalEvent): Promise<BridgeResult> {
        if (event.event_kind !== 'message') {
            return { status: 'ignored', reason: 'not_a_message' };
        }
        if (event.tags.includes(OUTBOUND_TAG)) {
            logger.debug(`[BRIDGE] Dropping our own echo ${event.id}`);
            return { status: 'ignored', reason: 'outbound' };
        }
        if (event.content.length === 0) {
            return { status: 'ignored', reason: 'empty' };
        }

        let messageId: string;
        try {
            const message = await this.mailboxes.append(this.ownerId, {
                from: 'ntfy',
                type: 'notification_received',
                content: event.content,
            });
            messageId = message.id;
        } catch (error) {
            logger.warn(`[BRIDGE] Could not store notification ${event.id}, not acknowledging`);
            logger.debug('[BRIDGE] Append failure:', error);
            return { status: 'failed', error: error instanceof Error ? error : new Error(String(error)) };
        }

        let acknowledged = false;
        try {
            await this.transport.send(`${ACK_PREFIX}${event.content}`, { tags: [OUTBOUND_TAG] });
            acknowledged = true;
        } catch (error) {
            logger.debug(`[BRIDGE] Acknowledgment for ${event.id} failed, message ${messageId} stays delivered:`, error);
        }

        logger.debug(`[BRIDGE] Delivered ${event.id} to ${this.ownerId} as ${messageId}`);
        return { status: 'delivered', messageId, acknowledged };
    }
}
