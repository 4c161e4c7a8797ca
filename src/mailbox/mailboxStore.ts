import { randomUUID } from 'node:crypto';
import { configuration } from '@/configuration';
import type { DocumentStore } from '@/persistence/documentStore';
import { FileDocumentStore } from '@/persistence/fileDocumentStore';
import { logger } from '@/ui/logger';
import { MailboxSchema, type Mailbox, type Message, type NewMessage } from './types';

export function createMessageId(now: Date = new Date()): string {
    const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
    return `msg_${stamp}_${randomUUID().slice(0, 8)}`;
}

/**
 * Per-worker inbox.
 *
 * Messages keep insertion order. After an append the only field that ever
 * changes is `read`, and only from false to true.
 */
export class MailboxStore {
    constructor(private readonly store: DocumentStore<Mailbox>) {}

    static open(directory: string = configuration.inboxDir): MailboxStore {
        return new MailboxStore(new FileDocumentStore(directory, MailboxSchema, {
            lockTimeoutMs: configuration.lockTimeoutMs,
            staleLockMs: configuration.staleLockMs,
        }));
    }

    locate(workerId: string): string {
        return this.store.locate(workerId);
    }

    /**
     * Resolves once the message is durably stored.
     * Throws LockTimeoutError (nothing written) when the mailbox stays locked.
     */
    async append(workerId: string, input: NewMessage): Promise<Message> {
        const message: Message = {
            id: createMessageId(),
            from: input.from,
            type: input.type,
            content: input.content,
            read: false,
            timestamp: new Date().toISOString(),
        };

        await this.store.update(workerId, current => ({
            messages: [...(current?.messages ?? []), message],
        }));

        logger.debug(`[MAILBOX] ${input.from} -> ${workerId} (${input.type}) ${message.id}`);
        return message;
    }

    async list(workerId: string): Promise<Message[]> {
        const mailbox = await this.store.read(workerId);
        return mailbox?.messages ?? [];
    }

    async unread(workerId: string): Promise<Message[]> {
        const messages = await this.list(workerId);
        return messages.filter(message => !message.read);
    }

    async unreadCount(workerId: string): Promise<number> {
        return (await this.unread(workerId)).length;
    }

    /** Returns how many messages were flipped to read */
    async markAllRead(workerId: string): Promise<number> {
        // Nothing to rewrite, and we do not want to create the file as a side effect
        if (await this.store.read(workerId) === null) {
            return 0;
        }

        let flipped = 0;
        await this.store.update(workerId, current => {
            const messages = current?.messages ?? [];
            flipped = messages.filter(message => !message.read).length;
            return { messages: messages.map(message => ({ ...message, read: true })) };
        });

        logger.debug(`[MAILBOX] Marked ${flipped} message(s) read for ${workerId}`);
        return flipped;
    }
}
