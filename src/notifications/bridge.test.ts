import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { NotificationBridge } from './bridge';
import type { ExternalEvent, NotificationTransport } from './types';
import { MailboxStore } from '@/mailbox/mailboxStore';
import { MemoryDocumentStore } from '@/persistence/memoryDocumentStore';
import type { Mailbox } from '@/mailbox/types';
import { LockTimeoutError } from '@/errors';

vi.mock('@/ui/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    },
}));

function event(overrides: Partial<ExternalEvent>): ExternalEvent {
    return {
        event_kind: 'message',
        id: 'evt1',
        timestamp: 1_700_000_000,
        content: 'hello',
        tags: [],
        ...overrides,
    };
}

describe('NotificationBridge', () => {
    let mailboxes: MailboxStore;
    let send: Mock<NotificationTransport['send']>;
    let bridge: NotificationBridge;

    beforeEach(() => {
        mailboxes = new MailboxStore(new MemoryDocumentStore<Mailbox>());
        send = vi.fn<NotificationTransport['send']>().mockResolvedValue(undefined);
        bridge = new NotificationBridge(mailboxes, { send }, 'commander');
    });

    it('stores a message for the owner and acknowledges it verbatim', async () => {
        const content = 'deploy <now> & "fast" $HOME';
        const result = await bridge.onExternalEvent(event({ content }));

        expect(result).toMatchObject({ status: 'delivered', acknowledged: true });
        const messages = await mailboxes.list('commander');
        expect(messages).toHaveLength(1);
        expect(messages[0]).toMatchObject({ from: 'ntfy', type: 'notification_received', content, read: false });
        expect(send).toHaveBeenCalledWith(`Received: ${content}`, { tags: ['outbound'] });
    });

    it('drops its own outbound echo without appending or acknowledging', async () => {
        const result = await bridge.onExternalEvent(event({ content: 'hello', tags: ['outbound'] }));

        expect(result).toEqual({ status: 'ignored', reason: 'outbound' });
        expect(await mailboxes.list('commander')).toEqual([]);
        expect(send).not.toHaveBeenCalled();
    });

    it('ignores keepalives and empty messages', async () => {
        expect(await bridge.onExternalEvent(event({ event_kind: 'keepalive' }))).toEqual({ status: 'ignored', reason: 'not_a_message' });
        expect(await bridge.onExternalEvent(event({ content: '' }))).toEqual({ status: 'ignored', reason: 'empty' });
        expect(send).not.toHaveBeenCalled();
        expect(await mailboxes.unreadCount('commander')).toBe(0);
    });

    it('does not acknowledge when the mailbox append fails', async () => {
        const failing = new MailboxStore(new MemoryDocumentStore<Mailbox>());
        vi.spyOn(failing, 'append').mockRejectedValue(new LockTimeoutError('memory://commander', 10_000));
        const failingBridge = new NotificationBridge(failing, { send }, 'commander');

        const result = await failingBridge.onExternalEvent(event({ content: 'urgent' }));

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error).toBeInstanceOf(LockTimeoutError);
        }
        expect(send).not.toHaveBeenCalled();
    });

    it('keeps the delivery when the acknowledgment fails', async () => {
        send.mockRejectedValue(new Error('relay down'));

        const result = await bridge.onExternalEvent(event({ content: 'still here' }));

        expect(result).toMatchObject({ status: 'delivered', acknowledged: false });
        expect(await mailboxes.unreadCount('commander')).toBe(1);
        expect(send).toHaveBeenCalledTimes(1);
    });
});
