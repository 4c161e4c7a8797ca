import * as z from 'zod';

export const MessageTypeSchema = z.string().min(1);

/**
 * Well-known message types. Any other non-empty string is accepted so that
 * workers can exchange ad hoc kinds of messages.
 */
export type KnownMessageType =
    | 'task_assigned'
    | 'model_switch'
    | 'report_received'
    | 'notification_received'
    | 'info';

export const MessageSchema = z.object({
    id: z.string().min(1),
    from: z.string().min(1),
    type: MessageTypeSchema,
    content: z.string(),
    read: z.boolean().default(false),
    timestamp: z.string(),
});

export type Message = z.infer<typeof MessageSchema>;

export const MailboxSchema = z.object({
    messages: z.array(MessageSchema).default([]),
});

export type Mailbox = z.infer<typeof MailboxSchema>;

export interface NewMessage {
    from: string;
    type: KnownMessageType | (string & {});
    content: string;
}
