/**
 * Inbound notification as the bridge sees it, independent of the relay.
 */
export interface ExternalEvent {
    /** "message" for real messages, anything else (open, keepalive, ...) is ignored */
    event_kind: string;
    id: string;
    /** Seconds since the epoch, as relays usually report it */
    timestamp: number;
    content: string;
    tags: string[];
}

/** Tag carried by everything we publish ourselves */
export const OUTBOUND_TAG = 'outbound';

export interface NotificationTransport {
    /** Publish `message` on the relay. Rejects when the relay did not accept it */
    send(message: string, options?: { tags?: string[]; title?: string }): Promise<void>;
}
