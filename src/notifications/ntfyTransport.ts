import axios from 'axios'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import * as z from 'zod'
import { logger } from '@/ui/logger'
import { delay } from '@/utils/delay'
import type { ExternalEvent, NotificationTransport } from './types'

const NtfyEventSchema = z.object({
  id: z.string(),
  time: z.number(),
  event: z.string(),
  message: z.string().optional(),
  tags: z.array(z.string()).optional(),
}).passthrough()

/**
 * Parse one line of ntfy's JSON stream. Returns null for blank or unreadable
 * lines; those are logged and skipped rather than ending the subscription.
 */
export function parseNtfyLine(line: string): ExternalEvent | null {
  const trimmed = line.trim()
  if (!trimmed) return null

  let raw: unknown
  try {
    raw = JSON.parse(trimmed)
  } catch {
    logger.debug('[NTFY] Skipping non-JSON line:', trimmed.slice(0, 200))
    return null
  }

  const parsed = NtfyEventSchema.safeParse(raw)
  if (!parsed.success) {
    logger.debug('[NTFY] Skipping unexpected event:', parsed.error.issues)
    return null
  }

  return {
    event_kind: parsed.data.event,
    id: parsed.data.id,
    timestamp: parsed.data.time,
    content: parsed.data.message ?? '',
    tags: parsed.data.tags ?? [],
  }
}

export interface NtfyOptions {
  server: string
  topic: string
  token?: string
  /** First reconnect delay; doubles per failed attempt up to 30 seconds */
  retryDelayMs?: number
}

export class NtfyTransport implements NotificationTransport {
  constructor(private readonly options: NtfyOptions) {}

  private get topicUrl(): string {
    return `${this.options.server}/${encodeURIComponent(this.options.topic)}`
  }

  private authHeaders(): Record<string, string> {
    return this.options.token ? { 'Authorization': `Bearer ${this.options.token}` } : {}
  }

  async send(message: string, options: { tags?: string[]; title?: string } = {}): Promise<void> {
    const headers: Record<string, string> = {
      'Content-Type': 'text/plain; charset=utf-8',
      ...this.authHeaders(),
    }
    if (options.tags && options.tags.length > 0) {
      headers['Tags'] = options.tags.join(',')
    }
    if (options.title) {
      headers['Title'] = options.title
    }

    try {
      await axios.post(this.topicUrl, message, { headers })
    } catch (error) {
      throw new Error(`Failed to publish to ntfy: ${error instanceof Error ? error.message : 'Unknown error'}`)
    }
  }

  /**
   * Stream events from the topic until `signal` aborts, reconnecting with
   * exponential backoff (capped at 30 seconds) whenever the stream drops or
   * `onEvent` throws. Resumes after the last message `onEvent` handled, so a
   * message whose handler failed is delivered again.
   */
  async subscribe(onEvent: (event: ExternalEvent) => Promise<void>, signal: AbortSignal): Promise<void> {
    let lastId: string | undefined
    let attempt = 0

    while (!signal.aborted) {
      try {
        const response = await axios.get<Readable>(`${this.topicUrl}/json`, {
          headers: this.authHeaders(),
          params: lastId ? { since: lastId } : undefined,
          responseType: 'stream',
          signal,
        })
        attempt = 0
        logger.debug('[NTFY] Subscribed to', this.topicUrl)

        const lines = createInterface({ input: response.data, crlfDelay: Infinity })
        try {
          for await (const line of lines) {
            const event = parseNtfyLine(line)
            if (!event) continue
            await onEvent(event)
            if (event.event_kind === 'message') {
              lastId = event.id
            }
          }
        } finally {
          lines.close()
          response.data.destroy()
        }
      } catch (error) {
        if (signal.aborted) break
        logger.debug('[NTFY] Stream failed:', error)
      }

      if (signal.aborted) break

      attempt++
      const backoffMs = Math.min((this.options.retryDelayMs ?? 1000) * Math.pow(2, attempt), 30000)
      logger.debug(`[NTFY] Reconnecting in ${backoffMs}ms (attempt ${attempt})`)
      await delay(backoffMs, signal)
    }
  }
}
