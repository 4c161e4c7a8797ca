import chalk from 'chalk'
import { configuration } from '@/configuration'
import { MailboxStore } from '@/mailbox/mailboxStore'
import { NotificationBridge } from '@/notifications/bridge'
import { NtfyTransport } from '@/notifications/ntfyTransport'
import { logger } from '@/ui/logger'

/**
 * `fleet bridge listen`: relays ntfy messages into the owner's mailbox until
 * interrupted.
 */
export async function handleBridgeCommand(args: string[]): Promise<void> {
  if (args[0] !== 'listen') {
    console.error(chalk.red(`Unknown bridge subcommand: ${args[0] ?? '(none)'}`))
    console.log('Usage: fleet bridge listen')
    process.exit(1)
  }

  const topic = configuration.ntfyTopic
  if (!topic) {
    throw new Error('NTFY_TOPIC is not set')
  }

  const transport = new NtfyTransport({ server: configuration.ntfyServer, topic, token: configuration.ntfyToken })
  const bridge = new NotificationBridge(MailboxStore.open(), transport, configuration.ownerId)

  const controller = new AbortController()
  const stop = () => controller.abort()
  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)

  console.log(chalk.blue(`Listening on ${configuration.ntfyServer}/${topic} for ${configuration.ownerId}. Ctrl-C to stop.`))
  try {
    await transport.subscribe(async event => {
      const result = await bridge.onExternalEvent(event)
      if (result.status === 'delivered') {
        console.log(chalk.green(`✓ ${event.id} -> ${result.messageId}${result.acknowledged ? '' : chalk.yellow(' (not acknowledged)')}`))
      } else if (result.status === 'failed') {
        console.log(chalk.red(`✗ ${event.id}: ${result.error.message} (retrying after reconnect)`))
        // Throwing makes the transport reconnect and deliver this event again
        throw result.error
      } else {
        logger.debug(`[BRIDGE] ${event.id} ignored: ${result.reason}`)
      }
    }, controller.signal)
  } finally {
    process.off('SIGINT', stop)
    process.off('SIGTERM', stop)
  }
}
