import chalk from 'chalk'
import { MailboxStore } from '@/mailbox/mailboxStore'
import type { Message } from '@/mailbox/types'
import { parseArgs, requireFlag, requirePositional } from './args'

export async function handleInboxCommand(args: string[]): Promise<void> {
  const subcommand = args[0]

  if (!subcommand || subcommand === 'help' || subcommand === '--help' || subcommand === '-h') {
    showInboxHelp()
    return
  }

  const mailboxes = MailboxStore.open()
  const parsed = parseArgs(args.slice(1), ['mark', 'all'])

  switch (subcommand) {
    case 'send': {
      const workerId = requirePositional(parsed, 0, 'worker')
      const content = parsed.positional.slice(1).join(' ')
      if (!content) {
        throw new Error('Message content is required')
      }
      const message = await mailboxes.append(workerId, {
        from: requireFlag(parsed, 'from'),
        type: parsed.flags.get('type') ?? 'info',
        content,
      })
      console.log(chalk.green(`✓ ${message.id} -> ${workerId}`))
      break
    }
    case 'count':
      console.log(String(await mailboxes.unreadCount(requirePositional(parsed, 0, 'worker'))))
      break
    case 'read': {
      const workerId = requirePositional(parsed, 0, 'worker')
      const messages = parsed.switches.has('all') ? await mailboxes.list(workerId) : await mailboxes.unread(workerId)
      if (messages.length === 0) {
        console.log(chalk.gray('No messages'))
      }
      for (const message of messages) {
        console.log(formatMessage(message))
      }
      if (parsed.switches.has('mark')) {
        const flipped = await mailboxes.markAllRead(workerId)
        console.log(chalk.gray(`Marked ${flipped} message(s) read`))
      }
      break
    }
    default:
      console.error(chalk.red(`Unknown inbox subcommand: ${subcommand}`))
      showInboxHelp()
      process.exit(1)
  }
}

export function formatMessage(message: Message): string {
  const marker = message.read ? chalk.gray('·') : chalk.yellow('●')
  return `${marker} ${chalk.gray(message.timestamp)} ${chalk.bold(message.from)} [${message.type}] ${message.content}`
}

function showInboxHelp(): void {
  console.log(`
${chalk.bold('fleet inbox')} - Worker mailboxes

${chalk.bold('Usage:')}
  fleet inbox send <worker> --from <id> [--type <type>] <content...>
  fleet inbox count <worker>               Print the unread count
  fleet inbox read <worker> [--all] [--mark]
                                           Show unread (or all) messages, optionally marking them read
`)
}
