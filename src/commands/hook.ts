import chalk from 'chalk'
import { configuration } from '@/configuration'
import { loadFleetConfig } from '@/fleet/fleetConfig'
import { WorkerStateStore } from '@/fleet/workerState'
import { MailboxStore } from '@/mailbox/mailboxStore'
import { evaluateStopHook, StopHookInputSchema } from '@/mailbox/stopHook'
import { logger } from '@/ui/logger'
import { TmuxUtilities } from '@/utils/tmux'
import { parseArgs } from './args'

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return ''
  const chunks: Buffer[] = []
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/** --worker, then FLEET_WORKER_ID, then the @agent_id option of the pane we run in */
async function resolveWorkerId(explicit: string | undefined): Promise<string | null> {
  if (explicit) return explicit
  if (process.env.FLEET_WORKER_ID) return process.env.FLEET_WORKER_ID
  const pane = process.env.TMUX_PANE
  if (!pane) return null
  return new TmuxUtilities(configuration.tmuxSocketPath).readPaneOption(pane, '@agent_id')
}

function parseHookInput(raw: string): boolean {
  if (!raw.trim()) return false
  try {
    const parsed = StopHookInputSchema.safeParse(JSON.parse(raw))
    return parsed.success ? parsed.data.stop_hook_active === true : false
  } catch (error) {
    logger.debug('[HOOK] Ignoring unreadable hook input:', error)
    return false
  }
}

/**
 * Runs as the CLI's turn-completion hook. Prints a block decision as JSON
 * when the turn should continue with unread mail; prints nothing otherwise.
 */
export async function handleHookCommand(args: string[]): Promise<void> {
  const [subcommand, ...rest] = args
  if (subcommand !== 'stop') {
    console.error(chalk.red(`Unknown hook: ${subcommand ?? '(none)'}`))
    console.log('Usage: fleet hook stop [--worker <id>]')
    process.exit(1)
  }

  const parsed = parseArgs(rest)
  const stopHookActive = parseHookInput(await readStdin())
  const workerId = await resolveWorkerId(parsed.flags.get('worker'))
  const fleet = await loadFleetConfig(configuration.fleetFile)

  const decision = await evaluateStopHook(
    {
      mailboxes: MailboxStore.open(),
      workerStates: WorkerStateStore.open(),
      workerIds: fleet.workers.map(worker => worker.id),
    },
    { workerId, stopHookActive }
  )

  if (decision) {
    process.stdout.write(`${JSON.stringify(decision)}\n`)
  }
}
