import chalk from 'chalk'
import { configuration } from '@/configuration'
import { activityLabel, classifyWorkerActivity } from '@/agent/workerActivity'
import type { TickReport } from '@/dispatch/dispatcher'
import { logger } from '@/ui/logger'
import { parseArgs, parseIntegerFlag } from './args'
import { openFleet } from './context'

export function formatTickReport(report: TickReport): string[] {
  const lines: string[] = []
  for (const { workerId, taskId } of report.unblocked) {
    lines.push(`${chalk.green('unblocked')} ${workerId} ${taskId}`)
  }
  for (const { workerId, from, to } of report.switched) {
    lines.push(`${chalk.cyan('switched')}  ${workerId} ${from} -> ${to}`)
  }
  for (const { workerId, unread } of report.nudged) {
    lines.push(`${chalk.blue('nudged')}    ${workerId} (${unread} unread)`)
  }
  for (const workerId of report.deferred) {
    lines.push(`${chalk.gray('deferred')}  ${workerId} (busy)`)
  }
  for (const workerId of report.absent) {
    lines.push(`${chalk.yellow('absent')}    ${workerId}`)
  }
  for (const { workerId, error } of report.errors) {
    lines.push(`${chalk.red('error')}     ${workerId}: ${error.message}`)
  }
  return lines
}

export async function handleTickCommand(): Promise<void> {
  const { dispatcher } = await openFleet()
  const lines = formatTickReport(await dispatcher.tick())
  console.log(lines.length > 0 ? lines.join('\n') : chalk.gray('Nothing to do'))
}

export async function handleWatchCommand(args: string[]): Promise<void> {
  const parsed = parseArgs(args)
  const intervalMs = parseIntegerFlag(parsed, 'interval') ?? configuration.tickIntervalMs
  if (intervalMs <= 0) {
    throw new Error('--interval must be positive')
  }

  const { dispatcher, fleet } = await openFleet()
  const controller = new AbortController()
  const stop = () => controller.abort()
  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)

  console.log(chalk.blue(`Watching ${fleet.workers.length} worker(s) every ${intervalMs}ms. Ctrl-C to stop.`))
  try {
    await dispatcher.watch(intervalMs, controller.signal, report => {
      for (const line of formatTickReport(report)) {
        console.log(`${chalk.gray(new Date().toLocaleTimeString())} ${line}`)
      }
    })
  } finally {
    process.off('SIGINT', stop)
    process.off('SIGTERM', stop)
  }
  logger.debug('[CLI] watch ended')
}

export async function handleStatusCommand(): Promise<void> {
  const { fleet, registry, mailboxes, workerStates, control } = await openFleet()

  for (const worker of fleet.workers) {
    const [task, unread, model, capture] = await Promise.all([
      registry.get(worker.id),
      mailboxes.unreadCount(worker.id),
      workerStates.activeModel(worker.id, worker.model),
      control.capture(worker),
    ])
    const activity = classifyWorkerActivity(capture)
    const taskText = task ? `${task.task_id} (${task.status})` : chalk.gray('no task')
    const unreadText = unread > 0 ? chalk.yellow(`${unread} unread`) : chalk.gray('0 unread')
    console.log(`${chalk.bold(worker.id.padEnd(10))} ${worker.cli}/${model}  ${activityLabel(activity).padEnd(8)} ${taskText}  ${unreadText}`)
  }

  const ownerUnread = await mailboxes.unreadCount(configuration.ownerId)
  console.log(chalk.gray(`${configuration.ownerId}: ${ownerUnread} unread`))
}
