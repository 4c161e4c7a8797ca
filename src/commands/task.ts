import chalk from 'chalk'
import type { NewTask, Task } from '@/tasks/types'
import { TaskRegistry } from '@/tasks/taskRegistry'
import { parseArgs, parseIntegerFlag, parseListFlag, requireFlag, requirePositional, type ParsedArgs } from './args'
import { openFleet } from './context'

export async function handleTaskCommand(args: string[]): Promise<void> {
  const subcommand = args[0]

  if (!subcommand || subcommand === 'help' || subcommand === '--help' || subcommand === '-h') {
    showTaskHelp()
    return
  }

  const parsed = parseArgs(args.slice(1))

  switch (subcommand) {
    case 'assign': {
      const { dispatcher } = await openFleet()
      const task = await dispatcher.assign(requirePositional(parsed, 0, 'worker'), taskFromArgs(parsed))
      console.log(chalk.green(`✓ ${formatTask(task)}`))
      break
    }
    case 'redo': {
      const { dispatcher } = await openFleet()
      const input = { ...taskFromArgs(parsed), redo_of: parsed.flags.get('redo-of') }
      const task = await dispatcher.redo(requirePositional(parsed, 0, 'worker'), input)
      console.log(chalk.green(`✓ ${formatTask(task)}`))
      break
    }
    case 'complete': {
      const { dispatcher } = await openFleet()
      const task = await dispatcher.complete(requirePositional(parsed, 0, 'worker'))
      console.log(chalk.green(`✓ ${formatTask(task)}`))
      break
    }
    case 'show': {
      const registry = TaskRegistry.open()
      const task = await registry.get(requirePositional(parsed, 0, 'worker'))
      console.log(task ? JSON.stringify(task, null, 2) : chalk.gray('No task'))
      break
    }
    case 'list': {
      const registry = TaskRegistry.open()
      for (const { workerId, task } of await registry.list()) {
        console.log(`${chalk.bold(workerId.padEnd(10))} ${formatTask(task)}`)
      }
      break
    }
    case 'lineage': {
      const registry = TaskRegistry.open()
      const chain = await registry.lineage(requirePositional(parsed, 0, 'task-id'))
      console.log(chain.length > 0 ? chain.map(task => task.task_id).join(' <- ') : chalk.gray('Unknown task'))
      break
    }
    default:
      console.error(chalk.red(`Unknown task subcommand: ${subcommand}`))
      showTaskHelp()
      process.exit(1)
  }
}

export function taskFromArgs(parsed: ParsedArgs): NewTask {
  return {
    task_id: requireFlag(parsed, 'id'),
    parent_id: requireFlag(parsed, 'parent'),
    type: parsed.flags.get('type') ?? 'implement',
    description: parsed.positional.slice(1).join(' '),
    bloom_level: parseIntegerFlag(parsed, 'bloom'),
    blocked_by: parseListFlag(parsed, 'blocked-by'),
  }
}

export function formatTask(task: Task): string {
  const status = task.status === 'done' ? chalk.green(task.status) : task.status === 'blocked' ? chalk.yellow(task.status) : chalk.blue(task.status)
  const extras = [
    task.bloom_level !== undefined ? `bloom ${task.bloom_level}` : null,
    task.blocked_by ? `after ${task.blocked_by.join(',')}` : null,
    task.redo_of ? `redo of ${task.redo_of}` : null,
  ].filter((extra): extra is string => extra !== null)
  return `${task.task_id} ${status}${extras.length > 0 ? chalk.gray(` (${extras.join('; ')})`) : ''}`
}

function showTaskHelp(): void {
  console.log(`
${chalk.bold('fleet task')} - Task registry

${chalk.bold('Usage:')}
  fleet task assign <worker> --id <id> --parent <id> [--type <type>] [--bloom <1-6>] [--blocked-by a,b] <description...>
  fleet task redo <worker> --id <id> --parent <id> [--redo-of <id>] [...same options] <description...>
  fleet task complete <worker>     Mark the worker's task done and report to the owner
  fleet task show <worker>         Print the worker's current task
  fleet task list                  Current task of every worker
  fleet task lineage <task-id>     Redo chain, newest first
`)
}
