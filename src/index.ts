#!/usr/bin/env node

/**
 * CLI entry point for the fleet command
 *
 * Simple argument parsing without any CLI framework dependencies
 */

import chalk from 'chalk'
import { configuration } from '@/configuration'
import { logger } from './ui/logger'
import packageJson from '../package.json'
import { handleBridgeCommand } from './commands/bridge'
import { handleStatusCommand, handleTickCommand, handleWatchCommand } from './commands/dispatch'
import { handleHookCommand } from './commands/hook'
import { handleInboxCommand } from './commands/inbox'
import { handleRouteCommand } from './commands/route'
import { handleTaskCommand } from './commands/task'

function showHelp(): void {
  console.log(`
${chalk.bold('fleet')} - Dispatch tasks and mail to a fleet of CLI coding agents in tmux

${chalk.bold('Usage:')}
  fleet tick                      Run one scheduling pass
  fleet watch [--interval <ms>]   Keep ticking until interrupted
  fleet status                    Workers, their tasks and unread mail
  fleet task <subcommand>         Assign, complete, redo and inspect tasks
  fleet inbox <subcommand>        Send and read mailbox messages
  fleet route <bloom>             Recommended model for a Bloom level (1-6)
  fleet hook stop                 Turn-completion hook for worker CLIs
  fleet bridge listen             Relay ntfy notifications to ${configuration.ownerId}
  fleet --version

Data lives in ${chalk.gray(configuration.fleetHomeDir)} (FLEET_HOME_DIR)
`)
}

async function run(args: string[]): Promise<void> {
  const [subcommand, ...rest] = args

  switch (subcommand) {
    case 'tick':
      await handleTickCommand()
      return
    case 'watch':
      await handleWatchCommand(rest)
      return
    case 'status':
      await handleStatusCommand()
      return
    case 'task':
      await handleTaskCommand(rest)
      return
    case 'inbox':
      await handleInboxCommand(rest)
      return
    case 'route':
      await handleRouteCommand(rest)
      return
    case 'hook':
      await handleHookCommand(rest)
      return
    case 'bridge':
      await handleBridgeCommand(rest)
      return
    case '--version':
    case '-v':
      console.log(packageJson.version)
      return
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp()
      return
    default:
      console.error(chalk.red(`Unknown command: ${subcommand}`))
      showHelp()
      process.exit(1)
  }
}

(async () => {
  const args = process.argv.slice(2)

  logger.debug('Starting fleet CLI with args: ', process.argv)

  try {
    await run(args)
  } catch (error) {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : 'Unknown error')
    if (process.env.DEBUG) {
      console.error(error)
    }
    process.exit(1)
  }
})();
