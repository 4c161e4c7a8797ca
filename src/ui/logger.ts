/**
 * - debug goes only to the log file
 * - info/warn/error are our UI, they go to the console and are mirrored to the file
 * - File output location: ~/.fleet/logs/<date time in local timezone>-pid-<pid>.log
 */

import chalk from 'chalk'
import { appendFileSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { configuration } from '@/configuration'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

function createLogFilePath(): string {
  const now = new Date()
  const pad = (n: number) => String(n).padStart(2, '0')
  const stamp = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}-${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`
  return join(configuration.logsDir, `${stamp}-pid-${process.pid}.log`)
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg
  if (arg instanceof Error) return arg.stack || arg.message
  return JSON.stringify(arg)
}

class Logger {
  private logsDirReady = false

  constructor(
    public readonly logFilePath: string = createLogFilePath()
  ) {}

  debug(message: string, ...args: unknown[]): void {
    this.logToFile('debug', message, ...args)
  }

  info(message: string, ...args: unknown[]): void {
    this.logToConsole('info', message, ...args)
    this.logToFile('info', message, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.logToConsole('warn', message, ...args)
    this.logToFile('warn', message, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    this.logToConsole('error', message, ...args)
    this.logToFile('error', message, ...args)
  }

  private logToConsole(level: Exclude<LogLevel, 'debug'>, message: string, ...args: unknown[]): void {
    switch (level) {
      case 'error': {
        console.error(chalk.red(message), ...args)
        break
      }

      case 'warn': {
        console.log(chalk.yellow(message), ...args)
        break
      }

      default: {
        console.log(chalk.blue(message), ...args)
        break
      }
    }
  }

  private logToFile(level: LogLevel, message: string, ...args: unknown[]): void {
    const logLine = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message} ${args.map(formatArg).join(' ')}\n`

    try {
      if (!this.logsDirReady) {
        mkdirSync(configuration.logsDir, { recursive: true })
        this.logsDirReady = true
      }
      appendFileSync(this.logFilePath, logLine)
    } catch (error) {
      // NOTE: never fall back to stdout in production, it would land in worker panes
      if (process.env.DEBUG) {
        console.error('Failed to write log file:', error)
        console.log(message, ...args)
      }
    }
  }
}

export type { Logger }
export const logger = new Logger()
