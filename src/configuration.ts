/**
 * Global configuration for the fleet dispatcher
 *
 * Centralizes all configuration including environment variables and paths
 * Environment files should be loaded using Node's --env-file flag
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name]
  if (!raw) return fallback
  const parsed = Number.parseInt(raw, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

class Configuration {
  // Directories and paths
  public readonly fleetHomeDir: string
  public readonly logsDir: string
  public readonly queueDir: string
  public readonly inboxDir: string
  public readonly tasksDir: string
  public readonly workerStateDir: string
  public readonly fleetFile: string

  // Timing
  public readonly lockTimeoutMs: number
  public readonly staleLockMs: number
  public readonly tickIntervalMs: number
  public readonly nudgeCooldownMs: number

  // The human-facing mailbox: receives notifications and completion reports
  public readonly ownerId: string

  // tmux server the worker panes live on; default server when unset
  public readonly tmuxSocketPath: string | undefined

  // ntfy relay used by the notification bridge
  public readonly ntfyServer: string
  public readonly ntfyTopic: string | undefined
  public readonly ntfyToken: string | undefined

  constructor() {
    // Directory configuration - Priority: FLEET_HOME_DIR env > default home dir
    if (process.env.FLEET_HOME_DIR) {
      // Expand ~ to home directory if present
      this.fleetHomeDir = process.env.FLEET_HOME_DIR.replace(/^~/, homedir())
    } else {
      this.fleetHomeDir = join(homedir(), '.fleet')
    }

    this.logsDir = join(this.fleetHomeDir, 'logs')
    this.queueDir = join(this.fleetHomeDir, 'queue')
    this.inboxDir = join(this.queueDir, 'inbox')
    this.tasksDir = join(this.queueDir, 'tasks')
    this.workerStateDir = join(this.queueDir, 'workers')
    this.fleetFile = join(this.fleetHomeDir, 'fleet.json')

    this.lockTimeoutMs = readIntEnv('FLEET_LOCK_TIMEOUT_MS', 10_000)
    this.staleLockMs = readIntEnv('FLEET_STALE_LOCK_MS', 60_000)
    this.tickIntervalMs = readIntEnv('FLEET_TICK_INTERVAL_MS', 5_000)
    this.nudgeCooldownMs = readIntEnv('FLEET_NUDGE_COOLDOWN_MS', 60_000)

    this.ownerId = process.env.FLEET_OWNER_ID || 'commander'

    this.tmuxSocketPath = process.env.FLEET_TMUX_SOCKET || undefined

    this.ntfyServer = (process.env.NTFY_SERVER || 'https://ntfy.sh').replace(/\/+$/, '')
    this.ntfyTopic = process.env.NTFY_TOPIC || undefined
    this.ntfyToken = process.env.NTFY_TOKEN || undefined
  }
}

export const configuration: Configuration = new Configuration()
