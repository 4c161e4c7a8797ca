import { configuration } from '@/configuration'
import { TmuxWorkerControl } from '@/agent/tmuxWorkerControl'
import { Dispatcher } from '@/dispatch/dispatcher'
import { loadFleetConfig, type FleetConfig } from '@/fleet/fleetConfig'
import { WorkerStateStore } from '@/fleet/workerState'
import { MailboxStore } from '@/mailbox/mailboxStore'
import { TaskRegistry } from '@/tasks/taskRegistry'

export interface FleetContext {
  fleet: FleetConfig
  registry: TaskRegistry
  mailboxes: MailboxStore
  workerStates: WorkerStateStore
  control: TmuxWorkerControl
  dispatcher: Dispatcher
}

/**
 * Wires the stores under the fleet home directory to the tmux-backed
 * worker control. Every command opens its own context.
 */
export async function openFleet(fleetFile: string = configuration.fleetFile): Promise<FleetContext> {
  const fleet = await loadFleetConfig(fleetFile)
  const registry = TaskRegistry.open()
  const mailboxes = MailboxStore.open()
  const workerStates = WorkerStateStore.open()
  const control = new TmuxWorkerControl()

  const dispatcher = new Dispatcher({
    registry,
    mailboxes,
    workerStates,
    control,
    fleet,
    ownerId: configuration.ownerId,
    nudgeCooldownMs: configuration.nudgeCooldownMs,
  })

  return { fleet, registry, mailboxes, workerStates, control, dispatcher }
}
