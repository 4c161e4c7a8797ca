import chalk from 'chalk'
import { configuration } from '@/configuration'
import { loadCapabilityConfig } from '@/routing/capabilityConfig'
import { capability, recommend } from '@/routing/capabilityRouter'
import { parseArgs, requirePositional } from './args'

/**
 * `fleet route <bloom>` prints the recommended model, `--model <id>` prints
 * a model's capability instead. Works without a fleet file.
 */
export async function handleRouteCommand(args: string[]): Promise<void> {
  const parsed = parseArgs(args)
  const config = await loadCapabilityConfig(parsed.flags.get('config') ?? configuration.fleetFile)

  const modelId = parsed.flags.get('model')
  if (modelId !== undefined) {
    console.log(String(capability(config, modelId)))
    return
  }

  const level = Number(requirePositional(parsed, 0, 'bloom'))
  const model = recommend(config, level)
  if (model === null) {
    console.log(chalk.gray('Routing not configured'))
    return
  }
  console.log(model)
}
