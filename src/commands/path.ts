import { Args, Command } from '@oclif/core'
import { loadConfig } from '../config/loader.js'
import { createEnvironmentOrchestrator } from '../utils/environment.js'
import { ErrorHelper } from '../utils/errors.js'

/**
 * Print an environment's directory
 *
 * @example
 * cd "$(grove path feature-x)"
 */
export default class Path extends Command {
  static description = 'Print the path of an environment'

  static examples = [
    '<%= config.bin %> <%= command.id %> feature-x',
    'cd "$(<%= config.bin %> <%= command.id %> feature-x)"',
  ]

  static args = {
    name: Args.string({
      description: 'Environment name',
      required: true,
    }),
  }

  async run(): Promise<void> {
    const { args } = await this.parse(Path)

    try {
      const orchestrator = createEnvironmentOrchestrator(await loadConfig())
      this.log(await orchestrator.path(args.name))
    } catch (error) {
      ErrorHelper.fail(this, error, false, 'Failed to resolve environment path')
    }
  }
}
