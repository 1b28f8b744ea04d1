import { Command, Flags } from '@oclif/core'
import { loadConfig } from '../config/loader.js'
import { jsonFlag } from '../utils/common-flags.js'
import { formatRepoList, formatTable } from '../utils/display.js'
import { createEnvironmentOrchestrator } from '../utils/environment.js'
import { ErrorHelper } from '../utils/errors.js'
import { summarizeStatus } from '../utils/status.js'

/**
 * List registered environments
 */
export default class List extends Command {
  static description = 'List environments'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --status',
    '<%= config.bin %> <%= command.id %> --name-only',
    '<%= config.bin %> <%= command.id %> --json',
  ]

  static flags = {
    status: Flags.boolean({
      char: 's',
      description: 'Inspect every worktree and show a status column',
      default: false,
    }),
    'path-only': Flags.boolean({
      description: 'Print only environment paths, one per line',
      default: false,
      exclusive: ['name-only'],
    }),
    'name-only': Flags.boolean({
      description: 'Print only environment names, one per line',
      default: false,
      exclusive: ['path-only'],
    }),
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(List)

    try {
      const orchestrator = createEnvironmentOrchestrator(await loadConfig())
      const environments = await orchestrator.list()

      if (flags['name-only'] || flags['path-only']) {
        for (const environment of environments) {
          this.log(flags['name-only'] ? environment.name : environment.path)
        }
        return
      }

      const statuses = await Promise.all(
        environments.map((environment) => orchestrator.statusOf(environment, { inspect: flags.status }))
      )

      if (flags.json) {
        this.log(
          JSON.stringify(
            {
              environments: statuses.map((status) => ({
                ...status.environment,
                existsOnDisk: status.existsOnDisk,
                ...(flags.status ? { status: summarizeStatus(status.repos), repoStatus: status.repos } : {}),
              })),
            },
            null,
            2
          )
        )
        return
      }

      const chalk = (await import('chalk')).default
      if (environments.length === 0) {
        this.log(chalk.yellow('No environments found'))
        return
      }

      const header = ['NAME', 'REPOSITORIES', 'CREATED', ...(flags.status ? ['STATUS'] : [])]
      const rows = statuses.map((status) => [
        status.environment.name,
        formatRepoList(status.environment),
        status.environment.createdAt.slice(0, 10),
        ...(flags.status ? [status.existsOnDisk ? summarizeStatus(status.repos) : 'missing'] : []),
      ])

      const [headerLine, ...lines] = formatTable([header, ...rows])
      this.log(chalk.bold(headerLine))
      lines.forEach((line, index) => {
        this.log(statuses[index].existsOnDisk ? line : chalk.red(`${line}  (directory missing)`))
      })
    } catch (error) {
      ErrorHelper.fail(this, error, flags.json, 'Failed to list environments')
    }
  }
}
