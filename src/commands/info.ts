import { Args, Command } from '@oclif/core'
import { loadConfig } from '../config/loader.js'
import { jsonFlag } from '../utils/common-flags.js'
import { STATUS_LABELS, formatRepoStatus } from '../utils/display.js'
import { createEnvironmentOrchestrator } from '../utils/environment.js'
import { ErrorHelper } from '../utils/errors.js'
import { classifyStatus, summarizeStatus } from '../utils/status.js'

/**
 * Show one environment in detail, with the live status of each worktree
 */
export default class Info extends Command {
  static description = 'Show details and status of an environment'

  static examples = ['<%= config.bin %> <%= command.id %> feature-x', '<%= config.bin %> <%= command.id %> feature-x --json']

  static args = {
    name: Args.string({
      description: 'Environment name',
      required: true,
    }),
  }

  static flags = {
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Info)

    try {
      const orchestrator = createEnvironmentOrchestrator(await loadConfig())
      const { environment, existsOnDisk, repos } = await orchestrator.status(args.name)

      if (flags.json) {
        this.log(
          JSON.stringify({ ...environment, existsOnDisk, status: summarizeStatus(repos), repoStatus: repos }, null, 2)
        )
        return
      }

      const chalk = (await import('chalk')).default
      const colour = {
        clean: chalk.green,
        uncommitted: chalk.yellow,
        ahead: chalk.yellow,
        error: chalk.red,
      }

      this.log(chalk.bold(environment.name))
      this.log(chalk.gray(`  Path:    ${environment.path}`))
      this.log(chalk.gray(`  Created: ${environment.createdAt}`))
      if (!existsOnDisk) {
        this.log(chalk.red('  Directory is missing'))
      }

      if (environment.prInfo) {
        const pr = environment.prInfo
        this.log('')
        this.log(chalk.cyan(`  Pull request #${pr.number}: ${pr.title}`))
        this.log(chalk.gray(`    ${pr.url} (by ${pr.author})`))
      }

      this.log('')
      this.log(chalk.bold('Repositories:'))
      for (const status of repos) {
        const statusClass = classifyStatus(status)
        this.log(`  ${chalk.cyan(status.name)} ${chalk.gray(`(${status.branch})`)}`)
        this.log(`    ${colour[statusClass](formatRepoStatus(status))}`)
      }

      if (environment.symlinks.length > 0) {
        this.log('')
        this.log(chalk.bold('Symlinks:'))
        for (const link of environment.symlinks) {
          this.log(`  ${link.target} -> ${link.source}`)
        }
      }

      if (environment.generatedFiles.length > 0) {
        this.log('')
        this.log(chalk.bold('Generated files:'))
        for (const file of environment.generatedFiles) {
          this.log(`  ${file}`)
        }
      }

      this.log('')
      this.log(`Overall: ${colour[summarizeStatus(repos)](STATUS_LABELS[summarizeStatus(repos)])}`)
    } catch (error) {
      ErrorHelper.fail(this, error, flags.json, 'Failed to read environment')
    }
  }
}
