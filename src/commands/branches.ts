import { Command } from '@oclif/core'
import { loadConfig } from '../config/loader.js'
import { baseRepos, fetchBranchesInterruptibly } from '../utils/branches.js'
import { jsonFlag } from '../utils/common-flags.js'
import { ErrorHelper, NotFoundError } from '../utils/errors.js'
import { createWorktreeClient } from '../utils/git.js'

/**
 * List remote branches of base repositories
 *
 * Fetches every named repository concurrently (all configured ones when
 * none is named). Ctrl+C stops the fetches.
 */
export default class Branches extends Command {
  static description = 'Fetch and list remote branches of base repositories'

  static strict = false

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> backend frontend',
    '<%= config.bin %> <%= command.id %> backend --json',
  ]

  static flags = {
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(Branches)

    try {
      const config = await loadConfig()
      const requested = argv.map(String)
      const names = requested.length > 0 ? requested : Object.keys(config.repositories).sort()

      for (const name of names) {
        if (!Object.hasOwn(config.repositories, name)) {
          throw new NotFoundError(`Unknown repository ${name}`, { repository: name })
        }
      }

      const ora = flags.json ? null : (await import('ora')).default
      const spinner = ora ? ora('Fetching branches...').start() : null
      const listings = await fetchBranchesInterruptibly(
        createWorktreeClient(),
        baseRepos(names, config.baseReposDir)
      ).finally(() => spinner?.stop())
      if (!listings) {
        this.log('Cancelled')
        return
      }

      if (flags.json) {
        this.log(JSON.stringify({ repositories: Object.fromEntries(listings) }, null, 2))
        return
      }

      const chalk = (await import('chalk')).default
      for (const [name, listing] of listings) {
        this.log(chalk.bold(name))
        if ('error' in listing) {
          this.log(chalk.red(`  error: ${listing.error}`))
        } else if (listing.branches.length === 0) {
          this.log(chalk.gray('  (no remote branches)'))
        } else {
          for (const branch of listing.branches) {
            this.log(`  ${branch}`)
          }
        }
      }
    } catch (error) {
      ErrorHelper.fail(this, error, flags.json, 'Failed to list branches')
    }
  }
}
