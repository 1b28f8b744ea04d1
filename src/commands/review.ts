import { Args, Command, Flags } from '@oclif/core'
import { loadConfig } from '../config/loader.js'
import { fetchFlag, jsonFlag, repoFlag, templatesFlag } from '../utils/common-flags.js'
import { CreatePhase, createEnvironmentOrchestrator } from '../utils/environment.js'
import { ErrorHelper } from '../utils/errors.js'
import {
  GitHubClient,
  findRepositoryForPr,
  parsePrReference,
  reviewEnvironmentName,
  toPrInfo,
} from '../utils/github.js'
import { parseRepoSpecs } from '../utils/selection.js'
import { initializeUI } from '../utils/ui.js'

/**
 * Create an environment for reviewing a pull request
 *
 * Looks the pull request up with the gh CLI and checks its head branch out
 * in an environment named `pr-<repo>-<number>`. Companion repositories given
 * with --repo are checked out beside it.
 */
export default class Review extends Command {
  static description = 'Create an environment for a GitHub pull request'

  static examples = [
    '<%= config.bin %> <%= command.id %> https://github.com/acme/backend/pull/42',
    '<%= config.bin %> <%= command.id %> backend#42',
    '<%= config.bin %> <%= command.id %> backend#42 --name review-login --json',
    '<%= config.bin %> <%= command.id %> backend#42 --repo frontend:main',
  ]

  static args = {
    pr: Args.string({
      description: 'Pull request URL or REPO#NUMBER',
      required: true,
    }),
  }

  static flags = {
    name: Flags.string({
      char: 'n',
      description: 'Environment name (default: pr-<repo>-<number>)',
    }),
    repo: repoFlag,
    fetch: fetchFlag,
    templates: templatesFlag,
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Review)
    const { spinner, chalk } = await initializeUI(flags.json)

    try {
      const config = await loadConfig()
      const reference = parsePrReference(args.pr)
      const companions = parseRepoSpecs(flags.repo ?? [])
      const { repository, github } = findRepositoryForPr(reference, config.repositories)

      spinner?.start(`Looking up ${github.owner}/${github.repo}#${reference.number}...`)
      const pullRequest = await new GitHubClient().getPullRequest(github, reference.number)
      const name = flags.name ?? reviewEnvironmentName(repository, pullRequest.number)

      const environment = await createEnvironmentOrchestrator(config).create(
        name,
        [{ name: repository, branch: pullRequest.headRefName }, ...companions],
        {
          fetch: flags.fetch,
          renderTemplates: flags.templates,
          prInfo: toPrInfo(pullRequest, repository),
          onProgress: (phase, message) => {
            if (!spinner) return
            if (phase === CreatePhase.COMPLETE) {
              spinner.succeed(message)
            } else {
              spinner.text = message
            }
          },
          onWarning: (message) => {
            spinner?.clear()
            ErrorHelper.warn(this, message, flags.json)
          },
        }
      )

      if (flags.json || !chalk) {
        this.log(JSON.stringify({ status: 'success', environment }, null, 2))
        return
      }

      this.log(chalk.green(`✓ Review environment ${environment.name} created at ${environment.path}`))
      this.log(chalk.gray(`  #${pullRequest.number} ${pullRequest.title}`))
      this.log(chalk.gray(`  by ${pullRequest.author.login} on ${pullRequest.headRefName}`))
      this.log('')
      this.log(chalk.cyan(`Ready to use: cd ${environment.path}`))
    } catch (error) {
      if (spinner?.isSpinning) {
        spinner.fail('Failed')
      }
      ErrorHelper.fail(this, error, flags.json, 'Failed to create review environment')
    }
  }
}
