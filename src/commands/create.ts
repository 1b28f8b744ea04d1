import { Args, Command } from '@oclif/core'
import type { ChalkInstance } from 'chalk'
import type { Ora } from 'ora'
import { loadConfig } from '../config/loader.js'
import type { GroveConfig } from '../config/schema.js'
import type { Environment } from '../registry/schema.js'
import { baseRepos, fetchBranchesInterruptibly, type BranchListing } from '../utils/branches.js'
import { fetchFlag, jsonFlag, repoFlag, templatesFlag, yesFlag } from '../utils/common-flags.js'
import { formatRepoList } from '../utils/display.js'
import {
  CreatePhase,
  createEnvironmentOrchestrator,
  type RepoSelection,
} from '../utils/environment.js'
import { ErrorHelper } from '../utils/errors.js'
import { createWorktreeClient } from '../utils/git.js'
import { parseRepoSpecs } from '../utils/selection.js'
import { initializeUI } from '../utils/ui.js'

/**
 * Create a multi-repository environment
 *
 * Adds one worktree per selected repository under a new environment
 * directory, then applies the configured symlinks, templates and copied
 * files. Without --repo on a terminal, asks for everything interactively.
 */
export default class Create extends Command {
  static description = 'Create an environment with worktrees from several repositories'

  static examples = [
    '<%= config.bin %> <%= command.id %> feature-x --repo backend:feature-x --repo frontend:feature-x',
    '<%= config.bin %> <%= command.id %> hotfix -r backend:hotfix/login --no-fetch',
    '<%= config.bin %> <%= command.id %> feature-x -r backend:main --no-templates --json',
    '<%= config.bin %> <%= command.id %>',
  ]

  static args = {
    name: Args.string({
      description: 'Environment name (letters, digits, "-" and "_")',
      required: false,
    }),
  }

  static flags = {
    repo: repoFlag,
    fetch: fetchFlag,
    templates: templatesFlag,
    yes: yesFlag,
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Create)
    const startTime = Date.now()
    const { spinner, chalk } = await initializeUI(flags.json)

    try {
      const config = await loadConfig()

      let name = args.name
      let repos: RepoSelection[] = parseRepoSpecs(flags.repo ?? [])

      if (!name || repos.length === 0) {
        if (flags.json || !process.stdin.isTTY) {
          ErrorHelper.validation(
            this,
            'An environment name and at least one --repo REPO:BRANCH are required',
            flags.json
          )
        }
        const answers = await this.prompt(config, name, repos)
        if (!answers) {
          this.log('Cancelled')
          return
        }
        name = answers.name
        repos = answers.repos
      }

      const orchestrator = createEnvironmentOrchestrator(config)
      spinner?.start(`Creating ${name}...`)

      const environment = await orchestrator.create(name, repos, {
        fetch: flags.fetch,
        renderTemplates: flags.templates,
        onProgress: this.buildProgressCallback(spinner),
        onWarning: (message) => {
          spinner?.clear()
          ErrorHelper.warn(this, message, flags.json)
        },
      })

      this.formatOutput(environment, flags.json, Date.now() - startTime, chalk)
    } catch (error) {
      if (spinner?.isSpinning) {
        spinner.fail('Failed')
      }
      ErrorHelper.fail(this, error, flags.json, 'Failed to create environment')
    }
  }

  /**
   * Ask for whatever the command line left out
   *
   * Branch choices come from each base repository's remote branches, fetched
   * concurrently; Ctrl+C during the fetch cancels the whole prompt.
   */
  private async prompt(
    config: GroveConfig,
    name: string | undefined,
    preselected: RepoSelection[]
  ): Promise<{ name: string; repos: RepoSelection[] } | null> {
    const { input, checkbox, confirm } = await import('@inquirer/prompts')
    const { isValidEnvironmentName } = await import('../utils/paths.js')

    const repoNames = Object.keys(config.repositories).sort()
    if (repoNames.length === 0) {
      ErrorHelper.validation(this, 'No repositories are configured. Add [repositories.<name>] to .grove.toml')
    }

    const envName =
      name ??
      (await input({
        message: 'Environment name:',
        validate: (value) => isValidEnvironmentName(value) || 'Use letters, digits, "-" and "_"',
      }))

    const selected =
      preselected.length > 0
        ? preselected.map((repo) => repo.name)
        : await checkbox({
            message: 'Repositories:',
            choices: repoNames.map((repoName) => ({ name: repoName, value: repoName })),
          })
    if (selected.length === 0) {
      return null
    }

    const needBranch = selected.filter((repoName) => !preselected.some((repo) => repo.name === repoName))
    const listings = await this.fetchBranchChoices(config, needBranch)
    if (!listings) {
      return null
    }

    const repos: RepoSelection[] = []
    for (const repoName of selected) {
      const given = preselected.find((repo) => repo.name === repoName)
      if (given) {
        repos.push(given)
        continue
      }
      repos.push({ name: repoName, branch: await this.askBranch(repoName, envName, listings.get(repoName)) })
    }

    this.log('')
    this.log(`  ${envName}: ${formatRepoList({ repos })}`)
    const proceed = await confirm({ message: 'Create this environment?', default: true })
    return proceed ? { name: envName, repos } : null
  }

  private async fetchBranchChoices(
    config: GroveConfig,
    names: string[]
  ): Promise<Map<string, BranchListing> | null> {
    if (names.length === 0) {
      return new Map()
    }

    const ora = (await import('ora')).default
    const spinner = ora('Fetching branches...').start()
    try {
      return await fetchBranchesInterruptibly(createWorktreeClient(), baseRepos(names, config.baseReposDir))
    } finally {
      spinner.stop()
    }
  }

  private async askBranch(
    repoName: string,
    envName: string,
    listing: BranchListing | undefined
  ): Promise<string> {
    const { input, select } = await import('@inquirer/prompts')
    const NEW_BRANCH = '\u0000new'
    if (listing && 'branches' in listing && listing.branches.length > 0) {
      const choice = await select({
        message: `Branch for ${repoName}:`,
        choices: [
          { name: `New branch (${envName})`, value: NEW_BRANCH },
          ...listing.branches.map((branch) => ({ name: branch, value: branch })),
        ],
      })
      if (choice !== NEW_BRANCH) {
        return choice
      }
    } else if (listing && 'error' in listing) {
      this.warn(`Could not list branches for ${repoName}: ${listing.error}`)
    }

    return input({
      message: `New branch for ${repoName}:`,
      default: envName,
      validate: (value) => value.trim().length > 0 || 'Branch name is required',
    })
  }

  private buildProgressCallback(spinner: Ora | null): (phase: CreatePhase, message: string) => void {
    return (phase: CreatePhase, message: string): void => {
      if (!spinner) {
        return
      }
      switch (phase) {
        case CreatePhase.ROLLBACK:
          spinner.fail('Creation failed, rolling back...')
          spinner.start('Rolling back...')
          break
        case CreatePhase.COMPLETE:
          spinner.succeed(message)
          break
        default:
          spinner.text = message
      }
    }
  }

  private formatOutput(environment: Environment, isJson: boolean, duration: number, chalk: ChalkInstance | null): void {
    if (isJson || !chalk) {
      this.log(JSON.stringify({ status: 'success', environment, duration }, null, 2))
      return
    }

    const output: string[] = []
    output.push(chalk.green(`✓ Environment ${environment.name} created at ${environment.path}`))
    for (const repo of environment.repos) {
      output.push(chalk.gray(`  ${repo.name}: ${repo.branch}`))
    }
    if (environment.symlinks.length > 0) {
      output.push(chalk.green(`✓ Symlinks: ${environment.symlinks.length}`))
    }
    if (environment.generatedFiles.length > 0) {
      output.push(chalk.green(`✓ Generated files: ${environment.generatedFiles.join(', ')}`))
    }
    output.push('')
    output.push(chalk.cyan(`Ready to use: cd ${environment.path}`))
    output.push(chalk.gray(`Duration: ${(duration / 1000).toFixed(2)}s`))
    this.log(output.join('\n'))
  }
}
