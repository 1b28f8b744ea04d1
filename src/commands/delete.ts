import { Command } from '@oclif/core'
import { loadConfig } from '../config/loader.js'
import { forceFlag, jsonFlag, yesFlag } from '../utils/common-flags.js'
import { createEnvironmentOrchestrator, type DeleteResult } from '../utils/environment.js'
import { EXIT_CODES, ErrorHelper, GroveError, UNEXPECTED_EXIT_CODE, describeError, errorMessage } from '../utils/errors.js'

interface DeleteOutcome {
  name: string
  result?: DeleteResult
  error?: unknown
}

/**
 * Delete one or more environments
 *
 * Refuses when a worktree has uncommitted changes or unpushed commits unless
 * --force is given. Every named environment is attempted; the exit code is
 * that of the first failure.
 */
export default class Delete extends Command {
  static description = 'Delete environments and their worktrees'

  static strict = false

  static examples = [
    '<%= config.bin %> <%= command.id %> feature-x',
    '<%= config.bin %> <%= command.id %> feature-x hotfix --yes',
    '<%= config.bin %> <%= command.id %> feature-x --force',
    '<%= config.bin %> <%= command.id %> feature-x --yes --json',
  ]

  static flags = {
    force: forceFlag,
    yes: yesFlag,
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(Delete)
    const names = argv.map(String)

    try {
      if (names.length === 0) {
        ErrorHelper.validation(this, 'Name at least one environment to delete', flags.json)
      }

      if (!flags.yes && !flags.json) {
        const { confirm } = await import('@inquirer/prompts')
        const proceed = await confirm({
          message: `Delete ${names.join(', ')}${flags.force ? ' (forced)' : ''}?`,
          default: false,
        })
        if (!proceed) {
          this.log('Cancelled')
          return
        }
      }

      const orchestrator = createEnvironmentOrchestrator(await loadConfig())
      const outcomes: DeleteOutcome[] = []
      for (const name of names) {
        try {
          outcomes.push({ name, result: await orchestrator.delete(name, { force: flags.force }) })
        } catch (error) {
          outcomes.push({ name, error })
        }
      }

      await this.report(outcomes, flags.json)

      const failed = outcomes.find((outcome) => outcome.error !== undefined)
      if (failed) {
        this.exit(failed.error instanceof GroveError ? EXIT_CODES[failed.error.kind] : UNEXPECTED_EXIT_CODE)
      }
    } catch (error) {
      ErrorHelper.fail(this, error, flags.json, 'Failed to delete environments')
    }
  }

  private async report(outcomes: DeleteOutcome[], isJson: boolean): Promise<void> {
    if (isJson) {
      this.log(
        JSON.stringify(
          {
            results: outcomes.map(({ name, result, error }) =>
              result
                ? { name, status: 'deleted', path: result.path, removedWorktrees: result.removedWorktrees }
                : {
                    name,
                    status: 'error',
                    kind: error instanceof GroveError ? error.kind : null,
                    error: errorMessage(error),
                  }
            ),
          },
          null,
          2
        )
      )
      return
    }

    const chalk = (await import('chalk')).default
    for (const { name, result, error } of outcomes) {
      if (result) {
        this.log(chalk.green(`✓ Deleted ${name}`))
        this.log(chalk.gray(`  ${result.path}`))
      } else {
        this.error(error instanceof GroveError ? describeError(error) : `${name}: ${errorMessage(error)}`, {
          exit: false,
        })
      }
    }
  }
}
