import { Command, Flags } from '@oclif/core'
import type { ChalkInstance } from 'chalk'
import { LOCAL_CONFIG_FILE, configLoader } from '../../config/loader.js'
import { ConfigSource, type ConfigWithSource } from '../../config/schema.js'
import { jsonFlag } from '../../utils/common-flags.js'
import { ErrorHelper } from '../../utils/errors.js'

const SOURCE_LABELS: Record<ConfigSource, string> = {
  [ConfigSource.ENV_VARS]: 'environment variable',
  [ConfigSource.LOCAL_CONFIG]: LOCAL_CONFIG_FILE,
  [ConfigSource.GLOBAL_CONFIG]: '~/.config/grove/config.toml',
  [ConfigSource.DEFAULT]: 'default',
}

/**
 * Show merged configuration
 *
 * Displays the final configuration after merging all sources.
 * Useful for debugging configuration issues and understanding
 * which settings are active.
 */
export default class ConfigShow extends Command {
  static description = 'Display merged configuration from all sources'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --sources',
    '<%= config.bin %> <%= command.id %> --json',
  ]

  static flags = {
    sources: Flags.boolean({
      char: 's',
      description: 'Show where each setting comes from',
      default: false,
    }),

    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ConfigShow)

    try {
      const configWithSources = await configLoader.loadWithSources({ cwd: process.cwd() })

      if (flags.json) {
        this.log(JSON.stringify(flags.sources ? configWithSources : configWithSources.config, null, 2))
        return
      }

      const chalk = (await import('chalk')).default
      this.displayHumanReadable(configWithSources, flags.sources, chalk)
      for (const warning of configWithSources.warnings) {
        this.warn(warning)
      }
    } catch (error) {
      ErrorHelper.fail(this, error, flags.json, 'Failed to load configuration')
    }
  }

  /**
   * Display configuration in human-readable format
   */
  private displayHumanReadable(configWithSources: ConfigWithSource, showSources: boolean, chalk: ChalkInstance): void {
    const { config, sources } = configWithSources
    const sourceOf = (key: string): string => {
      if (!showSources) return ''
      const source = sources[key] ?? ConfigSource.DEFAULT
      return chalk.gray(` (${SOURCE_LABELS[source]})`)
    }

    this.log(chalk.bold('\nConfiguration:\n'))
    this.log(`  baseReposDir = ${chalk.yellow(config.baseReposDir)}${sourceOf('baseReposDir')}`)
    this.log(`  environmentsDir = ${chalk.yellow(config.environmentsDir)}${sourceOf('environmentsDir')}`)
    this.log(`  registryPath = ${chalk.yellow(config.registryPath)}${sourceOf('registryPath')}`)

    this.log('')
    this.log(chalk.cyan.bold('[repositories]'))
    const repoNames = Object.keys(config.repositories).sort()
    if (repoNames.length === 0) {
      this.log(chalk.gray('  (none)'))
    }
    for (const name of repoNames) {
      this.log(`  ${name} = ${chalk.yellow(config.repositories[name].url)}${sourceOf(`repositories.${name}`)}`)
    }

    const rules = {
      templates: config.templates.map((rule) => ({ from: rule.source, to: rule.destination, when: rule.when })),
      copyFiles: config.copyFiles.map((rule) => ({ from: rule.source, to: rule.destination, when: rule.when })),
      symlinks: config.symlinks.map((rule) => ({ from: rule.source, to: rule.target, when: rule.when })),
    }
    for (const [key, list] of Object.entries(rules)) {
      this.log('')
      this.log(chalk.cyan.bold(`[${key}]`) + sourceOf(key))
      if (list.length === 0) {
        this.log(chalk.gray('  (none)'))
      }
      for (const rule of list) {
        const when = rule.when ? chalk.gray(` when ${rule.when.join(', ')}`) : ''
        this.log(`  ${rule.from} -> ${rule.to}${when}`)
      }
    }

    this.log('')
  }
}
