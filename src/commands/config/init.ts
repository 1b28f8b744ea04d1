import { Command, Flags } from '@oclif/core'
import fs from 'fs-extra'
import * as path from 'path'
import { LOCAL_CONFIG_FILE, getGlobalConfigPath } from '../../config/loader.js'
import { renderStarterConfig } from '../../config/starter.js'
import { jsonFlag } from '../../utils/common-flags.js'
import { ErrorHelper } from '../../utils/errors.js'

/**
 * Initialize grove configuration
 *
 * Writes a commented starter file, in the current directory by default.
 */
export default class ConfigInit extends Command {
  static description = `Generate a ${LOCAL_CONFIG_FILE} configuration file with defaults`

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --force',
    '<%= config.bin %> <%= command.id %> --global',
  ]

  static flags = {
    force: Flags.boolean({
      char: 'f',
      description: 'Overwrite an existing file',
      default: false,
    }),
    global: Flags.boolean({
      char: 'g',
      description: 'Create the global config in ~/.config/grove/config.toml',
      default: false,
    }),
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ConfigInit)
    const configPath = flags.global ? getGlobalConfigPath() : path.join(process.cwd(), LOCAL_CONFIG_FILE)

    try {
      const exists = await fs.pathExists(configPath)
      if (exists && !flags.force) {
        ErrorHelper.validation(
          this,
          `Configuration file already exists: ${configPath}\nUse --force to overwrite`,
          flags.json
        )
      }

      await fs.ensureDir(path.dirname(configPath))
      await fs.writeFile(configPath, renderStarterConfig(), { mode: 0o644 })

      const action = exists ? 'overwritten' : 'created'
      if (flags.json) {
        this.log(
          JSON.stringify(
            { status: 'success', action, path: configPath, type: flags.global ? 'global' : 'local' },
            null,
            2
          )
        )
        return
      }

      this.log(`✓ Configuration file ${action}: ${configPath}`)
      this.log('')
      this.log('Next steps:')
      this.log('  1. Add your repositories under [repositories.<name>]')
      this.log('  2. Run `grove config show` to verify configuration')
    } catch (error) {
      ErrorHelper.fail(this, error, flags.json, 'Failed to create configuration file')
    }
  }
}
