import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import {
  ConfigLoader,
  LOCAL_CONFIG_FILE,
  configFileExists,
  discoverConfigFiles,
  getGlobalConfigPath,
  mergeConfigs,
  mergeMultipleConfigs,
  parseConfigFile,
} from '../../src/config/loader.js'
import { ConfigSource } from '../../src/config/schema.js'

describe('Config Loader', () => {
  let tempDir: string
  let home: string
  let cwd: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'grove-test-'))
    home = path.join(tempDir, 'home')
    cwd = path.join(tempDir, 'project')
    await fs.ensureDir(home)
    await fs.ensureDir(cwd)
  })

  afterEach(async () => {
    await fs.remove(tempDir)
  })

  // ============================================================================
  // Discovery
  // ============================================================================

  describe('configFileExists', () => {
    it('should tell existing and missing files apart', async () => {
      const file = path.join(tempDir, 'a.toml')
      await fs.writeFile(file, '')

      expect(await configFileExists(file)).toBe(true)
      expect(await configFileExists(path.join(tempDir, 'b.toml'))).toBe(false)
    })
  })

  describe('discoverConfigFiles', () => {
    it('should look at the local file and the global file', async () => {
      await fs.outputFile(path.join(cwd, LOCAL_CONFIG_FILE), '')

      const files = await discoverConfigFiles(cwd, home)

      expect(files).toEqual([
        { path: path.join(cwd, LOCAL_CONFIG_FILE), source: ConfigSource.LOCAL_CONFIG, priority: 80, exists: true },
        { path: getGlobalConfigPath(home), source: ConfigSource.GLOBAL_CONFIG, priority: 50, exists: false },
      ])
    })
  })

  describe('getGlobalConfigPath', () => {
    it('should live under ~/.config/grove', () => {
      expect(getGlobalConfigPath('/home/dev')).toBe(path.join('/home/dev', '.config', 'grove', 'config.toml'))
    })
  })

  // ============================================================================
  // Parsing
  // ============================================================================

  describe('parseConfigFile', () => {
    it('should parse TOML tables and arrays of tables', async () => {
      const file = path.join(tempDir, 'grove.toml')
      await fs.writeFile(
        file,
        [
          'environmentsDir = "~/work/envs"',
          '',
          '[repositories.api]',
          'url = "git@github.com:acme/api.git"',
          '',
          '[[symlinks]]',
          'source = "web/dist"',
          'target = "api/public"',
          'when = ["api", "web"]',
          '',
        ].join('\n')
      )

      expect(await parseConfigFile(file)).toEqual({
        environmentsDir: '~/work/envs',
        repositories: { api: { url: 'git@github.com:acme/api.git' } },
        symlinks: [{ source: 'web/dist', target: 'api/public', when: ['api', 'web'] }],
      })
    })
  })

  // ============================================================================
  // Merging
  // ============================================================================

  describe('mergeConfigs', () => {
    it('should replace scalars and arrays and merge repositories by name', () => {
      const merged = mergeConfigs(
        {
          baseReposDir: '/a',
          repositories: { api: { url: 'old-api' }, web: { url: 'web' } },
          copyFiles: [{ source: '/x', destination: 'x' }],
        },
        {
          baseReposDir: '/b',
          repositories: { api: { url: 'new-api' } },
          copyFiles: [],
        }
      )

      expect(merged).toEqual({
        baseReposDir: '/b',
        repositories: { api: { url: 'new-api' }, web: { url: 'web' } },
        copyFiles: [],
      })
    })
  })

  describe('mergeMultipleConfigs', () => {
    it('should apply sources in priority order and track where values came from', () => {
      const { config, sources } = mergeMultipleConfigs(
        [
          { config: { environmentsDir: '/from-env' }, source: ConfigSource.ENV_VARS },
          {
            config: { environmentsDir: '/from-global', repositories: { api: { url: 'api-url' } } },
            source: ConfigSource.GLOBAL_CONFIG,
          },
        ],
        '/home/dev'
      )

      expect(config.environmentsDir).toBe('/from-env')
      expect(config.baseReposDir).toBe(path.resolve('/home/dev/.local/share/grove/repos'))
      expect(sources.environmentsDir).toBe(ConfigSource.ENV_VARS)
      expect(sources['repositories.api']).toBe(ConfigSource.GLOBAL_CONFIG)
      expect(sources.baseReposDir).toBe(ConfigSource.DEFAULT)
    })

    it('should expand ~ in template and copy sources', () => {
      const { config } = mergeMultipleConfigs(
        [
          {
            config: { templates: [{ source: '~/templates/compose.hbs', destination: 'docker-compose.yml' }] },
            source: ConfigSource.LOCAL_CONFIG,
          },
        ],
        '/home/dev'
      )

      expect(config.templates[0].source).toBe(path.resolve('/home/dev/templates/compose.hbs'))
      expect(config.templates[0].destination).toBe('docker-compose.yml')
    })
  })

  // ============================================================================
  // Loader
  // ============================================================================

  describe('ConfigLoader', () => {
    it('should fall back to defaults with no files or variables', async () => {
      const loader = new ConfigLoader()

      const config = await loader.load({ cwd, home, env: {} })

      expect(config.registryPath).toBe(path.join(home, '.local', 'share', 'grove', 'registry.json'))
      expect(config.repositories).toEqual({})
    })

    it('should let the local file override the global one and env vars override both', async () => {
      await fs.outputFile(
        getGlobalConfigPath(home),
        'baseReposDir = "/global/repos"\nenvironmentsDir = "/global/envs"\n[repositories.api]\nurl = "global-api"\n'
      )
      await fs.outputFile(
        path.join(cwd, LOCAL_CONFIG_FILE),
        'environmentsDir = "/local/envs"\n[repositories.web]\nurl = "local-web"\n'
      )
      const loader = new ConfigLoader()

      const { config, sources } = await loader.loadWithSources({
        cwd,
        home,
        env: { GROVE_BASE_REPOS_DIR: '/env/repos' },
      })

      expect(config.baseReposDir).toBe('/env/repos')
      expect(config.environmentsDir).toBe('/local/envs')
      expect(config.repositories).toEqual({ api: { url: 'global-api' }, web: { url: 'local-web' } })
      expect(sources.baseReposDir).toBe(ConfigSource.ENV_VARS)
      expect(sources.environmentsDir).toBe(ConfigSource.LOCAL_CONFIG)
    })

    it('should skip a malformed file and report it', async () => {
      const local = path.join(cwd, LOCAL_CONFIG_FILE)
      await fs.outputFile(local, 'environmentsDir = [unterminated')
      const loader = new ConfigLoader()

      const { config, warnings } = await loader.loadWithSources({ cwd, home, env: {} })

      expect(config.environmentsDir).toBe(path.join(home, 'grove-envs'))
      expect(warnings).toHaveLength(1)
      expect(warnings[0]).toContain(`Failed to parse ${local}`)
    })

    it('should cache results unless asked not to', async () => {
      const loader = new ConfigLoader()
      const first = await loader.loadWithSources({ cwd, home })
      await fs.outputFile(path.join(cwd, LOCAL_CONFIG_FILE), 'environmentsDir = "/changed"\n')

      expect(await loader.loadWithSources({ cwd, home })).toBe(first)
      expect((await loader.loadWithSources({ cwd, home, skipCache: true })).config.environmentsDir).toBe('/changed')
    })
  })
})
