import { parse as parseToml } from '@iarna/toml'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { errorMessage } from '../utils/errors.js'
import { resolvePath } from '../utils/paths.js'
import type { ConfigFile, ConfigWithSource, GroveConfig, PartialGroveConfig } from './schema.js'
import { ConfigSource, DEFAULT_CONFIG, validateConfig, validatePartialConfig } from './schema.js'
import { parseEnvVars, hasEnvConfig } from './env.js'

/**
 * Configuration Loader
 *
 * Loads grove configuration from, highest priority first:
 * 1. GROVE_* environment variables
 * 2. .grove.toml (current directory)
 * 3. Global config (~/.config/grove/config.toml)
 * 4. Built-in defaults
 *
 * Scalars and rule lists from a higher source replace lower ones; the
 * repositories table is merged by repository name.
 */

// ============================================================================
// Configuration File Patterns
// ============================================================================

export const LOCAL_CONFIG_FILE = '.grove.toml'

/**
 * Priority order for configuration sources (higher = more priority)
 */
const SOURCE_PRIORITY: Record<ConfigSource, number> = {
  [ConfigSource.ENV_VARS]: 90,
  [ConfigSource.LOCAL_CONFIG]: 80,
  [ConfigSource.GLOBAL_CONFIG]: 50,
  [ConfigSource.DEFAULT]: 0,
}

const SCALAR_KEYS = ['baseReposDir', 'environmentsDir', 'registryPath'] as const

// ============================================================================
// Configuration Discovery
// ============================================================================

/**
 * Get global configuration file path
 */
export function getGlobalConfigPath(home: string = os.homedir()): string {
  return path.join(home, '.config', 'grove', 'config.toml')
}

/**
 * Check if a configuration file exists and is readable
 */
export async function configFileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.R_OK)
    return true
  } catch {
    return false
  }
}

/**
 * List the configuration files grove looks at
 */
export async function discoverConfigFiles(cwd: string, home?: string): Promise<ConfigFile[]> {
  const candidates: Array<{ path: string; source: ConfigSource }> = [
    { path: path.join(path.resolve(cwd), LOCAL_CONFIG_FILE), source: ConfigSource.LOCAL_CONFIG },
    { path: getGlobalConfigPath(home), source: ConfigSource.GLOBAL_CONFIG },
  ]

  return Promise.all(
    candidates.map(async (candidate) => ({
      ...candidate,
      priority: SOURCE_PRIORITY[candidate.source],
      exists: await configFileExists(candidate.path),
    }))
  )
}

// ============================================================================
// Configuration Parsers
// ============================================================================

/**
 * Parse a grove TOML file
 */
export async function parseConfigFile(filePath: string): Promise<PartialGroveConfig> {
  const contents = await fs.readFile(filePath, 'utf-8')
  return validatePartialConfig(parseToml(contents))
}

// ============================================================================
// Configuration Merging
// ============================================================================

/**
 * Merge two partial configurations
 *
 * Override values win. Arrays are replaced, not concatenated.
 */
export function mergeConfigs(base: PartialGroveConfig, override: PartialGroveConfig): PartialGroveConfig {
  const result: PartialGroveConfig = { ...base }

  for (const key of SCALAR_KEYS) {
    const value = override[key]
    if (value !== undefined) {
      result[key] = value
    }
  }

  if (override.repositories !== undefined) {
    result.repositories = { ...base.repositories, ...override.repositories }
  }
  if (override.templates !== undefined) {
    result.templates = override.templates
  }
  if (override.copyFiles !== undefined) {
    result.copyFiles = override.copyFiles
  }
  if (override.symlinks !== undefined) {
    result.symlinks = override.symlinks
  }

  return result
}

/**
 * Merge multiple configuration sources
 *
 * Configs are merged in priority order (lower priority first). The result is
 * validated and its paths expanded.
 */
export function mergeMultipleConfigs(
  configs: Array<{ config: PartialGroveConfig; source: ConfigSource }>,
  home?: string
): Omit<ConfigWithSource, 'warnings'> {
  const sortedConfigs = [...configs].sort((a, b) => SOURCE_PRIORITY[a.source] - SOURCE_PRIORITY[b.source])

  let mergedConfig: PartialGroveConfig = { ...DEFAULT_CONFIG }
  const sources: { [key: string]: ConfigSource } = {}

  for (const key of Object.keys(DEFAULT_CONFIG)) {
    sources[key] = ConfigSource.DEFAULT
  }

  for (const { config, source } of sortedConfigs) {
    mergedConfig = mergeConfigs(mergedConfig, config)

    for (const [key, value] of Object.entries(config)) {
      if (value === undefined) {
        continue
      }
      sources[key] = source
      if (key === 'repositories' && config.repositories) {
        for (const repoName of Object.keys(config.repositories)) {
          sources[`repositories.${repoName}`] = source
        }
      }
    }
  }

  return {
    config: resolveConfigPaths(validateConfig(mergedConfig), home),
    sources,
  }
}

/**
 * Expand `~` and make directories and rule sources absolute
 */
export function resolveConfigPaths(config: GroveConfig, home?: string): GroveConfig {
  return {
    ...config,
    baseReposDir: resolvePath(config.baseReposDir, home),
    environmentsDir: resolvePath(config.environmentsDir, home),
    registryPath: resolvePath(config.registryPath, home),
    templates: config.templates.map((rule) => ({ ...rule, source: resolvePath(rule.source, home) })),
    copyFiles: config.copyFiles.map((rule) => ({ ...rule, source: resolvePath(rule.source, home) })),
  }
}

// ============================================================================
// Configuration Loading (Main API)
// ============================================================================

export interface LoadOptions {
  cwd?: string
  home?: string
  env?: NodeJS.ProcessEnv
  skipCache?: boolean
}

/**
 * Configuration loader with caching
 */
export class ConfigLoader {
  private cache: Map<string, ConfigWithSource> = new Map()

  /**
   * Load configuration from all sources
   */
  async load(options: LoadOptions = {}): Promise<GroveConfig> {
    return (await this.loadWithSources(options)).config
  }

  /**
   * Load configuration with source tracking
   *
   * A file that fails to parse or validate is skipped and reported in
   * `warnings`.
   */
  async loadWithSources(options: LoadOptions = {}): Promise<ConfigWithSource> {
    const cwd = options.cwd ?? process.cwd()
    const env = options.env ?? process.env
    const cacheKey = `${cwd}:${options.home ?? ''}`

    const cached = this.cache.get(cacheKey)
    if (cached && !options.skipCache && !options.env) {
      return cached
    }

    const configFiles = await discoverConfigFiles(cwd, options.home)
    const parsedConfigs: Array<{ config: PartialGroveConfig; source: ConfigSource }> = []
    const warnings: string[] = []

    for (const configFile of configFiles) {
      if (!configFile.exists) {
        continue
      }

      try {
        parsedConfigs.push({ config: await parseConfigFile(configFile.path), source: configFile.source })
      } catch (error) {
        warnings.push(`Failed to parse ${configFile.path}: ${errorMessage(error)}`)
      }
    }

    if (hasEnvConfig(env)) {
      parsedConfigs.push({ config: parseEnvVars(env), source: ConfigSource.ENV_VARS })
    }

    const result: ConfigWithSource = { ...mergeMultipleConfigs(parsedConfigs, options.home), warnings }
    this.cache.set(cacheKey, result)
    return result
  }

  /**
   * Clear the configuration cache
   */
  clearCache(): void {
    this.cache.clear()
  }
}

/**
 * Default config loader instance
 */
export const configLoader = new ConfigLoader()

/**
 * Load configuration (convenience function)
 */
export async function loadConfig(options?: LoadOptions): Promise<GroveConfig> {
  return configLoader.load(options)
}
