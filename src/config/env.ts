import type { PartialGroveConfig } from './schema.js'

/**
 * Environment Variable Parser
 *
 * Maps GROVE_* environment variables onto configuration keys:
 * - GROVE_BASE_REPOS_DIR → baseReposDir
 * - GROVE_ENVIRONMENTS_DIR → environmentsDir
 * - GROVE_REGISTRY_PATH → registryPath
 */

/**
 * Environment variable prefix
 */
const ENV_PREFIX = 'GROVE_'

type EnvConfigKey = 'baseReposDir' | 'environmentsDir' | 'registryPath'

/**
 * Supported environment variables and their config keys
 */
const ENV_VAR_MAP: Record<string, EnvConfigKey> = {
  GROVE_BASE_REPOS_DIR: 'baseReposDir',
  GROVE_ENVIRONMENTS_DIR: 'environmentsDir',
  GROVE_REGISTRY_PATH: 'registryPath',
}

/**
 * Parse all supported GROVE_* environment variables
 *
 * Empty and whitespace-only values are ignored.
 */
export function parseEnvVars(env: NodeJS.ProcessEnv = process.env): PartialGroveConfig {
  const config: PartialGroveConfig = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || !value?.trim()) {
      continue
    }

    const configKey = ENV_VAR_MAP[key]
    if (configKey) {
      config[configKey] = value.trim()
    }
  }

  return config
}

/**
 * Check if any supported GROVE_* environment variable is set
 */
export function hasEnvConfig(env: NodeJS.ProcessEnv = process.env): boolean {
  return Object.keys(parseEnvVars(env)).length > 0
}

/**
 * List all supported environment variables
 */
export function listSupportedEnvVars(): Array<{ name: string; path: string; type: string }> {
  return Object.entries(ENV_VAR_MAP).map(([name, configKey]) => ({
    name,
    path: configKey,
    type: 'string',
  }))
}
