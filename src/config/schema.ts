import { z } from 'zod'
import { isContainedRelativePath } from '../utils/paths.js'

/**
 * Configuration Schema for grove
 *
 * Zod schemas for the merged configuration and for the partial configs read
 * from each source (.grove.toml, the global config, GROVE_* variables).
 */

// ============================================================================
// Zod Schemas (for validation)
// ============================================================================

/**
 * Repository names an environment must contain for a rule to apply
 */
const WhenSchema = z.array(z.string().min(1)).min(1, 'when must name at least one repository')

/**
 * A path inside the environment root
 */
const EnvironmentPathSchema = z
  .string()
  .min(1)
  .refine(isContainedRelativePath, 'must be a relative path inside the environment')

export const RepositoryConfigSchema = z.object({
  url: z.string().min(1),
})

/**
 * Template rendered into the environment
 */
export const TemplateRuleSchema = z.object({
  source: z.string().min(1),
  destination: EnvironmentPathSchema,
  when: WhenSchema.optional(),
})

/**
 * Static file copied into the environment
 */
export const CopyRuleSchema = z.object({
  source: z.string().min(1),
  destination: EnvironmentPathSchema,
  when: WhenSchema.optional(),
})

/**
 * Link between repositories; both ends are relative to the environment root
 */
export const SymlinkRuleSchema = z.object({
  source: EnvironmentPathSchema,
  target: EnvironmentPathSchema,
  when: WhenSchema,
})

/**
 * Complete grove configuration schema
 */
export const GroveConfigSchema = z.object({
  baseReposDir: z.string().min(1),
  environmentsDir: z.string().min(1),
  registryPath: z.string().min(1),
  repositories: z.record(RepositoryConfigSchema),
  templates: z.array(TemplateRuleSchema),
  copyFiles: z.array(CopyRuleSchema),
  symlinks: z.array(SymlinkRuleSchema),
})

/**
 * Partial grove configuration schema without defaults
 */
export const PartialGroveConfigSchema = GroveConfigSchema.partial().strict()

// ============================================================================
// TypeScript Types (inferred from Zod schemas)
// ============================================================================

export type RepositoryConfig = z.infer<typeof RepositoryConfigSchema>
export type TemplateRule = z.infer<typeof TemplateRuleSchema>
export type CopyRule = z.infer<typeof CopyRuleSchema>
export type SymlinkRule = z.infer<typeof SymlinkRuleSchema>

/**
 * Complete grove configuration
 *
 * After loading, directory paths and rule sources are absolute.
 */
export type GroveConfig = z.infer<typeof GroveConfigSchema>

/**
 * Partial configuration (used for merging)
 */
export type PartialGroveConfig = z.infer<typeof PartialGroveConfigSchema>

// ============================================================================
// Configuration Source Types
// ============================================================================

/**
 * Where a configuration value came from
 */
export enum ConfigSource {
  ENV_VARS = 'env_vars',
  LOCAL_CONFIG = 'local_config',
  GLOBAL_CONFIG = 'global_config',
  DEFAULT = 'default',
}

/**
 * Configuration with source tracking
 * Used for debugging and showing where settings come from
 */
export interface ConfigWithSource {
  config: GroveConfig
  sources: {
    [key: string]: ConfigSource
  }
  /** Config files that could not be read and were skipped */
  warnings: string[]
}

/**
 * A discovered configuration file
 */
export interface ConfigFile {
  path: string
  source: ConfigSource
  priority: number
  exists: boolean
}

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 *
 * Used when no configuration files are found
 */
export const DEFAULT_CONFIG: GroveConfig = {
  baseReposDir: '~/.local/share/grove/repos',
  environmentsDir: '~/grove-envs',
  registryPath: '~/.local/share/grove/registry.json',
  repositories: {},
  templates: [],
  copyFiles: [],
  symlinks: [],
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration against schema
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): GroveConfig {
  return GroveConfigSchema.parse(config)
}

/**
 * Validate partial configuration (for merging)
 */
export function validatePartialConfig(config: unknown): PartialGroveConfig {
  return PartialGroveConfigSchema.parse(config)
}

/**
 * Check if value is a valid GroveConfig
 */
export function isGroveConfig(value: unknown): value is GroveConfig {
  return GroveConfigSchema.safeParse(value).success
}
