/**
 * grove - multi-repository environments built from git worktrees
 *
 * Main entry point and exports for programmatic use.
 */

export { run } from '@oclif/core'

export * from './utils/environment.js'
export * from './utils/errors.js'
export { WorktreeClient, createWorktreeClient } from './utils/git.js'
export { TemplateRenderer, buildTemplateContext, shouldRender } from './utils/template.js'
export { StatusInspector, classifyStatus, summarizeStatus } from './utils/status.js'
export { EnvironmentRegistry } from './registry/registry.js'
export { loadConfig, configLoader } from './config/loader.js'

// Re-export types
export type { Environment, RepoInstance, SymlinkEntry, PrInfo } from './registry/schema.js'
export type { GroveConfig } from './config/schema.js'
