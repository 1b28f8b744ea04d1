import { Flags } from '@oclif/core'

/**
 * Common CLI flags shared across multiple commands
 */

/**
 * JSON output flag
 * Enables structured JSON output instead of human-readable format
 */
export const jsonFlag = Flags.boolean({
  char: 'j',
  description: 'Output result in JSON format',
  default: false,
})

/**
 * Force operation flag
 * Bypasses safety checks
 */
export const forceFlag = Flags.boolean({
  char: 'f',
  description: 'Force the operation even when work would be lost',
  default: false,
})

/**
 * Skip confirmation prompts
 */
export const yesFlag = Flags.boolean({
  char: 'y',
  description: 'Answer yes to confirmation prompts',
  default: false,
})

/**
 * Repository selection, repeatable
 */
export const repoFlag = Flags.string({
  char: 'r',
  description: 'Repository and branch as REPO:BRANCH (repeatable)',
  multiple: true,
})

/**
 * Fetch base repositories before creating worktrees
 */
export const fetchFlag = Flags.boolean({
  description: 'Fetch base repositories before creating worktrees',
  default: true,
  allowNo: true,
})

/**
 * Render configured templates
 */
export const templatesFlag = Flags.boolean({
  description: 'Render configured templates',
  default: true,
  allowNo: true,
})
