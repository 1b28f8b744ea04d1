import { Errors } from '@oclif/core'

/**
 * Error taxonomy and CLI error rendering
 *
 * Core modules throw `GroveError` subclasses carrying structured context.
 * Commands hand them to `ErrorHelper`, which picks the exit code and turns
 * the context into a readable message (or a JSON document with --json).
 */

// ============================================================================
// Error Kinds
// ============================================================================

export enum ErrorKind {
  INVALID_INPUT = 'invalid_input',
  CONFLICT = 'conflict',
  NOT_FOUND = 'not_found',
  TOOL_FAILURE = 'tool_failure',
  TOOL_UNAVAILABLE = 'tool_unavailable',
  TEMPLATE_FAILURE = 'template_failure',
  PARTIAL = 'partial',
  FILESYSTEM = 'filesystem',
  REGISTRY = 'registry',
}

/**
 * Process exit codes, one per error kind so scripts can branch on them
 */
export const EXIT_CODES: Record<ErrorKind, number> = {
  [ErrorKind.INVALID_INPUT]: 2,
  [ErrorKind.NOT_FOUND]: 3,
  [ErrorKind.CONFLICT]: 4,
  [ErrorKind.TOOL_FAILURE]: 5,
  [ErrorKind.TOOL_UNAVAILABLE]: 6,
  [ErrorKind.TEMPLATE_FAILURE]: 7,
  [ErrorKind.PARTIAL]: 8,
  [ErrorKind.REGISTRY]: 9,
  [ErrorKind.FILESYSTEM]: 10,
}

export const UNEXPECTED_EXIT_CODE = 1

/**
 * Where an error happened
 */
export interface ErrorContext {
  environment?: string
  repository?: string
  branch?: string
  step?: string
  path?: string
}

/**
 * A rollback action that could not be undone after a failed creation
 */
export interface RollbackFailure {
  operation: string
  path: string
  error: string
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// Base Error
// ============================================================================

export abstract class GroveError extends Error {
  abstract readonly kind: ErrorKind

  /** Filled in by the create transaction when its own cleanup failed */
  rollbackFailures: RollbackFailure[] = []

  constructor(
    message: string,
    public context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }

  /**
   * Add context keys that are not already set
   */
  enrich(extra: ErrorContext): this {
    this.context = { ...extra, ...this.context }
    return this
  }
}

// ============================================================================
// Concrete Errors
// ============================================================================

export class InvalidInputError extends GroveError {
  readonly kind = ErrorKind.INVALID_INPUT

  constructor(message: string, context?: ErrorContext) {
    super(message, context)
    this.name = 'InvalidInputError'
  }
}

export class NotFoundError extends GroveError {
  readonly kind = ErrorKind.NOT_FOUND

  constructor(message: string, context?: ErrorContext) {
    super(message, context)
    this.name = 'NotFoundError'
  }
}

export type ConflictReason =
  | 'name_registered'
  | 'branch_checked_out'
  | 'directory_unregistered'
  | 'outstanding_work'

/**
 * Work that would be lost by deleting an environment
 */
export interface OutstandingWork {
  repository: string
  kind: 'uncommitted' | 'unpushed'
  count: number
}

export class ConflictError extends GroveError {
  readonly kind = ErrorKind.CONFLICT

  constructor(
    public readonly reason: ConflictReason,
    message: string,
    context?: ErrorContext,
    public readonly outstanding: OutstandingWork[] = []
  ) {
    super(message, context)
    this.name = 'ConflictError'
  }
}

/**
 * An external tool ran and reported failure
 */
export class ToolFailureError extends GroveError {
  readonly kind = ErrorKind.TOOL_FAILURE
  readonly command: string[]
  readonly stderr: string

  constructor(
    message: string,
    context: ErrorContext,
    details: { command: string[]; stderr: string },
    options?: { cause?: unknown }
  ) {
    super(message, context, options)
    this.name = 'ToolFailureError'
    this.command = details.command
    this.stderr = details.stderr
  }
}

/**
 * Cloning a base repository failed
 */
export class ProvisioningError extends ToolFailureError {
  constructor(
    message: string,
    context: ErrorContext,
    details: { command: string[]; stderr: string },
    options?: { cause?: unknown }
  ) {
    super(message, { ...context, step: 'provision' }, details, options)
    this.name = 'ProvisioningError'
  }
}

/**
 * An external tool could not be started at all
 */
export class ToolUnavailableError extends GroveError {
  readonly kind = ErrorKind.TOOL_UNAVAILABLE

  constructor(
    public readonly tool: string,
    message: string,
    context?: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, context, options)
    this.name = 'ToolUnavailableError'
  }
}

/**
 * A single template could not be rendered
 */
export class TemplateRenderError extends GroveError {
  readonly kind = ErrorKind.TEMPLATE_FAILURE

  constructor(
    public readonly templatePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, { path: templatePath, step: 'templates' }, options)
    this.name = 'TemplateRenderError'
  }
}

export interface TemplateFailure {
  template: string
  message: string
}

/**
 * Every template that failed during one rendering pass
 */
export class TemplateFailureError extends GroveError {
  readonly kind = ErrorKind.TEMPLATE_FAILURE

  constructor(
    public readonly failures: TemplateFailure[],
    context?: ErrorContext
  ) {
    super(`${failures.length} template(s) failed to render`, { step: 'templates', ...context })
    this.name = 'TemplateFailureError'
  }
}

export interface PartialFailure {
  target: string
  message: string
}

/**
 * Delete removed some things and not others
 */
export class PartialFailureError extends GroveError {
  readonly kind = ErrorKind.PARTIAL

  constructor(
    public readonly failures: PartialFailure[],
    context?: ErrorContext,
    public readonly recordRemoved = false
  ) {
    super(`${failures.length} removal step(s) failed`, context)
    this.name = 'PartialFailureError'
  }
}

export class RegistryError extends GroveError {
  readonly kind = ErrorKind.REGISTRY

  constructor(message: string, registryPath: string, options?: { cause?: unknown }) {
    super(message, { path: registryPath }, options)
    this.name = 'RegistryError'
  }
}

// ============================================================================
// Message Rendering
// ============================================================================

function describeContext(context: ErrorContext): string {
  const parts: string[] = []
  if (context.environment) parts.push(`environment: ${context.environment}`)
  if (context.repository) parts.push(`repository: ${context.repository}`)
  if (context.branch) parts.push(`branch: ${context.branch}`)
  if (context.step) parts.push(`step: ${context.step}`)
  return parts.length > 0 ? ` (${parts.join(', ')})` : ''
}

/**
 * Turn a structured error into the text shown on the terminal
 */
export function describeError(error: GroveError): string {
  const lines = [`${error.message}${describeContext(error.context)}`]

  if (error instanceof ConflictError) {
    switch (error.reason) {
      case 'outstanding_work':
        for (const work of error.outstanding) {
          const label = work.kind === 'uncommitted' ? 'uncommitted file(s)' : 'unpushed commit(s)'
          lines.push(`  ${work.repository}: ${work.count} ${label}`)
        }
        lines.push('Use --force to delete anyway.')
        break
      case 'directory_unregistered':
        lines.push(
          `The directory ${error.context.path ?? ''} is not tracked by grove. Remove it by hand and retry.`
        )
        break
      case 'name_registered':
        lines.push('Pick another name or delete the existing environment first.')
        break
      case 'branch_checked_out':
        break
    }
  } else if (error instanceof ToolFailureError) {
    lines.push(`  command: ${error.command.join(' ')}`)
    if (error.stderr) {
      lines.push(...error.stderr.split('\n').map((line) => `  ${line}`))
    }
  } else if (error instanceof ToolUnavailableError) {
    lines.push(`Make sure ${error.tool} is installed and on your PATH.`)
  } else if (error instanceof TemplateFailureError) {
    for (const failure of error.failures) {
      lines.push(`  ${failure.template}: ${failure.message}`)
    }
  } else if (error instanceof PartialFailureError) {
    for (const failure of error.failures) {
      lines.push(`  ${failure.target}: ${failure.message}`)
    }
    if (!error.recordRemoved) {
      lines.push('The environment is still registered.')
    }
  }

  if (error.rollbackFailures.length > 0) {
    lines.push('Cleanup did not finish; remove these by hand:')
    for (const failure of error.rollbackFailures) {
      lines.push(`  ${failure.path} (${failure.operation}): ${failure.error}`)
    }
  }

  return lines.join('\n')
}

// ============================================================================
// CLI Helper
// ============================================================================

/**
 * The part of an oclif command the helper writes to
 */
export interface CommandOutput {
  log(message?: string): void
  warn(input: string | Error): unknown
  error(input: string | Error, options: { exit: false }): void
  exit(code?: number): never
}

/**
 * Error Helper Utility
 *
 * Centralized error output for grove commands with JSON support.
 *
 * - `validation()` for user errors caught in the command itself
 * - `operation()` for runtime failures outside the grove error taxonomy
 * - `fail()` for anything thrown by the core; picks the exit code by kind
 *
 * @example
 * try {
 *   await orchestrator.create(name, repos)
 * } catch (error) {
 *   ErrorHelper.fail(this, error, flags.json)
 * }
 */
export class ErrorHelper {
  /**
   * Handle validation errors (bad flags, missing arguments)
   */
  static validation(command: CommandOutput, message: string, json?: boolean): never {
    if (json) {
      command.log(JSON.stringify({ status: 'error', kind: ErrorKind.INVALID_INPUT, error: message }, null, 2))
    } else {
      // { exit: false } keeps oclif from printing a stack trace
      command.error(message, { exit: false })
    }
    command.exit(EXIT_CODES[ErrorKind.INVALID_INPUT])
  }

  /**
   * Handle runtime failures that carry no grove error kind
   */
  static operation(command: CommandOutput, error: unknown, context: string, json?: boolean): never {
    const details = errorMessage(error)
    const message = `${context}: ${details}`

    if (json) {
      command.log(JSON.stringify({ status: 'error', error: message, context, details }, null, 2))
    } else {
      command.error(message, { exit: false })
    }
    command.exit(UNEXPECTED_EXIT_CODE)
  }

  /**
   * Render any error thrown by the core and exit with its code
   */
  static fail(command: CommandOutput, error: unknown, json?: boolean, context = 'Command failed'): never {
    // oclif signals exit() by throwing; let it through
    if (error instanceof Errors.ExitError) {
      throw error
    }

    if (!(error instanceof GroveError)) {
      return ErrorHelper.operation(command, error, context, json)
    }

    if (json) {
      command.log(
        JSON.stringify(
          {
            status: 'error',
            kind: error.kind,
            error: error.message,
            context: error.context,
            details: ErrorHelper.details(error),
          },
          null,
          2
        )
      )
    } else {
      command.error(describeError(error), { exit: false })
    }
    command.exit(EXIT_CODES[error.kind])
  }

  /**
   * Warn the user without exiting
   */
  static warn(command: CommandOutput, message: string, json?: boolean): void {
    if (json) {
      command.log(JSON.stringify({ status: 'warning', warning: message }, null, 2))
    } else {
      command.warn(message)
    }
  }

  private static details(error: GroveError): Record<string, unknown> {
    const details: Record<string, unknown> = {}
    if (error instanceof ConflictError) {
      details.reason = error.reason
      if (error.outstanding.length > 0) details.outstanding = error.outstanding
    } else if (error instanceof ToolFailureError) {
      details.command = error.command
      details.stderr = error.stderr
    } else if (error instanceof ToolUnavailableError) {
      details.tool = error.tool
    } else if (error instanceof TemplateFailureError) {
      details.failures = error.failures
    } else if (error instanceof PartialFailureError) {
      details.failures = error.failures
      details.recordRemoved = error.recordRemoved
    }
    if (error.rollbackFailures.length > 0) {
      details.rollbackFailures = error.rollbackFailures
    }
    return details
  }
}
