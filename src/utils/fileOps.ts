import fs from 'fs-extra'
import type { Stats } from 'fs'
import { lstat, mkdir, symlink } from 'fs/promises'
import * as path from 'path'
import { ErrorKind, GroveError, errorMessage, type ErrorContext } from './errors.js'

/**
 * File Operations Utilities
 *
 * Records every side effect of an environment creation so that a failed
 * creation can be undone in reverse order.
 */

/**
 * Get the errno code from a filesystem error
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error) {
    return String(error.code)
  }
  return 'UNKNOWN'
}

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * A filesystem step of the create transaction failed
 */
export class FileOperationError extends GroveError {
  readonly kind = ErrorKind.FILESYSTEM

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, context, options)
    this.name = 'FileOperationError'
  }
}

// ============================================================================
// Transaction Tracking
// ============================================================================

/**
 * Operation types for transaction tracking
 */
export enum OperationType {
  CREATE_DIR = 'create_dir',
  ADD_WORKTREE = 'add_worktree',
  CREATE_SYMLINK = 'create_symlink',
  WRITE_FILE = 'write_file',
  COPY_FILE = 'copy_file',
}

/**
 * A tracked operation for rollback
 */
export interface Operation {
  type: OperationType
  path: string
  metadata?: Record<string, string>
  timestamp: Date
}

/**
 * Result of a rollback operation
 */
export interface RollbackResult {
  /** Operations that were successfully rolled back */
  rolledBackOperations: Operation[]
  /** Operations that failed to rollback */
  failedRollbacks: Array<{ operation: Operation; error: string }>
}

export interface TransactionOptions {
  /** Called for operations that were skipped during rollback */
  onWarning?: (message: string) => void
  /** Detaches a worktree from its base repository */
  detachWorktree?: (baseRepo: string, worktreePath: string) => Promise<void>
  /** Deletes a branch the worktree step created (metadata `createdBranch`) */
  deleteBranch?: (baseRepo: string, branch: string) => Promise<void>
}

async function lstatOrNull(target: string): Promise<Stats | null> {
  try {
    return await lstat(target)
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return null
    }
    throw error
  }
}

/**
 * Transaction for tracking file operations
 *
 * Enables rollback of all operations if any step fails.
 */
export class FileOperationTransaction {
  private operations: Operation[] = []

  constructor(private readonly options: TransactionOptions = {}) {}

  /**
   * Record an operation
   */
  record(type: OperationType, target: string, metadata?: Record<string, string>): void {
    this.operations.push({
      type,
      path: target,
      metadata,
      timestamp: new Date(),
    })
  }

  /**
   * Get all recorded operations
   */
  getOperations(): Operation[] {
    return [...this.operations]
  }

  /**
   * Rollback all operations in reverse order
   *
   * A failing undo step is reported and the remaining steps still run.
   */
  async rollback(): Promise<RollbackResult> {
    const rolledBackOperations: Operation[] = []
    const failedRollbacks: Array<{ operation: Operation; error: string }> = []

    for (const op of [...this.operations].reverse()) {
      try {
        if (await this.undo(op)) {
          rolledBackOperations.push(op)
        }
      } catch (error) {
        const errMsg = errorMessage(error)
        failedRollbacks.push({ operation: op, error: errMsg })
        this.options.onWarning?.(`Failed to rollback operation ${op.type} at ${op.path}: ${errMsg}`)
      }
    }

    this.clear()

    return { rolledBackOperations, failedRollbacks }
  }

  /**
   * Clear all tracked operations
   */
  clear(): void {
    this.operations = []
  }

  /**
   * Undo one operation; false when there was nothing left to undo
   */
  private async undo(op: Operation): Promise<boolean> {
    switch (op.type) {
      case OperationType.CREATE_SYMLINK: {
        const stats = await lstatOrNull(op.path)
        if (!stats) {
          return false
        }
        if (!stats.isSymbolicLink()) {
          this.options.onWarning?.(
            `Skipped rollback of ${op.type} at ${op.path}: path exists but is not a symlink`
          )
          return false
        }
        await fs.unlink(op.path)
        return true
      }

      case OperationType.WRITE_FILE:
      case OperationType.COPY_FILE: {
        if (!(await lstatOrNull(op.path))) {
          return false
        }
        await fs.remove(op.path)
        return true
      }

      case OperationType.ADD_WORKTREE: {
        const baseRepo = op.metadata?.baseRepo
        if (!baseRepo || !this.options.detachWorktree) {
          this.options.onWarning?.(
            `Skipped rollback of ${op.type} at ${op.path}: no base repository recorded`
          )
          return false
        }
        await this.options.detachWorktree(baseRepo, op.path)
        const createdBranch = op.metadata?.createdBranch
        if (createdBranch && this.options.deleteBranch) {
          await this.options.deleteBranch(baseRepo, createdBranch)
        }
        return true
      }

      case OperationType.CREATE_DIR: {
        if (!(await lstatOrNull(op.path))) {
          return false
        }
        await fs.remove(op.path)
        return true
      }
    }
  }
}

// ============================================================================
// Environment File Helper
// ============================================================================

/**
 * Filesystem mutations of the create transaction
 *
 * Each method records what it did on the transaction and wraps failures in
 * `FileOperationError` tagged with the pipeline step.
 */
export class EnvironmentFiles {
  constructor(private readonly transaction: FileOperationTransaction) {}

  /**
   * Create a directory that must not exist yet
   *
   * Resolves false when it already exists; nothing is recorded then, so a
   * rollback never removes a directory this transaction did not create.
   */
  async createDirectory(target: string): Promise<boolean> {
    await fs.ensureDir(path.dirname(target))
    try {
      await mkdir(target)
    } catch (error) {
      if (getErrorCode(error) === 'EEXIST') {
        return false
      }
      throw new FileOperationError(
        `Failed to create directory ${target}: ${errorMessage(error)}`,
        { step: 'create_directory', path: target },
        { cause: error }
      )
    }
    this.transaction.record(OperationType.CREATE_DIR, target)
    return true
  }

  /**
   * Create a symlink at `target` pointing at the absolute `source`
   */
  async createSymlink(source: string, target: string): Promise<void> {
    try {
      if (await lstatOrNull(target)) {
        throw new FileOperationError(`Target already exists: ${target}`, {
          step: 'symlinks',
          path: target,
        })
      }
      await fs.ensureDir(path.dirname(target))
      await symlink(source, target)
    } catch (error) {
      if (error instanceof FileOperationError) {
        throw error
      }
      throw new FileOperationError(
        `Failed to create symlink from ${source} to ${target}: ${errorMessage(error)} (${getErrorCode(error)})`,
        { step: 'symlinks', path: target },
        { cause: error }
      )
    }
    this.transaction.record(OperationType.CREATE_SYMLINK, target, { source })
  }

  /**
   * Write rendered content to a file, creating parent directories
   */
  async writeFile(target: string, content: string): Promise<void> {
    try {
      await fs.outputFile(target, content, 'utf-8')
    } catch (error) {
      throw new FileOperationError(
        `Failed to write ${target}: ${errorMessage(error)}`,
        { step: 'templates', path: target },
        { cause: error }
      )
    }
    this.transaction.record(OperationType.WRITE_FILE, target)
  }

  /**
   * Copy a file or directory verbatim
   */
  async copyFile(source: string, target: string): Promise<void> {
    try {
      await fs.copy(source, target, { overwrite: true, errorOnExist: false })
    } catch (error) {
      throw new FileOperationError(
        `Failed to copy ${source} to ${target}: ${errorMessage(error)}`,
        { step: 'copy_files', path: target },
        { cause: error }
      )
    }
    this.transaction.record(OperationType.COPY_FILE, target, { source })
  }
}
