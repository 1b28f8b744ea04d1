import fs from 'fs-extra'
import * as path from 'path'
import type { GroveConfig } from '../config/schema.js'
import { EnvironmentRegistry } from '../registry/registry.js'
import type { Environment, PrInfo, RepoInstance, SymlinkEntry } from '../registry/schema.js'
import {
  ConflictError,
  GroveError,
  InvalidInputError,
  NotFoundError,
  PartialFailureError,
  TemplateFailureError,
  errorMessage,
  type PartialFailure,
  type TemplateFailure,
} from './errors.js'
import { EnvironmentFiles, FileOperationError, FileOperationTransaction, OperationType } from './fileOps.js'
import { createWorktreeClient, type WorktreeClient } from './git.js'
import { KeyedLock, provisionLockKey, worktreeLock, worktreeLockKey } from './keyed-lock.js'
import { isValidEnvironmentName } from './paths.js'
import { StatusInspector, findOutstandingWork, type RepoStatus } from './status.js'
import { TemplateRenderer, buildTemplateContext, shouldRender } from './template.js'

/**
 * Environment Orchestrator
 *
 * Creates and deletes environments. Creation is a fixed pipeline; every side
 * effect from the environment directory onward is recorded on a
 * FileOperationTransaction and undone in reverse if a later step fails.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * The git operations the orchestrator needs
 */
export type WorktreeGateway = Pick<
  WorktreeClient,
  | 'ensureClone'
  | 'fetchRemotes'
  | 'addWorktree'
  | 'removeWorktree'
  | 'deleteBranch'
  | 'pruneWorktrees'
  | 'getStatus'
>

/**
 * One requested repository and the branch to check out
 */
export interface RepoSelection {
  name: string
  branch: string
}

/**
 * Pipeline phases for progress tracking
 */
export enum CreatePhase {
  PROVISION = 'provision',
  FETCH = 'fetch',
  CREATE_DIRECTORY = 'create_directory',
  WORKTREES = 'worktrees',
  SYMLINKS = 'symlinks',
  TEMPLATES = 'templates',
  COPY_FILES = 'copy_files',
  REGISTER = 'register',
  ROLLBACK = 'rollback',
  COMPLETE = 'complete',
}

export interface CreateOptions {
  /** Fetch every base repository before adding worktrees (default true) */
  fetch?: boolean
  /** Render configured templates (default true) */
  renderTemplates?: boolean
  /** Attached to the record of a review environment */
  prInfo?: PrInfo
  onProgress?: (phase: CreatePhase, message: string) => void
  onWarning?: (message: string) => void
}

export interface DeleteOptions {
  force?: boolean
  onProgress?: (message: string) => void
}

export interface DeleteResult {
  name: string
  path: string
  removedWorktrees: string[]
}

export interface EnvironmentStatus {
  environment: Environment
  existsOnDisk: boolean
  repos: RepoStatus[]
}

export interface OrchestratorDependencies {
  config: GroveConfig
  client: WorktreeGateway
  registry: EnvironmentRegistry
  renderer?: TemplateRenderer
  lock?: KeyedLock
  now?: () => Date
}

// ============================================================================
// Orchestrator
// ============================================================================

export class EnvironmentOrchestrator {
  private readonly config: GroveConfig
  private readonly client: WorktreeGateway
  private readonly registry: EnvironmentRegistry
  private readonly renderer: TemplateRenderer
  private readonly inspector: StatusInspector
  private readonly lock: KeyedLock
  private readonly now: () => Date

  constructor(dependencies: OrchestratorDependencies) {
    this.config = dependencies.config
    this.client = dependencies.client
    this.registry = dependencies.registry
    this.renderer = dependencies.renderer ?? new TemplateRenderer()
    this.inspector = new StatusInspector(dependencies.client)
    this.lock = dependencies.lock ?? worktreeLock
    this.now = dependencies.now ?? (() => new Date())
  }

  /**
   * Path of the single base clone of a repository
   */
  baseRepoPath(repoName: string): string {
    return path.join(this.config.baseReposDir, repoName)
  }

  environmentPath(name: string): string {
    return path.join(this.config.environmentsDir, name)
  }

  // ==========================================================================
  // Create
  // ==========================================================================

  /**
   * Create an environment and register it
   *
   * Either the returned environment exists and is registered, or the
   * environment directory is gone and nothing was registered. Base clones
   * made along the way are kept.
   */
  async create(name: string, repos: RepoSelection[], options: CreateOptions = {}): Promise<Environment> {
    const { fetch = true, renderTemplates = true } = options
    const report = (phase: CreatePhase, message: string): void => options.onProgress?.(phase, message)
    const warn = (message: string): void => options.onWarning?.(message)

    const envPath = await this.validateCreate(name, repos)
    const createdAt = this.now().toISOString()

    // Provisioning failures leave no environment state behind to undo
    for (const repo of repos) {
      report(CreatePhase.PROVISION, `Preparing base repository ${repo.name}`)
      const { url } = this.config.repositories[repo.name]
      const baseRepo = this.baseRepoPath(repo.name)
      try {
        const { cloned } = await this.lock.run(provisionLockKey(baseRepo), () =>
          this.client.ensureClone(url, baseRepo)
        )
        if (cloned) {
          report(CreatePhase.PROVISION, `Cloned ${repo.name}`)
        }
      } catch (error) {
        throw this.asGroveError(error, CreatePhase.PROVISION).enrich({ environment: name, repository: repo.name })
      }
    }

    if (fetch) {
      await this.fetchAll(repos, report, warn)
    }

    const transaction = new FileOperationTransaction({
      onWarning: warn,
      detachWorktree: (baseRepo, worktreePath) => this.client.removeWorktree(baseRepo, worktreePath, true),
      deleteBranch: (baseRepo, branch) => this.client.deleteBranch(baseRepo, branch),
    })
    const files = new EnvironmentFiles(transaction)
    let phase = CreatePhase.CREATE_DIRECTORY

    try {
      report(phase, `Creating ${envPath}`)
      if (!(await files.createDirectory(envPath))) {
        throw new ConflictError(
          'directory_unregistered',
          `Directory ${envPath} already exists but is not a registered environment`,
          { environment: name, path: envPath, step: phase }
        )
      }

      phase = CreatePhase.WORKTREES
      const instances: RepoInstance[] = []
      for (const repo of repos) {
        const baseRepo = this.baseRepoPath(repo.name)
        const worktreePath = path.join(envPath, repo.name)
        report(phase, `Adding worktree ${repo.name} on ${repo.branch}`)

        await this.lock.run(worktreeLockKey(baseRepo, repo.branch), async () => {
          const added = await this.client.addWorktree(baseRepo, repo.branch, worktreePath)
          transaction.record(OperationType.ADD_WORKTREE, worktreePath, {
            baseRepo,
            branch: repo.branch,
            ...(added.source === 'created' ? { createdBranch: repo.branch } : {}),
          })
        })
        instances.push({ name: repo.name, branch: repo.branch, worktreePath })
      }

      const presentNames = repos.map((repo) => repo.name)

      phase = CreatePhase.SYMLINKS
      const symlinks = await this.createSymlinks(envPath, presentNames, files, report, warn)

      const generatedFiles: string[] = []

      phase = CreatePhase.TEMPLATES
      if (renderTemplates) {
        const context = buildTemplateContext({ envName: name, envPath, createdAt, repos, symlinks })
        generatedFiles.push(...(await this.renderTemplates(envPath, presentNames, context, files, report)))
      }

      phase = CreatePhase.COPY_FILES
      generatedFiles.push(...(await this.copyFiles(envPath, presentNames, files, report, warn)))

      phase = CreatePhase.REGISTER
      const environment: Environment = {
        name,
        path: envPath,
        createdAt,
        repos: instances,
        generatedFiles,
        symlinks,
        ...(options.prInfo ? { prInfo: options.prInfo } : {}),
      }
      report(phase, `Registering ${name}`)
      await this.registry.add(environment)

      report(CreatePhase.COMPLETE, `Environment ${name} is ready`)
      return environment
    } catch (error) {
      const primary = this.asGroveError(error, phase).enrich({ environment: name, step: phase })

      report(CreatePhase.ROLLBACK, 'Rolling back')
      const rollback = await transaction.rollback()
      primary.rollbackFailures = rollback.failedRollbacks.map(({ operation, error: message }) => ({
        operation: operation.type,
        path: operation.path,
        error: message,
      }))
      throw primary
    }
  }

  /**
   * Checks that run before any side effect
   */
  private async validateCreate(name: string, repos: RepoSelection[]): Promise<string> {
    if (!isValidEnvironmentName(name)) {
      throw new InvalidInputError(
        `Invalid environment name "${name}": use letters, digits, "-" and "_", not starting with "-"`,
        { environment: name }
      )
    }

    if (repos.length === 0) {
      throw new InvalidInputError('At least one repository is required', { environment: name })
    }

    const seen = new Set<string>()
    for (const repo of repos) {
      if (!repo.name || !repo.branch.trim()) {
        throw new InvalidInputError(`Repository "${repo.name}" needs a non-empty branch`, {
          environment: name,
          repository: repo.name,
        })
      }
      if (seen.has(repo.name)) {
        throw new InvalidInputError(`Repository ${repo.name} is requested more than once`, {
          environment: name,
          repository: repo.name,
        })
      }
      seen.add(repo.name)
    }

    for (const repo of repos) {
      if (!Object.hasOwn(this.config.repositories, repo.name)) {
        throw new NotFoundError(`Unknown repository ${repo.name}`, { environment: name, repository: repo.name })
      }
    }

    if (await this.registry.has(name)) {
      throw new ConflictError('name_registered', `Environment ${name} already exists`, { environment: name })
    }

    const envPath = this.environmentPath(name)
    if (await fs.pathExists(envPath)) {
      throw new ConflictError(
        'directory_unregistered',
        `Directory ${envPath} already exists but is not a registered environment`,
        { environment: name, path: envPath }
      )
    }

    return envPath
  }

  private async fetchAll(
    repos: RepoSelection[],
    report: (phase: CreatePhase, message: string) => void,
    warn: (message: string) => void
  ): Promise<void> {
    for (const repo of repos) {
      report(CreatePhase.FETCH, `Fetching ${repo.name}`)
      try {
        const summary = await this.client.fetchRemotes(this.baseRepoPath(repo.name))
        if (summary.newBranches > 0 || summary.newCommits > 0) {
          report(
            CreatePhase.FETCH,
            `${repo.name}: ${summary.newBranches} new branch(es), ${summary.newCommits} new commit(s)`
          )
        }
      } catch (error) {
        warn(`Fetch failed for ${repo.name}: ${errorMessage(error)}`)
      }
    }
  }

  private async createSymlinks(
    envPath: string,
    presentNames: string[],
    files: EnvironmentFiles,
    report: (phase: CreatePhase, message: string) => void,
    warn: (message: string) => void
  ): Promise<SymlinkEntry[]> {
    const created: SymlinkEntry[] = []

    for (const rule of this.config.symlinks) {
      if (!shouldRender(rule, presentNames)) {
        continue
      }

      const source = path.resolve(envPath, rule.source)
      if (!(await fs.pathExists(source))) {
        warn(`Symlink source ${rule.source} does not exist, skipping`)
        continue
      }

      report(CreatePhase.SYMLINKS, `Linking ${rule.target} -> ${rule.source}`)
      await files.createSymlink(await fs.realpath(source), path.resolve(envPath, rule.target))
      created.push({ source: rule.source, target: rule.target })
    }

    return created
  }

  /**
   * Render every active template, then write them all
   *
   * Nothing is written unless every template rendered.
   */
  private async renderTemplates(
    envPath: string,
    presentNames: string[],
    context: ReturnType<typeof buildTemplateContext>,
    files: EnvironmentFiles,
    report: (phase: CreatePhase, message: string) => void
  ): Promise<string[]> {
    const rendered: Array<{ destination: string; content: string }> = []
    const failures: TemplateFailure[] = []

    for (const rule of this.config.templates) {
      if (!shouldRender(rule, presentNames)) {
        continue
      }
      report(CreatePhase.TEMPLATES, `Rendering ${rule.destination}`)
      try {
        rendered.push({ destination: rule.destination, content: await this.renderer.render(rule.source, context) })
      } catch (error) {
        failures.push({ template: rule.source, message: errorMessage(error) })
      }
    }

    if (failures.length > 0) {
      throw new TemplateFailureError(failures)
    }

    for (const { destination, content } of rendered) {
      await files.writeFile(path.resolve(envPath, destination), content)
    }
    return rendered.map(({ destination }) => destination)
  }

  private async copyFiles(
    envPath: string,
    presentNames: string[],
    files: EnvironmentFiles,
    report: (phase: CreatePhase, message: string) => void,
    warn: (message: string) => void
  ): Promise<string[]> {
    const copied: string[] = []

    for (const rule of this.config.copyFiles) {
      if (!shouldRender(rule, presentNames)) {
        continue
      }
      if (!(await fs.pathExists(rule.source))) {
        warn(`Copy source ${rule.source} does not exist, skipping`)
        continue
      }
      report(CreatePhase.COPY_FILES, `Copying ${rule.destination}`)
      await files.copyFile(rule.source, path.resolve(envPath, rule.destination))
      copied.push(rule.destination)
    }

    return copied
  }

  private asGroveError(error: unknown, phase: CreatePhase): GroveError {
    if (error instanceof GroveError) {
      return error
    }
    return new FileOperationError(errorMessage(error), { step: phase }, { cause: error })
  }

  // ==========================================================================
  // Delete
  // ==========================================================================

  /**
   * Delete an environment
   *
   * Without `force`, refuses when any repository has uncommitted changes or
   * unpushed commits. Removal is best-effort: every step runs, and all
   * failures are reported together in one PartialFailureError. The record
   * is kept when the directory could not be removed.
   */
  async delete(name: string, options: DeleteOptions = {}): Promise<DeleteResult> {
    const environment = await this.info(name)
    const existsOnDisk = await fs.pathExists(environment.path)

    if (!options.force && existsOnDisk) {
      const outstanding = findOutstandingWork(await this.inspector.report(environment))
      if (outstanding.length > 0) {
        throw new ConflictError(
          'outstanding_work',
          `Environment ${name} has work that would be lost`,
          { environment: name, step: 'delete' },
          outstanding
        )
      }
    }

    const failures: PartialFailure[] = []
    const removedWorktrees: string[] = []
    const baseRepos = new Set<string>()

    for (const repo of environment.repos) {
      const baseRepo = this.baseRepoPath(repo.name)
      baseRepos.add(baseRepo)
      options.onProgress?.(`Removing worktree ${repo.name}`)
      try {
        await this.client.removeWorktree(baseRepo, repo.worktreePath, true)
        removedWorktrees.push(repo.name)
      } catch (error) {
        // Already detached from the base repository
        if (error instanceof NotFoundError) {
          removedWorktrees.push(repo.name)
          continue
        }
        failures.push({ target: repo.worktreePath, message: errorMessage(error) })
      }
    }

    let directoryRemoved = true
    options.onProgress?.(`Removing ${environment.path}`)
    try {
      await fs.remove(environment.path)
    } catch (error) {
      directoryRemoved = false
      failures.push({ target: environment.path, message: errorMessage(error) })
    }

    for (const baseRepo of baseRepos) {
      if (!(await fs.pathExists(baseRepo))) {
        continue
      }
      try {
        await this.client.pruneWorktrees(baseRepo)
      } catch (error) {
        failures.push({ target: baseRepo, message: `prune failed: ${errorMessage(error)}` })
      }
    }

    if (directoryRemoved) {
      await this.registry.remove(name)
    }

    if (failures.length > 0) {
      throw new PartialFailureError(failures, { environment: name, step: 'delete' }, directoryRemoved)
    }

    return { name, path: environment.path, removedWorktrees }
  }

  // ==========================================================================
  // Read Operations
  // ==========================================================================

  async list(): Promise<Environment[]> {
    return this.registry.list()
  }

  async info(name: string): Promise<Environment> {
    const environment = await this.registry.get(name)
    if (!environment) {
      throw new NotFoundError(`Environment ${name} not found`, { environment: name })
    }
    return environment
  }

  async path(name: string): Promise<string> {
    return (await this.info(name)).path
  }

  async status(name: string): Promise<EnvironmentStatus> {
    const environment = await this.info(name)
    return this.statusOf(environment)
  }

  /**
   * With `inspect: false` only the directory is checked and `repos` is empty
   */
  async statusOf(environment: Environment, options: { inspect?: boolean } = {}): Promise<EnvironmentStatus> {
    const existsOnDisk = await fs.pathExists(environment.path)
    const inspect = options.inspect ?? true
    return {
      environment,
      existsOnDisk,
      repos: inspect ? await this.inspector.report(environment) : [],
    }
  }
}

/**
 * Build an orchestrator over the real git client and registry file
 */
export function createEnvironmentOrchestrator(config: GroveConfig): EnvironmentOrchestrator {
  return new EnvironmentOrchestrator({
    config,
    client: createWorktreeClient(),
    registry: new EnvironmentRegistry(config.registryPath),
  })
}
