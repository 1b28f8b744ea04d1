import fs from 'fs-extra'
import * as path from 'path'
import { simpleGit, type SimpleGit } from 'simple-git'
import {
  ConflictError,
  GroveError,
  NotFoundError,
  ProvisioningError,
  ToolFailureError,
  ToolUnavailableError,
  errorMessage,
  type ErrorContext,
} from './errors.js'

/**
 * Git utility wrapper for the worktrees of base repositories
 *
 * Every method takes the repository it works on, so one client serves all
 * base repositories. Failures come back as `ToolUnavailableError` when git
 * could not be started and `ToolFailureError` when it ran and failed.
 */

export interface WorktreeInfo {
  path: string
  branch: string | null
  commit: string
  isPrunable: boolean
}

export interface FetchSummary {
  newBranches: number
  updatedBranches: number
  deletedBranches: number
  newCommits: number
}

export interface RepoStatusCounts {
  uncommittedCount: number
  aheadCount: number
  behindCount: number
  currentBranch: string | null
}

export interface AddWorktreeResult {
  path: string
  branch: string
  commit: string
  /** local: existing branch; remote: tracking branch from origin; created: new branch */
  source: 'local' | 'remote' | 'created'
  startPoint?: string
}

export interface DefaultBranch {
  branch: string
  /** Ref new branches start from */
  ref: string
}

const REMOTE = 'origin'

const SPAWN_FAILURE = /spawn \S+ (ENOENT|EACCES)/

/**
 * Map anything thrown by simple-git to the grove error taxonomy
 */
export function translateGitError(
  error: unknown,
  step: string,
  args: string[],
  context: ErrorContext = {}
): GroveError {
  if (error instanceof GroveError) {
    return error
  }
  const message = errorMessage(error)
  if (SPAWN_FAILURE.test(message)) {
    return new ToolUnavailableError('git', 'git could not be started', { ...context, step }, { cause: error })
  }
  return new ToolFailureError(
    `git ${args[0] ?? ''} failed`,
    { ...context, step },
    { command: ['git', ...args], stderr: message.trim() },
    { cause: error }
  )
}

/**
 * Turn `git branch -r --format=%(refname:short)` output into branch names
 *
 * Drops the remote HEAD pointer and bare remote names, strips the remote
 * prefix, removes duplicates and sorts.
 */
export function parseRemoteBranches(output: string): string[] {
  const names = output
    .split('\n')
    .map((line) => line.trim())
    .filter((ref) => ref.includes('/') && !ref.endsWith('/HEAD'))
    .map((ref) => ref.slice(ref.indexOf('/') + 1))
    .filter((name) => name.length > 0)

  return [...new Set(names)].sort()
}

/**
 * Parse `git worktree list --porcelain`
 */
export function parseWorktreeList(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = []
  let current: Partial<WorktreeInfo> = {}

  const flush = (): void => {
    if (current.path) {
      worktrees.push({
        path: current.path,
        branch: current.branch ?? null,
        commit: current.commit ?? '',
        isPrunable: current.isPrunable ?? false,
      })
    }
    current = {}
  }

  for (const line of output.split('\n')) {
    if (line.startsWith('worktree ')) {
      current.path = line.substring('worktree '.length).trim()
    } else if (line.startsWith('HEAD ')) {
      current.commit = line.substring('HEAD '.length).trim()
    } else if (line.startsWith('branch ')) {
      current.branch = line.substring('branch '.length).trim().replace('refs/heads/', '')
    } else if (line.startsWith('detached')) {
      current.branch = null
    } else if (line.startsWith('prunable')) {
      current.isPrunable = true
    } else if (line === '') {
      flush()
    }
  }
  flush()

  return worktrees
}

async function realpathOrSelf(target: string): Promise<string> {
  try {
    return await fs.realpath(target)
  } catch {
    return path.resolve(target)
  }
}

export class WorktreeClient {
  /**
   * Run one git task and translate its failure
   *
   * The simple-git instance is created inside the task so a missing
   * repository directory surfaces as a tool failure of the same step.
   */
  private async exec<T>(
    repoPath: string,
    step: string,
    args: string[],
    task: (git: SimpleGit) => Promise<T>,
    context: ErrorContext = {}
  ): Promise<T> {
    try {
      return await task(simpleGit(repoPath))
    } catch (error) {
      throw translateGitError(error, step, args, { path: repoPath, ...context })
    }
  }

  private async raw(repoPath: string, step: string, args: string[], context?: ErrorContext): Promise<string> {
    return this.exec(repoPath, step, args, (git) => git.raw(args), context)
  }

  /**
   * Resolve a ref, or null when it does not exist
   */
  private async resolveRef(repoPath: string, ref: string): Promise<string | null> {
    try {
      const sha = (await this.raw(repoPath, 'resolve', ['rev-parse', '--verify', '--quiet', ref])).trim()
      return sha || null
    } catch (error) {
      if (error instanceof ToolUnavailableError) {
        throw error
      }
      return null
    }
  }

  /**
   * Clone `url` into `destination` unless a repository is already there
   *
   * The base clone's HEAD is left detached either way, so every branch
   * stays free to be checked out by an environment.
   */
  async ensureClone(url: string, destination: string): Promise<{ cloned: boolean }> {
    const context: ErrorContext = { repository: path.basename(destination), path: destination }

    if (await fs.pathExists(path.join(destination, '.git'))) {
      await this.detachHead(destination, 'provision', context)
      return { cloned: false }
    }

    const parent = path.dirname(destination)
    await fs.ensureDir(parent)

    try {
      await simpleGit(parent).clone(url, destination)
    } catch (error) {
      const translated = translateGitError(error, 'provision', ['clone', url, destination], context)
      if (translated instanceof ToolFailureError) {
        throw new ProvisioningError(
          `Failed to clone ${url}`,
          translated.context,
          { command: translated.command, stderr: translated.stderr },
          { cause: error }
        )
      }
      throw translated
    }

    await this.detachHead(destination, 'provision', context)
    return { cloned: true }
  }

  /**
   * Detach HEAD when it points at a branch with commits
   */
  private async detachHead(repoPath: string, step: string, context: ErrorContext): Promise<void> {
    const branch = await this.symbolicRef(repoPath, 'HEAD')
    if (!branch || !(await this.resolveRef(repoPath, 'HEAD'))) {
      return
    }
    await this.raw(repoPath, step, ['checkout', '--detach'], context)
  }

  /**
   * Fetch all remotes and count what arrived
   */
  async fetchRemotes(repoPath: string): Promise<FetchSummary> {
    const args = ['fetch', '--all', '--prune']
    const result = await this.exec(repoPath, 'fetch', args, (git) => git.fetch(['--all', '--prune']))

    let newCommits = 0
    for (const update of result.updated) {
      const range = `${update.from}..${update.to}`
      const count = await this.raw(repoPath, 'fetch', ['rev-list', '--count', range])
      newCommits += Number.parseInt(count.trim(), 10) || 0
    }

    return {
      newBranches: result.branches.length,
      updatedBranches: result.updated.length,
      deletedBranches: result.deleted.length,
      newCommits,
    }
  }

  /**
   * Check whether a branch exists locally and on origin
   */
  async branchExists(repoPath: string, branch: string): Promise<{ local: boolean; remote: boolean }> {
    const [local, remote] = await Promise.all([
      this.resolveRef(repoPath, `refs/heads/${branch}`),
      this.resolveRef(repoPath, `refs/remotes/${REMOTE}/${branch}`),
    ])
    return { local: local !== null, remote: remote !== null }
  }

  /**
   * Branch new branches are created from
   *
   * origin's symbolic HEAD, else origin/main, else origin/master, else the
   * branch the base clone has checked out.
   */
  async getDefaultBranch(repoPath: string): Promise<DefaultBranch> {
    const symbolic = await this.symbolicRef(repoPath, `refs/remotes/${REMOTE}/HEAD`)
    if (symbolic?.startsWith(`${REMOTE}/`)) {
      const branch = symbolic.slice(REMOTE.length + 1)
      return { branch, ref: symbolic }
    }

    for (const candidate of ['main', 'master']) {
      if (await this.resolveRef(repoPath, `refs/remotes/${REMOTE}/${candidate}`)) {
        return { branch: candidate, ref: `${REMOTE}/${candidate}` }
      }
    }

    const head = await this.symbolicRef(repoPath, 'HEAD')
    if (head) {
      return { branch: head, ref: head }
    }

    throw new ToolFailureError(
      'Unable to determine the default branch',
      { step: 'worktrees', path: repoPath, repository: path.basename(repoPath) },
      { command: ['git', 'symbolic-ref', `refs/remotes/${REMOTE}/HEAD`], stderr: '' }
    )
  }

  private async symbolicRef(repoPath: string, ref: string): Promise<string | null> {
    try {
      const value = (await this.raw(repoPath, 'resolve', ['symbolic-ref', '--quiet', '--short', ref])).trim()
      return value || null
    } catch (error) {
      if (error instanceof ToolUnavailableError) {
        throw error
      }
      return null
    }
  }

  /**
   * List all worktrees of a base repository
   */
  async listWorktrees(repoPath: string): Promise<WorktreeInfo[]> {
    const output = await this.raw(repoPath, 'worktrees', ['worktree', 'list', '--porcelain'])
    return parseWorktreeList(output)
  }

  /**
   * Add a worktree for `branch` at `destination`
   *
   * Refuses when the branch is checked out in an environment worktree; the
   * base clone itself is detached to release it. An existing local branch is
   * checked out, a branch only on origin becomes a tracking branch, and
   * anything else is created from the default branch tip.
   */
  async addWorktree(baseRepo: string, branch: string, destination: string): Promise<AddWorktreeResult> {
    const context: ErrorContext = { repository: path.basename(baseRepo), branch }

    const worktrees = await this.listWorktrees(baseRepo)
    const baseRoot = await realpathOrSelf(baseRepo)
    let heldByBase = false
    for (const worktree of worktrees) {
      if (worktree.branch !== branch) {
        continue
      }
      if ((await realpathOrSelf(worktree.path)) === baseRoot) {
        heldByBase = true
        continue
      }
      throw new ConflictError(
        'branch_checked_out',
        `Branch ${branch} is already checked out at ${worktree.path}`,
        { ...context, path: worktree.path }
      )
    }

    // Clones made before HEAD was detached on provisioning still hold a branch
    if (heldByBase) {
      await this.raw(baseRepo, 'worktrees', ['checkout', '--detach'], context)
    }

    const exists = await this.branchExists(baseRepo, branch)
    let args: string[]
    let source: AddWorktreeResult['source']
    let startPoint: string | undefined

    if (exists.local) {
      args = ['worktree', 'add', destination, branch]
      source = 'local'
    } else if (exists.remote) {
      startPoint = `${REMOTE}/${branch}`
      args = ['worktree', 'add', '--track', '-b', branch, destination, startPoint]
      source = 'remote'
    } else {
      startPoint = (await this.getDefaultBranch(baseRepo)).ref
      args = ['worktree', 'add', '-b', branch, destination, startPoint]
      source = 'created'
    }

    await this.raw(baseRepo, 'worktrees', args, context)
    const commit = await this.raw(destination, 'worktrees', ['rev-parse', 'HEAD'], context)

    return { path: destination, branch, commit: commit.trim(), source, startPoint }
  }

  /**
   * Detach and delete a worktree of `baseRepo`
   */
  async removeWorktree(baseRepo: string, worktreePath: string, force = false): Promise<void> {
    const context: ErrorContext = { repository: path.basename(baseRepo), path: worktreePath }
    const target = await realpathOrSelf(worktreePath)

    const worktrees = await this.listWorktrees(baseRepo)
    let registered = false
    for (const worktree of worktrees) {
      const resolved = path.resolve(worktree.path) === path.resolve(worktreePath)
      if (resolved || (await realpathOrSelf(worktree.path)) === target) {
        registered = true
        break
      }
    }
    if (!registered) {
      throw new NotFoundError(`${worktreePath} is not a worktree of ${baseRepo}`, context)
    }

    const args = ['worktree', 'remove', ...(force ? ['--force'] : []), worktreePath]
    await this.raw(baseRepo, 'delete', args, context)
  }

  /**
   * Force-delete a local branch
   */
  async deleteBranch(baseRepo: string, branch: string): Promise<void> {
    await this.raw(baseRepo, 'rollback', ['branch', '-D', branch], { repository: path.basename(baseRepo), branch })
  }

  /**
   * Drop worktree entries whose directories are gone
   */
  async pruneWorktrees(baseRepo: string): Promise<void> {
    await this.raw(baseRepo, 'delete', ['worktree', 'prune'], { repository: path.basename(baseRepo) })
  }

  /**
   * Fetch and prune all remotes, then list remote branch names
   *
   * Aborting `signal` kills the running git process.
   */
  async fetchBranches(repoPath: string, options: { signal?: AbortSignal } = {}): Promise<string[]> {
    const git = (): SimpleGit => simpleGit({ baseDir: repoPath, abort: options.signal })
    const listArgs = ['branch', '-r', '--format=%(refname:short)']

    try {
      await git().fetch(['--all', '--prune'])
      const output = await git().raw(listArgs)
      return parseRemoteBranches(output)
    } catch (error) {
      throw translateGitError(error, 'branches', ['fetch', '--all', '--prune'], { path: repoPath })
    }
  }

  /**
   * Count uncommitted paths and commits ahead/behind the upstream
   *
   * Without an upstream, ahead and behind are zero.
   */
  async getStatus(repoPath: string): Promise<RepoStatusCounts> {
    const porcelain = await this.raw(repoPath, 'status', ['status', '--porcelain'])
    const uncommittedCount = porcelain.split('\n').filter((line) => line.trim().length > 0).length

    const head = await this.symbolicRef(repoPath, 'HEAD')

    const upstream = await this.resolveRef(repoPath, '@{u}')
    if (!upstream) {
      return { uncommittedCount, aheadCount: 0, behindCount: 0, currentBranch: head }
    }

    const counts = await this.raw(repoPath, 'status', ['rev-list', '--left-right', '--count', '@{u}...HEAD'])
    const [behind, ahead] = counts.trim().split(/\s+/).map((value) => Number.parseInt(value, 10) || 0)

    return {
      uncommittedCount,
      aheadCount: ahead ?? 0,
      behindCount: behind ?? 0,
      currentBranch: head,
    }
  }
}

/**
 * Create a new WorktreeClient instance
 */
export function createWorktreeClient(): WorktreeClient {
  return new WorktreeClient()
}
