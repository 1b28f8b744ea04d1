import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import type { GroveConfig } from '../../src/config/schema.js'
import type { WorktreeGateway } from '../../src/utils/environment.js'
import { ConflictError, NotFoundError, ProvisioningError, ToolFailureError } from '../../src/utils/errors.js'
import type { AddWorktreeResult, FetchSummary, RepoStatusCounts } from '../../src/utils/git.js'

/**
 * Test utilities and helpers for grove tests
 *
 * Provides an in-memory stand-in for the git worktree client and temporary
 * directory fixtures.
 */

/**
 * Create a temporary directory for a test
 */
export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'grove-test-'))
}

/**
 * Configuration rooted in a temporary directory
 */
export function createTestConfig(root: string, overrides: Partial<GroveConfig> = {}): GroveConfig {
  return {
    baseReposDir: path.join(root, 'repos'),
    environmentsDir: path.join(root, 'envs'),
    registryPath: path.join(root, 'state', 'registry.json'),
    repositories: {
      api: { url: 'git@github.com:acme/api.git' },
      web: { url: 'git@github.com:acme/web.git' },
    },
    templates: [],
    copyFiles: [],
    symlinks: [],
    ...overrides,
  }
}

interface FakeWorktree {
  baseRepo: string
  branch: string
}

const CLEAN: RepoStatusCounts = { uncommittedCount: 0, aheadCount: 0, behindCount: 0, currentBranch: null }

const tick = (): Promise<void> => new Promise<void>((resolve) => setImmediate(() => resolve()))

/**
 * Worktree client that keeps worktrees in memory and real directories on disk
 *
 * A worktree is a directory holding a README.md. Like git, a clone into a
 * directory that already holds one fails, and the clone check and the
 * branch check are each separated from their effect by a tick, so
 * concurrent callers that skip the lock would both pass the check.
 */
export class FakeWorktreeClient implements WorktreeGateway {
  readonly worktrees = new Map<string, FakeWorktree>()
  readonly statuses = new Map<string, RepoStatusCounts>()
  readonly pruned: string[] = []
  /** Destinations actually cloned */
  readonly clones: string[] = []
  /** `<repo>:<branch>` for every branch deleted */
  readonly deletedBranches: string[] = []
  /** Branches whose worktree add fails */
  readonly failingBranches = new Set<string>()
  /** Worktree paths whose removal fails */
  readonly failingRemovals = new Set<string>()
  fetchError: Error | null = null

  async ensureClone(url: string, destination: string): Promise<{ cloned: boolean }> {
    if (await fs.pathExists(path.join(destination, '.git'))) {
      return { cloned: false }
    }

    await tick()

    if (await fs.pathExists(destination)) {
      throw new ProvisioningError(
        `Failed to clone ${url}`,
        { repository: path.basename(destination), path: destination },
        {
          command: ['git', 'clone', url, destination],
          stderr: `fatal: destination path '${destination}' already exists and is not an empty directory.`,
        }
      )
    }
    await fs.ensureDir(path.join(destination, '.git'))
    this.clones.push(destination)
    return { cloned: true }
  }

  async fetchRemotes(_repoPath: string): Promise<FetchSummary> {
    if (this.fetchError) {
      throw this.fetchError
    }
    return { newBranches: 0, updatedBranches: 0, deletedBranches: 0, newCommits: 0 }
  }

  async addWorktree(baseRepo: string, branch: string, destination: string): Promise<AddWorktreeResult> {
    for (const [worktreePath, worktree] of this.worktrees) {
      if (worktree.baseRepo === baseRepo && worktree.branch === branch) {
        throw new ConflictError('branch_checked_out', `Branch ${branch} is already checked out at ${worktreePath}`, {
          repository: path.basename(baseRepo),
          branch,
        })
      }
    }

    await tick()

    if (this.failingBranches.has(branch)) {
      throw new ToolFailureError(
        'git worktree failed',
        { repository: path.basename(baseRepo), branch, step: 'worktrees' },
        { command: ['git', 'worktree', 'add', destination, branch], stderr: `fatal: invalid reference: ${branch}` }
      )
    }

    await fs.outputFile(path.join(destination, 'README.md'), `# ${path.basename(baseRepo)}\n`)
    this.worktrees.set(destination, { baseRepo, branch })
    return { path: destination, branch, commit: 'abc1234', source: 'created' }
  }

  async removeWorktree(_baseRepo: string, worktreePath: string, _force = false): Promise<void> {
    if (this.failingRemovals.has(worktreePath)) {
      throw new ToolFailureError(
        'git worktree failed',
        { step: 'delete' },
        { command: ['git', 'worktree', 'remove', worktreePath], stderr: 'fatal: worktree is locked' }
      )
    }
    if (!this.worktrees.has(worktreePath)) {
      throw new NotFoundError(`${worktreePath} is not a worktree`)
    }
    await fs.remove(worktreePath)
    this.worktrees.delete(worktreePath)
  }

  async deleteBranch(baseRepo: string, branch: string): Promise<void> {
    this.deletedBranches.push(`${path.basename(baseRepo)}:${branch}`)
  }

  async pruneWorktrees(baseRepo: string): Promise<void> {
    this.pruned.push(baseRepo)
  }

  async getStatus(repoPath: string): Promise<RepoStatusCounts> {
    return this.statuses.get(repoPath) ?? CLEAN
  }
}
