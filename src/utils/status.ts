import fs from 'fs-extra'
import type { OutstandingWork } from './errors.js'
import { errorMessage } from './errors.js'
import type { WorktreeClient } from './git.js'

/**
 * Per-repository status of an environment
 *
 * Computed on every call and never cached. A repository whose status cannot
 * be read gets zero counts and an `error`, so one broken worktree never hides
 * the rest of the report.
 */

export interface RepoStatus {
  name: string
  branch: string
  uncommittedCount: number
  aheadCount: number
  behindCount: number
  error?: string
}

export type StatusClass = 'clean' | 'uncommitted' | 'ahead' | 'error'

/**
 * Display classification; precedence is error, uncommitted, ahead, clean
 */
export function classifyStatus(status: RepoStatus): StatusClass {
  if (status.error !== undefined) {
    return 'error'
  }
  if (status.uncommittedCount > 0) {
    return 'uncommitted'
  }
  if (status.aheadCount > 0) {
    return 'ahead'
  }
  return 'clean'
}

const CLASS_RANK: Record<StatusClass, number> = {
  clean: 0,
  ahead: 1,
  uncommitted: 2,
  error: 3,
}

/**
 * Worst classification across an environment's repositories
 */
export function summarizeStatus(statuses: readonly RepoStatus[]): StatusClass {
  let worst: StatusClass = 'clean'
  for (const status of statuses) {
    const current = classifyStatus(status)
    if (CLASS_RANK[current] > CLASS_RANK[worst]) {
      worst = current
    }
  }
  return worst
}

/**
 * Uncommitted changes and unpushed commits that deleting would lose
 *
 * Repositories whose status could not be read are not reported.
 */
export function findOutstandingWork(statuses: readonly RepoStatus[]): OutstandingWork[] {
  const outstanding: OutstandingWork[] = []
  for (const status of statuses) {
    if (status.error !== undefined) {
      continue
    }
    if (status.uncommittedCount > 0) {
      outstanding.push({ repository: status.name, kind: 'uncommitted', count: status.uncommittedCount })
    }
    if (status.aheadCount > 0) {
      outstanding.push({ repository: status.name, kind: 'unpushed', count: status.aheadCount })
    }
  }
  return outstanding
}

export interface InspectedRepo {
  name: string
  branch: string
  worktreePath: string
}

export class StatusInspector {
  constructor(private readonly client: Pick<WorktreeClient, 'getStatus'>) {}

  /**
   * Status of every repository, in the environment's repository order
   */
  async report(environment: { repos: readonly InspectedRepo[] }): Promise<RepoStatus[]> {
    return Promise.all(environment.repos.map((repo) => this.inspect(repo)))
  }

  private async inspect(repo: InspectedRepo): Promise<RepoStatus> {
    const failed = (error: string): RepoStatus => ({
      name: repo.name,
      branch: repo.branch,
      uncommittedCount: 0,
      aheadCount: 0,
      behindCount: 0,
      error,
    })

    if (!(await fs.pathExists(repo.worktreePath))) {
      return failed('Worktree not found')
    }

    try {
      const counts = await this.client.getStatus(repo.worktreePath)
      return {
        name: repo.name,
        branch: repo.branch,
        uncommittedCount: counts.uncommittedCount,
        aheadCount: counts.aheadCount,
        behindCount: counts.behindCount,
      }
    } catch (error) {
      return failed(errorMessage(error))
    }
  }
}
