import type { Environment, RepoInstance } from '../registry/schema.js'
import { classifyStatus, type RepoStatus, type StatusClass } from './status.js'

/**
 * Plain-text formatting shared by the list, info and create commands
 */

export const STATUS_LABELS: Record<StatusClass, string> = {
  clean: 'clean',
  uncommitted: 'uncommitted changes',
  ahead: 'unpushed commits',
  error: 'error',
}

/**
 * One-line description of a repository's status
 */
export function formatRepoStatus(status: RepoStatus): string {
  const statusClass = classifyStatus(status)
  if (statusClass === 'error') {
    return `error: ${status.error ?? 'unknown'}`
  }

  const parts: string[] = []
  if (status.uncommittedCount > 0) {
    parts.push(`${status.uncommittedCount} uncommitted`)
  }
  if (status.aheadCount > 0) {
    parts.push(`${status.aheadCount} ahead`)
  }
  if (status.behindCount > 0) {
    parts.push(`${status.behindCount} behind`)
  }
  return parts.length > 0 ? parts.join(', ') : 'clean'
}

/**
 * `backend:main, frontend:feature/x`
 */
export function formatRepoList<R extends Pick<RepoInstance, 'name' | 'branch'>>(environment: { repos: R[] }): string {
  return environment.repos.map((repo) => `${repo.name}:${repo.branch}`).join(', ')
}

/**
 * Pad cells so columns line up
 */
export function formatTable(rows: string[][]): string[] {
  const widths: number[] = []
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length)
    })
  }
  return rows.map((row) =>
    row
      .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index] ?? 0)))
      .join('  ')
  )
}
