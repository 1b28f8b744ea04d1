import * as path from 'path'
import { errorMessage } from './errors.js'
import type { WorktreeClient } from './git.js'

/**
 * Remote branch listing across base repositories
 *
 * Repositories are fetched concurrently; one failing does not hide the
 * branches of the others.
 */

export type BranchListing = { branches: string[] } | { error: string }

export interface BranchRepo {
  name: string
  path: string
}

export async function fetchBranchesForRepos(
  client: Pick<WorktreeClient, 'fetchBranches'>,
  repos: readonly BranchRepo[],
  options: { signal?: AbortSignal } = {}
): Promise<Map<string, BranchListing>> {
  const results = await Promise.allSettled(repos.map((repo) => client.fetchBranches(repo.path, options)))

  const listings = new Map<string, BranchListing>()
  results.forEach((result, index) => {
    const repo = repos[index]
    listings.set(
      repo.name,
      result.status === 'fulfilled' ? { branches: result.value } : { error: errorMessage(result.reason) }
    )
  })
  return listings
}

/**
 * Base clones for the configured repositories, by name
 */
export function baseRepos(names: readonly string[], baseReposDir: string): BranchRepo[] {
  return names.map((name) => ({ name, path: path.join(baseReposDir, name) }))
}

/**
 * Where the interrupt comes from; `process` in the CLI
 */
export interface InterruptSource {
  once(event: 'SIGINT', listener: () => void): unknown
  removeListener(event: 'SIGINT', listener: () => void): unknown
}

/**
 * Fetch branches until Ctrl+C
 *
 * An interrupt aborts every running git process and resolves to null, so
 * the caller can give up instead of carrying on with partial listings.
 */
export async function fetchBranchesInterruptibly(
  client: Pick<WorktreeClient, 'fetchBranches'>,
  repos: readonly BranchRepo[],
  interrupts: InterruptSource = process
): Promise<Map<string, BranchListing> | null> {
  const controller = new AbortController()
  const cancel = (): void => controller.abort()
  interrupts.once('SIGINT', cancel)

  try {
    const listings = await fetchBranchesForRepos(client, repos, { signal: controller.signal })
    return controller.signal.aborted ? null : listings
  } finally {
    interrupts.removeListener('SIGINT', cancel)
  }
}
