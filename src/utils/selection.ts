import { InvalidInputError } from './errors.js'
import type { RepoSelection } from './environment.js'

/**
 * Parse `REPO:BRANCH`
 *
 * The branch is everything after the first colon, so branch names may
 * contain colons of their own.
 */
export function parseRepoSpec(spec: string): RepoSelection {
  const separator = spec.indexOf(':')
  if (separator <= 0 || separator === spec.length - 1) {
    throw new InvalidInputError(`Invalid repository spec "${spec}": expected REPO:BRANCH`)
  }

  const name = spec.slice(0, separator).trim()
  const branch = spec.slice(separator + 1).trim()
  if (!name || !branch) {
    throw new InvalidInputError(`Invalid repository spec "${spec}": expected REPO:BRANCH`)
  }

  return { name, branch }
}

export function parseRepoSpecs(specs: readonly string[]): RepoSelection[] {
  return specs.map(parseRepoSpec)
}
