import * as os from 'os'
import * as path from 'path'

/**
 * Path helpers shared by the config loader and the orchestrator
 */

const ENVIRONMENT_NAME_PATTERN = /^[a-zA-Z0-9_][a-zA-Z0-9_-]*$/

/**
 * Check whether a name can be used as an environment directory
 *
 * Letters, digits, hyphens and underscores only, never starting with a
 * hyphen or dot. This also rules out `.`, `..` and path separators.
 * `__proto__` is reserved since the registry keys records by name.
 */
export function isValidEnvironmentName(name: string): boolean {
  return ENVIRONMENT_NAME_PATTERN.test(name) && name !== '__proto__'
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(input: string, home: string = os.homedir()): string {
  if (input === '~') {
    return home
  }
  if (input.startsWith('~/') || input.startsWith(`~${path.sep}`)) {
    return path.join(home, input.slice(2))
  }
  return input
}

/**
 * Expand `~` and resolve to an absolute path
 */
export function resolvePath(input: string, home?: string): string {
  return path.resolve(expandHome(input, home))
}

/**
 * Whether `child` is `parent` itself or lies below it
 */
export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child))
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

/**
 * Whether a configured path stays inside the directory it is relative to
 */
export function isContainedRelativePath(candidate: string): boolean {
  if (path.isAbsolute(candidate)) {
    return false
  }
  return !candidate.split(/[\\/]/).includes('..')
}
