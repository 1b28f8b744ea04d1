import { execFile } from 'child_process'
import { z } from 'zod'
import type { GroveConfig } from '../config/schema.js'
import type { PrInfo } from '../registry/schema.js'
import { InvalidInputError, NotFoundError, ToolFailureError, ToolUnavailableError } from './errors.js'
import { getErrorCode } from './fileOps.js'

/**
 * GitHub pull request lookup for `grove review`
 *
 * Pull requests are accepted as a full URL
 * (`https://github.com/owner/repo/pull/42`) or as `repo#42`, where `repo` is
 * a configured repository name. Details come from the `gh` CLI.
 */

// ============================================================================
// Reference Parsing
// ============================================================================

const PR_URL_PATTERN = /^https?:\/\/github\.com\/([^/]+)\/([^/]+)\/pull\/(\d+)(?:\/.*)?$/
const PR_SHORTHAND_PATTERN = /^([a-zA-Z0-9_-]+)#(\d+)$/
const SSH_REMOTE_PATTERN = /^git@github\.com:([^/]+)\/(.+?)(?:\.git)?$/
const HTTPS_REMOTE_PATTERN = /^https?:\/\/github\.com\/([^/]+)\/([^/]+?)(?:\.git)?\/?$/

export interface GitHubRepo {
  owner: string
  repo: string
}

/**
 * A pull request named on the command line
 *
 * `repository` is set for the shorthand form, `owner`/`repo` for URLs.
 */
export type PrReference =
  | { kind: 'url'; owner: string; repo: string; number: number }
  | { kind: 'shorthand'; repository: string; number: number }

/**
 * Owner and name of a GitHub remote URL, or null for other hosts
 */
export function parseGitHubRepo(url: string): GitHubRepo | null {
  const match = SSH_REMOTE_PATTERN.exec(url.trim()) ?? HTTPS_REMOTE_PATTERN.exec(url.trim())
  if (!match) {
    return null
  }
  return { owner: match[1], repo: match[2] }
}

export function parsePrUrl(input: string): PrReference | null {
  const match = PR_URL_PATTERN.exec(input.trim())
  if (!match) {
    return null
  }
  return { kind: 'url', owner: match[1], repo: match[2], number: Number(match[3]) }
}

export function parsePrShorthand(input: string): PrReference | null {
  const match = PR_SHORTHAND_PATTERN.exec(input.trim())
  if (!match) {
    return null
  }
  return { kind: 'shorthand', repository: match[1], number: Number(match[2]) }
}

/**
 * @throws {InvalidInputError} when the input is neither form
 */
export function parsePrReference(input: string): PrReference {
  const reference = parsePrUrl(input) ?? parsePrShorthand(input)
  if (!reference) {
    throw new InvalidInputError(
      `Invalid pull request "${input}": expected https://github.com/OWNER/REPO/pull/N or REPO#N`
    )
  }
  return reference
}

/**
 * Resolve a reference to a configured repository and its GitHub coordinates
 *
 * @throws {NotFoundError} when no configured repository matches
 */
export function findRepositoryForPr(
  reference: PrReference,
  repositories: GroveConfig['repositories']
): { repository: string; github: GitHubRepo } {
  if (reference.kind === 'shorthand') {
    if (!Object.hasOwn(repositories, reference.repository)) {
      throw new NotFoundError(`Unknown repository ${reference.repository}`, { repository: reference.repository })
    }
    const config = repositories[reference.repository]
    const github = parseGitHubRepo(config.url)
    if (!github) {
      throw new InvalidInputError(`Repository ${reference.repository} is not hosted on GitHub: ${config.url}`, {
        repository: reference.repository,
      })
    }
    return { repository: reference.repository, github }
  }

  const wanted = `${reference.owner}/${reference.repo}`.toLowerCase()
  for (const [name, config] of Object.entries(repositories)) {
    const github = parseGitHubRepo(config.url)
    if (github && `${github.owner}/${github.repo}`.toLowerCase() === wanted) {
      return { repository: name, github }
    }
  }

  throw new NotFoundError(`No configured repository points at ${reference.owner}/${reference.repo}`)
}

// ============================================================================
// gh CLI
// ============================================================================

const pullRequestSchema = z.object({
  number: z.number(),
  title: z.string(),
  headRefName: z.string(),
  url: z.string(),
  author: z.object({ login: z.string() }),
})

export type PullRequest = z.infer<typeof pullRequestSchema>

/**
 * Runs `gh` with the given arguments and resolves with its stdout
 */
export type GhRunner = (args: string[]) => Promise<{ stdout: string }>

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr.trim()
  }
  return ''
}

export const runGh: GhRunner = (args) =>
  new Promise((resolve, reject) => {
    execFile('gh', args, { encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error) {
        reject(Object.assign(error, { stderr }))
        return
      }
      resolve({ stdout })
    })
  })

const PR_JSON_FIELDS = ['number', 'title', 'author', 'headRefName', 'url'] as const

export class GitHubClient {
  constructor(private readonly run: GhRunner = runGh) {}

  /**
   * Look up a pull request
   *
   * @throws {ToolUnavailableError} when gh is not installed
   * @throws {ToolFailureError} when gh fails or prints something unexpected
   */
  async getPullRequest(github: GitHubRepo, number: number): Promise<PullRequest> {
    const args = [
      'pr',
      'view',
      String(number),
      '--repo',
      `${github.owner}/${github.repo}`,
      '--json',
      PR_JSON_FIELDS.join(','),
    ]
    const command = ['gh', ...args]
    const context = { step: 'review' }

    let stdout: string
    try {
      stdout = (await this.run(args)).stdout
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        throw new ToolUnavailableError('gh', 'gh CLI not found', context, { cause: error })
      }
      const stderr = stderrOf(error)
      throw new ToolFailureError(`gh command failed: ${stderr || 'unknown error'}`, context, { command, stderr }, {
        cause: error,
      })
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(stdout)
    } catch (error) {
      throw new ToolFailureError('gh returned invalid JSON', context, { command, stderr: '' }, { cause: error })
    }

    const validation = pullRequestSchema.safeParse(parsed)
    if (!validation.success) {
      throw new ToolFailureError(
        `gh returned an unexpected pull request shape: ${validation.error.issues[0]?.message ?? 'invalid'}`,
        context,
        { command, stderr: '' }
      )
    }
    return validation.data
  }
}

/**
 * Default environment name for a review: `pr-<repo>-<number>`
 */
export function reviewEnvironmentName(repository: string, number: number): string {
  return `pr-${repository}-${number}`
}

export function toPrInfo(pullRequest: PullRequest, repository: string): PrInfo {
  return {
    number: pullRequest.number,
    url: pullRequest.url,
    title: pullRequest.title,
    author: pullRequest.author.login,
    headRef: pullRequest.headRefName,
    repoName: repository,
  }
}
