import { describe, it, expect, vi } from 'vitest'
import {
  GitHubClient,
  findRepositoryForPr,
  parseGitHubRepo,
  parsePrReference,
  reviewEnvironmentName,
  toPrInfo,
  type GhRunner,
} from '../../src/utils/github.js'
import {
  InvalidInputError,
  NotFoundError,
  ToolFailureError,
  ToolUnavailableError,
} from '../../src/utils/errors.js'

const repositories = {
  api: { url: 'git@github.com:Acme/api.git' },
  web: { url: 'https://github.com/acme/web' },
  infra: { url: 'git@gitlab.com:acme/infra.git' },
}

const pullRequest = {
  number: 42,
  title: 'Fix login redirect',
  headRefName: 'fix/login',
  url: 'https://github.com/acme/api/pull/42',
  author: { login: 'octocat' },
}

describe('github', () => {
  describe('parseGitHubRepo', () => {
    it.each([
      ['git@github.com:acme/api.git', { owner: 'acme', repo: 'api' }],
      ['git@github.com:acme/api', { owner: 'acme', repo: 'api' }],
      ['https://github.com/acme/web.git', { owner: 'acme', repo: 'web' }],
      ['https://github.com/acme/web/', { owner: 'acme', repo: 'web' }],
    ])('parses %s', (url, expected) => {
      expect(parseGitHubRepo(url)).toEqual(expected)
    })

    it('returns null for other hosts', () => {
      expect(parseGitHubRepo('git@gitlab.com:acme/infra.git')).toBeNull()
    })
  })

  describe('parsePrReference', () => {
    it('parses pull request URLs', () => {
      expect(parsePrReference('https://github.com/acme/api/pull/42/files')).toEqual({
        kind: 'url',
        owner: 'acme',
        repo: 'api',
        number: 42,
      })
    })

    it('parses the repo#number shorthand', () => {
      expect(parsePrReference('api#7')).toEqual({ kind: 'shorthand', repository: 'api', number: 7 })
    })

    it.each(['42', 'api#', 'https://github.com/acme/api/issues/42'])('rejects %s', (input) => {
      expect(() => parsePrReference(input)).toThrow(InvalidInputError)
    })
  })

  describe('findRepositoryForPr', () => {
    it('matches URLs against configured remotes ignoring case', () => {
      expect(
        findRepositoryForPr({ kind: 'url', owner: 'acme', repo: 'API', number: 1 }, repositories)
      ).toEqual({ repository: 'api', github: { owner: 'Acme', repo: 'api' } })
    })

    it('resolves the shorthand by repository name', () => {
      expect(findRepositoryForPr({ kind: 'shorthand', repository: 'web', number: 1 }, repositories)).toEqual({
        repository: 'web',
        github: { owner: 'acme', repo: 'web' },
      })
    })

    it('rejects repositories that are not configured', () => {
      expect(() =>
        findRepositoryForPr({ kind: 'shorthand', repository: 'mobile', number: 1 }, repositories)
      ).toThrow(NotFoundError)
      expect(() =>
        findRepositoryForPr({ kind: 'url', owner: 'other', repo: 'api', number: 1 }, repositories)
      ).toThrow('No configured repository points at other/api')
    })

    it('does not treat inherited object keys as repositories', () => {
      expect(() =>
        findRepositoryForPr({ kind: 'shorthand', repository: 'constructor', number: 1 }, repositories)
      ).toThrow('Unknown repository constructor')
    })

    it('rejects repositories hosted elsewhere', () => {
      expect(() =>
        findRepositoryForPr({ kind: 'shorthand', repository: 'infra', number: 1 }, repositories)
      ).toThrow(InvalidInputError)
    })
  })

  describe('GitHubClient', () => {
    it('asks gh for the pull request fields', async () => {
      const run = vi.fn<GhRunner>().mockResolvedValue({ stdout: JSON.stringify(pullRequest) })

      const result = await new GitHubClient(run).getPullRequest({ owner: 'acme', repo: 'api' }, 42)

      expect(result).toEqual(pullRequest)
      expect(run).toHaveBeenCalledWith([
        'pr',
        'view',
        '42',
        '--repo',
        'acme/api',
        '--json',
        'number,title,author,headRefName,url',
      ])
    })

    it('reports a missing gh binary', async () => {
      const run: GhRunner = async () => {
        throw Object.assign(new Error('spawn gh ENOENT'), { code: 'ENOENT' })
      }

      await expect(new GitHubClient(run).getPullRequest({ owner: 'acme', repo: 'api' }, 1)).rejects.toBeInstanceOf(
        ToolUnavailableError
      )
    })

    it('includes gh stderr when the command fails', async () => {
      const run: GhRunner = async () => {
        throw Object.assign(new Error('Command failed'), { stderr: 'no pull requests found\n' })
      }

      await expect(new GitHubClient(run).getPullRequest({ owner: 'acme', repo: 'api' }, 1)).rejects.toThrow(
        'gh command failed: no pull requests found'
      )
    })

    it('rejects output that is not a pull request', async () => {
      const invalid: GhRunner = async () => ({ stdout: 'not json' })
      const wrongShape: GhRunner = async () => ({ stdout: JSON.stringify({ number: 1 }) })

      await expect(new GitHubClient(invalid).getPullRequest({ owner: 'a', repo: 'b' }, 1)).rejects.toThrow(
        'gh returned invalid JSON'
      )
      await expect(new GitHubClient(wrongShape).getPullRequest({ owner: 'a', repo: 'b' }, 1)).rejects.toBeInstanceOf(
        ToolFailureError
      )
    })
  })

  it('names review environments and builds the record details', () => {
    expect(reviewEnvironmentName('api', 42)).toBe('pr-api-42')
    expect(toPrInfo(pullRequest, 'api')).toEqual({
      number: 42,
      url: 'https://github.com/acme/api/pull/42',
      title: 'Fix login redirect',
      author: 'octocat',
      headRef: 'fix/login',
      repoName: 'api',
    })
  })
})
