import { describe, it, expect } from 'vitest'
import { formatRepoList, formatRepoStatus, formatTable } from '../../src/utils/display.js'

const status = { name: 'api', branch: 'main', uncommittedCount: 0, aheadCount: 0, behindCount: 0 }

describe('display', () => {
  it('describes repository status', () => {
    expect(formatRepoStatus(status)).toBe('clean')
    expect(formatRepoStatus({ ...status, uncommittedCount: 2, aheadCount: 3, behindCount: 1 })).toBe(
      '2 uncommitted, 3 ahead, 1 behind'
    )
    expect(formatRepoStatus({ ...status, aheadCount: 5, error: 'Worktree not found' })).toBe(
      'error: Worktree not found'
    )
  })

  it('lists repositories with their branches', () => {
    expect(
      formatRepoList({
        repos: [
          { name: 'api', branch: 'main', worktreePath: '/envs/x/api' },
          { name: 'web', branch: 'feat/x', worktreePath: '/envs/x/web' },
        ],
      })
    ).toBe('api:main, web:feat/x')
  })

  it('aligns columns without padding the last one', () => {
    expect(
      formatTable([
        ['NAME', 'REPOSITORIES', 'CREATED'],
        ['feature-long', 'api:main', '2026-01-01'],
      ])
    ).toEqual(['NAME          REPOSITORIES  CREATED', 'feature-long  api:main      2026-01-01'])
  })
})
