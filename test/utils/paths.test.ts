import { describe, it, expect } from 'vitest'
import * as path from 'path'
import {
  expandHome,
  isContainedRelativePath,
  isValidEnvironmentName,
  isWithin,
  resolvePath,
} from '../../src/utils/paths.js'

describe('paths', () => {
  describe('isValidEnvironmentName', () => {
    it.each(['feature-x', 'pr_42', 'A1', '_scratch'])('accepts %s', (name) => {
      expect(isValidEnvironmentName(name)).toBe(true)
    })

    it.each(['', '-lead', '.', '..', 'a/b', 'has space', 'dot.name', '__proto__'])('rejects "%s"', (name) => {
      expect(isValidEnvironmentName(name)).toBe(false)
    })
  })

  describe('expandHome', () => {
    it('expands a bare tilde and a tilde prefix', () => {
      expect(expandHome('~', '/home/dev')).toBe('/home/dev')
      expect(expandHome('~/envs', '/home/dev')).toBe(path.join('/home/dev', 'envs'))
    })

    it('leaves other paths alone', () => {
      expect(expandHome('/srv/envs', '/home/dev')).toBe('/srv/envs')
      expect(expandHome('~other/envs', '/home/dev')).toBe('~other/envs')
    })
  })

  describe('resolvePath', () => {
    it('returns an absolute path', () => {
      expect(resolvePath('~/repos', '/home/dev')).toBe(path.resolve('/home/dev/repos'))
      expect(path.isAbsolute(resolvePath('relative/dir'))).toBe(true)
    })
  })

  describe('isWithin', () => {
    it('includes the parent itself and its descendants', () => {
      expect(isWithin('/envs', '/envs')).toBe(true)
      expect(isWithin('/envs', '/envs/feat/api')).toBe(true)
    })

    it('excludes siblings and prefixes', () => {
      expect(isWithin('/envs', '/envs-old')).toBe(false)
      expect(isWithin('/envs/feat', '/envs')).toBe(false)
    })
  })

  describe('isContainedRelativePath', () => {
    it('accepts nested relative paths', () => {
      expect(isContainedRelativePath('backend/.env')).toBe(true)
      expect(isContainedRelativePath('docker-compose.yml')).toBe(true)
    })

    it('rejects absolute paths and parent segments', () => {
      expect(isContainedRelativePath('/etc/passwd')).toBe(false)
      expect(isContainedRelativePath('../outside')).toBe(false)
      expect(isContainedRelativePath('api/../../outside')).toBe(false)
    })
  })
})
