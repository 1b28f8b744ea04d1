import { describe, it, expect } from 'vitest'
import { hasEnvConfig, listSupportedEnvVars, parseEnvVars } from '../../src/config/env.js'

describe('Environment Variable Parser', () => {
  describe('parseEnvVars', () => {
    it('should map supported variables to config keys', () => {
      const config = parseEnvVars({
        GROVE_BASE_REPOS_DIR: '/srv/repos',
        GROVE_ENVIRONMENTS_DIR: '~/envs',
        GROVE_REGISTRY_PATH: '/srv/registry.json',
      })

      expect(config).toEqual({
        baseReposDir: '/srv/repos',
        environmentsDir: '~/envs',
        registryPath: '/srv/registry.json',
      })
    })

    it('should trim values and ignore empty ones', () => {
      expect(parseEnvVars({ GROVE_BASE_REPOS_DIR: '  /srv/repos  ', GROVE_REGISTRY_PATH: '   ' })).toEqual({
        baseReposDir: '/srv/repos',
      })
    })

    it('should ignore unknown and unprefixed variables', () => {
      expect(parseEnvVars({ GROVE_UNKNOWN: 'x', HOME: '/home/dev' })).toEqual({})
    })
  })

  describe('hasEnvConfig', () => {
    it('should detect supported variables only', () => {
      expect(hasEnvConfig({ GROVE_ENVIRONMENTS_DIR: '/envs' })).toBe(true)
      expect(hasEnvConfig({ GROVE_UNKNOWN: 'x' })).toBe(false)
    })
  })

  describe('listSupportedEnvVars', () => {
    it('should list every supported variable', () => {
      expect(listSupportedEnvVars().map((entry) => entry.name)).toEqual([
        'GROVE_BASE_REPOS_DIR',
        'GROVE_ENVIRONMENTS_DIR',
        'GROVE_REGISTRY_PATH',
      ])
    })
  })
})
