import { describe, it, expect, vi } from 'vitest'
import { Errors } from '@oclif/core'
import {
  ConflictError,
  ErrorHelper,
  EXIT_CODES,
  ErrorKind,
  InvalidInputError,
  NotFoundError,
  PartialFailureError,
  ProvisioningError,
  TemplateFailureError,
  ToolFailureError,
  ToolUnavailableError,
  describeError,
  errorMessage,
  type CommandOutput,
} from '../../src/utils/errors.js'

class ExitSignal extends Error {
  constructor(readonly code: number | undefined) {
    super(`exit ${code}`)
  }
}

function createOutput() {
  const output = {
    log: vi.fn((_message?: string): void => undefined),
    warn: vi.fn((_input: string | Error): void => undefined),
    error: vi.fn((_input: string | Error, _options: { exit: false }): void => undefined),
    exit: vi.fn((code?: number): never => {
      throw new ExitSignal(code)
    }),
  }
  const command: CommandOutput = output
  return { output, command }
}

describe('errors', () => {
  describe('exit codes', () => {
    it('gives every kind its own code', () => {
      const codes = Object.values(EXIT_CODES)
      expect(new Set(codes).size).toBe(codes.length)
      expect(codes).not.toContain(0)
      expect(codes).not.toContain(1)
    })

    it('maps the documented kinds', () => {
      expect(EXIT_CODES[ErrorKind.INVALID_INPUT]).toBe(2)
      expect(EXIT_CODES[ErrorKind.NOT_FOUND]).toBe(3)
      expect(EXIT_CODES[ErrorKind.CONFLICT]).toBe(4)
      expect(EXIT_CODES[ErrorKind.PARTIAL]).toBe(8)
    })
  })

  describe('GroveError', () => {
    it('keeps existing context keys when enriched', () => {
      const error = new NotFoundError('Unknown repository api', { repository: 'api', step: 'validate' })

      error.enrich({ environment: 'feat', step: 'worktrees' })

      expect(error.context).toEqual({ environment: 'feat', repository: 'api', step: 'validate' })
    })

    it('tags provisioning failures with their step', () => {
      const error = new ProvisioningError('git clone failed', { repository: 'api' }, { command: ['git', 'clone'], stderr: '' })

      expect(error.kind).toBe(ErrorKind.TOOL_FAILURE)
      expect(error.context.step).toBe('provision')
      expect(error).toBeInstanceOf(ToolFailureError)
    })
  })

  describe('errorMessage', () => {
    it('reads Error messages and stringifies anything else', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom')
      expect(errorMessage(42)).toBe('42')
    })
  })

  describe('describeError', () => {
    it('appends context to the message', () => {
      const error = new InvalidInputError('Bad name', { environment: 'x y', step: 'validate' })

      expect(describeError(error)).toBe('Bad name (environment: x y, step: validate)')
    })

    it('lists outstanding work and the force hint', () => {
      const error = new ConflictError('outstanding_work', 'Environment feat has work that would be lost', {}, [
        { repository: 'api', kind: 'uncommitted', count: 2 },
        { repository: 'web', kind: 'unpushed', count: 1 },
      ])

      expect(describeError(error).split('\n')).toEqual([
        'Environment feat has work that would be lost',
        '  api: 2 uncommitted file(s)',
        '  web: 1 unpushed commit(s)',
        'Use --force to delete anyway.',
      ])
    })

    it('shows the failed command and its stderr', () => {
      const error = new ToolFailureError(
        'git worktree failed',
        {},
        { command: ['git', 'worktree', 'add'], stderr: 'fatal: invalid reference' }
      )

      expect(describeError(error).split('\n')).toEqual([
        'git worktree failed',
        '  command: git worktree add',
        '  fatal: invalid reference',
      ])
    })

    it('lists every failed template', () => {
      const error = new TemplateFailureError([
        { template: '/t/a.hbs', message: 'missing' },
        { template: '/t/b.hbs', message: 'syntax' },
      ])

      expect(describeError(error)).toBe(
        '2 template(s) failed to render (step: templates)\n  /t/a.hbs: missing\n  /t/b.hbs: syntax'
      )
    })

    it('says when a partially deleted environment is still registered', () => {
      const error = new PartialFailureError([{ target: '/envs/feat', message: 'EBUSY' }], {}, false)

      expect(describeError(error)).toBe(
        '1 removal step(s) failed\n  /envs/feat: EBUSY\nThe environment is still registered.'
      )
    })

    it('lists leftovers from a failed rollback', () => {
      const error = new NotFoundError('gone')
      error.rollbackFailures = [{ operation: 'create_dir', path: '/envs/feat', error: 'EACCES' }]

      expect(describeError(error)).toBe(
        'gone\nCleanup did not finish; remove these by hand:\n  /envs/feat (create_dir): EACCES'
      )
    })
  })

  describe('ErrorHelper', () => {
    it('exits with the code of the error kind', () => {
      const { output, command } = createOutput()

      expect(() => ErrorHelper.fail(command, new NotFoundError('Environment feat not found'))).toThrow(ExitSignal)

      expect(output.error).toHaveBeenCalledWith('Environment feat not found', { exit: false })
      expect(output.exit).toHaveBeenCalledWith(3)
    })

    it('prints a JSON document in json mode', () => {
      const { output, command } = createOutput()
      const error = new ToolUnavailableError('gh', 'gh CLI not found', { step: 'review' })

      expect(() => ErrorHelper.fail(command, error, true)).toThrow(ExitSignal)

      const printed: unknown = JSON.parse(String(output.log.mock.calls[0]?.[0]))
      expect(printed).toEqual({
        status: 'error',
        kind: 'tool_unavailable',
        error: 'gh CLI not found',
        context: { step: 'review' },
        details: { tool: 'gh' },
      })
      expect(output.exit).toHaveBeenCalledWith(6)
    })

    it('treats foreign errors as unexpected', () => {
      const { output, command } = createOutput()

      expect(() => ErrorHelper.fail(command, new Error('boom'), false, 'Failed to list')).toThrow(ExitSignal)

      expect(output.error).toHaveBeenCalledWith('Failed to list: boom', { exit: false })
      expect(output.exit).toHaveBeenCalledWith(1)
    })

    it('rethrows oclif exit signals untouched', () => {
      const { output, command } = createOutput()
      const exit = new Errors.ExitError(4)

      expect(() => ErrorHelper.fail(command, exit)).toThrow(exit)
      expect(output.exit).not.toHaveBeenCalled()
    })

    it('reports validation errors with exit code 2', () => {
      const { output, command } = createOutput()

      expect(() => ErrorHelper.validation(command, 'Name required', true)).toThrow(ExitSignal)

      expect(output.log).toHaveBeenCalledWith(
        JSON.stringify({ status: 'error', kind: 'invalid_input', error: 'Name required' }, null, 2)
      )
      expect(output.exit).toHaveBeenCalledWith(2)
    })

    it('warns through the command outside json mode', () => {
      const { output, command } = createOutput()

      ErrorHelper.warn(command, 'Fetch failed for api')

      expect(output.warn).toHaveBeenCalledWith('Fetch failed for api')
      expect(output.log).not.toHaveBeenCalled()
    })
  })
})
