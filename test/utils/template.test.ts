import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { TemplateRenderError } from '../../src/utils/errors.js'
import { TemplateRenderer, buildTemplateContext, shouldRender } from '../../src/utils/template.js'

describe('shouldRender', () => {
  it('applies rules without a condition everywhere', () => {
    expect(shouldRender({}, [])).toBe(true)
  })

  it('requires every named repository', () => {
    const rule = { when: ['backend', 'frontend'] }

    expect(shouldRender(rule, ['backend', 'frontend', 'docs'])).toBe(true)
    expect(shouldRender(rule, ['backend'])).toBe(false)
  })
})

describe('buildTemplateContext', () => {
  it('derives repoNames and freezes the result', () => {
    const context = buildTemplateContext({
      envName: 'feat',
      envPath: '/envs/feat',
      createdAt: '2026-01-02T03:04:05.000Z',
      repos: [
        { name: 'backend', branch: 'feat' },
        { name: 'frontend', branch: 'main' },
      ],
      symlinks: [],
    })

    expect(context.repoNames).toEqual(['backend', 'frontend'])
    expect(Object.isFrozen(context)).toBe(true)
    expect(Object.isFrozen(context.repos[0])).toBe(true)
  })
})

describe('TemplateRenderer', () => {
  let tempDir: string
  const renderer = new TemplateRenderer()
  const context = buildTemplateContext({
    envName: 'feat',
    envPath: '/envs/feat',
    createdAt: '2026-01-02T03:04:05.000Z',
    repos: [
      { name: 'backend', branch: 'feat/login' },
      { name: 'frontend', branch: 'main' },
    ],
    symlinks: [{ source: 'frontend/dist', target: 'backend/public' }],
  })

  async function writeTemplate(name: string, content: string): Promise<string> {
    const file = path.join(tempDir, name)
    await fs.writeFile(file, content)
    return file
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'grove-test-'))
  })

  afterEach(async () => {
    await fs.remove(tempDir)
  })

  it('renders variables without HTML escaping', async () => {
    const file = await writeTemplate('a.hbs', 'name={{envName}} path={{envPath}} <{{repos.[0].branch}}>')

    expect(await renderer.render(file, context)).toBe('name=feat path=/envs/feat <feat/login>')
  })

  it('iterates repositories and uses the helpers', async () => {
    const file = await writeTemplate(
      'b.hbs',
      '{{#each repos}}{{name}}:{{branch}};{{/each}}|{{join repoNames " "}}|{{#if (has repoNames "backend")}}api{{/if}}|{{#if (eq envName "other")}}x{{else}}y{{/if}}'
    )

    expect(await renderer.render(file, context)).toBe('backend:feat/login;frontend:main;|backend frontend|api|y')
  })

  it('treats an undefined variable as an error', async () => {
    const file = await writeTemplate('c.hbs', 'port={{port}}')

    await expect(renderer.render(file, context)).rejects.toBeInstanceOf(TemplateRenderError)
  })

  it('reports a missing template', async () => {
    const file = path.join(tempDir, 'missing.hbs')

    await expect(renderer.render(file, context)).rejects.toThrow(`Template not found: ${file}`)
  })

  it('rejects relative template paths', async () => {
    await expect(renderer.render('templates/a.hbs', context)).rejects.toThrow(
      'Template path must be absolute: templates/a.hbs'
    )
  })

  it('reports syntax errors with the template path', async () => {
    const file = await writeTemplate('d.hbs', '{{#each repos}}unterminated')

    await expect(renderer.render(file, context)).rejects.toThrow(`Failed to render template ${file}`)
  })
})
