import fs from 'fs-extra'
import Handlebars from 'handlebars'
import * as path from 'path'
import { TemplateRenderError, errorMessage } from './errors.js'
import { getErrorCode } from './fileOps.js'

/**
 * Template rendering and activation rules
 *
 * Templates are Handlebars files addressed by absolute path. They render in
 * strict mode, so a variable the context does not define is an error rather
 * than an empty string, and without HTML escaping since the output is config
 * and source files.
 *
 * Context available to templates:
 * - `envName`, `envPath`, `createdAt`
 * - `repos` - `[{ name, branch }]` in selection order
 * - `repoNames` - names only, for `{{#if (has repoNames "backend")}}`
 * - `symlinks` - `[{ source, target }]` that were created
 */

/**
 * Anything carrying an activation condition
 */
export interface ConditionalRule {
  when?: readonly string[]
}

/**
 * True when the rule has no condition or every name in it is present
 */
export function shouldRender(rule: ConditionalRule, presentRepoNames: Iterable<string>): boolean {
  if (!rule.when) {
    return true
  }
  const present = new Set(presentRepoNames)
  return rule.when.every((name) => present.has(name))
}

export interface TemplateRepo {
  readonly name: string
  readonly branch: string
}

export interface TemplateSymlink {
  readonly source: string
  readonly target: string
}

export interface TemplateContext {
  readonly envName: string
  readonly envPath: string
  readonly createdAt: string
  readonly repos: readonly TemplateRepo[]
  readonly repoNames: readonly string[]
  readonly symlinks: readonly TemplateSymlink[]
}

/**
 * Build the frozen context shared by every template of one creation
 */
export function buildTemplateContext(input: {
  envName: string
  envPath: string
  createdAt: string
  repos: ReadonlyArray<{ name: string; branch: string }>
  symlinks: ReadonlyArray<{ source: string; target: string }>
}): TemplateContext {
  const repos = Object.freeze(
    input.repos.map((repo) => Object.freeze({ name: repo.name, branch: repo.branch }))
  )
  const symlinks = Object.freeze(
    input.symlinks.map((link) => Object.freeze({ source: link.source, target: link.target }))
  )

  return Object.freeze({
    envName: input.envName,
    envPath: input.envPath,
    createdAt: input.createdAt,
    repos,
    repoNames: Object.freeze(repos.map((repo) => repo.name)),
    symlinks,
  })
}

function registerHelpers(instance: typeof Handlebars): void {
  // {{#if (has repoNames "backend")}}
  instance.registerHelper('has', (list: unknown, item: unknown) => Array.isArray(list) && list.includes(item))

  instance.registerHelper('eq', (left: unknown, right: unknown) => left === right)

  // {{join repoNames ", "}}; the separator defaults to ", "
  instance.registerHelper('join', (list: unknown, separator: unknown) => {
    if (!Array.isArray(list)) {
      return ''
    }
    return list.join(typeof separator === 'string' ? separator : ', ')
  })
}

export class TemplateRenderer {
  private readonly handlebars = Handlebars.create()

  constructor() {
    registerHelpers(this.handlebars)
  }

  /**
   * Render the template at an absolute path
   *
   * @throws {TemplateRenderError} for a missing file, a syntax error or an
   * undefined variable
   */
  async render(templatePath: string, context: TemplateContext): Promise<string> {
    if (!path.isAbsolute(templatePath)) {
      throw new TemplateRenderError(templatePath, `Template path must be absolute: ${templatePath}`)
    }

    let source: string
    try {
      source = await fs.readFile(templatePath, 'utf-8')
    } catch (error) {
      const message =
        getErrorCode(error) === 'ENOENT'
          ? `Template not found: ${templatePath}`
          : `Failed to read template ${templatePath}: ${errorMessage(error)}`
      throw new TemplateRenderError(templatePath, message, { cause: error })
    }

    try {
      const template = this.handlebars.compile(source, { strict: true, noEscape: true })
      return template(context)
    } catch (error) {
      throw new TemplateRenderError(
        templatePath,
        `Failed to render template ${templatePath}: ${errorMessage(error)}`,
        { cause: error }
      )
    }
  }
}
