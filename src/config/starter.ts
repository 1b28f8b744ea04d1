import { DEFAULT_CONFIG } from './schema.js'

/**
 * Commented configuration written by `grove config init`
 *
 * Only the directory keys are set; everything else is shown as commented-out
 * examples so the file parses as-is.
 */
export function renderStarterConfig(): string {
  return [
    '# grove configuration',
    '#',
    '# Directories accept "~" for your home directory.',
    '',
    `baseReposDir = "${DEFAULT_CONFIG.baseReposDir}"`,
    `environmentsDir = "${DEFAULT_CONFIG.environmentsDir}"`,
    `registryPath = "${DEFAULT_CONFIG.registryPath}"`,
    '',
    '# Repositories environments can be built from. Each is cloned once into',
    '# baseReposDir and shared by every environment.',
    '#',
    '# [repositories.backend]',
    '# url = "git@github.com:acme/backend.git"',
    '#',
    '# [repositories.frontend]',
    '# url = "git@github.com:acme/frontend.git"',
    '',
    '# Handlebars templates rendered into each new environment. "when" lists',
    '# the repositories that must all be present for the rule to apply.',
    '#',
    '# [[templates]]',
    '# source = "~/.config/grove/templates/docker-compose.yml.hbs"',
    '# destination = "docker-compose.yml"',
    '# when = ["backend", "frontend"]',
    '',
    '# Files copied as-is.',
    '#',
    '# [[copyFiles]]',
    '# source = "~/.config/grove/env.local"',
    '# destination = "backend/.env.local"',
    '',
    '# Links between repositories, relative to the environment root.',
    '#',
    '# [[symlinks]]',
    '# source = "frontend/dist"',
    '# target = "backend/public/app"',
    '# when = ["backend", "frontend"]',
    '',
  ].join('\n')
}
