import { z } from 'zod'

/**
 * Registry Schema
 *
 * The registry file keeps snake_case keys on disk; the rest of the code works
 * with the camelCase domain types below. `toRecord` and `fromRecord` are the
 * only places that know both shapes.
 */

export const REGISTRY_VERSION = 1

// ============================================================================
// Domain Types
// ============================================================================

/**
 * One repository checked out inside an environment
 */
export interface RepoInstance {
  name: string
  branch: string
  /** Absolute, always `<environment path>/<name>` */
  worktreePath: string
}

/**
 * A symlink created in an environment, paths relative to its root
 */
export interface SymlinkEntry {
  source: string
  target: string
}

/**
 * Pull request an environment was created to review
 */
export interface PrInfo {
  number: number
  url: string
  title: string
  author: string
  headRef: string
  repoName: string
}

export interface Environment {
  name: string
  path: string
  /** ISO-8601 */
  createdAt: string
  repos: RepoInstance[]
  /** Destinations of rendered templates and copied files, relative to `path` */
  generatedFiles: string[]
  symlinks: SymlinkEntry[]
  prInfo?: PrInfo
}

// ============================================================================
// Persisted Layout
// ============================================================================

const RepoInstanceRecordSchema = z.object({
  name: z.string().min(1),
  branch: z.string().min(1),
  worktree_path: z.string().min(1),
})

const SymlinkRecordSchema = z.object({
  source: z.string(),
  target: z.string(),
})

const PrInfoRecordSchema = z.object({
  number: z.number().int().positive(),
  url: z.string(),
  title: z.string(),
  author: z.string(),
  head_ref: z.string(),
  repo_name: z.string(),
})

export const EnvironmentRecordSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  created_at: z.string(),
  repos: z.array(RepoInstanceRecordSchema),
  generated_files: z.array(z.string()),
  symlinks: z.array(SymlinkRecordSchema),
  pr_info: PrInfoRecordSchema.optional(),
})

export const RegistryDocumentSchema = z.object({
  version: z.literal(REGISTRY_VERSION),
  environments: z.record(EnvironmentRecordSchema),
})

/**
 * Only the version, read before the rest of the document is trusted
 */
export const RegistryVersionSchema = z.object({
  version: z.number().int().positive(),
})

export type EnvironmentRecord = z.infer<typeof EnvironmentRecordSchema>
export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>

// ============================================================================
// Mapping
// ============================================================================

export function toRecord(environment: Environment): EnvironmentRecord {
  const record: EnvironmentRecord = {
    name: environment.name,
    path: environment.path,
    created_at: environment.createdAt,
    repos: environment.repos.map((repo) => ({
      name: repo.name,
      branch: repo.branch,
      worktree_path: repo.worktreePath,
    })),
    generated_files: [...environment.generatedFiles],
    symlinks: environment.symlinks.map((link) => ({ source: link.source, target: link.target })),
  }

  if (environment.prInfo) {
    record.pr_info = {
      number: environment.prInfo.number,
      url: environment.prInfo.url,
      title: environment.prInfo.title,
      author: environment.prInfo.author,
      head_ref: environment.prInfo.headRef,
      repo_name: environment.prInfo.repoName,
    }
  }

  return record
}

export function fromRecord(record: EnvironmentRecord): Environment {
  const environment: Environment = {
    name: record.name,
    path: record.path,
    createdAt: record.created_at,
    repos: record.repos.map((repo) => ({
      name: repo.name,
      branch: repo.branch,
      worktreePath: repo.worktree_path,
    })),
    generatedFiles: [...record.generated_files],
    symlinks: record.symlinks.map((link) => ({ source: link.source, target: link.target })),
  }

  if (record.pr_info) {
    environment.prInfo = {
      number: record.pr_info.number,
      url: record.pr_info.url,
      title: record.pr_info.title,
      author: record.pr_info.author,
      headRef: record.pr_info.head_ref,
      repoName: record.pr_info.repo_name,
    }
  }

  return environment
}

export function emptyRegistry(): RegistryDocument {
  return { version: REGISTRY_VERSION, environments: {} }
}
