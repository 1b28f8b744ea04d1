import fs from 'fs-extra'
import * as path from 'path'
import { ConflictError, RegistryError, errorMessage } from '../utils/errors.js'
import { getErrorCode } from '../utils/fileOps.js'
import { KeyedLock } from '../utils/keyed-lock.js'
import {
  REGISTRY_VERSION,
  RegistryDocumentSchema,
  RegistryVersionSchema,
  emptyRegistry,
  fromRecord,
  toRecord,
  type Environment,
  type RegistryDocument,
} from './schema.js'

/**
 * Environment Registry
 *
 * A JSON file mapping environment names to their records. Every mutation
 * re-reads the file, changes it in memory and replaces it atomically by
 * writing a temporary file and renaming it over the original. Mutations of
 * one registry file are serialized within the process.
 */

/**
 * Upgrades from version N to N + 1, keyed by N
 */
const MIGRATIONS: ReadonlyMap<number, (document: unknown) => unknown> = new Map()

const registryLock = new KeyedLock()

export class EnvironmentRegistry {
  constructor(readonly registryPath: string) {}

  /**
   * All environments, sorted by name
   */
  async list(): Promise<Environment[]> {
    const document = await this.load()
    return Object.values(document.environments)
      .map(fromRecord)
      .sort((a, b) => a.name.localeCompare(b.name))
  }

  async get(name: string): Promise<Environment | undefined> {
    const document = await this.load()
    return Object.hasOwn(document.environments, name) ? fromRecord(document.environments[name]) : undefined
  }

  async has(name: string): Promise<boolean> {
    const document = await this.load()
    return Object.hasOwn(document.environments, name)
  }

  /**
   * Add a record; the name must not be registered yet
   */
  async add(environment: Environment): Promise<void> {
    await this.mutate((document) => {
      if (Object.hasOwn(document.environments, environment.name)) {
        throw new ConflictError('name_registered', `Environment ${environment.name} is already registered`, {
          environment: environment.name,
          step: 'register',
        })
      }
      document.environments[environment.name] = toRecord(environment)
    })
  }

  /**
   * Remove a record; false when there was none
   */
  async remove(name: string): Promise<boolean> {
    let removed = false
    await this.mutate((document) => {
      if (Object.hasOwn(document.environments, name)) {
        delete document.environments[name]
        removed = true
      }
    })
    return removed
  }

  private async mutate(change: (document: RegistryDocument) => void): Promise<void> {
    await registryLock.run(path.resolve(this.registryPath), async () => {
      const document = await this.load()
      change(document)
      await this.save(document)
    })
  }

  /**
   * Read the registry; a missing file is an empty registry
   */
  async load(): Promise<RegistryDocument> {
    let raw: string
    try {
      raw = await fs.readFile(this.registryPath, 'utf-8')
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return emptyRegistry()
      }
      throw new RegistryError(`Failed to read registry: ${errorMessage(error)}`, this.registryPath, {
        cause: error,
      })
    }
    return this.parse(raw)
  }

  private parse(raw: string): RegistryDocument {
    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (error) {
      throw new RegistryError('Registry file is not valid JSON', this.registryPath, { cause: error })
    }

    const versioned = RegistryVersionSchema.safeParse(data)
    if (!versioned.success) {
      throw new RegistryError('Registry file has no valid version field', this.registryPath)
    }

    let version = versioned.data.version
    if (version > REGISTRY_VERSION) {
      throw new RegistryError(
        `Registry version ${version} is newer than the supported version ${REGISTRY_VERSION}`,
        this.registryPath
      )
    }

    let current = data
    while (version < REGISTRY_VERSION) {
      const migrate = MIGRATIONS.get(version)
      if (!migrate) {
        throw new RegistryError(`Registry version ${version} cannot be migrated`, this.registryPath)
      }
      current = migrate(current)
      version += 1
    }

    const parsed = RegistryDocumentSchema.safeParse(current)
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
      throw new RegistryError(`Registry file is malformed: ${issues}`, this.registryPath)
    }
    return parsed.data
  }

  private async save(document: RegistryDocument): Promise<void> {
    const tempPath = `${this.registryPath}.${process.pid}.${Date.now()}.tmp`
    try {
      await fs.outputJson(tempPath, document, { spaces: 2 })
      await fs.move(tempPath, this.registryPath, { overwrite: true })
    } catch (error) {
      await fs.remove(tempPath)
      throw new RegistryError(`Failed to write registry: ${errorMessage(error)}`, this.registryPath, {
        cause: error,
      })
    }
  }
}
