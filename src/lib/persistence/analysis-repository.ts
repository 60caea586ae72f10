/**
 * Saved Analysis Repository
 *
 * Named analyses (dataset path + operation list) in one JSON document under
 * the data directory. Saving under a taken name stores a timestamped copy
 * instead of overwriting.
 */

import { join } from 'node:path'
import type { ExecutionMode } from '@/types'
import { ANALYSES_FILE, STORE_FORMAT_VERSION } from '@/lib/constants'
import { formatTimestampSuffix } from '@/lib/utils'
import { JsonFileStore } from './json-store'
import { analysesDocumentSchema, type SavedAnalysis, type SavedOperation } from './schemas'

export interface SaveAnalysisInput {
  name: string
  description?: string | null
  datasetPath: string | null
  executionMode: ExecutionMode
  operations: SavedOperation[]
}

export type AnalysisUpdate = Partial<Pick<SaveAnalysisInput, 'name' | 'description' | 'executionMode' | 'operations'>>

export type AnalysisSummary = Omit<SavedAnalysis, 'operations'>

export interface RepositoryOptions {
  dataDir: string
  now?: () => Date
}

export class AnalysisNotFoundError extends Error {
  constructor(id: number) {
    super(`Saved analysis ${id} does not exist`)
    this.name = 'AnalysisNotFoundError'
  }
}

/**
 * `name`, or `name_YYYYMMDD_HHMMSS` (then `_1`, `_2`...) when it is taken
 */
export function versionedName(name: string, taken: Set<string>, now: Date): string {
  if (!taken.has(name)) return name
  const stamped = `${name}_${formatTimestampSuffix(now)}`
  let candidate = stamped
  let counter = 1
  while (taken.has(candidate)) {
    candidate = `${stamped}_${counter}`
    counter++
  }
  return candidate
}

export class AnalysisRepository {
  private readonly store: JsonFileStore<typeof analysesDocumentSchema>
  private readonly now: () => Date

  constructor(options: RepositoryOptions) {
    this.store = new JsonFileStore(join(options.dataDir, ANALYSES_FILE), analysesDocumentSchema, () => ({
      version: STORE_FORMAT_VERSION,
      nextId: 1,
      analyses: [],
    }))
    this.now = options.now ?? (() => new Date())
  }

  async save(input: SaveAnalysisInput): Promise<SavedAnalysis> {
    const saved = await this.store.update((document) => {
      const now = this.now()
      const timestamp = now.toISOString()
      const analysis: SavedAnalysis = {
        id: document.nextId,
        name: versionedName(input.name, new Set(document.analyses.map((a) => a.name)), now),
        description: input.description ?? null,
        createdAt: timestamp,
        modifiedAt: timestamp,
        operationCount: input.operations.length,
        datasetPath: input.datasetPath,
        executionMode: input.executionMode,
        operations: input.operations,
      }
      return {
        document: { ...document, nextId: document.nextId + 1, analyses: [...document.analyses, analysis] },
        result: analysis,
      }
    })
    console.log(`[Persistence] Saved analysis "${saved.name}" (${saved.operationCount} operations)`)
    return saved
  }

  /** Summaries, most recently modified first */
  async list(): Promise<AnalysisSummary[]> {
    const document = await this.store.read()
    return document.analyses
      .map((analysis): AnalysisSummary => ({
        id: analysis.id,
        name: analysis.name,
        description: analysis.description,
        createdAt: analysis.createdAt,
        modifiedAt: analysis.modifiedAt,
        operationCount: analysis.operationCount,
        datasetPath: analysis.datasetPath,
        executionMode: analysis.executionMode,
      }))
      .sort((a, b) => b.modifiedAt.localeCompare(a.modifiedAt) || b.id - a.id)
  }

  async load(id: number): Promise<SavedAnalysis | null> {
    const document = await this.store.read()
    return document.analyses.find((a) => a.id === id) ?? null
  }

  /**
   * @throws AnalysisNotFoundError
   */
  async update(id: number, changes: AnalysisUpdate): Promise<SavedAnalysis> {
    return this.store.update((document) => {
      const existing = document.analyses.find((a) => a.id === id)
      if (!existing) {
        throw new AnalysisNotFoundError(id)
      }
      const now = this.now()
      const otherNames = new Set(document.analyses.filter((a) => a.id !== id).map((a) => a.name))
      const operations = changes.operations ?? existing.operations
      const updated: SavedAnalysis = {
        ...existing,
        name: changes.name === undefined ? existing.name : versionedName(changes.name, otherNames, now),
        description: changes.description === undefined ? existing.description : changes.description,
        executionMode: changes.executionMode ?? existing.executionMode,
        operations,
        operationCount: operations.length,
        modifiedAt: now.toISOString(),
      }
      return {
        document: { ...document, analyses: document.analyses.map((a) => (a.id === id ? updated : a)) },
        result: updated,
      }
    })
  }

  async delete(id: number): Promise<boolean> {
    const deleted = await this.store.update((document) => {
      const analyses = document.analyses.filter((a) => a.id !== id)
      return { document: { ...document, analyses }, result: analyses.length !== document.analyses.length }
    })
    if (deleted) {
      console.log(`[Persistence] Deleted analysis ${id}`)
    }
    return deleted
  }
}
