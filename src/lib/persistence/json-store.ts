/**
 * JSON File Store
 *
 * One JSON document on disk, validated with zod on every read. Writes go to a
 * temporary file first and are renamed into place; read-modify-write cycles
 * are serialized through a mutex.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { z } from 'zod'
import { AsyncMutex } from '@/lib/utils/mutex'

export class StorageCorruptionError extends Error {
  readonly path: string

  constructor(path: string, reason: string) {
    super(`Storage file ${path} is unreadable: ${reason}`)
    this.name = 'StorageCorruptionError'
    this.path = path
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class JsonFileStore<TSchema extends z.ZodTypeAny> {
  private readonly mutex = new AsyncMutex()

  constructor(
    readonly path: string,
    private readonly schema: TSchema,
    private readonly createEmpty: () => z.infer<TSchema>
  ) {}

  /**
   * Read and validate the document. A missing file reads as empty.
   *
   * @throws StorageCorruptionError when the file is not valid JSON or fails validation
   */
  async read(): Promise<z.infer<TSchema>> {
    let text: string
    try {
      text = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        return this.createEmpty()
      }
      throw error
    }

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`[Persistence] Corrupted JSON in ${this.path}:`, message)
      throw new StorageCorruptionError(this.path, message)
    }

    const parsed = this.schema.safeParse(json)
    if (!parsed.success) {
      const details = parsed.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
      console.error(`[Persistence] Invalid document in ${this.path}:`, details)
      throw new StorageCorruptionError(this.path, details)
    }
    return parsed.data
  }

  /**
   * Apply a change to the current document and write it back atomically.
   */
  update<TResult>(mutate: (document: z.infer<TSchema>) => { document: z.infer<TSchema>; result: TResult }): Promise<TResult> {
    return this.mutex.acquire(async () => {
      const current = await this.read()
      const { document, result } = mutate(current)
      await this.write(document)
      return result
    })
  }

  private async write(document: z.infer<TSchema>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    const temp = `${this.path}.${process.pid}.tmp`
    await writeFile(temp, JSON.stringify(document, null, 2), 'utf8')
    await rename(temp, this.path)
  }
}
