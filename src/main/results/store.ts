import fs from 'fs/promises'
import path from 'path'
import { z } from 'zod'
import { compactTimestamp } from '../utils'

export type ResultType = 'screenshot' | 'clipboard'

export interface StoredResult {
  id: string
  type: ResultType
  content: string | null
  imagePath: string | null
  analysis: string | null
  timestamp: string
}

const storedResultSchema = z.object({
  id: z.string(),
  type: z.enum(['screenshot', 'clipboard']),
  content: z.string().nullable(),
  imagePath: z.string().nullable(),
  analysis: z.string().nullable(),
  timestamp: z.string()
})

const resultsFileSchema = z.array(storedResultSchema)

export const IMAGES_DIR = 'images'
const RESULTS_FILE = 'results.json'

/**
 * Capture results persisted as one JSON array plus an images directory.
 * Writes are serialized so concurrent captures never lose each other's records.
 */
export class ResultsStore {
  private lastIdStamp = ''
  private idSequence = 0
  private writeChain: Promise<unknown> = Promise.resolve()

  constructor(readonly dataDir: string) {}

  get imagesDir(): string {
    return path.join(this.dataDir, IMAGES_DIR)
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.imagesDir, { recursive: true })
  }

  generateId(date: Date = new Date()): string {
    const stamp = `${compactTimestamp(date)}_${String(date.getMilliseconds()).padStart(3, '0')}`
    this.idSequence = stamp === this.lastIdStamp ? this.idSequence + 1 : 0
    this.lastIdStamp = stamp
    return `${stamp}${String(this.idSequence).padStart(3, '0')}`
  }

  async list(): Promise<StoredResult[]> {
    return (await this.read()).results
  }

  private async read(): Promise<{ results: StoredResult[]; corrupt: boolean }> {
    let raw: string
    try {
      raw = await fs.readFile(path.join(this.dataDir, RESULTS_FILE), 'utf-8')
    } catch (error) {
      if (isNotFound(error)) return { results: [], corrupt: false }
      throw error
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (error) {
      console.error('[ResultsStore] results.json is not valid JSON, starting empty:', error)
      return { results: [], corrupt: true }
    }

    const parsed = resultsFileSchema.safeParse(data)
    if (!parsed.success) {
      console.error('[ResultsStore] results.json has an unexpected shape, starting empty')
      return { results: [], corrupt: true }
    }
    return { results: parsed.data, corrupt: false }
  }

  async latest(): Promise<StoredResult | null> {
    const results = await this.list()
    return results[results.length - 1] ?? null
  }

  async addScreenshot(input: { imageBase64: string; analysis: string | null; timestamp?: string }): Promise<StoredResult> {
    return this.exclusive(async () => {
      const id = this.generateId()
      const fileName = `screenshot_${id}.png`
      await fs.mkdir(this.imagesDir, { recursive: true })
      await fs.writeFile(path.join(this.imagesDir, fileName), Buffer.from(input.imageBase64, 'base64'))

      const result: StoredResult = {
        id,
        type: 'screenshot',
        content: null,
        imagePath: `${IMAGES_DIR}/${fileName}`,
        analysis: input.analysis,
        timestamp: input.timestamp ?? new Date().toISOString()
      }
      await this.append(result)
      return result
    })
  }

  async addClipboard(input: { text: string; analysis: string | null; timestamp?: string }): Promise<StoredResult> {
    return this.exclusive(async () => {
      const result: StoredResult = {
        id: this.generateId(),
        type: 'clipboard',
        content: input.text,
        imagePath: null,
        analysis: input.analysis,
        timestamp: input.timestamp ?? new Date().toISOString()
      }
      await this.append(result)
      return result
    })
  }

  /** Returns false when no result has that id. */
  async delete(id: string): Promise<boolean> {
    return this.exclusive(async () => {
      const results = await this.list()
      const target = results.find((result) => result.id === id)
      if (!target) {
        return false
      }

      await this.save(results.filter((result) => result.id !== id))
      if (target.imagePath) {
        await fs.rm(path.join(this.dataDir, target.imagePath), { force: true })
      }
      return true
    })
  }

  private async append(result: StoredResult): Promise<void> {
    const { results, corrupt } = await this.read()
    if (corrupt) {
      await this.quarantine()
    }
    results.push(result)
    await this.save(results)
  }

  // An unreadable results file is kept aside rather than overwritten
  private async quarantine(): Promise<void> {
    const source = path.join(this.dataDir, RESULTS_FILE)
    const target = path.join(this.dataDir, `${RESULTS_FILE}.${Date.now()}.bad`)
    await fs.rename(source, target)
    console.warn(`[ResultsStore] Moved unreadable ${RESULTS_FILE} to ${target}`)
  }

  private async save(results: StoredResult[]): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true })
    const target = path.join(this.dataDir, RESULTS_FILE)
    const temp = `${target}.tmp`
    await fs.writeFile(temp, JSON.stringify(results, null, 2), 'utf-8')
    await fs.rename(temp, target)
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(work, work)
    this.writeChain = run.catch(() => undefined)
    return run
  }
}

function isNotFound(error: unknown): boolean {
  return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT')
}
