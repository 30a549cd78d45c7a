import path from 'path'
import { promises as fsp } from 'fs'
import crypto from 'crypto'
import { DuplicateIdentifier, NotFound, StoreCorrupt, ValidationFailed } from '../errors'
import { SerialLock } from '../lib/lock'
import { catalogDocumentSchema, paperRecordSchema, type PaperRecord } from '../types'

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * The catalog as one JSON document on disk. Every mutation rewrites the whole
 * document through a temp file and a rename, and mutations run one at a time.
 */
export class RecordStore {
  private readonly lock = new SerialLock()

  constructor(private readonly documentPath: string) {}

  get path(): string {
    return this.documentPath
  }

  async init(): Promise<void> {
    await fsp.mkdir(path.dirname(this.documentPath), { recursive: true })
  }

  async close(): Promise<void> {
    await this.lock.idle()
  }

  async load(): Promise<PaperRecord[]> {
    let raw: string
    try {
      raw = await fsp.readFile(this.documentPath, 'utf8')
    } catch (err) {
      if (isMissingFile(err)) return []
      throw err
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      throw new StoreCorrupt('not valid JSON', err)
    }

    const result = catalogDocumentSchema.safeParse(parsed)
    if (!result.success) {
      const issue = result.error.issues[0]
      const where = issue.path.length > 0 ? issue.path.join('.') : 'document'
      throw new StoreCorrupt(`${where}: ${issue.message}`)
    }
    return result.data
  }

  append(record: PaperRecord): Promise<PaperRecord> {
    const checked = paperRecordSchema.safeParse(record)
    if (!checked.success) {
      const issues = checked.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      return Promise.reject(new ValidationFailed('Invalid paper record', issues))
    }
    const valid = checked.data

    return this.lock.run(async () => {
      const records = await this.load()
      if (records.some((entry) => entry.id === valid.id)) {
        throw new DuplicateIdentifier(valid.id)
      }
      records.push(valid)
      await this.persist(records)
      return valid
    })
  }

  remove(id: string): Promise<PaperRecord> {
    return this.lock.run(async () => {
      const records = await this.load()
      const index = records.findIndex((entry) => entry.id === id)
      if (index === -1) throw new NotFound(`Paper ${id}`)
      const [removed] = records.splice(index, 1)
      await this.persist(records)
      return removed
    })
  }

  normalizeStoredPaths(): Promise<number> {
    return this.lock.run(async () => {
      const records = await this.load()
      let changed = 0
      for (const record of records) {
        const fixed = record.filePath.replace(/\\+/g, '/')
        if (fixed !== record.filePath) {
          record.filePath = fixed
          changed += 1
        }
      }
      if (changed > 0) await this.persist(records)
      return changed
    })
  }

  private async persist(records: PaperRecord[]): Promise<void> {
    const tmpPath = `${this.documentPath}.${crypto.randomUUID()}.tmp`
    try {
      await fsp.writeFile(tmpPath, JSON.stringify(records, null, 2))
      await fsp.rename(tmpPath, this.documentPath)
    } catch (err) {
      await fsp.rm(tmpPath, { force: true })
      throw err
    }
  }
}
