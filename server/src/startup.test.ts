import path from 'path'
import { promises as fsp } from 'fs'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { healStoredPaths } from './startup'
import { RecordStore } from './store/recordStore'
import { StoreCorrupt } from './errors'
import { makeRecord, makeTempDir, removeTempDir } from './test/fixtures'

describe('healStoredPaths', () => {
  let dir: string
  let documentPath: string

  beforeEach(async () => {
    dir = await makeTempDir()
    documentPath = path.join(dir, 'papers.json')
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await removeTempDir(dir)
  })

  it('rewrites backslash paths and reports how many changed', async () => {
    const record = makeRecord({ filePath: '1\\1\\Physics\\Mid\\a.pdf' })
    await fsp.writeFile(documentPath, JSON.stringify([record, makeRecord()]))
    const records = new RecordStore(documentPath)

    await expect(healStoredPaths(records)).resolves.toBe(1)
    expect((await records.load())[0].filePath).toBe('1/1/Physics/Mid/a.pdf')
    expect(console.log).toHaveBeenCalledWith('[startup] normalized 1 stored file path(s) to forward slashes')
  })

  it('logs and carries on when the catalog document is corrupt', async () => {
    await fsp.writeFile(documentPath, '{ not json')
    const records = new RecordStore(documentPath)

    await expect(healStoredPaths(records)).resolves.toBe(0)
    expect(console.warn).toHaveBeenCalledWith('[startup] normalize failed', expect.any(StoreCorrupt))
    await expect(records.load()).rejects.toBeInstanceOf(StoreCorrupt)
  })
})
