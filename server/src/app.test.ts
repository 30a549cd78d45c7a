import path from 'path'
import { promises as fsp } from 'fs'
import request from 'supertest'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import express, { type Express, type NextFunction, type Request, type Response } from 'express'
import { createApp, errorHandler } from './app'
import { SessionGate } from './auth/session'
import { CatalogService } from './catalog/service'
import { FileRepository } from './store/fileRepository'
import { RecordStore } from './store/recordStore'
import { makeTempDir, removeTempDir } from './test/fixtures'

const PASSWORD = 'test-password'

describe('HTTP API', () => {
  let dir: string
  let records: RecordStore
  let app: Express

  function build(basePath = ''): Express {
    records = new RecordStore(path.join(dir, 'papers.json'))
    const files = new FileRepository(path.join(dir, 'uploads'))
    const gate = new SessionGate({ password: PASSWORD, secret: 'test-secret', ttlSeconds: 300 })
    return createApp({
      config: { basePath, maxUploadBytes: 1024, clientDist: path.join(dir, 'no-client') },
      service: new CatalogService(records, files),
      files,
      gate
    })
  }

  async function login(): Promise<string> {
    const res = await request(app).post('/api/session').send({ password: PASSWORD }).expect(201)
    return res.body.token
  }

  function uploadRequest(token: string, fields: Record<string, string> = {}) {
    const req = request(app).post('/api/papers').set('Authorization', `Bearer ${token}`)
    const values = { subject: 'Physics', year: '1', semester: '1', examType: 'Mid', examYear: '2023', ...fields }
    for (const [name, value] of Object.entries(values)) req.field(name, value)
    return req
  }

  beforeEach(async () => {
    dir = await makeTempDir()
    app = build()
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await records.close()
    await removeTempDir(dir)
  })

  it('reports health', async () => {
    await request(app).get('/api/health').expect(200, { ok: true })
  })

  it('browses an empty catalog', async () => {
    await request(app).get('/api/papers?year=1&examType=Mid').expect(200, [])
  })

  it('rejects a wrong password with a stable code', async () => {
    const res = await request(app).post('/api/session').send({ password: 'wrong' }).expect(401)
    expect(res.body).toEqual({ error: 'Incorrect password', code: 'INVALID_CREDENTIAL' })
  })

  it('requires an admin session to upload or delete', async () => {
    const upload = await request(app).post('/api/papers').expect(401)
    expect(upload.body.code).toBe('UNAUTHORIZED')

    const remove = await request(app).delete('/api/papers/some-id').set('Authorization', 'Bearer junk').expect(401)
    expect(remove.body).toEqual({ error: 'Invalid admin session', code: 'UNAUTHORIZED' })
  })

  it('uploads, filters, serves and deletes a paper', async () => {
    const token = await login()
    const created = await uploadRequest(token).attach('files', Buffer.from('%PDF-1.4'), 'exam.pdf').expect(201)
    const [paper] = created.body.papers
    expect(paper).toMatchObject({
      subject: 'Physics',
      year: 1,
      semester: 1,
      examType: 'Mid',
      examYear: 2023,
      academicYear: null,
      filePath: '1/1/Physics/Mid/exam.pdf',
      sizeBytes: 8
    })

    const mid = await request(app).get('/api/papers').query({ examType: 'Mid', subject: 'physics' }).expect(200)
    expect(mid.body.map((entry: { id: string }) => entry.id)).toEqual([paper.id])
    await request(app).get('/api/papers').query({ examType: 'End' }).expect(200, [])
    await request(app).get(`/api/papers/${paper.id}`).expect(200, paper)

    const file = await request(app).get(`/api/papers/${paper.id}/file`).expect(200)
    expect(file.headers['content-type']).toBe('application/pdf')
    expect(file.headers['content-length']).toBe('8')

    const download = await request(app).get(`/api/papers/${paper.id}/file?download=1`).expect(200)
    expect(download.headers['content-disposition']).toBe('attachment; filename="exam.pdf"')

    await request(app).delete(`/api/papers/${paper.id}`).set('Authorization', `Bearer ${token}`).expect(204)
    await request(app).get('/api/papers').expect(200, [])
    const again = await request(app).delete(`/api/papers/${paper.id}`).set('Authorization', `Bearer ${token}`).expect(404)
    expect(again.body.code).toBe('NOT_FOUND')
  })

  it('rejects an unsupported file kind and leaves the catalog unchanged', async () => {
    const token = await login()
    const res = await uploadRequest(token).attach('files', Buffer.from('MZ'), 'tool.exe').expect(415)

    expect(res.body).toEqual({ error: 'Unsupported file type: tool.exe', code: 'UNSUPPORTED_TYPE' })
    await request(app).get('/api/papers').expect(200, [])
    expect(await fsp.readdir(path.join(dir))).not.toContain('uploads')
  })

  it('reports a name collision instead of overwriting', async () => {
    const token = await login()
    await uploadRequest(token).attach('files', Buffer.from('first'), 'same.png').expect(201)
    const res = await uploadRequest(token).attach('files', Buffer.from('second'), 'same.png').expect(409)

    expect(res.body.code).toBe('NAME_COLLISION')
    const papers = await request(app).get('/api/papers').expect(200)
    expect(papers.body).toHaveLength(1)
  })

  it('rejects files over the size limit', async () => {
    const token = await login()
    const res = await uploadRequest(token).attach('files', Buffer.alloc(2048), 'big.pdf').expect(413)
    expect(res.body).toEqual({ error: 'File exceeds the 1KB limit', code: 'PAYLOAD_TOO_LARGE' })
  })

  it('lists validation issues for bad metadata', async () => {
    const token = await login()
    const res = await uploadRequest(token, { year: '2', semester: '1' })
      .attach('files', Buffer.from('%PDF'), 'a.pdf')
      .expect(400)

    expect(res.body).toEqual({
      error: 'Please fill all fields correctly.',
      code: 'VALIDATION_FAILED',
      issues: ['Semester must be one of 3, 4 for year 2']
    })
  })

  it('suggests subjects and describes course years', async () => {
    const token = await login()
    await uploadRequest(token).attach('files', Buffer.from('%PDF'), 'p.pdf').expect(201)
    await uploadRequest(token, { subject: 'Algorithms', year: '2', semester: '3' })
      .attach('files', Buffer.from('%PDF'), 'a.pdf')
      .expect(201)

    await request(app).get('/api/subjects').expect(200, ['Algorithms', 'Physics'])
    await request(app).get('/api/subjects?year=1').expect(200, ['Physics'])
    const years = await request(app).get('/api/years').expect(200)
    expect(years.body[1]).toEqual({ year: 2, semesters: [3, 4] })
  })

  it('runs the consistency check for admins', async () => {
    const token = await login()
    await request(app).get('/api/admin/consistency').expect(401)
    await request(app)
      .get('/api/admin/consistency')
      .set('Authorization', `Bearer ${token}`)
      .expect(200, { orphanedRecords: [], orphanedFiles: [] })
  })

  it('surfaces a corrupt catalog document', async () => {
    await fsp.writeFile(path.join(dir, 'papers.json'), '{bad')
    const res = await request(app).get('/api/papers').expect(500)
    expect(res.body).toEqual({ error: 'Catalog document is corrupt: not valid JSON', code: 'STORE_CORRUPT' })
  })

  it('answers unknown API routes with NOT_FOUND', async () => {
    const res = await request(app).get('/api/nothing-here').expect(404)
    expect(res.body.code).toBe('NOT_FOUND')
  })

  it('mounts the API under a base path', async () => {
    app = build('/archive')
    await request(app).get('/archive/api/health').expect(200, { ok: true })
    await request(app).get('/api/health').expect(404)
  })
})

describe('errorHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('hands a failure after the headers went out to the next handler', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const forwarded: unknown[] = []
    const app = express()
    app.get('/partial', (_req: Request, res: Response, next: NextFunction) => {
      res.status(200).type('text/plain')
      res.write('partial')
      next(new Error('stream failed'))
    })
    app.use(errorHandler(1024))
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      forwarded.push(err)
      res.end()
    })

    const res = await request(app).get('/partial')

    expect(res.status).toBe(200)
    expect(res.text).toBe('partial')
    expect(forwarded).toHaveLength(1)
    expect(console.error).not.toHaveBeenCalled()
  })

  it('answers with JSON while nothing has been sent', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const app = express()
    app.get('/boom', (_req: Request, _res: Response, next: NextFunction) => {
      next(new Error('boom'))
    })
    app.use(errorHandler(1024))

    const res = await request(app).get('/boom').expect(500)

    expect(res.body).toEqual({ error: 'Server error', code: 'INTERNAL' })
  })
})
