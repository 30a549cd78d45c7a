import fs from 'fs'
import path from 'path'
import express from 'express'
import multer from 'multer'
import type { ErrorRequestHandler, Request, Response, NextFunction, RequestHandler } from 'express'
import type { FileFilterCallback } from 'multer'
import type { ServerConfig } from './config'
import type { SessionGate } from './auth/session'
import type { CatalogService } from './catalog/service'
import { parseCatalogFilter, sortForBrowsing } from './catalog/query'
import { sanitizeFilename, type FileRepository } from './store/fileRepository'
import { CatalogError, NotFound, PayloadTooLarge, UnsupportedType, ValidationFailed, isCatalogError } from './errors'

export type AppDeps = {
  config: Pick<ServerConfig, 'basePath' | 'maxUploadBytes' | 'clientDist'>
  service: CatalogService
  files: FileRepository
  gate: SessionGate
}

const MAX_FILES_PER_UPLOAD = 20

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>

function route(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next)
  }
}

function toCatalogError(err: unknown, maxUploadBytes: number): CatalogError {
  if (isCatalogError(err)) return err
  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') return new PayloadTooLarge(maxUploadBytes)
    return new ValidationFailed(err.message)
  }
  if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
    return new ValidationFailed('Malformed request body')
  }
  return new CatalogError('INTERNAL', 500, 'Server error', { cause: err })
}

/** JSON error replies; mounted after every route and the static client. */
export function errorHandler(maxUploadBytes: number): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, next: NextFunction) => {
    // a stream that failed after its headers went out can only be aborted
    if (res.headersSent) {
      next(err)
      return
    }
    const failure = toCatalogError(err, maxUploadBytes)
    if (failure.status >= 500) console.error(`[error] ${failure.code}`, err)
    const body: { error: string; code: string; issues?: string[] } = { error: failure.message, code: failure.code }
    if (failure instanceof ValidationFailed && failure.issues.length > 0) body.issues = failure.issues
    res.status(failure.status).json(body)
  }
}

export function createApp({ config, service, files, gate }: AppDeps): express.Express {
  const app = express()
  app.disable('x-powered-by')

  const API_BASE = `${config.basePath}/api`
  const requireAdmin = gate.requireAdmin()

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes, files: MAX_FILES_PER_UPLOAD },
    fileFilter: (_req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
      if (files.isAllowed(file.originalname)) return cb(null, true)
      return cb(new UnsupportedType(file.originalname))
    }
  })

  const api = express.Router()
  api.use(express.json({ limit: '64kb' }))
  api.use(express.urlencoded({ extended: false, limit: '64kb' }))

  api.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true })
  })

  api.get(
    '/papers',
    route(async (req, res) => {
      const records = await service.browse(parseCatalogFilter(req.query))
      res.json(req.query.sort === 'recent' ? sortForBrowsing(records) : records)
    })
  )

  api.get(
    '/papers/:id',
    route(async (req, res) => {
      res.json(await service.get(req.params.id))
    })
  )

  api.get(
    '/papers/:id/file',
    route(async (req, res) => {
      const file = await service.openFile(req.params.id)
      res.setHeader('Cache-Control', 'public, max-age=31536000, immutable')
      if (req.query.download === '1') {
        res.download(file.path, sanitizeFilename(file.filename))
        return
      }
      res.type(file.contentType)
      res.sendFile(file.path)
    })
  )

  api.get(
    '/subjects',
    route(async (req, res) => {
      const { year, semester } = parseCatalogFilter(req.query)
      res.json(await service.subjects({ year, semester }))
    })
  )

  api.get('/years', (_req: Request, res: Response) => {
    res.json(service.yearsOverview())
  })

  api.post('/session', (req: Request, res: Response) => {
    const password: unknown = req.body?.password
    res.status(201).json(gate.authenticate(password))
  })

  api.post(
    '/papers',
    requireAdmin,
    upload.array('files', MAX_FILES_PER_UPLOAD),
    route(async (req, res) => {
      const uploaded = Array.isArray(req.files) ? req.files : []
      const papers = await service.upload(
        req.body,
        uploaded.map((file) => ({ originalName: file.originalname, bytes: file.buffer }))
      )
      res.status(201).json({ papers })
    })
  )

  api.delete(
    '/papers/:id',
    requireAdmin,
    route(async (req, res) => {
      await service.delete(req.params.id)
      res.status(204).end()
    })
  )

  api.get(
    '/admin/consistency',
    requireAdmin,
    route(async (_req, res) => {
      res.json(await service.checkConsistency())
    })
  )

  api.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFound(`Route ${req.method} ${req.path}`))
  })

  app.use(API_BASE, api)

  if (fs.existsSync(config.clientDist)) {
    app.use(config.basePath || '/', express.static(config.clientDist, {
      setHeaders: (res, filePath) => {
        if (filePath.endsWith('.html')) {
          res.setHeader('Cache-Control', 'public, max-age=0')
        } else {
          res.setHeader('Cache-Control', 'public, max-age=31536000, immutable')
        }
      }
    }))
    app.get([config.basePath || '/', `${config.basePath}/*`], (_req: Request, res: Response) => {
      res.setHeader('Cache-Control', 'public, max-age=0')
      res.sendFile(path.join(config.clientDist, 'index.html'))
    })
  }

  app.use(errorHandler(config.maxUploadBytes))

  return app
}
