import path from 'path'
import crypto from 'crypto'
import { fileURLToPath } from 'url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)
export const ROOT_DIR = path.resolve(__dirname, '../..')

export type ServerConfig = {
  port: number
  basePath: string
  dataDir: string
  catalogFile: string
  uploadsDir: string
  uploadPassword: string
  sessionSecret: string
  sessionTtlSeconds: number
  maxUploadBytes: number
  clientDist: string
}

const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024
const DEFAULT_SESSION_TTL_SECONDS = 8 * 60 * 60

export function normalizeBasePath(value?: string): string {
  if (!value) return ''
  let base = value.trim()
  if (!base) return ''
  if (!base.startsWith('/')) base = `/${base}`
  if (base.endsWith('/')) base = base.slice(0, -1)
  return base === '/' ? '' : base
}

function positiveInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`)
  }
  return parsed
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const production = env.NODE_ENV === 'production'
  const dataDir = env.DATA_DIR ? path.resolve(env.DATA_DIR) : path.join(ROOT_DIR, 'data')

  let uploadPassword = env.UPLOAD_PASSWORD ?? ''
  if (!uploadPassword) {
    if (production) throw new Error('UPLOAD_PASSWORD must be set in production')
    uploadPassword = 'change-me'
    console.warn('[config] UPLOAD_PASSWORD not set, using the development default')
  }

  let sessionSecret = env.SESSION_SECRET ?? ''
  if (!sessionSecret) {
    if (production) throw new Error('SESSION_SECRET must be set in production')
    sessionSecret = crypto.randomBytes(32).toString('hex')
  }

  return {
    port: positiveInt(env.PORT, 3001, 'PORT'),
    basePath: normalizeBasePath(env.BASE_PATH),
    dataDir,
    catalogFile: path.join(dataDir, 'papers.json'),
    uploadsDir: path.join(dataDir, 'uploads'),
    uploadPassword,
    sessionSecret,
    sessionTtlSeconds: positiveInt(env.SESSION_TTL_SECONDS, DEFAULT_SESSION_TTL_SECONDS, 'SESSION_TTL_SECONDS'),
    maxUploadBytes: positiveInt(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES, 'MAX_UPLOAD_BYTES'),
    clientDist: path.join(ROOT_DIR, 'dist')
  }
}
