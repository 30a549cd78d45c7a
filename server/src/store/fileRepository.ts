import crypto from 'crypto'
import path from 'path'
import { promises as fsp, type Dirent } from 'fs'
import { NameCollision, NotFound, UnsupportedType } from '../errors'
import { KeyedLock } from '../lib/lock'

export const ALLOWED_EXTENSIONS = ['pdf', 'jpg', 'jpeg', 'png'] as const

const CONTENT_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png'
}

export type StoredFile = {
  reference: string
  sizeBytes: number
  contentType: string
}

const MAX_NAME_LENGTH = 120

function safeStem(stem: string): string {
  return stem
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .replace(/^\.+/, '')
}

/**
 * Reduces an uploaded name to `[a-zA-Z0-9._-]`. The extension is kept whole
 * and only the stem is truncated. A stem with no letters or digits left
 * (e.g. a name written entirely in another script) becomes
 * `<fallback>-<hash>` so distinct originals stay distinct.
 */
export function sanitizeFilename(name: string, fallback = 'file'): string {
  const base = path.basename(name.replace(/\\/g, '/'))
  const dot = base.lastIndexOf('.')
  const rawExt = dot === -1 ? '' : base.slice(dot + 1)
  const hasExt = /^[a-zA-Z0-9]{1,16}$/.test(rawExt)
  const rawStem = hasExt ? base.slice(0, dot) : base
  const suffix = hasExt ? `.${rawExt}` : ''

  let stem = safeStem(rawStem)
  if (stem.length > 0 && !/[a-zA-Z0-9]/.test(stem)) {
    const digest = crypto.createHash('sha256').update(rawStem).digest('hex').slice(0, 8)
    stem = `${fallback}-${digest}`
  }
  if (stem.length === 0) stem = fallback
  return `${stem.slice(0, MAX_NAME_LENGTH - suffix.length)}${suffix}`
}

export function normalizeReference(reference: string): string {
  return reference.replace(/\\/g, '/').replace(/\/{2,}/g, '/').replace(/^\/+/, '')
}

export function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.')
  return dot === -1 ? '' : name.slice(dot + 1).toLowerCase()
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

/** Uploaded assets on disk, addressed by a path relative to `rootDir`. */
export class FileRepository {
  private readonly locks = new KeyedLock()
  private readonly allowed: ReadonlySet<string>

  constructor(
    private readonly rootDir: string,
    allowedExtensions: readonly string[] = ALLOWED_EXTENSIONS
  ) {
    this.allowed = new Set(allowedExtensions.map((ext) => ext.toLowerCase()))
  }

  get root(): string {
    return this.rootDir
  }

  async init(): Promise<void> {
    await fsp.mkdir(this.rootDir, { recursive: true })
  }

  isAllowed(filename: string): boolean {
    return this.allowed.has(extensionOf(filename))
  }

  assertAllowed(filename: string): void {
    if (!this.isAllowed(filename)) throw new UnsupportedType(filename)
  }

  contentTypeFor(filename: string): string {
    return CONTENT_TYPES[extensionOf(filename)] ?? 'application/octet-stream'
  }

  /**
   * Writes `bytes` under `folder/<sanitized name>`. Never overwrites: an
   * existing file with the same resolved name fails with NameCollision.
   */
  async store(bytes: Uint8Array, suggestedName: string, folder: string[] = []): Promise<StoredFile> {
    this.assertAllowed(suggestedName)
    const segments = folder.map((segment) => sanitizeFilename(segment, '_'))
    const reference = [...segments, sanitizeFilename(suggestedName)].join('/')
    const target = this.resolvePath(reference)

    return this.locks.run(reference, async () => {
      await fsp.mkdir(path.dirname(target), { recursive: true })
      try {
        await fsp.writeFile(target, bytes, { flag: 'wx' })
      } catch (err) {
        if (isErrno(err, 'EEXIST')) throw new NameCollision(reference)
        throw err
      }
      return {
        reference,
        sizeBytes: bytes.byteLength,
        contentType: this.contentTypeFor(reference)
      }
    })
  }

  async retrieve(reference: string): Promise<Buffer> {
    const target = await this.resolve(reference)
    return fsp.readFile(target)
  }

  /** Absolute path of an existing asset, for streaming responses. */
  async resolve(reference: string): Promise<string> {
    const target = this.resolveOrNotFound(reference)
    try {
      const stat = await fsp.stat(target)
      if (!stat.isFile()) throw new NotFound(`File ${reference}`)
    } catch (err) {
      if (isErrno(err, 'ENOENT')) throw new NotFound(`File ${reference}`)
      throw err
    }
    return target
  }

  async exists(reference: string): Promise<boolean> {
    try {
      await this.resolve(reference)
      return true
    } catch (err) {
      if (err instanceof NotFound) return false
      throw err
    }
  }

  delete(reference: string): Promise<void> {
    const normalized = normalizeReference(reference)
    const target = this.resolveOrNotFound(normalized)
    return this.locks.run(normalized, async () => {
      try {
        await fsp.unlink(target)
      } catch (err) {
        if (isErrno(err, 'ENOENT')) throw new NotFound(`File ${normalized}`)
        throw err
      }
    })
  }

  /** Every stored reference, sorted. */
  async list(): Promise<string[]> {
    const found: string[] = []
    const walk = async (dir: string, prefix: string): Promise<void> => {
      let entries: Dirent[]
      try {
        entries = await fsp.readdir(dir, { withFileTypes: true })
      } catch (err) {
        if (isErrno(err, 'ENOENT')) return
        throw err
      }
      for (const entry of entries) {
        const reference = prefix ? `${prefix}/${entry.name}` : entry.name
        if (entry.isDirectory()) {
          await walk(path.join(dir, entry.name), reference)
        } else if (entry.isFile()) {
          found.push(reference)
        }
      }
    }
    await walk(this.rootDir, '')
    return found.sort()
  }

  private resolvePath(reference: string): string {
    const base = path.resolve(this.rootDir)
    const resolved = path.resolve(base, normalizeReference(reference))
    if (resolved === base || !resolved.startsWith(base + path.sep)) {
      throw new Error('Invalid path')
    }
    return resolved
  }

  private resolveOrNotFound(reference: string): string {
    try {
      return this.resolvePath(reference)
    } catch {
      throw new NotFound(`File ${normalizeReference(reference)}`)
    }
  }
}
