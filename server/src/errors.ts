export type ErrorCode =
  | 'VALIDATION_FAILED'
  | 'UNAUTHORIZED'
  | 'INVALID_CREDENTIAL'
  | 'NOT_FOUND'
  | 'DUPLICATE_IDENTIFIER'
  | 'NAME_COLLISION'
  | 'PAYLOAD_TOO_LARGE'
  | 'UNSUPPORTED_TYPE'
  | 'STORE_CORRUPT'
  | 'PARTIAL_DELETE_FAILURE'
  | 'INTERNAL'

/**
 * Base class for every failure the catalog surfaces to callers. `code` is the
 * stable value clients switch on; `status` is the HTTP status it maps to.
 */
export class CatalogError extends Error {
  readonly code: ErrorCode
  readonly status: number

  constructor(code: ErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.status = status
  }
}

export class ValidationFailed extends CatalogError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_FAILED', 400, message)
    this.issues = issues
  }
}

export class Unauthorized extends CatalogError {
  constructor(message = 'Admin session required') {
    super('UNAUTHORIZED', 401, message)
  }
}

export class InvalidCredential extends CatalogError {
  constructor() {
    super('INVALID_CREDENTIAL', 401, 'Incorrect password')
  }
}

export class NotFound extends CatalogError {
  constructor(what: string) {
    super('NOT_FOUND', 404, `${what} not found`)
  }
}

export class DuplicateIdentifier extends CatalogError {
  constructor(id: string) {
    super('DUPLICATE_IDENTIFIER', 409, `A paper with id ${id} already exists`)
  }
}

export class NameCollision extends CatalogError {
  readonly reference: string

  constructor(reference: string) {
    super('NAME_COLLISION', 409, `A file named ${reference} already exists`)
    this.reference = reference
  }
}

export class PayloadTooLarge extends CatalogError {
  constructor(limitBytes: number) {
    const mb = limitBytes / 1024 / 1024
    const limit = mb >= 1 ? `${Math.round(mb)}MB` : `${Math.round(limitBytes / 1024)}KB`
    super('PAYLOAD_TOO_LARGE', 413, `File exceeds the ${limit} limit`)
  }
}

export class UnsupportedType extends CatalogError {
  readonly filename: string

  constructor(filename: string) {
    super('UNSUPPORTED_TYPE', 415, `Unsupported file type: ${filename}`)
    this.filename = filename
  }
}

export class StoreCorrupt extends CatalogError {
  constructor(detail: string, cause?: unknown) {
    super('STORE_CORRUPT', 500, `Catalog document is corrupt: ${detail}`, { cause })
  }
}

// The record is gone but its file could not be removed; checkConsistency
// reports the file as orphaned until someone cleans it up.
export class PartialDeleteFailure extends CatalogError {
  readonly id: string
  readonly orphanedFile: string

  constructor(id: string, orphanedFile: string, cause?: unknown) {
    super(
      'PARTIAL_DELETE_FAILURE',
      500,
      `Paper ${id} was removed from the catalog but its file ${orphanedFile} could not be deleted`,
      { cause }
    )
    this.id = id
    this.orphanedFile = orphanedFile
  }
}

export function isCatalogError(err: unknown): err is CatalogError {
  return err instanceof CatalogError
}
