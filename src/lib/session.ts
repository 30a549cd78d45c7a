import type { AdminSession } from '../types'

const SESSION_KEY = 'exam-archive-session'

type SessionStorage = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>

function isSession(value: unknown): value is AdminSession {
  if (typeof value !== 'object' || value === null) return false
  return (
    'token' in value &&
    typeof value.token === 'string' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'string'
  )
}

export function isExpired(session: AdminSession, now = Date.now()): boolean {
  const expiry = Date.parse(session.expiresAt)
  return Number.isNaN(expiry) || expiry <= now
}

export function readSession(storage: SessionStorage = window.localStorage, now = Date.now()): AdminSession | null {
  const raw = storage.getItem(SESSION_KEY)
  if (!raw) return null
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    storage.removeItem(SESSION_KEY)
    return null
  }
  if (!isSession(parsed) || isExpired(parsed, now)) {
    storage.removeItem(SESSION_KEY)
    return null
  }
  return parsed
}

export function writeSession(session: AdminSession, storage: SessionStorage = window.localStorage): void {
  storage.setItem(SESSION_KEY, JSON.stringify(session))
}

export function clearSession(storage: SessionStorage = window.localStorage): void {
  storage.removeItem(SESSION_KEY)
}
