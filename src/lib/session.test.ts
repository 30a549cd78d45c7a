import { describe, expect, it } from 'vitest'
import { clearSession, isExpired, readSession, writeSession } from './session'

function memoryStorage() {
  const items = new Map<string, string>()
  return {
    items,
    getItem: (key: string) => items.get(key) ?? null,
    setItem: (key: string, value: string) => {
      items.set(key, value)
    },
    removeItem: (key: string) => {
      items.delete(key)
    }
  }
}

const now = Date.parse('2025-03-01T12:00:00.000Z')

describe('admin session storage', () => {
  it('round-trips a live grant', () => {
    const storage = memoryStorage()
    const grant = { token: 'test-token', expiresAt: '2025-03-01T13:00:00.000Z' }

    writeSession(grant, storage)

    expect(readSession(storage, now)).toEqual(grant)
  })

  it('discards an expired grant', () => {
    const storage = memoryStorage()
    writeSession({ token: 'test-token', expiresAt: '2025-03-01T11:59:59.000Z' }, storage)

    expect(readSession(storage, now)).toBeNull()
    expect(storage.items.size).toBe(0)
  })

  it('discards unreadable data', () => {
    const storage = memoryStorage()
    storage.setItem('exam-archive-session', '{not json')
    expect(readSession(storage, now)).toBeNull()

    storage.setItem('exam-archive-session', JSON.stringify({ token: 42 }))
    expect(readSession(storage, now)).toBeNull()
    expect(storage.items.size).toBe(0)
  })

  it('clears on sign-out', () => {
    const storage = memoryStorage()
    writeSession({ token: 'test-token', expiresAt: '2025-03-01T13:00:00.000Z' }, storage)
    clearSession(storage)
    expect(readSession(storage, now)).toBeNull()
  })
})

describe('isExpired', () => {
  it('treats an unparseable expiry as expired', () => {
    expect(isExpired({ token: 't', expiresAt: 'soon' }, now)).toBe(true)
    expect(isExpired({ token: 't', expiresAt: '2025-03-02T00:00:00.000Z' }, now)).toBe(false)
  })
})
