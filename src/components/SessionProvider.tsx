import { useCallback, useEffect, useMemo, useState } from 'react'
import { login } from '../lib/api'
import { clearSession, readSession, writeSession } from '../lib/session'
import { SessionContext } from './sessionContext'
import type { AdminSession } from '../types'

const MAX_TIMER_MS = 2 ** 31 - 1

export function SessionProvider({ children }: { children: React.ReactNode }) {
  const [session, setSession] = useState<AdminSession | null>(() => readSession())

  // drop the grant in this tab once the server would refuse it
  useEffect(() => {
    if (!session) return
    const remaining = Date.parse(session.expiresAt) - Date.now()
    const timer = window.setTimeout(() => {
      clearSession()
      setSession(null)
    }, Math.min(MAX_TIMER_MS, Math.max(0, remaining)))
    return () => window.clearTimeout(timer)
  }, [session])

  const signIn = useCallback(async (password: string) => {
    const grant = await login(password)
    writeSession(grant)
    setSession(grant)
  }, [])

  const signOut = useCallback(() => {
    clearSession()
    setSession(null)
  }, [])

  const value = useMemo(() => ({ session, signIn, signOut }), [session, signIn, signOut])

  return <SessionContext.Provider value={value}>{children}</SessionContext.Provider>
}
