import { createContext, useContext } from 'react'
import type { AdminSession } from '../types'

export type SessionContextValue = {
  session: AdminSession | null
  signIn: (password: string) => Promise<void>
  signOut: () => void
}

export const SessionContext = createContext<SessionContextValue | null>(null)

export function useAdminSession(): SessionContextValue {
  const ctx = useContext(SessionContext)
  if (!ctx) throw new Error('Session context missing')
  return ctx
}
