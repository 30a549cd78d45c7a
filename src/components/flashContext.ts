import { createContext, useContext } from 'react'

export type FlashTone = 'success' | 'warning' | 'danger'

export type Flash = {
  id: string
  message: string
  tone: FlashTone
}

export type FlashContextValue = {
  flash: (message: string, tone?: FlashTone) => void
  dismiss: (id: string) => void
}

export const FlashContext = createContext<FlashContextValue | null>(null)

export function useFlash(): FlashContextValue {
  const ctx = useContext(FlashContext)
  if (!ctx) throw new Error('Flash context missing')
  return ctx
}
