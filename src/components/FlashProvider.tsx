import { useCallback, useMemo, useState } from 'react'
import { FlashContext, type Flash, type FlashTone } from './flashContext'

const FLASH_TIMEOUT_MS = 5000

export function FlashProvider({ children }: { children: React.ReactNode }) {
  const [messages, setMessages] = useState<Flash[]>([])

  const dismiss = useCallback((id: string) => {
    setMessages((prev) => prev.filter((entry) => entry.id !== id))
  }, [])

  const flash = useCallback(
    (message: string, tone: FlashTone = 'success') => {
      const id = crypto.randomUUID()
      setMessages((prev) => [...prev, { id, message, tone }])
      // warnings and errors stay until dismissed
      if (tone === 'success') window.setTimeout(() => dismiss(id), FLASH_TIMEOUT_MS)
    },
    [dismiss]
  )

  const value = useMemo(() => ({ flash, dismiss }), [flash, dismiss])

  return (
    <FlashContext.Provider value={value}>
      {children}
      <div className="flash-stack" role="status" aria-live="polite">
        {messages.map((entry) => (
          <div key={entry.id} className={`flash flash-${entry.tone}`}>
            <span>{entry.message}</span>
            <button type="button" className="flash-close" aria-label="Dismiss" onClick={() => dismiss(entry.id)}>
              ×
            </button>
          </div>
        ))}
      </div>
    </FlashContext.Provider>
  )
}
