import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { BrowserRouter } from 'react-router-dom'
import './index.css'
import App from './App.tsx'
import { FlashProvider } from './components/FlashProvider.tsx'
import { SessionProvider } from './components/SessionProvider.tsx'

const container = document.getElementById('root')
if (!container) throw new Error('Missing #root element')

createRoot(container).render(
  <StrictMode>
    <BrowserRouter basename={import.meta.env.BASE_URL}>
      <FlashProvider>
        <SessionProvider>
          <App />
        </SessionProvider>
      </FlashProvider>
    </BrowserRouter>
  </StrictMode>,
)
