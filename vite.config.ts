import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

const basePath = process.env.VITE_BASE_PATH ?? '/'
const normalizedBasePath = basePath.endsWith('/') ? basePath : `${basePath}/`
const apiTarget = process.env.VITE_API_TARGET ?? 'http://localhost:3001'

export default defineConfig({
  base: normalizedBasePath,
  plugins: [react()],
  server: {
    proxy: {
      [`${normalizedBasePath}api`]: apiTarget
    }
  }
})
