import 'dotenv/config'
import { loadConfig } from './config'
import { createApp } from './app'
import { SessionGate } from './auth/session'
import { CatalogService } from './catalog/service'
import { FileRepository } from './store/fileRepository'
import { RecordStore } from './store/recordStore'
import { healStoredPaths } from './startup'

const config = loadConfig()
const records = new RecordStore(config.catalogFile)
const files = new FileRepository(config.uploadsDir)
const service = new CatalogService(records, files)
const gate = new SessionGate({
  password: config.uploadPassword,
  secret: config.sessionSecret,
  ttlSeconds: config.sessionTtlSeconds
})

async function start(): Promise<void> {
  await records.init()
  await files.init()

  await healStoredPaths(records)

  const app = createApp({ config, service, files, gate })
  const server = app.listen(config.port, () => {
    console.log(`Exam paper archive running on http://localhost:${config.port}${config.basePath}`)
    console.log(`[startup] catalog: ${config.catalogFile}`)
    console.log(`[startup] uploads: ${config.uploadsDir}`)
  })

  const shutdown = (signal: string) => {
    console.log(`[shutdown] ${signal} received, closing`)
    server.close(() => {
      records
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('[shutdown] pending catalog write failed', err)
          process.exit(1)
        })
    })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

start().catch((err: unknown) => {
  console.error('[startup] failed', err)
  process.exit(1)
})
