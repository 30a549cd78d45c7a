import path from 'path'
import { describe, expect, it, vi } from 'vitest'
import { loadConfig, normalizeBasePath } from './config'

describe('normalizeBasePath', () => {
  it('adds a leading slash and drops a trailing one', () => {
    expect(normalizeBasePath('papers/')).toBe('/papers')
    expect(normalizeBasePath(' /archive ')).toBe('/archive')
    expect(normalizeBasePath('/')).toBe('')
    expect(normalizeBasePath(undefined)).toBe('')
  })
})

describe('loadConfig', () => {
  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      BASE_PATH: 'exams',
      DATA_DIR: '/srv/exams',
      UPLOAD_PASSWORD: 'test-password',
      SESSION_SECRET: 'test-secret',
      SESSION_TTL_SECONDS: '600',
      MAX_UPLOAD_BYTES: '1048576'
    })

    expect(config).toMatchObject({
      port: 8080,
      basePath: '/exams',
      dataDir: path.resolve('/srv/exams'),
      catalogFile: path.join(path.resolve('/srv/exams'), 'papers.json'),
      uploadsDir: path.join(path.resolve('/srv/exams'), 'uploads'),
      uploadPassword: 'test-password',
      sessionSecret: 'test-secret',
      sessionTtlSeconds: 600,
      maxUploadBytes: 1048576
    })
  })

  it('falls back to development defaults with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const config = loadConfig({})

    expect(config.port).toBe(3001)
    expect(config.uploadPassword).toBe('change-me')
    expect(config.sessionSecret).toHaveLength(64)
    expect(config.maxUploadBytes).toBe(50 * 1024 * 1024)
    expect(warn).toHaveBeenCalledWith('[config] UPLOAD_PASSWORD not set, using the development default')
    warn.mockRestore()
  })

  it('insists on secrets in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production', SESSION_SECRET: 'test-secret' })).toThrow(
      'UPLOAD_PASSWORD must be set in production'
    )
    expect(() => loadConfig({ NODE_ENV: 'production', UPLOAD_PASSWORD: 'test-password' })).toThrow(
      'SESSION_SECRET must be set in production'
    )
  })

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ UPLOAD_PASSWORD: 'x', SESSION_SECRET: 'y', PORT: 'eighty' })).toThrow(
      'PORT must be a positive integer, got "eighty"'
    )
  })
})
