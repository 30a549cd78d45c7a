import os from 'os'
import path from 'path'
import { promises as fsp } from 'fs'
import type { PaperRecord } from '../types'

let counter = 0

export function makeRecord(overrides: Partial<PaperRecord> = {}): PaperRecord {
  counter += 1
  return {
    id: `00000000-0000-4000-8000-${String(counter).padStart(12, '0')}`,
    subject: 'Physics',
    year: 1,
    semester: 1,
    examType: 'Mid',
    examYear: 2023,
    academicYear: null,
    originalFilename: `paper-${counter}.pdf`,
    filePath: `1/1/Physics/Mid/paper-${counter}.pdf`,
    sizeBytes: 12,
    uploadedAt: '2024-03-01T10:00:00.000Z',
    ...overrides
  }
}

export async function makeTempDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), 'exam-archive-'))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fsp.rm(dir, { recursive: true, force: true })
}
