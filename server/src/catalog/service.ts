import crypto from 'crypto'
import { z } from 'zod'
import { NotFound, PartialDeleteFailure, ValidationFailed } from '../errors'
import type { FileRepository } from '../store/fileRepository'
import { normalizeReference } from '../store/fileRepository'
import type { RecordStore } from '../store/recordStore'
import { EXAM_TYPES, type CatalogFilter, type ConsistencyReport, type PaperRecord, type SubjectScope } from '../types'
import { COURSE_YEARS, parseExamYear, yearToSemesters } from './calendar'
import { listSubjects, queryCatalog } from './query'

export type UploadFile = {
  originalName: string
  bytes: Uint8Array
}

export type PaperFile = {
  path: string
  filename: string
  contentType: string
}

export type YearOverview = {
  year: number
  semesters: number[]
}

const uploadMetadataSchema = z
  .object({
    subject: z.string({ required_error: 'Subject is required' }).trim().min(1, 'Subject is required'),
    year: z.coerce.number().int('Year must be a whole number'),
    semester: z.coerce.number().int('Semester must be a whole number'),
    examType: z.enum(EXAM_TYPES, { message: 'Exam type must be Mid or End' }),
    examYear: z.union([z.string(), z.number()]).transform(String)
  })
  .transform((value, ctx) => {
    if (yearToSemesters(value.year).length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['year'], message: 'Year must be between 1 and 4' })
    } else if (!yearToSemesters(value.year).includes(value.semester)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['semester'],
        message: `Semester must be one of ${yearToSemesters(value.year).join(', ')} for year ${value.year}`
      })
    }
    const parsed = parseExamYear(value.examYear)
    if (!parsed || parsed.examYear < 2000) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['examYear'],
        message: 'Exam year must look like 2024 or 2024-25'
      })
      return z.NEVER
    }
    return { ...value, examYear: parsed.examYear, academicYear: parsed.academicYear }
  })

export type UploadMetadata = z.infer<typeof uploadMetadataSchema>

export function parseUploadMetadata(input: unknown): UploadMetadata {
  const result = uploadMetadataSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message)
    throw new ValidationFailed('Please fill all fields correctly.', issues)
  }
  return result.data
}

/**
 * Upload, delete and browse flows over one RecordStore and one
 * FileRepository. Files are written before their record is appended, and
 * records are removed before their file is deleted, so the catalog never
 * points at a file that was never stored.
 */
export class CatalogService {
  constructor(
    private readonly records: RecordStore,
    private readonly files: FileRepository
  ) {}

  async browse(filter: CatalogFilter = {}): Promise<PaperRecord[]> {
    return queryCatalog(await this.records.load(), filter)
  }

  async get(id: string): Promise<PaperRecord> {
    const record = (await this.records.load()).find((entry) => entry.id === id)
    if (!record) throw new NotFound(`Paper ${id}`)
    return record
  }

  async openFile(id: string): Promise<PaperFile> {
    const record = await this.get(id)
    return {
      path: await this.files.resolve(record.filePath),
      filename: record.originalFilename,
      contentType: this.files.contentTypeFor(record.filePath)
    }
  }

  async subjects(scope: SubjectScope = {}): Promise<string[]> {
    return listSubjects(await this.records.load(), scope)
  }

  yearsOverview(): YearOverview[] {
    return COURSE_YEARS.map((year) => ({ year, semesters: yearToSemesters(year) }))
  }

  async upload(input: unknown, files: UploadFile[]): Promise<PaperRecord[]> {
    const meta = parseUploadMetadata(input)
    if (files.length === 0) throw new ValidationFailed('Please choose at least one file.')
    for (const file of files) this.files.assertAllowed(file.originalName)

    const folder = [String(meta.year), String(meta.semester), meta.subject, meta.examType]
    const created: PaperRecord[] = []
    const stored: string[] = []
    try {
      for (const file of files) {
        const saved = await this.files.store(file.bytes, file.originalName, folder)
        stored.push(saved.reference)
        const record = await this.records.append({
          id: crypto.randomUUID(),
          subject: meta.subject,
          year: meta.year,
          semester: meta.semester,
          examType: meta.examType,
          examYear: meta.examYear,
          academicYear: meta.academicYear,
          originalFilename: file.originalName,
          filePath: saved.reference,
          sizeBytes: saved.sizeBytes,
          uploadedAt: new Date().toISOString()
        })
        created.push(record)
      }
    } catch (err) {
      await this.rollback(created, stored)
      throw err
    }

    console.log(`[upload] stored ${created.length} paper(s) under ${folder.join('/')}`)
    return created
  }

  async delete(id: string): Promise<PaperRecord> {
    const removed = await this.records.remove(id)
    try {
      await this.files.delete(removed.filePath)
    } catch (err) {
      if (err instanceof NotFound) {
        console.warn(`[delete] file ${removed.filePath} for paper ${id} was already gone`)
        return removed
      }
      throw new PartialDeleteFailure(id, removed.filePath, err)
    }
    return removed
  }

  async checkConsistency(): Promise<ConsistencyReport> {
    const [records, storedFiles] = await Promise.all([this.records.load(), this.files.list()])
    const present = new Set(storedFiles)
    const referenced = new Set(records.map((record) => normalizeReference(record.filePath)))
    return {
      orphanedRecords: records.filter((record) => !present.has(normalizeReference(record.filePath))),
      orphanedFiles: storedFiles.filter((reference) => !referenced.has(reference))
    }
  }

  private async rollback(created: PaperRecord[], stored: string[]): Promise<void> {
    for (const record of created) {
      try {
        await this.records.remove(record.id)
      } catch (err) {
        console.error(`[upload] rollback could not remove record ${record.id}`, err)
      }
    }
    for (const reference of stored) {
      try {
        await this.files.delete(reference)
      } catch (err) {
        console.error(`[upload] rollback could not delete file ${reference}`, err)
      }
    }
  }
}
