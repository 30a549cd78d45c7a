import { z } from 'zod'

export const EXAM_TYPES = ['Mid', 'End'] as const

export type ExamType = (typeof EXAM_TYPES)[number]

export const paperRecordSchema = z.object({
  id: z.string().min(1),
  subject: z.string().trim().min(1),
  year: z.number().int(),
  semester: z.number().int(),
  examType: z.enum(EXAM_TYPES),
  examYear: z.number().int(),
  academicYear: z.string().nullable(),
  originalFilename: z.string(),
  filePath: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
  uploadedAt: z.string().datetime({ offset: true })
})

export type PaperRecord = z.infer<typeof paperRecordSchema>

export const catalogDocumentSchema = z.array(paperRecordSchema)

export type CatalogFilter = {
  subject?: string
  year?: number
  semester?: number
  examType?: string
}

export type SubjectScope = {
  year?: number
  semester?: number
}

export type ConsistencyReport = {
  orphanedRecords: PaperRecord[]
  orphanedFiles: string[]
}
