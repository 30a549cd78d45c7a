export type ExamType = 'Mid' | 'End'

export const EXAM_TYPES: readonly ExamType[] = ['Mid', 'End']

export type PaperItem = {
  id: string
  subject: string
  year: number
  semester: number
  examType: ExamType
  examYear: number
  academicYear: string | null
  originalFilename: string
  filePath: string
  sizeBytes: number
  uploadedAt: string
}

export type PaperFilter = {
  subject?: string
  year?: number
  semester?: number
  examType?: ExamType
}

export type YearOverview = {
  year: number
  semesters: number[]
}

export type AdminSession = {
  token: string
  expiresAt: string
}

export type ConsistencyReport = {
  orphanedRecords: PaperItem[]
  orphanedFiles: string[]
}
