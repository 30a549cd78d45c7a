import { EXAM_TYPES, type ExamType, type PaperFilter } from '../types'

function positiveInt(value: string | null): number | undefined {
  if (!value || !/^\d+$/.test(value.trim())) return undefined
  const parsed = Number(value.trim())
  return parsed > 0 ? parsed : undefined
}

function asExamType(value: string | null): ExamType | undefined {
  return EXAM_TYPES.find((type) => type === value)
}

export function filterFromSearch(params: URLSearchParams): PaperFilter {
  const filter: PaperFilter = {}
  const year = positiveInt(params.get('year'))
  const semester = positiveInt(params.get('semester'))
  const subject = params.get('subject')?.trim()
  const examType = asExamType(params.get('examType'))
  if (year !== undefined) filter.year = year
  if (semester !== undefined) filter.semester = semester
  if (subject) filter.subject = subject
  if (examType) filter.examType = examType
  return filter
}

export function hasFilters(filter: PaperFilter): boolean {
  return Object.values(filter).some((value) => value !== undefined)
}

/**
 * Applies one change to a filter. Changing the year drops a semester that
 * does not belong to it.
 */
export function updateFilter(
  filter: PaperFilter,
  change: Partial<Record<keyof PaperFilter, string>>,
  semestersForYear: (year: number) => number[]
): PaperFilter {
  const params = new URLSearchParams()
  const merged: Record<string, string | undefined> = {
    year: filter.year?.toString(),
    semester: filter.semester?.toString(),
    subject: filter.subject,
    examType: filter.examType,
    ...change
  }
  for (const [key, value] of Object.entries(merged)) {
    if (value) params.set(key, value)
  }
  const next = filterFromSearch(params)
  if (next.year !== undefined && next.semester !== undefined && !semestersForYear(next.year).includes(next.semester)) {
    delete next.semester
  }
  return next
}
