import type { CatalogFilter, PaperRecord, SubjectScope } from '../types'

function firstString(value: unknown): string {
  if (Array.isArray(value)) return firstString(value[0])
  return typeof value === 'string' ? value.trim() : ''
}

function optionalInt(value: unknown): number | undefined {
  const raw = firstString(value)
  if (!/^-?\d+$/.test(raw)) return undefined
  return Number(raw)
}

function normalizeSubject(subject: string): string {
  return subject.trim().toLowerCase()
}

/**
 * Builds a filter from query-string values. Blank fields are left out;
 * year and semester values that are not integers are dropped rather than
 * rejected.
 */
export function parseCatalogFilter(query: Record<string, unknown>): CatalogFilter {
  const filter: CatalogFilter = {}
  const subject = firstString(query.subject)
  const examType = firstString(query.examType) || firstString(query.exam_type)
  const year = optionalInt(query.year)
  const semester = optionalInt(query.semester)

  if (subject) filter.subject = subject
  if (examType) filter.examType = examType
  if (year !== undefined) filter.year = year
  if (semester !== undefined) filter.semester = semester
  return filter
}

export function matchesFilter(record: PaperRecord, filter: CatalogFilter): boolean {
  if (filter.year !== undefined && record.year !== filter.year) return false
  if (filter.semester !== undefined && record.semester !== filter.semester) return false
  if (filter.subject !== undefined && normalizeSubject(record.subject) !== normalizeSubject(filter.subject)) {
    return false
  }
  if (filter.examType !== undefined && record.examType !== filter.examType) return false
  return true
}

/** Records matching every present filter field, in stored order. */
export function queryCatalog(catalog: readonly PaperRecord[], filter: CatalogFilter = {}): PaperRecord[] {
  return catalog.filter((record) => matchesFilter(record, filter))
}

export function listSubjects(catalog: readonly PaperRecord[], scope: SubjectScope = {}): string[] {
  const subjects = new Set<string>()
  for (const record of catalog) {
    if (scope.year !== undefined && record.year !== scope.year) continue
    if (scope.semester !== undefined && record.semester !== scope.semester) continue
    subjects.add(record.subject)
  }
  return [...subjects].sort((a, b) => a.localeCompare(b))
}

/** Newest exam year first, then subject, then exam type. */
export function sortForBrowsing(records: readonly PaperRecord[]): PaperRecord[] {
  return [...records].sort(
    (a, b) =>
      b.examYear - a.examYear || a.subject.localeCompare(b.subject) || a.examType.localeCompare(b.examType)
  )
}
