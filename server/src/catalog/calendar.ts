export const COURSE_YEARS = [1, 2, 3, 4] as const

const SEMESTERS_BY_YEAR: Record<number, number[]> = {
  1: [1, 2],
  2: [3, 4],
  3: [5, 6],
  4: [7, 8]
}

export function yearToSemesters(year: number): number[] {
  return [...(SEMESTERS_BY_YEAR[year] ?? [])]
}

export type ExamYear = {
  examYear: number
  academicYear: string | null
}

/**
 * Accepts `2024`, `2024-25` or `2024-2025` (en and em dashes too, spaces
 * ignored). `examYear` is the start year and is what results sort on.
 */
export function parseExamYear(value: string | undefined | null): ExamYear | null {
  const s = (value ?? '').trim().replace(/[–—]/g, '-').replace(/\s+/g, '')

  const single = /^(\d{4})$/.exec(s)
  if (single) return { examYear: Number(single[1]), academicYear: null }

  const range = /^(\d{4})-(\d{2}|\d{4})$/.exec(s)
  if (!range) return null

  const start = Number(range[1])
  const endPart = range[2]
  let end = endPart.length === 4 ? Number(endPart) : Math.floor(start / 100) * 100 + Number(endPart)
  if (end < start) end = start + 1
  return { examYear: start, academicYear: `${start}-${end}` }
}
