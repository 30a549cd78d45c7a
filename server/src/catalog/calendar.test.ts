import { describe, expect, it } from 'vitest'
import { parseExamYear, yearToSemesters } from './calendar'

describe('yearToSemesters', () => {
  it('maps each course year to its two semesters', () => {
    expect(yearToSemesters(1)).toEqual([1, 2])
    expect(yearToSemesters(4)).toEqual([7, 8])
  })

  it('returns nothing for unknown years', () => {
    expect(yearToSemesters(0)).toEqual([])
    expect(yearToSemesters(5)).toEqual([])
  })
})

describe('parseExamYear', () => {
  it('accepts a single year', () => {
    expect(parseExamYear('2024')).toEqual({ examYear: 2024, academicYear: null })
  })

  it('expands a two-digit range end', () => {
    expect(parseExamYear('2024-25')).toEqual({ examYear: 2024, academicYear: '2024-2025' })
  })

  it('accepts full ranges written with dashes and spaces', () => {
    expect(parseExamYear('2023 – 2024')).toEqual({ examYear: 2023, academicYear: '2023-2024' })
    expect(parseExamYear('2023—2024')).toEqual({ examYear: 2023, academicYear: '2023-2024' })
  })

  it('bumps an end year earlier than the start', () => {
    expect(parseExamYear('2099-05')).toEqual({ examYear: 2099, academicYear: '2099-2100' })
    expect(parseExamYear('2024-2020')).toEqual({ examYear: 2024, academicYear: '2024-2025' })
  })

  it('returns null for anything else', () => {
    expect(parseExamYear('')).toBeNull()
    expect(parseExamYear(undefined)).toBeNull()
    expect(parseExamYear('24')).toBeNull()
    expect(parseExamYear('2024/25')).toBeNull()
  })
})
