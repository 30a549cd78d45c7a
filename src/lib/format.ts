import type { PaperItem } from '../types'

export function formatBytes(bytes: number): string {
  if (bytes <= 0 || Number.isNaN(bytes)) return '0 B'
  const units = ['B', 'KB', 'MB', 'GB']
  const idx = Math.min(units.length - 1, Math.floor(Math.log(bytes) / Math.log(1024)))
  const value = bytes / Math.pow(1024, idx)
  return `${value.toFixed(value >= 10 || idx === 0 ? 0 : 1)} ${units[idx]}`
}

export function formatDate(iso: string): string {
  const date = new Date(iso)
  if (Number.isNaN(date.getTime())) return 'Unknown'
  return date.toLocaleDateString(undefined, {
    year: 'numeric',
    month: 'short',
    day: 'numeric'
  })
}

export function formatExamYear(paper: Pick<PaperItem, 'examYear' | 'academicYear'>): string {
  return paper.academicYear ?? String(paper.examYear)
}

const ordinalSuffixes: Record<string, string> = { one: 'st', two: 'nd', few: 'rd', other: 'th' }
const ordinalRules = new Intl.PluralRules('en-US', { type: 'ordinal' })

export function ordinal(value: number): string {
  return `${value}${ordinalSuffixes[ordinalRules.select(value)] ?? 'th'}`
}

export function examTypeLabel(examType: string): string {
  if (examType === 'Mid') return 'Mid-semester'
  if (examType === 'End') return 'End-semester'
  return examType
}

export function isPdf(paper: Pick<PaperItem, 'filePath'>): boolean {
  return paper.filePath.toLowerCase().endsWith('.pdf')
}
