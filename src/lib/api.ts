import type { AdminSession, ConsistencyReport, PaperFilter, PaperItem, YearOverview } from '../types'

const baseUrl = import.meta.env.BASE_URL.replace(/\/$/, '')
export const apiBase = `${baseUrl}/api`

export class ApiError extends Error {
  readonly status: number
  readonly code: string
  readonly issues: string[]

  constructor(status: number, code: string, message: string, issues: string[] = []) {
    super(message)
    this.name = 'ApiError'
    this.status = status
    this.code = code
    this.issues = issues
  }
}

type ErrorBody = { error?: unknown; code?: unknown; issues?: unknown }

async function readError(res: Response, fallback: string): Promise<ApiError> {
  const body: ErrorBody = await res.json().catch(() => ({}))
  const message = typeof body.error === 'string' ? body.error : fallback
  const code = typeof body.code === 'string' ? body.code : 'INTERNAL'
  const issues = Array.isArray(body.issues) ? body.issues.filter((issue): issue is string => typeof issue === 'string') : []
  return new ApiError(res.status, code, message, issues)
}

function authHeaders(session: AdminSession): HeadersInit {
  return { Authorization: `Bearer ${session.token}` }
}

export function absoluteUrl(path: string): string {
  return new URL(path, window.location.origin).toString()
}

export function paperFileUrl(id: string, download = false): string {
  const suffix = download ? '?download=1' : ''
  return `${apiBase}/papers/${encodeURIComponent(id)}/file${suffix}`
}

export function filterToSearch(filter: PaperFilter): URLSearchParams {
  const params = new URLSearchParams()
  if (filter.year !== undefined) params.set('year', String(filter.year))
  if (filter.semester !== undefined) params.set('semester', String(filter.semester))
  if (filter.subject) params.set('subject', filter.subject)
  if (filter.examType) params.set('examType', filter.examType)
  return params
}

export async function fetchPapers(filter: PaperFilter = {}): Promise<PaperItem[]> {
  const params = filterToSearch(filter)
  params.set('sort', 'recent')
  const res = await fetch(`${apiBase}/papers?${params.toString()}`)
  if (!res.ok) throw await readError(res, 'Failed to load papers')
  return res.json()
}

export async function fetchPaper(id: string): Promise<PaperItem> {
  const res = await fetch(`${apiBase}/papers/${encodeURIComponent(id)}`)
  if (!res.ok) throw await readError(res, 'Paper not found')
  return res.json()
}

export async function fetchSubjects(scope: Pick<PaperFilter, 'year' | 'semester'> = {}): Promise<string[]> {
  const params = filterToSearch(scope)
  const res = await fetch(`${apiBase}/subjects?${params.toString()}`)
  if (!res.ok) throw await readError(res, 'Failed to load subjects')
  return res.json()
}

export async function fetchYears(): Promise<YearOverview[]> {
  const res = await fetch(`${apiBase}/years`)
  if (!res.ok) throw await readError(res, 'Failed to load years')
  return res.json()
}

export async function login(password: string): Promise<AdminSession> {
  const res = await fetch(`${apiBase}/session`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ password })
  })
  if (!res.ok) throw await readError(res, 'Login failed')
  return res.json()
}

export type UploadPayload = {
  files: File[]
  subject: string
  year: number
  semester: number
  examType: string
  examYear: string
}

export async function uploadPapers(session: AdminSession, payload: UploadPayload): Promise<PaperItem[]> {
  const formData = new FormData()
  formData.append('subject', payload.subject)
  formData.append('year', String(payload.year))
  formData.append('semester', String(payload.semester))
  formData.append('examType', payload.examType)
  formData.append('examYear', payload.examYear)
  for (const file of payload.files) formData.append('files', file, file.name)

  const res = await fetch(`${apiBase}/papers`, {
    method: 'POST',
    headers: authHeaders(session),
    body: formData
  })
  if (!res.ok) throw await readError(res, 'Upload failed')
  const body: { papers: PaperItem[] } = await res.json()
  return body.papers
}

export async function deletePaper(session: AdminSession, id: string): Promise<void> {
  const res = await fetch(`${apiBase}/papers/${encodeURIComponent(id)}`, {
    method: 'DELETE',
    headers: authHeaders(session)
  })
  if (!res.ok && res.status !== 204) throw await readError(res, 'Delete failed')
}

export async function fetchConsistency(session: AdminSession): Promise<ConsistencyReport> {
  const res = await fetch(`${apiBase}/admin/consistency`, { headers: authHeaders(session) })
  if (!res.ok) throw await readError(res, 'Consistency check failed')
  return res.json()
}
