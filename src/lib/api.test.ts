import { afterEach, describe, expect, it, vi } from 'vitest'
import { ApiError, deletePaper, fetchPaper, fetchPapers, filterToSearch, paperFileUrl, uploadPapers } from './api'

const session = { token: 'test-token', expiresAt: '2099-01-01T00:00:00.000Z' }

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('filterToSearch', () => {
  it('skips unset fields', () => {
    expect(filterToSearch({ year: 2, examType: 'End' }).toString()).toBe('year=2&examType=End')
  })
})

describe('paperFileUrl', () => {
  it('adds the download flag when asked', () => {
    expect(paperFileUrl('abc')).toBe('/api/papers/abc/file')
    expect(paperFileUrl('abc', true)).toBe('/api/papers/abc/file?download=1')
  })
})

describe('fetchPapers', () => {
  it('requests the recent ordering with the filter', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse([]))
    vi.stubGlobal('fetch', fetchMock)

    await fetchPapers({ year: 2, subject: 'Physics' })

    expect(fetchMock).toHaveBeenCalledWith('/api/papers?year=2&subject=Physics&sort=recent')
  })
})

describe('fetchPaper', () => {
  it('turns an error body into an ApiError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(jsonResponse({ error: 'Paper x not found', code: 'NOT_FOUND' }, 404))
    )

    const error = await fetchPaper('x').catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ApiError)
    expect(error).toMatchObject({ status: 404, code: 'NOT_FOUND', message: 'Paper x not found', issues: [] })
  })

  it('falls back when the error body is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('bad gateway', { status: 502 })))

    const error = await fetchPaper('x').catch((err: unknown) => err)

    expect(error).toMatchObject({ status: 502, code: 'INTERNAL', message: 'Paper not found' })
  })
})

describe('uploadPapers', () => {
  it('posts the metadata and files with the admin token', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ papers: [] }, 201))
    vi.stubGlobal('fetch', fetchMock)

    const file = new File(['%PDF-1.4'], 'midterm.pdf', { type: 'application/pdf' })
    const papers = await uploadPapers(session, {
      files: [file],
      subject: 'Physics',
      year: 1,
      semester: 2,
      examType: 'Mid',
      examYear: '2024-25'
    })

    expect(papers).toEqual([])
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('/api/papers')
    expect(init.method).toBe('POST')
    expect(init.headers).toEqual({ Authorization: 'Bearer test-token' })
    const body: FormData = init.body
    expect(body.get('subject')).toBe('Physics')
    expect(body.get('semester')).toBe('2')
    expect(body.get('examYear')).toBe('2024-25')
    expect(body.getAll('files')).toHaveLength(1)
  })

  it('keeps validation issues from the server', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        jsonResponse(
          { error: 'Please fill all fields correctly.', code: 'VALIDATION_FAILED', issues: ['Subject is required', 7] },
          400
        )
      )
    )

    const error = await uploadPapers(session, {
      files: [],
      subject: '',
      year: 1,
      semester: 1,
      examType: 'Mid',
      examYear: '2024'
    }).catch((err: unknown) => err)

    expect(error).toMatchObject({ code: 'VALIDATION_FAILED', issues: ['Subject is required'] })
  })
})

describe('deletePaper', () => {
  it('resolves on 204', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 204 }))
    vi.stubGlobal('fetch', fetchMock)

    await expect(deletePaper(session, 'a b')).resolves.toBeUndefined()
    expect(fetchMock).toHaveBeenCalledWith('/api/papers/a%20b', {
      method: 'DELETE',
      headers: { Authorization: 'Bearer test-token' }
    })
  })
})
