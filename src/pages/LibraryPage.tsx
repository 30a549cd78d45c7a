import { useCallback, useEffect, useMemo, useState } from 'react'
import { Link, useSearchParams } from 'react-router-dom'
import EmptyState from '../components/EmptyState'
import { useFlash } from '../components/flashContext'
import { fetchPapers, fetchSubjects, fetchYears, filterToSearch, paperFileUrl } from '../lib/api'
import { filterFromSearch, hasFilters, updateFilter } from '../lib/filters'
import { examTypeLabel, formatBytes, formatDate, formatExamYear, ordinal } from '../lib/format'
import { EXAM_TYPES, type PaperFilter, type PaperItem, type YearOverview } from '../types'

export default function LibraryPage() {
  const { flash } = useFlash()
  const [searchParams, setSearchParams] = useSearchParams()
  const filter = useMemo(() => filterFromSearch(searchParams), [searchParams])
  const [papers, setPapers] = useState<PaperItem[]>([])
  const [years, setYears] = useState<YearOverview[]>([])
  const [subjects, setSubjects] = useState<string[]>([])
  const [isLoading, setIsLoading] = useState(true)
  const [subjectDraft, setSubjectDraft] = useState(filter.subject ?? '')

  const semestersFor = useCallback(
    (year: number) => years.find((entry) => entry.year === year)?.semesters ?? [],
    [years]
  )

  const applyFilter = useCallback(
    (next: PaperFilter) => setSearchParams(filterToSearch(next)),
    [setSearchParams]
  )

  const change = useCallback(
    (patch: Partial<Record<keyof PaperFilter, string>>) => applyFilter(updateFilter(filter, patch, semestersFor)),
    [applyFilter, filter, semestersFor]
  )

  useEffect(() => {
    fetchYears()
      .then(setYears)
      .catch((error: unknown) => flash(error instanceof Error ? error.message : 'Failed to load years', 'danger'))
  }, [flash])

  useEffect(() => {
    setSubjectDraft(filter.subject ?? '')
  }, [filter.subject])

  useEffect(() => {
    let active = true
    setIsLoading(true)
    Promise.all([fetchPapers(filter), fetchSubjects({ year: filter.year, semester: filter.semester })])
      .then(([nextPapers, nextSubjects]) => {
        if (!active) return
        setPapers(nextPapers)
        setSubjects(nextSubjects)
      })
      .catch((error: unknown) => {
        if (active) flash(error instanceof Error ? error.message : 'Failed to load papers', 'danger')
      })
      .finally(() => {
        if (active) setIsLoading(false)
      })
    return () => {
      active = false
    }
  }, [filter, flash])

  const semesterOptions = filter.year !== undefined ? semestersFor(filter.year) : years.flatMap((entry) => entry.semesters)
  const totalBytes = useMemo(() => papers.reduce((sum, paper) => sum + paper.sizeBytes, 0), [papers])

  return (
    <div className="library-page">
      <section className="library-panel">
        <div className="library-header">
          <div>
            <h2>Question papers</h2>
            <p>
              {papers.length} paper{papers.length === 1 ? '' : 's'} found · {formatBytes(totalBytes)}
            </p>
          </div>
          <form
            className="library-controls"
            onSubmit={(event) => {
              event.preventDefault()
              change({ subject: subjectDraft })
            }}
          >
            <label className="field field-inline">
              <span>Year</span>
              <select value={filter.year ?? ''} onChange={(event) => change({ year: event.target.value })}>
                <option value="">Any</option>
                {years.map((entry) => (
                  <option key={entry.year} value={entry.year}>
                    {ordinal(entry.year)} year
                  </option>
                ))}
              </select>
            </label>
            <label className="field field-inline">
              <span>Semester</span>
              <select value={filter.semester ?? ''} onChange={(event) => change({ semester: event.target.value })}>
                <option value="">Any</option>
                {semesterOptions.map((semester) => (
                  <option key={semester} value={semester}>
                    Semester {semester}
                  </option>
                ))}
              </select>
            </label>
            <label className="field field-inline">
              <span>Subject</span>
              <input
                type="search"
                list="subject-options"
                placeholder="Any subject"
                value={subjectDraft}
                onChange={(event) => setSubjectDraft(event.target.value)}
                onBlur={() => {
                  if ((filter.subject ?? '') !== subjectDraft.trim()) change({ subject: subjectDraft })
                }}
              />
              <datalist id="subject-options">
                {subjects.map((subject) => (
                  <option key={subject} value={subject} />
                ))}
              </datalist>
            </label>
            <label className="field field-inline">
              <span>Exam</span>
              <select value={filter.examType ?? ''} onChange={(event) => change({ examType: event.target.value })}>
                <option value="">Any</option>
                {EXAM_TYPES.map((examType) => (
                  <option key={examType} value={examType}>
                    {examTypeLabel(examType)}
                  </option>
                ))}
              </select>
            </label>
            {hasFilters(filter) ? (
              <button type="button" className="btn btn-ghost btn-compact" onClick={() => applyFilter({})}>
                Clear
              </button>
            ) : null}
          </form>
        </div>

        {isLoading ? (
          <div className="loading">Loading papers…</div>
        ) : papers.length === 0 ? (
          <EmptyState filtered={hasFilters(filter)} onReset={() => applyFilter({})} />
        ) : (
          <div className="library-grid">
            {papers.map((paper) => (
              <Link key={paper.id} to={`/papers/${paper.id}`} className="paper-card">
                <div className="paper-body">
                  <div className="paper-badges">
                    <span className={`tag tag-${paper.examType.toLowerCase()}`}>{examTypeLabel(paper.examType)}</span>
                    <span className="tag tag-muted">{formatExamYear(paper)}</span>
                  </div>
                  <h3>{paper.subject}</h3>
                  <p className="paper-meta">
                    {ordinal(paper.year)} year · Semester {paper.semester}
                  </p>
                  <p className="paper-meta paper-filename">{paper.originalFilename}</p>
                </div>
                <div className="paper-footer">
                  <span>{formatDate(paper.uploadedAt)}</span>
                  <span>{formatBytes(paper.sizeBytes)}</span>
                  <a
                    className="btn btn-ghost btn-compact"
                    href={paperFileUrl(paper.id, true)}
                    onClick={(event) => event.stopPropagation()}
                  >
                    Download
                  </a>
                </div>
              </Link>
            ))}
          </div>
        )}
      </section>
    </div>
  )
}
