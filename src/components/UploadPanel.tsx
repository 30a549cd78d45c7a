import { useMemo, useState } from 'react'
import Dropzone from './Dropzone'
import { useFlash } from './flashContext'
import { ApiError, uploadPapers } from '../lib/api'
import { formatBytes, ordinal, examTypeLabel } from '../lib/format'
import { checkFiles } from '../lib/uploads'
import { EXAM_TYPES, type AdminSession, type PaperItem, type YearOverview } from '../types'

type UploadPanelProps = {
  session: AdminSession
  years: YearOverview[]
  subjects: string[]
  onUploaded: (papers: PaperItem[]) => void
  onSessionExpired: () => void
}

export default function UploadPanel({ session, years, subjects, onUploaded, onSessionExpired }: UploadPanelProps) {
  const { flash } = useFlash()
  const [files, setFiles] = useState<File[]>([])
  const [subject, setSubject] = useState('')
  const [year, setYear] = useState(1)
  const [semester, setSemester] = useState(1)
  const [examType, setExamType] = useState<string>('Mid')
  const [examYear, setExamYear] = useState(String(new Date().getFullYear()))
  const [isUploading, setIsUploading] = useState(false)
  const [issues, setIssues] = useState<string[]>([])

  const semesters = useMemo(() => years.find((entry) => entry.year === year)?.semesters ?? [], [years, year])
  const totalBytes = useMemo(() => files.reduce((sum, file) => sum + file.size, 0), [files])

  function handleFiles(picked: File[]) {
    const { accepted, rejected } = checkFiles(picked)
    if (rejected.length > 0) {
      flash(`Skipped ${rejected.map((file) => `${file.name} (${file.reason})`).join(', ')}`, 'warning')
    }
    setFiles((prev) => {
      const names = new Set(prev.map((file) => file.name))
      return [...prev, ...accepted.filter((file) => !names.has(file.name))]
    })
  }

  function handleYear(value: number) {
    setYear(value)
    const next = years.find((entry) => entry.year === value)?.semesters ?? []
    if (!next.includes(semester) && next.length > 0) setSemester(next[0])
  }

  async function handleUpload() {
    if (files.length === 0) return
    setIsUploading(true)
    setIssues([])
    try {
      const papers = await uploadPapers(session, {
        files,
        subject: subject.trim(),
        year,
        semester,
        examType,
        examYear: examYear.trim()
      })
      flash(`Uploaded ${papers.length} file(s) successfully.`)
      setFiles([])
      onUploaded(papers)
    } catch (error) {
      if (error instanceof ApiError) {
        if (error.code === 'UNAUTHORIZED') onSessionExpired()
        setIssues(error.issues)
      }
      flash(error instanceof Error ? error.message : 'Upload failed', 'danger')
    } finally {
      setIsUploading(false)
    }
  }

  return (
    <section className="panel">
      <div className="panel-header">
        <div>
          <h2>Upload papers</h2>
          <p>Every file in one upload shares the subject, semester and exam details below.</p>
        </div>
        <span className="panel-pill">Admin</span>
      </div>
      <div className="panel-grid">
        <div>
          <Dropzone onFiles={handleFiles} disabled={isUploading} />
          {files.length > 0 ? (
            <ul className="file-list">
              {files.map((file) => (
                <li key={file.name}>
                  <span>{file.name}</span>
                  <span className="file-size">{formatBytes(file.size)}</span>
                  <button
                    type="button"
                    className="btn btn-ghost btn-compact"
                    onClick={() => setFiles((prev) => prev.filter((entry) => entry !== file))}
                    disabled={isUploading}
                  >
                    Remove
                  </button>
                </li>
              ))}
            </ul>
          ) : null}
          <p className="panel-helper">
            {files.length === 0 ? 'No files selected.' : `${files.length} file(s) · ${formatBytes(totalBytes)}`}
          </p>
        </div>
        <div className="panel-form">
          <label className="field">
            <span>Subject</span>
            <input
              type="text"
              list="upload-subjects"
              placeholder="Engineering Mathematics"
              value={subject}
              onChange={(event) => setSubject(event.target.value)}
            />
            <datalist id="upload-subjects">
              {subjects.map((entry) => (
                <option key={entry} value={entry} />
              ))}
            </datalist>
          </label>
          <div className="field-row">
            <label className="field">
              <span>Year</span>
              <select value={year} onChange={(event) => handleYear(Number(event.target.value))}>
                {years.map((entry) => (
                  <option key={entry.year} value={entry.year}>
                    {ordinal(entry.year)} year
                  </option>
                ))}
              </select>
            </label>
            <label className="field">
              <span>Semester</span>
              <select value={semester} onChange={(event) => setSemester(Number(event.target.value))}>
                {semesters.map((entry) => (
                  <option key={entry} value={entry}>
                    Semester {entry}
                  </option>
                ))}
              </select>
            </label>
          </div>
          <div className="field-row">
            <label className="field">
              <span>Exam</span>
              <select value={examType} onChange={(event) => setExamType(event.target.value)}>
                {EXAM_TYPES.map((entry) => (
                  <option key={entry} value={entry}>
                    {examTypeLabel(entry)}
                  </option>
                ))}
              </select>
            </label>
            <label className="field">
              <span>Exam year</span>
              <input
                type="text"
                placeholder="2024 or 2024-25"
                value={examYear}
                onChange={(event) => setExamYear(event.target.value)}
              />
            </label>
          </div>
          {issues.length > 0 ? (
            <ul className="form-issues">
              {issues.map((issue) => (
                <li key={issue}>{issue}</li>
              ))}
            </ul>
          ) : null}
          <button
            type="button"
            className="btn btn-primary"
            onClick={handleUpload}
            disabled={files.length === 0 || !subject.trim() || isUploading}
          >
            {isUploading ? 'Uploading…' : 'Upload'}
          </button>
        </div>
      </div>
    </section>
  )
}
