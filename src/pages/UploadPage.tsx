import { useEffect, useState } from 'react'
import { Link, useNavigate } from 'react-router-dom'
import UploadPanel from '../components/UploadPanel'
import { useFlash } from '../components/flashContext'
import { ApiError, fetchConsistency, fetchSubjects, fetchYears, filterToSearch } from '../lib/api'
import type { AdminSession, ConsistencyReport, PaperItem, YearOverview } from '../types'

type UploadPageProps = {
  session: AdminSession
  onSessionExpired: () => void
}

export default function UploadPage({ session, onSessionExpired }: UploadPageProps) {
  const navigate = useNavigate()
  const { flash } = useFlash()
  const [years, setYears] = useState<YearOverview[]>([])
  const [subjects, setSubjects] = useState<string[]>([])
  const [report, setReport] = useState<ConsistencyReport | null>(null)
  const [isChecking, setIsChecking] = useState(false)

  useEffect(() => {
    Promise.all([fetchYears(), fetchSubjects()])
      .then(([yearData, subjectData]) => {
        setYears(yearData)
        setSubjects(subjectData)
      })
      .catch((error: unknown) => {
        flash(error instanceof Error ? error.message : 'Failed to load form options', 'danger')
      })
  }, [flash])

  function handleUploaded(papers: PaperItem[]) {
    const first = papers[0]
    if (!first) return
    const params = filterToSearch({ year: first.year, semester: first.semester, subject: first.subject })
    navigate(`/?${params.toString()}`)
  }

  async function runConsistencyCheck() {
    setIsChecking(true)
    try {
      const result = await fetchConsistency(session)
      setReport(result)
      if (result.orphanedRecords.length === 0 && result.orphanedFiles.length === 0) {
        flash('Catalog and stored files agree.')
      }
    } catch (error) {
      if (error instanceof ApiError && error.code === 'UNAUTHORIZED') onSessionExpired()
      flash(error instanceof Error ? error.message : 'Consistency check failed', 'danger')
    } finally {
      setIsChecking(false)
    }
  }

  return (
    <div className="upload-page">
      <UploadPanel
        session={session}
        years={years}
        subjects={subjects}
        onUploaded={handleUploaded}
        onSessionExpired={onSessionExpired}
      />
      <section className="panel">
        <div className="panel-header">
          <div>
            <h2>Consistency check</h2>
            <p>Lists catalog entries without a stored file and stored files no entry points at.</p>
          </div>
          <button type="button" className="btn btn-ghost" onClick={runConsistencyCheck} disabled={isChecking}>
            {isChecking ? 'Checking…' : 'Run check'}
          </button>
        </div>
        {report ? (
          <div className="consistency-report">
            <h3>Entries missing their file ({report.orphanedRecords.length})</h3>
            {report.orphanedRecords.length > 0 ? (
              <ul className="file-list">
                {report.orphanedRecords.map((paper) => (
                  <li key={paper.id}>
                    <Link to={`/papers/${paper.id}`}>{paper.subject}</Link>
                    <span className="file-size">{paper.filePath}</span>
                  </li>
                ))}
              </ul>
            ) : null}
            <h3>Files without an entry ({report.orphanedFiles.length})</h3>
            {report.orphanedFiles.length > 0 ? (
              <ul className="file-list">
                {report.orphanedFiles.map((reference) => (
                  <li key={reference}>
                    <span>{reference}</span>
                  </li>
                ))}
              </ul>
            ) : null}
          </div>
        ) : null}
      </section>
    </div>
  )
}
