import { useEffect, useMemo, useState } from 'react'
import { Link, useNavigate, useParams } from 'react-router-dom'
import { ApiError, absoluteUrl, deletePaper, fetchPaper, paperFileUrl } from '../lib/api'
import { examTypeLabel, formatBytes, formatDate, formatExamYear, isPdf, ordinal } from '../lib/format'
import { useFlash } from '../components/flashContext'
import { useAdminSession } from '../components/sessionContext'
import ConfirmDialog from '../components/ConfirmDialog'
import PaperViewer from '../components/PaperViewer'
import type { PaperItem } from '../types'

export default function PaperPage() {
  const { id } = useParams<{ id: string }>()
  const navigate = useNavigate()
  const { flash } = useFlash()
  const { session, signOut } = useAdminSession()
  const [paper, setPaper] = useState<PaperItem | null>(null)
  const [isLoading, setIsLoading] = useState(true)
  const [showConfirm, setShowConfirm] = useState(false)
  const [isDeleting, setIsDeleting] = useState(false)

  useEffect(() => {
    if (!id) return
    setIsLoading(true)
    fetchPaper(id)
      .then((data) => setPaper(data))
      .catch((error: unknown) => {
        flash(error instanceof Error ? error.message : 'Paper not found', 'warning')
      })
      .finally(() => setIsLoading(false))
  }, [id, flash])

  const viewUrl = useMemo(() => (paper ? absoluteUrl(paperFileUrl(paper.id)) : ''), [paper])

  async function copyLink(value: string) {
    try {
      await navigator.clipboard.writeText(value)
      flash('Link copied to clipboard.')
    } catch {
      flash('Unable to copy link.', 'warning')
    }
  }

  async function handleDelete() {
    if (!paper || !session) return
    setIsDeleting(true)
    try {
      await deletePaper(session, paper.id)
      flash('Paper deleted.')
      navigate(`/?year=${paper.year}&semester=${paper.semester}`)
    } catch (error) {
      if (error instanceof ApiError && error.code === 'UNAUTHORIZED') signOut()
      if (error instanceof ApiError && error.code === 'PARTIAL_DELETE_FAILURE') {
        flash(`${error.message}. Run the consistency check from the upload page.`, 'warning')
        navigate('/')
        return
      }
      flash(error instanceof Error ? error.message : 'Delete failed', 'danger')
    } finally {
      setIsDeleting(false)
      setShowConfirm(false)
    }
  }

  if (isLoading) {
    return <div className="loading">Loading paper…</div>
  }

  if (!paper) {
    return (
      <div className="paper-empty">
        <p>Paper not found.</p>
        <Link to="/" className="btn btn-primary">
          Back to papers
        </Link>
      </div>
    )
  }

  return (
    <div className="paper-page">
      <section className="paper-header">
        <div>
          <Link to={`/?year=${paper.year}&semester=${paper.semester}`} className="link-muted">
            ← {ordinal(paper.year)} year, semester {paper.semester}
          </Link>
          <h1>{paper.subject}</h1>
          <p className="paper-subtitle">
            {examTypeLabel(paper.examType)} examination · {formatExamYear(paper)}
          </p>
        </div>
        <div className="paper-actions">
          <a className="btn btn-primary" href={paperFileUrl(paper.id, true)}>
            Download
          </a>
          <a className="btn btn-ghost" href={viewUrl} target="_blank" rel="noreferrer">
            Open
          </a>
          <button className="btn btn-ghost" type="button" onClick={() => copyLink(viewUrl)}>
            Copy link
          </button>
          {session ? (
            <button className="btn btn-danger" type="button" onClick={() => setShowConfirm(true)}>
              Delete
            </button>
          ) : null}
        </div>
      </section>

      <section className="paper-meta-panel">
        <p className="paper-meta-row">
          <span>File</span>
          <span>{paper.originalFilename}</span>
        </p>
        <p className="paper-meta-row">
          <span>Size</span>
          <span>{formatBytes(paper.sizeBytes)}</span>
        </p>
        <p className="paper-meta-row">
          <span>Uploaded</span>
          <span>{formatDate(paper.uploadedAt)}</span>
        </p>
      </section>

      <PaperViewer
        fileUrl={paperFileUrl(paper.id)}
        kind={isPdf(paper) ? 'pdf' : 'image'}
        title={`${paper.subject} ${paper.examType} ${formatExamYear(paper)}`}
      />

      <ConfirmDialog
        open={showConfirm}
        title="Delete paper"
        description="This removes the file and its catalog entry. This action cannot be undone."
        confirmLabel="Delete"
        busy={isDeleting}
        onConfirm={handleDelete}
        onCancel={() => setShowConfirm(false)}
      />
    </div>
  )
}
