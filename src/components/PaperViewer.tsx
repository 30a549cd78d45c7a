import { useEffect, useRef, useState } from 'react'
import type { PDFDocumentProxy } from 'pdfjs-dist'
import { openPdf, renderPage } from '../lib/pdf'

type PaperViewerProps = {
  fileUrl: string
  kind: 'pdf' | 'image'
  title: string
}

export default function PaperViewer({ fileUrl, kind, title }: PaperViewerProps) {
  return (
    <section className="paper-viewer">
      <div className="viewer-header">
        <h3>Preview</h3>
      </div>
      {kind === 'pdf' ? <PdfPages pdfUrl={fileUrl} /> : <img className="viewer-image" src={fileUrl} alt={title} />}
    </section>
  )
}

function PdfPages({ pdfUrl }: { pdfUrl: string }) {
  const containerRef = useRef<HTMLDivElement | null>(null)
  const [doc, setDoc] = useState<PDFDocumentProxy | null>(null)
  const [pageNumber, setPageNumber] = useState(1)
  const [width, setWidth] = useState(800)
  const [error, setError] = useState<string | null>(null)
  const [isRendering, setIsRendering] = useState(false)

  useEffect(() => {
    const container = containerRef.current
    if (!container) return
    const observer = new ResizeObserver((entries) => {
      for (const entry of entries) {
        if (entry.contentRect.width > 0) setWidth(entry.contentRect.width)
      }
    })
    observer.observe(container)
    return () => observer.disconnect()
  }, [])

  useEffect(() => {
    let active = true
    let opened: PDFDocumentProxy | null = null
    setDoc(null)
    setError(null)
    setPageNumber(1)
    openPdf(pdfUrl)
      .then((loaded) => {
        opened = loaded
        if (active) setDoc(loaded)
        else void loaded.destroy()
      })
      .catch((err: unknown) => {
        if (active) setError(err instanceof Error ? err.message : 'Failed to load PDF')
      })
    return () => {
      active = false
      if (opened) void opened.destroy()
    }
  }, [pdfUrl])

  useEffect(() => {
    const container = containerRef.current
    if (!doc || !container) return
    let active = true
    setIsRendering(true)
    renderPage(doc, pageNumber, width)
      .then((canvas) => {
        if (!active) return
        container.replaceChildren(canvas)
      })
      .catch((err: unknown) => {
        if (active) setError(err instanceof Error ? err.message : 'Failed to render page')
      })
      .finally(() => {
        if (active) setIsRendering(false)
      })
    return () => {
      active = false
    }
  }, [doc, pageNumber, width])

  const pageCount = doc?.numPages ?? 0

  return (
    <div className="pdf-pages">
      <div className="pdf-toolbar">
        <button
          type="button"
          className="btn btn-ghost btn-compact"
          onClick={() => setPageNumber((n) => Math.max(1, n - 1))}
          disabled={pageNumber <= 1 || isRendering}
        >
          Previous
        </button>
        <span className="pdf-status">
          {error ? error : pageCount > 0 ? `Page ${pageNumber} of ${pageCount}` : 'Loading…'}
        </span>
        <button
          type="button"
          className="btn btn-ghost btn-compact"
          onClick={() => setPageNumber((n) => Math.min(pageCount, n + 1))}
          disabled={pageNumber >= pageCount || isRendering}
        >
          Next
        </button>
      </div>
      <div ref={containerRef} className="pdf-canvas" />
    </div>
  )
}
