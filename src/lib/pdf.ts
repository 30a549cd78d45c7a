import * as pdfjsLib from 'pdfjs-dist'
import type { PDFDocumentProxy } from 'pdfjs-dist'
import workerSrc from 'pdfjs-dist/build/pdf.worker.min.mjs?url'

let initialized = false

export function initPdfjs(): void {
  if (initialized) return
  pdfjsLib.GlobalWorkerOptions.workerSrc = workerSrc
  initialized = true
}

export async function openPdf(pdfUrl: string): Promise<PDFDocumentProxy> {
  initPdfjs()
  return pdfjsLib.getDocument({ url: pdfUrl }).promise
}

/** Scale that fits a page of `pageWidth` into `containerWidth`, within sane bounds. */
export function fitScale(pageWidth: number, containerWidth: number): number {
  return Math.max(0.5, Math.min(2.5, (containerWidth - 32) / pageWidth))
}

export async function renderPage(
  doc: PDFDocumentProxy,
  pageNumber: number,
  width: number
): Promise<HTMLCanvasElement> {
  const page = await doc.getPage(pageNumber)
  const viewport = page.getViewport({ scale: 1 })
  const scaledViewport = page.getViewport({ scale: fitScale(viewport.width, width) })

  const canvas = document.createElement('canvas')
  const ctx = canvas.getContext('2d')
  if (!ctx) throw new Error('Canvas not supported')
  canvas.width = Math.floor(scaledViewport.width)
  canvas.height = Math.floor(scaledViewport.height)

  await page.render({ canvasContext: ctx, viewport: scaledViewport }).promise
  page.cleanup()
  return canvas
}
