import { useCallback, useRef, useState } from 'react'
import type { DragEvent } from 'react'
import { ACCEPTED_EXTENSIONS, MAX_UPLOAD_BYTES } from '../lib/uploads'

export type DropzoneProps = {
  disabled?: boolean
  onFiles: (files: File[]) => void
}

const accept = ACCEPTED_EXTENSIONS.map((ext) => `.${ext}`).join(',')

export default function Dropzone({ disabled = false, onFiles }: DropzoneProps) {
  const [isDragging, setIsDragging] = useState(false)
  const inputRef = useRef<HTMLInputElement | null>(null)

  const handleFiles = useCallback(
    (files: FileList | null) => {
      if (!files || files.length === 0) return
      onFiles(Array.from(files))
      if (inputRef.current) inputRef.current.value = ''
    },
    [onFiles]
  )

  const handleDrop = useCallback(
    (event: DragEvent<HTMLDivElement>) => {
      event.preventDefault()
      setIsDragging(false)
      if (disabled) return
      handleFiles(event.dataTransfer.files)
    },
    [disabled, handleFiles]
  )

  return (
    <div
      className={`dropzone ${isDragging ? 'is-dragging' : ''} ${disabled ? 'is-disabled' : ''}`}
      onDragOver={(event) => {
        event.preventDefault()
        if (!disabled) setIsDragging(true)
      }}
      onDragLeave={() => setIsDragging(false)}
      onDrop={handleDrop}
    >
      <input
        ref={inputRef}
        type="file"
        multiple
        accept={accept}
        className="dropzone-input"
        disabled={disabled}
        onChange={(event) => handleFiles(event.target.files)}
      />
      <div className="dropzone-content">
        <div>
          <p className="dropzone-title">Drop papers here or browse</p>
          <p className="dropzone-meta">
            PDF, JPG or PNG · up to {Math.round(MAX_UPLOAD_BYTES / 1024 / 1024)}MB each
          </p>
        </div>
        <button
          type="button"
          className="btn btn-primary"
          disabled={disabled}
          onClick={() => inputRef.current?.click()}
        >
          Choose files
        </button>
      </div>
    </div>
  )
}
