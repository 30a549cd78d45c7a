export const ACCEPTED_EXTENSIONS = ['pdf', 'jpg', 'jpeg', 'png'] as const

export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024

export type RejectedFile = {
  name: string
  reason: 'unsupported type' | 'too large'
}

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.')
  return dot === -1 ? '' : name.slice(dot + 1).toLowerCase()
}

export function isAcceptedName(name: string): boolean {
  const ext = extensionOf(name)
  return ACCEPTED_EXTENSIONS.some((allowed) => allowed === ext)
}

/** Splits picked files into ones the server will take and ones it would refuse. */
export function checkFiles<T extends Pick<File, 'name' | 'size'>>(
  files: readonly T[],
  maxBytes = MAX_UPLOAD_BYTES
): { accepted: T[]; rejected: RejectedFile[] } {
  const accepted: T[] = []
  const rejected: RejectedFile[] = []
  for (const file of files) {
    if (!isAcceptedName(file.name)) {
      rejected.push({ name: file.name, reason: 'unsupported type' })
    } else if (file.size > maxBytes) {
      rejected.push({ name: file.name, reason: 'too large' })
    } else {
      accepted.push(file)
    }
  }
  return { accepted, rejected }
}
