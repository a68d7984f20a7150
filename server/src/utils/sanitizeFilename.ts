import path from 'path'

const SAFE_FILENAME_REGEX = /[^a-zA-Z0-9._\-\s]/g

/**
 * Reduce a name to a safe single path component: basename only, no NUL bytes or
 * separators, letters/digits/dot/dash/underscore/space. Falls back to `fallback`
 * when nothing is left.
 */
export function sanitizeFilename(originalName: string | undefined, fallback = 'file'): string {
  if (originalName == null) return fallback
  const base = path.basename(originalName.replace(/\0/g, '')).replace(/[/\\]/g, '')
  const safe = base.replace(SAFE_FILENAME_REGEX, '').replace(/\s+/g, ' ').trim()
  if (!safe || safe === '.' || safe === '..') return fallback
  return safe
}

/** File name without its extension, used as a document title. */
export function displayName(fileName: string): string {
  const base = path.basename(fileName)
  const ext = path.extname(base)
  return ext ? base.slice(0, -ext.length) : base
}
