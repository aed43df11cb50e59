const ALLOWED_EXTENSIONS = new Set(['png', 'jpg', 'jpeg', 'gif'])

export const allowedFile = (filename: string): boolean => {
  const dot = filename.lastIndexOf('.')
  if (dot === -1) return false

  return ALLOWED_EXTENSIONS.has(filename.slice(dot + 1).toLowerCase())
}

/**
 * Appends `_1`, `_2`, ... before the extension until the name is not taken.
 */
export const uniqueFilename = (filename: string, taken: ReadonlySet<string>): string => {
  if (!taken.has(filename)) return filename

  const dot = filename.lastIndexOf('.')
  const stem = dot > 0 ? filename.slice(0, dot) : filename
  const extension = dot > 0 ? filename.slice(dot) : ''

  let counter = 1
  while (taken.has(`${stem}_${counter}${extension}`)) counter++

  return `${stem}_${counter}${extension}`
}

/**
 * Reduces an uploaded filename to a flat, ASCII-only name that is safe to
 * join onto a directory. May return an empty string.
 */
export const secureFilename = (filename: string): string => {
  const ascii = filename
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .replace(/[/\\]/g, ' ')

  return ascii
    .split(/\s+/)
    .filter(Boolean)
    .join('_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '')
}
