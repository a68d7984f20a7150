import path from 'path'

/**
 * Throws when `filePath` resolves outside `dir`. Artifact references come back
 * from the job store, so they are checked before being read.
 */
export function assertPathWithinDir(dir: string, filePath: string): void {
  const resolvedDir = path.resolve(dir)
  const resolvedPath = path.resolve(filePath)
  if (resolvedPath !== resolvedDir && !resolvedPath.startsWith(resolvedDir + path.sep)) {
    throw new Error(`Path ${filePath} is outside ${dir}`)
  }
}
