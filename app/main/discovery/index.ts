// Export directory discovery

import path from 'node:path'
import * as fs from 'fs'
import log from 'electron-log/node'

/**
 * Walk the export directory and return the relative paths of all CSV files,
 * using forward slashes and sorted so runs are repeatable.
 */
export function discoverExportFiles(baseDir: string): string[] {
  if (baseDir.trim() === '') {
    throw new Error('Export directory path is empty')
  }
  if (!fs.existsSync(baseDir) || !fs.statSync(baseDir).isDirectory()) {
    throw new Error(`Export directory not found: ${baseDir}`)
  }

  const found: string[] = []
  const pending: string[] = [baseDir]

  while (pending.length > 0) {
    const dir = pending.pop()
    if (dir === undefined) break

    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name)
      if (entry.isDirectory()) {
        pending.push(fullPath)
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.csv')) {
        found.push(path.relative(baseDir, fullPath).split(path.sep).join('/'))
      }
    }
  }

  found.sort()
  log.verbose(`[VERIFY] Discovered ${found.length} CSV files under ${baseDir}`)
  return found
}
