// Reference catalog: the expected shape and content of every exported file

import * as fs from 'fs'
import { z } from 'zod'
import log from 'electron-log/node'
import type { CellSpec, ReferenceCatalog, ReferenceDefinition } from '../types'
import { parseCellSpec } from '../patterns'
import bundledCatalog from './reference-catalog.json'

export class CatalogError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message)
    this.name = 'CatalogError'
    this.issues = issues
  }
}

const RowCountSchema = z.number().int().nonnegative()

export const ReferenceEntrySchema = z
  .object({
    headers: z.array(z.string().min(1)).min(1),
    rows: z.array(z.array(z.string())).optional(),
    expectedRowCount: RowCountSchema.optional(),
    minRowCount: RowCountSchema.optional()
  })
  .strict()
  .superRefine((entry, ctx) => {
    entry.rows?.forEach((row, idx) => {
      if (row.length !== entry.headers.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', idx],
          message: `expected ${entry.headers.length} cells, got ${row.length}`
        })
      }
    })
    if (
      entry.expectedRowCount !== undefined &&
      entry.minRowCount !== undefined &&
      entry.minRowCount > entry.expectedRowCount
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minRowCount'],
        message: 'minRowCount cannot exceed expectedRowCount'
      })
    }
  })

export const CatalogFileSchema = z
  .object({
    version: z.literal(1),
    files: z.record(z.string().min(1), ReferenceEntrySchema)
  })
  .strict()

export function normalizeRelativePath(relPath: string): string {
  return relPath.replace(/\\/g, '/').replace(/^\.\//, '')
}

/**
 * Validate raw catalog data and build the immutable path → definition map.
 * Throws CatalogError when the data is malformed.
 */
export function buildCatalog(raw: unknown): ReferenceCatalog {
  const parsed = CatalogFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join(' > ') : '(root)'
      return `${where}: ${issue.message}`
    })
    throw new CatalogError('Malformed reference catalog', issues)
  }

  const catalog = new Map<string, ReferenceDefinition>()
  for (const [rawPath, entry] of Object.entries(parsed.data.files)) {
    const relPath = normalizeRelativePath(rawPath)
    if (catalog.has(relPath)) {
      throw new CatalogError('Malformed reference catalog', [`${rawPath}: duplicate path`])
    }

    const rows: ReadonlyArray<readonly CellSpec[]> | null = entry.rows
      ? Object.freeze(entry.rows.map(row => Object.freeze(row.map(parseCellSpec))))
      : null

    catalog.set(relPath, Object.freeze({
      path: relPath,
      headers: Object.freeze([...entry.headers]),
      rows,
      expectedRowCount: entry.expectedRowCount ?? null,
      minRowCount: entry.minRowCount ?? null
    }))
  }

  return catalog
}

/**
 * Load the catalog from a JSON file, or the bundled catalog when no path is given.
 */
export function loadCatalog(catalogPath?: string | null): ReferenceCatalog {
  if (!catalogPath) {
    const catalog = buildCatalog(bundledCatalog)
    log.info(`[CATALOG] Loaded ${catalog.size} bundled reference definitions`)
    return catalog
  }

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new CatalogError(`Could not read reference catalog ${catalogPath}`, [message])
  }

  const catalog = buildCatalog(raw)
  log.info(`[CATALOG] Loaded ${catalog.size} reference definitions from ${catalogPath}`)
  return catalog
}
