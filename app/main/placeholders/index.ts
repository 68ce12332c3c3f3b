// Placeholder / pseudo-blank detection
//
// These catch values that *look* like they were meant to be blank or are
// serialisation artefacts rather than genuine data.

import type { PlaceholderCategory } from '../types'

const SERIALIZATION_ARTIFACTS = new Set(['[object object]'])

const PROGRAMMATIC_NULLS = new Set(['null', 'undefined', 'nan', 'none'])

const SPREADSHEET_ERRORS = new Set(['#N/A', '#REF!', '#VALUE!', '#DIV/0!'])

const WHITESPACE_ONLY_RE = /^\s+$/

const CATEGORY_LABELS: Record<PlaceholderCategory, string> = {
  SERIALIZATION_ARTIFACT: 'Serialisation artefact (e.g. [object Object])',
  WHITESPACE_ONLY: 'Whitespace-only value (should be truly empty)',
  PROGRAMMATIC_NULL: 'Literal null/undefined/NaN/None, likely a code artefact',
  SPREADSHEET_ERROR: 'Spreadsheet error value'
}

/**
 * Classify a cell value as a placeholder category, or null for genuine data.
 * An empty string is never a placeholder.
 */
export function classifyPlaceholder(actual: string): PlaceholderCategory | null {
  if (actual === '') {
    return null
  }

  const trimmed = actual.trim()
  const keyword = trimmed.toLowerCase()

  if (SERIALIZATION_ARTIFACTS.has(keyword)) return 'SERIALIZATION_ARTIFACT'
  if (WHITESPACE_ONLY_RE.test(actual)) return 'WHITESPACE_ONLY'
  if (PROGRAMMATIC_NULLS.has(keyword)) return 'PROGRAMMATIC_NULL'
  if (SPREADSHEET_ERRORS.has(trimmed)) return 'SPREADSHEET_ERROR'

  return null
}

export function describePlaceholder(category: PlaceholderCategory): string {
  return CATEGORY_LABELS[category]
}
