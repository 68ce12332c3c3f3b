// Pattern tokens for dynamic cell values

import type { CellSpec, PatternToken } from '../types'

const MONTHS = 'Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec'

// dd-Mon-yyyy HH:MM:SS  (e.g. 19-Feb-2026 11:55:33)
const DATETIME_RE = new RegExp(`^\\d{2}-(?:${MONTHS})-\\d{4} (?:[01]\\d|2[0-3]):[0-5]\\d:[0-5]\\d$`)

// dd/mm/yyyy  (e.g. 24/02/2000)
const DATE_SLASH_RE = /^\d{2}\/\d{2}\/\d{4}$/

const INTEGER_RE = /^[0-9]+$/

export const PATTERN_TOKENS: readonly PatternToken[] = [
  'DATETIME',
  'DATE_SLASH',
  'INTEGER',
  'ANY',
  'EMPTY',
  'NONEMPTY'
]

// Older catalogs use these names
const TOKEN_ALIASES: Record<string, PatternToken> = {
  DATE_ONLY: 'DATETIME',
  NUMERIC_ID: 'INTEGER'
}

function isPatternToken(text: string): text is PatternToken {
  return (PATTERN_TOKENS as readonly string[]).includes(text)
}

/**
 * Resolve the text of a catalog cell into a token or a literal.
 * Anything that is not a known token (including a misspelt one) is a literal.
 */
export function parseCellSpec(text: string): CellSpec {
  if (isPatternToken(text)) {
    return { kind: 'token', token: text }
  }
  const alias = Object.prototype.hasOwnProperty.call(TOKEN_ALIASES, text) ? TOKEN_ALIASES[text] : undefined
  if (alias) {
    return { kind: 'token', token: alias }
  }
  return { kind: 'literal', text }
}

export function matchesToken(token: PatternToken, actual: string): boolean {
  switch (token) {
    case 'DATETIME':
      return DATETIME_RE.test(actual)
    case 'DATE_SLASH':
      return DATE_SLASH_RE.test(actual)
    case 'INTEGER':
      return INTEGER_RE.test(actual)
    case 'ANY':
      return true
    case 'EMPTY':
      return actual === ''
    case 'NONEMPTY':
      return actual.length >= 1
    default: {
      const unreachable: never = token
      throw new Error(`Unknown pattern token: ${String(unreachable)}`)
    }
  }
}

export function matchesCellSpec(spec: CellSpec, actual: string): boolean {
  if (spec.kind === 'literal') {
    return spec.text === actual
  }
  return matchesToken(spec.token, actual)
}

export function matches(tokenOrLiteral: string, actual: string): boolean {
  return matchesCellSpec(parseCellSpec(tokenOrLiteral), actual)
}

export function describeCellSpec(spec: CellSpec): string {
  return spec.kind === 'literal' ? spec.text : spec.token
}
