// File comparison against a reference definition

import type {
  CellResult,
  CellSpec,
  DiscoveredFile,
  FileResult,
  HeaderMismatch,
  ReferenceDefinition,
  RowCountMismatch
} from '../types'
import { describeCellSpec, matchesCellSpec } from '../patterns'
import { classifyPlaceholder } from '../placeholders'

/**
 * Compare headers position-by-position and by count.
 * Returns null when they are identical.
 */
export function compareHeaders(expected: readonly string[], actual: readonly string[]): HeaderMismatch | null {
  const identical = expected.length === actual.length && expected.every((h, i) => h === actual[i])
  if (identical) {
    return null
  }

  const missing = expected.filter(h => !actual.includes(h))
  const extra = actual.filter(h => !expected.includes(h))

  const parts: string[] = []
  if (missing.length > 0) {
    parts.push(`missing columns: ${JSON.stringify(missing)}`)
  }
  if (extra.length > 0) {
    parts.push(`extra columns: ${JSON.stringify(extra)}`)
  }
  if (parts.length === 0) {
    parts.push(expected.length === actual.length ? 'column order differs' : 'duplicate columns')
  }

  return { expected, actual, missing, extra, message: parts.join('; ') }
}

export function checkRowCount(reference: ReferenceDefinition, actualCount: number): RowCountMismatch | null {
  if (reference.expectedRowCount !== null && actualCount !== reference.expectedRowCount) {
    return {
      expected: reference.expectedRowCount,
      actual: actualCount,
      rule: 'exact',
      message: `expected ${reference.expectedRowCount} data rows, got ${actualCount}`
    }
  }
  if (reference.minRowCount !== null && actualCount < reference.minRowCount) {
    return {
      expected: reference.minRowCount,
      actual: actualCount,
      rule: 'minimum',
      message: `expected at least ${reference.minRowCount} data rows, got ${actualCount}`
    }
  }
  return null
}

/**
 * Compare one cell. A placeholder wins over a mismatch; a silent pass yields null.
 */
export function compareCell(
  spec: CellSpec,
  actual: string | undefined,
  row: number,
  column: number,
  columnName: string
): CellResult | null {
  if (actual === undefined) {
    return { kind: 'MISMATCH', row, column, columnName, expected: describeCellSpec(spec), actual: null }
  }

  const category = classifyPlaceholder(actual)
  if (category) {
    return { kind: 'PLACEHOLDER', row, column, columnName, category, actual }
  }

  if (!matchesCellSpec(spec, actual)) {
    return { kind: 'MISMATCH', row, column, columnName, expected: describeCellSpec(spec), actual }
  }

  return null
}

function compareRows(reference: ReferenceDefinition, expectedRows: ReadonlyArray<readonly CellSpec[]>, actualRows: string[][]): CellResult[] {
  const cells: CellResult[] = []

  expectedRows.forEach((expectedRow, rowIdx) => {
    // A missing row leaves every cell undefined
    const actualRow = actualRows[rowIdx] ?? []
    expectedRow.forEach((spec, colIdx) => {
      const columnName = reference.headers[colIdx] ?? `col_${colIdx}`
      const result = compareCell(spec, actualRow[colIdx], rowIdx, colIdx, columnName)
      if (result) {
        cells.push(result)
      }
    })
  })

  return cells
}

function scanPlaceholders(headers: readonly string[], actualRows: string[][]): CellResult[] {
  const cells: CellResult[] = []

  actualRows.forEach((actualRow, rowIdx) => {
    headers.forEach((columnName, colIdx) => {
      const actual = actualRow[colIdx]
      const category = actual === undefined ? null : classifyPlaceholder(actual)
      if (actual !== undefined && category) {
        cells.push({ kind: 'PLACEHOLDER', row: rowIdx, column: colIdx, columnName, category, actual })
      }
    })
  })

  return cells
}

/**
 * Verify one discovered file against its reference definition.
 */
export function compareFile(reference: ReferenceDefinition, discovered: DiscoveredFile): FileResult {
  const headerMismatch = compareHeaders(reference.headers, discovered.headers)
  if (headerMismatch) {
    // Cells are not compared against misaligned columns
    const result: FileResult = {
      path: reference.path,
      status: 'FAILED',
      headerMismatch,
      rowCountMismatch: null,
      cells: []
    }
    return Object.freeze(result)
  }

  const rowCountMismatch = checkRowCount(reference, discovered.rows.length)
  const cells = reference.rows
    ? compareRows(reference, reference.rows, discovered.rows)
    : scanPlaceholders(reference.headers, discovered.rows)

  const failed = rowCountMismatch !== null || cells.some(cell => cell.kind === 'MISMATCH')

  const result: FileResult = {
    path: reference.path,
    status: failed ? 'FAILED' : 'PASSED',
    headerMismatch: null,
    rowCountMismatch,
    cells: Object.freeze(cells)
  }
  return Object.freeze(result)
}
