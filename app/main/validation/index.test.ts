import { describe, it, expect } from 'vitest'
import type { DiscoveredFile, ReferenceDefinition } from '../types'
import { parseCellSpec } from '../patterns'
import { compareFile, compareHeaders, checkRowCount, compareCell } from './index'

function definition(
  headers: string[],
  rows: string[][] | null,
  counts: { expectedRowCount?: number; minRowCount?: number } = {}
): ReferenceDefinition {
  return {
    path: 'a.csv',
    headers,
    rows: rows ? rows.map(row => row.map(parseCellSpec)) : null,
    expectedRowCount: counts.expectedRowCount ?? null,
    minRowCount: counts.minRowCount ?? null
  }
}

function file(headers: string[], rows: string[][]): DiscoveredFile {
  return { path: 'a.csv', headers, rows }
}

// =============================================================================
// HEADERS
// =============================================================================

describe('compareHeaders', () => {
  it('should return null for identical headers', () => {
    expect(compareHeaders(['id', 'name'], ['id', 'name'])).toBeNull()
  })

  it('should report missing columns', () => {
    const mismatch = compareHeaders(['id', 'name', 'date'], ['id', 'name'])
    expect(mismatch?.missing).toEqual(['date'])
    expect(mismatch?.extra).toEqual([])
    expect(mismatch?.message).toBe('missing columns: ["date"]')
  })

  it('should report extra columns', () => {
    const mismatch = compareHeaders(['id'], ['id', 'notes'])
    expect(mismatch?.message).toBe('extra columns: ["notes"]')
  })

  it('should report renamed columns as missing and extra', () => {
    const mismatch = compareHeaders(['id', 'name'], ['id', 'full name'])
    expect(mismatch?.message).toBe('missing columns: ["name"]; extra columns: ["full name"]')
  })

  it('should report reordering', () => {
    expect(compareHeaders(['id', 'name'], ['name', 'id'])?.message).toBe('column order differs')
  })

  it('should report duplicated columns', () => {
    expect(compareHeaders(['id', 'name'], ['id', 'name', 'name'])?.message).toBe('duplicate columns')
  })
})

// =============================================================================
// ROW COUNTS
// =============================================================================

describe('checkRowCount', () => {
  it('should pass when no row count rule is set', () => {
    expect(checkRowCount(definition(['id'], null), 0)).toBeNull()
  })

  it('should enforce an exact row count', () => {
    const ref = definition(['id'], null, { expectedRowCount: 2 })
    expect(checkRowCount(ref, 2)).toBeNull()
    expect(checkRowCount(ref, 3)).toEqual({
      expected: 2,
      actual: 3,
      rule: 'exact',
      message: 'expected 2 data rows, got 3'
    })
  })

  it('should enforce a minimum row count', () => {
    const ref = definition(['id'], null, { minRowCount: 1 })
    expect(checkRowCount(ref, 5)).toBeNull()
    expect(checkRowCount(ref, 0)?.message).toBe('expected at least 1 data rows, got 0')
  })
})

// =============================================================================
// CELLS
// =============================================================================

describe('compareCell', () => {
  it('should return null for a matching value', () => {
    expect(compareCell(parseCellSpec('INTEGER'), '42', 0, 0, 'id')).toBeNull()
  })

  it('should prefer a placeholder over a mismatch', () => {
    expect(compareCell(parseCellSpec('INTEGER'), 'null', 0, 0, 'id')).toEqual({
      kind: 'PLACEHOLDER', row: 0, column: 0, columnName: 'id', category: 'PROGRAMMATIC_NULL', actual: 'null'
    })
  })

  it('should record a placeholder even when the value would match', () => {
    expect(compareCell(parseCellSpec('ANY'), '   ', 2, 1, 'notes')).toEqual({
      kind: 'PLACEHOLDER', row: 2, column: 1, columnName: 'notes', category: 'WHITESPACE_ONLY', actual: '   '
    })
  })

  it('should record a mismatch with the expected cell text', () => {
    expect(compareCell(parseCellSpec('DATE_ONLY'), 'yesterday', 0, 3, 'Created')).toEqual({
      kind: 'MISMATCH', row: 0, column: 3, columnName: 'Created', expected: 'DATETIME', actual: 'yesterday'
    })
  })

  it('should record an absent cell as a mismatch with a null actual', () => {
    expect(compareCell(parseCellSpec('ANY'), undefined, 0, 1, 'name')).toEqual({
      kind: 'MISMATCH', row: 0, column: 1, columnName: 'name', expected: 'ANY', actual: null
    })
  })
})

// =============================================================================
// FILES
// =============================================================================

describe('compareFile', () => {
  it('should pass an identical file with no cell results', () => {
    const result = compareFile(
      definition(['id', 'name'], [['1', 'Alice']]),
      file(['id', 'name'], [['1', 'Alice']])
    )
    expect(result.status).toBe('PASSED')
    expect(result.cells).toEqual([])
    expect(result.headerMismatch).toBeNull()
    expect(result.rowCountMismatch).toBeNull()
  })

  it('should not fail a file for a placeholder alone', () => {
    const result = compareFile(
      definition(['id'], [['INTEGER']]),
      file(['id'], [['[object Object]']])
    )
    expect(result.status).toBe('PASSED')
    expect(result.cells).toEqual([
      { kind: 'PLACEHOLDER', row: 0, column: 0, columnName: 'id', category: 'SERIALIZATION_ARTIFACT', actual: '[object Object]' }
    ])
  })

  it('should fail on a header mismatch without comparing cells', () => {
    const result = compareFile(
      definition(['id', 'name', 'date'], [['1', 'Alice', 'DATETIME']]),
      file(['id', 'name'], [['x', 'null']])
    )
    expect(result.status).toBe('FAILED')
    expect(result.headerMismatch?.message).toBe('missing columns: ["date"]')
    expect(result.cells).toEqual([])
  })

  it('should fail on a content mismatch', () => {
    const result = compareFile(
      definition(['id', 'name'], [['INTEGER', 'Alice']]),
      file(['id', 'name'], [['7', 'Bob']])
    )
    expect(result.status).toBe('FAILED')
    expect(result.cells).toEqual([
      { kind: 'MISMATCH', row: 0, column: 1, columnName: 'name', expected: 'Alice', actual: 'Bob' }
    ])
  })

  it('should treat every cell of a missing row as a mismatch', () => {
    const result = compareFile(
      definition(['id', 'name'], [['1', 'Alice'], ['2', 'ANY']]),
      file(['id', 'name'], [['1', 'Alice']])
    )
    expect(result.status).toBe('FAILED')
    expect(result.cells).toEqual([
      { kind: 'MISMATCH', row: 1, column: 0, columnName: 'id', expected: '2', actual: null },
      { kind: 'MISMATCH', row: 1, column: 1, columnName: 'name', expected: 'ANY', actual: null }
    ])
  })

  it('should treat absent cells of a short row as mismatches', () => {
    const result = compareFile(
      definition(['id', 'name'], [['1', 'EMPTY']]),
      file(['id', 'name'], [['1']])
    )
    expect(result.status).toBe('FAILED')
    expect(result.cells).toEqual([
      { kind: 'MISMATCH', row: 0, column: 1, columnName: 'name', expected: 'EMPTY', actual: null }
    ])
  })

  it('should ignore extra rows and extra trailing cells', () => {
    const result = compareFile(
      definition(['id'], [['1']]),
      file(['id'], [['1', 'NaN'], ['#REF!'], ['anything']])
    )
    expect(result.status).toBe('PASSED')
    expect(result.cells).toEqual([])
  })

  it('should keep cell results in row then column order', () => {
    const result = compareFile(
      definition(['a', 'b'], [['x', 'y'], ['x', 'y']]),
      file(['a', 'b'], [['1', 'none'], ['   ', '2']])
    )
    expect(result.cells.map(c => [c.kind, c.row, c.column])).toEqual([
      ['MISMATCH', 0, 0],
      ['PLACEHOLDER', 0, 1],
      ['PLACEHOLDER', 1, 0],
      ['MISMATCH', 1, 1]
    ])
  })

  it('should fail on a row count rule while still comparing cells', () => {
    const result = compareFile(
      definition(['id'], [['INTEGER']], { expectedRowCount: 1 }),
      file(['id'], [['1'], ['NaN']])
    )
    expect(result.status).toBe('FAILED')
    expect(result.rowCountMismatch?.message).toBe('expected 1 data rows, got 2')
    expect(result.cells).toEqual([])
  })

  it('should scan every cell of a headers-only definition for placeholders', () => {
    const result = compareFile(
      definition(['id', 'name'], null, { minRowCount: 1 }),
      file(['id', 'name'], [['1', 'NaN'], ['#N/A', 'Alice', 'undefined']])
    )
    expect(result.status).toBe('PASSED')
    expect(result.cells).toEqual([
      { kind: 'PLACEHOLDER', row: 0, column: 1, columnName: 'name', category: 'PROGRAMMATIC_NULL', actual: 'NaN' },
      { kind: 'PLACEHOLDER', row: 1, column: 0, columnName: 'id', category: 'SPREADSHEET_ERROR', actual: '#N/A' }
    ])
  })

  it('should return a frozen result', () => {
    const result = compareFile(definition(['id'], [['1']]), file(['id'], [['1']]))
    expect(Object.isFrozen(result)).toBe(true)
  })
})
