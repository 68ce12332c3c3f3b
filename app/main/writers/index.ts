// Report writers for JSON and CSV artifacts

import * as fs from 'fs'
import type { CellResult, FileResult, SummaryReport } from '../types'
import { describePlaceholder } from '../placeholders'

export type CsvRow = Record<string, unknown>

export const SUMMARY_HEADERS = ['File', 'Status', 'Details', 'Mismatches', 'Placeholders']

export function escapeCsvValue(value: unknown): string {
  if (value === null || value === undefined) {
    return ''
  }

  const str = String(value)

  // If contains comma, quote, or newline, wrap in quotes and escape quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Write rows to a CSV file with a fixed header order
 */
export function writeCsv(headers: string[], data: CsvRow[], outputPath: string): void {
  const lines: string[] = [headers.map(h => escapeCsvValue(h)).join(',')]

  for (const row of data) {
    lines.push(headers.map(h => escapeCsvValue(row[h])).join(','))
  }

  // Write to file (add newline at end for proper file format)
  fs.writeFileSync(outputPath, lines.join('\n') + '\n', 'utf-8')
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text
}

export function describeCellResult(cell: CellResult): string {
  const where = `Row ${cell.row + 1}, [${cell.columnName}]`
  switch (cell.kind) {
    case 'MATCH':
      return `${where}: ok`
    case 'MISMATCH':
      return cell.actual === null
        ? `${where}: expected '${cell.expected}' but the cell is missing`
        : `${where}: expected '${cell.expected}' but got '${truncate(cell.actual, 80)}'`
    case 'PLACEHOLDER':
      return `${where}: "${truncate(cell.actual.trim(), 60)}" (${describePlaceholder(cell.category)})`
  }
}

export function describeFileResult(result: FileResult): string {
  if (result.status === 'MISSING') return 'File not found in export directory'
  if (result.status === 'UNEXPECTED') return 'File not in reference set'

  const parts: string[] = []
  if (result.headerMismatch) {
    parts.push(`Headers: ${result.headerMismatch.message}`)
  }
  if (result.rowCountMismatch) {
    parts.push(result.rowCountMismatch.message)
  }
  const mismatches = result.cells.filter(c => c.kind === 'MISMATCH').length
  const placeholders = result.cells.filter(c => c.kind === 'PLACEHOLDER').length
  if (mismatches > 0) {
    parts.push(`${mismatches} cell issue(s)`)
  }
  if (placeholders > 0) {
    parts.push(`${placeholders} placeholder(s)`)
  }
  return parts.join('; ')
}

export function buildSummaryRows(report: SummaryReport): CsvRow[] {
  return report.files.map(result => ({
    File: result.path,
    Status: result.status,
    Details: describeFileResult(result),
    Mismatches: result.cells.filter(c => c.kind === 'MISMATCH').length,
    Placeholders: result.cells.filter(c => c.kind === 'PLACEHOLDER').length
  }))
}

export function writeSummaryCsv(report: SummaryReport, outputPath: string): void {
  writeCsv(SUMMARY_HEADERS, buildSummaryRows(report), outputPath)
}

/**
 * Write report.json: the summary report plus run metadata
 */
export function writeReportJson(
  report: SummaryReport,
  metadata: Record<string, unknown>,
  outputPath: string
): void {
  const reportWithMetadata = {
    ...metadata,
    counts: report.counts,
    files: report.files.map(result => ({
      ...result,
      details: describeFileResult(result),
      issues: result.cells.map(describeCellResult)
    }))
  }
  fs.writeFileSync(outputPath, JSON.stringify(reportWithMetadata, null, 2), 'utf-8')
}
