// CSV parser for exported files

import * as fs from 'fs'
import Papa from 'papaparse'
import log from 'electron-log/node'
import type { DiscoveredFile } from '../types'

export interface ParsedTable {
  headers: string[]
  rows: string[][]
}

/**
 * Parse CSV text into a header row and data rows.
 * Every cell stays a string and every line keeps its own cell count, so
 * short rows and rows of empty fields reach the comparator as written.
 * Header names are trimmed.
 */
export function parseCsvText(text: string): ParsedTable {
  // Strip the UTF-8 BOM and normalise line endings
  const content = text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n')
  if (content.trim() === '') {
    return { headers: [], rows: [] }
  }

  // The final line break ends the last row, it does not open a new one
  const body = content.endsWith('\n') ? content.slice(0, -1) : content

  const parsed = Papa.parse<string[]>(body, {
    delimiter: ',',
    newline: '\n',
    quoteChar: '"',
    header: false,
    dynamicTyping: false,
    skipEmptyLines: false
  })

  for (const error of parsed.errors) {
    log.warn(`[PARSE] Row ${error.row ?? '?'}: ${error.message}`)
  }

  // A blank line parses as a single empty field; it is a row with no cells
  const table = parsed.data.map(row => (row.length === 1 && row[0] === '' ? [] : row))
  const [headerRow, ...rows] = table

  return {
    headers: (headerRow ?? []).map(h => h.trim()),
    rows
  }
}

export function readExportFile(filePath: string, relPath: string): DiscoveredFile {
  let text: string
  try {
    text = fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    log.error(`[ERROR] Failed to read ${filePath}:`, error)
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to read export file ${relPath}: ${message}`)
  }

  const { headers, rows } = parseCsvText(text)
  return { path: relPath, headers, rows }
}
