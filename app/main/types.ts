// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

// Settings
export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug'

export interface AppSettings {
  exportDir: string
  catalogPath: string | null
  artifactDir: string
  logLevel: LogLevel
  failOnPlaceholders: boolean
  failOnUnexpected: boolean
}

// Pattern tokens
export type PatternToken = 'DATETIME' | 'DATE_SLASH' | 'INTEGER' | 'ANY' | 'EMPTY' | 'NONEMPTY'

export type CellSpec =
  | { kind: 'literal'; text: string }
  | { kind: 'token'; token: PatternToken }

// Reference catalog
export interface ReferenceDefinition {
  readonly path: string
  readonly headers: readonly string[]
  /** null for headers-only definitions */
  readonly rows: ReadonlyArray<readonly CellSpec[]> | null
  readonly expectedRowCount: number | null
  readonly minRowCount: number | null
}

export type ReferenceCatalog = ReadonlyMap<string, ReferenceDefinition>

// Discovered files
export interface DiscoveredFile {
  path: string
  headers: string[]
  rows: string[][]
}

// Results
export type PlaceholderCategory =
  | 'SERIALIZATION_ARTIFACT'
  | 'WHITESPACE_ONLY'
  | 'PROGRAMMATIC_NULL'
  | 'SPREADSHEET_ERROR'

interface CellPosition {
  row: number
  column: number
  columnName: string
}

export type CellResult =
  | (CellPosition & { kind: 'MATCH' })
  | (CellPosition & { kind: 'MISMATCH'; expected: string; actual: string | null })
  | (CellPosition & { kind: 'PLACEHOLDER'; category: PlaceholderCategory; actual: string })

export type FileStatus = 'PASSED' | 'FAILED' | 'MISSING' | 'UNEXPECTED'

export interface HeaderMismatch {
  expected: readonly string[]
  actual: readonly string[]
  missing: readonly string[]
  extra: readonly string[]
  message: string
}

export interface RowCountMismatch {
  expected: number
  actual: number
  rule: 'exact' | 'minimum'
  message: string
}

export interface FileResult {
  readonly path: string
  readonly status: FileStatus
  readonly headerMismatch: HeaderMismatch | null
  readonly rowCountMismatch: RowCountMismatch | null
  readonly cells: readonly CellResult[]
}

export interface SummaryCounts {
  totalExpected: number
  passed: number
  failed: number
  missing: number
  unexpected: number
  mismatches: number
  placeholders: number
  filesWithPlaceholders: number
}

export interface SummaryReport {
  readonly counts: Readonly<SummaryCounts>
  readonly files: readonly FileResult[]
}

export interface HealthPolicy {
  failOnPlaceholders: boolean
  failOnUnexpected: boolean
}

// Pipeline
export interface VerificationConfig extends HealthPolicy {
  exportDir: string
  artifactDir: string
  catalog: ReferenceCatalog
}

export interface VerificationRun {
  healthy: boolean
  report: SummaryReport
  artifactDir: string
  reportPath: string
  summaryPath: string
  timings: Record<string, number>
}
