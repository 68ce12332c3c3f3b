// Verification orchestration and pipeline execution

import path from 'node:path'
import * as fs from 'fs'
import log from 'electron-log/node'
import type {
  DiscoveredFile,
  FileResult,
  HealthPolicy,
  ReferenceCatalog,
  SummaryCounts,
  SummaryReport,
  VerificationConfig,
  VerificationRun
} from '../types'
import { compareFile } from '../validation'
import { discoverExportFiles } from '../discovery'
import { readExportFile } from '../parsers'
import { writeReportJson, writeSummaryCsv, describeFileResult } from '../writers'

function emptyResult(relPath: string, status: 'MISSING' | 'UNEXPECTED'): FileResult {
  const result: FileResult = { path: relPath, status, headerMismatch: null, rowCountMismatch: null, cells: [] }
  return Object.freeze(result)
}

/**
 * Verify discovered files against the catalog.
 *
 * Every catalog path yields exactly one PASSED, FAILED or MISSING result, in
 * catalog order; every other discovered path yields one UNEXPECTED result,
 * sorted by path. Pure: the same inputs always give the same report.
 */
export function verifyExports(catalog: ReferenceCatalog, discovered: readonly DiscoveredFile[]): SummaryReport {
  const index = new Map<string, DiscoveredFile>()
  for (const file of discovered) {
    if (!index.has(file.path)) {
      index.set(file.path, file)
    }
  }

  const counts: SummaryCounts = {
    totalExpected: catalog.size,
    passed: 0,
    failed: 0,
    missing: 0,
    unexpected: 0,
    mismatches: 0,
    placeholders: 0,
    filesWithPlaceholders: 0
  }
  const files: FileResult[] = []

  const record = (result: FileResult): void => {
    switch (result.status) {
      case 'PASSED': counts.passed++; break
      case 'FAILED': counts.failed++; break
      case 'MISSING': counts.missing++; break
      case 'UNEXPECTED': counts.unexpected++; break
    }
    let placeholders = 0
    for (const cell of result.cells) {
      if (cell.kind === 'MISMATCH') counts.mismatches++
      if (cell.kind === 'PLACEHOLDER') placeholders++
    }
    counts.placeholders += placeholders
    if (placeholders > 0) counts.filesWithPlaceholders++
    files.push(result)
  }

  for (const [relPath, reference] of catalog) {
    const file = index.get(relPath)
    record(file ? compareFile(reference, file) : emptyResult(relPath, 'MISSING'))
  }

  const unexpected = Array.from(index.keys())
    .filter(relPath => !catalog.has(relPath))
    .sort()
  for (const relPath of unexpected) {
    record(emptyResult(relPath, 'UNEXPECTED'))
  }

  return Object.freeze({ counts: Object.freeze(counts), files: Object.freeze(files) })
}

/**
 * Aggregate health of a report: failed or missing files are always unhealthy
 */
export function isHealthy(report: SummaryReport, policy: HealthPolicy): boolean {
  const { failed, missing, unexpected, placeholders } = report.counts
  if (failed > 0 || missing > 0) return false
  if (policy.failOnUnexpected && unexpected > 0) return false
  if (policy.failOnPlaceholders && placeholders > 0) return false
  return true
}

/**
 * Generate a unique artifact directory path with timestamp
 */
export function generateArtifactDir(baseDir: string = 'artifacts'): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').replace('Z', '')
  return path.join(baseDir, `run-${timestamp}`)
}

function logSummary(report: SummaryReport, healthy: boolean): void {
  const c = report.counts
  log.info(`[VERIFY] Total expected files : ${c.totalExpected}`)
  log.info(`[VERIFY] Passed               : ${c.passed}`)
  log.info(`[VERIFY] Failed               : ${c.failed}`)
  log.info(`[VERIFY] Missing              : ${c.missing}`)
  log.info(`[VERIFY] Unexpected           : ${c.unexpected}`)
  log.info(`[VERIFY] Placeholders         : ${c.placeholders} value(s) across ${c.filesWithPlaceholders} file(s)`)

  for (const result of report.files) {
    if (result.status === 'PASSED' && result.cells.length === 0) continue
    const line = `[VERIFY] ${result.status} ${result.path}: ${describeFileResult(result)}`
    if (result.status === 'PASSED') {
      log.warn(line)
    } else {
      log.error(line)
    }
  }

  if (healthy) {
    log.info('[VERIFY] All checks passed')
  } else {
    log.error('[VERIFY] Verification found problems')
  }
}

/**
 * Run the complete verification pipeline: discover, read, compare, report
 */
export function runExportVerification(config: VerificationConfig): VerificationRun {
  const timings: Record<string, number> = {}
  let startTime: number

  log.info(`[VERIFY] Scanning: ${path.resolve(config.exportDir)}`)

  // Step 1: Discover
  startTime = Date.now()
  const relPaths = discoverExportFiles(config.exportDir)
  timings['discover'] = Date.now() - startTime

  // Step 2: Read
  startTime = Date.now()
  const discovered = relPaths.map(relPath => readExportFile(path.join(config.exportDir, relPath), relPath))
  timings['read'] = Date.now() - startTime

  // Step 3: Compare
  startTime = Date.now()
  const report = verifyExports(config.catalog, discovered)
  const healthy = isHealthy(report, config)
  timings['compare'] = Date.now() - startTime

  // Step 4: Write artifacts
  startTime = Date.now()
  const artifactDir = generateArtifactDir(config.artifactDir)
  fs.mkdirSync(artifactDir, { recursive: true })
  const reportPath = path.join(artifactDir, 'report.json')
  const summaryPath = path.join(artifactDir, 'summary.csv')
  try {
    writeReportJson(report, {
      generatedAt: new Date().toISOString(),
      exportDir: path.resolve(config.exportDir),
      healthy
    }, reportPath)
    writeSummaryCsv(report, summaryPath)
  } catch (error) {
    log.error('[ERROR] Failed to write verification artifacts:', error)
    throw error
  }
  timings['write'] = Date.now() - startTime

  logSummary(report, healthy)
  log.info(`[VERIFY] Report written to ${reportPath}`)

  return { healthy, report, artifactDir, reportPath, summaryPath, timings }
}
