import { DiagnosticRecord, EcosystemReport, NamedCount } from '../contracts'
import { Snapshot } from '../snapshot/Snapshot'
import { compareNames } from '../diff/StatisticsAggregator'
import { debugLog } from '../logging/debugLog'

export interface EcosystemReportOptions {
  // Projects with more diagnostics than this are left out of the report
  maxDiagnosticsPerProject?: number
}

const countBy = (records: readonly DiagnosticRecord[], key: (record: DiagnosticRecord) => string): NamedCount[] => {
  const counts = new Map<string, number>()
  for (const record of records) {
    const name = key(record)
    counts.set(name, (counts.get(name) ?? 0) + 1)
  }
  return Array.from(counts, ([name, count]) => ({ name, count }))
}

/**
 * Flat view of a single snapshot with per-project, per-rule and per-level
 * counts.
 */
export function buildEcosystemReport(snapshot: Snapshot, options: EcosystemReportOptions = {}): EcosystemReport {
  const limit = options.maxDiagnosticsPerProject ?? 1000

  const diagnostics: DiagnosticRecord[] = []
  const skipped: NamedCount[] = []

  for (const project of snapshot.index.projects()) {
    if (project.diagnostics.length > limit) {
      skipped.push({ name: project.project, count: project.diagnostics.length })
      continue
    }
    diagnostics.push(...project.diagnostics)
  }

  debugLog({
    event: 'ecosystem_report_built',
    snapshotId: snapshot.id,
    includedDiagnostics: diagnostics.length,
    skippedProjects: skipped.map((project) => project.name),
  })

  return {
    name: snapshot.name,
    commit: snapshot.commit,
    diagnostics,
    projects: countBy(diagnostics, (record) => record.project).sort((a, b) => compareNames(a.name, b.name)),
    lints: countBy(diagnostics, (record) => record.lint_name).sort(
      (a, b) => b.count - a.count || compareNames(a.name, b.name)
    ),
    levels: countBy(diagnostics, (record) => record.level).sort((a, b) => compareNames(a.name, b.name)),
    skipped_projects: skipped,
    total: diagnostics.length,
  }
}
