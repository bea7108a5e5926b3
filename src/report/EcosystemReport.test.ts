import { describe, it, expect } from 'vitest'
import { buildEcosystemReport } from './EcosystemReport'
import { createSnapshot } from '../snapshot/Snapshot'
import { DiagnosticLevel, DiagnosticRecord } from '../contracts'

const diag = (project: string, lint_name: string, level: DiagnosticLevel, line = 1): DiagnosticRecord => ({
  project,
  path: 'main.py',
  line,
  column: 0,
  level,
  lint_name,
  message: `${lint_name} on line ${line}`,
})

const records = [
  diag('p2', 'X', 'warning'),
  diag('p1', 'X', 'warning'),
  diag('p1', 'Y', 'error', 2),
  diag('big', 'Z', 'error', 1),
  diag('big', 'Z', 'error', 2),
  diag('big', 'Z', 'error', 3),
]

describe('buildEcosystemReport', () => {
  it('should count diagnostics per project, rule and level', () => {
    const report = buildEcosystemReport(createSnapshot({ name: 'eco', commit: 'abc', records }), {
      maxDiagnosticsPerProject: 2,
    })

    expect(report.name).toBe('eco')
    expect(report.commit).toBe('abc')
    expect(report.total).toBe(3)
    expect(report.diagnostics).toEqual(records.slice(0, 3))
    expect(report.projects).toEqual([
      { name: 'p1', count: 2 },
      { name: 'p2', count: 1 },
    ])
    expect(report.lints).toEqual([
      { name: 'X', count: 2 },
      { name: 'Y', count: 1 },
    ])
    expect(report.levels).toEqual([
      { name: 'error', count: 1 },
      { name: 'warning', count: 2 },
    ])
  })

  it('should skip projects above the diagnostic limit', () => {
    const report = buildEcosystemReport(createSnapshot({ records }), { maxDiagnosticsPerProject: 2 })

    expect(report.skipped_projects).toEqual([{ name: 'big', count: 3 }])
    expect(report.projects.map((project) => project.name)).not.toContain('big')
  })

  it('should include every project under the default limit', () => {
    const report = buildEcosystemReport(createSnapshot({ records }))

    expect(report.skipped_projects).toEqual([])
    expect(report.total).toBe(6)
    expect(report.lints[0]).toEqual({ name: 'Z', count: 3 })
  })
})
