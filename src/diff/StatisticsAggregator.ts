import { ChangeCounts, DiagnosticRecord, DiffTree, LintStatistics, StatisticsTable } from '../contracts'

type Counter = { removed: number; added: number; changed: number }

const totalChange = (counts: ChangeCounts): number => counts.removed + counts.added + counts.changed

// Code-unit order, not locale order
export const compareNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

/**
 * Fold a diff tree into per-rule counts in a single pass.
 *
 * Rows are ordered by total change (removed + added + changed) descending,
 * then by rule name.
 */
export function aggregateStatistics(tree: DiffTree): StatisticsTable {
  const byLint = new Map<string, Counter>()

  const counterFor = (lintName: string): Counter => {
    let counter = byLint.get(lintName)
    if (!counter) {
      counter = { removed: 0, added: 0, changed: 0 }
      byLint.set(lintName, counter)
    }
    return counter
  }

  const countAdded = (records: readonly DiagnosticRecord[]) => {
    for (const record of records) counterFor(record.lint_name).added++
  }
  const countRemoved = (records: readonly DiagnosticRecord[]) => {
    for (const record of records) counterFor(record.lint_name).removed++
  }

  for (const project of tree.added_projects) countAdded(project.diagnostics)
  for (const project of tree.removed_projects) countRemoved(project.diagnostics)

  for (const project of tree.modified_projects) {
    for (const file of project.diffs.added_files) countAdded(file.diagnostics)
    for (const file of project.diffs.removed_files) countRemoved(file.diagnostics)

    for (const file of project.diffs.modified_files) {
      for (const line of file.diffs.added_lines) countAdded(line.diagnostics)
      for (const line of file.diffs.removed_lines) countRemoved(line.diagnostics)

      for (const line of file.diffs.modified_lines) {
        for (const textDiff of line.text_diffs) counterFor(textDiff.old.lint_name).changed++
        countAdded(line.added)
        countRemoved(line.removed)
      }
    }
  }

  const rows: LintStatistics[] = Array.from(byLint, ([lint_name, counts]) => ({ lint_name, ...counts }))
  rows.sort((a, b) => totalChange(b) - totalChange(a) || compareNames(a.lint_name, b.lint_name))

  const total = rows.reduce<Counter>(
    (sum, row) => ({
      removed: sum.removed + row.removed,
      added: sum.added + row.added,
      changed: sum.changed + row.changed,
    }),
    { removed: 0, added: 0, changed: 0 }
  )

  return { rows, total }
}
