import { describe, it, expect } from 'vitest'
import { aggregateStatistics, compareNames } from './StatisticsAggregator'
import { buildDiffTree } from './DiffBuilder'
import { createSnapshot } from '../snapshot/Snapshot'
import { DiagnosticRecord, DiffTree } from '../contracts'

const diag = (project: string, path: string, line: number, lint_name: string, message = 'message'): DiagnosticRecord => ({
  project,
  path,
  line,
  column: 1,
  level: 'error',
  lint_name,
  message,
})

const oldRecords = [
  diag('P1', 'a.py', 1, 'X', 'm1'),
  diag('P1', 'a.py', 2, 'Y'),
  diag('Gone', 'g.py', 1, 'Z'),
  diag('Gone', 'g.py', 2, 'Z'),
]

const newRecords = [
  diag('P1', 'a.py', 1, 'X', 'm2'),
  diag('P1', 'a.py', 5, 'Y'),
  diag('P1', 'b.py', 1, 'W'),
]

const statisticsFor = (before: DiagnosticRecord[], after: DiagnosticRecord[]) =>
  aggregateStatistics(buildDiffTree(createSnapshot({ records: before }), createSnapshot({ records: after })))

type Leaf = { kind: 'removed' | 'added' | 'changed'; lint_name: string }

// Every leaf of the tree, labelled by how it changed
const leaves = (tree: DiffTree): Leaf[] => {
  const label = (kind: Leaf['kind'], records: readonly DiagnosticRecord[]): Leaf[] =>
    records.map((record) => ({ kind, lint_name: record.lint_name }))

  return [
    ...tree.added_projects.flatMap((project) => label('added', project.diagnostics)),
    ...tree.removed_projects.flatMap((project) => label('removed', project.diagnostics)),
    ...tree.modified_projects.flatMap(({ diffs }) => [
      ...diffs.added_files.flatMap((file) => label('added', file.diagnostics)),
      ...diffs.removed_files.flatMap((file) => label('removed', file.diagnostics)),
      ...diffs.modified_files.flatMap((file) => [
        ...file.diffs.added_lines.flatMap((line) => label('added', line.diagnostics)),
        ...file.diffs.removed_lines.flatMap((line) => label('removed', line.diagnostics)),
        ...file.diffs.modified_lines.flatMap((line) => [
          ...label('changed', line.text_diffs.map((diff) => diff.old)),
          ...label('added', line.added),
          ...label('removed', line.removed),
        ]),
      ]),
    ]),
  ]
}

describe('aggregateStatistics', () => {
  it('should count every change at every level of the tree', () => {
    const statistics = statisticsFor(oldRecords, newRecords)

    expect(statistics.rows).toEqual([
      { lint_name: 'Y', removed: 1, added: 1, changed: 0 },
      { lint_name: 'Z', removed: 2, added: 0, changed: 0 },
      { lint_name: 'W', removed: 0, added: 1, changed: 0 },
      { lint_name: 'X', removed: 0, added: 0, changed: 1 },
    ])
    expect(statistics.total).toEqual({ removed: 3, added: 2, changed: 1 })
  })

  it('should make the total equal the sum of the rows', () => {
    const { rows, total } = statisticsFor(oldRecords, newRecords)

    expect(rows.reduce((sum, row) => sum + row.removed, 0)).toBe(total.removed)
    expect(rows.reduce((sum, row) => sum + row.added, 0)).toBe(total.added)
    expect(rows.reduce((sum, row) => sum + row.changed, 0)).toBe(total.changed)
  })

  it('should match the number of changed leaves in the tree for every rule', () => {
    const before = [...oldRecords, diag('P1', 'a.py', 9, 'X', 'dup'), diag('P1', 'a.py', 9, 'X', 'dup 2')]
    const after = [...newRecords, diag('P1', 'a.py', 9, 'X', 'dup'), diag('P1', 'a.py', 9, 'Y', 'other')]
    const tree = buildDiffTree(createSnapshot({ records: before }), createSnapshot({ records: after }))
    const treeLeaves = leaves(tree)

    const statistics = aggregateStatistics(tree)

    for (const row of statistics.rows) {
      const count = (kind: Leaf['kind']) =>
        treeLeaves.filter((leaf) => leaf.kind === kind && leaf.lint_name === row.lint_name).length
      expect(row).toEqual({ lint_name: row.lint_name, removed: count('removed'), added: count('added'), changed: count('changed') })
    }
    expect(new Set(statistics.rows.map((row) => row.lint_name))).toEqual(new Set(treeLeaves.map((leaf) => leaf.lint_name)))
    expect(statistics.total.removed + statistics.total.added + statistics.total.changed).toBe(treeLeaves.length)
    expect(treeLeaves).toHaveLength(8)
  })

  it('should swap added and removed when the snapshots are swapped', () => {
    const forward = statisticsFor(oldRecords, newRecords)
    const backward = statisticsFor(newRecords, oldRecords)

    expect(backward.total).toEqual({
      removed: forward.total.added,
      added: forward.total.removed,
      changed: forward.total.changed,
    })
    expect(backward.rows).toEqual([
      { lint_name: 'Y', removed: 1, added: 1, changed: 0 },
      { lint_name: 'Z', removed: 0, added: 2, changed: 0 },
      { lint_name: 'W', removed: 1, added: 0, changed: 0 },
      { lint_name: 'X', removed: 0, added: 0, changed: 1 },
    ])
  })

  it('should return no rows and zero totals for identical snapshots', () => {
    expect(statisticsFor(oldRecords, oldRecords)).toEqual({
      rows: [],
      total: { removed: 0, added: 0, changed: 0 },
    })
  })

  it('should count every diagnostic of an added project', () => {
    const statistics = statisticsFor([], [diag('P2', 'x.py', 1, 'A'), diag('P2', 'x.py', 2, 'A')])

    expect(statistics.total).toEqual({ removed: 0, added: 2, changed: 0 })
    expect(statistics.rows).toEqual([{ lint_name: 'A', removed: 0, added: 2, changed: 0 }])
  })
})

describe('compareNames', () => {
  it('should order by code unit rather than locale', () => {
    expect(['b', 'B', 'a', 'A'].sort(compareNames)).toEqual(['A', 'B', 'a', 'b'])
  })
})
