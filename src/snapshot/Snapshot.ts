import { v4 as uuidv4 } from 'uuid'
import { DiagnosticRecord, ProjectRun } from '../contracts'
import { SnapshotIndex } from './SnapshotIndex'
import { debugLog } from '../logging/debugLog'

export interface Snapshot {
  readonly id: string
  readonly name: string
  readonly commit: string
  readonly records: readonly DiagnosticRecord[]
  readonly runs: ReadonlyMap<string, ProjectRun>
  readonly index: SnapshotIndex
}

export interface SnapshotInit {
  name?: string
  commit?: string
  records: readonly DiagnosticRecord[]
  runs?: readonly ProjectRun[]
}

export const UNKNOWN_COMMIT = 'unknown'

export const shortCommit = (commit: string): string =>
  commit === UNKNOWN_COMMIT ? commit : commit.slice(0, 7)

/**
 * Build an immutable snapshot from already validated records.
 */
export function createSnapshot(init: SnapshotInit): Snapshot {
  const commit = init.commit ?? UNKNOWN_COMMIT
  const runs = new Map<string, ProjectRun>()
  for (const run of init.runs ?? []) {
    runs.set(run.project, run)
  }

  const records = Object.freeze([...init.records])
  const index = SnapshotIndex.build(records, init.runs ?? [])

  const snapshot: Snapshot = {
    id: uuidv4(),
    name: init.name ?? shortCommit(commit),
    commit,
    records,
    runs,
    index,
  }

  debugLog({
    event: 'snapshot_created',
    snapshotId: snapshot.id,
    name: snapshot.name,
    commit: snapshot.commit,
    projectCount: index.size,
    diagnosticCount: records.length,
  })

  return snapshot
}
