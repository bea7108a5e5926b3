import { DiffMetadata, DiffReport, SnapshotSummary, TimingReport } from '../contracts'
import { Snapshot } from '../snapshot/Snapshot'
import { buildDiffTree } from './DiffBuilder'
import { aggregateStatistics } from './StatisticsAggregator'
import { DEFAULT_SUCCESS_RETURN_CODES, findFailedProjects } from './RunHealth'
import { DEFAULT_TIMING_THRESHOLDS, TimingThresholds, compareTimings, summarizeTimings } from './TimingComparison'

export interface CompareOptions {
  successReturnCodes?: readonly number[]
  checkerRepoUrl?: string
}

const summarize = (snapshot: Snapshot): SnapshotSummary => ({
  name: snapshot.name,
  commit: snapshot.commit,
  snapshot_id: snapshot.id,
  diagnostics: snapshot.records.length,
})

export const describeSnapshots = (
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot,
  checkerRepoUrl?: string
): DiffMetadata => ({
  old: summarize(oldSnapshot),
  new: summarize(newSnapshot),
  ...(checkerRepoUrl !== undefined ? { checker_repo_url: checkerRepoUrl } : {}),
})

/**
 * Diff two snapshots and aggregate the result into the report handed to
 * renderers. Projects whose run failed on either side are listed under
 * failed_projects instead of being diffed.
 */
export function compareSnapshots(
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot,
  options: CompareOptions = {}
): DiffReport {
  const failedProjects = findFailedProjects(
    oldSnapshot,
    newSnapshot,
    options.successReturnCodes ?? DEFAULT_SUCCESS_RETURN_CODES
  )
  const diffs = buildDiffTree(oldSnapshot, newSnapshot, {
    excludeProjects: failedProjects.map((failed) => failed.project),
  })

  return {
    metadata: describeSnapshots(oldSnapshot, newSnapshot, options.checkerRepoUrl),
    diffs,
    statistics: aggregateStatistics(diffs),
    failed_projects: failedProjects,
  }
}

export function compareRunTimes(
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot,
  options: CompareOptions & { thresholds?: TimingThresholds } = {}
): TimingReport {
  const rows = compareTimings(oldSnapshot, newSnapshot, options.successReturnCodes ?? DEFAULT_SUCCESS_RETURN_CODES)
  return {
    metadata: describeSnapshots(oldSnapshot, newSnapshot, options.checkerRepoUrl),
    rows,
    summary: summarizeTimings(rows, options.thresholds ?? DEFAULT_TIMING_THRESHOLDS),
  }
}
