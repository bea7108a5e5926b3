import { ProjectRun, TimingFailure, TimingRow, TimingSummary } from '../contracts'
import { Snapshot } from '../snapshot/Snapshot'
import { DEFAULT_SUCCESS_RETURN_CODES } from './RunHealth'

export interface TimingThresholds {
  speedupFactor: number
  slowdownFactor: number
}

export const DEFAULT_TIMING_THRESHOLDS: TimingThresholds = {
  speedupFactor: 0.9,
  slowdownFactor: 1.1,
}

const isAbnormal = (run: ProjectRun, successReturnCodes: readonly number[]): boolean =>
  run.return_code !== undefined && run.return_code !== null && !successReturnCodes.includes(run.return_code)

const slowdownFactor = (oldTime: number, newTime: number): number => {
  if (oldTime > 0) return newTime / oldTime
  return newTime > 0 ? Infinity : 1
}

const rowRank = (row: TimingRow): number => {
  if (row.old_is_abnormal || row.new_is_abnormal) return 2
  if (row.old_is_timeout || row.new_is_timeout) return 1
  return 0
}

const significance = (row: TimingRow): number => (rowRank(row) === 0 ? Math.abs(row.factor - 1) : 0)

const compareSignificance = (a: TimingRow, b: TimingRow): number => {
  const left = significance(a)
  const right = significance(b)
  if (left === right) return 0
  return right > left ? 1 : -1
}

/**
 * Compare run times of the projects present in both snapshots. A run
 * without a time counts as a timeout.
 *
 * Rows are ordered abnormal exits first, then timeouts, then by how far the
 * factor (new time / old time) is from 1.
 */
export function compareTimings(
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot,
  successReturnCodes: readonly number[] = DEFAULT_SUCCESS_RETURN_CODES
): TimingRow[] {
  const rows: TimingRow[] = []

  for (const [project, oldRun] of oldSnapshot.runs) {
    const newRun = newSnapshot.runs.get(project)
    if (!newRun) continue

    const oldTime = oldRun.time_s ?? null
    const newTime = newRun.time_s ?? null
    const oldIsTimeout = oldTime === null
    const newIsTimeout = newTime === null
    const oldIsAbnormal = isAbnormal(oldRun, successReturnCodes)
    const newIsAbnormal = isAbnormal(newRun, successReturnCodes)
    const oldFailed = oldIsTimeout || oldIsAbnormal
    const newFailed = newIsTimeout || newIsAbnormal

    let factor: number
    let failureType: TimingFailure | null
    if (oldFailed && newFailed) {
      factor = 1
      failureType = 'both_failed'
    } else if (oldFailed) {
      factor = 0
      failureType = 'old_failed'
    } else if (newFailed || oldTime === null || newTime === null) {
      factor = Infinity
      failureType = 'new_failed'
    } else {
      factor = slowdownFactor(oldTime, newTime)
      failureType = null
    }

    rows.push({
      project,
      old_time: oldTime,
      new_time: newTime,
      old_return_code: oldRun.return_code ?? null,
      new_return_code: newRun.return_code ?? null,
      factor,
      failure_type: failureType,
      old_is_timeout: oldIsTimeout,
      new_is_timeout: newIsTimeout,
      old_is_abnormal: oldIsAbnormal,
      new_is_abnormal: newIsAbnormal,
    })
  }

  return rows.sort((a, b) => rowRank(b) - rowRank(a) || compareSignificance(a, b))
}

export function summarizeTimings(
  rows: readonly TimingRow[],
  thresholds: TimingThresholds = DEFAULT_TIMING_THRESHOLDS
): TimingSummary {
  const succeeded = rows.filter((row) => row.failure_type === null)
  const factors = succeeded.map((row) => row.factor).filter((factor) => Number.isFinite(factor))

  return {
    speedups: succeeded.filter((row) => row.factor < thresholds.speedupFactor).length,
    slowdowns: succeeded.filter((row) => row.factor > thresholds.slowdownFactor).length,
    timeouts: rows.filter((row) => row.old_is_timeout || row.new_is_timeout).length,
    abnormal_exits: rows.filter((row) => row.old_is_abnormal || row.new_is_abnormal).length,
    avg_factor: factors.length > 0 ? factors.reduce((sum, factor) => sum + factor, 0) / factors.length : 1,
  }
}
