import { FailedProject, ProjectRun, RunStatus } from '../contracts'
import { Snapshot } from '../snapshot/Snapshot'
import { compareNames } from './StatisticsAggregator'

export const DEFAULT_SUCCESS_RETURN_CODES: readonly number[] = [0, 1]

export function classifyRun(
  run: ProjectRun | undefined,
  successReturnCodes: readonly number[] = DEFAULT_SUCCESS_RETURN_CODES
): RunStatus {
  // Snapshots built from flat records carry no run information
  if (!run || run.return_code === undefined) {
    return 'unknown'
  }
  if (run.return_code === null) {
    return 'timeout'
  }
  if (!successReturnCodes.includes(run.return_code) || run.time_s === null) {
    return 'abnormal exit'
  }
  return 'success'
}

export const isFailedStatus = (status: RunStatus): boolean =>
  status === 'timeout' || status === 'abnormal exit'

const failureRank = (project: FailedProject): number => {
  if (project.old_status === 'abnormal exit' || project.new_status === 'abnormal exit') return 2
  if (project.old_status === 'timeout' || project.new_status === 'timeout') return 1
  return 0
}

/**
 * Projects present in both snapshots whose run failed on either side.
 * Abnormal exits come first, then timeouts.
 */
export function findFailedProjects(
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot,
  successReturnCodes: readonly number[] = DEFAULT_SUCCESS_RETURN_CODES
): FailedProject[] {
  const failed: FailedProject[] = []

  for (const [project, oldRun] of oldSnapshot.runs) {
    const newRun = newSnapshot.runs.get(project)
    if (!newRun) continue

    const oldStatus = classifyRun(oldRun, successReturnCodes)
    const newStatus = classifyRun(newRun, successReturnCodes)
    if (!isFailedStatus(oldStatus) && !isFailedStatus(newStatus)) continue

    const location = newRun.project_location ?? oldRun.project_location
    failed.push({
      project,
      ...(location !== undefined ? { project_location: location } : {}),
      old_status: oldStatus,
      new_status: newStatus,
      old_return_code: oldRun.return_code ?? null,
      new_return_code: newRun.return_code ?? null,
    })
  }

  return failed.sort((a, b) => failureRank(b) - failureRank(a) || compareNames(b.project, a.project))
}
