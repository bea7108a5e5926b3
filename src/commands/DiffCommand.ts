import { ConfigLoader } from '../config/ConfigLoader'
import { compareSnapshots } from '../diff/compareSnapshots'
import { loadSnapshot } from '../snapshot/SnapshotLoader'
import { debugLog } from '../logging/debugLog'
import { emit, resolveRenderer, snapshotOptions } from './shared'
import { CommandResult, PairOptions } from './types'

export async function diffCommand(oldPath: string, newPath: string, options: PairOptions = {}): Promise<CommandResult> {
  const configLoader = new ConfigLoader(options.config)
  const config = configLoader.getConfig()
  const renderer = resolveRenderer(options.format, config)

  const oldSnapshot = loadSnapshot(oldPath, snapshotOptions(configLoader, options.oldName))
  const newSnapshot = loadSnapshot(newPath, snapshotOptions(configLoader, options.newName))

  const report = compareSnapshots(oldSnapshot, newSnapshot, {
    successReturnCodes: config.runs.successReturnCodes,
    checkerRepoUrl: config.checkerRepoUrl,
  })

  debugLog({
    event: 'diff_command_complete',
    oldPath,
    newPath,
    format: renderer.format,
    total: report.statistics.total,
    failedProjects: report.failed_projects.length,
  })

  return emit(renderer.renderDiff(report), options)
}
