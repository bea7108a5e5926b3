import { ConfigLoader } from '../config/ConfigLoader'
import { compareRunTimes } from '../diff/compareSnapshots'
import { loadSnapshot } from '../snapshot/SnapshotLoader'
import { emit, resolveRenderer, snapshotOptions } from './shared'
import { CommandResult, PairOptions } from './types'

export async function timingCommand(oldPath: string, newPath: string, options: PairOptions = {}): Promise<CommandResult> {
  const configLoader = new ConfigLoader(options.config)
  const config = configLoader.getConfig()
  const renderer = resolveRenderer(options.format, config)

  const oldSnapshot = loadSnapshot(oldPath, snapshotOptions(configLoader, options.oldName))
  const newSnapshot = loadSnapshot(newPath, snapshotOptions(configLoader, options.newName))

  const report = compareRunTimes(oldSnapshot, newSnapshot, {
    successReturnCodes: config.runs.successReturnCodes,
    checkerRepoUrl: config.checkerRepoUrl,
    thresholds: config.timing,
  })

  return emit(renderer.renderTiming(report), options)
}
