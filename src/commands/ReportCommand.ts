import { ConfigLoader } from '../config/ConfigLoader'
import { buildEcosystemReport } from '../report/EcosystemReport'
import { loadSnapshot } from '../snapshot/SnapshotLoader'
import { emit, resolveRenderer, snapshotOptions } from './shared'
import { CommandResult, OutputOptions } from './types'

export async function reportCommand(
  snapshotPath: string,
  options: OutputOptions & { name?: string } = {}
): Promise<CommandResult> {
  const configLoader = new ConfigLoader(options.config)
  const config = configLoader.getConfig()
  const renderer = resolveRenderer(options.format, config)

  const snapshot = loadSnapshot(snapshotPath, snapshotOptions(configLoader, options.name))
  const report = buildEcosystemReport(snapshot, {
    maxDiagnosticsPerProject: config.report.maxDiagnosticsPerProject,
  })

  return emit(renderer.renderEcosystem(report), options)
}
