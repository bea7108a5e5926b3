import { promises as fs } from 'fs'
import path from 'path'
import { DiffConfig } from '../contracts'
import { ConfigLoader } from '../config/ConfigLoader'
import { ReportRenderer, RendererFactory, REPORT_FORMATS, isReportFormat } from '../rendering'
import { LoadSnapshotOptions } from '../snapshot/SnapshotLoader'
import { CommandResult, OutputOptions } from './types'

export const resolveRenderer = (format: string | undefined, config: DiffConfig): ReportRenderer => {
  const name = format ?? config.report.format
  if (!isReportFormat(name)) {
    throw new Error(`Unknown format "${name}". Expected one of: ${REPORT_FORMATS.join(', ')}`)
  }
  return RendererFactory.createRenderer(name)
}

export const snapshotOptions = (configLoader: ConfigLoader, name?: string): LoadSnapshotOptions => ({
  name,
  filters: {
    messages: configLoader.getConfig().filters.messages,
    ignoreProject: (project) => configLoader.isProjectIgnored(project),
  },
})

export async function emit(text: string, options: OutputOptions): Promise<CommandResult> {
  if (!options.output) {
    return { text }
  }

  const outputPath = path.resolve(options.output)
  await fs.mkdir(path.dirname(outputPath), { recursive: true })
  await fs.writeFile(outputPath, text, 'utf-8')
  return { text, outputPath }
}
